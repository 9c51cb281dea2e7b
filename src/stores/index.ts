export type {
  Order,
  OrderStatus,
  Product,
  FaqEntry,
  ContactInfo,
  ActionResult,
  Ticket,
  Repository
} from './types.js';
export { InMemoryRepository } from './memory.js';
export { InMemoryOrderRepository, type OrderRepository, type TrackingInfo } from './orders.js';
export { InMemoryProductRepository, type ProductRepository, type ProductSummary } from './products.js';
export { InMemoryFaqRepository, InMemoryTicketDesk, type FaqRepository, type TicketDesk } from './support.js';
export {
  createRepositories,
  loadStoreData,
  DEFAULT_STORE_PATH,
  type Repositories,
  type StoreData
} from './loader.js';
