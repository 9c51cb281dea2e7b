import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ContactInfoSchema, FaqEntrySchema, OrderSchema, ProductSchema } from './types.js';
import { InMemoryOrderRepository, type OrderRepository } from './orders.js';
import { InMemoryProductRepository, type ProductRepository } from './products.js';
import { InMemoryFaqRepository, InMemoryTicketDesk, type FaqRepository, type TicketDesk } from './support.js';

const StoreFileSchema = z.object({
  orders: z.array(OrderSchema).default([]),
  products: z.array(ProductSchema).default([]),
  faq: z.array(FaqEntrySchema).default([]),
  contact: ContactInfoSchema,
});

export type StoreData = z.infer<typeof StoreFileSchema>;

export interface Repositories {
  orders: OrderRepository;
  products: ProductRepository;
  faq: FaqRepository;
  tickets: TicketDesk;
}

export const DEFAULT_STORE_PATH = fileURLToPath(new URL('../../data/store.yaml', import.meta.url));

export function loadStoreData(path: string = DEFAULT_STORE_PATH): StoreData {
  return StoreFileSchema.parse(parseYaml(readFileSync(path, 'utf-8')));
}

// Fresh repositories per call: each owns its own copy of mutable state
export function createRepositories(data: StoreData = loadStoreData()): Repositories {
  return {
    orders: new InMemoryOrderRepository(data.orders),
    products: new InMemoryProductRepository(data.products),
    faq: new InMemoryFaqRepository(data.faq, data.contact),
    tickets: new InMemoryTicketDesk()
  };
}
