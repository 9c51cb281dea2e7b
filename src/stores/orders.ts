import type { ActionResult, Order, Repository } from './types.js';
import { InMemoryRepository } from './memory.js';

export interface TrackingInfo {
  tracking_number: string;
  carrier: string;
  status: Order['status'];
  estimated_delivery: string;
}

export interface OrderRepository extends Repository<Order> {
  getTracking(id: string): TrackingInfo | undefined;
  cancel(id: string): ActionResult;
}

const CANCEL_REFUSALS: Partial<Record<Order['status'], string>> = {
  shipped: 'Order already shipped. Please initiate a return instead.',
  delivered: 'Cannot cancel delivered orders',
  cancelled: 'Order is already cancelled',
};

export class InMemoryOrderRepository extends InMemoryRepository<Order> implements OrderRepository {
  constructor(orders: Order[]) {
    // Records are copied so cancellation never mutates the caller's data
    super(orders.map(order => ({ ...order, items: [...order.items] })), order => order.order_id);
  }

  getTracking(id: string): TrackingInfo | undefined {
    const order = this.getById(id);
    if (!order || !order.tracking_number) return undefined;

    return {
      tracking_number: order.tracking_number,
      carrier: 'FastShip',
      status: order.status,
      estimated_delivery: '2-3 business days'
    };
  }

  cancel(id: string): ActionResult {
    const order = this.getById(id);
    if (!order) {
      return { success: false, reason: 'Order not found' };
    }

    const refusal = CANCEL_REFUSALS[order.status];
    if (refusal) {
      return { success: false, reason: refusal };
    }

    this.records.set(order.order_id.toUpperCase(), { ...order, status: 'cancelled' });
    return { success: true, reason: `Order ${order.order_id} has been cancelled` };
  }
}
