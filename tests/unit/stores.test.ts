import { describe, it, expect } from 'vitest';

import { createRepositories, loadStoreData } from '../../src/stores/index.js';

describe('store repositories', () => {
  const data = loadStoreData();

  it('loads the bundled catalog', () => {
    expect(data.orders.map(order => order.order_id)).toEqual(['ORD-001', 'ORD-002', 'ORD-003']);
    expect(data.products).toHaveLength(4);
    expect(data.orders[1]?.tracking_number).toBeNull();
  });

  it('looks orders up case-insensitively', () => {
    const { orders } = createRepositories(data);

    expect(orders.getById('ord-001')?.status).toBe('shipped');
    expect(orders.getById('ORD-999')).toBeUndefined();
  });

  it('reports tracking only for orders with a tracking number', () => {
    const { orders } = createRepositories(data);

    expect(orders.getTracking('ORD-001')).toEqual({
      tracking_number: 'TRK123456789',
      carrier: 'FastShip',
      status: 'shipped',
      estimated_delivery: '2-3 business days'
    });
    expect(orders.getTracking('ORD-002')).toBeUndefined();
  });

  it('cancels a processing order at most once', () => {
    const { orders } = createRepositories(data);

    expect(orders.cancel('ORD-002')).toEqual({ success: true, reason: 'Order ORD-002 has been cancelled' });
    expect(orders.getById('ORD-002')?.status).toBe('cancelled');
    expect(orders.cancel('ORD-002')).toEqual({ success: false, reason: 'Order is already cancelled' });
  });

  it('refuses to cancel shipped, delivered or unknown orders', () => {
    const { orders } = createRepositories(data);

    expect(orders.cancel('ORD-001').reason).toBe('Order already shipped. Please initiate a return instead.');
    expect(orders.cancel('ORD-003').reason).toBe('Cannot cancel delivered orders');
    expect(orders.cancel('ORD-404')).toEqual({ success: false, reason: 'Order not found' });
  });

  it('keeps repositories independent', () => {
    const first = createRepositories(data);
    const second = createRepositories(data);

    first.orders.cancel('ORD-002');

    expect(second.orders.getById('ORD-002')?.status).toBe('processing');
    expect(data.orders[1]?.status).toBe('processing');
  });

  it('searches products by text and category', () => {
    const { products } = createRepositories(data);

    expect(products.search('keyboard').map(p => p.product_id)).toEqual(['PROD-004']);
    expect(products.search('', 'accessories').map(p => p.product_id)).toEqual(['PROD-002', 'PROD-003']);
    expect(products.listByCategory('Electronics').map(p => p.product_id)).toEqual(['PROD-001', 'PROD-004']);
  });

  it('finds FAQ entries by key or alias', () => {
    const { faq } = createRepositories(data);

    expect(faq.lookup('refund')?.key).toBe('return');
    expect(faq.lookup('delivery')?.topic).toBe('Shipping Information');
    expect(faq.lookup('gift cards')).toBeUndefined();
    expect(faq.contact().phone).toBe('+90 212 555 0123');
  });

  it('opens support tickets', () => {
    const { tickets } = createRepositories(data);
    const ticket = tickets.create('Customer Inquiry', 'My parcel is damaged');

    expect(ticket.ticket_id).toMatch(/^TKT-[0-9A-F]{8}$/);
    expect(ticket.message).toBe(`Support ticket ${ticket.ticket_id} created. Our team will respond within 24 hours.`);
    expect(ticket.status).toBe('open');
  });
});
