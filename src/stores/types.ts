import { z } from 'zod';

export const OrderSchema = z.object({
  order_id: z.string(),
  status: z.enum(['pending', 'processing', 'shipped', 'delivered', 'cancelled']),
  items: z.array(z.object({ name: z.string(), qty: z.number().int(), price: z.number() })),
  total: z.number(),
  shipping_address: z.string(),
  tracking_number: z.string().nullable().default(null),
});

export const ProductSchema = z.object({
  product_id: z.string(),
  name: z.string(),
  price: z.number(),
  description: z.string(),
  category: z.string(),
  in_stock: z.boolean().default(true),
  specs: z.record(z.union([z.string(), z.number()])).default({}),
});

export const FaqEntrySchema = z.object({
  key: z.string(),
  aliases: z.array(z.string()).default([]),
  topic: z.string(),
  content: z.string(),
});

export const ContactInfoSchema = z.object({
  phone: z.string(),
  email: z.string(),
  hours: z.string(),
  live_chat: z.string(),
});

export type Order = z.infer<typeof OrderSchema>;
export type OrderStatus = Order['status'];
export type Product = z.infer<typeof ProductSchema>;
export type FaqEntry = z.infer<typeof FaqEntrySchema>;
export type ContactInfo = z.infer<typeof ContactInfoSchema>;

export interface ActionResult {
  success: boolean;
  reason: string;
}

export interface Ticket {
  ticket_id: string;
  subject: string;
  status: 'open';
  message: string;
}

/** id → record lookup. A miss is `undefined`, never an exception. */
export interface Repository<T> {
  getById(id: string): T | undefined;
  list(): T[];
}
