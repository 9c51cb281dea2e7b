import { z } from 'zod';

// Accepts "order", "ORDER", "ORDER_AGENT" alike
const RouteSchema = z.string().transform(route => route.trim().toLowerCase().replace(/_agent$/, ''));

const EntitySchema = z.string().nullish().transform(value => (value && value.trim() ? value.trim() : undefined));

export const RoutingDecisionSchema = z.object({
  intent: z.string().default(''),
  route_to: RouteSchema.default('none'),
  requires_multiple: z.boolean().default(false),
  additional_routes: z.array(RouteSchema).default([]),
  extracted_entities: z.object({
    order_id: EntitySchema,
    product_id: EntitySchema,
    topic: EntitySchema,
  }).default({}),
  is_greeting: z.boolean().default(false),
});

export type RoutingDecision = z.infer<typeof RoutingDecisionSchema>;

export type RoutingSource = 'classifier' | 'keyword';
