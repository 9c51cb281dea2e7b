import type { RoutingDecision } from './schema.js';
import { extractOrderId } from '../handlers/order.js';
import { extractProductId } from '../handlers/product.js';

const KEYWORD_ROUTES: [route: string, intent: string, keywords: string[]][] = [
  ['order', 'order inquiry', ['order', 'tracking', 'shipped', 'delivery', 'cancel', 'status', 'ord-']],
  ['product', 'product inquiry', ['product', 'price', 'stock', 'available', 'buy', 'search', 'find', 'show me', 'prod-']],
  ['support', 'support inquiry', ['return', 'refund', 'warranty', 'shipping', 'payment', 'help', 'support', 'contact']],
];

/**
 * Deterministic single-route choice used when the classifier output is unusable.
 * Checked in fixed order; anything unmatched goes to support.
 */
export function keywordRouting(message: string): RoutingDecision {
  const lowered = message.toLowerCase();
  const match = KEYWORD_ROUTES.find(([, , keywords]) => keywords.some(keyword => lowered.includes(keyword)));
  const [route, intent] = match ?? ['support', 'general inquiry'];

  return {
    intent,
    route_to: route,
    requires_multiple: false,
    additional_routes: [],
    extracted_entities: {
      order_id: extractOrderId(message),
      product_id: extractProductId(message),
      topic: undefined
    },
    is_greeting: false
  };
}
