export { Dispatcher, type DispatcherOptions } from './dispatcher.js';
export { keywordRouting } from './fallback.js';
export { RoutingDecisionSchema, type RoutingDecision, type RoutingSource } from './schema.js';
