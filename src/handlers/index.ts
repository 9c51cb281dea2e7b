export type { DomainHandler, HandlerContext, HandlerOutput } from './types.js';
export { HandlerRegistry } from './registry.js';
export { OrderHandler, extractOrderId } from './order.js';
export { ProductHandler, extractProductId, searchTerms } from './product.js';
export { SupportHandler } from './support.js';
export { formatToolResult, runEffect, runTool } from './tool-results.js';
export { EffectLedger } from './effects.js';

import type { GenerationClient } from '../inference/index.js';
import type { Repositories } from '../stores/index.js';
import type { SearchProvider } from '../enrichment/index.js';
import type { Logger } from '../logger.js';
import { HandlerRegistry } from './registry.js';
import { OrderHandler } from './order.js';
import { ProductHandler } from './product.js';
import { SupportHandler } from './support.js';

export interface DefaultHandlerDeps {
  generator: GenerationClient;
  repositories: Repositories;
  semanticSearch?: SearchProvider;
  webSearch?: SearchProvider;
  logger?: Logger;
}

export function createDefaultRegistry(deps: DefaultHandlerDeps): HandlerRegistry {
  return new HandlerRegistry([
    new OrderHandler(deps.generator, deps.repositories.orders, deps.logger),
    new ProductHandler(deps.generator, deps.repositories.products, deps.semanticSearch, deps.logger),
    new SupportHandler(deps.generator, deps.repositories.faq, deps.repositories.tickets, deps.webSearch, deps.logger),
  ]);
}
