import type { GenerationClient } from '../inference/index.js';
import type { ProductRepository } from '../stores/index.js';
import type { ToolCall } from '../types/index.js';
import type { DomainHandler, HandlerContext, HandlerOutput } from './types.js';
import { searchOrEmpty, type SearchProvider } from '../enrichment/index.js';
import { componentLogger, type Logger } from '../logger.js';
import { buildHandlerPrompt, runTool } from './tool-results.js';

const PRODUCT_ID_PATTERN = /\bPROD-\d{3,}\b/i;

const FILLER_PATTERNS = [
  /\bshow\s+me\b/g,
  /\bsearch\s+for\b/g,
  /\bdo\s+you\s+(have|sell)\b/g,
  /\b(i'm|i\s+am)\s+looking\s+for\b/g,
  /\blooking\s+for\b/g,
  /\b(find|any|some|please)\b/g,
  /[?!.,]/g,
];

const SYSTEM_PROMPT = `You are a Product Assistant for an e-commerce platform.
Your role is to help customers find products and get product information.

Guidelines:
- Provide accurate product information from the tool results only
- If a product is out of stock, say so and suggest alternatives from the results if any
- Don't make claims about products that aren't supported by the data
- Be honest about limitations - if we don't have what they're looking for, say so

Respond in a helpful, informative tone.`;

export function extractProductId(text: string): string | undefined {
  return PRODUCT_ID_PATTERN.exec(text)?.[0].toUpperCase();
}

export function searchTerms(query: string): string {
  let terms = query.toLowerCase();
  for (const pattern of FILLER_PATTERNS) {
    terms = terms.replace(pattern, ' ');
  }
  return terms.replace(/\s+/g, ' ').trim();
}

export class ProductHandler implements DomainHandler {
  readonly name = 'product';
  private log: Logger;

  constructor(
    private readonly generator: GenerationClient,
    private readonly products: ProductRepository,
    private readonly semanticSearch?: SearchProvider,
    logger?: Logger
  ) {
    this.log = componentLogger('handler.product', logger);
  }

  async handle(message: string, context: HandlerContext): Promise<HandlerOutput> {
    const query = message.toLowerCase();
    const productId = extractProductId(message) ?? context.entities.product_id;
    const calls: ToolCall[] = [];

    if (productId) {
      const wantsStock = query.includes('stock') || query.includes('available');
      const call = wantsStock
        ? runTool('check_availability', { product_id: productId }, () => this.availability(productId), this.log)
        : runTool('get_product_details', { product_id: productId }, () => this.products.getById(productId), this.log);

      if (call.result === undefined) {
        return {
          content: `I couldn't find a product with the ID ${productId}. Could you please check the product code?`,
          toolInvocations: [call]
        };
      }
      calls.push(call);
    } else {
      const category = this.detectCategory(query);
      // The category is a filter, not a search term
      const terms = category
        ? searchTerms(message).replace(category.toLowerCase(), ' ').replace(/\s+/g, ' ').trim()
        : searchTerms(message);
      const found = runTool(
        'search_products',
        { query: terms, category: category ?? null },
        () => this.products.search(terms, category),
        this.log
      );
      calls.push(found);

      if (!Array.isArray(found.result) || found.result.length === 0) {
        const hits = await searchOrEmpty(this.semanticSearch, terms, 5, this.log, category ? { category } : undefined);
        if (hits.length > 0) {
          calls.push({
            name: 'semantic_search',
            arguments: { query: terms, limit: 5 },
            result: hits.map(hit => ({ ...hit.source, relevance_score: hit.score }))
          });
        } else {
          return {
            content: `I couldn't find any products matching "${terms}". Could you describe what you're looking for in a bit more detail?`,
            toolInvocations: calls
          };
        }
      }
    }

    const prompt = buildHandlerPrompt(
      message,
      context,
      calls,
      'Based on the above, provide a helpful response about the products.',
      'No results found.'
    );

    const content = await this.generator.generate(prompt, {
      instruction: SYSTEM_PROMPT,
      temperature: 0.7
    });

    return { content, toolInvocations: calls };
  }

  private availability(productId: string) {
    const product = this.products.getById(productId);
    if (!product) return undefined;

    return {
      product_id: product.product_id,
      name: product.name,
      in_stock: product.in_stock,
      message: product.in_stock ? 'Available' : 'Currently out of stock'
    };
  }

  private detectCategory(query: string): string | undefined {
    const categories = new Set(this.products.list().map(product => product.category));
    for (const category of categories) {
      if (query.includes(category.toLowerCase())) return category;
    }
    return undefined;
  }
}
