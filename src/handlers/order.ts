import type { GenerationClient } from '../inference/index.js';
import type { OrderRepository } from '../stores/index.js';
import type { ToolCall } from '../types/index.js';
import type { DomainHandler, HandlerContext, HandlerOutput } from './types.js';
import { componentLogger, type Logger } from '../logger.js';
import { buildHandlerPrompt, runEffect, runTool } from './tool-results.js';

const ORDER_ID_PATTERN = /\bORD-\d{3,}\b/i;

const SYSTEM_PROMPT = `You are an Order Assistant for an e-commerce platform.
Your role is to help customers with their order-related queries.

Guidelines:
- Only use order information present in the tool results; never make up order details
- If an order cannot be found, politely ask the customer to verify the order ID
- For cancellation requests, explain the outcome and any limitation clearly
- Protect customer privacy - don't reveal other customers' information

Respond in a helpful, professional tone.`;

export function extractOrderId(text: string): string | undefined {
  return ORDER_ID_PATTERN.exec(text)?.[0].toUpperCase();
}

export class OrderHandler implements DomainHandler {
  readonly name = 'order';
  private log: Logger;

  constructor(
    private readonly generator: GenerationClient,
    private readonly orders: OrderRepository,
    logger?: Logger
  ) {
    this.log = componentLogger('handler.order', logger);
  }

  async handle(message: string, context: HandlerContext): Promise<HandlerOutput> {
    const orderId = extractOrderId(message) ?? context.entities.order_id;
    const calls: ToolCall[] = [];

    if (orderId) {
      const found = runTool('get_order', { order_id: orderId }, () => this.orders.getById(orderId), this.log);
      if (found.result === undefined) {
        // A miss is answered honestly without asking the model to improvise
        return {
          content: `I couldn't find an order with the ID ${orderId}. Could you please double-check the order number?`,
          toolInvocations: [found]
        };
      }
      calls.push(this.select(orderId, message.toLowerCase(), found, context));
    }

    const prompt = buildHandlerPrompt(
      message,
      context,
      calls,
      'Based on the above, provide a helpful response to the customer about their order.',
      'No tools were called. No order ID was provided.'
    );

    const content = await this.generator.generate(prompt, {
      instruction: SYSTEM_PROMPT,
      temperature: 0.5
    });

    return { content, toolInvocations: calls };
  }

  private select(orderId: string, query: string, found: ToolCall, context: HandlerContext): ToolCall {
    const args = { order_id: orderId };

    if (query.includes('cancel')) {
      return runEffect(context, 'cancel_order', args, () => this.orders.cancel(orderId), this.log);
    }
    if (query.includes('track') || query.includes('shipping') || query.includes('where')) {
      return runTool('get_tracking_info', args, () => this.orders.getTracking(orderId), this.log);
    }
    if (query.includes('status')) {
      return runTool('get_order_status', args, () => this.orders.getById(orderId)?.status, this.log);
    }
    return found;
  }
}
