import type { GenerationClient } from '../inference/index.js';
import type { FaqRepository, TicketDesk } from '../stores/index.js';
import type { ToolCall } from '../types/index.js';
import type { DomainHandler, HandlerContext, HandlerOutput } from './types.js';
import { searchOrEmpty, type SearchProvider } from '../enrichment/index.js';
import { componentLogger, type Logger } from '../logger.js';
import { buildHandlerPrompt, runEffect, runTool } from './tool-results.js';

const FAQ_TOPICS = ['return', 'refund', 'shipping', 'delivery', 'warranty', 'payment'];
const CONTACT_KEYWORDS = ['contact', 'phone', 'email', 'call', 'reach'];
const TICKET_KEYWORDS = ['ticket', 'complaint', 'escalate'];

const SYSTEM_PROMPT = `You are a Customer Support Assistant for an e-commerce platform.
Your role is to help customers with general inquiries, FAQ, and support requests.

Guidelines:
- Answer common questions using FAQ content when available
- For complex issues, offer to create a support ticket
- Provide contact information when customers need direct assistance
- Be empathetic and understanding with frustrated customers
- Never make promises about outcomes that aren't guaranteed
- If you don't have the answer, admit it and offer alternatives

Respond in a warm, helpful, and professional tone.`;

export class SupportHandler implements DomainHandler {
  readonly name = 'support';
  private log: Logger;

  constructor(
    private readonly generator: GenerationClient,
    private readonly faq: FaqRepository,
    private readonly tickets: TicketDesk,
    private readonly webSearch?: SearchProvider,
    logger?: Logger
  ) {
    this.log = componentLogger('handler.support', logger);
  }

  async handle(message: string, context: HandlerContext): Promise<HandlerOutput> {
    const query = message.toLowerCase();
    const calls: ToolCall[] = [];

    const topic = FAQ_TOPICS.find(candidate => query.includes(candidate));
    if (topic) {
      calls.push(runTool('get_faq', { topic }, () => this.faq.lookup(topic), this.log));
    }

    if (CONTACT_KEYWORDS.some(keyword => query.includes(keyword))) {
      calls.push(runTool('get_contact_info', {}, () => this.faq.contact(), this.log));
    }

    if (TICKET_KEYWORDS.some(keyword => query.includes(keyword))) {
      const args = { subject: 'Customer Inquiry', description: message };
      calls.push(runEffect(context, 'create_support_ticket', args, () => this.tickets.create(args.subject, args.description), this.log));
    }

    const answered = calls.some(call => call.result !== undefined);
    if (!answered) {
      const hits = await searchOrEmpty(this.webSearch, `${message} customer support`, 3, this.log);
      if (hits.length > 0) {
        calls.push({
          name: 'web_search',
          arguments: { query: message, limit: 3 },
          result: hits.map(hit => ({ snippet: hit.text, score: hit.score, ...hit.source }))
        });
      }
    }

    const prompt = buildHandlerPrompt(
      message,
      context,
      calls,
      "Based on the above, provide a helpful response to the customer's support inquiry.",
      'No specific FAQ matched.'
    );

    const content = await this.generator.generate(prompt, {
      instruction: SYSTEM_PROMPT,
      temperature: 0.6
    });

    return { content, toolInvocations: calls };
  }
}
