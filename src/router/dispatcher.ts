import type { DraftResponse, HistoryEntry, Metadata, ToolCall } from '../types/index.js';
import type { GenerationClient } from '../inference/index.js';
import type { HandlerContext, HandlerOutput, HandlerRegistry } from '../handlers/index.js';
import { EffectLedger } from '../handlers/index.js';
import { parseStructured } from '../inference/index.js';
import { ConversationMemory } from '../memory/index.js';
import { componentLogger, type Logger } from '../logger.js';
import { keywordRouting } from './fallback.js';
import { RoutingDecisionSchema, type RoutingDecision, type RoutingSource } from './schema.js';
import {
  SUPERVISOR_PROMPT,
  ROUTER_INSTRUCTION,
  GREETING_FALLBACK,
  CLARIFY_FALLBACK,
  buildRoutingPrompt,
  buildMergePrompt,
  buildGreetingPrompt,
  buildClarifyPrompt
} from './prompts.js';

export interface DispatcherOptions {
  historyTurns?: number;
  logger?: Logger;
}

interface Classification {
  decision: RoutingDecision;
  source: RoutingSource;
  error?: string;
}

interface HandlerRun {
  route: string;
  output: HandlerOutput;
}

/**
 * Owns a session's conversation: classifies each message, fans out to the
 * domain handlers and merges their output into one draft. `draft` leaves the
 * message log alone (entity facts are still kept); `commit` records an exchange.
 */
export class Dispatcher {
  private memory = new ConversationMemory();
  private historyTurns: number;
  private log: Logger;

  constructor(
    private readonly generator: GenerationClient,
    private readonly registry: HandlerRegistry,
    options: DispatcherOptions = {}
  ) {
    this.historyTurns = options.historyTurns ?? 3;
    this.log = options.logger ?? componentLogger('dispatcher');
  }

  async process(message: string): Promise<DraftResponse> {
    const draft = await this.draft(message);
    this.commit(message, draft.content, draft.metadata);
    return draft;
  }

  async draft(message: string, effects: EffectLedger = new EffectLedger()): Promise<DraftResponse> {
    const { decision, source, error } = await this.classify(message);
    this.persistEntities(decision);

    const routes = this.selectRoutes(decision);
    const context = this.buildContext(effects);

    // Handlers only read the snapshot in `context`; results are joined in routing order
    const runs = await Promise.all(routes.map(route => this.invoke(route, message, context)));
    const produced = runs.filter((run): run is HandlerRun => run !== undefined);

    let content: string;
    if (produced.length === 0) {
      content = decision.is_greeting ? await this.greet(message) : await this.clarify(message);
    } else {
      content = await this.merge(message, decision, produced);
    }

    const handlersUsed = produced.map(run => run.route);
    const toolInvocations: ToolCall[] = produced.flatMap(run => run.output.toolInvocations);
    const metadata = {
      routing: decision,
      routing_source: source,
      handlers_used: handlersUsed,
      ...(error ? { routing_error: error } : {})
    };

    return {
      content,
      producer: 'router',
      toolInvocations,
      metadata,
      accepted: true,
      issues: []
    };
  }

  commit(message: string, reply: string, metadata: Readonly<Metadata> = {}): void {
    this.memory.append('user', message);
    this.memory.append('assistant', reply, metadata);
  }

  reset(): void {
    this.memory.reset();
  }

  history(): HistoryEntry[] {
    return this.memory.history();
  }

  get conversation(): ConversationMemory {
    return this.memory;
  }

  private async classify(message: string): Promise<Classification> {
    const prompt = buildRoutingPrompt(message, this.memory.summary(), this.registry.names());

    let raw: string;
    try {
      raw = await this.generator.generate(prompt, {
        instruction: ROUTER_INSTRUCTION,
        temperature: 0.1,
        structured: true
      });
    } catch (err) {
      this.log.warn({ err }, 'Routing classifier unavailable, using keyword routing');
      return { decision: keywordRouting(message), source: 'keyword', error: 'classifier unavailable' };
    }

    const parsed = parseStructured(raw, RoutingDecisionSchema);
    if (!parsed.ok) {
      this.log.warn({ reason: parsed.reason }, 'Routing decision unparsable, using keyword routing');
      return { decision: keywordRouting(message), source: 'keyword', error: parsed.reason };
    }

    return { decision: parsed.value, source: 'classifier' };
  }

  private persistEntities(decision: RoutingDecision): void {
    const { order_id, product_id, topic } = decision.extracted_entities;
    if (order_id) this.memory.setFact('order_id', order_id);
    if (product_id) this.memory.setFact('product_id', product_id);
    if (topic) this.memory.setFact('last_topic', topic);
  }

  private selectRoutes(decision: RoutingDecision): string[] {
    const routes: string[] = [];
    const candidates = decision.requires_multiple
      ? [decision.route_to, ...decision.additional_routes]
      : [decision.route_to];

    for (const route of candidates) {
      if (route === 'none' || routes.includes(route)) continue;
      if (!this.registry.get(route)) {
        this.log.debug({ route }, 'No handler registered for route');
        continue;
      }
      routes.push(route);
    }

    return routes;
  }

  private buildContext(effects: EffectLedger): HandlerContext {
    return {
      entities: {
        order_id: this.memory.getFact('order_id'),
        product_id: this.memory.getFact('product_id')
      },
      recentTurns: this.memory.history(this.historyTurns),
      effects
    };
  }

  private async invoke(route: string, message: string, context: HandlerContext): Promise<HandlerRun | undefined> {
    const handler = this.registry.get(route);
    if (!handler) return undefined;

    try {
      const output = await handler.handle(message, context);
      return { route, output };
    } catch (err) {
      this.log.error({ err, route }, 'Handler failed');
      return undefined;
    }
  }

  private async merge(message: string, decision: RoutingDecision, runs: HandlerRun[]): Promise<string> {
    const prompt = buildMergePrompt(
      message,
      decision.intent,
      runs.map(run => ({ origin: run.route, content: run.output.content }))
    );

    try {
      return await this.generator.generate(prompt, { instruction: SUPERVISOR_PROMPT, temperature: 0.6 });
    } catch (err) {
      this.log.warn({ err }, 'Merge generation failed, joining handler output');
      return runs.map(run => run.output.content).join('\n\n');
    }
  }

  private async greet(message: string): Promise<string> {
    try {
      return await this.generator.generate(buildGreetingPrompt(message), {
        instruction: SUPERVISOR_PROMPT,
        temperature: 0.7
      });
    } catch (err) {
      this.log.warn({ err }, 'Greeting generation failed');
      return GREETING_FALLBACK;
    }
  }

  private async clarify(message: string): Promise<string> {
    try {
      return await this.generator.generate(buildClarifyPrompt(message), {
        instruction: SUPERVISOR_PROMPT,
        temperature: 0.7
      });
    } catch (err) {
      this.log.warn({ err }, 'Clarifying generation failed');
      return CLARIFY_FALLBACK;
    }
  }
}
