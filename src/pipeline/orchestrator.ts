import type { DraftResponse, GuardrailVerdict, HistoryEntry, PipelineResult, Rubric } from '../types/index.js';
import { SAFE_REFUSAL } from '../types/index.js';
import type { GenerationClient } from '../inference/index.js';
import type { HandlerRegistry } from '../handlers/index.js';
import { EffectLedger } from '../handlers/index.js';
import { GuardrailEngine } from '../guardrails/index.js';
import { Dispatcher } from '../router/index.js';
import { Reviewer, type DraftReviewer, type ReviewOptions } from '../review/index.js';
import { componentLogger, type Logger } from '../logger.js';

export type BlockCallback = (text: string, reason: string) => void | Promise<void>;
export type FlagCallback = (text: string, flags: readonly string[]) => void | Promise<void>;

export interface PipelineOptions {
  generator: GenerationClient;
  registry: HandlerRegistry;
  guardrails?: GuardrailEngine;
  rubric?: Rubric;
  reviewer?: DraftReviewer;
  review?: Omit<ReviewOptions, 'logger'>;
  maxRetries?: number;
  historyTurns?: number;
  onBlock?: BlockCallback;
  onFlag?: FlagCallback;
  logger?: Logger;
}

interface LoopOutcome {
  text: string;
  routerDraft?: DraftResponse;
  reviewerDraft?: DraftResponse;
  retriesUsed: number;
  handlersUsed: string[];
}

/**
 * Guardrail → route → review → guardrail for one conversation.
 * Turns and resets are queued so a session never interleaves them. Only the
 * reply that is delivered enters the conversation history.
 */
export class Pipeline {
  private readonly guardrails: GuardrailEngine;
  private readonly dispatcher: Dispatcher;
  private readonly reviewer: DraftReviewer;
  private readonly maxRetries: number;
  private readonly onBlock?: BlockCallback;
  private readonly onFlag?: FlagCallback;
  private readonly log: Logger;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: PipelineOptions) {
    this.log = options.logger ?? componentLogger('pipeline');
    this.guardrails = options.guardrails ?? new GuardrailEngine();
    this.dispatcher = new Dispatcher(options.generator, options.registry, {
      historyTurns: options.historyTurns,
      logger: this.log.child({ component: 'dispatcher' })
    });
    this.reviewer = options.reviewer ?? new Reviewer(options.generator, options.rubric, {
      ...options.review,
      logger: this.log.child({ component: 'reviewer' })
    });
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.onBlock = options.onBlock;
    this.onFlag = options.onFlag;
  }

  process(message: string): Promise<PipelineResult> {
    return this.enqueue(() => this.run(message));
  }

  resetConversation(): Promise<void> {
    return this.enqueue(async () => this.dispatcher.reset());
  }

  getConversationHistory(): HistoryEntry[] {
    return this.dispatcher.history();
  }

  private async run(message: string): Promise<PipelineResult> {
    const startTime = Date.now();

    const inputVerdict = this.guardrails.checkInput(message);

    if (inputVerdict.action === 'block') {
      this.log.info({ reason: inputVerdict.reason, flags: inputVerdict.flags }, 'Input blocked');
      await this.notify(() => this.onBlock?.(message, inputVerdict.reason), 'onBlock');

      return {
        finalText: SAFE_REFUSAL,
        inputVerdict,
        blocked: true,
        blockReason: inputVerdict.reason,
        retriesUsed: 0,
        handlersUsed: [],
        latencyMs: Date.now() - startTime
      };
    }

    if (inputVerdict.action === 'flag') {
      this.log.info({ flags: inputVerdict.flags }, 'Input flagged');
      await this.notify(() => this.onFlag?.(message, inputVerdict.flags), 'onFlag');
    }

    const outcome = await this.draftLoop(message);
    const outputVerdict: GuardrailVerdict = this.guardrails.checkOutput(outcome.text);
    const finalText = outputVerdict.action === 'modify' ? outputVerdict.modifiedText : outcome.text;
    this.dispatcher.commit(message, finalText, outcome.routerDraft?.metadata);

    const result: PipelineResult = {
      finalText,
      inputVerdict,
      routerDraft: outcome.routerDraft,
      reviewerDraft: outcome.reviewerDraft,
      outputVerdict,
      blocked: false,
      blockReason: '',
      retriesUsed: outcome.retriesUsed,
      handlersUsed: outcome.handlersUsed,
      latencyMs: Date.now() - startTime
    };

    this.log.debug({
      retries_used: result.retriesUsed,
      handlers_used: result.handlersUsed,
      output_flags: outputVerdict.flags,
      latency_ms: result.latencyMs
    }, 'Message processed');

    return result;
  }

  // At most maxRetries + 1 router/reviewer cycles
  private async draftLoop(message: string): Promise<LoopOutcome> {
    let routerDraft: DraftResponse | undefined;
    let reviewerDraft: DraftResponse | undefined;
    let handlersUsed: string[] = [];
    const effects = new EffectLedger();

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      routerDraft = await this.dispatcher.draft(message, effects);
      handlersUsed = handlersOf(routerDraft);

      // The reviewer gets the draft text only; tool calls are carried over here
      const review = await this.reviewer.audit(routerDraft.content);
      reviewerDraft = {
        ...review,
        producer: 'reviewer',
        toolInvocations: routerDraft.toolInvocations
      };

      if (reviewerDraft.accepted) {
        return { text: reviewerDraft.content, routerDraft, reviewerDraft, retriesUsed: attempt, handlersUsed };
      }

      if (reviewerDraft.metadata.requires_retry !== true) {
        this.log.debug({ attempt, issues: reviewerDraft.issues }, 'Using reviewer correction');
        return { text: reviewerDraft.content, routerDraft, reviewerDraft, retriesUsed: attempt, handlersUsed };
      }

      this.log.info({ attempt, issues: reviewerDraft.issues }, 'Draft rejected');
    }

    this.log.warn({ max_retries: this.maxRetries }, 'Retries exhausted, using fallback');
    return {
      text: this.reviewer.fallbackText(),
      routerDraft,
      reviewerDraft,
      retriesUsed: this.maxRetries,
      handlersUsed
    };
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Keep the queue alive after a rejected turn
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async notify(callback: () => void | Promise<void>, name: string): Promise<void> {
    try {
      await callback();
    } catch (err) {
      this.log.error({ err, callback: name }, 'Pipeline callback failed');
    }
  }
}

function handlersOf(draft: DraftResponse): string[] {
  const used = draft.metadata.handlers_used;
  return Array.isArray(used) ? used.filter((name): name is string => typeof name === 'string') : [];
}
