import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';

import { componentLogger } from '../logger.js';

export interface InferenceBackend {
  name: string;
  type: 'anthropic' | 'ollama';
  model: string;
  baseUrl?: string;
}

export interface GenerateOptions {
  instruction?: string;
  temperature?: number;
  maxTokens?: number;
  structured?: boolean;
}

/**
 * The only surface the pipeline needs from a text model.
 * Tests substitute deterministic stubs for it.
 */
export interface GenerationClient {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export class InferenceError extends Error {
  constructor(
    message: string,
    readonly backend: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InferenceError';
  }
}

const STRUCTURED_SUFFIX = '\n\nRespond ONLY with a valid JSON object, no additional text.';
const DEFAULT_INSTRUCTION = 'You are a helpful, professional customer service assistant.';

const OllamaResponseSchema = z.object({ response: z.string() });

export interface InferenceRouterOptions {
  timeoutMs?: number;
  anthropic?: Anthropic;
}

export class InferenceRouter implements GenerationClient {
  private backends: Map<string, InferenceBackend> = new Map();
  private anthropic?: Anthropic;
  private defaultBackend: string;
  private timeoutMs?: number;
  private log = componentLogger('inference');

  constructor(backends: InferenceBackend[], defaultBackend: string, options: InferenceRouterOptions = {}) {
    for (const backend of backends) {
      this.backends.set(backend.name, backend);
    }
    this.anthropic = options.anthropic;

    this.defaultBackend = defaultBackend;
    this.timeoutMs = options.timeoutMs;
  }

  async generate(prompt: string, options: GenerateOptions = {}, backendName?: string): Promise<string> {
    const name = backendName ?? this.defaultBackend;
    const backend = this.backends.get(name);
    if (!backend) {
      throw new InferenceError(`Backend ${name} not configured`, name);
    }

    const startTime = Date.now();
    const output = backend.type === 'anthropic'
      ? await this.generateAnthropic(prompt, options, backend)
      : await this.generateOllama(prompt, options, backend);

    this.log.debug({
      backend: backend.name,
      model: backend.model,
      structured: options.structured ?? false,
      latency_ms: Date.now() - startTime
    }, 'Generation complete');

    return output;
  }

  private async generateAnthropic(
    prompt: string,
    options: GenerateOptions,
    backend: InferenceBackend
  ): Promise<string> {
    // Created on first use; a missing ANTHROPIC_API_KEY surfaces here as an InferenceError
    if (!this.anthropic) {
      try {
        this.anthropic = new Anthropic();
      } catch (error) {
        throw new InferenceError('Anthropic client not initialized', backend.name, { cause: error });
      }
    }
    const client = this.anthropic;

    const instruction = options.instruction ?? DEFAULT_INSTRUCTION;

    try {
      const response = await client.messages.create(
        {
          model: backend.model,
          max_tokens: options.maxTokens ?? 1024,
          temperature: options.temperature,
          system: options.structured ? instruction + STRUCTURED_SUFFIX : instruction,
          messages: [
            { role: 'user', content: prompt }
          ]
        },
        this.timeoutMs !== undefined ? { timeout: this.timeoutMs, maxRetries: 0 } : undefined
      );

      return response.content
        .flatMap(block => (block.type === 'text' ? [block.text] : []))
        .join('\n');
    } catch (error) {
      throw new InferenceError(`Anthropic request failed: ${String(error)}`, backend.name, { cause: error });
    }
  }

  private async generateOllama(
    prompt: string,
    options: GenerateOptions,
    backend: InferenceBackend
  ): Promise<string> {
    const baseUrl = backend.baseUrl ?? 'http://localhost:11434';

    let response: Response;
    try {
      response = await fetch(`${baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: backend.model,
          prompt,
          system: options.instruction ?? DEFAULT_INSTRUCTION,
          format: options.structured ? 'json' : undefined,
          options: {
            temperature: options.temperature,
            num_predict: options.maxTokens
          },
          stream: false
        }),
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined
      });
    } catch (error) {
      throw new InferenceError(`Ollama request failed: ${String(error)}`, backend.name, { cause: error });
    }

    if (!response.ok) {
      throw new InferenceError(`Ollama error: ${response.status}`, backend.name);
    }

    const parsed = OllamaResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new InferenceError('Ollama returned an unexpected payload', backend.name);
    }

    return parsed.data.response;
  }

  getAvailableBackends(): string[] {
    return Array.from(this.backends.keys());
  }
}
