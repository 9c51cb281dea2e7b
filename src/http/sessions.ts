import type { Pipeline } from '../pipeline/index.js';

export type PipelineFactory = (sessionId: string) => Pipeline;

/**
 * One pipeline per session id. Least recently used sessions are dropped once
 * the cap is reached; a dropped session starts over with empty memory.
 */
export class SessionRegistry {
  private sessions = new Map<string, Pipeline>();

  constructor(
    private readonly factory: PipelineFactory,
    private readonly maxSessions = 1000
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  acquire(sessionId: string): Pipeline {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }

    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }

    const pipeline = this.factory(sessionId);
    this.sessions.set(sessionId, pipeline);
    return pipeline;
  }

  find(sessionId: string): Pipeline | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }
}
