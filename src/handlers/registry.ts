import type { DomainHandler } from './types.js';

export class HandlerRegistry {
  private handlers = new Map<string, DomainHandler>();

  constructor(handlers: DomainHandler[] = []) {
    for (const handler of handlers) this.register(handler);
  }

  register(handler: DomainHandler): this {
    this.handlers.set(handler.name.toLowerCase(), handler);
    return this;
  }

  get(route: string): DomainHandler | undefined {
    return this.handlers.get(route.toLowerCase());
  }

  names(): string[] {
    return Array.from(this.handlers.keys());
  }
}
