import pino, { type Logger } from 'pino';

export type { Logger };

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.VITEST ? 'silent' : 'info';
}

export const logger: Logger = pino({ level: defaultLevel(), base: { service: 'replyguard' } });

// Pretty output is only for the long-running service; library use stays plain JSON
export function createServiceLogger(level: string = defaultLevel()): Logger {
  return pino({
    level,
    base: { service: 'replyguard' },
    transport: {
      target: 'pino-pretty',
      options: { colorize: true }
    }
  });
}

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
