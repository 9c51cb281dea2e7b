import type { FilterResult } from './types.js';

export const TRUNCATION_NOTICE = '\n\n[Response truncated for brevity]';
export const DEFAULT_MAX_OUTPUT_CHARS = 2000;

const TRUNCATION_MARGIN = 100;

export function filterLength(output: string, maxChars: number): FilterResult {
  if (output.length <= maxChars) {
    return { flags: [] };
  }

  return {
    flags: ['truncated'],
    rewritten: output.slice(0, Math.max(0, maxChars - TRUNCATION_MARGIN)) + TRUNCATION_NOTICE
  };
}
