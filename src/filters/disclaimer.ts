import type { FilterResult } from './types.js';
import { containsIgnoreCase } from '../utils/text.js';

export const DEFAULT_DISCLAIMERS: Record<string, string> = {
  'refund': '\n\n_Note: Refund policies are subject to our terms and conditions._',
  'warranty': '\n\n_Note: Warranty coverage varies by product. Check product documentation for details._',
  'price guarantee': '\n\n_Note: Prices and promotions are subject to change._',
};

export function filterDisclaimer(output: string, disclaimers: Record<string, string>): FilterResult {
  const flags: string[] = [];
  let rewritten = output;

  for (const [trigger, suffix] of Object.entries(disclaimers)) {
    if (!containsIgnoreCase(rewritten, trigger)) continue;
    // Presence is checked on the trimmed suffix so a re-run never doubles it
    if (rewritten.includes(suffix.trim())) continue;

    rewritten = rewritten + suffix;
    flags.push(`disclaimer_added:${trigger}`);
  }

  return {
    flags,
    rewritten: flags.length > 0 ? rewritten : undefined
  };
}
