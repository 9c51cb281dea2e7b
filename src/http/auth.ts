import { escapeRegExp } from '../utils/text.js';

export function extractBearer(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1];
}

export function isAuthorized(header: string | undefined, apiKeys: ReadonlySet<string>): boolean {
  // No configured keys means the service runs open, e.g. on localhost during development
  if (apiKeys.size === 0) return true;
  const key = extractBearer(header);
  return key !== undefined && apiKeys.has(key);
}

export function originAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some(allowed => {
    if (allowed.includes('*')) {
      const pattern = new RegExp('^' + allowed.split('*').map(escapeRegExp).join('.*') + '$');
      return pattern.test(origin);
    }
    return allowed === origin;
  });
}

