import { createHash } from 'crypto';

export const GENESIS_HASH = sha256('replyguard-genesis');

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

// Key order must not change the hash, at any depth
function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, canonical(entry)])
    );
  }
  return value;
}

export function hashObject(obj: object): string {
  return sha256(JSON.stringify(canonical(obj)));
}

export function hashRecord(line: string): string {
  return sha256(line);
}
