import type { z } from 'zod';

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

function tryJson(candidate: string): { ok: true; json: unknown } | { ok: false } {
  try {
    return { ok: true, json: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

// First balanced {...} object, skipping braces inside string literals
function firstObject(raw: string): string | undefined {
  const start = raw.indexOf('{');
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return raw.slice(start, i + 1);
    }
  }

  return undefined;
}

/**
 * Pull a JSON value out of model output: bare JSON, a fenced ```json block,
 * or the first balanced object embedded in prose.
 */
export function extractJson(raw: string): { ok: true; json: unknown } | { ok: false } {
  const trimmed = raw.trim();
  if (!trimmed) return { ok: false };

  const direct = tryJson(trimmed);
  if (direct.ok) return direct;

  const fence = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fence?.[1]) {
    const fenced = tryJson(fence[1].trim());
    if (fenced.ok) return fenced;
  }

  const object = firstObject(trimmed);
  if (object) return tryJson(object);

  return { ok: false };
}

/**
 * Validate untrusted structured output against a schema. Callers must handle
 * the failure branch; nothing here throws.
 */
export function parseStructured<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseResult<T> {
  const extracted = extractJson(raw);
  if (!extracted.ok) {
    return { ok: false, reason: 'Response is not valid JSON' };
  }

  const result = schema.safeParse(extracted.json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { ok: false, reason: `Schema mismatch${where}: ${issue?.message ?? 'invalid'}` };
  }

  return { ok: true, value: result.data };
}
