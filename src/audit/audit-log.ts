import { appendFileSync, readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { AuditRecord } from '../types/index.js';
import { GENESIS_HASH, hashRecord, sha256 } from './hasher.js';

export const REPLYGUARD_VERSION = '1.0.0';

const AuditRecordSchema = z.object({
  event_id: z.string(),
  timestamp: z.string(),
  action: z.enum(['ALLOW', 'BLOCK']),
  prev_record_hash: z.string()
}).passthrough();

export interface AuditEntry {
  action: AuditRecord['action'];
  session_id: string;
  request_id: string;
  input_flags: readonly string[];
  output_flags: readonly string[];
  retries_used: number;
  handlers_used: readonly string[];
  input: string;
  output: string;
  policyHash: string;
}

export interface AuditVerification {
  valid: boolean;
  records: number;
  errors: string[];
}

function readLines(path: string): string[] {
  if (!existsSync(path)) return [];
  return readFileSync(path, 'utf-8').split('\n').filter(line => line.trim().length > 0);
}

/**
 * Append-only JSONL decision log. Each record carries the SHA-256 of the
 * previous line, so any edit or deletion breaks the chain.
 */
export class AuditLog {
  private lastHash: string;

  constructor(private readonly logPath: string) {
    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const lines = readLines(logPath);
    const last = lines[lines.length - 1];
    this.lastHash = last === undefined ? GENESIS_HASH : hashRecord(last);
  }

  get path(): string {
    return this.logPath;
  }

  log(entry: AuditEntry): AuditRecord {
    const record: AuditRecord = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      action: entry.action,
      session_id: entry.session_id,
      request_id: entry.request_id,
      input_flags: [...entry.input_flags],
      output_flags: [...entry.output_flags],
      retries_used: entry.retries_used,
      handlers_used: [...entry.handlers_used],
      hash_input: sha256(entry.input),
      hash_output: sha256(entry.output),
      policy_hash: entry.policyHash,
      prev_record_hash: this.lastHash,
      replyguard_version: REPLYGUARD_VERSION
    };

    const line = JSON.stringify(record);
    appendFileSync(this.logPath, line + '\n');
    this.lastHash = hashRecord(line);

    return record;
  }

  // Hash of the most recent record; the next record will point at it
  head(): string {
    return this.lastHash;
  }

  verify(): AuditVerification {
    const lines = readLines(this.logPath);
    const errors: string[] = [];
    let expected = GENESIS_HASH;

    lines.forEach((line, i) => {
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        errors.push(`Record ${i}: Invalid JSON`);
        expected = hashRecord(line);
        return;
      }

      const parsed = AuditRecordSchema.safeParse(json);
      if (!parsed.success) {
        errors.push(`Record ${i}: Missing audit fields`);
      } else if (parsed.data.prev_record_hash !== expected) {
        errors.push(`Record ${i}: Chain broken - expected prev_hash ${expected}, got ${parsed.data.prev_record_hash}`);
      }

      expected = hashRecord(line);
    });

    return { valid: errors.length === 0, records: lines.length, errors };
  }
}
