export interface Rubric {
  readonly forbiddenPhrases: readonly string[];
  readonly forbiddenPromises: readonly string[];
  readonly forbiddenTones: readonly string[];
  readonly requiredTone: string;
  readonly disclaimerTopics: readonly string[];
  readonly minLength: number;
  readonly maxLength: number;
}

export interface GuardrailPolicy {
  readonly name: string;
  readonly version: string;
  readonly highRiskKeywords: readonly string[];
  readonly forbiddenTerms: readonly string[];
  readonly disclaimers: Readonly<Record<string, string>>;
  readonly maxOutputChars: number;
  readonly rubric: Rubric;
}

export interface AuditRecord {
  event_id: string;
  timestamp: string;
  action: 'ALLOW' | 'BLOCK';
  session_id: string;
  request_id: string;
  input_flags: string[];
  output_flags: string[];
  retries_used: number;
  handlers_used: string[];
  hash_input: string;
  hash_output: string;
  policy_hash: string;
  prev_record_hash: string;
  replyguard_version: string;
}
