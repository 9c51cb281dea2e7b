export type Role = 'user' | 'assistant';

export type Metadata = Record<string, unknown>;

export interface Message {
  readonly role: Role;
  readonly content: string;
  readonly metadata: Readonly<Metadata>;
}

export interface HistoryEntry {
  role: Role;
  content: string;
}

export interface ToolCall {
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly result: unknown;
}

export interface DraftResponse {
  readonly content: string;
  readonly producer: 'router' | 'reviewer';
  readonly toolInvocations: readonly ToolCall[];
  readonly metadata: Readonly<Metadata>;
  readonly accepted: boolean;
  readonly issues: readonly string[];
}
