export interface FilterResult {
  flags: string[];
  rewritten?: string;
}
