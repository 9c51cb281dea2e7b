export interface SearchHit {
  text: string;
  score: number;
  source: Record<string, string | number | boolean>;
}

export type SearchFilters = Record<string, string>;

/** Optional enrichment source. Absence or failure only reduces recall. */
export interface SearchProvider {
  readonly name: string;
  search(query: string, limit: number, filters?: SearchFilters): Promise<SearchHit[]>;
}
