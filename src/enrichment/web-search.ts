import { z } from 'zod';

import type { SearchFilters, SearchHit, SearchProvider } from './types.js';

const TavilyResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string().default(''),
    url: z.string().default(''),
    content: z.string().default(''),
    score: z.number().default(0),
  })).default([]),
});

export interface WebSearchOptions {
  apiKey: string;
  endpoint?: string;
  timeoutMs?: number;
  searchDepth?: 'basic' | 'advanced';
}

export class WebSearchClient implements SearchProvider {
  readonly name = 'web';
  private endpoint: string;

  constructor(private readonly options: WebSearchOptions) {
    this.endpoint = options.endpoint ?? 'https://api.tavily.com/search';
  }

  async search(query: string, limit: number, filters: SearchFilters = {}): Promise<SearchHit[]> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        api_key: this.options.apiKey,
        query,
        max_results: limit,
        search_depth: this.options.searchDepth ?? 'basic',
        include_domains: filters.domain ? [filters.domain] : undefined
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000)
    });

    if (!response.ok) {
      throw new Error(`Web search error: ${response.status}`);
    }

    const parsed = TavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Web search returned an unexpected payload');
    }

    return parsed.data.results.map(result => ({
      text: result.content,
      score: result.score,
      source: { title: result.title, url: result.url }
    }));
  }
}
