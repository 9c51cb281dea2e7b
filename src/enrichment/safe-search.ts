import type { Logger } from '../logger.js';
import type { SearchFilters, SearchHit, SearchProvider } from './types.js';

// Enrichment never fails a request: a missing or failing provider yields no hits
export async function searchOrEmpty(
  provider: SearchProvider | undefined,
  query: string,
  limit: number,
  log: Logger,
  filters?: SearchFilters
): Promise<SearchHit[]> {
  if (!provider) return [];

  try {
    return await provider.search(query, limit, filters);
  } catch (err) {
    log.warn({ err, provider: provider.name }, 'Enrichment search unavailable');
    return [];
  }
}
