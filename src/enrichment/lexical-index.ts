import type { SearchFilters, SearchHit, SearchProvider } from './types.js';

export interface IndexedDocument {
  text: string;
  metadata: Record<string, string | number | boolean>;
}

const STOPWORDS = new Set(['a', 'an', 'the', 'and', 'or', 'for', 'with', 'of', 'to', 'in', 'me', 'my', 'i', 'is', 'do', 'you', 'have']);

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 1 && !STOPWORDS.has(token));
}

/**
 * In-process ranked search over a fixed document set. Scores are the share of
 * query terms found in the document, so they fall in [0, 1].
 */
export class LexicalIndex implements SearchProvider {
  readonly name = 'lexical';
  private documents: { doc: IndexedDocument; terms: Set<string> }[] = [];

  constructor(documents: IndexedDocument[] = [], private readonly minScore = 0.3) {
    this.add(documents);
  }

  add(documents: IndexedDocument[]): void {
    for (const doc of documents) {
      this.documents.push({ doc, terms: new Set(tokenize(doc.text)) });
    }
  }

  async search(query: string, limit: number, filters: SearchFilters = {}): Promise<SearchHit[]> {
    const queryTerms = Array.from(new Set(tokenize(query)));
    if (queryTerms.length === 0) return [];

    const hits: SearchHit[] = [];
    for (const { doc, terms } of this.documents) {
      const matchesFilters = Object.entries(filters).every(
        ([key, value]) => String(doc.metadata[key] ?? '').toLowerCase() === value.toLowerCase()
      );
      if (!matchesFilters) continue;

      const matched = queryTerms.filter(term => terms.has(term)).length;
      const score = matched / queryTerms.length;
      if (score >= this.minScore) {
        hits.push({ text: doc.text, score, source: doc.metadata });
      }
    }

    return hits.sort((a, b) => b.score - a.score).slice(0, limit);
  }
}
