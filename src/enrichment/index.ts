export type { SearchHit, SearchFilters, SearchProvider } from './types.js';
export { LexicalIndex, type IndexedDocument } from './lexical-index.js';
export { WebSearchClient, type WebSearchOptions } from './web-search.js';
export { searchOrEmpty } from './safe-search.js';
export { productDocuments, createCatalogIndex } from './catalog.js';
