import type { Product } from '../stores/index.js';
import { LexicalIndex, type IndexedDocument } from './lexical-index.js';

export function productDocuments(products: Product[]): IndexedDocument[] {
  return products.map(product => ({
    text: `${product.name}: ${product.description} Category: ${product.category}. Price: $${product.price}.`,
    metadata: {
      product_id: product.product_id,
      category: product.category,
      in_stock: product.in_stock
    }
  }));
}

export function createCatalogIndex(products: Product[]): LexicalIndex {
  return new LexicalIndex(productDocuments(products));
}
