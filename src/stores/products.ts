import type { Product, Repository } from './types.js';
import { InMemoryRepository } from './memory.js';

export interface ProductSummary {
  product_id: string;
  name: string;
  price: number;
  in_stock: boolean;
  category: string;
}

export interface ProductRepository extends Repository<Product> {
  search(query: string, category?: string): ProductSummary[];
  listByCategory(category: string): ProductSummary[];
}

function summarize(product: Product): ProductSummary {
  return {
    product_id: product.product_id,
    name: product.name,
    price: product.price,
    in_stock: product.in_stock,
    category: product.category
  };
}

export class InMemoryProductRepository extends InMemoryRepository<Product> implements ProductRepository {
  constructor(products: Product[]) {
    super(products, product => product.product_id);
  }

  search(query: string, category?: string): ProductSummary[] {
    const needle = query.trim().toLowerCase();

    return this.list()
      .filter(product => !category || product.category.toLowerCase() === category.toLowerCase())
      .filter(product =>
        !needle ||
        product.name.toLowerCase().includes(needle) ||
        product.description.toLowerCase().includes(needle))
      .map(summarize);
  }

  listByCategory(category: string): ProductSummary[] {
    return this.list()
      .filter(product => product.category.toLowerCase() === category.toLowerCase())
      .map(summarize);
  }
}
