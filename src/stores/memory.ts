import type { Repository } from './types.js';

export class InMemoryRepository<T> implements Repository<T> {
  protected records = new Map<string, T>();

  constructor(records: T[], keyOf: (record: T) => string) {
    for (const record of records) {
      this.records.set(keyOf(record).toUpperCase(), record);
    }
  }

  getById(id: string): T | undefined {
    return this.records.get(id.trim().toUpperCase());
  }

  list(): T[] {
    return Array.from(this.records.values());
  }
}
