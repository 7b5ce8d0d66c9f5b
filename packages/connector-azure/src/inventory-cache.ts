/**
 * @module @infra-connectors/connector-azure/inventory-cache
 * Bounded least-recently-used cache
 */

import { ValidationFailureError } from '@infra-connectors/connector-contracts';
import type { InventoryFilters } from './query.js';

export class InventoryCache<V> {
  // Map iteration order doubles as recency order, oldest first
  private readonly entries = new Map<string, V>();

  constructor(readonly capacity = 8) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationFailureError(`Cache capacity must be a positive integer: ${capacity}`, 'capacity');
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Look up and mark as most recently used.
   */
  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /**
   * Look up without touching recency.
   */
  peek(key: string): V | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys from least to most recently used */
  keys(): string[] {
    return [...this.entries.keys()];
  }
}

/**
 * Cache key for a filter mapping; independent of key order.
 */
export function filtersKey(filters: InventoryFilters): string {
  const entries = Object.entries(filters).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}
