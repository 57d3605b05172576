/**
 * src/shared/cache/lru-cache.ts
 *
 * WHY:
 * - Default InstanceCache: bounded, least-recently-used eviction.
 * - peek/has/delete/keys are extras for inspection; the factory needs only the
 *   InstanceCache members.
 *
 * HOW:
 * - A Map keeps insertion order. Touching an entry deletes and re-inserts it, so the
 *   first key is always the least recently used one.
 */

import type { InstanceCache } from './instance-cache';

export class LruCache<V> implements InstanceCache<V> {
  private readonly entries = new Map<string, V>();

  constructor(readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new RangeError(`LruCache: maxSize must be a positive integer. Got ${maxSize}.`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;

    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  peek(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: V): string | null {
    if (this.entries.has(key)) {
      this.entries.delete(key);
      this.entries.set(key, value);
      return null;
    }

    let evicted: string | null = null;
    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
        evicted = oldest.value;
      }
    }

    this.entries.set(key, value);
    return evicted;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
