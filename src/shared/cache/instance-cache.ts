/**
 * src/shared/cache/instance-cache.ts
 *
 * WHY:
 * - The hasher factory keeps built instances so equal configurations share one object.
 * - The factory depends on this abstraction; tests and composition roots can inject
 *   their own (shared or isolated) cache instead of a hidden static one.
 *
 * HOW TO USE:
 * - cache.get(key)            // touches the entry (most recently used)
 * - cache.set(key, value)     // touches; returns the evicted key or null
 *
 * RULES:
 * - Synchronous only. Everything stored here is in-process object identity.
 */

export interface InstanceCache<V> {
  readonly maxSize: number;
  readonly size: number;

  get(key: string): V | undefined;

  /**
   * Insert or refresh `key`. When inserting a new key into a full cache the least
   * recently used entry is removed first and its key is returned.
   */
  set(key: string, value: V): string | null;

  clear(): void;
}
