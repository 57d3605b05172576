/**
 * src/modules/hashers/cache-key.ts
 *
 * WHY:
 * - Equivalent configurations must land on the same cached instance regardless of
 *   the key order they were written in.
 * - The key is handed back to callers (preloadConfiguration), so the salt must not
 *   be readable from it: the canonical form is SHA-256 digested.
 *
 * FORMAT:
 * - `${type}:${sha256hex(canonicalJson(config))}`
 */

import { createHash } from 'node:crypto';
import type { CacheKey, HasherConfig, HasherType } from './hasher.types';

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

/** JSON with object keys sorted lexicographically at every depth. */
export function canonicalJson(value: Json): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const body = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`)
      .join(',');
    return `{${body}}`;
  }
  return JSON.stringify(value);
}

export function buildCacheKey(type: HasherType, config: HasherConfig): CacheKey {
  const canonical = canonicalJson({
    salt: config.salt,
    min_length: config.minLength,
    alphabet: config.alphabet,
  });
  return `${type}:${createHash('sha256').update(canonical).digest('hex')}`;
}
