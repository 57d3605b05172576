/**
 * src/modules/hashers/policies/hasher-config.policy.ts
 *
 * WHY:
 * - One set of invariants shared by factory construction, per-call overrides and
 *   registry registration.
 * - Pure + unit-testable (no logging, no clocks, no codec).
 *
 * RULES:
 * - minLength is a non-negative integer.
 * - The alphabet has at least 16 unique characters (duplicates do not count) and
 *   no whitespace.
 * - The type is one of HASHER_TYPES. Nothing else is looked up by name.
 */

import { MIN_UNIQUE_ALPHABET_CHARS } from '../hasher.constants';
import { HasherErrors } from '../hasher.errors';
import { HASHER_TYPES, type HasherConfig, type HasherType } from '../hasher.types';

export function countUniqueChars(alphabet: string): number {
  return new Set(Array.from(alphabet)).size;
}

export function assertValidMinLength(minLength: number): void {
  if (!Number.isInteger(minLength) || minLength < 0) {
    throw HasherErrors.invalidMinLength(minLength);
  }
}

export function assertValidAlphabet(alphabet: string): void {
  const uniqueChars = countUniqueChars(alphabet);
  if (uniqueChars < MIN_UNIQUE_ALPHABET_CHARS) {
    throw HasherErrors.alphabetTooSmall(uniqueChars, MIN_UNIQUE_ALPHABET_CHARS);
  }
  if (/\s/.test(alphabet)) {
    throw HasherErrors.alphabetHasWhitespace();
  }
}

export function assertValidCacheSize(maxCacheSize: number): void {
  if (!Number.isInteger(maxCacheSize) || maxCacheSize <= 0) {
    throw HasherErrors.invalidCacheSize(maxCacheSize);
  }
}

/** Salt is not checked here: it may be empty, or still an env placeholder. */
export function assertValidHasherConfig(config: Pick<HasherConfig, 'minLength' | 'alphabet'>): void {
  assertValidMinLength(config.minLength);
  assertValidAlphabet(config.alphabet);
}

export function isHasherType(value: string): value is HasherType {
  return HASHER_TYPES.some((type) => type === value);
}

export function parseHasherType(value: string): HasherType {
  if (!isHasherType(value)) {
    throw HasherErrors.unknownType();
  }
  return value;
}
