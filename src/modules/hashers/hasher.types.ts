/**
 * src/modules/hashers/hasher.types.ts
 *
 * Shared contracts for the hashers module. No runtime logic beyond the closed
 * type tuple.
 */

export const HASHER_TYPES = ['default', 'secure', 'custom'] as const;

export type HasherType = (typeof HASHER_TYPES)[number];

/** Numbers the codec can carry. Large values come back from decode as bigint. */
export type NumberLike = number | bigint;

/** What decode hands back: the first decoded number, or the untouched input. */
export type DecodedValue = NumberLike | string;

/**
 * Effective, validated configuration of one codec instance.
 * The salt is a secret: never log it, never return it from a public accessor.
 */
export type HasherConfig = {
  salt: string;
  minLength: number;
  alphabet: string;
};

/**
 * Raw per-call configuration map, keyed the way configuration files spell it.
 * Omitted or null fields fall back to type defaults, then factory defaults.
 */
export type HasherOverrides = {
  salt?: string | null;
  min_length?: number | null;
  alphabet?: string | null;
};

export interface Converter {
  encode(value: unknown): string;
  decode(hash: string): DecodedValue;
}

export interface Hasher extends Converter {
  readonly type: HasherType;
}

export type CacheKey = string;

export type CacheStatistics = {
  hits: number;
  misses: number;
  evictions: number;
  currentSize: number;
  maxSize: number;
  hitRate: number;
  usage: number;
};
