/**
 * src/modules/hashers/hasher.factory.ts
 *
 * WHY:
 * - Single point where hasher configuration is validated, merged, keyed and cached.
 * - Equal configurations share one hasher instance; the cache is bounded (LRU).
 *
 * HOW TO USE:
 * - const factory = new HasherFactory({ salt: 'app-salt', minLength: 10 })
 * - factory.create('default', { min_length: 12 })        // cached by config
 * - factory.createConverter('custom', { salt: 'x' })     // fresh, not cached
 * - factory.getCacheStatistics()
 *
 * PIPELINE (create / preloadConfiguration / createConverter):
 * 1. type checked against the closed set (UnknownHasherTypeError otherwise)
 * 2. overrides shape-checked (Zod), then merged:
 *    factory defaults <- type defaults <- overrides
 * 3. effective config re-validated with the construction invariants
 * 4. secure + empty salt -> fresh 256-bit salt (never reused across calls)
 * 5. cache lookup by canonical key (create / preload only)
 *
 * CONCURRENCY:
 * - Every step is synchronous. Lookup, construction and insertion run without a
 *   suspension point, so one key never produces two instances.
 */

import { LruCache } from '../../shared/cache/lru-cache';
import type { InstanceCache } from '../../shared/cache/instance-cache';
import { logger as defaultLogger, type Logger } from '../../shared/logger/logger';
import { generateSecureSalt } from '../../shared/security/salt';
import { buildCacheKey } from './cache-key';
import { createHashidsCodec } from './codec';
import { HashidsConverter } from './converters/hashids-converter';
import {
  DEFAULT_ALPHABET,
  DEFAULT_MAX_CACHE_SIZE,
  DEFAULT_MIN_LENGTH,
  DEFAULT_SALT,
  HASHER_TYPE_DEFAULTS,
} from './hasher.constants';
import { parseHasherOverrides } from './hasher.schemas';
import {
  HASHER_TYPES,
  type CacheKey,
  type CacheStatistics,
  type Converter,
  type Hasher,
  type HasherConfig,
  type HasherType,
} from './hasher.types';
import {
  assertValidCacheSize,
  assertValidHasherConfig,
  parseHasherType,
} from './policies/hasher-config.policy';
import { buildHasher, type Clock } from './strategies';

export type HasherFactoryOptions = {
  salt?: string | null;
  minLength?: number;
  alphabet?: string;
  maxCacheSize?: number;

  /** Replaces the built-in LRU. Its maxSize wins over maxCacheSize. */
  cache?: InstanceCache<Hasher>;

  logger?: Logger;

  /** Milliseconds clock handed to secure hashers. */
  clock?: Clock;
};

type ResolvedRequest = {
  type: HasherType;
  config: HasherConfig;
};

type Counters = { hits: number; misses: number; evictions: number };

export class HasherFactory {
  private readonly defaults: HasherConfig;
  private readonly cache: InstanceCache<Hasher>;
  private readonly logger: Logger;
  private readonly clock?: Clock;
  private counters: Counters = { hits: 0, misses: 0, evictions: 0 };

  constructor(opts: HasherFactoryOptions = {}) {
    const defaults: HasherConfig = {
      salt: opts.salt ?? DEFAULT_SALT,
      minLength: opts.minLength ?? DEFAULT_MIN_LENGTH,
      alphabet: opts.alphabet ?? DEFAULT_ALPHABET,
    };

    assertValidHasherConfig(defaults);
    if (opts.cache) {
      assertValidCacheSize(opts.cache.maxSize);
    } else {
      assertValidCacheSize(opts.maxCacheSize ?? DEFAULT_MAX_CACHE_SIZE);
    }

    this.defaults = defaults;
    this.cache = opts.cache ?? new LruCache<Hasher>(opts.maxCacheSize ?? DEFAULT_MAX_CACHE_SIZE);
    this.logger = opts.logger ?? defaultLogger;
    this.clock = opts.clock;
  }

  /**
   * Returns the cached hasher for (type, effective config), building it on a miss.
   * Throws UnknownHasherTypeError or ConfigurationValidationError; never partially applies.
   */
  create(type: string, overrides: unknown = {}): Hasher {
    const request = this.resolve(type, overrides);
    return this.lookup(request, buildCacheKey(request.type, request.config));
  }

  /**
   * Same validation and merge as create(), but always a new codec-backed converter
   * that never enters the instance cache or the statistics.
   */
  createConverter(type: string, overrides: unknown = {}): Converter {
    const { config } = this.resolve(type, overrides);
    return new HashidsConverter(createHashidsCodec(config));
  }

  /** Warms the cache exactly as create() would and returns the key used. */
  preloadConfiguration(type: string, overrides: unknown = {}): CacheKey {
    const request = this.resolve(type, overrides);
    const key = buildCacheKey(request.type, request.config);
    this.lookup(request, key);
    return key;
  }

  getAvailableTypes(): HasherType[] {
    return [...HASHER_TYPES];
  }

  getCacheStatistics(): CacheStatistics {
    const { hits, misses, evictions } = this.counters;
    const lookups = hits + misses;
    const currentSize = this.cache.size;
    const maxSize = this.cache.maxSize;

    return {
      hits,
      misses,
      evictions,
      currentSize,
      maxSize,
      hitRate: lookups === 0 ? 0 : hits / lookups,
      usage: currentSize / maxSize,
    };
  }

  /** Drops every cached instance. Counters are kept. */
  clearInstanceCache(): void {
    const dropped = this.cache.size;
    this.cache.clear();
    this.logger.info('hasher.cache_cleared', { flow: 'hasher-factory', dropped });
  }

  /** Zeroes the counters. Cached instances are kept. */
  resetCacheStatistics(): void {
    this.counters = { hits: 0, misses: 0, evictions: 0 };
    this.logger.info('hasher.stats_reset', { flow: 'hasher-factory' });
  }

  private resolve(rawType: string, rawOverrides: unknown): ResolvedRequest {
    const type = parseHasherType(rawType);
    const overrides = parseHasherOverrides(rawOverrides);
    const typeDefaults = HASHER_TYPE_DEFAULTS[type];

    const config: HasherConfig = {
      salt: overrides.salt ?? typeDefaults.salt ?? this.defaults.salt,
      minLength: overrides.min_length ?? typeDefaults.min_length ?? this.defaults.minLength,
      alphabet: overrides.alphabet ?? typeDefaults.alphabet ?? this.defaults.alphabet,
    };

    assertValidHasherConfig(config);

    if (type === 'secure' && config.salt === '') {
      config.salt = generateSecureSalt();
      this.logger.debug('hasher.secure_salt_generated', { flow: 'hasher-factory', type });
    }

    return { type, config };
  }

  private lookup(request: ResolvedRequest, key: CacheKey): Hasher {
    const cached = this.cache.get(key);
    if (cached) {
      this.counters.hits += 1;
      return cached;
    }

    this.counters.misses += 1;
    const hasher = buildHasher(request.type, createHashidsCodec(request.config), this.clock);

    const evicted = this.cache.set(key, hasher);
    this.logger.debug('hasher.cache_miss', { flow: 'hasher-factory', type: request.type, key });

    if (evicted !== null) {
      this.counters.evictions += 1;
      this.logger.debug('hasher.cache_evicted', { flow: 'hasher-factory', key: evicted });
    }

    return hasher;
  }
}
