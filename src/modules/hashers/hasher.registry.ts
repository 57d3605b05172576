/**
 * src/modules/hashers/hasher.registry.ts
 *
 * WHY:
 * - Stable logical names ("default", "secure-api") instead of repeating configs.
 * - One converter per name, built on first use through the factory.
 *
 * STATE PER NAME:
 * - (absent)       -> Unregistered
 * - 'registered'   -> config stored, nothing built yet
 * - 'materialized' -> converter built and memoized
 * - registerHasher() on any state -> 'registered' (memoized converter dropped)
 *
 * RULES:
 * - Validation happens at registration, before anything is stored.
 * - registerHashers() is all-or-nothing.
 * - A `%env(VAR)%` or `%env(string:VAR)%` salt is resolved at materialization, not at
 *   registration. Other casts are rejected at registration.
 * - A null field counts as omitted.
 * - "default" always exists (registered in the constructor, may be overwritten).
 */

import {
  parseEnvPlaceholder,
  processEnvResolver,
  type EnvResolver,
} from '../../shared/config/env-resolver';
import { logger as defaultLogger, type Logger } from '../../shared/logger/logger';
import {
  DEFAULT_HASHER_NAME,
  HASHER_NAME_PATTERN,
  MAX_HASHER_NAME_LENGTH,
} from './hasher.constants';
import { HasherErrors } from './hasher.errors';
import { HasherFactory } from './hasher.factory';
import { parseHasherRegistration } from './hasher.schemas';
import type { Converter, HasherOverrides, HasherType } from './hasher.types';
import {
  assertValidAlphabet,
  assertValidMinLength,
  parseHasherType,
} from './policies/hasher-config.policy';

type SaltSource =
  | { kind: 'default' }
  | { kind: 'inline'; value: string }
  | { kind: 'env'; variable: string };

type HasherRegistration = {
  type: HasherType;
  salt: SaltSource;
  minLength?: number;
  alphabet?: string;
};

type HasherEntry =
  | { state: 'registered'; registration: HasherRegistration }
  | { state: 'materialized'; registration: HasherRegistration; converter: Converter };

export type HasherState = 'unregistered' | HasherEntry['state'];

export type HasherRegistryOptions = {
  factory?: HasherFactory;
  envResolver?: EnvResolver;
  logger?: Logger;
};

export class HasherRegistry {
  private readonly entries = new Map<string, HasherEntry>();
  private readonly factory: HasherFactory;
  private readonly envResolver: EnvResolver;
  private readonly logger: Logger;

  constructor(opts: HasherRegistryOptions = {}) {
    this.logger = opts.logger ?? defaultLogger;
    this.factory = opts.factory ?? new HasherFactory({ logger: this.logger });
    this.envResolver = opts.envResolver ?? processEnvResolver;

    this.registerHasher(DEFAULT_HASHER_NAME, {});
  }

  /** Validates and stores `config` under `name`, replacing any previous entry. */
  registerHasher(name: string, config: unknown): void {
    const registration = this.validateRegistration(name, config);
    this.commit(name, registration);
  }

  /** Validates every entry first; stores nothing if any entry is invalid. */
  registerHashers(configs: Record<string, unknown>): void {
    const staged = Object.entries(configs).map(
      ([name, config]) => [name, this.validateRegistration(name, config)] as const,
    );

    for (const [name, registration] of staged) {
      this.commit(name, registration);
    }
  }

  /**
   * Returns the memoized converter for `name`, building it on first use.
   * Throws HasherNotFoundError for unknown names.
   */
  getConverter(name: string = DEFAULT_HASHER_NAME): Converter {
    const entry = this.entries.get(name);
    if (!entry) {
      throw HasherErrors.hasherNotFound(name, this.getHasherNames());
    }

    if (entry.state === 'materialized') {
      return entry.converter;
    }

    const { registration } = entry;
    const converter = this.factory.createConverter(registration.type, this.toOverrides(registration));

    this.entries.set(name, { state: 'materialized', registration, converter });
    this.logger.debug('hasher.materialized', {
      flow: 'hasher-registry',
      name,
      type: registration.type,
    });

    return converter;
  }

  hasHasher(name: string): boolean {
    return this.entries.has(name);
  }

  getHasherNames(): string[] {
    return Array.from(this.entries.keys());
  }

  getHasherState(name: string): HasherState {
    return this.entries.get(name)?.state ?? 'unregistered';
  }

  /** Drops every memoized converter. Registrations stay. */
  clearCaches(): void {
    for (const [name, entry] of this.entries) {
      if (entry.state === 'materialized') {
        this.entries.set(name, { state: 'registered', registration: entry.registration });
      }
    }
  }

  private validateRegistration(name: string, config: unknown): HasherRegistration {
    assertValidHasherName(name);

    const input = parseHasherRegistration(config);
    const type = parseHasherType(input.type ?? 'default');

    const minLengthKey = input.min_length ?? undefined;
    const minHashLengthKey = input.min_hash_length ?? undefined;
    if (minLengthKey !== undefined && minHashLengthKey !== undefined) {
      throw HasherErrors.invalidField('min_length', 'Set either min_length or min_hash_length');
    }
    const minLength = minLengthKey ?? minHashLengthKey;
    const alphabet = input.alphabet ?? undefined;

    if (minLength !== undefined) assertValidMinLength(minLength);
    if (alphabet !== undefined) assertValidAlphabet(alphabet);

    return { type, salt: toSaltSource(input.salt), minLength, alphabet };
  }

  private commit(name: string, registration: HasherRegistration): void {
    const replaced = this.entries.has(name);
    this.entries.set(name, { state: 'registered', registration });

    this.logger.debug('hasher.registered', {
      flow: 'hasher-registry',
      name,
      type: registration.type,
      saltSource: registration.salt.kind,
      replaced,
    });
  }

  private toOverrides(registration: HasherRegistration): HasherOverrides {
    return {
      salt: this.resolveSalt(registration.salt),
      min_length: registration.minLength,
      alphabet: registration.alphabet,
    };
  }

  private resolveSalt(salt: SaltSource): string | undefined {
    switch (salt.kind) {
      case 'default':
        return undefined;
      case 'inline':
        return salt.value;
      case 'env': {
        const value = this.envResolver.get(salt.variable);
        if (value === undefined) {
          throw HasherErrors.unresolvedEnvSalt(salt.variable);
        }
        return value;
      }
    }
  }
}

function assertValidHasherName(name: string): void {
  if (name.length === 0) {
    throw HasherErrors.invalidHasherName('Hasher name cannot be empty');
  }
  if (name.length > MAX_HASHER_NAME_LENGTH) {
    throw HasherErrors.invalidHasherName(
      `Name too long (max ${MAX_HASHER_NAME_LENGTH} characters)`,
    );
  }
  if (!HASHER_NAME_PATTERN.test(name)) {
    throw HasherErrors.invalidHasherName(
      'Names can only contain letters, numbers, underscores, hyphens, and dots',
    );
  }
}

function toSaltSource(salt: string | null | undefined): SaltSource {
  if (salt === undefined || salt === null) return { kind: 'default' };

  const placeholder = parseEnvPlaceholder(salt);
  if (placeholder === null) return { kind: 'inline', value: salt };

  if (placeholder.cast !== null && placeholder.cast !== 'string') {
    throw HasherErrors.unsupportedEnvCast(placeholder.cast);
  }
  return { kind: 'env', variable: placeholder.variable };
}
