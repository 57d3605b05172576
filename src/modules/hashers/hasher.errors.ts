/**
 * src/modules/hashers/hasher.errors.ts
 *
 * WHY:
 * - The hashers module owns its failure semantics.
 * - Callers branch on the class (instanceof) or on AppError.code.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put a salt in a message or in meta.
 * - UnknownHasherTypeError never echoes the rejected value: every rejected input
 *   produces the same message.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/app-error';
import { HASHER_TYPES } from './hasher.types';

export class ConfigurationValidationError extends AppError {
  constructor(
    readonly field: string,
    message: string,
    meta?: AppErrorMeta,
  ) {
    super({
      code: 'CONFIGURATION_ERROR',
      status: 500,
      message: `Invalid hasher configuration (${field}): ${message}`,
      meta: { field, ...meta },
    });
    this.name = 'ConfigurationValidationError';
  }
}

export class UnknownHasherTypeError extends AppError {
  readonly allowedTypes: readonly string[];

  constructor() {
    super({
      code: 'UNKNOWN_HASHER_TYPE',
      status: 400,
      message: `Unknown hasher type. Available types: ${HASHER_TYPES.join(', ')}`,
      meta: { allowedTypes: [...HASHER_TYPES] },
    });
    this.name = 'UnknownHasherTypeError';
    this.allowedTypes = HASHER_TYPES;
  }
}

export class HasherNotFoundError extends AppError {
  constructor(
    readonly hasherName: string,
    available: readonly string[],
  ) {
    super({
      code: 'NOT_FOUND',
      status: 404,
      message: `Hasher "${hasherName}" is not registered`,
      meta: { hasherName, available: [...available] },
    });
    this.name = 'HasherNotFoundError';
  }
}

export const HasherErrors = {
  invalidMinLength(value: unknown) {
    return new ConfigurationValidationError(
      'min_length',
      `Must be a non-negative integer, got ${String(value)}`,
    );
  },

  alphabetTooSmall(uniqueChars: number, required: number) {
    return new ConfigurationValidationError(
      'alphabet',
      `Must contain at least ${required} unique characters, got ${uniqueChars}`,
      { uniqueChars, required },
    );
  },

  alphabetHasWhitespace() {
    return new ConfigurationValidationError('alphabet', 'Must not contain whitespace');
  },

  invalidCacheSize(value: unknown) {
    return new ConfigurationValidationError(
      'max_cache_size',
      `Must be a positive integer, got ${String(value)}`,
    );
  },

  invalidField(field: string, message: string) {
    return new ConfigurationValidationError(field, message);
  },

  invalidHasherName(message: string) {
    return new ConfigurationValidationError('name', message);
  },

  unsupportedEnvCast(cast: string) {
    return new ConfigurationValidationError(
      'salt',
      `Unsupported env cast "${cast}" (salts accept only "string:")`,
      { cast },
    );
  },

  unresolvedEnvSalt(variable: string) {
    return new ConfigurationValidationError(
      'salt',
      `Environment variable ${variable} is not set`,
      { variable },
    );
  },

  unknownType() {
    return new UnknownHasherTypeError();
  },

  hasherNotFound(name: string, available: readonly string[]) {
    return new HasherNotFoundError(name, available);
  },
} as const;
