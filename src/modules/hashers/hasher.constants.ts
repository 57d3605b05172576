import type { HasherOverrides, HasherType } from './hasher.types';

export const DEFAULT_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ1234567890';
export const SECURE_ALPHABET =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ1234567890!@#$%^&*';

export const DEFAULT_SALT = '';
export const DEFAULT_MIN_LENGTH = 10;
export const DEFAULT_MAX_CACHE_SIZE = 10;

// The codec cannot build a shuffle table from fewer distinct characters.
export const MIN_UNIQUE_ALPHABET_CHARS = 16;

export const DEFAULT_HASHER_NAME = 'default';
export const MAX_HASHER_NAME_LENGTH = 50;
export const HASHER_NAME_PATTERN = /^[a-zA-Z0-9_\-.]+$/;

/**
 * Per-type defaults. They sit between factory defaults and call overrides.
 * Secure leaves the salt to the factory: an empty salt there triggers generation.
 */
export const HASHER_TYPE_DEFAULTS: Readonly<Record<HasherType, HasherOverrides>> = {
  default: {},
  secure: { min_length: 20, alphabet: SECURE_ALPHABET },
  custom: { min_length: 15 },
};
