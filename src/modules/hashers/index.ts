/**
 * src/modules/hashers/index.ts
 *
 * WHY:
 * - Define the public surface of the hashers module.
 * - Callers must not deep-import policies or strategies.
 */

export { HasherFactory } from './hasher.factory';
export type { HasherFactoryOptions } from './hasher.factory';
export { HasherRegistry } from './hasher.registry';
export type { HasherRegistryOptions, HasherState } from './hasher.registry';
export { createHasherModule } from './hasher.module';
export type { HasherModule } from './hasher.module';
export { MultiHasherConverter } from './converters/multi-hasher-converter';
export { DefaultHasher, SecureHasher, CustomHasher } from './strategies';
export {
  ConfigurationValidationError,
  UnknownHasherTypeError,
  HasherNotFoundError,
} from './hasher.errors';
export {
  DEFAULT_ALPHABET,
  SECURE_ALPHABET,
  DEFAULT_MIN_LENGTH,
  DEFAULT_MAX_CACHE_SIZE,
  DEFAULT_HASHER_NAME,
} from './hasher.constants';
export { HASHER_TYPES } from './hasher.types';
export type {
  HasherType,
  HasherConfig,
  HasherOverrides,
  Hasher,
  Converter,
  CacheKey,
  CacheStatistics,
  DecodedValue,
  NumberLike,
} from './hasher.types';
