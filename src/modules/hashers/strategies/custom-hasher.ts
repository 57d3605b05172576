import { HashidsConverter } from '../converters/hashids-converter';
import type { Hasher } from '../hasher.types';

/**
 * Same behaviour as DefaultHasher, meant for caller-supplied overrides.
 * Defaults to min_length 15 when the caller does not set one.
 */
export class CustomHasher extends HashidsConverter implements Hasher {
  readonly type = 'custom';
}
