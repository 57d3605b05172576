/**
 * src/modules/hashers/strategies/default-hasher.ts
 *
 * Plain codec adapter. Uses the factory defaults as its own.
 */

import { HashidsConverter } from '../converters/hashids-converter';
import type { Hasher } from '../hasher.types';

export class DefaultHasher extends HashidsConverter implements Hasher {
  readonly type = 'default';
}
