/**
 * src/modules/hashers/strategies/secure-hasher.ts
 *
 * WHY:
 * - The same id encodes differently from one second to the next, so hashes do not
 *   reveal that two links point at the same record.
 *
 * HOW:
 * - encode: codec.encode([value, unixSeconds])
 * - decode: first number only, the timestamp is dropped
 * - Defaults: min_length 20, alphabet with symbols, salt generated by the factory
 *   when none is configured.
 */

import type { Codec } from '../codec';
import { HashidsConverter } from '../converters/hashids-converter';
import type { Hasher, NumberLike } from '../hasher.types';

export type Clock = () => number;

export class SecureHasher extends HashidsConverter implements Hasher {
  readonly type = 'secure';

  constructor(
    codec: Codec,
    private readonly clock: Clock = Date.now,
  ) {
    super(codec);
  }

  protected encodeNumber(value: NumberLike): string {
    const timestamp = Math.floor(this.clock() / 1000);
    return this.codec.encode([value, timestamp]);
  }
}
