/**
 * src/modules/hashers/codec.ts
 *
 * WHY:
 * - The reversible integer <-> string transform is the `hashids` package.
 * - Strategies depend on the Codec interface, so tests can swap in a fake.
 *
 * NOTE:
 * - hashids throws on decode when the input has characters outside its alphabet,
 *   and returns [] for other foreign strings. Callers treat both the same way.
 */

import Hashids from 'hashids';
import type { HasherConfig, NumberLike } from './hasher.types';

export interface Codec {
  encode(numbers: readonly NumberLike[]): string;
  decode(hash: string): NumberLike[];
}

export function createHashidsCodec(config: HasherConfig): Codec {
  const hashids = new Hashids(config.salt, config.minLength, config.alphabet);

  return {
    encode: (numbers) => hashids.encode([...numbers]),
    decode: (hash) => hashids.decode(hash),
  };
}
