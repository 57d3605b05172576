/**
 * src/modules/hashers/strategies/index.ts
 *
 * Closed dispatch from HasherType to strategy class. The Record type makes a
 * missing type a compile error; callers only reach this with a narrowed HasherType.
 */

import type { Codec } from '../codec';
import type { Hasher, HasherType } from '../hasher.types';
import { CustomHasher } from './custom-hasher';
import { DefaultHasher } from './default-hasher';
import { SecureHasher, type Clock } from './secure-hasher';

type HasherConstructor = new (codec: Codec, clock?: Clock) => Hasher;

const HASHER_STRATEGIES: Readonly<Record<HasherType, HasherConstructor>> = {
  default: DefaultHasher,
  secure: SecureHasher,
  custom: CustomHasher,
};

export function buildHasher(type: HasherType, codec: Codec, clock?: Clock): Hasher {
  const Strategy = HASHER_STRATEGIES[type];
  return new Strategy(codec, clock);
}

export { DefaultHasher, SecureHasher, CustomHasher };
export type { Clock };
