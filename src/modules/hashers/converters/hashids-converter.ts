/**
 * src/modules/hashers/converters/hashids-converter.ts
 *
 * WHY:
 * - Converter = stateless encode/decode pair over one codec.
 * - Hasher strategies extend it and only change how a number is encoded.
 *
 * RULES:
 * - encode: non-negative integers (number, bigint, digit string) go through the codec.
 *   Anything else is returned as String(value), never an error.
 * - decode: the first decoded number, or the input unchanged. Valid and forged
 *   hashes fail the same silent way (decode sees attacker input).
 */

import type { Codec } from '../codec';
import type { Converter, DecodedValue, NumberLike } from '../hasher.types';

const DIGITS = /^\d+$/;

export function toEncodableNumber(value: unknown): NumberLike | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'bigint') {
    return value >= 0n ? value : null;
  }
  if (typeof value === 'string' && DIGITS.test(value)) {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : BigInt(value);
  }
  return null;
}

export class HashidsConverter implements Converter {
  constructor(protected readonly codec: Codec) {}

  encode(value: unknown): string {
    const number = toEncodableNumber(value);
    if (number === null) return String(value);

    return this.encodeNumber(number);
  }

  decode(hash: string): DecodedValue {
    const [first] = this.decodeAll(hash);
    return first ?? hash;
  }

  protected encodeNumber(value: NumberLike): string {
    return this.codec.encode([value]);
  }

  private decodeAll(hash: string): NumberLike[] {
    try {
      return this.codec.decode(hash);
    } catch {
      // Foreign alphabet: same outcome as an undecodable hash.
      return [];
    }
  }
}
