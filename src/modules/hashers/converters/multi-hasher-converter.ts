/**
 * src/modules/hashers/converters/multi-hasher-converter.ts
 *
 * Converter bound to a registry name. Every call asks the registry, so
 * re-registering the name takes effect on the next encode/decode.
 *
 * HOW TO USE:
 * - const ids = new MultiHasherConverter(registry)
 * - ids.withHasher('secure-api').encode(42)
 */

import { DEFAULT_HASHER_NAME } from '../hasher.constants';
import type { HasherRegistry } from '../hasher.registry';
import type { Converter, DecodedValue } from '../hasher.types';

export class MultiHasherConverter implements Converter {
  constructor(
    private readonly registry: Pick<HasherRegistry, 'getConverter'>,
    readonly hasherName: string = DEFAULT_HASHER_NAME,
  ) {}

  withHasher(name: string): MultiHasherConverter {
    return new MultiHasherConverter(this.registry, name);
  }

  encode(value: unknown): string {
    return this.registry.getConverter(this.hasherName).encode(value);
  }

  decode(hash: string): DecodedValue {
    return this.registry.getConverter(this.hasherName).decode(hash);
  }
}
