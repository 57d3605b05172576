import { describe, it, expect } from 'vitest';
import { MultiHasherConverter } from '../../../src/modules/hashers/converters/multi-hasher-converter';
import { HasherNotFoundError } from '../../../src/modules/hashers/hasher.errors';
import { buildTestRegistry } from '../../helpers/build-test-hashers';

describe('MultiHasherConverter', () => {
  it('uses the default hasher unless told otherwise', () => {
    const { registry } = buildTestRegistry();
    const ids = new MultiHasherConverter(registry);

    expect(ids.hasherName).toBe('default');
    expect(ids.encode(4)).toBe(registry.getConverter('default').encode(4));
  });

  it('withHasher returns a copy bound to another name', () => {
    const { registry } = buildTestRegistry();
    registry.registerHasher('orders', { salt: 'orders-salt' });
    const ids = new MultiHasherConverter(registry);

    const orders = ids.withHasher('orders');

    expect(orders).not.toBe(ids);
    expect(orders.hasherName).toBe('orders');
    expect(ids.hasherName).toBe('default');
    expect(orders.decode(orders.encode(31))).toBe(31);
    expect(orders.encode(31)).toBe(registry.getConverter('orders').encode(31));
  });

  it('follows re-registration of its name', () => {
    const { registry, factory } = buildTestRegistry();
    registry.registerHasher('rotating', { salt: 'first' });
    const ids = new MultiHasherConverter(registry, 'rotating');
    ids.encode(1);

    registry.registerHasher('rotating', { salt: 'second' });

    expect(ids.encode(1)).toBe(factory.createConverter('default', { salt: 'second' }).encode(1));
  });

  it('surfaces unknown names', () => {
    const { registry } = buildTestRegistry();
    const ids = new MultiHasherConverter(registry, 'nope');

    expect(() => ids.encode(1)).toThrow(HasherNotFoundError);
    expect(() => ids.decode('abc')).toThrow(HasherNotFoundError);
  });
});
