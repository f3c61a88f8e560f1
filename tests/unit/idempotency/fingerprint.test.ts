/**
 * @fileoverview Unit tests for payload fingerprints
 */

import { canonicalJson, fingerprintMessage } from '../../../src';
import { placeOrder } from '../../helpers/dispatch';

describe('canonicalJson', () => {
  it('should sort keys and drop undefined members', () => {
    expect(canonicalJson({ b: 1, a: { d: undefined, c: [1, undefined] } })).toBe(
      '{"a":{"c":[1,null]},"b":1}',
    );
  });

  it('should normalise dates, bigints, maps and sets', () => {
    const value = {
      at: new Date('2026-03-01T10:00:00.000Z'),
      big: 12n,
      tags: new Set(['x', 'y']),
      limits: new Map([['max', 3]]),
    };

    expect(canonicalJson(value)).toBe(
      '{"at":"2026-03-01T10:00:00.000Z","big":"12","limits":{"max":3},"tags":["x","y"]}',
    );
  });

  it('should accept shared references but reject cycles', () => {
    const shared = { id: 1 };
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;

    expect(canonicalJson({ a: shared, b: shared })).toBe('{"a":{"id":1},"b":{"id":1}}');
    expect(() => canonicalJson(cyclic)).toThrow(TypeError);
  });
});

describe('fingerprintMessage', () => {
  it('should ignore request identity fields', () => {
    const a = placeOrder({ idempotencyKey: 'k1', idempotencyTtl: 10 });
    const b = {
      ...placeOrder({ idempotencyKey: 'k2' }),
      metadata: { messageId: 'm-2', timestamp: new Date(0) },
    };

    expect(fingerprintMessage(a)).toBe(fingerprintMessage(b));
    expect(fingerprintMessage(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should change with the payload', () => {
    expect(fingerprintMessage(placeOrder({ quantity: 2 }))).not.toBe(
      fingerprintMessage(placeOrder({ quantity: 3 })),
    );
  });

  it('should not depend on key order', () => {
    const first = { typeId: 'orders.place', kind: 'command' as const, sku: 'A', quantity: 1 };
    const second = { quantity: 1, sku: 'A', kind: 'command' as const, typeId: 'orders.place' };

    expect(fingerprintMessage(first)).toBe(fingerprintMessage(second));
  });
});
