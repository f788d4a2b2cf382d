import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ConfigError, UnsupportedValueError } from '../errors.js';
import { JsonEncoder, encode, encodeToString, estimateSize } from '../jsonjet.js';
import { EncoderRegistry } from '../registry.js';
import { streamPool } from '../stream.js';
import { field, t } from '../types.js';

const Doc = t.struct('Doc', {
  name: t.string(),
  n: t.int64(),
  m: t.record(t.int64()),
});

describe('encode', () => {
  it('encodes a struct with an escaped string and an empty map', () => {
    expect(encodeToString({ name: 'a\nb', n: 5, m: {} }, Doc)).toBe('{"name":"a\\nb","n":5,"m":{}}');
  });

  it('returns UTF-8 bytes', () => {
    expect(Array.from(encode('é', t.string()))).toEqual([0x22, 0xc3, 0xa9, 0x22]);
  });

  it('renders the 64-bit integer extremes exactly', () => {
    expect(encodeToString(-(2n ** 63n), t.int64())).toBe('-9223372036854775808');
    expect(encodeToString(2n ** 64n - 1n, t.uint64())).toBe('18446744073709551615');
  });

  it('writes integral numbers past 2^53 exactly', () => {
    expect(encodeToString(2 ** 62, t.int64())).toBe('4611686018427387904');
    expect(encodeToString(-(2 ** 62), t.int64())).toBe('-4611686018427387904');
    expect(encodeToString(2 ** 63, t.uint64())).toBe('9223372036854775808');
    expect(encodeToString(new Map([[2 ** 62, 1]]), t.map(t.int64(), t.int64()))).toBe('{"4611686018427387904":1}');
  });

  it('range-checks integers against their width', () => {
    expect(encodeToString(255, t.uint8())).toBe('255');
    expect(encodeToString(-128n, t.int8())).toBe('-128');
    expect(() => encode(256, t.uint8())).toThrow('cannot encode number 256 as uint8: out of range');
    expect(() => encode(-1, t.uint32())).toThrow(UnsupportedValueError);
    expect(() => encode(2n ** 63n, t.int64())).toThrow(UnsupportedValueError);
  });

  it('rejects values of the wrong kind', () => {
    expect(() => encode('5', t.int32())).toThrow('cannot encode string as int32');
    expect(() => encode(1, t.string())).toThrow('cannot encode number 1 as string');
    expect(() => encode(Number.NaN)).toThrow(UnsupportedValueError);
  });

  it('infers descriptors when none is given', () => {
    expect(encodeToString(null)).toBe('null');
    expect(encodeToString([1, 'two', false, 2.5])).toBe('[1,"two",false,2.5]');
    expect(encodeToString({ nested: { list: [] } })).toBe('{"nested":{"list":[]}}');
    expect(encodeToString(new Uint8Array([0x68, 0x69]))).toBe('"hi"');
  });

  it('encodes typed arrays element by element', () => {
    expect(encodeToString(new Int16Array([-1, 2]), t.array(t.int16()))).toBe('[-1,2]');
    expect(encodeToString(new BigInt64Array([5n]), t.array(t.int64()))).toBe('[5]');
  });

  it('renders nil and empty containers differently', () => {
    const Holder = t.struct('Holder', { list: t.array(t.string()), raw: t.bytes(), map: t.record(t.bool()) });
    expect(encodeToString({ list: null, raw: null, map: null }, Holder)).toBe('{"list":null,"raw":null,"map":null}');
    expect(encodeToString({ list: [], raw: new Uint8Array(0), map: {} }, Holder)).toBe('{"list":[],"raw":"","map":{}}');
  });

  it('returns the stream to the pool when encoding fails', () => {
    const before = streamPool.stats();
    expect(() => encode({ v: 1.5 }, t.struct('Bad', { v: t.int8() }))).toThrow(UnsupportedValueError);
    const after = streamPool.stats();
    expect(after.idle).toBe(Math.max(before.idle, 1));
  });

  it('round-trips through JSON.parse', () => {
    const Row = t.struct('Row', {
      id: t.int32(),
      label: t.string(),
      ok: t.bool(),
      ratio: t.float64(),
      tags: field(t.array(t.string()), { omitEmpty: true }),
    });
    fc.assert(
      fc.property(
        fc.record({
          id: fc.integer({ min: -(2 ** 31), max: 2 ** 31 - 1 }),
          label: fc.fullUnicodeString({ maxLength: 20 }),
          ok: fc.boolean(),
          ratio: fc.double({ min: -1e6, max: 1e6, noNaN: true }),
          tags: fc.array(fc.string({ maxLength: 5 }), { minLength: 1, maxLength: 3 }),
        }),
        (row) => {
          const parsed: unknown = JSON.parse(encodeToString(row, Row));
          expect(parsed).toMatchObject({ id: row.id, label: row.label, ok: row.ok, tags: row.tags });
          if (typeof parsed === 'object' && parsed !== null && 'ratio' in parsed && typeof parsed.ratio === 'number') {
            const scale = Math.max(Math.abs(row.ratio), 1e-4);
            expect(Math.abs(parsed.ratio - row.ratio) / scale).toBeLessThan(1e-5);
          } else {
            expect.unreachable();
          }
        },
      ),
    );
  });
});

describe('JsonEncoder', () => {
  it('sorts map keys when configured', () => {
    const sorted = new JsonEncoder({ sortMapKeys: true });
    const unsorted = new JsonEncoder({ sortMapKeys: false });
    const value = { b: 1, a: { d: 2, c: 3 } };
    expect(sorted.encodeToString(value)).toBe('{"a":{"c":3,"d":2},"b":1}');
    expect(unsorted.encodeToString(value)).toBe('{"b":1,"a":{"d":2,"c":3}}');
  });

  it('does not leak sorted mode into later calls', () => {
    const sorted = new JsonEncoder({ sortMapKeys: true });
    const unsorted = new JsonEncoder({ sortMapKeys: false });
    sorted.encode({ b: 1, a: 2 });
    expect(unsorted.encodeToString({ b: 1, a: 2 })).toBe('{"b":1,"a":2}');
  });

  it('validates its options', () => {
    expect(() => new JsonEncoder({ sortMapKeys: 1 })).toThrow(ConfigError);
  });

  it('uses the registry it is given', () => {
    class Secret {
      constructor(readonly value: string) {}
    }
    const registry = new EncoderRegistry().bind(Secret, t.struct('Secret', {}));
    expect(new JsonEncoder({}, registry).encodeToString(new Secret('test-secret'))).toBe('{}');
  });
});

describe('estimateSize', () => {
  it('scales with the root container', () => {
    expect(estimateSize(new Map([['a', 1]]))).toBe(32);
    expect(estimateSize(new Map([['a', 'b']]), t.record(t.string()))).toBe(24);
    expect(estimateSize([1, 2])).toBe(32);
    expect(estimateSize(['a', 'b'], t.array(t.string()))).toBe(24);
    expect(estimateSize({ a: 1, b: 2 })).toBe(64);
  });

  it('adds room for quotes to strings and bytes', () => {
    expect(estimateSize('abcd')).toBe(20);
    expect(estimateSize(new Uint8Array(10))).toBe(26);
  });

  it('uses a flat guess for everything else', () => {
    expect(estimateSize(5)).toBe(256);
    expect(estimateSize({ a: 1 }, Doc)).toBe(256);
  });
});
