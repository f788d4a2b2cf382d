import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { KeyMarshalError, UnsupportedKeyTypeError, UnsupportedValueError } from '../errors.js';
import { SORT_SCRATCH_LIMIT, compareBytes, sortScratchPool } from '../map_encoder.js';
import { EncoderRegistry } from '../registry.js';
import { EncoderStream } from '../stream.js';
import { t, type JsonType } from '../types.js';

const decoder = new TextDecoder();
const registry = new EncoderRegistry();

function render(type: JsonType, value: unknown, sorted = false): string {
  const stream = new EncoderStream(8);
  stream.sortMapKeys = sorted;
  registry.encoderFor(type).appendTo(stream, value);
  return decoder.decode(stream.toBytes());
}

class Label {
  constructor(private readonly text: string) {}

  marshalText(): string {
    return this.text;
  }
}

class BrokenLabel {
  marshalText(): string {
    throw new Error('boom');
  }
}

const Counts = t.record(t.int64());
const ById = t.map(t.int64(), t.string());
const ByLabel = t.map(t.text(), t.int8());
const ByFlag = t.map(t.bool(), t.int8());
const Loose = t.record(t.any());
const AnyMap = t.map(t.any(), t.any());

describe('map encoders', () => {
  it('renders null and empty maps', () => {
    expect(render(Counts, null)).toBe('null');
    expect(render(Counts, undefined)).toBe('null');
    expect(render(Counts, {})).toBe('{}');
    expect(render(Counts, new Map())).toBe('{}');
  });

  it('renders a single entry', () => {
    expect(render(Counts, { only: 1 })).toBe('{"only":1}');
    expect(render(Counts, new Map([['only', 1]]), true)).toBe('{"only":1}');
  });

  it('keeps iteration order when unsorted', () => {
    expect(render(Counts, { b: 2, a: 1 })).toBe('{"b":2,"a":1}');
    expect(
      render(
        Counts,
        new Map([
          ['b', 2],
          ['a', 1],
        ]),
      ),
    ).toBe('{"b":2,"a":1}');
  });

  it('orders keys bytewise when sorted', () => {
    expect(render(Counts, { b: 2, a: 1, B: 3 }, true)).toBe('{"B":3,"a":1,"b":2}');
    const ids = new Map([
      [10, 'x'],
      [9, 'y'],
      [-1, 'z'],
    ]);
    expect(render(ById, ids, true)).toBe('{"-1":"z","10":"x","9":"y"}');
  });

  it('escapes keys', () => {
    expect(render(Counts, { 'a"b': 1 })).toBe('{"a\\"b":1}');
    expect(render(Counts, { 'a\nb': 1, c: 2 }, true)).toBe('{"a\\nb":1,"c":2}');
  });

  it('renders integer keys as decimal text', () => {
    expect(render(ById, new Map([[-5n, 'neg']]))).toBe('{"-5":"neg"}');
    const unsigned = t.map(t.uint64(), t.bool());
    expect(render(unsigned, new Map([[18446744073709551615n, true]]))).toBe('{"18446744073709551615":true}');
  });

  it('uses marshalText for text keys', () => {
    const labels = new Map([
      [new Label('b'), 1],
      [new Label('a'), 2],
    ]);
    expect(render(ByLabel, labels)).toBe('{"b":1,"a":2}');
    expect(render(ByLabel, labels, true)).toBe('{"a":2,"b":1}');
    expect(render(ByLabel, new Map([[null, 1]]))).toBe('{"":1}');
  });

  it('wraps marshalText failures in KeyMarshalError', () => {
    const broken = new Map([[new BrokenLabel(), 1]]);
    try {
      render(ByLabel, broken);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(KeyMarshalError);
      if (err instanceof KeyMarshalError) {
        expect(err.message).toBe('encoding error for map key: boom');
        expect(err.cause).toBeInstanceOf(Error);
      }
    }
  });

  it('fails on unsupported key kinds only when a key is written', () => {
    expect(render(ByFlag, new Map())).toBe('{}');
    expect(() => render(ByFlag, new Map([[true, 1]]))).toThrow(UnsupportedKeyTypeError);
    expect(() =>
      render(
        ByFlag,
        new Map([
          [true, 1],
          [false, 2],
        ]),
        true,
      ),
    ).toThrow('unsupported map key type: bool');
  });

  it('rejects plain objects for non-text keys', () => {
    expect(() => render(ById, { 1: 'a' })).toThrow(UnsupportedValueError);
  });

  it('propagates value errors unchanged', () => {
    const small = t.record(t.uint8());
    expect(() => render(small, { a: 256 })).toThrow('cannot encode number 256 as uint8: out of range');
  });

  it('picks value encoders per value in generic maps', () => {
    const value = { a: 1, b: 'x', c: [true, null], d: { e: 2.5 } };
    expect(render(Loose, value)).toBe('{"a":1,"b":"x","c":[true,null],"d":{"e":2.5}}');
  });

  it('picks key encoders per key for any-keyed maps', () => {
    const mixed = new Map<unknown, unknown>([
      [1, 'a'],
      ['b', 2n],
      [new Label('c'), false],
    ]);
    expect(render(AnyMap, mixed)).toBe('{"1":"a","b":2,"c":false}');
    expect(() => render(AnyMap, new Map([[1.5, 'x']]))).toThrow('unsupported map key type: float64');
  });

  it('renders the same bytes for any insertion order when sorted', () => {
    fc.assert(
      fc.property(fc.dictionary(fc.string(), fc.integer()), (dict) => {
        const entries = Object.entries(dict);
        const forward = new Map(entries);
        const backward = new Map([...entries].reverse());
        expect(render(Counts, forward, true)).toBe(render(Counts, backward, true));
      }),
    );
  });

  it('does not pool scratch space from very large maps', () => {
    const before = sortScratchPool.stats().discarded;
    const big = new Map<string, number>();
    for (let i = 0; i <= SORT_SCRATCH_LIMIT; i++) big.set(`k${i}`, i);
    render(Counts, big, true);
    expect(sortScratchPool.stats().discarded).toBe(before + 1);

    const small = new Map([
      ['x', 1],
      ['y', 2],
    ]);
    render(Counts, small, true);
    expect(sortScratchPool.stats().discarded).toBe(before + 1);
  });
});

describe('compareBytes', () => {
  it('orders by bytes, then by length', () => {
    const enc = new TextEncoder();
    expect(compareBytes(enc.encode('a'), enc.encode('b'))).toBeLessThan(0);
    expect(compareBytes(enc.encode('ab'), enc.encode('a'))).toBeGreaterThan(0);
    expect(compareBytes(enc.encode('Z'), enc.encode('a'))).toBeLessThan(0);
    expect(compareBytes(enc.encode('same'), enc.encode('same'))).toBe(0);
  });
});
