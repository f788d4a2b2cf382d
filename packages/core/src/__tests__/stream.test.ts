import { afterEach, describe, expect, it } from 'vitest';
import { ObjectPool } from '../pool.js';
import {
  DEFAULT_STREAM_CAPACITY,
  EncoderStream,
  STREAM_HIGH_WATER_MARK,
  acquireStream,
  releaseStream,
  streamPool,
} from '../stream.js';

const decoder = new TextDecoder();

describe('EncoderStream', () => {
  it('writes bytes, pairs, ranges and ASCII text', () => {
    const stream = new EncoderStream(2);
    stream.writeByte(0x5b);
    stream.writeAscii('null');
    stream.writeBytePair(0x2c, 0x22);
    stream.writeRange(new TextEncoder().encode('xabcx'), 1, 4);
    stream.writeBytes(new TextEncoder().encode('"]'));
    expect(decoder.decode(stream.toBytes())).toBe('[null,"abc"]');
    expect(stream.length).toBe(12);
  });

  it('doubles capacity until the reservation fits', () => {
    const stream = new EncoderStream(4);
    stream.writeAscii('ab');
    stream.reserve(10);
    expect(stream.capacity).toBe(16);
    expect(decoder.decode(stream.toBytes())).toBe('ab');
  });

  it('fills claimed spans by offset', () => {
    const stream = new EncoderStream(8);
    stream.writeByte(0x41);
    const start = stream.claim(2);
    stream.setByte(start + 1, 0x43);
    stream.setByte(start, 0x42);
    expect(start).toBe(1);
    expect(decoder.decode(stream.toBytes())).toBe('ABC');
  });

  it('returns copies that do not alias the buffer', () => {
    const stream = new EncoderStream(8);
    stream.writeAscii('abc');
    const out = stream.toBytes();
    stream.reset();
    stream.writeAscii('xyz');
    expect(decoder.decode(out)).toBe('abc');
  });
});

describe('stream pool', () => {
  afterEach(() => {
    streamPool.clear();
  });

  it('reuses released streams', () => {
    const first = acquireStream();
    first.writeAscii('abc');
    releaseStream(first);

    const second = acquireStream();
    expect(second).toBe(first);
    expect(second.length).toBe(0);
    expect(streamPool.stats()).toMatchObject({ created: 1, reused: 1 });
    releaseStream(second);
  });

  it('sizes a stream to the estimate', () => {
    const stream = acquireStream(5000);
    expect(stream.capacity).toBe(5000);
    releaseStream(stream);
  });

  it('replaces buffers that grew past the high-water mark', () => {
    const stream = acquireStream();
    stream.reserve(STREAM_HIGH_WATER_MARK + 1);
    expect(stream.capacity).toBeGreaterThan(STREAM_HIGH_WATER_MARK);
    releaseStream(stream);

    const again = acquireStream();
    expect(again).toBe(stream);
    expect(again.capacity).toBe(DEFAULT_STREAM_CAPACITY);
    releaseStream(again);
  });

  it('keeps buffers at or below the high-water mark', () => {
    const stream = acquireStream(STREAM_HIGH_WATER_MARK);
    releaseStream(stream);
    expect(acquireStream().capacity).toBe(STREAM_HIGH_WATER_MARK);
  });

  it('clears sorted-key mode on release', () => {
    const stream = acquireStream();
    stream.sortMapKeys = true;
    releaseStream(stream);
    expect(acquireStream().sortMapKeys).toBe(false);
  });
});

describe('ObjectPool', () => {
  it('discards objects that fail validation', () => {
    const pool = new ObjectPool<number[]>({
      name: 'test',
      factory: () => [],
      reset: (a) => {
        a.length = 0;
      },
      validate: (a) => a.length <= 2,
    });

    const small = pool.acquire();
    small.push(1);
    pool.release(small);

    const big = pool.acquire();
    expect(big).toBe(small);
    expect(big).toEqual([]);
    big.push(1, 2, 3);
    pool.release(big);

    expect(pool.stats()).toEqual({ created: 1, reused: 1, discarded: 1, idle: 0 });
  });

  it('drops releases beyond maxIdle', () => {
    const pool = new ObjectPool({ name: 'test', factory: () => ({}), maxIdle: 1 });
    const a = pool.acquire();
    const b = pool.acquire();
    pool.release(a);
    pool.release(b);
    expect(pool.stats()).toEqual({ created: 2, reused: 0, discarded: 1, idle: 1 });
  });

  it('rejects a negative maxIdle', () => {
    expect(() => new ObjectPool({ name: 'test', factory: () => 1, maxIdle: -1 })).toThrow(RangeError);
  });
});
