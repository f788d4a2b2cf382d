// ============================================================================
// @jsonjet/core — Encoder Stream & Stream Pool
// ============================================================================
//
// One growable byte sink per encode call. Streams are pooled: a released
// stream keeps its buffer unless the buffer grew past the high-water mark,
// in which case it gets a fresh default-capacity buffer.
// ============================================================================

import { isDebugEnabled, logPoolDiscard } from './logger.js';
import { ObjectPool } from './pool.js';

/** Capacity of a fresh stream buffer. */
export const DEFAULT_STREAM_CAPACITY = 2048;

/** Streams whose buffer grew past this are shrunk back on release. */
export const STREAM_HIGH_WATER_MARK = 8192;

/**
 * A growable byte buffer backed by a Uint8Array.
 * Doubles capacity on overflow.
 */
export class EncoderStream {
  private buf: Uint8Array;
  private pos = 0;

  /** Sorted-key mode for map encoders, set per call by the entry point. */
  sortMapKeys = false;

  constructor(initialCapacity = DEFAULT_STREAM_CAPACITY) {
    this.buf = new Uint8Array(initialCapacity);
  }

  /** Current number of bytes written. */
  get length(): number {
    return this.pos;
  }

  /** Size of the backing buffer. */
  get capacity(): number {
    return this.buf.length;
  }

  /** Reset position without re-allocating. */
  reset(): void {
    this.pos = 0;
  }

  /** Swap in a fresh buffer of the given capacity, dropping the content. */
  replaceBuffer(capacity: number): void {
    this.buf = new Uint8Array(capacity);
    this.pos = 0;
  }

  /** Return a trimmed copy of the written bytes (never aliases the buffer). */
  toBytes(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  /**
   * Ensure at least `extra` bytes of capacity remain, growing once.
   * Callers that know their output size up front reserve it here so the
   * writes that follow never reallocate.
   */
  reserve(extra: number): void {
    const needed = this.pos + extra;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length || 1;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
  }

  /** Write a single byte. */
  writeByte(b: number): void {
    this.reserve(1);
    this.buf[this.pos++] = b;
  }

  /** Write two bytes (a separator pair such as `":` or an escape). */
  writeBytePair(a: number, b: number): void {
    this.reserve(2);
    this.buf[this.pos++] = a;
    this.buf[this.pos++] = b;
  }

  /** Write a block of bytes. */
  writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  /** Write `bytes[start, end)` without creating a view first. */
  writeRange(bytes: Uint8Array, start: number, end: number): void {
    const n = end - start;
    this.reserve(n);
    for (let i = start; i < end; i++) {
      this.buf[this.pos++] = bytes[i];
    }
  }

  /** Write a string known to be ASCII (digits, literals). */
  writeAscii(text: string): void {
    this.reserve(text.length);
    for (let i = 0; i < text.length; i++) {
      this.buf[this.pos++] = text.charCodeAt(i);
    }
  }

  /**
   * Open `n` bytes at the tail and return the offset of the first one.
   * Used by writers that fill a span right-to-left.
   */
  claim(n: number): number {
    this.reserve(n);
    const start = this.pos;
    this.pos += n;
    return start;
  }

  /** Store a byte at an offset obtained from `claim`. */
  setByte(offset: number, b: number): void {
    this.buf[offset] = b;
  }

  /**
   * Write a byte without a capacity check. Only valid after a `reserve`
   * that covers it.
   */
  pushUnchecked(b: number): void {
    this.buf[this.pos++] = b;
  }
}

// ── Stream Pool ─────────────────────────────────────────────────────────────

export const streamPool = new ObjectPool<EncoderStream>({
  name: 'stream-pool',
  factory: () => new EncoderStream(DEFAULT_STREAM_CAPACITY),
  reset: (stream) => {
    stream.sortMapKeys = false;
    if (stream.capacity > STREAM_HIGH_WATER_MARK) {
      if (isDebugEnabled()) logPoolDiscard('stream-pool', stream.capacity, STREAM_HIGH_WATER_MARK);
      stream.replaceBuffer(DEFAULT_STREAM_CAPACITY);
    } else {
      stream.reset();
    }
  },
});

/**
 * Acquire a stream whose buffer holds at least `estimatedSize` bytes.
 */
export function acquireStream(estimatedSize = 0): EncoderStream {
  const stream = streamPool.acquire();
  if (stream.capacity < estimatedSize) {
    stream.replaceBuffer(estimatedSize);
  }
  return stream;
}

/**
 * Return a stream to the pool. Its length is reset; a buffer past the
 * high-water mark is replaced by a default-capacity one.
 */
export function releaseStream(stream: EncoderStream): void {
  streamPool.release(stream);
}
