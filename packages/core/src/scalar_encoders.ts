// ============================================================================
// @jsonjet/core — Scalar Encoders
// ============================================================================
//
// Leaf encoders. Each is stateless and shared: integer encoders exist once
// per (signedness, bit width), the rest once per process.
// ============================================================================

import { NULL_LITERAL, type Encoder } from './encoder.js';
import { UnsupportedValueError } from './errors.js';
import { appendQuotedBytes, appendQuotedString } from './escape.js';
import { appendFloat32, appendFloat64, appendInt, appendUint } from './number_format.js';
import type { EncoderStream } from './stream.js';
import { isTextMarshaler, type IntBits } from './types.js';

export class NullEncoder implements Encoder {
  appendTo(stream: EncoderStream): void {
    stream.writeAscii(NULL_LITERAL);
  }
}

export class BoolEncoder implements Encoder {
  appendTo(stream: EncoderStream, value: unknown): void {
    if (typeof value !== 'boolean') {
      throw new UnsupportedValueError('bool', value);
    }
    stream.writeAscii(value ? 'true' : 'false');
  }
}

// ── Integers ────────────────────────────────────────────────────────────────

interface IntRange {
  /** Inclusive lower bound */
  readonly min: number;
  /** Exclusive upper bound (a power of two, exact as a double) */
  readonly limit: number;
  readonly minBig: bigint;
  readonly maxBig: bigint;
}

function intRange(bits: IntBits, signed: boolean): IntRange {
  if (signed) {
    const half = 2n ** BigInt(bits - 1);
    return { min: -Number(half), limit: Number(half), minBig: -half, maxBig: half - 1n };
  }
  const span = 2n ** BigInt(bits);
  return { min: 0, limit: Number(span), minBig: 0n, maxBig: span - 1n };
}

/**
 * Signed or unsigned integer of a fixed width. Accepts integral numbers
 * and bigints inside the width's range.
 */
export class IntegerEncoder implements Encoder {
  private readonly range: IntRange;
  readonly typeName: string;

  constructor(
    readonly bits: IntBits,
    readonly signed: boolean,
  ) {
    this.range = intRange(bits, signed);
    this.typeName = `${signed ? 'int' : 'uint'}${bits}`;
  }

  /** Throws unless `value` is an integer that fits this width. */
  check(value: unknown): number | bigint {
    const { min, limit, minBig, maxBig } = this.range;
    if (typeof value === 'number') {
      if (!Number.isInteger(value)) {
        throw new UnsupportedValueError(this.typeName, value, 'not an integer');
      }
      if (value < min || value >= limit) {
        throw new UnsupportedValueError(this.typeName, value, 'out of range');
      }
      return value;
    }
    if (typeof value === 'bigint') {
      if (value < minBig || value > maxBig) {
        throw new UnsupportedValueError(this.typeName, value, 'out of range');
      }
      return value;
    }
    throw new UnsupportedValueError(this.typeName, value);
  }

  appendTo(stream: EncoderStream, value: unknown): void {
    const n = this.check(value);
    if (this.signed) {
      appendInt(stream, n);
    } else {
      appendUint(stream, n);
    }
  }
}

const SIGNED: Record<IntBits, IntegerEncoder> = {
  8: new IntegerEncoder(8, true),
  16: new IntegerEncoder(16, true),
  32: new IntegerEncoder(32, true),
  64: new IntegerEncoder(64, true),
};

const UNSIGNED: Record<IntBits, IntegerEncoder> = {
  8: new IntegerEncoder(8, false),
  16: new IntegerEncoder(16, false),
  32: new IntegerEncoder(32, false),
  64: new IntegerEncoder(64, false),
};

export function intEncoder(bits: IntBits): IntegerEncoder {
  return SIGNED[bits];
}

export function uintEncoder(bits: IntBits): IntegerEncoder {
  return UNSIGNED[bits];
}

// ── Floats ──────────────────────────────────────────────────────────────────

export class Float64Encoder implements Encoder {
  appendTo(stream: EncoderStream, value: unknown): void {
    if (typeof value !== 'number') {
      throw new UnsupportedValueError('float64', value);
    }
    appendFloat64(stream, value);
  }
}

export class Float32Encoder implements Encoder {
  appendTo(stream: EncoderStream, value: unknown): void {
    if (typeof value !== 'number') {
      throw new UnsupportedValueError('float32', value);
    }
    appendFloat32(stream, value);
  }
}

// ── Text ────────────────────────────────────────────────────────────────────

export class StringEncoder implements Encoder {
  appendTo(stream: EncoderStream, value: unknown): void {
    if (typeof value !== 'string') {
      throw new UnsupportedValueError('string', value);
    }
    appendQuotedString(stream, value);
  }
}

/** `Uint8Array` as a JSON string of its (UTF-8) bytes; `null` for no array. */
export class BytesEncoder implements Encoder {
  appendTo(stream: EncoderStream, value: unknown): void {
    if (value === null || value === undefined) {
      stream.writeAscii(NULL_LITERAL);
      return;
    }
    if (!(value instanceof Uint8Array)) {
      throw new UnsupportedValueError('bytes', value);
    }
    appendQuotedBytes(stream, value);
  }
}

/** Values exposing `marshalText()`, written as the quoted text. */
export class TextMarshalerEncoder implements Encoder {
  appendTo(stream: EncoderStream, value: unknown): void {
    if (value === null || value === undefined) {
      stream.writeAscii(NULL_LITERAL);
      return;
    }
    if (!isTextMarshaler(value)) {
      throw new UnsupportedValueError('text', value, 'no marshalText()');
    }
    appendQuotedString(stream, value.marshalText());
  }
}

/**
 * Last resort for runtime values with no JSON shape of their own
 * (functions, symbols, dates): their string form, quoted.
 */
export class FallbackEncoder implements Encoder {
  appendTo(stream: EncoderStream, value: unknown): void {
    const text = value instanceof Date ? value.toISOString() : String(value);
    appendQuotedString(stream, text);
  }
}

export const nullEncoder = new NullEncoder();
export const boolEncoder = new BoolEncoder();
export const float32Encoder = new Float32Encoder();
export const float64Encoder = new Float64Encoder();
export const stringEncoder = new StringEncoder();
export const bytesEncoder = new BytesEncoder();
export const textMarshalerEncoder = new TextMarshalerEncoder();
export const fallbackEncoder = new FallbackEncoder();
