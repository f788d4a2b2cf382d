// ============================================================================
// @jsonjet/core — Byte-Level Number Parsing
// ============================================================================
//
// Parses numbers directly from UTF-8 byte spans without building a string.
// Integer overflow SATURATES to the type's min/max instead of failing; an
// explicit bit size (8/16/32) then range-checks the result.
//
// parseFloatBytes is an approximation (digit-by-digit accumulation, scaled
// exponent) and is not correctly rounded; results may differ from
// Number.parseFloat in the last bits for long mantissas.
// ============================================================================

import { NumberRangeError, NumberSyntaxError } from './errors.js';

export type IntBitSize = 8 | 16 | 32 | 64;

const PLUS = 0x2b;
const MINUS = 0x2d;
const DOT = 0x2e;
const LOWER_E = 0x65;
const UPPER_E = 0x45;

const INT64_MAX = 2n ** 63n - 1n;
const INT64_MIN_MAGNITUDE = 2n ** 63n;
const UINT64_MAX = 2n ** 64n - 1n;

const INT_RANGES: Record<8 | 16 | 32, readonly [bigint, bigint]> = {
  8: [-128n, 127n],
  16: [-32768n, 32767n],
  32: [-2147483648n, 2147483647n],
};

const UINT_MAX: Record<8 | 16 | 32, bigint> = {
  8: 255n,
  16: 65535n,
  32: 4294967295n,
};

const textDecoder = new TextDecoder();

function inputText(b: Uint8Array): string {
  return textDecoder.decode(b);
}

/** Value of an ASCII digit or letter (0-35), -1 otherwise. */
function digitValue(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30;
  if (c >= 0x61 && c <= 0x7a) return c - 0x61 + 10;
  if (c >= 0x41 && c <= 0x5a) return c - 0x41 + 10;
  return -1;
}

function checkBase(base: number): void {
  if (!Number.isInteger(base) || base < 2 || base > 36) {
    throw new RangeError(`invalid base ${base}`);
  }
}

/**
 * Accumulate the digits of `b[start..]` in `base`, saturating at `limit`.
 * Every character is validated even after saturation.
 */
function accumulateDigits(b: Uint8Array, start: number, base: number, limit: bigint): bigint {
  const bigBase = BigInt(base);
  const smallLimit = Math.floor(Number.MAX_SAFE_INTEGER / base) - 1;
  let small = 0;
  let big: bigint | undefined;
  let saturated = false;

  for (let i = start; i < b.length; i++) {
    const v = digitValue(b[i]);
    if (v < 0) {
      throw new NumberSyntaxError('invalid digit character', inputText(b));
    }
    if (v >= base) {
      throw new NumberSyntaxError(`digit out of range for base ${base}`, inputText(b));
    }
    if (saturated) continue;

    if (big === undefined) {
      if (small <= smallLimit) {
        small = small * base + v;
        continue;
      }
      big = BigInt(small);
    }
    big = big * bigBase + BigInt(v);
    if (big > limit) {
      big = limit;
      saturated = true;
    }
  }

  if (big !== undefined) return big;
  const result = BigInt(small);
  return result > limit ? limit : result;
}

/**
 * Parse a signed integer from bytes.
 *
 * Accepts an optional `+`/`-` followed by digits in `base` (2-36, letters
 * of either case above 9). Values beyond the int64 range saturate to
 * -2^63 / 2^63-1. With `bitSize` 8, 16 or 32 the final value must fit.
 *
 * @throws NumberSyntaxError on empty input, a bare sign or a bad digit
 * @throws NumberRangeError when the value does not fit `bitSize`
 *
 * @example
 * ```ts
 * parseIntBytes(new TextEncoder().encode('-42'));                  // -42n
 * parseIntBytes(new TextEncoder().encode('ff'), 16);               // 255n
 * parseIntBytes(new TextEncoder().encode('99999999999999999999')); // 9223372036854775807n
 * ```
 */
export function parseIntBytes(b: Uint8Array, base = 10, bitSize: IntBitSize = 64): bigint {
  checkBase(base);
  if (b.length === 0) {
    throw new NumberSyntaxError('empty input', '');
  }

  let i = 0;
  let negative = false;
  if (b[0] === PLUS) {
    i = 1;
  } else if (b[0] === MINUS) {
    negative = true;
    i = 1;
  }
  if (i >= b.length) {
    throw new NumberSyntaxError('no digits', inputText(b));
  }

  const magnitude = accumulateDigits(b, i, base, negative ? INT64_MIN_MAGNITUDE : INT64_MAX);
  const n = negative ? -magnitude : magnitude;

  if (bitSize !== 64) {
    const [min, max] = INT_RANGES[bitSize];
    if (n < min || n > max) {
      throw new NumberRangeError(inputText(b), bitSize, true);
    }
  }
  return n;
}

/**
 * Parse an unsigned integer from bytes. Same rules as `parseIntBytes`
 * without a minus sign; overflow saturates to 2^64-1.
 */
export function parseUintBytes(b: Uint8Array, base = 10, bitSize: IntBitSize = 64): bigint {
  checkBase(base);
  if (b.length === 0) {
    throw new NumberSyntaxError('empty input', '');
  }

  const i = b[0] === PLUS ? 1 : 0;
  if (i >= b.length) {
    throw new NumberSyntaxError('no digits', inputText(b));
  }

  const n = accumulateDigits(b, i, base, UINT64_MAX);
  if (bitSize !== 64 && n > UINT_MAX[bitSize]) {
    throw new NumberRangeError(inputText(b), bitSize, false);
  }
  return n;
}

function isDigit(c: number): boolean {
  return c >= 0x30 && c <= 0x39;
}

/**
 * Parse a decimal float from bytes: `[+-]digits[.digits][(e|E)[+-]digits]`.
 *
 * @throws NumberSyntaxError on empty input, a bare sign, no digits, a stray
 * character or a malformed exponent
 */
export function parseFloatBytes(b: Uint8Array, bitSize: 32 | 64 = 64): number {
  if (b.length === 0) {
    throw new NumberSyntaxError('empty input', '');
  }

  let i = 0;
  let negative = false;
  if (b[0] === PLUS) {
    i = 1;
  } else if (b[0] === MINUS) {
    negative = true;
    i = 1;
  }

  let n = 0;
  let sawDigit = false;
  let sawDot = false;

  for (; i < b.length; i++) {
    const c = b[i];
    if (c === DOT) {
      sawDot = true;
      i++;
      break;
    }
    if (c === LOWER_E || c === UPPER_E) break;
    if (!isDigit(c)) {
      throw new NumberSyntaxError('invalid number character', inputText(b));
    }
    sawDigit = true;
    n = n * 10 + (c - 0x30);
  }

  if (sawDot) {
    let weight = 0.1;
    for (; i < b.length; i++) {
      const c = b[i];
      if (c === LOWER_E || c === UPPER_E) break;
      if (!isDigit(c)) {
        throw new NumberSyntaxError('invalid number character', inputText(b));
      }
      sawDigit = true;
      n += weight * (c - 0x30);
      weight *= 0.1;
    }
  }

  if (!sawDigit) {
    throw new NumberSyntaxError('no digits', inputText(b));
  }

  // i is either at the end or at 'e'/'E'
  if (i < b.length) {
    i++;
    if (i >= b.length) {
      throw new NumberSyntaxError('malformed exponent', inputText(b));
    }
    let expSign = 1;
    if (b[i] === PLUS) {
      i++;
    } else if (b[i] === MINUS) {
      expSign = -1;
      i++;
    }
    if (i >= b.length || !isDigit(b[i])) {
      throw new NumberSyntaxError('malformed exponent', inputText(b));
    }

    let exp = 0;
    for (; i < b.length; i++) {
      const c = b[i];
      if (!isDigit(c)) {
        throw new NumberSyntaxError('invalid exponent character', inputText(b));
      }
      // past a few hundred steps the value is already 0 or Infinity
      if (exp < 100_000) exp = exp * 10 + (c - 0x30);
    }

    for (let j = 0; j < exp && n !== 0 && Number.isFinite(n); j++) {
      n = expSign > 0 ? n * 10 : n / 10;
    }
  }

  if (negative) n = -n;
  return bitSize === 32 ? Math.fround(n) : n;
}
