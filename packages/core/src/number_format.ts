// ============================================================================
// @jsonjet/core — Integer & Float Rendering
// ============================================================================
//
// Writes decimal text straight into an EncoderStream:
//   - u < 10          single digit
//   - u < 10 000      copied from the pre-rendered digit table
//   - u < 100 000 000 right-to-left, two digits per division
//   - otherwise       general-purpose formatter
//
// Floats that hold an integer in range render as integers. Everything else
// is rendered with 6 significant digits (%g style). This trades exact
// round-trips for speed and short output.
// ============================================================================

import { UnsupportedValueError } from './errors.js';
import type { EncoderStream } from './stream.js';

const ZERO = 0x30;
const FIVE = 0x35;
const MINUS = 0x2d;

/**
 * "0000".."9999", four ASCII bytes per entry, zero-padded so any entry
 * below 100 also serves as a two-digit pair at offset +2.
 */
const DIGIT_TABLE: Uint8Array = buildDigitTable();

function buildDigitTable(): Uint8Array {
  const table = new Uint8Array(10000 * 4);
  for (let i = 0; i < 10000; i++) {
    const o = i * 4;
    table[o] = ZERO + Math.floor(i / 1000);
    table[o + 1] = ZERO + (Math.floor(i / 100) % 10);
    table[o + 2] = ZERO + (Math.floor(i / 10) % 10);
    table[o + 3] = ZERO + (i % 10);
  }
  return table;
}

const TWO_POW_63 = 2 ** 63;
const MIN_INT64 = -(2n ** 63n);
const MIN_INT64_TEXT = '-9223372036854775808';

// ── Integers ────────────────────────────────────────────────────────────────

/**
 * Append an unsigned integer. `u` is a non-negative integral number or a
 * bigint; callers range-check before calling.
 */
export function appendUint(stream: EncoderStream, u: number | bigint): void {
  if (typeof u === 'bigint') {
    if (u < 100_000_000n) {
      appendUintNumber(stream, Number(u));
    } else {
      stream.writeAscii(u.toString());
    }
    return;
  }
  appendUintNumber(stream, u);
}

/**
 * Append a signed integer: `-` followed by the magnitude.
 */
export function appendInt(stream: EncoderStream, i: number | bigint): void {
  if (typeof i === 'bigint') {
    if (i === MIN_INT64) {
      stream.writeAscii(MIN_INT64_TEXT);
      return;
    }
    if (i < 0n) {
      stream.writeByte(MINUS);
      appendUint(stream, -i);
      return;
    }
    appendUint(stream, i);
    return;
  }
  if (i < 0) {
    stream.writeByte(MINUS);
    appendUintNumber(stream, -i);
    return;
  }
  appendUintNumber(stream, i);
}

function appendUintNumber(stream: EncoderStream, u: number): void {
  if (u < 10) {
    stream.writeByte(ZERO + u);
    return;
  }
  if (u < 10000) {
    const len = u < 100 ? 2 : u < 1000 ? 3 : 4;
    const end = u * 4 + 4;
    stream.writeRange(DIGIT_TABLE, end - len, end);
    return;
  }
  if (u < 100_000_000) {
    appendUintPairs(stream, u);
    return;
  }
  stream.writeAscii(Number.isSafeInteger(u) ? String(u) : BigInt(u).toString());
}

/** 10 000 <= u < 100 000 000. */
function appendUintPairs(stream: EncoderStream, u: number): void {
  let count = 0;
  for (let t = u; t > 0; t = Math.floor(t / 10)) count++;

  const start = stream.claim(count);
  let pos = start + count - 1;
  while (u >= 100) {
    const q = Math.floor(u / 100);
    const r = u - q * 100;
    u = q;
    stream.setByte(pos, DIGIT_TABLE[r * 4 + 3]);
    stream.setByte(pos - 1, DIGIT_TABLE[r * 4 + 2]);
    pos -= 2;
  }
  if (u >= 10) {
    stream.setByte(pos, DIGIT_TABLE[u * 4 + 3]);
    stream.setByte(pos - 1, DIGIT_TABLE[u * 4 + 2]);
  } else {
    stream.setByte(pos, ZERO + u);
  }
}

// ── Floats ──────────────────────────────────────────────────────────────────

/** Integral and inside [-2^63, 2^63). */
function isInt64Valued(f: number): boolean {
  return Number.isInteger(f) && f >= -TWO_POW_63 && f < TWO_POW_63;
}

/** Integral and inside the int32 range. */
function isInt32Valued(f: number): boolean {
  return Number.isInteger(f) && f >= -2147483648 && f <= 2147483647;
}

/**
 * Append a float64. Integral values render as integers; others with
 * 6 significant digits.
 *
 * @throws UnsupportedValueError for NaN and ±Infinity
 */
export function appendFloat64(stream: EncoderStream, f: number): void {
  if (!Number.isFinite(f)) {
    throw new UnsupportedValueError('float64', f, 'not representable in JSON');
  }
  if (isInt64Valued(f)) {
    appendInt(stream, Number.isSafeInteger(f) ? f : BigInt(f));
    return;
  }
  stream.writeAscii(formatSignificant6(f));
}

/**
 * Append a float32. The value is first rounded to single precision.
 *
 * @throws UnsupportedValueError for NaN and ±Infinity (including overflow
 * of the single-precision range)
 */
export function appendFloat32(stream: EncoderStream, f: number): void {
  const single = Math.fround(f);
  if (!Number.isFinite(single)) {
    throw new UnsupportedValueError('float32', f, 'not representable in JSON');
  }
  if (isInt32Valued(single)) {
    appendInt(stream, single);
    return;
  }
  stream.writeAscii(formatSignificant6(single));
}

/**
 * Text form of a float as the float encoders write it.
 *
 * @example
 * ```ts
 * formatFloat(2.5);         // '2.5'
 * formatFloat(1234567.5);   // '1.23457e+06'
 * formatFloat(0.1, 32);     // '0.1'
 * ```
 */
export function formatFloat(f: number, bitSize: 32 | 64 = 64): string {
  const value = bitSize === 32 ? Math.fround(f) : f;
  if (!Number.isFinite(value)) {
    throw new UnsupportedValueError(`float${bitSize}`, f, 'not representable in JSON');
  }
  const integral = bitSize === 32 ? isInt32Valued(value) : isInt64Valued(value);
  if (integral) return BigInt(value).toString();
  return formatSignificant6(value);
}

interface Rounded {
  /** Six significant digits, no decimal point. */
  digits: string;
  /** Decimal exponent of the first digit. */
  exp: number;
}

/**
 * Round a positive finite value to 6 significant digits. Exact halfway
 * cases go to the even neighbour; `toExponential` alone would round them
 * away from zero.
 */
function roundSignificant6(abs: number): Rounded {
  const seven = abs.toExponential(6);
  const sevenE = seven.indexOf('e');
  if (seven.charCodeAt(sevenE - 1) === FIVE) {
    const exp = Number(seven.slice(sevenE + 1));
    const d = BigInt(seven[0] + seven.slice(2, sevenE));
    if (equalsDecimal(abs, d, exp - 6)) {
      let kept = d / 10n;
      if (kept % 2n === 1n) kept += 1n;
      if (kept === 1_000_000n) return { digits: '100000', exp: exp + 1 };
      return { digits: kept.toString(), exp };
    }
  }
  const six = abs.toExponential(5);
  const sixE = six.indexOf('e');
  return { digits: six[0] + six.slice(2, sixE), exp: Number(six.slice(sixE + 1)) };
}

/** Whether `abs` is exactly `d * 10^k`. */
function equalsDecimal(abs: number, d: bigint, k: number): boolean {
  if (Number.isInteger(abs)) {
    return k >= 0 && BigInt(abs) === d * 10n ** BigInt(k);
  }
  if (k >= 0) return false;
  // abs = scaled / 2^shift, both exact
  let scaled = abs;
  let shift = 0n;
  while (!Number.isInteger(scaled)) {
    scaled *= 2;
    shift++;
  }
  return BigInt(scaled) * 10n ** BigInt(-k) === d << shift;
}

/**
 * %g with precision 6: round to 6 significant digits, trim trailing zeros,
 * use exponent form when the decimal exponent is < -4 or >= the precision.
 * Exponents carry a sign and at least two digits (`1e-05`, `1.5e+300`).
 */
function formatSignificant6(f: number): string {
  const sign = f < 0 ? '-' : '';
  const rounded = roundSignificant6(Math.abs(f));
  const exp = rounded.exp;

  let digits = rounded.digits;
  let nd = digits.length;
  while (nd > 1 && digits.charCodeAt(nd - 1) === ZERO) nd--;
  digits = digits.slice(0, nd);

  const dp = exp + 1;
  let eprec = 6;
  if (eprec > nd && nd >= dp) eprec = nd;

  if (exp < -4 || exp >= eprec) {
    const mantissa = nd > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    const absExp = Math.abs(exp);
    return `${sign}${mantissa}e${exp < 0 ? '-' : '+'}${absExp < 10 ? '0' : ''}${absExp}`;
  }

  const prec = 6 > dp ? nd : 6;
  const fracDigits = Math.max(prec - dp, 0);

  let out = sign;
  if (dp > 0) {
    out += digits.slice(0, Math.min(nd, dp));
    for (let i = nd; i < dp; i++) out += '0';
  } else {
    out += '0';
  }
  if (fracDigits > 0) {
    out += '.';
    for (let i = 0; i < fracDigits; i++) {
      const j = dp + i;
      out += j >= 0 && j < nd ? digits[j] : '0';
    }
  }
  return out;
}
