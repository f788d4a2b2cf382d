// ============================================================================
// @jsonjet/core — Encoder Contract
// ============================================================================

import type { EncoderStream } from './stream.js';

/**
 * One encoding strategy, compiled once per type descriptor and reused for
 * every value of that type. `appendTo` writes the JSON rendering of `value`
 * to the stream or throws; it never leaves the stream in use elsewhere.
 */
export interface Encoder {
  appendTo(stream: EncoderStream, value: unknown): void;
}

export const NULL_LITERAL = 'null';
export const EMPTY_OBJECT = '{}';
export const EMPTY_ARRAY = '[]';

export const LBRACE = 0x7b;
export const RBRACE = 0x7d;
export const LBRACKET = 0x5b;
export const RBRACKET = 0x5d;
export const COMMA = 0x2c;
export const COLON = 0x3a;
export const QUOTE = 0x22;

/** Narrow to an indexable object (not null, not an array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nullable reference: `null`/`undefined` render the null literal, anything
 * else goes to the element encoder.
 */
export class PointerEncoder implements Encoder {
  constructor(private readonly elem: Encoder) {}

  appendTo(stream: EncoderStream, value: unknown): void {
    if (value === null || value === undefined) {
      stream.writeAscii(NULL_LITERAL);
      return;
    }
    this.elem.appendTo(stream, value);
  }
}
