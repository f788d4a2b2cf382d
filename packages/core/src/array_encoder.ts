// ============================================================================
// @jsonjet/core — Array Encoder
// ============================================================================

import { COMMA, EMPTY_ARRAY, LBRACKET, NULL_LITERAL, RBRACKET, type Encoder } from './encoder.js';
import { UnsupportedValueError } from './errors.js';
import type { EncoderStream } from './stream.js';

function isSequence(value: unknown): value is ArrayLike<unknown> {
  return Array.isArray(value) || (ArrayBuffer.isView(value) && !(value instanceof DataView));
}

/**
 * Homogeneous array (or typed array): every element goes through one
 * element encoder. `null`/`undefined` render `null`, an empty array `[]`.
 */
export class ArrayEncoder implements Encoder {
  constructor(
    private readonly elem: Encoder,
    readonly typeName: string,
  ) {}

  appendTo(stream: EncoderStream, value: unknown): void {
    if (value === null || value === undefined) {
      stream.writeAscii(NULL_LITERAL);
      return;
    }
    if (!isSequence(value)) {
      throw new UnsupportedValueError(this.typeName, value);
    }
    const n = value.length;
    if (n === 0) {
      stream.writeAscii(EMPTY_ARRAY);
      return;
    }

    stream.writeByte(LBRACKET);
    this.elem.appendTo(stream, value[0]);
    for (let i = 1; i < n; i++) {
      stream.writeByte(COMMA);
      this.elem.appendTo(stream, value[i]);
    }
    stream.writeByte(RBRACKET);
  }
}
