// ============================================================================
// @jsonjet/core — Struct Encoder
// ============================================================================
//
// Field names are quoted (with the trailing colon) once at compile time.
// One of four emission paths is picked per call from data fixed at compile
// time:
//   - no fields          `{}`
//   - exactly one field  no separator bookkeeping
//   - no omitEmpty field plain loop, comma before every field but the first
//   - some omitEmpty     first-written tracking, empty fields skipped
// ============================================================================

import {
  COMMA,
  EMPTY_OBJECT,
  LBRACE,
  NULL_LITERAL,
  RBRACE,
  isRecord,
  type Encoder,
} from './encoder.js';
import { UnsupportedValueError } from './errors.js';
import type { EncoderStream } from './stream.js';
import type { JsonType } from './types.js';

/** Bytes assumed per field value when sizing the output. */
const VALUE_SIZE_GUESS = 20;

export type EmptyCheck = (value: unknown) => boolean;

/**
 * A struct field ready for emission.
 */
export interface CompiledField {
  /** Property read from the value */
  readonly prop: string;
  /** Quoted key with trailing colon, e.g. `"id":` */
  readonly key: Uint8Array;
  readonly encoder: Encoder;
  readonly omitEmpty: boolean;
  readonly isEmpty: EmptyCheck;
}

function isNullish(value: unknown): boolean {
  return value === null || value === undefined;
}

function isZeroNumber(value: unknown): boolean {
  return value === 0 || value === 0n || isNullish(value);
}

function hasNoElements(value: unknown): boolean {
  if (isNullish(value)) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (ArrayBuffer.isView(value)) return value.byteLength === 0;
  return false;
}

function hasNoEntries(value: unknown): boolean {
  if (isNullish(value)) return true;
  if (value instanceof Map) return value.size === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Zero-value test used by `omitEmpty`: `false`, `0`, `''`, empty bytes,
 * arrays and maps, and absent references. Struct values are never empty.
 */
export function emptyCheckFor(type: JsonType): EmptyCheck {
  switch (type.kind) {
    case 'null':
      return () => true;
    case 'bool':
      return (value) => value === false || isNullish(value);
    case 'int':
    case 'uint':
    case 'float32':
    case 'float64':
      return isZeroNumber;
    case 'string':
      return (value) => value === '' || isNullish(value);
    case 'bytes':
    case 'array':
      return hasNoElements;
    case 'map':
      return hasNoEntries;
    case 'lazy': {
      const { resolve } = type;
      let resolved: EmptyCheck | undefined;
      return (value) => {
        resolved ??= emptyCheckFor(resolve());
        return resolved(value);
      };
    }
    case 'struct':
      return () => false;
    default:
      return isNullish;
  }
}

export class StructEncoder implements Encoder {
  private readonly fields: readonly CompiledField[];
  private readonly hasOmitEmpty: boolean;
  private readonly sizeEstimate: number;

  constructor(
    readonly typeName: string,
    fields: readonly CompiledField[],
  ) {
    this.fields = fields;
    this.hasOmitEmpty = fields.some((f) => f.omitEmpty);
    this.sizeEstimate = fields.reduce((sum, f) => sum + f.key.length + 1 + VALUE_SIZE_GUESS, 2);
  }

  appendTo(stream: EncoderStream, value: unknown): void {
    if (value === null || value === undefined) {
      stream.writeAscii(NULL_LITERAL);
      return;
    }
    if (!isRecord(value)) {
      throw new UnsupportedValueError(this.typeName, value);
    }

    switch (this.fields.length) {
      case 0:
        stream.writeAscii(EMPTY_OBJECT);
        return;
      case 1:
        this.appendSingle(stream, value);
        return;
      default:
        stream.reserve(this.sizeEstimate);
        if (this.hasOmitEmpty) {
          this.appendOmitting(stream, value);
        } else {
          this.appendAll(stream, value);
        }
    }
  }

  private appendSingle(stream: EncoderStream, value: Record<string, unknown>): void {
    const f = this.fields[0];
    const v = value[f.prop];
    if (f.omitEmpty && f.isEmpty(v)) {
      stream.writeAscii(EMPTY_OBJECT);
      return;
    }
    stream.writeByte(LBRACE);
    stream.writeBytes(f.key);
    f.encoder.appendTo(stream, v);
    stream.writeByte(RBRACE);
  }

  private appendAll(stream: EncoderStream, value: Record<string, unknown>): void {
    const fields = this.fields;
    stream.writeByte(LBRACE);
    for (let i = 0; i < fields.length; i++) {
      const f = fields[i];
      if (i > 0) stream.writeByte(COMMA);
      stream.writeBytes(f.key);
      f.encoder.appendTo(stream, value[f.prop]);
    }
    stream.writeByte(RBRACE);
  }

  private appendOmitting(stream: EncoderStream, value: Record<string, unknown>): void {
    const fields = this.fields;
    let first = true;
    stream.writeByte(LBRACE);
    for (let i = 0; i < fields.length; i++) {
      const f = fields[i];
      const v = value[f.prop];
      if (f.omitEmpty && f.isEmpty(v)) continue;
      if (!first) stream.writeByte(COMMA);
      first = false;
      stream.writeBytes(f.key);
      f.encoder.appendTo(stream, v);
    }
    stream.writeByte(RBRACE);
  }
}
