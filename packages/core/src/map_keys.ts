// ============================================================================
// @jsonjet/core — Map Key Encoders
// ============================================================================
//
// JSON object keys are strings. Supported key kinds:
//   - string        the text itself
//   - int / uint    decimal text of the number
//   - text          the key's marshalText() result (null key -> "")
//   - any           chosen per key from its runtime kind
// Any other key kind gets an encoder that fails on first use, so an empty
// map of that type still encodes as `{}`.
// ============================================================================

import { QUOTE } from './encoder.js';
import { KeyMarshalError, UnsupportedKeyTypeError, UnsupportedValueError } from './errors.js';
import { appendQuotedString } from './escape.js';
import { appendInt, appendUint } from './number_format.js';
import { intEncoder, uintEncoder, type IntegerEncoder } from './scalar_encoders.js';
import { EncoderStream } from './stream.js';
import { isTextMarshaler, typeName, type JsonType } from './types.js';

export interface KeyEncoder {
  /** Write the key as a quoted JSON string. */
  appendKey(stream: EncoderStream, key: unknown): void;
  /** Rendered key text as UTF-8 (unquoted), for ordering keys. */
  resolveKey(key: unknown): Uint8Array;
}

const utf8 = new TextEncoder();
const EMPTY_KEY = new Uint8Array(0);

export class StringKeyEncoder implements KeyEncoder {
  appendKey(stream: EncoderStream, key: unknown): void {
    appendQuotedString(stream, this.text(key));
  }

  resolveKey(key: unknown): Uint8Array {
    return utf8.encode(this.text(key));
  }

  private text(key: unknown): string {
    if (typeof key !== 'string') {
      throw new UnsupportedValueError('string', key);
    }
    return key;
  }
}

export class IntKeyEncoder implements KeyEncoder {
  private readonly scratch = new EncoderStream(24);

  constructor(private readonly number: IntegerEncoder) {}

  appendKey(stream: EncoderStream, key: unknown): void {
    const n = this.number.check(key);
    stream.writeByte(QUOTE);
    this.appendNumber(stream, n);
    stream.writeByte(QUOTE);
  }

  resolveKey(key: unknown): Uint8Array {
    const n = this.number.check(key);
    this.scratch.reset();
    this.appendNumber(this.scratch, n);
    return this.scratch.toBytes();
  }

  private appendNumber(stream: EncoderStream, n: number | bigint): void {
    if (this.number.signed) {
      appendInt(stream, n);
    } else {
      appendUint(stream, n);
    }
  }
}

export class TextKeyEncoder implements KeyEncoder {
  appendKey(stream: EncoderStream, key: unknown): void {
    appendQuotedString(stream, this.text(key));
  }

  resolveKey(key: unknown): Uint8Array {
    const text = this.text(key);
    return text.length === 0 ? EMPTY_KEY : utf8.encode(text);
  }

  private text(key: unknown): string {
    if (key === null || key === undefined) return '';
    if (!isTextMarshaler(key)) {
      throw new UnsupportedKeyTypeError(kindOf(key));
    }
    try {
      return key.marshalText();
    } catch (err) {
      throw new KeyMarshalError(err);
    }
  }
}

export class UnsupportedKeyEncoder implements KeyEncoder {
  constructor(readonly typeName: string) {}

  appendKey(): void {
    throw new UnsupportedKeyTypeError(this.typeName);
  }

  resolveKey(): Uint8Array {
    throw new UnsupportedKeyTypeError(this.typeName);
  }
}

const INT64_MAX = 2n ** 63n - 1n;

const stringKeys = new StringKeyEncoder();
const textKeys = new TextKeyEncoder();
const int64Keys = new IntKeyEncoder(intEncoder(64));
const uint64Keys = new IntKeyEncoder(uintEncoder(64));

/**
 * Keys of `Map<unknown, V>` / `map<any, V>`: the key encoder is picked
 * from each key's runtime kind.
 */
export class DynamicKeyEncoder implements KeyEncoder {
  appendKey(stream: EncoderStream, key: unknown): void {
    this.keysFor(key).appendKey(stream, key);
  }

  resolveKey(key: unknown): Uint8Array {
    return this.keysFor(key).resolveKey(key);
  }

  private keysFor(key: unknown): KeyEncoder {
    if (typeof key === 'string') return stringKeys;
    if (typeof key === 'number' && Number.isInteger(key)) return int64Keys;
    if (typeof key === 'bigint') return key > INT64_MAX ? uint64Keys : int64Keys;
    if (isTextMarshaler(key)) return textKeys;
    throw new UnsupportedKeyTypeError(kindOf(key));
  }
}

/** Kind name of a runtime key, for error messages. */
function kindOf(key: unknown): string {
  if (key === null) return 'null';
  if (typeof key === 'number') return 'float64';
  if (typeof key === 'boolean') return 'bool';
  if (Array.isArray(key)) return 'array';
  return typeof key;
}

const intKeys = new Map<string, IntKeyEncoder>();

function intKeyEncoder(number: IntegerEncoder): IntKeyEncoder {
  let keys = intKeys.get(number.typeName);
  if (!keys) {
    keys = new IntKeyEncoder(number);
    intKeys.set(number.typeName, keys);
  }
  return keys;
}

/**
 * Key encoder for a map's key descriptor.
 */
export function buildKeyEncoder(type: JsonType): KeyEncoder {
  switch (type.kind) {
    case 'string':
      return stringKeys;
    case 'int':
      return intKeyEncoder(intEncoder(type.bits));
    case 'uint':
      return intKeyEncoder(uintEncoder(type.bits));
    case 'text':
      return textKeys;
    case 'any':
      return new DynamicKeyEncoder();
    case 'pointer':
      return type.elem.kind === 'text' ? textKeys : new UnsupportedKeyEncoder(typeName(type));
    case 'lazy':
      return buildKeyEncoder(type.resolve());
    default:
      return new UnsupportedKeyEncoder(typeName(type));
  }
}
