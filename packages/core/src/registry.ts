// ============================================================================
// @jsonjet/core — Encoder Registry
// ============================================================================
//
// Compiles type descriptors to encoders and caches them by descriptor
// identity. Compilation happens once per descriptor; every later lookup is
// a single WeakMap read.
//
// Recursive descriptors (through `t.lazy`) are handled with a forwarding
// encoder: before a descriptor's encoder is built, a placeholder that
// delegates to the finished encoder is cached, so a self-reference met
// during the build resolves to the placeholder instead of recursing.
// ============================================================================

import { ArrayEncoder } from './array_encoder.js';
import { PointerEncoder, type Encoder } from './encoder.js';
import { JsonJetError } from './errors.js';
import { quote } from './escape.js';
import { isDebugEnabled, logEncoderCompiled } from './logger.js';
import { GenericMapEncoder, MapEncoder } from './map_encoder.js';
import { buildKeyEncoder, type KeyEncoder } from './map_keys.js';
import {
  boolEncoder,
  bytesEncoder,
  fallbackEncoder,
  float32Encoder,
  float64Encoder,
  intEncoder,
  nullEncoder,
  stringEncoder,
  textMarshalerEncoder,
  uintEncoder,
} from './scalar_encoders.js';
import type { EncoderStream } from './stream.js';
import { StructEncoder, emptyCheckFor, type CompiledField } from './struct_encoder.js';
import { isTextMarshaler, t, typeName, type JsonType, type StructType } from './types.js';

/** Constructor of a class whose instances encode with a bound descriptor. */
export type BindableClass = abstract new (...args: never[]) => object;

const INT64_MAX = 2n ** 63n - 1n;

const ANY_ARRAY = t.array(t.any());
const ANY_RECORD = t.record(t.any());
const ANY_MAP = t.map(t.any(), t.any());

/**
 * Stands in for an encoder while it is being built; delegates once the
 * real encoder is set.
 */
class ForwardingEncoder implements Encoder {
  target: Encoder | undefined;

  constructor(private readonly typeName: string) {}

  appendTo(stream: EncoderStream, value: unknown): void {
    if (!this.target) {
      throw new JsonJetError(`encoder for ${this.typeName} used before it was built`);
    }
    this.target.appendTo(stream, value);
  }
}

/** `any`: encoder chosen from the runtime value on every call. */
class DynamicEncoder implements Encoder {
  constructor(private readonly registry: EncoderRegistry) {}

  appendTo(stream: EncoderStream, value: unknown): void {
    this.registry.encoderForValue(value).appendTo(stream, value);
  }
}

export class EncoderRegistry {
  private readonly cache = new WeakMap<JsonType, Encoder>();
  private readonly keyCache = new WeakMap<JsonType, KeyEncoder>();
  private readonly bindings = new WeakMap<object, JsonType>();
  private readonly dynamic: DynamicEncoder = new DynamicEncoder(this);
  private readonly resolveValue = (value: unknown): Encoder => this.encoderForValue(value);

  /**
   * Encoder for a descriptor, compiled on first use.
   *
   * @example
   * ```ts
   * const Point = t.struct('Point', { x: t.int32(), y: t.int32() });
   * registry.encoderFor(Point) === registry.encoderFor(Point); // true
   * ```
   */
  encoderFor(type: JsonType): Encoder {
    const cached = this.cache.get(type);
    if (cached) return cached;

    const name = typeName(type);
    const forward = new ForwardingEncoder(name);
    this.cache.set(type, forward);
    try {
      const built = this.build(type);
      forward.target = built;
      this.cache.set(type, built);
      if (isDebugEnabled()) logEncoderCompiled(name, built.constructor.name);
      return built;
    } catch (err) {
      this.cache.delete(type);
      throw err;
    }
  }

  /** Key encoder for a map key descriptor, cached like `encoderFor`. */
  keyEncoderFor(type: JsonType): KeyEncoder {
    let keys = this.keyCache.get(type);
    if (!keys) {
      keys = buildKeyEncoder(type);
      this.keyCache.set(type, keys);
    }
    return keys;
  }

  /** Whether a descriptor already has a cached encoder. */
  has(type: JsonType): boolean {
    return this.cache.has(type);
  }

  /**
   * Encode instances of `ctor` with `type` when they are met as `any`
   * values (top-level `encode(value)` calls, generic maps, `t.any()`).
   */
  bind(ctor: BindableClass, type: JsonType): this {
    this.bindings.set(ctor, type);
    return this;
  }

  /**
   * Descriptor for a runtime value, or `undefined` for values with no JSON
   * shape of their own (functions, symbols, dates), which are written as
   * their quoted string form.
   *
   * - `null`/`undefined` -> null, `boolean` -> bool, `number` -> float64
   * - `bigint` -> int64, or uint64 above the int64 range
   * - `string` -> string, `Uint8Array` -> bytes, arrays -> array<any>
   * - `Map` -> map<any, any>, `marshalText()` objects -> text
   * - bound class instances -> the bound descriptor
   * - other objects -> map<string, any> over their own enumerable keys
   */
  typeOfValue(value: unknown): JsonType | undefined {
    if (value === null || value === undefined) return t.null();
    if (typeof value === 'boolean') return t.bool();
    if (typeof value === 'number') return t.float64();
    if (typeof value === 'bigint') return value > INT64_MAX ? t.uint64() : t.int64();
    if (typeof value === 'string') return t.string();
    if (typeof value !== 'object') return undefined;
    if (value instanceof Uint8Array) return t.bytes();
    if (Array.isArray(value)) return ANY_ARRAY;
    if (value instanceof Map) return ANY_MAP;
    if (value instanceof Date) return undefined;
    const bound = this.bindings.get(value.constructor);
    if (bound) return bound;
    if (isTextMarshaler(value)) return t.text();
    return ANY_RECORD;
  }

  /** Encoder for a runtime value (see `typeOfValue`). */
  encoderForValue(value: unknown): Encoder {
    const type = this.typeOfValue(value);
    return type ? this.encoderFor(type) : fallbackEncoder;
  }

  private build(type: JsonType): Encoder {
    switch (type.kind) {
      case 'null':
        return nullEncoder;
      case 'bool':
        return boolEncoder;
      case 'int':
        return intEncoder(type.bits);
      case 'uint':
        return uintEncoder(type.bits);
      case 'float32':
        return float32Encoder;
      case 'float64':
        return float64Encoder;
      case 'string':
        return stringEncoder;
      case 'bytes':
        return bytesEncoder;
      case 'text':
        return textMarshalerEncoder;
      case 'any':
        return this.dynamic;
      case 'array':
        return new ArrayEncoder(this.encoderFor(type.elem), typeName(type));
      case 'pointer':
        return new PointerEncoder(this.encoderFor(type.elem));
      case 'lazy':
        return this.encoderFor(type.resolve());
      case 'map':
        return this.buildMap(type.key, type.value, typeName(type));
      case 'struct':
        return this.buildStruct(type);
    }
  }

  private buildMap(key: JsonType, value: JsonType, name: string): Encoder {
    const keys = this.keyEncoderFor(key);
    if (value.kind === 'any') {
      return new GenericMapEncoder(keys, this.resolveValue, name, key.kind);
    }
    return new MapEncoder(keys, this.encoderFor(value), name, key.kind);
  }

  private buildStruct(type: StructType): Encoder {
    const fields: CompiledField[] = type.fields.map((f) => ({
      prop: f.prop,
      key: quote(f.name, true),
      encoder: this.encoderFor(f.type),
      omitEmpty: f.omitEmpty,
      isEmpty: emptyCheckFor(f.type),
    }));
    return new StructEncoder(typeName(type), fields);
  }
}

/** Process-wide registry used by `encode` unless another is passed. */
export const defaultRegistry = new EncoderRegistry();
