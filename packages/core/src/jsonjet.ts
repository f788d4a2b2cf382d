// ============================================================================
// @jsonjet/core — Encode Entry Point
// ============================================================================
//
// encode(value, type?):
//   1. estimate the output size from the root value
//   2. take a pooled stream at least that large
//   3. run the descriptor's encoder (or the runtime-inferred one)
//   4. copy the written bytes out and return the stream to the pool
//
// The stream is released on every path; a failed call returns no bytes.
// ============================================================================

import { resolveConfig, type EncoderConfig } from './config.js';
import { EncoderRegistry, defaultRegistry } from './registry.js';
import { acquireStream, releaseStream } from './stream.js';
import type { JsonType } from './types.js';

const MAP_ENTRY_ESTIMATE = 32;
const TEXT_MAP_ENTRY_ESTIMATE = 24;
const ARRAY_ELEM_ESTIMATE = 16;
const TEXT_ARRAY_ELEM_ESTIMATE = 12;
const STRING_OVERHEAD = 16;
const DEFAULT_ESTIMATE = 256;

const utf8 = new TextDecoder();

function isTextMap(type: JsonType | undefined): boolean {
  return type?.kind === 'map' && type.value.kind === 'string';
}

/**
 * Initial stream size for a root value. Only the top level is inspected.
 */
export function estimateSize(value: unknown, type?: JsonType): number {
  if (value instanceof Map) {
    return value.size * (isTextMap(type) ? TEXT_MAP_ENTRY_ESTIMATE : MAP_ENTRY_ESTIMATE);
  }
  if (Array.isArray(value)) {
    const textElems = type?.kind === 'array' && type.elem.kind === 'string';
    return value.length * (textElems ? TEXT_ARRAY_ELEM_ESTIMATE : ARRAY_ELEM_ESTIMATE);
  }
  if (typeof value === 'string') {
    return value.length + STRING_OVERHEAD;
  }
  if (value instanceof Uint8Array) {
    return value.length + STRING_OVERHEAD;
  }
  // plain objects count as mappings unless a struct descriptor says otherwise
  const asMapping = type === undefined || type.kind === 'map' || type.kind === 'any';
  if (asMapping && typeof value === 'object' && value !== null) {
    return Object.keys(value).length * (isTextMap(type) ? TEXT_MAP_ENTRY_ESTIMATE : MAP_ENTRY_ESTIMATE);
  }
  return DEFAULT_ESTIMATE;
}

/**
 * Encoder bound to one configuration and registry.
 *
 * @example
 * ```ts
 * const User = t.struct('User', { id: t.int64(), name: t.string() });
 * const encoder = new JsonEncoder({ sortMapKeys: true });
 * encoder.encodeToString({ id: 1, name: 'a' }, User); // '{"id":1,"name":"a"}'
 * ```
 */
export class JsonEncoder {
  readonly config: EncoderConfig;
  readonly registry: EncoderRegistry;

  /**
   * @param options - partial `EncoderConfig`, validated; missing settings
   * come from the environment, then the defaults
   * @throws ConfigError when the options fail validation
   */
  constructor(options: unknown = {}, registry: EncoderRegistry = defaultRegistry) {
    this.config = resolveConfig(options);
    this.registry = registry;
  }

  /**
   * Encode `value` as JSON bytes. Without `type`, the encoder is chosen
   * from the runtime value.
   */
  encode(value: unknown, type?: JsonType): Uint8Array {
    const encoder = type ? this.registry.encoderFor(type) : this.registry.encoderForValue(value);
    const stream = acquireStream(estimateSize(value, type));
    try {
      stream.sortMapKeys = this.config.sortMapKeys;
      encoder.appendTo(stream, value);
      return stream.toBytes();
    } finally {
      releaseStream(stream);
    }
  }

  /** `encode`, decoded as UTF-8. */
  encodeToString(value: unknown, type?: JsonType): string {
    return utf8.decode(this.encode(value, type));
  }
}

let defaultEncoder: JsonEncoder | undefined;

function getDefaultEncoder(): JsonEncoder {
  defaultEncoder ??= new JsonEncoder();
  return defaultEncoder;
}

/**
 * Encode `value` as JSON bytes using the environment configuration.
 *
 * @throws UnsupportedValueError when a value does not fit its descriptor
 * @throws UnsupportedKeyTypeError / KeyMarshalError for bad map keys
 *
 * @example
 * ```ts
 * encode({ a: [1, 2.5, 'x'] });     // bytes of {"a":[1,2.5,"x"]}
 * encode(5n, t.uint8());            // bytes of 5
 * ```
 */
export function encode(value: unknown, type?: JsonType): Uint8Array {
  return getDefaultEncoder().encode(value, type);
}

export function encodeToString(value: unknown, type?: JsonType): string {
  return getDefaultEncoder().encodeToString(value, type);
}
