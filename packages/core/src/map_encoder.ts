// ============================================================================
// @jsonjet/core — Map Encoders
// ============================================================================
//
// Maps arrive as a `Map` or, for text keys, as a plain object. Paths:
//   - null/undefined  `null`
//   - no entries      `{}`
//   - one entry       written directly (no sort, no separators)
//   - sorted mode     keys resolved to bytes, ordered bytewise, then written
//   - otherwise       iteration order
//
// The homogeneous variant has one value encoder; the generic variant picks
// the value encoder from each runtime value.
// ============================================================================

import {
  COLON,
  COMMA,
  EMPTY_OBJECT,
  LBRACE,
  NULL_LITERAL,
  RBRACE,
  isRecord,
  type Encoder,
} from './encoder.js';
import { UnsupportedValueError } from './errors.js';
import { appendQuotedBytes } from './escape.js';
import type { KeyEncoder } from './map_keys.js';
import { ObjectPool } from './pool.js';
import type { EncoderStream } from './stream.js';

/** Bytes reserved per entry before writing. */
const ENTRY_SIZE_GUESS = 20;

/** Sort scratch sequences longer than this are not pooled. */
export const SORT_SCRATCH_LIMIT = 64;

interface SortEntry {
  key: Uint8Array;
  value: unknown;
}

const NO_KEY = new Uint8Array(0);

export const sortScratchPool = new ObjectPool<SortEntry[]>({
  name: 'sort-scratch',
  factory: () => [],
  validate: (entries) => entries.length <= SORT_SCRATCH_LIMIT,
  sizeOf: (entries) => entries.length,
  sizeLimit: SORT_SCRATCH_LIMIT,
  reset: (entries) => {
    for (const entry of entries) {
      entry.key = NO_KEY;
      entry.value = undefined;
    }
  },
});

/** Bytewise order of two UTF-8 sequences. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

function setEntry(entries: SortEntry[], i: number, key: Uint8Array, value: unknown): void {
  if (i < entries.length) {
    entries[i].key = key;
    entries[i].value = value;
  } else {
    entries.push({ key, value });
  }
}

abstract class BaseMapEncoder implements Encoder {
  private readonly acceptsObjects: boolean;

  constructor(
    protected readonly keys: KeyEncoder,
    readonly typeName: string,
    keyKind: string,
  ) {
    this.acceptsObjects = keyKind === 'string' || keyKind === 'any';
  }

  /** Encoder for one value of this map. */
  protected abstract valueEncoder(value: unknown): Encoder;

  appendTo(stream: EncoderStream, value: unknown): void {
    if (value === null || value === undefined) {
      stream.writeAscii(NULL_LITERAL);
      return;
    }
    if (value instanceof Map) {
      this.appendMap(stream, value);
      return;
    }
    if (isRecord(value) && !ArrayBuffer.isView(value)) {
      if (!this.acceptsObjects) {
        throw new UnsupportedValueError(this.typeName, value, 'plain objects only carry text keys');
      }
      this.appendObject(stream, value);
      return;
    }
    throw new UnsupportedValueError(this.typeName, value);
  }

  private appendMap(stream: EncoderStream, map: Map<unknown, unknown>): void {
    const size = map.size;
    if (size === 0) {
      stream.writeAscii(EMPTY_OBJECT);
      return;
    }
    stream.reserve(size * ENTRY_SIZE_GUESS);

    if (size === 1) {
      for (const [k, v] of map) this.appendSingle(stream, k, v);
      return;
    }

    if (stream.sortMapKeys) {
      const entries = sortScratchPool.acquire();
      try {
        let i = 0;
        for (const [k, v] of map) setEntry(entries, i++, this.keys.resolveKey(k), v);
        entries.length = size;
        this.appendSorted(stream, entries);
      } finally {
        sortScratchPool.release(entries);
      }
      return;
    }

    let first = true;
    stream.writeByte(LBRACE);
    for (const [k, v] of map) {
      if (!first) stream.writeByte(COMMA);
      first = false;
      this.appendEntry(stream, k, v);
    }
    stream.writeByte(RBRACE);
  }

  private appendObject(stream: EncoderStream, obj: Record<string, unknown>): void {
    const props = Object.keys(obj);
    const size = props.length;
    if (size === 0) {
      stream.writeAscii(EMPTY_OBJECT);
      return;
    }
    stream.reserve(size * ENTRY_SIZE_GUESS);

    if (size === 1) {
      this.appendSingle(stream, props[0], obj[props[0]]);
      return;
    }

    if (stream.sortMapKeys) {
      const entries = sortScratchPool.acquire();
      try {
        for (let i = 0; i < size; i++) {
          const k = props[i];
          setEntry(entries, i, this.keys.resolveKey(k), obj[k]);
        }
        entries.length = size;
        this.appendSorted(stream, entries);
      } finally {
        sortScratchPool.release(entries);
      }
      return;
    }

    stream.writeByte(LBRACE);
    for (let i = 0; i < size; i++) {
      const k = props[i];
      if (i > 0) stream.writeByte(COMMA);
      this.appendEntry(stream, k, obj[k]);
    }
    stream.writeByte(RBRACE);
  }

  private appendSingle(stream: EncoderStream, key: unknown, value: unknown): void {
    stream.writeByte(LBRACE);
    this.appendEntry(stream, key, value);
    stream.writeByte(RBRACE);
  }

  private appendEntry(stream: EncoderStream, key: unknown, value: unknown): void {
    this.keys.appendKey(stream, key);
    stream.writeByte(COLON);
    this.valueEncoder(value).appendTo(stream, value);
  }

  private appendSorted(stream: EncoderStream, entries: SortEntry[]): void {
    entries.sort((a, b) => compareBytes(a.key, b.key));
    stream.writeByte(LBRACE);
    for (let i = 0; i < entries.length; i++) {
      const { key, value } = entries[i];
      if (i > 0) stream.writeByte(COMMA);
      appendQuotedBytes(stream, key);
      stream.writeByte(COLON);
      this.valueEncoder(value).appendTo(stream, value);
    }
    stream.writeByte(RBRACE);
  }
}

/** Map whose values all share one encoder. */
export class MapEncoder extends BaseMapEncoder {
  constructor(
    keys: KeyEncoder,
    private readonly values: Encoder,
    typeName: string,
    keyKind: string,
  ) {
    super(keys, typeName, keyKind);
  }

  protected valueEncoder(): Encoder {
    return this.values;
  }
}

/** Map of arbitrary values; each value's encoder comes from its runtime kind. */
export class GenericMapEncoder extends BaseMapEncoder {
  constructor(
    keys: KeyEncoder,
    private readonly resolve: (value: unknown) => Encoder,
    typeName: string,
    keyKind: string,
  ) {
    super(keys, typeName, keyKind);
  }

  protected valueEncoder(value: unknown): Encoder {
    return this.resolve(value);
  }
}
