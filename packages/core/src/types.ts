// ============================================================================
// @jsonjet/core — Type Descriptors
// ============================================================================
//
// JavaScript values carry no static type, so encoders are selected by an
// explicit descriptor. Each descriptor object is compiled to an Encoder once
// and cached by identity: define descriptors once (module scope) and reuse
// them. Leaf builders return shared singletons.
// ============================================================================

export type IntBits = 8 | 16 | 32 | 64;

export interface NullType {
  readonly kind: 'null';
}
export interface BoolType {
  readonly kind: 'bool';
}
export interface IntType {
  readonly kind: 'int';
  readonly bits: IntBits;
}
export interface UintType {
  readonly kind: 'uint';
  readonly bits: IntBits;
}
export interface Float32Type {
  readonly kind: 'float32';
}
export interface Float64Type {
  readonly kind: 'float64';
}
export interface StringType {
  readonly kind: 'string';
}
/** Raw bytes (`Uint8Array`), rendered as a JSON string. */
export interface BytesType {
  readonly kind: 'bytes';
}
/** Objects exposing `marshalText()`, rendered as a JSON string. */
export interface TextType {
  readonly kind: 'text';
}
/** Any value; the encoder is chosen from the runtime value. */
export interface AnyType {
  readonly kind: 'any';
}
export interface ArrayType {
  readonly kind: 'array';
  readonly elem: JsonType;
}
export interface MapType {
  readonly kind: 'map';
  readonly key: JsonType;
  readonly value: JsonType;
}
/** Nullable reference: `null`/`undefined` render `null`, otherwise `elem`. */
export interface PointerType {
  readonly kind: 'pointer';
  readonly elem: JsonType;
}
/** Deferred descriptor, for types that refer to themselves. */
export interface LazyType {
  readonly kind: 'lazy';
  readonly resolve: () => JsonType;
}

export interface StructFieldDef {
  /** Property read from the value */
  readonly prop: string;
  /** Key written to the output */
  readonly name: string;
  readonly type: JsonType;
  /** Skip the field when its value is the type's zero value */
  readonly omitEmpty: boolean;
}

export interface StructType {
  readonly kind: 'struct';
  readonly name: string;
  readonly fields: readonly StructFieldDef[];
}

export type JsonType =
  | NullType
  | BoolType
  | IntType
  | UintType
  | Float32Type
  | Float64Type
  | StringType
  | BytesType
  | TextType
  | AnyType
  | ArrayType
  | MapType
  | PointerType
  | LazyType
  | StructType;

export type JsonKind = JsonType['kind'];

/** A value that renders itself as text (JSON string or map key). */
export interface TextMarshaler {
  marshalText(): string;
}

export function isTextMarshaler(value: unknown): value is TextMarshaler {
  return (
    typeof value === 'object' &&
    value !== null &&
    'marshalText' in value &&
    typeof value.marshalText === 'function'
  );
}

// ── Field declarations ──────────────────────────────────────────────────────

export interface FieldOptions {
  /** Output key (defaults to the property name) */
  name?: string;
  omitEmpty?: boolean;
}

/** A struct member declared with options. */
export interface FieldSpec {
  readonly type: JsonType;
  readonly options: FieldOptions;
}

/**
 * Declare a struct field with options.
 *
 * @example
 * ```ts
 * const User = t.struct('User', {
 *   id: t.int64(),
 *   email: field(t.string(), { omitEmpty: true }),
 *   createdAt: field(t.int64(), { name: 'created_at' }),
 * });
 * ```
 */
export function field(type: JsonType, options: FieldOptions = {}): FieldSpec {
  return { type, options };
}

function isFieldSpec(member: JsonType | FieldSpec): member is FieldSpec {
  return 'options' in member;
}

// ── Builders ────────────────────────────────────────────────────────────────

const NULL: NullType = { kind: 'null' };
const BOOL: BoolType = { kind: 'bool' };
const INT: Record<IntBits, IntType> = {
  8: { kind: 'int', bits: 8 },
  16: { kind: 'int', bits: 16 },
  32: { kind: 'int', bits: 32 },
  64: { kind: 'int', bits: 64 },
};
const UINT: Record<IntBits, UintType> = {
  8: { kind: 'uint', bits: 8 },
  16: { kind: 'uint', bits: 16 },
  32: { kind: 'uint', bits: 32 },
  64: { kind: 'uint', bits: 64 },
};
const FLOAT32: Float32Type = { kind: 'float32' };
const FLOAT64: Float64Type = { kind: 'float64' };
const STRING: StringType = { kind: 'string' };
const BYTES: BytesType = { kind: 'bytes' };
const TEXT: TextType = { kind: 'text' };
const ANY: AnyType = { kind: 'any' };

export const t = {
  null: (): NullType => NULL,
  bool: (): BoolType => BOOL,
  int8: (): IntType => INT[8],
  int16: (): IntType => INT[16],
  int32: (): IntType => INT[32],
  int64: (): IntType => INT[64],
  uint8: (): UintType => UINT[8],
  uint16: (): UintType => UINT[16],
  uint32: (): UintType => UINT[32],
  uint64: (): UintType => UINT[64],
  float32: (): Float32Type => FLOAT32,
  float64: (): Float64Type => FLOAT64,
  string: (): StringType => STRING,
  bytes: (): BytesType => BYTES,
  text: (): TextType => TEXT,
  any: (): AnyType => ANY,

  array: (elem: JsonType): ArrayType => ({ kind: 'array', elem }),
  map: (key: JsonType, value: JsonType): MapType => ({ kind: 'map', key, value }),
  /** Text-keyed mapping: a plain object or a `Map<string, V>`. */
  record: (value: JsonType): MapType => ({ kind: 'map', key: STRING, value }),
  pointer: (elem: JsonType): PointerType => ({ kind: 'pointer', elem }),
  lazy: (resolve: () => JsonType): LazyType => ({ kind: 'lazy', resolve }),

  /**
   * Record type with fields in declaration order.
   */
  struct: (name: string, members: Record<string, JsonType | FieldSpec>): StructType => ({
    kind: 'struct',
    name,
    fields: Object.entries(members).map(([prop, member]) => {
      const spec: FieldSpec = isFieldSpec(member) ? member : { type: member, options: {} };
      return {
        prop,
        name: spec.options.name ?? prop,
        type: spec.type,
        omitEmpty: spec.options.omitEmpty ?? false,
      };
    }),
  }),
} as const;

/**
 * Human-readable name of a descriptor, used in errors and logs.
 */
export function typeName(type: JsonType): string {
  switch (type.kind) {
    case 'int':
      return `int${type.bits}`;
    case 'uint':
      return `uint${type.bits}`;
    case 'array':
      return `array<${typeName(type.elem)}>`;
    case 'map':
      return `map<${typeName(type.key)}, ${typeName(type.value)}>`;
    case 'pointer':
      return `pointer<${typeName(type.elem)}>`;
    case 'struct':
      return `struct ${type.name}`;
    default:
      return type.kind;
  }
}
