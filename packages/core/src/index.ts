// ============================================================================
// @jsonjet/core — Public API
// ============================================================================

// High-level API
export { JsonEncoder, encode, encodeToString, estimateSize } from './jsonjet.js';

// Type descriptors
export { t, field, typeName, isTextMarshaler } from './types.js';
export type {
  JsonType,
  JsonKind,
  IntBits,
  StructFieldDef,
  StructType,
  MapType,
  ArrayType,
  FieldOptions,
  FieldSpec,
  TextMarshaler,
} from './types.js';

// Encoders & registry
export { EncoderRegistry, defaultRegistry } from './registry.js';
export type { BindableClass } from './registry.js';
export type { Encoder } from './encoder.js';
export type { KeyEncoder } from './map_keys.js';

// Streams & pools
export {
  EncoderStream,
  acquireStream,
  releaseStream,
  streamPool,
  DEFAULT_STREAM_CAPACITY,
  STREAM_HIGH_WATER_MARK,
} from './stream.js';
export { ObjectPool } from './pool.js';
export type { ObjectPoolOptions, ObjectPoolStats } from './pool.js';

// Numeric primitives
export { appendInt, appendUint, appendFloat32, appendFloat64, formatFloat } from './number_format.js';
export { parseIntBytes, parseUintBytes, parseFloatBytes } from './number_parse.js';
export type { IntBitSize } from './number_parse.js';

// String escaping
export { appendQuotedBytes, appendQuotedString, quote } from './escape.js';

// Configuration
export { resolveConfig, configFromEnv, DEFAULT_CONFIG } from './config.js';
export type { EncoderConfig } from './config.js';

// Errors
export {
  JsonJetError,
  UnsupportedKeyTypeError,
  KeyMarshalError,
  UnsupportedValueError,
  NumberParseError,
  NumberSyntaxError,
  NumberRangeError,
  ConfigError,
} from './errors.js';

// Logging
export { onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
