// ============================================================================
// @jsonjet/core — Error Types
// ============================================================================

/**
 * Base error class for all jsonjet errors.
 */
export class JsonJetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JsonJetError';
  }
}

// ---------------------------------------------------------------------------
// Encoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a map key's kind cannot be turned into JSON object key text.
 */
export class UnsupportedKeyTypeError extends JsonJetError {
  public readonly typeName: string;

  constructor(typeName: string) {
    super(`unsupported map key type: ${typeName}`);
    this.name = 'UnsupportedKeyTypeError';
    this.typeName = typeName;
  }
}

/**
 * Thrown when a key's own `marshalText()` fails.
 */
export class KeyMarshalError extends JsonJetError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`encoding error for map key: ${detail}`, { cause });
    this.name = 'KeyMarshalError';
  }
}

/**
 * Thrown when a value does not fit the type it is encoded as:
 * wrong JavaScript kind, integer outside the bit width, or a float
 * JSON cannot represent (NaN, ±Infinity).
 */
export class UnsupportedValueError extends JsonJetError {
  public readonly typeName: string;
  public readonly value: unknown;

  constructor(typeName: string, value: unknown, reason?: string) {
    super(`cannot encode ${describeValue(value)} as ${typeName}${reason ? `: ${reason}` : ''}`);
    this.name = 'UnsupportedValueError';
    this.typeName = typeName;
    this.value = value;
  }
}

// ---------------------------------------------------------------------------
// Numeric Parse Errors
// ---------------------------------------------------------------------------

/**
 * Base class for failures of the byte-level numeric parsers.
 */
export class NumberParseError extends JsonJetError {
  public readonly input: string;

  constructor(message: string, input: string) {
    super(`${message}: "${input}"`);
    this.name = 'NumberParseError';
    this.input = input;
  }
}

/**
 * Thrown when the input is not a number at all (empty, bare sign,
 * stray character, malformed exponent).
 */
export class NumberSyntaxError extends NumberParseError {
  constructor(message: string, input: string) {
    super(message, input);
    this.name = 'NumberSyntaxError';
  }
}

/**
 * Thrown when a parsed integer does not fit the requested bit size.
 */
export class NumberRangeError extends NumberParseError {
  public readonly bitSize: number;

  constructor(input: string, bitSize: number, signed: boolean) {
    super(`value out of range for ${signed ? 'int' : 'uint'}${bitSize}`, input);
    this.name = 'NumberRangeError';
    this.bitSize = bitSize;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when encoder options fail validation.
 */
export class ConfigError extends JsonJetError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid encoder config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'number' || typeof value === 'boolean') return `${typeof value} ${value}`;
  if (typeof value === 'bigint') return `bigint ${value}n`;
  if (typeof value === 'string') return 'string';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
