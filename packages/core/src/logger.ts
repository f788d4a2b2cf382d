// ============================================================================
// @jsonjet/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for jsonjet.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Current log level (controlled by the JSONJET_DEBUG env var).
 */
let currentLevel: LogLevel = levelFromEnv(process.env.JSONJET_DEBUG);

/**
 * Map a JSONJET_DEBUG value to a log level.
 */
export function levelFromEnv(value: string | undefined): LogLevel {
  if (value === '1' || value === 'true') return 'debug';
  if (value === 'warn') return 'warn';
  if (value === 'error') return 'error';
  return 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[jsonjet] ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[jsonjet] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only emitted when JSONJET_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

/**
 * Warning-level logging (something unexpected but handled).
 */
export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log the first construction of an encoder for a type descriptor.
 */
export function logEncoderCompiled(typeName: string, variant: string): void {
  debug(`compiled ${variant} for ${typeName}`, { type: typeName, variant });
}

/**
 * Log a pooled buffer that was dropped instead of recycled.
 */
export function logPoolDiscard(pool: string, size: number, limit: number): void {
  debug(`${pool}: discarded oversized item (${size} > ${limit})`, { pool, size, limit });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Check if debug mode is enabled. Hot paths test this before
 * building log payloads.
 */
export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
