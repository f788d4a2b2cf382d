// ============================================================================
// @jsonjet/core — Encoder Configuration
// ============================================================================
//
// Immutable settings consumed by the encoder. Explicit options win over the
// environment, which wins over defaults:
//
//   JSONJET_SORT_MAP_KEYS=1|true|0|false   sorted-key mode for map encoding
// ============================================================================

import process from 'node:process';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { warn } from './logger.js';

const configSchema = z
  .object({
    sortMapKeys: z.boolean(),
  })
  .strict();

/**
 * Encoder settings. `sortMapKeys` orders map entries by the byte order of
 * their rendered keys, making output independent of insertion order.
 */
export type EncoderConfig = Readonly<z.infer<typeof configSchema>>;

export const DEFAULT_CONFIG: EncoderConfig = Object.freeze({
  sortMapKeys: false,
});

/**
 * Read config overrides from environment variables.
 * Unrecognized values are ignored with a warning.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EncoderConfig> {
  const raw = env.JSONJET_SORT_MAP_KEYS;
  if (raw === undefined || raw === '') return {};
  if (raw === '1' || raw === 'true') return { sortMapKeys: true };
  if (raw === '0' || raw === 'false') return { sortMapKeys: false };
  warn(`ignoring JSONJET_SORT_MAP_KEYS=${raw}`, { expected: ['1', 'true', '0', 'false'] });
  return {};
}

/**
 * Build a frozen config from explicit options layered over the environment
 * and the defaults.
 *
 * @throws ConfigError when an option has the wrong type or is unknown
 */
export function resolveConfig(
  options: unknown = {},
  env: NodeJS.ProcessEnv = process.env,
): EncoderConfig {
  const explicit = configSchema.partial().safeParse(options);
  if (!explicit.success) {
    throw new ConfigError(
      explicit.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }

  const fromEnv = configFromEnv(env);
  return Object.freeze({
    sortMapKeys: explicit.data.sortMapKeys ?? fromEnv.sortMapKeys ?? DEFAULT_CONFIG.sortMapKeys,
  });
}
