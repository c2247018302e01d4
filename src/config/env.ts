/**
 * Centralized Environment Configuration
 *
 * All environment variable access goes through this module. Values are
 * validated with zod and returned as a typed GameConfig; invalid input fails
 * fast with a ConfigError naming every offending variable.
 *
 * Usage:
 *   const config = loadGameConfig();          // reads process.env
 *   const config = loadGameConfig({ GAME_LEVELS: 'intro,cave' });
 */

import { z } from 'zod';

import { ConfigError } from '../utils/errorTypes.js';
import { formatZodIssues } from '../utils/validation.js';

import type { LogLevel } from '../utils/logging/logger.js';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper to parse optional boolean env vars with default
 */
const optionalBoolean = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', ''])
    .optional()
    .transform((val) => (val === undefined || val === '' ? defaultValue : val === 'true'));

/**
 * Helper to parse integer env vars with default and bounds
 */
const integerWithDefault = (defaultValue: number, min: number, max: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .refine((val) => Number.isInteger(val), { message: 'Must be a valid integer' })
    .refine((val) => val >= min && val <= max, { message: `Must be between ${min} and ${max}` });

/**
 * Helper for optional string with default
 */
const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

/**
 * Comma-separated list; blank entries are dropped.
 */
const commaList = (defaultValue: string) =>
  optionalString(defaultValue)
    .transform((val) => val.split(',').map((item) => item.trim()).filter((item) => item.length > 0))
    .refine((items) => items.length > 0, { message: 'Must name at least one entry' });

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error', ''])
    .optional()
    .transform((val): LogLevel => (val === undefined || val === '' ? 'info' : val)),

  // -------------------------------------------------------------------------
  // Level data
  // -------------------------------------------------------------------------
  GAME_MAP_DIR: optionalString('data/maps'),
  GAME_LEVELS: commaList('level-1,level-2'),

  // -------------------------------------------------------------------------
  // Runtime
  // -------------------------------------------------------------------------
  GAME_DEBUG: optionalBoolean(false),
  GAME_TARGET_FPS: integerWithDefault(60, 1, 240),
});

export interface GameConfig {
  logLevel: LogLevel;
  /** Directory holding one `<level>.tmj` file per entry of `levels` */
  mapDir: string;
  /** Fixed level sequence, played in order */
  levels: string[];
  /** Initial state of the debug overlay */
  debug: boolean;
  targetFps: number;
}

export type EnvSource = Record<string, string | undefined>;

/**
 * Validate the environment and build the engine configuration.
 *
 * @throws ConfigError when any variable is malformed
 */
export function loadGameConfig(source: EnvSource = process.env): GameConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigError(`Invalid game configuration: ${issues.join('; ')}`, issues);
  }

  const env = result.data;
  return {
    logLevel: env.LOG_LEVEL,
    mapDir: env.GAME_MAP_DIR,
    levels: env.GAME_LEVELS,
    debug: env.GAME_DEBUG,
    targetFps: env.GAME_TARGET_FPS,
  };
}
