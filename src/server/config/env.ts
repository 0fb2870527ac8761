/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports helpers for the live/test
 * mode-suffixed settings.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime, parseModeFlag } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val === 'true' || val === '1'));

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category:
 * - Environment & Server
 * - Bot identity & channels
 * - Game resources
 * - Persistence
 * - Logging
 * - Metrics
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** HTTP/WebSocket server port */
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  /** Server bind address */
  HOST: z.string().default('0.0.0.0'),

  /** Allowed origin for WebSocket clients */
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // BOT IDENTITY & CHANNELS
  // ===================================================================

  /** Live/test switch. YES → *_TEST names, NO → *_LIVE names, unset → base names */
  PARLOR_TEST_MODE: z.string().optional(),

  /** Bot display name (mode-suffixed variants take precedence) */
  PARLOR_BOT_NAME: z.string().optional(),

  /** Comma-separated list of channel ids games may run in (empty = any) */
  PARLOR_GAME_CHANNEL_IDS: z.string().optional(),

  /** Comma-separated list of user ids with operator rights in every game */
  PARLOR_ADMIN_IDS: z.string().default(''),

  // ===================================================================
  // GAME RESOURCES
  // ===================================================================

  /** Directory holding characters.json and packs/ (required) */
  CHARACTERS_REPO_DIR: z.string().default('characters_repo'),

  /** Directory of per-game board configuration files (<gameType>.json) */
  GAME_CONFIG_DIR: z.string().default('config/games'),

  // ===================================================================
  // PERSISTENCE
  // ===================================================================

  /** Root directory for session snapshots */
  SNAPSHOT_DIR: z.string().default('data/snapshots'),

  /** Number of rotating autosave slots per session */
  AUTOSAVE_SLOTS: z.coerce.number().int().min(1).max(100).default(5),

  /** Autosave after this many mutating operations (0 disables autosave) */
  AUTOSAVE_EVERY: z.coerce.number().int().min(0).default(5),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Optional path for the combined log file */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // METRICS
  // ===================================================================

  /** Expose Prometheus metrics on /metrics */
  ENABLE_METRICS: booleanFlag(true),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues;
    const errors =
      issues.length > 0
        ? issues.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          }))
        : [
            {
              path: '',
              message: result.error.message,
            },
          ];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * This function should be called once at startup. If validation fails,
 * it prints clear error messages and exits the process.
 */
export function loadEnvOrExit(
  env: Record<string, string | undefined> = process.env
): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV to ensure test-specific behavior.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

// ============================================================================
// Live/test mode-suffixed settings
// ============================================================================

export type ModeEnv = Record<string, string | undefined>;

/** null = legacy names, true = *_TEST, false = *_LIVE. */
export function resolveTestMode(env: ModeEnv): boolean | null {
  return parseModeFlag(env.PARLOR_TEST_MODE);
}

/**
 * Read a string setting honouring the live/test switch. Mode-specific
 * variants fall back to the base name so settings can migrate gradually.
 */
export function getModeSetting(
  env: ModeEnv,
  name: string,
  defaultValue: string,
  testMode: boolean | null
): string {
  const base = env[name] ?? defaultValue;
  if (testMode === null) {
    return base.trim();
  }
  const suffixed = env[`${name}_${testMode ? 'TEST' : 'LIVE'}`];
  return (suffixed ?? base).trim();
}

/**
 * Read a channel-id list honouring the live/test switch. Unlike plain
 * settings there is no fallback between modes: a channel configured for
 * live use is never picked up in test mode.
 */
export function getModeChannelIds(
  env: ModeEnv,
  name: string,
  testMode: boolean | null,
  onInvalid: (chunk: string) => void = () => undefined
): string[] {
  const key = testMode === null ? name : `${name}_${testMode ? 'TEST' : 'LIVE'}`;
  return parseChannelIds(env[key] ?? '', onInvalid);
}

/**
 * Split a comma-separated id list, skipping blanks and reporting entries
 * that are not numeric ids.
 */
export function parseChannelIds(raw: string, onInvalid: (chunk: string) => void = () => undefined): string[] {
  const ids: string[] = [];
  for (const chunk of raw.split(',')) {
    const trimmed = chunk.trim();
    if (!trimmed) {
      continue;
    }
    if (!/^\d+$/.test(trimmed)) {
      onInvalid(trimmed);
      continue;
    }
    if (!ids.includes(trimmed)) {
      ids.push(trimmed);
    }
  }
  return ids;
}
