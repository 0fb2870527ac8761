/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for all application configuration.
 * It parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 *
 * Usage:
 *   import { config } from './config';
 */

import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  NodeEnvSchema,
  LogFormatSchema,
  LogLevelSchema,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  resolveTestMode,
  getModeSetting,
  getModeChannelIds,
  parseChannelIds,
  type RawEnv,
} from './env';

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    corsOrigin: z.string().min(1),
  }),
  bot: z.object({
    name: z.string().min(1),
    /** null = legacy names, true = test mode, false = live mode */
    testMode: z.boolean().nullable(),
    /** Channels games may run in; empty means unrestricted */
    gameChannelIds: z.array(z.string()),
    adminIds: z.array(z.string()),
  }),
  resources: z.object({
    charactersRepoDir: z.string().min(1),
    gameConfigDir: z.string().min(1),
  }),
  persistence: z.object({
    snapshotDir: z.string().min(1),
    autosaveSlots: z.number().int().positive(),
    autosaveEvery: z.number().int().min(0),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  metrics: z.object({
    enabled: z.boolean(),
  }),
  /** Non-fatal problems found while assembling config, logged at startup. */
  warnings: z.array(z.string()),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble and validate the application config from an already-parsed env.
 * Exposed separately so tests can build configs without touching process.env.
 */
export function buildConfig(env: RawEnv, rawEnv: Record<string, string | undefined>): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const testMode = resolveTestMode(rawEnv);
  const warnings: string[] = [];

  const botName = getModeSetting(rawEnv, 'PARLOR_BOT_NAME', 'Parlor', testMode) || 'Parlor';
  const gameChannelIds = getModeChannelIds(rawEnv, 'PARLOR_GAME_CHANNEL_IDS', testMode, (chunk) =>
    warnings.push(`Ignoring invalid channel id ${chunk}`)
  );
  const adminIds = parseChannelIds(env.PARLOR_ADMIN_IDS, (chunk) =>
    warnings.push(`Ignoring invalid admin id ${chunk}`)
  );

  const preliminaryConfig = {
    nodeEnv,
    isTest: nodeEnv === 'test',
    app: {
      version: env.npm_package_version?.trim() || '1.0.0',
    },
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigin: env.CORS_ORIGIN,
    },
    bot: {
      name: botName,
      testMode,
      gameChannelIds,
      adminIds,
    },
    resources: {
      charactersRepoDir: path.resolve(
        getModeSetting(rawEnv, 'CHARACTERS_REPO_DIR', env.CHARACTERS_REPO_DIR, testMode)
      ),
      gameConfigDir: path.resolve(env.GAME_CONFIG_DIR),
    },
    persistence: {
      snapshotDir: path.resolve(getModeSetting(rawEnv, 'SNAPSHOT_DIR', env.SNAPSHOT_DIR, testMode)),
      autosaveSlots: env.AUTOSAVE_SLOTS,
      autosaveEvery: env.AUTOSAVE_EVERY,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    metrics: {
      enabled: env.ENABLE_METRICS,
    },
    warnings,
  };

  return ConfigSchema.parse(preliminaryConfig);
}

// Load .env into process.env before we read anything from it.
// Skip in test mode so .env cannot override test-specific env vars.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export const config: Readonly<AppConfig> = Object.freeze(buildConfig(loadEnvOrExit(process.env), process.env));
