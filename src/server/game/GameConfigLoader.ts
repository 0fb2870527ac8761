import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';
import { ConfigurationError, errorMessage } from '../../shared/errors';
import { GAME_TYPES, type GameType } from '../../shared/types/session';
import { BoardConfigSchema, type BoardConfig } from '../../shared/validation/schemas';

export type GameConfigs = ReadonlyMap<GameType, BoardConfig>;

/**
 * Load `<dir>/<gameType>.json` for every game type this build knows.
 *
 * A missing file leaves that game unavailable; a file that exists but does
 * not validate is a startup error. At least one game must load.
 */
export async function loadGameConfigs(dir: string): Promise<GameConfigs> {
  const configs = new Map<GameType, BoardConfig>();

  for (const gameType of GAME_TYPES) {
    const file = path.join(dir, `${gameType}.json`);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch {
      logger.warn('No board configuration for game type; it will be unavailable', { gameType, file });
      continue;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Board configuration ${file} is not valid JSON: ${errorMessage(error)}`, {
        gameType,
        file,
      });
    }

    const parsed = BoardConfigSchema.safeParse(json);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new ConfigurationError(`Board configuration ${file} is invalid: ${details.join('; ')}`, {
        gameType,
        file,
      });
    }

    configs.set(gameType, parsed.data);
    logger.info('Loaded board configuration', {
      gameType,
      grid: `${parsed.data.gridCols}x${parsed.data.gridRows}`,
      goalTile: parsed.data.goalTile,
    });
  }

  if (configs.size === 0) {
    throw new ConfigurationError(`No board configurations found in ${dir}`, { dir });
  }
  return configs;
}
