import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadGameConfigs } from '../../src/server/game/GameConfigLoader';
import { ConfigurationError } from '../../src/shared/errors';
import { BoardConfigSchema } from '../../src/shared/validation/schemas';
import { logger } from '../../src/server/utils/logger';

jest.mock('../../src/server/utils/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

describe('loadGameConfigs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'parlor-games-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: string) => fs.writeFile(path.join(dir, 'snakes_ladders.json'), content, 'utf-8');

  it('loads a valid board and fills defaults', async () => {
    await writeConfig(JSON.stringify({ gridCols: 5, gridRows: 4, goalTile: 20, hazards: { '12': 3 } }));

    const configs = await loadGameConfigs(dir);

    expect(configs.get('snakes_ladders')).toEqual({
      gridCols: 5,
      gridRows: 4,
      goalTile: 20,
      startTile: 1,
      dieSides: 6,
      hazards: { '12': 3 },
      shortcuts: {},
      tileNotes: {},
    });
  });

  it('fails when no game has a configuration', async () => {
    await expect(loadGameConfigs(dir)).rejects.toThrow(`No board configurations found in ${dir}`);
    expect(logger.warn).toHaveBeenCalledWith('No board configuration for game type; it will be unavailable', {
      gameType: 'snakes_ladders',
      file: path.join(dir, 'snakes_ladders.json'),
    });
  });

  it('fails on a file that is not JSON', async () => {
    await writeConfig('{ gridCols');

    await expect(loadGameConfigs(dir)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('names every schema problem', async () => {
    await writeConfig(JSON.stringify({ gridCols: 10, gridRows: 10, goalTile: 100, hazards: { '30': 40 } }));

    await expect(loadGameConfigs(dir)).rejects.toThrow(
      `Board configuration ${path.join(dir, 'snakes_ladders.json')} is invalid: hazards.30: hazards must move down and start on the board`
    );
  });

  it('accepts the shipped board', async () => {
    const configs = await loadGameConfigs(path.resolve(__dirname, '../../config/games'));

    expect(configs.get('snakes_ladders')).toMatchObject({ gridCols: 10, gridRows: 10, goalTile: 100 });
  });
});

describe('BoardConfigSchema', () => {
  it('keeps the goal on the grid', () => {
    const result = BoardConfigSchema.safeParse({ gridCols: 3, gridRows: 3, goalTile: 10 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual(['goalTile must be at most 9']);
    }
  });

  it('rejects a tile that is both a hazard and a shortcut', () => {
    const result = BoardConfigSchema.safeParse({
      gridCols: 10,
      gridRows: 10,
      goalTile: 100,
      hazards: { '40': 20 },
      shortcuts: { '40': 60 },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        'a tile cannot be both a hazard and a shortcut',
      ]);
    }
  });
});
