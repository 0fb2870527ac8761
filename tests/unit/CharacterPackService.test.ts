import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CharacterPackService } from '../../src/server/services/CharacterPackService';
import { ConfigurationError } from '../../src/shared/errors';
import { logger } from '../../src/server/utils/logger';

jest.mock('../../src/server/utils/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

async function writeJson(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(value), 'utf-8');
}

describe('CharacterPackService', () => {
  let repoDir: string;

  const createService = () =>
    new CharacterPackService({ repoDir, botName: 'Parlor', availableGames: ['snakes_ladders'] });

  beforeEach(async () => {
    repoDir = await fs.mkdtemp(path.join(os.tmpdir(), 'parlor-characters-'));
    await writeJson(path.join(repoDir, 'packs', 'characters_classic.json'), [
      { name: 'Rook' },
      { name: 'Bishop', description: 'Moves diagonally' },
      { name: '' },
    ]);
    await writeJson(path.join(repoDir, 'packs', 'characters_fantasy.json'), [{ name: 'Wizard' }]);
    await writeJson(path.join(repoDir, 'packs', 'characters_chess.json'), [{ name: 'Knight' }]);
    await writeJson(path.join(repoDir, 'packs', 'characters_extra.json'), [{ name: 'Jester' }]);
    await writeJson(path.join(repoDir, 'packs', 'notes.json'), []);
  });

  afterEach(async () => {
    await fs.rm(repoDir, { recursive: true, force: true });
  });

  describe('with a pack configuration', () => {
    let service: CharacterPackService;

    beforeEach(async () => {
      await writeJson(path.join(repoDir, 'characters.json'), {
        alwaysShowFacesOnBoard: false,
        packs: [
          {
            name: 'Classic',
            file: 'characters_classic',
            enable_Parlor: true,
            enable_Parlor_snakes_ladders: true,
          },
          { name: 'Fantasy', file: 'characters_fantasy', enable_Parlor: true },
          { name: 'Chess', file: 'characters_chess', enable_Parlor: true, enable_Parlor_chess: true },
        ],
      });
      service = createService();
      await service.init();
    });

    it('loads every pack enabled for the bot', () => {
      expect(service.isInitialized()).toBe(true);
      expect(service.alwaysShowFacesOnBoard).toBe(false);
      expect(service.getCharacters().map((character) => character.name)).toEqual([
        'Rook',
        'Bishop',
        'Wizard',
        'Knight',
      ]);
      expect(logger.warn).toHaveBeenCalledWith('Skipping invalid character entry', { file: 'characters_classic' });
    });

    it('limits a game to packs carrying its own flag', () => {
      expect(service.getEnabledPacksForGame('snakes_ladders')).toEqual(['characters_classic']);
      expect(service.getCharactersForGame('snakes_ladders')).toEqual([
        { name: 'Rook', pack: 'characters_classic' },
        { name: 'Bishop', description: 'Moves diagonally', pack: 'characters_classic' },
      ]);
      expect(service.getCharactersForGame('ludo')).toEqual([]);
    });

    it('honours a captured pack list', () => {
      expect(
        service.getCharactersForGame('snakes_ladders', ['characters_fantasy']).map((character) => character.name)
      ).toEqual(['Wizard']);
    });

    it('checks single characters against the game flag', () => {
      expect(service.isCharacterEnabledForGame(' Rook ', 'snakes_ladders')).toBe(true);
      expect(service.isCharacterEnabledForGame('Wizard', 'snakes_ladders')).toBe(false);
      expect(service.isCharacterEnabledForGame('Nobody', 'snakes_ladders')).toBe(false);
    });

    it('warns about flags for games this process does not run', () => {
      expect(logger.warn).toHaveBeenCalledWith('Character pack has a flag for an unknown game', {
        pack: 'Chess',
        gameType: 'chess',
        key: 'enable_Parlor_chess',
      });
    });

    it('detects pack files missing from the configuration', () => {
      expect(service.detectUnconfiguredPacks()).toEqual(['characters_extra']);
    });

    it('forgets everything on teardown', () => {
      service.teardown();

      expect(service.isInitialized()).toBe(false);
      expect(service.getCharacters()).toEqual([]);
      expect(service.getEnabledPacksForGame('snakes_ladders')).toEqual([]);
      expect(service.alwaysShowFacesOnBoard).toBe(true);
    });
  });

  it('accepts the legacy list format', async () => {
    await writeJson(path.join(repoDir, 'characters.json'), [
      { name: 'Classic', file: 'characters_classic', enable_Parlor: true },
      'not an entry',
    ]);
    const service = createService();

    await service.init();

    expect(service.alwaysShowFacesOnBoard).toBe(true);
    expect(service.getCharacters().map((character) => character.name)).toEqual(['Rook', 'Bishop']);
  });

  it('starts empty when the configuration is missing', async () => {
    const service = createService();

    await service.init();

    expect(service.getCharacters()).toEqual([]);
    expect(service.detectUnconfiguredPacks()).toEqual([
      'characters_chess',
      'characters_classic',
      'characters_extra',
      'characters_fantasy',
    ]);
  });

  it('refuses to start without the characters repository', async () => {
    const service = new CharacterPackService({
      repoDir: path.join(repoDir, 'missing'),
      botName: 'Parlor',
      availableGames: [],
    });

    await expect(service.init()).rejects.toBeInstanceOf(ConfigurationError);
  });
});
