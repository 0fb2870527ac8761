import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';
import { ConfigurationError, errorMessage } from '../../shared/errors';
import {
  CharacterPackConfigSchema,
  CharacterPackEntrySchema,
  CharacterSchema,
  type CharacterDefinition,
  type CharacterPackEntry,
} from '../../shared/validation/schemas';
import { isRecord } from '../../shared/utils/coerce';

export const CHARACTER_CONFIG_FILENAME = 'characters.json';
export const PACKS_DIRNAME = 'packs';
const UNCONFIGURED_PACK_PREFIX = 'characters_';

export interface LoadedCharacter extends CharacterDefinition {
  /** File name (without extension) of the pack the character came from. */
  pack: string;
}

/**
 * Read-side view of the character catalog used by game sessions.
 */
export interface CharacterCatalog {
  getCharactersForGame(gameType: string, enabledPacks?: readonly string[]): LoadedCharacter[];
  getEnabledPacksForGame(gameType: string): string[];
  isCharacterEnabledForGame(name: string, gameType: string): boolean;
}

export interface CharacterPackServiceOptions {
  repoDir: string;
  botName: string;
  /** Game types known to this process; used to flag pack entries for unknown games. */
  availableGames: readonly string[];
}

interface PackConfigState {
  alwaysShowFacesOnBoard: boolean;
  entries: CharacterPackEntry[];
}

/**
 * Process-scoped character catalog.
 *
 * `<repoDir>/characters.json` lists the packs; each entry names a file under
 * `<repoDir>/packs/` and enables itself per bot (`enable_<bot>`) and per game
 * (`enable_<bot>_<game>`). Only packs enabled for the running bot are loaded,
 * and a game sees the subset that is also enabled for that game.
 *
 * Call `init()` once at startup and `teardown()` on shutdown; nothing here is
 * cached outside the instance.
 */
export class CharacterPackService implements CharacterCatalog {
  private readonly repoDir: string;
  private readonly botName: string;
  private readonly availableGames: ReadonlySet<string>;

  private initialized = false;
  private packConfig: PackConfigState = { alwaysShowFacesOnBoard: true, entries: [] };
  private characters: LoadedCharacter[] = [];
  private readonly characterToPack = new Map<string, string>();
  private unconfiguredPacks: string[] = [];

  constructor(options: CharacterPackServiceOptions) {
    this.repoDir = options.repoDir;
    this.botName = options.botName;
    this.availableGames = new Set(options.availableGames);
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  public get alwaysShowFacesOnBoard(): boolean {
    return this.packConfig.alwaysShowFacesOnBoard;
  }

  /**
   * Load pack configuration and every pack enabled for this bot.
   *
   * @throws ConfigurationError when the characters repository is missing
   */
  public async init(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const stat = await fs.stat(this.repoDir).catch(() => null);
    if (!stat || !stat.isDirectory()) {
      throw new ConfigurationError(
        `characters repository not found at ${this.repoDir}; set CHARACTERS_REPO_DIR to point to it`,
        { repoDir: this.repoDir }
      );
    }

    this.packConfig = await this.readPackConfig();
    const configuredFiles = new Set<string>();

    logger.info('Loading character packs', {
      botName: this.botName,
      packCount: this.packConfig.entries.length,
    });

    for (const entry of this.packConfig.entries) {
      if (entry.file) {
        configuredFiles.add(entry.file);
      }
      this.warnUnknownGameFlags(entry);

      const enabled = entry[`enable_${this.botName}`] === true;
      logger.info('Character pack status', {
        pack: entry.name,
        file: entry.file,
        status: enabled ? 'ENABLED' : 'DISABLED',
      });
      if (enabled && entry.file) {
        await this.loadPack(entry.file);
      }
    }

    this.unconfiguredPacks = await this.findUnconfiguredPacks(configuredFiles);
    if (this.unconfiguredPacks.length > 0) {
      logger.info('Detected pack files not listed in characters.json (disabled by default)', {
        packs: this.unconfiguredPacks,
      });
    }

    this.initialized = true;
    logger.info('Character catalog ready', { characters: this.characters.length });
  }

  public teardown(): void {
    this.characters = [];
    this.characterToPack.clear();
    this.packConfig = { alwaysShowFacesOnBoard: true, entries: [] };
    this.unconfiguredPacks = [];
    this.initialized = false;
  }

  public getCharacters(): LoadedCharacter[] {
    return [...this.characters];
  }

  /**
   * Pack files enabled for a game. Only the game-specific flag counts; the
   * bot-wide flag does not carry over to games.
   */
  public getEnabledPacksForGame(gameType: string): string[] {
    const flag = `enable_${this.botName}_${gameType}`;
    const packs: string[] = [];
    for (const entry of this.packConfig.entries) {
      if (entry.file && entry[flag] === true && !packs.includes(entry.file)) {
        packs.push(entry.file);
      }
    }
    return packs;
  }

  /**
   * Characters available in a game. Sessions pass the pack list captured at
   * start so later config edits do not change a running game.
   */
  public getCharactersForGame(gameType: string, enabledPacks?: readonly string[]): LoadedCharacter[] {
    const packs = new Set(enabledPacks ?? this.getEnabledPacksForGame(gameType));
    if (packs.size === 0) {
      return [];
    }
    return this.characters.filter((character) => packs.has(character.pack));
  }

  public isCharacterEnabledForGame(name: string, gameType: string): boolean {
    const pack = this.characterToPack.get(name.trim());
    return pack !== undefined && this.getEnabledPacksForGame(gameType).includes(pack);
  }

  /** Pack files present on disk but absent from characters.json. */
  public detectUnconfiguredPacks(): string[] {
    return [...this.unconfiguredPacks];
  }

  private async readPackConfig(): Promise<PackConfigState> {
    const configPath = path.join(this.repoDir, CHARACTER_CONFIG_FILENAME);
    let raw: string;
    try {
      raw = await fs.readFile(configPath, 'utf-8');
    } catch {
      logger.warn('Character pack configuration missing', { path: configPath });
      return { alwaysShowFacesOnBoard: true, entries: [] };
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      logger.error('Character pack configuration is not valid JSON', {
        path: configPath,
        error: errorMessage(error),
      });
      return { alwaysShowFacesOnBoard: true, entries: [] };
    }

    const parsed = CharacterPackConfigSchema.safeParse(parsedJson);
    if (!parsed.success) {
      logger.error('Unexpected character pack configuration format', {
        path: configPath,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return { alwaysShowFacesOnBoard: true, entries: [] };
    }

    // Legacy files are a bare list of pack entries.
    const rawEntries = Array.isArray(parsed.data) ? parsed.data : parsed.data.packs;
    const alwaysShowFacesOnBoard = Array.isArray(parsed.data) ? true : parsed.data.alwaysShowFacesOnBoard;

    const entries: CharacterPackEntry[] = [];
    for (const rawEntry of rawEntries) {
      if (!isRecord(rawEntry)) {
        continue;
      }
      const entry = CharacterPackEntrySchema.safeParse(rawEntry);
      if (entry.success) {
        entries.push(entry.data);
      }
    }

    if (entries.length === 0) {
      logger.warn('No pack entries found in character pack configuration', { path: configPath });
    }
    return { alwaysShowFacesOnBoard, entries };
  }

  private warnUnknownGameFlags(entry: CharacterPackEntry): void {
    if (this.availableGames.size === 0) {
      return;
    }
    const prefix = `enable_${this.botName}_`;
    for (const key of Object.keys(entry)) {
      if (!key.startsWith(prefix)) {
        continue;
      }
      const gameType = key.slice(prefix.length);
      if (gameType && !this.availableGames.has(gameType)) {
        logger.warn('Character pack has a flag for an unknown game', {
          pack: entry.name,
          gameType,
          key,
        });
      }
    }
  }

  private async loadPack(file: string): Promise<void> {
    const packPath = path.join(this.repoDir, PACKS_DIRNAME, `${file}.json`);
    let rawPack: unknown;
    try {
      rawPack = JSON.parse(await fs.readFile(packPath, 'utf-8'));
    } catch (error) {
      logger.warn('Failed to load character pack', { file, path: packPath, error: errorMessage(error) });
      return;
    }

    if (!Array.isArray(rawPack)) {
      logger.warn('Character pack is not a list of characters', { file });
      return;
    }

    let loaded = 0;
    for (const rawCharacter of rawPack) {
      const parsed = CharacterSchema.safeParse(rawCharacter);
      if (!parsed.success) {
        logger.warn('Skipping invalid character entry', { file });
        continue;
      }
      this.characters.push({ ...parsed.data, pack: file });
      this.characterToPack.set(parsed.data.name, file);
      loaded += 1;
    }
    logger.info('Loaded character pack', { file, characters: loaded });
  }

  private async findUnconfiguredPacks(configuredFiles: ReadonlySet<string>): Promise<string[]> {
    const packsDir = path.join(this.repoDir, PACKS_DIRNAME);
    let filenames: string[];
    try {
      filenames = await fs.readdir(packsDir);
    } catch {
      logger.warn('Character packs directory missing', { path: packsDir });
      return [];
    }

    const detected: string[] = [];
    for (const filename of filenames.sort()) {
      if (!filename.startsWith(UNCONFIGURED_PACK_PREFIX) || !filename.endsWith('.json')) {
        continue;
      }
      const pack = filename.slice(0, -'.json'.length);
      if (!configuredFiles.has(pack)) {
        detected.push(pack);
      }
    }
    return detected;
  }
}
