import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';
import { getMetricsService } from './MetricsService';
import {
  SnapshotCorruptionError,
  SnapshotNotFoundError,
  errorMessage,
} from '../../shared/errors';
import { SnapshotEnvelopeSchema, type SnapshotEnvelope } from '../../shared/validation/schemas';
import type { SnapshotKind } from '../../shared/types/session';
import type { SessionSnapshot } from '../game/sessionSnapshot';

export interface SnapshotInfo {
  /** `autosave-<slot>` or `manual-<n>`. */
  id: string;
  kind: SnapshotKind;
  generation: number;
  savedAt: string;
}

export interface LoadedSnapshot {
  id: string;
  envelope: SnapshotEnvelope;
}

/**
 * Persistence collaborator for session snapshots.
 */
export interface SnapshotStore {
  save(snapshot: SessionSnapshot): Promise<SnapshotInfo>;
  /** `snapshotId` is a listed id, or `latest` for the most recent save of either kind. */
  load(sessionId: string, snapshotId: string): Promise<LoadedSnapshot>;
  list(sessionId: string): Promise<SnapshotInfo[]>;
  deleteAll(sessionId: string): Promise<void>;
}

export interface FileSnapshotStoreOptions {
  rootDir: string;
  autosaveSlots: number;
}

const SNAPSHOT_ID_PATTERN = /^(autosave|manual)-(\d+)$/;
const LATEST = 'latest';

/**
 * One directory per session under `rootDir`:
 *
 *   <rootDir>/<sessionId>/autosave-<slot>.json   rotating, `autosaveSlots` files
 *   <rootDir>/<sessionId>/manual-<n>.json        numbered 1, 2, 3, ... forever
 *
 * Every file carries a per-kind `generation`. Autosave generation g lands in
 * slot ((g - 1) mod slots) + 1, so the oldest autosave is overwritten first.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly rootDir: string;
  private readonly autosaveSlots: number;

  constructor(options: FileSnapshotStoreOptions) {
    this.rootDir = options.rootDir;
    this.autosaveSlots = Math.max(1, options.autosaveSlots);
  }

  public async save(snapshot: SessionSnapshot): Promise<SnapshotInfo> {
    const dir = this.sessionDir(snapshot.sessionId);
    await fs.mkdir(dir, { recursive: true });

    const existing = (await this.list(snapshot.sessionId)).filter((info) => info.kind === snapshot.kind);
    const generation = existing.reduce((max, info) => Math.max(max, info.generation), 0) + 1;
    const index =
      snapshot.kind === 'autosave' ? ((generation - 1) % this.autosaveSlots) + 1 : generation;
    const id = `${snapshot.kind}-${index}`;

    const document: SessionSnapshot = { ...snapshot, generation };
    const target = path.join(dir, `${id}.json`);
    const temp = `${target}.tmp`;
    await fs.writeFile(temp, JSON.stringify(document, null, 2), 'utf-8');
    await fs.rename(temp, target);

    getMetricsService().recordSnapshotSaved(snapshot.kind);
    logger.info('Snapshot saved', { sessionId: snapshot.sessionId, snapshotId: id, generation });
    return { id, kind: snapshot.kind, generation, savedAt: snapshot.savedAt };
  }

  /**
   * @throws SnapshotNotFoundError when no such snapshot exists
   * @throws SnapshotCorruptionError when the file is not a readable snapshot
   */
  public async load(sessionId: string, snapshotId: string): Promise<LoadedSnapshot> {
    const requested = snapshotId.trim().toLowerCase();
    let id = requested;
    if (requested === LATEST) {
      const [newest] = await this.list(sessionId);
      if (!newest) {
        throw new SnapshotNotFoundError(sessionId, snapshotId);
      }
      id = newest.id;
    } else if (!SNAPSHOT_ID_PATTERN.test(requested)) {
      throw new SnapshotNotFoundError(sessionId, snapshotId);
    }

    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.sessionDir(sessionId), `${id}.json`), 'utf-8');
    } catch {
      throw new SnapshotNotFoundError(sessionId, id);
    }

    return { id, envelope: parseEnvelope(id, raw) };
  }

  /** Newest first. Unreadable files are logged and left out. */
  public async list(sessionId: string): Promise<SnapshotInfo[]> {
    const dir = this.sessionDir(sessionId);
    let filenames: string[];
    try {
      filenames = await fs.readdir(dir);
    } catch {
      return [];
    }

    const infos: SnapshotInfo[] = [];
    for (const filename of filenames) {
      if (!filename.endsWith('.json')) {
        continue;
      }
      const id = filename.slice(0, -'.json'.length);
      const match = SNAPSHOT_ID_PATTERN.exec(id);
      if (!match) {
        continue;
      }
      try {
        const envelope = parseEnvelope(id, await fs.readFile(path.join(dir, filename), 'utf-8'));
        infos.push({
          id,
          kind: envelope.kind,
          generation: envelope.generation ?? Number.parseInt(match[2], 10),
          savedAt: envelope.savedAt,
        });
      } catch (error) {
        logger.warn('Skipping unreadable snapshot', { sessionId, snapshotId: id, error: errorMessage(error) });
      }
    }

    return infos.sort(
      (a, b) => b.savedAt.localeCompare(a.savedAt) || b.generation - a.generation || a.id.localeCompare(b.id)
    );
  }

  public async deleteAll(sessionId: string): Promise<void> {
    await fs.rm(this.sessionDir(sessionId), { recursive: true, force: true });
    logger.info('Snapshots deleted', { sessionId });
  }

  private sessionDir(sessionId: string): string {
    // Channel ids are numeric; anything else is flattened so it cannot escape rootDir.
    return path.join(this.rootDir, sessionId.replace(/[^A-Za-z0-9_-]/g, '_'));
  }
}

function parseEnvelope(snapshotId: string, raw: string): SnapshotEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotCorruptionError(snapshotId, `invalid JSON (${errorMessage(error)})`);
  }
  const parsed = SnapshotEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new SnapshotCorruptionError(snapshotId, `${where}${issue ? issue.message : 'invalid snapshot'}`);
  }
  return parsed.data;
}
