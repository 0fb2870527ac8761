import { UnknownGameTypeError } from '../../shared/errors';
import {
  createParticipant,
  isGameType,
  type GameType,
  type Participant,
  type SessionRecord,
  type SnapshotKind,
} from '../../shared/types/session';
import type { RuleEngine } from '../../shared/engine/rules';
import { tileToAlphanumeric } from '../../shared/engine/boardCoordinates';
import { SnapshotParticipantSchema, type SnapshotEnvelope } from '../../shared/validation/schemas';
import { coerceId, coerceInt } from '../../shared/utils/coerce';

export const SNAPSHOT_VERSION = 1;

export interface SnapshotParticipant {
  id: string;
  role: string | null;
  coordinate: string | null;
  sequence: number;
  display: { background: string | null; outfit: string | null };
  swappedWith: string;
}

/** On-disk snapshot document, as written. */
export interface SessionSnapshot {
  version: typeof SNAPSHOT_VERSION;
  sessionId: string;
  gameType: GameType;
  operatorId: string;
  kind: SnapshotKind;
  generation?: number;
  savedAt: string;
  turnNumber: number;
  started: boolean;
  paused: boolean;
  ended: boolean;
  nextSequence: number;
  enabledPacks: string[];
  participants: SnapshotParticipant[];
  ruleState: Record<string, unknown>;
}

export interface RestoredSession {
  record: SessionRecord;
  rules: RuleEngine;
  /** Repairs applied while sanitizing; non-empty means the file was suspicious. */
  warnings: string[];
}

export function captureSnapshot(
  record: SessionRecord,
  rules: RuleEngine,
  kind: SnapshotKind,
  now: Date = new Date()
): SessionSnapshot {
  const participants = [...record.participants.values()]
    .sort((a, b) => a.sequence - b.sequence)
    .map((participant) => ({
      id: participant.id,
      role: participant.role,
      coordinate: participant.coordinate,
      sequence: participant.sequence,
      display: { ...participant.display },
      swappedWith: participant.swappedWith,
    }));

  return {
    version: SNAPSHOT_VERSION,
    sessionId: record.sessionId,
    gameType: record.gameType,
    operatorId: record.operatorId,
    kind,
    savedAt: now.toISOString(),
    turnNumber: record.turnNumber,
    started: record.started,
    paused: record.paused,
    ended: record.ended,
    nextSequence: record.nextSequence,
    enabledPacks: [...record.enabledPacks],
    participants,
    ruleState: rules.serialize(record.ruleState),
  };
}

/**
 * Rebuild a session from a parsed snapshot envelope.
 *
 * Participant entries that cannot be read are skipped, duplicate ids keep
 * their first occurrence, sequence numbers that are missing or collide are
 * reassigned after the highest valid one, and dangling swap links are reset.
 * The rule payload is sanitized by the game's own rule engine; afterwards
 * every coordinate is re-derived from the rule-side tile. The restored
 * session always belongs to `sessionId`, whatever the file claims.
 *
 * @throws UnknownGameTypeError when the snapshot names a game this build lacks
 */
export function restoreSnapshot(
  envelope: SnapshotEnvelope,
  sessionId: string,
  resolveRules: (gameType: GameType) => RuleEngine
): RestoredSession {
  if (!isGameType(envelope.gameType)) {
    throw new UnknownGameTypeError(envelope.gameType);
  }
  const gameType = envelope.gameType;
  const rules = resolveRules(gameType);
  const warnings: string[] = [];

  if (envelope.sessionId !== sessionId) {
    warnings.push(`snapshot belonged to session ${envelope.sessionId}; restored into ${sessionId}`);
  }

  const participants = new Map<string, Participant>();
  const usedSequences = new Set<number>();
  const needsSequence: Participant[] = [];

  envelope.participants.forEach((raw, index) => {
    const parsed = SnapshotParticipantSchema.safeParse(raw);
    if (!parsed.success || !parsed.data.id) {
      warnings.push(`participant entry ${index} is unreadable; skipped`);
      return;
    }
    const data = parsed.data;
    if (participants.has(data.id)) {
      warnings.push(`duplicate participant ${data.id} removed`);
      return;
    }

    const sequence = coerceInt(data.sequence);
    const participant = createParticipant(data.id, sequence ?? 0, data.role);
    participant.coordinate = data.coordinate;
    participant.display = { ...data.display };
    participant.swappedWith = coerceId(data.swappedWith) ?? data.id;

    if (sequence === null || sequence < 1 || usedSequences.has(sequence)) {
      warnings.push(`participant ${data.id} had an invalid or duplicate sequence number; reassigned`);
      needsSequence.push(participant);
    } else {
      usedSequences.add(sequence);
    }
    participants.set(data.id, participant);
  });

  let highestSequence = 0;
  for (const participant of participants.values()) {
    if (!needsSequence.includes(participant)) {
      highestSequence = Math.max(highestSequence, participant.sequence);
    }
  }
  for (const participant of needsSequence) {
    highestSequence += 1;
    participant.sequence = highestSequence;
  }

  for (const participant of participants.values()) {
    if (!participants.has(participant.swappedWith)) {
      warnings.push(`participant ${participant.id} had a swap link to unknown ${participant.swappedWith}; cleared`);
      participant.swappedWith = participant.id;
    }
  }

  const turnNumber = coerceInt(envelope.turnNumber);
  if (turnNumber === null || turnNumber < 1) {
    warnings.push('turn number was missing or invalid; reset to 1');
  }
  const storedNextSequence = coerceInt(envelope.nextSequence) ?? 0;

  const participantIds = [...participants.values()].sort((a, b) => a.sequence - b.sequence).map((p) => p.id);
  const deserialized = rules.deserialize(envelope.ruleState, participantIds);
  warnings.push(...deserialized.warnings);

  const record: SessionRecord = {
    sessionId,
    gameType,
    operatorId: envelope.operatorId,
    started: envelope.started,
    paused: envelope.paused,
    ended: envelope.ended,
    turnNumber: turnNumber !== null && turnNumber >= 1 ? turnNumber : 1,
    participants,
    nextSequence: Math.max(storedNextSequence, highestSequence + 1),
    enabledPacks: [...new Set(envelope.enabledPacks)],
    ruleState: deserialized.state,
  };

  const grid = { cols: rules.board.gridCols, rows: rules.board.gridRows };
  for (const id of participantIds) {
    const tile = rules.tileOf(record, id);
    if (tile === null) {
      warnings.push(`participant ${id} had no tile; placed on the start tile`);
      rules.placeToken(record, id, rules.board.startTile);
      continue;
    }
    const participant = participants.get(id);
    if (participant && participant.coordinate !== tileToAlphanumeric(tile, grid)) {
      warnings.push(`participant ${id} coordinate did not match tile ${tile}; corrected`);
      rules.placeToken(record, id, tile);
    }
  }

  return { record, rules, warnings };
}
