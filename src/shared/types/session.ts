/**
 * Core session data model shared by the turn engine, the swap coordinator,
 * the command serializer and snapshot persistence.
 */

export type GameType = 'snakes_ladders';

export const GAME_TYPES: readonly GameType[] = ['snakes_ladders'] as const;

export function isGameType(value: string): value is GameType {
  return (GAME_TYPES as readonly string[]).includes(value);
}

/** Display-layer selections carried by whoever wears a role. */
export interface DisplayMetadata {
  background: string | null;
  outfit: string | null;
}

export interface Participant {
  id: string;
  /** Assigned role/character name; null until assigned. */
  role: string | null;
  /** Alphanumeric board coordinate (e.g. "C4"); null when off the board. */
  coordinate: string | null;
  /** Join ordinal. Assigned once, never reused or renumbered. */
  sequence: number;
  display: DisplayMetadata;
  /**
   * Swap back-reference: the participant this one most recently exchanged
   * roles with. Equal to `id` when not currently swapped.
   */
  swappedWith: string;
}

/**
 * Rule payload for snakes & ladders. Every id held here must exist in the
 * session's participant map; `turnOrder` has no duplicates and holds every
 * participant that was ever given a sequence number.
 */
export interface SnakesLaddersState {
  gameType: 'snakes_ladders';
  tiles: Map<string, number>;
  /** Insertion order; ids are appended on first join and never removed. */
  turnOrder: string[];
  forfeited: Set<string>;
  actedThisCycle: Set<string>;
  winners: Set<string>;
  /** Turn number on which each participant first reached the goal. */
  goalReachedTurn: Map<string, number>;
}

/** Tagged union of every game type's rule payload. */
export type RuleState = SnakesLaddersState;

/**
 * Mutable record of one game in progress. The rule payload is owned by the
 * rule engine selected by `gameType`; everything else is game-agnostic.
 */
export interface SessionRecord {
  sessionId: string;
  gameType: GameType;
  operatorId: string;
  started: boolean;
  paused: boolean;
  ended: boolean;
  turnNumber: number;
  participants: Map<string, Participant>;
  nextSequence: number;
  enabledPacks: string[];
  ruleState: RuleState;
}

/** Periodic autosaves rotate through a bounded set of slots; manual saves never do. */
export type SnapshotKind = 'autosave' | 'manual';

/**
 * Outcome of a player or operator action. Rejections are normal negative
 * results, not errors, and never mutate state.
 */
export type ActionResult =
  | { ok: true; message: string; changed: boolean }
  | { ok: false; message: string };

export const accepted = (message: string, changed = true): ActionResult => ({
  ok: true,
  message,
  changed,
});

export const rejected = (message: string): ActionResult => ({ ok: false, message });

export function createParticipant(id: string, sequence: number, role: string | null = null): Participant {
  return {
    id,
    role,
    coordinate: null,
    sequence,
    display: { background: null, outfit: null },
    swappedWith: id,
  };
}
