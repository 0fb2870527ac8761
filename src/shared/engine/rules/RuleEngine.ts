import type { GameType, RuleState, SessionRecord } from '../../types/session';
import type { BoardConfig } from '../../validation/schemas';

export interface EligibilityResult {
  allowed: boolean;
  /** The only participant currently permitted to act, if any. */
  nextParticipantId: string | null;
  /** Human-readable reason when `allowed` is false. */
  reason?: string;
}

export interface TileRedirect {
  kind: 'hazard' | 'shortcut';
  from: number;
  to: number;
}

export interface WinCheck {
  /** Participants stamped on this check. */
  newlyFinished: string[];
  gameOver: boolean;
  /** Current winner set (final once `gameOver`). */
  winners: string[];
}

export interface SettleOutcome {
  win: WinCheck;
  /** True when the cycle completed and the turn counter advanced. */
  cycleAdvanced: boolean;
}

export interface MoveOutcome extends SettleOutcome {
  participantId: string;
  roll: number;
  from: number;
  /** Tile reached by the roll, after clamping to the goal. */
  landed: number;
  /** Final tile after at most one redirection. */
  to: number;
  redirect: TileRedirect | null;
  /** Turn number the move was made on. */
  turnNumber: number;
}

/** Rule-side view of one participant, for listings and rendering. */
export interface ParticipantStanding {
  tile: number | null;
  forfeited: boolean;
  finished: boolean;
  winner: boolean;
  /** Turn number on which the goal was first reached, if ever. */
  goalTurn: number | null;
}

export interface DeserializedRuleState {
  state: RuleState;
  warnings: string[];
}

/**
 * Game-type-specific rules. Implementations mutate `session.ruleState` (and
 * the participants' coordinates) only from these methods; callers hold the
 * session lock while invoking any mutating method.
 */
export interface RuleEngine {
  readonly gameType: GameType;
  readonly board: BoardConfig;

  createState(): RuleState;

  /** First join or re-join. Clears forfeit and restores preserved position. */
  addParticipant(session: SessionRecord, participantId: string): void;

  /** Flips forfeit membership only. Returns false for unknown participants. */
  forfeitParticipant(session: SessionRecord, participantId: string): boolean;

  /** Moves a token without rolling (operator placement, swaps). */
  placeToken(session: SessionRecord, participantId: string, tile: number): void;

  tileOf(session: SessionRecord, participantId: string): number | null;

  standingOf(session: SessionRecord, participantId: string): ParticipantStanding;

  /** The only participant currently permitted to act, or null when the cycle is done. */
  nextParticipant(session: SessionRecord): string | null;

  checkEligibility(session: SessionRecord, participantId: string): EligibilityResult;

  resolveMove(session: SessionRecord, participantId: string, roll: number): MoveOutcome;

  checkWin(session: SessionRecord): WinCheck;

  /** Win detection followed by cycle bookkeeping. */
  settle(session: SessionRecord): SettleOutcome;

  /** Player-facing summary of a move; names any redirection explicitly. */
  describeMove(outcome: MoveOutcome, displayName: string): string;

  serialize(state: RuleState): Record<string, unknown>;

  deserialize(raw: Record<string, unknown>, participantIds: string[]): DeserializedRuleState;
}
