import type { GameSessionStatus } from '../stateMachines/gameSession';
import type { DisplayMetadata, GameType } from './session';

export interface BoardToken {
  participantId: string;
  sequence: number;
  /** Role name, or "Player N" while unassigned. */
  label: string;
  tile: number | null;
  coordinate: string | null;
  display: DisplayMetadata;
  forfeited: boolean;
  winner: boolean;
}

/**
 * Read-only projection of a session handed to a BoardRenderer. Built fresh
 * for every render so renderers never hold live session state.
 */
export interface BoardView {
  sessionId: string;
  gameType: GameType;
  status: GameSessionStatus;
  turnNumber: number;
  cols: number;
  rows: number;
  goalTile: number;
  hazards: ReadonlyMap<number, number>;
  shortcuts: ReadonlyMap<number, number>;
  tokens: BoardToken[];
}
