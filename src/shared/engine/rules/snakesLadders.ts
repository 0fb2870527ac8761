import type { RuleState, SessionRecord, SnakesLaddersState } from '../../types/session';
import type { BoardConfig } from '../../validation/schemas';
import { coerceId, coerceInt, isRecord } from '../../utils/coerce';
import { tileToAlphanumeric, type GridDimensions } from '../boardCoordinates';
import type {
  DeserializedRuleState,
  EligibilityResult,
  MoveOutcome,
  ParticipantStanding,
  RuleEngine,
  SettleOutcome,
  TileRedirect,
  WinCheck,
} from './RuleEngine';

/**
 * Snakes & ladders on a boustrophedon grid.
 *
 * Turn order is fixed at join time. Within a cycle each eligible participant
 * rolls once; a participant is eligible while not forfeited, not yet acted
 * this cycle and still short of the goal. The cycle (and the session's turn
 * counter) advances once nobody eligible is left.
 *
 * Winners are stamped with the turn number on which they first reached the
 * goal. When every non-forfeited participant has finished, the final winners
 * are those stamped on the earliest turn, so same-turn arrivals tie.
 */
export class SnakesLaddersRules implements RuleEngine {
  public readonly gameType = 'snakes_ladders' as const;
  public readonly grid: GridDimensions;
  private readonly hazards: Map<number, number>;
  private readonly shortcuts: Map<number, number>;

  constructor(public readonly board: BoardConfig) {
    this.grid = { cols: board.gridCols, rows: board.gridRows };
    this.hazards = toTileMap(board.hazards);
    this.shortcuts = toTileMap(board.shortcuts);
  }

  public createState(): SnakesLaddersState {
    return {
      gameType: 'snakes_ladders',
      tiles: new Map(),
      turnOrder: [],
      forfeited: new Set(),
      actedThisCycle: new Set(),
      winners: new Set(),
      goalReachedTurn: new Map(),
    };
  }

  public addParticipant(session: SessionRecord, participantId: string): void {
    const state = this.stateOf(session);
    if (!state.turnOrder.includes(participantId)) {
      state.turnOrder.push(participantId);
    }
    state.forfeited.delete(participantId);
    if (state.goalReachedTurn.has(participantId)) {
      state.winners.add(participantId);
    }

    const preserved = state.tiles.get(participantId);
    const tile = preserved ?? this.board.startTile;
    state.tiles.set(participantId, tile);
    this.syncCoordinate(session, participantId, tile);
  }

  public forfeitParticipant(session: SessionRecord, participantId: string): boolean {
    const state = this.stateOf(session);
    if (!state.turnOrder.includes(participantId)) {
      return false;
    }
    state.forfeited.add(participantId);
    state.winners.delete(participantId);
    return true;
  }

  public placeToken(session: SessionRecord, participantId: string, tile: number): void {
    const state = this.stateOf(session);
    const clamped = Math.max(1, Math.min(tile, this.board.goalTile));
    state.tiles.set(participantId, clamped);
    this.syncCoordinate(session, participantId, clamped);
  }

  public tileOf(session: SessionRecord, participantId: string): number | null {
    return this.stateOf(session).tiles.get(participantId) ?? null;
  }

  public standingOf(session: SessionRecord, participantId: string): ParticipantStanding {
    const state = this.stateOf(session);
    return {
      tile: state.tiles.get(participantId) ?? null,
      forfeited: state.forfeited.has(participantId),
      finished: this.hasFinished(state, participantId),
      winner: state.winners.has(participantId),
      goalTurn: state.goalReachedTurn.get(participantId) ?? null,
    };
  }

  public nextParticipant(session: SessionRecord): string | null {
    return this.nextToAct(this.stateOf(session));
  }

  public checkEligibility(session: SessionRecord, participantId: string): EligibilityResult {
    const state = this.stateOf(session);
    const nextParticipantId = this.nextToAct(state);

    if (!state.turnOrder.includes(participantId)) {
      return { allowed: false, nextParticipantId, reason: 'You are not part of this game.' };
    }
    if (state.forfeited.has(participantId)) {
      return { allowed: false, nextParticipantId, reason: 'You have left this game.' };
    }
    if (this.hasFinished(state, participantId)) {
      return { allowed: false, nextParticipantId, reason: 'You have already reached the goal.' };
    }
    if (state.actedThisCycle.has(participantId)) {
      return {
        allowed: false,
        nextParticipantId,
        reason: 'You have already rolled this turn.',
      };
    }
    if (nextParticipantId !== participantId) {
      return { allowed: false, nextParticipantId, reason: 'It is not your turn.' };
    }
    return { allowed: true, nextParticipantId };
  }

  public resolveMove(session: SessionRecord, participantId: string, roll: number): MoveOutcome {
    const state = this.stateOf(session);
    const turnNumber = session.turnNumber;
    const from = state.tiles.get(participantId) ?? this.board.startTile;
    const landed = Math.min(from + roll, this.board.goalTile);
    const redirect = this.redirectFor(landed);
    const to = redirect ? redirect.to : landed;

    state.tiles.set(participantId, to);
    this.syncCoordinate(session, participantId, to);
    state.actedThisCycle.add(participantId);

    const settled = this.settle(session);
    return { participantId, roll, from, landed, to, redirect, turnNumber, ...settled };
  }

  public checkWin(session: SessionRecord): WinCheck {
    const state = this.stateOf(session);
    const newlyFinished: string[] = [];

    for (const id of state.turnOrder) {
      if (state.forfeited.has(id) || state.goalReachedTurn.has(id)) {
        continue;
      }
      if ((state.tiles.get(id) ?? 0) >= this.board.goalTile) {
        state.goalReachedTurn.set(id, session.turnNumber);
        state.winners.add(id);
        newlyFinished.push(id);
      }
    }

    const active = state.turnOrder.filter((id) => !state.forfeited.has(id));
    const gameOver =
      active.length > 0 && active.every((id) => (state.tiles.get(id) ?? 0) >= this.board.goalTile);

    if (gameOver) {
      const stamps = active
        .map((id) => state.goalReachedTurn.get(id))
        .filter((turn): turn is number => turn !== undefined);
      const earliest = Math.min(...stamps);
      state.winners = new Set(active.filter((id) => state.goalReachedTurn.get(id) === earliest));
    }

    return {
      newlyFinished,
      gameOver,
      winners: state.turnOrder.filter((id) => state.winners.has(id)),
    };
  }

  public settle(session: SessionRecord): SettleOutcome {
    const state = this.stateOf(session);
    const win = this.checkWin(session);
    let cycleAdvanced = false;

    if (!win.gameOver && state.actedThisCycle.size > 0 && this.nextToAct(state) === null) {
      state.actedThisCycle.clear();
      session.turnNumber += 1;
      cycleAdvanced = true;
    }

    return { win, cycleAdvanced };
  }

  public describeMove(outcome: MoveOutcome, displayName: string): string {
    const parts = [`${displayName} rolled a ${outcome.roll} and moved from ${outcome.from} to ${outcome.landed}.`];
    if (outcome.redirect?.kind === 'hazard') {
      parts.push(`Hazard! Slid down from ${outcome.redirect.from} to ${outcome.redirect.to}.`);
    } else if (outcome.redirect?.kind === 'shortcut') {
      parts.push(`Shortcut! Climbed up from ${outcome.redirect.from} to ${outcome.redirect.to}.`);
    }
    if (outcome.win.newlyFinished.includes(outcome.participantId)) {
      parts.push(`${displayName} reached the goal on turn ${outcome.turnNumber}!`);
    }
    return parts.join(' ');
  }

  public serialize(state: RuleState): Record<string, unknown> {
    return {
      tiles: Object.fromEntries(state.tiles),
      turnOrder: [...state.turnOrder],
      forfeited: [...state.forfeited],
      actedThisCycle: [...state.actedThisCycle],
      winners: [...state.winners],
      goalReachedTurn: Object.fromEntries(state.goalReachedTurn),
    };
  }

  public deserialize(raw: Record<string, unknown>, participantIds: string[]): DeserializedRuleState {
    const warnings: string[] = [];
    const known = new Set(participantIds);
    const state = this.createState();

    const readIdList = (field: string): string[] => {
      const value = raw[field];
      if (value === undefined) {
        return [];
      }
      if (!Array.isArray(value)) {
        warnings.push(`${field} is not a list; ignored`);
        return [];
      }
      const ids: string[] = [];
      for (const entry of value) {
        const id = coerceId(entry);
        if (id === null || !known.has(id)) {
          warnings.push(`${field}: stripped unknown participant ${String(entry)}`);
          continue;
        }
        if (ids.includes(id)) {
          warnings.push(`${field}: removed duplicate ${id}`);
          continue;
        }
        ids.push(id);
      }
      return ids;
    };

    const readNumberMap = (field: string): Map<string, number> => {
      const result = new Map<string, number>();
      const value = raw[field];
      if (value === undefined) {
        return result;
      }
      if (!isRecord(value)) {
        warnings.push(`${field} is not a map; ignored`);
        return result;
      }
      for (const [key, entry] of Object.entries(value)) {
        const id = coerceId(key);
        if (id === null || !known.has(id)) {
          warnings.push(`${field}: stripped unknown participant ${key}`);
          continue;
        }
        const num = coerceInt(entry);
        if (num === null) {
          warnings.push(`${field}: discarded non-numeric value for ${id}`);
          continue;
        }
        result.set(id, num);
      }
      return result;
    };

    state.turnOrder = readIdList('turnOrder');
    if (state.turnOrder.length === 0 && participantIds.length > 0) {
      warnings.push(
        `turn order was empty although ${participantIds.length} participant(s) exist; rebuilt from join order`
      );
    }
    for (const id of participantIds) {
      if (!state.turnOrder.includes(id)) {
        state.turnOrder.push(id);
      }
    }

    for (const [id, tile] of readNumberMap('tiles')) {
      state.tiles.set(id, Math.max(1, Math.min(tile, this.board.goalTile)));
    }
    state.forfeited = new Set(readIdList('forfeited'));
    state.actedThisCycle = new Set(readIdList('actedThisCycle'));
    state.winners = new Set(readIdList('winners'));
    state.goalReachedTurn = readNumberMap('goalReachedTurn');

    return { state, warnings };
  }

  /** First participant in turn order who may act, or null when none can. */
  public nextToAct(state: SnakesLaddersState): string | null {
    for (const id of state.turnOrder) {
      if (state.forfeited.has(id) || state.actedThisCycle.has(id) || this.hasFinished(state, id)) {
        continue;
      }
      return id;
    }
    return null;
  }

  public redirectFor(tile: number): TileRedirect | null {
    const down = this.hazards.get(tile);
    if (down !== undefined) {
      return { kind: 'hazard', from: tile, to: down };
    }
    const up = this.shortcuts.get(tile);
    if (up !== undefined) {
      return { kind: 'shortcut', from: tile, to: up };
    }
    return null;
  }

  private hasFinished(state: SnakesLaddersState, participantId: string): boolean {
    return (state.tiles.get(participantId) ?? 0) >= this.board.goalTile;
  }

  private syncCoordinate(session: SessionRecord, participantId: string, tile: number): void {
    const participant = session.participants.get(participantId);
    if (participant) {
      participant.coordinate = tileToAlphanumeric(tile, this.grid);
    }
  }

  private stateOf(session: SessionRecord): SnakesLaddersState {
    const state = session.ruleState;
    if (state.gameType !== 'snakes_ladders') {
      throw new Error(`Session ${session.sessionId} does not hold snakes_ladders state`);
    }
    return state;
  }
}

function toTileMap(record: Record<string, number>): Map<number, number> {
  const map = new Map<number, number>();
  for (const [from, to] of Object.entries(record)) {
    map.set(Number.parseInt(from, 10), to);
  }
  return map;
}
