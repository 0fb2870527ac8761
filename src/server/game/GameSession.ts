import { randomInt } from 'crypto';
import { logger } from '../utils/logger';
import { getMetricsService, type MoveOutcome as MoveMetricOutcome } from '../services/MetricsService';
import type { CharacterCatalog } from '../services/CharacterPackService';
import { RulePluginError } from '../../shared/errors';
import {
  accepted,
  createParticipant,
  rejected,
  type ActionResult,
  type GameType,
  type Participant,
  type SessionRecord,
} from '../../shared/types/session';
import type { BoardToken, BoardView } from '../../shared/types/board';
import type { MoveOutcome, RuleEngine, SettleOutcome } from '../../shared/engine/rules';
import { SwapGraph } from '../../shared/engine/swapCoordinator';
import {
  alphanumericToTile,
  normalizeCoordinate,
  type GridDimensions,
} from '../../shared/engine/boardCoordinates';
import {
  applyTransition,
  deriveGameSessionStatus,
  planTransition,
  type GameSessionStatus,
  type SessionTransition,
} from '../../shared/stateMachines/gameSession';

export type DieRoller = (sides: number) => number;

export interface GameSessionOptions {
  rules: RuleEngine;
  catalog?: CharacterCatalog | null;
  /** Defaults to a uniform roll in 1..sides. */
  rollDie?: DieRoller;
  /** Source for random character draws, in [0, 1). */
  random?: () => number;
}

type GuardResult<T> = { ok: true; value: T } | { ok: false; error: RulePluginError };

/** What an exchange moves between participants. */
type WornIdentity = Pick<Participant, 'role' | 'coordinate' | 'display' | 'swappedWith'>;

interface Checkpoint {
  participantIds: string[];
  ruleState: Record<string, unknown>;
  identities: Map<string, WornIdentity>;
  turnNumber: number;
}

const defaultRollDie: DieRoller = (sides) => randomInt(1, sides + 1);

const STATUS_REJECTIONS: Record<Exclude<GameSessionStatus, 'active'>, string> = {
  not_started: 'The game has not started yet.',
  paused: 'The game is paused.',
  ended: 'The game has already ended.',
};

export const mention = (participantId: string): string => `<@${participantId}>`;

/**
 * One game in progress.
 *
 * Every public mutator assumes the caller holds the session's serializer
 * lock. Rule engine calls are guarded: an exception raised by game-specific
 * logic rolls the rule state back to the last checkpoint, is queued as an
 * operator notice, and the operation reports a normal rejection.
 */
export class GameSession {
  public readonly record: SessionRecord;
  public readonly rules: RuleEngine;
  private readonly swaps: SwapGraph;
  private readonly catalog: CharacterCatalog | null;
  private readonly rollDie: DieRoller;
  private readonly random: () => number;
  private operatorNotices: string[] = [];

  constructor(record: SessionRecord, options: GameSessionOptions) {
    this.record = record;
    this.rules = options.rules;
    this.catalog = options.catalog ?? null;
    this.rollDie = options.rollDie ?? defaultRollDie;
    this.random = options.random ?? Math.random;
    this.swaps = new SwapGraph(record.participants);
  }

  /**
   * A fresh, not-yet-started session. Character packs are captured now so
   * later configuration edits never change a running game.
   */
  public static create(
    sessionId: string,
    gameType: GameType,
    operatorId: string,
    options: GameSessionOptions
  ): GameSession {
    const record: SessionRecord = {
      sessionId,
      gameType,
      operatorId,
      started: false,
      paused: false,
      ended: false,
      turnNumber: 1,
      participants: new Map(),
      nextSequence: 1,
      enabledPacks: options.catalog?.getEnabledPacksForGame(gameType) ?? [],
      ruleState: options.rules.createState(),
    };
    return new GameSession(record, options);
  }

  public get sessionId(): string {
    return this.record.sessionId;
  }

  public get operatorId(): string {
    return this.record.operatorId;
  }

  public get status(): GameSessionStatus {
    return deriveGameSessionStatus(this.record);
  }

  private get grid(): GridDimensions {
    return { cols: this.rules.board.gridCols, rows: this.rules.board.gridRows };
  }

  /** Operator-facing messages produced since the last call. */
  public drainOperatorNotices(): string[] {
    const notices = this.operatorNotices;
    this.operatorNotices = [];
    return notices;
  }

  public displayName(participantId: string): string {
    const participant = this.record.participants.get(participantId);
    if (!participant) {
      return mention(participantId);
    }
    return participant.role ?? `Player ${participant.sequence}`;
  }

  // ===================
  // Lifecycle
  // ===================

  public start(): ActionResult {
    const result = this.transition('start', `The game has started. Turn ${this.record.turnNumber} begins.`);
    if (!result.ok) {
      return result;
    }
    return accepted(this.withNextUp(result.message));
  }

  public pause(): ActionResult {
    return this.transition('pause', 'The game is paused.');
  }

  public resume(): ActionResult {
    const result = this.transition('resume', 'The game has resumed.');
    return result.ok ? accepted(this.withNextUp(result.message)) : result;
  }

  public end(): ActionResult {
    return this.transition('end', 'The game has ended.');
  }

  private transition(transition: SessionTransition, message: string): ActionResult {
    const plan = planTransition(this.record, transition);
    if (!plan.ok) {
      return rejected(plan.reason);
    }
    applyTransition(this.record, plan.to);
    getMetricsService().recordSessionTransition(transition);
    logger.info('Session transition', {
      sessionId: this.sessionId,
      transition,
      from: plan.from,
      to: plan.to,
    });
    return accepted(message);
  }

  // ===================
  // Membership
  // ===================

  /**
   * First join or re-join. A returning participant keeps their sequence
   * number and board position; only the forfeit flag is cleared.
   */
  public join(participantId: string, role: string | null = null): ActionResult {
    if (this.record.ended) {
      return rejected(STATUS_REJECTIONS.ended);
    }

    const existing = this.record.participants.get(participantId);
    if (existing && !this.rules.standingOf(this.record, participantId).forfeited) {
      return rejected(`${mention(participantId)} is already in the game as Player ${existing.sequence}.`);
    }

    let resolvedRole: string | null = null;
    if (role !== null) {
      const resolution = this.resolveRole(role, participantId);
      if (!resolution.ok) {
        return rejected(resolution.message);
      }
      resolvedRole = resolution.name;
    } else if (!existing?.role) {
      resolvedRole = this.drawCharacter();
    }

    if (existing) {
      const added = this.guardRule('addParticipant', () =>
        this.rules.addParticipant(this.record, participantId)
      );
      if (!added.ok) {
        return rejected('Could not add you back to the game; the operator has been notified.');
      }
      if (resolvedRole !== null) {
        existing.role = resolvedRole;
      }
      logger.info('Participant rejoined', { sessionId: this.sessionId, participantId });
      return accepted(
        `${mention(participantId)} rejoined the game as Player ${existing.sequence} (${this.displayName(participantId)}).`
      );
    }

    const participant = createParticipant(participantId, this.record.nextSequence, resolvedRole);
    const added = this.guardRule('addParticipant', () => {
      this.record.participants.set(participantId, participant);
      this.record.nextSequence += 1;
      this.rules.addParticipant(this.record, participantId);
    });
    if (!added.ok) {
      // Never joined, so the sequence number was never handed out.
      this.record.participants.delete(participantId);
      this.record.nextSequence = participant.sequence;
      return rejected('Could not add you to the game; the operator has been notified.');
    }

    logger.info('Participant joined', {
      sessionId: this.sessionId,
      participantId,
      sequence: participant.sequence,
      role: participant.role,
    });
    const roleText = participant.role ? ` (${participant.role})` : '';
    return accepted(`${mention(participantId)} joined as Player ${participant.sequence}${roleText}.`);
  }

  /**
   * Remove a participant from play. They stay in the turn order and on the
   * board; eligibility simply skips them from now on.
   */
  public forfeit(participantId: string): ActionResult {
    if (this.record.ended) {
      return rejected(STATUS_REJECTIONS.ended);
    }
    if (!this.record.participants.has(participantId)) {
      return rejected(`${mention(participantId)} is not part of this game.`);
    }
    if (this.rules.standingOf(this.record, participantId).forfeited) {
      return rejected(`${mention(participantId)} has already left the game.`);
    }

    const result = this.guardRule('forfeitParticipant', () => {
      this.rules.forfeitParticipant(this.record, participantId);
      return this.started ? this.rules.settle(this.record) : null;
    });
    if (!result.ok) {
      return rejected('Could not process the forfeit; the operator has been notified.');
    }

    logger.info('Participant forfeited', { sessionId: this.sessionId, participantId });
    const lines = [
      `${mention(participantId)} (${this.displayName(participantId)}) left the game. Their position is kept.`,
    ];
    if (result.value) {
      lines.push(...this.describeSettle(result.value));
    }
    return accepted(this.withNextUp(lines.join('\n')));
  }

  public assignRole(participantId: string, role: string): ActionResult {
    const participant = this.record.participants.get(participantId);
    if (!participant) {
      return rejected(`${mention(participantId)} is not part of this game.`);
    }
    const resolution = this.resolveRole(role, participantId);
    if (!resolution.ok) {
      return rejected(resolution.message);
    }
    participant.role = resolution.name;
    logger.info('Role assigned', { sessionId: this.sessionId, participantId, role: resolution.name });
    return accepted(`${mention(participantId)} is now ${resolution.name}.`);
  }

  // ===================
  // Swaps
  // ===================

  public exchange(aId: string, bId: string): ActionResult {
    return this.exchangeRoles(aId, bId, true);
  }

  public exchangePermanent(aId: string, bId: string): ActionResult {
    return this.exchangeRoles(aId, bId, false);
  }

  private exchangeRoles(aId: string, bId: string, reversible: boolean): ActionResult {
    if (this.record.ended) {
      return rejected(STATUS_REJECTIONS.ended);
    }
    for (const id of [aId, bId]) {
      if (!this.record.participants.has(id)) {
        return rejected(`${mention(id)} is not part of this game.`);
      }
    }
    if (aId === bId) {
      return rejected('A participant cannot swap with themselves.');
    }

    const result = this.guardRule('placeToken', () => {
      this.swaps.exchange(aId, bId, { reversible });
      return this.syncTiles([aId, bId]);
    });
    if (!result.ok) {
      return rejected('Could not swap those roles; the operator has been notified.');
    }

    logger.info('Roles exchanged', { sessionId: this.sessionId, a: aId, b: bId, reversible });
    const lines = [
      reversible
        ? `${mention(aId)} and ${mention(bId)} swapped roles.`
        : `${mention(aId)} and ${mention(bId)} permanently swapped roles.`,
      ...this.describeSettled(result.value),
    ];
    return accepted(lines.join('\n'));
  }

  /** Undo every reversible swap reachable from the participant's back-reference. */
  public unswap(participantId: string): ActionResult {
    if (this.record.ended) {
      return rejected(STATUS_REJECTIONS.ended);
    }
    if (!this.record.participants.has(participantId)) {
      return rejected(`${mention(participantId)} is not part of this game.`);
    }

    const chain = this.swaps.buildChain(participantId);
    if (chain.length === 0) {
      return rejected(`${mention(participantId)} is not currently swapped.`);
    }

    const result = this.guardRule('placeToken', () => this.syncTiles(this.swaps.revertChain(chain)));
    if (!result.ok) {
      return rejected('Could not undo those swaps; the operator has been notified.');
    }
    logger.info('Swap chain reverted', { sessionId: this.sessionId, participantId, chain });

    const plural = chain.length === 1 ? 'swap' : 'swaps';
    return accepted(
      [
        `Reverted ${chain.length} ${plural} involving ${mention(participantId)}.`,
        ...this.describeSettled(result.value),
      ].join('\n')
    );
  }

  /**
   * Bring rule-side tiles in line with coordinates after an exchange moved
   * coordinates between participants. Runs inside the caller's rule guard.
   */
  private syncTiles(participantIds: string[]): SettleOutcome | null {
    for (const id of participantIds) {
      const coordinate = this.record.participants.get(id)?.coordinate ?? null;
      const tile = coordinate === null ? null : alphanumericToTile(coordinate, this.grid);
      if (tile !== null) {
        this.rules.placeToken(this.record, id, tile);
      }
    }
    return this.started ? this.rules.settle(this.record) : null;
  }

  private describeSettled(settled: SettleOutcome | null): string[] {
    return settled ? this.describeSettle(settled) : [];
  }

  // ===================
  // Movement
  // ===================

  /** Operator placement. Skips the roll but still runs win detection. */
  public moveToken(participantId: string, coordinate: string): ActionResult {
    const blocked = this.movementBlocked();
    if (blocked) {
      return blocked;
    }
    if (!this.record.participants.has(participantId)) {
      return rejected(`${mention(participantId)} is not part of this game.`);
    }

    const tile = alphanumericToTile(coordinate, this.grid);
    if (tile === null) {
      return rejected(`Invalid coordinate: ${coordinate}`);
    }
    const goal = this.rules.board.goalTile;
    const normalized = normalizeCoordinate(coordinate, this.grid) ?? coordinate;
    if (tile > goal) {
      return rejected(`Position ${normalized} (tile ${tile}) is out of bounds (1-${goal}).`);
    }

    const result = this.guardRule('placeToken', () => {
      this.rules.placeToken(this.record, participantId, tile);
      return this.rules.settle(this.record);
    });
    if (!result.ok) {
      return rejected('Could not move that token; the operator has been notified.');
    }

    logger.info('Token moved by operator', { sessionId: this.sessionId, participantId, tile });
    const lines = [
      `${mention(participantId)} (${this.displayName(participantId)}) moved to ${normalized} (tile ${tile}).`,
      ...this.describeSettle(result.value),
    ];
    return accepted(this.withNextUp(lines.join('\n')));
  }

  /**
   * Roll for a participant. `forcedRoll` lets the operator dictate the die
   * value; eligibility applies either way.
   */
  public act(participantId: string, forcedRoll: number | null = null): ActionResult {
    const blocked = this.movementBlocked();
    if (blocked) {
      return blocked;
    }

    const sides = this.rules.board.dieSides;
    if (forcedRoll !== null && (!Number.isInteger(forcedRoll) || forcedRoll < 1 || forcedRoll > sides)) {
      return rejected(`Roll must be between 1 and ${sides}.`);
    }

    const eligibility = this.guardRule('checkEligibility', () =>
      this.rules.checkEligibility(this.record, participantId)
    );
    if (!eligibility.ok) {
      return rejected('Could not check whose turn it is; the operator has been notified.');
    }
    if (!eligibility.value.allowed) {
      const reason = eligibility.value.reason ?? 'You cannot roll right now.';
      const next = eligibility.value.nextParticipantId;
      if (next !== null && next !== participantId && reason === 'It is not your turn.') {
        return rejected(`${reason} Waiting for ${this.playerLabel(next)} to roll.`);
      }
      return rejected(reason);
    }

    const roll = forcedRoll ?? this.rollDie(sides);
    const outcome = this.guardRule('resolveMove', () => this.rules.resolveMove(this.record, participantId, roll));
    if (!outcome.ok) {
      return rejected('Something went wrong resolving that move; the operator has been notified.');
    }

    const move = outcome.value;
    getMetricsService().recordMove(moveMetricOutcome(move));
    logger.info('Move resolved', {
      sessionId: this.sessionId,
      participantId,
      roll,
      from: move.from,
      to: move.to,
      redirect: move.redirect?.kind ?? null,
      turnNumber: move.turnNumber,
    });

    const lines = [this.rules.describeMove(move, this.displayName(participantId))];
    const note = this.rules.board.tileNotes[String(move.to)];
    if (note) {
      lines.push(`Landed on tile ${move.to}: ${note}`);
    }
    lines.push(...this.describeSettle(move));
    return accepted(this.withNextUp(lines.join('\n')));
  }

  private get started(): boolean {
    return this.record.started && !this.record.ended;
  }

  private movementBlocked(): ActionResult | null {
    const status = this.status;
    return status === 'active' ? null : rejected(STATUS_REJECTIONS[status]);
  }

  /**
   * Cycle summary and game-over handling shared by every operation that
   * settles the rule state.
   */
  private describeSettle(settled: SettleOutcome): string[] {
    const lines: string[] = [];
    if (settled.win.gameOver) {
      if (!this.record.ended) {
        applyTransition(this.record, 'ended');
        getMetricsService().recordSessionTransition('end');
        logger.info('Game over', { sessionId: this.sessionId, winners: settled.win.winners });
      }
      lines.push(this.gameOverMessage(settled.win.winners));
      return lines;
    }
    if (settled.cycleAdvanced) {
      lines.push(this.turnSummary(this.record.turnNumber - 1));
    }
    return lines;
  }

  private withNextUp(message: string): string {
    if (this.status !== 'active') {
      return message;
    }
    const next = this.rules.nextParticipant(this.record);
    return next === null ? message : `${message}\nNext to roll: ${this.playerLabel(next)}.`;
  }

  private playerLabel(participantId: string): string {
    const participant = this.record.participants.get(participantId);
    if (!participant) {
      return mention(participantId);
    }
    return `Player ${participant.sequence} (${this.displayName(participantId)})`;
  }

  // ===================
  // Listings
  // ===================

  public listParticipants(): string {
    const participants = this.orderedParticipants();
    if (participants.length === 0) {
      return 'No players have joined yet.';
    }

    const lines = [`Players (turn ${this.record.turnNumber}, ${this.status.replace('_', ' ')}):`];
    for (const participant of participants) {
      const standing = this.rules.standingOf(this.record, participant.id);
      const parts = [
        `Player ${participant.sequence}: ${mention(participant.id)}`,
        participant.role ?? 'no role',
        standing.tile === null ? 'off the board' : `tile ${standing.tile} (${participant.coordinate ?? '?'})`,
      ];
      if (this.swaps.isSwapped(participant.id)) {
        parts.push(`swapped with ${mention(participant.swappedWith)}`);
      }
      if (standing.forfeited) {
        parts.push('FORFEIT');
      }
      if (standing.winner) {
        parts.push('WINNER');
      }
      lines.push(parts.join(' / '));
    }
    return lines.join('\n');
  }

  /** Leaderboard shown when a cycle completes: furthest tile first, ties by join order. */
  public turnSummary(completedTurn: number): string {
    const ranked = this.orderedParticipants()
      .map((participant) => ({ participant, standing: this.rules.standingOf(this.record, participant.id) }))
      .sort((left, right) => (right.standing.tile ?? 0) - (left.standing.tile ?? 0));

    const lines = [`Turn ${completedTurn} complete! Leaderboard:`];
    ranked.forEach(({ participant, standing }, index) => {
      const flags = `${standing.winner ? ' WINNER' : ''}${standing.forfeited ? ' FORFEIT' : ''}`;
      lines.push(
        `${index + 1}. Player ${participant.sequence} / ${this.displayName(participant.id)} / ${mention(participant.id)}: Tile ${standing.tile ?? '-'}${flags}`
      );
    });
    return lines.join('\n');
  }

  private gameOverMessage(winners: string[]): string {
    const describe = (id: string): string => {
      const participant = this.record.participants.get(id);
      const sequence = participant ? participant.sequence : '?';
      return `${mention(id)} (${this.displayName(id)}, Player ${sequence})`;
    };
    if (winners.length === 0) {
      return 'GAME OVER! Nobody won.';
    }
    const turn = this.rules.standingOf(this.record, winners[0]).goalTurn;
    const turnText = turn === null ? '' : ` on turn ${turn}`;
    if (winners.length === 1) {
      return `GAME OVER! Winner${turnText}: ${describe(winners[0])}.`;
    }
    return `GAME OVER! Winners tied${turnText}: ${winners.map(describe).join(', ')}.`;
  }

  private orderedParticipants(): Participant[] {
    return [...this.record.participants.values()].sort((a, b) => a.sequence - b.sequence);
  }

  public toBoardView(): BoardView {
    const board = this.rules.board;
    const tokens: BoardToken[] = this.orderedParticipants().map((participant) => {
      const standing = this.rules.standingOf(this.record, participant.id);
      return {
        participantId: participant.id,
        sequence: participant.sequence,
        label: this.displayName(participant.id),
        tile: standing.tile,
        coordinate: participant.coordinate,
        display: { ...participant.display },
        forfeited: standing.forfeited,
        winner: standing.winner,
      };
    });

    return {
      sessionId: this.sessionId,
      gameType: this.record.gameType,
      status: this.status,
      turnNumber: this.record.turnNumber,
      cols: board.gridCols,
      rows: board.gridRows,
      goalTile: board.goalTile,
      hazards: toNumberMap(board.hazards),
      shortcuts: toNumberMap(board.shortcuts),
      tokens,
    };
  }

  // ===================
  // Characters
  // ===================

  private availableCharacters(): string[] {
    if (!this.catalog) {
      return [];
    }
    return this.catalog
      .getCharactersForGame(this.record.gameType, this.record.enabledPacks)
      .map((character) => character.name);
  }

  private resolveRole(
    role: string,
    participantId: string
  ): { ok: true; name: string } | { ok: false; message: string } {
    const requested = role.trim();
    if (!requested) {
      return { ok: false, message: 'Role name cannot be empty.' };
    }

    let name = requested;
    const characters = this.availableCharacters();
    if (characters.length > 0) {
      const match = characters.find((candidate) => candidate.toLowerCase() === requested.toLowerCase());
      if (!match) {
        return { ok: false, message: `${requested} is not available in this game.` };
      }
      name = match;
    }

    for (const other of this.record.participants.values()) {
      if (other.id !== participantId && other.role?.toLowerCase() === name.toLowerCase()) {
        return { ok: false, message: `${name} is already taken by ${mention(other.id)}.` };
      }
    }
    return { ok: true, name };
  }

  private drawCharacter(): string | null {
    const taken = new Set(
      [...this.record.participants.values()]
        .map((participant) => participant.role?.toLowerCase())
        .filter((role): role is string => role !== undefined)
    );
    const free = this.availableCharacters().filter((name) => !taken.has(name.toLowerCase()));
    if (free.length === 0) {
      return null;
    }
    const index = Math.min(free.length - 1, Math.floor(this.random() * free.length));
    return free[index];
  }

  // ===================
  // Rule plugin guard
  // ===================

  private guardRule<T>(operation: string, fn: () => T): GuardResult<T> {
    const checkpoint = this.checkpoint();
    try {
      return { ok: true, value: fn() };
    } catch (cause) {
      const error = new RulePluginError(this.record.gameType, operation, cause);
      const restored = checkpoint !== null && this.restore(checkpoint);
      getMetricsService().recordRulePluginFailure(this.record.gameType, operation);
      logger.error('Rule plugin failure', {
        sessionId: this.sessionId,
        ...error.context,
        restored,
        stack: cause instanceof Error ? cause.stack : undefined,
      });
      this.operatorNotices.push(
        restored
          ? `Rule error during ${operation}: ${error.message}. The game state was rolled back and play continues.`
          : `Rule error during ${operation}: ${error.message}. The game state could not be rolled back; check the board.`
      );
      return { ok: false, error };
    }
  }

  private checkpoint(): Checkpoint | null {
    try {
      const identities = new Map<string, WornIdentity>();
      for (const participant of this.record.participants.values()) {
        identities.set(participant.id, {
          role: participant.role,
          coordinate: participant.coordinate,
          display: { ...participant.display },
          swappedWith: participant.swappedWith,
        });
      }
      return {
        participantIds: [...this.record.participants.keys()],
        ruleState: this.rules.serialize(this.record.ruleState),
        identities,
        turnNumber: this.record.turnNumber,
      };
    } catch (error) {
      logger.error('Could not checkpoint rule state', {
        sessionId: this.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private restore(checkpoint: Checkpoint): boolean {
    try {
      const { state } = this.rules.deserialize(checkpoint.ruleState, checkpoint.participantIds);
      this.record.ruleState = state;
      this.record.turnNumber = checkpoint.turnNumber;
      for (const [id, identity] of checkpoint.identities) {
        const participant = this.record.participants.get(id);
        if (participant) {
          Object.assign(participant, identity);
        }
      }
      return true;
    } catch (error) {
      logger.error('Could not restore rule state checkpoint', {
        sessionId: this.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}

function moveMetricOutcome(move: MoveOutcome): MoveMetricOutcome {
  if (move.win.newlyFinished.includes(move.participantId)) {
    return 'goal';
  }
  return move.redirect?.kind ?? 'plain';
}

function toNumberMap(record: Record<string, number>): Map<number, number> {
  const map = new Map<number, number>();
  for (const [from, to] of Object.entries(record)) {
    map.set(Number.parseInt(from, 10), to);
  }
  return map;
}
