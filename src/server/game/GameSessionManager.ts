import { GameSession, mention, type DieRoller } from './GameSession';
import { CommandSerializer } from './CommandSerializer';
import { helpText, isMutating, parseCommand, requiresOperator, type GameCommand } from './CommandParser';
import { captureSnapshot, restoreSnapshot } from './sessionSnapshot';
import type { GameConfigs } from './GameConfigLoader';
import { logger } from '../utils/logger';
import { getMetricsService } from '../services/MetricsService';
import type { CharacterCatalog } from '../services/CharacterPackService';
import type { SnapshotStore } from '../services/SnapshotStore';
import type { BoardRenderer, RenderContext } from '../rendering/BoardRenderer';
import { createRuleEngine, type RuleEngine } from '../../shared/engine/rules';
import { UnknownGameTypeError, errorMessage, isGameError, wrapError } from '../../shared/errors';
import {
  accepted,
  isGameType,
  rejected,
  type ActionResult,
  type GameType,
  type SnapshotKind,
} from '../../shared/types/session';
import type {
  ChatTransport,
  DispatchContext,
  InboundEvent,
  OutboundImage,
} from '../../shared/types/events';

export interface GameSessionManagerOptions {
  transport: ChatTransport;
  renderer: BoardRenderer;
  store: SnapshotStore;
  boards: GameConfigs;
  catalog?: CharacterCatalog | null;
  /** Channels games may run in; empty allows every channel. */
  gameChannelIds?: readonly string[];
  /** Users with operator rights in every session. */
  adminIds?: readonly string[];
  /** Autosave after this many state-changing commands; 0 disables. */
  autosaveEvery?: number;
  showFaces?: boolean;
  rollDie?: DieRoller;
  random?: () => number;
  now?: () => Date;
}

/** What a command produced, before it is sent. */
interface CommandReply {
  result: ActionResult;
  showBoard: boolean;
  /** Best-effort renderer warm-up, e.g. after a new avatar joins. */
  warmBoard: boolean;
}

const reply = (result: ActionResult, showBoard = false, warmBoard = false): CommandReply => ({
  result,
  showBoard,
  warmBoard,
});

const NO_SESSION = 'No game is running in this channel. Open one with !start <game type>.';

/**
 * Session registry and the single dispatch entry point for chat events.
 *
 * Every command for a channel runs under that channel's serializer lock, so
 * responses and state changes come out in the order the events arrived.
 * Plain chat intercepted while a session was busy is reposted on replay.
 */
export class GameSessionManager {
  private readonly sessions = new Map<string, GameSession>();
  private readonly mutationsSinceAutosave = new Map<string, number>();
  public readonly serializer: CommandSerializer;

  private readonly transport: ChatTransport;
  private readonly renderer: BoardRenderer;
  private readonly store: SnapshotStore;
  private readonly boards: GameConfigs;
  private readonly catalog: CharacterCatalog | null;
  private readonly gameChannelIds: readonly string[];
  private readonly adminIds: readonly string[];
  private readonly autosaveEvery: number;
  private readonly showFaces: boolean;
  private readonly rollDie: DieRoller | undefined;
  private readonly random: (() => number) | undefined;
  private readonly now: () => Date;

  constructor(options: GameSessionManagerOptions) {
    this.transport = options.transport;
    this.renderer = options.renderer;
    this.store = options.store;
    this.boards = options.boards;
    this.catalog = options.catalog ?? null;
    this.gameChannelIds = options.gameChannelIds ?? [];
    this.adminIds = options.adminIds ?? [];
    this.autosaveEvery = options.autosaveEvery ?? 0;
    this.showFaces = options.showFaces ?? true;
    this.rollDie = options.rollDie;
    this.random = options.random;
    this.now = options.now ?? (() => new Date());
    this.serializer = new CommandSerializer(this.transport, (event, context) => this.dispatch(event, context));
  }

  /** Transport entry point. */
  public handleInboundEvent(event: InboundEvent): Promise<void> {
    return this.serializer.submit(event);
  }

  public getSession(channelId: string): GameSession | undefined {
    return this.sessions.get(channelId);
  }

  public get activeSessionCount(): number {
    return this.sessions.size;
  }

  public availableGames(): GameType[] {
    return [...this.boards.keys()];
  }

  /**
   * Serializer dispatcher. Must reach `withLock` without awaiting anything
   * first: the serializer only sees a session as busy once the lock is set.
   */
  private dispatch(event: InboundEvent, context: DispatchContext): Promise<void> {
    const parsed = parseCommand(event.text);
    if (parsed === null) {
      return context.replayed ? this.repost(event) : Promise.resolve();
    }
    if (this.gameChannelIds.length > 0 && !this.gameChannelIds.includes(event.channelId)) {
      logger.debug('Ignoring command outside game channels', { channelId: event.channelId });
      return Promise.resolve();
    }

    const sessionId = event.channelId;
    return this.serializer
      .withLock(sessionId, async () => {
        if (!parsed.ok) {
          await this.send(sessionId, parsed.error);
          return;
        }
        await this.runCommand(sessionId, event, parsed.command);
      })
      .then(() => {
        if (!this.sessions.has(sessionId)) {
          this.serializer.forget(sessionId);
        }
      });
  }

  private async runCommand(sessionId: string, event: InboundEvent, command: GameCommand): Promise<void> {
    let outcome: CommandReply;
    try {
      outcome = await this.execute(sessionId, event.authorId, command);
    } catch (error) {
      const failure = wrapError(error, { sessionId, command: command.kind });
      logger.error('Command failed', failure.toJSON());
      outcome = reply(rejected('Something went wrong handling that command.'));
    }

    const session = this.sessions.get(sessionId);
    if (session && outcome.result.ok && outcome.result.changed && isMutating(command)) {
      await this.countMutation(session);
    }

    await this.send(sessionId, outcome.result.message);
    if (session) {
      await this.flushOperatorNotices(session);
      if (outcome.showBoard) {
        await this.sendBoard(session);
      }
      if (outcome.warmBoard) {
        this.warmBoard(session);
      }
    }
  }

  private async execute(sessionId: string, authorId: string, command: GameCommand): Promise<CommandReply> {
    if (command.kind === 'help') {
      return reply(accepted(helpText(), false));
    }
    if (command.kind === 'saves') {
      return reply(await this.listSaves(sessionId));
    }

    const session = this.sessions.get(sessionId);
    if (command.kind === 'start') {
      return this.start(sessionId, authorId, command.gameType, session);
    }
    if (command.kind === 'load') {
      return this.load(sessionId, authorId, command.snapshotId, session);
    }
    if (!session) {
      return reply(rejected(NO_SESSION));
    }
    if (requiresOperator(command) && !this.isOperator(session, authorId)) {
      return reply(rejected(`Only the game operator can use !${command.kind}.`));
    }

    switch (command.kind) {
      case 'end':
        return reply(await this.end(session));
      case 'pause':
        return reply(session.pause());
      case 'resume':
        return reply(session.resume());
      case 'join':
        return reply(session.join(authorId, command.role), false, true);
      case 'add':
        return reply(session.join(command.participantId, command.role), false, true);
      case 'leave':
        return reply(session.forfeit(authorId));
      case 'forfeit':
        return reply(session.forfeit(command.participantId));
      case 'assign':
        return reply(session.assignRole(command.participantId, command.role), false, true);
      case 'swap': {
        const result = command.permanent
          ? session.exchangePermanent(command.a, command.b)
          : session.exchange(command.a, command.b);
        return reply(result, result.ok);
      }
      case 'unswap': {
        const result = session.unswap(command.participantId);
        return reply(result, result.ok);
      }
      case 'move': {
        const result = session.moveToken(command.participantId, command.coordinate);
        return reply(result, result.ok);
      }
      case 'roll': {
        const result = session.act(command.participantId ?? authorId, command.value);
        return reply(result, result.ok);
      }
      case 'players':
        return reply(accepted(session.listParticipants(), false));
      case 'board':
        return reply(accepted('', false), true);
      case 'save':
        return reply(await this.save(session, 'manual'));
    }
  }

  // ===================
  // Session lifecycle
  // ===================

  private start(
    sessionId: string,
    authorId: string,
    requestedType: string | null,
    existing: GameSession | undefined
  ): CommandReply {
    if (existing && existing.status !== 'ended') {
      if (requestedType !== null) {
        return reply(rejected('A game is already open in this channel. The operator can close it with !end.'));
      }
      if (!this.isOperator(existing, authorId)) {
        return reply(rejected('Only the game operator can use !start.'));
      }
      const result = existing.start();
      return reply(result, result.ok);
    }

    if (requestedType === null) {
      return reply(rejected(`Usage: !start <game type>. Available: ${this.availableGames().join(', ')}.`));
    }
    const gameType = this.resolveGameType(requestedType);
    if (gameType === null) {
      return reply(
        rejected(`Unknown game type ${requestedType}. Available: ${this.availableGames().join(', ')}.`)
      );
    }

    const session = GameSession.create(sessionId, gameType, authorId, {
      rules: this.rulesFor(gameType),
      catalog: this.catalog,
      rollDie: this.rollDie,
      random: this.random,
    });
    this.register(session);
    logger.info('Session opened', { sessionId, gameType, operatorId: authorId });
    return reply(
      accepted(
        `A ${gameType} game is open. ${mention(authorId)} is the operator. Join with !join; the operator types !start to begin.`
      )
    );
  }

  /** Close the session for good: snapshots are deleted along with it. */
  private async end(session: GameSession): Promise<ActionResult> {
    const wasEnded = session.status === 'ended';
    if (!wasEnded) {
      const result = session.end();
      if (!result.ok) {
        return result;
      }
    }
    this.unregister(session.sessionId);
    await this.store.deleteAll(session.sessionId);
    return accepted(wasEnded ? 'The game is closed and its saves deleted.' : 'The game has ended. Saves deleted.');
  }

  private register(session: GameSession): void {
    this.sessions.set(session.sessionId, session);
    this.mutationsSinceAutosave.set(session.sessionId, 0);
    getMetricsService().setActiveSessions(this.sessions.size);
  }

  private unregister(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.mutationsSinceAutosave.delete(sessionId);
    getMetricsService().setActiveSessions(this.sessions.size);
  }

  private resolveGameType(requested: string): GameType | null {
    return isGameType(requested) && this.boards.has(requested) ? requested : null;
  }

  private rulesFor(gameType: GameType): RuleEngine {
    const board = this.boards.get(gameType);
    if (!board) {
      throw new UnknownGameTypeError(gameType);
    }
    return createRuleEngine(gameType, board);
  }

  private isOperator(session: GameSession, authorId: string): boolean {
    return authorId === session.operatorId || this.adminIds.includes(authorId);
  }

  // ===================
  // Persistence
  // ===================

  private async save(session: GameSession, kind: SnapshotKind): Promise<ActionResult> {
    const info = await this.store.save(captureSnapshot(session.record, session.rules, kind, this.now()));
    return accepted(`Saved as ${info.id}.`, false);
  }

  private async countMutation(session: GameSession): Promise<void> {
    if (this.autosaveEvery <= 0) {
      return;
    }
    const count = (this.mutationsSinceAutosave.get(session.sessionId) ?? 0) + 1;
    if (count < this.autosaveEvery) {
      this.mutationsSinceAutosave.set(session.sessionId, count);
      return;
    }
    this.mutationsSinceAutosave.set(session.sessionId, 0);
    try {
      await this.save(session, 'autosave');
    } catch (error) {
      logger.error('Autosave failed', { sessionId: session.sessionId, error: errorMessage(error) });
    }
  }

  private async listSaves(sessionId: string): Promise<ActionResult> {
    const saves = await this.store.list(sessionId);
    if (saves.length === 0) {
      return accepted('No saves for this channel.', false);
    }
    return accepted(['Saves (newest first):', ...saves.map((info) => `${info.id} (${info.savedAt})`)].join('\n'), false);
  }

  /**
   * Replace (or recreate) the channel's session from a snapshot. Repairs
   * made while sanitizing are sent privately to the operator.
   */
  private async load(
    sessionId: string,
    authorId: string,
    snapshotId: string,
    existing: GameSession | undefined
  ): Promise<CommandReply> {
    if (existing && !this.isOperator(existing, authorId)) {
      return reply(rejected('Only the game operator can use !load.'));
    }

    let restoredSession: GameSession;
    let loadedId: string;
    let warnings: string[];
    try {
      const loaded = await this.store.load(sessionId, snapshotId);
      if (!existing && authorId !== loaded.envelope.operatorId && !this.adminIds.includes(authorId)) {
        return reply(rejected('Only the operator of that saved game can load it.'));
      }
      const restored = restoreSnapshot(loaded.envelope, sessionId, (gameType) => this.rulesFor(gameType));
      restoredSession = new GameSession(restored.record, {
        rules: restored.rules,
        catalog: this.catalog,
        rollDie: this.rollDie,
        random: this.random,
      });
      loadedId = loaded.id;
      warnings = restored.warnings;
    } catch (error) {
      if (isGameError(error)) {
        logger.warn('Snapshot load failed', error.toJSON());
        return reply(rejected(error.message));
      }
      throw error;
    }

    this.register(restoredSession);
    getMetricsService().recordSnapshotLoaded(warnings.length > 0);
    logger.info('Snapshot loaded', { sessionId, snapshotId: loadedId, warnings: warnings.length });

    if (warnings.length > 0) {
      await this.notify(
        sessionId,
        restoredSession.operatorId,
        [`Loaded ${loadedId} with ${warnings.length} repair(s):`, ...warnings.map((w) => `- ${w}`)].join('\n')
      );
    }
    return reply(
      accepted(`Loaded ${loadedId}. Turn ${restoredSession.record.turnNumber}, ${restoredSession.status.replace('_', ' ')}.`),
      true
    );
  }

  // ===================
  // Output
  // ===================

  private renderContext(): RenderContext {
    return { backgroundOverrides: new Map(), showFaces: this.showFaces };
  }

  private async sendBoard(session: GameSession): Promise<void> {
    try {
      const rendered = await this.renderer.render(session.toBoardView(), this.renderContext());
      await this.transport.send(session.sessionId, {
        text: rendered.text,
        image: rendered.image ?? undefined,
      });
    } catch (error) {
      logger.error('Board render failed', { sessionId: session.sessionId, error: errorMessage(error) });
    }
  }

  private warmBoard(session: GameSession): void {
    void this.renderer.warm?.(session.toBoardView()).catch((error: unknown) => {
      logger.warn('Board warm-up failed', { sessionId: session.sessionId, error: errorMessage(error) });
    });
  }

  private async flushOperatorNotices(session: GameSession): Promise<void> {
    for (const notice of session.drainOperatorNotices()) {
      await this.notify(session.sessionId, session.operatorId, notice);
    }
  }

  private async send(channelId: string, text: string): Promise<void> {
    if (!text) {
      return;
    }
    try {
      await this.transport.send(channelId, { text });
    } catch (error) {
      logger.error('Failed to send message', { channelId, error: errorMessage(error) });
    }
  }

  private async notify(channelId: string, recipientId: string, text: string): Promise<void> {
    try {
      await this.transport.notify(channelId, recipientId, text);
    } catch (error) {
      logger.error('Failed to notify user', { channelId, recipientId, error: errorMessage(error) });
    }
  }

  /**
   * Put intercepted chat back in the channel, attributed to its author. The
   * first captured attachment rides along; the rest follow one per message.
   */
  private async repost(event: InboundEvent): Promise<void> {
    const images: OutboundImage[] = [];
    for (const attachment of event.attachments) {
      images.push({ filename: attachment.filename, data: Buffer.from(await attachment.read()) });
    }

    const text = event.text.trim();
    const [first, ...rest] = images;
    await this.transport.send(event.channelId, {
      text: text ? `${mention(event.authorId)}: ${text}` : `${mention(event.authorId)} shared:`,
      image: first,
      replyTo: event.replyTo,
    });
    for (const image of rest) {
      await this.transport.send(event.channelId, { text: `${mention(event.authorId)} shared:`, image });
    }
  }
}
