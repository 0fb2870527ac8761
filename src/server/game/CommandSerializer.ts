import { logger, runWithEventContext } from '../utils/logger';
import { getMetricsService, type DropReason } from '../services/MetricsService';
import { PayloadCaptureError, SessionBusyError, errorMessage } from '../../shared/errors';
import {
  queuedEventToInbound,
  type CapturedAttachment,
  type ChatTransport,
  type DispatchContext,
  type EventDispatcher,
  type InboundEvent,
  type QueuedEvent,
} from '../../shared/types/events';

/**
 * A reserved queue position. The slot is appended synchronously when the
 * event arrives; `ready` settles once capture finishes and never rejects.
 * A null result means nothing of the event survived capture.
 */
interface QueueSlot {
  arrival: number;
  ready: Promise<QueuedEvent | null>;
}

interface SessionLane {
  locked: boolean;
  draining: boolean;
  lockedAt: number;
  nextArrival: number;
  queue: QueueSlot[];
}

export interface CommandSerializerOptions {
  /** Maps an inbound event to the session it mutates. Defaults to the channel id. */
  resolveSessionId?: (event: InboundEvent) => string;
  now?: () => number;
}

/**
 * Per-session advisory lock plus intercept/queue/replay.
 *
 * At most one lock-protected operation runs per session. Events that arrive
 * while a session is busy are captured (text, attachment bytes and reply
 * linkage), deleted from the transport and replayed in arrival order once
 * the lock is released.
 *
 * Dispatchers must call `withLock` before their first await; the busy check
 * in `submit` relies on the lock being visible as soon as dispatch starts.
 */
export class CommandSerializer {
  private readonly lanes = new Map<string, SessionLane>();
  private dispatcher: EventDispatcher | null;
  private readonly resolveSessionId: (event: InboundEvent) => string;
  private readonly now: () => number;

  constructor(
    private readonly transport: ChatTransport,
    dispatcher: EventDispatcher | null = null,
    options: CommandSerializerOptions = {}
  ) {
    this.dispatcher = dispatcher;
    this.resolveSessionId = options.resolveSessionId ?? ((event) => event.channelId);
    this.now = options.now ?? Date.now;
  }

  public setDispatcher(dispatcher: EventDispatcher): void {
    this.dispatcher = dispatcher;
  }

  public isLocked(sessionId: string): boolean {
    return this.lanes.get(sessionId)?.locked ?? false;
  }

  /** Locked, draining, or holding queued events that have not replayed yet. */
  public isBusy(sessionId: string): boolean {
    const lane = this.lanes.get(sessionId);
    if (!lane) {
      return false;
    }
    return lane.locked || lane.draining || lane.queue.length > 0;
  }

  public queueLength(sessionId: string): number {
    return this.lanes.get(sessionId)?.queue.length ?? 0;
  }

  /** Drop bookkeeping for a session that has ended. Busy sessions are kept. */
  public forget(sessionId: string): void {
    if (!this.isBusy(sessionId)) {
      this.lanes.delete(sessionId);
    }
  }

  /**
   * Run `operation` with exclusive rights to mutate the session. Rejects with
   * SessionBusyError instead of waiting when the lock is already held. The
   * session's queue is drained after the operation settles.
   */
  public async withLock<T>(sessionId: string, operation: () => Promise<T>): Promise<T> {
    const lane = this.laneFor(sessionId);
    if (lane.locked) {
      throw new SessionBusyError(sessionId);
    }

    lane.locked = true;
    lane.lockedAt = this.now();
    try {
      return await operation();
    } finally {
      lane.locked = false;
      getMetricsService().recordLockHold(Math.max(0, this.now() - lane.lockedAt) / 1000);
      await this.drain(sessionId);
    }
  }

  /**
   * Inbound entry point. Idle sessions dispatch immediately; busy sessions
   * get the event queued and this returns without waiting for the lock.
   */
  public async submit(event: InboundEvent): Promise<void> {
    const sessionId = this.resolveSessionId(event);
    if (this.isBusy(sessionId)) {
      this.intercept(sessionId, event);
      return;
    }
    await this.dispatch(sessionId, event, { replayed: false });
  }

  private laneFor(sessionId: string): SessionLane {
    let lane = this.lanes.get(sessionId);
    if (!lane) {
      lane = { locked: false, draining: false, lockedAt: 0, nextArrival: 0, queue: [] };
      this.lanes.set(sessionId, lane);
    }
    return lane;
  }

  private dispatch(sessionId: string, event: InboundEvent, context: DispatchContext): Promise<void> {
    const dispatcher = this.dispatcher;
    if (!dispatcher) {
      logger.warn('No dispatcher registered; event ignored', { sessionId, eventId: event.id });
      return Promise.resolve();
    }
    return runWithEventContext(
      { eventId: event.id, sessionId, authorId: event.authorId, replayed: context.replayed },
      () => dispatcher(event, context)
    );
  }

  private intercept(sessionId: string, event: InboundEvent): void {
    const lane = this.laneFor(sessionId);
    const arrival = lane.nextArrival++;
    lane.queue.push({ arrival, ready: this.capture(sessionId, event, arrival) });
    getMetricsService().recordEventQueued();
    logger.debug('Event intercepted while session busy', {
      sessionId,
      eventId: event.id,
      arrival,
      queueLength: lane.queue.length,
    });
  }

  private async capture(sessionId: string, event: InboundEvent, arrival: number): Promise<QueuedEvent | null> {
    const attachments: CapturedAttachment[] = [];
    for (const handle of event.attachments) {
      let data: Buffer;
      try {
        data = Buffer.from(await handle.read());
      } catch (error) {
        await this.reportDrop(sessionId, event, handle.filename, 'attachment_read_failed', errorMessage(error));
        continue;
      }
      if (data.byteLength === 0) {
        await this.reportDrop(sessionId, event, handle.filename, 'empty_attachment', 'read returned zero bytes');
        continue;
      }
      attachments.push({ filename: handle.filename, contentType: handle.contentType, data });
    }

    try {
      await this.transport.deleteEvent(event);
    } catch (error) {
      logger.warn('Failed to delete intercepted event from transport', {
        sessionId,
        eventId: event.id,
        error: errorMessage(error),
      });
    }

    if (event.text.trim().length === 0 && attachments.length === 0) {
      logger.warn('Intercepted event has nothing left to replay', { sessionId, eventId: event.id });
      return null;
    }

    return {
      origin: event.authorId,
      payload: { text: event.text, attachments },
      channelId: event.channelId,
      replyTo: event.replyTo,
      sourceEventId: event.id,
      arrivedAt: event.receivedAt,
      arrival,
    };
  }

  private async reportDrop(
    sessionId: string,
    event: InboundEvent,
    filename: string,
    reason: DropReason,
    detail: string
  ): Promise<void> {
    const failure = new PayloadCaptureError(filename, detail, { sessionId, eventId: event.id, reason });
    getMetricsService().recordEventDropped(reason);
    logger.warn('Dropped attachment from intercepted event', failure.toJSON());
    try {
      await this.transport.notify(
        event.channelId,
        event.authorId,
        `Your attachment "${filename}" could not be saved while the game was busy and was dropped.`
      );
    } catch (error) {
      logger.warn('Failed to notify author about dropped attachment', {
        sessionId,
        eventId: event.id,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Replay queued events in arrival order. Only one drain runs per session;
   * lock releases that happen inside a replay return here immediately and
   * the outer loop picks up whatever they queued.
   */
  private async drain(sessionId: string): Promise<void> {
    const lane = this.lanes.get(sessionId);
    if (!lane || lane.draining || lane.locked) {
      return;
    }

    lane.draining = true;
    try {
      while (lane.queue.length > 0 && !lane.locked) {
        const slot = lane.queue[0];
        const queued = await slot.ready;
        if (lane.locked) {
          // Taken by a direct withLock call; its release drains the rest.
          break;
        }
        lane.queue.shift();
        if (queued) {
          await this.replay(sessionId, queued);
        }
      }
    } finally {
      lane.draining = false;
    }
  }

  private async replay(sessionId: string, queued: QueuedEvent): Promise<void> {
    try {
      await this.dispatch(sessionId, queuedEventToInbound(queued), { replayed: true });
      getMetricsService().recordEventReplayed();
    } catch (error) {
      if (error instanceof SessionBusyError) {
        getMetricsService().recordEventDropped('reentrant_lock');
        logger.error('Dropped replayed event: session lock still held', {
          sessionId,
          eventId: queued.sourceEventId,
          arrival: queued.arrival,
        });
        return;
      }
      getMetricsService().recordReplayFailure();
      logger.error('Replay dispatch failed; continuing with next queued event', {
        sessionId,
        eventId: queued.sourceEventId,
        arrival: queued.arrival,
        error: errorMessage(error),
      });
    }
  }
}
