/**
 * Tests for CommandSerializer.
 *
 * This file covers:
 * - Lock contention (withLock never waits; sessions are independent)
 * - Interception, deletion and in-order replay of events
 * - Attachment capture (zero-byte and failed reads are dropped and reported)
 * - Replay failures and re-entrant lock acquisition
 */

import { CommandSerializer } from '../../src/server/game/CommandSerializer';
import { SessionBusyError } from '../../src/shared/errors';
import { logger } from '../../src/server/utils/logger';
import type {
  AttachmentHandle,
  ChatTransport,
  DispatchContext,
  InboundEvent,
  OutboundMessage,
} from '../../src/shared/types/events';

jest.mock('../../src/server/utils/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
  runWithEventContext: <T>(_context: unknown, fn: () => T): T => fn(),
}));

class RecordingTransport implements ChatTransport {
  public readonly sent: Array<{ channelId: string; message: OutboundMessage }> = [];
  public readonly deleted: string[] = [];
  public readonly notices: Array<{ channelId: string; recipientId: string; text: string }> = [];

  public async send(channelId: string, message: OutboundMessage): Promise<void> {
    this.sent.push({ channelId, message });
  }

  public async deleteEvent(event: InboundEvent): Promise<void> {
    this.deleted.push(event.id);
  }

  public async notify(channelId: string, recipientId: string, text: string): Promise<void> {
    this.notices.push({ channelId, recipientId, text });
  }
}

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function event(id: string, text: string, attachments: AttachmentHandle[] = []): InboundEvent {
  return { id, channelId: 'chan', authorId: 'u1', text, attachments, replyTo: null, receivedAt: Number(id) };
}

function attachment(filename: string, read: () => Promise<Uint8Array>): AttachmentHandle {
  return { filename, contentType: 'image/png', read };
}

describe('CommandSerializer', () => {
  let transport: RecordingTransport;
  let serializer: CommandSerializer;
  let gate: Deferred;
  let order: string[];

  /** Every event takes the lock; the live event "first" holds it until the gate opens. */
  const lockingDispatcher =
    (onReplay: (event: InboundEvent) => Promise<void> | void = () => undefined) =>
    (dispatched: InboundEvent, context: DispatchContext): Promise<void> =>
      serializer.withLock('chan', async () => {
        order.push(`${dispatched.text}:${context.replayed ? 'replayed' : 'live'}`);
        if (!context.replayed && dispatched.text === 'first') {
          await gate.promise;
        }
        if (context.replayed) {
          await onReplay(dispatched);
        }
      });

  beforeEach(() => {
    transport = new RecordingTransport();
    serializer = new CommandSerializer(transport);
    gate = deferred();
    order = [];
  });

  describe('withLock', () => {
    it('rejects instead of waiting when the lock is held', async () => {
      const holder = serializer.withLock('chan', () => gate.promise);

      expect(serializer.isLocked('chan')).toBe(true);
      await expect(serializer.withLock('chan', async () => 1)).rejects.toBeInstanceOf(SessionBusyError);

      gate.resolve();
      await holder;
      expect(serializer.isLocked('chan')).toBe(false);
    });

    it('keeps sessions independent', async () => {
      const holder = serializer.withLock('chan', () => gate.promise);

      await expect(serializer.withLock('other', async () => 'ok')).resolves.toBe('ok');

      gate.resolve();
      await holder;
    });

    it('releases the lock when the operation throws', async () => {
      await expect(
        serializer.withLock('chan', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(serializer.isLocked('chan')).toBe(false);
    });
  });

  describe('interception and replay', () => {
    it('replays events intercepted during a locked operation in arrival order', async () => {
      serializer.setDispatcher(lockingDispatcher());

      const first = serializer.submit(event('1', 'first'));
      await serializer.submit(event('2', 'second'));
      await serializer.submit(event('3', 'third'));

      expect(serializer.queueLength('chan')).toBe(2);
      expect(order).toEqual(['first:live']);

      gate.resolve();
      await first;

      expect(order).toEqual(['first:live', 'second:replayed', 'third:replayed']);
      expect(transport.deleted).toEqual(['2', '3']);
      expect(serializer.isBusy('chan')).toBe(false);
    });

    it('queues events that arrive during a drain behind the ones already waiting', async () => {
      serializer.setDispatcher(
        lockingDispatcher((replayed) => {
          if (replayed.text === 'second') {
            void serializer.submit(event('4', 'fourth'));
          }
        })
      );

      const first = serializer.submit(event('1', 'first'));
      await serializer.submit(event('2', 'second'));
      await serializer.submit(event('3', 'third'));
      gate.resolve();
      await first;

      expect(order).toEqual(['first:live', 'second:replayed', 'third:replayed', 'fourth:replayed']);
    });

    it('replays in arrival order even when a later capture finishes first', async () => {
      const slowRead = deferred();
      const replayed: string[] = [];
      serializer.setDispatcher(
        lockingDispatcher((dispatched) => {
          replayed.push(`${dispatched.text}:${dispatched.attachments.length}`);
        })
      );

      const first = serializer.submit(event('1', 'first'));
      await serializer.submit(
        event('2', 'slow', [
          attachment('map.png', async () => {
            await slowRead.promise;
            return new Uint8Array([1, 2, 3]);
          }),
        ])
      );
      await serializer.submit(event('3', 'quick'));
      await new Promise<void>((done) => setImmediate(done));

      expect(transport.deleted).toEqual(['3']);

      gate.resolve();
      await new Promise<void>((done) => setImmediate(done));

      expect(order).toEqual(['first:live']);
      expect(serializer.queueLength('chan')).toBe(2);

      slowRead.resolve();
      await first;

      expect(order).toEqual(['first:live', 'slow:replayed', 'quick:replayed']);
      expect(replayed).toEqual(['slow:1', 'quick:0']);
      expect(transport.deleted).toEqual(['3', '2']);
    });

    it('never runs two operations for the same session at once', async () => {
      let active = 0;
      let maxActive = 0;
      serializer.setDispatcher((dispatched, context) =>
        serializer.withLock('chan', async () => {
          active += 1;
          maxActive = Math.max(maxActive, active);
          if (!context.replayed && dispatched.text === 'first') {
            await gate.promise;
          } else {
            await Promise.resolve();
          }
          active -= 1;
        })
      );

      const first = serializer.submit(event('1', 'first'));
      for (const id of ['2', '3', '4', '5']) {
        await serializer.submit(event(id, `event ${id}`));
      }
      gate.resolve();
      await first;

      expect(maxActive).toBe(1);
    });

    it('continues with the next event when a replay fails', async () => {
      serializer.setDispatcher(
        lockingDispatcher((replayed) => {
          if (replayed.text === 'boom') {
            throw new Error('replay exploded');
          }
        })
      );

      const first = serializer.submit(event('1', 'first'));
      await serializer.submit(event('2', 'boom'));
      await serializer.submit(event('3', 'after'));
      gate.resolve();
      await first;

      expect(order).toEqual(['first:live', 'boom:replayed', 'after:replayed']);
      expect(logger.error).toHaveBeenCalledWith(
        'Replay dispatch failed; continuing with next queued event',
        expect.objectContaining({ eventId: '2', error: 'replay exploded' })
      );
    });

    it('drops a replay that re-enters a lock it already holds', async () => {
      serializer.setDispatcher((dispatched, context) => {
        if (context.replayed && dispatched.text === 'nested') {
          return serializer.withLock('chan', () => serializer.withLock('chan', async () => undefined));
        }
        return lockingDispatcher()(dispatched, context);
      });

      const first = serializer.submit(event('1', 'first'));
      await serializer.submit(event('2', 'nested'));
      await serializer.submit(event('3', 'after'));
      gate.resolve();
      await first;

      expect(order).toEqual(['first:live', 'after:replayed']);
      expect(logger.error).toHaveBeenCalledWith(
        'Dropped replayed event: session lock still held',
        expect.objectContaining({ sessionId: 'chan', eventId: '2' })
      );
    });
  });

  describe('attachment capture', () => {
    it('drops zero-byte attachments, keeps the rest and tells the author', async () => {
      const received: string[] = [];
      serializer.setDispatcher(
        lockingDispatcher(async (replayed) => {
          for (const handle of replayed.attachments) {
            received.push(`${handle.filename}=${Buffer.from(await handle.read()).toString('utf-8')}`);
          }
        })
      );

      const first = serializer.submit(event('1', 'first'));
      await serializer.submit(
        event('2', 'look', [
          attachment('empty.png', async () => new Uint8Array(0)),
          attachment('cat.png', async () => Buffer.from('meow')),
        ])
      );
      gate.resolve();
      await first;

      expect(order).toEqual(['first:live', 'look:replayed']);
      expect(received).toEqual(['cat.png=meow']);
      expect(transport.notices).toEqual([
        {
          channelId: 'chan',
          recipientId: 'u1',
          text: 'Your attachment "empty.png" could not be saved while the game was busy and was dropped.',
        },
      ]);
    });

    it('skips an event when nothing survives capture', async () => {
      serializer.setDispatcher(lockingDispatcher());

      const first = serializer.submit(event('1', 'first'));
      await serializer.submit(
        event('2', '', [
          attachment('photo.png', async () => {
            throw new Error('socket closed');
          }),
        ])
      );
      gate.resolve();
      await first;

      expect(order).toEqual(['first:live']);
      expect(transport.deleted).toEqual(['2']);
      expect(transport.notices.map((notice) => notice.text)).toEqual([
        'Your attachment "photo.png" could not be saved while the game was busy and was dropped.',
      ]);
    });
  });

  it('forgets idle sessions but keeps busy ones', async () => {
    serializer.setDispatcher(lockingDispatcher());

    const first = serializer.submit(event('1', 'first'));
    await serializer.submit(event('2', 'second'));
    serializer.forget('chan');
    expect(serializer.queueLength('chan')).toBe(1);

    gate.resolve();
    await first;
    serializer.forget('chan');
    expect(serializer.isBusy('chan')).toBe(false);
  });
});
