import { Server as SocketIOServer, type Socket } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import { ZodError } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { errorMessage } from '../../shared/errors';
import {
  HandshakeAuthSchema,
  WebSocketPayloadSchemas,
  type ChatMessagePayload,
} from '../../shared/validation/websocketSchemas';
import type {
  ChannelMessagePayload,
  ClientToServerEvents,
  ServerToClientEvents,
  WebSocketErrorCode,
  WebSocketErrorPayload,
} from '../../shared/types/websocket';
import type { ChatTransport, InboundEvent, OutboundMessage } from '../../shared/types/events';

interface SocketData {
  userId: string;
}

type ChatServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;
type ChatSocket = Socket<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;

export type InboundEventHandler = (event: InboundEvent) => Promise<void>;

export interface SocketChatTransportOptions {
  corsOrigin: string;
  /** Author id stamped on messages the bot sends. */
  botName: string;
}

export const channelRoom = (channelId: string): string => `channel:${channelId}`;
export const userRoom = (userId: string): string => `user:${userId}`;

/**
 * Turn a validated chat payload into the runtime's event shape. Attachment
 * bytes are decoded lazily so capture is the first thing to read them.
 */
export function toInboundEvent(
  payload: ChatMessagePayload,
  authorId: string,
  id: string,
  receivedAt: number
): InboundEvent {
  return {
    id,
    channelId: payload.channelId,
    authorId,
    text: payload.text,
    attachments: payload.attachments.map((attachment) => ({
      filename: attachment.filename,
      contentType: attachment.contentType,
      read: async () => Buffer.from(attachment.dataBase64, 'base64'),
    })),
    replyTo: payload.replyTo,
    receivedAt,
  };
}

/**
 * socket.io implementation of the chat transport. Users identify themselves
 * in the handshake (`auth.userId`); channel membership is room membership.
 *
 * A posted line is broadcast to the channel first and then handed to the
 * runtime, so an intercepted line can be retracted with `message_deleted`.
 */
export class SocketChatTransport implements ChatTransport {
  private readonly io: ChatServer;
  private readonly botName: string;
  private handler: InboundEventHandler | null = null;

  constructor(httpServer: HTTPServer, options: SocketChatTransportOptions) {
    this.botName = options.botName;
    this.io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>(
      httpServer,
      {
        cors: {
          origin: options.corsOrigin,
          methods: ['GET', 'POST'],
          credentials: true,
        },
        transports: ['websocket', 'polling'],
        maxHttpBufferSize: 16 * 1024 * 1024,
      }
    );

    this.setupMiddleware();
    this.setupEventHandlers();
  }

  public onInboundEvent(handler: InboundEventHandler): void {
    this.handler = handler;
  }

  public async send(channelId: string, message: OutboundMessage): Promise<void> {
    const payload: ChannelMessagePayload = {
      id: uuidv4(),
      channelId,
      authorId: this.botName,
      text: message.text,
      image: message.image
        ? { filename: message.image.filename, dataBase64: message.image.data.toString('base64') }
        : null,
      attachments: [],
      replyTo: message.replyTo ?? null,
      sentAt: new Date().toISOString(),
    };
    this.io.to(channelRoom(channelId)).emit('message', payload);
  }

  public async deleteEvent(event: InboundEvent): Promise<void> {
    this.io.to(channelRoom(event.channelId)).emit('message_deleted', { id: event.id, channelId: event.channelId });
  }

  public async notify(channelId: string, recipientId: string, text: string): Promise<void> {
    this.io.to(userRoom(recipientId)).emit('notice', { channelId, text });
  }

  public close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.io.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private setupMiddleware(): void {
    this.io.use((socket, next) => {
      const parsed = HandshakeAuthSchema.safeParse(socket.handshake.auth);
      if (!parsed.success) {
        logger.warn('WebSocket handshake rejected', { socketId: socket.id });
        next(new Error('auth.userId is required'));
        return;
      }
      socket.data.userId = parsed.data.userId;
      next();
    });
  }

  private setupEventHandlers(): void {
    this.io.on('connection', (socket: ChatSocket) => {
      const userId = socket.data.userId;
      void socket.join(userRoom(userId));
      logger.info('WebSocket connected', { userId, socketId: socket.id });

      socket.on('join_channel', (data: unknown) => {
        try {
          const { channelId } = WebSocketPayloadSchemas.join_channel.parse(data);
          void socket.join(channelRoom(channelId));
          logger.debug('Socket joined channel', { userId, channelId });
        } catch (error) {
          this.handleError(socket, 'join_channel', error);
        }
      });

      socket.on('leave_channel', (data: unknown) => {
        try {
          const { channelId } = WebSocketPayloadSchemas.leave_channel.parse(data);
          void socket.leave(channelRoom(channelId));
        } catch (error) {
          this.handleError(socket, 'leave_channel', error);
        }
      });

      socket.on('chat_message', async (data: unknown) => {
        try {
          const payload = WebSocketPayloadSchemas.chat_message.parse(data);
          await this.handleChatMessage(socket, payload);
        } catch (error) {
          this.handleError(socket, 'chat_message', error);
        }
      });

      socket.on('disconnect', (reason) => {
        logger.info('WebSocket disconnected', { userId, socketId: socket.id, reason });
      });
    });
  }

  private async handleChatMessage(socket: ChatSocket, payload: ChatMessagePayload): Promise<void> {
    const room = channelRoom(payload.channelId);
    if (!socket.rooms.has(room)) {
      this.emitError(socket, 'ACCESS_DENIED', 'Join the channel before posting to it', 'chat_message');
      return;
    }

    const event = toInboundEvent(payload, socket.data.userId, uuidv4(), Date.now());
    const broadcast: ChannelMessagePayload = {
      id: event.id,
      channelId: event.channelId,
      authorId: event.authorId,
      text: event.text,
      image: null,
      attachments: payload.attachments.map((attachment) => attachment.filename),
      replyTo: event.replyTo,
      sentAt: new Date(event.receivedAt).toISOString(),
    };
    this.io.to(room).emit('message', broadcast);

    if (!this.handler) {
      logger.warn('No inbound handler attached; chat message not processed', { channelId: event.channelId });
      return;
    }
    await this.handler(event);
  }

  private handleError(socket: ChatSocket, eventName: string, error: unknown): void {
    if (error instanceof ZodError) {
      const first = error.issues[0];
      const message = first ? `${first.path.join('.') || 'payload'}: ${first.message}` : 'Invalid payload';
      this.emitError(socket, 'INVALID_PAYLOAD', message, eventName);
      return;
    }
    logger.error('Error handling WebSocket event', {
      event: eventName,
      socketId: socket.id,
      userId: socket.data.userId,
      error: errorMessage(error),
    });
    this.emitError(socket, 'INTERNAL_ERROR', 'Failed to process event', eventName);
  }

  private emitError(socket: ChatSocket, code: WebSocketErrorCode, message: string, event?: string): void {
    logger.warn('WebSocket error', { code, event, socketId: socket.id, userId: socket.data.userId });
    const payload: WebSocketErrorPayload = {
      type: 'error',
      code,
      message,
      ...(event ? { event } : {}),
    };
    socket.emit('error', payload);
  }
}
