import type {
  ChatMessagePayload,
  JoinChannelPayload,
  LeaveChannelPayload,
} from '../validation/websocketSchemas';

/**
 * Error codes used in structured WebSocket error payloads. They should
 * remain stable so clients can tell categories of failures apart.
 */
export type WebSocketErrorCode = 'INVALID_PAYLOAD' | 'ACCESS_DENIED' | 'INTERNAL_ERROR';

export interface WebSocketErrorPayload {
  type: 'error';
  code: WebSocketErrorCode;
  /** Name of the event that triggered this error, when known. */
  event?: string;
  message: string;
}

export interface ChannelImagePayload {
  filename: string;
  dataBase64: string;
}

/** A chat line as every member of the channel room sees it. */
export interface ChannelMessagePayload {
  id: string;
  channelId: string;
  authorId: string;
  text: string;
  image: ChannelImagePayload | null;
  attachments: string[];
  replyTo: string | null;
  sentAt: string;
}

export interface MessageDeletedPayload {
  id: string;
  channelId: string;
}

/** Private message to one user, delivered to all of that user's sockets. */
export interface NoticePayload {
  channelId: string;
  text: string;
}

export interface ServerToClientEvents {
  message: (payload: ChannelMessagePayload) => void;
  message_deleted: (payload: MessageDeletedPayload) => void;
  notice: (payload: NoticePayload) => void;
  error: (payload: WebSocketErrorPayload) => void;
}

export interface ClientToServerEvents {
  join_channel: (payload: JoinChannelPayload) => void;
  leave_channel: (payload: LeaveChannelPayload) => void;
  chat_message: (payload: ChatMessagePayload) => void;
}
