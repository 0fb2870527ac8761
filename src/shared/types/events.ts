/**
 * Chat-event shapes exchanged between a ChatTransport and the command
 * serializer.
 */

/** A binary attachment whose bytes have not been read yet. */
export interface AttachmentHandle {
  filename: string;
  contentType: string | null;
  read(): Promise<Uint8Array>;
}

/** An attachment whose bytes are fully materialized in memory. */
export interface CapturedAttachment {
  filename: string;
  contentType: string | null;
  data: Buffer;
}

export interface InboundEvent {
  /** Transport-level id, used to delete the original message. */
  id: string;
  channelId: string;
  authorId: string;
  text: string;
  attachments: AttachmentHandle[];
  /** Id of the message this one replied to, if any. */
  replyTo: string | null;
  receivedAt: number;
}

export interface QueuedEvent {
  origin: string;
  payload: {
    text: string;
    attachments: CapturedAttachment[];
  };
  channelId: string;
  replyTo: string | null;
  /** Original transport id; the message itself has been deleted. */
  sourceEventId: string;
  arrivedAt: number;
  /** Monotonic arrival ordinal within the session queue. */
  arrival: number;
}

export interface DispatchContext {
  /** True when the event is being replayed from the serializer queue. */
  replayed: boolean;
}

export type EventDispatcher = (event: InboundEvent, context: DispatchContext) => Promise<void>;

export interface OutboundImage {
  filename: string;
  data: Buffer;
}

export interface OutboundMessage {
  text: string;
  image?: OutboundImage;
  replyTo?: string | null;
}

/**
 * Platform-facing collaborator. Implementations deliver and remove events;
 * message composition beyond plain text + one image is out of scope.
 */
export interface ChatTransport {
  send(channelId: string, message: OutboundMessage): Promise<void>;
  deleteEvent(event: InboundEvent): Promise<void>;
  notify(channelId: string, recipientId: string, text: string): Promise<void>;
}

/** Wraps already-captured bytes so a replay looks like a live event. */
export function toAttachmentHandle(attachment: CapturedAttachment): AttachmentHandle {
  return {
    filename: attachment.filename,
    contentType: attachment.contentType,
    read: async () => attachment.data,
  };
}

export function queuedEventToInbound(event: QueuedEvent): InboundEvent {
  return {
    id: event.sourceEventId,
    channelId: event.channelId,
    authorId: event.origin,
    text: event.payload.text,
    attachments: event.payload.attachments.map(toAttachmentHandle),
    replyTo: event.replyTo,
    receivedAt: event.arrivedAt,
  };
}
