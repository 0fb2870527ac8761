import { z } from 'zod';

/**
 * Zod schemas for incoming WebSocket payloads.
 *
 * The socket.io transport is a development and integration surface for the
 * chat runtime: clients join channel rooms and post chat lines, optionally
 * with base64-encoded attachments.
 */

/** Cap on a single decoded attachment; larger files are rejected at the edge. */
export const MAX_ATTACHMENT_BYTES = 8 * 1024 * 1024;

const ChannelIdSchema = z.string().trim().min(1).max(64);

// --- Handshake ---

export const HandshakeAuthSchema = z.object({
  userId: z.string().trim().min(1).max(64),
});

// --- Channel room events ---

export const JoinChannelPayloadSchema = z.object({
  channelId: ChannelIdSchema,
});

export type JoinChannelPayload = z.infer<typeof JoinChannelPayloadSchema>;

export const LeaveChannelPayloadSchema = z.object({
  channelId: ChannelIdSchema,
});

export type LeaveChannelPayload = z.infer<typeof LeaveChannelPayloadSchema>;

// --- Chat events ---

export const ChatAttachmentPayloadSchema = z.object({
  filename: z.string().trim().min(1).max(255),
  contentType: z.string().max(255).nullable().default(null),
  dataBase64: z
    .string()
    .regex(/^[A-Za-z0-9+/]*={0,2}$/, 'Attachment data must be base64')
    // base64 encodes 3 bytes in 4 characters
    .refine((value) => (value.length / 4) * 3 <= MAX_ATTACHMENT_BYTES + 2, {
      message: 'Attachment is too large',
    }),
});

export type ChatAttachmentPayload = z.infer<typeof ChatAttachmentPayloadSchema>;

export const ChatMessagePayloadSchema = z
  .object({
    channelId: ChannelIdSchema,
    text: z.string().max(2000, 'Message must be at most 2000 characters').default(''),
    attachments: z.array(ChatAttachmentPayloadSchema).max(10).default([]),
    replyTo: z.string().min(1).nullable().default(null),
  })
  .refine((payload) => payload.text.trim().length > 0 || payload.attachments.length > 0, {
    message: 'Message cannot be empty',
    path: ['text'],
  });

export type ChatMessagePayload = z.infer<typeof ChatMessagePayloadSchema>;

/**
 * Aggregated schema map keyed by event name.
 */
export const WebSocketPayloadSchemas = {
  join_channel: JoinChannelPayloadSchema,
  leave_channel: LeaveChannelPayloadSchema,
  chat_message: ChatMessagePayloadSchema,
} as const;

