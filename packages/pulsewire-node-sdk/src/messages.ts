/**
 * Session frame codec.
 *
 * Outbound frames are fixed JSON objects. Inbound frames carry no type tag,
 * so decoding tries each known shape in a fixed order and the first match
 * wins. A frame that matches nothing is a recoverable decode failure.
 */
import { z } from 'zod';
import { ACT_CONNECT, ACT_HEARTBEAT } from './constants.js';
import { PulseError, errorMessage } from './errors.js';

// ── Types ──────────────────────────────────────────────────────────

/** One frame as read off the socket. */
export type InboundFrame =
  | { type: 'text'; data: string }
  | { type: 'binary'; data: Uint8Array };

/** Tags of single-key application frames. */
export const APPLICATION_TAGS = [
  'post_published',
  'post_updated',
  'post_expire',
  'post_fundraising_updated',
  'api2_chat_message',
  'stories',
  'story_tips',
  'stream',
  'stream_start',
  'stream_stop',
  'stream_update',
  'stream_look',
  'stream_unlook',
  'stream_comment',
  'stream_likes',
  'toasts',
] as const;

export type ApplicationTag = (typeof APPLICATION_TAGS)[number];

/** Application frames recognised by their fields rather than by a tag key. */
export type ShapedTag = 'chat_count' | 'notification_count' | 'notification' | 'stream_tips';

export interface OnlinesMessage {
  kind: 'onlines';
  online: number[];
}

export interface ConnectedMessage {
  kind: 'connected';
  connected: boolean;
  v: string;
}

export interface ErrorMessage {
  kind: 'error';
  error: number;
}

export interface ApplicationMessage {
  kind: 'application';
  tag: ApplicationTag | ShapedTag;
  /** Opaque payload; for tagged frames the value under the tag key. */
  payload: unknown;
}

export type InboundMessage = OnlinesMessage | ConnectedMessage | ErrorMessage | ApplicationMessage;

export type DecodeResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; error: PulseError };

// ── Shapes (decode order) ──────────────────────────────────────────

const OnlinesSchema = z.object({ online: z.array(z.number().int()) });

const ConnectedSchema = z.object({ connected: z.boolean(), v: z.string() });

const ErrorSchema = z.object({ error: z.number().int() });

const ChatCountSchema = z.object({ chat_messages: z.number() });

const NotificationCountSchema = z.object({
  messages: z.number(),
  hasSystemNotifications: z.boolean(),
});

const NotificationSchema = z.object({
  new_message: z.unknown().refine((value) => value !== undefined, { message: 'Required' }),
  hasSystemNotifications: z.boolean(),
});

const StreamTipsSchema = z.object({
  stream_tips: z.unknown().refine((value) => value !== undefined, { message: 'Required' }),
  tips_count: z.number(),
});

const SHAPED: ReadonlyArray<readonly [ShapedTag, z.ZodTypeAny]> = [
  ['chat_count', ChatCountSchema],
  ['notification_count', NotificationCountSchema],
  ['notification', NotificationSchema],
  ['stream_tips', StreamTipsSchema],
];

function isApplicationTag(key: string): key is ApplicationTag {
  return APPLICATION_TAGS.some((tag) => tag === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeTagged(value: unknown): ApplicationMessage | null {
  if (!isRecord(value)) return null;
  const keys = Object.keys(value);
  if (keys.length !== 1) return null;
  const [tag] = keys;
  if (tag === undefined || !isApplicationTag(tag)) return null;
  return { kind: 'application', tag, payload: value[tag] };
}

function decodeValue(value: unknown): InboundMessage | null {
  const onlines = OnlinesSchema.safeParse(value);
  if (onlines.success) {
    return { kind: 'onlines', online: onlines.data.online };
  }

  const connected = ConnectedSchema.safeParse(value);
  if (connected.success) {
    return { kind: 'connected', connected: connected.data.connected, v: connected.data.v };
  }

  const error = ErrorSchema.safeParse(value);
  if (error.success) {
    return { kind: 'error', error: error.data.error };
  }

  const tagged = decodeTagged(value);
  if (tagged) return tagged;

  for (const [tag, schema] of SHAPED) {
    if (schema.safeParse(value).success) {
      return { kind: 'application', tag, payload: value };
    }
  }

  return null;
}

// ── Encode ─────────────────────────────────────────────────────────

/** Authentication frame sent once, right after the socket opens. */
export function pulseEncodeConnect(token: string): string {
  return JSON.stringify({ act: ACT_CONNECT, token });
}

/** Liveness ping. */
export function pulseEncodeHeartbeat(): string {
  return JSON.stringify({ act: ACT_HEARTBEAT, ids: [] });
}

// ── Decode ─────────────────────────────────────────────────────────

/**
 * Decode one inbound frame. Never throws: failures come back as
 * `{ ok: false }` carrying a DECODE_ERROR.
 */
export function pulseDecodeFrame(frame: InboundFrame | string): DecodeResult {
  const text = typeof frame === 'string' ? frame : frame.type === 'text' ? frame.data : null;
  if (text === null) {
    return { ok: false, error: PulseError.decodeError('Binary frames are not supported') };
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err: unknown) {
    return { ok: false, error: PulseError.decodeError(`Frame is not valid JSON: ${errorMessage(err)}`, err) };
  }

  const message = decodeValue(value);
  if (message === null) {
    return { ok: false, error: PulseError.decodeError('Frame matches no known message shape') };
  }
  return { ok: true, message };
}

