/**
 * Session frame codec.
 */
import { describe, it, expect } from 'vitest';
import {
  APPLICATION_TAGS,
  PulseErrorCode,
  pulseDecodeFrame,
  pulseEncodeConnect,
  pulseEncodeHeartbeat,
} from '../../../src/index.js';
import type { DecodeResult } from '../../../src/index.js';

function decode(value: unknown): DecodeResult {
  return pulseDecodeFrame(JSON.stringify(value));
}

describe('MSG: Encoding', () => {
  it('MSG-ENC-001: connect frame', () => {
    expect(pulseEncodeConnect('T1')).toBe('{"act":"connect","token":"T1"}');
  });

  it('MSG-ENC-002: heartbeat frame', () => {
    expect(pulseEncodeHeartbeat()).toBe('{"act":"get_onlines","ids":[]}');
  });
});

describe('MSG: Control and liveness frames', () => {
  it('MSG-DEC-001: liveness ack', () => {
    expect(decode({ online: [1, 2] })).toEqual({ ok: true, message: { kind: 'onlines', online: [1, 2] } });
  });

  it('MSG-DEC-002: connected acknowledgement', () => {
    expect(pulseDecodeFrame('{"connected":true,"v":"1"}')).toEqual({
      ok: true,
      message: { kind: 'connected', connected: true, v: '1' },
    });
  });

  it('MSG-DEC-003: error frame', () => {
    expect(decode({ error: 1 })).toEqual({ ok: true, message: { kind: 'error', error: 1 } });
  });

  it('MSG-DEC-004: liveness wins over later shapes', () => {
    const result = decode({ online: [], error: 3 });
    expect(result.ok && result.message.kind).toBe('onlines');
  });

  it('MSG-DEC-005: text frames in the object form decode the same way', () => {
    expect(pulseDecodeFrame({ type: 'text', data: '{"error":2}' })).toEqual({
      ok: true,
      message: { kind: 'error', error: 2 },
    });
  });
});

describe('MSG: Application frames', () => {
  it('MSG-APP-001: every known tag decodes with its payload', () => {
    for (const tag of APPLICATION_TAGS) {
      expect(decode({ [tag]: { id: 1 } })).toEqual({
        ok: true,
        message: { kind: 'application', tag, payload: { id: 1 } },
      });
    }
  });

  it('MSG-APP-002: tagged frames carry scalar payloads', () => {
    expect(decode({ post_updated: '42' })).toEqual({
      ok: true,
      message: { kind: 'application', tag: 'post_updated', payload: '42' },
    });
  });

  it('MSG-APP-003: chat count shape', () => {
    expect(decode({ chat_messages: 3 })).toEqual({
      ok: true,
      message: { kind: 'application', tag: 'chat_count', payload: { chat_messages: 3 } },
    });
  });

  it('MSG-APP-004: notification count and notification shapes', () => {
    const count = decode({ messages: 2, hasSystemNotifications: false });
    expect(count.ok && count.message.kind === 'application' && count.message.tag).toBe('notification_count');

    const note = decode({ new_message: { id: 9 }, hasSystemNotifications: true });
    expect(note.ok && note.message.kind === 'application' && note.message.tag).toBe('notification');
  });

  it('MSG-APP-005: stream tips shape', () => {
    const tips = decode({ stream_tips: [], tips_count: 0 });
    expect(tips.ok && tips.message.kind === 'application' && tips.message.tag).toBe('stream_tips');
  });

  it('MSG-APP-006: a known tag with extra keys is not a tagged frame', () => {
    const result = decode({ stream: {}, other: 1 });
    expect(result.ok).toBe(false);
  });
});

describe('MSG: Undecodable frames', () => {
  it('MSG-BAD-001: non-JSON text', () => {
    const result = pulseDecodeFrame('hello');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(PulseErrorCode.DECODE_ERROR);
    expect(result.error.fatal).toBe(false);
  });

  it('MSG-BAD-002: unknown shape', () => {
    const result = decode({ unknown_event: {} });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Frame matches no known message shape');
  });

  it('MSG-BAD-003: binary frame', () => {
    const result = pulseDecodeFrame({ type: 'binary', data: new Uint8Array([1, 2]) });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Binary frames are not supported');
  });

  it('MSG-BAD-004: JSON scalars and arrays match nothing', () => {
    expect(pulseDecodeFrame('42').ok).toBe(false);
    expect(pulseDecodeFrame('[]').ok).toBe(false);
    expect(pulseDecodeFrame('null').ok).toBe(false);
  });

  it('MSG-BAD-005: wrongly typed control fields fall through', () => {
    expect(decode({ connected: 'yes', v: '1' }).ok).toBe(false);
    expect(decode({ error: 'x' }).ok).toBe(false);
  });
});
