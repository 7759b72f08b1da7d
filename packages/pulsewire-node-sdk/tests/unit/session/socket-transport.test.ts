/**
 * Socket wrapping: frame queue, sink and source over a ws-shaped socket.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { PulseError, PulseErrorCode, PulseFrameQueue, pulseWrapSocket } from '../../../src/index.js';
import { SOCKET_CLOSE_GRACE_MS } from '../../../src/constants.js';
import { FakeSocket, flush, recordingLogger, silentLogger } from '../../helpers/fakes.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('TR: PulseFrameQueue', () => {
  it('TR-Q-001: frames pushed before a read are buffered in order', async () => {
    const queue = new PulseFrameQueue();
    queue.push({ type: 'text', data: 'a' });
    queue.push({ type: 'text', data: 'b' });
    await expect(queue.next()).resolves.toEqual({ type: 'text', data: 'a' });
    await expect(queue.next()).resolves.toEqual({ type: 'text', data: 'b' });
  });

  it('TR-Q-002: a waiting reader gets the next push', async () => {
    const queue = new PulseFrameQueue();
    const reading = queue.next();
    queue.push({ type: 'text', data: 'x' });
    await expect(reading).resolves.toEqual({ type: 'text', data: 'x' });
  });

  it('TR-Q-003: buffered frames come out before the end', async () => {
    const queue = new PulseFrameQueue();
    queue.push({ type: 'text', data: 'last' });
    queue.end();
    queue.push({ type: 'text', data: 'ignored' });
    await expect(queue.next()).resolves.toEqual({ type: 'text', data: 'last' });
    await expect(queue.next()).resolves.toBeNull();
    expect(queue.ended).toBe(true);
  });

  it('TR-Q-004: a failure rejects waiting and later reads', async () => {
    const queue = new PulseFrameQueue();
    const reading = queue.next();
    queue.fail(PulseError.transportError('gone'));
    await expect(reading).rejects.toThrow('gone');
    await expect(queue.next()).rejects.toThrow('gone');
  });

  it('TR-Q-005: end after a failure keeps the failure', async () => {
    const queue = new PulseFrameQueue();
    queue.fail(PulseError.transportError('gone'));
    queue.end();
    await expect(queue.next()).rejects.toThrow('gone');
  });
});

describe('TR: pulseWrapSocket source', () => {
  it('TR-SRC-001: text messages become text frames', async () => {
    const socket = new FakeSocket();
    const { source } = pulseWrapSocket(socket, silentLogger());
    socket.receive({ online: [] });
    await expect(source.next()).resolves.toEqual({ type: 'text', data: '{"online":[]}' });
  });

  it('TR-SRC-002: binary messages keep their bytes', async () => {
    const socket = new FakeSocket();
    const { source } = pulseWrapSocket(socket, silentLogger());
    socket.receiveBinary(new Uint8Array([7, 8, 9]));
    const frame = await source.next();
    if (frame?.type !== 'binary') throw new Error('expected a binary frame');
    expect(Array.from(frame.data)).toEqual([7, 8, 9]);
  });

  it('TR-SRC-003: a remote close ends the stream after buffered frames', async () => {
    const socket = new FakeSocket();
    const { source } = pulseWrapSocket(socket, silentLogger());
    socket.receive({ error: 1 });
    socket.remoteClose();
    await expect(source.next()).resolves.toEqual({ type: 'text', data: '{"error":1}' });
    await expect(source.next()).resolves.toBeNull();
  });

  it('TR-SRC-004: a socket error fails the stream and is logged', async () => {
    const { logger, lines } = recordingLogger();
    const socket = new FakeSocket();
    const { source } = pulseWrapSocket(socket, logger);
    socket.fail('boom');

    const err: unknown = await source.next().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PulseError);
    expect(err instanceof PulseError && err.code).toBe(PulseErrorCode.TRANSPORT_ERROR);
    expect(err instanceof PulseError && err.message).toBe('Socket error: boom');
    expect(lines.find((l) => l.msg === 'Socket error')?.reason).toBe('boom');
  });
});

describe('TR: pulseWrapSocket sink', () => {
  it('TR-SNK-001: send writes the text and resolves on the callback', async () => {
    const socket = new FakeSocket();
    const { sink } = pulseWrapSocket(socket, silentLogger());
    await sink.send('{"act":"get_onlines","ids":[]}');
    expect(socket.sent).toEqual(['{"act":"get_onlines","ids":[]}']);
  });

  it('TR-SNK-002: a send error rejects with a transport error', async () => {
    const socket = new FakeSocket();
    socket.sendError = new Error('nope');
    const { sink } = pulseWrapSocket(socket, silentLogger());
    await expect(sink.send('x')).rejects.toThrow('Send failed: nope');
  });

  it('TR-SNK-003: sending on a closed socket rejects', async () => {
    const socket = new FakeSocket();
    const { sink } = pulseWrapSocket(socket, silentLogger());
    socket.remoteClose();
    await expect(sink.send('x')).rejects.toThrow('Socket is closed');
    expect(socket.sent).toEqual([]);
  });

  it('TR-SNK-004: close performs a normal closure and ends the stream', async () => {
    const socket = new FakeSocket();
    const { sink, source } = pulseWrapSocket(socket, silentLogger());
    await sink.close();
    expect(socket.closeCalls).toBe(1);
    expect(socket.terminated).toBe(false);
    await expect(source.next()).resolves.toBeNull();
  });

  it('TR-SNK-005: close on an already closed socket resolves at once', async () => {
    const socket = new FakeSocket();
    const { sink } = pulseWrapSocket(socket, silentLogger());
    socket.remoteClose();
    await sink.close();
    expect(socket.closeCalls).toBe(0);
  });

  it('TR-SNK-006: a socket that does not close in time is terminated', async () => {
    vi.useFakeTimers();
    const socket = new FakeSocket();
    socket.closesCleanly = false;
    const { sink, source } = pulseWrapSocket(socket, silentLogger());

    let done = false;
    const closing = sink.close().then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(SOCKET_CLOSE_GRACE_MS - 1);
    expect(done).toBe(false);
    expect(socket.terminated).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await closing;
    expect(socket.terminated).toBe(true);
    await expect(source.next()).resolves.toBeNull();
  });

  it('TR-SNK-007: concurrent closes both resolve', async () => {
    const socket = new FakeSocket();
    const { sink } = pulseWrapSocket(socket, silentLogger());
    await Promise.all([sink.close(), sink.close()]);
    await flush();
    expect(socket.closeCalls).toBe(2);
  });
});
