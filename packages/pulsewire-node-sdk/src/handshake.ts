import { DEFAULT_CONNECT_TIMEOUT_MS } from './constants.js';
import { PulseError, errorMessage } from './errors.js';
import type { PulseLogger } from './logger.js';
import { pulseDecodeFrame, pulseEncodeConnect } from './messages.js';
import type { ConnectedMessage, InboundFrame } from './messages.js';
import type { SocketChannel } from './socket-transport.js';
import { withTimeout } from './timing.js';
import type { Bounded } from './timing.js';

export interface HandshakeOptions {
  timeoutMs?: number;
  logger: PulseLogger;
}

/**
 * Authenticate an open channel: send the connect frame and require the
 * first inbound frame to be a `connected` acknowledgement. The channel is
 * closed on every failure.
 *
 * @throws PulseError(HANDSHAKE_TIMEOUT) when nothing arrives in time.
 * @throws PulseError(HANDSHAKE_PROTOCOL) when the first frame is anything else.
 * @throws PulseError(TRANSPORT_ERROR) when the socket fails or closes first.
 */
export async function pulseHandshake(
  channel: SocketChannel,
  token: string,
  options: HandshakeOptions,
): Promise<ConnectedMessage> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const log = options.logger;

  const fail = async (error: PulseError): Promise<never> => {
    await channel.sink.close();
    throw error;
  };

  try {
    await channel.sink.send(pulseEncodeConnect(token));
  } catch (err: unknown) {
    return fail(
      err instanceof PulseError
        ? err
        : PulseError.transportError(`Connect frame not sent: ${errorMessage(err)}`, err),
    );
  }

  let first: Bounded<InboundFrame | null>;
  try {
    first = await withTimeout(channel.source.next(), timeoutMs);
  } catch (err: unknown) {
    return fail(
      err instanceof PulseError
        ? err
        : PulseError.transportError(`Handshake read failed: ${errorMessage(err)}`, err),
    );
  }

  if (first.kind === 'timeout') {
    log.warn('Handshake timed out', { timeoutMs });
    return fail(PulseError.handshakeTimeout(timeoutMs));
  }
  if (first.value === null) {
    return fail(PulseError.transportError('Connection closed during handshake'));
  }

  const decoded = pulseDecodeFrame(first.value);
  if (!decoded.ok || decoded.message.kind !== 'connected') {
    const received = decoded.ok ? decoded.message.kind : 'undecodable frame';
    log.warn('Unexpected handshake message', { received });
    return fail(PulseError.handshakeProtocol(`Unexpected message during handshake: ${received}`));
  }

  return decoded.message;
}
