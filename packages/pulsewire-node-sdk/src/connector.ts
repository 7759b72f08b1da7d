import { PulseSession } from './session.js';
import type { PulseSessionOptions } from './session.js';

export type ConnectOptions = Omit<PulseSessionOptions, 'url' | 'token'>;

/** Opens a connected session; swapped out in tests. */
export type SessionConnector = (url: string, token: string, options?: ConnectOptions) => Promise<PulseSession>;

/**
 * Open, authenticate and start a session in one call.
 *
 * @example
 * ```ts
 * const session = await pulseConnect(profile.wsUrl, profile.wsAuthToken, {
 *   onMessage: (message) => console.log(message),
 * });
 * await session.terminated;
 * ```
 */
export async function pulseConnect(
  url: string,
  token: string,
  options: ConnectOptions = {},
): Promise<PulseSession> {
  const session = new PulseSession({ ...options, url, token });
  await session.connect();
  return session;
}
