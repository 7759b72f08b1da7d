import { z } from 'zod';
import type { PulseClient } from './client.js';
import { pulseConnect } from './connector.js';
import type { ConnectOptions, SessionConnector } from './connector.js';
import type { SessionMessage } from './decoder.js';
import { PulseError } from './errors.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';
import type { PulseSession, TerminationReason } from './session.js';

// ── Profile ────────────────────────────────────────────────────────

const AccountProfileSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  username: z.string(),
  wsUrl: z.string().url(),
  wsAuthToken: z.string().min(1),
});

export type AccountProfile = z.infer<typeof AccountProfileSchema>;

/**
 * Fetch the signed-in account's profile, which names the session endpoint
 * and its token.
 *
 * @throws PulseError(REQUEST_FAILED)
 */
export async function pulseFetchProfile(client: PulseClient, url: string): Promise<AccountProfile> {
  const response = await client.get(url);
  return response.parse(AccountProfileSchema);
}

// ── Supervisor ─────────────────────────────────────────────────────

export type DisconnectOutcome = { ok: true } | { ok: false; error: PulseError };

export interface SupervisorCallbacks {
  onStart?(profile: AccountProfile): void;
  onMessage?(message: SessionMessage, profile: AccountProfile): void | Promise<void>;
  onDisconnect?(outcome: DisconnectOutcome, profile: AccountProfile): void;
}

export interface PulseSessionSupervisorOptions extends SupervisorCallbacks {
  client: PulseClient;
  profileUrl: string;
  /** Session settings; messages are routed to `onMessage` below. */
  session?: Omit<ConnectOptions, 'onMessage' | 'onTerminated'>;
  connect?: SessionConnector;
  logger?: PulseLogger;
}

function toOutcome(reason: TerminationReason): DisconnectOutcome {
  switch (reason.kind) {
    case 'closed':
      return { ok: true };
    case 'remote-closed':
      return { ok: false, error: PulseError.transportError('Session closed by remote') };
    case 'error':
      return { ok: false, error: reason.error };
  }
}

/**
 * Drives one session at a time for an account: fetches the profile,
 * connects, forwards messages and reports how the session ended. It never
 * reconnects on its own; call `start()` again after a disconnect.
 */
export class PulseSessionSupervisor {
  private readonly _client: PulseClient;
  private readonly _profileUrl: string;
  private readonly _sessionOptions: Omit<ConnectOptions, 'onMessage' | 'onTerminated'>;
  private readonly _connect: SessionConnector;
  private readonly _callbacks: SupervisorCallbacks;
  private readonly _logger: PulseLogger;
  private _session: PulseSession | null = null;
  private _starting = false;

  constructor(options: PulseSessionSupervisorOptions) {
    this._client = options.client;
    this._profileUrl = options.profileUrl;
    this._sessionOptions = options.session ?? {};
    this._connect = options.connect ?? pulseConnect;
    this._callbacks = {
      onStart: options.onStart,
      onMessage: options.onMessage,
      onDisconnect: options.onDisconnect,
    };
    this._logger = options.logger ?? getLogger().child({ component: 'supervisor' });
  }

  get running(): boolean {
    return this._session !== null;
  }

  /**
   * Fetch the profile and connect. Rejects when the profile request or the
   * connection fails; no disconnect is reported in that case.
   */
  async start(): Promise<AccountProfile> {
    if (this._starting || this._session) {
      throw new Error('Supervisor is already running a session');
    }
    this._starting = true;
    try {
      const profile = await pulseFetchProfile(this._client, this._profileUrl);
      this._logger.info('Profile fetched', { id: profile.id, username: profile.username });

      const session = await this._connect(profile.wsUrl, profile.wsAuthToken, {
        logger: this._logger,
        ...this._sessionOptions,
        onMessage: (message) => this._callbacks.onMessage?.(message, profile),
      });
      this._session = session;

      // Subscribed after connect so a failed start reports no disconnect.
      session.onTerminated((reason) => {
        if (this._session === session) this._session = null;
        const outcome = toOutcome(reason);
        this._logger.info('Session ended', { ok: outcome.ok });
        this._callbacks.onDisconnect?.(outcome, profile);
      });

      this._callbacks.onStart?.(profile);
      return profile;
    } finally {
      this._starting = false;
    }
  }

  /** Close the current session, if any, and wait for it to stop. */
  async stop(): Promise<void> {
    const session = this._session;
    if (!session) return;
    await session.close();
  }
}
