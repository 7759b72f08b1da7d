/**
 * pulsewire: listening example
 *
 * Demonstrates the full flow:
 *   1. Load settings and credentials from pulse.config.json / auth.json
 *   2. Make a signed request for the account profile
 *   3. Open the real-time session named by the profile
 *   4. Print messages until Ctrl+C, then close the session cleanly
 *
 * Run:
 *   npx tsx examples/listen-example.ts ./pulse.config.json
 */

import {
  PulseClient,
  PulseFetchTransport,
  PulseHttpRuleSource,
  PulseRuleCache,
  PulseSessionSupervisor,
  createLogger,
  pulseLoadAuth,
  pulseLoadConfig,
} from 'pulsewire-node-sdk';
import type { DisconnectOutcome } from 'pulsewire-node-sdk';

// ── Setup ───────────────────────────────────────────────────────

const config = await pulseLoadConfig(process.argv[2] ?? './pulse.config.json');
const logger = createLogger({ level: config.logLevel });
const auth = await pulseLoadAuth(config.authFile, config.origin);

const transport = new PulseFetchTransport({ timeoutMs: config.requestTimeoutMs });
const rules = new PulseRuleCache({
  source: new PulseHttpRuleSource({ url: config.rulesUrl, transport, logger }),
  ttlSeconds: config.rulesTtlSeconds,
  logger,
});
const client = new PulseClient({ auth, rules, transport, logger });

// ── Signed request ──────────────────────────────────────────────

const me = await client.get(config.profileUrl);
logger.info('Profile response', { status: me.status });

// ── Session ─────────────────────────────────────────────────────

let finish: (outcome: DisconnectOutcome) => void = () => undefined;
const ended = new Promise<DisconnectOutcome>((resolve) => {
  finish = resolve;
});

const supervisor = new PulseSessionSupervisor({
  client,
  profileUrl: config.profileUrl,
  logger,
  onStart: (profile) => logger.info('Listening', { username: profile.username }),
  onMessage: (message) => {
    if (message.kind === 'application') {
      logger.info('Message', { tag: message.tag, payload: message.payload });
    }
  },
  onDisconnect: (outcome) => finish(outcome),
});

process.once('SIGINT', () => {
  supervisor.stop().catch((err: unknown) => logger.error('Stop failed', { err }));
});

// Rejects when the profile request or the handshake fails.
await supervisor.start();

const outcome = await ended;
if (!outcome.ok) {
  logger.error('Session lost', outcome.error);
  process.exitCode = 1;
}
