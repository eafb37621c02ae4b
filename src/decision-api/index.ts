import { createServer } from 'http';
import path from 'path';
import { DecisionEngine } from '@core/engine';
import { describeError } from '@core/errors';
import { loadPolicyPack } from '@core/policy-pack';
import { RuleBasedAdvisoryModel } from '@core/rule-model';
import { API_PREFIX, WS_EVENTS } from '@shared/constants';
import { createApp } from './app';
import { config } from './config';
import { createLedger } from './ledger-factory';
import { PendingStore } from './pending-store';
import { broadcast, closeWebSocket, initWebSocket } from './websocket';

export const SHUTDOWN_REASON = 'Service shutting down before human review';

async function start() {
  const policy = await loadPolicyPack(path.resolve(config.policyPackDir));
  console.warn(
    `[POLICY] Loaded ${policy.meta.packId}@${policy.meta.version} (${policy.boundaries.rules.length} boundary rules)`,
  );

  const { ledger, description, close: closeLedger } = await createLedger(config);
  console.warn(`[LEDGER] Using ${description}`);

  const pending = new PendingStore();
  const engine = new DecisionEngine({
    policy,
    model: new RuleBasedAdvisoryModel(policy.boundaries),
    ledger,
    advisoryTimeoutMs: config.timeouts.advisoryMs,
    ledgerTimeoutMs: config.timeouts.ledgerMs,
    onRecord: (event) => broadcast(WS_EVENTS.AUDIT_RECORD_APPENDED, event),
    onHalt: (claimId, error) => {
      console.warn(`[ENGINE] Claim ${claimId} halted at ${error.stage}: ${error.code}`);
    },
  });

  const app = createApp(
    { engine, ledger, pending },
    { clientUrl: config.clientUrl, logRequests: config.nodeEnv !== 'test' },
  );
  const server = createServer(app);
  initWebSocket(server);

  let shuttingDown = false;
  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    console.warn(`[SERVER] ${signal} received, abandoning ${pending.size} pending claim(s)`);
    setTimeout(() => process.exit(1), 10_000).unref();

    const results = await Promise.allSettled(
      pending.list().map((decision) => engine.abandon(decision, SHUTDOWN_REASON)),
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        console.error('[SERVER] Abandon failed:', describeError(result.reason));
      } else if (!result.value.ok) {
        console.error('[SERVER] Abandon not recorded:', result.value.error.message);
      }
    }

    await closeWebSocket();
    server.close(() => {
      closeLedger()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[SERVER] Ledger close failed:', describeError(err));
          process.exit(1);
        });
    });
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[SERVER] Shutdown failed:', describeError(err));
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  server.listen(config.port, () => {
    console.warn(`[SERVER] Claims advisory API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
