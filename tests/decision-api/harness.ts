import { createServer } from 'http';
import { createApp } from '@api/app';
import { PendingStore } from '@api/pending-store';
import type { AdvisoryModel } from '@core/advisory';
import { DecisionEngine } from '@core/engine';
import { InMemoryAuditLedger } from '@core/ledger';
import { FIXED_CLOCK, loadTestPolicy, sequentialIds, stubModel } from '../decision-core/fixtures';

export interface TestApi {
  baseUrl: string;
  engine: DecisionEngine;
  ledger: InMemoryAuditLedger;
  pending: PendingStore;
  close: () => Promise<void>;
}

/** The full API on an ephemeral port, backed by an in-memory ledger. */
export async function startTestApi(model: AdvisoryModel = stubModel('High', 0.82).model): Promise<TestApi> {
  const policy = await loadTestPolicy();
  const ledger = new InMemoryAuditLedger();
  const pending = new PendingStore();
  const engine = new DecisionEngine({
    policy,
    model,
    ledger,
    clock: FIXED_CLOCK,
    generateClaimId: sequentialIds(),
  });
  const server = createServer(createApp({ engine, ledger, pending }, { logRequests: false }));

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}/api`,
    engine,
    ledger,
    pending,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export interface JsonResponse {
  status: number;
  body: unknown;
}

export async function call(
  api: TestApi,
  method: 'GET' | 'POST',
  path: string,
  body?: unknown,
): Promise<JsonResponse> {
  const res = await fetch(`${api.baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: res.status, body: await res.json() };
}

export const CONFIRMATION = {
  confirmed: true,
  overrideReason: 'Matches prior claim pattern',
  decisionMakerId: 'adjuster-1',
};
