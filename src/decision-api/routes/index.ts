import { Router } from 'express';
import type { DecisionEngine } from '@core/engine';
import type { AuditLedger } from '@core/ledger';
import type { PendingStore } from '../pending-store';
import { createAuditRouter } from './audit';
import { createClaimsRouter } from './claims';
import { createHealthRouter } from './health';
import { createPolicyPackRouter } from './policy-pack';

export interface ApiDependencies {
  engine: DecisionEngine;
  ledger: AuditLedger;
  pending: PendingStore;
}

export function createApiRouter({ engine, ledger, pending }: ApiDependencies): Router {
  const router = Router();
  router.use(createHealthRouter(pending));
  router.use('/policy-pack', createPolicyPackRouter(engine.policy));
  router.use('/claims', createClaimsRouter(engine, pending));
  router.use('/audit', createAuditRouter(ledger));
  return router;
}
