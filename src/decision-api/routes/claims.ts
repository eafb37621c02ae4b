import { Router } from 'express';
import { z } from 'zod';
import type { DecisionEngine, PendingDecision } from '@core/engine';
import { checkChain } from '@core/state-machine';
import type { ApiResponse } from '@shared/types';
import { asyncHandler, sendEngineError } from '../middleware/index';
import type { PendingStore } from '../pending-store';

const abandonSchema = z.object({
  reason: z.string().trim().min(1).optional(),
});

function notFound(claimId: string): ApiResponse {
  return { success: false, error: `No claim ${claimId} is awaiting human review`, code: 'NotFound' };
}

function pendingView(pending: PendingDecision) {
  return { ...pending, status: 'PENDING_HUMAN' as const };
}

export function createClaimsRouter(engine: DecisionEngine, pending: PendingStore): Router {
  const router = Router();

  // Submit a claim; runs up to PENDING_HUMAN
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const result = await engine.evaluate(req.body);
      if (!result.ok) return sendEngineError(res, result.error);
      pending.add(result.value);
      res.status(201).json({ success: true, data: pendingView(result.value) });
    }),
  );

  router.get('/pending', (_req, res) => {
    res.json({ success: true, data: pending.list().map(pendingView) });
  });

  // HumanGate: confirm or reject the advisory suggestion
  router.post(
    '/:id/confirmation',
    asyncHandler(async (req, res) => {
      const decision = pending.get(req.params.id);
      if (!decision) return res.status(404).json(notFound(req.params.id));

      const result = await engine.resolve(decision, req.body);
      if (!engine.isOpen(decision)) pending.remove(decision.claimId);

      if (!result.ok) return sendEngineError(res, result.error);
      res.json({ success: true, data: result.value });
    }),
  );

  router.post(
    '/:id/abandon',
    asyncHandler(async (req, res) => {
      const decision = pending.get(req.params.id);
      if (!decision) return res.status(404).json(notFound(req.params.id));

      const body = abandonSchema.safeParse(req.body ?? {});
      if (!body.success) {
        return res
          .status(400)
          .json({ success: false, error: 'reason must be a non-empty string' });
      }

      const result = await engine.abandon(decision, body.data.reason);
      pending.remove(decision.claimId);

      if (!result.ok) return sendEngineError(res, result.error);
      res.json({ success: true, data: result.value });
    }),
  );

  router.get(
    '/:id/audit',
    asyncHandler(async (req, res) => {
      const records = await engine.readChain(req.params.id);
      if (records.length === 0) {
        const response: ApiResponse = {
          success: false,
          error: `No audit records for claim ${req.params.id}`,
          code: 'NotFound',
        };
        return res.status(404).json(response);
      }
      res.json({ success: true, data: { records, chain: checkChain(records) } });
    }),
  );

  return router;
}
