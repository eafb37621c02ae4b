import { Router } from 'express';
import type { ApiResponse } from '@shared/types';
import type { PendingStore } from '../pending-store';

export function createHealthRouter(pending: PendingStore): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const response: ApiResponse = {
      success: true,
      data: {
        status: 'ok',
        pendingClaims: pending.size,
        uptimeSeconds: Math.round(process.uptime()),
        timestamp: new Date().toISOString(),
      },
    };
    res.json(response);
  });

  return router;
}
