import { Router } from 'express';
import { z } from 'zod';
import type { AuditLedger } from '@core/ledger';
import type { ApiResponse } from '@shared/types';
import { asyncHandler } from '../middleware/index';

const auditQuerySchema = z.object({
  from: z.coerce.number().int().positive().optional(),
});

export function createAuditRouter(ledger: AuditLedger): Router {
  const router = Router();

  // GET /audit?from=n -- global order for compliance review
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const query = auditQuerySchema.safeParse(req.query);
      if (!query.success) {
        const response: ApiResponse = {
          success: false,
          error: 'from must be a positive integer sequence number',
        };
        return res.status(400).json(response);
      }
      const records = await ledger.readAll(query.data.from);
      res.json({ success: true, data: records });
    }),
  );

  router.get(
    '/verify',
    asyncHandler(async (_req, res) => {
      const verification = await ledger.verify();
      res.json({ success: true, data: verification });
    }),
  );

  return router;
}
