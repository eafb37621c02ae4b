import { Router } from 'express';
import type { PolicyPack } from '@core/policy-pack';
import type { ApiResponse } from '@shared/types';

export function createPolicyPackRouter(policy: PolicyPack): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const response: ApiResponse = {
      success: true,
      data: {
        meta: policy.meta,
        capabilities: policy.capabilities,
        boundaries: policy.boundaries,
        ruleIds: policy.boundaries.rules.map((r) => r.ruleId),
      },
    };
    res.json(response);
  });

  return router;
}
