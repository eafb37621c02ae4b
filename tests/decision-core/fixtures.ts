import { fileURLToPath } from 'url';
import { vi } from 'vitest';
import { buildSuggestion, type AdvisoryModel, type AdvisorySuggestion } from '@core/advisory';
import type { SeverityCategory } from '@core/claim-input';
import type { ValidatedClaim } from '@core/governance';
import { loadPolicyPack, type PolicyPack } from '@core/policy-pack';

export const PACK_DIR = fileURLToPath(
  new URL('../../policy-packs/claims-advisory-v1', import.meta.url),
);

export function loadTestPolicy(): Promise<PolicyPack> {
  return loadPolicyPack(PACK_DIR);
}

export const SCENARIO_INPUT = {
  claim_type: 'Auto',
  damage_amount: 15000.0,
  injury_involved: true,
  risk_factor: 'medium',
} as const;

export const STUB_MODEL_ID = 'stub-model';

export function stubSuggestion(
  category: SeverityCategory,
  confidence: number,
  overrides: Partial<AdvisorySuggestion> = {},
): AdvisorySuggestion {
  return {
    ...buildSuggestion({
      category,
      confidence,
      ruleSignals: [`stub suggests ${category}`],
      modelId: STUB_MODEL_ID,
    }),
    ...overrides,
  };
}

/** A model that always returns the same suggestion, with a call-counting spy. */
export function stubModel(
  category: SeverityCategory,
  confidence: number,
  overrides: Partial<AdvisorySuggestion> = {},
) {
  const suggest = vi.fn((_claim: ValidatedClaim) => stubSuggestion(category, confidence, overrides));
  const model: AdvisoryModel = { modelId: STUB_MODEL_ID, suggest };
  return { model, suggest };
}

/** Deterministic claim ids: claim-1, claim-2, ... */
export function sequentialIds(prefix = 'claim'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export const FIXED_CLOCK = () => new Date('2026-03-01T12:00:00.000Z');
