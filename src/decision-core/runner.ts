import { randomUUID } from 'crypto';
import type { ErrorCode } from '@shared/types';
import type { UncertaintyLevel } from './advisory';
import type { SeverityCategory } from './claim-input';
import { describeError } from './errors';
import type { DecisionEngine, HumanReviewer } from './engine';
import type { RejectionKind } from './human-gate';
import type { GeneratedClaim } from './scenarios/claims';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type ClaimOutcome = 'finalized' | 'rejected' | 'failed';

export interface ClaimRunResult {
  claimIndex: number;
  outcome: ClaimOutcome;
  claimId?: string;
  suggestedCategory?: SeverityCategory;
  confidence?: number;
  uncertaintyLevel?: UncertaintyLevel;
  /** True when a human confirmation reached the ledger. */
  humanReviewed: boolean;
  rejectionKind?: RejectionKind;
  errorCode?: ErrorCode;
  reasons: string[];
  auditChain: number[];
}

export interface BatchResult {
  batchId: string;
  totalClaims: number;
  results: ClaimRunResult[];
  errors: { claimIndex: number; error: string }[];
}

// ---------------------------------------------------------------------------
// Single claim
// ---------------------------------------------------------------------------

async function runSingleClaim(
  engine: DecisionEngine,
  claim: GeneratedClaim,
  reviewer: HumanReviewer,
): Promise<ClaimRunResult> {
  const result = await engine.makeDecision(claim.input, reviewer);

  if (!result.ok) {
    return {
      claimIndex: claim.claimIndex,
      outcome: 'failed',
      humanReviewed: false,
      errorCode: result.error.code,
      reasons: [...result.error.reasons],
      auditChain: [],
    };
  }

  const decision = result.value;
  const common = {
    claimIndex: claim.claimIndex,
    claimId: decision.claimId,
    suggestedCategory: decision.suggestion.category,
    confidence: decision.suggestion.confidence,
    uncertaintyLevel: decision.suggestion.uncertainty.level,
    auditChain: [...decision.auditChain],
  };

  if (decision.status === 'FINALIZED') {
    return { ...common, outcome: 'finalized', humanReviewed: true, reasons: [] };
  }

  return {
    ...common,
    outcome: 'rejected',
    humanReviewed: decision.kind === 'human',
    rejectionKind: decision.kind,
    reasons: [...decision.reasons],
  };
}

// ---------------------------------------------------------------------------
// Public entry point
// ---------------------------------------------------------------------------

/** Run every claim through the engine concurrently. */
export async function runClaimBatch(
  engine: DecisionEngine,
  claims: readonly GeneratedClaim[],
  reviewer: HumanReviewer,
): Promise<BatchResult> {
  const batchId = randomUUID();
  const results: ClaimRunResult[] = [];
  const errors: { claimIndex: number; error: string }[] = [];

  const settled = await Promise.allSettled(
    claims.map((claim) => runSingleClaim(engine, claim, reviewer)),
  );

  settled.forEach((outcome, i) => {
    if (outcome.status === 'fulfilled') {
      results.push(outcome.value);
    } else {
      errors.push({ claimIndex: claims[i].claimIndex, error: describeError(outcome.reason) });
    }
  });

  return {
    batchId,
    totalClaims: claims.length,
    results,
    errors,
  };
}
