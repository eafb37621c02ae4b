import { PIPELINE_STATES } from '@shared/constants';
import type { AuditStage } from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PipelineState = (typeof PIPELINE_STATES)[number];

export interface TransitionSuccess {
  ok: true;
  newState: PipelineState;
  /** False only for PENDING_HUMAN, which is implied by the ADVISED record. */
  audited: boolean;
}

export interface TransitionFailure {
  ok: false;
  error: string;
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

export const TRANSITION_TABLE: Record<PipelineState, readonly PipelineState[]> = {
  RECEIVED: ['VALIDATED', 'REJECTED'],
  VALIDATED: ['GOVERNED', 'REJECTED'],
  GOVERNED: ['ADVISED', 'REJECTED'],
  ADVISED: ['PENDING_HUMAN', 'REJECTED'],
  PENDING_HUMAN: ['HUMAN_CONFIRMED', 'REJECTED'],
  HUMAN_CONFIRMED: ['FINALIZED', 'REJECTED'],
  FINALIZED: [],
  REJECTED: [],
};

/** The only order in which audit stages may appear for a claim. */
export const CANONICAL_CHAIN: readonly AuditStage[] = [
  'RECEIVED',
  'VALIDATED',
  'GOVERNED',
  'ADVISED',
  'HUMAN_CONFIRMED',
  'FINALIZED',
];

export function isTerminal(state: PipelineState): boolean {
  return TRANSITION_TABLE[state].length === 0;
}

/**
 * Pure reducer over pipeline states. `null` is the state before RECEIVED has
 * been recorded.
 */
export function transition(current: PipelineState | null, next: PipelineState): TransitionResult {
  if (current === null) {
    return next === 'RECEIVED'
      ? { ok: true, newState: next, audited: true }
      : { ok: false, error: `A claim must enter the pipeline at RECEIVED, not ${next}` };
  }

  if (!TRANSITION_TABLE[current].includes(next)) {
    return {
      ok: false,
      error: isTerminal(current)
        ? `State ${current} is terminal`
        : `Cannot move from ${current} to ${next}`,
    };
  }

  return { ok: true, newState: next, audited: next !== 'PENDING_HUMAN' };
}

// ---------------------------------------------------------------------------
// Chain validation
// ---------------------------------------------------------------------------

export interface ChainCheck {
  valid: boolean;
  error?: string;
}

/**
 * A chain is valid when sequence numbers strictly increase and the stages are
 * a gap-free prefix of CANONICAL_CHAIN, optionally closed by one REJECTED
 * record after a non-empty prefix.
 */
export function checkChain(
  records: readonly { sequenceNumber: number; stage: AuditStage }[],
): ChainCheck {
  for (let i = 0; i < records.length; i++) {
    const { sequenceNumber, stage } = records[i];

    if (i > 0 && sequenceNumber <= records[i - 1].sequenceNumber) {
      return {
        valid: false,
        error: `Sequence ${sequenceNumber} does not follow ${records[i - 1].sequenceNumber}`,
      };
    }

    const isLast = i === records.length - 1;
    if (stage === CANONICAL_CHAIN[i]) {
      if (stage === 'FINALIZED' && !isLast) {
        return { valid: false, error: 'Records follow FINALIZED' };
      }
      continue;
    }
    if (stage === 'REJECTED' && i > 0) {
      if (!isLast) {
        return { valid: false, error: 'Records follow REJECTED' };
      }
      continue;
    }
    return {
      valid: false,
      error: `Stage ${stage} at position ${i} breaks the canonical order`,
    };
  }
  return { valid: true };
}
