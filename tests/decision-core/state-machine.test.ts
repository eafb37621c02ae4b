import { describe, it, expect } from 'vitest';
import { PIPELINE_STATES } from '@shared/constants';
import type { AuditStage } from '@shared/types';
import {
  CANONICAL_CHAIN,
  TRANSITION_TABLE,
  checkChain,
  isTerminal,
  transition,
} from '@core/state-machine';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function chain(...stages: AuditStage[]) {
  return stages.map((stage, i) => ({ sequenceNumber: (i + 1) * 10, stage }));
}

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

describe('TRANSITION_TABLE', () => {
  it('covers every pipeline state', () => {
    expect(Object.keys(TRANSITION_TABLE).sort()).toEqual([...PIPELINE_STATES].sort());
  });

  it('lets every non-terminal state halt into REJECTED', () => {
    for (const state of PIPELINE_STATES) {
      if (isTerminal(state)) continue;
      expect(TRANSITION_TABLE[state]).toContain('REJECTED');
    }
  });

  it('treats FINALIZED and REJECTED as terminal', () => {
    expect(isTerminal('FINALIZED')).toBe(true);
    expect(isTerminal('REJECTED')).toBe(true);
    expect(isTerminal('PENDING_HUMAN')).toBe(false);
  });
});

describe('transition', () => {
  it('enters only at RECEIVED', () => {
    expect(transition(null, 'RECEIVED')).toEqual({ ok: true, newState: 'RECEIVED', audited: true });
    expect(transition(null, 'VALIDATED')).toEqual({
      ok: false,
      error: 'A claim must enter the pipeline at RECEIVED, not VALIDATED',
    });
  });

  it('walks the happy path', () => {
    let state = transition(null, 'RECEIVED');
    for (const next of ['VALIDATED', 'GOVERNED', 'ADVISED', 'PENDING_HUMAN', 'HUMAN_CONFIRMED', 'FINALIZED'] as const) {
      if (!state.ok) throw new Error(state.error);
      state = transition(state.newState, next);
    }
    expect(state).toEqual({ ok: true, newState: 'FINALIZED', audited: true });
  });

  it('does not audit PENDING_HUMAN', () => {
    expect(transition('ADVISED', 'PENDING_HUMAN')).toEqual({
      ok: true,
      newState: 'PENDING_HUMAN',
      audited: false,
    });
  });

  it('refuses to skip the human', () => {
    expect(transition('ADVISED', 'FINALIZED')).toEqual({
      ok: false,
      error: 'Cannot move from ADVISED to FINALIZED',
    });
    expect(transition('PENDING_HUMAN', 'FINALIZED').ok).toBe(false);
  });

  it('refuses to leave a terminal state', () => {
    expect(transition('FINALIZED', 'REJECTED')).toEqual({ ok: false, error: 'State FINALIZED is terminal' });
    expect(transition('REJECTED', 'RECEIVED')).toEqual({ ok: false, error: 'State REJECTED is terminal' });
  });
});

// ---------------------------------------------------------------------------
// Chain validation
// ---------------------------------------------------------------------------

describe('checkChain', () => {
  it('accepts the full canonical chain', () => {
    expect(checkChain(chain(...CANONICAL_CHAIN))).toEqual({ valid: true });
  });

  it('accepts every prefix, including the empty one', () => {
    for (let i = 0; i <= CANONICAL_CHAIN.length; i++) {
      expect(checkChain(chain(...CANONICAL_CHAIN.slice(0, i))).valid).toBe(true);
    }
  });

  it('accepts REJECTED after a non-empty prefix', () => {
    expect(checkChain(chain('RECEIVED', 'REJECTED')).valid).toBe(true);
    expect(checkChain(chain('RECEIVED', 'VALIDATED', 'GOVERNED', 'ADVISED', 'HUMAN_CONFIRMED', 'REJECTED')).valid).toBe(true);
  });

  it('refuses REJECTED as the first record', () => {
    expect(checkChain(chain('REJECTED'))).toEqual({
      valid: false,
      error: 'Stage REJECTED at position 0 breaks the canonical order',
    });
  });

  it('refuses gaps and reordering', () => {
    expect(checkChain(chain('RECEIVED', 'GOVERNED')).valid).toBe(false);
    expect(checkChain(chain('RECEIVED', 'VALIDATED', 'ADVISED', 'GOVERNED')).valid).toBe(false);
  });

  it('refuses records after a terminal record', () => {
    expect(checkChain(chain('RECEIVED', 'REJECTED', 'VALIDATED'))).toEqual({
      valid: false,
      error: 'Records follow REJECTED',
    });
  });

  it('refuses sequence numbers that do not increase', () => {
    expect(
      checkChain([
        { sequenceNumber: 4, stage: 'RECEIVED' },
        { sequenceNumber: 4, stage: 'VALIDATED' },
      ]),
    ).toEqual({ valid: false, error: 'Sequence 4 does not follow 4' });
  });
});
