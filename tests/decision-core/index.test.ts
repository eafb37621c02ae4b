import { describe, it, expect } from 'vitest';
import * as core from '@core/index';

describe('decision-core entry point', () => {
  it('exposes the engine and its collaborators', () => {
    expect(core.DecisionEngine).toBeTypeOf('function');
    expect(core.GovernanceValidator).toBeTypeOf('function');
    expect(core.HumanGate).toBeTypeOf('function');
    expect(core.InMemoryAuditLedger).toBeTypeOf('function');
    expect(core.FileAuditLedger).toBeTypeOf('function');
    expect(core.RuleBasedAdvisoryModel).toBeTypeOf('function');
    expect(core.lockPolicy).toBeTypeOf('function');
    expect(core.withTimeout).toBeTypeOf('function');
    expect(core.runClaimBatch).toBeTypeOf('function');
  });
});
