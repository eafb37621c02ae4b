import { describe, it, expect, beforeAll } from 'vitest';
import capabilities from '../../policy-packs/claims-advisory-v1/capabilities.json';
import boundaries from '../../policy-packs/claims-advisory-v1/boundaries.json';
import meta from '../../policy-packs/claims-advisory-v1/pack.json';
import { PolicyPackError } from '@core/errors';
import { PolicyMutationError } from '@core/immutable';
import { createPolicyPack, loadPolicyPack, type PolicyPack } from '@core/policy-pack';
import { loadTestPolicy } from './fixtures';

describe('loadPolicyPack', () => {
  let policy: PolicyPack;

  beforeAll(async () => {
    policy = await loadTestPolicy();
  });

  it('loads metadata, capabilities and boundaries', () => {
    expect(policy.meta.packId).toBe('claims-advisory-v1');
    expect(policy.meta.version).toBe('1.0.0');
    expect(policy.capabilities.categories).toEqual(['Low', 'Medium', 'High']);
    expect(policy.boundaries.rules.map((r) => r.ruleId)).toEqual([
      'BND-INJ-001',
      'BND-DMG-001',
      'BND-LIA-001',
      'BND-LOW-001',
      'BND-HLT-001',
    ]);
  });

  it('carries the frozen thresholds', () => {
    expect(policy.boundaries.damageThresholds).toEqual({ low: 5000, medium: 15000, high: 50000 });
    expect(policy.boundaries.riskWeights).toEqual({ low: 1, medium: 1.5, high: 2 });
    expect(policy.boundaries.injuryMultiplier).toBe(1.8);
    expect(policy.boundaries.severityThresholds).toEqual({ low: 5, medium: 15 });
  });

  it('declares protected attributes as disallowed fields', () => {
    expect(policy.capabilities.fields.claimant_age?.allowed).toBe(false);
    expect(policy.capabilities.actions.auto_approve?.allowed).toBe(false);
    expect(policy.capabilities.actions.suggest_severity?.allowed).toBe(true);
  });

  it('rejects assignment at any depth', () => {
    expect(() => Reflect.set(policy.boundaries.severityThresholds, 'low', 1)).toThrow(
      PolicyMutationError,
    );
    expect(() => Reflect.set(policy.meta, 'version', '9.9.9')).toThrow(
      'Policy is read-only: cannot assign claims-advisory-v1.meta.version',
    );
    expect(policy.boundaries.severityThresholds.low).toBe(5);
    expect(policy.meta.version).toBe('1.0.0');
  });

  it('rejects deletion and array mutation', () => {
    expect(() => Reflect.deleteProperty(policy.capabilities.fields, 'claim_type')).toThrow(
      PolicyMutationError,
    );
    expect(() =>
      Reflect.apply(Array.prototype.push, policy.boundaries.rules, [{ ruleId: 'X' }]),
    ).toThrow(PolicyMutationError);
    expect(policy.boundaries.rules).toHaveLength(5);
  });

  it('rejects freezing, which would otherwise detach the handle', () => {
    expect(() => Object.freeze(policy.capabilities)).toThrow(PolicyMutationError);
  });

  it('returns the same guarded view for repeated reads', () => {
    expect(policy.boundaries.rules).toBe(policy.boundaries.rules);
  });

  it('fails with PolicyPackError for a missing directory', async () => {
    await expect(loadPolicyPack('/nonexistent/policy-pack')).rejects.toThrow(PolicyPackError);
  });
});

describe('createPolicyPack', () => {
  function documents() {
    return {
      meta: structuredClone(meta),
      capabilities: structuredClone(capabilities),
      boundaries: structuredClone(boundaries),
    };
  }

  it('accepts the shipped documents', () => {
    expect(createPolicyPack(documents()).meta.packId).toBe('claims-advisory-v1');
  });

  it('rejects duplicate rule ids', () => {
    const docs = documents();
    docs.boundaries.rules.push(structuredClone(docs.boundaries.rules[0]));
    expect(() => createPolicyPack(docs)).toThrow('duplicate ruleId BND-INJ-001');
  });

  it('rejects an allowed field that is not a claim input', () => {
    const docs = documents();
    const fields = { ...docs.capabilities.fields, region: { allowed: true, type: 'number' } };
    expect(() =>
      createPolicyPack({ ...docs, capabilities: { ...docs.capabilities, fields } }),
    ).toThrow("capabilities: allowed field 'region' is not a claim input field");
  });

  it('rejects thresholds that do not increase', () => {
    const docs = documents();
    docs.boundaries.severityThresholds = { low: 15, medium: 5 };
    expect(() => createPolicyPack(docs)).toThrow(
      'boundaries: severity thresholds must increase low < medium',
    );
  });

  it('rejects a rule that reads a disallowed field', () => {
    const docs = documents();
    const rule = {
      ruleId: 'BND-AGE-001',
      when: { field: 'claimant_age', op: 'gte', value: 70 },
      category: 'High',
      enforcement: 'minimum',
      rationale: 'not permitted',
    };
    expect(() =>
      createPolicyPack({
        ...docs,
        boundaries: { ...docs.boundaries, rules: [...docs.boundaries.rules, rule] },
      }),
    ).toThrow("boundaries: rule BND-AGE-001 reads field 'claimant_age' that is not an allowed input");
  });

  it('reports schema errors with the file they came from', () => {
    const docs = documents();
    expect(() =>
      createPolicyPack({ ...docs, boundaries: { ...docs.boundaries, injuryMultiplier: -1 } }),
    ).toThrow(/^boundaries\.json: injuryMultiplier:/);
  });
});
