import { describe, it, expect, beforeAll } from 'vitest';
import {
  admissibleCategories,
  admits,
  categoryForScore,
  matchRules,
  nearestAdmissible,
  severityScore,
} from '@core/boundaries';
import type { BoundaryRule, PolicyPack } from '@core/policy-pack';
import { SCENARIO_INPUT, loadTestPolicy } from './fixtures';

function rule(category: BoundaryRule['category'], enforcement: BoundaryRule['enforcement']): BoundaryRule {
  return {
    ruleId: `T-${category}-${enforcement}`,
    when: { field: 'injury_involved', op: 'eq', value: true },
    category,
    enforcement,
    rationale: 'test',
  };
}

describe('admits', () => {
  it('applies minimum, maximum and exact bounds', () => {
    expect(admits(rule('Medium', 'minimum'), 'Low')).toBe(false);
    expect(admits(rule('Medium', 'minimum'), 'High')).toBe(true);
    expect(admits(rule('Medium', 'maximum'), 'High')).toBe(false);
    expect(admits(rule('Medium', 'maximum'), 'Medium')).toBe(true);
    expect(admits(rule('High', 'exact'), 'Medium')).toBe(false);
    expect(admits(rule('High', 'exact'), 'High')).toBe(true);
  });
});

describe('admissibleCategories', () => {
  const all = ['Low', 'Medium', 'High'] as const;

  it('returns every category when no rule matched', () => {
    expect(admissibleCategories(all, [])).toEqual(['Low', 'Medium', 'High']);
  });

  it('intersects the bounds of every rule', () => {
    expect(admissibleCategories(all, [rule('Medium', 'minimum'), rule('Medium', 'maximum')])).toEqual([
      'Medium',
    ]);
  });

  it('returns nothing for contradictory rules', () => {
    expect(admissibleCategories(all, [rule('High', 'minimum'), rule('Low', 'maximum')])).toEqual([]);
  });
});

describe('nearestAdmissible', () => {
  it('keeps an admissible category', () => {
    expect(nearestAdmissible('Medium', ['Medium', 'High'])).toBe('Medium');
  });

  it('moves to the closest admissible category', () => {
    expect(nearestAdmissible('Low', ['Medium', 'High'])).toBe('Medium');
    expect(nearestAdmissible('High', ['Low'])).toBe('Low');
  });

  it('breaks ties toward the more severe category', () => {
    expect(nearestAdmissible('Medium', ['Low', 'High'])).toBe('High');
  });

  it('returns null when nothing is admissible', () => {
    expect(nearestAdmissible('Low', [])).toBeNull();
  });
});

describe('with the shipped boundary spec', () => {
  let policy: PolicyPack;

  beforeAll(async () => {
    policy = await loadTestPolicy();
  });

  it('scores damage, risk, injury and claim type', () => {
    const s = severityScore(policy.boundaries, SCENARIO_INPUT);
    expect(s.damageFactor).toBe(15);
    expect(s.riskWeight).toBe(1.5);
    expect(s.injuryFactor).toBe(1.8);
    expect(s.claimTypeFactor).toBe(1);
    expect(s.score).toBeCloseTo(40.5, 10);
  });

  it('applies the liability multiplier', () => {
    const s = severityScore(policy.boundaries, {
      claim_type: 'Liability',
      damage_amount: 10000,
      injury_involved: false,
      risk_factor: 'low',
    });
    expect(s.score).toBeCloseTo(12, 10);
  });

  it('maps scores onto categories at the thresholds', () => {
    expect(categoryForScore(policy.boundaries, 4.99)).toBe('Low');
    expect(categoryForScore(policy.boundaries, 5)).toBe('Medium');
    expect(categoryForScore(policy.boundaries, 14.99)).toBe('Medium');
    expect(categoryForScore(policy.boundaries, 15)).toBe('High');
  });

  it('matches rules in declaration order', () => {
    expect(matchRules(policy.boundaries, SCENARIO_INPUT).map((r) => r.ruleId)).toEqual(['BND-INJ-001']);
    expect(
      matchRules(policy.boundaries, {
        claim_type: 'Liability',
        damage_amount: 75000,
        injury_involved: true,
        risk_factor: 'high',
      }).map((r) => r.ruleId),
    ).toEqual(['BND-INJ-001', 'BND-DMG-001', 'BND-LIA-001']);
    expect(
      matchRules(policy.boundaries, {
        claim_type: 'Property',
        damage_amount: 400,
        injury_involved: false,
        risk_factor: 'low',
      }).map((r) => r.ruleId),
    ).toEqual(['BND-LOW-001']);
  });
});
