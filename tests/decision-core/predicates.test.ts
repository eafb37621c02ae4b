import { describe, it, expect } from 'vitest';
import type { ClaimInput } from '@core/claim-input';
import { evaluatePredicate, predicateFields, predicateSchema } from '@core/predicates';

const input: ClaimInput = {
  claim_type: 'Liability',
  damage_amount: 20000,
  injury_involved: true,
  risk_factor: 'high',
};

describe('evaluatePredicate', () => {
  it('compares scalars', () => {
    expect(evaluatePredicate({ field: 'claim_type', op: 'eq', value: 'Liability' }, input)).toBe(true);
    expect(evaluatePredicate({ field: 'claim_type', op: 'neq', value: 'Liability' }, input)).toBe(false);
    expect(evaluatePredicate({ field: 'injury_involved', op: 'eq', value: true }, input)).toBe(true);
  });

  it('compares numbers at the boundary', () => {
    expect(evaluatePredicate({ field: 'damage_amount', op: 'gte', value: 20000 }, input)).toBe(true);
    expect(evaluatePredicate({ field: 'damage_amount', op: 'gt', value: 20000 }, input)).toBe(false);
    expect(evaluatePredicate({ field: 'damage_amount', op: 'lt', value: 20000 }, input)).toBe(false);
    expect(evaluatePredicate({ field: 'damage_amount', op: 'lte', value: 20000 }, input)).toBe(true);
  });

  it('never orders non-numbers', () => {
    expect(evaluatePredicate({ field: 'risk_factor', op: 'gt', value: 1 }, input)).toBe(false);
  });

  it('matches membership', () => {
    expect(evaluatePredicate({ field: 'risk_factor', op: 'in', value: ['medium', 'high'] }, input)).toBe(true);
    expect(evaluatePredicate({ field: 'risk_factor', op: 'in', value: ['low'] }, input)).toBe(false);
  });

  it('combines with all and any', () => {
    const liabilityInjury = {
      all: [
        { field: 'claim_type', op: 'eq', value: 'Liability' },
        { field: 'injury_involved', op: 'eq', value: true },
      ],
    } as const;
    expect(evaluatePredicate(liabilityInjury, input)).toBe(true);
    expect(
      evaluatePredicate(
        {
          any: [
            { field: 'claim_type', op: 'eq', value: 'Auto' },
            { field: 'damage_amount', op: 'lt', value: 100 },
          ],
        },
        input,
      ),
    ).toBe(false);
  });

  it('treats an unknown field as absent', () => {
    expect(evaluatePredicate({ field: 'region', op: 'eq', value: 'north' }, input)).toBe(false);
  });
});

describe('predicateFields', () => {
  it('lists each field once in first-seen order', () => {
    expect(
      predicateFields({
        all: [
          { field: 'damage_amount', op: 'lt', value: 1000 },
          { any: [{ field: 'claim_type', op: 'eq', value: 'Auto' }, { field: 'damage_amount', op: 'gt', value: 0 }] },
        ],
      }),
    ).toEqual(['damage_amount', 'claim_type']);
  });
});

describe('predicateSchema', () => {
  it('accepts nested predicates', () => {
    const result = predicateSchema.safeParse({
      any: [{ field: 'risk_factor', op: 'in', value: ['high'] }, { all: [{ field: 'injury_involved', op: 'eq', value: true }] }],
    });
    expect(result.success).toBe(true);
  });

  it("requires an array for 'in' and a scalar elsewhere", () => {
    expect(predicateSchema.safeParse({ field: 'risk_factor', op: 'in', value: 'high' }).success).toBe(false);
    expect(predicateSchema.safeParse({ field: 'damage_amount', op: 'gt', value: [1] }).success).toBe(false);
  });

  it('rejects unknown operators and extra keys', () => {
    expect(predicateSchema.safeParse({ field: 'damage_amount', op: 'between', value: 1 }).success).toBe(false);
    expect(predicateSchema.safeParse({ field: 'damage_amount', op: 'gt', value: 1, note: 'x' }).success).toBe(false);
    expect(predicateSchema.safeParse({ all: [] }).success).toBe(false);
  });
});
