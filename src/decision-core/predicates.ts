// JSON predicates over a claim input, used by decision boundary rules.
//
//   { "field": "damage_amount", "op": "gte", "value": 50000 }
//   { "all": [ ... ] }   { "any": [ ... ] }

import { z } from 'zod';
import type { ClaimInput } from './claim-input';

export type Scalar = string | number | boolean;

export type ComparisonOp = 'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte' | 'in';

export interface Comparison {
  readonly field: string;
  readonly op: ComparisonOp;
  readonly value: Scalar | readonly Scalar[];
}

export type Predicate =
  | Comparison
  | { readonly all: readonly Predicate[] }
  | { readonly any: readonly Predicate[] };

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const comparisonSchema: z.ZodType<Comparison> = z
  .object({
    field: z.string().min(1),
    op: z.enum(['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in']),
    value: z.union([scalarSchema, z.array(scalarSchema)]),
  })
  .strict()
  .refine((c) => (c.op === 'in') === Array.isArray(c.value), {
    message: "'in' takes an array value; every other operator takes a scalar",
  });

export const predicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    comparisonSchema,
    z.object({ all: z.array(predicateSchema).min(1) }).strict(),
    z.object({ any: z.array(predicateSchema).min(1) }).strict(),
  ]),
);

function compare(actual: unknown, op: ComparisonOp, expected: Scalar | readonly Scalar[]): boolean {
  switch (op) {
    case 'eq':
      return actual === expected;
    case 'neq':
      return actual !== expected;
    case 'in':
      return Array.isArray(expected) && expected.some((candidate) => candidate === actual);
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      if (typeof actual !== 'number' || typeof expected !== 'number') return false;
      if (op === 'gt') return actual > expected;
      if (op === 'gte') return actual >= expected;
      if (op === 'lt') return actual < expected;
      return actual <= expected;
    }
  }
}

export function evaluatePredicate(predicate: Predicate, input: ClaimInput): boolean {
  if ('all' in predicate) {
    return predicate.all.every((p) => evaluatePredicate(p, input));
  }
  if ('any' in predicate) {
    return predicate.any.some((p) => evaluatePredicate(p, input));
  }
  const fields: Readonly<Record<string, unknown>> = input;
  return compare(fields[predicate.field], predicate.op, predicate.value);
}

/** Every field name a predicate reads, in first-seen order. */
export function predicateFields(predicate: Predicate): string[] {
  if ('all' in predicate) return unique(predicate.all.flatMap(predicateFields));
  if ('any' in predicate) return unique(predicate.any.flatMap(predicateFields));
  return [predicate.field];
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
