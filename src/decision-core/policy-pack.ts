import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  ADVISORY_ACTIONS,
  CLAIM_TYPES,
  RISK_FACTORS,
  SEVERITY_CATEGORIES,
} from '@shared/constants';
import { CLAIM_INPUT_FIELDS, claimInputSchema } from './claim-input';
import type { ClaimType, RiskFactor, SeverityCategory } from './claim-input';
import { PolicyPackError, describeError } from './errors';
import { lockPolicy } from './immutable';
import { predicateFields, predicateSchema, type Predicate } from './predicates';

// --- Types ---

export interface PackMeta {
  readonly packId: string;
  readonly version: string;
  readonly description: string;
  readonly effectiveDate: string;
  readonly createdAt: string;
}

export type FieldType = 'enum' | 'number' | 'boolean';

export interface FieldCapability {
  readonly allowed: boolean;
  readonly type?: FieldType;
  readonly values?: readonly string[];
  readonly min?: number;
  readonly max?: number;
  readonly reason?: string;
}

export type AdvisoryAction = (typeof ADVISORY_ACTIONS)[number];

export interface ActionCapability {
  readonly allowed: boolean;
  readonly claimTypes?: readonly ClaimType[];
  readonly reason?: string;
}

export interface CapabilityDictionary {
  readonly dictionaryId: string;
  readonly version: string;
  readonly fields: Readonly<Record<string, FieldCapability>>;
  readonly actions: Readonly<Partial<Record<AdvisoryAction, ActionCapability>>>;
  readonly categories: readonly SeverityCategory[];
}

export type Enforcement = 'minimum' | 'maximum' | 'exact';

export interface BoundaryRule {
  readonly ruleId: string;
  readonly when: Predicate;
  readonly category: SeverityCategory;
  readonly enforcement: Enforcement;
  readonly rationale: string;
}

export interface DecisionBoundarySpec {
  readonly specId: string;
  readonly version: string;
  readonly damageThresholds: { readonly low: number; readonly medium: number; readonly high: number };
  readonly riskWeights: Readonly<Record<RiskFactor, number>>;
  readonly injuryMultiplier: number;
  readonly liabilityMultiplier: number;
  readonly severityThresholds: { readonly low: number; readonly medium: number };
  readonly rules: readonly BoundaryRule[];
}

export interface PolicyPack {
  readonly meta: PackMeta;
  readonly capabilities: CapabilityDictionary;
  readonly boundaries: DecisionBoundarySpec;
}

// --- Schemas ---

const packMetaSchema: z.ZodType<PackMeta> = z.object({
  packId: z.string().min(1),
  version: z.string().min(1),
  description: z.string(),
  effectiveDate: z.string().min(1),
  createdAt: z.string().min(1),
});

const fieldCapabilitySchema: z.ZodType<FieldCapability> = z
  .object({
    allowed: z.boolean(),
    type: z.enum(['enum', 'number', 'boolean']).optional(),
    values: z.array(z.string()).min(1).optional(),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
    reason: z.string().optional(),
  })
  .refine((f) => !f.allowed || f.type !== undefined, {
    message: 'allowed fields must declare a type',
  })
  .refine((f) => f.type !== 'enum' || f.values !== undefined, {
    message: 'enum fields must declare values',
  });

const actionCapabilitySchema: z.ZodType<ActionCapability> = z.object({
  allowed: z.boolean(),
  claimTypes: z.array(z.enum(CLAIM_TYPES)).optional(),
  reason: z.string().optional(),
});

const capabilityDictionarySchema: z.ZodType<CapabilityDictionary> = z.object({
  dictionaryId: z.string().min(1),
  version: z.string().min(1),
  fields: z.record(z.string(), fieldCapabilitySchema),
  actions: z.record(z.enum(ADVISORY_ACTIONS), actionCapabilitySchema),
  categories: z.array(z.enum(SEVERITY_CATEGORIES)).min(1),
});

const boundaryRuleSchema: z.ZodType<BoundaryRule> = z.object({
  ruleId: z.string().min(1),
  when: predicateSchema,
  category: z.enum(SEVERITY_CATEGORIES),
  enforcement: z.enum(['minimum', 'maximum', 'exact']),
  rationale: z.string().min(1),
});

const decisionBoundarySpecSchema: z.ZodType<DecisionBoundarySpec> = z.object({
  specId: z.string().min(1),
  version: z.string().min(1),
  damageThresholds: z.object({
    low: z.number().positive(),
    medium: z.number().positive(),
    high: z.number().positive(),
  }),
  riskWeights: z.object({
    low: z.number().positive(),
    medium: z.number().positive(),
    high: z.number().positive(),
  }),
  injuryMultiplier: z.number().positive(),
  liabilityMultiplier: z.number().positive(),
  severityThresholds: z.object({
    low: z.number().positive(),
    medium: z.number().positive(),
  }),
  rules: z.array(boundaryRuleSchema),
});

// --- Consistency checks ---

function checkConsistency(capabilities: CapabilityDictionary, boundaries: DecisionBoundarySpec): string[] {
  const problems: string[] = [];
  const allowedFields = Object.entries(capabilities.fields)
    .filter(([, spec]) => spec.allowed)
    .map(([name]) => name);

  for (const name of allowedFields) {
    if (!CLAIM_INPUT_FIELDS.includes(name)) {
      problems.push(`capabilities: allowed field '${name}' is not a claim input field`);
    }
  }
  for (const name of CLAIM_INPUT_FIELDS) {
    if (!allowedFields.includes(name)) {
      problems.push(`capabilities: claim input field '${name}' must be declared as allowed`);
    }
  }

  const enumFields: Record<string, readonly string[]> = {
    claim_type: claimInputSchema.shape.claim_type.options,
    risk_factor: claimInputSchema.shape.risk_factor.options,
  };
  for (const [name, known] of Object.entries(enumFields)) {
    const declared = capabilities.fields[name]?.values ?? [];
    const unknown = declared.filter((v) => !known.includes(v));
    if (unknown.length > 0) {
      problems.push(`capabilities: field '${name}' declares unsupported values ${unknown.join(', ')}`);
    }
  }

  const { damageThresholds: d, severityThresholds: s } = boundaries;
  if (!(d.low < d.medium && d.medium < d.high)) {
    problems.push('boundaries: damage thresholds must increase low < medium < high');
  }
  if (!(s.low < s.medium)) {
    problems.push('boundaries: severity thresholds must increase low < medium');
  }

  const seen = new Set<string>();
  for (const rule of boundaries.rules) {
    if (seen.has(rule.ruleId)) {
      problems.push(`boundaries: duplicate ruleId ${rule.ruleId}`);
    }
    seen.add(rule.ruleId);
    if (!capabilities.categories.includes(rule.category)) {
      problems.push(`boundaries: rule ${rule.ruleId} targets undeclared category ${rule.category}`);
    }
    for (const field of predicateFields(rule.when)) {
      if (!allowedFields.includes(field)) {
        problems.push(`boundaries: rule ${rule.ruleId} reads field '${field}' that is not an allowed input`);
      }
    }
  }

  return problems;
}

// --- Construction ---

function parseWith<T>(schema: z.ZodType<T>, raw: unknown, source: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PolicyPackError(`${source}: ${detail}`);
  }
  return result.data;
}

/**
 * Validate raw policy documents and return a read-only handle. Any later write
 * through the handle throws `PolicyMutationError`.
 */
export function createPolicyPack(raw: {
  meta: unknown;
  capabilities: unknown;
  boundaries: unknown;
}): PolicyPack {
  const meta = parseWith(packMetaSchema, raw.meta, 'pack.json');
  const capabilities = parseWith(capabilityDictionarySchema, raw.capabilities, 'capabilities.json');
  const boundaries = parseWith(decisionBoundarySpecSchema, raw.boundaries, 'boundaries.json');

  const problems = checkConsistency(capabilities, boundaries);
  if (problems.length > 0) {
    throw new PolicyPackError(`Inconsistent policy pack ${meta.packId}: ${problems.join('; ')}`);
  }

  return lockPolicy({ meta, capabilities, boundaries }, meta.packId);
}

// --- Loader ---

async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new PolicyPackError(`Cannot read ${filePath}: ${describeError(err)}`);
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new PolicyPackError(`Invalid JSON in ${filePath}: ${describeError(err)}`);
  }
}

export async function loadPolicyPack(packDir: string): Promise<PolicyPack> {
  const [meta, capabilities, boundaries] = await Promise.all([
    readJson(path.join(packDir, 'pack.json')),
    readJson(path.join(packDir, 'capabilities.json')),
    readJson(path.join(packDir, 'boundaries.json')),
  ]);

  return createPolicyPack({ meta, capabilities, boundaries });
}
