import { z } from 'zod';
import { ADVISORY_ACTIONS, GOVERNANCE_STATUS, SEVERITY_CATEGORIES } from '@shared/constants';
import type { SeverityCategory } from './claim-input';
import type { ValidatedClaim } from './governance';
import type { AdvisoryAction } from './policy-pack';

// ---------------------------------------------------------------------------
// Suggestion shape
// ---------------------------------------------------------------------------

export type UncertaintyLevel = 'Low' | 'Medium' | 'High';

export interface UncertaintyAssessment {
  readonly level: UncertaintyLevel;
  readonly entropy: number;
  readonly normalizedEntropy: number;
  readonly interpretation: string;
  readonly distribution: Readonly<Record<SeverityCategory, number>>;
}

export interface FeatureContribution {
  readonly feature: string;
  readonly value: string | number | boolean;
  readonly factor: number;
}

/**
 * A non-binding recommendation. `governanceStatus` is always ADVISORY_ONLY;
 * a suggestion carrying anything else is refused before it reaches a human.
 */
export interface AdvisorySuggestion {
  readonly category: SeverityCategory;
  readonly confidence: number;
  readonly action: AdvisoryAction;
  readonly ruleSignals: readonly string[];
  readonly uncertainty: UncertaintyAssessment;
  readonly contributions: readonly FeatureContribution[];
  readonly governanceStatus: typeof GOVERNANCE_STATUS;
  readonly modelId: string;
}

/**
 * External advisory capability. Implementations must be deterministic for
 * identical input and must signal failure by throwing, never by guessing.
 */
export interface AdvisoryModel {
  readonly modelId: string;
  suggest(claim: ValidatedClaim): AdvisorySuggestion | Promise<AdvisorySuggestion>;
}

const distributionSchema = z.object({
  Low: z.number(),
  Medium: z.number(),
  High: z.number(),
});

/**
 * Structural check on whatever a model returned. Policy checks (confidence
 * range, admissible category, allowed action) happen in governance.
 */
export const advisorySuggestionSchema = z.object({
  category: z.string(),
  confidence: z.number(),
  action: z.string(),
  ruleSignals: z.array(z.string()),
  uncertainty: z.object({
    level: z.enum(['Low', 'Medium', 'High']),
    entropy: z.number(),
    normalizedEntropy: z.number(),
    interpretation: z.string(),
    distribution: distributionSchema,
  }),
  contributions: z.array(
    z.object({
      feature: z.string(),
      value: z.union([z.string(), z.number(), z.boolean()]),
      factor: z.number(),
    }),
  ),
  governanceStatus: z.string(),
  modelId: z.string().min(1),
});

export type RawSuggestion = z.infer<typeof advisorySuggestionSchema>;

export function isSeverityCategory(value: string): value is SeverityCategory {
  return SEVERITY_CATEGORIES.some((c) => c === value);
}

export function isAdvisoryAction(value: string): value is AdvisoryAction {
  return ADVISORY_ACTIONS.some((a) => a === value);
}

// ---------------------------------------------------------------------------
// Uncertainty
// ---------------------------------------------------------------------------

const EPSILON = 1e-10;

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/** Winner takes `confidence`; the remainder is split evenly. */
export function distributionFor(
  category: SeverityCategory,
  confidence: number,
): Record<SeverityCategory, number> {
  const p = Math.min(1, Math.max(0, confidence));
  const rest = (1 - p) / (SEVERITY_CATEGORIES.length - 1);
  return {
    Low: category === 'Low' ? p : rest,
    Medium: category === 'Medium' ? p : rest,
    High: category === 'High' ? p : rest,
  };
}

export function assessUncertainty(
  distribution: Record<SeverityCategory, number>,
): UncertaintyAssessment {
  const probabilities = SEVERITY_CATEGORIES.map((c) => Math.min(1, Math.max(0, distribution[c])));
  const entropy = Math.max(
    0,
    -probabilities.reduce((sum, p) => sum + p * Math.log(p + EPSILON), 0),
  );
  const normalizedEntropy = entropy / Math.log(SEVERITY_CATEGORIES.length);

  let level: UncertaintyLevel;
  let interpretation: string;
  if (normalizedEntropy < 0.3) {
    level = 'Low';
    interpretation = 'Model is confident in this suggestion';
  } else if (normalizedEntropy < 0.6) {
    level = 'Medium';
    interpretation = 'Moderate uncertainty; extra human scrutiny recommended';
  } else {
    level = 'High';
    interpretation = 'Model is uncertain; requires careful human review';
  }

  return {
    level,
    entropy: round4(entropy),
    normalizedEntropy: round4(normalizedEntropy),
    interpretation,
    distribution: {
      Low: round4(distribution.Low),
      Medium: round4(distribution.Medium),
      High: round4(distribution.High),
    },
  };
}

export interface SuggestionParts {
  category: SeverityCategory;
  confidence: number;
  ruleSignals: readonly string[];
  modelId: string;
  action?: AdvisoryAction;
  contributions?: readonly FeatureContribution[];
  distribution?: Record<SeverityCategory, number>;
}

/** Assemble a suggestion, deriving uncertainty from the confidence. */
export function buildSuggestion(parts: SuggestionParts): AdvisorySuggestion {
  const distribution = parts.distribution ?? distributionFor(parts.category, parts.confidence);
  return {
    category: parts.category,
    confidence: parts.confidence,
    action: parts.action ?? 'suggest_severity',
    ruleSignals: [...parts.ruleSignals],
    uncertainty: assessUncertainty(distribution),
    contributions: [...(parts.contributions ?? [])],
    governanceStatus: GOVERNANCE_STATUS,
    modelId: parts.modelId,
  };
}
