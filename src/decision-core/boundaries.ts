import { severityRank } from './claim-input';
import type { ClaimInput, SeverityCategory } from './claim-input';
import type { BoundaryRule, DecisionBoundarySpec } from './policy-pack';
import { evaluatePredicate } from './predicates';

/** Rules whose predicate holds for `input`, in declaration order. */
export function matchRules(spec: DecisionBoundarySpec, input: ClaimInput): BoundaryRule[] {
  return spec.rules.filter((rule) => evaluatePredicate(rule.when, input));
}

export function admits(rule: BoundaryRule, category: SeverityCategory): boolean {
  const bound = severityRank(rule.category);
  const rank = severityRank(category);
  switch (rule.enforcement) {
    case 'minimum':
      return rank >= bound;
    case 'maximum':
      return rank <= bound;
    case 'exact':
      return rank === bound;
  }
}

/**
 * Categories left after intersecting the bounds of every matched rule. An
 * empty result means the boundary spec contradicts itself for this input.
 */
export function admissibleCategories(
  categories: readonly SeverityCategory[],
  rules: readonly BoundaryRule[],
): SeverityCategory[] {
  return categories.filter((category) => rules.every((rule) => admits(rule, category)));
}

/**
 * Move `category` to the nearest admissible one. Ties go to the more severe
 * category.
 */
export function nearestAdmissible(
  category: SeverityCategory,
  admissible: readonly SeverityCategory[],
): SeverityCategory | null {
  if (admissible.includes(category)) return category;
  let best: SeverityCategory | null = null;
  let bestDistance = Infinity;
  for (const candidate of admissible) {
    const distance = Math.abs(severityRank(candidate) - severityRank(category));
    if (
      distance < bestDistance ||
      (distance === bestDistance && best !== null && severityRank(candidate) > severityRank(best))
    ) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

// ---------------------------------------------------------------------------
// Severity score
// ---------------------------------------------------------------------------

export interface SeverityScore {
  score: number;
  damageFactor: number;
  riskWeight: number;
  injuryFactor: number;
  claimTypeFactor: number;
}

export function severityScore(spec: DecisionBoundarySpec, input: ClaimInput): SeverityScore {
  const damageFactor = input.damage_amount / 1000;
  const riskWeight = spec.riskWeights[input.risk_factor];
  const injuryFactor = input.injury_involved ? spec.injuryMultiplier : 1;
  const claimTypeFactor = input.claim_type === 'Liability' ? spec.liabilityMultiplier : 1;
  return {
    score: damageFactor * riskWeight * injuryFactor * claimTypeFactor,
    damageFactor,
    riskWeight,
    injuryFactor,
    claimTypeFactor,
  };
}

export function categoryForScore(spec: DecisionBoundarySpec, score: number): SeverityCategory {
  if (score < spec.severityThresholds.low) return 'Low';
  if (score < spec.severityThresholds.medium) return 'Medium';
  return 'High';
}
