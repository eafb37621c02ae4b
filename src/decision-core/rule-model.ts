// Deterministic rule-table advisory model driven entirely by the frozen
// decision boundary spec.

import { SEVERITY_CATEGORIES } from '@shared/constants';
import { buildSuggestion, type AdvisoryModel, type AdvisorySuggestion, type FeatureContribution } from './advisory';
import {
  admissibleCategories,
  categoryForScore,
  matchRules,
  nearestAdmissible,
  severityScore,
} from './boundaries';
import type { ClaimInput } from './claim-input';
import type { ValidatedClaim } from './governance';
import type { DecisionBoundarySpec } from './policy-pack';

const usd = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });
const whole = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

function dollars(threshold: number): string {
  return `$${whole.format(threshold)}`;
}

export function damageSignal(spec: DecisionBoundarySpec, amount: number): string {
  const { low, medium, high } = spec.damageThresholds;
  const value = usd.format(amount);
  if (amount < low) return `Low damage (< ${dollars(low)}): ${value}`;
  if (amount < medium) return `Medium damage (${dollars(low)}-${dollars(medium)}): ${value}`;
  if (amount < high) return `High damage (${dollars(medium)}-${dollars(high)}): ${value}`;
  return `Very high damage (>= ${dollars(high)}): ${value}`;
}

export function inputSignals(spec: DecisionBoundarySpec, input: ClaimInput): string[] {
  const signals = [damageSignal(spec, input.damage_amount)];

  signals.push(
    input.injury_involved
      ? `Injury involved (multiplier: ${spec.injuryMultiplier}x)`
      : 'No injury involved',
  );

  const weight = spec.riskWeights[input.risk_factor];
  const label = input.risk_factor.charAt(0).toUpperCase() + input.risk_factor.slice(1);
  signals.push(`${label} risk factor (weight: ${weight}x)`);

  signals.push(
    input.claim_type === 'Liability'
      ? `Liability claim (multiplier: ${spec.liabilityMultiplier}x)`
      : `Claim type: ${input.claim_type}`,
  );

  return signals;
}

export class RuleBasedAdvisoryModel implements AdvisoryModel {
  readonly modelId: string;

  constructor(private readonly spec: DecisionBoundarySpec) {
    this.modelId = `rule-table/${spec.specId}@${spec.version}`;
  }

  suggest(claim: ValidatedClaim): AdvisorySuggestion {
    const { input } = claim;
    const { score, damageFactor, riskWeight, injuryFactor, claimTypeFactor } = severityScore(
      this.spec,
      input,
    );

    const scored = categoryForScore(this.spec, score);
    const matched = matchRules(this.spec, input);
    const admissible = admissibleCategories(SEVERITY_CATEGORIES, matched);
    const category = nearestAdmissible(scored, admissible);
    if (category === null) {
      throw new Error(
        `Boundary rules ${matched.map((r) => r.ruleId).join(', ')} leave no admissible category`,
      );
    }

    const signals = inputSignals(this.spec, input);
    signals.push(`Severity score: ${score.toFixed(2)} (${scored})`);
    for (const rule of matched) {
      signals.push(`Boundary ${rule.ruleId}: ${rule.rationale}`);
    }

    // A category forced by a boundary rule carries no score-based confidence.
    let confidence = 0.5;
    if (category === scored) {
      const { low, medium } = this.spec.severityThresholds;
      const margin = Math.min(Math.abs(score - low), Math.abs(score - medium));
      confidence = Math.round((0.5 + 0.45 * Math.min(1, margin / low)) * 10_000) / 10_000;
    } else {
      signals.push(`Category moved from ${scored} to ${category} by boundary rules`);
    }

    const contributions: FeatureContribution[] = [
      { feature: 'damage_amount', value: input.damage_amount, factor: damageFactor },
      { feature: 'risk_factor', value: input.risk_factor, factor: riskWeight },
      { feature: 'injury_involved', value: input.injury_involved, factor: injuryFactor },
      { feature: 'claim_type', value: input.claim_type, factor: claimTypeFactor },
    ].sort((a, b) => b.factor - a.factor);

    return buildSuggestion({
      category,
      confidence,
      ruleSignals: signals,
      modelId: this.modelId,
      contributions,
    });
  }
}
