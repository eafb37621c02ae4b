import type { UncertaintyLevel } from './advisory';
import type { SeverityCategory } from './claim-input';
import type { BatchResult } from './runner';

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export const CONFIDENCE_BINS = [
  { label: '0.0-0.5', lower: 0, upper: 0.5 },
  { label: '0.5-0.7', lower: 0.5, upper: 0.7 },
  { label: '0.7-0.8', lower: 0.7, upper: 0.8 },
  { label: '0.8-0.9', lower: 0.8, upper: 0.9 },
  { label: '0.9-1.0', lower: 0.9, upper: 1 },
] as const;

export type ConfidenceBin = (typeof CONFIDENCE_BINS)[number]['label'];

export interface ConfidenceStats {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
  /** Population standard deviation. */
  std: number;
  /** Lower bound inclusive, upper exclusive; the last bin includes 1.0. */
  bins: Record<ConfidenceBin, number>;
}

export interface BatchSummary {
  totalClaims: number;
  byOutcome: { finalized: number; rejected: number; failed: number };
  bySuggestedCategory: Record<SeverityCategory, number>;
  errorsByCode: Record<string, number>;
  averageConfidence: number;
  confidence: ConfidenceStats;
  uncertaintyLevels: Record<UncertaintyLevel, number>;
  humanReviewed: number;
  /** Finalized claims as a share of claims a human actually reviewed. */
  humanAgreementRate: number;
  errors: { claimIndex: number; error: string }[];
}

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

function binFor(value: number): ConfidenceBin | null {
  const last = CONFIDENCE_BINS.length - 1;
  for (let i = 0; i <= last; i++) {
    const { label, lower, upper } = CONFIDENCE_BINS[i];
    if (value >= lower && (value < upper || (i === last && value === upper))) return label;
  }
  return null;
}

export function computeConfidenceStats(values: readonly number[]): ConfidenceStats {
  const bins: Record<ConfidenceBin, number> = {
    '0.0-0.5': 0,
    '0.5-0.7': 0,
    '0.7-0.8': 0,
    '0.8-0.9': 0,
    '0.9-1.0': 0,
  };
  if (values.length === 0) {
    return { count: 0, mean: 0, median: 0, min: 0, max: 0, std: 0, bins };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  const mean = sorted.reduce((sum, v) => sum + v, 0) / n;
  const mid = Math.floor(n / 2);
  const median = n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  const variance = sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / n;

  for (const value of sorted) {
    const bin = binFor(value);
    if (bin) bins[bin] += 1;
  }

  return {
    count: n,
    mean,
    median,
    min: sorted[0],
    max: sorted[n - 1],
    std: Math.sqrt(variance),
    bins,
  };
}

export function computeBatchSummary(result: BatchResult): BatchSummary {
  const byOutcome = { finalized: 0, rejected: 0, failed: 0 };
  const bySuggestedCategory: Record<SeverityCategory, number> = { Low: 0, Medium: 0, High: 0 };
  const uncertaintyLevels: Record<UncertaintyLevel, number> = { Low: 0, Medium: 0, High: 0 };
  const errorsByCode: Record<string, number> = {};

  let humanReviewed = 0;
  const confidences: number[] = [];

  for (const cr of result.results) {
    byOutcome[cr.outcome] += 1;

    if (cr.errorCode) {
      errorsByCode[cr.errorCode] = (errorsByCode[cr.errorCode] ?? 0) + 1;
    }

    if (cr.suggestedCategory) {
      bySuggestedCategory[cr.suggestedCategory] += 1;
    }
    if (cr.confidence !== undefined) {
      confidences.push(cr.confidence);
    }
    if (cr.uncertaintyLevel) {
      uncertaintyLevels[cr.uncertaintyLevel] += 1;
    }

    if (cr.humanReviewed) humanReviewed += 1;
  }

  const confidence = computeConfidenceStats(confidences);

  return {
    totalClaims: result.totalClaims,
    byOutcome,
    bySuggestedCategory,
    errorsByCode,
    averageConfidence: confidence.mean,
    confidence,
    uncertaintyLevels,
    humanReviewed,
    humanAgreementRate: humanReviewed > 0 ? byOutcome.finalized / humanReviewed : 0,
    errors: [...result.errors],
  };
}
