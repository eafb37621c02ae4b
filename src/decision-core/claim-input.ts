import { z } from 'zod';
import { CLAIM_TYPES, RISK_FACTORS, SEVERITY_CATEGORIES } from '@shared/constants';

export type ClaimType = (typeof CLAIM_TYPES)[number];
export type RiskFactor = (typeof RISK_FACTORS)[number];
export type SeverityCategory = (typeof SEVERITY_CATEGORIES)[number];

export const claimInputSchema = z
  .object({
    claim_type: z.enum(CLAIM_TYPES),
    damage_amount: z.number().finite().nonnegative(),
    injury_involved: z.boolean(),
    risk_factor: z.enum(RISK_FACTORS),
  })
  .strict();

export type ClaimInput = Readonly<z.infer<typeof claimInputSchema>>;

export const CLAIM_INPUT_FIELDS = Object.keys(claimInputSchema.shape);

export function severityRank(category: SeverityCategory): number {
  return SEVERITY_CATEGORIES.indexOf(category);
}
