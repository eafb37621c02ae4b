// ---------------------------------------------------------------------------
// Seeded claim generator for batch review runs
// ---------------------------------------------------------------------------

import { CLAIM_TYPES, RISK_FACTORS } from '@shared/constants';
import type { ClaimInput } from '../claim-input';

export interface GeneratedClaim {
  claimIndex: number;
  input: ClaimInput;
}

export interface ClaimGeneratorOptions {
  minDamage?: number;
  maxDamage?: number;
  /** Probability that a generated claim involves an injury. */
  injuryRate?: number;
}

// ---------------------------------------------------------------------------
// Seeded PRNG -- mulberry32
// ---------------------------------------------------------------------------

export function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(rng: () => number, pool: readonly T[]): T {
  return pool[Math.floor(rng() * pool.length)];
}

// Log-uniform so that small claims are as common as large ones per decade.
function damageAmount(rng: () => number, min: number, max: number): number {
  const logMin = Math.log(min);
  const logMax = Math.log(max);
  const value = Math.exp(logMin + rng() * (logMax - logMin));
  return Math.round(value * 100) / 100;
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

export function generateClaims(
  count: number,
  seed: number,
  options: ClaimGeneratorOptions = {},
): GeneratedClaim[] {
  const { minDamage = 100, maxDamage = 120_000, injuryRate = 0.3 } = options;
  if (!(minDamage > 0) || !(maxDamage >= minDamage)) {
    throw new RangeError(`Invalid damage range [${minDamage}, ${maxDamage}]`);
  }

  const rng = mulberry32(seed);
  const claims: GeneratedClaim[] = [];

  for (let i = 0; i < count; i++) {
    claims.push({
      claimIndex: i,
      input: {
        claim_type: pick(rng, CLAIM_TYPES),
        damage_amount: damageAmount(rng, minDamage, maxDamage),
        injury_involved: rng() < injuryRate,
        risk_factor: pick(rng, RISK_FACTORS),
      },
    });
  }

  return claims;
}
