/**
 * Lenders Mortgage Insurance estimate from a published-style rate table.
 * Premiums are approximate; actual pricing varies by insurer and lender.
 */

import { LMI_LVR_THRESHOLD } from "@/lib/model/constants";

/** Rates as a fraction of the loan, per loan tier: ≤$300k, ≤$500k, ≤$1M, >$1M. */
type TierRates = readonly [number, number, number, number];

/** [LVR band upper bound, tier rates], ascending. */
export const LMI_RATE_TABLE: readonly (readonly [number, TierRates])[] = [
  [0.81, [0.005, 0.0064, 0.00896, 0.00992]],
  [0.82, [0.005, 0.0067, 0.00938, 0.01039]],
  [0.83, [0.0055, 0.0071, 0.00994, 0.01101]],
  [0.84, [0.0073, 0.009, 0.0126, 0.01395]],
  [0.85, [0.0078, 0.0098, 0.01372, 0.01519]],
  [0.86, [0.0092, 0.0121, 0.01694, 0.01876]],
  [0.87, [0.0098, 0.0127, 0.01778, 0.01969]],
  [0.88, [0.0112, 0.0136, 0.01904, 0.02108]],
  [0.89, [0.0118, 0.0142, 0.01988, 0.02201]],
  [0.9, [0.0127, 0.0168, 0.02352, 0.02604]],
  [0.91, [0.0197, 0.0258, 0.03612, 0.03999]],
  [0.92, [0.0197, 0.0258, 0.03612, 0.03999]],
  [0.93, [0.0221, 0.0292, 0.04088, 0.04526]],
  [0.94, [0.0221, 0.0292, 0.04088, 0.04526]],
  [0.95, [0.0243, 0.0321, 0.04494, 0.04976]],
];

export function loanTier(loanAmount: number): 0 | 1 | 2 | 3 {
  if (loanAmount <= 300_000) return 0;
  if (loanAmount <= 500_000) return 1;
  if (loanAmount <= 1_000_000) return 2;
  return 3;
}

/**
 * Estimated LMI premium in whole dollars. 0 at LVR ≤ 80%; above 95% uses the top band.
 */
export function estimateLmi(loanAmount: number, lvr: number): number {
  if (lvr <= LMI_LVR_THRESHOLD) return 0;
  const tier = loanTier(loanAmount);
  const band =
    LMI_RATE_TABLE.find(([upper]) => lvr <= upper) ??
    LMI_RATE_TABLE[LMI_RATE_TABLE.length - 1];
  if (!band) return 0;
  return Math.round(loanAmount * band[1][tier]);
}
