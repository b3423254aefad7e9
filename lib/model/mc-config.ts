/**
 * Monte Carlo configuration: stochastic variable order, clip bounds,
 * default correlations, covariance construction.
 */

import {
  MCConfigSchema,
  type CorrelationMatrix,
  type MCConfig,
  type MCConfigInput,
} from "@/lib/types/zod";
import { InvalidCorrelationError } from "@/lib/model/errors";
import { isSymmetric, scaleByOuter, type Matrix } from "@/lib/utils/linalg";

/** Index order used by every vector and matrix below. */
export const VAR_NAMES = [
  "propertyAppreciation",
  "investmentReturn",
  "rentIncrease",
  "inflation",
  "mortgageRate",
] as const;
export type StochasticVariable = (typeof VAR_NAMES)[number];

export const VAR_INDEX = {
  propertyAppreciation: 0,
  investmentReturn: 1,
  rentIncrease: 2,
  inflation: 3,
  mortgageRate: 4,
} as const satisfies Record<StochasticVariable, number>;

/** Realized annual values are clipped to [FLOORS[i], CEILINGS[i]]. */
export const FLOORS: readonly number[] = [-0.2, -0.4, 0.0, 0.0, 0.01];
export const CEILINGS: readonly number[] = [0.3, 0.5, 0.15, 0.12, 0.15];

//  prop_appr, inv_ret, rent_inc, inflation, mort_rate
export const DEFAULT_CORRELATION: readonly (readonly number[])[] = [
  [1.0, 0.2, 0.3, 0.4, -0.25],
  [0.2, 1.0, 0.05, -0.1, -0.15],
  [0.3, 0.05, 1.0, 0.6, 0.3],
  [0.4, -0.1, 0.6, 1.0, 0.65],
  [-0.25, -0.15, 0.3, 0.65, 1.0],
];

/** Diagonal jitter added before factoring; only absorbs rounding, not invalid input. */
export const COVARIANCE_EPSILON = 1e-10;

export function createMCConfig(input: MCConfigInput = {}): MCConfig {
  return MCConfigSchema.parse(input);
}

export function stdVector(config: MCConfig): number[] {
  return [
    config.stdPropertyAppreciation,
    config.stdInvestmentReturn,
    config.stdRentIncrease,
    config.stdInflation,
    config.stdMortgageRate,
  ];
}

function assertCorrelation(m: CorrelationMatrix): void {
  if (!isSymmetric(m)) {
    throw new InvalidCorrelationError("Correlation matrix must be symmetric");
  }
  m.forEach((row, i) => {
    if (Math.abs(row[i] - 1) > 1e-12) {
      throw new InvalidCorrelationError(
        `Correlation matrix diagonal must be 1 (got ${row[i]} for ${VAR_NAMES[i]})`
      );
    }
    for (const c of row) {
      if (!(c >= -1 && c <= 1)) {
        throw new InvalidCorrelationError(`Correlations must lie in [-1, 1] (got ${c})`);
      }
    }
  });
}

/** Override matrix (validated) or a copy of DEFAULT_CORRELATION. */
export function correlationMatrix(config: MCConfig): Matrix {
  if (config.correlationOverride != null) {
    assertCorrelation(config.correlationOverride);
    return config.correlationOverride.map((row) => [...row]);
  }
  return DEFAULT_CORRELATION.map((row) => [...row]);
}

/** cov[i][j] = corr[i][j] · std[i] · std[j]. */
export function buildCovMatrix(config: MCConfig): Matrix {
  return scaleByOuter(correlationMatrix(config), stdVector(config));
}
