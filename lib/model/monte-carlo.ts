/**
 * Monte Carlo buy-vs-rent simulation.
 * N paths advance together one year at a time under correlated shocks to
 * property appreciation, investment return, rent increase, inflation and
 * mortgage rate. State lives in one Float64Array per quantity, indexed by
 * path; the inner loop walks the paths and applies the deterministic engine's
 * branches (mortgage still owing, rate moved, which side costs more) per path.
 * With zero volatility every path reproduces simulate().
 */

import { z } from "zod";
import type { MCConfig, ScenarioParams } from "@/lib/types/zod";
import { MONTHS_PER_YEAR, WEEKS_PER_YEAR } from "@/lib/model/constants";
import {
  CEILINGS,
  COVARIANCE_EPSILON,
  FLOORS,
  VAR_INDEX,
  VAR_NAMES,
  buildCovMatrix,
} from "@/lib/model/mc-config";
import {
  effectiveDividendTaxRate,
  investorMarginalRate,
  loanAmount,
  rateForYear,
  upfrontCosts,
} from "@/lib/model/params";
import { addDiagonal, choleskyDecompose, lowerTriangularMultiply } from "@/lib/utils/linalg";
import { createRandomSource } from "@/lib/utils/random";

/** Raw output. Each grid has one row per year (0..T), each row one value per path. */
export interface MCTimeSeries {
  years: number[];
  nRuns: number;
  buyNetWorth: Float64Array[];
  rentNetWorth: Float64Array[];
  /** Buy − rent. */
  difference: Float64Array[];
  propertyValues: Float64Array[];
  mortgageBalances: Float64Array[];
  /** Realized mortgage rate per path; row 0 holds the settlement rate. */
  mortgageRates: Float64Array[];
}

export interface MCSummary {
  years: number[];
  percentiles: number[];
  /** Percentile → per-year values. */
  buyPercentiles: Record<number, number[]>;
  rentPercentiles: Record<number, number[]>;
  differencePercentiles: Record<number, number[]>;
  /** Share of paths with buy ahead of rent, per year. */
  probBuyWins: number[];
  /** First year the median difference goes from ≤ 0 to > 0. */
  medianCrossover: number | null;
}

export const DEFAULT_PERCENTILES = [10, 25, 50, 75, 90];

/** (T+1) rows of N values backed by one buffer. */
function allocateGrid(rows: number, cols: number): Float64Array[] {
  const buffer = new Float64Array(rows * cols);
  return Array.from({ length: rows }, (_, t) => buffer.subarray(t * cols, (t + 1) * cols));
}

function clip(value: number, lo: number, hi: number): number {
  return Math.min(Math.max(value, lo), hi);
}

/** Annuity payment for `months` payments; zero rate amortizes straight-line. */
function annuityPayment(balance: number, annualRate: number, months: number): number {
  if (annualRate === 0) return balance / months;
  const r = annualRate / MONTHS_PER_YEAR;
  const compound = Math.pow(1 + r, months);
  return (balance * r * compound) / (compound - 1);
}

/** Months (fractional) for `payment` to clear `balance` at monthly rate r. */
function monthsToRepay(balance: number, r: number, payment: number): number {
  if (r === 0) return balance / payment;
  return Math.log(payment / (payment - r * balance)) / Math.log(1 + r);
}

/**
 * Factor the covariance once per run. A covariance that is not positive
 * definite (beyond the rounding jitter) throws CholeskyError.
 */
export function choleskyFactor(config: MCConfig): number[][] {
  return choleskyDecompose(addDiagonal(buildCovMatrix(config), COVARIANCE_EPSILON));
}

export function mcSimulate(params: ScenarioParams, config: MCConfig): MCTimeSeries {
  const N = config.nRuns;
  const T = params.timeHorizonYears;
  const { buy, rent, investment: inv } = params;

  const L = choleskyFactor(config);
  const rng = createRandomSource(config.seed);

  const dividendTaxRate = effectiveDividendTaxRate(
    investorMarginalRate(params),
    inv.frankingRate
  );
  const upfront = upfrontCosts(buy);
  const loan = loanAmount(buy);
  const firstRate = rateForYear(buy, 1);

  // Base means in VAR_NAMES order; the mortgage mean follows the year-1 scheduled rate
  const baseMeans = [
    buy.propertyAppreciationRate,
    inv.returnRate,
    rent.rentIncreaseRate,
    params.inflationRate,
    firstRate,
  ];

  // Per-path state
  const mortgageBalance = new Float64Array(N).fill(loan);
  const currentRate = new Float64Array(N).fill(firstRate);
  const payment = new Float64Array(N);
  const propertyValue = new Float64Array(N).fill(buy.purchasePrice);
  const buyInvestments = new Float64Array(N).fill(Math.max(params.existingSavings - upfront, 0));
  const buyContributions = Float64Array.from(buyInvestments);
  const rentInvestments = new Float64Array(N).fill(params.existingSavings);
  const rentContributions = Float64Array.from(rentInvestments);
  const weeklyRent = new Float64Array(N).fill(rent.weeklyRent);
  const priceLevel = new Float64Array(N).fill(1);

  const years = Array.from({ length: T + 1 }, (_, t) => t);
  const outBuy = allocateGrid(T + 1, N);
  const outRent = allocateGrid(T + 1, N);
  const outDiff = allocateGrid(T + 1, N);
  const outProperty = allocateGrid(T + 1, N);
  const outMortgage = allocateGrid(T + 1, N);
  const outRate = allocateGrid(T + 1, N);

  for (let i = 0; i < N; i++) {
    const buyNw = propertyValue[i] - mortgageBalance[i] + buyInvestments[i];
    outBuy[0][i] = buyNw;
    outRent[0][i] = rentInvestments[i];
    outDiff[0][i] = buyNw - rentInvestments[i];
    outProperty[0][i] = propertyValue[i];
    outMortgage[0][i] = mortgageBalance[i];
    outRate[0][i] = firstRate;
  }

  const z = new Float64Array(VAR_NAMES.length);
  const shock = new Float64Array(VAR_NAMES.length);
  const realized = new Float64Array(VAR_NAMES.length);
  const mortgageIdx = VAR_INDEX.mortgageRate;
  const fixedOwnershipCosts = buy.waterRatesAnnual + buy.strataAnnual;
  const pctOwnershipCosts = buy.councilRatesPct + buy.insurancePct + buy.maintenancePct;

  for (let year = 1; year <= T; year++) {
    // Offset of this year's scheduled rate from the year-1 base; persists until the next entry
    const scheduleOffset = rateForYear(buy, year) - firstRate;
    const remainingMonths = (buy.mortgageTermYears - (year - 1)) * MONTHS_PER_YEAR;

    const rowBuy = outBuy[year];
    const rowRent = outRent[year];
    const rowDiff = outDiff[year];
    const rowProperty = outProperty[year];
    const rowMortgage = outMortgage[year];
    const rowRate = outRate[year];

    for (let i = 0; i < N; i++) {
      // Correlated shocks around the base means, clipped per variable
      rng.fillNormal(z);
      lowerTriangularMultiply(L, z, shock);
      for (let k = 0; k < realized.length; k++) {
        realized[k] = clip(baseMeans[k] + shock[k], FLOORS[k], CEILINGS[k]);
      }
      const appreciation = realized[VAR_INDEX.propertyAppreciation];
      const investReturn = realized[VAR_INDEX.investmentReturn];
      const rentIncrease = realized[VAR_INDEX.rentIncrease];
      const inflation = realized[VAR_INDEX.inflation];
      // Scheduled moves shift the whole distribution, keeping each path's dispersion
      const mortgageRate = clip(
        realized[mortgageIdx] + scheduleOffset,
        FLOORS[mortgageIdx],
        CEILINGS[mortgageIdx]
      );

      const balance = mortgageBalance[i];
      const hasMortgage = balance > 0;

      // Re-amortize over the remaining term when the path's rate moved
      const rateChanged = year === 1 || mortgageRate !== currentRate[i];
      if (rateChanged && remainingMonths > 0) {
        payment[i] = hasMortgage ? annuityPayment(balance, mortgageRate, remainingMonths) : 0;
      }
      currentRate[i] = mortgageRate;

      // Closed-form 12-payment update: B·(1+r)^12 − P·((1+r)^12 − 1)/r
      const r = mortgageRate / MONTHS_PER_YEAR;
      const pmt = payment[i];
      const compound = r > 0 ? Math.pow(1 + r, MONTHS_PER_YEAR) : 1;
      const annuity = r > 0 ? (compound - 1) / r : MONTHS_PER_YEAR;
      const projected = balance * compound - pmt * annuity;
      const repaidThisYear = hasMortgage && projected < 0;
      const newBalance = hasMortgage ? Math.max(projected, 0) : 0;
      const totalPayments = !hasMortgage
        ? 0
        : repaidThisYear
          ? pmt * Math.min(monthsToRepay(balance, r, pmt), MONTHS_PER_YEAR)
          : pmt * MONTHS_PER_YEAR;
      const principalPaid = hasMortgage ? balance - newBalance : 0;
      const interestPaid = totalPayments - principalPaid;
      mortgageBalance[i] = newBalance;

      const value = Math.max(propertyValue[i] * (1 + appreciation), 0);
      propertyValue[i] = value;
      priceLevel[i] *= 1 + inflation;

      const ongoing = value * pctOwnershipCosts + fixedOwnershipCosts * priceLevel[i];
      const buyYearCosts = principalPaid + interestPaid + ongoing;

      // Dividends are only paid out of a positive return
      const paysDividends = investReturn > 0;
      const buyDividends = paysDividends ? buyInvestments[i] * inv.dividendYield : 0;
      const buyDividendTax = buyDividends * dividendTaxRate;
      buyInvestments[i] += buyInvestments[i] * investReturn - buyDividendTax;
      buyContributions[i] += buyDividends - buyDividendTax;

      const annualRent = weeklyRent[i] * WEEKS_PER_YEAR;
      const rentYearCosts = annualRent + rent.rentersInsuranceAnnual * priceLevel[i];

      const rentDividends = paysDividends ? rentInvestments[i] * inv.dividendYield : 0;
      const rentDividendTax = rentDividends * dividendTaxRate;
      rentInvestments[i] += rentInvestments[i] * investReturn - rentDividendTax;
      rentContributions[i] += rentDividends - rentDividendTax;

      // Cost gap goes to whichever side spent less, with mid-year growth
      const buyCostsMore = buyYearCosts > rentYearCosts;
      const rentCostsMore = rentYearCosts > buyYearCosts;
      const surplusToRent = buyCostsMore ? buyYearCosts - rentYearCosts : 0;
      const surplusToBuy = rentCostsMore ? rentYearCosts - buyYearCosts : 0;
      const midYear = 1 + investReturn / 2;
      rentInvestments[i] += surplusToRent * midYear;
      rentContributions[i] += surplusToRent;
      buyInvestments[i] += surplusToBuy * midYear;
      buyContributions[i] += surplusToBuy;

      const buyNw = value - newBalance + buyInvestments[i];
      const rentNw = rentInvestments[i];
      rowBuy[i] = buyNw;
      rowRent[i] = rentNw;
      rowDiff[i] = buyNw - rentNw;
      rowProperty[i] = value;
      rowMortgage[i] = newBalance;
      rowRate[i] = mortgageRate;

      weeklyRent[i] *= 1 + rentIncrease;
    }
  }

  return {
    years,
    nRuns: N,
    buyNetWorth: outBuy,
    rentNetWorth: outRent,
    difference: outDiff,
    propertyValues: outProperty,
    mortgageBalances: outMortgage,
    mortgageRates: outRate,
  };
}

/** Linear interpolation between order statistics (p = 25 → 25th percentile). */
export function percentile(sorted: ArrayLike<number>, p: number): number {
  if (sorted.length === 0) return NaN;
  const idx = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  const frac = idx - lo;
  return sorted[lo] * (1 - frac) + sorted[hi] * frac;
}

function percentileBands(grid: Float64Array[], percentiles: number[]): Record<number, number[]> {
  const bands: Record<number, number[]> = {};
  for (const p of percentiles) bands[p] = [];
  for (const row of grid) {
    const sorted = Float64Array.from(row).sort();
    for (const p of percentiles) bands[p].push(percentile(sorted, p));
  }
  return bands;
}

/** Percentile bands, probability buy wins, and median crossover per year. */
export function summarize(
  ts: MCTimeSeries,
  percentiles: number[] = DEFAULT_PERCENTILES
): MCSummary {
  const bandPercentiles = percentiles.includes(50) ? percentiles : [...percentiles, 50];
  const buyPercentiles = percentileBands(ts.buyNetWorth, percentiles);
  const rentPercentiles = percentileBands(ts.rentNetWorth, percentiles);
  const differencePercentiles = percentileBands(ts.difference, bandPercentiles);

  const probBuyWins = ts.difference.map((row) => {
    if (row.length === 0) return 0;
    let wins = 0;
    for (const d of row) if (d > 0) wins++;
    return wins / row.length;
  });

  const medianDiff = differencePercentiles[50];
  let medianCrossover: number | null = null;
  for (let t = 1; t < medianDiff.length; t++) {
    if (medianDiff[t - 1] <= 0 && medianDiff[t] > 0) {
      medianCrossover = ts.years[t];
      break;
    }
  }

  if (!percentiles.includes(50)) delete differencePercentiles[50];

  return {
    years: [...ts.years],
    percentiles: [...percentiles],
    buyPercentiles,
    rentPercentiles,
    differencePercentiles,
    probBuyWins,
    medianCrossover,
  };
}

export interface MeanStd {
  mean: number;
  /** Population standard deviation. */
  std: number;
}

/** Spread of horizon-year results across independently seeded runs. */
export interface MCStabilityResult {
  nSeeds: number;
  runsPerSeed: number;
  seeds: number[];
  medianDifference: MeanStd;
  /** Share of paths with buy ahead, 0..1. */
  probBuyWins: MeanStd;
  p10Difference: MeanStd;
  p90Difference: MeanStd;
  medianBuyNetWorth: MeanStd;
  medianRentNetWorth: MeanStd;
  /** Median crossover year of each seed that had one. */
  crossoverYears: number[];
}

/** Seeds for a stability run are drawn from this fixed source. */
export const STABILITY_SEED = 42;
const MAX_STABILITY_SEED = 1_000_000;

const StabilityCountsSchema = z.object({
  nSeeds: z.number().int().positive(),
  runsPerSeed: z.number().int().positive(),
});

function meanStd(values: number[]): MeanStd {
  if (values.length === 0) return { mean: NaN, std: NaN };
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return { mean, std: Math.sqrt(variance) };
}

/**
 * Re-run the simulation under `nSeeds` different seeds (volatilities and
 * correlations from `config`, its nRuns and seed replaced) and report how
 * much the horizon-year summary moves between them.
 */
export function mcStability(
  params: ScenarioParams,
  config: MCConfig,
  nSeeds: number,
  runsPerSeed: number
): MCStabilityResult {
  const counts = StabilityCountsSchema.parse({ nSeeds, runsPerSeed });
  const horizon = params.timeHorizonYears;
  const seedSource = createRandomSource(STABILITY_SEED);
  const seeds = Array.from(
    { length: counts.nSeeds },
    () => 1 + Math.floor(seedSource.random() * (MAX_STABILITY_SEED - 1))
  );

  const medianDiffs: number[] = [];
  const probs: number[] = [];
  const p10s: number[] = [];
  const p90s: number[] = [];
  const medianBuy: number[] = [];
  const medianRent: number[] = [];
  const crossoverYears: number[] = [];

  for (const seed of seeds) {
    const ts = mcSimulate(params, { ...config, nRuns: counts.runsPerSeed, seed });
    const summary = summarize(ts, [10, 50, 90]);
    medianDiffs.push(summary.differencePercentiles[50][horizon]);
    probs.push(summary.probBuyWins[horizon]);
    p10s.push(summary.differencePercentiles[10][horizon]);
    p90s.push(summary.differencePercentiles[90][horizon]);
    medianBuy.push(summary.buyPercentiles[50][horizon]);
    medianRent.push(summary.rentPercentiles[50][horizon]);
    if (summary.medianCrossover != null) crossoverYears.push(summary.medianCrossover);
  }

  return {
    nSeeds: counts.nSeeds,
    runsPerSeed: counts.runsPerSeed,
    seeds,
    medianDifference: meanStd(medianDiffs),
    probBuyWins: meanStd(probs),
    p10Difference: meanStd(p10s),
    p90Difference: meanStd(p90s),
    medianBuyNetWorth: meanStd(medianBuy),
    medianRentNetWorth: meanStd(medianRent),
    crossoverYears,
  };
}
