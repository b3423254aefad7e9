/**
 * Golden scenario fixtures shared by engine, Monte Carlo and sweep tests.
 * Base (default Sydney purchase), rate schedule, first home buyer, and a
 * hand-checkable scenario with every rate at zero.
 */

import type { ScenarioParams, ScenarioParamsInput } from "@/lib/types/zod";
import { createScenarioParams } from "@/lib/model/params";

function createBaseScenario(overrides: ScenarioParamsInput = {}): ScenarioParams {
  return createScenarioParams({
    ...overrides,
    buy: {
      purchasePrice: 800_000,
      depositPct: 0.2,
      mortgageRate: 0.062,
      mortgageTermYears: 30,
      propertyAppreciationRate: 0.05,
      state: "NSW",
      firstHomeBuyer: false,
      ...overrides.buy,
    },
    rent: { weeklyRent: 650, rentIncreaseRate: 0.04, ...overrides.rent },
    investment: { returnRate: 0.07, ...overrides.investment },
    timeHorizonYears: overrides.timeHorizonYears ?? 30,
    existingSavings: overrides.existingSavings ?? 200_000,
  });
}

/** $800k NSW purchase, 20% deposit, 6.2% over 30 years, $650/wk rent, $200k savings. */
export function getBaseScenario(): ScenarioParams {
  return createBaseScenario();
}

/** Base scenario at 6% from year 1, dropping to 4% from year 5. */
export function getDroppingRateScenario(): ScenarioParams {
  return createBaseScenario({
    buy: {
      mortgageRate: 0.06,
      rateSchedule: [
        { year: 1, rate: 0.06 },
        { year: 5, rate: 0.04 },
      ],
    },
  });
}

/** Base scenario at a flat 6%. */
export function getFlatRateScenario(): ScenarioParams {
  return createBaseScenario({ buy: { mortgageRate: 0.06 } });
}

export function getFirstHomeBuyerScenario(purchasePrice = 800_000): ScenarioParams {
  return createBaseScenario({ buy: { purchasePrice, firstHomeBuyer: true } });
}

/**
 * $100k purchase, 20% deposit, interest-free 10-year loan, no growth, no ongoing costs,
 * $100/wk flat rent, $50k savings, 2-year horizon. Every value is exact arithmetic.
 */
export function getZeroRateScenario(overrides: ScenarioParamsInput = {}): ScenarioParams {
  return createScenarioParams({
    ...overrides,
    buy: {
      purchasePrice: 100_000,
      depositPct: 0.2,
      mortgageRate: 0,
      mortgageTermYears: 10,
      propertyAppreciationRate: 0,
      stampDutyOverride: 0,
      councilRatesPct: 0,
      insurancePct: 0,
      maintenancePct: 0,
      waterRatesAnnual: 0,
      strataAnnual: 0,
      sellingAgentPct: 0,
      sellingLegal: 0,
      ...overrides.buy,
    },
    rent: {
      weeklyRent: 100,
      rentIncreaseRate: 0,
      rentersInsuranceAnnual: 0,
      ...overrides.rent,
    },
    investment: { returnRate: 0, dividendYield: 0, frankingRate: 0, ...overrides.investment },
    inflationRate: overrides.inflationRate ?? 0,
    timeHorizonYears: overrides.timeHorizonYears ?? 2,
    existingSavings: overrides.existingSavings ?? 50_000,
  });
}
