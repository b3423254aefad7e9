/**
 * Scenario parameter construction and derived fields
 * (deposit, loan, stamp duty, LMI, grant, rate in effect per year).
 */

import {
  ScenarioParamsSchema,
  type BuyParams,
  type ScenarioParams,
  type ScenarioParamsInput,
} from "@/lib/types/zod";
import { CORPORATE_TAX_RATE } from "@/lib/model/constants";
import { estimateLmi } from "@/lib/model/lmi";
import { calcStampDuty, fhog, marginalRate } from "@/lib/model/tax";

/** Scenario with every field at its documented default. */
export function defaultScenarioParams(): ScenarioParams {
  return ScenarioParamsSchema.parse({});
}

/** Build validated params from partial input; missing fields take defaults. */
export function createScenarioParams(input: ScenarioParamsInput = {}): ScenarioParams {
  return ScenarioParamsSchema.parse(input);
}

export function deposit(buy: BuyParams): number {
  return buy.purchasePrice * buy.depositPct;
}

export function loanAmount(buy: BuyParams): number {
  return buy.purchasePrice - deposit(buy);
}

/** Loan-to-value ratio at purchase. */
export function lvr(buy: BuyParams): number {
  if (buy.purchasePrice <= 0) return 0;
  return loanAmount(buy) / buy.purchasePrice;
}

export function stampDuty(buy: BuyParams): number {
  if (buy.stampDutyOverride != null) return buy.stampDutyOverride;
  return calcStampDuty(buy.purchasePrice, buy.state, buy.firstHomeBuyer, buy.newBuild);
}

/** Explicit LMI premium, or the LVR-table estimate when unset. */
export function lmiPremium(buy: BuyParams): number {
  if (buy.lmi != null) return buy.lmi;
  return estimateLmi(loanAmount(buy), lvr(buy));
}

/** FHOG is only paid to first home buyers. */
export function firstHomeGrant(buy: BuyParams): number {
  if (!buy.firstHomeBuyer) return 0;
  return fhog(buy.state, buy.newBuild, buy.purchasePrice);
}

/** Cash spent at settlement: deposit + stamp duty + LMI − grant. */
export function upfrontCosts(buy: BuyParams): number {
  return deposit(buy) + stampDuty(buy) + lmiPremium(buy) - firstHomeGrant(buy);
}

/** Mortgage rate in effect: latest schedule entry starting at or before `year`, else the base rate. */
export function rateForYear(buy: BuyParams, year: number): number {
  if (!buy.rateSchedule || buy.rateSchedule.length === 0) return buy.mortgageRate;
  const sorted = [...buy.rateSchedule].sort((a, b) => a.year - b.year);
  let rate = buy.mortgageRate;
  for (const entry of sorted) {
    if (entry.year > year) break;
    rate = entry.rate;
  }
  return rate;
}

export function investorMarginalRate(params: ScenarioParams): number {
  return marginalRate(params.tax.grossIncome);
}

/**
 * Effective tax rate on dividends. Franked dividends carry a credit for company tax,
 * so only the gap between the marginal and corporate rate is payable on that share.
 */
export function effectiveDividendTaxRate(marginal: number, frankingRate: number): number {
  const frankedRate =
    marginal > CORPORATE_TAX_RATE
      ? (marginal - CORPORATE_TAX_RATE) / (1 - CORPORATE_TAX_RATE)
      : 0;
  return frankingRate * frankedRate + (1 - frankingRate) * marginal;
}
