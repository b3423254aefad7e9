/**
 * Validation and guardrails for a scenario before it is simulated.
 * Hard errors block calculation; soft warnings allow it.
 */

import { SUPPORTED_STATES, type ScenarioParams } from "@/lib/types/zod";
import { upfrontCosts } from "@/lib/model/params";

export interface ValidationError {
  code: string;
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/** Longest horizon the engines accept. */
export const MAX_HORIZON_YEARS = 100;

function rateFields(params: ScenarioParams): [string, number][] {
  const { buy, rent, investment } = params;
  const fields: [string, number][] = [
    ["buy.mortgageRate", buy.mortgageRate],
    ["buy.propertyAppreciationRate", buy.propertyAppreciationRate],
    ["rent.rentIncreaseRate", rent.rentIncreaseRate],
    ["investment.returnRate", investment.returnRate],
    ["investment.dividendYield", investment.dividendYield],
    ["inflationRate", params.inflationRate],
  ];
  for (const entry of buy.rateSchedule ?? []) {
    fields.push([`buy.rateSchedule[year ${entry.year}]`, entry.rate]);
  }
  return fields;
}

function percentFields(params: ScenarioParams): [string, number][] {
  const { buy } = params;
  return [
    ["buy.councilRatesPct", buy.councilRatesPct],
    ["buy.insurancePct", buy.insurancePct],
    ["buy.maintenancePct", buy.maintenancePct],
    ["buy.sellingAgentPct", buy.sellingAgentPct],
  ];
}

function amountFields(params: ScenarioParams): [string, number][] {
  const { buy, rent } = params;
  return [
    ["buy.purchasePrice", buy.purchasePrice],
    ["buy.waterRatesAnnual", buy.waterRatesAnnual],
    ["buy.strataAnnual", buy.strataAnnual],
    ["buy.sellingLegal", buy.sellingLegal],
    ["rent.weeklyRent", rent.weeklyRent],
    ["rent.rentersInsuranceAnnual", rent.rentersInsuranceAnnual],
    ["tax.grossIncome", params.tax.grossIncome],
    ["existingSavings", params.existingSavings],
  ];
}

/**
 * Validate params for an engine run. Checks run on parsed params, so they catch
 * values the schema allows but the model cannot use sensibly.
 */
export function validateScenario(params: ScenarioParams): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const { buy } = params;

  for (const [path, rate] of rateFields(params)) {
    if (!Number.isFinite(rate) || rate < -0.5 || rate > 1) {
      errors.push({
        code: "INVALID_RATES",
        message: `${path} must be a decimal between -50% and 100% (got ${rate})`,
      });
    }
    if (rate > 1) {
      warnings.push({
        code: "RATE_LOOKS_LIKE_PERCENT",
        message: `${path} is ${rate}; rates are decimals (0.06 = 6%)`,
      });
    }
  }
  for (const [path, pct] of percentFields(params)) {
    if (pct > 1) {
      warnings.push({
        code: "RATE_LOOKS_LIKE_PERCENT",
        message: `${path} is ${pct}; rates are decimals (0.01 = 1%)`,
      });
    }
  }

  for (const [path, amount] of amountFields(params)) {
    if (!Number.isFinite(amount) || amount < 0) {
      errors.push({
        code: "NEGATIVE_AMOUNT",
        message: `${path} must be zero or more (got ${amount})`,
      });
    }
  }

  if (
    !Number.isInteger(params.timeHorizonYears) ||
    params.timeHorizonYears < 1 ||
    params.timeHorizonYears > MAX_HORIZON_YEARS
  ) {
    errors.push({
      code: "INVALID_HORIZON",
      message: `Time horizon must be a whole number of years from 1 to ${MAX_HORIZON_YEARS} (got ${params.timeHorizonYears})`,
    });
  }

  if (buy.depositPct <= 0 || buy.depositPct > 1) {
    errors.push({
      code: "INVALID_DEPOSIT",
      message: `Deposit must be above 0% and at most 100% of the price (got ${buy.depositPct * 100}%)`,
    });
  }

  const supported: readonly string[] = SUPPORTED_STATES;
  const stateKnown = supported.includes(buy.state.toUpperCase());
  if (!stateKnown && buy.stampDutyOverride == null) {
    errors.push({
      code: "UNSUPPORTED_STATE",
      message: `Unknown state '${buy.state}'. Supported: ${SUPPORTED_STATES.join(", ")}`,
    });
  }

  if (errors.length === 0) {
    const upfront = upfrontCosts(buy);
    if (upfront > params.existingSavings) {
      warnings.push({
        code: "UNDERWATER_START",
        message: `Upfront costs ($${Math.round(upfront)}) exceed existing savings ($${Math.round(params.existingSavings)}); the shortfall is not modelled`,
      });
    }
  }

  if (params.timeHorizonYears < buy.mortgageTermYears) {
    warnings.push({
      code: "MORTGAGE_OUTLIVES_HORIZON",
      message: `The ${buy.mortgageTermYears}-year mortgage is not repaid within the ${params.timeHorizonYears}-year horizon`,
    });
  }

  return { errors, warnings };
}
