/**
 * Sensitivity analysis: sweep one numeric parameter, re-run the projection per value.
 * Addressable parameters are a closed list of dotted paths (e.g. "buy.mortgageRate").
 */

import {
  ScenarioParamsSchema,
  type BuyParams,
  type InvestmentParams,
  type RentParams,
  type ScenarioParams,
  type TaxParams,
} from "@/lib/types/zod";
import { crossoverYear, netWorthAtSale, simulate } from "@/lib/model/engine";
import { UnknownParamPathError } from "@/lib/model/errors";

/** Keys of T whose values are numbers (nullable numbers included). */
type NumericKey<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends number ? K : never;
}[keyof T];

const BUY_FIELDS = [
  "purchasePrice",
  "depositPct",
  "mortgageRate",
  "mortgageTermYears",
  "propertyAppreciationRate",
  "stampDutyOverride",
  "lmi",
  "councilRatesPct",
  "insurancePct",
  "maintenancePct",
  "waterRatesAnnual",
  "strataAnnual",
  "sellingAgentPct",
  "sellingLegal",
] as const satisfies readonly NumericKey<BuyParams>[];

const RENT_FIELDS = [
  "weeklyRent",
  "rentIncreaseRate",
  "rentersInsuranceAnnual",
] as const satisfies readonly NumericKey<RentParams>[];

const INVESTMENT_FIELDS = [
  "returnRate",
  "dividendYield",
  "frankingRate",
] as const satisfies readonly NumericKey<InvestmentParams>[];

const TAX_FIELDS = ["grossIncome"] as const satisfies readonly NumericKey<TaxParams>[];

const TOP_LEVEL_FIELDS = [
  "inflationRate",
  "timeHorizonYears",
  "existingSavings",
] as const satisfies readonly NumericKey<ScenarioParams>[];

type ParamPath =
  | { section: "buy"; field: (typeof BUY_FIELDS)[number] }
  | { section: "rent"; field: (typeof RENT_FIELDS)[number] }
  | { section: "investment"; field: (typeof INVESTMENT_FIELDS)[number] }
  | { section: "tax"; field: (typeof TAX_FIELDS)[number] }
  | { section: null; field: (typeof TOP_LEVEL_FIELDS)[number] };

const PARAM_PATHS = new Map<string, ParamPath>([
  ...BUY_FIELDS.map((field): [string, ParamPath] => [`buy.${field}`, { section: "buy", field }]),
  ...RENT_FIELDS.map((field): [string, ParamPath] => [`rent.${field}`, { section: "rent", field }]),
  ...INVESTMENT_FIELDS.map((field): [string, ParamPath] => [
    `investment.${field}`,
    { section: "investment", field },
  ]),
  ...TAX_FIELDS.map((field): [string, ParamPath] => [`tax.${field}`, { section: "tax", field }]),
  ...TOP_LEVEL_FIELDS.map((field): [string, ParamPath] => [field, { section: null, field }]),
]);

/** Every dotted path accepted by sweep(). */
export const SWEEPABLE_PATHS: readonly string[] = [...PARAM_PATHS.keys()];

/** "buy.mortgage_rate" → "buy.mortgageRate"; camelCase input passes through. */
export function normalizeParamPath(path: string): string {
  return path
    .split(".")
    .map((part) => part.trim().replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()))
    .join(".");
}

function resolvePath(path: string): ParamPath {
  const resolved = PARAM_PATHS.get(normalizeParamPath(path));
  if (!resolved) throw new UnknownParamPathError(path);
  return resolved;
}

export function getParamAtPath(params: ScenarioParams, path: string): number | null {
  const p = resolvePath(path);
  switch (p.section) {
    case "buy":
      return params.buy[p.field];
    case "rent":
      return params.rent[p.field];
    case "investment":
      return params.investment[p.field];
    case "tax":
      return params.tax[p.field];
    case null:
      return params[p.field];
  }
}

/** Copy of params with one field replaced. The input is not modified. */
export function setParamAtPath(
  params: ScenarioParams,
  path: string,
  value: number
): ScenarioParams {
  const p = resolvePath(path);
  switch (p.section) {
    case "buy":
      return { ...params, buy: { ...params.buy, [p.field]: value } };
    case "rent":
      return { ...params, rent: { ...params.rent, [p.field]: value } };
    case "investment":
      return { ...params, investment: { ...params.investment, [p.field]: value } };
    case "tax":
      return { ...params, tax: { ...params.tax, [p.field]: value } };
    case null:
      return { ...params, [p.field]: value };
  }
}

export interface SweepResult {
  paramValue: number;
  buyNetWorthReal: number;
  rentNetWorthReal: number;
  differenceReal: number;
  buyWins: boolean;
  crossover: number | null;
  /** After-tax liquidation at the horizon, real dollars. */
  buyLiquidation: number;
  rentLiquidation: number;
}

/**
 * Run the projection once per value, in input order.
 * Throws UnknownParamPathError before any run if the path is not sweepable.
 */
export function sweep(params: ScenarioParams, path: string, values: number[]): SweepResult[] {
  resolvePath(path);
  return values.map((value) => {
    // Parsing re-validates the changed field and yields a deep copy
    const p = ScenarioParamsSchema.parse(setParamAtPath(params, path, value));
    const snapshots = simulate(p);
    const final = snapshots[snapshots.length - 1];
    const liquidation = netWorthAtSale(final, p);
    return {
      paramValue: value,
      buyNetWorthReal: final.buyNetWorthReal,
      rentNetWorthReal: final.rentNetWorthReal,
      differenceReal: final.netWorthDifferenceReal,
      buyWins: final.netWorthDifferenceReal > 0,
      crossover: crossoverYear(snapshots),
      buyLiquidation: liquidation.buyNetWorthAfterSaleReal,
      rentLiquidation: liquidation.rentNetWorthAfterTaxReal,
    };
  });
}

/** Inclusive float range, values rounded to 6 dp. */
export function frange(start: number, stop: number, step: number): number[] {
  if (step <= 0) return [];
  const values: number[] = [];
  for (let v = start; v <= stop + step / 2; v += step) {
    values.push(Math.round(v * 1e6) / 1e6);
  }
  return values;
}
