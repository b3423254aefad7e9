/**
 * Scenario config files: snake_case nested mapping <-> ScenarioParams.
 *
 * Shape: { buy: {...}, rent: {...}, investment: {...}, tax: {...},
 *          inflation_rate, time_horizon_years, existing_savings }
 * Unknown keys are ignored and missing keys take the model defaults.
 * `buy.rate_schedule` accepts {year, rate} objects or [year, rate] pairs.
 * Files are YAML or JSON, chosen by extension; anything else is read as YAML,
 * which also accepts JSON.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  BuyParamsSchema,
  InvestmentParamsSchema,
  RateScheduleEntrySchema,
  RentParamsSchema,
  ScenarioParamsSchema,
  TaxParamsSchema,
  type ScenarioParams,
} from "@/lib/types/zod";
import { ConfigError, type ConfigIssue } from "@/lib/model/errors";

const b = BuyParamsSchema.shape;
const r = RentParamsSchema.shape;
const i = InvestmentParamsSchema.shape;

const RateSchedulePairSchema = z
  .tuple([RateScheduleEntrySchema.shape.year, RateScheduleEntrySchema.shape.rate])
  .transform(([year, rate]) => ({ year, rate }));

export const BuyConfigSchema = z.object({
  purchase_price: b.purchasePrice,
  deposit_pct: b.depositPct,
  mortgage_rate: b.mortgageRate,
  mortgage_term_years: b.mortgageTermYears,
  property_appreciation_rate: b.propertyAppreciationRate,
  stamp_duty_override: b.stampDutyOverride,
  lmi: b.lmi,
  state: b.state,
  first_home_buyer: b.firstHomeBuyer,
  new_build: b.newBuild,
  rate_schedule: z
    .array(z.union([RateScheduleEntrySchema, RateSchedulePairSchema]))
    .nullable()
    .default(null),
  council_rates_pct: b.councilRatesPct,
  insurance_pct: b.insurancePct,
  maintenance_pct: b.maintenancePct,
  water_rates_annual: b.waterRatesAnnual,
  strata_annual: b.strataAnnual,
  selling_agent_pct: b.sellingAgentPct,
  selling_legal: b.sellingLegal,
});

export const RentConfigSchema = z.object({
  weekly_rent: r.weeklyRent,
  rent_increase_rate: r.rentIncreaseRate,
  renters_insurance_annual: r.rentersInsuranceAnnual,
});

export const InvestmentConfigSchema = z.object({
  return_rate: i.returnRate,
  dividend_yield: i.dividendYield,
  franking_rate: i.frankingRate,
});

export const TaxConfigSchema = z.object({
  gross_income: TaxParamsSchema.shape.grossIncome,
});

const s = ScenarioParamsSchema.shape;

export const ScenarioConfigSchema = z.object({
  buy: BuyConfigSchema.default({}),
  rent: RentConfigSchema.default({}),
  investment: InvestmentConfigSchema.default({}),
  tax: TaxConfigSchema.default({}),
  inflation_rate: s.inflationRate,
  time_horizon_years: s.timeHorizonYears,
  existing_savings: s.existingSavings,
});

/** Config as written to disk (every key present, schedule as {year, rate}). */
export type ScenarioConfig = z.infer<typeof ScenarioConfigSchema>;
/** Config as read from disk (every key optional). */
export type ScenarioConfigInput = z.input<typeof ScenarioConfigSchema>;

function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/** Map a parsed config mapping to validated params. Throws ConfigError on bad values. */
export function paramsFromConfig(data: unknown): ScenarioParams {
  const parsed = ScenarioConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issues = toConfigIssues(parsed.error);
    console.error("[Config] Invalid scenario config:", issues);
    throw new ConfigError(
      `Invalid scenario config: ${issues.map((x) => `${x.path || "(root)"}: ${x.message}`).join("; ")}`,
      issues
    );
  }
  const { buy, rent, investment, tax } = parsed.data;
  return {
    buy: {
      purchasePrice: buy.purchase_price,
      depositPct: buy.deposit_pct,
      mortgageRate: buy.mortgage_rate,
      mortgageTermYears: buy.mortgage_term_years,
      propertyAppreciationRate: buy.property_appreciation_rate,
      stampDutyOverride: buy.stamp_duty_override,
      lmi: buy.lmi,
      state: buy.state,
      firstHomeBuyer: buy.first_home_buyer,
      newBuild: buy.new_build,
      rateSchedule: buy.rate_schedule,
      councilRatesPct: buy.council_rates_pct,
      insurancePct: buy.insurance_pct,
      maintenancePct: buy.maintenance_pct,
      waterRatesAnnual: buy.water_rates_annual,
      strataAnnual: buy.strata_annual,
      sellingAgentPct: buy.selling_agent_pct,
      sellingLegal: buy.selling_legal,
    },
    rent: {
      weeklyRent: rent.weekly_rent,
      rentIncreaseRate: rent.rent_increase_rate,
      rentersInsuranceAnnual: rent.renters_insurance_annual,
    },
    investment: {
      returnRate: investment.return_rate,
      dividendYield: investment.dividend_yield,
      frankingRate: investment.franking_rate,
    },
    tax: { grossIncome: tax.gross_income },
    inflationRate: parsed.data.inflation_rate,
    timeHorizonYears: parsed.data.time_horizon_years,
    existingSavings: parsed.data.existing_savings,
  };
}

/** Inverse of paramsFromConfig. */
export function paramsToConfig(params: ScenarioParams): ScenarioConfig {
  const { buy, rent, investment, tax } = params;
  return {
    buy: {
      purchase_price: buy.purchasePrice,
      deposit_pct: buy.depositPct,
      mortgage_rate: buy.mortgageRate,
      mortgage_term_years: buy.mortgageTermYears,
      property_appreciation_rate: buy.propertyAppreciationRate,
      stamp_duty_override: buy.stampDutyOverride,
      lmi: buy.lmi,
      state: buy.state,
      first_home_buyer: buy.firstHomeBuyer,
      new_build: buy.newBuild,
      rate_schedule: buy.rateSchedule
        ? buy.rateSchedule.map(({ year, rate }) => ({ year, rate }))
        : null,
      council_rates_pct: buy.councilRatesPct,
      insurance_pct: buy.insurancePct,
      maintenance_pct: buy.maintenancePct,
      water_rates_annual: buy.waterRatesAnnual,
      strata_annual: buy.strataAnnual,
      selling_agent_pct: buy.sellingAgentPct,
      selling_legal: buy.sellingLegal,
    },
    rent: {
      weekly_rent: rent.weeklyRent,
      rent_increase_rate: rent.rentIncreaseRate,
      renters_insurance_annual: rent.rentersInsuranceAnnual,
    },
    investment: {
      return_rate: investment.returnRate,
      dividend_yield: investment.dividendYield,
      franking_rate: investment.frankingRate,
    },
    tax: { gross_income: tax.grossIncome },
    inflation_rate: params.inflationRate,
    time_horizon_years: params.timeHorizonYears,
    existing_savings: params.existingSavings,
  };
}

export type ConfigFormat = "yaml" | "json";

/** `.json` is JSON; `.yaml`, `.yml` and unknown extensions are YAML. */
export function configFormatForPath(path: string): ConfigFormat {
  return extname(path).toLowerCase() === ".json" ? "json" : "yaml";
}

/** Parse config text. Syntax errors throw ConfigError. */
export function parseConfigText(
  text: string,
  source = "config",
  format: ConfigFormat = "json"
): ScenarioParams {
  let data: unknown;
  try {
    data = format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Config] Could not parse ${source}:`, message);
    throw new ConfigError(`Could not parse ${source}: ${message}`);
  }
  return paramsFromConfig(data);
}

export async function loadConfigFile(path: string): Promise<ScenarioParams> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Config] Could not read ${path}:`, message);
    throw new ConfigError(`Could not read ${path}: ${message}`);
  }
  return parseConfigText(text, path, configFormatForPath(path));
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** Stable key for memoizing results: sorted-key JSON of the config mapping. */
export function configCacheKey(params: ScenarioParams): string {
  return stableStringify(paramsToConfig(params));
}
