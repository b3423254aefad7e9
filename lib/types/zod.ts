/**
 * Zod schemas for the buy-vs-rent scenario model.
 * All rates are decimals (0.062 = 6.2%); percentages are converted at the UI boundary.
 */

import { z } from "zod";

export const SUPPORTED_STATES = ["NSW", "VIC", "QLD"] as const;

/** State code as entered; case-insensitive, validated by the stamp duty dispatcher. */
export const StateCodeSchema = z.string().min(1);
export type StateCode = z.infer<typeof StateCodeSchema>;

export const RateScheduleEntrySchema = z.object({
  /** First simulation year (1-based) the rate applies to. */
  year: z.number().int().min(0),
  rate: z.number(),
});
export type RateScheduleEntry = z.infer<typeof RateScheduleEntrySchema>;

export const BuyParamsSchema = z.object({
  purchasePrice: z.number().min(0).default(800_000),
  depositPct: z.number().min(0).max(1).default(0.2),
  mortgageRate: z.number().default(0.062),
  mortgageTermYears: z.number().int().positive().default(30),
  propertyAppreciationRate: z.number().default(0.05),
  /** When set, skips the state stamp duty calculation. */
  stampDutyOverride: z.number().min(0).nullable().default(null),
  /** Lenders mortgage insurance premium. Null = estimate from LVR. */
  lmi: z.number().min(0).nullable().default(null),
  state: StateCodeSchema.default("NSW"),
  firstHomeBuyer: z.boolean().default(false),
  newBuild: z.boolean().default(false),
  /** Variable rate schedule, e.g. [{year: 1, rate: 0.062}, {year: 4, rate: 0.055}]. */
  rateSchedule: z.array(RateScheduleEntrySchema).nullable().default(null),

  // Ongoing costs: % of property value per year
  councilRatesPct: z.number().min(0).default(0.003),
  insurancePct: z.number().min(0).default(0.002),
  maintenancePct: z.number().min(0).default(0.01),
  // Ongoing costs: fixed amounts in year-0 dollars (inflated)
  waterRatesAnnual: z.number().min(0).default(1_200),
  strataAnnual: z.number().min(0).default(0),

  // Sale costs
  sellingAgentPct: z.number().min(0).max(1).default(0.02),
  sellingLegal: z.number().min(0).default(2_000),
});
export type BuyParams = z.infer<typeof BuyParamsSchema>;

export const RentParamsSchema = z.object({
  weeklyRent: z.number().min(0).default(650),
  rentIncreaseRate: z.number().default(0.04),
  rentersInsuranceAnnual: z.number().min(0).default(300),
});
export type RentParams = z.infer<typeof RentParamsSchema>;

export const InvestmentParamsSchema = z.object({
  returnRate: z.number().default(0.07),
  /** Portion of the return paid as dividends (taxed annually). */
  dividendYield: z.number().min(0).default(0.02),
  /** Share of dividends that are franked (0–1). */
  frankingRate: z.number().min(0).max(1).default(0),
});
export type InvestmentParams = z.infer<typeof InvestmentParamsSchema>;

export const TaxParamsSchema = z.object({
  grossIncome: z.number().min(0).default(180_000),
});
export type TaxParams = z.infer<typeof TaxParamsSchema>;

export const ScenarioParamsSchema = z.object({
  buy: BuyParamsSchema.default({}),
  rent: RentParamsSchema.default({}),
  investment: InvestmentParamsSchema.default({}),
  tax: TaxParamsSchema.default({}),
  inflationRate: z.number().default(0.03),
  timeHorizonYears: z.number().int().min(0).default(30),
  existingSavings: z.number().min(0).default(200_000),
});
export type ScenarioParams = z.infer<typeof ScenarioParamsSchema>;
/** Input shape before defaults are applied (every field optional). */
export type ScenarioParamsInput = z.input<typeof ScenarioParamsSchema>;

/** 5×5 correlation matrix in VAR_NAMES order. */
export const CorrelationMatrixSchema = z.array(z.array(z.number()).length(5)).length(5);
export type CorrelationMatrix = z.infer<typeof CorrelationMatrixSchema>;

export const MCConfigSchema = z.object({
  nRuns: z.number().int().positive().default(5_000),
  // The generator state is 32 bits; wider seeds would alias
  seed: z.number().int().min(0).max(0xffffffff).nullable().default(null),
  // Annual standard deviation per stochastic variable
  stdPropertyAppreciation: z.number().min(0).default(0.1),
  stdInvestmentReturn: z.number().min(0).default(0.15),
  stdRentIncrease: z.number().min(0).default(0.02),
  stdInflation: z.number().min(0).default(0.015),
  stdMortgageRate: z.number().min(0).default(0.01),
  /** Null = DEFAULT_CORRELATION. */
  correlationOverride: CorrelationMatrixSchema.nullable().default(null),
});
export type MCConfig = z.infer<typeof MCConfigSchema>;
export type MCConfigInput = z.input<typeof MCConfigSchema>;
