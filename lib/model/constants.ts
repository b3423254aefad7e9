/**
 * Default constants and rate tables for the Australian housing model.
 * Income tax brackets are 2025-26; stamp duty tables are owner-occupier rates.
 */

/** [upper bound, rate] pair for a marginal bracket table. */
export type Bracket = readonly [threshold: number, rate: number];

/** Resident income tax brackets (excluding Medicare levy). */
export const INCOME_BRACKETS: readonly Bracket[] = [
  [18_200, 0.0],
  [45_000, 0.16],
  [135_000, 0.3],
  [190_000, 0.37],
  [Infinity, 0.45],
];

export const MEDICARE_LEVY = 0.02;

/** Company tax rate used to value franking credits. */
export const CORPORATE_TAX_RATE = 0.3;

/** CGT discount for assets held more than 12 months. */
export const CGT_DISCOUNT = 0.5;

export const NSW_DUTY_BRACKETS: readonly Bracket[] = [
  [17_000, 0.0125],
  [36_000, 0.015],
  [97_000, 0.0175],
  [364_000, 0.035],
  [1_212_000, 0.045],
  [3_636_000, 0.055],
  [Infinity, 0.065],
];

/** VIC principal place of residence rates, used up to VIC_FLAT_RATE_THRESHOLD. */
export const VIC_DUTY_BRACKETS: readonly Bracket[] = [
  [25_000, 0.014],
  [130_000, 0.024],
  [440_000, 0.05],
  [960_000, 0.06],
];
export const VIC_FLAT_RATE_THRESHOLD = 960_000;
export const VIC_FLAT_RATE = 0.055;

/** QLD home concession rates. */
export const QLD_DUTY_BRACKETS: readonly Bracket[] = [
  [75_000, 0.015],
  [540_000, 0.035],
  [1_000_000, 0.045],
  [Infinity, 0.0575],
];

/** First home buyer duty thresholds: full exemption up to `exempt`, linear taper up to `concession`. */
export const FHB_DUTY_THRESHOLDS = {
  NSW: { exempt: 800_000, concession: 1_000_000 },
  VIC: { exempt: 600_000, concession: 750_000 },
  QLD: { exempt: 700_000, concession: 800_000 },
  QLD_NEW_BUILD: { exempt: 800_000, concession: 900_000 },
} as const;

/** First Home Owner Grant, new builds only. */
export const FHOG_AMOUNTS: Readonly<Record<string, number>> = {
  NSW: 10_000,
  VIC: 10_000,
  QLD: 30_000,
};

/** QLD forfeits the grant entirely above this price. */
export const QLD_FHOG_PRICE_CAP = 750_000;

/** LMI applies above this LVR. */
export const LMI_LVR_THRESHOLD = 0.8;

export const MONTHS_PER_YEAR = 12;
export const WEEKS_PER_YEAR = 52;
