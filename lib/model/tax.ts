/**
 * Australian tax calculations: income tax, stamp duty, CGT, FHOG.
 * Pure functions over the tables in constants.ts.
 */

import {
  CGT_DISCOUNT,
  FHB_DUTY_THRESHOLDS,
  FHOG_AMOUNTS,
  INCOME_BRACKETS,
  MEDICARE_LEVY,
  NSW_DUTY_BRACKETS,
  QLD_DUTY_BRACKETS,
  QLD_FHOG_PRICE_CAP,
  VIC_DUTY_BRACKETS,
  VIC_FLAT_RATE,
  VIC_FLAT_RATE_THRESHOLD,
  type Bracket,
} from "@/lib/model/constants";
import { UnsupportedStateError } from "@/lib/model/errors";
import { SUPPORTED_STATES } from "@/lib/types/zod";

/** Sum of rate × band for each marginal bracket the amount reaches. */
export function calcProgressiveDuty(amount: number, brackets: readonly Bracket[]): number {
  let total = 0;
  let prev = 0;
  for (const [threshold, rate] of brackets) {
    const band = Math.min(amount, threshold) - prev;
    if (band <= 0) break;
    total += band * rate;
    prev = threshold;
  }
  return total;
}

/** Income tax excluding Medicare levy. */
export function incomeTax(grossIncome: number): number {
  return calcProgressiveDuty(grossIncome, INCOME_BRACKETS);
}

/** Marginal rate for the income band (upper bound inclusive), plus Medicare levy. */
export function marginalRate(grossIncome: number): number {
  let rate = 0;
  for (const [threshold, r] of INCOME_BRACKETS) {
    rate = r;
    if (grossIncome <= threshold) break;
  }
  return rate + MEDICARE_LEVY;
}

/**
 * Scale full duty for a first home buyer: 0 up to `exempt`, linear to full duty at `concession`.
 * Returns null above the concession cap (no concession).
 */
function firstHomeBuyerDuty(
  price: number,
  fullDuty: () => number,
  thresholds: { exempt: number; concession: number }
): number | null {
  if (price <= thresholds.exempt) return 0;
  if (price > thresholds.concession) return null;
  const payable = (price - thresholds.exempt) / (thresholds.concession - thresholds.exempt);
  return fullDuty() * payable;
}

export function calcNswStampDuty(price: number, firstHomeBuyer = false): number {
  const full = () => calcProgressiveDuty(price, NSW_DUTY_BRACKETS);
  if (firstHomeBuyer) {
    const concessional = firstHomeBuyerDuty(price, full, FHB_DUTY_THRESHOLDS.NSW);
    if (concessional != null) return concessional;
  }
  return full();
}

/** VIC: progressive up to $960k, flat 5.5% of the whole price above. */
export function calcVicStampDuty(price: number, firstHomeBuyer = false): number {
  const full = () =>
    price <= VIC_FLAT_RATE_THRESHOLD
      ? calcProgressiveDuty(price, VIC_DUTY_BRACKETS)
      : price * VIC_FLAT_RATE;
  if (firstHomeBuyer) {
    const concessional = firstHomeBuyerDuty(price, full, FHB_DUTY_THRESHOLDS.VIC);
    if (concessional != null) return concessional;
  }
  return full();
}

/** QLD home concession rates; new builds get a higher first home buyer exemption. */
export function calcQldStampDuty(
  price: number,
  firstHomeBuyer = false,
  newBuild = false
): number {
  const full = () => calcProgressiveDuty(price, QLD_DUTY_BRACKETS);
  if (firstHomeBuyer) {
    const thresholds = newBuild ? FHB_DUTY_THRESHOLDS.QLD_NEW_BUILD : FHB_DUTY_THRESHOLDS.QLD;
    const concessional = firstHomeBuyerDuty(price, full, thresholds);
    if (concessional != null) return concessional;
  }
  return full();
}

type DutyCalculator = (price: number, firstHomeBuyer: boolean, newBuild: boolean) => number;

const STAMP_DUTY_CALCULATORS: Record<(typeof SUPPORTED_STATES)[number], DutyCalculator> = {
  NSW: calcNswStampDuty,
  VIC: calcVicStampDuty,
  QLD: calcQldStampDuty,
};

function isSupportedState(code: string): code is (typeof SUPPORTED_STATES)[number] {
  return (SUPPORTED_STATES as readonly string[]).includes(code);
}

/** Stamp duty for a state. Throws UnsupportedStateError for states without a calculator. */
export function calcStampDuty(
  price: number,
  state = "NSW",
  firstHomeBuyer = false,
  newBuild = false
): number {
  const code = state.toUpperCase();
  if (!isSupportedState(code)) {
    throw new UnsupportedStateError(state, SUPPORTED_STATES);
  }
  return STAMP_DUTY_CALCULATORS[code](price, firstHomeBuyer, newBuild);
}

/**
 * CGT payable on a gain. PPOR is exempt; the 50% discount applies when held over 12 months.
 */
export function calcCgt(
  gains: number,
  marginalTaxRate: number,
  heldOver12Months = true,
  isPpor = false
): number {
  if (isPpor || gains <= 0) return 0;
  const taxable = heldOver12Months ? gains * (1 - CGT_DISCOUNT) : gains;
  return taxable * marginalTaxRate;
}

/** First Home Owner Grant (new builds only). QLD forfeits the grant above its price cap. */
export function fhog(state = "NSW", newBuild = false, price = 0): number {
  if (!newBuild) return 0;
  const code = state.toUpperCase();
  if (code === "QLD" && price > QLD_FHOG_PRICE_CAP) return 0;
  return FHOG_AMOUNTS[code] ?? 0;
}
