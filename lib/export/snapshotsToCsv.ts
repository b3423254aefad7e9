/**
 * Export yearly snapshots to CSV.
 * Fixed 20-column header; money to 2 dp, mortgage rate to 4 dp.
 */

import type { YearSnapshot } from "@/lib/model/engine";

/** Column name → snapshot field, in output order. */
const COLUMNS: readonly (readonly [string, keyof YearSnapshot])[] = [
  ["year", "year"],
  ["property_value", "propertyValue"],
  ["mortgage_balance", "mortgageBalance"],
  ["mortgage_rate", "mortgageRate"],
  ["buy_housing_costs", "buyHousingCosts"],
  ["buy_cumulative_costs", "buyCumulativeCosts"],
  ["buy_equity", "buyEquity"],
  ["buy_investments", "buyInvestments"],
  ["buy_contributions", "buyContributions"],
  ["buy_net_worth", "buyNetWorth"],
  ["buy_net_worth_real", "buyNetWorthReal"],
  ["annual_rent", "annualRent"],
  ["rent_housing_costs", "rentHousingCosts"],
  ["rent_cumulative_costs", "rentCumulativeCosts"],
  ["rent_investments", "rentInvestments"],
  ["rent_contributions", "rentContributions"],
  ["rent_net_worth", "rentNetWorth"],
  ["rent_net_worth_real", "rentNetWorthReal"],
  ["net_worth_difference", "netWorthDifference"],
  ["net_worth_difference_real", "netWorthDifferenceReal"],
];

export const CSV_HEADER = COLUMNS.map(([name]) => name);

function formatCell(field: keyof YearSnapshot, value: number): string {
  if (field === "year") return String(value);
  if (field === "mortgageRate") return value.toFixed(4);
  return value.toFixed(2);
}

/** Serialize snapshots to CSV, one row per year. */
export function snapshotsToCsv(snapshots: YearSnapshot[]): string {
  const rows: string[] = [CSV_HEADER.join(",")];
  for (const snap of snapshots) {
    rows.push(COLUMNS.map(([, field]) => formatCell(field, snap[field])).join(","));
  }
  return rows.join("\n") + "\n";
}
