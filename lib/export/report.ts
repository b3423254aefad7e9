/**
 * Plain-text reports: parameter header, net worth table at key years,
 * year-by-year breakdown, after-tax liquidation comparison, sensitivity sweep table.
 */

import type { ScenarioParams } from "@/lib/types/zod";
import {
  crossoverYear,
  netWorthAtSale,
  type YearSnapshot,
} from "@/lib/model/engine";
import { deposit, investorMarginalRate, loanAmount, stampDuty } from "@/lib/model/params";
import type { SweepResult } from "@/lib/model/sensitivity";
import { fmt, formatNumber, formatPercent } from "@/lib/utils/format";

const pad = (value: string, width: number) => value.padStart(width);

const winnerLabel = (buyWins: boolean) => (buyWins ? "Buy" : "Rent");

function tableLines(header: string, rows: string[]): string[] {
  return [header, "-".repeat(header.length), ...rows];
}

function byYear(snapshots: YearSnapshot[]): Map<number, YearSnapshot> {
  return new Map(snapshots.map((s) => [s.year, s]));
}

export function summaryHeader(params: ScenarioParams): string {
  const { buy, rent, investment: inv } = params;
  const lines = [
    "Australian Housing Model - Buy vs Rent Analysis",
    "=".repeat(70),
    "",
    `  Purchase price:  ${fmt(buy.purchasePrice)} (${buy.state})`,
    `  Deposit:         ${formatPercent(buy.depositPct, 0)} (${fmt(deposit(buy))})`,
    `  Stamp duty:      ${fmt(stampDuty(buy))}`,
    `  Loan amount:     ${fmt(loanAmount(buy))}`,
    `  Mortgage rate:   ${formatPercent(buy.mortgageRate, 2)} p.a. (${buy.mortgageTermYears}yr)`,
  ];
  if (buy.rateSchedule && buy.rateSchedule.length > 0) {
    const schedule = [...buy.rateSchedule]
      .sort((a, b) => a.year - b.year)
      .map((e) => `yr${e.year}: ${formatPercent(e.rate, 2)}`)
      .join(", ");
    lines.push(`  Rate schedule:   ${schedule}`);
  }
  if (buy.strataAnnual > 0) {
    lines.push(`  Strata:          ${fmt(buy.strataAnnual)}/yr`);
  }
  lines.push(
    `  Appreciation:    ${formatPercent(buy.propertyAppreciationRate)} p.a.`,
    "",
    `  Weekly rent:     $${formatNumber(rent.weeklyRent)} (increases ${formatPercent(rent.rentIncreaseRate)}/yr)`,
    `  Savings:         ${fmt(params.existingSavings)}`,
    `  Investment return: ${formatPercent(inv.returnRate)} p.a. (div yield ${formatPercent(inv.dividendYield)})`,
    `  Inflation:       ${formatPercent(params.inflationRate)} p.a.`,
    `  Tax bracket:     ${formatPercent(investorMarginalRate(params), 0)} (income ${fmt(params.tax.grossIncome)})`,
    ""
  );
  return lines.join("\n");
}

/** Default report years: every 5 up to 30 within the horizon, plus the horizon itself. */
export function keyYears(horizon: number): number[] {
  const years = [0, 5, 10, 15, 20, 25, 30].filter((y) => y <= horizon);
  if (!years.includes(horizon)) years.push(horizon);
  return years;
}

export function summaryTable(
  snapshots: YearSnapshot[],
  params: ScenarioParams,
  options: { years?: number[]; showReal?: boolean } = {}
): string {
  const years = options.years ?? keyYears(params.timeHorizonYears);
  const showReal = options.showReal ?? true;
  const snapshotMap = byYear(snapshots);

  const header = showReal
    ? `${pad("Year", 4)} | ${pad("Buy NW (nom)", 14)} | ${pad("Buy NW (real)", 14)} | ` +
      `${pad("Rent NW (nom)", 14)} | ${pad("Rent NW (real)", 14)} | ${pad("Winner", 6)}`
    : `${pad("Year", 4)} | ${pad("Buy NW", 14)} | ${pad("Rent NW", 14)} | ` +
      `${pad("Difference", 14)} | ${pad("Winner", 6)}`;

  const rows: string[] = [];
  for (const year of years) {
    const s = snapshotMap.get(year);
    if (!s) continue;
    const winner = winnerLabel(s.netWorthDifference > 0);
    rows.push(
      showReal
        ? `${pad(String(s.year), 4)} | ${pad(fmt(s.buyNetWorth), 14)} | ${pad(fmt(s.buyNetWorthReal), 14)} | ` +
            `${pad(fmt(s.rentNetWorth), 14)} | ${pad(fmt(s.rentNetWorthReal), 14)} | ${pad(winner, 6)}`
        : `${pad(String(s.year), 4)} | ${pad(fmt(s.buyNetWorth), 14)} | ${pad(fmt(s.rentNetWorth), 14)} | ` +
            `${pad(fmt(s.netWorthDifference), 14)} | ${pad(winner, 6)}`
    );
  }
  return tableLines(header, rows).join("\n");
}

/** After-tax liquidation comparison at years 5, 10, ... within the horizon. */
export function liquidationSummary(snapshots: YearSnapshot[], params: ScenarioParams): string {
  const years = [5, 10, 15, 20, 25, 30].filter((y) => y <= params.timeHorizonYears);
  const snapshotMap = byYear(snapshots);
  const header =
    `${pad("Year", 4)} | ${pad("Buy (after sale)", 16)} | ${pad("Rent (after CGT)", 16)} | ` +
    `${pad("Diff", 14)} | ${pad("Winner", 6)}`;

  const rows: string[] = [];
  for (const year of years) {
    const s = snapshotMap.get(year);
    if (!s) continue;
    const result = netWorthAtSale(s, params);
    rows.push(
      `${pad(String(year), 4)} | ${pad(fmt(result.buyNetWorthAfterSale), 16)} | ` +
        `${pad(fmt(result.rentNetWorthAfterTax), 16)} | ${pad(fmt(result.difference), 14)} | ` +
        `${pad(winnerLabel(result.buyWins), 6)}`
    );
  }
  return ["After-tax liquidation comparison:", ...tableLines(header, rows)].join("\n");
}

/** Every snapshot year: property, mortgage, rate, costs and both net worths. */
export function detailedTable(snapshots: YearSnapshot[]): string {
  const header =
    `${pad("Yr", 3)} | ${pad("Prop Value", 12)} | ${pad("Mortgage", 12)} | ${pad("Rate", 5)} | ` +
    `${pad("Buy Costs", 10)} | ${pad("Buy NW", 12)} | ` +
    `${pad("Rent", 10)} | ${pad("Rent Inv", 12)} | ${pad("Rent NW", 12)} | ${pad("Diff", 12)}`;
  const rows = snapshots.map(
    (s) =>
      `${pad(String(s.year), 3)} | ${pad(fmt(s.propertyValue), 12)} | ${pad(fmt(s.mortgageBalance), 12)} | ` +
      `${pad(formatPercent(s.mortgageRate), 5)} | ` +
      `${pad(fmt(s.buyHousingCosts), 10)} | ${pad(fmt(s.buyNetWorth), 12)} | ` +
      `${pad(fmt(s.annualRent), 10)} | ${pad(fmt(s.rentInvestments), 12)} | ` +
      `${pad(fmt(s.rentNetWorth), 12)} | ${pad(fmt(s.netWorthDifference), 12)}`
  );
  return tableLines(header, rows).join("\n");
}

export function crossoverMessage(snapshots: YearSnapshot[]): string {
  const xover = crossoverYear(snapshots);
  if (xover != null) return `Crossover point: Year ${xover} (buying becomes better)`;
  const last = snapshots[snapshots.length - 1];
  if (last && last.netWorthDifference > 0) return "Buying is better from the start.";
  return "Renting is better for the entire time horizon.";
}

export function fullReport(snapshots: YearSnapshot[], params: ScenarioParams): string {
  return [
    summaryHeader(params),
    summaryTable(snapshots, params),
    "",
    crossoverMessage(snapshots),
    "",
    liquidationSummary(snapshots, params),
  ].join("\n");
}

/** Sweep results as a table; percentage values print as "6.00%", others as "800,000". */
export function formatSweep(path: string, results: SweepResult[], isPercentage = true): string {
  const label = path.split(".").pop() ?? path;
  const header =
    `${pad("", 2)} ${pad(label, 12)} | ${pad("Buy NW (real)", 14)} | ${pad("Rent NW (real)", 14)} | ` +
    `${pad("Diff", 14)} | ${pad("Winner", 6)} | ${pad("Crossover", 9)}`;
  const rows = results.map((r) => {
    const value = isPercentage ? formatPercent(r.paramValue, 2) : formatNumber(r.paramValue);
    const xover = r.crossover != null ? `Year ${r.crossover}` : "N/A";
    return (
      `${pad("", 2)} ${pad(value, 12)} | ${pad(fmt(r.buyNetWorthReal), 14)} | ` +
      `${pad(fmt(r.rentNetWorthReal), 14)} | ${pad(fmt(r.differenceReal), 14)} | ` +
      `${pad(winnerLabel(r.buyWins), 6)} | ${pad(xover, 9)}`
    );
  });
  return [`Sensitivity: ${path} (at end of time horizon)`, ...tableLines(header, rows)].join("\n");
}
