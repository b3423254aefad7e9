/**
 * Buy-vs-rent projection engine.
 * Annual steps with monthly mortgage amortization; whichever scenario spends less
 * in a year invests the difference with mid-year growth.
 */

import type { ScenarioParams } from "@/lib/types/zod";
import { MONTHS_PER_YEAR, WEEKS_PER_YEAR } from "@/lib/model/constants";
import {
  effectiveDividendTaxRate,
  investorMarginalRate,
  loanAmount,
  rateForYear,
  upfrontCosts,
} from "@/lib/model/params";
import { calcCgt } from "@/lib/model/tax";

/** State at the end of a simulated year (year 0 = settlement). */
export interface YearSnapshot {
  year: number;

  // Buy scenario
  propertyValue: number;
  mortgageBalance: number;
  /** Rate in effect during this year. */
  mortgageRate: number;
  /** Mortgage repayments + ongoing costs this year (upfront costs in year 0). */
  buyHousingCosts: number;
  buyCumulativeCosts: number;
  buyEquity: number;
  buyInvestments: number;
  /** Cost base of buy-side investments. */
  buyContributions: number;
  buyNetWorth: number;
  buyNetWorthReal: number;

  // Rent scenario
  annualRent: number;
  rentHousingCosts: number;
  rentCumulativeCosts: number;
  rentInvestments: number;
  /** Cost base of rent-side investments. */
  rentContributions: number;
  rentNetWorth: number;
  rentNetWorthReal: number;

  /** Buy − rent; positive = buying is ahead. */
  netWorthDifference: number;
  netWorthDifferenceReal: number;
}

/** After-tax position if everything is sold at a snapshot's year. */
export interface LiquidationResult {
  year: number;
  buyNetWorthAfterSale: number;
  buyNetWorthAfterSaleReal: number;
  rentNetWorthAfterTax: number;
  rentNetWorthAfterTaxReal: number;
  difference: number;
  differenceReal: number;
  buyWins: boolean;
}

export interface AmortizationYear {
  balance: number;
  principalPaid: number;
  interestPaid: number;
}

/** Cumulative inflation factor from year 0. */
export function priceIndex(inflationRate: number, year: number): number {
  return Math.pow(1 + inflationRate, year);
}

/** Monthly P&I repayment. Zero rate amortizes straight-line. */
export function monthlyRepayment(principal: number, annualRate: number, years: number): number {
  const n = years * MONTHS_PER_YEAR;
  if (n <= 0) return principal;
  if (annualRate === 0) return principal / n;
  const r = annualRate / MONTHS_PER_YEAR;
  const compound = Math.pow(1 + r, n);
  return (principal * (r * compound)) / (compound - 1);
}

/**
 * Apply 12 monthly repayments. The final principal payment is capped at the
 * remaining balance; stops early once the loan is repaid.
 */
export function mortgageBalanceAfterYear(
  balance: number,
  annualRate: number,
  payment: number
): AmortizationYear {
  const r = annualRate / MONTHS_PER_YEAR;
  let principalPaid = 0;
  let interestPaid = 0;
  let remaining = balance;
  for (let m = 0; m < MONTHS_PER_YEAR; m++) {
    const interest = remaining * r;
    const principal = Math.min(payment - interest, remaining);
    remaining -= principal;
    interestPaid += interest;
    principalPaid += principal;
    if (remaining <= 0) break;
  }
  return { balance: Math.max(remaining, 0), principalPaid, interestPaid };
}

/** One year of portfolio growth net of dividend tax. */
export function growInvestments(
  portfolio: number,
  returnRate: number,
  dividendYield: number,
  dividendTaxRate: number
): { balance: number; reinvestedDividends: number } {
  const grossReturn = portfolio * returnRate;
  // Dividends are part of a positive return; none are paid in a losing year
  const dividends = returnRate > 0 ? portfolio * dividendYield : 0;
  const dividendTax = dividends * dividendTaxRate;
  return {
    balance: portfolio + grossReturn - dividendTax,
    reinvestedDividends: dividends - dividendTax,
  };
}

/** Surplus invested during the year earns roughly half a year of returns. */
export function midYearGrowth(surplus: number, returnRate: number): number {
  return surplus * (1 + returnRate / 2);
}

/**
 * Run the year-by-year simulation for both scenarios.
 * Returns one snapshot per year, 0..timeHorizonYears inclusive.
 */
export function simulate(params: ScenarioParams): YearSnapshot[] {
  const { buy, rent, investment: inv } = params;
  const dividendTaxRate = effectiveDividendTaxRate(
    investorMarginalRate(params),
    inv.frankingRate
  );

  const upfront = upfrontCosts(buy);

  let currentRate = rateForYear(buy, 1);
  let mortgageBalance = loanAmount(buy);
  let payment = monthlyRepayment(mortgageBalance, currentRate, buy.mortgageTermYears);

  let propertyValue = buy.purchasePrice;
  let buyInvestments = Math.max(params.existingSavings - upfront, 0);
  let buyContributions = buyInvestments;
  let buyCumulative = upfront;

  let rentInvestments = params.existingSavings;
  let rentContributions = params.existingSavings;
  let weeklyRent = rent.weeklyRent;
  let rentCumulative = 0;

  const buyNetWorth0 = propertyValue - mortgageBalance + buyInvestments;
  const snapshots: YearSnapshot[] = [
    {
      year: 0,
      propertyValue,
      mortgageBalance,
      mortgageRate: currentRate,
      buyHousingCosts: upfront,
      buyCumulativeCosts: buyCumulative,
      buyEquity: propertyValue - mortgageBalance,
      buyInvestments,
      buyContributions,
      buyNetWorth: buyNetWorth0,
      buyNetWorthReal: buyNetWorth0,
      annualRent: 0,
      rentHousingCosts: 0,
      rentCumulativeCosts: 0,
      rentInvestments,
      rentContributions,
      rentNetWorth: rentInvestments,
      rentNetWorthReal: rentInvestments,
      netWorthDifference: buyNetWorth0 - rentInvestments,
      netWorthDifferenceReal: buyNetWorth0 - rentInvestments,
    },
  ];

  for (let year = 1; year <= params.timeHorizonYears; year++) {
    const deflator = priceIndex(params.inflationRate, year);

    // Rate change: re-amortize the remaining balance over the remaining term
    const yearRate = rateForYear(buy, year);
    if (yearRate !== currentRate && mortgageBalance > 0) {
      currentRate = yearRate;
      const remainingYears = buy.mortgageTermYears - (year - 1);
      if (remainingYears > 0) {
        payment = monthlyRepayment(mortgageBalance, currentRate, remainingYears);
      }
    }

    let mortgagePaid = 0;
    if (mortgageBalance > 0) {
      const amort = mortgageBalanceAfterYear(mortgageBalance, currentRate, payment);
      mortgageBalance = amort.balance;
      mortgagePaid = amort.principalPaid + amort.interestPaid;
    }

    propertyValue *= 1 + buy.propertyAppreciationRate;

    const ongoing =
      propertyValue * (buy.councilRatesPct + buy.insurancePct + buy.maintenancePct) +
      (buy.waterRatesAnnual + buy.strataAnnual) * deflator;
    const buyYearCosts = mortgagePaid + ongoing;
    buyCumulative += buyYearCosts;

    const buyGrowth = growInvestments(
      buyInvestments,
      inv.returnRate,
      inv.dividendYield,
      dividendTaxRate
    );
    buyInvestments = buyGrowth.balance;
    buyContributions += buyGrowth.reinvestedDividends;

    const annualRent = weeklyRent * WEEKS_PER_YEAR;
    const rentYearCosts = annualRent + rent.rentersInsuranceAnnual * deflator;
    rentCumulative += rentYearCosts;

    const rentGrowth = growInvestments(
      rentInvestments,
      inv.returnRate,
      inv.dividendYield,
      dividendTaxRate
    );
    rentInvestments = rentGrowth.balance;
    rentContributions += rentGrowth.reinvestedDividends;

    // Whoever spent less this year invests the gap
    if (buyYearCosts > rentYearCosts) {
      const surplus = buyYearCosts - rentYearCosts;
      rentInvestments += midYearGrowth(surplus, inv.returnRate);
      rentContributions += surplus;
    } else if (rentYearCosts > buyYearCosts) {
      const surplus = rentYearCosts - buyYearCosts;
      buyInvestments += midYearGrowth(surplus, inv.returnRate);
      buyContributions += surplus;
    }

    const buyEquity = propertyValue - mortgageBalance;
    const buyNetWorth = buyEquity + buyInvestments;
    const rentNetWorth = rentInvestments;
    const buyNetWorthReal = buyNetWorth / deflator;
    const rentNetWorthReal = rentNetWorth / deflator;

    snapshots.push({
      year,
      propertyValue,
      mortgageBalance,
      mortgageRate: currentRate,
      buyHousingCosts: buyYearCosts,
      buyCumulativeCosts: buyCumulative,
      buyEquity,
      buyInvestments,
      buyContributions,
      buyNetWorth,
      buyNetWorthReal,
      annualRent,
      rentHousingCosts: rentYearCosts,
      rentCumulativeCosts: rentCumulative,
      rentInvestments,
      rentContributions,
      rentNetWorth,
      rentNetWorthReal,
      netWorthDifference: buyNetWorth - rentNetWorth,
      netWorthDifferenceReal: buyNetWorthReal - rentNetWorthReal,
    });

    weeklyRent *= 1 + rent.rentIncreaseRate;
  }

  return snapshots;
}

/**
 * After-tax liquidation at a snapshot.
 * Buy: sell the home (PPOR, no CGT), repay the mortgage (a shortfall reduces net worth),
 * then pay discounted CGT on the investment portfolio. Rent: discounted CGT on the portfolio.
 */
export function netWorthAtSale(snapshot: YearSnapshot, params: ScenarioParams): LiquidationResult {
  const { buy } = params;
  const marginal = investorMarginalRate(params);
  const deflator = priceIndex(params.inflationRate, snapshot.year);

  const saleProceeds =
    snapshot.propertyValue * (1 - buy.sellingAgentPct) - buy.sellingLegal * deflator;
  const buyInvestmentGains = Math.max(snapshot.buyInvestments - snapshot.buyContributions, 0);
  const buyAfterSale =
    saleProceeds -
    snapshot.mortgageBalance +
    snapshot.buyInvestments -
    calcCgt(buyInvestmentGains, marginal, true);

  const rentGains = Math.max(snapshot.rentInvestments - snapshot.rentContributions, 0);
  const rentAfterTax = snapshot.rentInvestments - calcCgt(rentGains, marginal, true);

  const difference = buyAfterSale - rentAfterTax;
  return {
    year: snapshot.year,
    buyNetWorthAfterSale: buyAfterSale,
    buyNetWorthAfterSaleReal: buyAfterSale / deflator,
    rentNetWorthAfterTax: rentAfterTax,
    rentNetWorthAfterTaxReal: rentAfterTax / deflator,
    difference,
    differenceReal: difference / deflator,
    buyWins: buyAfterSale > rentAfterTax,
  };
}

/** First year buy overtakes rent (difference goes from ≤ 0 to > 0), or null. */
export function crossoverYear(snapshots: YearSnapshot[]): number | null {
  for (let i = 1; i < snapshots.length; i++) {
    const prev = snapshots[i - 1];
    const curr = snapshots[i];
    if (prev.netWorthDifference <= 0 && curr.netWorthDifference > 0) return curr.year;
  }
  return null;
}
