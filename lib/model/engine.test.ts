/**
 * Engine unit tests: amortization, investment growth, the yearly projection,
 * liquidation after tax, and the concrete scenarios from the fixtures.
 */

import { describe, it, expect } from "vitest";
import {
  crossoverYear,
  growInvestments,
  midYearGrowth,
  monthlyRepayment,
  mortgageBalanceAfterYear,
  netWorthAtSale,
  priceIndex,
  simulate,
  type YearSnapshot,
} from "./engine";
import { createScenarioParams, loanAmount, upfrontCosts } from "./params";
import {
  getBaseScenario,
  getDroppingRateScenario,
  getFirstHomeBuyerScenario,
  getFlatRateScenario,
  getZeroRateScenario,
} from "@/fixtures/golden-scenarios";

describe("monthlyRepayment", () => {
  it("amortizes straight-line at a zero rate", () => {
    expect(monthlyRepayment(120_000, 0, 10)).toBe(1_000);
  });

  it("returns the principal for a zero-length term", () => {
    expect(monthlyRepayment(50_000, 0.06, 0)).toBe(50_000);
  });

  it("pays more than the interest-only amount", () => {
    const payment = monthlyRepayment(640_000, 0.062, 30);
    expect(payment).toBeGreaterThan((640_000 * 0.062) / 12);
    expect(payment).toBeLessThan(640_000 / 12);
  });
});

describe("mortgageBalanceAfterYear", () => {
  it("splits twelve payments into principal and interest", () => {
    const payment = monthlyRepayment(500_000, 0.06, 25);
    const { balance, principalPaid, interestPaid } = mortgageBalanceAfterYear(
      500_000,
      0.06,
      payment
    );
    expect(principalPaid + interestPaid).toBeCloseTo(payment * 12, 6);
    expect(balance).toBeCloseTo(500_000 - principalPaid, 6);
    expect(interestPaid).toBeGreaterThan(0);
  });

  it("drives the balance to zero over the full term", () => {
    const payment = monthlyRepayment(640_000, 0.062, 30);
    let balance = 640_000;
    for (let year = 0; year < 30; year++) {
      balance = mortgageBalanceAfterYear(balance, 0.062, payment).balance;
    }
    expect(balance).toBeLessThan(1);
  });

  it("caps the final principal payment at the remaining balance", () => {
    const result = mortgageBalanceAfterYear(1_500, 0, 1_000);
    expect(result.balance).toBe(0);
    expect(result.principalPaid).toBe(1_500);
    expect(result.interestPaid).toBe(0);
  });
});

describe("growInvestments", () => {
  it("taxes dividends and reinvests the remainder", () => {
    const { balance, reinvestedDividends } = growInvestments(100_000, 0.07, 0.02, 0.39);
    // 100k + 7k return − 780 dividend tax
    expect(balance).toBeCloseTo(106_220, 6);
    expect(reinvestedDividends).toBeCloseTo(1_220, 6);
  });

  it("pays no dividends in a losing year", () => {
    const { balance, reinvestedDividends } = growInvestments(100_000, -0.1, 0.02, 0.39);
    expect(balance).toBeCloseTo(90_000, 6);
    expect(reinvestedDividends).toBe(0);
  });
});

describe("midYearGrowth", () => {
  it("earns half a year of return", () => {
    expect(midYearGrowth(10_000, 0.08)).toBeCloseTo(10_400, 6);
  });
});

describe("priceIndex", () => {
  it("compounds inflation from year 0", () => {
    expect(priceIndex(0.03, 0)).toBe(1);
    expect(priceIndex(0.03, 2)).toBeCloseTo(1.0609, 10);
  });
});

describe("simulate", () => {
  it("returns one snapshot per year including year 0", () => {
    const params = getBaseScenario();
    const snapshots = simulate(params);
    expect(snapshots).toHaveLength(31);
    expect(snapshots[0].year).toBe(0);
    expect(snapshots[0].propertyValue).toBe(params.buy.purchasePrice);
    expect(snapshots[0].mortgageBalance).toBe(loanAmount(params.buy));
    expect(snapshots[30].year).toBe(30);
  });

  it("matches hand-computed values in a zero-rate scenario", () => {
    const snapshots = simulate(getZeroRateScenario());
    const [y0, y1, y2] = snapshots;

    expect(y0.buyInvestments).toBe(30_000);
    expect(y0.buyNetWorth).toBe(50_000);
    expect(y0.rentNetWorth).toBe(50_000);
    expect(y0.netWorthDifference).toBe(0);

    // $8,000 a year of mortgage against $5,200 of rent; the renter invests the gap
    expect(y1.mortgageBalance).toBeCloseTo(72_000, 6);
    expect(y1.buyHousingCosts).toBeCloseTo(8_000, 6);
    expect(y1.rentHousingCosts).toBe(5_200);
    expect(y1.rentInvestments).toBeCloseTo(52_800, 6);
    expect(y1.rentContributions).toBeCloseTo(52_800, 6);
    expect(y1.buyNetWorth).toBeCloseTo(58_000, 6);
    expect(y1.netWorthDifference).toBeCloseTo(5_200, 6);

    expect(y2.mortgageBalance).toBeCloseTo(64_000, 6);
    expect(y2.buyCumulativeCosts).toBeCloseTo(36_000, 6);
    expect(y2.rentCumulativeCosts).toBe(10_400);
    expect(y2.rentNetWorth).toBeCloseTo(55_600, 6);
    expect(y2.buyNetWorth).toBeCloseTo(66_000, 6);
  });

  it("invests the buyer's surplus when rent costs more", () => {
    const snapshots = simulate(getZeroRateScenario({ rent: { weeklyRent: 200 } }));
    // $10,400 rent against $8,000 of repayments
    expect(snapshots[1].buyInvestments).toBeCloseTo(32_400, 6);
    expect(snapshots[1].buyContributions).toBeCloseTo(32_400, 6);
    expect(snapshots[1].rentInvestments).toBe(50_000);
  });

  it("grows the invested surplus by half a year of return", () => {
    const snapshots = simulate(getZeroRateScenario({ investment: { returnRate: 0.1 } }));
    // rent pool: 50k × 1.1 + 2,800 × 1.05
    expect(snapshots[1].rentInvestments).toBeCloseTo(57_940, 6);
    expect(snapshots[1].rentContributions).toBeCloseTo(52_800, 6);
  });

  it("inflates fixed ownership and renting costs", () => {
    const params = getZeroRateScenario({
      buy: { waterRatesAnnual: 1_000 },
      rent: { rentersInsuranceAnnual: 500 },
      inflationRate: 0.1,
    });
    const snapshots = simulate(params);
    expect(snapshots[2].buyHousingCosts).toBeCloseTo(8_000 + 1_000 * 1.21, 6);
    expect(snapshots[2].rentHousingCosts).toBeCloseTo(5_200 + 500 * 1.21, 6);
    expect(snapshots[2].buyNetWorthReal).toBeCloseTo(snapshots[2].buyNetWorth / 1.21, 6);
  });

  it("reports real net worth below nominal when inflation is positive", () => {
    const snapshots = simulate(getBaseScenario());
    for (const s of snapshots.slice(1)) {
      expect(s.buyNetWorthReal).toBeLessThan(s.buyNetWorth);
      expect(s.rentNetWorthReal).toBeLessThan(s.rentNetWorth);
    }
  });

  it("never increases the mortgage balance at a fixed rate", () => {
    const snapshots = simulate(getBaseScenario());
    for (let t = 1; t < snapshots.length; t++) {
      expect(snapshots[t].mortgageBalance).toBeLessThanOrEqual(snapshots[t - 1].mortgageBalance);
    }
  });

  it("is monotone in appreciation and investment return", () => {
    const base = getBaseScenario();
    const lowGrowth = simulate({ ...base, buy: { ...base.buy, propertyAppreciationRate: 0.03 } });
    const highGrowth = simulate({ ...base, buy: { ...base.buy, propertyAppreciationRate: 0.06 } });
    const lowReturn = simulate({ ...base, investment: { ...base.investment, returnRate: 0.05 } });
    const highReturn = simulate({ ...base, investment: { ...base.investment, returnRate: 0.09 } });
    for (let t = 1; t < lowGrowth.length; t++) {
      expect(highGrowth[t].propertyValue).toBeGreaterThan(lowGrowth[t].propertyValue);
      expect(highReturn[t].buyInvestments).toBeGreaterThanOrEqual(lowReturn[t].buyInvestments);
      expect(highReturn[t].rentInvestments).toBeGreaterThanOrEqual(lowReturn[t].rentInvestments);
    }
  });

  it("records the scheduled rate in effect each year", () => {
    const snapshots = simulate(getDroppingRateScenario());
    expect(snapshots[1].mortgageRate).toBe(0.06);
    expect(snapshots[4].mortgageRate).toBe(0.06);
    expect(snapshots[5].mortgageRate).toBe(0.04);
  });

  it("lowers the payment when the scheduled rate drops", () => {
    const snapshots = simulate(getDroppingRateScenario());
    const flat = simulate(getFlatRateScenario());
    expect(snapshots[5].buyHousingCosts).toBeLessThan(flat[5].buyHousingCosts);
  });

  it("raises net worth when dividends are franked", () => {
    const base = getBaseScenario();
    const unfranked = simulate(base);
    const franked = simulate({ ...base, investment: { ...base.investment, frankingRate: 1 } });
    expect(franked[30].rentInvestments).toBeGreaterThan(unfranked[30].rentInvestments);
  });

  it("puts the first home owner grant into the buyer's investments", () => {
    const existing = getFirstHomeBuyerScenario();
    const newBuild = { ...existing, buy: { ...existing.buy, newBuild: true } };
    expect(simulate(newBuild)[0].buyInvestments - simulate(existing)[0].buyInvestments).toBe(10_000);
  });

  it("floors buyer investments at zero when upfront costs exceed savings", () => {
    const params = createScenarioParams({ existingSavings: 50_000 });
    expect(upfrontCosts(params.buy)).toBeGreaterThan(50_000);
    expect(simulate(params)[0].buyInvestments).toBe(0);
  });
});

describe("base scenario", () => {
  const snapshots = simulate(getBaseScenario());

  it("starts with renting ahead", () => {
    expect(snapshots[0].rentNetWorth).toBeGreaterThan(snapshots[0].buyNetWorth);
  });

  it("owns the home outright after 30 years", () => {
    expect(snapshots[30].buyEquity).toBeGreaterThan(0);
    expect(snapshots[30].mortgageBalance).toBeLessThan(1);
  });
});

describe("rate schedule scenario", () => {
  it("ends year 10 with more buyer net worth than a flat 6%", () => {
    const dropping = simulate(getDroppingRateScenario());
    const flat = simulate(getFlatRateScenario());
    expect(dropping[10].buyNetWorth).toBeGreaterThan(flat[10].buyNetWorth);
  });
});

describe("netWorthAtSale", () => {
  const params = createScenarioParams({ inflationRate: 0 });
  const snapshot: YearSnapshot = {
    ...simulate(params)[10],
    propertyValue: 1_000_000,
    mortgageBalance: 300_000,
    buyInvestments: 150_000,
    buyContributions: 100_000,
    rentInvestments: 500_000,
    rentContributions: 300_000,
  };

  it("sells the home CGT-free and taxes portfolio gains at the discount", () => {
    const result = netWorthAtSale(snapshot, params);
    // 980,000 − 2,000 − 300,000 + 150,000 − 50,000 × 50% × 39%
    expect(result.buyNetWorthAfterSale).toBeCloseTo(818_250, 6);
    // 500,000 − 200,000 × 50% × 39%
    expect(result.rentNetWorthAfterTax).toBeCloseTo(461_000, 6);
    expect(result.difference).toBeCloseTo(357_250, 6);
    expect(result.buyWins).toBe(true);
    expect(result.year).toBe(10);
  });

  it("inflates the legal fee and deflates to real dollars", () => {
    const inflated = { ...params, inflationRate: 0.03 };
    const result = netWorthAtSale(snapshot, inflated);
    const index = Math.pow(1.03, 10);
    expect(result.buyNetWorthAfterSale).toBeCloseTo(820_250 - 2_000 * index, 6);
    expect(result.buyNetWorthAfterSaleReal).toBeCloseTo(result.buyNetWorthAfterSale / index, 6);
    expect(result.rentNetWorthAfterTaxReal).toBeCloseTo(461_000 / index, 6);
  });

  it("carries a mortgage shortfall into net worth", () => {
    const underwater = { ...snapshot, propertyValue: 200_000, buyInvestments: 0, buyContributions: 0 };
    const result = netWorthAtSale(underwater, params);
    // 196,000 − 2,000 − 300,000
    expect(result.buyNetWorthAfterSale).toBeCloseTo(-106_000, 6);
    expect(result.buyWins).toBe(false);
  });
});

describe("crossoverYear", () => {
  it("finds the first year buying moves ahead", () => {
    expect(crossoverYear(simulate(getZeroRateScenario()))).toBe(1);
  });

  it("is null when buying never moves ahead", () => {
    const snapshots = simulate(getZeroRateScenario()).map((s) => ({
      ...s,
      netWorthDifference: -1,
    }));
    expect(crossoverYear(snapshots)).toBeNull();
  });
});
