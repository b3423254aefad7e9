import { describe, it, expect } from "vitest";
import { CSV_HEADER, snapshotsToCsv } from "./snapshotsToCsv";
import { simulate } from "@/lib/model/engine";
import { getDroppingRateScenario, getZeroRateScenario } from "@/fixtures/golden-scenarios";

describe("snapshotsToCsv", () => {
  it("writes the fixed 20-column header", () => {
    expect(CSV_HEADER).toHaveLength(20);
    const [header] = snapshotsToCsv([]).split("\n");
    expect(header).toBe(
      "year,property_value,mortgage_balance,mortgage_rate,buy_housing_costs," +
        "buy_cumulative_costs,buy_equity,buy_investments,buy_contributions,buy_net_worth," +
        "buy_net_worth_real,annual_rent,rent_housing_costs,rent_cumulative_costs," +
        "rent_investments,rent_contributions,rent_net_worth,rent_net_worth_real," +
        "net_worth_difference,net_worth_difference_real"
    );
  });

  it("writes one row per snapshot with money to 2 dp and rate to 4 dp", () => {
    const lines = snapshotsToCsv(simulate(getZeroRateScenario())).split("\n");
    expect(lines).toHaveLength(5);
    expect(lines[4]).toBe("");
    expect(lines[2]).toBe(
      "1,100000.00,72000.00,0.0000,8000.00,28000.00,28000.00,30000.00,30000.00,58000.00," +
        "58000.00,5200.00,5200.00,5200.00,52800.00,52800.00,52800.00,52800.00,5200.00,5200.00"
    );
  });

  it("formats scheduled rates", () => {
    const lines = snapshotsToCsv(simulate(getDroppingRateScenario())).split("\n");
    expect(lines[1].split(",")[3]).toBe("0.0600");
    expect(lines[6].split(",")[3]).toBe("0.0400");
  });
});
