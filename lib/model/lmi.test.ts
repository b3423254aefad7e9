import { describe, it, expect } from "vitest";
import { estimateLmi, loanTier } from "./lmi";

describe("loanTier", () => {
  it("buckets loans at $300k, $500k and $1M", () => {
    expect(loanTier(300_000)).toBe(0);
    expect(loanTier(300_001)).toBe(1);
    expect(loanTier(500_000)).toBe(1);
    expect(loanTier(1_000_000)).toBe(2);
    expect(loanTier(1_000_001)).toBe(3);
  });
});

describe("estimateLmi", () => {
  it("is zero at or below 80% LVR", () => {
    expect(estimateLmi(640_000, 0.8)).toBe(0);
    expect(estimateLmi(400_000, 0.5)).toBe(0);
  });

  it("uses the band containing the LVR and the loan tier", () => {
    // 90% band, $500k–$1M tier: 2.352%
    expect(estimateLmi(720_000, 0.9)).toBe(16_934);
    // 85% band, ≤$300k tier: 0.78%
    expect(estimateLmi(255_000, 0.85)).toBe(1_989);
  });

  it("uses the 95% band above 95% LVR", () => {
    expect(estimateLmi(400_000, 0.97)).toBe(estimateLmi(400_000, 0.95));
    expect(estimateLmi(400_000, 0.95)).toBe(12_840);
  });

  it("rounds to whole dollars", () => {
    expect(Number.isInteger(estimateLmi(333_333, 0.88))).toBe(true);
  });
});
