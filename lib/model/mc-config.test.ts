import { describe, it, expect } from "vitest";
import {
  CEILINGS,
  DEFAULT_CORRELATION,
  FLOORS,
  VAR_NAMES,
  buildCovMatrix,
  correlationMatrix,
  createMCConfig,
  stdVector,
} from "./mc-config";
import { InvalidCorrelationError } from "./errors";

describe("createMCConfig", () => {
  it("applies the default run count and volatilities", () => {
    const config = createMCConfig();
    expect(config.nRuns).toBe(5_000);
    expect(config.seed).toBeNull();
    expect(stdVector(config)).toEqual([0.1, 0.15, 0.02, 0.015, 0.01]);
    expect(config.correlationOverride).toBeNull();
  });

  it("rejects a non-positive run count and a wrongly shaped matrix", () => {
    expect(() => createMCConfig({ nRuns: 0 })).toThrow();
    expect(() => createMCConfig({ correlationOverride: [[1, 0], [0, 1]] })).toThrow();
  });

  it("only accepts seeds that fit the 32-bit generator state", () => {
    expect(createMCConfig({ seed: 0xffffffff }).seed).toBe(0xffffffff);
    expect(() => createMCConfig({ seed: 2 ** 32 + 1 })).toThrow();
    expect(() => createMCConfig({ seed: -1 })).toThrow();
  });
});

describe("bounds", () => {
  it("gives every variable a floor below its ceiling", () => {
    expect(FLOORS).toHaveLength(VAR_NAMES.length);
    expect(CEILINGS).toHaveLength(VAR_NAMES.length);
    FLOORS.forEach((floor, i) => expect(floor).toBeLessThan(CEILINGS[i]));
  });
});

describe("correlationMatrix", () => {
  it("returns a copy of the default matrix", () => {
    const m = correlationMatrix(createMCConfig());
    expect(m).toEqual(DEFAULT_CORRELATION);
    m[0][1] = 0.99;
    expect(DEFAULT_CORRELATION[0][1]).toBe(0.2);
  });

  it("correlates inflation and mortgage rate positively", () => {
    expect(DEFAULT_CORRELATION[3][4]).toBeGreaterThan(0.5);
  });

  it("rejects a diagonal entry other than 1", () => {
    const corr = DEFAULT_CORRELATION.map((row) => [...row]);
    corr[2][2] = 0.9;
    expect(() => correlationMatrix(createMCConfig({ correlationOverride: corr }))).toThrow(
      InvalidCorrelationError
    );
  });

  it("rejects entries outside [-1, 1]", () => {
    const corr = DEFAULT_CORRELATION.map((row) => [...row]);
    corr[0][1] = 1.5;
    corr[1][0] = 1.5;
    expect(() => correlationMatrix(createMCConfig({ correlationOverride: corr }))).toThrow(
      "Correlations must lie in [-1, 1] (got 1.5)"
    );
  });
});

describe("buildCovMatrix", () => {
  it("scales correlations by both standard deviations", () => {
    const cov = buildCovMatrix(createMCConfig());
    expect(cov[0][0]).toBeCloseTo(0.01, 12);
    expect(cov[1][1]).toBeCloseTo(0.0225, 12);
    expect(cov[0][1]).toBeCloseTo(0.2 * 0.1 * 0.15, 12);
    expect(cov[3][4]).toBeCloseTo(0.65 * 0.015 * 0.01, 12);
    expect(cov[4][3]).toBe(cov[3][4]);
  });
});
