import { describe, it, expect } from "vitest";
import { MAX_SEED, createRandomSource } from "./random";

describe("createRandomSource", () => {
  it("repeats the sequence for the same seed", () => {
    const a = createRandomSource(123);
    const b = createRandomSource(123);
    const seqA = Array.from({ length: 10 }, () => a.randn());
    const seqB = Array.from({ length: 10 }, () => b.randn());
    expect(seqA).toEqual(seqB);
  });

  it("differs between seeds", () => {
    const a = createRandomSource(1);
    const b = createRandomSource(2);
    expect(a.random()).not.toBe(b.random());
  });

  it("accepts the full 32-bit seed range", () => {
    expect(createRandomSource(0).random()).toBeGreaterThanOrEqual(0);
    expect(createRandomSource(MAX_SEED).random()).toBeLessThan(1);
  });

  it("rejects seeds outside the 32-bit range instead of wrapping them", () => {
    expect(() => createRandomSource(2 ** 32 + 1)).toThrow(RangeError);
    expect(() => createRandomSource(-1)).toThrow(RangeError);
    expect(() => createRandomSource(1.5)).toThrow(RangeError);
  });

  it("draws uniforms in [0, 1)", () => {
    const rng = createRandomSource(9);
    for (let i = 0; i < 1_000; i++) {
      const u = rng.random();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });

  it("draws normals with roughly zero mean and unit variance", () => {
    const rng = createRandomSource(2024);
    const sample = new Float64Array(20_000);
    rng.fillNormal(sample);
    const mean = sample.reduce((s, v) => s + v, 0) / sample.length;
    const variance = sample.reduce((s, v) => s + (v - mean) ** 2, 0) / sample.length;
    expect(Math.abs(mean)).toBeLessThan(0.05);
    expect(Math.abs(variance - 1)).toBeLessThan(0.05);
  });
});
