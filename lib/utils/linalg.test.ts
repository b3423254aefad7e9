import { describe, it, expect } from "vitest";
import {
  addDiagonal,
  choleskyDecompose,
  identity,
  isSymmetric,
  lowerTriangularMultiply,
  type Matrix,
} from "./linalg";
import { CholeskyError } from "@/lib/model/errors";

function multiplyByTranspose(L: Matrix): Matrix {
  return L.map((row) =>
    L.map((_, j) => row.reduce((sum, v, k) => sum + v * L[j][k], 0))
  );
}

describe("choleskyDecompose", () => {
  it("factors a positive definite matrix into L·Lᵀ", () => {
    const m = [
      [4, 2, 0.4],
      [2, 5, 1],
      [0.4, 1, 3],
    ];
    const L = choleskyDecompose(m);
    expect(L[0][1]).toBe(0);
    expect(L[0][2]).toBe(0);
    expect(L[1][2]).toBe(0);
    expect(L[0][0]).toBe(2);
    const product = multiplyByTranspose(L);
    m.forEach((row, i) => row.forEach((v, j) => expect(product[i][j]).toBeCloseTo(v, 12)));
  });

  it("factors the identity to itself", () => {
    expect(choleskyDecompose(identity(3))).toEqual(identity(3));
  });

  it("throws on a matrix that is not positive definite", () => {
    expect(() => choleskyDecompose([[1, 2], [2, 1]])).toThrow(CholeskyError);
  });

  it("throws on an all-zero matrix unless jitter is added", () => {
    const zero = [[0, 0], [0, 0]];
    expect(() => choleskyDecompose(zero)).toThrow(CholeskyError);
    expect(choleskyDecompose(addDiagonal(zero, 1e-10))[1][1]).toBeCloseTo(1e-5, 15);
  });
});

describe("isSymmetric", () => {
  it("compares mirrored entries", () => {
    expect(isSymmetric([[1, 0.3], [0.3, 1]])).toBe(true);
    expect(isSymmetric([[1, 0.3], [0.2, 1]])).toBe(false);
  });
});

describe("lowerTriangularMultiply", () => {
  it("ignores entries above the diagonal", () => {
    const out = new Float64Array(2);
    lowerTriangularMultiply([[2, 99], [1, 3]], [1, 2], out);
    expect(Array.from(out)).toEqual([2, 7]);
  });
});
