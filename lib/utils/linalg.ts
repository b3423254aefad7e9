/**
 * Small dense linear algebra for the Monte Carlo covariance (5×5).
 * Matrices are row-major arrays of rows.
 */

import { CholeskyError } from "@/lib/model/errors";

export type Matrix = number[][];

export function identity(n: number): Matrix {
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))
  );
}

/** Elementwise corr[i][j] * std[i] * std[j]. */
export function scaleByOuter(corr: Matrix, std: readonly number[]): Matrix {
  return corr.map((row, i) => row.map((c, j) => c * std[i] * std[j]));
}

export function addDiagonal(m: Matrix, epsilon: number): Matrix {
  return m.map((row, i) => row.map((v, j) => (i === j ? v + epsilon : v)));
}

export function isSymmetric(m: Matrix, tolerance = 1e-12): boolean {
  for (let i = 0; i < m.length; i++) {
    for (let j = i + 1; j < m.length; j++) {
      if (Math.abs(m[i][j] - m[j][i]) > tolerance) return false;
    }
  }
  return true;
}

/**
 * Lower-triangular L with L·Lᵀ = m. Throws CholeskyError when m is not positive definite.
 */
export function choleskyDecompose(m: Matrix): Matrix {
  const n = m.length;
  const L: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let j = 0; j < n; j++) {
    let diag = m[j][j];
    for (let k = 0; k < j; k++) diag -= L[j][k] * L[j][k];
    if (!(diag > 0)) throw new CholeskyError(j, diag);
    const ljj = Math.sqrt(diag);
    L[j][j] = ljj;
    for (let i = j + 1; i < n; i++) {
      let s = m[i][j];
      for (let k = 0; k < j; k++) s -= L[i][k] * L[j][k];
      L[i][j] = s / ljj;
    }
  }
  return L;
}

/** out = L · z for a lower-triangular L. */
export function lowerTriangularMultiply(L: Matrix, z: ArrayLike<number>, out: Float64Array): void {
  for (let i = 0; i < L.length; i++) {
    let s = 0;
    const row = L[i];
    for (let k = 0; k <= i; k++) s += row[k] * z[k];
    out[i] = s;
  }
}
