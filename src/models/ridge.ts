/**
 * Ridge regression (L2-regularized least squares), closed form.
 *
 * Missing feature values are imputed with the training medians, features are
 * standardized (std 0 → 1), the intercept is the target mean and is not
 * penalized:  (ZᵀZ + αI) β = Zᵀ(y − ȳ)
 */

import type { RidgeParameters } from '../types';

export type FeatureVector = Array<number | null>;

// =============================================================================
// STATISTICS
// =============================================================================

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function column(rows: FeatureVector[], j: number): number[] {
  const values: number[] = [];
  for (const row of rows) {
    const v = row[j];
    if (v !== null && v !== undefined && Number.isFinite(v)) values.push(v);
  }
  return values;
}

function impute(row: FeatureVector, medians: number[]): number[] {
  return medians.map((m, j) => {
    const v = row[j];
    return v !== null && v !== undefined && Number.isFinite(v) ? v : m;
  });
}

// =============================================================================
// LINEAR ALGEBRA
// =============================================================================

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 * A is symmetric positive definite here (α > 0), so a pivot of 0 means α was 0.
 */
export function solveLinearSystem(a: number[][], b: number[]): number[] {
  const n = b.length;
  const m = a.map((row, i) => [...row, b[i]]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivot][col])) pivot = r;
    }
    if (Math.abs(m[pivot][col]) < 1e-12) {
      throw new Error('Singular system: ridge penalty must be positive');
    }
    [m[col], m[pivot]] = [m[pivot], m[col]];

    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / m[col][col];
      if (factor === 0) continue;
      for (let c = col; c <= n; c++) {
        m[r][c] -= factor * m[col][c];
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let sum = m[r][n];
    for (let c = r + 1; c < n; c++) sum -= m[r][c] * x[c];
    x[r] = sum / m[r][r];
  }
  return x;
}

// =============================================================================
// FIT / PREDICT
// =============================================================================

export function fitRidge(rows: FeatureVector[], targets: number[], alpha: number): RidgeParameters {
  if (rows.length === 0 || rows.length !== targets.length) {
    throw new Error(`Ridge fit needs matching, non-empty rows and targets (got ${rows.length}/${targets.length})`);
  }
  const p = rows[0].length;

  const imputeMedians = Array.from({ length: p }, (_, j) => median(column(rows, j)));
  const filled = rows.map((row) => impute(row, imputeMedians));

  const featureMeans = Array.from({ length: p }, (_, j) => filled.reduce((s, r) => s + r[j], 0) / filled.length);
  const featureStds = featureMeans.map((mu, j) => {
    const variance = filled.reduce((s, r) => s + (r[j] - mu) ** 2, 0) / filled.length;
    const std = Math.sqrt(variance);
    return std > 1e-12 ? std : 1;
  });
  const z = filled.map((r) => r.map((v, j) => (v - featureMeans[j]) / featureStds[j]));

  const intercept = targets.reduce((s, v) => s + v, 0) / targets.length;
  const centered = targets.map((v) => v - intercept);

  const gram: number[][] = Array.from({ length: p }, () => new Array<number>(p).fill(0));
  const rhs = new Array<number>(p).fill(0);
  for (let i = 0; i < z.length; i++) {
    for (let j = 0; j < p; j++) {
      rhs[j] += z[i][j] * centered[i];
      for (let k = j; k < p; k++) {
        gram[j][k] += z[i][j] * z[i][k];
      }
    }
  }
  for (let j = 0; j < p; j++) {
    for (let k = 0; k < j; k++) gram[j][k] = gram[k][j];
    gram[j][j] += alpha;
  }

  const coefficients = solveLinearSystem(gram, rhs);
  return { intercept, coefficients, featureMeans, featureStds, imputeMedians, alpha };
}

export function predictRidge(params: RidgeParameters, row: FeatureVector): number {
  const filled = impute(row, params.imputeMedians);
  let y = params.intercept;
  for (let j = 0; j < params.coefficients.length; j++) {
    y += params.coefficients[j] * ((filled[j] - params.featureMeans[j]) / params.featureStds[j]);
  }
  return y;
}
