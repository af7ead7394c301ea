import { InvalidInputError } from './errors.js';

export type FeatureRow = readonly number[];

/**
 * Pluggable regression model. Prediction call sites only depend on this shape,
 * so a heavier model can be swapped in without touching them.
 */
export interface RegressionStrategy {
  fit(features: readonly FeatureRow[], labels: readonly number[]): void;
  predict(features: FeatureRow): number;
  /** Coefficient of determination of the fitted model on the given data. */
  score(features: readonly FeatureRow[], labels: readonly number[]): number;
}

export type RegressionStrategyFactory = () => RegressionStrategy;

/**
 * R² = 1 - SSres / SStot. A constant target is only defined when the
 * predictions match it exactly (R² = 1).
 */
export function coefficientOfDetermination(actual: readonly number[], predicted: readonly number[]): number {
  if (actual.length !== predicted.length) {
    throw new InvalidInputError('Actual and predicted series must have the same length');
  }
  if (actual.length === 0) {
    throw new InvalidInputError('Cannot score an empty series');
  }

  let mean = 0;
  for (const y of actual) mean += y;
  mean /= actual.length;

  let ssTot = 0;
  let ssRes = 0;
  for (let i = 0; i < actual.length; i++) {
    ssTot += (actual[i] - mean) ** 2;
    ssRes += (actual[i] - predicted[i]) ** 2;
  }

  if (ssTot === 0) {
    if (ssRes === 0) return 1;
    throw new InvalidInputError('R² is undefined for a constant series with non-zero residuals');
  }
  return 1 - ssRes / ssTot;
}

export function assertFiniteSeries(values: readonly number[], label: string): void {
  for (const v of values) {
    if (!Number.isFinite(v)) {
      throw new InvalidInputError(`${label} must contain only finite numbers`);
    }
  }
}

const PIVOT_EPSILON = 1e-12;

/**
 * Solves A·x = b in place by Gaussian elimination with partial pivoting.
 * A column is singular when its pivot is at most PIVOT_EPSILON times its
 * original diagonal entry.
 */
function solveLinearSystem(a: number[][], b: number[]): number[] {
  const n = b.length;
  const tolerances = a.map((row, i) => PIVOT_EPSILON * Math.abs(row[i]));

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivotRow][col])) pivotRow = row;
    }
    if (Math.abs(a[pivotRow][col]) <= tolerances[col]) {
      throw new InvalidInputError('Features are linearly dependent; regression is singular');
    }
    [a[col], a[pivotRow]] = [a[pivotRow], a[col]];
    [b[col], b[pivotRow]] = [b[pivotRow], b[col]];

    for (let row = col + 1; row < n; row++) {
      const factor = a[row][col] / a[col][col];
      if (factor === 0) continue;
      for (let k = col; k < n; k++) a[row][k] -= factor * a[col][k];
      b[row] -= factor * b[col];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let sum = b[row];
    for (let k = row + 1; k < n; k++) sum -= a[row][k] * x[k];
    x[row] = sum / a[row][row];
  }
  return x;
}

/**
 * Ordinary least squares over any number of features, with an intercept.
 *
 * Features are centred before solving the normal equations. Columns with no
 * variance get a zero coefficient; a constant target yields a constant model.
 */
export class LeastSquaresRegression implements RegressionStrategy {
  private coefficients: number[] = [];
  private intercept = 0;
  private fitted = false;

  fit(features: readonly FeatureRow[], labels: readonly number[]): void {
    const n = features.length;
    if (n !== labels.length) {
      throw new InvalidInputError('Feature rows and labels must have the same length');
    }
    if (n < 2) {
      throw new InvalidInputError('At least 2 samples are required to fit a regression');
    }
    const width = features[0].length;
    for (const row of features) {
      if (row.length !== width) {
        throw new InvalidInputError('All feature rows must have the same width');
      }
      assertFiniteSeries(row, 'Features');
    }
    assertFiniteSeries(labels, 'Labels');

    const featureMeans = new Array<number>(width).fill(0);
    let labelMean = 0;
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < width; j++) featureMeans[j] += features[i][j];
      labelMean += labels[i];
    }
    for (let j = 0; j < width; j++) featureMeans[j] /= n;
    labelMean /= n;

    const coefficients = new Array<number>(width).fill(0);

    if (labels.every((y) => y === labels[0])) {
      this.commit(coefficients, labels[0]);
      return;
    }

    const active: number[] = [];
    for (let j = 0; j < width; j++) {
      if (features.some((row) => row[j] !== features[0][j])) active.push(j);
    }

    if (active.length > 0) {
      const xtx = active.map(() => new Array<number>(active.length).fill(0));
      const xty = new Array<number>(active.length).fill(0);
      for (let i = 0; i < n; i++) {
        const dy = labels[i] - labelMean;
        for (let p = 0; p < active.length; p++) {
          const dp = features[i][active[p]] - featureMeans[active[p]];
          xty[p] += dp * dy;
          for (let q = p; q < active.length; q++) {
            xtx[p][q] += dp * (features[i][active[q]] - featureMeans[active[q]]);
          }
        }
      }
      for (let p = 0; p < active.length; p++) {
        for (let q = 0; q < p; q++) xtx[p][q] = xtx[q][p];
      }

      const solution = solveLinearSystem(xtx, xty);
      active.forEach((j, p) => {
        coefficients[j] = solution[p];
      });
    }

    let intercept = labelMean;
    for (let j = 0; j < width; j++) intercept -= coefficients[j] * featureMeans[j];
    this.commit(coefficients, intercept);
  }

  /** Model state only changes once a fit has fully succeeded. */
  private commit(coefficients: number[], intercept: number): void {
    this.coefficients = coefficients;
    this.intercept = intercept;
    this.fitted = true;
  }

  predict(features: FeatureRow): number {
    if (!this.fitted) {
      throw new InvalidInputError('Regression has not been fitted');
    }
    if (features.length !== this.coefficients.length) {
      throw new InvalidInputError(
        `Expected ${this.coefficients.length} features, received ${features.length}`,
      );
    }
    let y = this.intercept;
    for (let j = 0; j < features.length; j++) y += this.coefficients[j] * features[j];
    return y;
  }

  score(features: readonly FeatureRow[], labels: readonly number[]): number {
    return coefficientOfDetermination(labels, features.map((row) => this.predict(row)));
  }

  getCoefficients(): { coefficients: number[]; intercept: number } {
    return { coefficients: [...this.coefficients], intercept: this.intercept };
  }
}
