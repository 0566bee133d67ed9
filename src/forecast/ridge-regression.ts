import { Effect } from "effect";
import { NumericDegenerateError } from "../errors/numeric-degenerate.error.js";
import type { RidgeFit } from "./types.js";

const PIVOT_TOLERANCE = 1e-12;

const column = (rows: readonly (readonly number[])[], j: number): number[] =>
  rows.map((row) => row[j] ?? 0);

const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Solves A·x = b for a symmetric positive-definite A by Cholesky
 * factorisation. Fails when a pivot vanishes relative to its own diagonal
 * entry, which with a positive ridge penalty cannot happen.
 */
export const solveSymmetric = (
  a: readonly (readonly number[])[],
  b: readonly number[]
): Effect.Effect<number[], NumericDegenerateError> => {
  const n = b.length;
  const lower: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    const lowerRow = lower[i] ?? [];

    for (let j = 0; j <= i; j++) {
      const upperRow = lower[j] ?? [];
      let sum = a[i]?.[j] ?? 0;
      for (let k = 0; k < j; k++) {
        sum -= (lowerRow[k] ?? 0) * (upperRow[k] ?? 0);
      }

      if (i === j) {
        // Per column, so a large-variance column cannot swamp a small pivot.
        if (!(sum > 0 && sum > Math.abs(a[i]?.[i] ?? 0) * PIVOT_TOLERANCE)) {
          return Effect.fail(
            new NumericDegenerateError({
              message: `Normal equations are singular at column ${i} (pivot ${sum})`,
            })
          );
        }
        lowerRow[i] = Math.sqrt(sum);
      } else {
        lowerRow[j] = sum / (upperRow[j] ?? 1);
      }
    }
  }

  // Forward substitution: L·z = b
  const z = new Array<number>(n).fill(0);
  for (let i = 0; i < n; i++) {
    let sum = b[i] ?? 0;
    for (let k = 0; k < i; k++) {
      sum -= (lower[i]?.[k] ?? 0) * (z[k] ?? 0);
    }
    z[i] = sum / (lower[i]?.[i] ?? 1);
  }

  // Back substitution: Lᵀ·x = z
  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = z[i] ?? 0;
    for (let k = i + 1; k < n; k++) {
      sum -= (lower[k]?.[i] ?? 0) * (x[k] ?? 0);
    }
    x[i] = sum / (lower[i]?.[i] ?? 1);
  }

  return Effect.succeed(x);
};

/**
 * L2-regularised least squares with an unpenalised intercept: features and
 * target are centred, `(XcᵀXc + αI)·w = Xcᵀyc` is solved, and the intercept
 * restores the means.
 */
export const fitRidge = (
  rows: readonly (readonly number[])[],
  target: readonly number[],
  alpha: number
): Effect.Effect<RidgeFit, NumericDegenerateError> =>
  Effect.gen(function* () {
    const featureCount = rows[0]?.length ?? 0;
    const featureMeans = Array.from({ length: featureCount }, (_, j) => mean(column(rows, j)));
    const targetMean = mean(target);

    const centered = rows.map((row) => row.map((value, j) => value - (featureMeans[j] ?? 0)));
    const centeredTarget = target.map((value) => value - targetMean);

    const gram: number[][] = Array.from({ length: featureCount }, (_, i) =>
      Array.from({ length: featureCount }, (_, j) => {
        let sum = 0;
        for (const row of centered) {
          sum += (row[i] ?? 0) * (row[j] ?? 0);
        }
        return i === j ? sum + alpha : sum;
      })
    );

    const moment = Array.from({ length: featureCount }, (_, j) => {
      let sum = 0;
      centered.forEach((row, r) => {
        sum += (row[j] ?? 0) * (centeredTarget[r] ?? 0);
      });
      return sum;
    });

    const coefficients = yield* solveSymmetric(gram, moment);
    const intercept =
      targetMean -
      coefficients.reduce((sum, coefficient, j) => sum + coefficient * (featureMeans[j] ?? 0), 0);

    return { coefficients, intercept };
  });

export const predict = (fit: RidgeFit, rows: readonly (readonly number[])[]): number[] =>
  rows.map((row) =>
    row.reduce((sum, value, j) => sum + value * (fit.coefficients[j] ?? 0), fit.intercept)
  );
