import type { RegressionMetrics } from "./types.js";

export const regressionMetrics = (
  actual: readonly number[],
  predicted: readonly number[]
): RegressionMetrics => {
  const n = actual.length;
  if (n === 0) {
    return { r2: Number.NaN, mape: Number.NaN, rmse: Number.NaN };
  }

  const actualMean = actual.reduce((sum, value) => sum + value, 0) / n;

  let ssRes = 0;
  let ssTot = 0;
  let absolutePercentageSum = 0;

  actual.forEach((value, i) => {
    const error = value - (predicted[i] ?? 0);
    ssRes += error * error;
    ssTot += (value - actualMean) ** 2;
    absolutePercentageSum += Math.abs(error) / Math.max(Math.abs(value), Number.EPSILON);
  });

  // A constant holdout has no variance to explain.
  const r2 = ssTot === 0 ? (ssRes === 0 ? 1 : 0) : 1 - ssRes / ssTot;

  return {
    r2,
    mape: absolutePercentageSum / n,
    rmse: Math.sqrt(ssRes / n),
  };
};
