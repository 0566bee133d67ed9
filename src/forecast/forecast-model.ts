import { Effect } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import type { NumericDegenerateError } from "../errors/numeric-degenerate.error.js";
import { regressionMetrics } from "./metrics.js";
import { fitRidge, predict } from "./ridge-regression.js";
import type { FeatureFrame, ForecastModel } from "./types.js";

const TRAIN_SHARE = 0.75;

// Never shuffled: the holdout is the tail of the series.
export const chronologicalSplitIndex = (rowCount: number): number =>
  Math.max(1, Math.floor(rowCount * TRAIN_SHARE));

export const trainAndEvaluate = (
  frame: FeatureFrame,
  alpha: number
): Effect.Effect<ForecastModel, InvalidInputError | NumericDegenerateError> =>
  Effect.gen(function* () {
    const rowCount = frame.rows.length;

    if (rowCount === 0) {
      return yield* Effect.fail(
        new InvalidInputError({ message: "Feature frame is empty", field: "forecast" })
      );
    }
    if (!(alpha >= 0)) {
      return yield* Effect.fail(
        new InvalidInputError({
          message: `Ridge alpha must be non-negative, got ${alpha}`,
          field: "ridgeAlpha",
        })
      );
    }

    const split = chronologicalSplitIndex(rowCount);
    const trainRows = frame.rows.slice(0, split);
    const trainTarget = frame.target.slice(0, split);

    let holdout: ForecastModel["holdout"] = "chronological";
    let testRows = frame.rows.slice(split);
    let testTarget = frame.target.slice(split);

    if (testRows.length === 0) {
      yield* Effect.logWarning(
        `Only ${rowCount} sample(s) available for the forecast split; evaluating in-sample`
      );
      holdout = "in-sample";
      testRows = trainRows;
      testTarget = trainTarget;
    }

    const fit = yield* fitRidge(trainRows, trainTarget, alpha);
    const predicted = predict(fit, testRows);

    return {
      featureNames: frame.featureNames,
      ...fit,
      ...regressionMetrics(testTarget, predicted),
      trainSize: trainRows.length,
      testSize: testRows.length,
      holdout,
      actual: testTarget,
      predicted,
    };
  });
