export type FeatureFrame = {
  readonly featureNames: readonly string[];
  readonly rows: readonly (readonly number[])[];
  readonly target: readonly number[]; // grid load, kW
};

export type RidgeFit = {
  readonly coefficients: readonly number[];
  readonly intercept: number;
};

export type RegressionMetrics = {
  readonly r2: number;
  readonly mape: number; // fraction, not percent
  readonly rmse: number;
};

export type ForecastModel = RidgeFit &
  RegressionMetrics & {
    readonly featureNames: readonly string[];
    readonly trainSize: number;
    readonly testSize: number;
    // "in-sample" when the series is too short to hold anything out
    readonly holdout: "chronological" | "in-sample";
    readonly actual: readonly number[];
    readonly predicted: readonly number[];
  };
