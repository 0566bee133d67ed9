import { INDUSTRIES } from "../registry/industry-profile.js";
import type { Industry } from "../registry/types.js";
import type { PricedSample } from "../simulation/types.js";
import type { FeatureFrame } from "./types.js";

export const FEATURE_NAMES: readonly string[] = [
  "temperature",
  "radiation",
  "hour_sin",
  "hour_cos",
  // flat is the all-zero case, avoiding a collinear third dummy
  "is_peak",
  "is_valley",
  ...INDUSTRIES.map((industry) => `cnt_${industry}`),
  "lag1",
];

export const buildFeatureFrame = (
  samples: readonly PricedSample[],
  industryCounts: Readonly<Record<Industry, number>>
): FeatureFrame => {
  // Cross-sectional covariates: identical on every row.
  const counts = INDUSTRIES.map((industry) => industryCounts[industry]);

  const rows = samples.map((sample, index) => {
    const angle = (2 * Math.PI * sample.hour) / 24;
    const lag1 = samples[index - 1]?.gridLoad ?? sample.gridLoad;

    return [
      sample.temperature,
      sample.radiation,
      Math.sin(angle),
      Math.cos(angle),
      sample.period === "peak" ? 1 : 0,
      sample.period === "valley" ? 1 : 0,
      ...counts,
      lag1,
    ];
  });

  return {
    featureNames: FEATURE_NAMES,
    rows,
    target: samples.map((sample) => sample.gridLoad),
  };
};
