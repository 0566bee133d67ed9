import { Effect } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import { nextGaussian } from "../random/gaussian.js";
import type { TimeSample } from "../weather/types.js";
import type { SimulatedSample } from "./types.js";

const PV_CONVERSION_EFFICIENCY = 0.2;
const TEMPERATURE_SENSITIVITY = 0.005; // share of baseline per °C
const RADIATION_LOAD_FACTOR = 0.8; // kW per W/m²
const NOISE_SHARE = 0.01;
const LOAD_FLOOR_SHARE = 0.1;

export const pvOutputFromRadiation = (
  radiationWm2: number,
  capacityKwp: number
): number => {
  const kw = (radiationWm2 * PV_CONVERSION_EFFICIENCY * capacityKwp) / 1000;
  return Math.max(0, Math.min(kw, capacityKwp));
};

/**
 * Statistical proxy for the regional demand curve: baseline plus a
 * temperature term around the series mean, an irradiance term and Gaussian
 * noise, floored at 10% of baseline. Noise comes from the ambient `Random`
 * service, so the caller owns the seed.
 */
export const simulateLoad = (
  series: readonly TimeSample[],
  pvCapacityKwp: number,
  baselineKw: number
): Effect.Effect<readonly SimulatedSample[], InvalidInputError> =>
  Effect.gen(function* () {
    if (!(pvCapacityKwp >= 0)) {
      return yield* Effect.fail(
        new InvalidInputError({
          message: `PV capacity must be non-negative, got ${pvCapacityKwp}`,
          field: "pvCapacityKwp",
        })
      );
    }
    if (!(baselineKw > 0)) {
      return yield* Effect.fail(
        new InvalidInputError({
          message: `Baseline load must be positive, got ${baselineKw}`,
          field: "baselineKw",
        })
      );
    }
    if (series.length === 0) {
      return [];
    }

    const meanTemperature =
      series.reduce((sum, sample) => sum + sample.temperature, 0) / series.length;
    const temperatureCoefficient = baselineKw * TEMPERATURE_SENSITIVITY;
    const floor = baselineKw * LOAD_FLOOR_SHARE;

    const samples: SimulatedSample[] = [];

    for (const sample of series) {
      const noise = yield* nextGaussian(0, baselineKw * NOISE_SHARE);
      const load =
        baselineKw +
        (sample.temperature - meanTemperature) * temperatureCoefficient +
        sample.radiation * RADIATION_LOAD_FACTOR +
        noise;

      samples.push({
        ...sample,
        pvOutput: pvOutputFromRadiation(sample.radiation, pvCapacityKwp),
        gridLoad: Math.max(load, floor),
      });
    }

    return samples;
  });
