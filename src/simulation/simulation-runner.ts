import { Effect, Random } from "effect";
import { validateBattery, walkDispatch } from "../dispatch/dispatch-policy.js";
import type { BatteryConfig } from "../dispatch/types.js";
import { buildBaselineTrace, compareScenarios } from "../economics/baseline-comparator.js";
import { aggregateTrace, priceTrace, roundCurrency } from "../economics/economics.js";
import type { ScenarioComparison, TraceEntry } from "../economics/types.js";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import type { NumericDegenerateError } from "../errors/numeric-degenerate.error.js";
import { buildFeatureFrame } from "../forecast/features.js";
import { trainAndEvaluate } from "../forecast/forecast-model.js";
import type { ForecastModel } from "../forecast/types.js";
import {
  industryCounts,
  normalizeBusinesses,
  predictPeakLoads,
} from "../registry/industry-profile.js";
import type { BusinessLoadPrediction, RawBusinessRecord } from "../registry/types.js";
import { classifyHour, validateTouSchedule } from "../tariff/tou-classifier.js";
import type { TouSchedule } from "../tariff/types.js";
import { validateWeatherSeries } from "../weather/validate-weather.js";
import type { TimeSample } from "../weather/types.js";
import { simulateLoad } from "./load-model.js";
import type { PricedSample, SimulatedSample } from "./types.js";

const PEAK_TO_AVERAGE_LOAD = 0.6;
const REFERENCE_REGISTRY_SIZE = 200;

export type SimulationInput = {
  readonly weather: readonly TimeSample[];
  readonly businesses: readonly RawBusinessRecord[];
  readonly schedule: TouSchedule;
  readonly battery: BatteryConfig;
  readonly pvCapacityKwp: number;
  readonly markup: number;
  readonly initialSoc: number; // %
  readonly defaultBaseLoadKw: number;
  readonly ridgeAlpha: number;
  readonly seed: number;
};

export type KpiRecord = {
  readonly totalPredictedPeakLoad: number;
  readonly totalCost: number;
  readonly totalRevenue: number;
  readonly totalMargin: number;
  readonly peakReduction: number;
  readonly costSaving: number;
  readonly marginGain: number;
};

export type SimulationReport = {
  readonly baselineLoadKw: number;
  readonly predictions: readonly BusinessLoadPrediction[];
  readonly samples: readonly PricedSample[];
  readonly dispatchTrace: readonly TraceEntry[];
  readonly baselineTrace: readonly TraceEntry[];
  readonly kpis: KpiRecord;
  readonly comparison: ScenarioComparison;
  readonly forecast: ForecastModel;
};

/**
 * Average regional load the curve is built around. Predicted new peak load is
 * scaled down to an average; without a prediction the configured default is
 * scaled by registry size relative to a 200-business reference, never below half.
 */
export const deriveBaselineLoad = (
  predictedPeakLoad: number,
  registrySize: number,
  defaultBaseLoadKw: number
): number =>
  predictedPeakLoad > 0
    ? predictedPeakLoad * PEAK_TO_AVERAGE_LOAD
    : defaultBaseLoadKw * Math.max(0.5, registrySize / REFERENCE_REGISTRY_SIZE);

export const priceSamples = (
  samples: readonly SimulatedSample[],
  schedule: TouSchedule
): Effect.Effect<readonly PricedSample[], InvalidInputError> =>
  Effect.forEach(samples, (sample) =>
    classifyHour(sample.hour, schedule).pipe(
      Effect.map((slot): PricedSample => ({ ...sample, ...slot }))
    )
  );

const validateScalars = (
  input: SimulationInput
): Effect.Effect<void, InvalidInputError> => {
  if (!(input.markup >= 1)) {
    return Effect.fail(
      new InvalidInputError({
        message: `Markup must be at least 1, got ${input.markup}`,
        field: "markup",
      })
    );
  }
  if (!(input.defaultBaseLoadKw > 0)) {
    return Effect.fail(
      new InvalidInputError({
        message: `Default base load must be positive, got ${input.defaultBaseLoadKw}`,
        field: "defaultBaseLoadKw",
      })
    );
  }
  return Effect.void;
};

export const runSimulation = (
  input: SimulationInput
): Effect.Effect<SimulationReport, InvalidInputError | NumericDegenerateError> =>
  Effect.gen(function* () {
    yield* validateScalars(input);
    const weather = yield* validateWeatherSeries(input.weather);
    const schedule = yield* validateTouSchedule(input.schedule);
    const battery = yield* validateBattery(input.battery, input.initialSoc);

    const businesses = yield* normalizeBusinesses(input.businesses);
    const predictions = predictPeakLoads(businesses);
    const totalPredictedPeakLoad = predictions.reduce(
      (sum, prediction) => sum + prediction.predictedPeakLoad,
      0
    );
    const baselineLoadKw = deriveBaselineLoad(
      totalPredictedPeakLoad,
      businesses.length,
      input.defaultBaseLoadKw
    );

    yield* Effect.logDebug("Simulation inputs resolved", {
      hours: weather.length,
      businesses: businesses.length,
      totalPredictedPeakLoad,
      baselineLoadKw,
    });

    const simulated = yield* simulateLoad(weather, input.pvCapacityKwp, baselineLoadKw).pipe(
      Effect.withRandom(Random.make(input.seed))
    );
    const samples = yield* priceSamples(simulated, schedule);

    const dispatchTrace = priceTrace(
      walkDispatch(samples, battery, { soc: input.initialSoc }),
      input.markup
    );

    // Neither depends on the SOC carried through the walk.
    const [baselineTrace, forecast] = yield* Effect.all(
      [
        Effect.sync(() => buildBaselineTrace(samples, input.markup, input.initialSoc)),
        trainAndEvaluate(
          buildFeatureFrame(samples, industryCounts(businesses)),
          input.ridgeAlpha
        ),
      ],
      { concurrency: "unbounded" }
    );

    const totals = aggregateTrace(dispatchTrace);
    const comparison = compareScenarios(dispatchTrace, baselineTrace);

    return {
      baselineLoadKw,
      predictions,
      samples,
      dispatchTrace,
      baselineTrace,
      kpis: {
        totalPredictedPeakLoad: roundCurrency(totalPredictedPeakLoad),
        ...totals,
        peakReduction: comparison.peakReduction,
        costSaving: comparison.costSaving,
        marginGain: comparison.marginGain,
      },
      comparison,
      forecast,
    };
  }).pipe(Effect.withLogSpan("simulation"));
