import { Effect } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import type { TimeSample } from "./types.js";

// Rejects anything the hourly fold cannot consume in order.
export const validateWeatherSeries = (
  series: readonly TimeSample[]
): Effect.Effect<readonly TimeSample[], InvalidInputError> =>
  Effect.gen(function* () {
    if (series.length === 0) {
      return yield* Effect.fail(
        new InvalidInputError({ message: "Weather series is empty", field: "weather" })
      );
    }

    let previousMs = -Infinity;

    for (const [index, sample] of series.entries()) {
      const timeMs = sample.time.getTime();

      if (Number.isNaN(timeMs)) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Weather sample ${index} has an invalid timestamp`,
            field: "weather.time",
          })
        );
      }

      if (timeMs <= previousMs) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Weather timestamps must be strictly increasing (sample ${index}: ${sample.time.toISOString()})`,
            field: "weather.time",
          })
        );
      }

      if (!(Number.isInteger(sample.hour) && sample.hour >= 0 && sample.hour <= 23)) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Weather sample ${index} has hour ${sample.hour}, expected an integer within 0-23`,
            field: "weather.hour",
          })
        );
      }

      if (!Number.isFinite(sample.temperature)) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Weather sample ${index} has a non-finite temperature`,
            field: "weather.temperature",
          })
        );
      }

      if (!Number.isFinite(sample.radiation) || sample.radiation < 0) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Weather sample ${index} has invalid radiation ${sample.radiation}`,
            field: "weather.radiation",
          })
        );
      }

      previousMs = timeMs;
    }

    return series;
  });
