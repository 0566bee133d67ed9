import { Effect, Layer, Schema } from "effect";
import { FileSystem } from "@effect/platform";
import {
  WeatherNotAvailableError,
  WeatherSource,
  type TimeSample,
} from "./types.js";

const WeatherRowSchema = Schema.Struct({
  time: Schema.String,
  temperature: Schema.Number,
  radiation: Schema.Number,
});

const WeatherFileSchema = Schema.parseJson(Schema.Array(WeatherRowSchema));

const ZONE_DESIGNATOR = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;
const WALL_CLOCK_HOUR = /[T ](\d{2}):/;

export type ParsedTimestamp = {
  readonly time: Date;
  readonly hour: number;
};

/**
 * Naive timestamps are read as UTC, never as the host's local zone. The hour
 * is kept as written, so `10:00+08:00` stays hour 10 while its instant is 02:00Z.
 */
export const parseTimestamp = (raw: string): ParsedTimestamp => {
  const time = new Date(ZONE_DESIGNATOR.test(raw) ? raw : `${raw}Z`);
  const writtenHour = WALL_CLOCK_HOUR.exec(raw)?.[1];

  return {
    time,
    hour: writtenHour === undefined ? time.getUTCHours() : Number.parseInt(writtenHour, 10),
  };
};

export type JsonFileWeatherConfig = {
  readonly path: string;
};

export const JsonFileWeatherLayer = (
  config: JsonFileWeatherConfig
): Layer.Layer<WeatherSource, never, FileSystem.FileSystem> =>
  Layer.effect(
    WeatherSource,
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;

      const getHourlySeries = (): Effect.Effect<
        readonly TimeSample[],
        WeatherNotAvailableError
      > =>
        Effect.gen(function* () {
          const content = yield* fileSystem.readFileString(config.path);
          const rows = yield* Schema.decodeUnknown(WeatherFileSchema)(content);

          yield* Effect.logDebug(`Loaded ${rows.length} weather rows`, {
            path: config.path,
          });

          return rows.map(
            (row): TimeSample => ({
              ...parseTimestamp(row.time),
              temperature: row.temperature,
              radiation: row.radiation,
            })
          );
        }).pipe(
          Effect.catchAll((error) =>
            Effect.fail(
              new WeatherNotAvailableError({
                message: `Failed to read weather file ${config.path}: ${error.message}`,
                cause: error,
              })
            )
          )
        );

      return WeatherSource.of({ getHourlySeries });
    })
  );
