import { Context, Data, Effect } from "effect";

export type TimeSample = {
  readonly time: Date;
  // Wall-clock hour as written at the source; tariffs are defined on it.
  readonly hour: number;
  readonly temperature: number; // °C
  readonly radiation: number; // shortwave irradiance, W/m²
};

export class WeatherNotAvailableError extends Data.TaggedError(
  "WeatherNotAvailable"
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class WeatherSource extends Context.Tag("WeatherSource")<
  WeatherSource,
  {
    readonly getHourlySeries: () => Effect.Effect<
      readonly TimeSample[],
      WeatherNotAvailableError
    >;
  }
>() {}

export type IWeatherSource = Context.Tag.Service<typeof WeatherSource>;
