import { Effect, Layer, Random } from "effect";
import { nextGaussian } from "../random/gaussian.js";
import { WeatherSource, type TimeSample } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

export type SyntheticWeatherConfig = {
  readonly start: Date;
  readonly hours: number;
  readonly seed: number;
  readonly meanTemperature?: number; // °C, default 15
  readonly peakRadiation?: number; // W/m² at solar noon on a clear day, default 800
};

// Typical-climate stand-in used when no measured series is supplied.
// Temperature bottoms out around 03:00; irradiance follows a half sine between
// 06:00 and 18:00, thinned by a random cloud factor.
export const generateSyntheticWeather = (
  config: SyntheticWeatherConfig
): Effect.Effect<readonly TimeSample[]> =>
  Effect.gen(function* () {
    const meanTemperature = config.meanTemperature ?? 15;
    const peakRadiation = config.peakRadiation ?? 800;
    const samples: TimeSample[] = [];

    for (let i = 0; i < config.hours; i++) {
      const time = new Date(config.start.getTime() + i * HOUR_MS);
      const hour = time.getUTCHours();
      const hourOfDay = hour + time.getUTCMinutes() / 60;

      const temperature =
        meanTemperature +
        5 * Math.sin((2 * Math.PI * (hourOfDay - 9)) / 24) +
        (yield* nextGaussian(0, 0.5));

      let radiation = 0;
      if (hourOfDay >= 6 && hourOfDay <= 18) {
        const cloudFactor = yield* Random.nextRange(0.6, 1.0);
        radiation = Math.max(
          0,
          peakRadiation * Math.sin((Math.PI * (hourOfDay - 6)) / 12) * cloudFactor
        );
      }

      samples.push({ time, hour, temperature, radiation });
    }

    return samples;
  }).pipe(Effect.withRandom(Random.make(config.seed)));

export const SyntheticWeatherLayer = (
  config: SyntheticWeatherConfig
): Layer.Layer<WeatherSource> =>
  Layer.succeed(
    WeatherSource,
    WeatherSource.of({
      getHourlySeries: () =>
        generateSyntheticWeather(config).pipe(
          Effect.tap((samples) =>
            Effect.logDebug(`Generated ${samples.length} synthetic weather rows`, {
              start: config.start.toISOString(),
              seed: config.seed,
            })
          )
        ),
    })
  );
