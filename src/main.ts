import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Cause, Config, Effect, Layer, Logger, LogLevel, Option } from "effect"
import * as Sentry from "@sentry/node";
import { App } from './app.js';
import { AppConfig } from './config.js';
import { createInputLayers } from './layers.js';
import { WeatherSource } from './weather/types.js';
import { BusinessRegistry } from './registry/types.js';
import { DEFAULT_TOU_SCHEDULE, withPrices } from './tariff/tou-classifier.js';
import { DEFAULT_BATTERY } from './dispatch/types.js';

const isProd = process.env.NODE_ENV == 'production';

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  enabled: process.env.SENTRY_DSN !== undefined,
});

const HOUR_MS = 60 * 60 * 1000;

// Two days back, aligned to the hour, so the synthetic series covers past and upcoming days.
const defaultSyntheticStart = () =>
  new Date(Math.floor((Date.now() - 2 * 24 * HOUR_MS) / HOUR_MS) * HOUR_MS);

const InputLayers = Layer.unwrapEffect(
  Effect.gen(function*() {
    const inputs = yield* Config.all(AppConfig.inputs);
    const seed = yield* AppConfig.simulation.seed;

    return createInputLayers({
      weatherFile: inputs.weatherFile,
      registryFile: inputs.registryFile,
      forceSyntheticWeather: process.argv.includes('--synthetic-weather'),
      syntheticWeather: {
        start: Option.getOrElse(inputs.syntheticWeatherStart, defaultSyntheticStart),
        hours: inputs.syntheticWeatherHours,
        seed,
      },
    });
  })
);

const program = Effect.gen(function*() {
  const simulation = yield* Config.all(AppConfig.simulation);
  const battery = yield* Config.all(AppConfig.battery);
  const prices = yield* Config.all(AppConfig.tariff);

  const app = new App(
    yield* WeatherSource,
    yield* BusinessRegistry,
    {
      ...simulation,
      schedule: withPrices(DEFAULT_TOU_SCHEDULE, prices),
      battery: { ...DEFAULT_BATTERY, ...battery },
    },
  );

  yield* app.run();
}).pipe(
  Effect.tapErrorCause((cause) =>
    Effect.promise(() => {
      Sentry.captureException(Cause.squash(cause));
      return Sentry.flush(2000);
    })
  ),
  Effect.provide(InputLayers),
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);
NodeRuntime.runMain(program);
