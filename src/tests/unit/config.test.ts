import { describe, it, expect } from "@effect/vitest";
import { Config, ConfigProvider, Effect, Option } from "effect";
import { AppConfig } from "../../config.js";

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)));

describe("AppConfig", () => {
  it.effect("should fall back to defaults", () =>
    Effect.gen(function* () {
      const simulation = yield* Config.all(AppConfig.simulation);
      const battery = yield* Config.all(AppConfig.battery);
      const tariff = yield* Config.all(AppConfig.tariff);
      const inputs = yield* Config.all(AppConfig.inputs);

      expect(simulation).toEqual({
        pvCapacityKwp: 1000,
        markup: 1.1,
        initialSoc: 60,
        defaultBaseLoadKw: 12000,
        ridgeAlpha: 1,
        seed: 42,
      });
      expect(battery).toEqual({ capacityKwh: 15000, maxPowerKw: 3000 });
      expect(tariff).toEqual({ peak: 1.2, flat: 0.8, valley: 0.4 });
      expect(Option.isNone(inputs.weatherFile)).toBe(true);
      expect(inputs.syntheticWeatherHours).toBe(168);
    }).pipe(withEnv([]))
  );

  it.effect("should read overrides from the environment", () =>
    Effect.gen(function* () {
      const simulation = yield* Config.all(AppConfig.simulation);
      const inputs = yield* Config.all(AppConfig.inputs);

      expect(simulation.markup).toBe(1.25);
      expect(simulation.seed).toBe(7);
      expect(inputs.weatherFile).toEqual(Option.some("data/weather.json"));
      expect(Option.map(inputs.syntheticWeatherStart, (date) => date.toISOString())).toEqual(
        Option.some("2024-06-01T00:00:00.000Z")
      );
    }).pipe(
      withEnv([
        ["MARKUP", "1.25"],
        ["RANDOM_SEED", "7"],
        ["WEATHER_FILE", "data/weather.json"],
        ["SYNTHETIC_WEATHER_START", "2024-06-01T00:00:00Z"],
      ])
    )
  );

  it.effect("should reject a fractional seed", () =>
    Effect.gen(function* () {
      const result = yield* Effect.either(AppConfig.simulation.seed);

      expect(result._tag).toBe("Left");
    }).pipe(withEnv([["RANDOM_SEED", "4.5"]]))
  );
});
