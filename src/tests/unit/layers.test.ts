import { describe, it, expect } from "@effect/vitest";
import { Effect, Option } from "effect";
import { NodeFileSystem } from "@effect/platform-node";
import { fileURLToPath } from "node:url";
import { createInputLayers } from "../../layers.js";
import { WeatherSource } from "../../weather/types.js";
import { BusinessRegistry } from "../../registry/types.js";

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const syntheticWeather = {
  start: new Date("2024-06-01T00:00:00Z"),
  hours: 12,
  seed: 42,
};

describe("createInputLayers", () => {
  it.effect("should use the configured files", () =>
    Effect.gen(function* () {
      const weather = yield* (yield* WeatherSource).getHourlySeries();
      const businesses = yield* (yield* BusinessRegistry).getBusinesses();

      expect(weather).toHaveLength(3);
      expect(businesses).toHaveLength(3);
    }).pipe(
      Effect.provide(
        createInputLayers({
          weatherFile: Option.some(fixture("weather.json")),
          registryFile: Option.some(fixture("registry.json")),
          syntheticWeather,
          forceSyntheticWeather: false,
        })
      ),
      Effect.provide(NodeFileSystem.layer)
    )
  );

  it.effect("should generate weather and an empty registry when nothing is configured", () =>
    Effect.gen(function* () {
      const weather = yield* (yield* WeatherSource).getHourlySeries();
      const businesses = yield* (yield* BusinessRegistry).getBusinesses();

      expect(weather).toHaveLength(12);
      expect(businesses).toEqual([]);
    }).pipe(
      Effect.provide(
        createInputLayers({
          weatherFile: Option.none(),
          registryFile: Option.none(),
          syntheticWeather,
          forceSyntheticWeather: false,
        })
      ),
      Effect.provide(NodeFileSystem.layer)
    )
  );

  it.effect("should prefer synthetic weather when forced", () =>
    Effect.gen(function* () {
      const weather = yield* (yield* WeatherSource).getHourlySeries();

      expect(weather).toHaveLength(12);
    }).pipe(
      Effect.provide(
        createInputLayers({
          weatherFile: Option.some(fixture("weather.json")),
          registryFile: Option.none(),
          syntheticWeather,
          forceSyntheticWeather: true,
        })
      ),
      Effect.provide(NodeFileSystem.layer)
    )
  );
});
