import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import { SyntheticWeatherLayer, generateSyntheticWeather } from "../../../weather/synthetic.adapter.js";
import { WeatherSource } from "../../../weather/types.js";

const start = new Date("2024-06-01T00:00:00Z");

describe("generateSyntheticWeather", () => {
  it.effect("should produce consecutive hourly samples from the start", () =>
    Effect.gen(function* () {
      const samples = yield* generateSyntheticWeather({ start, hours: 48, seed: 42 });

      expect(samples).toHaveLength(48);
      expect(samples[0]?.time.toISOString()).toBe("2024-06-01T00:00:00.000Z");
      expect(samples[47]?.time.toISOString()).toBe("2024-06-02T23:00:00.000Z");
    })
  );

  it.effect("should be dark at night and bounded by the clear-sky curve by day", () =>
    Effect.gen(function* () {
      const samples = yield* generateSyntheticWeather({ start, hours: 24, seed: 5 });

      samples.forEach((sample, hour) => {
        const clearSky = hour >= 6 && hour <= 18 ? 800 * Math.sin((Math.PI * (hour - 6)) / 12) : 0;

        expect(sample.radiation).toBeGreaterThanOrEqual(0.6 * clearSky - 1e-9);
        expect(sample.radiation).toBeLessThanOrEqual(clearSky + 1e-9);
      });
      expect(samples[2]?.radiation).toBe(0);
      expect(samples[12]?.radiation).toBeGreaterThan(0);
    })
  );

  it.effect("should keep temperature near the diurnal curve", () =>
    Effect.gen(function* () {
      const samples = yield* generateSyntheticWeather({
        start,
        hours: 24,
        seed: 9,
        meanTemperature: 25,
      });

      samples.forEach((sample, hour) => {
        const curve = 25 + 5 * Math.sin((2 * Math.PI * (hour - 9)) / 24);
        // noise standard deviation is 0.5 °C
        expect(Math.abs(sample.temperature - curve)).toBeLessThan(3);
      });
    })
  );

  it.effect("should repeat for a seed and differ across seeds", () =>
    Effect.gen(function* () {
      const first = yield* generateSyntheticWeather({ start, hours: 24, seed: 42 });
      const again = yield* generateSyntheticWeather({ start, hours: 24, seed: 42 });
      const other = yield* generateSyntheticWeather({ start, hours: 24, seed: 43 });

      expect(again).toStrictEqual(first);
      expect(other.map((sample) => sample.temperature)).not.toEqual(
        first.map((sample) => sample.temperature)
      );
    })
  );

  it.effect("should serve the same series through the layer", () =>
    Effect.gen(function* () {
      const source = yield* WeatherSource;
      const served = yield* source.getHourlySeries();
      const direct = yield* generateSyntheticWeather({ start, hours: 6, seed: 1 });

      expect(served).toStrictEqual(direct);
    }).pipe(Effect.provide(SyntheticWeatherLayer({ start, hours: 6, seed: 1 })))
  );
});
