import { Config as EffectConfig } from "effect";


export const AppConfig = {
  simulation: {
    pvCapacityKwp: EffectConfig.number("PV_CAPACITY_KWP").pipe(EffectConfig.withDefault(1000)),
    markup: EffectConfig.number("MARKUP").pipe(EffectConfig.withDefault(1.1)),
    initialSoc: EffectConfig.number("INITIAL_SOC").pipe(EffectConfig.withDefault(60)),
    defaultBaseLoadKw: EffectConfig.number("DEFAULT_BASE_LOAD_KW").pipe(
      EffectConfig.withDefault(12000)
    ),
    ridgeAlpha: EffectConfig.number("RIDGE_ALPHA").pipe(EffectConfig.withDefault(1.0)),
    seed: EffectConfig.integer("RANDOM_SEED").pipe(EffectConfig.withDefault(42)),
  },

  battery: {
    capacityKwh: EffectConfig.number("BATTERY_CAPACITY_KWH").pipe(EffectConfig.withDefault(15000)),
    maxPowerKw: EffectConfig.number("BATTERY_MAX_POWER_KW").pipe(EffectConfig.withDefault(3000)),
  },

  tariff: {
    peak: EffectConfig.number("TOU_PEAK_PRICE").pipe(EffectConfig.withDefault(1.2)),
    flat: EffectConfig.number("TOU_FLAT_PRICE").pipe(EffectConfig.withDefault(0.8)),
    valley: EffectConfig.number("TOU_VALLEY_PRICE").pipe(EffectConfig.withDefault(0.4)),
  },

  inputs: {
    weatherFile: EffectConfig.option(EffectConfig.string("WEATHER_FILE")),
    registryFile: EffectConfig.option(EffectConfig.string("REGISTRY_FILE")),
    syntheticWeatherHours: EffectConfig.integer("SYNTHETIC_WEATHER_HOURS").pipe(
      EffectConfig.withDefault(168)
    ),
    syntheticWeatherStart: EffectConfig.option(EffectConfig.date("SYNTHETIC_WEATHER_START")),
  },
};
