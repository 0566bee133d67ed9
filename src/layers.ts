import { Layer, Option } from "effect";
import type { FileSystem } from "@effect/platform";
import { JsonFileWeatherLayer } from "./weather/json-file.adapter.js";
import { SyntheticWeatherLayer, type SyntheticWeatherConfig } from "./weather/synthetic.adapter.js";
import { EmptyRegistryLayer, JsonFileRegistryLayer } from "./registry/json-file.adapter.js";
import type { WeatherSource } from "./weather/types.js";
import type { BusinessRegistry } from "./registry/types.js";

export const createInputLayers = (config: {
    readonly weatherFile: Option.Option<string>;
    readonly registryFile: Option.Option<string>;
    readonly syntheticWeather: SyntheticWeatherConfig;
    readonly forceSyntheticWeather: boolean;
}): Layer.Layer<WeatherSource | BusinessRegistry, never, FileSystem.FileSystem> => {
    const weatherLayer = config.forceSyntheticWeather
        ? SyntheticWeatherLayer(config.syntheticWeather)
        : Option.match(config.weatherFile, {
            onNone: () => SyntheticWeatherLayer(config.syntheticWeather),
            onSome: (path) => JsonFileWeatherLayer({ path }),
        });

    const registryLayer = Option.match(config.registryFile, {
        onNone: () => EmptyRegistryLayer,
        onSome: (path) => JsonFileRegistryLayer({ path }),
    });

    return Layer.mergeAll(weatherLayer, registryLayer);
};
