import { Effect, Layer, Schema } from "effect";
import { FileSystem } from "@effect/platform";
import {
  BusinessRegistry,
  RawBusinessRecordSchema,
  RegistryNotAvailableError,
} from "./types.js";

const RegistryFileSchema = Schema.parseJson(Schema.Array(RawBusinessRecordSchema));

export type JsonFileRegistryConfig = {
  readonly path: string;
};

export const JsonFileRegistryLayer = (
  config: JsonFileRegistryConfig
): Layer.Layer<BusinessRegistry, never, FileSystem.FileSystem> =>
  Layer.effect(
    BusinessRegistry,
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;

      return BusinessRegistry.of({
        getBusinesses: () =>
          fileSystem.readFileString(config.path).pipe(
            Effect.flatMap(Schema.decodeUnknown(RegistryFileSchema)),
            Effect.tap((records) =>
              Effect.logDebug(`Loaded ${records.length} registry records`, {
                path: config.path,
              })
            ),
            Effect.catchAll((error) =>
              Effect.fail(
                new RegistryNotAvailableError({
                  message: `Failed to read registry file ${config.path}: ${error.message}`,
                  cause: error,
                })
              )
            )
          ),
      });
    })
  );

// Used when no registry is configured: the run falls back to the default base load.
export const EmptyRegistryLayer: Layer.Layer<BusinessRegistry> = Layer.succeed(
  BusinessRegistry,
  BusinessRegistry.of({
    getBusinesses: () => Effect.succeed([]),
  })
);
