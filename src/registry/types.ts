import { Context, Data, Effect, Schema } from "effect";

export const IndustrySchema = Schema.Literal(
  "manufacturing",
  "retail_dining",
  "warehousing_logistics",
  "office_services"
);

export type Industry = Schema.Schema.Type<typeof IndustrySchema>;

export const ScaleSchema = Schema.Literal("S", "M", "L");

export type Scale = Schema.Schema.Type<typeof ScaleSchema>;

export type ProfileShape = "stable_high" | "dual_peak" | "flat" | "day_high";

export type IndustryProfile = {
  readonly baseLoad: number; // kW per 1M registered capital
  readonly peakRatio: number;
  readonly profileShape: ProfileShape;
};

// Raw registry row as supplied by a collaborator; every field may be missing.
export const RawBusinessRecordSchema = Schema.Struct({
  name: Schema.optional(Schema.String),
  creditCode: Schema.optional(Schema.String),
  industry: Schema.optional(Schema.String),
  businessScope: Schema.optional(Schema.String),
  registeredCapital: Schema.optional(Schema.Union(Schema.Number, Schema.String)),
  scale: Schema.optional(Schema.String),
});

export type RawBusinessRecord = Schema.Schema.Type<typeof RawBusinessRecordSchema>;

export type BusinessRecord = {
  readonly name: string;
  readonly industry: Industry;
  readonly registeredCapital: number; // in units of 10k currency
  readonly scale: Scale;
};

export type BusinessLoadPrediction = {
  readonly name: string;
  readonly industry: Industry;
  readonly predictedPeakLoad: number; // kW
  readonly profileShape: ProfileShape;
};

export class RegistryNotAvailableError extends Data.TaggedError(
  "RegistryNotAvailable"
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class BusinessRegistry extends Context.Tag("BusinessRegistry")<
  BusinessRegistry,
  {
    readonly getBusinesses: () => Effect.Effect<
      readonly RawBusinessRecord[],
      RegistryNotAvailableError
    >;
  }
>() {}

export type IBusinessRegistry = Context.Tag.Service<typeof BusinessRegistry>;
