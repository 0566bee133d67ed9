import { Effect, Schema } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import {
  IndustrySchema,
  ScaleSchema,
  type BusinessLoadPrediction,
  type BusinessRecord,
  type Industry,
  type IndustryProfile,
  type RawBusinessRecord,
  type Scale,
} from "./types.js";

export const INDUSTRY_PROFILES: Readonly<Record<Industry, IndustryProfile>> = {
  manufacturing: { baseLoad: 500, peakRatio: 0.6, profileShape: "stable_high" },
  retail_dining: { baseLoad: 150, peakRatio: 0.8, profileShape: "dual_peak" },
  warehousing_logistics: { baseLoad: 80, peakRatio: 0.3, profileShape: "flat" },
  office_services: { baseLoad: 200, peakRatio: 0.7, profileShape: "day_high" },
};

// Feature column order depends on this order.
export const INDUSTRIES: readonly Industry[] = IndustrySchema.literals;

export const SCALE_FACTORS: Readonly<Record<Scale, number>> = {
  S: 0.8,
  M: 1.0,
  L: 1.2,
};

const INDUSTRY_KEYWORDS: Readonly<Record<Industry, readonly string[]>> = {
  manufacturing: ["manufactur", "processing", "factory", "machinery", "electronic", "printing"],
  retail_dining: ["restaurant", "dining", "catering", "supermarket", "convenience", "retail", "grocery"],
  warehousing_logistics: ["warehous", "logistic", "distribution", "storage", "transport", "courier", "freight"],
  office_services: ["consult", "service", "software", "design", "training", "advertis", "accounting", "legal", "staffing"],
};

const DEFAULT_REGISTERED_CAPITAL = 100;
const DEFAULT_SCALE: Scale = "M";

const isIndustry = Schema.is(IndustrySchema);
const isScale = Schema.is(ScaleSchema);

/**
 * Maps free-text registry fields onto a known industry category. Keywords are
 * checked over the industry label and business scope together, first category
 * wins; an exact category label is accepted as-is.
 */
export const classifyIndustry = (
  industryLabel: string | undefined,
  businessScope: string | undefined
): Industry | undefined => {
  const text = `${industryLabel ?? ""} ${businessScope ?? ""}`.toLowerCase();

  for (const industry of INDUSTRIES) {
    if (INDUSTRY_KEYWORDS[industry].some((keyword) => text.includes(keyword))) {
      return industry;
    }
  }

  return industryLabel !== undefined && isIndustry(industryLabel) ? industryLabel : undefined;
};

const parseCapital = (raw: RawBusinessRecord["registeredCapital"]): number => {
  if (raw === undefined) {
    return DEFAULT_REGISTERED_CAPITAL;
  }

  const value = typeof raw === "number" ? raw : Number.parseFloat(raw);
  return Number.isNaN(value) ? DEFAULT_REGISTERED_CAPITAL : value;
};

export const normalizeBusinesses = (
  records: readonly RawBusinessRecord[]
): Effect.Effect<readonly BusinessRecord[], InvalidInputError> =>
  Effect.gen(function* () {
    const seenCreditCodes = new Set<string>();
    const businesses: BusinessRecord[] = [];

    for (const [index, record] of records.entries()) {
      if (record.creditCode !== undefined) {
        if (seenCreditCodes.has(record.creditCode)) {
          continue;
        }
        seenCreditCodes.add(record.creditCode);
      }

      const name = record.name ?? `business-${index + 1}`;

      const industry = classifyIndustry(record.industry, record.businessScope);
      if (industry === undefined) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Unknown industry for ${name}: "${record.industry ?? ""}"`,
            field: "registry.industry",
          })
        );
      }

      const scale = record.scale ?? DEFAULT_SCALE;
      if (!isScale(scale)) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Unknown scale for ${name}: "${scale}"`,
            field: "registry.scale",
          })
        );
      }

      const registeredCapital = parseCapital(record.registeredCapital);
      if (!(registeredCapital > 0)) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `Registered capital for ${name} must be positive, got ${registeredCapital}`,
            field: "registry.registeredCapital",
          })
        );
      }

      businesses.push({ name, industry, registeredCapital, scale });
    }

    return businesses;
  });

export const predictPeakLoads = (
  businesses: readonly BusinessRecord[]
): readonly BusinessLoadPrediction[] =>
  businesses.map((business) => {
    const profile = INDUSTRY_PROFILES[business.industry];

    return {
      name: business.name,
      industry: business.industry,
      predictedPeakLoad:
        profile.baseLoad * (business.registeredCapital / 100) * SCALE_FACTORS[business.scale],
      profileShape: profile.profileShape,
    };
  });

export const industryCounts = (
  businesses: readonly BusinessRecord[]
): Readonly<Record<Industry, number>> => {
  const counts: Record<Industry, number> = {
    manufacturing: 0,
    retail_dining: 0,
    warehousing_logistics: 0,
    office_services: 0,
  };

  for (const business of businesses) {
    counts[business.industry] += 1;
  }

  return counts;
};
