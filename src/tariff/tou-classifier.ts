import { Effect } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import type { Period, TariffSlot, TouSchedule } from "./types.js";

export const DEFAULT_TOU_SCHEDULE: TouSchedule = {
  peak: { hours: [8, 9, 10, 11, 17, 18, 19, 20, 21], price: 1.2 },
  flat: { hours: [7, 12, 13, 14, 15, 16, 22], price: 0.8 },
  valley: { hours: [0, 1, 2, 3, 4, 5, 6, 23], price: 0.4 },
};

// Fixed precedence. Flat is the fallback and its hour list is never consulted.
const CLASSIFICATION_ORDER = ["peak", "valley"] as const satisfies readonly Period[];

const isHourOfDay = (hour: number): boolean =>
  Number.isInteger(hour) && hour >= 0 && hour <= 23;

export const classifyHour = (
  hour: number,
  schedule: TouSchedule
): Effect.Effect<TariffSlot, InvalidInputError> => {
  if (!isHourOfDay(hour)) {
    return Effect.fail(
      new InvalidInputError({
        message: `Hour must be an integer within 0-23, got ${hour}`,
        field: "hour",
      })
    );
  }

  for (const period of CLASSIFICATION_ORDER) {
    if (schedule[period].hours.includes(hour)) {
      return Effect.succeed({ period, price: schedule[period].price });
    }
  }

  return Effect.succeed({ period: "flat", price: schedule.flat.price });
};

export const validateTouSchedule = (
  schedule: TouSchedule
): Effect.Effect<TouSchedule, InvalidInputError> =>
  Effect.gen(function* () {
    for (const period of ["peak", "flat", "valley"] as const) {
      const band = schedule[period];

      if (!(band.price > 0)) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `TOU ${period} price must be positive, got ${band.price}`,
            field: `tou.${period}.price`,
          })
        );
      }

      const invalidHour = band.hours.find((hour) => !isHourOfDay(hour));
      if (invalidHour !== undefined) {
        return yield* Effect.fail(
          new InvalidInputError({
            message: `TOU ${period} hours must be integers within 0-23, got ${invalidHour}`,
            field: `tou.${period}.hours`,
          })
        );
      }
    }

    return schedule;
  });

export const withPrices = (
  schedule: TouSchedule,
  prices: { readonly peak: number; readonly flat: number; readonly valley: number }
): TouSchedule => ({
  peak: { ...schedule.peak, price: prices.peak },
  flat: { ...schedule.flat, price: prices.flat },
  valley: { ...schedule.valley, price: prices.valley },
});
