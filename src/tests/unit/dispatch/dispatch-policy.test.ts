import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import {
  advanceSoc,
  decideDispatch,
  validateBattery,
  walkDispatch,
} from "../../../dispatch/dispatch-policy.js";
import { DEFAULT_BATTERY, type BatteryConfig } from "../../../dispatch/types.js";
import { evaluateHour, roundCurrency } from "../../../economics/economics.js";
import type { Period } from "../../../tariff/types.js";
import { pricedSample } from "../../helpers/samples.js";

describe("dispatch-policy", () => {
  const battery: BatteryConfig = {
    capacityKwh: 15000,
    maxPowerKw: 3000,
    minSoc: 20,
    maxSoc: 90,
  };

  describe("decideDispatch", () => {
    it("should discharge at full power during peak with energy available", () => {
      const decision = decideDispatch({ period: "peak", soc: 60, netLoad: 500 }, battery);

      // -min(3000, (60 - 20) / 100 * 15000)
      expect(decision.action).toBe("DISCHARGE");
      expect(decision.storagePower).toBe(-3000);
      expect(decision.gridPurchase).toBe(0);
      expect(evaluateHour(decision.gridPurchase, decision.storagePower, 1.2, 1.1).cost).toBe(0);
    });

    it("should charge at full power during valley with headroom", () => {
      const decision = decideDispatch({ period: "valley", soc: 60, netLoad: 200 }, battery);

      // min(3000, (90 - 60) / 100 * 15000)
      expect(decision.action).toBe("CHARGE");
      expect(decision.storagePower).toBe(3000);
      expect(decision.gridPurchase).toBe(3200);
      expect(roundCurrency(evaluateHour(decision.gridPurchase, decision.storagePower, 0.4, 1.1).cost)).toBe(1280);
    });

    it("should limit discharge to the energy above the lower bound", () => {
      const decision = decideDispatch({ period: "peak", soc: 25, netLoad: 1000 }, battery);

      // (25 - 20) / 100 * 15000 = 750 kWh available
      expect(decision.storagePower).toBeCloseTo(-750, 6);
      expect(decision.gridPurchase).toBeCloseTo(250, 6);
    });

    it("should hold during flat hours", () => {
      const decision = decideDispatch({ period: "flat", soc: 50, netLoad: 800 }, battery);

      expect(decision).toEqual({
        action: "HOLD",
        storagePower: 0,
        gridPurchase: 800,
        reason: "Flat tariff, holding",
      });
    });

    it("should hold when bounds are exhausted", () => {
      const depleted = decideDispatch({ period: "peak", soc: 20, netLoad: 800 }, battery);
      const full = decideDispatch({ period: "valley", soc: 90, netLoad: 800 }, battery);

      expect(depleted.action).toBe("HOLD");
      expect(depleted.storagePower).toBe(0);
      expect(full.action).toBe("HOLD");
      expect(full.storagePower).toBe(0);
    });

    it("should never buy a negative amount from the grid", () => {
      const surplus = decideDispatch({ period: "flat", soc: 50, netLoad: -300 }, battery);
      const discharging = decideDispatch({ period: "peak", soc: 80, netLoad: 100 }, battery);

      expect(surplus.gridPurchase).toBe(0);
      expect(discharging.gridPurchase).toBe(0);
    });
  });

  describe("advanceSoc", () => {
    it("should move SOC by the stored energy share of capacity", () => {
      expect(advanceSoc(60, -3000, battery)).toBeCloseTo(40, 9);
      expect(advanceSoc(60, 3000, battery)).toBeCloseTo(80, 9);
      expect(advanceSoc(60, 0, battery)).toBe(60);
    });

    it("should not cross the dispatch bounds", () => {
      expect(advanceSoc(25, -750, battery)).toBeGreaterThanOrEqual(20);
      expect(advanceSoc(89, 150, battery)).toBeLessThanOrEqual(90);
    });
  });

  describe("walkDispatch", () => {
    it("should carry SOC from one hour to the next", () => {
      const samples = [0, 1, 2].map((index) =>
        pricedSample({ index, hour: 9, period: "peak", price: 1.2, gridLoad: 5000 })
      );

      const trace = walkDispatch(samples, battery, { soc: 60 });

      expect(trace.map((action) => action.action)).toEqual(["DISCHARGE", "DISCHARGE", "HOLD"]);
      expect(trace[0]?.socBefore).toBe(60);
      expect(trace[0]?.socAfter).toBeCloseTo(40, 9);
      expect(trace[1]?.socBefore).toBe(trace[0]?.socAfter);
      expect(trace[1]?.socAfter).toBeCloseTo(20, 9);
      expect(trace[2]?.storagePower).toBe(0);
      expect(trace[2]?.gridPurchase).toBe(5000);
    });

    it("should keep SOC within bounds over a long mixed sequence", () => {
      const periods: Period[] = ["valley", "valley", "flat", "peak", "peak", "peak", "flat", "valley"];
      const samples = Array.from({ length: 96 }, (_, index) =>
        pricedSample({
          index,
          period: periods[index % periods.length] ?? "flat",
          price: 1,
          gridLoad: 1000 + (index % 7) * 150,
          pvOutput: (index % 5) * 300,
        })
      );
      const smallBattery: BatteryConfig = { ...DEFAULT_BATTERY, capacityKwh: 4000, maxPowerKw: 1700 };

      const trace = walkDispatch(samples, smallBattery, { soc: 60 });

      expect(trace).toHaveLength(96);
      for (const action of trace) {
        expect(action.socAfter).toBeGreaterThanOrEqual(0);
        expect(action.socAfter).toBeLessThanOrEqual(100);
        expect(action.gridPurchase).toBeGreaterThanOrEqual(0);
        if (action.action === "DISCHARGE") {
          expect(action.socAfter).toBeGreaterThanOrEqual(smallBattery.minSoc);
        }
        if (action.action === "CHARGE") {
          expect(action.socAfter).toBeLessThanOrEqual(smallBattery.maxSoc);
        }
      }
    });
  });

  describe("validateBattery", () => {
    it.effect("should accept the default battery", () =>
      Effect.gen(function* () {
        expect(yield* validateBattery(DEFAULT_BATTERY, 60)).toBe(DEFAULT_BATTERY);
      })
    );

    it.effect("should reject non-positive capacity and power", () =>
      Effect.gen(function* () {
        const capacity = yield* Effect.flip(validateBattery({ ...battery, capacityKwh: -1 }, 60));
        const power = yield* Effect.flip(validateBattery({ ...battery, maxPowerKw: 0 }, 60));

        expect(capacity.field).toBe("battery.capacityKwh");
        expect(power.field).toBe("battery.maxPowerKw");
      })
    );

    it.effect("should reject an initial SOC outside 0-100", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(validateBattery(battery, 120));
        expect(error.field).toBe("initialSoc");
      })
    );
  });
});
