import { Effect } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import type { Period } from "../tariff/types.js";
import type { PricedSample } from "../simulation/types.js";
import type {
  BatteryConfig,
  BatteryState,
  DispatchAction,
  DispatchDecision,
} from "./types.js";

export type DispatchInput = {
  readonly period: Period;
  readonly soc: number;
  readonly netLoad: number; // grid load minus PV, kW
};

// Greedy, myopic peak shaving / valley filling. No look-ahead.
export const decideDispatch = (
  input: DispatchInput,
  battery: BatteryConfig
): DispatchDecision => {
  const { period, soc, netLoad } = input;

  let action: DispatchDecision["action"] = "HOLD";
  let storagePower = 0;
  let reason: string;

  if (period === "peak") {
    if (soc > battery.minSoc) {
      action = "DISCHARGE";
      const energyAvailableKwh = ((soc - battery.minSoc) / 100) * battery.capacityKwh;
      storagePower = -Math.min(battery.maxPowerKw, energyAvailableKwh);
      reason = "Peak tariff, discharging to shave peak";
    } else {
      reason = "Peak tariff but SOC at lower bound, holding";
    }
  } else if (period === "valley") {
    if (soc < battery.maxSoc) {
      action = "CHARGE";
      const headroomKwh = ((battery.maxSoc - soc) / 100) * battery.capacityKwh;
      storagePower = Math.min(battery.maxPowerKw, headroomKwh);
      reason = "Valley tariff, charging to fill valley";
    } else {
      reason = "Valley tariff but SOC at upper bound, holding";
    }
  } else {
    reason = "Flat tariff, holding";
  }

  return {
    action,
    storagePower,
    gridPurchase: Math.max(0, netLoad + storagePower),
    reason,
  };
};

export const advanceSoc = (
  soc: number,
  storagePower: number,
  battery: BatteryConfig
): number => {
  let next = soc + (storagePower / battery.capacityKwh) * 100;

  // Float drift in the kWh/% round trip must not cross the dispatch bounds.
  if (storagePower < 0) {
    next = Math.max(next, battery.minSoc);
  } else if (storagePower > 0) {
    next = Math.min(next, battery.maxSoc);
  }

  return Math.min(100, Math.max(0, next));
};

/**
 * Sequential fold over the hourly samples. Each hour reads the SOC left by the
 * previous one, so the trace has to be built strictly in timestamp order.
 */
export const walkDispatch = (
  samples: readonly PricedSample[],
  battery: BatteryConfig,
  initialState: BatteryState
): readonly DispatchAction[] =>
  samples.reduce<{ readonly state: BatteryState; readonly trace: DispatchAction[] }>(
    ({ state, trace }, sample) => {
      const decision = decideDispatch(
        {
          period: sample.period,
          soc: state.soc,
          netLoad: sample.gridLoad - sample.pvOutput,
        },
        battery
      );
      const socAfter = advanceSoc(state.soc, decision.storagePower, battery);

      trace.push({
        ...decision,
        time: sample.time,
        hour: sample.hour,
        period: sample.period,
        price: sample.price,
        gridLoad: sample.gridLoad,
        pvOutput: sample.pvOutput,
        socBefore: state.soc,
        socAfter,
      });

      return { state: { soc: socAfter }, trace };
    },
    { state: initialState, trace: [] }
  ).trace;

export const validateBattery = (
  battery: BatteryConfig,
  initialSoc: number
): Effect.Effect<BatteryConfig, InvalidInputError> => {
  if (!(battery.capacityKwh > 0)) {
    return Effect.fail(
      new InvalidInputError({
        message: `Battery capacity must be positive, got ${battery.capacityKwh}`,
        field: "battery.capacityKwh",
      })
    );
  }
  if (!(battery.maxPowerKw > 0)) {
    return Effect.fail(
      new InvalidInputError({
        message: `Battery power limit must be positive, got ${battery.maxPowerKw}`,
        field: "battery.maxPowerKw",
      })
    );
  }
  if (!(battery.minSoc >= 0 && battery.minSoc < battery.maxSoc && battery.maxSoc <= 100)) {
    return Effect.fail(
      new InvalidInputError({
        message: `SOC bounds must satisfy 0 <= min < max <= 100, got ${battery.minSoc}-${battery.maxSoc}`,
        field: "battery.soc",
      })
    );
  }
  if (!(initialSoc >= 0 && initialSoc <= 100)) {
    return Effect.fail(
      new InvalidInputError({
        message: `Initial SOC must be within 0-100, got ${initialSoc}`,
        field: "initialSoc",
      })
    );
  }

  return Effect.succeed(battery);
};
