import type { Period } from "../tariff/types.js";

export type BatteryConfig = {
  readonly capacityKwh: number;
  readonly maxPowerKw: number;
  readonly minSoc: number; // %
  readonly maxSoc: number; // %
};

export const DEFAULT_BATTERY: BatteryConfig = {
  capacityKwh: 15000,
  maxPowerKw: 3000,
  minSoc: 20,
  maxSoc: 90,
};

export type BatteryState = {
  readonly soc: number; // %
};

export type DispatchActionKind = "HOLD" | "CHARGE" | "DISCHARGE";

export type DispatchDecision = {
  readonly action: DispatchActionKind;
  readonly storagePower: number; // kW, + charging, - discharging
  readonly gridPurchase: number; // kW
  readonly reason: string;
};

export type DispatchAction = DispatchDecision & {
  readonly time: Date;
  readonly hour: number;
  readonly period: Period;
  readonly price: number;
  readonly gridLoad: number;
  readonly pvOutput: number;
  readonly socBefore: number;
  readonly socAfter: number;
};
