import type { Period } from "../tariff/types.js";
import type { TimeSample } from "../weather/types.js";

export type SimulatedSample = TimeSample & {
  readonly pvOutput: number; // kW
  readonly gridLoad: number; // kW
};

// A simulated hour with its tariff slot resolved.
export type PricedSample = SimulatedSample & {
  readonly period: Period;
  readonly price: number;
};
