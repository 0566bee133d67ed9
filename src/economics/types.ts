import type { DispatchAction } from "../dispatch/types.js";

export type EconomicResult = {
  readonly cost: number;
  readonly revenue: number;
  readonly margin: number; // revenue - cost
};

export type TraceEntry = DispatchAction & EconomicResult;

export type ScenarioTotals = {
  readonly totalCost: number;
  readonly totalRevenue: number;
  readonly totalMargin: number;
};

export type ScenarioComparison = {
  readonly costDispatch: number;
  readonly costNoDispatch: number;
  readonly marginDispatch: number;
  readonly marginNoDispatch: number;
  readonly costSaving: number;
  readonly marginGain: number;
  readonly peakReduction: number; // kWh of peak-hour purchase avoided
};
