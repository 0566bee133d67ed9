import type { PricedSample } from "../simulation/types.js";
import { aggregateTrace, evaluateHour, roundCurrency } from "./economics.js";
import type { ScenarioComparison, TraceEntry } from "./types.js";

// Counterfactual with storage idle. No cross-hour state, so it can be built
// alongside the dispatch walk.
export const buildBaselineTrace = (
  samples: readonly PricedSample[],
  markup: number,
  idleSoc: number
): readonly TraceEntry[] =>
  samples.map((sample): TraceEntry => {
    const gridPurchase = Math.max(0, sample.gridLoad - sample.pvOutput);

    return {
      time: sample.time,
      hour: sample.hour,
      period: sample.period,
      price: sample.price,
      gridLoad: sample.gridLoad,
      pvOutput: sample.pvOutput,
      socBefore: idleSoc,
      socAfter: idleSoc,
      action: "HOLD",
      storagePower: 0,
      gridPurchase,
      reason: "No storage dispatch",
      ...evaluateHour(gridPurchase, 0, sample.price, markup),
    };
  });

export const peakPurchaseReduction = (
  dispatchTrace: readonly TraceEntry[],
  baselineTrace: readonly TraceEntry[]
): number => {
  let reduction = 0;

  dispatchTrace.forEach((entry, index) => {
    const baseline = baselineTrace[index];
    if (entry.period === "peak" && baseline !== undefined) {
      reduction += Math.max(0, baseline.gridPurchase - entry.gridPurchase);
    }
  });

  return roundCurrency(reduction);
};

// KPIs are derived from the rounded totals only, never recomputed from raw hours.
export const compareScenarios = (
  dispatchTrace: readonly TraceEntry[],
  baselineTrace: readonly TraceEntry[]
): ScenarioComparison => {
  const dispatch = aggregateTrace(dispatchTrace);
  const baseline = aggregateTrace(baselineTrace);

  return {
    costDispatch: dispatch.totalCost,
    costNoDispatch: baseline.totalCost,
    marginDispatch: dispatch.totalMargin,
    marginNoDispatch: baseline.totalMargin,
    costSaving: roundCurrency(baseline.totalCost - dispatch.totalCost),
    marginGain: roundCurrency(dispatch.totalMargin - baseline.totalMargin),
    peakReduction: peakPurchaseReduction(dispatchTrace, baselineTrace),
  };
};
