import type { DispatchAction } from "../dispatch/types.js";
import type { EconomicResult, ScenarioTotals, TraceEntry } from "./types.js";

export const roundCurrency = (value: number): number => Math.round(value * 100) / 100;

// Per-hour values stay unrounded; rounding happens once, at aggregation.
export const evaluateHour = (
  gridPurchase: number,
  storagePower: number,
  price: number,
  markup: number
): EconomicResult => {
  const cost = gridPurchase * price;
  // Energy delivered to customers: purchase net of what went into storage.
  const revenue = (gridPurchase - storagePower) * price * markup;

  return { cost, revenue, margin: revenue - cost };
};

export const priceTrace = (
  actions: readonly DispatchAction[],
  markup: number
): readonly TraceEntry[] =>
  actions.map((action) => ({
    ...action,
    ...evaluateHour(action.gridPurchase, action.storagePower, action.price, markup),
  }));

export const aggregateTrace = (entries: readonly EconomicResult[]): ScenarioTotals => {
  let cost = 0;
  let revenue = 0;

  for (const entry of entries) {
    cost += entry.cost;
    revenue += entry.revenue;
  }

  const totalCost = roundCurrency(cost);
  const totalRevenue = roundCurrency(revenue);

  return {
    totalCost,
    totalRevenue,
    totalMargin: roundCurrency(totalRevenue - totalCost),
  };
};
