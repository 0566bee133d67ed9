import type { Effect } from "effect";
import type { ForecastModel } from "../forecast/types.js";
import type { KpiRecord } from "../simulation/simulation-runner.js";
import type { ScenarioComparison, TraceEntry } from "../economics/types.js";

export type IEventLogger = {
  onRunStarted: (hours: number, businesses: number) => Effect.Effect<void>;
  onDispatchAction: (entry: TraceEntry) => Effect.Effect<void>;
  onForecastEvaluated: (model: ForecastModel) => Effect.Effect<void>;
  onRunCompleted: (kpis: KpiRecord, comparison: ScenarioComparison) => Effect.Effect<void>;
};
