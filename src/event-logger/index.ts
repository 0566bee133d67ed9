import type { IEventLogger } from "./types.js";
import type { ForecastModel } from "../forecast/types.js";
import type { KpiRecord } from "../simulation/simulation-runner.js";
import type { ScenarioComparison, TraceEntry } from "../economics/types.js";
import { Effect } from "effect";

export class EventLogger implements IEventLogger {

  public onRunStarted(hours: number, businesses: number) {
    return Effect.log(`Starting simulation over ${hours} hours with ${businesses} registry records`);
  }

  public onDispatchAction(entry: TraceEntry) {
    return Effect.logDebug(`${entry.time.toISOString()} ${entry.period} ${entry.action}`, {
      storagePower: entry.storagePower,
      gridPurchase: entry.gridPurchase,
      socAfter: entry.socAfter,
      reason: entry.reason,
    });
  }

  public onForecastEvaluated(model: ForecastModel) {
    return Effect.log(
      `Load forecast (${model.holdout}, train=${model.trainSize}, test=${model.testSize}): R²=${model.r2.toFixed(3)} MAPE=${(model.mape * 100).toFixed(2)}% RMSE=${model.rmse.toFixed(1)} kW`
    );
  }

  public onRunCompleted(kpis: KpiRecord, comparison: ScenarioComparison) {
    return Effect.log('Simulation completed', {
      ...kpis,
      costNoDispatch: comparison.costNoDispatch,
      marginNoDispatch: comparison.marginNoDispatch,
    });
  }
}
