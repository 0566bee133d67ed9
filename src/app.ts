import type { IWeatherSource, WeatherNotAvailableError } from './weather/types.js';
import type { IBusinessRegistry, RegistryNotAvailableError } from './registry/types.js';
import type { IEventLogger } from './event-logger/types.js';
import { EventLogger } from './event-logger/index.js';
import type { InvalidInputError } from './errors/invalid-input.error.js';
import type { NumericDegenerateError } from './errors/numeric-degenerate.error.js';
import { runSimulation, type SimulationInput, type SimulationReport } from './simulation/simulation-runner.js';
import { Effect } from 'effect';

export type SimulationSettings = Omit<SimulationInput, 'weather' | 'businesses'>;

export class App {
  public constructor(
    private readonly weatherSource: IWeatherSource,
    private readonly businessRegistry: IBusinessRegistry,
    private readonly settings: SimulationSettings,
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) { }

  /**
   * Materialises every collaborator input first, then runs the simulation
   * core once. Either the whole report is produced or the run fails.
   */
  public run(): Effect.Effect<
    SimulationReport,
    WeatherNotAvailableError
    | RegistryNotAvailableError
    | InvalidInputError
    | NumericDegenerateError
  > {
    const deps = this;

    return Effect.gen(function*() {
      const [weather, businesses] = yield* Effect.all(
        [
          deps.weatherSource.getHourlySeries(),
          deps.businessRegistry.getBusinesses(),
        ],
        { concurrency: 'unbounded' },
      );

      yield* deps.eventLogger.onRunStarted(weather.length, businesses.length);

      const report = yield* runSimulation({
        ...deps.settings,
        weather,
        businesses,
      });

      yield* Effect.forEach(report.dispatchTrace, (entry) => deps.eventLogger.onDispatchAction(entry), { discard: true });
      yield* deps.eventLogger.onForecastEvaluated(report.forecast);
      yield* deps.eventLogger.onRunCompleted(report.kpis, report.comparison);

      return report;
    }).pipe(
      Effect.tapError((err) => Effect.logError(`Simulation failed: ${err.message}`, { tag: err._tag })),
    );
  }
}
