import { BacktestMetrics, BacktestParams, BacktestResult, ChartData } from './types';
import { PriceSeries } from './price-series';
import { generateSignals, cleanSignals } from './strategy';
import { simulateReturns, validateCostRate, DEFAULT_COST_RATE } from './simulator';
import { computeMetrics } from './report';
import { buildChartData } from './chart';
import { InsufficientDataError, InvalidParameterError, StateError } from './errors';
import { createLogger, Logger } from '../utils/logger';

const defaultLog = createLogger('backtest');

function validateWindow(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidParameterError(`${name} must be a positive integer, got ${value}`, { [name]: value });
  }
}

/**
 * Run one SMA-crossover simulation over `series`. Pure: the returned result is frozen and
 * shares nothing with other runs.
 */
export function runBacktest(series: PriceSeries, params: BacktestParams, log: Logger = defaultLog): BacktestResult {
  const { shortWindow, longWindow, costRate = DEFAULT_COST_RATE } = params;
  validateWindow('shortWindow', shortWindow);
  validateWindow('longWindow', longWindow);
  validateCostRate(costRate);

  const needed = Math.max(shortWindow, longWindow);
  if (series.length < needed) {
    throw new InsufficientDataError(
      `series has ${series.length} prices but the ${needed}-period average needs at least ${needed}`,
      { length: series.length, shortWindow, longWindow },
    );
  }
  if (shortWindow >= longWindow) {
    log.warn('Short window is not shorter than long window', { shortWindow, longWindow });
  }

  log.debug('Backtest starting', { prices: series.length, shortWindow, longWindow, costRate });

  const signalRows = cleanSignals(generateSignals(series, shortWindow, longWindow));
  if (signalRows.length === 0) {
    throw new InsufficientDataError(
      `no rows remain after the ${needed}-period warm-up (series has ${series.length} prices)`,
      { length: series.length, shortWindow, longWindow },
    );
  }

  const rows = simulateReturns(signalRows, series.prices(), costRate).map(r => Object.freeze(r));
  const metrics = Object.freeze(computeMetrics(rows, series.length));

  log.info('Backtest complete', { rows: rows.length, ...metrics });

  return Object.freeze({
    params: Object.freeze({ shortWindow, longWindow, costRate }),
    seriesLength: series.length,
    dateRange: Object.freeze({ start: series.start, end: series.end }),
    rows: Object.freeze(rows),
    metrics,
  });
}

export type EngineState =
  | { status: 'not-run' }
  | { status: 'completed'; result: BacktestResult };

export interface BacktestEngineOptions {
  logger?: Logger;
}

/**
 * Holds one price series and the result of its most recent run.
 * A run replaces the previous result wholesale; a failed run leaves it untouched.
 */
export class BacktestEngine {
  private state: EngineState = { status: 'not-run' };
  private chart: ChartData | null = null;
  private readonly log: Logger;

  constructor(readonly series: PriceSeries, options: BacktestEngineOptions = {}) {
    this.log = options.logger ?? defaultLog;
  }

  get status(): EngineState['status'] {
    return this.state.status;
  }

  run(shortWindow: number, longWindow: number, costRate = DEFAULT_COST_RATE): BacktestMetrics {
    const result = runBacktest(this.series, { shortWindow, longWindow, costRate }, this.log);
    this.state = { status: 'completed', result };
    this.chart = null;
    return result.metrics;
  }

  result(): BacktestResult {
    return this.completed('Result').result;
  }

  metrics(): BacktestMetrics {
    return this.completed('Metrics').result.metrics;
  }

  chartData(): ChartData {
    const { result } = this.completed('Chart data');
    if (!this.chart) this.chart = buildChartData(result);
    return this.chart;
  }

  private completed(what: string): Extract<EngineState, { status: 'completed' }> {
    if (this.state.status !== 'completed') {
      throw new StateError(`${what} requested before a backtest run completed`);
    }
    return this.state;
  }
}
