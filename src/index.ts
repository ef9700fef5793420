export { PriceSeries } from './backtest/price-series';
export { BacktestEngine, runBacktest } from './backtest/engine';
export type { EngineState, BacktestEngineOptions } from './backtest/engine';
export { movingAverage, crossoverSignal, crossoverSignals, positionChanges, WARMUP_SIGNAL } from './backtest/indicators';
export { generateSignals, cleanSignals } from './backtest/strategy';
export { simulateReturns, priceReturn, DEFAULT_COST_RATE } from './backtest/simulator';
export { computeMetrics, formatMetrics, TRADING_DAYS_PER_YEAR } from './backtest/report';
export { buildChartData, chartDataToCsv, exportChartData } from './backtest/chart';
export { parsePriceCsv, loadPriceSeries } from './backtest/data-loader';
export { runSweep } from './backtest/sweep-grid';
export {
  BacktestError,
  StateError,
  InvalidParameterError,
  DomainError,
  InsufficientDataError,
  describeError,
} from './backtest/errors';
export type {
  PricePoint,
  Signal,
  SignalRow,
  CleanSignalRow,
  ReturnsRow,
  BacktestParams,
  BacktestMetrics,
  BacktestResult,
  ChartData,
  ChartPoint,
  CrossoverMarker,
} from './backtest/types';
