export interface PricePoint {
  timestamp: number; // epoch ms
  price: number;
}

export type Signal = 1 | -1;

export interface SignalRow {
  index: number; // position in the source PriceSeries
  timestamp: number;
  price: number;
  shortMa?: number;       // undefined for the first shortWindow - 1 rows
  longMa?: number;        // undefined for the first longWindow - 1 rows
  signal?: Signal;        // undefined unless both averages are defined
  positionChange?: number; // undefined unless this row and the previous one both carry a signal
}

/** A SignalRow that survived warm-up removal: every derived field is present. */
export interface CleanSignalRow extends SignalRow {
  shortMa: number;
  longMa: number;
  signal: Signal;
  positionChange: number;
}

export interface ReturnsRow extends CleanSignalRow {
  priceReturn: number;
  strategyReturn: number;
  transactionCost: number;
  netReturn: number;
  cumulativeReturn: number;
}

export interface BacktestParams {
  shortWindow: number;
  longWindow: number;
  costRate?: number; // fraction of notional per unit of signal change, default 0.001
}

export interface BacktestMetrics {
  totalReturn: number;
  annualizedReturn: number;
  sharpeRatio: number;
  maxDrawdown: number;
}

export interface BacktestResult {
  params: Required<BacktestParams>;
  seriesLength: number;
  dateRange: { start: number; end: number };
  rows: readonly ReturnsRow[];
  metrics: BacktestMetrics;
}

export type CrossoverMarker = 'buy' | 'sell';

export interface ChartPoint {
  timestamp: number;
  price: number;
  shortMa: number;
  longMa: number;
  signal: Signal;
  cumulativeReturn: number;
  buyHoldReturn: number;
  marker?: CrossoverMarker;
}

export interface ChartData {
  shortWindow: number;
  longWindow: number;
  points: readonly ChartPoint[];
}
