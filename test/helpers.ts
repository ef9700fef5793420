import { PriceSeries } from '../src/backtest/price-series';
import { Logger } from '../src/utils/logger';

export const DAY_MS = 86_400_000;
export const START_MS = Date.UTC(2024, 0, 1);

export function dailySeries(prices: number[]): PriceSeries {
  return PriceSeries.fromArrays(prices.map((_, i) => START_MS + i * DAY_MS), prices);
}

/** Up, dip, recover: two crossovers under windows 1/2. */
export const ZIGZAG = [10, 11, 12, 11, 10, 11, 12];

/** Deterministic wavy uptrend, always positive. */
export function wavyPrices(n: number): number[] {
  return Array.from({ length: n }, (_, i) => 100 + 10 * Math.sin(i / 5) + i * 0.3);
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
