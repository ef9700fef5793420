import { BacktestMetrics } from './types';
import { PriceSeries } from './price-series';
import { BacktestEngine } from './engine';
import { InsufficientDataError } from './errors';
import { Logger } from '../utils/logger';

export interface SweepRow {
  shortWindow: number;
  longWindow: number;
  metrics: BacktestMetrics;
}

export interface SweepOutcome {
  rows: SweepRow[];
  skipped: Array<{ shortWindow: number; longWindow: number; reason: string }>;
}

/** NaN sorts last; otherwise higher Sharpe first. */
export function compareBySharpe(a: SweepRow, b: SweepRow): number {
  const sa = a.metrics.sharpeRatio;
  const sb = b.metrics.sharpeRatio;
  if (Number.isNaN(sa) && Number.isNaN(sb)) return 0;
  if (Number.isNaN(sa)) return 1;
  if (Number.isNaN(sb)) return -1;
  if (sa === sb) return 0;
  return sb > sa ? 1 : -1;
}

/**
 * Every (short, long) pair with short < long, each on its own engine. Pairs the series is
 * too short for are reported in `skipped`; any other error propagates.
 */
export function runSweep(
  series: PriceSeries,
  shortWindows: readonly number[],
  longWindows: readonly number[],
  costRate: number,
  logger?: Logger
): SweepOutcome {
  const rows: SweepRow[] = [];
  const skipped: SweepOutcome['skipped'] = [];

  for (const shortWindow of shortWindows) {
    for (const longWindow of longWindows) {
      if (shortWindow >= longWindow) continue;
      const engine = new BacktestEngine(series, { logger });
      try {
        const metrics = engine.run(shortWindow, longWindow, costRate);
        rows.push({ shortWindow, longWindow, metrics });
      } catch (err) {
        if (!(err instanceof InsufficientDataError)) throw err;
        skipped.push({ shortWindow, longWindow, reason: err.message });
      }
    }
  }

  return { rows: rows.sort(compareBySharpe), skipped };
}
