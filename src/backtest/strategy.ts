import { CleanSignalRow, SignalRow } from './types';
import { PriceSeries } from './price-series';
import { movingAverage, crossoverSignals, positionChanges } from './indicators';

/** One SignalRow per price: both averages, the crossover signal and its first difference. */
export function generateSignals(series: PriceSeries, shortWindow: number, longWindow: number): SignalRow[] {
  const prices = series.prices();
  const shortMa = movingAverage(prices, shortWindow);
  const longMa = movingAverage(prices, longWindow);
  const signals = crossoverSignals(shortMa, longMa);
  const changes = positionChanges(signals);

  return series.toArray().map((point, i) => ({
    index: i,
    timestamp: point.timestamp,
    price: point.price,
    shortMa: shortMa[i],
    longMa: longMa[i],
    signal: signals[i],
    positionChange: changes[i],
  }));
}

export function isCleanRow(row: SignalRow): row is CleanSignalRow {
  return row.shortMa !== undefined &&
    row.longMa !== undefined &&
    row.signal !== undefined &&
    row.positionChange !== undefined;
}

/**
 * Drop the rows a simulation cannot use: the warm-up period, where an average is undefined,
 * and row 0, which has no predecessor to difference against. The first fully-averaged row
 * stays, carrying its change from the warm-up signal.
 */
export function cleanSignals(rows: readonly SignalRow[]): CleanSignalRow[] {
  return rows.filter(isCleanRow);
}
