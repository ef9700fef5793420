import { CleanSignalRow, ReturnsRow, Signal } from './types';
import { DomainError, InvalidParameterError } from './errors';

export const DEFAULT_COST_RATE = 0.001;

export function validateCostRate(costRate: number): void {
  if (!Number.isFinite(costRate) || costRate < 0) {
    throw new InvalidParameterError(`Cost rate must be a non-negative number, got ${costRate}`, { costRate });
  }
}

/** Simple return from prev to curr. */
export function priceReturn(prev: number, curr: number): number {
  if (!Number.isFinite(prev) || prev <= 0) {
    throw new DomainError(`Cannot compute a return from price ${prev}`, { prev, curr });
  }
  return (curr - prev) / prev;
}

// signal[t-1] recovered from the row itself: positionChange = signal[t] - signal[t-1]
function signalBefore(row: CleanSignalRow): Signal {
  return row.signal - row.positionChange > 0 ? 1 : -1;
}

/**
 * Turn cleaned signal rows into position-aware net returns.
 *
 * The position held over period t is the signal set at the close of t-1, so there is no
 * look-ahead. A position change is charged one period later at |change| x costRate, which
 * makes a full flip cost twice the rate. The first row has no retained predecessor and is
 * charged nothing.
 *
 * @param prices the full price array the rows index into
 */
export function simulateReturns(
  rows: readonly CleanSignalRow[],
  prices: readonly number[],
  costRate = DEFAULT_COST_RATE
): ReturnsRow[] {
  validateCostRate(costRate);

  const out: ReturnsRow[] = [];
  let wealth = 1;

  for (let k = 0; k < rows.length; k++) {
    const row = rows[k];
    const prevRow = k > 0 ? rows[k - 1] : undefined;
    if (row.index < 1 || row.index >= prices.length) {
      throw new InvalidParameterError(
        `Row index ${row.index} has no preceding price in a series of ${prices.length}`,
        { index: row.index },
      );
    }

    const ret = priceReturn(prices[row.index - 1], prices[row.index]);
    const held = prevRow ? prevRow.signal : signalBefore(row);
    const strategyReturn = held * ret;
    const transactionCost = prevRow ? Math.abs(prevRow.positionChange) * costRate : 0;
    const netReturn = strategyReturn - transactionCost;

    wealth *= 1 + netReturn;

    out.push({
      ...row,
      priceReturn: ret,
      strategyReturn,
      transactionCost,
      netReturn,
      cumulativeReturn: wealth - 1,
    });
  }

  return out;
}
