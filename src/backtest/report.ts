import { BacktestMetrics, BacktestResult, ReturnsRow } from './types';
import { InvalidParameterError, StateError } from './errors';

export const TRADING_DAYS_PER_YEAR = 252;

export function computeMetrics(rows: readonly ReturnsRow[], seriesLength: number): BacktestMetrics {
  if (rows.length === 0) {
    throw new StateError('No simulated returns to summarize; run a backtest first');
  }
  if (!Number.isInteger(seriesLength) || seriesLength < rows.length) {
    throw new InvalidParameterError(
      `Series length ${seriesLength} cannot be shorter than the ${rows.length} simulated rows`,
      { seriesLength, rows: rows.length },
    );
  }

  const totalReturn = rows[rows.length - 1].cumulativeReturn;

  // Annualized over the full input length, warm-up rows included
  const annualizedReturn = Math.pow(1 + totalReturn, TRADING_DAYS_PER_YEAR / seriesLength) - 1;

  const returns = rows.map(r => r.netReturn);
  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / (returns.length - 1);
  const std = Math.sqrt(variance);
  // Zero or undefined variance passes through as NaN / ±Infinity
  const sharpeRatio = Math.sqrt(TRADING_DAYS_PER_YEAR) * mean / std;

  let peak = 1 + rows[0].cumulativeReturn;
  let maxDrawdown = 0;
  for (const r of rows) {
    const wealth = 1 + r.cumulativeReturn;
    if (wealth > peak) peak = wealth;
    const dd = wealth / peak - 1;
    if (dd < maxDrawdown) maxDrawdown = dd;
  }

  return { totalReturn, annualizedReturn, sharpeRatio, maxDrawdown };
}

function formatNumber(value: number, asPct: boolean): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Inf';
  if (value === -Infinity) return '-Inf';
  return asPct ? `${(value * 100).toFixed(2)}%` : value.toFixed(2);
}

const METRIC_LINES: Array<{ key: keyof BacktestMetrics; label: string; pct: boolean }> = [
  { key: 'totalReturn', label: 'Total Return', pct: true },
  { key: 'annualizedReturn', label: 'Annualized Return', pct: true },
  { key: 'sharpeRatio', label: 'Sharpe Ratio', pct: false },
  { key: 'maxDrawdown', label: 'Max Drawdown', pct: true },
];

/** Metric summary, one `Label<pad to 20>value` line per metric. */
export function formatMetrics(metrics: BacktestMetrics): string {
  return METRIC_LINES
    .map(({ key, label, pct }) => `${label.padEnd(20)}${formatNumber(metrics[key], pct)}`)
    .join('\n');
}

export function printReport(result: BacktestResult, title = 'SMA crossover'): void {
  const startDate = new Date(result.dateRange.start).toISOString().split('T')[0];
  const endDate = new Date(result.dateRange.end).toISOString().split('T')[0];
  const { shortWindow, longWindow, costRate } = result.params;
  const changes = result.rows.filter(r => r.positionChange !== 0).length;

  console.log('\n' + '='.repeat(60));
  console.log(`Strategy: ${title} (${shortWindow}/${longWindow})`);
  console.log(`Period:   ${startDate} to ${endDate} (${result.seriesLength} prices, ${result.rows.length} simulated)`);
  console.log(`Cost:     ${(costRate * 100).toFixed(3)}% per unit of signal change, ${changes} position change(s)`);
  console.log('='.repeat(60));
  console.log(formatMetrics(result.metrics));
  console.log('='.repeat(60));
}
