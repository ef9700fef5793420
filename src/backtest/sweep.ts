/**
 * Window sweep — grid search over (short, long) SMA pairs on one ticker.
 *
 * Usage:
 *   tsx src/backtest/sweep.ts SPY
 *   tsx src/backtest/sweep.ts SPY --short 5,10,20 --long 50,100,200 --cost 0.0005
 */

import { loadPriceSeries } from './data-loader';
import { runSweep } from './sweep-grid';
import { parseSweepArgs } from './cli-args';
import { describeError } from './errors';
import { createLogger } from '../utils';

function fmtPct(v: number): string {
  return Number.isFinite(v) ? `${(v * 100).toFixed(1)}%` : String(v);
}

function main() {
  try {
    const args = parseSweepArgs(process.argv.slice(2));
    const series = loadPriceSeries(args.ticker, { from: args.from, to: args.to });
    const { rows, skipped } = runSweep(series, args.shortWindows, args.longWindows, args.costRate, createLogger('sweep'));

    console.log('\n' + '='.repeat(60));
    console.log(`SWEEP ${args.ticker} (${series.length} prices, cost ${(args.costRate * 100).toFixed(3)}%)`);
    console.log('='.repeat(60));
    console.log(
      'Short'.padStart(6) +
      'Long'.padStart(6) +
      'Total'.padStart(10) +
      'Annual'.padStart(10) +
      'Sharpe'.padStart(9) +
      'MaxDD'.padStart(10)
    );
    console.log('-'.repeat(51));
    for (const r of rows) {
      console.log(
        String(r.shortWindow).padStart(6) +
        String(r.longWindow).padStart(6) +
        fmtPct(r.metrics.totalReturn).padStart(10) +
        fmtPct(r.metrics.annualizedReturn).padStart(10) +
        (Number.isFinite(r.metrics.sharpeRatio) ? r.metrics.sharpeRatio.toFixed(2) : String(r.metrics.sharpeRatio)).padStart(9) +
        fmtPct(r.metrics.maxDrawdown).padStart(10)
      );
    }
    console.log('='.repeat(51));

    for (const s of skipped) {
      console.warn(`Skipped ${s.shortWindow}/${s.longWindow}: ${s.reason}`);
    }
  } catch (err) {
    console.error(`[ERROR] ${describeError(err)}`);
    process.exit(1);
  }
}

main();
