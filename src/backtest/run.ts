/**
 * Single SMA-crossover backtest from a local price file.
 *
 * Usage:
 *   tsx src/backtest/run.ts SPY                       # windows and cost from .env (50/200, 0.1%)
 *   tsx src/backtest/run.ts SPY 20 100 --cost 0.0005
 *   tsx src/backtest/run.ts SPY 50 200 --from 2015-01-01 --to 2020-01-01 --export spy.csv
 */

import path from 'path';
import { loadPriceSeries } from './data-loader';
import { BacktestEngine } from './engine';
import { printReport } from './report';
import { exportChartData } from './chart';
import { parseRunArgs } from './cli-args';
import { describeError } from './errors';
import { config } from '../utils';

function main() {
  try {
    const args = parseRunArgs(process.argv.slice(2));
    const series = loadPriceSeries(args.ticker, { from: args.from, to: args.to });

    console.log(`Backtesting ${args.ticker}: ${series.length} prices, windows ${args.shortWindow}/${args.longWindow}`);

    const engine = new BacktestEngine(series);
    engine.run(args.shortWindow, args.longWindow, args.costRate);
    printReport(engine.result(), `${args.ticker} SMA crossover`);

    if (args.exportPath) {
      const target = path.isAbsolute(args.exportPath)
        ? args.exportPath
        : path.join(config.data.exportDir, args.exportPath);
      const written = exportChartData(engine.chartData(), target);
      console.log(`Chart data written to ${written}`);
    }
  } catch (err) {
    console.error(`[ERROR] ${describeError(err)}`);
    process.exit(1);
  }
}

main();
