import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

function optionalNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = Number(raw);
  if (!Number.isFinite(val)) throw new Error(`Env var ${key} must be a number, got "${raw}"`);
  return val;
}

function optionalWindow(key: string, fallback: number): number {
  const val = optionalNumber(key, fallback);
  if (!Number.isInteger(val) || val < 1) {
    throw new Error(`Env var ${key} must be a positive integer, got ${val}`);
  }
  return val;
}

function optionalPath(key: string, fallback: string): string {
  const raw = process.env[key];
  return raw ? path.resolve(raw) : fallback;
}

const costRate = optionalNumber('BACKTEST_COST_RATE', 0.001);
if (costRate < 0) throw new Error(`Env var BACKTEST_COST_RATE must be >= 0, got ${costRate}`);

export const config = {
  backtest: {
    costRate,
    shortWindow: optionalWindow('BACKTEST_SHORT_WINDOW', 50),
    longWindow: optionalWindow('BACKTEST_LONG_WINDOW', 200),
  },
  data: {
    pricesDir: optionalPath('BACKTEST_PRICES_DIR', path.resolve(__dirname, '../../data/prices')),
    exportDir: optionalPath('BACKTEST_EXPORT_DIR', path.resolve(__dirname, '../../data/exports')),
  },
} as const;
