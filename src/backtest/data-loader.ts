import fs from 'fs';
import path from 'path';
import { PricePoint } from './types';
import { PriceSeries } from './price-series';
import { InsufficientDataError } from './errors';
import { config, createLogger } from '../utils';

const log = createLogger('data-loader');

const DATE_COLUMNS = ['date', 'timestamp', 'time'];
// Adjusted close wins over raw close when a file carries both
const PRICE_COLUMNS = ['adj close', 'adj_close', 'adjclose', 'price', 'close'];

export interface ParsedPrices {
  points: PricePoint[];
  skipped: number;
}

function splitRow(line: string): string[] {
  return line.split(',').map(cell => cell.trim().replace(/^"(.*)"$/, '$1'));
}

function findColumn(header: string[], candidates: string[]): number {
  const lower = header.map(h => h.toLowerCase());
  for (const name of candidates) {
    const idx = lower.indexOf(name);
    if (idx !== -1) return idx;
  }
  return -1;
}

/** Numeric cells are epoch ms; anything else goes through Date.parse (YYYY-MM-DD is UTC midnight). */
export function parseTimestamp(raw: string): number {
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return Date.parse(raw);
}

/**
 * Parse a daily price CSV with a header row. Rows whose date or price do not parse are
 * skipped and counted. Output is sorted by timestamp.
 */
export function parsePriceCsv(content: string): ParsedPrices {
  const lines = content.split(/\r?\n/);
  const headerIdx = lines.findIndex(l => l.trim() !== '');
  if (headerIdx === -1) throw new Error('Price CSV is empty');

  const header = splitRow(lines[headerIdx]);
  const dateCol = findColumn(header, DATE_COLUMNS);
  const priceCol = findColumn(header, PRICE_COLUMNS);
  if (dateCol === -1 || priceCol === -1) {
    throw new Error(
      `Price CSV header must name a date column (${DATE_COLUMNS.join('/')}) ` +
      `and a price column (${PRICE_COLUMNS.join('/')}), got: ${header.join(',')}`
    );
  }

  const points: PricePoint[] = [];
  let skipped = 0;
  for (let i = headerIdx + 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const parts = splitRow(line);
    const timestamp = parseTimestamp(parts[dateCol] ?? '');
    const priceCell = parts[priceCol] ?? '';
    const price = priceCell === '' ? NaN : Number(priceCell);
    if (!Number.isFinite(timestamp) || !Number.isFinite(price)) {
      skipped++;
      continue;
    }
    points.push({ timestamp, price });
  }

  return { points: points.sort((a, b) => a.timestamp - b.timestamp), skipped };
}

export interface LoadOptions {
  dir?: string;
  from?: string; // inclusive, YYYY-MM-DD
  to?: string;   // exclusive, YYYY-MM-DD
}

export function pricesPath(ticker: string, dir = config.data.pricesDir): string {
  return path.join(dir, `${ticker.toUpperCase()}.csv`);
}

function parseBound(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const ts = Date.parse(value);
  if (!Number.isFinite(ts)) throw new Error(`Invalid --${name} date: ${value} (expected YYYY-MM-DD)`);
  return ts;
}

/** Load `<dir>/<TICKER>.csv` into a PriceSeries, optionally clipped to [from, to). */
export function loadPriceSeries(ticker: string, options: LoadOptions = {}): PriceSeries {
  const file = pricesPath(ticker, options.dir);
  if (!fs.existsSync(file)) {
    throw new Error(`No price file for ${ticker.toUpperCase()}: ${file}`);
  }

  const { points, skipped } = parsePriceCsv(fs.readFileSync(file, 'utf-8'));
  if (skipped > 0) {
    log.warn('Skipped malformed price rows', { ticker, file, skipped });
  }

  const series = new PriceSeries(points);
  const from = parseBound('from', options.from);
  const to = parseBound('to', options.to);

  let clipped: PriceSeries;
  try {
    clipped = series.between(from, to);
  } catch (err) {
    if (!(err instanceof InsufficientDataError)) throw err;
    throw new InsufficientDataError(
      `No prices for ${ticker.toUpperCase()} in range ${options.from ?? 'start'} to ${options.to ?? 'end'}`,
      { ticker, from: options.from, to: options.to },
    );
  }

  log.debug('Loaded prices', { ticker, rows: clipped.length });
  return clipped;
}
