import { config } from '../utils';

export interface RunArgs {
  ticker: string;
  shortWindow: number;
  longWindow: number;
  costRate: number;
  from?: string;
  to?: string;
  exportPath?: string;
}

export interface SweepArgs {
  ticker: string;
  shortWindows: number[];
  longWindows: number[];
  costRate: number;
  from?: string;
  to?: string;
}

export interface Defaults {
  shortWindow: number;
  longWindow: number;
  costRate: number;
}

const DEFAULT_SHORT_GRID = [5, 10, 20, 50];
const DEFAULT_LONG_GRID = [50, 100, 200];

function parseIntArg(flag: string, raw: string): number {
  const val = Number(raw);
  if (!Number.isInteger(val)) throw new Error(`${flag} expects an integer, got "${raw}"`);
  return val;
}

function parseNumberArg(flag: string, raw: string): number {
  const val = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(val)) throw new Error(`${flag} expects a number, got "${raw}"`);
  return val;
}

function parseList(flag: string, raw: string): number[] {
  return raw.split(',').filter(s => s.trim() !== '').map(s => parseIntArg(flag, s.trim()));
}

// Extract named flags, leave positional args intact
function splitFlags(rawArgs: string[], known: string[]): { flags: Map<string, string>; positional: string[] } {
  const flags = new Map<string, string>();
  const positional: string[] = [];
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (known.includes(arg)) {
      const value = rawArgs[i + 1];
      if (value === undefined) throw new Error(`${arg} needs a value`);
      flags.set(arg, value);
      i++;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown flag: ${arg}`);
    } else {
      positional.push(arg);
    }
  }
  return { flags, positional };
}

/** `<ticker> [shortWindow] [longWindow] [--cost r] [--from d] [--to d] [--export file]` */
export function parseRunArgs(rawArgs: string[], defaults: Defaults = config.backtest): RunArgs {
  const { flags, positional } = splitFlags(rawArgs, ['--cost', '--from', '--to', '--export']);
  const [ticker, shortRaw, longRaw] = positional;
  if (!ticker) throw new Error('Usage: backtest <ticker> [shortWindow] [longWindow] [--cost rate] [--from YYYY-MM-DD] [--to YYYY-MM-DD] [--export file]');

  const cost = flags.get('--cost');
  return {
    ticker: ticker.toUpperCase(),
    shortWindow: shortRaw !== undefined ? parseIntArg('shortWindow', shortRaw) : defaults.shortWindow,
    longWindow: longRaw !== undefined ? parseIntArg('longWindow', longRaw) : defaults.longWindow,
    costRate: cost !== undefined ? parseNumberArg('--cost', cost) : defaults.costRate,
    from: flags.get('--from'),
    to: flags.get('--to'),
    exportPath: flags.get('--export'),
  };
}

/** `<ticker> [--short 5,10] [--long 50,200] [--cost r] [--from d] [--to d]` */
export function parseSweepArgs(rawArgs: string[], defaults: Defaults = config.backtest): SweepArgs {
  const { flags, positional } = splitFlags(rawArgs, ['--short', '--long', '--cost', '--from', '--to']);
  const [ticker] = positional;
  if (!ticker) throw new Error('Usage: sweep <ticker> [--short 5,10,20] [--long 50,200] [--cost rate]');

  const shortRaw = flags.get('--short');
  const longRaw = flags.get('--long');
  const cost = flags.get('--cost');
  return {
    ticker: ticker.toUpperCase(),
    shortWindows: shortRaw !== undefined ? parseList('--short', shortRaw) : [...DEFAULT_SHORT_GRID],
    longWindows: longRaw !== undefined ? parseList('--long', longRaw) : [...DEFAULT_LONG_GRID],
    costRate: cost !== undefined ? parseNumberArg('--cost', cost) : defaults.costRate,
    from: flags.get('--from'),
    to: flags.get('--to'),
  };
}
