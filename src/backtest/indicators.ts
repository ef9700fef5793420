import { Signal } from './types';
import { InvalidParameterError } from './errors';

/** Simple Moving Average over a trailing window. Undefined for the first (window-1) elements. */
export function movingAverage(values: readonly number[], window: number): (number | undefined)[] {
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidParameterError(`Moving-average window must be a positive integer, got ${window}`, { window });
  }
  if (window > values.length) {
    throw new InvalidParameterError(
      `Moving-average window ${window} exceeds series length ${values.length}`,
      { window, length: values.length },
    );
  }

  const result: (number | undefined)[] = new Array(values.length).fill(undefined);

  let sum = 0;
  for (let i = 0; i < window; i++) sum += values[i];
  result[window - 1] = sum / window;

  for (let i = window; i < values.length; i++) {
    sum += values[i] - values[i - window];
    result[i] = sum / window;
  }
  return result;
}

/**
 * +1 when the short average is strictly above the long one, -1 otherwise.
 * Equality resolves to -1; this is the threshold the strategy has always used.
 */
export function crossoverSignal(shortMa: number | undefined, longMa: number | undefined): Signal | undefined {
  if (shortMa === undefined || longMa === undefined) return undefined;
  return shortMa > longMa ? 1 : -1;
}

export function crossoverSignals(
  shortMa: readonly (number | undefined)[],
  longMa: readonly (number | undefined)[]
): (Signal | undefined)[] {
  if (shortMa.length !== longMa.length) {
    throw new InvalidParameterError(
      `Average series differ in length (${shortMa.length} vs ${longMa.length})`,
    );
  }
  return shortMa.map((s, i) => crossoverSignal(s, longMa[i]));
}

/** Signal assumed for rows before both averages exist. */
export const WARMUP_SIGNAL: Signal = -1;

/**
 * First difference of the signal series. A warm-up predecessor counts as WARMUP_SIGNAL, so the
 * first fully-averaged row carries the entry into its opening position. Undefined at index 0
 * and wherever the signal itself is undefined.
 */
export function positionChanges(signals: readonly (Signal | undefined)[]): (number | undefined)[] {
  return signals.map((curr, i) => {
    if (i === 0 || curr === undefined) return undefined;
    return curr - (signals[i - 1] ?? WARMUP_SIGNAL);
  });
}
