import { describe, it, expect, vi } from 'vitest';
import { BacktestEngine, runBacktest } from '../src/backtest/engine';
import { InsufficientDataError, InvalidParameterError, StateError } from '../src/backtest/errors';
import { Logger } from '../src/utils/logger';
import { dailySeries, wavyPrices, silentLogger, ZIGZAG } from './helpers';

function engineFor(prices: number[]): BacktestEngine {
  return new BacktestEngine(dailySeries(prices), { logger: silentLogger });
}

describe('BacktestEngine state', () => {
  it('starts not-run and refuses results', () => {
    const engine = engineFor(ZIGZAG);
    expect(engine.status).toBe('not-run');
    expect(() => engine.metrics()).toThrow(StateError);
    expect(() => engine.result()).toThrow(StateError);
    expect(() => engine.chartData()).toThrow(StateError);
  });

  it('returns metrics from run and keeps them available', () => {
    const engine = engineFor(ZIGZAG);
    const metrics = engine.run(1, 2, 0.01);
    expect(engine.status).toBe('completed');
    expect(engine.metrics()).toEqual(metrics);
    expect(engine.result().rows).toHaveLength(6);
    expect(metrics.totalReturn).toBeCloseTo(-0.08808517966942164, 12);
  });

  it('replaces the previous result wholesale on a new run', () => {
    const engine = engineFor(ZIGZAG);
    engine.run(1, 2, 0.01);
    const first = engine.result();
    engine.run(1, 3, 0);
    const second = engine.result();
    expect(second).not.toBe(first);
    expect(second.params).toEqual({ shortWindow: 1, longWindow: 3, costRate: 0 });
    expect(second.rows.map(r => r.index)).toEqual([2, 3, 4, 5, 6]);
    expect(first.params.longWindow).toBe(2);
  });

  it('keeps the previous result when a run fails', () => {
    const engine = engineFor(ZIGZAG);
    engine.run(1, 2, 0.01);
    expect(() => engine.run(1, 50)).toThrow(InsufficientDataError);
    expect(engine.status).toBe('completed');
    expect(engine.result().params.longWindow).toBe(2);
  });

  it('defaults the cost rate to 0.1%', () => {
    const engine = engineFor(ZIGZAG);
    engine.run(1, 2);
    expect(engine.result().params.costRate).toBe(0.001);
    expect(engine.result().rows.map(r => r.transactionCost)).toEqual([0, 0.002, 0, 0.002, 0, 0.002]);
  });

  it('freezes the stored result', () => {
    const engine = engineFor(ZIGZAG);
    engine.run(1, 2);
    const result = engine.result();
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.rows)).toBe(true);
    expect(Object.isFrozen(result.rows[0])).toBe(true);
    expect(Object.isFrozen(result.metrics)).toBe(true);
  });

  it('shares nothing between engines', () => {
    const a = engineFor(ZIGZAG);
    const b = engineFor(ZIGZAG);
    a.run(1, 2);
    expect(b.status).toBe('not-run');
  });

  it('logs through the injected logger', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    new BacktestEngine(dailySeries(ZIGZAG), { logger }).run(3, 2);
    expect(logger.warn).toHaveBeenCalledWith('Short window is not shorter than long window', { shortWindow: 3, longWindow: 2 });
    expect(logger.info).toHaveBeenCalledWith('Backtest complete', expect.objectContaining({ rows: 5 }));
  });
});

describe('BacktestEngine parameters', () => {
  it('raises InsufficientDataError for a series shorter than the long window', () => {
    expect(() => engineFor([1, 2, 3]).run(2, 5)).toThrow(InsufficientDataError);
  });

  it('simulates the single row left after warm-up', () => {
    const engine = engineFor([1, 2, 3, 4]);
    engine.run(2, 4);
    expect(engine.result().rows.map(r => r.index)).toEqual([3]);
  });

  it('raises InsufficientDataError when nothing survives warm-up', () => {
    expect(() => engineFor([5]).run(1, 1)).toThrow(InsufficientDataError);
  });

  it('rejects non-positive or fractional windows', () => {
    const engine = engineFor(ZIGZAG);
    expect(() => engine.run(0, 3)).toThrow(InvalidParameterError);
    expect(() => engine.run(2, -1)).toThrow(InvalidParameterError);
    expect(() => engine.run(2.5, 4)).toThrow(InvalidParameterError);
  });

  it('rejects a negative cost rate', () => {
    expect(() => engineFor(ZIGZAG).run(1, 2, -0.01)).toThrow(InvalidParameterError);
  });
});

describe('BacktestEngine scenarios', () => {
  it('flat prices: short signal throughout, zero returns, NaN Sharpe', () => {
    const engine = engineFor(new Array(8).fill(100));
    const metrics = engine.run(2, 3, 0.001);
    const rows = engine.result().rows;

    expect(rows).toHaveLength(6);
    for (const r of rows) {
      expect(r.signal).toBe(-1);
      expect(r.positionChange).toBe(0);
      expect(r.priceReturn).toBe(0);
      expect(r.netReturn).toBeCloseTo(0, 15);
      expect(r.cumulativeReturn).toBe(0);
    }
    expect(metrics.totalReturn).toBe(0);
    expect(metrics.annualizedReturn).toBe(0);
    expect(metrics.maxDrawdown).toBe(0);
    expect(metrics.sharpeRatio).toBeNaN();
  });

  it('rising prices: one entry from the warm-up short, charged once', () => {
    const prices = Array.from({ length: 10 }, (_, i) => 100 + i);
    const engine = engineFor(prices);
    const metrics = engine.run(2, 4, 0.001);
    const rows = engine.result().rows;

    expect(rows.map(r => r.index)).toEqual([3, 4, 5, 6, 7, 8, 9]);
    expect(rows.map(r => r.signal)).toEqual([1, 1, 1, 1, 1, 1, 1]);
    expect(rows.map(r => r.positionChange)).toEqual([2, 0, 0, 0, 0, 0, 0]);
    expect(rows.map(r => r.transactionCost)).toEqual([0, 0.002, 0, 0, 0, 0, 0]);

    expect(rows[0].strategyReturn).toBeCloseTo(-1 / 102, 12);
    expect(rows[1].netReturn).toBeCloseTo(1 / 103 - 0.002, 12);
    for (const r of rows.slice(2)) {
      expect(r.netReturn).toBe(r.priceReturn);
    }
    expect(metrics.totalReturn).toBeCloseTo(0.045801800070289556, 12);
    expect(metrics.maxDrawdown).toBe(0);
    expect(metrics.sharpeRatio).toBeGreaterThan(0);
  });

  it('keeps drawdown non-positive and total return on the curve end', () => {
    const series = dailySeries(wavyPrices(120));
    for (const [s, l] of [[3, 8], [5, 20], [10, 30], [1, 2]]) {
      const result = runBacktest(series, { shortWindow: s, longWindow: l, costRate: 0.002 }, silentLogger);
      const curve = result.rows.map(r => r.cumulativeReturn);
      expect(result.metrics.maxDrawdown).toBeLessThanOrEqual(0);
      expect(result.metrics.totalReturn).toBeCloseTo(curve[curve.length - 1], 9);
      expect(result.seriesLength).toBe(120);
    }
  });
});

describe('BacktestEngine chart data', () => {
  it('exposes the retained rows with crossover markers and a buy-and-hold curve', () => {
    const engine = engineFor(ZIGZAG);
    engine.run(1, 2, 0.01);
    const chart = engine.chartData();

    expect(chart.shortWindow).toBe(1);
    expect(chart.longWindow).toBe(2);
    expect(chart.points.map(p => p.marker)).toEqual(['buy', undefined, 'sell', undefined, 'buy', undefined]);
    expect(chart.points.map(p => p.price)).toEqual([11, 12, 11, 10, 11, 12]);
    expect(chart.points[5].buyHoldReturn).toBeCloseTo(0.2, 12);
    expect(chart.points[5].cumulativeReturn).toBe(engine.metrics().totalReturn);
  });

  it('rebuilds chart data after a new run', () => {
    const engine = engineFor(ZIGZAG);
    engine.run(1, 2);
    const first = engine.chartData();
    expect(engine.chartData()).toBe(first);
    engine.run(1, 3);
    expect(engine.chartData()).not.toBe(first);
    expect(engine.chartData().longWindow).toBe(3);
  });
});
