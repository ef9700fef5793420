import { PricePoint } from './types';
import { DomainError, InsufficientDataError, InvalidParameterError } from './errors';

/**
 * Immutable, strictly time-ordered price series. The only input to a backtest.
 * Construction validates every row; a PriceSeries that exists is always well-formed.
 */
export class PriceSeries {
  private readonly points: readonly PricePoint[];

  constructor(points: readonly PricePoint[]) {
    if (points.length === 0) {
      throw new InvalidParameterError('Price series must contain at least one row');
    }

    for (let i = 0; i < points.length; i++) {
      const { timestamp, price } = points[i];
      if (!Number.isFinite(timestamp)) {
        throw new InvalidParameterError(`Invalid timestamp at row ${i}`, { index: i, timestamp });
      }
      if (i > 0 && timestamp <= points[i - 1].timestamp) {
        throw new InvalidParameterError(
          `Timestamps must be strictly increasing (row ${i})`,
          { index: i, timestamp, previous: points[i - 1].timestamp },
        );
      }
      if (!Number.isFinite(price) || price <= 0) {
        throw new DomainError(`Price must be positive and finite at row ${i}`, { index: i, price });
      }
    }

    this.points = Object.freeze(points.map(p => Object.freeze({ timestamp: p.timestamp, price: p.price })));
  }

  static fromArrays(timestamps: readonly number[], prices: readonly number[]): PriceSeries {
    if (timestamps.length !== prices.length) {
      throw new InvalidParameterError(
        `Timestamp and price arrays differ in length (${timestamps.length} vs ${prices.length})`,
      );
    }
    return new PriceSeries(timestamps.map((timestamp, i) => ({ timestamp, price: prices[i] })));
  }

  get length(): number {
    return this.points.length;
  }

  get start(): number {
    return this.points[0].timestamp;
  }

  get end(): number {
    return this.points[this.points.length - 1].timestamp;
  }

  prices(): number[] {
    return this.points.map(p => p.price);
  }

  toArray(): readonly PricePoint[] {
    return this.points;
  }

  /** Rows with from <= timestamp < to. */
  between(from = -Infinity, to = Infinity): PriceSeries {
    const inRange = this.points.filter(p => p.timestamp >= from && p.timestamp < to);
    if (inRange.length === 0) {
      throw new InsufficientDataError(`no prices in [${from}, ${to})`, { from, to });
    }
    return new PriceSeries(inRange);
  }
}
