export type BacktestErrorCode =
  | 'STATE'
  | 'INVALID_PARAMETER'
  | 'DOMAIN'
  | 'INSUFFICIENT_DATA';

/** Base for every error the backtest core throws. `context` carries the offending values. */
export class BacktestError extends Error {
  readonly code: BacktestErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BacktestErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Results requested before a backtest run has completed. */
export class StateError extends BacktestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('STATE', message, context);
  }
}

/** Window sizes, cost rates or series input outside their allowed range. */
export class InvalidParameterError extends BacktestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INVALID_PARAMETER', message, context);
  }
}

/** A price that makes a return ratio undefined. */
export class DomainError extends BacktestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('DOMAIN', message, context);
  }
}

/** Nothing left to simulate once the warm-up rows are removed. */
export class InsufficientDataError extends BacktestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INSUFFICIENT_DATA', message, context);
  }
}

/** One-line, user-facing description per error kind. Unknown errors keep their message. */
export function describeError(err: unknown): string {
  if (err instanceof InsufficientDataError) {
    return `Not enough price data: ${err.message}. Widen the date range or shrink the windows.`;
  }
  if (err instanceof InvalidParameterError) {
    return `Invalid parameter: ${err.message}`;
  }
  if (err instanceof DomainError) {
    return `Bad price data: ${err.message}`;
  }
  if (err instanceof StateError) {
    return `Backtest not run: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}
