/**
 * Error taxonomy for the screening pipeline.
 *
 * Every error carries a stable `code` so outcomes can be grouped in scan
 * statistics without matching on message text.
 */

export type ScreenerErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'INSUFFICIENT_HISTORY'
  | 'BENCHMARK_DATA_INSUFFICIENT'
  | 'CONFIGURATION'
  | 'PROVIDER'
  | 'ILLEGAL_TRANSITION'
  | 'UNEXPECTED';

export class ScreenerError extends Error {
  constructor(
    message: string,
    public readonly code: ScreenerErrorCode,
    public readonly symbol: string | null = null
  ) {
    super(message);
    this.name = 'ScreenerError';
  }
}

export class DataUnavailableError extends ScreenerError {
  constructor(
    symbol: string,
    message: string,
    public readonly barCount: number | null = null
  ) {
    super(message, 'DATA_UNAVAILABLE', symbol);
    this.name = 'DataUnavailableError';
  }
}

export class InsufficientHistoryError extends ScreenerError {
  constructor(
    symbol: string,
    public readonly required: number,
    public readonly available: number
  ) {
    super(
      `${symbol}: need ${required} bars, have ${available}`,
      'INSUFFICIENT_HISTORY',
      symbol
    );
    this.name = 'InsufficientHistoryError';
  }
}

export class BenchmarkDataInsufficientError extends ScreenerError {
  constructor(
    public readonly benchmarkSymbol: string,
    public readonly required: number,
    public readonly available: number,
    symbol: string | null = null
  ) {
    super(
      `Benchmark ${benchmarkSymbol}: need ${required} aligned bars, have ${available}`,
      'BENCHMARK_DATA_INSUFFICIENT',
      symbol
    );
    this.name = 'BenchmarkDataInsufficientError';
  }
}

export class ConfigurationError extends ScreenerError {
  constructor(message: string, public readonly errors: string[] = []) {
    super(
      errors.length > 0 ? `${message}: ${errors.join('; ')}` : message,
      'CONFIGURATION'
    );
    this.name = 'ConfigurationError';
  }
}

export class ProviderError extends ScreenerError {
  constructor(
    message: string,
    public readonly provider: string,
    symbol: string,
    public readonly method: string,
    public readonly cause?: Error
  ) {
    super(message, 'PROVIDER', symbol);
    this.name = 'ProviderError';
  }
}

export class IllegalTransitionError extends ScreenerError {
  constructor(symbol: string, from: string, to: string) {
    super(`${symbol}: illegal transition ${from} -> ${to}`, 'ILLEGAL_TRANSITION', symbol);
    this.name = 'IllegalTransitionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): ScreenerErrorCode {
  return error instanceof ScreenerError ? error.code : 'UNEXPECTED';
}
