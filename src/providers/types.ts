/**
 * Shared types and interfaces for market data providers.
 *
 * Providers hand the screener raw rows and raw fundamentals; normalizing
 * column names, dates and missing values is the pipeline's job, so a
 * provider only has to report what its source returned.
 */

/** One row of OHLCV history as delivered by the source. */
export type RawPriceRow = Record<string, unknown>;

export interface RawFundamentals {
  quarterlyEpsGrowth?: number | null;
  annualEpsGrowth?: number | null;
  /** Annual EPS growth rates, most recent year first. */
  annualEpsGrowthHistory?: number[] | null;
  returnOnEquity?: number | null;
  revenueGrowth?: number | null;
  institutionalOwnershipPct?: number | null;
  sharesOutstanding?: number | null;
  avgVolume50d?: number | null;
  marketCap?: number | null;
}

export interface PriceDataProvider {
  /**
   * Daily history covering at least `lookbackDays` calendar days.
   * Null means the source has nothing for the symbol.
   */
  getHistory(symbol: string, lookbackDays: number): Promise<RawPriceRow[] | null>;
}

export interface FundamentalsProvider {
  getFundamentals(symbol: string): Promise<RawFundamentals | null>;
}

export interface MarketDataProvider extends PriceDataProvider, FundamentalsProvider {
  readonly name: string;
  getRequestCount(): number;
  close(): void;
}

export type ProviderType = 'local';
