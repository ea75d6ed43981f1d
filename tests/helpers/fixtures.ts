import { DEFAULT_SCREENER_CONFIG, type ScreenerConfig } from '@/scoring/scoring_config';
import type { PriceBar, PriceSeries } from '@/data/price_series';
import { distancePct, type IndicatorSet } from '@/scoring/indicators';
import type {
  FundamentalsProvider,
  PriceDataProvider,
  RawFundamentals,
  RawPriceRow,
} from '@/providers/types';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2023, 0, 2);

export function dateAt(index: number): string {
  return new Date(START + index * DAY_MS).toISOString().slice(0, 10);
}

/** `count` closes compounding by `rate` per bar from `start`. */
export function geometricCloses(count: number, rate: number, start = 100): number[] {
  return Array.from({ length: count }, (_, i) => start * Math.pow(1 + rate, i));
}

export interface SeriesOptions {
  volume?: number | null;
  adjusted?: boolean;
}

/** Bars open at the close, with the high 1% above and the low 1% below it. */
export function makeSeries(
  symbol: string,
  closes: readonly number[],
  { volume = 1_000_000, adjusted = false }: SeriesOptions = {}
): PriceSeries {
  const bars: PriceBar[] = closes.map((close, i) => ({
    date: dateAt(i),
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume,
    adjClose: adjusted ? close : null,
  }));
  return {
    symbol,
    bars,
    hasVolume: volume !== null,
    hasAdjustedClose: adjusted,
  };
}

export function toRawRows(series: PriceSeries): RawPriceRow[] {
  return series.bars.map((bar) => ({
    Date: bar.date,
    Open: bar.open,
    High: bar.high,
    Low: bar.low,
    Close: bar.close,
    Volume: bar.volume,
  }));
}

export function testConfig(mutate?: (config: ScreenerConfig) => void): ScreenerConfig {
  const config = structuredClone(DEFAULT_SCREENER_CONFIG);
  mutate?.(config);
  return config;
}

/**
 * Hand-built indicator set for small synthetic series; distances follow
 * the engine's formula.
 */
export function manualIndicators(
  closes: readonly number[],
  emaShort: readonly (number | null)[],
  emaLong: readonly (number | null)[]
): IndicatorSet {
  const nulls = closes.map((): number | null => null);
  return {
    length: closes.length,
    periods: DEFAULT_SCREENER_CONFIG.indicators,
    emaShort: [...emaShort],
    emaLong: [...emaLong],
    emaMedium: nulls,
    emaTrend: nulls,
    rsi: nulls,
    high52w: closes.map((c) => c * 1.01),
    dailyReturns: nulls,
    aboveEmaShort: closes.map((c, i) => {
      const ema = emaShort[i];
      return ema === null ? null : c > ema;
    }),
    aboveEmaLong: closes.map((c, i) => {
      const ema = emaLong[i];
      return ema === null ? null : c > ema;
    }),
    distanceEmaShortPct: closes.map((c, i) => distancePct(c, emaShort[i])),
    distanceEmaLongPct: closes.map((c, i) => distancePct(c, emaLong[i])),
  };
}

export const STRONG_FUNDAMENTALS: RawFundamentals = {
  quarterlyEpsGrowth: 0.5,
  annualEpsGrowth: 0.5,
  annualEpsGrowthHistory: [0.5, 0.5, 0.5],
  returnOnEquity: 0.34,
  revenueGrowth: 0.4,
  institutionalOwnershipPct: 0.8,
  sharesOutstanding: 126_000_000,
  avgVolume50d: 1_000_000,
  marketCap: 50e9,
};

/**
 * In-process market data keyed by symbol. Symbols listed in `failing`
 * throw from getHistory.
 */
export class InMemoryMarketData implements PriceDataProvider, FundamentalsProvider {
  readonly historyCalls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly prices: Map<string, RawPriceRow[]>,
    private readonly fundamentals: Map<string, RawFundamentals> = new Map(),
    private readonly failing: Set<string> = new Set(),
    private readonly failingFundamentals: Set<string> = new Set()
  ) {}

  async getHistory(symbol: string): Promise<RawPriceRow[] | null> {
    this.historyCalls.push(symbol);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 1));
      if (this.failing.has(symbol)) {
        throw new Error(`upstream error for ${symbol}`);
      }
      return this.prices.get(symbol) ?? null;
    } finally {
      this.inFlight--;
    }
  }

  async getFundamentals(symbol: string): Promise<RawFundamentals | null> {
    if (this.failingFundamentals.has(symbol)) {
      throw new Error(`fundamentals outage for ${symbol}`);
    }
    return this.fundamentals.get(symbol) ?? null;
  }
}
