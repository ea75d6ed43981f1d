import { computeIndicators } from '@/scoring/indicators';
import { toFundamentals } from '@/scoring/fundamentals';
import { computeMarketTrend, type MarketTrend } from '@/scoring/canslim/m_market_direction';
import type { CanslimInput } from '@/scoring/canslim/types';
import type { RSScore } from '@/scoring/relative_strength';
import { DEFAULT_SCREENER_CONFIG } from '@/scoring/scoring_config';
import type { PriceSeries } from '@/data/price_series';
import type { RawFundamentals } from '@/providers/types';
import { geometricCloses, makeSeries } from './fixtures';

export function rsOf(value: number): RSScore {
  return {
    value,
    benchmarkSymbol: 'SPY',
    periodDays: 63,
    quarterContributions: [value, value, value, value],
    stockReturnsPct: [0, 0, 0, 0],
    benchmarkReturnsPct: [0, 0, 0, 0],
    bucketSizes: [15, 16, 16, 16],
    usedAdjustedClose: false,
  };
}

export function bullishMarket(): MarketTrend {
  return computeMarketTrend(
    makeSeries('SPY', geometricCloses(260, 0.003)),
    'SPY',
    DEFAULT_SCREENER_CONFIG.market,
    DEFAULT_SCREENER_CONFIG.indicators,
    new Date('2024-06-03T00:00:00Z')
  );
}

export interface InputOptions {
  series?: PriceSeries;
  fundamentals?: RawFundamentals | null;
  rs?: RSScore | null;
  marketTrend?: MarketTrend;
}

/** Rising stock (1% per bar, constant volume) with the given fundamentals. */
export function canslimInput({
  series = makeSeries('LEAD', geometricCloses(260, 0.01)),
  fundamentals = null,
  rs = rsOf(10),
  marketTrend = bullishMarket(),
}: InputOptions = {}): CanslimInput {
  const indicators = computeIndicators(series, DEFAULT_SCREENER_CONFIG.indicators);
  if (!indicators.ok) {
    throw indicators.error;
  }
  return {
    symbol: series.symbol,
    series,
    indicators: indicators.value,
    fundamentals: toFundamentals(fundamentals),
    rs,
    marketTrend,
    params: DEFAULT_SCREENER_CONFIG.canslim,
  };
}
