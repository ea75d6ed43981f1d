/**
 * M - market direction.
 *
 * The benchmark's trend is computed once before the scan starts and shared
 * read-only by every symbol.
 */

import type { PriceSeries } from '@/data/price_series';
import { computeEma, lastValue } from '../indicators';
import { roundScore } from '../normalize';
import type { IndicatorParams, MarketParams } from '../scoring_config';
import type { SubScoreOutcome } from './types';

export type MarketDirection = 'Bullish' | 'Bearish' | 'Neutral';

export interface MarketTrend {
  direction: MarketDirection;
  score: number;
  referenceSymbol: string;
  computedAt: string;
  latestClose: number | null;
  indicators: {
    ema21: number | null;
    ema50: number | null;
    ema200: number | null;
  };
  /** Computed from fewer signals than normal (short or missing history). */
  degraded: boolean;
  dataGaps: string[];
}

/** Score used when the benchmark history is too short to judge. */
export const FALLBACK_MARKET_SCORE = 40;

interface Signal {
  name: string;
  weight: number;
  value: boolean | null;
}

export function classifyDirection(score: number, params: MarketParams): MarketDirection {
  if (score >= params.bullishThreshold) return 'Bullish';
  if (score < params.bearishThreshold) return 'Bearish';
  return 'Neutral';
}

export function computeMarketTrend(
  benchmark: PriceSeries | null,
  referenceSymbol: string,
  params: MarketParams,
  indicatorParams: IndicatorParams,
  now: Date = new Date()
): MarketTrend {
  const bars = benchmark?.bars ?? [];
  const closes = bars.map((bar) => bar.close);
  const latestClose = lastValue(closes);
  const computedAt = now.toISOString();

  if (bars.length < params.minBars || latestClose === null) {
    return {
      direction: 'Neutral',
      score: FALLBACK_MARKET_SCORE,
      referenceSymbol,
      computedAt,
      latestClose,
      indicators: { ema21: null, ema50: null, ema200: null },
      degraded: true,
      dataGaps: [`benchmark_history_${bars.length}_of_${params.minBars}`],
    };
  }

  const ema21Series = computeEma(closes, indicatorParams.emaLong);
  const ema50Series = computeEma(closes, indicatorParams.emaMedium);
  const ema200Series = computeEma(closes, indicatorParams.emaTrend);
  const ema21 = lastValue(ema21Series);
  const ema50 = lastValue(ema50Series);
  const ema200 = lastValue(ema200Series);
  const pastIndex = ema50Series.length - 1 - params.slopeLookback;
  const ema50Past = pastIndex >= 0 ? ema50Series[pastIndex] : null;

  const signals: Signal[] = [
    { name: 'close_above_ema200', weight: 0.4, value: ema200 === null ? null : latestClose > ema200 },
    {
      name: 'ema_alignment',
      weight: 0.3,
      // Without the 200 EMA only the 21 > 50 half of the stack is checked
      value:
        ema21 === null || ema50 === null
          ? null
          : ema21 > ema50 && (ema200 === null || ema50 > ema200),
    },
    {
      name: 'ema50_rising',
      weight: 0.2,
      value: ema50 === null || ema50Past === null ? null : ema50 > ema50Past,
    },
    { name: 'close_above_ema21', weight: 0.1, value: ema21 === null ? null : latestClose > ema21 },
  ];

  let weighted = 0;
  let weightSum = 0;
  const dataGaps: string[] = ema200 === null ? ['ema200_unavailable'] : [];
  for (const signal of signals) {
    if (signal.value === null) {
      dataGaps.push(signal.name);
      continue;
    }
    weightSum += signal.weight;
    weighted += signal.value ? signal.weight : 0;
  }

  const score = weightSum > 0 ? roundScore((weighted / weightSum) * 100) : FALLBACK_MARKET_SCORE;

  return {
    direction: weightSum > 0 ? classifyDirection(score, params) : 'Neutral',
    score,
    referenceSymbol,
    computedAt,
    latestClose,
    indicators: { ema21, ema50, ema200 },
    degraded: dataGaps.length > 0,
    dataGaps,
  };
}

export function scoreMarketDirection(trend: MarketTrend): SubScoreOutcome {
  const detail = {
    direction: trend.direction,
    marketScore: trend.score,
    referenceSymbol: trend.referenceSymbol,
  };
  if (trend.degraded) {
    return {
      kind: 'degraded',
      value: trend.score,
      detail,
      reason: `market trend computed with gaps: ${trend.dataGaps.join(', ')}`,
    };
  }
  return { kind: 'ok', value: trend.score, detail };
}
