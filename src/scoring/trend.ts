/**
 * Trend analyzer: how consistently price holds its short and long EMAs over
 * the recent window, and whether the window prints higher highs and higher
 * lows.
 */

import type { PriceSeries } from '@/data/price_series';
import type { IndicatorSet, Series } from './indicators';
import { clamp, roundScore } from './normalize';
import type { TrendParams } from './scoring_config';

export const MIN_TREND_WINDOW = 60;

export interface TrendScore {
  score: number;
  ema8AdherencePct: number;
  ema21AdherencePct: number;
  higherHighs: boolean;
  higherLows: boolean;
  isTrending: boolean;
  windowBars: number;
}

export interface TrendMeasures {
  ema8AdherencePct: number;
  ema21AdherencePct: number;
  higherHighs: boolean;
  higherLows: boolean;
}

/**
 * Trending when either adherence clears its threshold.
 *
 * Bands: trending with both structure flags 80-100, with one flag 60-80,
 * with none 50-60; not trending stays below 50.
 */
export function scoreTrend(measures: TrendMeasures, params: TrendParams): TrendScore {
  const { ema8AdherencePct: a8, ema21AdherencePct: a21, higherHighs, higherLows } = measures;
  const isTrending = a8 >= params.emaShortAdherencePct || a21 >= params.emaLongAdherencePct;
  const blend = (a8 + a21) / 200;
  const flags = (higherHighs ? 1 : 0) + (higherLows ? 1 : 0);

  let score: number;
  if (isTrending && flags === 2) {
    score = 80 + 20 * blend;
  } else if (isTrending && flags === 1) {
    score = 60 + 20 * blend;
  } else if (isTrending) {
    score = 50 + 10 * blend;
  } else {
    score = 40 * blend + 4 * flags;
  }

  return {
    score: roundScore(clamp(score)),
    ema8AdherencePct: a8,
    ema21AdherencePct: a21,
    higherHighs,
    higherLows,
    isTrending,
    windowBars: params.windowBars,
  };
}

function adherencePct(closes: readonly number[], ema: Series, start: number): number {
  const count = closes.length - start;
  if (count <= 0) return 0;
  let held = 0;
  for (let i = start; i < closes.length; i++) {
    const value = ema[i];
    if (value !== null && closes[i] >= value) held++;
  }
  return (held / count) * 100;
}

export function analyzeTrend(
  series: PriceSeries,
  indicators: IndicatorSet,
  params: TrendParams
): TrendScore {
  const window = Math.min(Math.max(MIN_TREND_WINDOW, params.windowBars), series.bars.length);
  const start = series.bars.length - window;
  const closes = series.bars.map((bar) => bar.close);

  const recent = series.bars.slice(start);
  const half = Math.floor(recent.length / 2);
  const first = recent.slice(0, half);
  const second = recent.slice(half);
  const maxHigh = (bars: typeof recent): number => Math.max(...bars.map((b) => b.high));
  const minLow = (bars: typeof recent): number => Math.min(...bars.map((b) => b.low));
  const hasHalves = first.length > 0 && second.length > 0;

  const scored = scoreTrend(
    {
      ema8AdherencePct: adherencePct(closes, indicators.emaShort, start),
      ema21AdherencePct: adherencePct(closes, indicators.emaLong, start),
      higherHighs: hasHalves && maxHigh(second) > maxHigh(first),
      higherLows: hasHalves && minLow(second) > minLow(first),
    },
    params
  );
  return { ...scored, windowBars: window };
}
