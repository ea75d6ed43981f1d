/**
 * Indicator engine: EMAs, Wilder RSI, rolling 52-week high and derived
 * per-bar columns. Every array is aligned 1:1 with the series' bars and
 * holds null during an indicator's warm-up.
 */

import { InsufficientHistoryError } from '@/core/errors';
import { err, ok, type Result } from '@/core/result';
import type { PriceSeries } from '@/data/price_series';
import type { IndicatorParams } from './scoring_config';

export type Series = (number | null)[];

export interface IndicatorSet {
  readonly length: number;
  readonly periods: IndicatorParams;
  /** EMA of the short period (8 by default). */
  readonly emaShort: Series;
  /** EMA of the long period (21 by default). */
  readonly emaLong: Series;
  readonly emaMedium: Series;
  readonly emaTrend: Series;
  readonly rsi: Series;
  /** Highest high over the trailing `highLookback` bars (partial at the start). */
  readonly high52w: number[];
  readonly dailyReturns: Series;
  readonly aboveEmaShort: (boolean | null)[];
  readonly aboveEmaLong: (boolean | null)[];
  /** (close - EMA) as a percentage of the EMA. */
  readonly distanceEmaShortPct: Series;
  readonly distanceEmaLongPct: Series;
}

/**
 * EMA seeded with the simple average of the first `period` values.
 */
export function computeEma(values: readonly number[], period: number): Series {
  const out: Series = new Array(values.length).fill(null);
  if (period < 1 || values.length < period) return out;

  const k = 2 / (period + 1);
  let seed = 0;
  for (let i = 0; i < period; i++) seed += values[i];
  let prev = seed / period;
  out[period - 1] = prev;

  for (let i = period; i < values.length; i++) {
    prev = values[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

/**
 * Wilder-smoothed RSI. The first value sits at index `period`.
 * A window without losses reads 100; one without any movement reads 50.
 */
export function computeRsi(values: readonly number[], period: number): Series {
  const out: Series = new Array(values.length).fill(null);
  if (period < 1 || values.length <= period) return out;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = values[i] - values[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;
  out[period] = rsiFromAverages(avgGain, avgLoss);

  for (let i = period + 1; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    out[i] = rsiFromAverages(avgGain, avgLoss);
  }
  return out;
}

function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

export function rollingMax(values: readonly number[], window: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    let max = values[i];
    for (let j = Math.max(0, i - window + 1); j < i; j++) {
      if (values[j] > max) max = values[j];
    }
    out.push(max);
  }
  return out;
}

export function distancePct(close: number, ema: number | null): number | null {
  if (ema === null || ema === 0) return null;
  return ((close - ema) * 100) / ema;
}

export function requiredBars(params: IndicatorParams): number {
  return Math.max(params.emaShort, params.emaLong, params.emaMedium, params.emaTrend, params.rsiPeriod + 1);
}

export function computeIndicators(
  series: PriceSeries,
  params: IndicatorParams
): Result<IndicatorSet, InsufficientHistoryError> {
  const needed = requiredBars(params);
  if (series.bars.length < needed) {
    return err(new InsufficientHistoryError(series.symbol, needed, series.bars.length));
  }

  const close = series.bars.map((bar) => bar.close);
  const high = series.bars.map((bar) => bar.high);
  const emaShort = computeEma(close, params.emaShort);
  const emaLong = computeEma(close, params.emaLong);

  return ok({
    length: close.length,
    periods: params,
    emaShort,
    emaLong,
    emaMedium: computeEma(close, params.emaMedium),
    emaTrend: computeEma(close, params.emaTrend),
    rsi: computeRsi(close, params.rsiPeriod),
    high52w: rollingMax(high, params.highLookback),
    dailyReturns: close.map((c, i) => (i === 0 ? null : c / close[i - 1] - 1)),
    aboveEmaShort: close.map((c, i) => compareAbove(c, emaShort[i])),
    aboveEmaLong: close.map((c, i) => compareAbove(c, emaLong[i])),
    distanceEmaShortPct: close.map((c, i) => distancePct(c, emaShort[i])),
    distanceEmaLongPct: close.map((c, i) => distancePct(c, emaLong[i])),
  });
}

function compareAbove(close: number, ema: number | null): boolean | null {
  return ema === null ? null : close > ema;
}

export function lastValue<T>(values: readonly (T | null)[]): T | null {
  return values.length > 0 ? values[values.length - 1] : null;
}
