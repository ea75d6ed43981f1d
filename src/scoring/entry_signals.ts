/**
 * Pullback entry detection over the most recent bars.
 *
 * - EMA8_Retest: price was extended above the short EMA and has pulled back
 *   into its band while still holding the long EMA.
 * - EMA21_Retest: price was extended above the long EMA and has pulled back
 *   into its band, below the short EMA but not through the long one.
 * - EMA8_Reclaim: a short dip below the short EMA (long EMA held throughout)
 *   is followed by a close back above it.
 *
 * A bar carries at most one signal; Reclaim wins over EMA8_Retest, which
 * wins over EMA21_Retest.
 */

import type { PriceSeries } from '@/data/price_series';
import type { IndicatorSet } from './indicators';
import type { EntryParams } from './scoring_config';

export type EntrySignalType = 'EMA8_Retest' | 'EMA21_Retest' | 'EMA8_Reclaim';

export interface EntrySignal {
  date: string;
  signalType: EntrySignalType;
  closePrice: number;
  rsi: number | null;
  distanceEma8Pct: number | null;
  distanceEma21Pct: number | null;
}

interface BarView {
  close: number;
  emaShort: number | null;
  emaLong: number | null;
  distShort: number | null;
  distLong: number | null;
}

function view(series: PriceSeries, ind: IndicatorSet, i: number): BarView {
  return {
    close: series.bars[i].close,
    emaShort: ind.emaShort[i],
    emaLong: ind.emaLong[i],
    distShort: ind.distanceEmaShortPct[i],
    distLong: ind.distanceEmaLongPct[i],
  };
}

function isEma8Retest(prev: BarView, cur: BarView, params: EntryParams): boolean {
  if (prev.distShort === null || cur.distShort === null || cur.emaLong === null) return false;
  return (
    prev.distShort > params.emaShortBandPct &&
    Math.abs(cur.distShort) <= params.emaShortBandPct &&
    cur.close >= cur.emaLong
  );
}

function isEma21Retest(prev: BarView, cur: BarView, params: EntryParams): boolean {
  if (
    prev.distLong === null ||
    cur.distLong === null ||
    cur.emaShort === null ||
    cur.emaLong === null
  ) {
    return false;
  }
  return (
    prev.distLong > params.emaLongBandPct &&
    Math.abs(cur.distLong) <= params.emaLongBandPct &&
    cur.close < cur.emaShort &&
    cur.close >= cur.emaLong
  );
}

function isEma8Reclaim(
  series: PriceSeries,
  ind: IndicatorSet,
  i: number,
  params: EntryParams
): boolean {
  const cur = view(series, ind, i);
  if (cur.emaShort === null || cur.emaLong === null) return false;
  if (!(cur.close > cur.emaShort && cur.close >= cur.emaLong)) return false;

  let stretch = 0;
  let dippedBelow = false;
  for (let j = i - 1; j >= 0 && stretch < params.reclaimLookback; j--) {
    const bar = view(series, ind, j);
    if (bar.emaShort === null || bar.emaLong === null) return false;
    if (bar.close > bar.emaShort) break;
    // The dip must not lose the long EMA
    if (bar.close < bar.emaLong) return false;
    if (bar.close < bar.emaShort) dippedBelow = true;
    stretch++;
  }
  return stretch > 0 && dippedBelow;
}

export function classifyBar(
  series: PriceSeries,
  ind: IndicatorSet,
  i: number,
  params: EntryParams
): EntrySignalType | null {
  if (i < 1 || i >= series.bars.length) return null;
  if (isEma8Reclaim(series, ind, i, params)) return 'EMA8_Reclaim';

  const prev = view(series, ind, i - 1);
  const cur = view(series, ind, i);
  if (isEma8Retest(prev, cur, params)) return 'EMA8_Retest';
  if (isEma21Retest(prev, cur, params)) return 'EMA21_Retest';
  return null;
}

export function detectEntrySignals(
  series: PriceSeries,
  ind: IndicatorSet,
  params: EntryParams
): EntrySignal[] {
  const signals: EntrySignal[] = [];
  const start = Math.max(1, series.bars.length - params.recentBars);

  for (let i = start; i < series.bars.length; i++) {
    const signalType = classifyBar(series, ind, i, params);
    if (!signalType) continue;
    signals.push({
      date: series.bars[i].date,
      signalType,
      closePrice: series.bars[i].close,
      rsi: ind.rsi[i],
      distanceEma8Pct: ind.distanceEmaShortPct[i],
      distanceEma21Pct: ind.distanceEmaLongPct[i],
    });
  }
  return signals;
}
