import { describe, expect, it } from 'vitest';
import {
  computeEma,
  computeIndicators,
  computeRsi,
  distancePct,
  rollingMax,
} from '@/scoring/indicators';
import { InsufficientHistoryError } from '@/core/errors';
import { DEFAULT_SCREENER_CONFIG } from '@/scoring/scoring_config';
import { geometricCloses, makeSeries } from '../helpers/fixtures';

describe('computeEma', () => {
  it('seeds with the simple average and smooths with 2/(N+1)', () => {
    expect(computeEma([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it('returns only nulls when the input is shorter than the period', () => {
    expect(computeEma([1, 2], 3)).toEqual([null, null]);
  });
});

describe('computeRsi', () => {
  it('reads 100 when there are no losses', () => {
    const rsi = computeRsi([1, 2, 3, 4, 5], 3);
    expect(rsi.slice(0, 3)).toEqual([null, null, null]);
    expect(rsi[3]).toBe(100);
    expect(rsi[4]).toBe(100);
  });

  it('reads 50 for a flat series and for balanced moves', () => {
    expect(computeRsi([5, 5, 5, 5], 2)[3]).toBe(50);
    expect(computeRsi([1, 2, 1], 2)[2]).toBe(50);
  });

  it('applies Wilder smoothing after the first average', () => {
    // first averages: gain 1, loss 0.5 over 2 changes; next change +1
    // gain = (1*1 + 1)/2 = 1, loss = (0.5*1 + 0)/2 = 0.25, rs = 4
    const rsi = computeRsi([10, 12, 11, 12], 2);
    expect(rsi[2]).toBeCloseTo(100 - 100 / 3, 10);
    expect(rsi[3]).toBeCloseTo(80, 10);
  });
});

describe('rollingMax and distancePct', () => {
  it('tracks the trailing maximum over a partial window at the start', () => {
    expect(rollingMax([1, 3, 2, 1, 0], 3)).toEqual([1, 3, 3, 3, 2]);
  });

  it('measures distance relative to the EMA', () => {
    expect(distancePct(102, 100)).toBe(2);
    expect(distancePct(95, 100)).toBe(-5);
    expect(distancePct(100, null)).toBeNull();
  });
});

describe('computeIndicators', () => {
  it('fails with insufficient history below the longest lookback', () => {
    const result = computeIndicators(
      makeSeries('SHORT', geometricCloses(150, 0.01)),
      DEFAULT_SCREENER_CONFIG.indicators
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InsufficientHistoryError);
    expect(result.error.required).toBe(200);
    expect(result.error.available).toBe(150);
  });

  it('produces arrays aligned with the series', () => {
    const series = makeSeries('LONG', geometricCloses(220, 0.01));
    const result = computeIndicators(series, DEFAULT_SCREENER_CONFIG.indicators);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const ind = result.value;
    expect(ind.length).toBe(220);
    expect(ind.emaShort[6]).toBeNull();
    expect(ind.emaShort[7]).not.toBeNull();
    expect(ind.emaTrend[198]).toBeNull();
    expect(ind.emaTrend[199]).not.toBeNull();
    expect(ind.rsi[13]).toBeNull();
    expect(ind.rsi[14]).toBe(100);
    expect(ind.dailyReturns[0]).toBeNull();
    expect(ind.dailyReturns[1]).toBeCloseTo(0.01, 10);
    expect(ind.aboveEmaShort[219]).toBe(true);
    expect(ind.high52w[219]).toBeCloseTo(series.bars[219].high, 10);
  });
});
