/**
 * S - supply and demand: share turnover, recent volume surges, proximity to
 * a breakout and power gaps.
 */

import type { PriceSeries } from '@/data/price_series';
import type { Fundamentals } from '../fundamentals';
import { lastValue } from '../indicators';
import { NEUTRAL_SCORE, mean } from '../normalize';
import { outcomeFrom, unavailable, type CanslimInput, type SubScoreOutcome } from './types';

const NEUTRAL = NEUTRAL_SCORE / 100;
const AVG_VOLUME_BARS = 50;
const TRADING_DAYS_PER_YEAR = 252;

export const S_WEIGHTS = { turnover: 0.4, volumeSurge: 0.3, breakout: 0.2, powerGap: 0.1 };

export interface AverageVolume {
  value: number;
  source: 'series' | 'fundamentals';
}

/**
 * Mean volume over the last 50 bars that report one, falling back to the
 * provider's figure when the series has no volume column.
 */
export function averageVolume(series: PriceSeries, fundamentals: Fundamentals): AverageVolume | null {
  if (series.hasVolume) {
    const volumes = series.bars
      .slice(-AVG_VOLUME_BARS)
      .map((bar) => bar.volume)
      .filter((v): v is number => v !== null);
    const avg = mean(volumes);
    if (avg !== null && avg > 0) return { value: avg, source: 'series' };
  }
  if (fundamentals.avgVolume50d.present) {
    return { value: fundamentals.avgVolume50d.value, source: 'fundamentals' };
  }
  return null;
}

/** Annualized turnover credit on a 0-1 scale, or null without share count. */
export function turnoverScore(
  avgVolume: number,
  fundamentals: Fundamentals,
  turnoverCap: number
): number | null {
  if (!fundamentals.sharesOutstanding.present) return null;
  const turnover = (avgVolume * TRADING_DAYS_PER_YEAR) / fundamentals.sharesOutstanding.value;
  return Math.min(turnover, turnoverCap) / turnoverCap;
}

export function scoreSupplyDemand({
  series,
  indicators,
  fundamentals,
  params,
}: CanslimInput): SubScoreOutcome {
  const { turnoverCap, volumeSurgeRatio, breakoutProximity, powerGapLookback, powerGapPct } =
    params.s;
  const avg = averageVolume(series, fundamentals);
  if (!avg) {
    return unavailable('no volume from series or provider');
  }

  const degraded: string[] = [];

  let turnover = turnoverScore(avg.value, fundamentals, turnoverCap);
  if (turnover === null) {
    turnover = NEUTRAL;
    degraded.push('shares outstanding missing');
  }

  const recent = series.bars.slice(-powerGapLookback);
  let volumeSurge = NEUTRAL;
  let powerGap = NEUTRAL;
  if (avg.source === 'series') {
    const maxVolume = Math.max(0, ...recent.map((bar) => bar.volume ?? 0));
    volumeSurge = Math.min(1, maxVolume / avg.value / volumeSurgeRatio);

    const offset = series.bars.length - recent.length;
    powerGap = recent.some((bar, k) => {
      const prev = series.bars[offset + k - 1];
      if (!prev || bar.volume === null) return false;
      return bar.open >= prev.high * (1 + powerGapPct / 100) && bar.volume >= volumeSurgeRatio * avg.value;
    })
      ? 1
      : 0;
  } else {
    degraded.push('series has no volume, surge and gap checks skipped');
  }

  const close = lastValue(series.bars.map((bar) => bar.close));
  const high = lastValue(indicators.high52w);
  const breakout = close !== null && high !== null && close >= breakoutProximity * high ? 1 : 0;

  return outcomeFrom(
    S_WEIGHTS.turnover * turnover +
      S_WEIGHTS.volumeSurge * volumeSurge +
      S_WEIGHTS.breakout * breakout +
      S_WEIGHTS.powerGap * powerGap,
    {
      avgVolume50d: avg.value,
      avgVolumeSource: avg.source,
      turnoverComponent: turnover,
      volumeSurgeComponent: volumeSurge,
      breakout: breakout === 1,
      powerGapComponent: powerGap,
    },
    degraded
  );
}
