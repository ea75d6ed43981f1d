/**
 * N - new products/new highs: revenue growth and proximity to the 52-week high.
 */

import { lastValue } from '../indicators';
import { NEUTRAL_SCORE, clamp, targetRatio } from '../normalize';
import { outcomeFrom, unavailable, type CanslimInput, type SubScoreOutcome } from './types';

export function scoreNewHighs({ series, indicators, fundamentals, params }: CanslimInput): SubScoreOutcome {
  const { revenueTarget, revenueWeight, proximityWeight, proximityCap } = params.n;
  const close = lastValue(series.bars.map((bar) => bar.close));
  const high = lastValue(indicators.high52w);
  if (close === null || high === null || high <= 0) {
    return unavailable('no 52-week high');
  }

  const proximity = clamp(close / high / proximityCap, 0, 1);
  const degraded: string[] = [];
  let revenue = NEUTRAL_SCORE / 100;
  if (fundamentals.revenueGrowth.present) {
    revenue = targetRatio(fundamentals.revenueGrowth.value, revenueTarget);
  } else {
    degraded.push('revenue growth missing');
  }

  return outcomeFrom(
    revenueWeight * revenue + proximityWeight * proximity,
    {
      revenueGrowth: fundamentals.revenueGrowth.present ? fundamentals.revenueGrowth.value : null,
      priceToHigh: close / high,
      revenueComponent: revenue,
      proximityComponent: proximity,
    },
    degraded
  );
}
