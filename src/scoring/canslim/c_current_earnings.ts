/**
 * C - current quarterly earnings growth.
 */

import { targetRatio } from '../normalize';
import { outcomeFrom, unavailable, type CanslimInput, type SubScoreOutcome } from './types';

export function scoreCurrentEarnings({ fundamentals, params }: CanslimInput): SubScoreOutcome {
  const growth = fundamentals.quarterlyEpsGrowth;
  if (!growth.present) {
    return unavailable('quarterly EPS growth not reported');
  }
  return outcomeFrom(
    targetRatio(growth.value, params.c.growthTarget),
    { quarterlyEpsGrowth: growth.value, target: params.c.growthTarget },
    []
  );
}
