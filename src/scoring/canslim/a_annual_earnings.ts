/**
 * A - annual earnings: latest growth, consistency over recent years, ROE.
 *
 * Companies with fewer than `minYears` of reported growth (recent listings)
 * are scored on a reweighted blend and discounted.
 */

import { NEUTRAL_SCORE, targetRatio } from '../normalize';
import { outcomeFrom, unavailable, type CanslimInput, type SubScoreOutcome } from './types';

const NEUTRAL = NEUTRAL_SCORE / 100;
const CONSISTENCY_YEARS = 3;

const STANDARD_WEIGHTS = { growth: 0.5, consistency: 0.3, roe: 0.2 };
const LIMITED_HISTORY_WEIGHTS = { growth: 0.6, consistency: 0.15, roe: 0.25 };

export function scoreAnnualEarnings({ fundamentals, params }: CanslimInput): SubScoreOutcome {
  const { growthTarget, roeTarget, minYears, limitedHistoryDiscount } = params.a;
  const history = fundamentals.annualEpsGrowthHistory;

  const latest = fundamentals.annualEpsGrowth.present
    ? fundamentals.annualEpsGrowth.value
    : history.present
      ? history.value[0]
      : null;
  if (latest === null) {
    return unavailable('annual EPS growth not reported');
  }

  const degraded: string[] = [];

  let consistency = NEUTRAL;
  if (history.present) {
    const recent = history.value.slice(0, CONSISTENCY_YEARS);
    consistency = recent.filter((g) => g >= growthTarget).length / recent.length;
  } else {
    degraded.push('growth history missing');
  }

  let roe = NEUTRAL;
  if (fundamentals.returnOnEquity.present) {
    roe = targetRatio(fundamentals.returnOnEquity.value, roeTarget);
  } else {
    degraded.push('return on equity missing');
  }

  const years = history.present ? history.value.length : 0;
  const limited = years < minYears;
  const growth = targetRatio(latest, growthTarget);
  const weights = limited ? LIMITED_HISTORY_WEIGHTS : STANDARD_WEIGHTS;
  const blend =
    (weights.growth * growth + weights.consistency * consistency + weights.roe * roe) *
    (limited ? limitedHistoryDiscount : 1);

  return outcomeFrom(
    blend,
    {
      annualEpsGrowth: latest,
      yearsOfHistory: years,
      limitedHistory: limited,
      growthComponent: growth,
      consistencyComponent: consistency,
      roeComponent: roe,
    },
    degraded
  );
}
