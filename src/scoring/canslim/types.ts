/**
 * Shared shapes for the CANSLIM sub-scorers.
 */

import type { PriceSeries } from '@/data/price_series';
import type { Fundamentals } from '../fundamentals';
import type { IndicatorSet } from '../indicators';
import type { RSScore } from '../relative_strength';
import type { CanslimCriterion, CanslimParams } from '../scoring_config';
import type { MarketTrend } from './m_market_direction';

export type SubScoreDetail = Record<string, number | string | boolean | null>;

/**
 * What a sub-scorer can report: a full score, a score computed with a
 * neutral stand-in for some missing input, or nothing at all.
 */
export type SubScoreOutcome =
  | { kind: 'ok'; value: number; detail: SubScoreDetail }
  | { kind: 'degraded'; value: number; detail: SubScoreDetail; reason: string }
  | { kind: 'unavailable'; reason: string };

export interface CanslimSubScore {
  criterion: CanslimCriterion;
  value: number;
  detail: SubScoreDetail;
  degraded: boolean;
  reason: string | null;
}

export interface CanslimInput {
  symbol: string;
  series: PriceSeries;
  indicators: IndicatorSet;
  fundamentals: Fundamentals;
  /** Null when relative strength could not be scored. */
  rs: RSScore | null;
  marketTrend: MarketTrend;
  params: CanslimParams;
}

export type SubScorer = (input: CanslimInput) => SubScoreOutcome;

export function unavailable(reason: string): SubScoreOutcome {
  return { kind: 'unavailable', reason };
}

/** Wraps a 0-1 blend as a 0-100 outcome, degraded when any reason is given. */
export function outcomeFrom(
  fraction: number,
  detail: SubScoreDetail,
  degradedReasons: string[]
): SubScoreOutcome {
  const value = Math.min(Math.max(fraction, 0), 1) * 100;
  if (degradedReasons.length > 0) {
    return { kind: 'degraded', value, detail, reason: degradedReasons.join('; ') };
  }
  return { kind: 'ok', value, detail };
}
