/**
 * CANSLIM composite: runs the seven sub-scorers and blends them with the
 * configured weights. A criterion that cannot be scored contributes the
 * neutral midpoint and is flagged as degraded.
 */

import type { Maybe } from '@/core/result';
import { NEUTRAL_SCORE, clamp, roundScore } from '../normalize';
import type { RSScore } from '../relative_strength';
import {
  CANSLIM_CRITERIA,
  type CanslimCriterion,
  type CanslimWeights,
  type ScreeningThresholds,
} from '../scoring_config';
import { scoreAnnualEarnings } from './a_annual_earnings';
import { scoreCurrentEarnings } from './c_current_earnings';
import { scoreInstitutional } from './i_institutional';
import { scoreLeadership } from './l_leader';
import { scoreMarketDirection } from './m_market_direction';
import { scoreNewHighs } from './n_new_highs';
import { scoreSupplyDemand } from './s_supply_demand';
import type { CanslimInput, CanslimSubScore, SubScoreOutcome, SubScorer } from './types';

export interface CanslimComposite {
  symbol: string;
  total: number;
  subScores: Record<CanslimCriterion, CanslimSubScore>;
  weights: CanslimWeights;
  degradedCriteria: CanslimCriterion[];
}

export const SUB_SCORERS: Record<CanslimCriterion, SubScorer> = {
  C: scoreCurrentEarnings,
  A: scoreAnnualEarnings,
  N: scoreNewHighs,
  S: scoreSupplyDemand,
  L: scoreLeadership,
  I: scoreInstitutional,
  M: (input) => scoreMarketDirection(input.marketTrend),
};

export function toSubScore(criterion: CanslimCriterion, outcome: SubScoreOutcome): CanslimSubScore {
  switch (outcome.kind) {
    case 'ok':
      return {
        criterion,
        value: roundScore(clamp(outcome.value)),
        detail: outcome.detail,
        degraded: false,
        reason: null,
      };
    case 'degraded':
      return {
        criterion,
        value: roundScore(clamp(outcome.value)),
        detail: outcome.detail,
        degraded: true,
        reason: outcome.reason,
      };
    case 'unavailable':
      return {
        criterion,
        value: NEUTRAL_SCORE,
        detail: {},
        degraded: true,
        reason: outcome.reason,
      };
  }
}

export function computeCanslimComposite(
  input: CanslimInput,
  scorers: Record<CanslimCriterion, SubScorer> = SUB_SCORERS
): CanslimComposite {
  const weights = input.params.weights;
  const score = (criterion: CanslimCriterion): CanslimSubScore =>
    toSubScore(criterion, scorers[criterion](input));
  const subScores: Record<CanslimCriterion, CanslimSubScore> = {
    C: score('C'),
    A: score('A'),
    N: score('N'),
    S: score('S'),
    L: score('L'),
    I: score('I'),
    M: score('M'),
  };

  let total = 0;
  for (const criterion of CANSLIM_CRITERIA) {
    total += weights[criterion] * subScores[criterion].value;
  }

  return {
    symbol: input.symbol,
    total: roundScore(clamp(total)),
    subScores,
    weights,
    degradedCriteria: CANSLIM_CRITERIA.filter((c) => subScores[c].degraded),
  };
}

export interface AcceptanceInput {
  composite: CanslimComposite;
  rs: RSScore | null;
  marketCap: Maybe<number>;
}

/**
 * Reasons the symbol fails the screening thresholds; empty means accepted.
 * Market cap is only enforced when the provider reports one.
 */
export function rejectionReasons(
  { composite, rs, marketCap }: AcceptanceInput,
  thresholds: ScreeningThresholds
): string[] {
  const reasons: string[] = [];
  if (!rs) {
    reasons.push('rs_unscored');
  } else if (rs.value < thresholds.minRsScore) {
    reasons.push(`rs_below_min (${roundScore(rs.value, 2)} < ${thresholds.minRsScore})`);
  }
  if (composite.total < thresholds.minCanslimScore) {
    reasons.push(`canslim_below_min (${composite.total} < ${thresholds.minCanslimScore})`);
  }
  if (marketCap.present && marketCap.value < thresholds.minMarketCap) {
    reasons.push(`market_cap_below_min (${marketCap.value} < ${thresholds.minMarketCap})`);
  }
  return reasons;
}
