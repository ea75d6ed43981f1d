/**
 * I - institutional sponsorship. Turnover stands in when ownership is not
 * reported.
 */

import { clamp } from '../normalize';
import { averageVolume, turnoverScore } from './s_supply_demand';
import { outcomeFrom, unavailable, type CanslimInput, type SubScoreOutcome } from './types';

export function scoreInstitutional({ series, fundamentals, params }: CanslimInput): SubScoreOutcome {
  const ownership = fundamentals.institutionalOwnershipPct;
  if (ownership.present) {
    return outcomeFrom(
      clamp(ownership.value / params.i.institutionalCap, 0, 1),
      { institutionalOwnershipPct: ownership.value },
      []
    );
  }

  const avg = averageVolume(series, fundamentals);
  const proxy = avg ? turnoverScore(avg.value, fundamentals, params.s.turnoverCap) : null;
  if (proxy === null) {
    return unavailable('institutional ownership and turnover both unavailable');
  }
  return outcomeFrom(
    proxy,
    { institutionalOwnershipPct: null, turnoverProxy: proxy },
    ['institutional ownership missing, turnover used as proxy']
  );
}
