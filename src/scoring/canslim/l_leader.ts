/**
 * L - leader or laggard, from relative strength against the benchmark.
 */

import { clamp } from '../normalize';
import { unavailable, type CanslimInput, type SubScoreOutcome } from './types';

export function scoreLeadership({ rs, params }: CanslimInput): SubScoreOutcome {
  if (!rs) {
    return unavailable('relative strength not scored');
  }
  // Matching the benchmark scores 50; full credit at the configured outperformance
  const value = clamp(50 + (50 * rs.value) / params.l.fullCreditOutperformancePct);
  return {
    kind: 'ok',
    value,
    detail: { rsValue: rs.value, benchmark: rs.benchmarkSymbol },
  };
}
