import { describe, expect, it } from 'vitest';
import { absent, present } from '@/core/result';
import {
  computeCanslimComposite,
  rejectionReasons,
  SUB_SCORERS,
  type CanslimComposite,
} from '@/scoring/canslim/composite';
import type { SubScorer } from '@/scoring/canslim/types';
import { CANSLIM_CRITERIA, DEFAULT_SCREENER_CONFIG } from '@/scoring/scoring_config';
import { canslimInput, rsOf } from '../helpers/canslim_input';
import { STRONG_FUNDAMENTALS } from '../helpers/fixtures';

const fixed = (value: number): SubScorer => () => ({ kind: 'ok', value, detail: {} });

function compositeOf(value: number): CanslimComposite {
  const scorer = fixed(value);
  return computeCanslimComposite(canslimInput(), {
    C: scorer,
    A: scorer,
    N: scorer,
    S: scorer,
    L: scorer,
    I: scorer,
    M: scorer,
  });
}

describe('computeCanslimComposite', () => {
  it('uses default weights that sum to 1', () => {
    const weights = DEFAULT_SCREENER_CONFIG.canslim.weights;
    const sum = CANSLIM_CRITERIA.reduce((acc, c) => acc + weights[c], 0);
    expect(sum).toBeCloseTo(1, 10);
  });

  it('scores a strong leader in a bullish market', () => {
    const composite = computeCanslimComposite(
      canslimInput({ fundamentals: STRONG_FUNDAMENTALS, rs: rsOf(10) })
    );
    expect(composite.subScores.C.value).toBe(100);
    expect(composite.subScores.S.value).toBe(80);
    expect(composite.subScores.I.value).toBe(80);
    expect(composite.subScores.M.value).toBe(100);
    expect(composite.degradedCriteria).toEqual([]);
    expect(composite.total).toBeCloseTo(95.7, 6);
  });

  it('substitutes the midpoint for criteria that cannot be scored', () => {
    const composite = computeCanslimComposite(canslimInput({ fundamentals: null, rs: null }));
    for (const criterion of ['C', 'A', 'L', 'I'] as const) {
      expect(composite.subScores[criterion].value).toBe(50);
      expect(composite.subScores[criterion].degraded).toBe(true);
    }
    expect(composite.subScores.N.value).toBe(63.3);
    expect(composite.subScores.S.value).toBe(60);
    expect(composite.degradedCriteria).toEqual(['C', 'A', 'N', 'S', 'L', 'I']);
    expect(composite.subScores.L.reason).toBe('relative strength not scored');
    expect(composite.total).toBeCloseTo(60.5, 0);
  });

  it('blends injected scorers with the configured weights', () => {
    expect(compositeOf(80).total).toBe(80);

    const composite = computeCanslimComposite(canslimInput(), {
      ...SUB_SCORERS,
      C: fixed(80),
      A: fixed(80),
      N: fixed(80),
      S: fixed(80),
      L: () => ({ kind: 'unavailable', reason: 'no benchmark' }),
      I: fixed(80),
      M: fixed(80),
    });
    expect(composite.total).toBe(74);
    expect(composite.degradedCriteria).toEqual(['L']);
  });

  it('clamps out-of-range sub-scores', () => {
    expect(compositeOf(140).total).toBe(100);
    expect(compositeOf(-20).total).toBe(0);
  });
});

describe('rejectionReasons', () => {
  const thresholds = DEFAULT_SCREENER_CONFIG.screening;

  it('accepts a symbol clearing every threshold', () => {
    expect(
      rejectionReasons({ composite: compositeOf(80), rs: rsOf(3), marketCap: present(50e9) }, thresholds)
    ).toEqual([]);
  });

  it('rejects unscored relative strength and a weak composite', () => {
    expect(rejectionReasons({ composite: compositeOf(65), rs: null, marketCap: absent }, thresholds)).toEqual([
      'rs_unscored',
      'canslim_below_min (65 < 70)',
    ]);
  });

  it('rejects underperformers and small caps', () => {
    expect(
      rejectionReasons({ composite: compositeOf(90), rs: rsOf(-2.5), marketCap: present(5e9) }, thresholds)
    ).toEqual(['rs_below_min (-2.5 < 0)', 'market_cap_below_min (5000000000 < 10000000000)']);
  });

  it('skips the market cap check when no cap is reported', () => {
    expect(
      rejectionReasons({ composite: compositeOf(90), rs: rsOf(1), marketCap: absent }, thresholds)
    ).toEqual([]);
  });
});
