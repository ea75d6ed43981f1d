import { describe, expect, it } from 'vitest';
import { applySymbolLimit, computeRsRatings, sortRankedDeterministic } from '@/scoring/ranking';

describe('applySymbolLimit', () => {
  const symbols = ['AAA', 'BBB', 'CCC', 'DDD'];

  it('returns all symbols when no limit is set', () => {
    expect(applySymbolLimit(symbols, 0)).toEqual({ symbolsToScore: symbols, truncated: false });
    expect(applySymbolLimit(symbols, null)).toEqual({ symbolsToScore: symbols, truncated: false });
  });

  it('keeps the first symbols up to the limit', () => {
    expect(applySymbolLimit(symbols, 2)).toEqual({ symbolsToScore: ['AAA', 'BBB'], truncated: true });
    expect(applySymbolLimit(symbols, 4)).toEqual({ symbolsToScore: symbols, truncated: false });
  });
});

describe('sortRankedDeterministic', () => {
  it('orders by composite, then RS, then symbol', () => {
    const sorted = sortRankedDeterministic([
      { symbol: 'CCC', compositeScore: 80, rsValue: 2 },
      { symbol: 'BBB', compositeScore: 90, rsValue: 1 },
      { symbol: 'DDD', compositeScore: 80, rsValue: 5 },
      { symbol: 'AAA', compositeScore: 80, rsValue: 2 },
    ]);
    expect(sorted.map((item) => item.symbol)).toEqual(['BBB', 'DDD', 'AAA', 'CCC']);
  });
});

describe('computeRsRatings', () => {
  it('spreads ratings between 1 and 99', () => {
    const ratings = computeRsRatings(new Map([['AAA', -3], ['BBB', 0], ['CCC', 8]]));
    expect(Object.fromEntries(ratings)).toEqual({ AAA: 1, BBB: 50, CCC: 99 });
  });

  it('gives a lone symbol the midpoint', () => {
    expect(computeRsRatings(new Map([['AAA', 4]])).get('AAA')).toBe(50);
  });
});
