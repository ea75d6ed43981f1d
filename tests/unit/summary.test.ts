import { describe, expect, it } from 'vitest';
import { formatRankedLine, formatScanSummary } from '@/run/summary';
import type { RankedSymbol, ScanReport } from '@/scoring/engine';
import { bullishMarket } from '../helpers/canslim_input';

function report(ranked: RankedSymbol[], overrides: Partial<ScanReport> = {}): ScanReport {
  return {
    scanId: '2024-06-03__abcd1234',
    universe: 'test',
    benchmark: 'SPY',
    startedAt: '2024-06-03T12:00:00.000Z',
    completedAt: '2024-06-03T12:00:05.000Z',
    marketTrend: bullishMarket(),
    stats: {
      analyzed: 5,
      accepted: ranked.length,
      rejected: 5 - ranked.length - 1,
      failed: 1,
      degradedSubScores: 0,
      truncated: false,
      failuresByCode: { DATA_UNAVAILABLE: 1 },
    },
    ranked,
    outcomes: [],
    entrySignals: {},
    ...overrides,
  };
}

const LEADER: RankedSymbol = {
  rank: 1,
  symbol: 'AAA',
  compositeScore: 91.25,
  rsValue: 12.35,
  rsRating: 99,
  trendScore: 88,
  latestClose: 120,
  latestSignal: {
    date: '2024-05-31',
    signalType: 'EMA8_Retest',
    closePrice: 120,
    rsi: 58,
    distanceEma8Pct: 0.4,
    distanceEma21Pct: 3.1,
  },
  degradedCriteria: [],
};

describe('formatRankedLine', () => {
  it('prints score, signed RS, trend and the latest signal', () => {
    expect(formatRankedLine(LEADER)).toBe(
      '1. AAA composite 91.3 | RS +12.35 (rating 99) | trend 88.0 | EMA8_Retest on 2024-05-31'
    );
  });

  it('prints negative RS and a missing signal', () => {
    expect(formatRankedLine({ ...LEADER, rank: 2, rsValue: -1.5, latestSignal: null })).toBe(
      '2. AAA composite 91.3 | RS -1.50 (rating 99) | trend 88.0 | no entry signal'
    );
  });
});

describe('formatScanSummary', () => {
  it('lists ranked opportunities after the counts', () => {
    expect(formatScanSummary(report([LEADER]))).toEqual([
      'Scan 2024-06-03__abcd1234 | universe test | benchmark SPY',
      'Market: Bullish (score 100.0)',
      'Analyzed: 5 | Failed: 1 | Rejected: 3 | Opportunities found: 1',
      '1. AAA composite 91.3 | RS +12.35 (rating 99) | trend 88.0 | EMA8_Retest on 2024-05-31',
    ]);
  });

  it('still prints the counts when nothing passed', () => {
    const empty = report([]);
    const lines = formatScanSummary({
      ...empty,
      marketTrend: { ...empty.marketTrend, direction: 'Neutral', score: 40, degraded: true },
    });
    expect(lines).toEqual([
      'Scan 2024-06-03__abcd1234 | universe test | benchmark SPY',
      'Market: Neutral (score 40.0, degraded)',
      'Analyzed: 5 | Failed: 1 | Rejected: 4 | Opportunities found: 0',
      'No symbols passed the screening thresholds.',
    ]);
  });
});
