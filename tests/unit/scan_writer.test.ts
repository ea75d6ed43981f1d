import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { writeScanReport } from '@/run/writer';
import type { ScanReport } from '@/scoring/engine';
import { hashObjectShort, stableStringify } from '@/utils/hash';
import { bullishMarket } from '../helpers/canslim_input';

let tempDir: string;

const report: ScanReport = {
  scanId: '2024-06-03__abcd1234',
  universe: 'test',
  benchmark: 'SPY',
  startedAt: '2024-06-03T12:00:00.000Z',
  completedAt: '2024-06-03T12:00:01.000Z',
  marketTrend: bullishMarket(),
  stats: {
    analyzed: 0,
    accepted: 0,
    rejected: 0,
    failed: 0,
    degradedSubScores: 0,
    truncated: false,
    failuresByCode: {},
  },
  ranked: [],
  outcomes: [],
  entrySignals: {},
};

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'screener-scans-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('writeScanReport', () => {
  it('writes the report under its scan id', () => {
    const outDir = join(tempDir, 'nested', 'scans');
    const result = writeScanReport(report, outDir);
    expect(result.filePath).toBe(join(outDir, '2024-06-03__abcd1234.json'));
    expect(result.contentHash).toHaveLength(16);

    const written: unknown = JSON.parse(readFileSync(result.filePath, 'utf-8'));
    expect(written).toEqual(report);
  });

  it('hashes equal reports identically', () => {
    const first = writeScanReport(report, tempDir);
    const second = writeScanReport({ ...report }, join(tempDir, 'again'));
    expect(second.contentHash).toBe(first.contentHash);
  });
});

describe('stableStringify', () => {
  it('sorts keys at every depth and drops undefined', () => {
    expect(stableStringify({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"y":2,"z":1}]},"b":1}'
    );
    expect(hashObjectShort({ a: 1, b: 2 }, 8)).toBe(hashObjectShort({ b: 2, a: 1 }, 8));
  });
});
