/**
 * Offline provider reading exported history and fundamentals from disk.
 *
 *   <dataDir>/prices/<SYMBOL>.csv         header row + one row per bar
 *   <dataDir>/fundamentals/<SYMBOL>.json  RawFundamentals fields
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ProviderError, errorMessage } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import type { MarketDataProvider, RawFundamentals, RawPriceRow } from './types';

const logger = createChildLogger('local_file_provider');

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Splits CSV text into header-keyed rows. Cell values stay strings; quoted
 * cells may contain commas.
 */
export function parseCsv(content: string): RawPriceRow[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (lines.length === 0) return [];

  const header = splitCsvLine(lines[0]);
  return lines.slice(1).map((line) => {
    const cells = splitCsvLine(line);
    const row: RawPriceRow = {};
    header.forEach((name, index) => {
      row[name] = cells[index] ?? '';
    });
    return row;
  });
}

function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      if (quoted && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        quoted = !quoted;
      }
    } else if (ch === ',' && !quoted) {
      cells.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current.trim());
  return cells;
}

export function parseFundamentalsJson(parsed: unknown): RawFundamentals | null {
  if (!isObject(parsed)) return null;
  const history = Array.isArray(parsed.annualEpsGrowthHistory)
    ? parsed.annualEpsGrowthHistory
        .map(numberOrNull)
        .filter((v): v is number => v !== null)
    : null;
  return {
    quarterlyEpsGrowth: numberOrNull(parsed.quarterlyEpsGrowth),
    annualEpsGrowth: numberOrNull(parsed.annualEpsGrowth),
    annualEpsGrowthHistory: history,
    returnOnEquity: numberOrNull(parsed.returnOnEquity),
    revenueGrowth: numberOrNull(parsed.revenueGrowth),
    institutionalOwnershipPct: numberOrNull(parsed.institutionalOwnershipPct),
    sharesOutstanding: numberOrNull(parsed.sharesOutstanding),
    avgVolume50d: numberOrNull(parsed.avgVolume50d),
    marketCap: numberOrNull(parsed.marketCap),
  };
}

export class LocalFileMarketDataProvider implements MarketDataProvider {
  readonly name = 'local';
  private requestCount = 0;

  constructor(private readonly dataDir: string = join(process.cwd(), 'data')) {}

  async getHistory(symbol: string, _lookbackDays: number): Promise<RawPriceRow[] | null> {
    this.requestCount++;
    const path = join(this.dataDir, 'prices', `${symbol.toUpperCase()}.csv`);
    if (!existsSync(path)) {
      logger.debug({ symbol, path }, 'No price file');
      return null;
    }
    try {
      return parseCsv(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ProviderError(
        `Failed to read price history: ${errorMessage(error)}`,
        this.name,
        symbol,
        'getHistory',
        error instanceof Error ? error : undefined
      );
    }
  }

  async getFundamentals(symbol: string): Promise<RawFundamentals | null> {
    this.requestCount++;
    const path = join(this.dataDir, 'fundamentals', `${symbol.toUpperCase()}.json`);
    if (!existsSync(path)) {
      return null;
    }
    try {
      return parseFundamentalsJson(JSON.parse(readFileSync(path, 'utf-8')));
    } catch (error) {
      throw new ProviderError(
        `Failed to read fundamentals: ${errorMessage(error)}`,
        this.name,
        symbol,
        'getFundamentals',
        error instanceof Error ? error : undefined
      );
    }
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  close(): void {
    // Nothing held open between reads
  }
}
