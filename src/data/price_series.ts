/**
 * Price series normalization.
 *
 * Providers disagree on column names (Close vs close vs c), date encodings
 * and row order, and occasionally return blank or duplicated rows. Everything
 * downstream works on the canonical, frozen PriceSeries built here.
 */

import { DataUnavailableError } from '@/core/errors';
import { err, ok, type Result } from '@/core/result';
import { parseBarDate } from '@/core/time';
import type { RawPriceRow } from '@/providers/types';

export interface PriceBar {
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number | null;
  readonly adjClose: number | null;
}

export interface PriceSeries {
  readonly symbol: string;
  readonly bars: readonly PriceBar[];
  /** At least one bar carries a volume. */
  readonly hasVolume: boolean;
  /** Every bar carries an adjusted close. */
  readonly hasAdjustedClose: boolean;
}

type Field = 'date' | 'open' | 'high' | 'low' | 'close' | 'adjClose' | 'volume';

const FIELDS: readonly Field[] = ['date', 'open', 'high', 'low', 'close', 'adjClose', 'volume'];
const REQUIRED_FIELDS: readonly Field[] = ['date', 'open', 'high', 'low', 'close'];

const COLUMN_ALIASES: Record<Field, readonly string[]> = {
  date: ['date', 'datetime', 'timestamp', 'time', 't'],
  open: ['open', 'o'],
  high: ['high', 'h'],
  low: ['low', 'l'],
  close: ['close', 'c'],
  adjClose: ['adjclose', 'adjustedclose'],
  volume: ['volume', 'vol', 'v'],
};

function canonicalKey(key: string): string {
  return key.toLowerCase().replace(/[\s_-]/g, '');
}

/**
 * Maps each field to the source column carrying it, looking at the keys of
 * every row (some sources omit empty cells).
 */
export function resolveColumns(rows: readonly RawPriceRow[]): Partial<Record<Field, string>> {
  const byCanonical = new Map<string, string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      const canonical = canonicalKey(key);
      if (!byCanonical.has(canonical)) {
        byCanonical.set(canonical, key);
      }
    }
  }

  const columns: Partial<Record<Field, string>> = {};
  for (const field of FIELDS) {
    for (const alias of COLUMN_ALIASES[field]) {
      const source = byCanonical.get(alias);
      if (source !== undefined) {
        columns[field] = source;
        break;
      }
    }
  }
  return columns;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim().replace(/,/g, '');
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function positive(value: number | null): number | null {
  return value !== null && value > 0 ? value : null;
}

export interface NormalizeOptions {
  /** Minimum clean bars for the series to be usable. */
  minBars?: number;
}

export function normalizePriceSeries(
  symbol: string,
  rows: readonly RawPriceRow[] | null | undefined,
  { minBars = 200 }: NormalizeOptions = {}
): Result<PriceSeries, DataUnavailableError> {
  if (!rows || rows.length === 0) {
    return err(new DataUnavailableError(symbol, `${symbol}: no price history returned`, 0));
  }

  const columns = resolveColumns(rows);
  const missing = REQUIRED_FIELDS.filter((field) => columns[field] === undefined);
  if (missing.length > 0) {
    return err(
      new DataUnavailableError(symbol, `${symbol}: missing required columns ${missing.join(', ')}`, 0)
    );
  }

  const read = (row: RawPriceRow, field: Field): unknown => {
    const column = columns[field];
    return column === undefined ? undefined : row[column];
  };

  // Later rows win on duplicate dates
  const byDate = new Map<string, PriceBar>();
  for (const row of rows) {
    const date = parseBarDate(read(row, 'date'));
    const open = positive(toNumber(read(row, 'open')));
    const high = positive(toNumber(read(row, 'high')));
    const low = positive(toNumber(read(row, 'low')));
    const close = positive(toNumber(read(row, 'close')));
    if (date === null || open === null || high === null || low === null || close === null) {
      continue;
    }

    const volume = toNumber(read(row, 'volume'));
    byDate.set(
      date,
      Object.freeze({
        date,
        open,
        high,
        low,
        close,
        volume: volume !== null && volume >= 0 ? volume : null,
        adjClose: positive(toNumber(read(row, 'adjClose'))),
      })
    );
  }

  const bars = [...byDate.values()].sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0
  );

  if (bars.length < minBars) {
    return err(
      new DataUnavailableError(
        symbol,
        `${symbol}: ${bars.length} clean bars, need at least ${minBars}`,
        bars.length
      )
    );
  }

  return ok(
    Object.freeze({
      symbol,
      bars: Object.freeze(bars),
      hasVolume: bars.some((bar) => bar.volume !== null),
      hasAdjustedClose: bars.length > 0 && bars.every((bar) => bar.adjClose !== null),
    })
  );
}
