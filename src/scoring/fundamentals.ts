/**
 * Fundamentals as seen by the sub-scorers: every metric is explicitly
 * present or absent, so a missing value can never be mistaken for zero.
 */

import { absent, fromNullable, present, type Maybe } from '@/core/result';
import type { RawFundamentals } from '@/providers/types';

export interface Fundamentals {
  quarterlyEpsGrowth: Maybe<number>;
  annualEpsGrowth: Maybe<number>;
  /** Most recent year first. */
  annualEpsGrowthHistory: Maybe<number[]>;
  returnOnEquity: Maybe<number>;
  revenueGrowth: Maybe<number>;
  institutionalOwnershipPct: Maybe<number>;
  sharesOutstanding: Maybe<number>;
  avgVolume50d: Maybe<number>;
  marketCap: Maybe<number>;
}

export const EMPTY_FUNDAMENTALS: Fundamentals = {
  quarterlyEpsGrowth: absent,
  annualEpsGrowth: absent,
  annualEpsGrowthHistory: absent,
  returnOnEquity: absent,
  revenueGrowth: absent,
  institutionalOwnershipPct: absent,
  sharesOutstanding: absent,
  avgVolume50d: absent,
  marketCap: absent,
};

function positiveOnly(value: number | null | undefined): Maybe<number> {
  const maybe = fromNullable(value);
  return maybe.present && maybe.value > 0 ? maybe : absent;
}

export function toFundamentals(raw: RawFundamentals | null | undefined): Fundamentals {
  if (!raw) return EMPTY_FUNDAMENTALS;

  const history = (raw.annualEpsGrowthHistory ?? []).filter((v) => Number.isFinite(v));
  return {
    quarterlyEpsGrowth: fromNullable(raw.quarterlyEpsGrowth),
    annualEpsGrowth: fromNullable(raw.annualEpsGrowth),
    annualEpsGrowthHistory: history.length > 0 ? present(history) : absent,
    returnOnEquity: fromNullable(raw.returnOnEquity),
    revenueGrowth: fromNullable(raw.revenueGrowth),
    institutionalOwnershipPct: fromNullable(raw.institutionalOwnershipPct),
    sharesOutstanding: positiveOnly(raw.sharesOutstanding),
    avgVolume50d: positiveOnly(raw.avgVolume50d),
    marketCap: positiveOnly(raw.marketCap),
  };
}

export function missingFundamentals(f: Fundamentals): string[] {
  return Object.entries(f)
    .filter(([, value]) => !value.present)
    .map(([key]) => key);
}
