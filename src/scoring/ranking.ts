/**
 * Deterministic ordering of accepted symbols and the RS percentile rating.
 */

import { percentileRating } from './normalize';

export interface Rankable {
  symbol: string;
  compositeScore: number;
  rsValue: number;
}

/**
 * Composite descending, then RS descending, then symbol ascending.
 */
export function sortRankedDeterministic<T extends Rankable>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => {
    if (b.compositeScore !== a.compositeScore) {
      return b.compositeScore - a.compositeScore;
    }
    if (b.rsValue !== a.rsValue) {
      return b.rsValue - a.rsValue;
    }
    return a.symbol.localeCompare(b.symbol);
  });
}

/**
 * 1-99 rating of each symbol's RS value among every RS-scored symbol of the
 * run. Only meaningful once all symbols are scored.
 */
export function computeRsRatings(values: ReadonlyMap<string, number>): Map<string, number> {
  const all = [...values.values()];
  const ratings = new Map<string, number>();
  for (const [symbol, value] of values) {
    ratings.set(symbol, percentileRating(value, all));
  }
  return ratings;
}

export function applySymbolLimit(
  symbols: string[],
  maxSymbols?: number | null
): { symbolsToScore: string[]; truncated: boolean } {
  if (!maxSymbols || maxSymbols <= 0) {
    return { symbolsToScore: symbols, truncated: false };
  }
  if (symbols.length <= maxSymbols) {
    return { symbolsToScore: symbols, truncated: false };
  }
  return { symbolsToScore: symbols.slice(0, maxSymbols), truncated: true };
}
