/**
 * Relative strength against a benchmark, weighted toward the most recent
 * quarter.
 *
 * The last `periodDays` daily intervals of the aligned price histories are
 * split into four consecutive buckets. Each bucket contributes the stock's
 * return minus the benchmark's return (percentage points), and the four
 * contributions are blended with the quarter weights.
 */

import { BenchmarkDataInsufficientError, InsufficientHistoryError } from '@/core/errors';
import { err, ok, type Result } from '@/core/result';
import type { PriceBar, PriceSeries } from '@/data/price_series';
import type { QuarterWeights, RelativeStrengthParams } from './scoring_config';

type Quad = [number, number, number, number];

export interface RSScore {
  value: number;
  benchmarkSymbol: string;
  periodDays: number;
  /** Stock minus benchmark return per bucket, oldest first. */
  quarterContributions: Quad;
  stockReturnsPct: Quad;
  benchmarkReturnsPct: Quad;
  /** Intervals per bucket, oldest first. */
  bucketSizes: Quad;
  usedAdjustedClose: boolean;
}

export type RSError = InsufficientHistoryError | BenchmarkDataInsufficientError;

/**
 * Interval counts per bucket, oldest first. Leftover intervals go one each
 * to the most recent buckets: 63 -> [15, 16, 16, 16].
 */
export function quarterBucketSizes(periodDays: number): Quad {
  const base = Math.floor(periodDays / 4);
  const remainder = periodDays % 4;
  const size = (index: number): number => base + (index >= 4 - remainder ? 1 : 0);
  return [size(0), size(1), size(2), size(3)];
}

function bucketReturns(prices: readonly number[], sizes: Quad): Quad {
  const returns: number[] = [];
  let start = 0;
  for (const size of sizes) {
    const end = start + size;
    returns.push((prices[end] / prices[start] - 1) * 100);
    start = end;
  }
  return [returns[0], returns[1], returns[2], returns[3]];
}

/**
 * Blends oldest-first contributions with most-recent-first weights.
 */
export function weightContributions(contributions: Quad, weights: QuarterWeights): number {
  let total = 0;
  for (let i = 0; i < 4; i++) {
    total += weights[3 - i] * contributions[i];
  }
  return total;
}

export function computeRelativeStrength(
  stock: PriceSeries,
  benchmark: PriceSeries,
  params: RelativeStrengthParams
): Result<RSScore, RSError> {
  const { periodDays, quarterWeights } = params;
  const required = periodDays + 1;

  if (stock.bars.length < required) {
    return err(new InsufficientHistoryError(stock.symbol, required, stock.bars.length));
  }
  if (benchmark.bars.length < required) {
    return err(
      new BenchmarkDataInsufficientError(benchmark.symbol, required, benchmark.bars.length, stock.symbol)
    );
  }

  const useAdjusted = stock.hasAdjustedClose && benchmark.hasAdjustedClose;
  const price = (bar: PriceBar): number => (useAdjusted ? bar.adjClose ?? bar.close : bar.close);

  const benchmarkByDate = new Map<string, number>();
  for (const bar of benchmark.bars) {
    benchmarkByDate.set(bar.date, price(bar));
  }

  const stockPrices: number[] = [];
  const benchPrices: number[] = [];
  for (const bar of stock.bars) {
    const benchPrice = benchmarkByDate.get(bar.date);
    if (benchPrice !== undefined) {
      stockPrices.push(price(bar));
      benchPrices.push(benchPrice);
    }
  }

  if (stockPrices.length < required) {
    return err(
      new BenchmarkDataInsufficientError(benchmark.symbol, required, stockPrices.length, stock.symbol)
    );
  }

  const sizes = quarterBucketSizes(periodDays);
  const stockReturnsPct = bucketReturns(stockPrices.slice(-required), sizes);
  const benchmarkReturnsPct = bucketReturns(benchPrices.slice(-required), sizes);
  const quarterContributions: Quad = [
    stockReturnsPct[0] - benchmarkReturnsPct[0],
    stockReturnsPct[1] - benchmarkReturnsPct[1],
    stockReturnsPct[2] - benchmarkReturnsPct[2],
    stockReturnsPct[3] - benchmarkReturnsPct[3],
  ];

  return ok({
    value: weightContributions(quarterContributions, quarterWeights),
    benchmarkSymbol: benchmark.symbol,
    periodDays,
    quarterContributions,
    stockReturnsPct,
    benchmarkReturnsPct,
    bucketSizes: sizes,
    usedAdjustedClose: useAdjusted,
  });
}
