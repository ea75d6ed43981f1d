/**
 * Screening engine
 * Scores every symbol of a universe against the benchmark and ranks the
 * ones that pass the screening thresholds.
 *
 * Pre-scan: universe, benchmark history and the shared MarketTrend.
 * Fan-out: a bounded pool of workers runs the per-symbol pipeline; each
 * result lands in its input slot so order never depends on timing.
 * Barrier: RS ratings and ranking only happen once every worker is done.
 */

import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';
import { hashObjectShort } from '@/utils/hash';
import { formatDate } from '@/core/time';
import {
  BenchmarkDataInsufficientError,
  DataUnavailableError,
  errorCode,
  errorMessage,
  type ScreenerErrorCode,
} from '@/core/errors';
import type { UniverseSource } from '@/core/universe';
import { normalizePriceSeries, type PriceSeries } from '@/data/price_series';
import type { FundamentalsProvider, PriceDataProvider, RawPriceRow } from '@/providers/types';
import { computeIndicators, lastValue } from './indicators';
import { computeRelativeStrength, type RSScore } from './relative_strength';
import { analyzeTrend, type TrendScore } from './trend';
import { detectEntrySignals, type EntrySignal } from './entry_signals';
import { EMPTY_FUNDAMENTALS, missingFundamentals, toFundamentals, type Fundamentals } from './fundamentals';
import { computeCanslimComposite, rejectionReasons, type CanslimComposite } from './canslim/composite';
import { computeMarketTrend, type MarketTrend } from './canslim/m_market_direction';
import { applySymbolLimit, computeRsRatings, sortRankedDeterministic } from './ranking';
import { SymbolTracker, type SymbolState } from './symbol_state';
import type { CanslimCriterion, ScreenerConfig } from './scoring_config';

const logger = createChildLogger('screening_engine');

export type FailureStage = 'fetch' | 'normalize' | 'indicators' | 'scoring';

export interface ScoredSymbol {
  symbol: string;
  latestDate: string;
  latestClose: number;
  barCount: number;
  rs: RSScore | null;
  rsError: { code: ScreenerErrorCode; message: string } | null;
  trend: TrendScore;
  entrySignals: EntrySignal[];
  composite: CanslimComposite;
  missingFundamentals: string[];
  stateHistory: readonly SymbolState[];
}

export interface AcceptedSymbol extends ScoredSymbol {
  state: 'Accepted';
}

export interface RejectedSymbol extends ScoredSymbol {
  state: 'Rejected';
  reasons: string[];
}

export interface FailedSymbol {
  state: 'Failed';
  symbol: string;
  stage: FailureStage;
  errorCode: ScreenerErrorCode;
  message: string;
  stateHistory: readonly SymbolState[];
}

export type SymbolOutcome = AcceptedSymbol | RejectedSymbol | FailedSymbol;

export interface RankedSymbol {
  rank: number;
  symbol: string;
  compositeScore: number;
  rsValue: number;
  rsRating: number;
  trendScore: number;
  latestClose: number;
  latestSignal: EntrySignal | null;
  degradedCriteria: CanslimCriterion[];
}

export interface ScanStats {
  analyzed: number;
  accepted: number;
  rejected: number;
  failed: number;
  degradedSubScores: number;
  truncated: boolean;
  failuresByCode: Partial<Record<ScreenerErrorCode, number>>;
}

export interface ScanReport {
  scanId: string;
  universe: string;
  benchmark: string;
  startedAt: string;
  completedAt: string;
  marketTrend: MarketTrend;
  stats: ScanStats;
  ranked: RankedSymbol[];
  /** One outcome per analyzed symbol, in universe order. */
  outcomes: SymbolOutcome[];
  entrySignals: Record<string, EntrySignal[]>;
}

export interface ScanDependencies {
  priceProvider: PriceDataProvider;
  fundamentalsProvider: FundamentalsProvider;
  universeSource: UniverseSource;
  throttler?: RequestThrottler;
  now?: () => Date;
}

export interface ScanRequest {
  /** Universe selector passed to the universe source. */
  universe: string;
  /** Overrides the universe's and the config's benchmark. */
  benchmarkSymbol?: string;
  config: ScreenerConfig;
}

export interface SymbolContext {
  config: ScreenerConfig;
  benchmark: PriceSeries | null;
  benchmarkError: BenchmarkDataInsufficientError | null;
  marketTrend: MarketTrend;
  priceProvider: PriceDataProvider;
  fundamentalsProvider: FundamentalsProvider;
  throttler: RequestThrottler;
}

function failed(
  tracker: SymbolTracker,
  stage: FailureStage,
  error: unknown
): FailedSymbol {
  tracker.transition('Failed');
  const outcome: FailedSymbol = {
    state: 'Failed',
    symbol: tracker.symbol,
    stage,
    errorCode: errorCode(error),
    message: errorMessage(error),
    stateHistory: tracker.history,
  };
  logger.warn({ symbol: tracker.symbol, stage, errorCode: outcome.errorCode, error: outcome.message }, 'Symbol failed');
  return outcome;
}

async function loadFundamentals(symbol: string, ctx: SymbolContext): Promise<Fundamentals> {
  try {
    const raw = await ctx.throttler.schedule(() => ctx.fundamentalsProvider.getFundamentals(symbol));
    return toFundamentals(raw);
  } catch (error) {
    // Fundamentals only feed sub-scores, which degrade to neutral without them
    logger.warn({ symbol, error: errorMessage(error) }, 'Fundamentals unavailable, scoring without them');
    return EMPTY_FUNDAMENTALS;
  }
}

/**
 * Runs one symbol from raw history to a terminal state. Never throws: any
 * error becomes a Failed outcome tagged with the stage it happened in.
 */
export async function evaluateSymbol(symbol: string, ctx: SymbolContext): Promise<SymbolOutcome> {
  const tracker = new SymbolTracker(symbol);
  const { config } = ctx;
  let stage: FailureStage = 'fetch';

  try {
    let rows: RawPriceRow[] | null;
    try {
      rows = await ctx.throttler.schedule(() =>
        ctx.priceProvider.getHistory(symbol, config.pipeline.lookbackDays)
      );
    } catch (error) {
      return failed(
        tracker,
        stage,
        new DataUnavailableError(symbol, `${symbol}: price history fetch failed: ${errorMessage(error)}`)
      );
    }

    stage = 'normalize';
    const normalized = normalizePriceSeries(symbol, rows, { minBars: config.pipeline.minBars });
    if (!normalized.ok) {
      return failed(tracker, stage, normalized.error);
    }
    const series = normalized.value;
    tracker.transition('Validated');

    stage = 'indicators';
    const indicatorResult = computeIndicators(series, config.indicators);
    if (!indicatorResult.ok) {
      return failed(tracker, stage, indicatorResult.error);
    }
    const indicators = indicatorResult.value;

    stage = 'scoring';
    const fundamentals = await loadFundamentals(symbol, ctx);

    let rs: RSScore | null = null;
    let rsError: ScoredSymbol['rsError'] = null;
    if (ctx.benchmark) {
      const rsResult = computeRelativeStrength(series, ctx.benchmark, config.relativeStrength);
      if (rsResult.ok) {
        rs = rsResult.value;
      } else {
        rsError = { code: rsResult.error.code, message: rsResult.error.message };
      }
    } else if (ctx.benchmarkError) {
      rsError = { code: ctx.benchmarkError.code, message: ctx.benchmarkError.message };
    }

    const trend = analyzeTrend(series, indicators, config.trend);
    const entrySignals = detectEntrySignals(series, indicators, config.entry);
    const composite = computeCanslimComposite({
      symbol,
      series,
      indicators,
      fundamentals,
      rs,
      marketTrend: ctx.marketTrend,
      params: config.canslim,
    });
    tracker.transition('Scored');

    const last = series.bars[series.bars.length - 1];
    const scored: ScoredSymbol = {
      symbol,
      latestDate: last.date,
      latestClose: last.close,
      barCount: series.bars.length,
      rs,
      rsError,
      trend,
      entrySignals,
      composite,
      missingFundamentals: missingFundamentals(fundamentals),
      stateHistory: tracker.history,
    };

    const reasons = rejectionReasons(
      { composite, rs, marketCap: fundamentals.marketCap },
      config.screening
    );
    if (reasons.length > 0) {
      tracker.transition('Rejected');
      logger.debug({ symbol, reasons }, 'Symbol rejected');
      return { ...scored, state: 'Rejected', reasons };
    }
    tracker.transition('Accepted');
    return { ...scored, state: 'Accepted' };
  } catch (error) {
    return failed(tracker, stage, error);
  }
}

export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  concurrency: number
): Promise<void> {
  let next = 0;
  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      await worker(items[index], index);
    }
  });

  await Promise.all(workers);
}

async function loadBenchmark(
  symbol: string,
  config: ScreenerConfig,
  deps: ScanDependencies,
  throttler: RequestThrottler
): Promise<{ series: PriceSeries | null; error: BenchmarkDataInsufficientError | null }> {
  const required = config.relativeStrength.periodDays + 1;
  let rows: RawPriceRow[] | null = null;
  try {
    rows = await throttler.schedule(() =>
      deps.priceProvider.getHistory(symbol, config.pipeline.lookbackDays)
    );
  } catch (error) {
    logger.error({ symbol, error: errorMessage(error) }, 'Benchmark fetch failed');
  }

  // Short benchmarks are kept: the market trend degrades and RS reports
  // the shortfall per symbol.
  const normalized = normalizePriceSeries(symbol, rows, { minBars: 1 });
  if (!normalized.ok) {
    return { series: null, error: new BenchmarkDataInsufficientError(symbol, required, 0) };
  }
  return { series: normalized.value, error: null };
}

function buildStats(outcomes: readonly SymbolOutcome[], truncated: boolean): ScanStats {
  const stats: ScanStats = {
    analyzed: outcomes.length,
    accepted: 0,
    rejected: 0,
    failed: 0,
    degradedSubScores: 0,
    truncated,
    failuresByCode: {},
  };
  for (const outcome of outcomes) {
    switch (outcome.state) {
      case 'Accepted':
        stats.accepted++;
        stats.degradedSubScores += outcome.composite.degradedCriteria.length;
        break;
      case 'Rejected':
        stats.rejected++;
        stats.degradedSubScores += outcome.composite.degradedCriteria.length;
        break;
      case 'Failed':
        stats.failed++;
        stats.failuresByCode[outcome.errorCode] = (stats.failuresByCode[outcome.errorCode] ?? 0) + 1;
        break;
    }
  }
  return stats;
}

export function rankOutcomes(outcomes: readonly SymbolOutcome[]): RankedSymbol[] {
  const rsValues = new Map<string, number>();
  for (const outcome of outcomes) {
    if (outcome.state !== 'Failed' && outcome.rs) {
      rsValues.set(outcome.symbol, outcome.rs.value);
    }
  }
  const ratings = computeRsRatings(rsValues);

  const accepted: Omit<RankedSymbol, 'rank'>[] = [];
  for (const outcome of outcomes) {
    if (outcome.state !== 'Accepted' || !outcome.rs) continue;
    accepted.push({
      symbol: outcome.symbol,
      compositeScore: outcome.composite.total,
      rsValue: outcome.rs.value,
      rsRating: ratings.get(outcome.symbol) ?? 50,
      trendScore: outcome.trend.score,
      latestClose: outcome.latestClose,
      latestSignal: lastValue(outcome.entrySignals),
      degradedCriteria: outcome.composite.degradedCriteria,
    });
  }

  return sortRankedDeterministic(accepted).map((item, index) => ({ ...item, rank: index + 1 }));
}

export async function runScan(request: ScanRequest, deps: ScanDependencies): Promise<ScanReport> {
  const { config } = request;
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const throttler = deps.throttler ?? new RequestThrottler(config.pipeline.throttleMs);

  const universe = await deps.universeSource.getUniverse(request.universe);
  const benchmarkSymbol = (
    request.benchmarkSymbol ??
    universe.benchmark ??
    config.benchmarkSymbol
  ).toUpperCase();
  const { symbolsToScore, truncated } = applySymbolLimit(
    universe.symbols,
    config.pipeline.maxSymbolsPerRun
  );
  if (truncated) {
    logger.warn(
      { total: universe.symbols.length, limit: config.pipeline.maxSymbolsPerRun },
      'Universe truncated to max_symbols_per_run'
    );
  }

  logger.info(
    {
      universe: universe.name,
      symbolCount: symbolsToScore.length,
      benchmark: benchmarkSymbol,
      maxWorkers: config.screening.maxWorkers,
    },
    'Starting scan'
  );

  const benchmark = await loadBenchmark(benchmarkSymbol, config, deps, throttler);
  const marketTrend = computeMarketTrend(
    benchmark.series,
    benchmarkSymbol,
    config.market,
    config.indicators,
    startedAt
  );
  logger.info(
    { direction: marketTrend.direction, score: marketTrend.score, degraded: marketTrend.degraded },
    'Market trend computed'
  );

  const ctx: SymbolContext = {
    config,
    benchmark: benchmark.series,
    benchmarkError: benchmark.error,
    marketTrend,
    priceProvider: deps.priceProvider,
    fundamentalsProvider: deps.fundamentalsProvider,
    throttler,
  };

  const slots: (SymbolOutcome | null)[] = symbolsToScore.map(() => null);
  await runWithConcurrency(
    symbolsToScore,
    async (symbol, index) => {
      slots[index] = await evaluateSymbol(symbol, ctx);
    },
    config.screening.maxWorkers
  );
  const outcomes = slots.filter((outcome): outcome is SymbolOutcome => outcome !== null);

  const ranked = rankOutcomes(outcomes);
  const stats = buildStats(outcomes, truncated);
  const entrySignals: Record<string, EntrySignal[]> = {};
  for (const outcome of outcomes) {
    if (outcome.state !== 'Failed' && outcome.entrySignals.length > 0) {
      entrySignals[outcome.symbol] = outcome.entrySignals;
    }
  }

  const completedAt = now();
  const scanId = `${formatDate(startedAt)}__${hashObjectShort({
    startedAt: startedAt.toISOString(),
    universe: universe.name,
    benchmark: benchmarkSymbol,
    symbols: symbolsToScore,
  }, 8)}`;

  logger.info(
    {
      scanId,
      analyzed: stats.analyzed,
      failed: stats.failed,
      rejected: stats.rejected,
      accepted: stats.accepted,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    },
    'Scan complete'
  );

  return {
    scanId,
    universe: universe.name,
    benchmark: benchmarkSymbol,
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    marketTrend,
    stats,
    ranked,
    outcomes,
    entrySignals,
  };
}
