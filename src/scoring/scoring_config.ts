/**
 * Screener configuration: typed shape, defaults, and the snake_case file
 * format it is loaded from.
 *
 * Structural checks live in schemas/screener_config.v1.schema.json; the
 * cross-field rules (weight sums, period ordering) are checked here.
 */

import { ConfigurationError } from '@/core/errors';

export const CANSLIM_CRITERIA = ['C', 'A', 'N', 'S', 'L', 'I', 'M'] as const;
export type CanslimCriterion = (typeof CANSLIM_CRITERIA)[number];
export type CanslimWeights = Record<CanslimCriterion, number>;

/** Quarter weights, most recent quarter first. */
export type QuarterWeights = [number, number, number, number];

export interface IndicatorParams {
  emaShort: number;
  emaLong: number;
  emaMedium: number;
  emaTrend: number;
  rsiPeriod: number;
  highLookback: number;
}

export interface RelativeStrengthParams {
  periodDays: number;
  quarterWeights: QuarterWeights;
}

export interface TrendParams {
  windowBars: number;
  emaShortAdherencePct: number;
  emaLongAdherencePct: number;
}

export interface EntryParams {
  recentBars: number;
  emaShortBandPct: number;
  emaLongBandPct: number;
  reclaimLookback: number;
}

export interface CanslimParams {
  weights: CanslimWeights;
  c: { growthTarget: number };
  a: {
    growthTarget: number;
    roeTarget: number;
    minYears: number;
    limitedHistoryDiscount: number;
  };
  n: {
    revenueTarget: number;
    revenueWeight: number;
    proximityWeight: number;
    proximityCap: number;
  };
  s: {
    turnoverCap: number;
    volumeSurgeRatio: number;
    breakoutProximity: number;
    powerGapLookback: number;
    powerGapPct: number;
  };
  l: { fullCreditOutperformancePct: number };
  i: { institutionalCap: number };
}

export interface MarketParams {
  bullishThreshold: number;
  bearishThreshold: number;
  minBars: number;
  slopeLookback: number;
}

export interface ScreeningThresholds {
  minMarketCap: number;
  minRsScore: number;
  minCanslimScore: number;
  maxWorkers: number;
}

export interface PipelineParams {
  minBars: number;
  lookbackDays: number;
  throttleMs: number;
  /** 0 disables the limit. */
  maxSymbolsPerRun: number;
  universeCacheTtlHours: number;
}

export interface ScreenerConfig {
  benchmarkSymbol: string;
  indicators: IndicatorParams;
  relativeStrength: RelativeStrengthParams;
  trend: TrendParams;
  entry: EntryParams;
  canslim: CanslimParams;
  market: MarketParams;
  screening: ScreeningThresholds;
  pipeline: PipelineParams;
}

export const DEFAULT_SCREENER_CONFIG: ScreenerConfig = {
  benchmarkSymbol: 'SPY',
  indicators: {
    emaShort: 8,
    emaLong: 21,
    emaMedium: 50,
    emaTrend: 200,
    rsiPeriod: 14,
    highLookback: 252,
  },
  relativeStrength: {
    periodDays: 63,
    quarterWeights: [0.4, 0.2, 0.2, 0.2],
  },
  trend: {
    windowBars: 60,
    emaShortAdherencePct: 70,
    emaLongAdherencePct: 80,
  },
  entry: {
    recentBars: 15,
    emaShortBandPct: 2,
    emaLongBandPct: 3,
    reclaimLookback: 5,
  },
  canslim: {
    weights: { C: 0.15, A: 0.15, N: 0.15, S: 0.1, L: 0.2, I: 0.1, M: 0.15 },
    c: { growthTarget: 0.25 },
    a: { growthTarget: 0.25, roeTarget: 0.17, minYears: 3, limitedHistoryDiscount: 0.85 },
    n: { revenueTarget: 0.2, revenueWeight: 0.7, proximityWeight: 0.3, proximityCap: 1.05 },
    s: {
      turnoverCap: 2.0,
      volumeSurgeRatio: 1.5,
      breakoutProximity: 0.98,
      powerGapLookback: 10,
      powerGapPct: 4,
    },
    l: { fullCreditOutperformancePct: 10 },
    i: { institutionalCap: 1.0 },
  },
  market: {
    bullishThreshold: 60,
    bearishThreshold: 40,
    minBars: 50,
    slopeLookback: 20,
  },
  screening: {
    minMarketCap: 10e9,
    minRsScore: 0,
    minCanslimScore: 70,
    maxWorkers: 3,
  },
  pipeline: {
    minBars: 200,
    lookbackDays: 400,
    throttleMs: 0,
    maxSymbolsPerRun: 0,
    universeCacheTtlHours: 24,
  },
};

export interface RawScreenerConfig {
  $schema?: string;
  benchmark_symbol?: string;
  indicators?: {
    ema_short?: number;
    ema_long?: number;
    ema_medium?: number;
    ema_trend?: number;
    rsi_period?: number;
    high_lookback?: number;
  };
  relative_strength?: {
    period_days?: number;
    quarter_weights?: number[];
  };
  trend?: {
    window_bars?: number;
    ema_short_adherence_pct?: number;
    ema_long_adherence_pct?: number;
  };
  entry?: {
    recent_bars?: number;
    ema_short_band_pct?: number;
    ema_long_band_pct?: number;
    reclaim_lookback?: number;
  };
  canslim?: {
    weights?: Partial<CanslimWeights>;
    c?: { growth_target?: number };
    a?: {
      growth_target?: number;
      roe_target?: number;
      min_years?: number;
      limited_history_discount?: number;
    };
    n?: {
      revenue_target?: number;
      revenue_weight?: number;
      proximity_weight?: number;
      proximity_cap?: number;
    };
    s?: {
      turnover_cap?: number;
      volume_surge_ratio?: number;
      breakout_proximity?: number;
      power_gap_lookback?: number;
      power_gap_pct?: number;
    };
    l?: { full_credit_outperformance_pct?: number };
    i?: { institutional_cap?: number };
  };
  market?: {
    bullish_threshold?: number;
    bearish_threshold?: number;
    min_bars?: number;
    slope_lookback?: number;
  };
  screening?: {
    min_market_cap?: number;
    min_rs_score?: number;
    min_canslim_score?: number;
    max_workers?: number;
  };
  pipeline?: {
    min_bars?: number;
    lookback_days?: number;
    throttle_ms?: number;
    max_symbols_per_run?: number;
    universe_cache_ttl_hours?: number;
  };
}

function toCanslimWeights(weights: Partial<CanslimWeights>): CanslimWeights {
  // Absent keys become NaN so collectConfigErrors reports them
  return {
    C: weights.C ?? Number.NaN,
    A: weights.A ?? Number.NaN,
    N: weights.N ?? Number.NaN,
    S: weights.S ?? Number.NaN,
    L: weights.L ?? Number.NaN,
    I: weights.I ?? Number.NaN,
    M: weights.M ?? Number.NaN,
  };
}

function toQuarterWeights(values: number[] | undefined, fallback: QuarterWeights): QuarterWeights {
  if (!values || values.length !== 4) return fallback;
  return [values[0], values[1], values[2], values[3]];
}

/**
 * Overlays a (schema-validated) raw config on the defaults.
 */
export function mergeRawConfig(
  raw: RawScreenerConfig | null,
  base: ScreenerConfig = DEFAULT_SCREENER_CONFIG
): ScreenerConfig {
  if (!raw) return structuredClone(base);

  const ind = raw.indicators ?? {};
  const rs = raw.relative_strength ?? {};
  const trend = raw.trend ?? {};
  const entry = raw.entry ?? {};
  const cs = raw.canslim ?? {};
  const market = raw.market ?? {};
  const screening = raw.screening ?? {};
  const pipeline = raw.pipeline ?? {};

  return {
    benchmarkSymbol: (raw.benchmark_symbol ?? base.benchmarkSymbol).trim().toUpperCase(),
    indicators: {
      emaShort: ind.ema_short ?? base.indicators.emaShort,
      emaLong: ind.ema_long ?? base.indicators.emaLong,
      emaMedium: ind.ema_medium ?? base.indicators.emaMedium,
      emaTrend: ind.ema_trend ?? base.indicators.emaTrend,
      rsiPeriod: ind.rsi_period ?? base.indicators.rsiPeriod,
      highLookback: ind.high_lookback ?? base.indicators.highLookback,
    },
    relativeStrength: {
      periodDays: rs.period_days ?? base.relativeStrength.periodDays,
      quarterWeights: toQuarterWeights(rs.quarter_weights, base.relativeStrength.quarterWeights),
    },
    trend: {
      windowBars: trend.window_bars ?? base.trend.windowBars,
      emaShortAdherencePct: trend.ema_short_adherence_pct ?? base.trend.emaShortAdherencePct,
      emaLongAdherencePct: trend.ema_long_adherence_pct ?? base.trend.emaLongAdherencePct,
    },
    entry: {
      recentBars: entry.recent_bars ?? base.entry.recentBars,
      emaShortBandPct: entry.ema_short_band_pct ?? base.entry.emaShortBandPct,
      emaLongBandPct: entry.ema_long_band_pct ?? base.entry.emaLongBandPct,
      reclaimLookback: entry.reclaim_lookback ?? base.entry.reclaimLookback,
    },
    canslim: {
      // The schema requires all seven keys, so a file's weights replace the defaults whole
      weights: cs.weights ? toCanslimWeights(cs.weights) : { ...base.canslim.weights },
      c: { growthTarget: cs.c?.growth_target ?? base.canslim.c.growthTarget },
      a: {
        growthTarget: cs.a?.growth_target ?? base.canslim.a.growthTarget,
        roeTarget: cs.a?.roe_target ?? base.canslim.a.roeTarget,
        minYears: cs.a?.min_years ?? base.canslim.a.minYears,
        limitedHistoryDiscount:
          cs.a?.limited_history_discount ?? base.canslim.a.limitedHistoryDiscount,
      },
      n: {
        revenueTarget: cs.n?.revenue_target ?? base.canslim.n.revenueTarget,
        revenueWeight: cs.n?.revenue_weight ?? base.canslim.n.revenueWeight,
        proximityWeight: cs.n?.proximity_weight ?? base.canslim.n.proximityWeight,
        proximityCap: cs.n?.proximity_cap ?? base.canslim.n.proximityCap,
      },
      s: {
        turnoverCap: cs.s?.turnover_cap ?? base.canslim.s.turnoverCap,
        volumeSurgeRatio: cs.s?.volume_surge_ratio ?? base.canslim.s.volumeSurgeRatio,
        breakoutProximity: cs.s?.breakout_proximity ?? base.canslim.s.breakoutProximity,
        powerGapLookback: cs.s?.power_gap_lookback ?? base.canslim.s.powerGapLookback,
        powerGapPct: cs.s?.power_gap_pct ?? base.canslim.s.powerGapPct,
      },
      l: {
        fullCreditOutperformancePct:
          cs.l?.full_credit_outperformance_pct ?? base.canslim.l.fullCreditOutperformancePct,
      },
      i: { institutionalCap: cs.i?.institutional_cap ?? base.canslim.i.institutionalCap },
    },
    market: {
      bullishThreshold: market.bullish_threshold ?? base.market.bullishThreshold,
      bearishThreshold: market.bearish_threshold ?? base.market.bearishThreshold,
      minBars: market.min_bars ?? base.market.minBars,
      slopeLookback: market.slope_lookback ?? base.market.slopeLookback,
    },
    screening: {
      minMarketCap: screening.min_market_cap ?? base.screening.minMarketCap,
      minRsScore: screening.min_rs_score ?? base.screening.minRsScore,
      minCanslimScore: screening.min_canslim_score ?? base.screening.minCanslimScore,
      maxWorkers: screening.max_workers ?? base.screening.maxWorkers,
    },
    pipeline: {
      minBars: pipeline.min_bars ?? base.pipeline.minBars,
      lookbackDays: pipeline.lookback_days ?? base.pipeline.lookbackDays,
      throttleMs: pipeline.throttle_ms ?? base.pipeline.throttleMs,
      maxSymbolsPerRun: pipeline.max_symbols_per_run ?? base.pipeline.maxSymbolsPerRun,
      universeCacheTtlHours:
        pipeline.universe_cache_ttl_hours ?? base.pipeline.universeCacheTtlHours,
    },
  };
}

export const WEIGHT_SUM_TOLERANCE = 1e-6;

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

/**
 * Cross-field rules the JSON schema cannot express. Returns every violation.
 */
export function collectConfigErrors(config: ScreenerConfig): string[] {
  const errors: string[] = [];
  const { indicators, canslim, relativeStrength, market, screening, pipeline } = config;

  if (!config.benchmarkSymbol) {
    errors.push('benchmark_symbol: must not be empty');
  }

  for (const criterion of CANSLIM_CRITERIA) {
    const weight = canslim.weights[criterion];
    if (!Number.isFinite(weight) || weight < 0) {
      errors.push(`canslim.weights.${criterion}: must be a non-negative number`);
    }
  }
  const weightSum = sum(CANSLIM_CRITERIA.map((c) => canslim.weights[c]));
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
    errors.push(`canslim.weights: must sum to 1 (got ${weightSum})`);
  }

  const quarterSum = sum(relativeStrength.quarterWeights);
  if (Math.abs(quarterSum - 1) > WEIGHT_SUM_TOLERANCE) {
    errors.push(`relative_strength.quarter_weights: must sum to 1 (got ${quarterSum})`);
  }
  if (relativeStrength.periodDays < 4) {
    errors.push('relative_strength.period_days: must be at least 4');
  }

  const nSum = canslim.n.revenueWeight + canslim.n.proximityWeight;
  if (Math.abs(nSum - 1) > WEIGHT_SUM_TOLERANCE) {
    errors.push(`canslim.n: revenue_weight + proximity_weight must equal 1 (got ${nSum})`);
  }

  if (!(indicators.emaShort < indicators.emaLong)) {
    errors.push('indicators: ema_short must be shorter than ema_long');
  }
  if (!(indicators.emaLong < indicators.emaMedium && indicators.emaMedium < indicators.emaTrend)) {
    errors.push('indicators: ema_long < ema_medium < ema_trend must hold');
  }

  if (!(market.bearishThreshold < market.bullishThreshold)) {
    errors.push('market: bearish_threshold must be below bullish_threshold');
  }

  if (!Number.isInteger(screening.maxWorkers) || screening.maxWorkers < 1) {
    errors.push('screening.max_workers: must be a positive integer');
  }
  if (!Number.isFinite(screening.minMarketCap) || screening.minMarketCap < 0) {
    errors.push('screening.min_market_cap: must be a non-negative number');
  }
  if (!Number.isFinite(screening.minRsScore)) {
    errors.push('screening.min_rs_score: must be a number');
  }
  if (
    !Number.isFinite(screening.minCanslimScore) ||
    screening.minCanslimScore < 0 ||
    screening.minCanslimScore > 100
  ) {
    errors.push('screening.min_canslim_score: must be within [0, 100]');
  }

  if (pipeline.minBars < indicators.emaTrend) {
    errors.push(
      `pipeline.min_bars: must cover the longest EMA (${indicators.emaTrend} bars)`
    );
  }
  if (pipeline.lookbackDays < pipeline.minBars) {
    errors.push('pipeline.lookback_days: must be at least pipeline.min_bars');
  }

  return errors;
}

export function assertValidConfig(config: ScreenerConfig): ScreenerConfig {
  const errors = collectConfigErrors(config);
  if (errors.length > 0) {
    throw new ConfigurationError('Invalid screener configuration', errors);
  }
  return config;
}
