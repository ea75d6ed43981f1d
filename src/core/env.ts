/**
 * Environment variable handling with validation
 */

import { ConfigurationError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

/** Threshold overrides accepted from the environment. */
export interface ScreeningEnvOverrides {
  minMarketCap?: number;
  minRsScore?: number;
  minCanslimScore?: number;
  maxWorkers?: number;
}

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
  benchmarkSymbol: string | null;
  universe: string | null;
  dataDir: string | null;
  cacheDbPath: string | null;
  screening: ScreeningEnvOverrides;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseNumberVar(name: string, errors: string[], integer = false): number | undefined {
  const raw = getEnvVar(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    errors.push(`${name}: expected ${integer ? 'an integer' : 'a number'}, got "${raw}"`);
    return undefined;
  }
  return value;
}

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const errors: string[] = [];
  const screening: ScreeningEnvOverrides = {
    minMarketCap: parseNumberVar('MIN_MARKET_CAP', errors),
    minRsScore: parseNumberVar('MIN_RS_SCORE', errors),
    minCanslimScore: parseNumberVar('MIN_CANSLIM_SCORE', errors),
    maxWorkers: parseNumberVar('MAX_WORKERS', errors, true),
  };
  if (errors.length > 0) {
    throw new ConfigurationError('Invalid environment', errors);
  }

  return {
    logLevel: pick(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pick(getEnvVar('NODE_ENV'), NODE_ENVS, 'development'),
    benchmarkSymbol: getEnvVar('BENCHMARK_SYMBOL')?.toUpperCase() ?? null,
    universe: getEnvVar('UNIVERSE') ?? null,
    dataDir: getEnvVar('SCREENER_DATA_DIR') ?? null,
    cacheDbPath: getEnvVar('SCREENER_CACHE_DB') ?? null,
    screening,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
