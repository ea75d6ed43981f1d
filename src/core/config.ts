/**
 * Screener configuration loaded from config/screener.json
 *
 * Order of precedence: built-in defaults < config file < environment.
 * Any problem is raised as a ConfigurationError before a scan starts.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { ConfigurationError, errorMessage } from './errors';
import { getEnvConfig, type EnvConfig } from './env';
import { validateScreenerConfig } from '@/validation/ajv_instance';
import {
  assertValidConfig,
  mergeRawConfig,
  type RawScreenerConfig,
  type ScreenerConfig,
} from '@/scoring/scoring_config';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('config');

let cachedConfig: ScreenerConfig | null = null;

export function resolveConfigPath(projectRoot: string = process.cwd()): string {
  const override = process.env.SCREENER_CONFIG?.trim();
  if (override) {
    return isAbsolute(override) ? override : join(projectRoot, override);
  }
  return join(projectRoot, 'config', 'screener.json');
}

function readRawConfig(path: string): RawScreenerConfig | null {
  if (!existsSync(path)) {
    logger.debug({ path }, 'No screener config file, using defaults');
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Unreadable config file ${path}`, [errorMessage(error)]);
  }

  const result = validateScreenerConfig(parsed);
  if (!result.valid || !result.data) {
    throw new ConfigurationError(`Config file ${path} failed schema validation`, result.errors ?? []);
  }
  return result.data;
}

export function applyEnvOverrides(config: ScreenerConfig, env: EnvConfig): ScreenerConfig {
  const { screening } = env;
  return {
    ...config,
    benchmarkSymbol: env.benchmarkSymbol ?? config.benchmarkSymbol,
    screening: {
      minMarketCap: screening.minMarketCap ?? config.screening.minMarketCap,
      minRsScore: screening.minRsScore ?? config.screening.minRsScore,
      minCanslimScore: screening.minCanslimScore ?? config.screening.minCanslimScore,
      maxWorkers: screening.maxWorkers ?? config.screening.maxWorkers,
    },
  };
}

export function loadScreenerConfig(projectRoot: string = process.cwd()): ScreenerConfig {
  const path = resolveConfigPath(projectRoot);
  const merged = mergeRawConfig(readRawConfig(path));
  const config = assertValidConfig(applyEnvOverrides(merged, getEnvConfig()));

  logger.debug(
    { path, benchmark: config.benchmarkSymbol, maxWorkers: config.screening.maxWorkers },
    'Screener config loaded'
  );
  return config;
}

export function getConfig(): ScreenerConfig {
  if (!cachedConfig) {
    cachedConfig = loadScreenerConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
