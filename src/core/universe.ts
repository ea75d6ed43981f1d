/**
 * Ticker universe sources.
 *
 * Universes are JSON packs under config/universes/. The cached source keeps
 * the resolved symbol list in the TTL cache so repeated scans within the TTL
 * do not re-read (or, for remote sources, re-download) the list.
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { basename, isAbsolute, join } from 'path';
import { DataUnavailableError } from './errors';
import { hoursToSeconds } from './time';
import type { CacheProvider } from '@/data/repositories/cache_repo';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('universe');

export interface UniverseConfig {
  name: string;
  description: string;
  benchmark: string | null;
  symbols: string[];
}

export interface UniverseSource {
  getUniverse(selector: string): Promise<UniverseConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Uppercases and dedupes symbols, keeping first-seen order.
 */
export function normalizeSymbols(symbols: unknown): string[] {
  if (!Array.isArray(symbols)) return [];
  const normalized: string[] = [];
  const seen = new Set<string>();
  for (const sym of symbols) {
    if (typeof sym !== 'string') continue;
    const upper = sym.trim().toUpperCase();
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      normalized.push(upper);
    }
  }
  return normalized;
}

export function normalizeUniverse(raw: unknown, fallbackName: string): UniverseConfig {
  const parsed = isRecord(raw) ? raw : {};
  return {
    name: typeof parsed.name === 'string' ? parsed.name : fallbackName,
    description: typeof parsed.description === 'string' ? parsed.description : '',
    benchmark:
      typeof parsed.benchmark === 'string' && parsed.benchmark.trim()
        ? parsed.benchmark.trim().toUpperCase()
        : null,
    symbols: normalizeSymbols(parsed.symbols),
  };
}

export class ConfigUniverseSource implements UniverseSource {
  constructor(private readonly projectRoot: string = process.cwd()) {}

  resolvePath(selector: string): string | null {
    const universeDir = join(this.projectRoot, 'config', 'universes');
    const candidates = isAbsolute(selector)
      ? [selector]
      : [
          join(this.projectRoot, selector),
          join(universeDir, selector),
          join(universeDir, `${selector}.json`),
        ];
    const direct = candidates.find((path) => path.endsWith('.json') && existsSync(path));
    if (direct) return direct;

    // Fall back to matching the pack's display name
    if (!existsSync(universeDir)) return null;
    const wanted = selector.trim().toLowerCase();
    for (const file of readdirSync(universeDir).filter((f) => f.endsWith('.json'))) {
      const path = join(universeDir, file);
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (isRecord(parsed) && typeof parsed.name === 'string' && parsed.name.trim().toLowerCase() === wanted) {
        return path;
      }
    }
    return null;
  }

  async getUniverse(selector: string): Promise<UniverseConfig> {
    const path = this.resolvePath(selector);
    if (!path) {
      throw new DataUnavailableError(selector, `Universe "${selector}" not found`);
    }
    const universe = normalizeUniverse(
      JSON.parse(readFileSync(path, 'utf-8')),
      basename(path, '.json')
    );
    if (universe.symbols.length === 0) {
      throw new DataUnavailableError(selector, `Universe "${selector}" has no symbols`);
    }
    logger.debug({ selector, path, count: universe.symbols.length }, 'Universe loaded');
    return universe;
  }
}

/**
 * Explicit symbol list, used by the CLI's --symbols flag and by tests.
 */
export class StaticUniverseSource implements UniverseSource {
  constructor(private readonly universe: UniverseConfig) {}

  async getUniverse(): Promise<UniverseConfig> {
    return { ...this.universe, symbols: normalizeSymbols(this.universe.symbols) };
  }
}

export class CachedUniverseSource implements UniverseSource {
  constructor(
    private readonly inner: UniverseSource,
    private readonly cache: CacheProvider,
    private readonly ttlHours: number = 24
  ) {}

  static cacheKey(selector: string): string {
    return `universe:${selector.trim().toLowerCase()}`;
  }

  async getUniverse(selector: string): Promise<UniverseConfig> {
    const key = CachedUniverseSource.cacheKey(selector);
    const cached = this.cache.get(key);
    if (cached !== null) {
      const universe = normalizeUniverse(cached, selector);
      if (universe.symbols.length > 0) {
        logger.debug({ selector, count: universe.symbols.length }, 'Universe cache hit');
        return universe;
      }
    }

    const universe = await this.inner.getUniverse(selector);
    if (this.ttlHours > 0) {
      this.cache.set(key, universe, hoursToSeconds(this.ttlHours));
    }
    return universe;
  }
}
