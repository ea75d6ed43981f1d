import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DataUnavailableError } from '@/core/errors';
import {
  CachedUniverseSource,
  ConfigUniverseSource,
  StaticUniverseSource,
  normalizeSymbols,
  type UniverseConfig,
} from '@/core/universe';
import { IN_MEMORY, openDatabase } from '@/data/db';
import { SqliteCacheProvider } from '@/data/repositories/cache_repo';

describe('SqliteCacheProvider', () => {
  let db: Database.Database;
  let clock: number;
  let cache: SqliteCacheProvider;

  beforeEach(() => {
    db = openDatabase(IN_MEMORY);
    clock = 1_700_000_000_000;
    cache = new SqliteCacheProvider(db, () => clock);
  });

  afterEach(() => {
    db.close();
  });

  it('returns stored values until the TTL elapses', () => {
    cache.set('k', { symbols: ['AAA'] }, 60);
    clock += 59_999;
    expect(cache.get('k')).toEqual({ symbols: ['AAA'] });
    clock += 1;
    expect(cache.get('k')).toBeNull();
  });

  it('counts hits and overwrites on set', () => {
    cache.set('k', 1, 60);
    cache.get('k');
    cache.get('k');
    expect(cache.getEntry('k')?.hitCount).toBe(2);

    clock += 1000;
    cache.set('k', 2, 120);
    expect(cache.get('k')).toBe(2);
    expect(cache.getEntry('k')).toEqual({ key: 'k', lastUpdated: clock, ttlSeconds: 120, hitCount: 3 });
  });

  it('invalidates and cleans up expired entries', () => {
    cache.set('a', 'x', 10);
    cache.set('b', 'y', 1000);
    cache.invalidate('b');
    expect(cache.get('b')).toBeNull();

    cache.set('c', 'z', 1000);
    clock += 10_000;
    expect(cache.cleanupExpired()).toBe(1);
    expect(cache.getEntry('a')).toBeNull();
    expect(cache.get('c')).toBe('z');
  });
});

describe('normalizeSymbols', () => {
  it('uppercases, trims and dedupes in first-seen order', () => {
    expect(normalizeSymbols([' aapl', 'MSFT', 'AAPL', '', 42, 'nvda'])).toEqual(['AAPL', 'MSFT', 'NVDA']);
    expect(normalizeSymbols('AAPL')).toEqual([]);
  });
});

describe('ConfigUniverseSource', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'screener-universe-'));
    mkdirSync(join(root, 'config', 'universes'), { recursive: true });
    writeFileSync(
      join(root, 'config', 'universes', 'growth.json'),
      JSON.stringify({ name: 'Growth Leaders', benchmark: 'qqq', symbols: ['nvda', 'meta', 'NVDA'] })
    );
    writeFileSync(join(root, 'config', 'universes', 'empty.json'), JSON.stringify({ symbols: [] }));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('loads a pack by file name', async () => {
    const universe = await new ConfigUniverseSource(root).getUniverse('growth');
    expect(universe).toEqual({
      name: 'Growth Leaders',
      description: '',
      benchmark: 'QQQ',
      symbols: ['NVDA', 'META'],
    });
  });

  it('loads a pack by display name', async () => {
    const universe = await new ConfigUniverseSource(root).getUniverse('growth leaders');
    expect(universe.symbols).toEqual(['NVDA', 'META']);
  });

  it('fails for unknown or empty universes', async () => {
    const source = new ConfigUniverseSource(root);
    await expect(source.getUniverse('missing')).rejects.toBeInstanceOf(DataUnavailableError);
    await expect(source.getUniverse('empty')).rejects.toThrow('Universe "empty" has no symbols');
  });
});

describe('CachedUniverseSource', () => {
  const universe: UniverseConfig = {
    name: 'test',
    description: 'made-up symbols',
    benchmark: 'SPY',
    symbols: ['AAA', 'BBB'],
  };

  it('reads the inner source once within the TTL', async () => {
    const db = openDatabase(IN_MEMORY);
    let clock = 0;
    const cache = new SqliteCacheProvider(db, () => clock);
    const inner = new StaticUniverseSource(universe);
    const spy = vi.spyOn(inner, 'getUniverse');
    const source = new CachedUniverseSource(inner, cache, 1);

    expect(await source.getUniverse('Test')).toEqual(universe);
    expect(await source.getUniverse('test')).toEqual(universe);
    expect(spy).toHaveBeenCalledTimes(1);

    clock += 3_600_000;
    await source.getUniverse('test');
    expect(spy).toHaveBeenCalledTimes(2);
    db.close();
  });

  it('skips caching when the TTL is zero', async () => {
    const db = openDatabase(IN_MEMORY);
    const cache = new SqliteCacheProvider(db);
    const source = new CachedUniverseSource(new StaticUniverseSource(universe), cache, 0);
    await source.getUniverse('test');
    expect(cache.get(CachedUniverseSource.cacheKey('test'))).toBeNull();
    db.close();
  });
});
