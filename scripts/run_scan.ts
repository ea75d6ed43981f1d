/**
 * Scan Script
 * Scores a universe against its benchmark and prints the ranked opportunities
 *
 * Usage: npx tsx scripts/run_scan.ts [--universe=default] [--benchmark=SPY]
 *        [--symbols=AAPL,MSFT] [--out=data/scans] [--no-write]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

import { getConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { ScreenerError, errorMessage } from '../src/core/errors';
import {
  CachedUniverseSource,
  ConfigUniverseSource,
  StaticUniverseSource,
  normalizeSymbols,
  type UniverseSource,
} from '../src/core/universe';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { SqliteCacheProvider } from '../src/data/repositories/cache_repo';
import { createProvider } from '../src/providers/registry';
import { runScan } from '../src/scoring/engine';
import { formatScanSummary } from '../src/run/summary';
import { writeScanReport } from '../src/run/writer';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_scan');

interface ScanCliArgs {
  universe: string;
  benchmark?: string;
  symbols: string[];
  outDir?: string;
  write: boolean;
}

function readFlag(name: string): string | undefined {
  const arg = process.argv.find((candidate) => candidate.startsWith(`--${name}=`));
  const value = arg?.slice(name.length + 3).trim();
  return value ? value : undefined;
}

function parseArgs(): ScanCliArgs {
  return {
    universe: readFlag('universe') ?? getEnvConfig().universe ?? 'default',
    benchmark: readFlag('benchmark')?.toUpperCase(),
    symbols: normalizeSymbols((readFlag('symbols') ?? '').split(',')),
    outDir: readFlag('out'),
    write: !process.argv.includes('--no-write'),
  };
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = getConfig();
  const provider = createProvider();
  const db = initializeDatabase();

  try {
    const universeSource: UniverseSource =
      args.symbols.length > 0
        ? new StaticUniverseSource({
            name: 'command line',
            description: '',
            benchmark: null,
            symbols: args.symbols,
          })
        : new CachedUniverseSource(
            new ConfigUniverseSource(),
            new SqliteCacheProvider(db),
            config.pipeline.universeCacheTtlHours
          );

    const report = await runScan(
      { universe: args.universe, benchmarkSymbol: args.benchmark, config },
      { priceProvider: provider, fundamentalsProvider: provider, universeSource }
    );

    for (const line of formatScanSummary(report)) {
      console.log(line);
    }

    if (args.write) {
      const { filePath } = writeScanReport(report, args.outDir ? resolve(args.outDir) : undefined);
      console.log(`Report: ${filePath}`);
    }
  } finally {
    provider.close();
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ScreenerError) {
    logger.error({ code: error.code, error: error.message }, 'Scan aborted');
  } else {
    logger.error({ error: errorMessage(error) }, 'Scan failed');
  }
  process.exitCode = 1;
});
