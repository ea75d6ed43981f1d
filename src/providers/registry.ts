import { ConfigurationError } from '@/core/errors';
import { LocalFileMarketDataProvider } from './local_file_provider';
import type { MarketDataProvider, ProviderType } from './types';

const PROVIDER_TYPES: readonly ProviderType[] = ['local'];

/**
 * Create market data provider based on ENV configuration.
 *
 * ENV:
 * - MARKET_DATA_PROVIDER: 'local'
 * - SCREENER_DATA_DIR: root of the local provider's files (default ./data)
 *
 * Default: 'local'
 */
export function createProvider(providerType?: string): MarketDataProvider {
  const requested = providerType || process.env.MARKET_DATA_PROVIDER || 'local';
  const type = PROVIDER_TYPES.find((candidate) => candidate === requested);

  switch (type) {
    case 'local':
      return new LocalFileMarketDataProvider(process.env.SCREENER_DATA_DIR?.trim() || undefined);
    default:
      throw new ConfigurationError(`Unknown provider type: ${requested}`);
  }
}
