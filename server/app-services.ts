/**
 * Service wiring shared by the HTTP server, the MCP server and the tests.
 */

import * as path from 'path';
import type { AppConfig } from './config/app-config.js';
import type { ApiSettings } from './config/config-schema.js';
import { configRegistry } from './config/config-registry.js';
import { ComparableGenerator } from './services/comparable-generator.js';
import { Geocoder, NominatimGeocoder, RegionGeocoder } from './services/geocoder.js';
import type { Clock } from './services/market-data-cache.js';
import { MarketDataSource } from './services/market-data-source.js';
import { MarketUpstream, SurveyMarketUpstream } from './services/market-upstream.js';
import { PriceEstimator } from './services/price-estimator.js';
import { ToolDispatcher } from './services/tool-dispatcher.js';
import { ComparableApproach } from './services/valuation/comparable-approach.js';
import { MarketApproach } from './services/valuation/market-approach.js';
import { YieldApproach } from './services/valuation/yield-approach.js';
import { IStorage, MemStorage } from './storage.js';
import { createLogger } from './utils/logger.js';
import { RandomSource, defaultRandom } from './utils/random-source.js';

const log = createLogger('Bootstrap');

export interface AppServices {
  settings: ApiSettings;
  storage: IStorage;
  marketData: MarketDataSource;
  estimator: PriceEstimator;
  dispatcher: ToolDispatcher;
}

export interface ServiceOptions {
  settings: ApiSettings;
  geocoder: Geocoder;
  upstream?: MarketUpstream;
  storage?: IStorage;
  random?: RandomSource;
  now?: () => Date;
  clock?: Clock;
}

export function createAppServices(options: ServiceOptions): AppServices {
  const now = options.now ?? (() => new Date());
  const storage = options.storage ?? new MemStorage(now);

  const marketData = new MarketDataSource({
    upstream: options.upstream ?? new SurveyMarketUpstream(options.settings),
    settings: options.settings,
    comparableGenerator: new ComparableGenerator(options.random ?? defaultRandom, now),
    clock: options.clock
  });

  const estimator = new PriceEstimator(
    {
      comparable: new ComparableApproach(marketData, options.geocoder, now),
      yield_based: new YieldApproach(marketData),
      market_based: new MarketApproach(marketData, now)
    },
    marketData,
    now
  );

  return {
    settings: options.settings,
    storage,
    marketData,
    estimator,
    dispatcher: new ToolDispatcher(storage, estimator, now)
  };
}

export async function createGeocoder(config: AppConfig): Promise<Geocoder> {
  if (config.GEOCODER_PROVIDER === 'nominatim') {
    log.info(`🌐 Geocoding with Nominatim at ${config.NOMINATIM_URL}`);
    return new NominatimGeocoder(config.NOMINATIM_URL, config.GEOCODER_TIMEOUT_MS);
  }
  const centroidsPath = path.join(process.cwd(), 'data', 'region-centroids.json');
  log.info(`🗺️ Geocoding with region centroids from ${centroidsPath}`);
  return RegionGeocoder.fromFile(centroidsPath);
}

export async function bootstrapServices(config: AppConfig): Promise<AppServices> {
  await configRegistry.initialize(config);
  const geocoder = await createGeocoder(config);
  return createAppServices({ settings: configRegistry.getSettings(), geocoder });
}
