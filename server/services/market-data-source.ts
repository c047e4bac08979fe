/**
 * Market Data Source
 *
 * Land prices, area yields, comparable sales and market trends for the
 * valuation approaches. Every lookup consults the cache first, then the
 * upstream, and falls back to a deterministic default when the upstream
 * fails. Lookups never reject.
 *
 * Fallback land prices and yields are not cached, so an outage heals as
 * soon as the upstream answers again. Comparable sales are synthesized and
 * market trends cache whichever answer they produced.
 */

import type {
  ComparableSale,
  LandPriceData,
  MarketTrends,
  PropertyType
} from '../../shared/schema.js';
import type { ApiSettings } from '../config/config-schema.js';
import { createLogger } from '../utils/logger.js';
import { describeError } from '../utils/result.js';
import { findRegionRule } from '../utils/region-matcher.js';
import { CACHE_TTL_HOURS, CacheStats, Clock, MarketDataCache } from './market-data-cache.js';
import { ComparableGenerator } from './comparable-generator.js';
import { DEFAULT_LAND_PRICE_PER_SQM } from './land-price-api.js';
import type { MarketUpstream } from './market-upstream.js';

const log = createLogger('MarketData');

export const NEUTRAL_MARKET_TRENDS: MarketTrends = {
  priceTrend: 'flat',
  demandLevel: 'medium',
  supplyLevel: 'medium',
  outlook: 'stable',
  confidence: 'low'
};

export interface MarketDataSourceOptions {
  upstream: MarketUpstream;
  settings: ApiSettings;
  comparableGenerator?: ComparableGenerator;
  clock?: Clock;
}

export class MarketDataSource {
  private readonly upstream: MarketUpstream;
  private readonly settings: ApiSettings;
  private readonly comparableGenerator: ComparableGenerator;

  private readonly landPriceCache: MarketDataCache<LandPriceData>;
  private readonly areaYieldCache: MarketDataCache<number>;
  private readonly comparablesCache: MarketDataCache<ComparableSale[]>;
  private readonly trendsCache: MarketDataCache<MarketTrends>;

  constructor(options: MarketDataSourceOptions) {
    this.upstream = options.upstream;
    this.settings = options.settings;
    this.comparableGenerator = options.comparableGenerator ?? new ComparableGenerator();

    const clock = options.clock ?? Date.now;
    this.landPriceCache = new MarketDataCache<LandPriceData>(clock);
    this.areaYieldCache = new MarketDataCache<number>(clock);
    this.comparablesCache = new MarketDataCache<ComparableSale[]>(clock);
    this.trendsCache = new MarketDataCache<MarketTrends>(clock);
  }

  async landPrice(address: string): Promise<LandPriceData> {
    const key = MarketDataCache.makeKey('land_price', { address });
    const cached = this.landPriceCache.get(key);
    if (cached.hit) return { ...cached.value };

    try {
      const result = await this.upstream.fetchLandPrice(address);
      this.landPriceCache.set(key, result, CACHE_TTL_HOURS.land_price);
      return { ...result };
    } catch (error) {
      const reason = describeError(error);
      log.warn(`⚠️ Land price upstream failed for "${address}", using default: ${reason}`);
      return { pricePerSqm: DEFAULT_LAND_PRICE_PER_SQM, source: 'default', error: reason };
    }
  }

  async areaYieldRate(address: string): Promise<number> {
    const key = MarketDataCache.makeKey('area_yield', { address });
    const cached = this.areaYieldCache.get(key);
    if (cached.hit) return cached.value;

    try {
      const rate = await this.upstream.fetchAreaYield(address);
      this.areaYieldCache.set(key, rate, CACHE_TTL_HOURS.area_yield);
      return rate;
    } catch (error) {
      const fallback = this.defaultYieldFor(address);
      log.warn(`⚠️ Area yield upstream failed for "${address}", using ${fallback}%: ${describeError(error)}`);
      return fallback;
    }
  }

  /**
   * Region default from the settings table, or the national default
   */
  defaultYieldFor(address: string): number {
    const { defaultRates, nationalDefault } = this.settings.estimation.yield;
    return findRegionRule(address, defaultRates)?.rate ?? nationalDefault;
  }

  async comparableSales(
    lat: number,
    lon: number,
    propertyType: PropertyType,
    buildingAge: number,
    floorArea: number
  ): Promise<ComparableSale[]> {
    const key = MarketDataCache.makeKey('comparable_sales', {
      lat,
      lon,
      type: propertyType,
      age: buildingAge,
      area: floorArea
    });
    const cached = this.comparablesCache.get(key);
    if (cached.hit) return [...cached.value];

    const sales = this.comparableGenerator.generate({ lat, lon, propertyType, buildingAge, floorArea });
    this.comparablesCache.set(key, sales, CACHE_TTL_HOURS.comparable_sales);
    log.debug(`🏘️ Generated ${sales.length} comparable sales near (${lat}, ${lon})`);
    return [...sales];
  }

  async marketTrends(address: string, propertyType: PropertyType): Promise<MarketTrends> {
    const key = MarketDataCache.makeKey('market_trends', { address, type: propertyType });
    const cached = this.trendsCache.get(key);
    if (cached.hit) return { ...cached.value };

    let trends: MarketTrends;
    try {
      trends = await this.upstream.fetchMarketTrends(address, propertyType);
    } catch (error) {
      const reason = describeError(error);
      log.warn(`⚠️ Market trends upstream failed for "${address}": ${reason}`);
      trends = { ...NEUTRAL_MARKET_TRENDS, error: reason };
    }
    this.trendsCache.set(key, trends, CACHE_TTL_HOURS.market_trends);
    return { ...trends };
  }

  getCacheStats(): Record<string, CacheStats> {
    return {
      land_price: this.landPriceCache.getStats(),
      area_yield: this.areaYieldCache.getStats(),
      comparable_sales: this.comparablesCache.getStats(),
      market_trends: this.trendsCache.getStats()
    };
  }

  clearCache(): void {
    this.landPriceCache.clear();
    this.areaYieldCache.clear();
    this.comparablesCache.clear();
    this.trendsCache.clear();
  }
}
