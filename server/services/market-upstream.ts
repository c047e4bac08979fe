/**
 * Market Upstream
 *
 * The remote sources behind MarketDataSource. Every method may reject; the
 * source turns rejections into fallback values.
 */

import type { LandPriceData, MarketTrends, PropertyType } from '../../shared/schema.js';
import type { ApiSettings } from '../config/config-schema.js';
import { findRegionRule } from '../utils/region-matcher.js';
import { LandPriceApiClient } from './land-price-api.js';

export interface MarketUpstream {
  fetchLandPrice(address: string): Promise<LandPriceData>;
  fetchAreaYield(address: string): Promise<number>;
  fetchMarketTrends(address: string, propertyType: PropertyType): Promise<MarketTrends>;
}

/**
 * Default upstream: land prices from the government API client, area yields
 * and market trends from the configured survey tables.
 */
export class SurveyMarketUpstream implements MarketUpstream {
  private landPriceApi: LandPriceApiClient;

  constructor(
    private readonly settings: ApiSettings,
    landPriceApi?: LandPriceApiClient
  ) {
    this.landPriceApi = landPriceApi ?? new LandPriceApiClient(settings.dataSources.landPriceApi);
  }

  async fetchLandPrice(address: string): Promise<LandPriceData> {
    return this.landPriceApi.fetchLandPrice(address);
  }

  async fetchAreaYield(address: string): Promise<number> {
    const { surveyRates, nationalDefault } = this.settings.estimation.yield;
    return findRegionRule(address, surveyRates)?.rate ?? nationalDefault;
  }

  // TODO: split trends by property type once the survey tables carry per-type rows
  async fetchMarketTrends(address: string, _propertyType: PropertyType): Promise<MarketTrends> {
    const { rules } = this.settings.estimation.marketTrends;
    const rule = findRegionRule(address, rules);
    return { ...(rule?.trends ?? this.settings.estimation.marketTrends.default) };
  }
}
