/**
 * Market-Based Approach
 *
 * Land value (price per m² × floor area) plus the depreciated replacement
 * cost of the building.
 */

import type { LandPriceData, PropertyDescriptor, PropertyType } from '../../../shared/schema.js';
import { EstimationErrorKind, estimationError } from '../../utils/estimation-errors.js';
import { createLogger } from '../../utils/logger.js';
import { roundToUnit } from '../../utils/numbers.js';
import { describeError } from '../../utils/result.js';
import type { MarketDataSource } from '../market-data-source.js';
import { MarketResult, ValuationApproach, buildingAgeOf } from './types.js';

const log = createLogger('MarketApproach');

// Replacement cost per m² of a new building
export const BUILDING_BASE_COST_PER_SQM: Record<PropertyType, number> = {
  apartment: 180_000,
  house: 200_000,
  small_building: 250_000
};

const DEPRECIATION_PER_YEAR = 0.02;
const MIN_REMAINING_RATIO = 0.2;

export function estimateBuildingValue(propertyType: PropertyType, floorArea: number, buildingAge: number): number {
  const newValue = BUILDING_BASE_COST_PER_SQM[propertyType] * floorArea;
  const remaining = Math.max(MIN_REMAINING_RATIO, 1 - buildingAge * DEPRECIATION_PER_YEAR);
  return Math.round(newValue * remaining);
}

export class MarketApproach implements ValuationApproach<MarketResult> {
  readonly method = 'market_based' as const;

  constructor(
    private readonly marketData: Pick<MarketDataSource, 'landPrice'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async estimate(property: PropertyDescriptor): Promise<MarketResult> {
    if (!property.address) {
      return this.fail(EstimationErrorKind.INPUT_MISSING, 'address is required for the market method');
    }

    let landPrice: LandPriceData;
    try {
      landPrice = await this.marketData.landPrice(property.address);
    } catch (error) {
      log.error(`❌ Land price lookup failed for "${property.address}":`, error);
      return this.fail(EstimationErrorKind.UPSTREAM_UNAVAILABLE, `land price lookup failed: ${describeError(error)}`);
    }

    const age = buildingAgeOf(property.constructionYear, this.now());
    const buildingValue = estimateBuildingValue(property.propertyType, property.floorArea, age);
    const landComponent = landPrice.pricePerSqm * property.floorArea;

    return {
      method: this.method,
      estimatedPrice: roundToUnit(landComponent + buildingValue),
      confidence: landPrice.source === 'default' ? 'low' : 'medium',
      landPricePerSqm: landPrice.pricePerSqm,
      buildingValue,
      landPriceSource: landPrice.source
    };
  }

  private fail(kind: EstimationErrorKind, message: string): MarketResult {
    return {
      method: this.method,
      estimatedPrice: null,
      confidence: 'low',
      error: estimationError(kind, message)
    };
  }
}
