/**
 * Comparable Sales Approach
 *
 * Prices the subject from nearby sales, each adjusted for floor area,
 * building age and distance before averaging.
 */

import type { ComparableSale, ConfidenceLabel, Coordinates, PropertyDescriptor } from '../../../shared/schema.js';
import { EstimationErrorKind, estimationError } from '../../utils/estimation-errors.js';
import { createLogger } from '../../utils/logger.js';
import { mean, roundToUnit, upperMedian } from '../../utils/numbers.js';
import { Result, describeError, err } from '../../utils/result.js';
import type { GeocodeError, Geocoder } from '../geocoder.js';
import type { MarketDataSource } from '../market-data-source.js';
import {
  ComparableResult,
  MIN_COMPARABLE_PROPERTIES,
  ValuationApproach,
  buildingAgeOf
} from './types.js';

const log = createLogger('ComparableApproach');

const AGE_ADJUSTMENT_PER_YEAR = 0.01;
const DISTANCE_DECAY_PER_KM = 0.05;
const MIN_DISTANCE_FACTOR = 0.95;
const REPORTED_COMPARABLES = 5;

export function adjustComparablePrice(sale: ComparableSale, subjectArea: number, subjectAge: number): number {
  const areaRatio = sale.floorArea > 0 ? subjectArea / sale.floorArea : 1;
  const ageFactor = 1 - (sale.buildingAge - subjectAge) * AGE_ADJUSTMENT_PER_YEAR;
  const distanceFactor = Math.max(MIN_DISTANCE_FACTOR, 1 - (sale.distance / 1000) * DISTANCE_DECAY_PER_KM);
  return sale.price * areaRatio * ageFactor * distanceFactor;
}

function confidenceFor(count: number): ConfidenceLabel {
  if (count >= 5) return 'high';
  if (count >= 3) return 'medium';
  return 'low';
}

export class ComparableApproach implements ValuationApproach<ComparableResult> {
  readonly method = 'comparable' as const;

  constructor(
    private readonly marketData: Pick<MarketDataSource, 'comparableSales'>,
    private readonly geocoder: Geocoder,
    private readonly now: () => Date = () => new Date()
  ) {}

  async estimate(property: PropertyDescriptor): Promise<ComparableResult> {
    if (!property.address) {
      return this.fail(EstimationErrorKind.INPUT_MISSING, 'address is required for the comparable method', 0);
    }

    let located: Result<Coordinates, GeocodeError>;
    try {
      located = await this.geocoder.geocode(property.address);
    } catch (error) {
      located = err<GeocodeError>({ kind: 'service_unavailable', message: describeError(error) });
    }
    if (!located.ok) {
      log.warn(`📍 Geocoding failed for "${property.address}": ${located.error.message}`);
      return this.fail(
        EstimationErrorKind.GEOCODING_FAILURE,
        `could not resolve coordinates (${located.error.kind}): ${located.error.message}`,
        0
      );
    }

    const subjectAge = buildingAgeOf(property.constructionYear, this.now());
    const { lat, lon } = located.value;
    const sales = await this.marketData.comparableSales(
      lat,
      lon,
      property.propertyType,
      subjectAge,
      property.floorArea
    );

    if (sales.length < MIN_COMPARABLE_PROPERTIES) {
      return this.fail(
        EstimationErrorKind.INSUFFICIENT_DATA,
        `not enough comparable sales (found ${sales.length}, need ${MIN_COMPARABLE_PROPERTIES})`,
        sales.length
      );
    }

    const adjusted = sales.map((sale) => adjustComparablePrice(sale, property.floorArea, subjectAge));
    const nearest = [...sales].sort((a, b) => a.distance - b.distance).slice(0, REPORTED_COMPARABLES);

    return {
      method: this.method,
      estimatedPrice: roundToUnit(mean(adjusted)),
      confidence: confidenceFor(adjusted.length),
      comparableCount: adjusted.length,
      priceRange: {
        min: roundToUnit(Math.min(...adjusted)),
        max: roundToUnit(Math.max(...adjusted)),
        median: roundToUnit(upperMedian(adjusted))
      },
      comparables: nearest
    };
  }

  private fail(kind: EstimationErrorKind, message: string, comparableCount: number): ComparableResult {
    return {
      method: this.method,
      estimatedPrice: null,
      confidence: 'low',
      error: estimationError(kind, message),
      comparableCount
    };
  }
}
