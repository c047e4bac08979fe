import type { ComparableSale, PropertyType } from '../../shared/schema.js';
import { RandomSource, defaultRandom, randomInt, uniform } from '../utils/random-source.js';
import { roundToDecimals } from '../utils/numbers.js';

// Typical transaction price per m² for a new building of each type
export const BASE_PRICE_PER_SQM: Record<PropertyType, number> = {
  apartment: 600_000,
  house: 500_000,
  small_building: 700_000
};

const AGE_DISCOUNT_PER_YEAR = 0.015;
const MIN_AGE_FACTOR = 0.3;
const MIN_DISTANCE_FACTOR = 0.9;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ComparableQuery {
  lat: number;
  lon: number;
  propertyType: PropertyType;
  buildingAge: number;
  floorArea: number;
}

/**
 * Synthesizes a neighbourhood of recent sales around the subject property.
 * Coordinates are accepted for a future radius filter but do not shape the output.
 */
export class ComparableGenerator {
  constructor(
    private readonly random: RandomSource = defaultRandom,
    private readonly now: () => Date = () => new Date()
  ) {}

  generate(query: ComparableQuery): ComparableSale[] {
    const base = BASE_PRICE_PER_SQM[query.propertyType];
    const agedPricePerSqm = base * Math.max(MIN_AGE_FACTOR, 1 - query.buildingAge * AGE_DISCOUNT_PER_YEAR);
    const count = randomInt(this.random, 3, 8);

    const sales: ComparableSale[] = [];
    for (let i = 0; i < count; i++) {
      sales.push(this.buildOne(i, query, agedPricePerSqm));
    }
    return sales.sort((a, b) => a.distance - b.distance);
  }

  private buildOne(index: number, query: ComparableQuery, agedPricePerSqm: number): ComparableSale {
    const area = query.floorArea * uniform(this.random, 0.8, 1.3);
    const age = query.buildingAge + randomInt(this.random, -3, 5);
    const distance = randomInt(this.random, 100, 800);
    const distanceFactor = Math.max(MIN_DISTANCE_FACTOR, 1 - (distance / 1000) * 0.05);
    const pricePerSqm = agedPricePerSqm * distanceFactor * uniform(this.random, 0.9, 1.1);
    const daysAgo = randomInt(this.random, 30, 365);

    return {
      id: `comp_${String(index + 1).padStart(3, '0')}`,
      price: Math.trunc(pricePerSqm * area),
      floorArea: roundToDecimals(area, 1),
      buildingAge: Math.max(0, age),
      distance,
      saleDate: new Date(this.now().getTime() - daysAgo * DAY_MS).toISOString().slice(0, 10),
      propertyType: query.propertyType,
      pricePerSqm: Math.trunc(pricePerSqm)
    };
  }
}
