/**
 * Price Estimator
 *
 * Runs the requested valuation approaches side by side and folds their
 * results into one weighted price, a numeric confidence score and an ordered
 * list of recommendations. An approach that cannot price the property only
 * drops out of the average; when none can, the result is returned with a
 * null price and a zero score.
 */

import {
  ComparableSale,
  ConfidenceLabel,
  EstimationMethod,
  EstimationMethodsInput,
  LandPriceData,
  MarketTrends,
  PropertyDescriptor,
  PropertyType,
  estimationMethods
} from '../../shared/schema.js';
import { EstimationError, EstimationErrorKind, estimationError } from '../utils/estimation-errors.js';
import { createLogger } from '../utils/logger.js';
import { coefficientOfVariation, roundToUnit } from '../utils/numbers.js';
import { describeError } from '../utils/result.js';
import type { MarketDataSource } from './market-data-source.js';
import type {
  ApproachResult,
  ComparableResult,
  MarketResult,
  ValuationApproach,
  ValuationApproaches,
  YieldResult
} from './valuation/types.js';

const log = createLogger('PriceEstimator');

export const METHOD_WEIGHTS: Record<EstimationMethod, number> = {
  comparable: 0.4,
  yield_based: 0.4,
  market_based: 0.2
};

export interface MethodEstimates {
  comparable?: ComparableResult;
  yield_based?: YieldResult;
  market_based?: MarketResult;
}

export interface FinalEstimate {
  price: number | null;
  methodsUsed: EstimationMethod[];
  confidence: ConfidenceLabel;
}

export interface EstimationResult {
  propertyId: string;
  estimationDate: string;
  estimationMethods: EstimationMethod[];
  estimates: MethodEstimates;
  finalEstimate: FinalEstimate;
  confidenceScore: number;
  recommendations: string[];
  error?: EstimationError;
  // Flattened fields for simple callers
  confidence: ConfidenceLabel;
  recommendation: string;
}

/**
 * "all", an absent list or an empty list mean every method.
 * Duplicates are dropped and the canonical order is kept.
 */
export function normalizeMethods(methods?: EstimationMethodsInput): EstimationMethod[] {
  if (methods === undefined || methods === 'all' || methods.length === 0) {
    return [...estimationMethods];
  }
  const requested = new Set(methods);
  return estimationMethods.filter((method) => requested.has(method));
}

export function confidenceLabel(score: number): ConfidenceLabel {
  if (score >= 0.7) return 'high';
  if (score >= 0.4) return 'medium';
  return 'low';
}

function pricedMethods(methods: EstimationMethod[], estimates: MethodEstimates): Array<{ method: EstimationMethod; price: number }> {
  return methods.flatMap((method) => {
    const price = estimates[method]?.estimatedPrice;
    return price === null || price === undefined ? [] : [{ method, price }];
  });
}

export function calculateWeightedAverage(methods: EstimationMethod[], estimates: MethodEstimates): FinalEstimate {
  const priced = pricedMethods(methods, estimates);
  if (priced.length === 0) {
    return { price: null, methodsUsed: [], confidence: 'low' };
  }

  const weightedSum = priced.reduce((acc, p) => acc + p.price * METHOD_WEIGHTS[p.method], 0);
  const totalWeight = priced.reduce((acc, p) => acc + METHOD_WEIGHTS[p.method], 0);

  return {
    price: roundToUnit(weightedSum / totalWeight),
    methodsUsed: priced.map((p) => p.method),
    confidence: priced.length >= 2 ? 'high' : 'medium'
  };
}

/**
 * Score in [0, 1] from three signals: how many methods priced the property,
 * how many comparables backed the comparable method, and how closely the
 * methods agree (coefficient of variation of their prices). Zero when no
 * method priced the property.
 */
export function calculateConfidenceScore(methods: EstimationMethod[], estimates: MethodEstimates): number {
  const priced = pricedMethods(methods, estimates);

  if (priced.length === 0) return 0;

  let score = Math.min(priced.length * 0.3, 0.6);

  // Comparable support counts even when the comparable method itself declined
  if (estimates.comparable) {
    score += Math.min(estimates.comparable.comparableCount * 0.1, 0.2);
  }

  if (priced.length >= 2) {
    const cv = coefficientOfVariation(priced.map((p) => p.price));
    score += Math.max(0, 0.2 - cv * 0.5);
  }

  return Math.min(score, 1);
}

export function generateRecommendations(
  finalEstimate: FinalEstimate,
  confidenceScore: number,
  estimates: MethodEstimates,
  purchasePrice?: number
): string[] {
  if (finalEstimate.price === null) {
    return ['Not enough data to estimate a price. Collect more detailed property information.'];
  }

  const recommendations: string[] = [];

  if (purchasePrice !== undefined && purchasePrice > 0) {
    const diffRatio = (finalEstimate.price - purchasePrice) / purchasePrice;
    const percent = (Math.abs(diffRatio) * 100).toFixed(1);
    if (diffRatio > 0.1) {
      recommendations.push(`✨ Expected appreciation of about ${percent}% since purchase.`);
    } else if (diffRatio < -0.1) {
      recommendations.push(`⚠️ Expected depreciation of about ${percent}% since purchase.`);
    } else {
      recommendations.push('💰 Minimal price change since purchase.');
    }
  }

  switch (confidenceLabel(confidenceScore)) {
    case 'high':
      recommendations.push('📊 Estimate confidence is high. Usable as a reference value for a sale.');
      break;
    case 'medium':
      recommendations.push('📈 Estimate confidence is moderate. Consider an additional appraisal.');
      break;
    case 'low':
      recommendations.push('🔍 Estimate confidence is low. A professional appraisal is recommended.');
      break;
  }

  const areaYield = estimates.yield_based?.areaYieldRate;
  if (areaYield !== undefined) {
    if (areaYield > 6) {
      recommendations.push('🏢 High-yield area; investor demand can be expected.');
    } else if (areaYield < 4) {
      recommendations.push('🏠 Low-yield area; consider selling to an owner-occupier.');
    }
  }

  return recommendations;
}

// A rejecting approach becomes that method's failure result
async function settleApproach<R extends ApproachResult>(
  approach: ValuationApproach<R>,
  property: PropertyDescriptor,
  failed: (error: EstimationError) => R
): Promise<R> {
  try {
    return await approach.estimate(property);
  } catch (error) {
    log.error(`❌ ${approach.method} approach failed:`, error);
    return failed(
      estimationError(EstimationErrorKind.UPSTREAM_UNAVAILABLE, `${approach.method} approach failed: ${describeError(error)}`)
    );
  }
}

export class PriceEstimator {
  constructor(
    private readonly approaches: ValuationApproaches,
    private readonly marketData: MarketDataSource,
    private readonly now: () => Date = () => new Date()
  ) {}

  async estimate(property: PropertyDescriptor, methods?: EstimationMethodsInput): Promise<EstimationResult> {
    const startTime = Date.now();
    const requested = normalizeMethods(methods);
    const wants = (method: EstimationMethod) => requested.includes(method);

    const [comparable, yieldBased, marketBased] = await Promise.all([
      wants('comparable')
        ? settleApproach(this.approaches.comparable, property, (error) => ({
            method: 'comparable',
            estimatedPrice: null,
            confidence: 'low',
            comparableCount: 0,
            error
          }))
        : undefined,
      wants('yield_based')
        ? settleApproach(this.approaches.yield_based, property, (error) => ({
            method: 'yield_based',
            estimatedPrice: null,
            confidence: 'low',
            error
          }))
        : undefined,
      wants('market_based')
        ? settleApproach(this.approaches.market_based, property, (error) => ({
            method: 'market_based',
            estimatedPrice: null,
            confidence: 'low',
            error
          }))
        : undefined
    ]);

    const estimates: MethodEstimates = {};
    if (comparable) estimates.comparable = comparable;
    if (yieldBased) estimates.yield_based = yieldBased;
    if (marketBased) estimates.market_based = marketBased;

    const finalEstimate = calculateWeightedAverage(requested, estimates);
    const confidenceScore = calculateConfidenceScore(requested, estimates);
    const recommendations = generateRecommendations(finalEstimate, confidenceScore, estimates, property.purchasePrice);

    const result: EstimationResult = {
      propertyId: property.id ?? 'unknown',
      estimationDate: this.now().toISOString(),
      estimationMethods: requested,
      estimates,
      finalEstimate,
      confidenceScore,
      recommendations,
      confidence: confidenceLabel(confidenceScore),
      recommendation: recommendations[0] ?? ''
    };

    if (finalEstimate.price === null) {
      result.error = estimationError(EstimationErrorKind.AGGREGATION_EMPTY, 'no valuation method produced a price');
      log.warn(`⚠️ No method could price ${result.propertyId} (${requested.join(', ')})`);
    } else {
      log.info(
        `✅ Estimated ${result.propertyId} in ${Date.now() - startTime}ms ` +
          `using [${finalEstimate.methodsUsed.join(', ')}], score ${confidenceScore.toFixed(2)}`
      );
    }

    return result;
  }

  // ==========================================================================
  // Market data lookups
  // ==========================================================================

  lookupLandPrice(address: string): Promise<LandPriceData> {
    return this.marketData.landPrice(address);
  }

  lookupAreaYield(address: string): Promise<number> {
    return this.marketData.areaYieldRate(address);
  }

  lookupComparables(
    lat: number,
    lon: number,
    propertyType: PropertyType,
    buildingAge: number,
    floorArea: number
  ): Promise<ComparableSale[]> {
    return this.marketData.comparableSales(lat, lon, propertyType, buildingAge, floorArea);
  }

  lookupMarketTrends(address: string, propertyType: PropertyType): Promise<MarketTrends> {
    return this.marketData.marketTrends(address, propertyType);
  }
}
