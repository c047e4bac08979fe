/**
 * Valuation Approach Types
 *
 * Every approach resolves to a result object. A null `estimatedPrice` always
 * carries an `error`; approaches never reject.
 */

import type {
  ComparableSale,
  ConfidenceLabel,
  EstimationMethod,
  PriceRange,
  PropertyDescriptor
} from '../../../shared/schema.js';
import type { EstimationError } from '../../utils/estimation-errors.js';

// Fewer comparables than this and the comparable approach declines to price
export const MIN_COMPARABLE_PROPERTIES = 2;

// Assumed building age when the construction year is unknown
export const DEFAULT_BUILDING_AGE = 15;

export function buildingAgeOf(constructionYear: number | undefined, now: Date): number {
  if (constructionYear === undefined) return DEFAULT_BUILDING_AGE;
  return Math.max(0, now.getFullYear() - constructionYear);
}

// ============================================================================
// Results
// ============================================================================

interface ApproachFailure<M extends EstimationMethod> {
  method: M;
  estimatedPrice: null;
  confidence: 'low';
  error: EstimationError;
}

export interface ComparableEstimate {
  method: 'comparable';
  estimatedPrice: number;
  confidence: ConfidenceLabel;
  comparableCount: number;
  priceRange: PriceRange;
  comparables: ComparableSale[];
}

export interface ComparableFailure extends ApproachFailure<'comparable'> {
  comparableCount: number;
}

export type ComparableResult = ComparableEstimate | ComparableFailure;

export type YieldScenario = 'conservative' | 'moderate' | 'optimistic';

export interface YieldEstimate {
  method: 'yield_based';
  estimatedPrice: number;
  confidence: ConfidenceLabel;
  areaYieldRate: number;
  yieldScenarios: Record<YieldScenario, number | null>;
  annualRent: number;
}

export interface YieldFailure extends ApproachFailure<'yield_based'> {
  areaYieldRate?: number;
  yieldScenarios?: Record<YieldScenario, number | null>;
  annualRent?: number;
}

export type YieldResult = YieldEstimate | YieldFailure;

export interface MarketEstimate {
  method: 'market_based';
  estimatedPrice: number;
  confidence: ConfidenceLabel;
  landPricePerSqm: number;
  buildingValue: number;
  landPriceSource: string;
}

export type MarketFailure = ApproachFailure<'market_based'>;

export type MarketResult = MarketEstimate | MarketFailure;

export type ApproachResult = ComparableResult | YieldResult | MarketResult;

// ============================================================================
// Strategy interface
// ============================================================================

export interface ValuationApproach<R extends ApproachResult = ApproachResult> {
  readonly method: R['method'];
  estimate(property: PropertyDescriptor): Promise<R>;
}

export interface ValuationApproaches {
  comparable: ValuationApproach<ComparableResult>;
  yield_based: ValuationApproach<YieldResult>;
  market_based: ValuationApproach<MarketResult>;
}
