/**
 * Yield-Based (Income Capitalization) Approach
 *
 * price = annual rent / (area yield / 100), under three yield scenarios.
 * The moderate scenario is the headline estimate.
 */

import type { PropertyDescriptor } from '../../../shared/schema.js';
import { EstimationErrorKind, estimationError } from '../../utils/estimation-errors.js';
import { roundToUnit } from '../../utils/numbers.js';
import type { MarketDataSource } from '../market-data-source.js';
import type { ValuationApproach, YieldResult, YieldScenario } from './types.js';

// Percentage-point spread between scenarios
const SCENARIO_SPREAD = 0.5;

export function capitalize(annualRent: number, yieldPercent: number): number | null {
  if (yieldPercent <= 0) return null;
  return roundToUnit(annualRent / (yieldPercent / 100));
}

export function buildYieldScenarios(areaYield: number): Record<YieldScenario, number> {
  return {
    conservative: areaYield + SCENARIO_SPREAD,
    moderate: areaYield,
    optimistic: areaYield - SCENARIO_SPREAD
  };
}

export class YieldApproach implements ValuationApproach<YieldResult> {
  readonly method = 'yield_based' as const;

  constructor(private readonly marketData: Pick<MarketDataSource, 'areaYieldRate'>) {}

  async estimate(property: PropertyDescriptor): Promise<YieldResult> {
    const monthlyRent = property.monthlyRent ?? 0;
    if (monthlyRent <= 0) {
      return {
        method: this.method,
        estimatedPrice: null,
        confidence: 'low',
        error: estimationError(EstimationErrorKind.INPUT_MISSING, 'rent data missing')
      };
    }

    const areaYieldRate = await this.marketData.areaYieldRate(property.address ?? '');
    const annualRent = monthlyRent * 12;
    const scenarios = buildYieldScenarios(areaYieldRate);
    const yieldScenarios = {
      conservative: capitalize(annualRent, scenarios.conservative),
      moderate: capitalize(annualRent, scenarios.moderate),
      optimistic: capitalize(annualRent, scenarios.optimistic)
    };

    if (yieldScenarios.moderate === null) {
      return {
        method: this.method,
        estimatedPrice: null,
        confidence: 'low',
        areaYieldRate,
        yieldScenarios,
        annualRent,
        error: estimationError(
          EstimationErrorKind.INSUFFICIENT_DATA,
          `area yield rate must be positive (got ${areaYieldRate}%)`
        )
      };
    }

    return {
      method: this.method,
      estimatedPrice: yieldScenarios.moderate,
      confidence: 'medium',
      areaYieldRate,
      yieldScenarios,
      annualRent
    };
  }
}
