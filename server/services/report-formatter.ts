/**
 * Report Formatter
 *
 * Plain-text renderings of tool results.
 */

import type { EstimationMethod, Investor } from '../../shared/schema.js';
import { formatCurrency } from '../utils/numbers.js';
import type { PropertyAnalysis } from './investment-calculations.js';
import type { EstimationResult, MethodEstimates } from './price-estimator.js';

function formatPayback(years: number | null): string {
  return years === null ? 'n/a' : `${years} years`;
}

export interface AnalysisContext {
  purchasePrice: number;
  monthlyRent: number;
  loanAmount: number;
}

export function formatAnalysisReport(analysis: PropertyAnalysis, context: AnalysisContext): string {
  const loanRatio = context.purchasePrice > 0 ? context.loanAmount / context.purchasePrice : 0;

  const lines = [
    '🏠 Property Investment Analysis',
    '',
    '📊 Basics',
    `- Price: ${formatCurrency(context.purchasePrice)}`,
    `- Monthly rent: ${formatCurrency(context.monthlyRent)}`,
    `- Loan ratio: ${Math.round(loanRatio * 100)}%`,
    '',
    '📈 Profitability',
    `- Gross yield: ${analysis.grossYield.toFixed(2)}%`,
    `- Net yield: ${analysis.netYield.toFixed(2)}%`,
    `- Monthly cash flow: ${formatCurrency(analysis.monthlyCashflow)}`,
    `- Annual cash flow: ${formatCurrency(analysis.annualCashflow)}`,
    '',
    '💰 Payback',
    `- Payback period: ${formatPayback(analysis.paybackPeriod)}`,
    `- Monthly loan payment: ${formatCurrency(analysis.monthlyLoanPayment)}`,
    '',
    '🏛️ Tax',
    `- Annual depreciation: ${formatCurrency(analysis.annualDepreciation)}`,
    `- Annual tax benefit: ${formatCurrency(analysis.annualTaxBenefit)}`,
    `- After-tax annual income: ${formatCurrency(analysis.netAnnualIncome)}`
  ];

  if (analysis.grossYield >= 6) {
    lines.push('', '💎 High-yield property: attractive returns.');
  } else if (analysis.grossYield <= 4) {
    lines.push('', '💔 Low-yield property: watch profitability closely.');
  }

  return lines.join('\n');
}

export interface ComparisonRow {
  propertyId: string;
  propertyName: string;
  analysis: PropertyAnalysis;
}

/** Ranked by gross yield, highest first */
export function formatComparisonReport(rows: ComparisonRow[]): string {
  const ranked = [...rows].sort((a, b) => b.analysis.grossYield - a.analysis.grossYield);
  const lines = ['🔍 Property Comparison', ''];

  ranked.forEach((row, index) => {
    lines.push(
      `${index + 1}. ${row.propertyName} (${row.propertyId})`,
      `   Gross yield: ${row.analysis.grossYield}%`,
      `   Monthly cash flow: ${formatCurrency(row.analysis.monthlyCashflow)}`,
      `   Payback: ${formatPayback(row.analysis.paybackPeriod)}`,
      ''
    );
  });

  return lines.join('\n').trimEnd();
}

export interface PortfolioSummary {
  investor: Investor;
  propertyCount: number;
  totalInvestment: number;
  totalMonthlyRent: number;
  totalAnnualCashflow: number;
  investmentBudget: number;
  recommendedLoanRatio: number;
}

export function formatPortfolioReport(summary: PortfolioSummary): string {
  const { investor } = summary;
  const lines = [
    `💼 Portfolio Analysis (investor: ${investor.investmentExperience})`,
    '',
    '📊 Portfolio Summary',
    `- Properties: ${summary.propertyCount}`,
    `- Total investment: ${formatCurrency(summary.totalInvestment)}`,
    `- Total monthly rent: ${formatCurrency(summary.totalMonthlyRent)}`,
    `- Total annual cash flow: ${formatCurrency(summary.totalAnnualCashflow)}`
  ];

  if (investor.targetMonthlyIncome > 0) {
    const progress = (summary.totalMonthlyRent / investor.targetMonthlyIncome) * 100;
    lines.push(`- Target monthly income reached: ${progress.toFixed(1)}%`);
  }

  lines.push(
    '',
    '🧭 Guidance',
    `- Investment budget: ${formatCurrency(summary.investmentBudget)}`,
    `- Recommended loan ratio: ${Math.round(summary.recommendedLoanRatio * 100)}%`
  );

  return lines.join('\n');
}

function describeMethod(method: EstimationMethod, estimates: MethodEstimates): string {
  switch (method) {
    case 'comparable': {
      const result = estimates.comparable;
      if (!result) return 'not run';
      if (result.estimatedPrice === null) return `could not estimate (${result.error.kind}: ${result.error.message})`;
      return `${formatCurrency(result.estimatedPrice)} (${result.comparableCount} comparables)`;
    }
    case 'yield_based': {
      const result = estimates.yield_based;
      if (!result) return 'not run';
      if (result.estimatedPrice === null) return `could not estimate (${result.error.kind}: ${result.error.message})`;
      return `${formatCurrency(result.estimatedPrice)} (area yield ${result.areaYieldRate}%)`;
    }
    case 'market_based': {
      const result = estimates.market_based;
      if (!result) return 'not run';
      if (result.estimatedPrice === null) return `could not estimate (${result.error.kind}: ${result.error.message})`;
      return `${formatCurrency(result.estimatedPrice)} (land ${formatCurrency(result.landPricePerSqm)}/m², ${result.landPriceSource})`;
    }
  }
}

export function formatEstimationReport(result: EstimationResult): string {
  const { finalEstimate } = result;
  const lines = [`🏷️ Sale Price Estimate (ID: ${result.propertyId})`, ''];

  if (finalEstimate.price === null) {
    lines.push('❌ Could not estimate a price.');
  } else {
    lines.push(
      `💰 Estimated price: ${formatCurrency(finalEstimate.price)}`,
      `- Methods used: ${finalEstimate.methodsUsed.join(', ')}`
    );
  }
  lines.push(`- Confidence: ${result.confidence} (${result.confidenceScore.toFixed(2)})`, '', '📋 By method');

  for (const method of result.estimationMethods) {
    lines.push(`- ${method}: ${describeMethod(method, result.estimates)}`);
  }

  lines.push('', '💡 Recommendations', ...result.recommendations.map((r) => `- ${r}`));
  return lines.join('\n');
}
