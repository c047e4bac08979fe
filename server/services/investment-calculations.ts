/**
 * Investment Calculations
 *
 * Closed-form rental property metrics: yields, annuity loan payment, cash
 * flow, payback, depreciation and tax benefit.
 */

import { roundToDecimals } from '../utils/numbers.js';

export const DEFAULT_ANNUAL_EXPENSE_RATE = 0.2;
export const DEFAULT_LOAN_RATIO = 0.8;
export const DEFAULT_INTEREST_RATE = 0.025;
export const DEFAULT_LOAN_PERIOD_YEARS = 25;
export const DEFAULT_OCCUPANCY_MONTHS = 12;

// Statutory useful life in years, by structure
export const USEFUL_LIFE_YEARS: Record<string, number> = {
  rc: 47,
  house: 33,
  apartment: 22,
  small_building: 22
};
const DEFAULT_USEFUL_LIFE = 22;
const BUILDING_SHARE_OF_PRICE = 0.7;

export function calculateGrossYield(annualRent: number, purchasePrice: number): number {
  if (purchasePrice <= 0) return 0;
  return (annualRent / purchasePrice) * 100;
}

export function calculateNetYield(annualRent: number, annualExpenses: number, purchasePrice: number): number {
  if (purchasePrice <= 0) return 0;
  return ((annualRent - annualExpenses) / purchasePrice) * 100;
}

/**
 * Level (annuity) monthly payment. Zero for non-positive amounts or periods
 * and negative rates; a straight split at 0%.
 */
export function calculateMonthlyLoanPayment(loanAmount: number, interestRate: number, loanPeriodYears: number): number {
  if (loanAmount <= 0 || interestRate < 0 || loanPeriodYears <= 0) return 0;

  const totalPayments = loanPeriodYears * 12;
  if (interestRate === 0) return loanAmount / totalPayments;

  const monthlyRate = interestRate / 12;
  const growth = (1 + monthlyRate) ** totalPayments;
  return (loanAmount * monthlyRate * growth) / (growth - 1);
}

export function calculateMonthlyCashflow(monthlyRent: number, monthlyLoanPayment: number, monthlyExpenses: number): number {
  return monthlyRent - monthlyLoanPayment - monthlyExpenses;
}

/** Years to recover the down payment; null when the property never pays back */
export function calculatePaybackPeriod(downPayment: number, annualCashflow: number): number | null {
  if (annualCashflow <= 0) return null;
  return downPayment / annualCashflow;
}

export function calculateTaxBenefit(annualDepreciation: number, annualExpenses: number, taxRate: number): number {
  return (annualDepreciation + annualExpenses) * taxRate;
}

export function calculateBuildingDepreciation(purchasePrice: number, propertyType: string): number {
  const life = USEFUL_LIFE_YEARS[propertyType] ?? DEFAULT_USEFUL_LIFE;
  return (purchasePrice * BUILDING_SHARE_OF_PRICE) / life;
}

// ============================================================================
// Composite analysis
// ============================================================================

export interface AnalysisInput {
  purchasePrice: number;
  monthlyRent: number;
  propertyType?: string;
  occupancyMonthsPerYear?: number;
  annualExpenses?: number;
  annualExpenseRate?: number;
  loanAmount?: number;
  interestRate?: number;
  loanPeriod?: number;
  downPayment?: number;
}

export interface PropertyAnalysis {
  grossYield: number;
  netYield: number;
  monthlyCashflow: number;
  annualCashflow: number;
  paybackPeriod: number | null;
  monthlyLoanPayment: number;
  annualDepreciation: number;
  annualTaxBenefit: number;
  netAnnualIncome: number;
}

export function calculatePropertyAnalysis(input: AnalysisInput, investor?: { taxBracket: number }): PropertyAnalysis {
  const { purchasePrice, monthlyRent } = input;
  const annualRent = monthlyRent * (input.occupancyMonthsPerYear ?? DEFAULT_OCCUPANCY_MONTHS);
  const annualExpenses = input.annualExpenses ?? annualRent * (input.annualExpenseRate ?? DEFAULT_ANNUAL_EXPENSE_RATE);

  const loanAmount = input.loanAmount ?? purchasePrice * DEFAULT_LOAN_RATIO;
  const monthlyLoanPayment = calculateMonthlyLoanPayment(
    loanAmount,
    input.interestRate ?? DEFAULT_INTEREST_RATE,
    input.loanPeriod ?? DEFAULT_LOAN_PERIOD_YEARS
  );

  const monthlyCashflow = calculateMonthlyCashflow(monthlyRent, monthlyLoanPayment, annualExpenses / 12);
  const annualCashflow = monthlyCashflow * 12;

  const annualDepreciation = calculateBuildingDepreciation(purchasePrice, input.propertyType ?? 'apartment');
  const annualTaxBenefit = investor ? calculateTaxBenefit(annualDepreciation, annualExpenses, investor.taxBracket) : 0;

  const payback = calculatePaybackPeriod(input.downPayment ?? purchasePrice - loanAmount, annualCashflow);

  return {
    grossYield: roundToDecimals(calculateGrossYield(annualRent, purchasePrice), 2),
    netYield: roundToDecimals(calculateNetYield(annualRent, annualExpenses, purchasePrice), 2),
    monthlyCashflow: Math.round(monthlyCashflow),
    annualCashflow: Math.round(annualCashflow),
    paybackPeriod: payback === null ? null : roundToDecimals(payback, 1),
    monthlyLoanPayment: Math.round(monthlyLoanPayment),
    annualDepreciation: Math.round(annualDepreciation),
    annualTaxBenefit: Math.round(annualTaxBenefit),
    netAnnualIncome: Math.round(annualCashflow + annualTaxBenefit)
  };
}

// ============================================================================
// Validation
// ============================================================================

export interface CalculationInputFields {
  purchase_price?: number;
  monthly_rent?: number;
  loan_amount?: number;
  interest_rate?: number;
  loan_period?: number;
  occupancy_months_per_year?: number;
}

/**
 * Field name → message for every invalid input; empty when all is well
 */
export function validateCalculationInputs(fields: CalculationInputFields): Record<string, string> {
  const errors: Record<string, string> = {};

  for (const field of ['purchase_price', 'monthly_rent'] as const) {
    const value = fields[field];
    if (value === undefined) {
      errors[field] = `${field} is required`;
    } else if (value <= 0) {
      errors[field] = `${field} must be greater than 0`;
    }
  }

  if (fields.loan_amount !== undefined && fields.purchase_price !== undefined && fields.loan_amount > fields.purchase_price) {
    errors.loan_amount = 'Loan amount cannot exceed purchase price';
  }

  if (fields.interest_rate !== undefined && (fields.interest_rate < 0 || fields.interest_rate > 0.2)) {
    errors.interest_rate = 'Interest rate should be between 0% and 20%';
  }

  if (fields.loan_period !== undefined && (fields.loan_period <= 0 || fields.loan_period > 35)) {
    errors.loan_period = 'Loan period should be between 1 and 35 years';
  }

  const occupancy = fields.occupancy_months_per_year;
  if (occupancy !== undefined && (occupancy < 0 || occupancy > 12)) {
    errors.occupancy_months_per_year = 'Occupancy months should be between 0 and 12';
  }

  return errors;
}
