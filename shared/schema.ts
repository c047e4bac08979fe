import { z } from "zod";

// ============================================================================
// Enumerations
// ============================================================================

export const propertyTypes = ["apartment", "house", "small_building"] as const;
export const PropertyTypeZ = z.enum(propertyTypes);
export type PropertyType = z.infer<typeof PropertyTypeZ>;

export const estimationMethods = ["comparable", "yield_based", "market_based"] as const;
export const EstimationMethodZ = z.enum(estimationMethods);
export type EstimationMethod = z.infer<typeof EstimationMethodZ>;

export const InvestmentExperienceZ = z.enum(["beginner", "intermediate", "experienced"]);
export type InvestmentExperience = z.infer<typeof InvestmentExperienceZ>;

export const RiskToleranceZ = z.enum(["conservative", "moderate", "aggressive"]);
export type RiskTolerance = z.infer<typeof RiskToleranceZ>;

export type ConfidenceLabel = "high" | "medium" | "low";

// ============================================================================
// Registry models (wire format is snake_case, domain is camelCase)
// ============================================================================

export const insertPropertySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    address: z.string().min(1),
    type: PropertyTypeZ,
    construction_year: z.number().int().min(1800).max(2100),
    room_layout: z.string().min(1),
    floor_area: z.number().positive(),

    // Purchase
    purchase_price: z.number().nonnegative(),
    down_payment: z.number().nonnegative(),
    loan_amount: z.number().nonnegative(),
    interest_rate: z.number().min(0).default(0.025),
    loan_period: z.number().int().positive().default(25),

    // Income & running costs
    monthly_rent: z.number().nonnegative(),
    management_fee: z.number().nonnegative().default(0),
    repair_reserve: z.number().nonnegative().default(0),
    property_tax: z.number().nonnegative().default(0),
    insurance: z.number().nonnegative().default(0),

    // Operations
    occupancy_months_per_year: z.number().int().min(0).max(12).default(12),
    tenant_turnover_cost: z.number().nonnegative().default(0),
    major_repair_reserve: z.number().nonnegative().default(0),

    notes: z.string().optional()
  })
  .transform((p) => ({
    id: p.id,
    name: p.name,
    address: p.address,
    type: p.type,
    constructionYear: p.construction_year,
    roomLayout: p.room_layout,
    floorArea: p.floor_area,
    purchasePrice: p.purchase_price,
    downPayment: p.down_payment,
    loanAmount: p.loan_amount,
    interestRate: p.interest_rate,
    loanPeriod: p.loan_period,
    monthlyRent: p.monthly_rent,
    managementFee: p.management_fee,
    repairReserve: p.repair_reserve,
    propertyTax: p.property_tax,
    insurance: p.insurance,
    occupancyMonthsPerYear: p.occupancy_months_per_year,
    tenantTurnoverCost: p.tenant_turnover_cost,
    majorRepairReserve: p.major_repair_reserve,
    notes: p.notes
  }));

export type InsertProperty = z.infer<typeof insertPropertySchema>;

export interface Property extends InsertProperty {
  createdAt: string;
  updatedAt: string;
}

export const insertInvestorSchema = z
  .object({
    id: z.string().min(1).optional(),
    annual_income: z.number().nonnegative(),
    tax_bracket: z.number().min(0).max(1),
    investment_experience: InvestmentExperienceZ,
    risk_tolerance: RiskToleranceZ,
    available_cash: z.number().nonnegative(),
    current_debt: z.number().nonnegative().default(0),
    monthly_savings: z.number().nonnegative(),
    target_monthly_income: z.number().nonnegative(),
    investment_period: z.number().int().positive(),
    preferred_property_types: z.array(PropertyTypeZ).default([]),
    preferred_locations: z.array(z.string()).default([])
  })
  .transform((i) => ({
    id: i.id,
    annualIncome: i.annual_income,
    taxBracket: i.tax_bracket,
    investmentExperience: i.investment_experience,
    riskTolerance: i.risk_tolerance,
    availableCash: i.available_cash,
    currentDebt: i.current_debt,
    monthlySavings: i.monthly_savings,
    targetMonthlyIncome: i.target_monthly_income,
    investmentPeriod: i.investment_period,
    preferredPropertyTypes: i.preferred_property_types,
    preferredLocations: i.preferred_locations
  }));

export type InsertInvestor = z.infer<typeof insertInvestorSchema>;

export interface Investor extends Omit<InsertInvestor, "id"> {
  id: string;
  createdAt: string;
}

// ============================================================================
// Estimation input
// ============================================================================

/**
 * Inputs to one price estimation. Defaults match what the valuation
 * approaches assume when a field is missing.
 */
export const PropertyDescriptorZ = z.object({
  id: z.string().min(1).optional(),
  address: z.string().trim().min(1).optional(),
  propertyType: PropertyTypeZ.default("apartment"),
  constructionYear: z.number().int().min(1800).max(2100).optional(),
  floorArea: z.number().positive().default(50),
  monthlyRent: z.number().nonnegative().optional(),
  purchasePrice: z.number().nonnegative().optional()
});

export type PropertyDescriptor = z.infer<typeof PropertyDescriptorZ>;

export const EstimationMethodsInputZ = z.union([
  z.literal("all"),
  z.array(EstimationMethodZ)
]);

export type EstimationMethodsInput = z.infer<typeof EstimationMethodsInputZ>;

// ============================================================================
// Market data
// ============================================================================

export interface ComparableSale {
  id: string;
  price: number;
  floorArea: number;
  buildingAge: number;
  distance: number; // meters
  saleDate: string; // YYYY-MM-DD
  propertyType: PropertyType;
  pricePerSqm: number;
}

export interface PriceRange {
  min: number;
  max: number;
  median: number;
}

export interface LandPriceData {
  pricePerSqm: number;
  source: string;
  count?: number;
  priceRange?: PriceRange;
  error?: string;
}

export type PriceTrend = "rising" | "slightly_rising" | "flat" | "slightly_falling" | "falling";
export type MarketLevel = "high" | "medium" | "low";
export type MarketOutlook = "favorable" | "somewhat_favorable" | "stable" | "cautious";

export interface MarketTrends {
  priceTrend: PriceTrend;
  demandLevel: MarketLevel;
  supplyLevel: MarketLevel;
  outlook: MarketOutlook;
  confidence: ConfidenceLabel;
  error?: string;
}

export interface Coordinates {
  lat: number;
  lon: number;
}
