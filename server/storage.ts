import { v4 as uuidv4 } from "uuid";
import {
  type InsertInvestor,
  type InsertProperty,
  type Investor,
  type Property,
} from "../shared/schema.js";

export interface IStorage {
  getProperty(id: string): Promise<Property | undefined>;
  getAllProperties(): Promise<Property[]>;
  saveProperty(property: InsertProperty): Promise<Property>;

  getInvestor(id: string): Promise<Investor | undefined>;
  getAllInvestors(): Promise<Investor[]>;
  saveInvestor(investor: InsertInvestor): Promise<Investor>;
}

/**
 * In-memory registries of properties and investor profiles.
 * Saving an existing id replaces the record and keeps its creation time.
 */
export class MemStorage implements IStorage {
  private properties = new Map<string, Property>();
  private investors = new Map<string, Investor>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getProperty(id: string): Promise<Property | undefined> {
    return this.properties.get(id);
  }

  async getAllProperties(): Promise<Property[]> {
    return Array.from(this.properties.values());
  }

  async saveProperty(insertProperty: InsertProperty): Promise<Property> {
    const timestamp = this.now().toISOString();
    const existing = this.properties.get(insertProperty.id);
    const property: Property = {
      ...insertProperty,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    this.properties.set(property.id, property);
    return property;
  }

  async getInvestor(id: string): Promise<Investor | undefined> {
    return this.investors.get(id);
  }

  async getAllInvestors(): Promise<Investor[]> {
    return Array.from(this.investors.values());
  }

  async saveInvestor(insertInvestor: InsertInvestor): Promise<Investor> {
    const id = insertInvestor.id ?? uuidv4();
    const existing = this.investors.get(id);
    const investor: Investor = {
      ...insertInvestor,
      id,
      createdAt: existing?.createdAt ?? this.now().toISOString(),
    };
    this.investors.set(id, investor);
    return investor;
  }
}

// ============================================================================
// Derived figures
// ============================================================================

export function propertyAge(property: Pick<Property, "constructionYear">, now: Date = new Date()): number {
  return Math.max(0, now.getFullYear() - property.constructionYear);
}

export function annualRentOf(property: Pick<Property, "monthlyRent" | "occupancyMonthsPerYear">): number {
  return property.monthlyRent * property.occupancyMonthsPerYear;
}

export function annualExpensesOf(
  property: Pick<Property, "managementFee" | "repairReserve" | "propertyTax" | "insurance">
): number {
  return (property.managementFee + property.repairReserve) * 12 + property.propertyTax + property.insurance;
}

const INCOME_MULTIPLE = { conservative: 5, moderate: 6, aggressive: 7 } as const;
const LOAN_RATIO_BY_EXPERIENCE = { beginner: 0.7, intermediate: 0.8, experienced: 0.85 } as const;

// Rough budget: a multiple of annual income scaled by risk tolerance
export function investmentBudgetOf(investor: Pick<Investor, "annualIncome" | "riskTolerance">): number {
  return investor.annualIncome * INCOME_MULTIPLE[investor.riskTolerance];
}

export function recommendedLoanRatioOf(investor: Pick<Investor, "investmentExperience">): number {
  return LOAN_RATIO_BY_EXPERIENCE[investor.investmentExperience];
}
