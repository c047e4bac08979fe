/**
 * Tool Dispatcher
 *
 * Validates tool arguments, routes them to the registries, calculators and
 * the price estimator, and renders text results. Shared by the MCP server and
 * the HTTP routes.
 *
 * Bad arguments come back as "Input error: ..." text. Unknown tools, ids and
 * resources raise ToolError with a 404 status.
 */

import { z } from 'zod';
import {
  PropertyDescriptor,
  PropertyDescriptorZ,
  type Investor,
  type Property
} from '../../shared/schema.js';
import {
  IStorage,
  annualExpensesOf,
  annualRentOf,
  investmentBudgetOf,
  propertyAge,
  recommendedLoanRatioOf
} from '../storage.js';
import { ToolError } from '../utils/estimation-errors.js';
import { createLogger } from '../utils/logger.js';
import {
  AnalysisInput,
  DEFAULT_LOAN_RATIO,
  PropertyAnalysis,
  calculatePropertyAnalysis,
  validateCalculationInputs
} from './investment-calculations.js';
import type { EstimationResult, PriceEstimator } from './price-estimator.js';
import {
  ComparisonRow,
  formatAnalysisReport,
  formatComparisonReport,
  formatEstimationReport,
  formatPortfolioReport
} from './report-formatter.js';
import {
  AddressArgsZ,
  AnalyzePropertyArgsZ,
  ComparePropertiesArgsZ,
  EstimateSalePriceArgsZ,
  LookupComparablesArgsZ,
  LookupMarketTrendsArgsZ,
  PortfolioAnalysisArgsZ,
  RegisterInvestorArgsZ,
  RegisterPropertyArgsZ,
  TOOL_DEFINITIONS,
  ToolDefinition
} from './tool-definitions.js';

const log = createLogger('ToolDispatcher');

const RESOURCE_HOST = 'local.host';

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

function parseArgs<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new ToolError(tool, `Input error: ${formatZodError(parsed.error)}`, 400);
  }
  return parsed.data;
}

// Ratios and rates given as percentages (80, 2.5) are scaled to fractions
function asFraction(value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value > 1 ? value / 100 : value;
}

type ToolHandler = (args: unknown) => Promise<string>;

export class ToolDispatcher {
  private readonly handlers: Record<string, ToolHandler>;

  constructor(
    private readonly storage: IStorage,
    private readonly estimator: PriceEstimator,
    private readonly now: () => Date = () => new Date()
  ) {
    this.handlers = {
      analyze_property: (args) => this.analyzeProperty(args),
      register_property: (args) => this.registerProperty(args),
      register_investor: (args) => this.registerInvestor(args),
      compare_properties: (args) => this.compareProperties(args),
      portfolio_analysis: (args) => this.portfolioAnalysis(args),
      estimate_sale_price: async (args) => formatEstimationReport(await this.estimate(args)),
      lookup_land_price: (args) => this.lookupLandPrice(args),
      lookup_area_yield: (args) => this.lookupAreaYield(args),
      lookup_comparables: (args) => this.lookupComparables(args),
      lookup_market_trends: (args) => this.lookupMarketTrends(args)
    };
  }

  listTools(): ToolDefinition[] {
    return TOOL_DEFINITIONS;
  }

  hasTool(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.handlers, name);
  }

  async callTool(name: string, args: unknown): Promise<string> {
    if (!this.hasTool(name)) {
      throw new ToolError(name, `Unknown tool: ${name}`, 404);
    }

    try {
      return await this.handlers[name](args);
    } catch (error) {
      if (error instanceof ToolError && error.status === 400) {
        log.warn(`⚠️ ${name}: ${error.message}`);
        return error.message;
      }
      throw error;
    }
  }

  // ==========================================================================
  // Investment analysis
  // ==========================================================================

  private async analyzeProperty(args: unknown): Promise<string> {
    const input = parseArgs('analyze_property', AnalyzePropertyArgsZ, args);

    const purchasePrice = input.purchase_price ?? input.property_price;
    const loanRatio = asFraction(input.loan_ratio);
    const loanAmount =
      input.loan_amount ?? (loanRatio !== undefined && purchasePrice !== undefined ? purchasePrice * loanRatio : undefined);
    const interestRate = asFraction(input.interest_rate);

    const errors = validateCalculationInputs({
      purchase_price: purchasePrice,
      monthly_rent: input.monthly_rent,
      loan_amount: loanAmount,
      interest_rate: interestRate,
      loan_period: input.loan_period
    });
    if (purchasePrice === undefined || input.monthly_rent === undefined || Object.keys(errors).length > 0) {
      return `Input error: ${Object.values(errors).join(', ')}`;
    }

    const effectiveLoan = loanAmount ?? purchasePrice * DEFAULT_LOAN_RATIO;
    const analysisInput: AnalysisInput = {
      purchasePrice,
      monthlyRent: input.monthly_rent,
      loanAmount: effectiveLoan,
      interestRate,
      loanPeriod: input.loan_period,
      annualExpenseRate: input.annual_expense_rate,
      downPayment: purchasePrice - effectiveLoan + input.initial_cost
    };
    const investor = input.investor_tax_bracket !== undefined ? { taxBracket: input.investor_tax_bracket } : undefined;

    const analysis = calculatePropertyAnalysis(analysisInput, investor);
    return formatAnalysisReport(analysis, {
      purchasePrice,
      monthlyRent: input.monthly_rent,
      loanAmount: effectiveLoan
    });
  }

  private analysisOf(property: Property, investor?: Investor): PropertyAnalysis {
    return calculatePropertyAnalysis(
      {
        purchasePrice: property.purchasePrice,
        monthlyRent: property.monthlyRent,
        propertyType: property.type,
        occupancyMonthsPerYear: property.occupancyMonthsPerYear,
        annualExpenses: annualExpensesOf(property),
        loanAmount: property.loanAmount,
        interestRate: property.interestRate,
        loanPeriod: property.loanPeriod,
        downPayment: property.downPayment
      },
      investor
    );
  }

  private async requireProperty(tool: string, id: string): Promise<Property> {
    const property = await this.storage.getProperty(id);
    if (!property) {
      throw new ToolError(tool, `Property not found: ${id}`, 404);
    }
    return property;
  }

  private async compareProperties(args: unknown): Promise<string> {
    const { property_ids } = parseArgs('compare_properties', ComparePropertiesArgsZ, args);
    if (property_ids.length < 2) {
      return 'At least two properties are required for a comparison.';
    }

    const rows: ComparisonRow[] = [];
    for (const id of property_ids) {
      const property = await this.requireProperty('compare_properties', id);
      rows.push({ propertyId: id, propertyName: property.name, analysis: this.analysisOf(property) });
    }
    return formatComparisonReport(rows);
  }

  private async portfolioAnalysis(args: unknown): Promise<string> {
    const input = parseArgs('portfolio_analysis', PortfolioAnalysisArgsZ, args);

    const investor = await this.storage.getInvestor(input.investor_id);
    if (!investor) {
      throw new ToolError('portfolio_analysis', `Investor not found: ${input.investor_id}`, 404);
    }

    const all = await this.storage.getAllProperties();
    const properties = input.property_ids
      ? all.filter((property) => input.property_ids?.includes(property.id))
      : all;

    if (properties.length === 0) {
      return 'No properties to analyze.';
    }

    const totalAnnualCashflow = properties.reduce(
      (acc, property) => acc + this.analysisOf(property, investor).annualCashflow,
      0
    );

    return formatPortfolioReport({
      investor,
      propertyCount: properties.length,
      totalInvestment: properties.reduce((acc, p) => acc + p.purchasePrice, 0),
      totalMonthlyRent: properties.reduce((acc, p) => acc + p.monthlyRent, 0),
      totalAnnualCashflow,
      investmentBudget: investmentBudgetOf(investor),
      recommendedLoanRatio: recommendedLoanRatioOf(investor)
    });
  }

  // ==========================================================================
  // Registries
  // ==========================================================================

  private async registerProperty(args: unknown): Promise<string> {
    const { property_data } = parseArgs('register_property', RegisterPropertyArgsZ, args);
    const property = await this.storage.saveProperty(property_data);
    log.info(`🏠 Registered property ${property.id}`);
    return `✅ Registered property '${property.name}' (ID: ${property.id}).`;
  }

  private async registerInvestor(args: unknown): Promise<string> {
    const { investor_data } = parseArgs('register_investor', RegisterInvestorArgsZ, args);
    const investor = await this.storage.saveInvestor(investor_data);
    log.info(`👤 Registered investor ${investor.id}`);
    return `✅ Registered investor profile (ID: ${investor.id}).`;
  }

  // ==========================================================================
  // Price estimation
  // ==========================================================================

  /**
   * Structured estimate. A registered property supplies defaults that
   * inline fields override.
   */
  async estimate(args: unknown): Promise<EstimationResult> {
    const input = parseArgs('estimate_sale_price', EstimateSalePriceArgsZ, args);
    const registered = input.property_id
      ? await this.requireProperty('estimate_sale_price', input.property_id)
      : undefined;

    const descriptor = this.toDescriptor({
      id: input.property_id,
      address: input.address ?? registered?.address,
      propertyType: input.property_type ?? registered?.type,
      constructionYear: input.construction_year ?? registered?.constructionYear,
      floorArea: input.floor_area ?? registered?.floorArea,
      monthlyRent: input.monthly_rent ?? registered?.monthlyRent,
      purchasePrice: input.purchase_price ?? registered?.purchasePrice
    });

    return this.estimator.estimate(descriptor, input.estimation_methods);
  }

  private toDescriptor(fields: z.input<typeof PropertyDescriptorZ>): PropertyDescriptor {
    const blankAddress = fields.address !== undefined && fields.address.trim() === '';
    return parseArgs('estimate_sale_price', PropertyDescriptorZ, {
      ...fields,
      address: blankAddress ? undefined : fields.address
    });
  }

  // ==========================================================================
  // Market data lookups
  // ==========================================================================

  private async lookupLandPrice(args: unknown): Promise<string> {
    const { address } = parseArgs('lookup_land_price', AddressArgsZ, args);
    const landPrice = await this.estimator.lookupLandPrice(address);
    return JSON.stringify({ address, ...landPrice }, null, 2);
  }

  private async lookupAreaYield(args: unknown): Promise<string> {
    const { address } = parseArgs('lookup_area_yield', AddressArgsZ, args);
    const areaYieldRate = await this.estimator.lookupAreaYield(address);
    return JSON.stringify({ address, areaYieldRate }, null, 2);
  }

  private async lookupComparables(args: unknown): Promise<string> {
    const input = parseArgs('lookup_comparables', LookupComparablesArgsZ, args);
    const comparables = await this.estimator.lookupComparables(
      input.lat,
      input.lon,
      input.property_type,
      input.building_age,
      input.floor_area
    );
    return JSON.stringify(comparables, null, 2);
  }

  private async lookupMarketTrends(args: unknown): Promise<string> {
    const { address, property_type } = parseArgs('lookup_market_trends', LookupMarketTrendsArgsZ, args);
    const trends = await this.estimator.lookupMarketTrends(address, property_type);
    return JSON.stringify({ address, propertyType: property_type, ...trends }, null, 2);
  }

  // ==========================================================================
  // Resources
  // ==========================================================================

  async listResources(): Promise<ResourceDescriptor[]> {
    const properties = await this.storage.getAllProperties();
    const investors = await this.storage.getAllInvestors();

    return [
      ...properties.map((property) => ({
        uri: `property://${RESOURCE_HOST}/${property.id}`,
        name: `Property: ${property.name}`,
        description: `Details of property ${property.id}`,
        mimeType: 'application/json'
      })),
      ...investors.map((investor) => ({
        uri: `investor://${RESOURCE_HOST}/${investor.id}`,
        name: 'Investor profile',
        description: `Profile of investor ${investor.id}`,
        mimeType: 'application/json'
      }))
    ];
  }

  async readResource(uri: string): Promise<string> {
    const match = /^(property|investor):\/\/local\.host\/(.+)$/.exec(uri);
    if (!match) {
      throw new ToolError('read_resource', `Unknown resource URI: ${uri}`, 404);
    }
    const [, kind, id] = match;

    if (kind === 'property') {
      const property = await this.requireProperty('read_resource', id);
      return JSON.stringify(
        {
          ...property,
          age: propertyAge(property, this.now()),
          annualRent: annualRentOf(property),
          annualExpenses: annualExpensesOf(property)
        },
        null,
        2
      );
    }

    const investor = await this.storage.getInvestor(id);
    if (!investor) {
      throw new ToolError('read_resource', `Investor not found: ${id}`, 404);
    }
    return JSON.stringify(
      {
        ...investor,
        investmentBudget: investmentBudgetOf(investor),
        recommendedLoanRatio: recommendedLoanRatioOf(investor)
      },
      null,
      2
    );
  }
}
