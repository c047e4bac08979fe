/**
 * Tool Catalogue
 *
 * Argument schemas (zod) and the JSON Schema advertised to clients for every
 * tool. Wire arguments are snake_case.
 */

import { z } from 'zod';
import {
  EstimationMethodsInputZ,
  PropertyTypeZ,
  insertInvestorSchema,
  insertPropertySchema
} from '../../shared/schema.js';

// ============================================================================
// Argument schemas
// ============================================================================

export const AnalyzePropertyArgsZ = z.object({
  property_price: z.number().optional(),
  purchase_price: z.number().optional(),
  monthly_rent: z.number().optional(),
  initial_cost: z.number().nonnegative().default(0),
  loan_ratio: z.number().nonnegative().optional(),
  loan_amount: z.number().nonnegative().optional(),
  interest_rate: z.number().optional(),
  loan_period: z.number().optional(),
  annual_expense_rate: z.number().min(0).max(1).optional(),
  investor_tax_bracket: z.number().min(0).max(1).optional()
});

export const RegisterPropertyArgsZ = z.object({
  property_data: insertPropertySchema
});

export const RegisterInvestorArgsZ = z.object({
  investor_data: insertInvestorSchema
});

export const ComparePropertiesArgsZ = z.object({
  property_ids: z.array(z.string())
});

export const PortfolioAnalysisArgsZ = z.object({
  investor_id: z.string().min(1),
  property_ids: z.array(z.string()).optional()
});

export const EstimateSalePriceArgsZ = z.object({
  property_id: z.string().min(1).optional(),
  address: z.string().optional(),
  property_type: PropertyTypeZ.optional(),
  construction_year: z.number().int().optional(),
  floor_area: z.number().positive().optional(),
  monthly_rent: z.number().nonnegative().optional(),
  purchase_price: z.number().nonnegative().optional(),
  estimation_methods: EstimationMethodsInputZ.optional()
});

export type EstimateSalePriceArgs = z.infer<typeof EstimateSalePriceArgsZ>;

export const AddressArgsZ = z.object({
  address: z.string()
});

export const LookupComparablesArgsZ = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  property_type: PropertyTypeZ.default('apartment'),
  building_age: z.number().min(0).default(15),
  floor_area: z.number().positive().default(50)
});

export const LookupMarketTrendsArgsZ = z.object({
  address: z.string(),
  property_type: PropertyTypeZ.default('apartment')
});

// ============================================================================
// Advertised definitions
// ============================================================================

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
  };
}

const propertyTypeProperty = {
  type: 'string',
  enum: ['apartment', 'house', 'small_building'],
  description: 'Property type'
};

const propertyIdsProperty = {
  type: 'array',
  items: { type: 'string' },
  description: 'Registered property ids'
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'analyze_property',
    description: 'Analyze the profitability of a rental property',
    inputSchema: {
      type: 'object',
      properties: {
        property_price: { type: 'number', description: 'Property price (JPY)' },
        monthly_rent: { type: 'number', description: 'Monthly rent (JPY)' },
        initial_cost: { type: 'number', description: 'Initial costs (JPY)', default: 0 },
        loan_ratio: { type: 'number', description: 'Loan ratio (0.0-1.0, or a percentage)', default: 0.8 },
        interest_rate: { type: 'number', description: 'Annual interest rate (0.0-1.0, or a percentage)', default: 0.025 },
        loan_period: { type: 'integer', description: 'Loan period (years)', default: 25 },
        annual_expense_rate: { type: 'number', description: 'Annual expenses as a share of rent (0.0-1.0)', default: 0.2 },
        investor_tax_bracket: { type: 'number', description: 'Investor income tax rate (optional)' }
      },
      required: ['property_price', 'monthly_rent']
    }
  },
  {
    name: 'register_property',
    description: 'Register a property',
    inputSchema: {
      type: 'object',
      properties: {
        property_data: { type: 'object', description: 'Property record (snake_case fields)' }
      },
      required: ['property_data']
    }
  },
  {
    name: 'register_investor',
    description: 'Register an investor profile',
    inputSchema: {
      type: 'object',
      properties: {
        investor_data: { type: 'object', description: 'Investor profile (snake_case fields; id generated when absent)' }
      },
      required: ['investor_data']
    }
  },
  {
    name: 'compare_properties',
    description: 'Rank registered properties by gross yield',
    inputSchema: {
      type: 'object',
      properties: { property_ids: propertyIdsProperty },
      required: ['property_ids']
    }
  },
  {
    name: 'portfolio_analysis',
    description: "Summarize an investor's portfolio",
    inputSchema: {
      type: 'object',
      properties: {
        investor_id: { type: 'string', description: 'Investor id' },
        property_ids: { ...propertyIdsProperty, description: 'Properties to include (default: all)' }
      },
      required: ['investor_id']
    }
  },
  {
    name: 'estimate_sale_price',
    description: 'Estimate the sale price of a property from comparables, yield and land value',
    inputSchema: {
      type: 'object',
      properties: {
        property_id: { type: 'string', description: 'Registered property id' },
        address: { type: 'string', description: 'Address' },
        property_type: propertyTypeProperty,
        construction_year: { type: 'integer', description: 'Construction year' },
        floor_area: { type: 'number', description: 'Floor area (m²)' },
        monthly_rent: { type: 'number', description: 'Monthly rent (JPY)' },
        purchase_price: { type: 'number', description: 'Purchase price (JPY)' },
        estimation_methods: {
          oneOf: [
            { type: 'string', enum: ['all'] },
            { type: 'array', items: { type: 'string', enum: ['comparable', 'yield_based', 'market_based'] } }
          ],
          description: 'Methods to run (default: all)'
        }
      }
    }
  },
  {
    name: 'lookup_land_price',
    description: 'Land price per m² for an address',
    inputSchema: {
      type: 'object',
      properties: { address: { type: 'string', description: 'Address' } },
      required: ['address']
    }
  },
  {
    name: 'lookup_area_yield',
    description: 'Typical gross yield (%) for an address',
    inputSchema: {
      type: 'object',
      properties: { address: { type: 'string', description: 'Address' } },
      required: ['address']
    }
  },
  {
    name: 'lookup_comparables',
    description: 'Comparable sales near a coordinate, nearest first',
    inputSchema: {
      type: 'object',
      properties: {
        lat: { type: 'number', description: 'Latitude' },
        lon: { type: 'number', description: 'Longitude' },
        property_type: propertyTypeProperty,
        building_age: { type: 'number', description: 'Building age (years)', default: 15 },
        floor_area: { type: 'number', description: 'Floor area (m²)', default: 50 }
      },
      required: ['lat', 'lon']
    }
  },
  {
    name: 'lookup_market_trends',
    description: 'Market trend judgement for an address',
    inputSchema: {
      type: 'object',
      properties: {
        address: { type: 'string', description: 'Address' },
        property_type: propertyTypeProperty
      },
      required: ['address']
    }
  }
];
