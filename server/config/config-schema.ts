/**
 * Configuration Schemas
 *
 * Structure and validation for the API settings file (config/api-settings.yaml).
 * Uses Zod for runtime validation and TypeScript type generation.
 */

import { z } from 'zod';

// ============================================================================
// Region rules (substring matching against free-form addresses)
// ============================================================================
export const RegionRuleSchema = z.object({
  name: z.string().min(1),
  // every entry must appear in the address
  all: z.array(z.string().min(1)).default([]),
  // at least one entry must appear (ignored when empty)
  any: z.array(z.string().min(1)).default([])
});

export type RegionRule = z.infer<typeof RegionRuleSchema>;

export const YieldRuleSchema = RegionRuleSchema.extend({
  rate: z.number().min(0).max(30)
});

export type YieldRule = z.infer<typeof YieldRuleSchema>;

const LevelSchema = z.enum(['high', 'medium', 'low']);

export const TrendProfileSchema = z.object({
  priceTrend: z.enum(['rising', 'slightly_rising', 'flat', 'slightly_falling', 'falling']),
  demandLevel: LevelSchema,
  supplyLevel: LevelSchema,
  outlook: z.enum(['favorable', 'somewhat_favorable', 'stable', 'cautious']),
  confidence: LevelSchema
});

export const TrendRuleSchema = RegionRuleSchema.extend({
  trends: TrendProfileSchema
});

export type TrendRule = z.infer<typeof TrendRuleSchema>;

// ============================================================================
// Data sources
// ============================================================================
export const LandPriceApiSchema = z.object({
  baseUrl: z.string().url(),
  enabled: z.boolean(),
  timeoutMs: z.number().int().positive(),
  fromYear: z.number().int(),
  toYear: z.number().int(),
  prefectureCodes: z.record(z.string(), z.string()),
  defaultPrefectureCode: z.string()
});

export type LandPriceApiSettings = z.infer<typeof LandPriceApiSchema>;

// ============================================================================
// Master schema
// ============================================================================
export const ApiSettingsSchema = z.object({
  dataSources: z.object({
    landPriceApi: LandPriceApiSchema
  }),
  estimation: z.object({
    yield: z.object({
      // reported by the simulated market survey
      surveyRates: z.array(YieldRuleSchema),
      // used when the survey is unavailable
      defaultRates: z.array(YieldRuleSchema),
      nationalDefault: z.number().min(0).max(30)
    }),
    marketTrends: z.object({
      rules: z.array(TrendRuleSchema),
      default: TrendProfileSchema
    })
  })
});

export type ApiSettings = z.infer<typeof ApiSettingsSchema>;

export function validateApiSettings(value: unknown): { success: true; data: ApiSettings } | { success: false; error: string } {
  const result = ApiSettingsSchema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error.message };
}

const TOKYO_CORE = ['港区', '千代田区', '中央区'];
const TOKYO_INNER = ['新宿区', '渋谷区', '品川区'];

export const DEFAULT_API_SETTINGS: ApiSettings = {
  dataSources: {
    landPriceApi: {
      baseUrl: 'https://www.land.mlit.go.jp/webland/api',
      enabled: false,
      timeoutMs: 5000,
      fromYear: 2023,
      toYear: 2024,
      prefectureCodes: {
        '東京都': '13',
        '神奈川県': '14',
        '大阪府': '27',
        '愛知県': '23',
        '福岡県': '40'
      },
      defaultPrefectureCode: '13'
    }
  },
  estimation: {
    yield: {
      surveyRates: [
        { name: 'tokyo-core', all: ['東京都'], any: TOKYO_CORE, rate: 3.8 },
        { name: 'tokyo-inner', all: ['東京都'], any: TOKYO_INNER, rate: 4.2 },
        { name: 'tokyo', all: ['東京都'], any: [], rate: 4.8 },
        { name: 'osaka-central', all: ['大阪'], any: ['中央区', '北区'], rate: 5.0 },
        { name: 'osaka', all: ['大阪'], any: [], rate: 5.5 },
        { name: 'nagoya', all: [], any: ['名古屋', '愛知県'], rate: 5.8 },
        { name: 'fukuoka', all: ['福岡'], any: [], rate: 6.2 }
      ],
      defaultRates: [
        { name: 'tokyo-core', all: ['東京都'], any: TOKYO_CORE, rate: 4.0 },
        { name: 'tokyo-inner', all: ['東京都'], any: TOKYO_INNER, rate: 4.3 },
        { name: 'tokyo', all: ['東京都'], any: [], rate: 4.5 },
        { name: 'kanagawa', all: ['神奈川県'], any: [], rate: 5.0 },
        { name: 'osaka', all: ['大阪府'], any: [], rate: 5.5 }
      ],
      nationalDefault: 6.0
    },
    marketTrends: {
      rules: [
        {
          name: 'tokyo-core',
          all: ['東京都'],
          any: TOKYO_CORE,
          trends: { priceTrend: 'rising', demandLevel: 'high', supplyLevel: 'low', outlook: 'favorable', confidence: 'high' }
        },
        {
          name: 'tokyo',
          all: ['東京都'],
          any: [],
          trends: { priceTrend: 'slightly_rising', demandLevel: 'medium', supplyLevel: 'medium', outlook: 'somewhat_favorable', confidence: 'medium' }
        },
        {
          name: 'major-cities',
          all: [],
          any: ['大阪', '名古屋', '福岡'],
          trends: { priceTrend: 'slightly_rising', demandLevel: 'medium', supplyLevel: 'medium', outlook: 'stable', confidence: 'medium' }
        }
      ],
      default: { priceTrend: 'flat', demandLevel: 'medium', supplyLevel: 'medium', outlook: 'stable', confidence: 'medium' }
    }
  }
};
