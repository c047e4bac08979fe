/**
 * Land Price API Client
 *
 * Reads recent trade prices from the government real-estate transaction API
 * (TradeListSearch) and reduces them to an average price per square meter.
 * Disabled by default; when disabled every call reports the upstream as
 * unavailable so callers fall back to their defaults.
 */

import { z } from 'zod';
import type { LandPriceData } from '../../shared/schema.js';
import type { LandPriceApiSettings } from '../config/config-schema.js';
import { UpstreamUnavailableError } from '../utils/estimation-errors.js';
import { describeError } from '../utils/result.js';
import { upperMedian } from '../utils/numbers.js';

export const DEFAULT_LAND_PRICE_PER_SQM = 400_000;
const MAX_TRADES = 50;
// TradePrice is quoted in units of 10,000 yen
const TRADE_PRICE_UNIT = 10_000;

const TradeRowZ = z
  .object({
    TradePrice: z.union([z.string(), z.number()]).optional(),
    Area: z.union([z.string(), z.number()]).optional()
  })
  .passthrough();

const TradeListResponseZ = z.object({
  data: z.array(TradeRowZ).default([])
});

type TradeRow = z.infer<typeof TradeRowZ>;

export class LandPriceApiClient {
  constructor(
    private readonly settings: LandPriceApiSettings,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  isEnabled(): boolean {
    return this.settings.enabled;
  }

  async fetchLandPrice(address: string): Promise<LandPriceData> {
    if (!this.isEnabled()) {
      throw new UpstreamUnavailableError('land_price', 'land price API is disabled');
    }

    const params = new URLSearchParams({
      area: this.prefectureCode(address),
      from: String(this.settings.fromYear),
      to: String(this.settings.toYear)
    });
    const url = `${this.settings.baseUrl}/TradeListSearch?${params.toString()}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'User-Agent': 'RealEstateInvestmentService/1.0' },
        signal: AbortSignal.timeout(this.settings.timeoutMs)
      });
    } catch (error) {
      throw new UpstreamUnavailableError('land_price', `land price API request failed: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new UpstreamUnavailableError('land_price', `land price API status ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamUnavailableError('land_price', `land price API returned invalid JSON: ${describeError(error)}`);
    }

    const parsed = TradeListResponseZ.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamUnavailableError('land_price', `unexpected land price API payload: ${parsed.error.message}`);
    }

    return summarizeTrades(parsed.data.data);
  }

  /**
   * Prefecture code for the address; unknown prefectures use the default code
   */
  prefectureCode(address: string): string {
    for (const [prefecture, code] of Object.entries(this.settings.prefectureCodes)) {
      if (address.includes(prefecture)) return code;
    }
    return this.settings.defaultPrefectureCode;
  }
}

export function summarizeTrades(rows: TradeRow[]): LandPriceData {
  if (rows.length === 0) {
    return { pricePerSqm: DEFAULT_LAND_PRICE_PER_SQM, source: 'land price API (no data)', count: 0 };
  }

  const pricesPerSqm: number[] = [];
  for (const row of rows.slice(0, MAX_TRADES)) {
    const tradePrice = toNumber(row.TradePrice);
    const area = toNumber(row.Area);
    if (tradePrice === null || area === null || area <= 0) continue;
    pricesPerSqm.push((tradePrice * TRADE_PRICE_UNIT) / area);
  }

  if (pricesPerSqm.length === 0) {
    return { pricePerSqm: DEFAULT_LAND_PRICE_PER_SQM, source: 'land price API (unparsable data)', count: 0 };
  }

  const average = pricesPerSqm.reduce((a, b) => a + b, 0) / pricesPerSqm.length;
  return {
    pricePerSqm: Math.trunc(average),
    source: `land price API (average of ${pricesPerSqm.length} trades)`,
    count: pricesPerSqm.length,
    priceRange: {
      min: Math.min(...pricesPerSqm),
      max: Math.max(...pricesPerSqm),
      median: upperMedian(pricesPerSqm)
    }
  };
}

function toNumber(value: string | number | undefined): number | null {
  if (value === undefined || value === '-' || value === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}
