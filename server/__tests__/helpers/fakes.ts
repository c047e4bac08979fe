import { createAppServices, type ServiceOptions } from "../../app-services.js";
import { DEFAULT_API_SETTINGS } from "../../config/config-schema.js";
import type { Coordinates, LandPriceData, MarketTrends, PropertyType } from "../../../shared/schema.js";
import type { Geocoder, GeocodeError } from "../../services/geocoder.js";
import type { MarketUpstream } from "../../services/market-upstream.js";
import { UpstreamUnavailableError } from "../../utils/estimation-errors.js";
import { createSeededRandom } from "../../utils/random-source.js";
import { Result, err, ok } from "../../utils/result.js";

// Mid-year, so the local calendar year is 2026 in every time zone
export const FIXED_NOW = new Date("2026-06-15T12:00:00Z");
export const fixedNow = () => FIXED_NOW;

/**
 * Scriptable upstream: fixed answers, call counters and a failure switch
 */
export class FakeUpstream implements MarketUpstream {
  failing = false;
  calls = { landPrice: 0, areaYield: 0, marketTrends: 0 };

  constructor(
    private readonly answers: {
      landPrice?: LandPriceData;
      areaYield?: number;
      trends?: MarketTrends;
    } = {}
  ) {}

  async fetchLandPrice(_address: string): Promise<LandPriceData> {
    this.calls.landPrice++;
    if (this.failing) throw new UpstreamUnavailableError("land_price", "connection refused");
    return this.answers.landPrice ?? { pricePerSqm: 650_000, source: "test survey" };
  }

  async fetchAreaYield(_address: string): Promise<number> {
    this.calls.areaYield++;
    if (this.failing) throw new UpstreamUnavailableError("area_yield", "connection refused");
    return this.answers.areaYield ?? 4.5;
  }

  async fetchMarketTrends(_address: string, _propertyType: PropertyType): Promise<MarketTrends> {
    this.calls.marketTrends++;
    if (this.failing) throw new UpstreamUnavailableError("market_trends", "connection refused");
    return (
      this.answers.trends ?? {
        priceTrend: "rising",
        demandLevel: "high",
        supplyLevel: "low",
        outlook: "favorable",
        confidence: "high",
      }
    );
  }
}

export class FixedGeocoder implements Geocoder {
  calls: string[] = [];

  constructor(private readonly outcome: Result<Coordinates, GeocodeError> = ok({ lat: 35.6581, lon: 139.7516 })) {}

  async geocode(address: string): Promise<Result<Coordinates, GeocodeError>> {
    this.calls.push(address);
    return this.outcome;
  }
}

export const unknownAddressGeocoder = () =>
  new FixedGeocoder(err({ kind: "not_found", message: "address not found" }));

export const propertyFixture = (overrides: Record<string, unknown> = {}) => ({
  id: "p1",
  name: "Test Mansion",
  address: "東京都港区六本木1-1-1",
  type: "apartment",
  construction_year: 2016,
  room_layout: "1LDK",
  floor_area: 45,
  purchase_price: 20_000_000,
  down_payment: 4_000_000,
  loan_amount: 16_000_000,
  monthly_rent: 100_000,
  ...overrides,
});

export const investorFixture = (overrides: Record<string, unknown> = {}) => ({
  id: "i1",
  annual_income: 8_000_000,
  tax_bracket: 0.2,
  investment_experience: "intermediate",
  risk_tolerance: "moderate",
  available_cash: 5_000_000,
  monthly_savings: 100_000,
  target_monthly_income: 200_000,
  investment_period: 20,
  ...overrides,
});

/**
 * Services on built-in settings: survey upstream (land price API disabled),
 * a fixed geocoder, seeded comparables and a fixed clock
 */
export const testServices = (overrides: Partial<ServiceOptions> = {}) =>
  createAppServices({
    settings: DEFAULT_API_SETTINGS,
    geocoder: new FixedGeocoder(),
    random: createSeededRandom(1),
    now: fixedNow,
    ...overrides,
  });
