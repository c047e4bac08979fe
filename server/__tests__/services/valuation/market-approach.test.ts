import { describe, it, expect } from "vitest";
import type { LandPriceData, PropertyDescriptor } from "../../../../shared/schema.js";
import { MarketApproach, estimateBuildingValue } from "../../../services/valuation/market-approach.js";
import { EstimationErrorKind } from "../../../utils/estimation-errors.js";
import { fixedNow } from "../../helpers/fakes.js";

const subject: PropertyDescriptor = {
  address: "東京都港区六本木1-1-1",
  propertyType: "apartment",
  constructionYear: 2016,
  floorArea: 50,
};

const approachWith = (landPrice: () => Promise<LandPriceData>) => new MarketApproach({ landPrice }, fixedNow);

describe("estimateBuildingValue", () => {
  it("depreciates two percent a year", () => {
    expect(estimateBuildingValue("apartment", 50, 10)).toBe(7_200_000);
    expect(estimateBuildingValue("house", 100, 0)).toBe(20_000_000);
  });

  it("keeps at least a fifth of the replacement cost", () => {
    expect(estimateBuildingValue("small_building", 100, 60)).toBe(5_000_000);
  });
});

describe("MarketApproach", () => {
  it("adds land value to the building value", async () => {
    const approach = approachWith(async () => ({ pricePerSqm: 650_000, source: "test survey" }));

    expect(await approach.estimate(subject)).toEqual({
      method: "market_based",
      estimatedPrice: 39_700_000,
      confidence: "medium",
      landPricePerSqm: 650_000,
      buildingValue: 7_200_000,
      landPriceSource: "test survey",
    });
  });

  it("has low confidence on the default land price", async () => {
    const approach = approachWith(async () => ({ pricePerSqm: 400_000, source: "default", error: "disabled" }));

    expect(await approach.estimate(subject)).toMatchObject({
      estimatedPrice: 27_200_000,
      confidence: "low",
      landPriceSource: "default",
    });
  });

  it("assumes a fifteen-year-old building without a construction year", async () => {
    const approach = approachWith(async () => ({ pricePerSqm: 400_000, source: "default" }));
    const result = await approach.estimate({ ...subject, constructionYear: undefined });

    expect(result).toMatchObject({ buildingValue: 6_300_000, estimatedPrice: 26_300_000 });
  });

  it("requires an address", async () => {
    let calls = 0;
    const approach = approachWith(async () => {
      calls++;
      return { pricePerSqm: 400_000, source: "default" };
    });

    expect(await approach.estimate({ ...subject, address: undefined })).toEqual({
      method: "market_based",
      estimatedPrice: null,
      confidence: "low",
      error: { kind: EstimationErrorKind.INPUT_MISSING, message: "address is required for the market method" },
    });
    expect(calls).toBe(0);
  });

  it("reports a rejected land price lookup as an unavailable upstream", async () => {
    const approach = approachWith(async () => {
      throw new Error("cache exploded");
    });

    expect(await approach.estimate(subject)).toMatchObject({
      estimatedPrice: null,
      error: { kind: EstimationErrorKind.UPSTREAM_UNAVAILABLE, message: "land price lookup failed: cache exploded" },
    });
  });
});
