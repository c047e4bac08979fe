import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import type { ToolDispatcher } from "../../services/tool-dispatcher.js";
import { ToolError } from "../../utils/estimation-errors.js";
import { investorFixture, propertyFixture, testServices } from "../helpers/fakes.js";

const secondProperty = propertyFixture({
  id: "p2",
  name: "Second House",
  purchase_price: 30_000_000,
  down_payment: 6_000_000,
  loan_amount: 24_000_000,
  monthly_rent: 120_000,
});

describe("ToolDispatcher", () => {
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    dispatcher = testServices().dispatcher;
  });

  async function registerFixtures() {
    await dispatcher.callTool("register_property", { property_data: propertyFixture() });
    await dispatcher.callTool("register_property", { property_data: secondProperty });
    await dispatcher.callTool("register_investor", { investor_data: investorFixture() });
  }

  it("lists every tool", () => {
    expect(dispatcher.listTools().map((tool) => tool.name)).toEqual([
      "analyze_property",
      "register_property",
      "register_investor",
      "compare_properties",
      "portfolio_analysis",
      "estimate_sale_price",
      "lookup_land_price",
      "lookup_area_yield",
      "lookup_comparables",
      "lookup_market_trends",
    ]);
  });

  it("rejects unknown tools with a 404", async () => {
    await expect(dispatcher.callTool("delete_everything", {})).rejects.toMatchObject({
      name: "ToolError",
      status: 404,
      message: "Unknown tool: delete_everything",
    });
  });

  describe("analyze_property", () => {
    it("renders the full analysis with default financing", async () => {
      const text = await dispatcher.callTool("analyze_property", { property_price: 20_000_000, monthly_rent: 100_000 });

      expect(text).toBe(
        [
          "🏠 Property Investment Analysis",
          "",
          "📊 Basics",
          "- Price: ¥20,000,000",
          "- Monthly rent: ¥100,000",
          "- Loan ratio: 80%",
          "",
          "📈 Profitability",
          "- Gross yield: 6.00%",
          "- Net yield: 4.80%",
          "- Monthly cash flow: ¥8,221",
          "- Annual cash flow: ¥98,656",
          "",
          "💰 Payback",
          "- Payback period: 40.5 years",
          "- Monthly loan payment: ¥71,779",
          "",
          "🏛️ Tax",
          "- Annual depreciation: ¥636,364",
          "- Annual tax benefit: ¥0",
          "- After-tax annual income: ¥98,656",
          "",
          "💎 High-yield property: attractive returns.",
        ].join("\n")
      );
    });

    it("accepts percentages for the loan ratio and interest rate", async () => {
      const text = await dispatcher.callTool("analyze_property", {
        purchase_price: 20_000_000,
        monthly_rent: 100_000,
        loan_ratio: 70,
        interest_rate: 2.5,
      });
      const lines = text.split("\n");

      expect(lines).toContain("- Loan ratio: 70%");
      expect(lines).toContain("- Monthly loan payment: ¥62,806");
    });

    it("reports missing fields as an input error", async () => {
      expect(await dispatcher.callTool("analyze_property", { purchase_price: 20_000_000 })).toBe(
        "Input error: monthly_rent is required"
      );
    });

    it("reports mistyped fields as an input error", async () => {
      expect(await dispatcher.callTool("analyze_property", { purchase_price: "a lot", monthly_rent: 100_000 })).toBe(
        "Input error: purchase_price: Expected number, received string"
      );
    });

    it("rejects a loan above the price", async () => {
      expect(
        await dispatcher.callTool("analyze_property", {
          purchase_price: 20_000_000,
          monthly_rent: 100_000,
          loan_amount: 25_000_000,
        })
      ).toBe("Input error: Loan amount cannot exceed purchase price");
    });
  });

  describe("registries", () => {
    it("confirms registrations", async () => {
      expect(await dispatcher.callTool("register_property", { property_data: propertyFixture() })).toBe(
        "✅ Registered property 'Test Mansion' (ID: p1)."
      );
      expect(await dispatcher.callTool("register_investor", { investor_data: investorFixture() })).toBe(
        "✅ Registered investor profile (ID: i1)."
      );
    });

    it("reports invalid property data", async () => {
      const text = await dispatcher.callTool("register_property", { property_data: { id: "x" } });
      expect(text).toMatch(/^Input error: property_data\.name: Required/);
    });
  });

  describe("compare_properties", () => {
    it("ranks properties by gross yield", async () => {
      await registerFixtures();
      const text = await dispatcher.callTool("compare_properties", { property_ids: ["p2", "p1"] });

      expect(text).toBe(
        [
          "🔍 Property Comparison",
          "",
          "1. Test Mansion (p1)",
          "   Gross yield: 6%",
          "   Monthly cash flow: ¥28,221",
          "   Payback: 11.8 years",
          "",
          "2. Second House (p2)",
          "   Gross yield: 4.8%",
          "   Monthly cash flow: ¥12,332",
          "   Payback: 40.5 years",
        ].join("\n")
      );
    });

    it("needs at least two properties", async () => {
      expect(await dispatcher.callTool("compare_properties", { property_ids: ["p1"] })).toBe(
        "At least two properties are required for a comparison."
      );
    });

    it("rejects unknown properties", async () => {
      await registerFixtures();
      await expect(dispatcher.callTool("compare_properties", { property_ids: ["p1", "zzz"] })).rejects.toThrow(
        "Property not found: zzz"
      );
    });
  });

  describe("portfolio_analysis", () => {
    it("summarizes the investor's properties", async () => {
      await registerFixtures();
      const text = await dispatcher.callTool("portfolio_analysis", { investor_id: "i1" });

      expect(text).toBe(
        [
          "💼 Portfolio Analysis (investor: intermediate)",
          "",
          "📊 Portfolio Summary",
          "- Properties: 2",
          "- Total investment: ¥50,000,000",
          "- Total monthly rent: ¥220,000",
          "- Total annual cash flow: ¥486,640",
          "- Target monthly income reached: 110.0%",
          "",
          "🧭 Guidance",
          "- Investment budget: ¥48,000,000",
          "- Recommended loan ratio: 80%",
        ].join("\n")
      );
    });

    it("restricts to the listed properties", async () => {
      await registerFixtures();
      const text = await dispatcher.callTool("portfolio_analysis", { investor_id: "i1", property_ids: ["p2"] });
      expect(text.split("\n")).toContain("- Properties: 1");
    });

    it("reports an empty selection", async () => {
      await registerFixtures();
      expect(await dispatcher.callTool("portfolio_analysis", { investor_id: "i1", property_ids: [] })).toBe(
        "No properties to analyze."
      );
    });

    it("rejects unknown investors", async () => {
      const failure = dispatcher.callTool("portfolio_analysis", { investor_id: "nobody" });
      await expect(failure).rejects.toBeInstanceOf(ToolError);
      await expect(failure).rejects.toThrow("Investor not found: nobody");
    });
  });

  describe("estimate_sale_price", () => {
    it("renders a yield-only estimate for a registered property", async () => {
      await registerFixtures();
      const text = await dispatcher.callTool("estimate_sale_price", {
        property_id: "p1",
        estimation_methods: ["yield_based"],
      });

      expect(text).toBe(
        [
          "🏷️ Sale Price Estimate (ID: p1)",
          "",
          "💰 Estimated price: ¥31,580,000",
          "- Methods used: yield_based",
          "- Confidence: low (0.30)",
          "",
          "📋 By method",
          "- yield_based: ¥31,580,000 (area yield 3.8%)",
          "",
          "💡 Recommendations",
          "- ✨ Expected appreciation of about 57.9% since purchase.",
          "- 🔍 Estimate confidence is low. A professional appraisal is recommended.",
          "- 🏠 Low-yield area; consider selling to an owner-occupier.",
        ].join("\n")
      );
    });

    it("lets inline fields override the registered property", async () => {
      await registerFixtures();
      const result = await dispatcher.estimate({
        property_id: "p1",
        monthly_rent: 190_000,
        estimation_methods: ["yield_based"],
      });
      // 2,280,000 / 3.8%
      expect(result.finalEstimate.price).toBe(60_000_000);
    });

    it("treats a blank address as missing", async () => {
      const result = await dispatcher.estimate({
        address: "   ",
        monthly_rent: 100_000,
        estimation_methods: ["market_based", "yield_based"],
      });

      expect(result.propertyId).toBe("unknown");
      expect(result.estimates.market_based).toMatchObject({ estimatedPrice: null, error: { kind: "input_missing" } });
      // national default yield of 6%
      expect(result.finalEstimate.price).toBe(20_000_000);
    });

    it("rejects unknown methods", async () => {
      const text = await dispatcher.callTool("estimate_sale_price", { estimation_methods: ["astrology"] });
      expect(text).toMatch(/^Input error: estimation_methods/);
    });

    it("rejects unknown property ids", async () => {
      await expect(dispatcher.callTool("estimate_sale_price", { property_id: "ghost" })).rejects.toMatchObject({
        status: 404,
        message: "Property not found: ghost",
      });
    });
  });

  describe("market data lookups", () => {
    it("returns the default land price while the API is disabled", async () => {
      const text = await dispatcher.callTool("lookup_land_price", { address: "東京都港区" });
      expect(JSON.parse(text)).toEqual({
        address: "東京都港区",
        pricePerSqm: 400_000,
        source: "default",
        error: "land price API is disabled",
      });
    });

    it("returns the survey yield", async () => {
      const text = await dispatcher.callTool("lookup_area_yield", { address: "東京都渋谷区" });
      expect(JSON.parse(text)).toEqual({ address: "東京都渋谷区", areaYieldRate: 4.2 });
    });

    it("returns market trends", async () => {
      const text = await dispatcher.callTool("lookup_market_trends", { address: "東京都港区", property_type: "house" });
      expect(JSON.parse(text)).toEqual({
        address: "東京都港区",
        propertyType: "house",
        priceTrend: "rising",
        demandLevel: "high",
        supplyLevel: "low",
        outlook: "favorable",
        confidence: "high",
      });
    });

    it("returns synthesized comparables", async () => {
      const text = await dispatcher.callTool("lookup_comparables", { lat: 35.6581, lon: 139.7516 });
      const sales = z.array(z.object({ id: z.string(), propertyType: z.string() })).parse(JSON.parse(text));

      expect(sales.length).toBeGreaterThanOrEqual(3);
      expect(sales.length).toBeLessThanOrEqual(8);
      expect(new Set(sales.map((s) => s.propertyType))).toEqual(new Set(["apartment"]));
    });

    it("validates coordinates", async () => {
      const text = await dispatcher.callTool("lookup_comparables", { lat: 120, lon: 139.7 });
      expect(text).toMatch(/^Input error: lat: /);
    });
  });

  describe("resources", () => {
    it("lists registered properties and investors", async () => {
      await registerFixtures();
      expect((await dispatcher.listResources()).map((r) => r.uri)).toEqual([
        "property://local.host/p1",
        "property://local.host/p2",
        "investor://local.host/i1",
      ]);
    });

    it("reads a property with derived figures", async () => {
      await registerFixtures();
      const text = await dispatcher.readResource("property://local.host/p1");

      expect(JSON.parse(text)).toMatchObject({ id: "p1", name: "Test Mansion", age: 10, annualRent: 1_200_000, annualExpenses: 0 });
    });

    it("reads an investor with guidance figures", async () => {
      await registerFixtures();
      const text = await dispatcher.readResource("investor://local.host/i1");

      expect(JSON.parse(text)).toMatchObject({ id: "i1", investmentBudget: 48_000_000, recommendedLoanRatio: 0.8 });
    });

    it("rejects unknown URIs and ids", async () => {
      await expect(dispatcher.readResource("ftp://local.host/p1")).rejects.toThrow("Unknown resource URI: ftp://local.host/p1");
      await expect(dispatcher.readResource("investor://local.host/nobody")).rejects.toMatchObject({ status: 404 });
    });
  });
});
