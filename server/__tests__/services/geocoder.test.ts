import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { NominatimGeocoder, RegionGeocoder } from "../../services/geocoder.js";

const CENTROIDS_PATH = fileURLToPath(new URL("../../../data/region-centroids.json", import.meta.url));

describe("RegionGeocoder", () => {
  const geocoder = new RegionGeocoder([
    { name: "Tokyo", match: ["東京都"], lat: 35.6895, lon: 139.6917 },
    { name: "Minato", match: ["東京都", "港区"], lat: 35.6581, lon: 139.7516 },
  ]);

  it("prefers the region with the most matching terms", async () => {
    expect(await geocoder.geocode("東京都港区六本木1-1-1")).toEqual({ ok: true, value: { lat: 35.6581, lon: 139.7516 } });
  });

  it("falls back to the broader region", async () => {
    expect(await geocoder.geocode("東京都世田谷区")).toEqual({ ok: true, value: { lat: 35.6895, lon: 139.6917 } });
  });

  it("reports unknown addresses as not found", async () => {
    expect(await geocoder.geocode("沖縄県那覇市")).toEqual({
      ok: false,
      error: { kind: "not_found", message: "address not found: 沖縄県那覇市" },
    });
  });

  it("loads the bundled centroid table", async () => {
    const fromFile = await RegionGeocoder.fromFile(CENTROIDS_PATH);

    expect(await fromFile.geocode("大阪府大阪市北区梅田1-1")).toEqual({ ok: true, value: { lat: 34.7055, lon: 135.4983 } });
    expect(await fromFile.geocode("北海道札幌市中央区")).toEqual({ ok: true, value: { lat: 43.0621, lon: 141.3544 } });
  });
});

describe("NominatimGeocoder", () => {
  function geocoderAnswering(respond: () => Response) {
    const urls: string[] = [];
    const fetchImpl: typeof fetch = async (input) => {
      urls.push(String(input));
      return respond();
    };
    return { geocoder: new NominatimGeocoder("https://geo.test", 1000, fetchImpl), urls };
  }

  it("parses the first hit and sends a single-result query", async () => {
    const { geocoder, urls } = geocoderAnswering(() => Response.json([{ lat: "35.5", lon: "139.5", display_name: "x" }]));

    expect(await geocoder.geocode("東京都港区")).toEqual({ ok: true, value: { lat: 35.5, lon: 139.5 } });
    const url = new URL(urls[0]);
    expect(url.pathname).toBe("/search");
    expect(url.searchParams.get("q")).toBe("東京都港区");
    expect(url.searchParams.get("format")).toBe("json");
    expect(url.searchParams.get("limit")).toBe("1");
  });

  it("reports an empty answer as not found", async () => {
    const { geocoder } = geocoderAnswering(() => Response.json([]));
    const result = await geocoder.geocode("nowhere");
    expect(result).toEqual({ ok: false, error: { kind: "not_found", message: "address not found: nowhere" } });
  });

  it("reports a failing status as service unavailable", async () => {
    const { geocoder } = geocoderAnswering(() => new Response("busy", { status: 503 }));
    expect(await geocoder.geocode("東京都")).toEqual({
      ok: false,
      error: { kind: "service_unavailable", message: "geocoder status 503" },
    });
  });

  it("reports transport errors as service unavailable", async () => {
    const geocoder = new NominatimGeocoder("https://geo.test", 1000, async () => {
      throw new Error("timed out");
    });
    expect(await geocoder.geocode("東京都")).toEqual({
      ok: false,
      error: { kind: "service_unavailable", message: "geocoder request failed: timed out" },
    });
  });

  it("reports an unexpected payload as service unavailable", async () => {
    const { geocoder } = geocoderAnswering(() => Response.json({ error: "bad" }));
    expect(await geocoder.geocode("東京都")).toEqual({
      ok: false,
      error: { kind: "service_unavailable", message: "unexpected geocoder payload" },
    });
  });
});
