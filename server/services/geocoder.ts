/**
 * Geocoding
 *
 * Resolves free-form addresses to coordinates. Failures come back as values:
 * `not_found` when the address is unknown, `service_unavailable` when the
 * provider could not be reached in time.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { Coordinates } from '../../shared/schema.js';
import { Result, describeError, err, ok } from '../utils/result.js';

export type GeocodeErrorKind = 'not_found' | 'service_unavailable';

export interface GeocodeError {
  kind: GeocodeErrorKind;
  message: string;
}

export interface Geocoder {
  geocode(address: string): Promise<Result<Coordinates, GeocodeError>>;
}

// ============================================================================
// Offline gazetteer
// ============================================================================

export const RegionCentroidZ = z.object({
  name: z.string().min(1),
  match: z.array(z.string().min(1)).min(1),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180)
});

export type RegionCentroid = z.infer<typeof RegionCentroidZ>;

/**
 * Resolves an address to the centroid of the most specific known region it
 * mentions (the entry with the most matching terms).
 */
export class RegionGeocoder implements Geocoder {
  constructor(private readonly regions: RegionCentroid[]) {}

  static async fromFile(filePath: string): Promise<RegionGeocoder> {
    const raw = await fs.readFile(filePath, 'utf-8');
    const regions = z.array(RegionCentroidZ).parse(JSON.parse(raw));
    return new RegionGeocoder(regions);
  }

  async geocode(address: string): Promise<Result<Coordinates, GeocodeError>> {
    let best: RegionCentroid | undefined;
    for (const region of this.regions) {
      if (!region.match.every((term) => address.includes(term))) continue;
      if (!best || region.match.length > best.match.length) {
        best = region;
      }
    }

    if (!best) {
      return err({ kind: 'not_found', message: `address not found: ${address}` });
    }
    return ok({ lat: best.lat, lon: best.lon });
  }
}

// ============================================================================
// Nominatim (OpenStreetMap)
// ============================================================================

const NominatimResponseZ = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number()
  })
);

export class NominatimGeocoder implements Geocoder {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async geocode(address: string): Promise<Result<Coordinates, GeocodeError>> {
    const params = new URLSearchParams({ q: address, format: 'json', limit: '1' });

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/search?${params.toString()}`, {
        headers: { 'User-Agent': 'RealEstateInvestmentService/1.0' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      return err({ kind: 'service_unavailable', message: `geocoder request failed: ${describeError(error)}` });
    }

    if (!response.ok) {
      return err({ kind: 'service_unavailable', message: `geocoder status ${response.status}` });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return err({ kind: 'service_unavailable', message: `geocoder returned invalid JSON: ${describeError(error)}` });
    }

    const parsed = NominatimResponseZ.safeParse(body);
    if (!parsed.success) {
      return err({ kind: 'service_unavailable', message: 'unexpected geocoder payload' });
    }

    const [first] = parsed.data;
    if (!first) {
      return err({ kind: 'not_found', message: `address not found: ${address}` });
    }
    return ok({ lat: first.lat, lon: first.lon });
  }
}
