import { z } from 'zod';
import { getEnv } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import type { Geocoder } from '../monitor/types.js';

export const UNKNOWN_ADDRESS = 'Unknown Address';
export const DISTANCE_UNKNOWN = 'Distance unknown';

const EARTH_RADIUS_KM = 6371;

export class GeocoderError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'GeocoderError';
  }
}

const reverseResponseSchema = z.object({
  display_name: z.string().optional(),
  error: z.string().optional(),
});

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Great-circle distance in kilometres. */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a));
}

export function calculateDistance(
  lat1: number | null,
  lon1: number | null,
  lat2: number | null,
  lon2: number | null,
): string {
  if (lat1 === null || lon1 === null || lat2 === null || lon2 === null) return DISTANCE_UNKNOWN;
  return `${haversineKm(lat1, lon1, lat2, lon2).toFixed(1)} km`;
}

export interface NominatimOptions {
  baseUrl: string;
  userAgent: string;
}

/**
 * Reverse geocoding against a Nominatim-compatible endpoint.
 */
export class NominatimGeocoder implements Geocoder {
  constructor(private readonly options: NominatimOptions) {}

  async reverseGeocode(lat: number, lon: number): Promise<string> {
    const params = new URLSearchParams({ format: 'jsonv2', lat: String(lat), lon: String(lon) });
    const url = `${this.options.baseUrl.replace(/\/$/, '')}/reverse?${params.toString()}`;

    const response = await fetch(url, {
      headers: { 'User-Agent': this.options.userAgent, 'Accept-Language': 'en' },
    });

    if (!response.ok) {
      throw new GeocoderError(`Reverse geocode failed: ${response.status} ${response.statusText}`, response.status);
    }

    const body = reverseResponseSchema.parse(await response.json());
    if (!body.display_name) {
      getLogger().warn({ lat, lon, error: body.error }, 'Reverse geocode returned no address');
      return UNKNOWN_ADDRESS;
    }
    return body.display_name;
  }

  calculateDistance(lat1: number | null, lon1: number | null, lat2: number | null, lon2: number | null): string {
    return calculateDistance(lat1, lon1, lat2, lon2);
  }
}

export function createGeocoder(): NominatimGeocoder {
  const env = getEnv();
  return new NominatimGeocoder({ baseUrl: env.GEOCODER_BASE_URL, userAgent: env.GEOCODER_USER_AGENT });
}
