import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { z } from 'zod';

import { formatIssues, MiqatError } from '../common/errors';
import { HTTP_CLIENT } from '../http/http.constants';

import catalogueData from './data/locations.json';
import { Location, locationCatalogueSchema } from './location.schema';

const EARTH_RADIUS_KM = 6371;
const DEFAULT_CITY = 'İstanbul';

const ipLookupSchema = z.object({
  latitude: z.coerce.number(),
  longitude: z.coerce.number(),
});

const geocoderResultSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
    address: z
      .object({
        city: z.string().optional(),
        town: z.string().optional(),
        village: z.string().optional(),
        municipality: z.string().optional(),
        state: z.string().optional(),
        country: z.string().optional(),
        country_code: z.string().optional(),
      })
      .optional(),
  }),
);

/**
 * Great-circle distance between two coordinates, in kilometres.
 */
export function haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Built-in city catalogue plus the two online lookups used by `miqat config`:
 * IP based detection and free-text search.
 */
@Injectable()
export class LocationService {
  private readonly logger = new Logger(LocationService.name);
  private readonly catalogue: Location[];
  private readonly ipLookupUrl: string;
  private readonly geocoderUrl: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
  ) {
    const parsed = locationCatalogueSchema.safeParse(catalogueData);
    if (!parsed.success) {
      throw new Error(`Invalid location catalogue:\n${formatIssues(parsed.error.errors)}`);
    }
    this.catalogue = parsed.data;
    this.ipLookupUrl = this.configService.getOrThrow<string>('api.ipLookupUrl');
    this.geocoderUrl = this.configService.getOrThrow<string>('api.geocoderUrl');
  }

  getCatalogue(): readonly Location[] {
    return this.catalogue;
  }

  getDefaultLocation(): Location {
    return this.catalogue.find((loc) => loc.city === DEFAULT_CITY) ?? this.catalogue[0];
  }

  /**
   * Closest catalogue entry, optionally restricted to one country.
   * Returns null only when the country has no entries.
   */
  findNearest(lat: number, lon: number, countryCode?: string): Location | null {
    let nearest: Location | null = null;
    let minDistance = Infinity;

    for (const loc of this.catalogue) {
      if (countryCode && loc.countryCode !== countryCode.toUpperCase()) continue;

      const distance = haversineDistance(lat, lon, loc.lat, loc.lon);
      if (distance < minDistance) {
        minDistance = distance;
        nearest = loc;
      }
    }

    return nearest;
  }

  /**
   * Detect the user's approximate position from their public IP
   * and map it to the nearest catalogue city.
   */
  async detectFromIp(): Promise<Location> {
    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(this.ipLookupUrl, { timeout: 10_000 });
      payload = response.data;
    } catch (error) {
      throw new MiqatError(`IP location lookup failed: ${describeError(error)}`, { cause: error });
    }

    const parsed = ipLookupSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MiqatError('IP location lookup returned no coordinates');
    }

    const { latitude, longitude } = parsed.data;
    this.logger.debug(`IP lookup resolved to ${latitude}, ${longitude}`);
    return this.findNearest(latitude, longitude) ?? this.getDefaultLocation();
  }

  /**
   * Search places by free text using the OpenStreetMap geocoder.
   */
  async search(query: string, limit = 5): Promise<Location[]> {
    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(this.geocoderUrl, {
        params: { format: 'json', limit: String(limit), addressdetails: '1', q: query },
        timeout: 15_000,
      });
      payload = response.data;
    } catch (error) {
      throw new MiqatError(`Location search failed: ${describeError(error)}`, { cause: error });
    }

    const parsed = geocoderResultSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MiqatError('Location search returned an unexpected response');
    }

    return parsed.data.map((item) => {
      const address = item.address ?? {};
      const city =
        address.city ?? address.town ?? address.village ?? address.municipality ?? address.state ?? 'Unknown';

      return {
        city,
        country: address.country ?? 'Unknown',
        countryCode: (address.country_code ?? 'XX').toUpperCase(),
        lat: item.lat,
        lon: item.lon,
        addressLabel: item.display_name,
      };
    });
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
