/**
 * Zipcode Geocoder
 * Source: Zippopotam.us (public, no key required)
 *
 * Endpoint: https://api.zippopotam.us/{country}/{zipcode}
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { LookupUnavailableError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { Coordinates } from './solar.types.js';

const ZIPPOPOTAM_URL = 'https://api.zippopotam.us';
const DEFAULT_TIMEOUT_MS = 10_000;

const zippopotamResponseSchema = z.object({
  places: z.array(z.object({
    'place name': z.string().optional(),
    latitude: z.coerce.number(),
    longitude: z.coerce.number(),
  })),
});

export interface GeocoderOptions {
  country?: string;
  timeoutMs?: number;
  http?: Pick<AxiosInstance, 'get'>;
  logger: Logger;
}

export class ZipcodeGeocoder {
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly country: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  // Postal codes do not move; keep coordinates for the process lifetime
  private readonly coordinates = new Map<string, Coordinates>();

  constructor(options: GeocoderOptions) {
    this.http = options.http ?? axios.create({ baseURL: ZIPPOPOTAM_URL });
    this.country = (options.country ?? 'us').toLowerCase();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async geocode(zipcode: string, signal?: AbortSignal): Promise<Coordinates> {
    const key = `${this.country}:${zipcode}`;
    const known = this.coordinates.get(key);
    if (known) {
      return known;
    }

    let body: unknown;
    try {
      const startMs = Date.now();
      const response = await this.http.get<unknown>(
        `/${encodeURIComponent(this.country)}/${encodeURIComponent(zipcode)}`,
        { timeout: this.timeoutMs, signal }
      );
      body = response.data;
      this.logger.debug?.({ zipcode, latencyMs: Date.now() - startMs }, 'Geocoder response received');
    } catch (err) {
      throw new LookupUnavailableError(`Geocoding ${zipcode} failed: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = zippopotamResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LookupUnavailableError(`Geocoding ${zipcode} returned an unexpected payload`);
    }

    const place = parsed.data.places[0];
    if (!place || !Number.isFinite(place.latitude) || !Number.isFinite(place.longitude)) {
      throw new LookupUnavailableError(`No coordinates found for zipcode ${zipcode}`);
    }

    const coords: Coordinates = { latitude: place.latitude, longitude: place.longitude };
    this.coordinates.set(key, coords);

    this.logger.info({ zipcode, place: place['place name'], ...coords }, 'Zipcode geocoded');
    return coords;
  }
}
