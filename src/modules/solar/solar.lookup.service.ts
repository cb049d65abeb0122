/**
 * Solar Lookup Service
 * ====================
 * Postal code → coordinates (network) → sunrise/sunset (local computation).
 */

import type { Logger } from '../../common/logger.js';
import { computeSunTimes } from './sun.times.js';
import type { ZipcodeGeocoder } from './zipcode.geocoder.js';
import type { SolarEvent, SolarLookup } from './solar.types.js';

export class SolarLookupService implements SolarLookup {
  constructor(
    private readonly geocoder: Pick<ZipcodeGeocoder, 'geocode'>,
    private readonly logger: Logger
  ) {}

  async getSunriseSunset(locationKey: string, date: Date, signal?: AbortSignal): Promise<SolarEvent> {
    const coords = await this.geocoder.geocode(locationKey, signal);
    const event = computeSunTimes(coords, date);

    this.logger.info({
      locationKey,
      sunrise: event.sunriseTime.toISOString(),
      sunset: event.sunsetTime.toISOString(),
    }, 'Sunrise/sunset computed');

    return event;
  }
}
