/**
 * Sunrise and sunset for a location and local calendar date.
 */

import SunCalc from 'suncalc';
import { LookupUnavailableError } from '../../common/errors.js';
import type { Coordinates, SolarEvent } from './solar.types.js';

const isValidDate = (value: Date): boolean => Number.isFinite(value.getTime());

export function computeSunTimes(coords: Coordinates, date: Date): SolarEvent {
  // Local noon keeps the lookup on the intended calendar day in any timezone
  const noon = new Date(date.getFullYear(), date.getMonth(), date.getDate(), 12, 0, 0, 0);
  const times = SunCalc.getTimes(noon, coords.latitude, coords.longitude);

  if (!isValidDate(times.sunrise) || !isValidDate(times.sunset)) {
    // Polar day or polar night
    throw new LookupUnavailableError(
      `No sunrise/sunset at ${coords.latitude},${coords.longitude} on ${noon.toDateString()}`
    );
  }

  return { sunriseTime: times.sunrise, sunsetTime: times.sunset };
}
