/**
 * Solar modifier types
 */

export interface SolarConfig {
  locationKey: string;        // Postal code
  country: string;            // Postal code country, e.g. 'us'
  enabled: boolean;
  sunriseBrightness: number;  // Target between sunrise and sunset
  sunsetBrightness: number;   // Target between sunset and next sunrise
  minModifier: number;
  maxModifier: number;
}

export interface SolarEvent {
  sunriseTime: Date;
  sunsetTime: Date;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type SolarPhase = 'day' | 'night';

export type SolarAdjustment =
  | { kind: 'disabled' }
  | { kind: 'unavailable'; reason: string }
  | { kind: 'adjusted'; phase: SolarPhase; brightness: number };

/**
 * Sunrise/sunset source for a location on a given date.
 * Implementations throw LookupUnavailableError on failure.
 */
export interface SolarLookup {
  getSunriseSunset: (locationKey: string, date: Date, signal?: AbortSignal) => Promise<SolarEvent>;
}

export type SolarEventResult =
  | { ok: true; event: SolarEvent; cached: boolean }
  | { ok: false; reason: string };
