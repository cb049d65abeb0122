/**
 * Curve Evaluator
 * ===============
 * Time of day → brightness along a sine wave:
 *
 *   baseLevel + amplitude * sin(2π * (hours + phaseOffsetHours) / cycleHours)
 *
 * The result is always within [0, 100]. Out-of-range hours (negative, > 24,
 * fractional) are accepted; sine makes the curve periodic in cycleHours.
 */

import { clamp } from '../../common/math.js';
import { BRIGHTNESS_MAX, BRIGHTNESS_MIN, type CurveParameters } from './curve.types.js';

const MS_PER_HOUR = 3_600_000;

/**
 * Fractional hours since local midnight.
 */
export function hoursSinceMidnight(date: Date): number {
  return date.getHours()
    + date.getMinutes() / 60
    + date.getSeconds() / 3600
    + date.getMilliseconds() / MS_PER_HOUR;
}

export function clampBrightness(value: number, fallback: number): number {
  if (Number.isNaN(value)) {
    return Number.isFinite(fallback) ? clamp(fallback, BRIGHTNESS_MIN, BRIGHTNESS_MAX) : BRIGHTNESS_MIN;
  }
  // ±Infinity lands on the nearest bound
  return clamp(value, BRIGHTNESS_MIN, BRIGHTNESS_MAX);
}

export function evaluateCurve(now: Date | number, params: CurveParameters): number {
  const hours = typeof now === 'number' ? now : hoursSinceMidnight(now);
  const angle = (2 * Math.PI * (hours + params.phaseOffsetHours)) / params.cycleHours;
  const raw = params.baseLevel + params.amplitude * Math.sin(angle);

  return clampBrightness(raw, params.baseLevel);
}
