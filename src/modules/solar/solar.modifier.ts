/**
 * Solar Modifier
 * ==============
 * Sunrise/sunset → brightness target.
 *
 * Day is [sunrise, sunset), night is [sunset, next sunrise). At the exact
 * boundary instant the later phase applies. The chosen target is clamped to
 * [minModifier, maxModifier].
 */

import { clamp } from '../../common/math.js';
import type { Logger } from '../../common/logger.js';
import { hoursSinceMidnight } from '../curve/curve.evaluator.js';
import type { SolarEventCache } from './solar.cache.js';
import type { SolarAdjustment, SolarConfig, SolarEvent, SolarPhase } from './solar.types.js';

export function solarPhaseAt(now: Date, event: SolarEvent): SolarPhase {
  const t = hoursSinceMidnight(now);
  const sunrise = hoursSinceMidnight(event.sunriseTime);
  const sunset = hoursSinceMidnight(event.sunsetTime);

  if (sunrise <= sunset) {
    return t >= sunrise && t < sunset ? 'day' : 'night';
  }
  // Local clock wraps midnight between sunrise and sunset
  return t >= sunrise || t < sunset ? 'day' : 'night';
}

export function adjustForSolarEvent(now: Date, event: SolarEvent, config: SolarConfig): SolarAdjustment {
  if (!config.enabled) {
    return { kind: 'disabled' };
  }

  const phase = solarPhaseAt(now, event);
  const target = phase === 'day' ? config.sunriseBrightness : config.sunsetBrightness;
  const brightness = clamp(target, config.minModifier, config.maxModifier);

  return { kind: 'adjusted', phase, brightness };
}

export class SolarModifier {
  constructor(
    private readonly config: SolarConfig,
    private readonly cache: Pick<SolarEventCache, 'get'>,
    private readonly logger: Logger
  ) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Adjustment for `now`, fetching the day's solar event when needed.
   * Never throws: lookup problems come back as 'unavailable'.
   */
  async resolve(now: Date): Promise<SolarAdjustment> {
    if (!this.config.enabled) {
      return { kind: 'disabled' };
    }

    const result = await this.cache.get(now);
    if (!result.ok) {
      return { kind: 'unavailable', reason: result.reason };
    }

    const adjustment = adjustForSolarEvent(now, result.event, this.config);
    this.logger.debug?.({ adjustment, cached: result.cached }, 'Solar adjustment resolved');
    return adjustment;
  }
}
