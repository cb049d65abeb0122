/**
 * Brightness Controller
 * =====================
 * Owns the desired-brightness decision and its application.
 *
 * Precedence, not blending: when the solar modifier is enabled and has an
 * event for today its value is the target, otherwise the base curve is.
 */

import { clamp } from '../../common/math.js';
import { ApplyFailureError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { evaluateCurve } from '../curve/curve.evaluator.js';
import { BRIGHTNESS_MAX, BRIGHTNESS_MIN, type CurveParameters } from '../curve/curve.types.js';
import type { SolarModifier } from '../solar/solar.modifier.js';
import { runTransition, type TransitionContext } from './brightness.transition.js';
import {
  DEFAULT_TRANSITION,
  type ApplyOutcome,
  type BrightnessDriver,
  type BrightnessTarget,
  type TransitionOptions,
} from './brightness.types.js';

export interface BrightnessControllerOptions {
  curve: CurveParameters;
  solar: Pick<SolarModifier, 'resolve'>;
  driver: BrightnessDriver;
  logger: Logger;
  transition?: Partial<TransitionOptions>;
  sleep?: TransitionContext['sleep'];
}

export function toPercent(brightness: number): number {
  if (!Number.isFinite(brightness)) {
    return brightness > 0 ? BRIGHTNESS_MAX : BRIGHTNESS_MIN;
  }
  return clamp(Math.round(brightness), BRIGHTNESS_MIN, BRIGHTNESS_MAX);
}

export class BrightnessController {
  private readonly transition: TransitionOptions;

  constructor(private readonly options: BrightnessControllerOptions) {
    this.transition = { ...DEFAULT_TRANSITION, ...options.transition };
  }

  get driverName(): string {
    return this.options.driver.name;
  }

  async computeTarget(now: Date): Promise<BrightnessTarget> {
    const curveBrightness = evaluateCurve(now, this.options.curve);
    const solar = await this.options.solar.resolve(now);

    if (solar.kind === 'adjusted') {
      return {
        brightness: clamp(solar.brightness, BRIGHTNESS_MIN, BRIGHTNESS_MAX),
        source: 'solar',
        curveBrightness,
        solar,
      };
    }

    return { brightness: curveBrightness, source: 'curve', curveBrightness, solar };
  }

  /**
   * Apply a brightness through the driver. Throws ApplyFailureError when the
   * driver rejects a write; callers decide how loud that is.
   */
  async apply(brightness: number, signal?: AbortSignal): Promise<ApplyOutcome> {
    const target = toPercent(brightness);
    const { driver, logger } = this.options;

    let previous: number | null;
    try {
      previous = await driver.getBrightness();
    } catch (err) {
      // Unknown level: the target is written directly
      logger.warn({ driver: driver.name, error: errorMessage(err) }, 'Could not read current brightness');
      previous = null;
    }

    if (previous !== null && Math.abs(previous - target) <= this.transition.adjustThreshold) {
      logger.debug?.({ previous, target }, 'Brightness already close to target');
      return { status: 'unchanged', target, previous, brightness: previous, steps: 0 };
    }

    if (signal?.aborted) {
      return { status: 'aborted', target, previous, brightness: previous, steps: 0 };
    }

    if (previous === null) {
      try {
        await driver.setBrightness(target);
      } catch (err) {
        throw new ApplyFailureError(target, `${driver.name}: setting brightness to ${target}% failed: ${errorMessage(err)}`, { cause: err });
      }
      return { status: 'applied', target, previous, brightness: target, steps: 1 };
    }

    const result = await runTransition(driver, previous, target, this.transition, {
      signal,
      sleep: this.options.sleep,
    });

    logger.info({ previous, target, writes: result.writes, status: result.status }, 'Brightness transition finished');

    return {
      status: result.status,
      target,
      previous,
      brightness: result.brightness,
      steps: result.writes,
    };
  }
}
