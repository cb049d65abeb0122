/**
 * Brightness Transition
 * =====================
 * Linear fade from the current level to the target in a fixed number of
 * writes spread over durationMs. The last write is always the exact target.
 */

import { sleep as defaultSleep } from '../../common/clock.js';
import { ApplyFailureError, errorMessage } from '../../common/errors.js';
import type { BrightnessDriver, TransitionOptions } from './brightness.types.js';

export interface TransitionResult {
  status: 'applied' | 'aborted';
  brightness: number;         // Last level written (or `from` when nothing was)
  writes: number;
}

export interface TransitionContext {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function transitionLevels(from: number, to: number, steps: number): number[] {
  const count = Math.max(1, Math.floor(steps));
  const stepSize = (to - from) / count;
  const levels: number[] = [];

  for (let step = 1; step < count; step++) {
    levels.push(Math.round(from + stepSize * step));
  }
  levels.push(to);
  return levels;
}

export async function runTransition(
  driver: BrightnessDriver,
  from: number,
  to: number,
  options: Pick<TransitionOptions, 'durationMs' | 'steps'>,
  context: TransitionContext = {}
): Promise<TransitionResult> {
  const levels = transitionLevels(from, to, options.steps);
  const stepDelay = options.durationMs / levels.length;
  const sleep = context.sleep ?? defaultSleep;

  let brightness = from;
  let writes = 0;

  for (const level of levels) {
    if (context.signal?.aborted) {
      return { status: 'aborted', brightness, writes };
    }

    try {
      await driver.setBrightness(level);
    } catch (err) {
      throw new ApplyFailureError(
        to,
        `${driver.name}: setting brightness to ${level}% failed: ${errorMessage(err)}`,
        { cause: err }
      );
    }
    brightness = level;
    writes++;

    if (writes < levels.length) {
      await sleep(stepDelay, context.signal);
    }
  }

  return { status: 'applied', brightness, writes };
}
