/**
 * Brightness controller types
 */

import type { SolarAdjustment } from '../solar/solar.types.js';

/**
 * OS-level brightness primitive. Percent is an integer 0..100.
 */
export interface BrightnessDriver {
  readonly name: string;
  getBrightness: () => Promise<number | null>;
  setBrightness: (percent: number) => Promise<void>;
}

export type TargetSource = 'curve' | 'solar';

export interface BrightnessTarget {
  brightness: number;         // 0..100, not rounded
  source: TargetSource;
  curveBrightness: number;
  solar: SolarAdjustment;
}

export type ApplyStatus = 'applied' | 'unchanged' | 'aborted';

export interface ApplyOutcome {
  status: ApplyStatus;
  target: number;             // Integer percent requested
  previous: number | null;    // Level read before applying, when the driver knows it
  brightness: number | null;  // Level the display is left at
  steps: number;              // Writes performed
}

export interface TransitionOptions {
  durationMs: number;
  steps: number;
  adjustThreshold: number;    // Skip writes when |current - target| <= this
}

export const DEFAULT_TRANSITION: TransitionOptions = {
  durationMs: 3_000,
  steps: 10,
  adjustThreshold: 5,
};
