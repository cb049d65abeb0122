/**
 * Brightness curve types
 */

export interface CurveParameters {
  amplitude: number;          // Swing around baseLevel, > 0
  baseLevel: number;          // Midline, 0..100
  cycleHours: number;         // Period, usually 24
  phaseOffsetHours: number;   // Shifts the peak; -6 puts it at noon for a 24h cycle
}

export const BRIGHTNESS_MIN = 0;
export const BRIGHTNESS_MAX = 100;
