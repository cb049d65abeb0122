import type { ApplyStatus, BrightnessTarget } from '../brightness/brightness.types.js';

export interface SchedulerConfig {
  intervalMs: number;         // Wait between ticks
  runOnStart: boolean;        // Tick immediately on start
}

export type LoopState = 'idle' | 'tick-active' | 'stopped';

export type TickStatus = ApplyStatus | 'skipped-manual' | 'failed';

export interface TickResult {
  tickId: string;
  status: TickStatus;
  startedAt: string;
  durationMs: number;
  target?: BrightnessTarget;
  brightness?: number | null;
  error?: string;
}
