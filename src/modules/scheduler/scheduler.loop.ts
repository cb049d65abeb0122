/**
 * Scheduler Loop
 * ==============
 * Periodic recompute-and-apply of the display brightness.
 *
 *   idle ──timer──▶ tick-active ──done──▶ idle (timer re-armed)
 *
 * A manual-mode tick is a no-op that still re-arms the timer. Ticks never
 * overlap: the next wait starts only after the previous tick settles.
 * stop() clears the pending wait and aborts the tick in flight; nothing is
 * applied after it returns.
 */

import { v4 as uuid } from 'uuid';
import type { Clock } from '../../common/clock.js';
import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { BrightnessController } from '../brightness/brightness.controller.js';
import type { ModeState } from '../mode/mode.state.js';
import type { LoopState, SchedulerConfig, TickResult, TickStatus } from './scheduler.types.js';

const DEFAULT_CONFIG: SchedulerConfig = {
  intervalMs: 5 * 60 * 1000,  // 5 minutes
  runOnStart: true,
};

export interface SchedulerLoopDeps {
  controller: Pick<BrightnessController, 'computeTarget' | 'apply'>;
  mode: ModeState;
  clock: Clock;
  logger: Logger;
}

export class SchedulerLoop {
  private readonly config: SchedulerConfig;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<TickResult> | null = null;
  private inFlight: AbortController | null = null;
  private started = false;

  constructor(private readonly deps: SchedulerLoopDeps, config?: Partial<SchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get state(): LoopState {
    if (this.current) return 'tick-active';
    return this.started ? 'idle' : 'stopped';
  }

  start(): void {
    if (this.started) {
      this.deps.logger.info({}, 'Scheduler already running');
      return;
    }

    this.started = true;
    this.arm(this.config.runOnStart ? 0 : this.config.intervalMs);

    this.deps.logger.info(
      { intervalMs: this.config.intervalMs, runOnStart: this.config.runOnStart },
      `Scheduler started (interval: ${this.config.intervalMs / 1000 / 60}min)`
    );
  }

  async stop(): Promise<void> {
    if (!this.started && !this.current) {
      return;
    }

    this.started = false;
    this.disarm();
    this.inFlight?.abort();

    if (this.current) {
      await this.current;
    }
    this.deps.logger.info({}, 'Scheduler stopped');
  }

  /**
   * Skip the rest of the current wait and tick now.
   */
  triggerNow(): void {
    if (!this.started || this.current) {
      return;
    }
    this.disarm();
    this.arm(0);
  }

  /**
   * Run one tick. A tick already in flight is shared rather than doubled.
   */
  runTick(): Promise<TickResult> {
    if (this.current) {
      return this.current;
    }

    const tick = this.executeTick().finally(() => {
      this.current = null;
    });
    this.current = tick;
    return tick;
  }

  private arm(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tickAndRearm();
    }, delayMs);
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async tickAndRearm(): Promise<void> {
    await this.runTick();
    if (this.started && !this.timer) {
      this.arm(this.config.intervalMs);
    }
  }

  private async executeTick(): Promise<TickResult> {
    const { controller, mode, clock, logger } = this.deps;
    const tickId = `tick_${Date.now()}_${uuid().slice(0, 6)}`;
    const now = clock.now();
    const startMs = Date.now();

    const finish = (status: TickStatus, extra: Partial<TickResult> = {}): TickResult => ({
      tickId,
      status,
      startedAt: now.toISOString(),
      durationMs: Date.now() - startMs,
      ...extra,
    });

    if (!mode.isAuto()) {
      logger.debug?.({ tickId }, 'Manual mode, tick skipped');
      return finish('skipped-manual');
    }

    const abort = new AbortController();
    this.inFlight = abort;

    try {
      const target = await controller.computeTarget(now);

      if (abort.signal.aborted) {
        return finish('aborted', { target });
      }
      // The user may have taken over while the target was being computed
      if (!mode.isAuto()) {
        return finish('skipped-manual', { target });
      }

      const outcome = await controller.apply(target.brightness, abort.signal);

      if (outcome.status === 'applied' && outcome.brightness !== null) {
        mode.recordApplied(outcome.brightness);
      }

      logger.info({
        tickId,
        source: target.source,
        target: outcome.target,
        previous: outcome.previous,
        status: outcome.status,
      }, 'Tick completed');

      return finish(outcome.status, { target, brightness: outcome.brightness });
    } catch (err) {
      const error = errorMessage(err);
      logger.error({ tickId, error }, 'Tick failed');
      return finish('failed', { error });
    } finally {
      if (this.inFlight === abort) {
        this.inFlight = null;
      }
    }
  }
}
