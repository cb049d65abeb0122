/**
 * Scheduler Loop Tests
 * Driven with fake timers; no real time passes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SchedulerLoop } from '../scheduler.loop.js';
import { ModeState } from '../../mode/mode.state.js';
import { ApplyFailureError } from '../../../common/errors.js';
import type { ApplyOutcome, BrightnessTarget } from '../../brightness/brightness.types.js';

const INTERVAL_MS = 60_000;
const clock = { now: () => new Date(2024, 3, 15, 12, 0, 0, 0) };

const targetOf = (brightness: number): BrightnessTarget => ({
  brightness,
  source: 'curve',
  curveBrightness: brightness,
  solar: { kind: 'disabled' },
});

const appliedOf = (brightness: number): ApplyOutcome => ({
  status: 'applied',
  target: brightness,
  previous: 40,
  brightness,
  steps: 10,
});

describe('SchedulerLoop', () => {
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
  let controller: {
    computeTarget: ReturnType<typeof vi.fn>;
    apply: ReturnType<typeof vi.fn>;
  };
  let mode: ModeState;

  const createLoop = (runOnStart = true) =>
    new SchedulerLoop({ controller, mode, clock, logger: mockLogger }, { intervalMs: INTERVAL_MS, runOnStart });

  beforeEach(() => {
    vi.clearAllMocks();
    controller = {
      computeTarget: vi.fn().mockResolvedValue(targetOf(62)),
      apply: vi.fn().mockResolvedValue(appliedOf(62)),
    };
    mode = new ModeState();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('runTick', () => {

    it('should compute, apply and record the brightness in auto mode', async () => {
      const loop = createLoop();

      const result = await loop.runTick();

      expect(result.status).toBe('applied');
      expect(result.brightness).toBe(62);
      expect(result.tickId).toMatch(/^tick_\d+_[0-9a-f]{6}$/);
      expect(controller.computeTarget).toHaveBeenCalledWith(clock.now());
      expect(controller.apply).toHaveBeenCalledWith(62, expect.any(AbortSignal));
      expect(mode.lastAppliedBrightness).toBe(62);
    });

    it('should apply nothing in manual mode and resume after toggling back', async () => {
      const loop = createLoop();
      await loop.runTick();

      mode.toggle();
      controller.computeTarget.mockResolvedValue(targetOf(30));
      controller.apply.mockResolvedValue(appliedOf(30));

      const skipped = await loop.runTick();
      expect(skipped.status).toBe('skipped-manual');
      expect(controller.apply).toHaveBeenCalledTimes(1);
      expect(mode.lastAppliedBrightness).toBe(62);

      mode.toggle();
      const resumed = await loop.runTick();
      expect(resumed.status).toBe('applied');
      expect(controller.apply).toHaveBeenCalledTimes(2);
      expect(mode.lastAppliedBrightness).toBe(30);
    });

    it('should not apply when the user switches to manual mid-tick', async () => {
      controller.computeTarget.mockImplementation(async () => {
        mode.toggle();
        return targetOf(62);
      });
      const loop = createLoop();

      const result = await loop.runTick();

      expect(result.status).toBe('skipped-manual');
      expect(controller.apply).not.toHaveBeenCalled();
    });

    it('should contain apply failures within the tick', async () => {
      controller.apply.mockRejectedValue(new ApplyFailureError(62, 'sysfs: setting brightness to 62% failed: EACCES'));
      const loop = createLoop();

      const result = await loop.runTick();

      expect(result.status).toBe('failed');
      expect(result.error).toBe('sysfs: setting brightness to 62% failed: EACCES');
      expect(mode.lastAppliedBrightness).toBeNull();
      expect(mockLogger.error).toHaveBeenCalledTimes(1);
    });

    it('should not record anything when the display is already close', async () => {
      controller.apply.mockResolvedValue({ status: 'unchanged', target: 62, previous: 60, brightness: 60, steps: 0 });
      const loop = createLoop();

      const result = await loop.runTick();

      expect(result.status).toBe('unchanged');
      expect(result.brightness).toBe(60);
      expect(mode.lastAppliedBrightness).toBeNull();
    });

    it('should keep the last written level across unchanged ticks', async () => {
      const loop = createLoop();
      await loop.runTick();

      controller.apply.mockResolvedValue({ status: 'unchanged', target: 63, previous: 61, brightness: 61, steps: 0 });
      await loop.runTick();

      expect(mode.lastAppliedBrightness).toBe(62);
    });

    it('should share a tick that is already in flight', async () => {
      const loop = createLoop();

      const [a, b] = await Promise.all([loop.runTick(), loop.runTick()]);

      expect(a).toBe(b);
      expect(controller.computeTarget).toHaveBeenCalledTimes(1);
    });
  });

  describe('timer', () => {

    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('should tick on start and then once per interval', async () => {
      const loop = createLoop();
      loop.start();

      await vi.advanceTimersByTimeAsync(0);
      expect(controller.computeTarget).toHaveBeenCalledTimes(1);
      expect(loop.state).toBe('idle');

      await vi.advanceTimersByTimeAsync(INTERVAL_MS - 1);
      expect(controller.computeTarget).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(controller.computeTarget).toHaveBeenCalledTimes(2);

      await loop.stop();
    });

    it('should keep the cadence through manual-mode ticks', async () => {
      const loop = createLoop(false);
      mode.set('manual');
      loop.start();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 2);
      expect(controller.computeTarget).not.toHaveBeenCalled();

      mode.set('auto');
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(controller.computeTarget).toHaveBeenCalledTimes(1);

      await loop.stop();
    });

    it('should keep running after a failed tick', async () => {
      controller.apply
        .mockRejectedValueOnce(new ApplyFailureError(62, 'device busy'))
        .mockResolvedValue(appliedOf(62));
      const loop = createLoop();
      loop.start();

      await vi.advanceTimersByTimeAsync(0);
      expect(mode.lastAppliedBrightness).toBeNull();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(controller.apply).toHaveBeenCalledTimes(2);
      expect(mode.lastAppliedBrightness).toBe(62);

      await loop.stop();
    });

    it('should interrupt the wait on stop', async () => {
      const loop = createLoop();
      loop.start();
      await vi.advanceTimersByTimeAsync(0);

      await loop.stop();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 10);

      expect(controller.computeTarget).toHaveBeenCalledTimes(1);
      expect(loop.state).toBe('stopped');
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should not apply anything once stopped mid-tick', async () => {
      let release: (target: BrightnessTarget) => void = () => {};
      controller.computeTarget.mockImplementation(
        () => new Promise<BrightnessTarget>((resolve) => { release = resolve; })
      );
      const loop = createLoop();
      loop.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(loop.state).toBe('tick-active');

      const inFlight = loop.runTick();
      const stopping = loop.stop();
      release(targetOf(62));
      await stopping;

      expect((await inFlight).status).toBe('aborted');
      expect(controller.apply).not.toHaveBeenCalled();
      expect(loop.state).toBe('stopped');
    });

    it('should tick immediately on triggerNow', async () => {
      const loop = createLoop(false);
      loop.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(controller.computeTarget).not.toHaveBeenCalled();

      loop.triggerNow();
      await vi.advanceTimersByTimeAsync(0);
      expect(controller.computeTarget).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(controller.computeTarget).toHaveBeenCalledTimes(2);

      await loop.stop();
    });

    it('should ignore a second start', () => {
      const loop = createLoop();
      loop.start();
      loop.start();

      expect(mockLogger.info).toHaveBeenCalledWith({}, 'Scheduler already running');
      expect(vi.getTimerCount()).toBe(1);
    });
  });
});
