/**
 * Build the brightness scheduler from configuration.
 *
 * Wiring only; nothing starts until start() is called.
 */

import { systemClock, type Clock } from './common/clock.js';
import type { Logger, RootLogger } from './common/logger.js';
import type { Env } from './config/env.js';
import type { BrightnessConfig } from './config/brightness.config.js';
import { BrightnessController } from './modules/brightness/brightness.controller.js';
import { DryRunBrightnessDriver, SysfsBacklightDriver } from './modules/brightness/brightness.drivers.js';
import type { BrightnessDriver } from './modules/brightness/brightness.types.js';
import { ModeState } from './modules/mode/mode.state.js';
import { SchedulerLoop } from './modules/scheduler/scheduler.loop.js';
import { SolarEventCache } from './modules/solar/solar.cache.js';
import { SolarLookupService } from './modules/solar/solar.lookup.service.js';
import { SolarModifier } from './modules/solar/solar.modifier.js';
import { SolarPrefetchJob } from './modules/solar/solar.prefetch.job.js';
import type { SolarLookup } from './modules/solar/solar.types.js';
import { ZipcodeGeocoder } from './modules/solar/zipcode.geocoder.js';

export interface AppOverrides {
  clock?: Clock;
  driver?: BrightnessDriver;
  lookup?: SolarLookup;
}

export interface BrightnessApp {
  mode: ModeState;
  loop: SchedulerLoop;
  controller: BrightnessController;
  solarCache: SolarEventCache;
  prefetch: SolarPrefetchJob | null;
  start: () => void;
  stop: () => Promise<void>;
}

function createDriver(env: Env, logger: Logger): BrightnessDriver {
  if (env.BRIGHTNESS_DRIVER === 'dry-run') {
    return new DryRunBrightnessDriver(logger);
  }
  return new SysfsBacklightDriver({
    root: env.BACKLIGHT_ROOT,
    device: env.BACKLIGHT_DEVICE,
    logger,
  });
}

export function buildApp(
  env: Env,
  config: BrightnessConfig,
  rootLogger: RootLogger,
  overrides: AppOverrides = {}
): BrightnessApp {
  const clock = overrides.clock ?? systemClock;
  const solarLogger = rootLogger.child({ component: 'solar' });

  const lookup = overrides.lookup ?? new SolarLookupService(
    new ZipcodeGeocoder({
      country: config.solar.country,
      timeoutMs: env.SOLAR_LOOKUP_TIMEOUT_MS,
      logger: solarLogger,
    }),
    solarLogger
  );

  const solarCache = new SolarEventCache({
    lookup,
    locationKey: config.solar.locationKey,
    timeoutMs: env.SOLAR_LOOKUP_TIMEOUT_MS,
    logger: solarLogger,
  });

  const controller = new BrightnessController({
    curve: config.curve,
    solar: new SolarModifier(config.solar, solarCache, solarLogger),
    driver: overrides.driver ?? createDriver(env, rootLogger.child({ component: 'driver' })),
    logger: rootLogger.child({ component: 'brightness' }),
    transition: {
      durationMs: env.TRANSITION_DURATION_MS,
      steps: env.TRANSITION_STEPS,
      adjustThreshold: env.ADJUST_THRESHOLD,
    },
  });

  const mode = new ModeState('auto');

  const loop = new SchedulerLoop(
    { controller, mode, clock, logger: rootLogger.child({ component: 'scheduler' }) },
    { intervalMs: env.TICK_INTERVAL_MS, runOnStart: true }
  );

  const prefetch = config.solar.enabled
    ? new SolarPrefetchJob({ expression: env.SOLAR_PREFETCH_CRON, cache: solarCache, clock, logger: solarLogger })
    : null;

  return {
    mode,
    loop,
    controller,
    solarCache,
    prefetch,
    start: () => {
      prefetch?.start();
      loop.start();
    },
    stop: async () => {
      prefetch?.stop();
      await loop.stop();
    },
  };
}
