#!/usr/bin/env node
/**
 * Entry point
 *
 *   brightness-scheduler [run]   start the scheduler (default)
 *   brightness-scheduler reset   set every backlight device to 100%
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { AppError, ConfigurationError, errorMessage } from './common/errors.js';
import { consoleLogger, createLogger, type RootLogger } from './common/logger.js';
import { loadBrightnessConfig } from './config/brightness.config.js';
import { loadEnv } from './config/env.js';
import { resetBrightness } from './modules/brightness/brightness.reset.js';
import { bindModeSignals } from './modules/mode/mode.signals.js';

async function run(logger: RootLogger, configPath: string, env: ReturnType<typeof loadEnv>): Promise<void> {
  const config = await loadBrightnessConfig(configPath);
  logger.info({
    configPath,
    driver: env.BRIGHTNESS_DRIVER,
    solar: config.solar.enabled,
    intervalMs: env.TICK_INTERVAL_MS,
  }, 'Brightness configuration loaded');

  const app = buildApp(env, config, logger);

  const unbindSignals = bindModeSignals(process, {
    mode: app.mode,
    logger: logger.child({ component: 'mode' }),
    onResumeAuto: () => app.loop.triggerNow(),
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    unbindSignals();
    app.stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  app.start();
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'run';

  let env: ReturnType<typeof loadEnv>;
  try {
    env = loadEnv();
  } catch (err) {
    consoleLogger.error({ error: errorMessage(err) }, 'Startup failed');
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(env.LOG_LEVEL);

  try {
    switch (command) {
      case 'run':
        await run(logger, env.BRIGHTNESS_CONFIG_PATH, env);
        break;
      case 'reset': {
        const result = await resetBrightness(logger, env.BACKLIGHT_ROOT);
        if (result.failed.length > 0) process.exitCode = 1;
        break;
      }
      default:
        throw new ConfigurationError(`Unknown command "${command}" (expected "run" or "reset")`);
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.error({ code: err.code, issues: err.issues }, err.message);
    } else if (err instanceof AppError) {
      logger.error({ code: err.code }, err.message);
    } else {
      logger.error({ error: errorMessage(err) }, 'Startup failed');
    }
    process.exitCode = 1;
  }
}

void main();
