/**
 * SOLAR PREFETCH CRON JOB
 *
 * Warms the daily solar cache shortly after midnight so the first tick of a
 * day does not wait on the geocoder.
 */

import cron from 'node-cron';
import type { Clock } from '../../common/clock.js';
import { ConfigurationError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { SolarEventCache } from './solar.cache.js';

export interface CronTask {
  stop: () => void;
}

export type CronScheduleFn = (expression: string, fn: () => void) => CronTask;

const defaultSchedule: CronScheduleFn = (expression, fn) => cron.schedule(expression, fn);

export interface SolarPrefetchOptions {
  expression: string;
  cache: Pick<SolarEventCache, 'get'>;
  clock: Clock;
  logger: Logger;
  schedule?: CronScheduleFn;
}

export class SolarPrefetchJob {
  private task: CronTask | null = null;

  constructor(private readonly options: SolarPrefetchOptions) {
    if (!cron.validate(options.expression)) {
      throw new ConfigurationError(`Invalid solar prefetch cron expression: ${options.expression}`);
    }
  }

  get running(): boolean {
    return this.task !== null;
  }

  start(): void {
    if (this.task) {
      this.options.logger.info({}, 'Solar prefetch already running');
      return;
    }

    const schedule = this.options.schedule ?? defaultSchedule;
    this.task = schedule(this.options.expression, () => {
      void this.run();
    });

    this.options.logger.info({ expression: this.options.expression }, 'Solar prefetch scheduled');
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  async run(): Promise<boolean> {
    try {
      const result = await this.options.cache.get(this.options.clock.now());
      if (result.ok) {
        this.options.logger.info({ cached: result.cached }, 'Solar prefetch completed');
      }
      return result.ok;
    } catch (err) {
      this.options.logger.error({ error: errorMessage(err) }, 'Solar prefetch failed');
      return false;
    }
  }
}
