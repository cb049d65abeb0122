/**
 * Solar Event Cache
 * =================
 * One entry per local calendar date. The first request of a day fetches,
 * later requests that day reuse the entry, and a new date replaces it.
 *
 * Failures are not cached: the next request of the same day retries.
 */

import { localDateKey } from '../../common/clock.js';
import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { withTimeout } from '../../common/timeout.js';
import type { SolarEvent, SolarEventResult, SolarLookup } from './solar.types.js';

export interface SolarEventCacheOptions {
  lookup: SolarLookup;
  locationKey: string;
  timeoutMs: number;
  logger: Logger;
}

interface CacheEntry {
  dateKey: string;
  event: SolarEvent;
}

export class SolarEventCache {
  private entry: CacheEntry | null = null;
  private inFlight = new Map<string, Promise<SolarEventResult>>();

  constructor(private readonly options: SolarEventCacheOptions) {}

  async get(now: Date): Promise<SolarEventResult> {
    const dateKey = localDateKey(now);

    if (this.entry && this.entry.dateKey === dateKey) {
      return { ok: true, event: this.entry.event, cached: true };
    }

    const pending = this.inFlight.get(dateKey);
    if (pending) {
      return pending;
    }

    const request = this.fetch(dateKey, now).finally(() => {
      this.inFlight.delete(dateKey);
    });
    this.inFlight.set(dateKey, request);
    return request;
  }

  /**
   * Entry for the given date, without fetching.
   */
  peek(now: Date): SolarEvent | null {
    const dateKey = localDateKey(now);
    return this.entry?.dateKey === dateKey ? this.entry.event : null;
  }

  private async fetch(dateKey: string, now: Date): Promise<SolarEventResult> {
    const { lookup, locationKey, timeoutMs, logger } = this.options;

    try {
      const event = await withTimeout(
        'Solar lookup',
        timeoutMs,
        (signal) => lookup.getSunriseSunset(locationKey, now, signal)
      );

      // A late answer for an earlier day must not replace a newer entry
      if (!this.entry || this.entry.dateKey <= dateKey) {
        this.entry = { dateKey, event };
      }
      return { ok: true, event, cached: false };
    } catch (err) {
      const reason = errorMessage(err);
      logger.warn({ locationKey, dateKey, reason }, 'Solar lookup unavailable, using base curve');
      return { ok: false, reason };
    }
  }
}
