/**
 * Solar Event Cache Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SolarEventCache } from '../solar.cache.js';
import { LookupUnavailableError } from '../../../common/errors.js';
import type { SolarEvent } from '../solar.types.js';

const eventFor = (day: number): SolarEvent => ({
  sunriseTime: new Date(2024, 3, day, 6, 12, 0, 0),
  sunsetTime: new Date(2024, 3, day, 19, 40, 0, 0),
});

const createMockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('SolarEventCache', () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fetch once per calendar day', async () => {
    const lookup = { getSunriseSunset: vi.fn().mockResolvedValue(eventFor(15)) };
    const cache = new SolarEventCache({ lookup, locationKey: '10001', timeoutMs: 1000, logger });

    const first = await cache.get(new Date(2024, 3, 15, 7, 0));
    const second = await cache.get(new Date(2024, 3, 15, 22, 30));

    expect(first).toEqual({ ok: true, event: eventFor(15), cached: false });
    expect(second).toEqual({ ok: true, event: eventFor(15), cached: true });
    expect(lookup.getSunriseSunset).toHaveBeenCalledTimes(1);
  });

  it('should refetch when the date rolls over', async () => {
    const lookup = {
      getSunriseSunset: vi.fn()
        .mockResolvedValueOnce(eventFor(15))
        .mockResolvedValueOnce(eventFor(16)),
    };
    const cache = new SolarEventCache({ lookup, locationKey: '10001', timeoutMs: 1000, logger });

    await cache.get(new Date(2024, 3, 15, 23, 59));
    const nextDay = await cache.get(new Date(2024, 3, 16, 0, 1));

    expect(nextDay).toEqual({ ok: true, event: eventFor(16), cached: false });
    expect(lookup.getSunriseSunset).toHaveBeenCalledTimes(2);
    expect(cache.peek(new Date(2024, 3, 16, 12, 0))).toEqual(eventFor(16));
    expect(cache.peek(new Date(2024, 3, 15, 12, 0))).toBeNull();
  });

  it('should report failures without caching them', async () => {
    const lookup = {
      getSunriseSunset: vi.fn()
        .mockRejectedValueOnce(new LookupUnavailableError('No coordinates found for zipcode 00000'))
        .mockResolvedValueOnce(eventFor(15)),
    };
    const cache = new SolarEventCache({ lookup, locationKey: '00000', timeoutMs: 1000, logger });

    const failed = await cache.get(new Date(2024, 3, 15, 8, 0));
    expect(failed).toEqual({ ok: false, reason: 'No coordinates found for zipcode 00000' });
    expect(logger.warn).toHaveBeenCalledTimes(1);

    const retried = await cache.get(new Date(2024, 3, 15, 8, 5));
    expect(retried).toEqual({ ok: true, event: eventFor(15), cached: false });
  });

  it('should give up after the timeout and abort the lookup', async () => {
    vi.useFakeTimers();
    let seenSignal: AbortSignal | undefined;
    const lookup = {
      getSunriseSunset: vi.fn((_key: string, _date: Date, signal?: AbortSignal) => {
        seenSignal = signal;
        return new Promise<SolarEvent>(() => {});
      }),
    };
    const cache = new SolarEventCache({ lookup, locationKey: '10001', timeoutMs: 50, logger });

    const pending = cache.get(new Date(2024, 3, 15, 8, 0));
    await vi.advanceTimersByTimeAsync(50);

    expect(await pending).toEqual({ ok: false, reason: 'Solar lookup timed out after 50ms' });
    expect(seenSignal?.aborted).toBe(true);
  });

  it('should share one in-flight lookup between concurrent callers', async () => {
    let release: (event: SolarEvent) => void = () => {};
    const lookup = {
      getSunriseSunset: vi.fn(() => new Promise<SolarEvent>((resolve) => { release = resolve; })),
    };
    const cache = new SolarEventCache({ lookup, locationKey: '10001', timeoutMs: 1000, logger });

    const a = cache.get(new Date(2024, 3, 15, 8, 0));
    const b = cache.get(new Date(2024, 3, 15, 8, 0));
    release(eventFor(15));

    expect(await a).toEqual({ ok: true, event: eventFor(15), cached: false });
    expect(await b).toEqual({ ok: true, event: eventFor(15), cached: false });
    expect(lookup.getSunriseSunset).toHaveBeenCalledTimes(1);
  });
});
