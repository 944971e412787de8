/**
 * Adjustment Engine - one bounded multiplier per (item, forecast date).
 *
 * Weather and holiday/event signals compose multiplicatively and the product
 * is clamped to [minMultiplier, maxMultiplier]. Missing, stale or failing
 * feeds give a neutral 1.0 and a logged SignalUnavailableError; they never
 * fail the run.
 */

import type { HolidayFeed, WeatherFeed } from '../db/signal-store';
import type { AdjustmentSignal, WeatherReading } from '../types';
import { itemSettingsFor, type PlannerConfig, type WeatherResponse } from '../utils/config';
import { SignalUnavailableError } from '../infra/errors';
import { daysBetween } from '../utils/dates';
import { createLogger } from '../utils/logger';

const logger = createLogger('adjustments');

export interface AdjustmentBreakdown {
  date: string;
  /** Clamped product of the applied signals */
  multiplier: number;
  unclamped: number;
  /** Signals that moved the multiplier, with their effective contribution */
  applied: Array<AdjustmentSignal & { contribution: number }>;
}

export interface AdjustmentEngine {
  multiplierFor(date: string, item: { itemId: number; canonicalName: string }): Promise<AdjustmentBreakdown>;
}

export interface AdjustmentEngineDeps {
  weather: WeatherFeed;
  holidays: HolidayFeed;
  config: PlannerConfig;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** A signal with weight w moves the multiplier by (m - 1)·w. */
export function weightedContribution(signal: Pick<AdjustmentSignal, 'multiplier' | 'weight'>): number {
  const w = clamp(signal.weight, 0, 1);
  return 1 + (signal.multiplier - 1) * w;
}

/**
 * Monotone weather response: each factor is 1 at the neutral anchors and
 * moves by the item's coefficient per 10 units of departure, floored at 0.
 */
export function weatherMultiplier(
  reading: Pick<WeatherReading, 'maxTemp' | 'precipitation'>,
  response: WeatherResponse,
  anchors: { neutralTemp: number; neutralRain: number },
): number {
  const tempFactor =
    reading.maxTemp === null ? 1 : Math.max(0, 1 + (response.temp * (reading.maxTemp - anchors.neutralTemp)) / 10);
  const rainFactor =
    reading.precipitation === null
      ? 1
      : Math.max(0, 1 + (response.rain * (reading.precipitation - anchors.neutralRain)) / 10);
  return tempFactor * rainFactor;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export function createAdjustmentEngine(deps: AdjustmentEngineDeps): AdjustmentEngine {
  const { weather, holidays, config } = deps;
  const settings = config.adjustments;

  // Per-engine caches: one feed lookup per date per run
  const weatherCache = new Map<string, Promise<WeatherReading | null>>();
  const holidayCache = new Map<string, Promise<AdjustmentSignal[]>>();

  function unavailable(feed: 'weather' | 'holiday', date: string, reason: string, cause?: unknown): void {
    const error = new SignalUnavailableError(feed, date, reason, cause === undefined ? undefined : { cause });
    logger.warn({ code: error.code, feed, date }, error.message);
  }

  async function lookupWeather(date: string): Promise<WeatherReading | null> {
    let reading: WeatherReading | null;
    try {
      reading = await weather.get(date, config.location);
    } catch (error) {
      unavailable('weather', date, 'feed failed', error);
      return null;
    }
    if (!reading) {
      unavailable('weather', date, 'no reading');
      return null;
    }
    const recorded = reading.recordedAt.toISOString().slice(0, 10);
    if (daysBetween(recorded, date) > settings.staleAfterDays) {
      unavailable('weather', date, `reading recorded ${recorded} is stale`);
      return null;
    }
    return reading;
  }

  async function lookupHolidays(date: string): Promise<AdjustmentSignal[]> {
    try {
      return await holidays.get(date);
    } catch (error) {
      unavailable('holiday', date, 'feed failed', error);
      return [];
    }
  }

  function cached<T>(cache: Map<string, Promise<T>>, date: string, load: (d: string) => Promise<T>): Promise<T> {
    let pending = cache.get(date);
    if (!pending) {
      pending = load(date);
      cache.set(date, pending);
    }
    return pending;
  }

  return {
    async multiplierFor(date, item) {
      const applied: AdjustmentBreakdown['applied'] = [];

      const response =
        itemSettingsFor(config, item.canonicalName).weatherResponse ?? settings.defaultWeatherResponse;
      if (response) {
        const reading = await cached(weatherCache, date, lookupWeather);
        if (reading) {
          const m = weatherMultiplier(reading, response, settings);
          applied.push({ date, kind: 'weather', name: 'weather', multiplier: m, weight: 1, contribution: m });
        }
      }

      for (const signal of await cached(holidayCache, date, lookupHolidays)) {
        applied.push({ ...signal, contribution: weightedContribution(signal) });
      }

      const unclamped = applied.reduce((product, s) => product * s.contribution, 1);
      const multiplier = clamp(unclamped, settings.minMultiplier, settings.maxMultiplier);
      if (multiplier !== unclamped) {
        logger.debug({ itemId: item.itemId, date, unclamped, multiplier }, 'Adjustment clamped');
      }
      return { date, multiplier, unclamped, applied };
    },
  };
}
