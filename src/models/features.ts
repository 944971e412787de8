/**
 * Feature rows for the per-item model.
 *
 * Rolling same-weekday means only ever look at instances strictly before the
 * row's date, so a training row never sees its own target.
 */

import type { HolidayFeed, WeatherFeed } from '../db/signal-store';
import type { AdjustmentSignal, CanonicalSaleRecord, WeatherReading } from '../types';
import { WEEKDAYS, monthOf, weekdayOf, type Weekday } from '../utils/dates';
import { errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';
import type { FeatureVector } from './ridge';

const logger = createLogger('features');

export const FEATURE_SCHEMA = [
  'max_temp',
  'rain_mm',
  'last4_same_wd',
  'last8_same_wd',
  'is_holiday',
  'month_sin',
  'month_cos',
  ...WEEKDAYS.map((d) => `wd_${d}`),
];

export interface FeatureContext {
  date: string;
  weather: WeatherReading | null;
  signals: AdjustmentSignal[];
  /** Earlier same-weekday quantities, newest first */
  priorSameWeekday: number[];
}

export interface TrainingSample {
  date: string;
  features: FeatureVector;
  target: number;
}

/** Mean of the newest `window` values, or null with fewer than `minPeriods`. */
export function rollingMean(prior: number[], window: number, minPeriods: number): number | null {
  const slice = prior.slice(0, window);
  if (slice.length < minPeriods) return null;
  return slice.reduce((a, b) => a + b, 0) / slice.length;
}

export function isHolidayLike(signals: AdjustmentSignal[]): boolean {
  return signals.some((s) => s.kind === 'holiday' || s.multiplier > 1);
}

export function buildFeatureRow(ctx: FeatureContext): FeatureVector {
  const weekday = weekdayOf(ctx.date);
  const angle = (2 * Math.PI * monthOf(ctx.date)) / 12;
  return [
    ctx.weather?.maxTemp ?? null,
    ctx.weather?.precipitation ?? null,
    rollingMean(ctx.priorSameWeekday, 4, 2),
    rollingMean(ctx.priorSameWeekday, 8, 3),
    isHolidayLike(ctx.signals) ? 1 : 0,
    Math.sin(angle),
    Math.cos(angle),
    ...WEEKDAYS.map((d) => (d === weekday ? 1 : 0)),
  ];
}

// ---------------------------------------------------------------------------
// Signal lookup for feature rows
// ---------------------------------------------------------------------------

export interface FeatureSignals {
  weather(date: string): Promise<WeatherReading | null>;
  signals(date: string): Promise<AdjustmentSignal[]>;
}

/**
 * Feature-side view of the feeds. A failing lookup leaves the feature missing
 * (imputed later) rather than failing the item.
 */
export function createFeatureSignals(weather: WeatherFeed, holidays: HolidayFeed, location: string): FeatureSignals {
  return {
    async weather(date) {
      try {
        return await weather.get(date, location);
      } catch (error) {
        logger.warn({ date, error: errorMessage(error) }, 'Weather lookup failed; feature left missing');
        return null;
      }
    },
    async signals(date) {
      try {
        return await holidays.get(date);
      } catch (error) {
        logger.warn({ date, error: errorMessage(error) }, 'Holiday lookup failed; treated as ordinary day');
        return [];
      }
    },
  };
}

/**
 * One sample per operating day of history, oldest first. Sundays are skipped.
 */
export async function buildTrainingSet(
  history: CanonicalSaleRecord[],
  lookup: FeatureSignals,
): Promise<TrainingSample[]> {
  const byDate = new Map<string, { weekday: Weekday; target: number }>();
  for (const record of history) {
    const weekday = weekdayOf(record.date);
    if (weekday === null) continue;
    const existing = byDate.get(record.date);
    byDate.set(record.date, { weekday, target: (existing?.target ?? 0) + record.quantity });
  }

  const days = [...byDate.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const seen = new Map<Weekday, number[]>();
  const samples: TrainingSample[] = [];

  for (const [date, { weekday, target }] of days) {
    const prior = seen.get(weekday) ?? [];
    const [weather, signals] = await Promise.all([lookup.weather(date), lookup.signals(date)]);
    samples.push({
      date,
      features: buildFeatureRow({ date, weather, signals, priorSameWeekday: prior }),
      target,
    });
    seen.set(weekday, [target, ...prior]);
  }

  return samples;
}

/** Same-weekday quantities before `before`, newest first. */
export function priorSameWeekday(history: CanonicalSaleRecord[], weekday: Weekday, before: string): number[] {
  const byDate = new Map<string, number>();
  for (const record of history) {
    if (record.date >= before || weekdayOf(record.date) !== weekday) continue;
    byDate.set(record.date, (byDate.get(record.date) ?? 0) + record.quantity);
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
    .map(([, quantity]) => quantity);
}
