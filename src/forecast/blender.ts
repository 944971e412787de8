/**
 * Blender & Post-Processor
 *
 *   final = max(((1 − α)·baseline + α·model) × multiplier, floor)
 *
 * α is forced to 0 for an item without a usable model. Deviation alerts are
 * evaluated on the unrounded value and never change it; rounding to the
 * item's unit is the last step.
 */

import type { CanonicalSaleRecord, ForecastAlert, ForecastDayDetail, ForecastLine } from '../types';
import { WEEKDAYS, addDays, daysBetween, weekDates, weekdayOf, type Weekday } from '../utils/dates';
import type { ItemBaseline } from './baseline';
import { mean, sampleStd } from './baseline';

export interface AlertSettings {
  stdDevMultiple: number;
  minInstances: number;
}

export interface BlendInput {
  itemId: number;
  itemName: string;
  weekStart: string;
  baseline: ItemBaseline;
  /** Per-day model predictions; null when the item has no usable model */
  modelPredictions: Record<Weekday, number> | null;
  modelVersion: number | null;
  alpha: number;
  multipliers: Record<Weekday, number>;
  floor: number;
  roundingUnit: number;
  alerts: AlertSettings;
  /** Typical-week statistics for the weekly note */
  weekly: WeeklyStats;
}

export interface BlendOutput {
  line: ForecastLine;
  alerts: ForecastAlert[];
}

export interface WeeklyStats {
  mean: number;
  std: number;
  weeks: number;
}

// =============================================================================
// ROUNDING
// =============================================================================

function tidy(value: number): number {
  return Number(value.toFixed(6));
}

/**
 * Nearest multiple of `unit`; if that falls below `floor`, the smallest
 * multiple at or above the floor.
 */
export function roundToUnit(value: number, unit: number, floor = 0): number {
  const rounded = tidy(Math.round(value / unit) * unit);
  if (rounded >= floor) return rounded;
  return tidy(Math.ceil(tidy(floor / unit)) * unit);
}

// =============================================================================
// WEEKLY NOTE
// =============================================================================

/**
 * Totals per Monday-based week of history before `weekStart`; mean and
 * sample std across those weeks (std 0 with fewer than two weeks).
 */
export function weeklyStats(history: CanonicalSaleRecord[], weekStart: string): WeeklyStats {
  const totals = new Map<string, number>();
  for (const record of history) {
    if (record.date >= weekStart || weekdayOf(record.date) === null) continue;
    const offset = ((daysBetween(record.date, weekStart) % 7) + 7) % 7;
    const monday = addDays(record.date, offset === 0 ? 0 : offset - 7);
    totals.set(monday, (totals.get(monday) ?? 0) + record.quantity);
  }
  const values = [...totals.values()];
  return { mean: mean(values), std: sampleStd(values), weeks: values.length };
}

export function weeklyNote(weeklyTotal: number, stats: WeeklyStats, stdDevMultiple: number): string {
  if (stats.mean <= 0) return 'No typical week yet';
  const diffPct = Math.round(((weeklyTotal - stats.mean) / stats.mean) * 100);
  if (stats.std > 0 && weeklyTotal > stats.mean + stdDevMultiple * stats.std) {
    return `Higher than usual (+${diffPct}%)`;
  }
  if (stats.std > 0 && weeklyTotal < Math.max(stats.mean - stdDevMultiple * stats.std, 0)) {
    return `Lower than usual (${diffPct}%)`;
  }
  return 'As expected';
}

// =============================================================================
// BLEND
// =============================================================================

export function blendItem(input: BlendInput): BlendOutput {
  const alerts: ForecastAlert[] = [];
  const days: ForecastDayDetail[] = [];
  const quantities: Record<Weekday, number> = { mon: 0, tue: 0, wed: 0, thu: 0, fri: 0, sat: 0 };

  for (const { weekday, date } of weekDates(input.weekStart)) {
    const base = input.baseline.weekdays[weekday];
    const rawModel = input.modelPredictions ? input.modelPredictions[weekday] : null;
    const modelPrediction = rawModel === null ? null : Math.max(0, rawModel);
    const alphaApplied = modelPrediction === null ? 0 : input.alpha;

    const blended =
      modelPrediction === null
        ? base.estimatedMean
        : (1 - alphaApplied) * base.estimatedMean + alphaApplied * modelPrediction;
    const multiplier = input.multipliers[weekday];
    const unrounded = Math.max(blended * multiplier, input.floor);

    if (
      base.historyMean !== null &&
      base.historyStd !== null &&
      base.instances.length >= input.alerts.minInstances &&
      tidy(Math.abs(unrounded - base.historyMean)) > tidy(input.alerts.stdDevMultiple * base.historyStd)
    ) {
      alerts.push({
        itemId: input.itemId,
        day: weekday,
        reason: 'deviates from history',
        detail:
          `${tidy(unrounded)} vs mean ${tidy(base.historyMean)} ` +
          `(±${input.alerts.stdDevMultiple}×${tidy(base.historyStd)}) on ${date}`,
      });
    }

    const quantity = roundToUnit(unrounded, input.roundingUnit, input.floor);
    quantities[weekday] = quantity;
    days.push({
      weekday,
      date,
      baseline: base.estimatedMean,
      modelPrediction,
      alphaApplied,
      multiplier,
      unrounded,
      quantity,
    });
  }

  const weeklyTotal = tidy(WEEKDAYS.reduce((sum, d) => sum + quantities[d], 0));

  return {
    line: {
      itemId: input.itemId,
      itemName: input.itemName,
      coldStart: input.baseline.coldStart,
      modelVersion: input.modelPredictions ? input.modelVersion : null,
      quantities,
      days,
      weeklyTotal,
      note: weeklyNote(weeklyTotal, input.weekly, input.alerts.stdDevMultiple),
    },
    alerts,
  };
}
