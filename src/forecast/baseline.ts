/**
 * Baseline Estimator - recency-weighted weekday means per item.
 *
 * Recomputed from the trailing history on every run; nothing here is stored
 * or updated incrementally.
 */

import type { CanonicalSaleRecord } from '../types';
import { addDays, daysBetween, weekdayOf, type Weekday } from '../utils/dates';

// =============================================================================
// TYPES
// =============================================================================

/** weekday: ≥2 same-weekday instances; overall: item-level fallback; none: no history */
export type BaselineSource = 'weekday' | 'overall' | 'none';

export interface WeekdayBaseline {
  itemId: number;
  weekday: Weekday;
  estimatedMean: number;
  /** Sum of the decay weights that produced the mean; 0 when there is no history */
  sampleWeight: number;
  source: BaselineSource;
  /** Same-weekday instances used (newest first) */
  instances: number[];
  /** Unweighted mean / sample std of `instances`; null below two instances */
  historyMean: number | null;
  historyStd: number | null;
  /** Last history date the estimate could see */
  lastUpdated: string;
}

export interface ItemBaseline {
  itemId: number;
  coldStart: boolean;
  weekdays: Record<Weekday, WeekdayBaseline>;
}

export interface BaselineOptions {
  windowWeeks: number;
  decay: number;
}

// =============================================================================
// HELPERS
// =============================================================================

export function weightedMean(values: number[], weights: number[]): number {
  let num = 0;
  let den = 0;
  for (let i = 0; i < values.length; i++) {
    num += values[i] * weights[i];
    den += weights[i];
  }
  return den > 0 ? num / den : 0;
}

export function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

/** Sample standard deviation (n - 1). 0 below two values. */
export function sampleStd(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const variance = values.reduce((s, v) => s + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/** Whole weeks between `date` and the Sunday before `weekStart`. */
function weeksBack(date: string, weekStart: string): number {
  return Math.max(0, Math.floor((daysBetween(date, weekStart) - 1) / 7));
}

// =============================================================================
// ESTIMATE
// =============================================================================

/**
 * Estimate Mon–Sat baselines for one item from its history before `weekStart`.
 *
 * Instance i steps back from the newest same-weekday record is weighted
 * `decay^i`. A weekday with fewer than two instances falls back to the item's
 * overall mean, each record weighted `decay^(weeks back)`. An item with no
 * history at all gets zeros and is marked cold start.
 */
export function estimateBaselines(
  itemId: number,
  history: CanonicalSaleRecord[],
  weekStart: string,
  options: BaselineOptions,
): ItemBaseline {
  const { windowWeeks, decay } = options;
  const lastUpdated = addDays(weekStart, -1);

  // One quantity per operating date
  const byDate = new Map<string, number>();
  for (const record of history) {
    if (record.itemId !== itemId || record.date >= weekStart) continue;
    if (weekdayOf(record.date) === null) continue;
    byDate.set(record.date, (byDate.get(record.date) ?? 0) + record.quantity);
  }

  const dates = [...byDate.keys()].sort().reverse();
  const coldStart = dates.length === 0;

  let overallMean = 0;
  let overallWeight = 0;
  if (!coldStart) {
    const values = dates.map((d) => byDate.get(d) ?? 0);
    const weights = dates.map((d) => decay ** weeksBack(d, weekStart));
    overallMean = weightedMean(values, weights);
    overallWeight = weights.reduce((a, b) => a + b, 0);
  }

  const estimate = (weekday: Weekday): WeekdayBaseline => {
    const instances = dates
      .filter((d) => weekdayOf(d) === weekday)
      .slice(0, windowWeeks)
      .map((d) => byDate.get(d) ?? 0);

    let estimatedMean: number;
    let sampleWeight: number;
    let source: BaselineSource;

    if (instances.length >= 2) {
      const weights = instances.map((_, i) => decay ** i);
      estimatedMean = weightedMean(instances, weights);
      sampleWeight = weights.reduce((a, b) => a + b, 0);
      source = 'weekday';
    } else if (!coldStart) {
      estimatedMean = overallMean;
      sampleWeight = overallWeight;
      source = 'overall';
    } else {
      estimatedMean = 0;
      sampleWeight = 0;
      source = 'none';
    }

    return {
      itemId,
      weekday,
      estimatedMean,
      sampleWeight,
      source,
      instances,
      historyMean: instances.length >= 2 ? mean(instances) : null,
      historyStd: instances.length >= 2 ? sampleStd(instances) : null,
      lastUpdated,
    };
  };

  const weekdays: Record<Weekday, WeekdayBaseline> = {
    mon: estimate('mon'),
    tue: estimate('tue'),
    wed: estimate('wed'),
    thu: estimate('thu'),
    fri: estimate('fri'),
    sat: estimate('sat'),
  };

  return { itemId, coldStart, weekdays };
}
