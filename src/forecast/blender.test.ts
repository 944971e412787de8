import { describe, it, expect } from 'vitest';
import { blendItem, roundToUnit, weeklyNote, weeklyStats, type BlendInput } from './blender';
import type { ItemBaseline, WeekdayBaseline } from './baseline';
import type { CanonicalSaleRecord } from '../types';
import { WEEKDAYS, type Weekday } from '../utils/dates';

const WEEK = '2024-03-04';

function perDay(value: number): Record<Weekday, number> {
  return { mon: value, tue: value, wed: value, thu: value, fri: value, sat: value };
}

function weekdayBaseline(weekday: Weekday, estimatedMean: number, instances: number[] = []): WeekdayBaseline {
  const n = instances.length;
  const m = n > 0 ? instances.reduce((a, b) => a + b, 0) / n : 0;
  const std = n > 1 ? Math.sqrt(instances.reduce((s, v) => s + (v - m) ** 2, 0) / (n - 1)) : 0;
  return {
    itemId: 1,
    weekday,
    estimatedMean,
    sampleWeight: n,
    source: n >= 2 ? 'weekday' : 'overall',
    instances,
    historyMean: n >= 2 ? m : null,
    historyStd: n >= 2 ? std : null,
    lastUpdated: '2024-03-03',
  };
}

function baselineOf(means: Record<Weekday, number>, monInstances: number[] = []): ItemBaseline {
  return {
    itemId: 1,
    coldStart: false,
    weekdays: {
      mon: weekdayBaseline('mon', means.mon, monInstances),
      tue: weekdayBaseline('tue', means.tue),
      wed: weekdayBaseline('wed', means.wed),
      thu: weekdayBaseline('thu', means.thu),
      fri: weekdayBaseline('fri', means.fri),
      sat: weekdayBaseline('sat', means.sat),
    },
  };
}

function input(overrides: Partial<BlendInput> = {}): BlendInput {
  return {
    itemId: 1,
    itemName: 'Sourdough Loaf',
    weekStart: WEEK,
    baseline: baselineOf(perDay(50)),
    modelPredictions: null,
    modelVersion: null,
    alpha: 0.5,
    multipliers: perDay(1),
    floor: 0,
    roundingUnit: 1,
    alerts: { stdDevMultiple: 1.5, minInstances: 2 },
    weekly: { mean: 0, std: 0, weeks: 0 },
    ...overrides,
  };
}

describe('blendItem', () => {
  it('uses the baseline alone at alpha 0 and the model alone at alpha 1', () => {
    const withModel = { modelPredictions: perDay(80), modelVersion: 3 };

    expect(blendItem(input({ ...withModel, alpha: 0 })).line.quantities).toEqual(perDay(50));
    expect(blendItem(input({ ...withModel, alpha: 1 })).line.quantities).toEqual(perDay(80));
    expect(blendItem(input({ ...withModel, alpha: 0.25 })).line.quantities).toEqual(perDay(58));
  });

  it('forces alpha to 0 without a model', () => {
    const { line } = blendItem(input({ alpha: 0.7, modelVersion: 4 }));

    expect(line.quantities).toEqual(perDay(50));
    expect(line.days.every((d) => d.alphaApplied === 0 && d.modelPrediction === null)).toBe(true);
    expect(line.modelVersion).toBeNull();
  });

  it('clips negative model predictions to zero before blending', () => {
    const { line } = blendItem(input({ modelPredictions: perDay(-10), modelVersion: 1 }));
    expect(line.days[0].modelPrediction).toBe(0);
    expect(line.quantities.mon).toBe(25);
  });

  it('applies the multiplier after blending', () => {
    const { line } = blendItem(input({ alpha: 0, multipliers: { ...perDay(1), mon: 1.3 } }));
    expect(line.days[0]).toMatchObject({ weekday: 'mon', date: WEEK, baseline: 50, multiplier: 1.3 });
    expect(line.days[0].unrounded).toBeCloseTo(65, 10);
    expect(line.quantities.mon).toBe(65);
    expect(line.weeklyTotal).toBe(315);
  });

  it('never goes below the floor', () => {
    const { line } = blendItem(input({ baseline: baselineOf(perDay(2)), floor: 6 }));
    expect(line.quantities).toEqual(perDay(6));
    expect(line.days[0].unrounded).toBe(6);
  });

  it('rounds to the item unit as the last step', () => {
    const { line } = blendItem(input({ baseline: baselineOf(perDay(13)), roundingUnit: 6 }));
    expect(line.quantities.mon).toBe(12);
    expect(line.days[0].unrounded).toBe(13);
  });

  it('raises a deviation alert from the unrounded value', () => {
    // history mean 10.5, sample std 1, threshold 1.5
    const instances = [10, 10, 10, 12];
    const alerting = blendItem(input({ baseline: baselineOf({ ...perDay(10), mon: 12.4 }, instances) }));

    expect(alerting.alerts).toEqual([
      {
        itemId: 1,
        day: 'mon',
        reason: 'deviates from history',
        detail: '12.4 vs mean 10.5 (±1.5×1) on 2024-03-04',
      },
    ]);
    // The alert never changes the quantity
    expect(alerting.line.quantities.mon).toBe(12);

    const quiet = blendItem(input({ baseline: baselineOf({ ...perDay(10), mon: 11.9 }, instances) }));
    expect(quiet.alerts).toEqual([]);
    expect(quiet.line.quantities.mon).toBe(12);
  });

  it('needs the minimum number of instances before alerting', () => {
    const { alerts } = blendItem(
      input({
        baseline: baselineOf({ ...perDay(10), mon: 40 }, [10, 10, 10, 12]),
        alerts: { stdDevMultiple: 1.5, minInstances: 5 },
      }),
    );
    expect(alerts).toEqual([]);
  });

  it('lists days Monday to Saturday', () => {
    const { line } = blendItem(input());
    expect(line.days.map((d) => d.weekday)).toEqual([...WEEKDAYS]);
    expect(line.days[5].date).toBe('2024-03-09');
  });
});

describe('roundToUnit', () => {
  it('rounds to the nearest multiple', () => {
    expect(roundToUnit(44.6089, 1)).toBe(45);
    expect(roundToUnit(13, 6)).toBe(12);
    expect(roundToUnit(0.36, 0.1)).toBe(0.4);
  });

  it('rounds up to the first multiple at or above the floor', () => {
    expect(roundToUnit(5, 6, 5)).toBe(6);
    expect(roundToUnit(2, 6, 5)).toBe(6);
    expect(roundToUnit(6, 4, 6)).toBe(8);
  });
});

describe('weeklyStats', () => {
  it('totals Monday-based weeks before the forecast week', () => {
    const history: CanonicalSaleRecord[] = [
      { date: '2024-02-26', itemId: 1, quantity: 40, sourceRowRef: '1:1' },
      { date: '2024-02-27', itemId: 1, quantity: 5, sourceRowRef: '1:2' },
      { date: '2024-03-03', itemId: 1, quantity: 99, sourceRowRef: '1:3' }, // Sunday
      { date: '2024-03-04', itemId: 1, quantity: 10, sourceRowRef: '1:4' },
      { date: '2024-03-09', itemId: 1, quantity: 20, sourceRowRef: '1:5' },
      { date: '2024-03-11', itemId: 1, quantity: 70, sourceRowRef: '1:6' },
    ];
    const stats = weeklyStats(history, '2024-03-11');

    expect(stats.weeks).toBe(2);
    expect(stats.mean).toBe(37.5);
    expect(stats.std).toBeCloseTo(Math.sqrt(112.5), 10);
  });
});

describe('weeklyNote', () => {
  const typical = { mean: 100, std: 10, weeks: 8 };

  it('compares the weekly total with a typical week', () => {
    expect(weeklyNote(130, typical, 1.5)).toBe('Higher than usual (+30%)');
    expect(weeklyNote(80, typical, 1.5)).toBe('Lower than usual (-20%)');
    expect(weeklyNote(110, typical, 1.5)).toBe('As expected');
  });

  it('has nothing to compare against without history', () => {
    expect(weeklyNote(50, { mean: 0, std: 0, weeks: 0 }, 1.5)).toBe('No typical week yet');
    expect(weeklyNote(500, { mean: 100, std: 0, weeks: 1 }, 1.5)).toBe('As expected');
  });
});
