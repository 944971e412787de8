import { describe, it, expect } from 'vitest';
import { estimateBaselines, sampleStd } from './baseline';
import type { CanonicalSaleRecord } from '../types';

const WEEK = '2024-03-11';

function sale(date: string, quantity: number, itemId = 1): CanonicalSaleRecord {
  return { date, itemId, quantity, sourceRowRef: `1:${date}` };
}

// Four Mondays, oldest first
const MONDAYS = [sale('2024-02-12', 40), sale('2024-02-19', 45), sale('2024-02-26', 42), sale('2024-03-04', 50)];

describe('estimateBaselines', () => {
  it('weights the newest same-weekday instance heaviest', () => {
    const baseline = estimateBaselines(1, MONDAYS, WEEK, { windowWeeks: 8, decay: 0.9 });
    const mon = baseline.weekdays.mon;

    // (50 + 0.9·42 + 0.81·45 + 0.729·40) / (1 + 0.9 + 0.81 + 0.729)
    expect(mon.estimatedMean).toBeCloseTo(153.41 / 3.439, 10);
    expect(Math.round(mon.estimatedMean)).toBe(45);
    expect(mon.sampleWeight).toBeCloseTo(3.439, 10);
    expect(mon.source).toBe('weekday');
    expect(mon.instances).toEqual([50, 42, 45, 40]);
    expect(mon.historyMean).toBe(44.25);
    expect(mon.lastUpdated).toBe('2024-03-10');
    expect(baseline.coldStart).toBe(false);
  });

  it('moves toward the unweighted mean as decay approaches 1', () => {
    const at = (decay: number) =>
      estimateBaselines(1, MONDAYS, WEEK, { windowWeeks: 8, decay }).weekdays.mon.estimatedMean;

    expect(at(1)).toBe(44.25);
    expect(at(0.5)).toBeCloseTo(87.25 / 1.875, 10);
    expect(Math.abs(at(0.5) - 44.25)).toBeGreaterThan(Math.abs(at(0.9) - 44.25));
  });

  it('uses only the configured window of instances', () => {
    const mon = estimateBaselines(1, MONDAYS, WEEK, { windowWeeks: 2, decay: 0.9 }).weekdays.mon;
    expect(mon.instances).toEqual([50, 42]);
    expect(mon.estimatedMean).toBeCloseTo(87.8 / 1.9, 10);
  });

  it('falls back to the overall recency-weighted mean below two instances', () => {
    const history = [
      sale('2024-02-27', 30),
      sale('2024-03-04', 10),
      sale('2024-03-05', 20),
      sale('2024-03-10', 999), // Sunday
      sale('2024-03-11', 500), // inside the forecast week
      sale('2024-03-05', 7, 2), // another item
    ];
    const baseline = estimateBaselines(1, history, WEEK, { windowWeeks: 8, decay: 0.9 });

    expect(baseline.weekdays.tue.source).toBe('weekday');
    expect(baseline.weekdays.tue.estimatedMean).toBeCloseTo((20 + 0.9 * 30) / 1.9, 10);

    // Mar 4 and Mar 5 are in the last week (weight 1), Feb 27 one week back (0.9)
    expect(baseline.weekdays.mon.source).toBe('overall');
    expect(baseline.weekdays.mon.estimatedMean).toBeCloseTo(57 / 2.9, 10);
    expect(baseline.weekdays.mon.historyMean).toBeNull();
    expect(baseline.weekdays.sat.estimatedMean).toBeCloseTo(57 / 2.9, 10);
  });

  it('returns zeros and flags cold start without history', () => {
    const baseline = estimateBaselines(7, [], WEEK, { windowWeeks: 8, decay: 0.9 });
    expect(baseline.coldStart).toBe(true);
    expect(baseline.weekdays.wed).toMatchObject({ estimatedMean: 0, sampleWeight: 0, source: 'none' });
  });
});

describe('sampleStd', () => {
  it('uses n - 1', () => {
    expect(sampleStd([40, 45, 42, 50])).toBeCloseTo(Math.sqrt(56.75 / 3), 10);
    expect(sampleStd([5])).toBe(0);
  });
});
