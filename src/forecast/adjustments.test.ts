import { describe, it, expect, vi } from 'vitest';
import { createAdjustmentEngine, weatherMultiplier, weightedContribution } from './adjustments';
import type { HolidayFeed, WeatherFeed } from '../db/signal-store';
import type { AdjustmentSignal, WeatherReading } from '../types';
import { resolveConfig, type PlannerConfigInput } from '../utils/config';

const DATE = '2024-03-04';
const LOAF = { itemId: 1, canonicalName: 'Sourdough Loaf' };

function holiday(multiplier: number, weight = 1, name = 'Bank Holiday'): AdjustmentSignal {
  return { date: DATE, kind: 'holiday', name, multiplier, weight };
}

function reading(overrides: Partial<WeatherReading> = {}): WeatherReading {
  return {
    date: DATE,
    location: 'default',
    maxTemp: 30,
    precipitation: 1,
    source: 'test',
    recordedAt: new Date('2024-03-01T06:00:00Z'),
    ...overrides,
  };
}

function engineWith(options: {
  signals?: AdjustmentSignal[];
  weather?: WeatherFeed;
  holidays?: HolidayFeed;
  config?: PlannerConfigInput;
}) {
  const weather: WeatherFeed = options.weather ?? { get: async () => null };
  const holidays: HolidayFeed = options.holidays ?? { get: async () => options.signals ?? [] };
  return createAdjustmentEngine({ weather, holidays, config: resolveConfig(options.config) });
}

const WARM_LOAF: PlannerConfigInput = {
  items: { 'sourdough loaf': { weatherResponse: { temp: 0.1, rain: -0.1 } } },
};

describe('weightedContribution', () => {
  it('scales the departure from 1 by the weight', () => {
    expect(weightedContribution({ multiplier: 1.4, weight: 0.5 })).toBeCloseTo(1.2, 10);
    expect(weightedContribution({ multiplier: 1.4, weight: 0 })).toBe(1);
    expect(weightedContribution({ multiplier: 0.6, weight: 2 })).toBeCloseTo(0.6, 10);
  });
});

describe('weatherMultiplier', () => {
  const anchors = { neutralTemp: 20, neutralRain: 1 };

  it('is neutral at the anchors', () => {
    expect(weatherMultiplier({ maxTemp: 20, precipitation: 1 }, { temp: 0.1, rain: -0.2 }, anchors)).toBe(1);
  });

  it('moves by the coefficient per ten units and never goes negative', () => {
    expect(weatherMultiplier({ maxTemp: 30, precipitation: 11 }, { temp: 0.1, rain: -0.2 }, anchors)).toBeCloseTo(
      1.1 * 0.8,
      10,
    );
    expect(weatherMultiplier({ maxTemp: 20, precipitation: 101 }, { temp: 0, rain: -0.5 }, anchors)).toBe(0);
    expect(weatherMultiplier({ maxTemp: null, precipitation: null }, { temp: 1, rain: 1 }, anchors)).toBe(1);
  });
});

describe('createAdjustmentEngine', () => {
  it('applies a holiday multiplier', async () => {
    const result = await engineWith({ signals: [holiday(1.3)] }).multiplierFor(DATE, LOAF);
    expect(result.multiplier).toBeCloseTo(1.3, 10);
    expect(result.applied.map((s) => s.name)).toEqual(['Bank Holiday']);
  });

  it('multiplies signals together and clamps the product', async () => {
    const result = await engineWith({
      signals: [holiday(1.3), holiday(1.4, 1, 'Fair')],
    }).multiplierFor(DATE, LOAF);

    expect(result.unclamped).toBeCloseTo(1.82, 10);
    expect(result.multiplier).toBe(1.5);
  });

  it('clamps at the configured lower bound', async () => {
    const result = await engineWith({
      signals: [holiday(0.2)],
      config: { adjustments: { minMultiplier: 0.7 } },
    }).multiplierFor(DATE, LOAF);
    expect(result.multiplier).toBe(0.7);
  });

  it('is exactly 1 with no signals', async () => {
    const result = await engineWith({}).multiplierFor(DATE, LOAF);
    expect(result).toEqual({ date: DATE, multiplier: 1, unclamped: 1, applied: [] });
  });

  it('applies the weather response configured for the item', async () => {
    const weather: WeatherFeed = { get: async () => reading() };
    const result = await engineWith({ weather, config: WARM_LOAF }).multiplierFor(DATE, LOAF);

    expect(result.multiplier).toBeCloseTo(1.1, 10);
    expect(result.applied[0]).toMatchObject({ kind: 'weather', name: 'weather' });
  });

  it('ignores weather for items without a response', async () => {
    const get = vi.fn(async () => reading());
    const result = await engineWith({ weather: { get }, config: WARM_LOAF }).multiplierFor(DATE, {
      itemId: 2,
      canonicalName: 'Baguette',
    });

    expect(result.multiplier).toBe(1);
    expect(get).not.toHaveBeenCalled();
  });

  it('treats a stale reading as unavailable', async () => {
    const weather: WeatherFeed = { get: async () => reading({ recordedAt: new Date('2024-02-01T06:00:00Z') }) };
    const result = await engineWith({ weather, config: WARM_LOAF }).multiplierFor(DATE, LOAF);
    expect(result.multiplier).toBe(1);
    expect(result.applied).toEqual([]);
  });

  it('falls back to 1 when a feed fails', async () => {
    const weather: WeatherFeed = { get: async () => Promise.reject(new Error('timeout')) };
    const holidays: HolidayFeed = { get: async () => Promise.reject(new Error('timeout')) };
    const result = await engineWith({ weather, holidays, config: WARM_LOAF }).multiplierFor(DATE, LOAF);
    expect(result.multiplier).toBe(1);
  });

  it('looks each date up once per engine', async () => {
    const get = vi.fn(async () => [holiday(1.1)]);
    const engine = engineWith({ holidays: { get } });

    await engine.multiplierFor(DATE, LOAF);
    await engine.multiplierFor(DATE, { itemId: 2, canonicalName: 'Baguette' });
    await engine.multiplierFor('2024-03-05', LOAF);

    expect(get).toHaveBeenCalledTimes(2);
  });
});
