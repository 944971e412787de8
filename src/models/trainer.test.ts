import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase } from '../db/index';
import { createItemStore, type ItemStore } from '../db/item-store';
import { createModelStore, type ModelStore } from '../db/model-store';
import { createSalesStore, type SalesStore } from '../db/sales-store';
import type { HolidayFeed, WeatherFeed } from '../db/signal-store';
import type { CanonicalSaleRecord } from '../types';
import { resolveConfig, type PlannerConfigInput } from '../utils/config';
import { addDays, isoWeekdayIndex } from '../utils/dates';
import { InvalidInputError } from '../infra/errors';
import { FEATURE_SCHEMA, buildTrainingSet, type FeatureSignals } from './features';
import { createModelTrainer, mape, rollingOriginMape } from './trainer';

const noWeather: WeatherFeed = { get: async () => null };
const noHolidays: HolidayFeed = { get: async () => [] };

/** `days` consecutive operating days from Monday 2024-01-01, Sundays skipped. */
function history(itemId: number, days: number): CanonicalSaleRecord[] {
  const records: CanonicalSaleRecord[] = [];
  let date = '2024-01-01';
  while (records.length < days) {
    const index = isoWeekdayIndex(date);
    if (index !== 6) {
      records.push({ date, itemId, quantity: 10 + 2 * index + (records.length % 3), sourceRowRef: `1:${records.length}` });
    }
    date = addDays(date, 1);
  }
  return records;
}

describe('mape', () => {
  it('averages absolute percentage errors, using 1 for a zero actual', () => {
    expect(mape([10, 0], [12, 1])).toBeCloseTo(60, 10);
    expect(mape([], [])).toBe(0);
  });
});

describe('rollingOriginMape', () => {
  it('is null when no fold has enough training rows', () => {
    const rows = [[1], [2], [3], [4], [5]];
    expect(rollingOriginMape(rows, [1, 2, 3, 4, 5], [0.6, 0.9], 10, 1)).toBeNull();
  });
});

describe('buildTrainingSet', () => {
  const lookup: FeatureSignals = { weather: async () => null, signals: async () => [] };

  it('builds one row per operating day from earlier same-weekday values only', async () => {
    const samples = await buildTrainingSet(
      [
        { date: '2024-01-15', itemId: 1, quantity: 30, sourceRowRef: '1:3' },
        { date: '2024-01-01', itemId: 1, quantity: 10, sourceRowRef: '1:1' },
        { date: '2024-01-07', itemId: 1, quantity: 5, sourceRowRef: '1:2' },
        { date: '2024-01-08', itemId: 1, quantity: 20, sourceRowRef: '1:2' },
      ],
      lookup,
    );

    expect(samples.map((s) => [s.date, s.target])).toEqual([
      ['2024-01-01', 10],
      ['2024-01-08', 20],
      ['2024-01-15', 30],
    ]);
    expect(samples.every((s) => s.features.length === FEATURE_SCHEMA.length)).toBe(true);

    const last4 = FEATURE_SCHEMA.indexOf('last4_same_wd');
    const last8 = FEATURE_SCHEMA.indexOf('last8_same_wd');
    expect(samples[1].features[last4]).toBeNull();
    expect(samples[2].features[last4]).toBe(15);
    expect(samples[2].features[last8]).toBeNull();
    expect(samples[2].features[FEATURE_SCHEMA.indexOf('wd_mon')]).toBe(1);
    expect(samples[2].features[FEATURE_SCHEMA.indexOf('wd_tue')]).toBe(0);
  });
});

describe('createModelTrainer', () => {
  let items: ItemStore;
  let sales: SalesStore;
  let models: ModelStore;

  beforeEach(async () => {
    const db = await openDatabase({ file: null });
    items = createItemStore(db);
    sales = createSalesStore(db);
    models = createModelStore(db);
  });

  const trainerWith = (config: PlannerConfigInput = {}) =>
    createModelTrainer({
      items,
      sales,
      models,
      weather: noWeather,
      holidays: noHolidays,
      config: resolveConfig(config),
      now: () => new Date('2024-03-01T00:00:00Z'),
    });

  it('skips items below the training threshold', async () => {
    const bun = items.create('Bun');
    sales.append(history(bun.itemId, 15));

    expect(await trainerWith().trainItem(bun.itemId)).toBeNull();
    expect(models.load(bun.itemId)).toBeNull();
  });

  it('trains, stores and versions a ridge model', async () => {
    const loaf = items.create('Sourdough Loaf');
    sales.append(history(loaf.itemId, 30));
    const trainer = trainerWith();

    const first = await trainer.trainItem(loaf.itemId);
    expect(first).toMatchObject({
      itemId: loaf.itemId,
      algorithmTag: 'ridge',
      version: 1,
      nTrainingSamples: 30,
      featureSchema: FEATURE_SCHEMA,
      trainedAt: new Date('2024-03-01T00:00:00Z'),
    });
    expect(first?.parameters.coefficients).toHaveLength(FEATURE_SCHEMA.length);
    expect(typeof first?.crossValError).toBe('number');

    const second = await trainer.trainItem(loaf.itemId);
    expect(second?.version).toBe(2);
    expect(models.load(loaf.itemId)?.version).toBe(2);
  });

  it('drops the stored model once history is below a raised threshold', async () => {
    const loaf = items.create('Sourdough Loaf');
    sales.append(history(loaf.itemId, 30));
    expect((await trainerWith().trainItem(loaf.itemId))?.version).toBe(1);

    expect(await trainerWith({ models: { minTrainingSamples: 40 } }).trainItem(loaf.itemId)).toBeNull();
    expect(models.load(loaf.itemId)).toBeNull();
  });

  it('flags a model whose validation error exceeds the ceiling', async () => {
    const loaf = items.create('Sourdough Loaf');
    sales.append(history(loaf.itemId, 30));

    const model = await trainerWith({ models: { cvErrorCeiling: 1e-9 } }).trainItem(loaf.itemId);
    expect(model?.lowConfidence).toBe(true);
  });

  it('trains every active item with enough history', async () => {
    const loaf = items.create('Sourdough Loaf');
    const bun = items.create('Bun');
    const retired = items.create('Retired Tart');
    sales.append([...history(loaf.itemId, 30), ...history(bun.itemId, 5), ...history(retired.itemId, 30)]);
    items.setActive(retired.itemId, false);

    const trained = await trainerWith().trainAll();
    expect(trained.map((m) => m.itemId)).toEqual([loaf.itemId]);
  });

  it('rejects an unknown item', async () => {
    await expect(trainerWith().trainItem(999)).rejects.toThrow(InvalidInputError);
  });
});
