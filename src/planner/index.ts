/**
 * Planner - the public entry points over one database.
 *
 *   ingest(raw export)              → IngestResult
 *   forecast(week, α, useModel)     → ForecastRun
 *   train(itemId | 'all')           → ItemModel | null | ItemModel[]
 *
 * plus run history, item administration and signal import.
 */

import type { Database } from '../db';
import { createItemStore, type ItemStore } from '../db/item-store';
import { createModelStore, type ModelStore } from '../db/model-store';
import { createRunStore, type RunStore } from '../db/run-store';
import { createSalesStore, type SalesStore } from '../db/sales-store';
import { createSignalStore, type HolidayFeed, type SignalStore, type WeatherFeed } from '../db/signal-store';
import { generateForecast, type ForecastRequest } from '../forecast/engine';
import { ingestExport, type RawExport } from '../import/ingest';
import { parseEventsCsv, parseWeatherCsv } from '../import/signals';
import type { IngestResult, RejectedRow } from '../import/types';
import { createModelTrainer, type ModelTrainer } from '../models/trainer';
import type { ForecastRun, ForecastRunSummary, IngestionBatch, Item, ItemModel } from '../types';
import { resolveConfig, type PlannerConfig } from '../utils/config';
import { nextMonday } from '../utils/dates';

export interface PlannerOptions {
  db: Database;
  config?: PlannerConfig;
  /** Replace the database-backed feeds (e.g. with a live weather service) */
  weather?: WeatherFeed;
  holidays?: HolidayFeed;
  now?: () => Date;
}

export interface ForecastOptions extends Omit<ForecastRequest, 'weekStart'> {
  /** Defaults to the next Monday (today when today is Monday) */
  weekStart?: string;
}

export interface SignalImportResult {
  imported: number;
  rejected: RejectedRow[];
}

export interface Planner {
  readonly config: PlannerConfig;

  ingest(raw: RawExport): IngestResult;
  forecast(options?: ForecastOptions): Promise<ForecastRun>;
  train(target: number): Promise<ItemModel | null>;
  train(target: 'all'): Promise<ItemModel[]>;

  getRun(runId: number): ForecastRun | null;
  listRuns(weekStart?: string): ForecastRunSummary[];
  latestRun(weekStart?: string): ForecastRun | null;

  listItems(options?: { activeOnly?: boolean }): Item[];
  addAlias(alias: string, itemId: number): Item;
  setItemActive(itemId: number, active: boolean): Item;
  getModel(itemId: number): ItemModel | null;
  /** Committed ingestion batches, newest first */
  listBatches(): IngestionBatch[];

  importWeather(content: string, source?: string): SignalImportResult;
  importEvents(content: string): SignalImportResult;
}

export function createPlanner(options: PlannerOptions): Planner {
  const { db } = options;
  const config = options.config ?? resolveConfig();
  const now = options.now ?? (() => new Date());

  const items: ItemStore = createItemStore(db);
  const sales: SalesStore = createSalesStore(db);
  const models: ModelStore = createModelStore(db);
  const runs: RunStore = createRunStore(db);
  const signals: SignalStore = createSignalStore(db);
  const weather = options.weather ?? signals.weather;
  const holidays = options.holidays ?? signals.holidays;

  const trainer: ModelTrainer = createModelTrainer({ items, sales, models, weather, holidays, config, now });

  function train(target: number): Promise<ItemModel | null>;
  function train(target: 'all'): Promise<ItemModel[]>;
  function train(target: number | 'all'): Promise<ItemModel | null | ItemModel[]> {
    return target === 'all' ? trainer.trainAll() : trainer.trainItem(target);
  }

  return {
    config,

    ingest(raw) {
      return ingestExport({ db, items, sales, config }, raw);
    },

    forecast(forecastOptions = {}) {
      const { weekStart, ...rest } = forecastOptions;
      return generateForecast(
        { items, sales, models, runs, weather, holidays, config },
        { ...rest, weekStart: weekStart ?? nextMonday(now()) },
      );
    },

    train,

    getRun(runId) {
      return runs.getRun(runId);
    },

    listRuns(weekStart) {
      return weekStart ? runs.listRuns(weekStart) : runs.listAllRuns();
    },

    latestRun(weekStart) {
      return runs.latestRun(weekStart);
    },

    listItems(listOptions) {
      return items.list(listOptions);
    },

    addAlias(alias, itemId) {
      return items.addAlias(itemId, alias);
    },

    setItemActive(itemId, active) {
      return items.setActive(itemId, active);
    },

    getModel(itemId) {
      return models.load(itemId);
    },

    listBatches() {
      return sales.listBatches();
    },

    importWeather(content, source) {
      const { records, rejected } = parseWeatherCsv(content, config, source, now());
      return { imported: signals.upsertWeather(records), rejected };
    },

    importEvents(content) {
      const { records, rejected } = parseEventsCsv(content, config);
      return { imported: signals.upsertEvents(records), rejected };
    },
  };
}
