/**
 * Forecast generation for one week.
 *
 * readiness check → per item {baseline, model prediction, adjustments, blend}
 * → one complete run handed to the recorder. Items are best-effort (a model
 * failure degrades that item to its baseline); the run record is
 * all-or-nothing.
 */

import type { ItemStore } from '../db/item-store';
import type { ModelStore } from '../db/model-store';
import type { RunStore } from '../db/run-store';
import type { SalesStore } from '../db/sales-store';
import type { HolidayFeed, WeatherFeed } from '../db/signal-store';
import type { ForecastAlert, ForecastLine, ForecastRun, Item, ItemModel, CanonicalSaleRecord } from '../types';
import { itemSettingsFor, type PlannerConfig } from '../utils/config';
import { addDays, isMonday, weekDates, type Weekday } from '../utils/dates';
import { HistoryNotReadyError, InvalidInputError, RunAbortedError, errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';
import { FEATURE_SCHEMA, buildFeatureRow, createFeatureSignals, priorSameWeekday, type FeatureSignals } from '../models/features';
import { predictRidge } from '../models/ridge';
import { createAdjustmentEngine, type AdjustmentEngine } from './adjustments';
import { estimateBaselines } from './baseline';
import { blendItem, weeklyStats } from './blender';

const logger = createLogger('forecast');

export interface ForecastRequest {
  /** Monday of the week to forecast (YYYY-MM-DD) */
  weekStart: string;
  /** AI emphasis in [0, 1]; defaults to blend.alpha */
  alpha?: number;
  useModel?: boolean;
  /** Forecast even if history is not committed through the day before */
  skipReadinessCheck?: boolean;
  signal?: AbortSignal;
}

export interface ForecastEngineDeps {
  items: ItemStore;
  sales: SalesStore;
  models: ModelStore;
  runs: RunStore;
  weather: WeatherFeed;
  holidays: HolidayFeed;
  config: PlannerConfig;
}

/**
 * History must be committed through the day before the week, less the grace
 * days (the shop is closed on Sunday).
 */
export function assertHistoryReady(sales: SalesStore, weekStart: string, graceDays: number): void {
  const requiredThrough = addDays(weekStart, -1);
  const latest = sales.latestSaleDate();
  if (latest === null || latest < addDays(requiredThrough, -graceDays)) {
    throw new HistoryNotReadyError(requiredThrough, latest);
  }
}

async function predictWeek(
  model: ItemModel,
  history: CanonicalSaleRecord[],
  weekStart: string,
  lookup: FeatureSignals,
): Promise<Record<Weekday, number>> {
  if (model.featureSchema.join(',') !== FEATURE_SCHEMA.join(',')) {
    throw new Error(`model v${model.version} was trained on a different feature set; retrain it`);
  }
  const predictions: Record<Weekday, number> = { mon: 0, tue: 0, wed: 0, thu: 0, fri: 0, sat: 0 };
  for (const { weekday, date } of weekDates(weekStart)) {
    const [weather, signals] = await Promise.all([lookup.weather(date), lookup.signals(date)]);
    const row = buildFeatureRow({
      date,
      weather,
      signals,
      priorSameWeekday: priorSameWeekday(history, weekday, weekStart),
    });
    const value = predictRidge(model.parameters, row);
    if (!Number.isFinite(value)) throw new Error(`model v${model.version} produced a non-finite prediction`);
    predictions[weekday] = value;
  }
  return predictions;
}

async function multipliersFor(
  engine: AdjustmentEngine,
  item: Item,
  weekStart: string,
): Promise<Record<Weekday, number>> {
  const multipliers: Record<Weekday, number> = { mon: 1, tue: 1, wed: 1, thu: 1, fri: 1, sat: 1 };
  for (const { weekday, date } of weekDates(weekStart)) {
    const breakdown = await engine.multiplierFor(date, item);
    multipliers[weekday] = breakdown.multiplier;
  }
  return multipliers;
}

export async function generateForecast(deps: ForecastEngineDeps, request: ForecastRequest): Promise<ForecastRun> {
  const { items, sales, models, runs, config } = deps;
  const { weekStart, signal } = request;
  const alpha = request.alpha ?? config.blend.alpha;
  const useModel = request.useModel ?? true;

  if (!isMonday(weekStart)) {
    throw new InvalidInputError(`Week start must be a Monday in YYYY-MM-DD form, got "${weekStart}"`);
  }
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new InvalidInputError(`AI emphasis must be between 0 and 1, got ${alpha}`);
  }
  if (!request.skipReadinessCheck) {
    assertHistoryReady(sales, weekStart, config.readiness.graceDays);
  }

  const checkAbort = () => {
    if (signal?.aborted) throw new RunAbortedError(weekStart);
  };
  checkAbort();

  const activeItems = items.list({ activeOnly: true });

  // Snapshot the models once so a retrain during the run cannot mix versions
  const snapshot = new Map<number, ItemModel>();
  if (useModel) {
    for (const item of activeItems) {
      const model = models.load(item.itemId);
      if (!model) continue;
      if (model.nTrainingSamples < config.models.minTrainingSamples) {
        logger.debug(
          { itemId: item.itemId, samples: model.nTrainingSamples, required: config.models.minTrainingSamples },
          'Stored model below training threshold; ignored',
        );
        continue;
      }
      snapshot.set(item.itemId, model);
    }
  }

  const adjustments = createAdjustmentEngine({ weather: deps.weather, holidays: deps.holidays, config });
  const lookup = createFeatureSignals(deps.weather, deps.holidays, config.location);
  const range = { from: addDays(weekStart, -7 * config.baseline.lookbackWeeks), to: addDays(weekStart, -1) };

  const lines: ForecastLine[] = [];
  const alerts: ForecastAlert[] = [];

  logger.info({ week: weekStart, alpha, useModel, items: activeItems.length }, 'Generating forecast');

  for (const item of activeItems) {
    checkAbort();

    const history = sales.query(item.itemId, range);
    const baseline = estimateBaselines(item.itemId, history, weekStart, config.baseline);
    if (baseline.coldStart) {
      logger.info({ itemId: item.itemId, name: item.canonicalName }, 'InsufficientHistory: cold start');
      alerts.push({
        itemId: item.itemId,
        day: null,
        reason: 'no history',
        detail: `No sales in the ${config.baseline.lookbackWeeks} weeks before ${weekStart}`,
      });
    }

    let modelPredictions: Record<Weekday, number> | null = null;
    const model = snapshot.get(item.itemId);
    if (model && model.lowConfidence) {
      logger.debug({ itemId: item.itemId, cvMape: model.crossValError }, 'Low-confidence model left out of blend');
    } else if (model) {
      try {
        modelPredictions = await predictWeek(model, history, weekStart, lookup);
      } catch (error) {
        logger.warn({ itemId: item.itemId, error: errorMessage(error) }, 'Model prediction failed; using baseline');
        alerts.push({ itemId: item.itemId, day: null, reason: 'model unavailable', detail: errorMessage(error) });
      }
    }

    const settings = itemSettingsFor(config, item.canonicalName);
    const { line, alerts: itemAlerts } = blendItem({
      itemId: item.itemId,
      itemName: item.canonicalName,
      weekStart,
      baseline,
      modelPredictions,
      modelVersion: model ? model.version : null,
      alpha,
      multipliers: await multipliersFor(adjustments, item, weekStart),
      floor: settings.minBatch ?? config.floors.defaultMinBatch,
      roundingUnit: settings.roundingUnit ?? config.rounding.defaultUnit,
      alerts: config.alerts,
      weekly: weeklyStats(history, weekStart),
    });

    lines.push(line);
    alerts.push(...itemAlerts);
  }

  checkAbort();
  return runs.record({
    weekStartDate: weekStart,
    lines,
    alerts,
    parameters: { alpha, useModel, config },
  });
}
