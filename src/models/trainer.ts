/**
 * Per-item model training.
 *
 * An item gets a ridge model only with at least `minTrainingSamples` labelled
 * day-rows; below that any stored model is dropped. Retraining replaces the
 * stored model wholesale; a model whose rolling-origin MAPE exceeds the
 * ceiling is kept but flagged lowConfidence.
 */

import type { ItemStore } from '../db/item-store';
import type { ModelStore } from '../db/model-store';
import type { SalesStore } from '../db/sales-store';
import type { HolidayFeed, WeatherFeed } from '../db/signal-store';
import type { ItemModel } from '../types';
import type { PlannerConfig } from '../utils/config';
import { InvalidInputError, PersistenceFailure, errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';
import { FEATURE_SCHEMA, buildTrainingSet, createFeatureSignals } from './features';
import { fitRidge, predictRidge, type FeatureVector } from './ridge';

const logger = createLogger('trainer');

/** Whole-history range for training reads. */
const ALL_DATES = { from: '0000-01-01', to: '9999-12-31' };

export interface ModelTrainerDeps {
  items: ItemStore;
  sales: SalesStore;
  models: ModelStore;
  weather: WeatherFeed;
  holidays: HolidayFeed;
  config: PlannerConfig;
  now?: () => Date;
}

export interface ModelTrainer {
  /** Returns null when the item has too little history for a model. */
  trainItem(itemId: number): Promise<ItemModel | null>;
  /** Trains every active item; items below the threshold are skipped. */
  trainAll(): Promise<ItemModel[]>;
}

/**
 * Mean absolute percentage error (%); a true value of 0 uses 1 as denominator.
 */
export function mape(actual: number[], predicted: number[]): number {
  if (actual.length === 0) return 0;
  let total = 0;
  for (let i = 0; i < actual.length; i++) {
    const denom = actual[i] === 0 ? 1 : Math.abs(actual[i]);
    total += Math.abs(actual[i] - predicted[i]) / denom;
  }
  return (total / actual.length) * 100;
}

/**
 * Rolling-origin validation: for each fraction f, fit on the first ⌊n·f⌋
 * rows and score the rest. Folds whose training prefix is shorter than
 * `minTrainRows` (or leaves nothing to score) are skipped; null when every
 * fold was skipped.
 */
export function rollingOriginMape(
  rows: FeatureVector[],
  targets: number[],
  fractions: number[],
  minTrainRows: number,
  alpha: number,
): number | null {
  const n = rows.length;
  const scores: number[] = [];
  for (const fraction of fractions) {
    const k = Math.floor(n * fraction);
    if (k < minTrainRows || k >= n) continue;
    const params = fitRidge(rows.slice(0, k), targets.slice(0, k), alpha);
    const predicted = rows.slice(k).map((row) => predictRidge(params, row));
    scores.push(mape(targets.slice(k), predicted));
  }
  return scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : null;
}

export function createModelTrainer(deps: ModelTrainerDeps): ModelTrainer {
  const { items, sales, models, config } = deps;
  const now = deps.now ?? (() => new Date());
  const settings = config.models;
  const lookup = createFeatureSignals(deps.weather, deps.holidays, config.location);

  const trainer: ModelTrainer = {
    async trainItem(itemId) {
      const item = items.get(itemId);
      if (!item) throw new InvalidInputError(`Unknown item id ${itemId}`);

      const samples = await buildTrainingSet(sales.query(itemId, ALL_DATES), lookup);
      if (samples.length < settings.minTrainingSamples) {
        const removed = models.remove(itemId);
        logger.info(
          { itemId, samples: samples.length, required: settings.minTrainingSamples, removed },
          'InsufficientHistory: no model trained',
        );
        return null;
      }

      const rows = samples.map((s) => s.features);
      const targets = samples.map((s) => s.target);
      const parameters = fitRidge(rows, targets, settings.ridgeAlpha);
      const crossValError = rollingOriginMape(
        rows,
        targets,
        settings.cvFractions,
        settings.minFoldTrainRows,
        settings.ridgeAlpha,
      );
      const lowConfidence = crossValError !== null && crossValError > settings.cvErrorCeiling;

      const model = models.save({
        itemId,
        algorithmTag: 'ridge',
        parameters,
        featureSchema: [...FEATURE_SCHEMA],
        nTrainingSamples: samples.length,
        crossValError,
        lowConfidence,
        trainedAt: now(),
      });

      logger.info(
        { itemId, name: item.canonicalName, n: samples.length, cvMape: crossValError, lowConfidence, version: model.version },
        'Model trained',
      );
      return model;
    },

    async trainAll() {
      const trained: ItemModel[] = [];
      for (const item of items.list({ activeOnly: true })) {
        try {
          const model = await trainer.trainItem(item.itemId);
          if (model) trained.push(model);
        } catch (error) {
          if (error instanceof PersistenceFailure) throw error;
          logger.warn({ itemId: item.itemId, error: errorMessage(error) }, 'Training failed for item');
        }
      }
      return trained;
    },
  };

  return trainer;
}
