/**
 * Model store - one current ItemModel per item.
 *
 * Saving replaces the previous record wholesale inside a single transaction
 * and bumps its version, so a reader sees either the old model or the new
 * one, never a mix.
 */

import { z } from 'zod';
import type { Database, SqlRow } from './index';
import { rowNumber, rowOptionalNumber, rowString } from './index';
import type { ItemModel } from '../types';
import { PersistenceFailure, errorMessage } from '../infra/errors';

export type ItemModelDraft = Omit<ItemModel, 'version'>;

export interface ModelStore {
  save(model: ItemModelDraft): ItemModel;
  load(itemId: number): ItemModel | null;
  /** Drops the item's model; true when one was stored. */
  remove(itemId: number): boolean;
  list(): ItemModel[];
}

const ridgeParametersSchema = z.object({
  intercept: z.number(),
  coefficients: z.array(z.number()),
  featureMeans: z.array(z.number()),
  featureStds: z.array(z.number()),
  imputeMedians: z.array(z.number()),
  alpha: z.number(),
});

const featureSchemaSchema = z.array(z.string());

function parseJson<T>(schema: z.ZodType<T>, text: string, what: string): T {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new PersistenceFailure(`Stored ${what} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new PersistenceFailure(`Stored ${what} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

function toModel(row: SqlRow): ItemModel {
  return {
    itemId: rowNumber(row, 'item_id'),
    algorithmTag: 'ridge',
    version: rowNumber(row, 'version'),
    parameters: parseJson(ridgeParametersSchema, rowString(row, 'parameters'), 'model parameters'),
    featureSchema: parseJson(featureSchemaSchema, rowString(row, 'feature_schema'), 'feature schema'),
    nTrainingSamples: rowNumber(row, 'n_training_samples'),
    crossValError: rowOptionalNumber(row, 'cross_val_error'),
    lowConfidence: rowNumber(row, 'low_confidence') === 1,
    trainedAt: new Date(rowNumber(row, 'trained_at')),
  };
}

export function createModelStore(db: Database): ModelStore {
  const store: ModelStore = {
    save(model) {
      return db.transaction(() => {
        const current = db.query('SELECT version FROM item_models WHERE item_id = ?', [model.itemId]);
        const version = current.length > 0 ? rowNumber(current[0], 'version') + 1 : 1;

        db.run(
          `INSERT INTO item_models
             (item_id, version, algorithm_tag, parameters, feature_schema,
              n_training_samples, cross_val_error, low_confidence, trained_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(item_id) DO UPDATE SET
             version = excluded.version,
             algorithm_tag = excluded.algorithm_tag,
             parameters = excluded.parameters,
             feature_schema = excluded.feature_schema,
             n_training_samples = excluded.n_training_samples,
             cross_val_error = excluded.cross_val_error,
             low_confidence = excluded.low_confidence,
             trained_at = excluded.trained_at`,
          [
            model.itemId,
            version,
            model.algorithmTag,
            JSON.stringify(model.parameters),
            JSON.stringify(model.featureSchema),
            model.nTrainingSamples,
            model.crossValError,
            model.lowConfidence ? 1 : 0,
            model.trainedAt.getTime(),
          ],
        );
        return { ...model, version };
      });
    },

    load(itemId) {
      const rows = db.query('SELECT * FROM item_models WHERE item_id = ?', [itemId]);
      return rows.length > 0 ? toModel(rows[0]) : null;
    },

    remove(itemId) {
      return db.transaction(() => {
        const current = db.query('SELECT version FROM item_models WHERE item_id = ?', [itemId]);
        if (current.length === 0) return false;
        db.run('DELETE FROM item_models WHERE item_id = ?', [itemId]);
        return true;
      });
    },

    list() {
      return db.query('SELECT * FROM item_models ORDER BY item_id').map(toModel);
    },
  };
  return store;
}
