/**
 * Canonical sales store.
 *
 * One row per (date, item_id). A later batch replaces the stored quantity for
 * the pairs it covers; summing duplicates inside a batch is the ingester's job.
 */

import type { Database, SqlRow } from './index';
import { rowNumber, rowOptionalString, rowString } from './index';
import type { CanonicalSaleRecord, DateRange, IngestionBatch } from '../types';

export interface SalesStore {
  /** Write-replace per (date, item_id); returns the number of records written. */
  append(records: CanonicalSaleRecord[], batchId?: number | null): number;
  query(itemId: number, range: DateRange): CanonicalSaleRecord[];
  /** Latest date with any committed record, or null before the first ingest. */
  latestSaleDate(): string | null;

  recordBatch(batch: Omit<IngestionBatch, 'id'>): IngestionBatch;
  findBatchByHash(contentHash: string): IngestionBatch | null;
  listBatches(): IngestionBatch[];
}

function toBatch(row: SqlRow): IngestionBatch {
  return {
    id: rowNumber(row, 'id'),
    contentHash: rowString(row, 'content_hash'),
    sourceName: rowOptionalString(row, 'source_name'),
    accepted: rowNumber(row, 'accepted'),
    rejected: rowNumber(row, 'rejected'),
    minDate: rowOptionalString(row, 'min_date'),
    maxDate: rowOptionalString(row, 'max_date'),
    committedAt: new Date(rowNumber(row, 'committed_at')),
  };
}

export function createSalesStore(db: Database): SalesStore {
  return {
    append(records, batchId = null) {
      if (records.length === 0) return 0;
      db.transaction(() => {
        for (const record of records) {
          db.run(
            `INSERT INTO sales_records (date, item_id, quantity, source_row_ref, batch_id)
             VALUES (?, ?, ?, ?, ?)
             ON CONFLICT(date, item_id) DO UPDATE SET
               quantity = excluded.quantity,
               source_row_ref = excluded.source_row_ref,
               batch_id = excluded.batch_id`,
            [record.date, record.itemId, record.quantity, record.sourceRowRef, batchId],
          );
        }
      });
      return records.length;
    },

    query(itemId, range) {
      return db
        .query(
          `SELECT date, item_id, quantity, source_row_ref FROM sales_records
           WHERE item_id = ? AND date >= ? AND date <= ?
           ORDER BY date`,
          [itemId, range.from, range.to],
        )
        .map((row) => ({
          date: rowString(row, 'date'),
          itemId: rowNumber(row, 'item_id'),
          quantity: rowNumber(row, 'quantity'),
          sourceRowRef: rowString(row, 'source_row_ref'),
        }));
    },

    latestSaleDate() {
      const rows = db.query('SELECT MAX(date) AS latest FROM sales_records');
      return rows.length > 0 ? rowOptionalString(rows[0], 'latest') : null;
    },

    recordBatch(batch) {
      db.run(
        `INSERT INTO ingestion_batches
           (content_hash, source_name, accepted, rejected, min_date, max_date, committed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          batch.contentHash,
          batch.sourceName,
          batch.accepted,
          batch.rejected,
          batch.minDate,
          batch.maxDate,
          batch.committedAt.getTime(),
        ],
      );
      return { ...batch, id: db.lastInsertId() };
    },

    findBatchByHash(contentHash) {
      const rows = db.query(
        'SELECT * FROM ingestion_batches WHERE content_hash = ? ORDER BY id LIMIT 1',
        [contentHash],
      );
      return rows.length > 0 ? toBatch(rows[0]) : null;
    },

    listBatches() {
      return db.query('SELECT * FROM ingestion_batches ORDER BY id DESC').map(toBatch);
    },
  };
}
