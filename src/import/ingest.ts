/**
 * Ingestion - raw export → canonical sales records.
 *
 * parse → normalize (SchemaError aborts before any write) → resolve →
 * re-sum per (date, item) → append + batch record, all in one transaction.
 * Rows held out by an ambiguous name are reported, never guessed.
 */

import { createHash } from 'crypto';
import type { Database } from '../db';
import type { ItemStore } from '../db/item-store';
import type { SalesStore } from '../db/sales-store';
import type { CanonicalSaleRecord } from '../types';
import type { PlannerConfig } from '../utils/config';
import { createItemResolver, type Resolution } from '../catalog/resolver';
import { ResolutionAmbiguityError } from '../infra/errors';
import { parseCsvTable } from './csv-parser';
import { normalizeExport, normalizeOptionsFrom } from './normalizer';
import type { Delimiter, FuzzyMatch, IngestResult, RejectedRow, TidyRow } from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger('ingest');

export interface IngestDeps {
  db: Database;
  items: ItemStore;
  sales: SalesStore;
  config: PlannerConfig;
}

export interface RawExport {
  content: string;
  /** File name or other label kept with the batch */
  sourceName?: string;
  /** Field separator; sniffed from the content when omitted */
  delimiter?: Delimiter;
}

export function contentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

function rowRef(rows: number[]): string {
  return rows.join(',');
}

export function ingestExport(deps: IngestDeps, raw: RawExport): IngestResult {
  const { db, items, sales, config } = deps;
  const hash = contentHash(raw.content);
  const duplicateOfBatch = sales.findBatchByHash(hash)?.id ?? null;
  if (duplicateOfBatch !== null) {
    logger.warn({ batch: duplicateOfBatch, source: raw.sourceName }, 'Identical export was already ingested');
  }

  const table = parseCsvTable(raw.content, { delimiter: raw.delimiter });
  const normalized = normalizeExport(table, normalizeOptionsFrom(config));

  const result = db.transaction((): IngestResult => {
    const resolver = createItemResolver(items, config.resolver);
    const cache = new Map<string, Resolution | ResolutionAmbiguityError>();
    const rejectedRows: RejectedRow[] = [...normalized.rejected];
    const errors: string[] = [];
    const itemsCreated: IngestResult['itemsCreated'] = [];
    const fuzzyMatches: FuzzyMatch[] = [];

    const resolveName = (name: string): Resolution | ResolutionAmbiguityError => {
      const cached = cache.get(name);
      if (cached) return cached;
      let outcome: Resolution | ResolutionAmbiguityError;
      try {
        outcome = resolver.resolve(name);
      } catch (error) {
        if (!(error instanceof ResolutionAmbiguityError)) throw error;
        outcome = error;
      }
      cache.set(name, outcome);
      if (outcome instanceof ResolutionAmbiguityError) {
        logger.warn({ rawName: name, candidates: outcome.candidates }, 'Ambiguous item name held out');
        errors.push(outcome.message);
      } else if (outcome.method === 'created') {
        itemsCreated.push({ itemId: outcome.itemId, canonicalName: outcome.canonicalName });
      } else if (outcome.method === 'fuzzy') {
        fuzzyMatches.push({
          rawName: name,
          itemId: outcome.itemId,
          canonicalName: outcome.canonicalName,
          score: outcome.score,
        });
      }
      return outcome;
    };

    // Names that differ only by alias can land on the same item: sum again
    const byKey = new Map<string, { date: string; itemId: number; quantity: number; rows: number[] }>();
    const accept = (row: TidyRow, itemId: number) => {
      const key = `${row.date}|${itemId}`;
      const existing = byKey.get(key);
      if (existing) {
        existing.quantity += row.quantity;
        existing.rows.push(...row.sourceRows);
      } else {
        byKey.set(key, { date: row.date, itemId, quantity: row.quantity, rows: [...row.sourceRows] });
      }
    };

    for (const row of normalized.rows) {
      const outcome = resolveName(row.itemNameRaw);
      if (outcome instanceof ResolutionAmbiguityError) {
        for (const r of row.sourceRows) {
          rejectedRows.push({ row: r, reason: 'ambiguous item name', value: row.itemNameRaw });
        }
        continue;
      }
      accept(row, outcome.itemId);
    }

    const pending = [...byKey.values()];
    const dates = pending.map((p) => p.date).sort();
    const dateRange = dates.length > 0 ? { from: dates[0], to: dates[dates.length - 1] } : null;
    rejectedRows.sort((a, b) => a.row - b.row);

    const batch = sales.recordBatch({
      contentHash: hash,
      sourceName: raw.sourceName ?? null,
      accepted: pending.length,
      rejected: rejectedRows.length,
      minDate: dateRange?.from ?? null,
      maxDate: dateRange?.to ?? null,
      committedAt: new Date(),
    });

    const records: CanonicalSaleRecord[] = pending.map((p) => ({
      date: p.date,
      itemId: p.itemId,
      quantity: p.quantity,
      sourceRowRef: `${batch.id}:${rowRef([...p.rows].sort((a, b) => a - b))}`,
    }));
    sales.append(records, batch.id);

    return {
      batchId: batch.id,
      accepted: records.length,
      rejectedRows,
      errors,
      itemsCreated,
      fuzzyMatches,
      duplicateOfBatch,
      dateRange,
    };
  });

  logger.info(
    {
      batch: result.batchId,
      source: raw.sourceName,
      accepted: result.accepted,
      rejected: result.rejectedRows.length,
      created: result.itemsCreated.length,
    },
    'Export ingested',
  );
  return result;
}
