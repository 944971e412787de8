/**
 * Normalizer - raw sales export → tidy `{date, itemNameRaw, quantity, isRefund}` rows
 *
 * Column meaning comes from a declarative synonym table (header-synonyms.json
 * plus configured extras), so a new export vendor is a table entry rather
 * than a code path. Two layouts are recognised:
 * - long: one row per (date, item) with date/item/quantity columns
 * - wide: one row per item with a column per date ("Square-style")
 *
 * Rows sharing (date, raw item name) are summed here, before any item
 * resolution happens.
 */

import builtinSynonyms from './header-synonyms.json';
import { parseNumberCell } from './csv-parser';
import type {
  CsvTable,
  HeaderSynonyms,
  NormalizeResult,
  RejectedRow,
  ResolvedColumns,
  SemanticColumn,
  TidyRow,
} from './types';
import { SchemaError } from '../infra/errors';
import { displayName } from '../catalog/text';
import { isDateLikeHeader, parseDateValue } from '../utils/dates';
import type { PlannerConfig } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('normalizer');

export interface NormalizeOptions {
  /** Extra synonyms, consulted before the built-in table */
  synonyms?: Partial<HeaderSynonyms>;
  dayFirst?: boolean;
  wideMinDateColumns?: number;
  refundVocabulary?: string[];
}

export function normalizeOptionsFrom(config: PlannerConfig): NormalizeOptions {
  return {
    synonyms: config.import.headerSynonyms,
    dayFirst: config.import.dayFirst,
    wideMinDateColumns: config.import.wideMinDateColumns,
    refundVocabulary: config.import.refundVocabulary,
  };
}

// ---------------------------------------------------------------------------
// Header resolution
// ---------------------------------------------------------------------------

export function normalizeHeader(header: string): string {
  return header
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

const RESOLUTION_ORDER: SemanticColumn[] = ['date', 'quantity', 'item', 'variation', 'eventType'];

function mergedSynonyms(extra: Partial<HeaderSynonyms> = {}): HeaderSynonyms {
  const merged: HeaderSynonyms = {
    date: [],
    item: [],
    quantity: [],
    variation: [],
    eventType: [],
  };
  for (const column of RESOLUTION_ORDER) {
    merged[column] = [...(extra[column] ?? []), ...builtinSynonyms[column]].map(normalizeHeader);
  }
  return merged;
}

/**
 * Pick one header per semantic column. Synonym order is priority order; a
 * header claimed by one column is not reused by a later one.
 */
export function resolveColumns(headers: string[], extra?: Partial<HeaderSynonyms>): ResolvedColumns {
  const synonyms = mergedSynonyms(extra);
  const normalized = headers.map(normalizeHeader);
  const used = new Set<number>();

  const find = (column: SemanticColumn): number | null => {
    for (const synonym of synonyms[column]) {
      const idx = normalized.findIndex((h, i) => h === synonym && !used.has(i));
      if (idx >= 0) {
        used.add(idx);
        return idx;
      }
    }
    return null;
  };

  const resolved: ResolvedColumns = {
    date: null,
    item: null,
    quantity: null,
    variation: null,
    eventType: null,
  };
  for (const column of RESOLUTION_ORDER) {
    resolved[column] = find(column);
  }
  return resolved;
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

interface PendingRow {
  date: string;
  itemNameRaw: string;
  quantity: number;
  row: number;
}

/** Sum rows sharing (date, raw name); output sorted by date, then name. */
export function aggregateRows(pending: PendingRow[]): TidyRow[] {
  const byKey = new Map<string, TidyRow>();
  for (const p of pending) {
    const key = `${p.date}\u0000${p.itemNameRaw}`;
    const existing = byKey.get(key);
    if (existing) {
      existing.quantity += p.quantity;
      existing.sourceRows.push(p.row);
    } else {
      byKey.set(key, {
        date: p.date,
        itemNameRaw: p.itemNameRaw,
        quantity: p.quantity,
        isRefund: false,
        sourceRows: [p.row],
      });
    }
  }

  return [...byKey.values()]
    .map((row) => ({ ...row, isRefund: row.quantity < 0, sourceRows: [...row.sourceRows].sort((a, b) => a - b) }))
    .sort((a, b) =>
      a.date !== b.date ? (a.date < b.date ? -1 : 1) : a.itemNameRaw < b.itemNameRaw ? -1 : a.itemNameRaw > b.itemNameRaw ? 1 : 0,
    );
}

// ---------------------------------------------------------------------------
// Normalize
// ---------------------------------------------------------------------------

export function normalizeExport(table: CsvTable, options: NormalizeOptions = {}): NormalizeResult {
  const dayFirst = options.dayFirst ?? true;
  const wideMin = options.wideMinDateColumns ?? 5;
  const vocabulary = (options.refundVocabulary ?? ['refund', 'return']).map((v) => v.toLowerCase());

  if (table.headers.length === 0) {
    throw new SchemaError('Export is empty', ['date', 'item', 'quantity'], []);
  }

  const columns = resolveColumns(table.headers, options.synonyms);
  const dateHeaders = table.headers
    .map((header, index) => ({ header, index }))
    .filter(({ header }) => isDateLikeHeader(header));

  const result =
    dateHeaders.length >= wideMin
      ? normalizeWide(table, columns, dateHeaders, dayFirst)
      : normalizeLong(table, columns, dayFirst, vocabulary);

  logger.info(
    { layout: result.layout, rows: result.rows.length, rejected: result.rejected.length },
    'Normalized export',
  );
  return result;
}

function normalizeLong(
  table: CsvTable,
  columns: ResolvedColumns,
  dayFirst: boolean,
  vocabulary: string[],
): NormalizeResult {
  const { date: dateCol, item: itemCol, quantity: qtyCol } = columns;
  if (dateCol === null || itemCol === null || qtyCol === null) {
    const missing = (['date', 'item', 'quantity'] as const).filter((c) => columns[c] === null);
    throw new SchemaError(
      `Missing mandatory column(s): ${missing.join(', ')}. Headers seen: ${table.headers.join(', ')}`,
      [...missing],
      table.headers,
    );
  }

  const pending: PendingRow[] = [];
  const rejected: RejectedRow[] = [];

  for (const record of table.rows) {
    const cell = (index: number | null) => (index === null ? '' : record.fields[index] ?? '');

    const dateRaw = cell(dateCol);
    const date = parseDateValue(dateRaw, dayFirst);
    if (!date) {
      rejected.push({ row: record.rowNumber, reason: 'unparseable date', value: dateRaw });
      continue;
    }

    const name = displayName(cell(itemCol));
    if (!name) {
      rejected.push({ row: record.rowNumber, reason: 'missing item name' });
      continue;
    }

    const qtyRaw = cell(qtyCol);
    const quantity = parseNumberCell(qtyRaw);
    if (quantity === null) {
      rejected.push({ row: record.rowNumber, reason: 'non-numeric quantity', value: qtyRaw });
      continue;
    }

    const typeValue = cell(columns.eventType).toLowerCase();
    const isRefund = quantity < 0 || (typeValue.length > 0 && vocabulary.some((v) => typeValue.includes(v)));

    pending.push({
      date,
      itemNameRaw: name,
      quantity: isRefund && quantity !== 0 ? -Math.abs(quantity) : quantity,
      row: record.rowNumber,
    });
  }

  return { layout: 'long', columns, rows: aggregateRows(pending), rejected };
}

function normalizeWide(
  table: CsvTable,
  columns: ResolvedColumns,
  dateHeaders: Array<{ header: string; index: number }>,
  dayFirst: boolean,
): NormalizeResult {
  const itemCol = columns.item;
  if (itemCol === null) {
    throw new SchemaError(
      `Wide export has no item column. Headers seen: ${table.headers.join(', ')}`,
      ['item'],
      table.headers,
    );
  }

  const dateColumns: Array<{ header: string; index: number; date: string }> = [];
  for (const { header, index } of dateHeaders) {
    const date = parseDateValue(header, dayFirst);
    if (date) {
      dateColumns.push({ header, index, date });
    } else {
      logger.warn({ header }, 'Ignoring date-like column that is not a calendar date');
    }
  }

  const pending: PendingRow[] = [];
  const rejected: RejectedRow[] = [];

  for (const record of table.rows) {
    const cell = (index: number | null) => (index === null ? '' : record.fields[index] ?? '');

    const base = displayName(cell(itemCol));
    const variation = displayName(cell(columns.variation));
    const name = base && variation ? `${base} - ${variation}` : base || variation;
    if (!name) {
      rejected.push({ row: record.rowNumber, reason: 'missing item name' });
      continue;
    }

    for (const column of dateColumns) {
      const raw = cell(column.index);
      if (!raw) continue;
      const quantity = parseNumberCell(raw);
      if (quantity === null) {
        rejected.push({
          row: record.rowNumber,
          reason: `non-numeric quantity in column "${column.header}"`,
          value: raw,
        });
        continue;
      }
      if (quantity <= 0) continue;
      pending.push({ date: column.date, itemNameRaw: name, quantity, row: record.rowNumber });
    }
  }

  return { layout: 'wide', columns, rows: aggregateRows(pending), rejected };
}
