/**
 * Sales export import types
 */

export type Delimiter = 'auto' | 'comma' | 'tab' | 'pipe';

export interface CsvRecord {
  /** 1-based row number in the file, header excluded */
  rowNumber: number;
  fields: string[];
}

export interface CsvTable {
  headers: string[];
  rows: CsvRecord[];
  delimiter: string;
}

/** Semantic columns the Normalizer looks for. */
export type SemanticColumn = 'date' | 'item' | 'quantity' | 'variation' | 'eventType';

export type HeaderSynonyms = Record<SemanticColumn, string[]>;

export interface ResolvedColumns {
  date: number | null;
  item: number | null;
  quantity: number | null;
  variation: number | null;
  eventType: number | null;
}

export interface TidyRow {
  date: string;
  itemNameRaw: string;
  /** Net quantity; negative when refunds outweigh sales */
  quantity: number;
  isRefund: boolean;
  /** File row numbers summed into this row */
  sourceRows: number[];
}

export interface RejectedRow {
  row: number;
  reason: string;
  value?: string;
}

export interface NormalizeResult {
  layout: 'long' | 'wide';
  columns: ResolvedColumns;
  rows: TidyRow[];
  rejected: RejectedRow[];
}

export interface FuzzyMatch {
  rawName: string;
  itemId: number;
  canonicalName: string;
  score: number;
}

export interface IngestResult {
  /** null when nothing was committed */
  batchId: number | null;
  /** Canonical records written */
  accepted: number;
  rejectedRows: RejectedRow[];
  /** Non-fatal problems worth showing to the operator */
  errors: string[];
  itemsCreated: Array<{ itemId: number; canonicalName: string }>;
  fuzzyMatches: FuzzyMatch[];
  /** Earlier batch with byte-identical content, if any */
  duplicateOfBatch: number | null;
  dateRange: { from: string; to: string } | null;
}
