/**
 * Forecast export types
 */

import type { Weekday } from '../utils/dates';

export interface CSVOptions {
  delimiter?: string;
  quoteChar?: string;
  includeHeader?: boolean;
}

export type SheetCell = string | number | null;

export interface ExcelSheet {
  name: string;
  headers: string[];
  rows: SheetCell[][];
}

/** One row of the forecast table handed to a spreadsheet. */
export interface ForecastTableRow extends Record<Weekday, number> {
  itemId: number;
  item: string;
  weeklyTotal: number;
  /** Alert reasons for the item, "; "-joined with the day where there is one */
  alerts: string;
  note: string;
}

export interface ForecastTable {
  weekStartDate: string;
  runId: number;
  createdAt: Date;
  rows: ForecastTableRow[];
}

export type ExportFormat = 'csv' | 'excel_xml';
