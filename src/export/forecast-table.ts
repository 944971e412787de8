/**
 * Forecast run → tabular artifact {item, Mon..Sat, total, alerts, note}.
 */

import type { ForecastRun } from '../types';
import { WEEKDAYS, WEEKDAY_LABELS } from '../utils/dates';
import { generateCSV, generateExcelXML } from './formats';
import type { ExportFormat, ForecastTable, ForecastTableRow } from './types';

export const FORECAST_TABLE_HEADERS = [
  'Item Name',
  'Weekly Total',
  ...WEEKDAYS.map((d) => WEEKDAY_LABELS[d]),
  'Alerts',
  'Notes',
];

export function toForecastTable(run: ForecastRun): ForecastTable {
  const rows: ForecastTableRow[] = run.lines.map((line) => {
    const alerts = run.alerts
      .filter((a) => a.itemId === line.itemId)
      .map((a) => (a.day ? `${WEEKDAY_LABELS[a.day]}: ${a.reason}` : a.reason))
      .join('; ');
    return {
      itemId: line.itemId,
      item: line.itemName,
      ...line.quantities,
      weeklyTotal: line.weeklyTotal,
      alerts,
      note: line.note,
    };
  });
  return { weekStartDate: run.weekStartDate, runId: run.runId, createdAt: run.createdAt, rows };
}

function tableCells(row: ForecastTableRow): Array<string | number> {
  return [row.item, row.weeklyTotal, ...WEEKDAYS.map((d) => row[d]), row.alerts, row.note];
}

export function forecastTableToCsv(table: ForecastTable): string {
  return generateCSV(FORECAST_TABLE_HEADERS, table.rows.map(tableCells));
}

export function forecastTableToExcelXml(table: ForecastTable): string {
  return generateExcelXML([
    { name: `Week ${table.weekStartDate}`, headers: FORECAST_TABLE_HEADERS, rows: table.rows.map(tableCells) },
  ]);
}

export function renderForecastTable(table: ForecastTable, format: ExportFormat): string {
  return format === 'csv' ? forecastTableToCsv(table) : forecastTableToExcelXml(table);
}

/** Pick a format from an output file name. */
export function formatForPath(path: string): ExportFormat {
  return /\.(xml|xls)$/i.test(path) ? 'excel_xml' : 'csv';
}
