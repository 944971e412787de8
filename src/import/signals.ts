/**
 * Weather and holiday/event CSV import for the local signal feeds.
 *
 * weather: date, max_temp, rain_mm
 * events:  date, event_name, event_type, uplift_pct[, weight]
 */

import type { AdjustmentSignal, WeatherReading } from '../types';
import type { PlannerConfig } from '../utils/config';
import { parseDateValue } from '../utils/dates';
import { InvalidInputError } from '../infra/errors';
import { parseCsvTable, parseNumberCell } from './csv-parser';
import { normalizeHeader } from './normalizer';
import type { CsvRecord, RejectedRow } from './types';

export interface SignalImport<T> {
  records: T[];
  rejected: RejectedRow[];
}

function columnIndex(headers: string[], names: string[]): number | null {
  const normalized = headers.map(normalizeHeader);
  for (const name of names) {
    const idx = normalized.indexOf(normalizeHeader(name));
    if (idx >= 0) return idx;
  }
  return null;
}

function requireColumns(kind: string, headers: string[], wanted: Record<string, number | null>): void {
  const missing = Object.entries(wanted)
    .filter(([, idx]) => idx === null)
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new InvalidInputError(`${kind} file is missing column(s): ${missing.join(', ')}`);
  }
}

function cellOf(record: CsvRecord, index: number | null): string {
  return index === null ? '' : record.fields[index] ?? '';
}

export function parseWeatherCsv(
  content: string,
  config: PlannerConfig,
  source = 'import',
  recordedAt: Date = new Date(),
): SignalImport<WeatherReading> {
  const table = parseCsvTable(content);
  const dateCol = columnIndex(table.headers, ['date']);
  const tempCol = columnIndex(table.headers, ['max_temp', 'max temp', 'temperature', 'temp']);
  const rainCol = columnIndex(table.headers, ['rain_mm', 'rain', 'precipitation', 'precip_mm']);
  requireColumns('Weather', table.headers, { date: dateCol, max_temp: tempCol, rain_mm: rainCol });

  const records: WeatherReading[] = [];
  const rejected: RejectedRow[] = [];
  for (const record of table.rows) {
    const dateRaw = cellOf(record, dateCol);
    const date = parseDateValue(dateRaw, config.import.dayFirst);
    if (!date) {
      rejected.push({ row: record.rowNumber, reason: 'unparseable date', value: dateRaw });
      continue;
    }
    const tempRaw = cellOf(record, tempCol);
    const rainRaw = cellOf(record, rainCol);
    const maxTemp = tempRaw ? parseNumberCell(tempRaw) : null;
    const precipitation = rainRaw ? parseNumberCell(rainRaw) : null;
    if ((tempRaw && maxTemp === null) || (rainRaw && precipitation === null)) {
      rejected.push({ row: record.rowNumber, reason: 'non-numeric weather value', value: `${tempRaw}/${rainRaw}` });
      continue;
    }
    records.push({ date, location: config.location, maxTemp, precipitation, source, recordedAt });
  }
  return { records, rejected };
}

export function parseEventsCsv(content: string, config: PlannerConfig): SignalImport<AdjustmentSignal> {
  const table = parseCsvTable(content);
  const dateCol = columnIndex(table.headers, ['date']);
  const nameCol = columnIndex(table.headers, ['event_name', 'name', 'event', 'holiday']);
  const typeCol = columnIndex(table.headers, ['event_type', 'type', 'kind']);
  const upliftCol = columnIndex(table.headers, ['uplift_pct', 'uplift', 'uplift %']);
  const weightCol = columnIndex(table.headers, ['weight', 'confidence']);
  requireColumns('Events', table.headers, { date: dateCol, event_name: nameCol });

  const records: AdjustmentSignal[] = [];
  const rejected: RejectedRow[] = [];
  for (const record of table.rows) {
    const dateRaw = cellOf(record, dateCol);
    const date = parseDateValue(dateRaw, config.import.dayFirst);
    if (!date) {
      rejected.push({ row: record.rowNumber, reason: 'unparseable date', value: dateRaw });
      continue;
    }
    const name = cellOf(record, nameCol).trim();
    if (!name) {
      rejected.push({ row: record.rowNumber, reason: 'missing event name' });
      continue;
    }

    const type = normalizeHeader(cellOf(record, typeCol));
    const kind = type === 'public holiday' || type === 'holiday' ? 'holiday' : 'event';

    const upliftRaw = cellOf(record, upliftCol);
    const uplift = upliftRaw ? parseNumberCell(upliftRaw.replace(/%$/, '')) : null;
    if (upliftRaw && uplift === null) {
      rejected.push({ row: record.rowNumber, reason: 'non-numeric uplift', value: upliftRaw });
      continue;
    }
    if (uplift !== null && uplift <= -100) {
      rejected.push({ row: record.rowNumber, reason: 'uplift must be above -100%', value: upliftRaw });
      continue;
    }
    const upliftPct = uplift ?? (kind === 'holiday' ? config.adjustments.defaultHolidayUpliftPct : 0);

    const weightRaw = cellOf(record, weightCol);
    const weight = weightRaw ? parseNumberCell(weightRaw) : 1;
    if (weight === null || weight < 0 || weight > 1) {
      rejected.push({ row: record.rowNumber, reason: 'weight must be between 0 and 1', value: weightRaw });
      continue;
    }

    records.push({ date, kind, name, multiplier: 1 + upliftPct / 100, weight });
  }
  return { records, rejected };
}
