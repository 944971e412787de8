/**
 * CSV Parser - split CSV/TSV/pipe-delimited exports into header + records
 *
 * Handles:
 * - Auto-detection of delimiter (comma, tab, pipe)
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters, newlines and escaped quotes ("")
 *
 * Column meaning is decided later by the Normalizer.
 */

import { createLogger } from '../utils/logger';
import type { CsvRecord, CsvTable, Delimiter } from './types';

const logger = createLogger('csv-parser');

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  tab: '\t',
  pipe: '|',
};

/**
 * Auto-detect delimiter by counting occurrences in the first few lines.
 * Prefers comma > tab > pipe if counts are equal.
 */
export function detectDelimiter(text: string): string {
  const sampleLines = text.split(/\r?\n/).slice(0, 10).filter(Boolean);
  if (sampleLines.length === 0) return ',';

  const candidates = [',', '\t', '|'];
  let bestDelimiter = ',';
  let bestScore = -1;

  for (const delim of candidates) {
    const counts = sampleLines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') {
          inQuotes = !inQuotes;
        } else if (ch === delim && !inQuotes) {
          count++;
        }
      }
      return count;
    });

    const uniqueCounts = new Set(counts);
    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;

    // Score: higher average count + bonus for consistency
    const consistencyBonus = uniqueCounts.size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

// ---------------------------------------------------------------------------
// Record splitter (handles quoted fields)
// ---------------------------------------------------------------------------

/**
 * Split the whole text into records of fields. A newline inside quotes stays
 * part of the field.
 */
function parseRecords(data: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < data.length) {
    const ch = data[i];

    if (inQuotes) {
      if (ch === '"') {
        if (data[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
      continue;
    }

    if (ch === '"' && current.trim().length === 0) {
      current = '';
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(current.trim());
      current = '';
    } else if (ch === '\n') {
      fields.push(current.trim());
      records.push(fields);
      fields = [];
      current = '';
    } else {
      current += ch;
    }
    i++;
  }

  if (current.length > 0 || fields.length > 0) {
    fields.push(current.trim());
    records.push(fields);
  }

  return records;
}

// ---------------------------------------------------------------------------
// Main parse function
// ---------------------------------------------------------------------------

export interface ParseOptions {
  delimiter?: Delimiter;
}

/**
 * Parse CSV text into a header row and data records. Blank lines are skipped
 * but still counted, so row numbers match what a spreadsheet shows minus one.
 */
export function parseCsvTable(csvData: string, options: ParseOptions = {}): CsvTable {
  const { delimiter: delimiterOption = 'auto' } = options;

  // Strip UTF-8 BOM
  let data = csvData;
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }

  // Normalize line endings
  data = data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  const delimiter = delimiterOption === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[delimiterOption];

  const records = parseRecords(data, delimiter);
  const isBlank = (fields: string[]) => fields.every((f) => f.length === 0);

  const headerIndex = records.findIndex((fields) => !isBlank(fields));
  if (headerIndex === -1) {
    return { headers: [], rows: [], delimiter };
  }

  const headers = records[headerIndex];
  const rows: CsvRecord[] = [];
  for (let i = headerIndex + 1; i < records.length; i++) {
    if (isBlank(records[i])) continue;
    rows.push({ rowNumber: i - headerIndex, fields: records[i] });
  }

  logger.debug(
    { delimiter: delimiter === '\t' ? 'tab' : delimiter, columns: headers.length, rows: rows.length },
    'Parsed CSV',
  );

  return { headers, rows, delimiter };
}

/**
 * Parse a numeric cell: strips thousands separators, currency symbols and
 * spaces. Returns null for anything that is not a finite number.
 */
export function parseNumberCell(raw: string): number | null {
  const cleaned = raw.replace(/[,\s$£€]/g, '');
  if (!cleaned || !/^[-+]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}
