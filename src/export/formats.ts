/**
 * Export Formats - CSV and Excel XML
 *
 * Pure TypeScript, no external dependencies.
 */

import type { CSVOptions, ExcelSheet, SheetCell } from './types';

// =============================================================================
// CSV GENERATION
// =============================================================================

/**
 * Generate a CSV string from headers and rows.
 */
export function generateCSV(
  headers: string[],
  rows: Array<Array<string | number | boolean | null | undefined>>,
  options: CSVOptions = {},
): string {
  const delimiter = options.delimiter ?? ',';
  const quoteChar = options.quoteChar ?? '"';
  const includeHeader = options.includeHeader ?? true;

  function escapeField(value: string | number | boolean | null | undefined): string {
    if (value === null || value === undefined) {
      return '';
    }

    const str = String(value);

    // Quote if contains delimiter, quote char, or newline
    if (
      str.includes(delimiter) ||
      str.includes(quoteChar) ||
      str.includes('\n') ||
      str.includes('\r')
    ) {
      return `${quoteChar}${str.split(quoteChar).join(quoteChar + quoteChar)}${quoteChar}`;
    }

    return str;
  }

  const lines: string[] = [];

  if (includeHeader) {
    lines.push(headers.map(escapeField).join(delimiter));
  }

  for (const row of rows) {
    lines.push(row.map(escapeField).join(delimiter));
  }

  return lines.join('\n');
}

// =============================================================================
// EXCEL XML (SpreadsheetML)
// =============================================================================

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Generate a SpreadsheetML workbook that Excel and LibreOffice open directly.
 * Numbers are typed as Number cells; everything else is a String cell.
 */
export function generateExcelXML(sheets: ExcelSheet[]): string {
  function cell(value: SheetCell): string {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return `<Cell><Data ss:Type="Number">${value}</Data></Cell>`;
    }
    const text = value === null || typeof value === 'number' ? '' : escapeXml(value);
    return `<Cell><Data ss:Type="String">${text}</Data></Cell>`;
  }

  const out: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<?mso-application progid="Excel.Sheet"?>',
    '<Workbook xmlns="urn:schemas-microsoft-com:office:spreadsheet"',
    '  xmlns:ss="urn:schemas-microsoft-com:office:spreadsheet">',
    '  <Styles>',
    '    <Style ss:ID="Default" ss:Name="Normal"/>',
    '    <Style ss:ID="Header">',
    '      <Font ss:Bold="1"/>',
    '    </Style>',
    '  </Styles>',
  ];

  for (const sheet of sheets) {
    // Excel caps sheet names at 31 characters
    out.push(`  <Worksheet ss:Name="${escapeXml(sheet.name.substring(0, 31))}">`);
    out.push('    <Table>');
    out.push(
      '      <Row>' +
        sheet.headers
          .map((h) => `<Cell ss:StyleID="Header"><Data ss:Type="String">${escapeXml(h)}</Data></Cell>`)
          .join('') +
        '</Row>',
    );
    for (const row of sheet.rows) {
      out.push('      <Row>' + row.map(cell).join('') + '</Row>');
    }
    out.push('    </Table>');
    out.push('  </Worksheet>');
  }

  out.push('</Workbook>');
  return out.join('\n') + '\n';
}
