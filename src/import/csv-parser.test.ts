import { describe, it, expect } from 'vitest';
import { detectDelimiter, parseCsvTable, parseNumberCell } from './csv-parser';

describe('parseCsvTable', () => {
  it('splits header and rows, stripping the BOM and CRLF', () => {
    const table = parseCsvTable('\uFEFFDate,Item,Qty\r\n2024-03-04,Sourdough Loaf,12\r\n');
    expect(table.headers).toEqual(['Date', 'Item', 'Qty']);
    expect(table.rows).toEqual([{ rowNumber: 1, fields: ['2024-03-04', 'Sourdough Loaf', '12'] }]);
  });

  it('keeps delimiters, escaped quotes and newlines inside quoted fields', () => {
    const table = parseCsvTable('Item,Note\n"Roll, seeded","say ""hi""\nthere"\n');
    expect(table.rows[0].fields).toEqual(['Roll, seeded', 'say "hi"\nthere']);
  });

  it('skips blank lines but keeps file row numbers', () => {
    const table = parseCsvTable('Item,Qty\nA,1\n\nB,2\n');
    expect(table.rows.map((r) => r.rowNumber)).toEqual([1, 3]);
  });

  it('returns no headers for an empty file', () => {
    expect(parseCsvTable('\n\n').headers).toEqual([]);
  });

  it('auto-detects tab and pipe delimiters', () => {
    expect(detectDelimiter('a\tb\tc\n1\t2\t3')).toBe('\t');
    expect(detectDelimiter('a|b\n1|2')).toBe('|');
    expect(parseCsvTable('Item\tQty\nBun\t4').rows[0].fields).toEqual(['Bun', '4']);
  });

  it('uses an explicit delimiter instead of sniffing', () => {
    const content = 'Item, size\tQty\nRoll, seeded\t4';
    expect(parseCsvTable(content).headers).toEqual(['Item', 'size\tQty']);

    const table = parseCsvTable(content, { delimiter: 'tab' });
    expect(table.headers).toEqual(['Item, size', 'Qty']);
    expect(table.rows[0].fields).toEqual(['Roll, seeded', '4']);
    expect(table.delimiter).toBe('\t');
  });
});

describe('parseNumberCell', () => {
  it('parses plain, signed and formatted numbers', () => {
    expect(parseNumberCell('12')).toBe(12);
    expect(parseNumberCell('-3')).toBe(-3);
    expect(parseNumberCell('1,250')).toBe(1250);
    expect(parseNumberCell('2.5')).toBe(2.5);
  });

  it('rejects non-numeric cells', () => {
    expect(parseNumberCell('')).toBeNull();
    expect(parseNumberCell('twelve')).toBeNull();
    expect(parseNumberCell('12abc')).toBeNull();
  });
});
