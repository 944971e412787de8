import { describe, it, expect } from 'vitest';
import { parseCsvTable } from './csv-parser';
import { normalizeExport, resolveColumns } from './normalizer';
import { SchemaError } from '../infra/errors';

const LONG_EXPORT = [
  'Business Date,Item Name,Qty,Event Type',
  '04/03/2024,Sourdough Loaf,10,Payment',
  '04/03/2024,Sourdough Loaf,5,Payment',
  '04/03/2024,Sourdough Loaf,2,Refund',
  '05/03/2024,Baguette,-3,',
  'xx,Baguette,1,Payment',
  '05/03/2024,,1,Payment',
  '05/03/2024,Baguette,lots,Payment',
].join('\n');

describe('resolveColumns', () => {
  it('maps synonyms to semantic columns', () => {
    expect(resolveColumns(['Business Date', 'Item Name', 'Qty', 'Event Type'])).toEqual({
      date: 0,
      item: 1,
      quantity: 2,
      variation: null,
      eventType: 3,
    });
  });

  it('consults configured synonyms', () => {
    const columns = resolveColumns(['Date', 'Item', 'How many'], { quantity: ['How Many'] });
    expect(columns.quantity).toBe(2);
  });
});

describe('normalizeExport (long layout)', () => {
  it('sums duplicates, flips refunds and reports bad rows', () => {
    const result = normalizeExport(parseCsvTable(LONG_EXPORT));

    expect(result.layout).toBe('long');
    expect(result.rows).toEqual([
      { date: '2024-03-04', itemNameRaw: 'Sourdough Loaf', quantity: 13, isRefund: false, sourceRows: [1, 2, 3] },
      { date: '2024-03-05', itemNameRaw: 'Baguette', quantity: -3, isRefund: true, sourceRows: [4] },
    ]);
    expect(result.rejected).toEqual([
      { row: 5, reason: 'unparseable date', value: 'xx' },
      { row: 6, reason: 'missing item name' },
      { row: 7, reason: 'non-numeric quantity', value: 'lots' },
    ]);
  });

  it('forces refunds negative and leaves negative values unchanged', () => {
    const csv = ['Date,Item,Quantity,Type', '2024-03-04,Bun,4,refund', '2024-03-05,Bun,-4,Refund'].join('\n');
    const rows = normalizeExport(parseCsvTable(csv)).rows;
    expect(rows.map((r) => r.quantity)).toEqual([-4, -4]);
  });

  it('gives the same totals whatever the row order', () => {
    const [header, ...rows] = LONG_EXPORT.split('\n');
    const reversed = [header, ...rows.reverse()].join('\n');
    const totals = (csv: string) =>
      normalizeExport(parseCsvTable(csv)).rows.map((r) => [r.date, r.itemNameRaw, r.quantity]);
    expect(totals(reversed)).toEqual(totals(LONG_EXPORT));
  });

  it('throws SchemaError naming the unresolved columns', () => {
    const table = parseCsvTable('When,What,How many\n2024-03-04,Bun,1');
    try {
      normalizeExport(table);
      expect.fail('expected SchemaError');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.missing).toEqual(['date', 'item', 'quantity']);
        expect(error.code).toBe('SCHEMA');
      }
    }
  });

  it('throws SchemaError for an empty export', () => {
    expect(() => normalizeExport(parseCsvTable(''))).toThrow(SchemaError);
  });
});

describe('normalizeExport (wide layout)', () => {
  const WIDE_EXPORT = [
    'Item Name,Item Variation,04/03/2024,05/03/2024,06/03/2024,07/03/2024,08/03/2024',
    'Croissant,Almond,3,,0,2,x',
    'Baguette,,1,1,1,1,1',
  ].join('\n');

  it('unpivots date columns, drops blank and zero cells and appends the variation', () => {
    const result = normalizeExport(parseCsvTable(WIDE_EXPORT));

    expect(result.layout).toBe('wide');
    expect(result.rows.map((r) => [r.date, r.itemNameRaw, r.quantity])).toEqual([
      ['2024-03-04', 'Baguette', 1],
      ['2024-03-04', 'Croissant - Almond', 3],
      ['2024-03-05', 'Baguette', 1],
      ['2024-03-06', 'Baguette', 1],
      ['2024-03-07', 'Baguette', 1],
      ['2024-03-07', 'Croissant - Almond', 2],
      ['2024-03-08', 'Baguette', 1],
    ]);
    expect(result.rejected).toEqual([
      { row: 1, reason: 'non-numeric quantity in column "08/03/2024"', value: 'x' },
    ]);
  });

  it('reads the file as long when there are fewer date columns than configured', () => {
    expect(() => normalizeExport(parseCsvTable(WIDE_EXPORT), { wideMinDateColumns: 6 })).toThrow(SchemaError);
  });
});
