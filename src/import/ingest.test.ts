import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase, type Database } from '../db/index';
import { createItemStore, type ItemStore } from '../db/item-store';
import { createSalesStore, type SalesStore } from '../db/sales-store';
import { resolveConfig } from '../utils/config';
import { ingestExport } from './ingest';

const ALL = { from: '2024-01-01', to: '2024-12-31' };

describe('ingestExport', () => {
  let db: Database;
  let items: ItemStore;
  let sales: SalesStore;

  beforeEach(async () => {
    db = await openDatabase({ file: null });
    items = createItemStore(db);
    sales = createSalesStore(db);
  });

  const ingest = (content: string) => ingestExport({ db, items, sales, config: resolveConfig() }, { content });

  it('holds out rows with an ambiguous name and commits the rest', () => {
    const small = items.create('Rye Bread Small');
    const large = items.create('Rye Bread Large');

    const result = ingest(
      'Date,Item,Qty\n2024-03-04,Rye Bread Small Large,5\n2024-03-04,Bun,4\n2024-03-05,Rye Bread Small Large,2',
    );

    expect(result.accepted).toBe(1);
    expect(result.rejectedRows).toEqual([
      { row: 1, reason: 'ambiguous item name', value: 'Rye Bread Small Large' },
      { row: 3, reason: 'ambiguous item name', value: 'Rye Bread Small Large' },
    ]);
    expect(result.errors).toHaveLength(1);
    expect(result.itemsCreated).toEqual([{ itemId: 3, canonicalName: 'Bun' }]);
    expect(sales.query(3, ALL).map((r) => [r.date, r.quantity])).toEqual([['2024-03-04', 4]]);
    expect(sales.query(small.itemId, ALL)).toEqual([]);
    expect(sales.query(large.itemId, ALL)).toEqual([]);
  });

  it('sums names that resolve to the same item on the same date', () => {
    const loaf = items.create('Sourdough Loaf');
    items.addAlias(loaf.itemId, 'SD Loaf');

    const result = ingest('Date,Item,Qty\n2024-03-04,Sourdough Loaf,20\n2024-03-04,SD Loaf,11');

    expect(result.accepted).toBe(1);
    expect(result.itemsCreated).toEqual([]);
    expect(sales.query(loaf.itemId, ALL)).toEqual([
      { date: '2024-03-04', itemId: loaf.itemId, quantity: 31, sourceRowRef: `${result.batchId}:1,2` },
    ]);
  });
});
