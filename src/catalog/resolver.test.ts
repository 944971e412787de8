import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase } from '../db/index';
import { createItemStore, type ItemStore } from '../db/item-store';
import { createItemResolver } from './resolver';
import { normalizeName, tokenSimilarity } from './text';
import { InvalidInputError, ResolutionAmbiguityError } from '../infra/errors';

describe('text helpers', () => {
  it('normalizes case, punctuation and whitespace', () => {
    expect(normalizeName('  Croissant -  ALMOND ')).toBe('croissant almond');
  });

  it('scores the longest common token run against the longer name', () => {
    expect(tokenSimilarity('Almond Croissants', 'almond croissant')).toBe(1);
    expect(tokenSimilarity('Almond Croissant Tray', 'Almond Croissant')).toBeCloseTo(2 / 3, 10);
    expect(tokenSimilarity('Bun', '')).toBe(0);
  });
});

describe('createItemResolver', () => {
  let items: ItemStore;

  beforeEach(async () => {
    const db = await openDatabase({ file: null });
    items = createItemStore(db);
  });

  const resolverFor = (rules: Array<{ pattern: string; canonical: string }> = []) =>
    createItemResolver(items, { similarityThreshold: 0.75, rules });

  it('matches canonical names and aliases exactly, ignoring case and spacing', () => {
    const loaf = items.create('Sourdough Loaf');
    items.addAlias(loaf.itemId, 'SD Loaf');
    const resolver = resolverFor();

    expect(resolver.resolve('sourdough   LOAF')).toEqual({
      itemId: loaf.itemId,
      canonicalName: 'Sourdough Loaf',
      method: 'exact',
      score: 1,
    });
    expect(resolver.resolve('sd loaf').itemId).toBe(loaf.itemId);
  });

  it('applies canonicalization rules and records the raw name as an alias', () => {
    const resolver = resolverFor([{ pattern: '^choc(olate)? chip', canonical: 'Chocolate Chip Cookie' }]);

    const first = resolver.resolve('Choc Chip Cookie Large');
    expect(first.method).toBe('rule');
    expect(first.canonicalName).toBe('Chocolate Chip Cookie');
    expect(items.get(first.itemId)?.aliases).toEqual(['Choc Chip Cookie Large']);

    // Second sighting is an exact alias hit
    expect(resolver.resolve('choc chip cookie large').method).toBe('exact');
  });

  it('fuzzy-matches above the threshold without storing an alias', () => {
    const croissant = items.create('Almond Croissant');
    const match = resolverFor().resolve('Almond Croissants');

    expect(match).toEqual({ itemId: croissant.itemId, canonicalName: 'Almond Croissant', method: 'fuzzy', score: 1 });
    expect(items.get(croissant.itemId)?.aliases).toEqual([]);
  });

  it('creates a new item when nothing clears the threshold', () => {
    const croissant = items.create('Almond Croissant');
    const created = resolverFor().resolve('Almond Croissant Tray');

    expect(created.method).toBe('created');
    expect(created.itemId).not.toBe(croissant.itemId);
    expect(items.list().map((i) => i.canonicalName)).toEqual(['Almond Croissant', 'Almond Croissant Tray']);
  });

  it('raises ResolutionAmbiguityError on a tie between items', () => {
    items.create('Rye Bread Small');
    items.create('Rye Bread Large');

    expect(() => resolverFor().resolve('Rye Bread Small Large')).toThrow(ResolutionAmbiguityError);
    expect(items.list()).toHaveLength(2);
  });

  it('refuses an alias that is another item\'s canonical name', () => {
    const rye = items.create('Rye Bread');
    items.create('Rye Loaf');
    expect(() => items.addAlias(rye.itemId, 'rye loaf')).toThrow(InvalidInputError);
  });

  it('rejects an invalid rule pattern up front', () => {
    expect(() => resolverFor([{ pattern: '(', canonical: 'Bun' }])).toThrow(InvalidInputError);
  });
});
