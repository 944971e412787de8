/**
 * Item store - canonical items and their aliases.
 *
 * Aliases are only ever written by an explicit mapping (a configured rule or
 * an operator's `addAlias`); the store never merges two items.
 */

import type { Database, SqlRow } from './index';
import { rowNumber, rowString } from './index';
import type { Item } from '../types';
import { displayName, normalizeName } from '../catalog/text';
import { InvalidInputError } from '../infra/errors';

export interface ItemStore {
  list(options?: { activeOnly?: boolean }): Item[];
  get(itemId: number): Item | null;
  /** Match a normalized name against canonical names first, then aliases. */
  findByName(name: string): Item | null;
  create(canonicalName: string): Item;
  addAlias(itemId: number, alias: string): Item;
  setActive(itemId: number, active: boolean): Item;
}

export function createItemStore(db: Database): ItemStore {
  function aliasesOf(itemId: number): string[] {
    return db
      .query('SELECT alias FROM item_aliases WHERE item_id = ? ORDER BY created_at, alias', [itemId])
      .map((row) => rowString(row, 'alias'));
  }

  function toItem(row: SqlRow): Item {
    const itemId = rowNumber(row, 'id');
    return {
      itemId,
      canonicalName: rowString(row, 'canonical_name'),
      aliases: aliasesOf(itemId),
      active: rowNumber(row, 'active') === 1,
      createdAt: new Date(rowNumber(row, 'created_at')),
    };
  }

  function requireItem(itemId: number): Item {
    const item = store.get(itemId);
    if (!item) throw new InvalidInputError(`Unknown item id ${itemId}`);
    return item;
  }

  const store: ItemStore = {
    list(options = {}) {
      const rows = options.activeOnly
        ? db.query('SELECT * FROM items WHERE active = 1 ORDER BY canonical_name COLLATE NOCASE, id')
        : db.query('SELECT * FROM items ORDER BY canonical_name COLLATE NOCASE, id');
      return rows.map(toItem);
    },

    get(itemId) {
      const rows = db.query('SELECT * FROM items WHERE id = ?', [itemId]);
      return rows.length > 0 ? toItem(rows[0]) : null;
    },

    findByName(name) {
      const normalized = normalizeName(name);
      if (!normalized) return null;

      const direct = db.query('SELECT * FROM items WHERE normalized_name = ?', [normalized]);
      if (direct.length > 0) return toItem(direct[0]);

      const viaAlias = db.query(
        `SELECT items.* FROM item_aliases
         JOIN items ON items.id = item_aliases.item_id
         WHERE item_aliases.normalized_alias = ?`,
        [normalized],
      );
      return viaAlias.length > 0 ? toItem(viaAlias[0]) : null;
    },

    create(canonicalName) {
      const name = displayName(canonicalName);
      const normalized = normalizeName(name);
      if (!normalized) throw new InvalidInputError('Item name must not be empty');

      db.run(
        'INSERT INTO items (canonical_name, normalized_name, active, created_at) VALUES (?, ?, 1, ?)',
        [name, normalized, Date.now()],
      );
      return requireItem(db.lastInsertId());
    },

    addAlias(itemId, alias) {
      const item = requireItem(itemId);
      const name = displayName(alias);
      const normalized = normalizeName(name);
      if (!normalized) throw new InvalidInputError('Alias must not be empty');
      if (normalized === normalizeName(item.canonicalName)) return item;

      const owner = db.query('SELECT id, canonical_name FROM items WHERE normalized_name = ?', [normalized]);
      if (owner.length > 0) {
        throw new InvalidInputError(
          `"${name}" is the canonical name of item ${rowNumber(owner[0], 'id')} ` +
            `("${rowString(owner[0], 'canonical_name')}"); items are never merged through an alias`,
        );
      }

      db.run(
        `INSERT INTO item_aliases (normalized_alias, alias, item_id, created_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(normalized_alias) DO UPDATE SET alias = excluded.alias, item_id = excluded.item_id`,
        [normalized, name, itemId, Date.now()],
      );
      return requireItem(itemId);
    },

    setActive(itemId, active) {
      requireItem(itemId);
      db.run('UPDATE items SET active = ? WHERE id = ?', [active ? 1 : 0, itemId]);
      return requireItem(itemId);
    },
  };

  return store;
}
