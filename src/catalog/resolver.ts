/**
 * Item Resolver - raw item-name strings → stable item ids.
 *
 * Order of matching:
 * 1. exact (case/whitespace/punctuation-insensitive) against canonical names and aliases
 * 2. configured canonicalization rules (the raw name becomes an explicit alias)
 * 3. fuzzy token match above the similarity threshold (not stored as an alias)
 * 4. otherwise a new item named after the raw string
 *
 * Equal best fuzzy scores for different items raise ResolutionAmbiguityError.
 */

import type { ItemStore } from '../db/item-store';
import type { Item } from '../types';
import { InvalidInputError, ResolutionAmbiguityError } from '../infra/errors';
import { normalizeName, tokenSimilarity } from './text';
import { createLogger } from '../utils/logger';

const logger = createLogger('resolver');

export type ResolutionMethod = 'exact' | 'rule' | 'fuzzy' | 'created';

export interface Resolution {
  itemId: number;
  canonicalName: string;
  method: ResolutionMethod;
  /** Similarity for fuzzy matches, 1 otherwise */
  score: number;
}

export interface CanonicalRule {
  pattern: string;
  canonical: string;
}

export interface ResolverOptions {
  similarityThreshold: number;
  rules: CanonicalRule[];
}

export interface ItemResolver {
  resolve(rawName: string): Resolution;
}

const SCORE_EPSILON = 1e-9;

function compileRules(rules: CanonicalRule[]): Array<{ regex: RegExp; canonical: string }> {
  return rules.map((rule) => {
    try {
      return { regex: new RegExp(rule.pattern, 'i'), canonical: rule.canonical };
    } catch (error) {
      throw new InvalidInputError(`Invalid resolver rule pattern "${rule.pattern}": ${String(error)}`);
    }
  });
}

export function createItemResolver(items: ItemStore, options: ResolverOptions): ItemResolver {
  const rules = compileRules(options.rules);

  function bestScore(rawName: string, item: Item): number {
    let best = tokenSimilarity(rawName, item.canonicalName);
    for (const alias of item.aliases) {
      best = Math.max(best, tokenSimilarity(rawName, alias));
    }
    return best;
  }

  function fuzzy(rawName: string): Resolution | null {
    let top = 0;
    let matches: Item[] = [];
    for (const item of items.list()) {
      const score = bestScore(rawName, item);
      if (score < options.similarityThreshold) continue;
      if (score > top + SCORE_EPSILON) {
        top = score;
        matches = [item];
      } else if (Math.abs(score - top) <= SCORE_EPSILON) {
        matches.push(item);
      }
    }

    if (matches.length === 0) return null;
    if (matches.length > 1) {
      throw new ResolutionAmbiguityError(
        rawName,
        matches.map((m) => ({ itemId: m.itemId, canonicalName: m.canonicalName })),
      );
    }
    return { itemId: matches[0].itemId, canonicalName: matches[0].canonicalName, method: 'fuzzy', score: top };
  }

  return {
    resolve(rawName) {
      if (!normalizeName(rawName)) {
        throw new InvalidInputError('Item name must not be empty');
      }

      const exact = items.findByName(rawName);
      if (exact) {
        return { itemId: exact.itemId, canonicalName: exact.canonicalName, method: 'exact', score: 1 };
      }

      for (const rule of rules) {
        if (!rule.regex.test(rawName)) continue;
        const target = items.findByName(rule.canonical) ?? items.create(rule.canonical);
        const item = items.addAlias(target.itemId, rawName);
        logger.debug({ rawName, itemId: item.itemId, canonical: item.canonicalName }, 'Rule match');
        return { itemId: item.itemId, canonicalName: item.canonicalName, method: 'rule', score: 1 };
      }

      const match = fuzzy(rawName);
      if (match) {
        logger.info({ rawName, itemId: match.itemId, score: match.score }, 'Fuzzy item match');
        return match;
      }

      const created = items.create(rawName);
      logger.info({ itemId: created.itemId, name: created.canonicalName }, 'New item');
      return { itemId: created.itemId, canonicalName: created.canonicalName, method: 'created', score: 1 };
    },
  };
}
