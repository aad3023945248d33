/**
 * Sale Matcher - bind an incoming sale to an inventory item
 *
 * Strategies, in strict priority order:
 *   1. external listing id
 *   2. custom SKU
 *   3. internal SKU (candidate sku, or its custom SKU when it has no sku)
 *   4. case-insensitive exact title
 *   5. fuzzy title similarity >= threshold, over active items and items
 *      ended within the recently-ended window
 *
 * Strategies 1-4 prefer active items, then the most recently updated.
 * Fuzzy matches take the highest score, ties going to the most recently updated.
 */

import { createLogger } from '../utils/logger';
import { err, ok, type Result } from '../utils/result';
import type { Database } from '../db/index';
import type { Item, MatchMethod, Sale } from '../types';
import { findItemsByListingId, getItem, parseItemRow } from '../inventory/items';
import { getSale, listOrphanedSales, updateSale } from '../inventory/sales';
import { titleSimilarity } from './similarity';

const logger = createLogger('sale-matcher');

const DAY_MS = 24 * 60 * 60 * 1000;
const SCORE_EPSILON = 1e-9;

export interface MatchCandidate {
  listingId: string | null;
  sku: string | null;
  customSku: string | null;
  title: string | null;
}

export interface MatchResult {
  item: Item;
  method: MatchMethod;
  /** Similarity score, fuzzy matches only. */
  score?: number;
}

export interface MatcherOptions {
  fuzzyThreshold: number;
  recentlyEndedDays: number;
}

function firstItem(db: Database, sql: string, params: string[]): Item | null {
  const row = db.get(`${sql} ORDER BY active DESC, updated_at DESC, id DESC LIMIT 1`, params);
  return row ? parseItemRow(row) : null;
}

function fuzzyMatch(db: Database, userId: string, title: string, options: MatcherOptions, now: number): MatchResult | null {
  const endedCutoff = now - options.recentlyEndedDays * DAY_MS;
  const pool = db
    .query('SELECT * FROM items WHERE user_id = ? AND (active = 1 OR ended_at >= ?)', [userId, endedCutoff])
    .map(parseItemRow);

  let best: { item: Item; score: number } | null = null;
  for (const item of pool) {
    const score = titleSimilarity(title, item.title);
    if (score + SCORE_EPSILON < options.fuzzyThreshold) continue;
    if (
      !best ||
      score > best.score + SCORE_EPSILON ||
      (Math.abs(score - best.score) <= SCORE_EPSILON && item.updatedAt > best.item.updatedAt)
    ) {
      best = { item, score };
    }
  }
  return best ? { item: best.item, method: 'fuzzy_title', score: best.score } : null;
}

export function matchSale(
  db: Database,
  userId: string,
  candidate: MatchCandidate,
  options: MatcherOptions,
  now: number,
): MatchResult | null {
  if (candidate.listingId) {
    const item = findItemsByListingId(db, userId, candidate.listingId)[0];
    if (item) return { item, method: 'listing_id' };
  }

  if (candidate.customSku) {
    const item = firstItem(db, 'SELECT * FROM items WHERE user_id = ? AND custom_sku = ?', [userId, candidate.customSku]);
    if (item) return { item, method: 'custom_sku' };
  }

  const internalSku = candidate.sku ?? candidate.customSku;
  if (internalSku) {
    const item = firstItem(db, 'SELECT * FROM items WHERE user_id = ? AND sku = ?', [userId, internalSku]);
    if (item) return { item, method: 'sku' };
  }

  const title = candidate.title?.trim();
  if (title) {
    const item = firstItem(db, 'SELECT * FROM items WHERE user_id = ? AND lower(title) = lower(?)', [userId, title]);
    if (item) return { item, method: 'title' };

    return fuzzyMatch(db, userId, title, options, now);
  }

  return null;
}

export interface RematchSummary {
  examined: number;
  matched: number;
}

function bindSale(db: Database, sale: Sale, item: Item, method: MatchMethod, now: number): void {
  updateSale(
    db,
    sale.id,
    {
      itemId: item.id,
      matchMethod: method,
      cost: sale.cost ?? item.costBasis ?? undefined,
    },
    now,
  );
}

/**
 * Re-run matching for sales with no item or a deleted one. Sales already
 * bound to an existing item are left alone, so repeated runs are no-ops.
 */
export function rematchSales(db: Database, userId: string, options: MatcherOptions, now: number): RematchSummary {
  const orphans = listOrphanedSales(db, userId, 10_000);
  let matched = 0;
  for (const sale of orphans) {
    const result = matchSale(db, userId, sale, options, now);
    if (!result) continue;
    bindSale(db, sale, result.item, result.method, now);
    matched++;
  }
  logger.info({ userId, examined: orphans.length, matched }, 'Rematch complete');
  return { examined: orphans.length, matched };
}

export type ResolveFailure = 'sale_not_found' | 'item_not_found';

/** Bind a sale to an item chosen by the user. */
export function resolveSale(
  db: Database,
  userId: string,
  saleId: string,
  itemId: string,
  now: number,
): Result<Sale, ResolveFailure> {
  const sale = getSale(db, userId, saleId);
  if (!sale) return err('sale_not_found');
  const item = getItem(db, userId, itemId);
  if (!item) return err('item_not_found');

  bindSale(db, sale, item, 'manual', now);
  logger.info({ userId, saleId, itemId }, 'Sale resolved manually');
  const updated = getSale(db, userId, saleId);
  return updated ? ok(updated) : err('sale_not_found');
}
