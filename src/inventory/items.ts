/**
 * Inventory items - local mirror of the user's listings
 *
 * Items are deactivated, never deleted, by the sync pipeline. At most one
 * active item exists per (user, external listing id); the partial unique
 * index in the schema enforces it.
 */

import { generateId } from '../utils/id';
import type { Database, Row } from '../db/index';
import { bool, num, optNum, optOneOf, optStr, str } from '../db/rows';
import type { EndReason, Item } from '../types';

const END_REASONS: readonly EndReason[] = ['sold', 'unsold'];

export type ItemPatch = Partial<Omit<Item, 'id' | 'userId' | 'createdAt' | 'updatedAt'>>;

export interface NewItem {
  userId: string;
  externalListingId: string | null;
  title: string;
  sku?: string | null;
  customSku?: string | null;
  price?: number | null;
  costBasis?: number | null;
  quantity?: number;
  locationCode?: string | null;
  lastEventAt?: number | null;
  lastSyncedAt?: number | null;
}

const PATCH_COLUMNS: Record<keyof ItemPatch, string> = {
  externalListingId: 'external_listing_id',
  sku: 'sku',
  customSku: 'custom_sku',
  title: 'title',
  price: 'price',
  costBasis: 'cost_basis',
  quantity: 'quantity',
  active: 'active',
  locationCode: 'location_code',
  endedAt: 'ended_at',
  endReason: 'end_reason',
  soldAt: 'sold_at',
  lastEventAt: 'last_event_at',
  lastSyncedAt: 'last_synced_at',
};

const PATCH_KEYS: readonly (keyof ItemPatch)[] = [
  'externalListingId',
  'sku',
  'customSku',
  'title',
  'price',
  'costBasis',
  'quantity',
  'active',
  'locationCode',
  'endedAt',
  'endReason',
  'soldAt',
  'lastEventAt',
  'lastSyncedAt',
];

export function parseItemRow(row: Row): Item {
  return {
    id: str(row, 'id'),
    userId: str(row, 'user_id'),
    externalListingId: optStr(row, 'external_listing_id'),
    sku: optStr(row, 'sku'),
    customSku: optStr(row, 'custom_sku'),
    title: str(row, 'title'),
    price: optNum(row, 'price'),
    costBasis: optNum(row, 'cost_basis'),
    quantity: num(row, 'quantity'),
    active: bool(row, 'active'),
    locationCode: optStr(row, 'location_code'),
    endedAt: optNum(row, 'ended_at'),
    endReason: optOneOf(row, 'end_reason', END_REASONS),
    soldAt: optNum(row, 'sold_at'),
    lastEventAt: optNum(row, 'last_event_at'),
    lastSyncedAt: optNum(row, 'last_synced_at'),
    createdAt: num(row, 'created_at'),
    updatedAt: num(row, 'updated_at'),
  };
}

export function getItem(db: Database, userId: string, itemId: string): Item | null {
  const row = db.get('SELECT * FROM items WHERE id = ? AND user_id = ?', [itemId, userId]);
  return row ? parseItemRow(row) : null;
}

/** Items carrying a listing id, active first then most recently updated. */
export function findItemsByListingId(db: Database, userId: string, listingId: string): Item[] {
  return db
    .query(
      'SELECT * FROM items WHERE user_id = ? AND external_listing_id = ? ORDER BY active DESC, updated_at DESC, id DESC',
      [userId, listingId],
    )
    .map(parseItemRow);
}

export function findItemForListing(db: Database, userId: string, listingId: string): Item | null {
  return findItemsByListingId(db, userId, listingId)[0] ?? null;
}

export function createItem(db: Database, input: NewItem, now: number): Item {
  const item: Item = {
    id: generateId('itm'),
    userId: input.userId,
    externalListingId: input.externalListingId,
    sku: input.sku ?? null,
    customSku: input.customSku ?? null,
    title: input.title,
    price: input.price ?? null,
    costBasis: input.costBasis ?? null,
    quantity: input.quantity ?? 1,
    active: true,
    locationCode: input.locationCode ?? null,
    endedAt: null,
    endReason: null,
    soldAt: null,
    lastEventAt: input.lastEventAt ?? null,
    lastSyncedAt: input.lastSyncedAt ?? null,
    createdAt: now,
    updatedAt: now,
  };
  db.run(
    `INSERT INTO items (id, user_id, external_listing_id, sku, custom_sku, title, price, cost_basis, quantity, active,
       location_code, ended_at, end_reason, sold_at, last_event_at, last_synced_at, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, NULL, NULL, NULL, ?, ?, ?, ?)`,
    [
      item.id,
      item.userId,
      item.externalListingId,
      item.sku,
      item.customSku,
      item.title,
      item.price,
      item.costBasis,
      item.quantity,
      item.locationCode,
      item.lastEventAt,
      item.lastSyncedAt,
      now,
      now,
    ],
  );
  return item;
}

/** Apply a partial update; returns false when the item does not exist. */
export function updateItem(db: Database, itemId: string, patch: ItemPatch, now: number): boolean {
  const sets: string[] = [];
  const params: (string | number | boolean | null)[] = [];
  for (const key of PATCH_KEYS) {
    const value = patch[key];
    if (value === undefined) continue;
    sets.push(`${PATCH_COLUMNS[key]} = ?`);
    params.push(value);
  }
  sets.push('updated_at = ?');
  params.push(now, itemId);
  return db.run(`UPDATE items SET ${sets.join(', ')} WHERE id = ?`, params) > 0;
}

export interface ListItemsOptions {
  activeOnly?: boolean;
  limit?: number;
}

export function listItems(db: Database, userId: string, options: ListItemsOptions = {}): Item[] {
  const limit = Math.min(Math.max(1, options.limit ?? 100), 1000);
  const sql = options.activeOnly
    ? 'SELECT * FROM items WHERE user_id = ? AND active = 1 ORDER BY updated_at DESC LIMIT ?'
    : 'SELECT * FROM items WHERE user_id = ? ORDER BY updated_at DESC LIMIT ?';
  return db.query(sql, [userId, limit]).map(parseItemRow);
}
