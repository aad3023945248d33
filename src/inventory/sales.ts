/**
 * Sales - one row per (user, marketplace order id)
 */

import { generateId } from '../utils/id';
import type { Database, Row } from '../db/index';
import { num, oneOf, optNum, optOneOf, optStr, str } from '../db/rows';
import type { MatchMethod, Sale, SaleFees, SaleStatus } from '../types';

const SALE_STATUSES: readonly SaleStatus[] = ['pending', 'paid', 'shipped', 'completed'];
const MATCH_METHODS: readonly MatchMethod[] = ['listing_id', 'custom_sku', 'sku', 'title', 'fuzzy_title', 'manual'];

/** Position in the pending → paid → shipped → completed progression. */
export function statusRank(status: SaleStatus): number {
  return SALE_STATUSES.indexOf(status);
}

/** The later of two statuses; status never moves backwards. */
export function advanceStatus(current: SaleStatus, incoming: SaleStatus): SaleStatus {
  return statusRank(incoming) > statusRank(current) ? incoming : current;
}

export type SalePatch = Partial<
  Pick<
    Sale,
    | 'listingId'
    | 'title'
    | 'sku'
    | 'customSku'
    | 'price'
    | 'quantity'
    | 'cost'
    | 'fees'
    | 'status'
    | 'itemId'
    | 'matchMethod'
    | 'buyerUsername'
    | 'trackingNumber'
    | 'carrier'
    | 'soldAt'
    | 'shippedAt'
    | 'deliveredAt'
  >
>;

type ScalarPatchKey = Exclude<keyof SalePatch, 'fees'>;

const PATCH_COLUMNS: Record<ScalarPatchKey, string> = {
  listingId: 'listing_id',
  title: 'title',
  sku: 'sku',
  customSku: 'custom_sku',
  price: 'price',
  quantity: 'quantity',
  cost: 'cost',
  status: 'status',
  itemId: 'item_id',
  matchMethod: 'match_method',
  buyerUsername: 'buyer_username',
  trackingNumber: 'tracking_number',
  carrier: 'carrier',
  soldAt: 'sold_at',
  shippedAt: 'shipped_at',
  deliveredAt: 'delivered_at',
};

const PATCH_KEYS: readonly ScalarPatchKey[] = [
  'listingId',
  'title',
  'sku',
  'customSku',
  'price',
  'quantity',
  'cost',
  'status',
  'itemId',
  'matchMethod',
  'buyerUsername',
  'trackingNumber',
  'carrier',
  'soldAt',
  'shippedAt',
  'deliveredAt',
];

export interface NewSale {
  userId: string;
  externalOrderId: string;
  listingId: string | null;
  title: string | null;
  sku: string | null;
  customSku: string | null;
  price: number;
  quantity: number;
  fees: SaleFees;
  status: SaleStatus;
  buyerUsername: string | null;
  soldAt: number | null;
  trackingNumber?: string | null;
  carrier?: string | null;
}

export function parseSaleRow(row: Row): Sale {
  return {
    id: str(row, 'id'),
    userId: str(row, 'user_id'),
    externalOrderId: str(row, 'external_order_id'),
    listingId: optStr(row, 'listing_id'),
    title: optStr(row, 'title'),
    sku: optStr(row, 'sku'),
    customSku: optStr(row, 'custom_sku'),
    price: num(row, 'price'),
    quantity: num(row, 'quantity'),
    cost: optNum(row, 'cost'),
    fees: {
      marketplace: num(row, 'marketplace_fee'),
      payment: num(row, 'payment_fee'),
      shipping: num(row, 'shipping_cost'),
      other: num(row, 'other_fees'),
    },
    status: oneOf(row, 'status', SALE_STATUSES),
    itemId: optStr(row, 'item_id'),
    matchMethod: optOneOf(row, 'match_method', MATCH_METHODS),
    buyerUsername: optStr(row, 'buyer_username'),
    trackingNumber: optStr(row, 'tracking_number'),
    carrier: optStr(row, 'carrier'),
    soldAt: optNum(row, 'sold_at'),
    shippedAt: optNum(row, 'shipped_at'),
    deliveredAt: optNum(row, 'delivered_at'),
    createdAt: num(row, 'created_at'),
    updatedAt: num(row, 'updated_at'),
  };
}

export function getSale(db: Database, userId: string, saleId: string): Sale | null {
  const row = db.get('SELECT * FROM sales WHERE id = ? AND user_id = ?', [saleId, userId]);
  return row ? parseSaleRow(row) : null;
}

export function getSaleByOrderId(db: Database, userId: string, externalOrderId: string): Sale | null {
  const row = db.get('SELECT * FROM sales WHERE user_id = ? AND external_order_id = ?', [userId, externalOrderId]);
  return row ? parseSaleRow(row) : null;
}

export function hasSaleForListing(db: Database, userId: string, listingId: string): boolean {
  return db.get('SELECT 1 AS hit FROM sales WHERE user_id = ? AND listing_id = ? LIMIT 1', [userId, listingId]) !== undefined;
}

export function insertSale(db: Database, input: NewSale, now: number): Sale {
  const sale: Sale = {
    id: generateId('sale'),
    userId: input.userId,
    externalOrderId: input.externalOrderId,
    listingId: input.listingId,
    title: input.title,
    sku: input.sku,
    customSku: input.customSku,
    price: input.price,
    quantity: input.quantity,
    cost: null,
    fees: input.fees,
    status: input.status,
    itemId: null,
    matchMethod: null,
    buyerUsername: input.buyerUsername,
    trackingNumber: input.trackingNumber ?? null,
    carrier: input.carrier ?? null,
    soldAt: input.soldAt,
    shippedAt: null,
    deliveredAt: null,
    createdAt: now,
    updatedAt: now,
  };
  db.run(
    `INSERT INTO sales (id, user_id, external_order_id, listing_id, title, sku, custom_sku, price, quantity, cost,
       marketplace_fee, payment_fee, shipping_cost, other_fees, status, item_id, match_method, buyer_username,
       tracking_number, carrier, sold_at, shipped_at, delivered_at, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, NULL, ?, ?, ?, ?, ?, NULL, NULL, ?, ?, ?, ?, NULL, NULL, ?, ?)`,
    [
      sale.id,
      sale.userId,
      sale.externalOrderId,
      sale.listingId,
      sale.title,
      sale.sku,
      sale.customSku,
      sale.price,
      sale.quantity,
      sale.fees.marketplace,
      sale.fees.payment,
      sale.fees.shipping,
      sale.fees.other,
      sale.status,
      sale.buyerUsername,
      sale.trackingNumber,
      sale.carrier,
      sale.soldAt,
      now,
      now,
    ],
  );
  return sale;
}

export function updateSale(db: Database, saleId: string, patch: SalePatch, now: number): boolean {
  const sets: string[] = [];
  const params: (string | number | null)[] = [];
  for (const key of PATCH_KEYS) {
    const value = patch[key];
    if (value === undefined) continue;
    sets.push(`${PATCH_COLUMNS[key]} = ?`);
    params.push(value);
  }
  if (patch.fees) {
    sets.push('marketplace_fee = ?', 'payment_fee = ?', 'shipping_cost = ?', 'other_fees = ?');
    params.push(patch.fees.marketplace, patch.fees.payment, patch.fees.shipping, patch.fees.other);
  }
  sets.push('updated_at = ?');
  params.push(now, saleId);
  return db.run(`UPDATE sales SET ${sets.join(', ')} WHERE id = ?`, params) > 0;
}

/** Sales with no item, or whose item no longer exists. */
export function listOrphanedSales(db: Database, userId: string, limit = 200): Sale[] {
  return db
    .query(
      `SELECT s.* FROM sales s
       LEFT JOIN items i ON i.id = s.item_id
       WHERE s.user_id = ? AND (s.item_id IS NULL OR i.id IS NULL)
       ORDER BY s.sold_at DESC, s.created_at DESC
       LIMIT ?`,
      [userId, limit],
    )
    .map(parseSaleRow);
}
