/**
 * applySale - the one path through which orders become Sales
 *
 * Used by the item-sold processor, the backfill importer and the poller.
 * First sight: create the Sale, run the matcher, decrement the matched
 * item (deactivating it at zero), copy its cost, notify. Repeat sight:
 * advance status and fill in fees / tracking without touching inventory.
 */

import { createLogger } from '../utils/logger';
import { ok } from '../utils/result';
import type { OrderSnapshot, Sale, SaleFees } from '../types';
import { updateItem } from '../inventory/items';
import { advanceStatus, getSaleByOrderId, insertSale, updateSale, type SalePatch } from '../inventory/sales';
import { matchSale } from '../matching/sale-matcher';
import type { ProcessorContext, ProcessorResult } from './types';

const logger = createLogger('apply-sale');

export interface IncomingOrder extends OrderSnapshot {
  trackingNumber?: string | null;
  carrier?: string | null;
}

export interface ApplySaleOptions {
  /** Emit the "Item sold" notification on first sight (default true). */
  notify?: boolean;
}

function mergeFees(current: SaleFees, incoming: SaleFees): SaleFees {
  return {
    marketplace: incoming.marketplace > 0 ? incoming.marketplace : current.marketplace,
    payment: incoming.payment > 0 ? incoming.payment : current.payment,
    shipping: incoming.shipping > 0 ? incoming.shipping : current.shipping,
    other: incoming.other > 0 ? incoming.other : current.other,
  };
}

function feesEqual(a: SaleFees, b: SaleFees): boolean {
  return a.marketplace === b.marketplace && a.payment === b.payment && a.shipping === b.shipping && a.other === b.other;
}

function updateExisting(ctx: ProcessorContext, sale: Sale, order: IncomingOrder): ProcessorResult {
  const patch: SalePatch = {};
  const fields: string[] = [];

  const status = advanceStatus(sale.status, order.status);
  if (status !== sale.status) {
    patch.status = status;
    fields.push('status');
  }
  const fees = mergeFees(sale.fees, order.fees);
  if (!feesEqual(fees, sale.fees)) {
    patch.fees = fees;
    fields.push('fees');
  }
  if (order.trackingNumber && order.trackingNumber !== sale.trackingNumber) {
    patch.trackingNumber = order.trackingNumber;
    fields.push('trackingNumber');
  }
  if (order.carrier && order.carrier !== sale.carrier) {
    patch.carrier = order.carrier;
    fields.push('carrier');
  }
  if (order.buyerUsername && !sale.buyerUsername) {
    patch.buyerUsername = order.buyerUsername;
    fields.push('buyerUsername');
  }

  if (fields.length === 0) {
    return ok({ kind: 'noop', reason: 'unchanged', objectId: order.orderId });
  }
  updateSale(ctx.db, sale.id, patch, ctx.now);
  logger.debug({ userId: ctx.userId, saleId: sale.id, fields }, 'Sale updated');
  return ok({ kind: 'sale_updated', saleId: sale.id, status, fields });
}

export function applySale(ctx: ProcessorContext, order: IncomingOrder, options: ApplySaleOptions = {}): ProcessorResult {
  const { db, userId, now } = ctx;

  return db.transaction(() => {
    const existing = getSaleByOrderId(db, userId, order.orderId);
    if (existing) {
      return updateExisting(ctx, existing, order);
    }

    const sale = insertSale(
      db,
      {
        userId,
        externalOrderId: order.orderId,
        listingId: order.listingId,
        title: order.title,
        sku: order.sku,
        customSku: order.customSku,
        price: order.price,
        quantity: order.quantity,
        fees: order.fees,
        status: order.status,
        buyerUsername: order.buyerUsername,
        soldAt: order.soldAt,
        trackingNumber: order.trackingNumber ?? null,
        carrier: order.carrier ?? null,
      },
      now,
    );

    const match = matchSale(db, userId, order, ctx.matcher, now);
    if (!match) {
      logger.info({ userId, orderId: order.orderId, title: order.title }, 'Sale has no matching item');
    } else {
      const { item } = match;
      const remaining = Math.max(0, item.quantity - order.quantity);
      const soldOut = remaining === 0 && item.active;
      // An end that arrived before this sale was recorded as unsold.
      const relabel = !item.active && item.endReason === 'unsold';
      updateItem(
        db,
        item.id,
        {
          quantity: remaining,
          soldAt: order.soldAt ?? now,
          ...(soldOut ? { active: false, endedAt: order.soldAt ?? now, endReason: 'sold' as const } : {}),
          ...(relabel ? { endReason: 'sold' as const } : {}),
        },
        now,
      );
      updateSale(db, sale.id, { itemId: item.id, matchMethod: match.method, cost: item.costBasis ?? undefined }, now);
      logger.info(
        { userId, orderId: order.orderId, itemId: item.id, method: match.method, score: match.score, remaining },
        'Sale matched to item',
      );
    }

    if (options.notify !== false) {
      ctx.notifications.notify(
        userId,
        {
          type: 'success',
          title: 'Item sold',
          message: `${order.title ?? order.listingId ?? order.orderId} sold for $${order.price.toFixed(2)}`,
          source: 'sync',
        },
        now,
      );
    }

    return ok({
      kind: 'sale_created',
      saleId: sale.id,
      itemId: match ? match.item.id : null,
      matchMethod: match ? match.method : null,
    });
  });
}
