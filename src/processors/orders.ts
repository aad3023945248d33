/**
 * Order event processors: sold, shipped, delivered.
 */

import { createLogger } from '../utils/logger';
import { ok } from '../utils/result';
import type { ItemSoldEvent, OrderDeliveredEvent, OrderShippedEvent, Sale, SaleStatus } from '../types';
import { advanceStatus, getSaleByOrderId, updateSale, type SalePatch } from '../inventory/sales';
import { applySale } from './apply-sale';
import type { ProcessorContext, ProcessorResult } from './types';

const logger = createLogger('order-processors');

export function processSold(ctx: ProcessorContext, event: ItemSoldEvent): ProcessorResult {
  return applySale(ctx, event.order);
}

function advanceOrder(
  ctx: ProcessorContext,
  orderId: string,
  target: SaleStatus,
  extra: (sale: Sale, patch: SalePatch, fields: string[]) => void,
): ProcessorResult {
  const { db, userId } = ctx;
  const sale = getSaleByOrderId(db, userId, orderId);
  if (!sale) {
    logger.info({ userId, orderId, target }, 'Fulfilment event for unknown order');
    return ok({ kind: 'noop', reason: 'orphan', objectId: orderId });
  }

  const patch: SalePatch = {};
  const fields: string[] = [];
  const status = advanceStatus(sale.status, target);
  if (status !== sale.status) {
    patch.status = status;
    fields.push('status');
  }
  extra(sale, patch, fields);

  if (fields.length === 0) {
    return ok({ kind: 'noop', reason: 'unchanged', objectId: orderId });
  }
  updateSale(db, sale.id, patch, ctx.now);
  return ok({ kind: 'sale_updated', saleId: sale.id, status, fields });
}

export function processShipped(ctx: ProcessorContext, event: OrderShippedEvent): ProcessorResult {
  const at = event.occurredAt ?? ctx.now;
  return advanceOrder(ctx, event.orderId, 'shipped', (sale, patch, fields) => {
    if (event.trackingNumber && event.trackingNumber !== sale.trackingNumber) {
      patch.trackingNumber = event.trackingNumber;
      fields.push('trackingNumber');
    }
    if (event.carrier && event.carrier !== sale.carrier) {
      patch.carrier = event.carrier;
      fields.push('carrier');
    }
    if (sale.shippedAt === null) {
      patch.shippedAt = at;
      fields.push('shippedAt');
    }
  });
}

export function processDelivered(ctx: ProcessorContext, event: OrderDeliveredEvent): ProcessorResult {
  const at = event.occurredAt ?? ctx.now;
  return advanceOrder(ctx, event.orderId, 'completed', (sale, patch, fields) => {
    if (sale.deliveredAt === null) {
      patch.deliveredAt = at;
      fields.push('deliveredAt');
    }
  });
}
