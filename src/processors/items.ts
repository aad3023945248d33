/**
 * Item event processors: listed, relisted, revised, ended, out-of-stock.
 *
 * Ordering is best effort, so each processor converges on its own:
 * revisions apply last-write-wins on lastEventAt, ended items are never
 * revived by a revision, and end/reactivate compare against event time.
 */

import { createLogger } from '../utils/logger';
import { err, ok } from '../utils/result';
import type { EndReason, Item, ItemEndedEvent, ItemListedEvent, ItemOutOfStockEvent, ItemRelistedEvent, ItemRevisedEvent, ListingSnapshot } from '../types';
import { createItem, findItemForListing, updateItem, type ItemPatch } from '../inventory/items';
import { hasSaleForListing } from '../inventory/sales';
import type { ProcessorContext, ProcessorResult } from './types';

const logger = createLogger('item-processors');

function eventTime(ctx: ProcessorContext, occurredAt: number | null): number {
  return occurredAt ?? ctx.now;
}

function isConstraintError(error: unknown): boolean {
  return error instanceof Error && /UNIQUE constraint failed/i.test(error.message);
}

/** Listing fields that differ from the item, as a patch. */
function listingPatch(item: Item, listing: ListingSnapshot): { patch: ItemPatch; fields: string[] } {
  const patch: ItemPatch = {};
  const fields: string[] = [];
  if (listing.title !== null && listing.title !== item.title) {
    patch.title = listing.title;
    fields.push('title');
  }
  if (listing.price !== null && listing.price !== item.price) {
    patch.price = listing.price;
    fields.push('price');
  }
  if (listing.quantity !== null && listing.quantity !== item.quantity) {
    patch.quantity = listing.quantity;
    fields.push('quantity');
  }
  if (listing.sku !== null && listing.sku !== item.sku) {
    patch.sku = listing.sku;
    fields.push('sku');
  }
  if (listing.customSku !== null && listing.customSku !== item.customSku) {
    patch.customSku = listing.customSku;
    fields.push('customSku');
  }
  return { patch, fields };
}

function notifyImported(ctx: ProcessorContext, title: string, verb: string): void {
  ctx.notifications.notify(
    ctx.userId,
    { type: 'info', title: 'New listing imported', message: `${title} was ${verb}`, source: 'sync' },
    ctx.now,
  );
}

/**
 * A relist that names its predecessor carries the item over to the new
 * listing id instead of creating a second item.
 */
function findRelistPredecessor(ctx: ProcessorContext, event: ItemListedEvent | ItemRelistedEvent): Item | null {
  if (event.topic !== 'item_relisted' || !event.previousListingId) return null;
  return findItemForListing(ctx.db, ctx.userId, event.previousListingId);
}

export function processListed(ctx: ProcessorContext, event: ItemListedEvent | ItemRelistedEvent): ProcessorResult {
  const { db, userId } = ctx;
  const { listing } = event;
  const at = eventTime(ctx, event.occurredAt);

  try {
    return db.transaction((): ProcessorResult => {
      const existing = findItemForListing(db, userId, listing.listingId) ?? findRelistPredecessor(ctx, event);

      if (!existing) {
        const item = createItem(
          db,
          {
            userId,
            externalListingId: listing.listingId,
            title: listing.title ?? `Listing ${listing.listingId}`,
            sku: listing.sku,
            customSku: listing.customSku,
            price: listing.price,
            quantity: listing.quantity ?? 1,
            lastEventAt: at,
            lastSyncedAt: ctx.now,
          },
          ctx.now,
        );
        notifyImported(ctx, item.title, event.topic === 'item_relisted' ? 'relisted' : 'listed');
        logger.info({ userId, listingId: listing.listingId, itemId: item.id }, 'Item created from listing');
        return ok({ kind: 'item_created', itemId: item.id });
      }

      const { patch, fields } = listingPatch(existing, listing);
      const movesListing = existing.externalListingId !== listing.listingId;
      if (movesListing) {
        patch.externalListingId = listing.listingId;
        fields.push('externalListingId');
      }

      if (!existing.active) {
        if (existing.endedAt !== null && at < existing.endedAt) {
          logger.debug({ userId, listingId: listing.listingId, itemId: existing.id }, 'Listing event predates item end');
          return ok({ kind: 'noop', reason: 'stale', objectId: listing.listingId });
        }
        updateItem(
          db,
          existing.id,
          {
            ...patch,
            active: true,
            endedAt: null,
            endReason: null,
            quantity: listing.quantity ?? Math.max(1, existing.quantity),
            lastEventAt: Math.max(at, existing.lastEventAt ?? at),
            lastSyncedAt: ctx.now,
          },
          ctx.now,
        );
        notifyImported(ctx, patch.title ?? existing.title, 'relisted');
        logger.info({ userId, listingId: listing.listingId, itemId: existing.id }, 'Item reactivated');
        return ok({ kind: 'item_reactivated', itemId: existing.id });
      }

      if (existing.lastEventAt !== null && at < existing.lastEventAt) {
        return ok({ kind: 'noop', reason: 'stale', objectId: listing.listingId });
      }
      updateItem(db, existing.id, { ...patch, lastEventAt: at, lastSyncedAt: ctx.now }, ctx.now);
      if (fields.length === 0) {
        return ok({ kind: 'noop', reason: 'unchanged', objectId: listing.listingId });
      }
      return ok({ kind: 'item_updated', itemId: existing.id, fields });
    });
  } catch (error) {
    if (isConstraintError(error)) {
      return err({ reason: 'conflict', message: `listing ${listing.listingId} is already active on another item` });
    }
    throw error;
  }
}

export function processRevised(ctx: ProcessorContext, event: ItemRevisedEvent): ProcessorResult {
  const { db, userId } = ctx;
  const { listing } = event;
  const at = eventTime(ctx, event.occurredAt);

  const item = findItemForListing(db, userId, listing.listingId);
  if (!item) {
    logger.info({ userId, listingId: listing.listingId }, 'Revision for unknown listing');
    return ok({ kind: 'noop', reason: 'orphan', objectId: listing.listingId });
  }
  if (!item.active) {
    return ok({ kind: 'noop', reason: 'already_ended', objectId: listing.listingId });
  }
  if (item.lastEventAt !== null && at < item.lastEventAt) {
    return ok({ kind: 'noop', reason: 'stale', objectId: listing.listingId });
  }

  const { patch, fields } = listingPatch(item, listing);
  updateItem(db, item.id, { ...patch, lastEventAt: at, lastSyncedAt: ctx.now }, ctx.now);
  if (fields.length === 0) {
    return ok({ kind: 'noop', reason: 'unchanged', objectId: listing.listingId });
  }
  return ok({ kind: 'item_updated', itemId: item.id, fields });
}

export function processEnded(ctx: ProcessorContext, event: ItemEndedEvent): ProcessorResult {
  const { db, userId } = ctx;
  const at = eventTime(ctx, event.occurredAt);

  return db.transaction((): ProcessorResult => {
    const item = findItemForListing(db, userId, event.listingId);
    if (!item) {
      return ok({ kind: 'noop', reason: 'orphan', objectId: event.listingId });
    }
    if (!item.active) {
      return ok({ kind: 'noop', reason: 'already_ended', objectId: event.listingId });
    }
    if (event.occurredAt !== null && item.lastEventAt !== null && event.occurredAt < item.lastEventAt) {
      logger.debug({ userId, listingId: event.listingId }, 'End event predates the current listing');
      return ok({ kind: 'noop', reason: 'stale', objectId: event.listingId });
    }

    const soldOut = item.quantity === 0 && item.soldAt !== null;
    const endReason: EndReason = soldOut || hasSaleForListing(db, userId, event.listingId) ? 'sold' : 'unsold';
    updateItem(db, item.id, { active: false, endedAt: at, endReason, lastEventAt: Math.max(at, item.lastEventAt ?? at) }, ctx.now);
    logger.info({ userId, listingId: event.listingId, itemId: item.id, endReason }, 'Item ended');
    return ok({ kind: 'item_ended', itemId: item.id, endReason });
  });
}

export function processOutOfStock(ctx: ProcessorContext, event: ItemOutOfStockEvent): ProcessorResult {
  const { db, userId } = ctx;
  const at = eventTime(ctx, event.occurredAt);

  const item = findItemForListing(db, userId, event.listingId);
  if (!item) {
    return ok({ kind: 'noop', reason: 'orphan', objectId: event.listingId });
  }
  if (!item.active) {
    return ok({ kind: 'noop', reason: 'already_ended', objectId: event.listingId });
  }
  if (item.quantity === 0) {
    return ok({ kind: 'noop', reason: 'unchanged', objectId: event.listingId });
  }

  updateItem(db, item.id, { quantity: 0, lastEventAt: Math.max(at, item.lastEventAt ?? at) }, ctx.now);
  ctx.notifications.notify(
    userId,
    { type: 'warning', title: 'Out of stock', message: `${item.title} is out of stock`, source: 'sync' },
    ctx.now,
  );
  return ok({ kind: 'item_out_of_stock', itemId: item.id });
}
