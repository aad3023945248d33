import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryDatabase, type Database } from '../db/index';
import { createItem, getItem } from '../inventory/items';
import { getSaleByOrderId } from '../inventory/sales';
import { createNotificationService, type NotificationService } from '../notifications/index';
import type { ListingSnapshot, MarketplaceEvent, OrderSnapshot } from '../types';
import { processEvent, type ProcessorContext } from './index';

const T = Date.parse('2024-06-01T00:00:00.000Z');
const MIN = 60_000;

function listing(overrides: Partial<ListingSnapshot> = {}): ListingSnapshot {
  return { listingId: 'L-1', title: 'Brass Lamp', sku: null, customSku: null, price: 40, quantity: 1, ...overrides };
}

function order(overrides: Partial<OrderSnapshot> = {}): OrderSnapshot {
  return {
    orderId: 'O-1',
    listingId: 'L-1',
    title: 'Brass Lamp',
    sku: null,
    customSku: null,
    price: 40,
    quantity: 1,
    status: 'paid',
    fees: { marketplace: 0, payment: 0, shipping: 0, other: 0 },
    buyerUsername: 'buyer_one',
    soldAt: T + 5 * MIN,
    ...overrides,
  };
}

describe('processEvent', () => {
  let db: Database;
  let notifications: NotificationService;

  function ctx(now = T + 60 * MIN): ProcessorContext {
    return { db, userId: 'u1', now, notifications, matcher: { fuzzyThreshold: 0.8, recentlyEndedDays: 90 } };
  }

  function run(event: MarketplaceEvent, now?: number) {
    const result = processEvent(ctx(now), event);
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
  }

  beforeEach(async () => {
    db = await createInMemoryDatabase();
    notifications = createNotificationService(db);
  });

  describe('item events', () => {
    it('creates an item on first listing and treats a replay as unchanged', () => {
      const event: MarketplaceEvent = {
        topic: 'item_listed',
        sellerUsername: null,
        occurredAt: T,
        listing: listing({ title: null, listingId: 'L-9' }),
      };

      const first = run(event);
      expect(first.kind).toBe('item_created');
      if (first.kind !== 'item_created') return;
      expect(getItem(db, 'u1', first.itemId)?.title).toBe('Listing L-9');
      expect(notifications.list('u1').map((n) => n.title)).toEqual(['New listing imported']);

      expect(run(event)).toEqual({ kind: 'noop', reason: 'unchanged', objectId: 'L-9' });
    });

    it('applies revisions last-write-wins on event time', () => {
      run({ topic: 'item_listed', sellerUsername: null, occurredAt: T, listing: listing() });

      const newer = run({ topic: 'item_revised', sellerUsername: null, occurredAt: T + 2 * MIN, listing: listing({ price: 35 }) });
      expect(newer.kind).toBe('item_updated');

      const older = run({ topic: 'item_revised', sellerUsername: null, occurredAt: T + MIN, listing: listing({ price: 50 }) });
      expect(older).toEqual({ kind: 'noop', reason: 'stale', objectId: 'L-1' });

      const item = db.get('SELECT price FROM items WHERE external_listing_id = ?', ['L-1']);
      expect(item?.price).toBe(35);
    });

    it('keeps an ended item inactive when a late revision arrives', () => {
      run({ topic: 'item_listed', sellerUsername: null, occurredAt: T, listing: listing() });
      const ended = run({ topic: 'item_ended', sellerUsername: null, occurredAt: T + 2 * MIN, listingId: 'L-1' });
      expect(ended.kind).toBe('item_ended');
      if (ended.kind === 'item_ended') expect(ended.endReason).toBe('unsold');

      const revised = run({ topic: 'item_revised', sellerUsername: null, occurredAt: T + MIN, listing: listing({ price: 10 }) });
      expect(revised).toEqual({ kind: 'noop', reason: 'already_ended', objectId: 'L-1' });

      const row = db.get('SELECT active, price FROM items WHERE external_listing_id = ?', ['L-1']);
      expect(row?.active).toBe(0);
      expect(row?.price).toBe(40);
    });

    it('marks an ended listing as sold when a sale exists for it', () => {
      run({ topic: 'item_listed', sellerUsername: null, occurredAt: T, listing: listing({ quantity: 2 }) });
      run({ topic: 'item_sold', sellerUsername: null, occurredAt: T + MIN, order: order() });

      const ended = run({ topic: 'item_ended', sellerUsername: null, occurredAt: T + 2 * MIN, listingId: 'L-1' });
      expect(ended.kind).toBe('item_ended');
      if (ended.kind === 'item_ended') expect(ended.endReason).toBe('sold');
    });

    it('reactivates on relist after the end, but not for an older listing event', () => {
      run({ topic: 'item_listed', sellerUsername: null, occurredAt: T, listing: listing() });
      run({ topic: 'item_ended', sellerUsername: null, occurredAt: T + 10 * MIN, listingId: 'L-1' });

      const early = run({
        topic: 'item_relisted',
        sellerUsername: null,
        occurredAt: T + 5 * MIN,
        listing: listing(),
        previousListingId: null,
      });
      expect(early).toEqual({ kind: 'noop', reason: 'stale', objectId: 'L-1' });

      const late = run({
        topic: 'item_relisted',
        sellerUsername: null,
        occurredAt: T + 20 * MIN,
        listing: listing(),
        previousListingId: null,
      });
      expect(late.kind).toBe('item_reactivated');
      const row = db.get('SELECT active, ended_at, end_reason FROM items WHERE external_listing_id = ?', ['L-1']);
      expect(row).toEqual({ active: 1, ended_at: null, end_reason: null });
    });

    it('moves the item to the new listing id on relist with a predecessor', () => {
      const first = run({ topic: 'item_listed', sellerUsername: null, occurredAt: T, listing: listing() });
      run({ topic: 'item_ended', sellerUsername: null, occurredAt: T + MIN, listingId: 'L-1' });

      const relisted = run({
        topic: 'item_relisted',
        sellerUsername: null,
        occurredAt: T + 2 * MIN,
        listing: listing({ listingId: 'L-2' }),
        previousListingId: 'L-1',
      });
      expect(relisted.kind).toBe('item_reactivated');
      if (first.kind !== 'item_created') throw new Error('expected creation');
      const item = getItem(db, 'u1', first.itemId);
      expect(item?.externalListingId).toBe('L-2');
      expect(item?.active).toBe(true);
      expect(db.get('SELECT COUNT(*) AS n FROM items')?.n).toBe(1);
    });

    it('zeroes quantity on out-of-stock without ending the item', () => {
      run({ topic: 'item_listed', sellerUsername: null, occurredAt: T, listing: listing({ quantity: 3 }) });

      const result = run({ topic: 'item_out_of_stock', sellerUsername: null, occurredAt: T + MIN, listingId: 'L-1' }, T + 90 * MIN);
      expect(result.kind).toBe('item_out_of_stock');
      expect(db.get('SELECT active, quantity FROM items')).toEqual({ active: 1, quantity: 0 });
      expect(notifications.list('u1')[0]?.title).toBe('Out of stock');

      expect(run({ topic: 'item_out_of_stock', sellerUsername: null, occurredAt: T + MIN, listingId: 'L-1' })).toEqual({
        kind: 'noop',
        reason: 'unchanged',
        objectId: 'L-1',
      });
    });

    it('reports revisions for unknown listings as orphans', () => {
      expect(run({ topic: 'item_revised', sellerUsername: null, occurredAt: T, listing: listing({ listingId: 'L-404' }) })).toEqual({
        kind: 'noop',
        reason: 'orphan',
        objectId: 'L-404',
      });
    });
  });

  describe('order events', () => {
    it('creates a matched sale, decrements inventory once and copies cost', () => {
      const item = createItem(db, { userId: 'u1', externalListingId: 'L-1', title: 'Brass Lamp', quantity: 2, costBasis: 12 }, T);
      const event: MarketplaceEvent = { topic: 'item_sold', sellerUsername: null, occurredAt: T + MIN, order: order() };

      const first = run(event);
      expect(first).toEqual({
        kind: 'sale_created',
        saleId: getSaleByOrderId(db, 'u1', 'O-1')?.id,
        itemId: item.id,
        matchMethod: 'listing_id',
      });
      expect(getSaleByOrderId(db, 'u1', 'O-1')?.cost).toBe(12);
      expect(getItem(db, 'u1', item.id)?.quantity).toBe(1);

      expect(run(event)).toEqual({ kind: 'noop', reason: 'unchanged', objectId: 'O-1' });
      expect(getItem(db, 'u1', item.id)?.quantity).toBe(1);
      expect(notifications.list('u1').filter((n) => n.title === 'Item sold')).toHaveLength(1);
    });

    it('deactivates the item as sold when the last unit sells', () => {
      const item = createItem(db, { userId: 'u1', externalListingId: 'L-1', title: 'Brass Lamp', quantity: 1 }, T);

      run({ topic: 'item_sold', sellerUsername: null, occurredAt: T + MIN, order: order() });

      const updated = getItem(db, 'u1', item.id);
      expect(updated?.quantity).toBe(0);
      expect(updated?.active).toBe(false);
      expect(updated?.endReason).toBe('sold');
      expect(updated?.endedAt).toBe(T + 5 * MIN);
    });

    it('reaches the same end state whether the end or the sale arrives first', () => {
      const endState = () => db.get('SELECT active, quantity, end_reason FROM items WHERE external_listing_id = ?', ['L-1']);
      const listed: MarketplaceEvent = { topic: 'item_listed', sellerUsername: null, occurredAt: T, listing: listing() };
      const sold: MarketplaceEvent = { topic: 'item_sold', sellerUsername: null, occurredAt: T + MIN, order: order() };
      const ended: MarketplaceEvent = { topic: 'item_ended', sellerUsername: null, occurredAt: T + MIN, listingId: 'L-1' };

      run(listed);
      run(sold);
      run(ended);
      const soldFirst = endState();

      db.run('DELETE FROM items');
      db.run('DELETE FROM sales');
      run(listed);
      run(ended);
      run(sold);

      expect(soldFirst).toEqual({ active: 0, quantity: 0, end_reason: 'sold' });
      expect(endState()).toEqual(soldFirst);
    });

    it('records unmatched sales with no item', () => {
      const result = run({ topic: 'item_sold', sellerUsername: null, occurredAt: T, order: order({ listingId: 'L-404', title: 'Unknown' }) });
      expect(result.kind).toBe('sale_created');
      if (result.kind === 'sale_created') {
        expect(result.itemId).toBeNull();
        expect(result.matchMethod).toBeNull();
      }
    });

    it('fills in fees from a later report', () => {
      run({ topic: 'item_sold', sellerUsername: null, occurredAt: T, order: order() });
      const result = run({
        topic: 'item_sold',
        sellerUsername: null,
        occurredAt: T,
        order: order({ fees: { marketplace: 3.5, payment: 0, shipping: 0, other: 0 } }),
      });
      expect(result.kind).toBe('sale_updated');
      if (result.kind === 'sale_updated') expect(result.fields).toEqual(['fees']);
      expect(getSaleByOrderId(db, 'u1', 'O-1')?.fees.marketplace).toBe(3.5);
    });

    it('never moves sale status backwards', () => {
      run({ topic: 'item_sold', sellerUsername: null, occurredAt: T, order: order() });

      const shipped = run({
        topic: 'order_shipped',
        sellerUsername: null,
        occurredAt: T + MIN,
        orderId: 'O-1',
        trackingNumber: '1Z999',
        carrier: 'UPS',
      });
      expect(shipped).toEqual({
        kind: 'sale_updated',
        saleId: getSaleByOrderId(db, 'u1', 'O-1')?.id,
        status: 'shipped',
        fields: ['status', 'trackingNumber', 'carrier', 'shippedAt'],
      });

      expect(run({ topic: 'item_sold', sellerUsername: null, occurredAt: T, order: order({ status: 'paid' }) })).toEqual({
        kind: 'noop',
        reason: 'unchanged',
        objectId: 'O-1',
      });

      run({ topic: 'order_delivered', sellerUsername: null, occurredAt: T + 2 * MIN, orderId: 'O-1' });
      const replay = run({
        topic: 'order_shipped',
        sellerUsername: null,
        occurredAt: T + MIN,
        orderId: 'O-1',
        trackingNumber: '1Z999',
        carrier: 'UPS',
      });
      expect(replay).toEqual({ kind: 'noop', reason: 'unchanged', objectId: 'O-1' });

      const sale = getSaleByOrderId(db, 'u1', 'O-1');
      expect(sale?.status).toBe('completed');
      expect(sale?.shippedAt).toBe(T + MIN);
      expect(sale?.deliveredAt).toBe(T + 2 * MIN);
    });

    it('reports fulfilment for unknown orders as orphans', () => {
      expect(run({ topic: 'order_delivered', sellerUsername: null, occurredAt: T, orderId: 'O-404' })).toEqual({
        kind: 'noop',
        reason: 'orphan',
        objectId: 'O-404',
      });
    });
  });
});
