import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createInMemoryDatabase, type Database } from '../db/index';
import { createItem, getItem } from '../inventory/items';
import { createNotificationService } from '../notifications/index';
import type { MarketplaceEvent } from '../types';
import { createEventQueue, retryDelay, type EventQueue, type NewRawEvent } from './event-queue';
import { createEventWorkerPool, type WorkerDeps } from './worker';

const T = Date.parse('2024-06-01T00:00:00.000Z');
const BASE = 1000;

const SOLD: MarketplaceEvent = {
  topic: 'item_sold',
  sellerUsername: 'seller_one',
  occurredAt: T,
  order: {
    orderId: '1001',
    listingId: null,
    title: 'Brass Lamp',
    sku: null,
    customSku: 'SKU-42',
    price: 25,
    quantity: 1,
    status: 'paid',
    fees: { marketplace: 0, payment: 0, shipping: 0, other: 0 },
    buyerUsername: 'buyer_one',
    soldAt: T,
  },
};

function rawEvent(overrides: Partial<NewRawEvent> = {}): NewRawEvent {
  return {
    userId: 'u1',
    source: 'push_json',
    topic: 'item_sold',
    externalEventId: 'evt-1',
    objectId: '1001',
    rawPayload: '{"orderId":"1001"}',
    event: SOLD,
    occurredAt: T,
    receivedAt: T,
    ...overrides,
  };
}

describe('event queue', () => {
  let db: Database;
  let queue: EventQueue;

  beforeEach(async () => {
    db = await createInMemoryDatabase();
    queue = createEventQueue(db, { bucketMs: 15 * 60_000, maxRetries: 2, retryBaseDelayMs: BASE, processingTimeoutMs: 5000 });
  });

  it('accepts the first delivery and counts the rest as duplicates', () => {
    const first = queue.enqueue(rawEvent());
    const second = queue.enqueue(rawEvent({ receivedAt: T + 10 }));
    const third = queue.enqueue(rawEvent({ receivedAt: T + 20 }));

    expect(first.status).toBe('accepted');
    expect(second).toEqual({ status: 'duplicate', eventId: first.eventId });
    expect(third).toEqual({ status: 'duplicate', eventId: first.eventId });
    expect(queue.getEvent(first.eventId)?.duplicateCount).toBe(2);
  });

  it('stores receipt-time failures as failed and re-arms them on a good redelivery', () => {
    const failed = queue.enqueue(rawEvent({ event: null, failure: { kind: 'unmapped', message: 'no user' }, userId: null }));
    expect(queue.getEvent(failed.eventId)).toMatchObject({ status: 'failed', errorKind: 'unmapped', error: 'no user' });

    const repeat = queue.enqueue(rawEvent({ event: null, failure: { kind: 'unmapped', message: 'no user' }, userId: null }));
    expect(repeat.status).toBe('duplicate');

    const rearmed = queue.enqueue(rawEvent({ userId: null }));
    expect(rearmed).toEqual({ status: 'accepted', eventId: failed.eventId });
    expect(queue.getEvent(failed.eventId)).toMatchObject({ status: 'received', errorKind: null, retryCount: 0 });
  });

  it('backs off processing failures exponentially, then fails', () => {
    const { eventId } = queue.enqueue(rawEvent());

    expect(queue.claim(eventId, T)).toBe(true);
    expect(queue.claim(eventId, T)).toBe(false);
    expect(queue.fail(eventId, 'processing', 'boom', T)).toBe('retry_scheduled');
    expect(queue.getEvent(eventId)?.nextAttemptAt).toBe(T + BASE);
    expect(queue.listReady(T + BASE - 1, 10)).toEqual([]);
    expect(queue.listReady(T + BASE, 10).map((event) => event.id)).toEqual([eventId]);

    queue.claim(eventId, T + BASE);
    expect(queue.fail(eventId, 'processing', 'boom', T + BASE)).toBe('retry_scheduled');
    expect(queue.getEvent(eventId)?.nextAttemptAt).toBe(T + BASE + 3 * BASE);

    queue.claim(eventId, T + 4 * BASE);
    expect(queue.fail(eventId, 'processing', 'boom', T + 4 * BASE)).toBe('failed');
    expect(queue.getEvent(eventId)).toMatchObject({ status: 'failed', errorKind: 'processing', retryCount: 3 });
  });

  it('never retries parse failures', () => {
    const { eventId } = queue.enqueue(rawEvent());
    queue.claim(eventId, T);
    expect(queue.fail(eventId, 'parse', 'bad payload', T)).toBe('failed');
  });

  it('computes retry delays as powers of three', () => {
    expect([1, 2, 3, 4].map((attempt) => retryDelay(100, attempt))).toEqual([100, 300, 900, 2700]);
  });

  it('sweeps stuck events back to received, or to failed once retries are spent', () => {
    const { eventId } = queue.enqueue(rawEvent());
    queue.claim(eventId, T);

    expect(queue.sweepStuck(T + 5000)).toEqual({ requeued: 0, failed: 0 });
    expect(queue.sweepStuck(T + 5001)).toEqual({ requeued: 1, failed: 0 });
    expect(queue.getEvent(eventId)?.status).toBe('received');

    queue.claim(eventId, T + 6000);
    queue.sweepStuck(T + 20_000);
    queue.claim(eventId, T + 21_000);
    expect(queue.sweepStuck(T + 40_000)).toEqual({ requeued: 0, failed: 1 });
    expect(queue.getEvent(eventId)).toMatchObject({ status: 'failed', errorKind: 'stuck' });
  });

  it('re-arms events for manual replay', () => {
    const { eventId } = queue.enqueue(rawEvent());
    queue.claim(eventId, T);
    expect(queue.enqueueProcessing(eventId, T)).toBe(false);
    queue.fail(eventId, 'parse', 'bad', T);

    const listener = vi.fn();
    queue.subscribe(listener);
    expect(queue.enqueueProcessing(eventId, T + 1)).toBe(true);
    expect(listener).toHaveBeenCalledWith(eventId);
    expect(queue.getEvent(eventId)).toMatchObject({ status: 'received', retryCount: 0, nextAttemptAt: T + 1 });
    expect(queue.enqueueProcessing('evt_missing', T)).toBe(false);
  });

  it('filters listed events by status and user', () => {
    queue.enqueue(rawEvent());
    queue.enqueue(rawEvent({ externalEventId: 'evt-2', userId: 'u2' }));
    queue.enqueue(rawEvent({ externalEventId: 'evt-3', event: null, failure: { kind: 'parse', message: 'x' } }));

    expect(queue.listEvents({ userId: 'u2' })).toHaveLength(1);
    expect(queue.listEvents({ status: 'failed' }).map((event) => event.externalEventId)).toEqual(['evt-3']);
  });
});

describe('event worker pool', () => {
  let db: Database;
  let queue: EventQueue;
  let deps: WorkerDeps;
  let sellers: Map<string, string>;

  beforeEach(async () => {
    db = await createInMemoryDatabase();
    queue = createEventQueue(db, { bucketMs: 15 * 60_000, maxRetries: 2, retryBaseDelayMs: BASE, processingTimeoutMs: 5000 });
    sellers = new Map();
    deps = {
      db,
      queue,
      notifications: createNotificationService(db),
      matcher: { fuzzyThreshold: 0.8, recentlyEndedDays: 90 },
      resolveUser: (seller) => sellers.get(seller) ?? null,
      clock: () => T + 1000,
    };
  });

  it('applies repeated deliveries exactly once', async () => {
    const item = createItem(db, { userId: 'u1', externalListingId: null, title: 'Brass Lamp', customSku: 'SKU-42', quantity: 1 }, T);
    for (let i = 0; i < 3; i++) queue.enqueue(rawEvent({ receivedAt: T + i }));

    const pool = createEventWorkerPool(deps, { concurrency: 2, pollIntervalMs: 50 });
    expect(await pool.drain()).toBe(1);

    const sales = db.query('SELECT item_id FROM sales');
    expect(sales).toEqual([{ item_id: item.id }]);
    expect(getItem(db, 'u1', item.id)).toMatchObject({ quantity: 0, active: false });
    expect(queue.listEvents({ status: 'processed' })).toHaveLength(1);
  });

  it('processes events for one listing in receipt order', async () => {
    const listing = { listingId: 'L-1', title: 'Lamp', sku: null, customSku: null, price: 10, quantity: 1 };
    queue.enqueue(
      rawEvent({
        externalEventId: 'a',
        objectId: 'L-1',
        topic: 'item_listed',
        event: { topic: 'item_listed', sellerUsername: null, occurredAt: T, listing },
        receivedAt: T,
      }),
    );
    queue.enqueue(
      rawEvent({
        externalEventId: 'b',
        objectId: 'L-1',
        topic: 'item_ended',
        event: { topic: 'item_ended', sellerUsername: null, occurredAt: T + 1, listingId: 'L-1' },
        receivedAt: T + 1,
      }),
    );

    const pool = createEventWorkerPool(deps, { concurrency: 1, pollIntervalMs: 50 });
    await pool.drain();
    expect(db.get('SELECT active, end_reason FROM items')).toEqual({ active: 0, end_reason: 'unsold' });
  });

  it('fails events for unknown sellers and processes them once the seller is mapped', async () => {
    const { eventId } = queue.enqueue(rawEvent({ userId: null }));
    const pool = createEventWorkerPool(deps, { concurrency: 1, pollIntervalMs: 50 });

    await pool.drain();
    expect(queue.getEvent(eventId)).toMatchObject({ status: 'failed', errorKind: 'unmapped' });

    sellers.set('seller_one', 'u1');
    queue.enqueueProcessing(eventId, T);
    await pool.drain();
    expect(queue.getEvent(eventId)).toMatchObject({ status: 'processed', userId: 'u1' });
  });

  it('processes accepted events while running', async () => {
    const pool = createEventWorkerPool(deps, { concurrency: 2, pollIntervalMs: 10_000 });
    pool.start();
    const { eventId } = queue.enqueue(rawEvent());

    await vi.waitFor(() => expect(queue.getEvent(eventId)?.status).toBe('processed'));
    await pool.stop();
    expect(pool.isRunning()).toBe(false);
  });

  it('halts and reports when the ledger fails', async () => {
    const onFatal = vi.fn();
    const broken: EventQueue = {
      ...queue,
      listReady: () => {
        throw new Error('disk I/O error');
      },
    };
    const pool = createEventWorkerPool({ ...deps, queue: broken, onFatal }, { concurrency: 2, pollIntervalMs: 50 });

    pool.start();
    await pool.stop();

    expect(pool.isRunning()).toBe(false);
    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal.mock.calls[0]?.[0]).toBeInstanceOf(Error);
    expect(onFatal.mock.calls[0]?.[0].name).toBe('PipelineFatalError');
  });
});
