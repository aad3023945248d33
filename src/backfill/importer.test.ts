import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createInMemoryDatabase, type Database } from '../db/index';
import { createCredentialVault, type CredentialVault } from '../credentials/index';
import { createNotificationService, type NotificationService } from '../notifications/index';
import { createItem, getItem } from '../inventory/items';
import { MarketplaceApiError } from '../infra/errors';
import type { MarketplaceClient, OrderPage, OrderQuery, RemoteOrder } from '../marketplace/client';
import { getWatermark } from '../sync/watermarks';
import {
  BackfillInProgressError,
  createBackfillImporter,
  windowKey,
  type BackfillCheckpoint,
  type BackfillSettings,
} from './importer';

const DAY = 24 * 60 * 60 * 1000;
const NOW = Date.parse('2024-07-01T00:00:00.000Z');
const APR_1 = Date.parse('2024-04-01T00:00:00.000Z');
const JAN_1 = Date.parse('2024-01-01T00:00:00.000Z');

const SETTINGS: BackfillSettings = {
  windowDays: 91,
  maxIterations: 100,
  maxOrders: 1000,
  maxLookbackYears: 20,
  emptyWindowsToStop: 2,
  checkpointEvery: 4,
  pageSize: 50,
};

function remoteOrder(orderId: string, soldAt: number, overrides: Partial<RemoteOrder> = {}): RemoteOrder {
  return {
    orderId,
    listingId: null,
    title: `Order ${orderId}`,
    sku: null,
    customSku: null,
    price: 20,
    quantity: 1,
    status: 'paid',
    fees: { marketplace: 2, payment: 0, shipping: 0, other: 0 },
    buyerUsername: 'buyer_one',
    soldAt,
    lastModifiedAt: soldAt,
    trackingNumber: null,
    carrier: null,
    ...overrides,
  };
}

function ordersBetween(orders: RemoteOrder[], query: OrderQuery): RemoteOrder[] {
  return orders.filter((o) => o.soldAt !== null && o.soldAt >= query.from && (query.to === null || o.soldAt <= query.to));
}

function fakeFetch(orders: RemoteOrder[]) {
  return vi.fn(async (_token: string, query: OrderQuery, offset: number, limit: number): Promise<OrderPage> => {
    const inWindow = ordersBetween(orders, query);
    return { orders: inWindow.slice(offset, offset + limit), total: inWindow.length, failures: [] };
  });
}

describe('backfill importer', () => {
  let db: Database;
  let notifications: NotificationService;
  let vault: CredentialVault;

  beforeEach(async () => {
    db = await createInMemoryDatabase();
    notifications = createNotificationService(db);
    vault = createCredentialVault(db, { refresh: vi.fn(), notifications, clock: () => NOW });
    vault.storeCredential('u1', {
      marketplaceUserId: 'seller_one',
      accessToken: 'test-access-token',
      refreshToken: 'test-refresh-token',
      expiresAt: NOW + DAY,
    });
  });

  function importer(fetchOrders: MarketplaceClient['fetchOrders'], settings: Partial<BackfillSettings> = {}) {
    return createBackfillImporter(
      {
        db,
        vault,
        client: { fetchOrders },
        notifications,
        matcher: { fuzzyThreshold: 0.8, recentlyEndedDays: 90 },
        clock: () => NOW,
        retry: { maxAttempts: 1 },
      },
      { ...SETTINGS, ...settings },
    );
  }

  it('stops after two consecutive empty windows without scanning a third', async () => {
    const fetchOrders = fakeFetch([]);
    const report = await importer(fetchOrders).runBackfill('u1');

    expect(report.final).toEqual({ kind: 'exhausted', reason: 'empty_windows' });
    expect(report.windowsScanned).toBe(2);
    expect(report.incomplete).toBe(false);
    expect(fetchOrders.mock.calls.map((call) => call[1])).toEqual([
      { field: 'creationdate', from: APR_1, to: NOW },
      { field: 'creationdate', from: JAN_1, to: APR_1 },
    ]);
    expect(fetchOrders.mock.calls[0]?.[0]).toBe('test-access-token');

    expect(importer(fetchOrders).getRun(report.runId)).toMatchObject({
      status: 'exhausted',
      reason: 'empty_windows',
      incomplete: false,
      windowsScanned: 2,
      ordersCollected: 0,
      oldestWindowStart: JAN_1,
    });
    expect(getWatermark(db, 'u1', 'orders_backfill')?.cursorAt).toBe(JAN_1);
  });

  it('keeps going when a window with an order is followed by an empty one', async () => {
    const fetchOrders = fakeFetch([remoteOrder('1001', Date.parse('2024-02-15T12:00:00.000Z'))]);
    const report = await importer(fetchOrders).runBackfill('u1');

    expect(report.windowsScanned).toBe(4);
    expect(report.ordersCollected).toBe(1);
    expect(report.final).toEqual({ kind: 'exhausted', reason: 'empty_windows' });
  });

  it('applies orders through the sale path without per-sale notifications', async () => {
    const item = createItem(db, { userId: 'u1', externalListingId: null, title: 'Brass Lamp', customSku: 'SKU-1', quantity: 1 }, NOW - 200 * DAY);
    const fetchOrders = fakeFetch([remoteOrder('1001', NOW - 5 * DAY, { customSku: 'SKU-1', title: 'Brass Lamp' })]);

    const report = await importer(fetchOrders).runBackfill('u1');

    expect(report.ordersApplied).toBe(1);
    expect(db.query('SELECT external_order_id, item_id, match_method FROM sales')).toEqual([
      { external_order_id: '1001', item_id: item.id, match_method: 'custom_sku' },
    ]);
    expect(getItem(db, 'u1', item.id)).toMatchObject({ quantity: 0, active: false, endReason: 'sold' });
    expect(notifications.list('u1').map((n) => [n.type, n.title, n.message])).toEqual([
      ['success', 'Sales import complete', 'Imported 1 orders.'],
    ]);
  });

  it('pages through a window and counts orders seen twice once', async () => {
    const orders = [remoteOrder('1', NOW - DAY), remoteOrder('2', NOW - 2 * DAY), remoteOrder('3', APR_1)];
    const fetchOrders = fakeFetch(orders);

    const report = await importer(fetchOrders, { pageSize: 2 }).runBackfill('u1');

    // order 3 sits on the boundary and is returned by both of the first two windows
    expect(fetchOrders.mock.calls.map((call) => [call[1].from, call[2]])).toEqual([
      [APR_1, 0],
      [APR_1, 2],
      [JAN_1, 0],
      [JAN_1 - 91 * DAY, 0],
    ]);
    expect(report.ordersCollected).toBe(3);
    expect(report.windowsScanned).toBe(3);
  });

  it('aborts as incomplete at the order cap', async () => {
    const fetchOrders = fakeFetch([remoteOrder('1', NOW - DAY), remoteOrder('2', NOW - 2 * DAY), remoteOrder('3', NOW - 3 * DAY)]);

    const report = await importer(fetchOrders, { maxOrders: 2 }).runBackfill('u1');

    expect(report.final).toEqual({ kind: 'aborted', reason: 'max_orders' });
    expect(report.incomplete).toBe(true);
    expect(report.ordersCollected).toBe(2);
    expect(db.query('SELECT id FROM sales')).toHaveLength(2);
    expect(notifications.list('u1')[0]?.title).toBe('Sales import incomplete');
  });

  it('aborts as incomplete at the iteration cap', async () => {
    const report = await importer(fakeFetch([]), { maxIterations: 3, emptyWindowsToStop: 10 }).runBackfill('u1');

    expect(report.final).toEqual({ kind: 'aborted', reason: 'max_iterations' });
    expect(report.windowsScanned).toBe(3);
    expect(report.incomplete).toBe(true);
  });

  it('stops at the look-back horizon, clamping the last window', async () => {
    const fetchOrders = fakeFetch([]);
    const report = await importer(fetchOrders, { windowDays: 200, maxLookbackYears: 1, emptyWindowsToStop: 10 }).runBackfill('u1');

    expect(report.final).toEqual({ kind: 'exhausted', reason: 'lookback_horizon' });
    expect(fetchOrders.mock.calls.map((call) => [call[1].from, call[1].to])).toEqual([
      [NOW - 200 * DAY, NOW],
      [NOW - 365 * DAY, NOW - 200 * DAY],
    ]);
  });

  it('checkpoints every N windows', async () => {
    const checkpoints: BackfillCheckpoint[] = [];
    const report = await importer(fakeFetch([]), { windowDays: 10, emptyWindowsToStop: 5, checkpointEvery: 2 }).runBackfill('u1', {
      onCheckpoint: (checkpoint) => checkpoints.push(checkpoint),
    });

    expect(report.windowsScanned).toBe(5);
    expect(checkpoints.map((c) => [c.windowsScanned, c.oldestWindowStart])).toEqual([
      [2, NOW - 20 * DAY],
      [4, NOW - 40 * DAY],
    ]);
    expect(getWatermark(db, 'u1', 'orders_backfill')?.cursorAt).toBe(NOW - 50 * DAY);
  });

  it('finishes the current window and stops when cancelled', async () => {
    const controller = new AbortController();
    const fetchOrders = vi.fn(async (): Promise<OrderPage> => {
      controller.abort();
      return { orders: [], total: 0, failures: [] };
    });

    const backfill = importer(fetchOrders);
    const report = await backfill.runBackfill('u1', { signal: controller.signal });

    expect(report.final).toEqual({ kind: 'cancelled' });
    expect(report.windowsScanned).toBe(1);
    expect(fetchOrders).toHaveBeenCalledTimes(1);
    expect(backfill.latestRun('u1')?.status).toBe('cancelled');
    expect(notifications.list('u1')).toEqual([]);
  });

  it('detaches from the caller signal once the run finishes', async () => {
    const controller = new AbortController();
    const added = vi.spyOn(controller.signal, 'addEventListener');
    const removed = vi.spyOn(controller.signal, 'removeEventListener');

    const backfill = importer(fakeFetch([]));
    await backfill.runBackfill('u1', { signal: controller.signal });
    await backfill.runBackfill('u1', { signal: controller.signal });

    expect(added).toHaveBeenCalledTimes(2);
    expect(removed).toHaveBeenCalledTimes(2);
    expect(removed.mock.calls.map((call) => call[1])).toEqual(added.mock.calls.map((call) => call[1]));
  });

  it('records a failed window, keeps scanning, and retries it on request', async () => {
    let failing = true;
    const fetchOrders = vi.fn(async (_token: string, query: OrderQuery): Promise<OrderPage> => {
      if (failing && query.to === APR_1) throw new MarketplaceApiError('fetch orders', 400, 'bad filter');
      return { orders: [], total: 0, failures: [] };
    });
    const backfill = importer(fetchOrders);

    const report = await backfill.runBackfill('u1');

    expect(report.windowsScanned).toBe(4);
    expect(report.failedWindows).toBe(1);
    expect(report.incomplete).toBe(true);
    const [failed] = backfill.listFailedImports('u1');
    expect(failed).toMatchObject({
      kind: 'window',
      externalId: windowKey(JAN_1, APR_1),
      attempts: 1,
      error: 'fetch orders failed (400): bad filter',
    });
    expect(windowKey(JAN_1, APR_1)).toBe('2024-01-01T00:00:00.000Z..2024-04-01T00:00:00.000Z');

    failing = false;
    expect(await backfill.retryFailedImports('u1')).toEqual({ resolved: 1, failed: 0 });
    expect(backfill.listFailedImports('u1')).toEqual([]);
    expect(backfill.listFailedImports('u1', { includeResolved: true })).toHaveLength(1);
  });

  it('keeps unmappable orders as failed imports and counts retry attempts', async () => {
    const fetchOrders = vi.fn(async (_token: string, query: OrderQuery, offset: number): Promise<OrderPage> => {
      if (query.to === NOW && offset === 0) {
        return {
          orders: [],
          total: 1,
          failures: [{ externalId: '9001', payload: JSON.stringify({ orderId: '9001' }), error: 'lineItems: Required' }],
        };
      }
      return { orders: [], total: 0, failures: [] };
    });
    const backfill = importer(fetchOrders);

    const report = await backfill.runBackfill('u1');
    expect(report.failedOrders).toBe(1);
    // the first window held an order, so two more empty windows are needed
    expect(report.windowsScanned).toBe(3);

    expect(await backfill.retryFailedImports('u1')).toEqual({ resolved: 0, failed: 1 });
    expect(backfill.listFailedImports('u1')).toMatchObject([{ kind: 'order', externalId: '9001', attempts: 2 }]);
  });

  it('aborts with reconnect_required when the user has no usable credential', async () => {
    const fetchOrders = fakeFetch([]);
    const backfill = importer(fetchOrders);

    const report = await backfill.runBackfill('u2');

    expect(report.final).toEqual({ kind: 'aborted', reason: 'reconnect_required' });
    expect(report.windowsScanned).toBe(0);
    expect(fetchOrders).not.toHaveBeenCalled();
    expect(backfill.getRun(report.runId)).toMatchObject({ status: 'aborted', reason: 'reconnect_required' });
  });

  it('runs one backfill per user in the background and cancels it', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetchOrders = vi.fn(async (): Promise<OrderPage> => {
      await gate;
      return { orders: [], total: 0, failures: [] };
    });
    const backfill = importer(fetchOrders);

    const { runId } = backfill.startBackfill('u1');
    expect(backfill.isRunning('u1')).toBe(true);
    expect(() => backfill.startBackfill('u1')).toThrow(BackfillInProgressError);
    expect(backfill.cancelBackfill('u1')).toBe(true);
    expect(backfill.cancelBackfill('nobody')).toBe(false);

    release();
    await vi.waitFor(() => expect(backfill.isRunning('u1')).toBe(false));
    expect(backfill.getRun(runId)).toMatchObject({ status: 'cancelled', windowsScanned: 1 });
  });
});
