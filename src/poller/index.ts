/**
 * Poller - low-frequency fallback for users without push subscriptions
 *
 * Pulls orders and listings modified since the per-user watermarks, turns
 * them into synthetic events and feeds them through the same deduplicating
 * queue as pushed notifications. External ids are stable per object
 * (`order:<id>`, `listing:<id>:<lastModified>`) so overlapping polls and
 * pushes collapse.
 */

import { createLogger } from '../utils/logger';
import type { Database } from '../db/index';
import { CredentialError, errorMessage } from '../infra/errors';
import { RETRY_POLICIES, withRetry, type RetryOptions } from '../infra/retry';
import type { CredentialVault } from '../credentials/index';
import type { MarketplaceClient, RemoteListing, RemoteOrder } from '../marketplace/client';
import type { EventQueue, NewRawEvent } from '../queue/event-queue';
import type { SubscriptionManager } from '../subscriptions/manager';
import { advanceWatermark, getWatermark } from '../sync/watermarks';
import { eventObjectId, type MarketplaceEvent } from '../types';

const logger = createLogger('poller');

// =============================================================================
// TYPES
// =============================================================================

export interface PollerConfig {
  alwaysPoll: boolean;
  pageSize: number;
  /** How far back the first poll for a user reaches. */
  initialLookbackMs: number;
}

export interface PollerDeps {
  db: Database;
  vault: Pick<CredentialVault, 'getCredential' | 'listActiveUsers'>;
  client: Pick<MarketplaceClient, 'fetchOrders' | 'fetchListingsModifiedSince'>;
  queue: Pick<EventQueue, 'enqueue'>;
  subscriptions: Pick<SubscriptionManager, 'hasEnabledSubscriptions'>;
  retry?: RetryOptions;
}

export interface PollSummary {
  userId: string;
  skipped: boolean;
  orders: number;
  listings: number;
  accepted: number;
  duplicates: number;
  failed: number;
}

export interface PollAllSummary {
  polled: number;
  skipped: number;
  failed: number;
  accepted: number;
}

export interface Poller {
  pollUser(userId: string, now: number): Promise<PollSummary>;
  pollAll(now: number): Promise<PollAllSummary>;
}

// =============================================================================
// EVENT SYNTHESIS
// =============================================================================

function orderEvents(order: RemoteOrder, sellerUsername: string): Array<{ externalEventId: string; event: MarketplaceEvent }> {
  const occurredAt = order.lastModifiedAt ?? order.soldAt;
  const { lastModifiedAt: _modified, trackingNumber, carrier, ...snapshot } = order;
  // each modification is its own event, so later status or fee changes are not collapsed
  const saleId = order.lastModifiedAt === null ? `order:${order.orderId}` : `order:${order.orderId}:${order.lastModifiedAt}`;
  const events: Array<{ externalEventId: string; event: MarketplaceEvent }> = [
    { externalEventId: saleId, event: { topic: 'item_sold', sellerUsername, occurredAt, order: snapshot } },
  ];
  if (trackingNumber) {
    events.push({
      externalEventId: `order:${order.orderId}:shipped`,
      event: { topic: 'order_shipped', sellerUsername, occurredAt, orderId: order.orderId, trackingNumber, carrier },
    });
  }
  return events;
}

function listingEvent(listing: RemoteListing, sellerUsername: string): MarketplaceEvent {
  const { active, lastModifiedAt, ...snapshot } = listing;
  if (!active) {
    return { topic: 'item_ended', sellerUsername, occurredAt: lastModifiedAt, listingId: listing.listingId };
  }
  return { topic: 'item_listed', sellerUsername, occurredAt: lastModifiedAt, listing: snapshot };
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createPoller(deps: PollerDeps, config: PollerConfig): Poller {
  const { db } = deps;
  const retry = deps.retry ?? RETRY_POLICIES.marketplace.config;

  async function pollUser(userId: string, now: number): Promise<PollSummary> {
    const summary: PollSummary = { userId, skipped: false, orders: 0, listings: 0, accepted: 0, duplicates: 0, failed: 0 };
    if (!config.alwaysPoll && deps.subscriptions.hasEnabledSubscriptions(userId)) {
      return { ...summary, skipped: true };
    }

    const credential = deps.vault.getCredential(userId);
    const token = await credential.getAccessToken();
    const seller = credential.marketplaceUserId;

    function push(input: Omit<NewRawEvent, 'userId' | 'source' | 'receivedAt'>): void {
      const outcome = deps.queue.enqueue({ ...input, userId, source: 'poll', receivedAt: now });
      if (input.failure) summary.failed++;
      else if (outcome.status === 'accepted') summary.accepted++;
      else summary.duplicates++;
    }

    // Orders
    const ordersFrom = getWatermark(db, userId, 'orders_poll')?.cursorAt ?? now - config.initialLookbackMs;
    let newestOrder = ordersFrom;
    for (let offset = 0; ; offset += config.pageSize) {
      const page = await withRetry(
        () => deps.client.fetchOrders(token, { field: 'lastmodifieddate', from: ordersFrom, to: now }, offset, config.pageSize),
        retry,
      );
      for (const order of page.orders) {
        summary.orders++;
        newestOrder = Math.max(newestOrder, order.lastModifiedAt ?? order.soldAt ?? newestOrder);
        for (const { externalEventId, event } of orderEvents(order, seller)) {
          push({
            topic: event.topic,
            externalEventId,
            objectId: eventObjectId(event),
            rawPayload: JSON.stringify(order),
            event,
            occurredAt: event.occurredAt,
          });
        }
      }
      for (const failure of page.failures) {
        push({
          topic: 'item_sold',
          externalEventId: `order:${failure.externalId}`,
          objectId: failure.externalId,
          rawPayload: failure.payload,
          event: null,
          occurredAt: null,
          failure: { kind: 'parse', message: failure.error },
        });
      }
      const seen = page.orders.length + page.failures.length;
      if (seen === 0 || offset + seen >= page.total) break;
    }
    advanceWatermark(db, userId, 'orders_poll', newestOrder, now);

    // Listings
    const listingsFrom = getWatermark(db, userId, 'listings_poll')?.cursorAt ?? now - config.initialLookbackMs;
    const changes = await withRetry(() => deps.client.fetchListingsModifiedSince(token, listingsFrom, now), retry);
    let newestListing = listingsFrom;
    for (const listing of changes.listings) {
      summary.listings++;
      newestListing = Math.max(newestListing, listing.lastModifiedAt);
      const event = listingEvent(listing, seller);
      push({
        topic: event.topic,
        externalEventId: `listing:${listing.listingId}:${listing.lastModifiedAt}`,
        objectId: listing.listingId,
        rawPayload: JSON.stringify(listing),
        event,
        occurredAt: listing.lastModifiedAt,
      });
    }
    advanceWatermark(db, userId, 'listings_poll', newestListing, now);

    logger.info(summary, 'Poll complete');
    return summary;
  }

  return {
    pollUser,

    async pollAll(now) {
      const totals: PollAllSummary = { polled: 0, skipped: 0, failed: 0, accepted: 0 };
      for (const userId of deps.vault.listActiveUsers()) {
        try {
          const result = await pollUser(userId, now);
          if (result.skipped) {
            totals.skipped++;
          } else {
            totals.polled++;
            totals.accepted += result.accepted;
          }
        } catch (err) {
          totals.failed++;
          if (err instanceof CredentialError) {
            logger.warn({ userId, error: err.message }, 'Poll skipped, credential unusable');
          } else {
            logger.error({ userId, error: errorMessage(err) }, 'Poll failed');
          }
        }
      }
      return totals;
    },
  };
}
