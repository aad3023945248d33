/**
 * Shared domain types
 */

import { TOPIC_VALUES } from './utils/config';

// =============================================================================
// EVENTS
// =============================================================================

export type EventSource = 'push_json' | 'push_xml' | 'poll';

export type EventTopic = (typeof TOPIC_VALUES)[number];

export const ALL_TOPICS: readonly EventTopic[] = TOPIC_VALUES;

export function isEventTopic(value: string): value is EventTopic {
  return ALL_TOPICS.some((topic) => topic === value);
}

export type RawEventStatus = 'received' | 'processing' | 'processed' | 'failed';

export type RawEventErrorKind = 'parse' | 'processing' | 'unmapped' | 'stuck';

/** Listing fields carried by item events. Null means "not present in the payload". */
export interface ListingSnapshot {
  listingId: string;
  title: string | null;
  sku: string | null;
  customSku: string | null;
  price: number | null;
  quantity: number | null;
}

export interface SaleFees {
  marketplace: number;
  payment: number;
  shipping: number;
  other: number;
}

export type SaleStatus = 'pending' | 'paid' | 'shipped' | 'completed';

/** An order line as reported by the marketplace. */
export interface OrderSnapshot {
  orderId: string;
  listingId: string | null;
  title: string | null;
  sku: string | null;
  customSku: string | null;
  price: number;
  quantity: number;
  status: SaleStatus;
  fees: SaleFees;
  buyerUsername: string | null;
  soldAt: number | null;
}

interface EventBase {
  sellerUsername: string | null;
  /** Marketplace-side timestamp (epoch ms), when the payload carries one. */
  occurredAt: number | null;
}

export interface ItemListedEvent extends EventBase {
  topic: 'item_listed';
  listing: ListingSnapshot;
}

export interface ItemRelistedEvent extends EventBase {
  topic: 'item_relisted';
  listing: ListingSnapshot;
  previousListingId: string | null;
}

export interface ItemRevisedEvent extends EventBase {
  topic: 'item_revised';
  listing: ListingSnapshot;
}

export interface ItemEndedEvent extends EventBase {
  topic: 'item_ended';
  listingId: string;
}

export interface ItemSoldEvent extends EventBase {
  topic: 'item_sold';
  order: OrderSnapshot;
}

export interface ItemOutOfStockEvent extends EventBase {
  topic: 'item_out_of_stock';
  listingId: string;
}

export interface OrderShippedEvent extends EventBase {
  topic: 'order_shipped';
  orderId: string;
  trackingNumber: string | null;
  carrier: string | null;
}

export interface OrderDeliveredEvent extends EventBase {
  topic: 'order_delivered';
  orderId: string;
}

export type MarketplaceEvent =
  | ItemListedEvent
  | ItemRelistedEvent
  | ItemRevisedEvent
  | ItemEndedEvent
  | ItemSoldEvent
  | ItemOutOfStockEvent
  | OrderShippedEvent
  | OrderDeliveredEvent;

/** Listing or order id the event is about; used for per-object ordering and dedup. */
export function eventObjectId(event: MarketplaceEvent): string {
  switch (event.topic) {
    case 'item_listed':
    case 'item_relisted':
    case 'item_revised':
      return event.listing.listingId;
    case 'item_ended':
    case 'item_out_of_stock':
      return event.listingId;
    case 'item_sold':
      return event.order.orderId;
    case 'order_shipped':
    case 'order_delivered':
      return event.orderId;
  }
}

export interface RawEvent {
  id: string;
  userId: string | null;
  source: EventSource;
  topic: string;
  externalEventId: string | null;
  dedupKey: string;
  objectId: string | null;
  rawPayload: string;
  event: MarketplaceEvent | null;
  status: RawEventStatus;
  errorKind: RawEventErrorKind | null;
  error: string | null;
  retryCount: number;
  duplicateCount: number;
  mutation: string | null;
  receivedAt: number;
  occurredAt: number | null;
  startedAt: number | null;
  processedAt: number | null;
  nextAttemptAt: number | null;
}

// =============================================================================
// INVENTORY
// =============================================================================

export type EndReason = 'sold' | 'unsold';

export interface Item {
  id: string;
  userId: string;
  externalListingId: string | null;
  sku: string | null;
  customSku: string | null;
  title: string;
  price: number | null;
  costBasis: number | null;
  quantity: number;
  active: boolean;
  locationCode: string | null;
  endedAt: number | null;
  endReason: EndReason | null;
  soldAt: number | null;
  lastEventAt: number | null;
  lastSyncedAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export type MatchMethod = 'listing_id' | 'custom_sku' | 'sku' | 'title' | 'fuzzy_title' | 'manual';

export interface Sale {
  id: string;
  userId: string;
  externalOrderId: string;
  listingId: string | null;
  title: string | null;
  sku: string | null;
  customSku: string | null;
  price: number;
  quantity: number;
  cost: number | null;
  fees: SaleFees;
  status: SaleStatus;
  itemId: string | null;
  matchMethod: MatchMethod | null;
  buyerUsername: string | null;
  trackingNumber: string | null;
  carrier: string | null;
  soldAt: number | null;
  shippedAt: number | null;
  deliveredAt: number | null;
  createdAt: number;
  updatedAt: number;
}

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export type NotificationType = 'info' | 'success' | 'warning' | 'error';

export interface UserNotification {
  id: string;
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  source: string;
  readAt: number | null;
  createdAt: number;
}
