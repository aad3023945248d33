/**
 * Mapping between internal topics and the marketplace's names for them:
 * REST notification topic ids (JSON push) and legacy platform-notification
 * event names (XML push).
 */

import { ALL_TOPICS, type EventTopic } from '../types';

/** Topic id used when subscribing through the notification REST API. */
export const REMOTE_TOPIC_IDS: Record<EventTopic, string> = {
  item_listed: 'ITEM_LISTED',
  item_relisted: 'ITEM_RELISTED',
  item_revised: 'ITEM_REVISED',
  item_ended: 'ITEM_ENDED',
  item_sold: 'ITEM_SOLD',
  item_out_of_stock: 'ITEM_OUT_OF_STOCK',
  order_shipped: 'FULFILLMENT_ORDER_SHIPPED',
  order_delivered: 'FULFILLMENT_ORDER_DELIVERED',
};

/** Inbound JSON topic ids; a few legacy aliases map onto the same topic. */
const JSON_TOPIC_ALIASES: Record<string, EventTopic> = {
  ITEM_PRICE_CHANGE: 'item_revised',
  ITEM_CLOSED: 'item_ended',
  ORDER_SHIPPED: 'order_shipped',
  ORDER_DELIVERED: 'order_delivered',
};

export function topicFromRemoteId(remote: string): EventTopic | null {
  const upper = remote.trim().toUpperCase();
  const direct = ALL_TOPICS.find((topic) => REMOTE_TOPIC_IDS[topic] === upper);
  return direct ?? JSON_TOPIC_ALIASES[upper] ?? null;
}

/** Legacy notification event names, as carried in NotificationEventName. */
export const LEGACY_EVENT_NAMES: Record<string, EventTopic> = {
  ItemListed: 'item_listed',
  ItemRelisted: 'item_relisted',
  ItemRevised: 'item_revised',
  ItemClosed: 'item_ended',
  ItemUnsold: 'item_ended',
  ItemSold: 'item_sold',
  FixedPriceTransaction: 'item_sold',
  AuctionCheckoutComplete: 'item_sold',
  ItemOutOfStock: 'item_out_of_stock',
  ItemMarkedShipped: 'order_shipped',
};

/** Events enabled through the legacy preferences call, per topic. */
export const LEGACY_PREFERENCE_EVENTS: Record<EventTopic, string[]> = {
  item_listed: ['ItemListed'],
  item_relisted: ['ItemRelisted'],
  item_revised: ['ItemRevised'],
  item_ended: ['ItemClosed', 'ItemUnsold'],
  item_sold: ['FixedPriceTransaction', 'ItemSold'],
  item_out_of_stock: ['ItemOutOfStock'],
  order_shipped: ['ItemMarkedShipped'],
  order_delivered: [],
};
