/**
 * Schema for normalized events as stored in raw_events.event_json.
 */

import { z } from 'zod';
import type { MarketplaceEvent } from '../types';

const base = {
  sellerUsername: z.string().nullable(),
  occurredAt: z.number().nullable(),
};

const listingSnapshot = z.object({
  listingId: z.string(),
  title: z.string().nullable(),
  sku: z.string().nullable(),
  customSku: z.string().nullable(),
  price: z.number().nullable(),
  quantity: z.number().nullable(),
});

export const orderSnapshotSchema = z.object({
  orderId: z.string(),
  listingId: z.string().nullable(),
  title: z.string().nullable(),
  sku: z.string().nullable(),
  customSku: z.string().nullable(),
  price: z.number(),
  quantity: z.number(),
  status: z.enum(['pending', 'paid', 'shipped', 'completed']),
  fees: z.object({ marketplace: z.number(), payment: z.number(), shipping: z.number(), other: z.number() }),
  buyerUsername: z.string().nullable(),
  soldAt: z.number().nullable(),
});

export const marketplaceEventSchema = z.discriminatedUnion('topic', [
  z.object({ topic: z.literal('item_listed'), listing: listingSnapshot, ...base }),
  z.object({ topic: z.literal('item_relisted'), listing: listingSnapshot, previousListingId: z.string().nullable(), ...base }),
  z.object({ topic: z.literal('item_revised'), listing: listingSnapshot, ...base }),
  z.object({ topic: z.literal('item_ended'), listingId: z.string(), ...base }),
  z.object({ topic: z.literal('item_sold'), order: orderSnapshotSchema, ...base }),
  z.object({ topic: z.literal('item_out_of_stock'), listingId: z.string(), ...base }),
  z.object({
    topic: z.literal('order_shipped'),
    orderId: z.string(),
    trackingNumber: z.string().nullable(),
    carrier: z.string().nullable(),
    ...base,
  }),
  z.object({ topic: z.literal('order_delivered'), orderId: z.string(), ...base }),
]);

export function parseStoredEvent(json: string | null): MarketplaceEvent | null {
  if (!json) return null;
  const result = marketplaceEventSchema.safeParse(JSON.parse(json));
  return result.success ? result.data : null;
}
