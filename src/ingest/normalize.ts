/**
 * Payload normalization
 *
 * Turns the two inbound push formats into a MarketplaceEvent:
 * - JSON notifications: { metadata: { topic, ... }, notification: { ... } }
 * - Legacy SOAP/XML platform notifications: Envelope > Body > <Call>Response
 *
 * Never throws. Anything that cannot be turned into a known event comes back
 * as { ok: false, reason } so the receiver can persist it as a parse failure.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { EventSource, EventTopic, MarketplaceEvent, SaleFees, SaleStatus } from '../types';
import { eventObjectId } from '../types';
import { LEGACY_EVENT_NAMES, topicFromRemoteId } from '../marketplace/topics';
import { child, isNode, numberText, text, type XmlNode } from '../marketplace/xml';

// =============================================================================
// TYPES
// =============================================================================

interface DeliveryMeta {
  source: EventSource;
  /** Topic as named by the payload (or our topic when recognised). */
  topic: string;
  externalEventId: string | null;
  sellerUsername: string | null;
  occurredAt: number | null;
  objectId: string | null;
}

export type NormalizeResult =
  | (DeliveryMeta & { ok: true; event: MarketplaceEvent })
  | (DeliveryMeta & { ok: false; reason: string });

type Built = { ok: true; event: MarketplaceEvent } | { ok: false; reason: string; objectId: string | null };

// =============================================================================
// SHARED HELPERS
// =============================================================================

const ZERO_FEES: SaleFees = { marketplace: 0, payment: 0, shipping: 0, other: 0 };

export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function blankToNull(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function paymentStatusToSale(value: string | null | undefined): SaleStatus {
  if (!value) return 'pending';
  const upper = value.toUpperCase();
  return upper === 'PAID' || upper === 'CHECKOUTCOMPLETE' || upper === 'COMPLETE' ? 'paid' : 'pending';
}

// =============================================================================
// JSON NOTIFICATIONS
// =============================================================================

const idish = z.union([z.string().trim().min(1), z.number().int().nonnegative().transform((n) => String(n))]);

const numberish = z.union([
  z.number(),
  z
    .string()
    .trim()
    .min(1)
    .transform((raw, ctx) => {
      const parsed = Number(raw);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a number' });
        return z.NEVER;
      }
      return parsed;
    }),
]);

const money = z.union([numberish, z.object({ value: numberish }).transform((amount) => amount.value)]);

const envelopeSchema = z.object({
  metadata: z
    .object({
      topic: z.string().min(1),
      eventId: z.string().optional(),
      timestamp: z.string().optional(),
    })
    .passthrough(),
  notification: z
    .object({
      notificationId: z.string().optional(),
      eventDate: z.string().optional(),
      data: z.record(z.unknown()).optional(),
    })
    .passthrough(),
});

const sellerSchema = z.object({
  sellerUsername: z.string().optional(),
  username: z.string().optional(),
  seller: z.object({ username: z.string().optional() }).optional(),
});

const listingDataSchema = z.object({
  itemId: idish,
  title: z.string().optional(),
  sku: z.string().optional(),
  customSku: z.string().optional(),
  price: money.optional(),
  quantity: numberish.optional(),
  previousItemId: idish.optional(),
});

const listingRefSchema = z.object({ itemId: idish });

const soldDataSchema = z
  .object({
    orderId: idish.optional(),
    itemId: idish.optional(),
    transactionId: idish.optional(),
    title: z.string().optional(),
    sku: z.string().optional(),
    customSku: z.string().optional(),
    soldPrice: money.optional(),
    price: money.optional(),
    quantity: numberish.optional(),
    buyerId: z.string().optional(),
    buyerUsername: z.string().optional(),
    paymentStatus: z.string().optional(),
    soldDate: z.string().optional(),
    fees: z
      .object({
        marketplace: money.optional(),
        payment: money.optional(),
        shipping: money.optional(),
        other: money.optional(),
      })
      .optional(),
  })
  .refine((data) => data.orderId !== undefined || data.itemId !== undefined, {
    message: 'orderId or itemId is required',
  });

const shippedDataSchema = z.object({
  orderId: idish,
  trackingNumber: z.string().optional(),
  carrier: z.string().optional(),
  shippingCarrierCode: z.string().optional(),
});

const orderRefSchema = z.object({ orderId: idish });

function sellerFromJson(data: Record<string, unknown>): string | null {
  const parsed = sellerSchema.safeParse(data);
  if (!parsed.success) return null;
  return blankToNull(parsed.data.sellerUsername ?? parsed.data.username ?? parsed.data.seller?.username);
}

function buildJsonEvent(
  topic: EventTopic,
  data: Record<string, unknown>,
  base: { sellerUsername: string | null; occurredAt: number | null },
  externalEventId: string | null,
): Built {
  switch (topic) {
    case 'item_listed':
    case 'item_relisted':
    case 'item_revised': {
      const parsed = listingDataSchema.safeParse(data);
      if (!parsed.success) return { ok: false, reason: formatIssues(parsed.error), objectId: null };
      const d = parsed.data;
      const listing = {
        listingId: d.itemId,
        title: blankToNull(d.title),
        sku: blankToNull(d.sku),
        customSku: blankToNull(d.customSku),
        price: d.price ?? null,
        quantity: d.quantity === undefined ? null : Math.max(0, Math.trunc(d.quantity)),
      };
      if (topic === 'item_relisted') {
        return {
          ok: true,
          event: { topic, listing, previousListingId: d.previousItemId ?? null, ...base },
        };
      }
      return { ok: true, event: { topic, listing, ...base } };
    }

    case 'item_ended':
    case 'item_out_of_stock': {
      const parsed = listingRefSchema.safeParse(data);
      if (!parsed.success) return { ok: false, reason: formatIssues(parsed.error), objectId: null };
      return { ok: true, event: { topic, listingId: parsed.data.itemId, ...base } };
    }

    case 'item_sold': {
      const parsed = soldDataSchema.safeParse(data);
      if (!parsed.success) return { ok: false, reason: formatIssues(parsed.error), objectId: null };
      const d = parsed.data;
      const listingId = d.itemId ?? null;
      const orderId =
        d.orderId ??
        (d.transactionId !== undefined
          ? `${listingId}-${d.transactionId}`
          : externalEventId !== null
            ? `${listingId}-${externalEventId}`
            : `${listingId}`);
      return {
        ok: true,
        event: {
          topic,
          order: {
            orderId,
            listingId,
            title: blankToNull(d.title),
            sku: blankToNull(d.sku),
            customSku: blankToNull(d.customSku),
            price: round2(d.soldPrice ?? d.price ?? 0),
            quantity: Math.max(1, Math.trunc(d.quantity ?? 1)),
            status: paymentStatusToSale(d.paymentStatus),
            fees: {
              marketplace: d.fees?.marketplace ?? 0,
              payment: d.fees?.payment ?? 0,
              shipping: d.fees?.shipping ?? 0,
              other: d.fees?.other ?? 0,
            },
            buyerUsername: blankToNull(d.buyerUsername ?? d.buyerId),
            soldAt: parseTimestamp(d.soldDate) ?? base.occurredAt,
          },
          ...base,
        },
      };
    }

    case 'order_shipped': {
      const parsed = shippedDataSchema.safeParse(data);
      if (!parsed.success) return { ok: false, reason: formatIssues(parsed.error), objectId: null };
      const d = parsed.data;
      return {
        ok: true,
        event: {
          topic,
          orderId: d.orderId,
          trackingNumber: blankToNull(d.trackingNumber),
          carrier: blankToNull(d.carrier ?? d.shippingCarrierCode),
          ...base,
        },
      };
    }

    case 'order_delivered': {
      const parsed = orderRefSchema.safeParse(data);
      if (!parsed.success) return { ok: false, reason: formatIssues(parsed.error), objectId: null };
      return { ok: true, event: { topic, orderId: parsed.data.orderId, ...base } };
    }
  }
}

/** Best-effort object id for a payload we could not fully parse. */
function looseObjectId(data: Record<string, unknown>): string | null {
  for (const key of ['orderId', 'itemId', 'listingId']) {
    const value = data[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return null;
}

export function normalizeJson(body: string): NormalizeResult {
  const unknownMeta: DeliveryMeta = {
    source: 'push_json',
    topic: 'unknown',
    externalEventId: null,
    sellerUsername: null,
    occurredAt: null,
    objectId: null,
  };

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    return { ...unknownMeta, ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return { ...unknownMeta, ok: false, reason: `invalid envelope: ${formatIssues(envelope.error)}` };
  }

  const { metadata, notification } = envelope.data;
  const data: Record<string, unknown> = notification.data ?? notification;
  const meta: DeliveryMeta = {
    source: 'push_json',
    topic: metadata.topic,
    externalEventId: blankToNull(notification.notificationId ?? metadata.eventId),
    sellerUsername: sellerFromJson(data),
    occurredAt: parseTimestamp(notification.eventDate ?? metadata.timestamp),
    objectId: looseObjectId(data),
  };

  const topic = topicFromRemoteId(metadata.topic);
  if (!topic) {
    return { ...meta, ok: false, reason: `unsupported topic ${metadata.topic}` };
  }

  const built = buildJsonEvent(topic, data, { sellerUsername: meta.sellerUsername, occurredAt: meta.occurredAt }, meta.externalEventId);
  if (!built.ok) {
    return { ...meta, topic, objectId: built.objectId ?? meta.objectId, ok: false, reason: built.reason };
  }
  return { ...meta, topic, objectId: eventObjectId(built.event), ok: true, event: built.event };
}

// =============================================================================
// LEGACY XML NOTIFICATIONS
// =============================================================================

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
});

function responseTopic(callName: string, eventName: string | null): EventTopic | null {
  if (eventName && LEGACY_EVENT_NAMES[eventName]) return LEGACY_EVENT_NAMES[eventName];
  if (callName.includes('GetItemTransactions')) return 'item_sold';
  if (callName.includes('GetItem')) return 'item_listed';
  if (callName.includes('ReviseItem')) return 'item_revised';
  if (callName.includes('RelistItem')) return 'item_relisted';
  if (callName.includes('EndItem')) return 'item_ended';
  return null;
}

function availableQuantity(item: XmlNode): number | null {
  const total = numberText(item, 'Quantity');
  if (total === null) return null;
  const sold = numberText(child(item, 'SellingStatus'), 'QuantitySold') ?? 0;
  return Math.max(0, Math.trunc(total - sold));
}

function buildXmlEvent(
  topic: EventTopic,
  response: XmlNode,
  base: { sellerUsername: string | null; occurredAt: number | null },
): Built {
  const item = child(response, 'Item');
  const listingId = text(item, 'ItemID') ?? text(response, 'ItemID');

  switch (topic) {
    case 'item_listed':
    case 'item_relisted':
    case 'item_revised': {
      if (!item || !listingId) return { ok: false, reason: 'Item/ItemID missing', objectId: listingId };
      const listing = {
        listingId,
        title: text(item, 'Title'),
        sku: null,
        customSku: text(item, 'SKU'),
        price: numberText(item, 'StartPrice') ?? numberText(item, 'BuyItNowPrice'),
        quantity: availableQuantity(item),
      };
      if (topic === 'item_relisted') {
        return {
          ok: true,
          event: { topic, listing, previousListingId: text(item, 'RelistParentID') ?? text(response, 'OriginalItemID'), ...base },
        };
      }
      return { ok: true, event: { topic, listing, ...base } };
    }

    case 'item_ended':
    case 'item_out_of_stock':
      if (!listingId) return { ok: false, reason: 'ItemID missing', objectId: null };
      return { ok: true, event: { topic, listingId, ...base } };

    case 'item_sold': {
      const transaction = child(child(response, 'TransactionArray'), 'Transaction');
      if (!transaction) return { ok: false, reason: 'TransactionArray/Transaction missing', objectId: listingId };
      const transactionId = text(transaction, 'TransactionID');
      const orderId =
        text(child(transaction, 'ContainingOrder'), 'OrderID') ??
        text(transaction, 'OrderLineItemID') ??
        (listingId && transactionId ? `${listingId}-${transactionId}` : null);
      if (!orderId) return { ok: false, reason: 'order id missing', objectId: listingId };
      const quantity = Math.max(1, Math.trunc(numberText(transaction, 'QuantityPurchased') ?? 1));
      const unitPrice = numberText(transaction, 'TransactionPrice') ?? numberText(item, 'StartPrice') ?? 0;
      const checkout = text(child(transaction, 'Status'), 'CheckoutStatus');
      return {
        ok: true,
        event: {
          topic,
          order: {
            orderId,
            listingId,
            title: text(item, 'Title'),
            sku: null,
            customSku: text(item, 'SKU'),
            price: numberText(transaction, 'AmountPaid') ?? round2(unitPrice * quantity),
            quantity,
            status: paymentStatusToSale(checkout),
            fees: { ...ZERO_FEES, marketplace: numberText(transaction, 'FinalValueFee') ?? 0 },
            buyerUsername: text(child(transaction, 'Buyer'), 'UserID'),
            soldAt: parseTimestamp(text(transaction, 'CreatedDate')) ?? base.occurredAt,
          },
          ...base,
        },
      };
    }

    case 'order_shipped': {
      const transaction = child(child(response, 'TransactionArray'), 'Transaction');
      const orderId =
        text(child(transaction, 'ContainingOrder'), 'OrderID') ?? text(transaction, 'OrderLineItemID') ?? text(response, 'OrderID');
      if (!orderId) return { ok: false, reason: 'order id missing', objectId: listingId };
      const tracking = child(child(transaction, 'ShippingDetails'), 'ShipmentTrackingDetails');
      return {
        ok: true,
        event: {
          topic,
          orderId,
          trackingNumber: text(tracking, 'ShipmentTrackingNumber'),
          carrier: text(tracking, 'ShippingCarrierUsed'),
          ...base,
        },
      };
    }

    case 'order_delivered': {
      const orderId = text(response, 'OrderID');
      if (!orderId) return { ok: false, reason: 'OrderID missing', objectId: listingId };
      return { ok: true, event: { topic, orderId, ...base } };
    }
  }
}

export function normalizeXml(body: string): NormalizeResult {
  const meta: DeliveryMeta = {
    source: 'push_xml',
    topic: 'unknown',
    externalEventId: null,
    sellerUsername: null,
    occurredAt: null,
    objectId: null,
  };

  if (!body.trim()) {
    return { ...meta, ok: false, reason: 'empty body' };
  }

  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    return { ...meta, ok: false, reason: `invalid XML: ${validation.err.msg} (line ${validation.err.line})` };
  }

  let document: unknown;
  try {
    document = xmlParser.parse(body);
  } catch (err) {
    return { ...meta, ok: false, reason: `invalid XML: ${err instanceof Error ? err.message : String(err)}` };
  }

  const root = isNode(document) ? document : undefined;
  const soapBody = child(child(root, 'Envelope'), 'Body') ?? child(root, 'Body');
  if (!soapBody) {
    return { ...meta, ok: false, reason: 'SOAP Body not found' };
  }

  const callName = Object.keys(soapBody).find((key) => key !== 'Header' && !key.startsWith('xmlns') && isNode(soapBody[key]));
  const response = callName ? child(soapBody, callName) : undefined;
  if (!callName || !response) {
    return { ...meta, ok: false, reason: 'notification element not found' };
  }

  const item = child(response, 'Item');
  const eventName = text(response, 'NotificationEventName');
  const sellerUsername = text(response, 'RecipientUserID') ?? text(child(item, 'Seller'), 'UserID');
  const occurredAt = parseTimestamp(text(response, 'Timestamp'));
  const described: DeliveryMeta = {
    ...meta,
    topic: eventName ?? callName,
    sellerUsername,
    occurredAt,
    objectId: text(item, 'ItemID'),
  };

  const topic = responseTopic(callName, eventName);
  if (!topic) {
    return { ...described, ok: false, reason: `unsupported notification ${eventName ?? callName}` };
  }

  const built = buildXmlEvent(topic, response, { sellerUsername, occurredAt });
  if (!built.ok) {
    return { ...described, topic, objectId: built.objectId ?? described.objectId, ok: false, reason: built.reason };
  }
  return { ...described, topic, objectId: eventObjectId(built.event), ok: true, event: built.event };
}

export function normalizeDelivery(source: 'push_json' | 'push_xml', body: string): NormalizeResult {
  return source === 'push_json' ? normalizeJson(body) : normalizeXml(body);
}
