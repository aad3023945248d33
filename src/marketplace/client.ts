/**
 * Marketplace API client - orders, listings, relisting
 *
 * Endpoints:
 * - GET  /sell/fulfillment/v1/order       orders by creation / modification date (paged)
 * - POST /ws/api.dll GetSellerEvents      listings modified in a time range
 * - POST /ws/api.dll ReviseFixedPriceItem in-place price change
 * - POST /ws/api.dll EndFixedPriceItem + RelistFixedPriceItem  end-and-recreate
 *
 * Every method takes the access token from the caller's vault capability;
 * the client itself holds no user state.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { MarketplaceApiError } from '../infra/errors';
import type { ListingSnapshot, OrderSnapshot, SaleStatus } from '../types';
import { apiJson, bearer, API_BASE, type MarketplaceEnvironment } from './http';
import { createTradingCall, type TradingCall } from './trading';
import { child, children, numberText, text, type XmlNode } from './xml';

const logger = createLogger('marketplace-client');

// =============================================================================
// TYPES
// =============================================================================

export interface OrderQuery {
  field: 'creationdate' | 'lastmodifieddate';
  from: number;
  /** Open-ended when null. */
  to: number | null;
}

export interface RemoteOrder extends OrderSnapshot {
  lastModifiedAt: number | null;
  trackingNumber: string | null;
  carrier: string | null;
}

/** An order on a page that could not be mapped. */
export interface OrderFailure {
  externalId: string;
  payload: string;
  error: string;
}

export interface OrderPage {
  orders: RemoteOrder[];
  total: number;
  failures: OrderFailure[];
}

export interface RemoteListing extends ListingSnapshot {
  active: boolean;
  lastModifiedAt: number;
}

export interface ListingChanges {
  listings: RemoteListing[];
  /** Marketplace clock at the time of the response. */
  asOf: number;
}

export interface MarketplaceClient {
  fetchOrders(accessToken: string, query: OrderQuery, offset: number, limit: number): Promise<OrderPage>;
  fetchListingsModifiedSince(accessToken: string, since: number, until: number): Promise<ListingChanges>;
  /** Present only when listings can be repriced in place. */
  reviseListingPrice?(accessToken: string, listingId: string, price: number): Promise<void>;
  /** End the listing and publish it again; resolves to the new listing id. */
  endAndRecreate(accessToken: string, listingId: string, price: number): Promise<string>;
}

export interface MarketplaceClientOptions {
  environment: MarketplaceEnvironment;
  requestTimeoutMs: number;
  relistStrategy: 'revise' | 'recreate';
  tradingCall?: TradingCall;
}

// =============================================================================
// ORDER MAPPING
// =============================================================================

const amountSchema = z
  .object({ value: z.union([z.string(), z.number()]) })
  .transform((amount) => {
    const parsed = Number(amount.value);
    return Number.isFinite(parsed) ? parsed : 0;
  });

const lineItemSchema = z.object({
  lineItemId: z.string().optional(),
  legacyItemId: z.string().optional(),
  sku: z.string().optional(),
  title: z.string().optional(),
  quantity: z.number().int().positive().optional(),
  total: amountSchema.optional(),
  lineItemCost: amountSchema.optional(),
  deliveryCost: z.object({ shippingCost: amountSchema.optional() }).optional(),
});

const fulfillmentSchema = z.object({
  shipmentTrackingNumber: z.string().optional(),
  shippingCarrierCode: z.string().optional(),
});

const orderSchema = z.object({
  orderId: z.string().min(1),
  creationDate: z.string().optional(),
  lastModifiedDate: z.string().optional(),
  orderFulfillmentStatus: z.string().optional(),
  orderPaymentStatus: z.string().optional(),
  buyer: z.object({ username: z.string().optional() }).optional(),
  totalMarketplaceFee: amountSchema.optional(),
  lineItems: z.array(lineItemSchema).min(1),
  fulfillments: z.array(fulfillmentSchema).optional(),
});

const orderPageSchema = z.object({
  total: z.number().int().nonnegative().default(0),
  orders: z.array(z.unknown()).default([]),
});

function parseDate(value: string | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function emptyToNull(value: string | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

function orderStatus(fulfillment: string | undefined, payment: string | undefined): SaleStatus {
  if (fulfillment === 'FULFILLED') return 'completed';
  if (fulfillment === 'IN_PROGRESS') return 'shipped';
  return payment === 'PAID' ? 'paid' : 'pending';
}

/**
 * Map one order resource. Multi-line orders are represented by their first
 * line item; quantity and price cover that line.
 */
export function mapRemoteOrder(raw: unknown): RemoteOrder {
  const order = orderSchema.parse(raw);
  const line = order.lineItems[0];
  const tracking = order.fulfillments?.[0];
  return {
    orderId: order.orderId,
    listingId: emptyToNull(line.legacyItemId),
    title: emptyToNull(line.title),
    sku: emptyToNull(line.sku),
    customSku: null,
    price: line.total ?? line.lineItemCost ?? 0,
    quantity: line.quantity ?? 1,
    status: orderStatus(order.orderFulfillmentStatus, order.orderPaymentStatus),
    fees: {
      marketplace: order.totalMarketplaceFee ?? 0,
      payment: 0,
      shipping: line.deliveryCost?.shippingCost ?? 0,
      other: 0,
    },
    buyerUsername: emptyToNull(order.buyer?.username),
    soldAt: parseDate(order.creationDate),
    lastModifiedAt: parseDate(order.lastModifiedDate),
    trackingNumber: emptyToNull(tracking?.shipmentTrackingNumber),
    carrier: emptyToNull(tracking?.shippingCarrierCode),
  };
}

export function orderFilter(query: OrderQuery): string {
  const from = new Date(query.from).toISOString();
  const to = query.to === null ? '' : new Date(query.to).toISOString();
  return `${query.field}:[${from}..${to}]`;
}

function describeFailure(raw: unknown, fallbackId: string, err: unknown): OrderFailure {
  const parsed = z.object({ orderId: z.string() }).safeParse(raw);
  let message = err instanceof Error ? err.message : String(err);
  if (err instanceof z.ZodError) {
    message = err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  }
  return {
    externalId: parsed.success ? parsed.data.orderId : fallbackId,
    payload: JSON.stringify(raw) ?? 'null',
    error: message,
  };
}

// =============================================================================
// LISTING MAPPING
// =============================================================================

export function mapSellerEventItem(item: XmlNode, asOf: number): RemoteListing | null {
  const listingId = text(item, 'ItemID');
  if (!listingId) return null;
  const selling = child(item, 'SellingStatus');
  const total = numberText(item, 'Quantity');
  const sold = numberText(selling, 'QuantitySold') ?? 0;
  const status = text(selling, 'ListingStatus');
  return {
    listingId,
    title: text(item, 'Title'),
    sku: null,
    customSku: text(item, 'SKU'),
    price: numberText(selling, 'CurrentPrice') ?? numberText(item, 'StartPrice'),
    quantity: total === null ? null : Math.max(0, Math.trunc(total - sold)),
    active: status === null || status === 'Active',
    lastModifiedAt: asOf,
  };
}

// =============================================================================
// FACTORY
// =============================================================================

export function createMarketplaceClient(options: MarketplaceClientOptions): MarketplaceClient {
  const baseUrl = API_BASE[options.environment];
  const trading = options.tradingCall ?? createTradingCall(options);

  const client: MarketplaceClient = {
    async fetchOrders(accessToken, query, offset, limit) {
      const params = new URLSearchParams({
        filter: orderFilter(query),
        limit: String(limit),
        offset: String(offset),
      });
      const page = await apiJson(
        'fetch orders',
        `${baseUrl}/sell/fulfillment/v1/order?${params.toString()}`,
        { headers: { ...bearer(accessToken), Accept: 'application/json' }, timeoutMs: options.requestTimeoutMs },
        orderPageSchema,
      );

      const orders: RemoteOrder[] = [];
      const failures: OrderFailure[] = [];
      page.orders.forEach((raw, index) => {
        try {
          orders.push(mapRemoteOrder(raw));
        } catch (err) {
          failures.push(describeFailure(raw, `offset:${offset + index}`, err));
        }
      });

      if (failures.length > 0) {
        logger.warn({ offset, failed: failures.length }, 'Some orders on page could not be mapped');
      }
      return { orders, total: page.total, failures };
    },

    async fetchListingsModifiedSince(accessToken, since, until) {
      const response = await trading('GetSellerEvents', accessToken, {
        ModTimeFrom: new Date(since).toISOString(),
        ModTimeTo: new Date(until).toISOString(),
        DetailLevel: 'ReturnAll',
      });
      const asOf = Date.parse(text(response, 'Timestamp') ?? '');
      const stamp = Number.isNaN(asOf) ? until : asOf;
      const listings = children(child(response, 'ItemArray'), 'Item')
        .map((item) => mapSellerEventItem(item, stamp))
        .filter((listing): listing is RemoteListing => listing !== null);
      return { listings, asOf: stamp };
    },

    async endAndRecreate(accessToken, listingId, price) {
      try {
        await trading('EndFixedPriceItem', accessToken, { ItemID: listingId, EndingReason: 'NotAvailable' });
      } catch (err) {
        // 1047: listing already ended; relisting still applies
        if (!(err instanceof MarketplaceApiError && err.body.startsWith('1047:'))) throw err;
        logger.info({ listingId }, 'Listing already ended, relisting');
      }
      const response = await trading('RelistFixedPriceItem', accessToken, {
        Item: { ItemID: listingId, StartPrice: price.toFixed(2) },
      });
      const newListingId = text(response, 'ItemID');
      if (!newListingId) {
        throw new MarketplaceApiError('RelistFixedPriceItem', 200, 'response carried no ItemID');
      }
      logger.info({ listingId, newListingId, price }, 'Listing recreated');
      return newListingId;
    },
  };

  if (options.relistStrategy === 'revise') {
    client.reviseListingPrice = async (accessToken, listingId, price) => {
      await trading('ReviseFixedPriceItem', accessToken, { Item: { ItemID: listingId, StartPrice: price.toFixed(2) } });
      logger.info({ listingId, price }, 'Listing price revised');
    };
  }

  return client;
}
