import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MarketplaceApiError, NotFoundError } from '../infra/errors';
import { RateLimitError } from '../infra/retry';
import { createMarketplaceClient, mapRemoteOrder, orderFilter } from './client';
import { createNotificationClient } from './notification';
import { buildTradingRequest, checkAck, type TradingCall } from './trading';

const mockFetch = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

const SAMPLE_ORDER = {
  orderId: '12-34567-89012',
  creationDate: '2024-03-10T15:00:00.000Z',
  lastModifiedDate: '2024-03-11T09:30:00.000Z',
  orderFulfillmentStatus: 'NOT_STARTED',
  orderPaymentStatus: 'PAID',
  buyer: { username: 'buyer_7' },
  totalMarketplaceFee: { value: '3.25', currency: 'USD' },
  lineItems: [
    {
      lineItemId: '1',
      legacyItemId: '2233',
      sku: 'SKU-9',
      title: 'Ceramic Mug',
      quantity: 2,
      total: { value: '30.00', currency: 'USD' },
      deliveryCost: { shippingCost: { value: '5.50', currency: 'USD' } },
    },
  ],
};

describe('mapRemoteOrder', () => {
  it('maps the first line item of an order', () => {
    expect(mapRemoteOrder(SAMPLE_ORDER)).toEqual({
      orderId: '12-34567-89012',
      listingId: '2233',
      title: 'Ceramic Mug',
      sku: 'SKU-9',
      customSku: null,
      price: 30,
      quantity: 2,
      status: 'paid',
      fees: { marketplace: 3.25, payment: 0, shipping: 5.5, other: 0 },
      buyerUsername: 'buyer_7',
      soldAt: Date.parse('2024-03-10T15:00:00.000Z'),
      lastModifiedAt: Date.parse('2024-03-11T09:30:00.000Z'),
      trackingNumber: null,
      carrier: null,
    });
  });

  it('maps fulfillment states onto sale status', () => {
    expect(mapRemoteOrder({ ...SAMPLE_ORDER, orderFulfillmentStatus: 'FULFILLED' }).status).toBe('completed');
    expect(mapRemoteOrder({ ...SAMPLE_ORDER, orderFulfillmentStatus: 'IN_PROGRESS' }).status).toBe('shipped');
    expect(mapRemoteOrder({ ...SAMPLE_ORDER, orderPaymentStatus: 'PENDING' }).status).toBe('pending');
  });
});

describe('orderFilter', () => {
  it('formats closed and open ranges', () => {
    const from = Date.parse('2024-01-01T00:00:00.000Z');
    const to = Date.parse('2024-04-01T00:00:00.000Z');
    expect(orderFilter({ field: 'creationdate', from, to })).toBe(
      'creationdate:[2024-01-01T00:00:00.000Z..2024-04-01T00:00:00.000Z]',
    );
    expect(orderFilter({ field: 'lastmodifieddate', from, to: null })).toBe('lastmodifieddate:[2024-01-01T00:00:00.000Z..]');
  });
});

describe('MarketplaceClient.fetchOrders', () => {
  it('pages orders and reports unmappable ones separately', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ total: 2, orders: [SAMPLE_ORDER, { orderId: 'BAD-1', lineItems: [] }] }));
    const client = createMarketplaceClient({ environment: 'sandbox', requestTimeoutMs: 1000, relistStrategy: 'recreate' });

    const page = await client.fetchOrders(
      'access-token',
      { field: 'creationdate', from: Date.parse('2024-01-01T00:00:00.000Z'), to: Date.parse('2024-04-01T00:00:00.000Z') },
      200,
      200,
    );

    expect(page.total).toBe(2);
    expect(page.orders.map((o) => o.orderId)).toEqual(['12-34567-89012']);
    expect(page.failures).toHaveLength(1);
    expect(page.failures[0].externalId).toBe('BAD-1');

    const url = new URL(String(mockFetch.mock.calls[0][0]));
    expect(url.origin).toBe('https://api.sandbox.ebay.com');
    expect(url.pathname).toBe('/sell/fulfillment/v1/order');
    expect(url.searchParams.get('filter')).toBe('creationdate:[2024-01-01T00:00:00.000Z..2024-04-01T00:00:00.000Z]');
    expect(url.searchParams.get('offset')).toBe('200');
  });

  it('raises typed errors for rate limits and server errors', async () => {
    const client = createMarketplaceClient({ environment: 'production', requestTimeoutMs: 1000, relistStrategy: 'recreate' });
    const query = { field: 'creationdate' as const, from: 0, to: 1 };

    mockFetch.mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'retry-after': '3' } }));
    const limited = await client.fetchOrders('t', query, 0, 10).catch((err: unknown) => err);
    expect(limited).toBeInstanceOf(RateLimitError);
    expect(limited instanceof RateLimitError && limited.retryAfter).toBe(3000);

    mockFetch.mockResolvedValueOnce(new Response('boom', { status: 503 }));
    const failed = await client.fetchOrders('t', query, 0, 10).catch((err: unknown) => err);
    expect(failed).toBeInstanceOf(MarketplaceApiError);
    expect(failed instanceof MarketplaceApiError && failed.statusCode).toBe(503);
  });
});

describe('MarketplaceClient relisting', () => {
  it('ends then relists, tolerating an already-ended listing', async () => {
    const trading = vi.fn<Parameters<TradingCall>, ReturnType<TradingCall>>();
    trading
      .mockRejectedValueOnce(new MarketplaceApiError('EndFixedPriceItem', 400, '1047: Auction already closed'))
      .mockResolvedValueOnce({ Ack: 'Success', ItemID: '998877' });
    const client = createMarketplaceClient({
      environment: 'production',
      requestTimeoutMs: 1000,
      relistStrategy: 'recreate',
      tradingCall: trading,
    });

    await expect(client.endAndRecreate('t', '112233', 8.1)).resolves.toBe('998877');
    expect(trading).toHaveBeenLastCalledWith('RelistFixedPriceItem', 't', { Item: { ItemID: '112233', StartPrice: '8.10' } });
    expect(client.reviseListingPrice).toBeUndefined();
  });

  it('offers in-place revision only when configured', () => {
    const client = createMarketplaceClient({ environment: 'production', requestTimeoutMs: 1000, relistStrategy: 'revise' });
    expect(typeof client.reviseListingPrice).toBe('function');
  });
});

describe('Trading API helpers', () => {
  it('builds a namespaced request document', () => {
    expect(buildTradingRequest('EndFixedPriceItem', { ItemID: '42', EndingReason: 'NotAvailable' })).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        '<EndFixedPriceItemRequest xmlns="urn:ebay:apis:eBLBaseComponents">' +
        '<ItemID>42</ItemID><EndingReason>NotAvailable</EndingReason>' +
        '</EndFixedPriceItemRequest>',
    );
  });

  it('maps auth failures to 401', () => {
    const failure = { Ack: 'Failure', Errors: { ErrorCode: '932', LongMessage: 'Auth token is hard expired.' } };
    const error = (() => {
      try {
        checkAck('GetSellerEvents', failure);
        return null;
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(MarketplaceApiError);
    expect(error instanceof MarketplaceApiError && error.statusCode).toBe(401);
    expect(() => checkAck('GetSellerEvents', { Ack: 'Warning' })).not.toThrow();
  });
});

describe('NotificationClient', () => {
  const client = createNotificationClient({ environment: 'production', requestTimeoutMs: 1000 });

  it('reads created ids from the Location header', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(null, {
        status: 201,
        headers: { location: 'https://api.ebay.com/commerce/notification/v1/destination/dest-123' },
      }),
    );
    await expect(
      client.createDestination('t', { name: 'marketsync', endpoint: 'https://example.test/hook', verificationToken: 'test-token' }),
    ).resolves.toBe('dest-123');
  });

  it('reports deleted subscriptions as not found', async () => {
    mockFetch.mockResolvedValueOnce(new Response('missing', { status: 404 }));
    await expect(client.deleteSubscription('t', 'sub-1')).rejects.toBeInstanceOf(NotFoundError);
  });
});
