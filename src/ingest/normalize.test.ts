import { describe, it, expect } from 'vitest';
import { normalizeJson, normalizeXml } from './normalize';

const SOLD_JSON = JSON.stringify({
  metadata: { topic: 'ITEM_SOLD', eventId: 'evt-1', timestamp: '2024-05-01T10:00:00.000Z' },
  notification: {
    orderId: '1001',
    itemId: '123456789',
    sku: '',
    customSku: 'SKU-42',
    title: 'Vintage Lamp',
    soldPrice: '25.50',
    quantity: 1,
    buyerId: 'buyer_1',
    sellerUsername: 'seller_one',
  },
});

const ADD_ITEM_XML = `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/">
  <soapenv:Body>
    <GetItemResponse xmlns="urn:ebay:apis:eBLBaseComponents">
      <Item>
        <ItemID>123456789012</ItemID>
        <Title>Test Item - Handheld Console</Title>
        <Seller>
          <UserID>testuser</UserID>
        </Seller>
        <StartPrice currencyID="USD">199.99</StartPrice>
        <SKU>TEST-SKU-001</SKU>
        <Quantity>1</Quantity>
      </Item>
    </GetItemResponse>
  </soapenv:Body>
</soapenv:Envelope>`;

const TRANSACTION_XML = `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/">
  <soapenv:Body>
    <GetItemTransactionsResponse xmlns="urn:ebay:apis:eBLBaseComponents">
      <Timestamp>2024-05-03T12:00:00.000Z</Timestamp>
      <NotificationEventName>FixedPriceTransaction</NotificationEventName>
      <RecipientUserID>seller_one</RecipientUserID>
      <Item>
        <ItemID>111</ItemID>
        <Title>Blue Vase</Title>
        <SKU>VASE-1</SKU>
      </Item>
      <TransactionArray>
        <Transaction>
          <TransactionID>9001</TransactionID>
          <QuantityPurchased>2</QuantityPurchased>
          <TransactionPrice currencyID="USD">12.50</TransactionPrice>
          <Buyer><UserID>buyer_2</UserID></Buyer>
          <ContainingOrder><OrderID>ORD-77</OrderID></ContainingOrder>
          <Status><CheckoutStatus>CheckoutComplete</CheckoutStatus></Status>
        </Transaction>
      </TransactionArray>
    </GetItemTransactionsResponse>
  </soapenv:Body>
</soapenv:Envelope>`;

describe('normalizeJson', () => {
  it('normalizes a sold notification', () => {
    const result = normalizeJson(SOLD_JSON);
    const occurredAt = Date.parse('2024-05-01T10:00:00.000Z');

    expect(result).toEqual({
      ok: true,
      source: 'push_json',
      topic: 'item_sold',
      externalEventId: 'evt-1',
      sellerUsername: 'seller_one',
      occurredAt,
      objectId: '1001',
      event: {
        topic: 'item_sold',
        sellerUsername: 'seller_one',
        occurredAt,
        order: {
          orderId: '1001',
          listingId: '123456789',
          title: 'Vintage Lamp',
          sku: null,
          customSku: 'SKU-42',
          price: 25.5,
          quantity: 1,
          status: 'pending',
          fees: { marketplace: 0, payment: 0, shipping: 0, other: 0 },
          buyerUsername: 'buyer_1',
          soldAt: occurredAt,
        },
      },
    });
  });

  it('derives an order id from listing and transaction ids', () => {
    const result = normalizeJson(
      JSON.stringify({
        metadata: { topic: 'ITEM_SOLD' },
        notification: { itemId: '42', transactionId: '7', soldPrice: 10 },
      }),
    );
    expect(result.ok).toBe(true);
    if (result.ok && result.event.topic === 'item_sold') {
      expect(result.event.order.orderId).toBe('42-7');
      expect(result.event.order.quantity).toBe(1);
    }
  });

  it('reads the nested notification data form', () => {
    const result = normalizeJson(
      JSON.stringify({
        metadata: { topic: 'ITEM_ENDED' },
        notification: {
          notificationId: 'n-9',
          eventDate: '2024-05-02T00:00:00.000Z',
          data: { itemId: 555, username: 'seller_two' },
        },
      }),
    );
    expect(result).toMatchObject({
      ok: true,
      topic: 'item_ended',
      externalEventId: 'n-9',
      sellerUsername: 'seller_two',
      objectId: '555',
      event: { topic: 'item_ended', listingId: '555' },
    });
  });

  it('maps price-change notifications to revisions', () => {
    const result = normalizeJson(
      JSON.stringify({
        metadata: { topic: 'ITEM_PRICE_CHANGE' },
        notification: { itemId: 'L-1', price: { value: '19.99', currency: 'USD' } },
      }),
    );
    expect(result.ok && result.event).toEqual({
      topic: 'item_revised',
      sellerUsername: null,
      occurredAt: null,
      listing: { listingId: 'L-1', title: null, sku: null, customSku: null, price: 19.99, quantity: null },
    });
  });

  it('reports invalid JSON', () => {
    const result = normalizeJson('{not json');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason.startsWith('invalid JSON:')).toBe(true);
  });

  it('reports a missing envelope', () => {
    const result = normalizeJson('{"foo":1}');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason.startsWith('invalid envelope:')).toBe(true);
  });

  it('rejects unsupported topics instead of ignoring them', () => {
    const result = normalizeJson(
      JSON.stringify({ metadata: { topic: 'MARKETPLACE_ACCOUNT_DELETION' }, notification: { userId: 'x' } }),
    );
    expect(result).toMatchObject({
      ok: false,
      topic: 'MARKETPLACE_ACCOUNT_DELETION',
      reason: 'unsupported topic MARKETPLACE_ACCOUNT_DELETION',
    });
  });

  it('reports missing required fields with the field path', () => {
    const result = normalizeJson(JSON.stringify({ metadata: { topic: 'ITEM_ENDED' }, notification: { foo: 'bar' } }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.topic).toBe('item_ended');
      expect(result.reason).toContain('itemId');
    }
  });
});

describe('normalizeXml', () => {
  it('normalizes a listing notification', () => {
    const result = normalizeXml(ADD_ITEM_XML);
    expect(result).toEqual({
      ok: true,
      source: 'push_xml',
      topic: 'item_listed',
      externalEventId: null,
      sellerUsername: 'testuser',
      occurredAt: null,
      objectId: '123456789012',
      event: {
        topic: 'item_listed',
        sellerUsername: 'testuser',
        occurredAt: null,
        listing: {
          listingId: '123456789012',
          title: 'Test Item - Handheld Console',
          sku: null,
          customSku: 'TEST-SKU-001',
          price: 199.99,
          quantity: 1,
        },
      },
    });
  });

  it('maps call names to topics', () => {
    const xml = ADD_ITEM_XML.replace(/GetItemResponse/g, 'EndItemResponse');
    expect(normalizeXml(xml)).toMatchObject({ ok: true, topic: 'item_ended', event: { listingId: '123456789012' } });
  });

  it('normalizes a fixed-price transaction into a sale', () => {
    const result = normalizeXml(TRANSACTION_XML);
    const occurredAt = Date.parse('2024-05-03T12:00:00.000Z');
    expect(result.ok).toBe(true);
    expect(result.objectId).toBe('ORD-77');
    expect(result.ok && result.event).toEqual({
      topic: 'item_sold',
      sellerUsername: 'seller_one',
      occurredAt,
      order: {
        orderId: 'ORD-77',
        listingId: '111',
        title: 'Blue Vase',
        sku: null,
        customSku: 'VASE-1',
        price: 25,
        quantity: 2,
        status: 'paid',
        fees: { marketplace: 0, payment: 0, shipping: 0, other: 0 },
        buyerUsername: 'buyer_2',
        soldAt: occurredAt,
      },
    });
  });

  it('reports malformed XML', () => {
    const result = normalizeXml('<Envelope><Body>');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason.startsWith('invalid XML')).toBe(true);
  });

  it('reports unknown notification elements', () => {
    const result = normalizeXml(
      '<Envelope><Body><GetFeedbackResponse><Foo>1</Foo></GetFeedbackResponse></Body></Envelope>',
    );
    expect(result).toMatchObject({ ok: false, reason: 'unsupported notification GetFeedbackResponse' });
  });

  it('reports an empty body', () => {
    expect(normalizeXml('   ')).toMatchObject({ ok: false, reason: 'empty body' });
  });
});
