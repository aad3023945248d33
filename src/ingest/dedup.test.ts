import { describe, it, expect } from 'vitest';
import { canonicalJson, computeDedupKey, type DedupKeyInput } from './dedup';
import type { MarketplaceEvent } from '../types';

const BUCKET = 15 * 60_000;

function revised(price: number): MarketplaceEvent {
  return {
    topic: 'item_revised',
    sellerUsername: 'seller_one',
    occurredAt: null,
    listing: { listingId: 'L-1', title: 'Lamp', sku: null, customSku: null, price, quantity: 1 },
  };
}

function input(overrides: Partial<DedupKeyInput> = {}): DedupKeyInput {
  return {
    source: 'push_xml',
    userId: 'u1',
    topic: 'item_revised',
    externalEventId: null,
    objectId: 'L-1',
    event: revised(10),
    rawPayload: '<xml/>',
    occurredAt: null,
    receivedAt: 1_000_000,
    ...overrides,
  };
}

describe('computeDedupKey', () => {
  it('keys on the external event id when present', () => {
    const a = computeDedupKey(input({ source: 'push_json', externalEventId: 'evt-1', event: revised(10) }), BUCKET);
    const b = computeDedupKey(input({ source: 'push_json', externalEventId: 'evt-1', event: revised(99) }), BUCKET);
    const otherSource = computeDedupKey(input({ source: 'poll', externalEventId: 'evt-1' }), BUCKET);
    const otherUser = computeDedupKey(input({ source: 'push_json', userId: 'u2', externalEventId: 'evt-1' }), BUCKET);

    expect(a).toBe(b);
    expect(a).not.toBe(otherSource);
    expect(a).not.toBe(otherUser);
  });

  it('collapses identical content within one time bucket', () => {
    const first = computeDedupKey(input({ receivedAt: 1_000_000 }), BUCKET);
    const second = computeDedupKey(input({ receivedAt: 1_000_000 + 1000 }), BUCKET);
    expect(first).toBe(second);
  });

  it('separates successive revisions of the same listing', () => {
    expect(computeDedupKey(input({ event: revised(10) }), BUCKET)).not.toBe(
      computeDedupKey(input({ event: revised(9) }), BUCKET),
    );
  });

  it('separates identical content in different buckets', () => {
    expect(computeDedupKey(input({ receivedAt: 0 }), BUCKET)).not.toBe(
      computeDedupKey(input({ receivedAt: BUCKET }), BUCKET),
    );
  });

  it('prefers the marketplace timestamp over receipt time for bucketing', () => {
    const a = computeDedupKey(input({ occurredAt: 5000, receivedAt: 0 }), BUCKET);
    const b = computeDedupKey(input({ occurredAt: 5000, receivedAt: BUCKET * 3 }), BUCKET);
    expect(a).toBe(b);
  });
});

describe('canonicalJson', () => {
  it('is independent of key order', () => {
    expect(canonicalJson({ b: 1, a: { d: [1, 2], c: null } })).toBe(canonicalJson({ a: { c: null, d: [1, 2] }, b: 1 }));
    expect(canonicalJson({ b: 1, a: 'x' })).toBe('{"a":"x","b":1}');
  });
});
