/**
 * Idempotency keys for inbound events.
 *
 * With a marketplace event id: hash(source, user, external id).
 * Without one: hash(topic, object id, content digest, time bucket), so an exact
 * re-delivery collapses while a later revision of the same listing does not.
 */

import { createHash } from 'crypto';
import type { EventSource, MarketplaceEvent } from '../types';

export interface DedupKeyInput {
  source: EventSource;
  userId: string | null;
  topic: string;
  externalEventId: string | null;
  objectId: string | null;
  event: MarketplaceEvent | null;
  rawPayload: string;
  occurredAt: number | null;
  receivedAt: number;
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function computeDedupKey(input: DedupKeyInput, bucketMs: number): string {
  if (input.externalEventId) {
    return sha256(['ext', input.source, input.userId ?? '', input.externalEventId].join('|'));
  }

  const content = input.event ? canonicalJson(input.event) : input.rawPayload;
  const bucket = Math.floor((input.occurredAt ?? input.receivedAt) / bucketMs);
  return sha256(['content', input.topic, input.objectId ?? '', sha256(content), String(bucket)].join('|'));
}
