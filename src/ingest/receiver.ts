/**
 * Notification Receiver - webhook endpoints for push notifications
 *
 * GET  handles the endpoint verification handshakes.
 * POST persists the delivery through the deduplicator and acknowledges it,
 * whatever the payload looked like. Only a failure to write the ledger
 * returns 503, so the marketplace redelivers.
 */

import express, { Router, type Request, type Response } from 'express';
import { createLogger } from '../utils/logger';
import type { EventSource, EventTopic } from '../types';
import type { EnqueueOutcome, EventQueue } from '../queue/event-queue';
import { normalizeDelivery } from './normalize';

const logger = createLogger('receiver');

export interface SubscriptionCounter {
  recordEvent(userId: string, topic: EventTopic, now: number): void;
}

export interface ReceiverDeps {
  queue: EventQueue;
  /** Map the seller named in a payload to a user id. */
  resolveUser: (sellerUsername: string) => string | null;
  subscriptions?: SubscriptionCounter;
  clock?: () => number;
}

export interface ReceiverPaths {
  /** JSON notification endpoint. */
  json: string;
  /** Legacy XML/SOAP notification endpoint. */
  xml: string;
}

export type DeliveryResult = EnqueueOutcome & { failure: 'parse' | 'unmapped' | null };

// =============================================================================
// HANDSHAKE
// =============================================================================

function firstQueryValue(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return null;
}

/** Response body for a verification GET. */
export function verificationResponse(query: Record<string, unknown>): Record<string, string> {
  const challenge = firstQueryValue(query.challenge_code);
  if (challenge !== null) return { challengeResponse: challenge };
  const token = firstQueryValue(query.verification_token);
  if (token !== null) return { verificationToken: token };
  return { status: 'ok' };
}

// =============================================================================
// DELIVERY
// =============================================================================

/**
 * Normalize and persist one delivery. Throws only when the ledger write
 * fails.
 */
export function receiveDelivery(
  deps: ReceiverDeps,
  source: Exclude<EventSource, 'poll'>,
  body: string,
  now: number,
): DeliveryResult {
  const normalized = normalizeDelivery(source, body);
  const base = {
    source,
    topic: normalized.topic,
    externalEventId: normalized.externalEventId,
    objectId: normalized.objectId,
    rawPayload: body,
    occurredAt: normalized.occurredAt,
    receivedAt: now,
  };

  if (!normalized.ok) {
    logger.warn({ source, topic: normalized.topic, reason: normalized.reason }, 'Unparseable notification');
    const outcome = deps.queue.enqueue({
      ...base,
      userId: null,
      event: null,
      failure: { kind: 'parse', message: normalized.reason },
    });
    return { ...outcome, failure: 'parse' };
  }

  const seller = normalized.sellerUsername;
  const userId = seller ? deps.resolveUser(seller) : null;
  if (!userId) {
    logger.warn({ source, topic: normalized.topic, seller }, 'Notification for unknown seller');
    const outcome = deps.queue.enqueue({
      ...base,
      userId: null,
      event: normalized.event,
      failure: { kind: 'unmapped', message: `no user for seller ${seller ?? '(none)'}` },
    });
    return { ...outcome, failure: 'unmapped' };
  }

  const outcome = deps.queue.enqueue({ ...base, userId, event: normalized.event });
  if (outcome.status === 'accepted') {
    deps.subscriptions?.recordEvent(userId, normalized.event.topic, now);
  }
  return { ...outcome, failure: null };
}

// =============================================================================
// ROUTER
// =============================================================================

export function createReceiverRouter(deps: ReceiverDeps, paths: ReceiverPaths): Router {
  const router = Router();
  const clock = deps.clock ?? Date.now;
  const rawBody = express.text({ type: () => true, limit: '2mb' });

  const verify = (req: Request, res: Response) => {
    res.json(verificationResponse(req.query));
  };

  const receive = (source: 'push_json' | 'push_xml') => (req: Request, res: Response) => {
    const body = typeof req.body === 'string' ? req.body : '';
    try {
      const result = receiveDelivery(deps, source, body, clock());
      res.status(200).json({ received: true, id: result.eventId });
    } catch (err) {
      logger.error({ err, source }, 'Failed to persist notification');
      res.status(503).json({ error: 'Temporarily unavailable' });
    }
  };

  router.get(paths.json, verify);
  router.get(paths.xml, verify);
  router.post(paths.json, rawBody, receive('push_json'));
  router.post(paths.xml, rawBody, receive('push_xml'));

  return router;
}
