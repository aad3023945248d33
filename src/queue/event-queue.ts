/**
 * Event Queue - the raw_events ledger plus the deduplicator in front of it
 *
 * Every inbound notification (push or poll) lands here exactly once per
 * dedup key. Rows move received → processing → processed | failed; failed
 * rows can be re-armed by a later delivery or a manual replay.
 */

import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { Database, Row } from '../db/index';
import { num, oneOf, optNum, optOneOf, optStr, str } from '../db/rows';
import { computeDedupKey } from '../ingest/dedup';
import { parseStoredEvent } from '../ingest/event-schema';
import type { EventSource, MarketplaceEvent, RawEvent, RawEventErrorKind, RawEventStatus } from '../types';

const logger = createLogger('event-queue');

const STATUSES: readonly RawEventStatus[] = ['received', 'processing', 'processed', 'failed'];
const SOURCES: readonly EventSource[] = ['push_json', 'push_xml', 'poll'];
const ERROR_KINDS: readonly RawEventErrorKind[] = ['parse', 'processing', 'unmapped', 'stuck'];

// =============================================================================
// TYPES
// =============================================================================

export interface NewRawEvent {
  userId: string | null;
  source: EventSource;
  topic: string;
  externalEventId: string | null;
  objectId: string | null;
  rawPayload: string;
  event: MarketplaceEvent | null;
  occurredAt: number | null;
  receivedAt: number;
  /** Set when the event is already known to be unprocessable at receipt. */
  failure?: { kind: 'parse' | 'unmapped'; message: string };
}

export type EnqueueOutcome = { status: 'accepted'; eventId: string } | { status: 'duplicate'; eventId: string };

export type FailOutcome = 'retry_scheduled' | 'failed';

export interface SweepSummary {
  requeued: number;
  failed: number;
}

export interface ListEventsFilter {
  status?: RawEventStatus;
  userId?: string;
  limit?: number;
}

export interface EventQueueConfig {
  bucketMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  processingTimeoutMs: number;
}

export interface EventQueue {
  /** Persist an inbound event through the deduplicator. */
  enqueue(input: NewRawEvent): EnqueueOutcome;
  /** Re-arm a specific event for processing (manual replay). False if unknown or in flight. */
  enqueueProcessing(eventId: string, now: number): boolean;

  /** Received events whose next attempt is due, in receipt order. */
  listReady(now: number, limit: number): RawEvent[];
  /** Atomically move an event from received to processing. */
  claim(eventId: string, now: number): boolean;
  assignUser(eventId: string, userId: string): void;
  complete(eventId: string, mutation: unknown, now: number): void;
  fail(eventId: string, kind: RawEventErrorKind, message: string, now: number): FailOutcome;
  sweepStuck(now: number): SweepSummary;

  getEvent(eventId: string): RawEvent | null;
  listEvents(filter?: ListEventsFilter): RawEvent[];

  /** Called with the event id whenever an event becomes ready. Returns an unsubscribe function. */
  subscribe(listener: (eventId: string) => void): () => void;
}

// =============================================================================
// ROWS
// =============================================================================

export function parseRawEventRow(row: Row): RawEvent {
  return {
    id: str(row, 'id'),
    userId: optStr(row, 'user_id'),
    source: oneOf(row, 'source', SOURCES),
    topic: str(row, 'topic'),
    externalEventId: optStr(row, 'external_event_id'),
    dedupKey: str(row, 'dedup_key'),
    objectId: optStr(row, 'object_id'),
    rawPayload: str(row, 'raw_payload'),
    event: parseStoredEvent(optStr(row, 'event_json')),
    status: oneOf(row, 'status', STATUSES),
    errorKind: optOneOf(row, 'error_kind', ERROR_KINDS),
    error: optStr(row, 'error'),
    retryCount: num(row, 'retry_count'),
    duplicateCount: num(row, 'duplicate_count'),
    mutation: optStr(row, 'mutation'),
    receivedAt: num(row, 'received_at'),
    occurredAt: optNum(row, 'occurred_at'),
    startedAt: optNum(row, 'started_at'),
    processedAt: optNum(row, 'processed_at'),
    nextAttemptAt: optNum(row, 'next_attempt_at'),
  };
}

/** Delay before the n-th retry: base, 3x base, 9x base, ... */
export function retryDelay(baseMs: number, attempt: number): number {
  return baseMs * 3 ** Math.max(0, attempt - 1);
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createEventQueue(db: Database, config: EventQueueConfig): EventQueue {
  const listeners = new Set<(eventId: string) => void>();

  function announce(eventId: string): void {
    for (const listener of listeners) listener(eventId);
  }

  function getEvent(eventId: string): RawEvent | null {
    const row = db.get('SELECT * FROM raw_events WHERE id = ?', [eventId]);
    return row ? parseRawEventRow(row) : null;
  }

  function insert(input: NewRawEvent, dedupKey: string): string {
    const id = generateId('evt');
    const failure = input.failure ?? null;
    db.run(
      `INSERT INTO raw_events (id, user_id, source, topic, external_event_id, dedup_key, object_id, raw_payload,
         event_json, status, error_kind, error, retry_count, duplicate_count, received_at, occurred_at, next_attempt_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, 0, ?, ?, ?)`,
      [
        id,
        input.userId,
        input.source,
        input.topic,
        input.externalEventId,
        dedupKey,
        input.objectId,
        input.rawPayload,
        input.event ? JSON.stringify(input.event) : null,
        failure ? 'failed' : 'received',
        failure?.kind ?? null,
        failure?.message ?? null,
        input.receivedAt,
        input.occurredAt,
        failure ? null : input.receivedAt,
      ],
    );
    return id;
  }

  function rearm(existing: RawEvent, input: NewRawEvent): void {
    db.run(
      `UPDATE raw_events
       SET status = 'received', user_id = COALESCE(?, user_id), raw_payload = ?, event_json = ?, error_kind = NULL,
           error = NULL, retry_count = 0, next_attempt_at = ?, started_at = NULL, processed_at = NULL
       WHERE id = ? AND status = 'failed'`,
      [input.userId, input.rawPayload, input.event ? JSON.stringify(input.event) : null, input.receivedAt, existing.id],
    );
  }

  return {
    enqueue(input) {
      const dedupKey = computeDedupKey(input, config.bucketMs);
      const outcome = db.transaction((): EnqueueOutcome => {
        const row = db.get('SELECT * FROM raw_events WHERE dedup_key = ?', [dedupKey]);
        if (!row) {
          return { status: 'accepted', eventId: insert(input, dedupKey) };
        }
        const existing = parseRawEventRow(row);
        if (existing.status === 'failed' && !input.failure) {
          rearm(existing, input);
          return { status: 'accepted', eventId: existing.id };
        }
        db.run('UPDATE raw_events SET duplicate_count = duplicate_count + 1 WHERE id = ?', [existing.id]);
        return { status: 'duplicate', eventId: existing.id };
      });

      if (outcome.status === 'duplicate') {
        logger.debug({ eventId: outcome.eventId, topic: input.topic, source: input.source }, 'Duplicate event');
      } else if (input.failure) {
        logger.warn(
          { eventId: outcome.eventId, topic: input.topic, kind: input.failure.kind, reason: input.failure.message },
          'Event stored as failed',
        );
      } else {
        logger.info({ eventId: outcome.eventId, topic: input.topic, source: input.source, userId: input.userId }, 'Event accepted');
        announce(outcome.eventId);
      }
      return outcome;
    },

    enqueueProcessing(eventId, now) {
      const changed = db.run(
        `UPDATE raw_events
         SET status = 'received', error_kind = NULL, error = NULL, retry_count = 0, next_attempt_at = ?,
             started_at = NULL, processed_at = NULL
         WHERE id = ? AND status != 'processing'`,
        [now, eventId],
      );
      if (changed === 0) return false;
      logger.info({ eventId }, 'Event re-armed for processing');
      announce(eventId);
      return true;
    },

    listReady(now, limit) {
      return db
        .query(
          `SELECT * FROM raw_events
           WHERE status = 'received' AND (next_attempt_at IS NULL OR next_attempt_at <= ?)
           ORDER BY received_at ASC, id ASC LIMIT ?`,
          [now, limit],
        )
        .map(parseRawEventRow);
    },

    claim(eventId, now) {
      return (
        db.run(
          `UPDATE raw_events SET status = 'processing', started_at = ?, retry_count = retry_count + 1
           WHERE id = ? AND status = 'received'`,
          [now, eventId],
        ) > 0
      );
    },

    assignUser(eventId, userId) {
      db.run('UPDATE raw_events SET user_id = ? WHERE id = ?', [userId, eventId]);
    },

    complete(eventId, mutation, now) {
      db.run(
        `UPDATE raw_events SET status = 'processed', mutation = ?, processed_at = ?, error_kind = NULL, error = NULL,
           next_attempt_at = NULL
         WHERE id = ?`,
        [JSON.stringify(mutation), now, eventId],
      );
    },

    fail(eventId, kind, message, now) {
      const event = getEvent(eventId);
      const attempts = event?.retryCount ?? 0;
      const retryable = kind === 'processing' || kind === 'stuck';

      if (retryable && attempts <= config.maxRetries) {
        const nextAttemptAt = now + retryDelay(config.retryBaseDelayMs, attempts);
        db.run(
          `UPDATE raw_events SET status = 'received', error_kind = ?, error = ?, next_attempt_at = ?, started_at = NULL
           WHERE id = ?`,
          [kind, message, nextAttemptAt, eventId],
        );
        logger.warn({ eventId, attempts, nextAttemptAt, error: message }, 'Event processing failed, retry scheduled');
        return 'retry_scheduled';
      }

      db.run(
        `UPDATE raw_events SET status = 'failed', error_kind = ?, error = ?, processed_at = ?, next_attempt_at = NULL
         WHERE id = ?`,
        [kind, message, now, eventId],
      );
      logger.error({ eventId, attempts, kind, error: message }, 'Event failed');
      return 'failed';
    },

    sweepStuck(now) {
      const cutoff = now - config.processingTimeoutMs;
      const stuck = db
        .query("SELECT * FROM raw_events WHERE status = 'processing' AND started_at < ?", [cutoff])
        .map(parseRawEventRow);

      let requeued = 0;
      let failed = 0;
      for (const event of stuck) {
        if (event.retryCount > config.maxRetries) {
          db.run(
            `UPDATE raw_events SET status = 'failed', error_kind = 'stuck', error = ?, processed_at = ?
             WHERE id = ? AND status = 'processing'`,
            ['processing timed out', now, event.id],
          );
          failed++;
        } else {
          db.run(
            `UPDATE raw_events SET status = 'received', next_attempt_at = ?, started_at = NULL
             WHERE id = ? AND status = 'processing'`,
            [now, event.id],
          );
          requeued++;
          announce(event.id);
        }
      }
      if (stuck.length > 0) {
        logger.warn({ requeued, failed }, 'Swept stuck events');
      }
      return { requeued, failed };
    },

    getEvent,

    listEvents(filter = {}) {
      const clauses: string[] = [];
      const params: (string | number)[] = [];
      if (filter.status) {
        clauses.push('status = ?');
        params.push(filter.status);
      }
      if (filter.userId) {
        clauses.push('user_id = ?');
        params.push(filter.userId);
      }
      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
      const limit = Math.min(Math.max(1, filter.limit ?? 100), 1000);
      return db
        .query(`SELECT * FROM raw_events ${where} ORDER BY received_at DESC, id DESC LIMIT ?`, [...params, limit])
        .map(parseRawEventRow);
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
