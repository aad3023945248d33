/**
 * Event Worker Pool - drains the event queue into the processors
 *
 * - `concurrency` async workers, each claiming the oldest ready event
 * - never two events for the same (user, object) in flight at once
 * - claims are conditional updates, so a second pool on the same
 *   database cannot double-process an event
 * - a failure of the ledger itself is fatal: the pool stops and reports
 *   through onFatal
 */

import { createLogger } from '../utils/logger';
import { errorMessage, PipelineFatalError } from '../infra/errors';
import type { Database } from '../db/index';
import type { NotificationService } from '../notifications/index';
import type { MatcherOptions } from '../matching/sale-matcher';
import { processEvent, type ProcessorResult } from '../processors/index';
import type { RawEvent } from '../types';
import type { EventQueue } from './event-queue';

const logger = createLogger('event-worker');

// =============================================================================
// TYPES
// =============================================================================

export interface WorkerConfig {
  /** Number of concurrent workers. */
  concurrency: number;
  /** How often idle workers look for due retries. */
  pollIntervalMs: number;
}

export interface WorkerDeps {
  db: Database;
  queue: EventQueue;
  notifications: NotificationService;
  matcher: MatcherOptions;
  /** Map a marketplace seller name to a user, for events stored before the user was known. */
  resolveUser: (sellerUsername: string) => string | null;
  clock?: () => number;
  onFatal?: (error: PipelineFatalError) => void;
}

export type EventOutcome = 'processed' | 'retry_scheduled' | 'failed';

export interface EventWorkerPool {
  start(): void;
  /** Stop taking new events and wait for in-flight ones. */
  stop(): Promise<void>;
  /** Wake idle workers. */
  kick(): void;
  /** Process ready events until none are left; returns how many were handled. */
  drain(): Promise<number>;
  isRunning(): boolean;
  inFlight(): number;
}

// =============================================================================
// PROCESSING
// =============================================================================

function orderingKey(event: RawEvent): string {
  return `${event.userId ?? event.event?.sellerUsername ?? ''}:${event.objectId ?? event.id}`;
}

/**
 * Run one claimed event through its processor and record the outcome.
 * Exceptions from the ledger calls propagate; everything else is recorded.
 */
export function handleClaimedEvent(deps: WorkerDeps, raw: RawEvent, now: number): EventOutcome {
  const { queue } = deps;
  const event = raw.event;
  if (!event) {
    return queue.fail(raw.id, 'parse', raw.error ?? 'event has no normalized payload', now);
  }

  let userId = raw.userId;
  if (!userId && event.sellerUsername) {
    userId = deps.resolveUser(event.sellerUsername);
    if (userId) queue.assignUser(raw.id, userId);
  }
  if (!userId) {
    return queue.fail(raw.id, 'unmapped', `no user for seller ${event.sellerUsername ?? '(none)'}`, now);
  }

  let result: ProcessorResult;
  try {
    result = processEvent(
      { db: deps.db, userId, now, notifications: deps.notifications, matcher: deps.matcher },
      event,
    );
  } catch (err) {
    logger.warn({ eventId: raw.id, topic: event.topic, err }, 'Processor threw');
    return queue.fail(raw.id, 'processing', errorMessage(err), now);
  }

  if (!result.ok) {
    const kind = result.error.reason === 'invalid_event' ? 'parse' : 'processing';
    return queue.fail(raw.id, kind, `${result.error.reason}: ${result.error.message}`, now);
  }

  queue.complete(raw.id, result.value, now);
  logger.info({ eventId: raw.id, userId, topic: event.topic, mutation: result.value.kind }, 'Event processed');
  return 'processed';
}

// =============================================================================
// POOL
// =============================================================================

export function createEventWorkerPool(deps: WorkerDeps, config: WorkerConfig): EventWorkerPool {
  const clock = deps.clock ?? Date.now;
  const busyKeys = new Set<string>();
  let running = false;
  let workers: Promise<void>[] = [];
  let waiters: Array<() => void> = [];
  let unsubscribe: (() => void) | null = null;

  function wakeAll(): void {
    const pending = waiters;
    waiters = [];
    for (const wake of pending) wake();
  }

  function waitForWork(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, config.pollIntervalMs);
      function done(): void {
        clearTimeout(timer);
        waiters = waiters.filter((waiter) => waiter !== done);
        resolve();
      }
      waiters.push(done);
    });
  }

  /** Claim the oldest ready event whose ordering key is free. */
  function claimNext(now: number): { raw: RawEvent; key: string } | null {
    const ready = deps.queue.listReady(now, 50);
    for (const raw of ready) {
      const key = orderingKey(raw);
      if (busyKeys.has(key)) continue;
      if (!deps.queue.claim(raw.id, now)) continue;
      busyKeys.add(key);
      return { raw, key };
    }
    return null;
  }

  function halt(err: unknown): void {
    if (!running) return;
    running = false;
    unsubscribe?.();
    unsubscribe = null;
    wakeAll();
    const fatal = err instanceof PipelineFatalError ? err : new PipelineFatalError('Event ledger unavailable', err);
    logger.fatal({ err }, 'Event worker pool halted');
    deps.onFatal?.(fatal);
  }

  /** Returns false when nothing was ready. Ledger errors propagate. */
  function step(): boolean {
    const now = clock();
    const claimed = claimNext(now);
    if (!claimed) return false;
    try {
      handleClaimedEvent(deps, claimed.raw, now);
    } finally {
      busyKeys.delete(claimed.key);
    }
    return true;
  }

  async function runWorker(slot: number): Promise<void> {
    logger.debug({ slot }, 'Worker started');
    while (running) {
      let worked: boolean;
      try {
        worked = step();
      } catch (err) {
        halt(err);
        return;
      }
      if (worked) {
        // Yield so sibling workers and the HTTP server get a turn.
        await new Promise<void>((resolve) => setImmediate(resolve));
      } else {
        await waitForWork();
      }
    }
  }

  return {
    start() {
      if (running) return;
      running = true;
      unsubscribe = deps.queue.subscribe(() => wakeAll());
      workers = [];
      for (let slot = 0; slot < config.concurrency; slot++) {
        workers.push(runWorker(slot));
      }
      logger.info({ concurrency: config.concurrency }, 'Event worker pool started');
    },

    async stop() {
      if (!running) {
        await Promise.all(workers);
        return;
      }
      running = false;
      unsubscribe?.();
      unsubscribe = null;
      wakeAll();
      await Promise.all(workers);
      workers = [];
      logger.info('Event worker pool stopped');
    },

    kick() {
      wakeAll();
    },

    async drain() {
      let handled = 0;
      while (step()) {
        handled++;
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
      return handled;
    },

    isRunning() {
      return running;
    },

    inFlight() {
      return busyKeys.size;
    },
  };
}
