/**
 * Historical Backfill Importer
 *
 * Walks a user's order history backward in fixed-width windows:
 *
 *   scanning(start, end, i) -> scanning(start - width, start, i + 1) -> ...
 *     -> exhausted(empty_windows | lookback_horizon)
 *      | aborted(max_iterations | max_orders | reconnect_required)
 *      | cancelled
 *
 * Every order goes through applySale, the same path as live item-sold
 * events, so a restarted backfill reprocesses harmlessly. Cancellation is
 * checked between windows only: the current window always finishes.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { Database, Row } from '../db/index';
import { bool, num, oneOf, optNum, optStr, str } from '../db/rows';
import { CredentialError, errorMessage } from '../infra/errors';
import { RETRY_POLICIES, withRetry, type RetryOptions } from '../infra/retry';
import type { CredentialVault } from '../credentials/index';
import { mapRemoteOrder, type MarketplaceClient, type RemoteOrder } from '../marketplace/client';
import type { MatcherOptions } from '../matching/sale-matcher';
import type { NotificationService } from '../notifications/index';
import { applySale, type IncomingOrder } from '../processors/apply-sale';
import { orderSnapshotSchema } from '../ingest/event-schema';
import { setWatermark } from '../sync/watermarks';

const logger = createLogger('backfill');

const DAY_MS = 24 * 60 * 60 * 1000;
const YEAR_MS = 365 * DAY_MS;

// =============================================================================
// TYPES
// =============================================================================

export type BackfillState =
  | { kind: 'scanning'; windowStart: number; windowEnd: number; iteration: number }
  | { kind: 'exhausted'; reason: 'empty_windows' | 'lookback_horizon' }
  | { kind: 'aborted'; reason: 'max_iterations' | 'max_orders' | 'reconnect_required' }
  | { kind: 'cancelled' };

export type FinalBackfillState = Exclude<BackfillState, { kind: 'scanning' }>;

export type BackfillRunStatus = 'running' | 'exhausted' | 'aborted' | 'cancelled' | 'failed';

const RUN_STATUSES: readonly BackfillRunStatus[] = ['running', 'exhausted', 'aborted', 'cancelled', 'failed'];

export interface BackfillSettings {
  windowDays: number;
  maxIterations: number;
  maxOrders: number;
  maxLookbackYears: number;
  emptyWindowsToStop: number;
  checkpointEvery: number;
  pageSize: number;
}

export interface BackfillCheckpoint {
  runId: string;
  userId: string;
  windowsScanned: number;
  ordersCollected: number;
  /** Current look-back depth. */
  oldestWindowStart: number;
  at: number;
}

export interface BackfillOptions extends Partial<BackfillSettings> {
  /** End of the first window; defaults to the clock. */
  now?: number;
  signal?: AbortSignal;
  onCheckpoint?: (checkpoint: BackfillCheckpoint) => void;
}

export interface BackfillReport {
  runId: string;
  userId: string;
  final: FinalBackfillState;
  windowsScanned: number;
  ordersCollected: number;
  ordersApplied: number;
  failedOrders: number;
  failedWindows: number;
  oldestWindowStart: number | null;
  incomplete: boolean;
}

export interface BackfillRun {
  id: string;
  userId: string;
  status: BackfillRunStatus;
  reason: string | null;
  incomplete: boolean;
  windowsScanned: number;
  ordersCollected: number;
  oldestWindowStart: number | null;
  startedAt: number;
  finishedAt: number | null;
  lastCheckpointAt: number | null;
}

export type FailedImportKind = 'order' | 'window';

const FAILED_IMPORT_KINDS: readonly FailedImportKind[] = ['order', 'window'];

export interface FailedImport {
  id: string;
  userId: string;
  kind: FailedImportKind;
  externalId: string;
  payload: string | null;
  error: string;
  attempts: number;
  resolvedAt: number | null;
  createdAt: number;
}

export interface RetryImportsSummary {
  resolved: number;
  failed: number;
}

export interface BackfillDeps {
  db: Database;
  vault: Pick<CredentialVault, 'getCredential'>;
  client: Pick<MarketplaceClient, 'fetchOrders'>;
  notifications: NotificationService;
  matcher: MatcherOptions;
  clock?: () => number;
  retry?: RetryOptions;
}

export interface BackfillImporter {
  /** Run to completion. Rejects with BackfillInProgressError if one is already running for the user. */
  runBackfill(userId: string, options?: BackfillOptions): Promise<BackfillReport>;
  /** Start in the background and return the run id. */
  startBackfill(userId: string, options?: BackfillOptions): { runId: string };
  cancelBackfill(userId: string): boolean;
  isRunning(userId: string): boolean;
  getRun(runId: string): BackfillRun | null;
  latestRun(userId: string): BackfillRun | null;
  listFailedImports(userId: string, options?: { includeResolved?: boolean }): FailedImport[];
  retryFailedImports(userId: string): Promise<RetryImportsSummary>;
}

export class BackfillInProgressError extends Error {
  constructor(userId: string) {
    super(`A backfill is already running for ${userId}`);
    this.name = 'BackfillInProgressError';
  }
}

// =============================================================================
// STORED PAYLOADS
// =============================================================================

const storedOrderSchema = orderSnapshotSchema.extend({
  trackingNumber: z.string().nullable().optional(),
  carrier: z.string().nullable().optional(),
});

/** `map`: the marketplace resource could not be mapped. `apply`: mapped, but applying it failed. */
const failedOrderPayloadSchema = z.discriminatedUnion('stage', [
  z.object({ stage: z.literal('map'), raw: z.unknown() }),
  z.object({ stage: z.literal('apply'), order: storedOrderSchema }),
]);

const failedWindowPayloadSchema = z.object({ from: z.number(), to: z.number() });

// =============================================================================
// ROWS
// =============================================================================

function parseRunRow(row: Row): BackfillRun {
  return {
    id: str(row, 'id'),
    userId: str(row, 'user_id'),
    status: oneOf(row, 'status', RUN_STATUSES),
    reason: optStr(row, 'reason'),
    incomplete: bool(row, 'incomplete'),
    windowsScanned: num(row, 'windows_scanned'),
    ordersCollected: num(row, 'orders_collected'),
    oldestWindowStart: optNum(row, 'oldest_window_start'),
    startedAt: num(row, 'started_at'),
    finishedAt: optNum(row, 'finished_at'),
    lastCheckpointAt: optNum(row, 'last_checkpoint_at'),
  };
}

function parseFailedImportRow(row: Row): FailedImport {
  return {
    id: str(row, 'id'),
    userId: str(row, 'user_id'),
    kind: oneOf(row, 'kind', FAILED_IMPORT_KINDS),
    externalId: str(row, 'external_id'),
    payload: optStr(row, 'payload'),
    error: str(row, 'error'),
    attempts: num(row, 'attempts'),
    resolvedAt: optNum(row, 'resolved_at'),
    createdAt: num(row, 'created_at'),
  };
}

export function windowKey(from: number, to: number): string {
  return `${new Date(from).toISOString()}..${new Date(to).toISOString()}`;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

interface ScanState {
  userId: string;
  seen: Set<string>;
  ordersCollected: number;
  ordersApplied: number;
  failedOrders: number;
  maxOrders: number;
  pageSize: number;
}

interface WindowOutcome {
  newOrders: number;
  reachedOrderCap: boolean;
}

export function createBackfillImporter(deps: BackfillDeps, config: BackfillSettings): BackfillImporter {
  const { db } = deps;
  const clock = deps.clock ?? Date.now;
  const retry = deps.retry ?? RETRY_POLICIES.marketplace.config;
  const running = new Map<string, { runId: string; controller: AbortController }>();

  function recordFailedImport(userId: string, kind: FailedImportKind, externalId: string, payload: string | null, error: string): void {
    const now = clock();
    const existing = db.get('SELECT id FROM failed_imports WHERE user_id = ? AND kind = ? AND external_id = ? AND resolved_at IS NULL', [
      userId,
      kind,
      externalId,
    ]);
    if (existing) {
      db.run('UPDATE failed_imports SET attempts = attempts + 1, error = ?, payload = ? WHERE id = ?', [error, payload, str(existing, 'id')]);
    } else {
      db.run(
        `INSERT INTO failed_imports (id, user_id, kind, external_id, payload, error, attempts, created_at)
         VALUES (?, ?, ?, ?, ?, ?, 1, ?)`,
        [generateId('fim'), userId, kind, externalId, payload, error, now],
      );
    }
    logger.warn({ userId, kind, externalId, error }, 'Import failed');
  }

  /** Apply one order; throws when it could not be applied. */
  function applyOrder(userId: string, order: IncomingOrder): void {
    const result = applySale(
      { db, userId, now: clock(), notifications: deps.notifications, matcher: deps.matcher },
      order,
      { notify: false },
    );
    if (!result.ok) throw new Error(`${result.error.reason}: ${result.error.message}`);
  }

  function applyCollected(scan: ScanState, order: RemoteOrder): void {
    try {
      applyOrder(scan.userId, order);
      scan.ordersApplied++;
    } catch (err) {
      scan.failedOrders++;
      recordFailedImport(scan.userId, 'order', order.orderId, JSON.stringify({ stage: 'apply', order }), errorMessage(err));
    }
  }

  /** Page through one window. Throws when a page cannot be fetched. */
  async function scanWindow(scan: ScanState, from: number, to: number): Promise<WindowOutcome> {
    const token = await deps.vault.getCredential(scan.userId).getAccessToken();
    let newOrders = 0;
    let offset = 0;

    for (;;) {
      const pageOffset = offset;
      const page = await withRetry(
        () => deps.client.fetchOrders(token, { field: 'creationdate', from, to }, pageOffset, scan.pageSize),
        retry,
      );

      for (const failure of page.failures) {
        if (scan.seen.has(failure.externalId)) continue;
        scan.seen.add(failure.externalId);
        newOrders++;
        scan.failedOrders++;
        const raw: unknown = JSON.parse(failure.payload);
        recordFailedImport(scan.userId, 'order', failure.externalId, JSON.stringify({ stage: 'map', raw }), failure.error);
      }

      for (const order of page.orders) {
        if (scan.seen.has(order.orderId)) continue;
        scan.seen.add(order.orderId);
        newOrders++;
        scan.ordersCollected++;
        applyCollected(scan, order);
        if (scan.ordersCollected >= scan.maxOrders) return { newOrders, reachedOrderCap: true };
      }

      const received = page.orders.length + page.failures.length;
      offset += received;
      if (received === 0 || offset >= page.total) break;
    }

    return { newOrders, reachedOrderCap: false };
  }

  function checkpoint(runId: string, userId: string, scan: ScanState, windowsScanned: number, oldestWindowStart: number, options: BackfillOptions): void {
    const at = clock();
    db.run(
      'UPDATE backfill_runs SET windows_scanned = ?, orders_collected = ?, oldest_window_start = ?, last_checkpoint_at = ? WHERE id = ?',
      [windowsScanned, scan.ordersCollected, oldestWindowStart, at, runId],
    );
    setWatermark(db, userId, 'orders_backfill', oldestWindowStart, at);
    const point: BackfillCheckpoint = {
      runId,
      userId,
      windowsScanned,
      ordersCollected: scan.ordersCollected,
      oldestWindowStart,
      at,
    };
    logger.info(point, 'Backfill checkpoint');
    options.onCheckpoint?.(point);
  }

  async function execute(runId: string, userId: string, startAt: number, settings: BackfillSettings, signal: AbortSignal, options: BackfillOptions): Promise<BackfillReport> {
    const widthMs = settings.windowDays * DAY_MS;
    const horizon = startAt - settings.maxLookbackYears * YEAR_MS;
    const scan: ScanState = {
      userId,
      seen: new Set(),
      ordersCollected: 0,
      ordersApplied: 0,
      failedOrders: 0,
      maxOrders: settings.maxOrders,
      pageSize: settings.pageSize,
    };

    let windowEnd = startAt;
    let iteration = 0;
    let emptyStreak = 0;
    let failedWindows = 0;
    let oldestWindowStart: number | null = null;
    let final: FinalBackfillState | null = null;

    while (final === null) {
      if (signal.aborted) {
        final = { kind: 'cancelled' };
        break;
      }
      if (iteration >= settings.maxIterations) {
        final = { kind: 'aborted', reason: 'max_iterations' };
        break;
      }
      if (windowEnd <= horizon) {
        final = { kind: 'exhausted', reason: 'lookback_horizon' };
        break;
      }

      const state: BackfillState = {
        kind: 'scanning',
        windowStart: Math.max(windowEnd - widthMs, horizon),
        windowEnd,
        iteration,
      };
      logger.debug({ userId, ...state }, 'Scanning window');

      let outcome: WindowOutcome | null = null;
      try {
        outcome = await scanWindow(scan, state.windowStart, state.windowEnd);
      } catch (err) {
        if (err instanceof CredentialError) {
          final = { kind: 'aborted', reason: 'reconnect_required' };
          break;
        }
        failedWindows++;
        recordFailedImport(
          userId,
          'window',
          windowKey(state.windowStart, state.windowEnd),
          JSON.stringify({ from: state.windowStart, to: state.windowEnd }),
          errorMessage(err),
        );
      }

      iteration++;
      oldestWindowStart = state.windowStart;

      if (outcome === null) {
        // a failed window says nothing about whether history continues
        emptyStreak = 0;
      } else if (outcome.reachedOrderCap) {
        final = { kind: 'aborted', reason: 'max_orders' };
      } else {
        emptyStreak = outcome.newOrders === 0 ? emptyStreak + 1 : 0;
        if (emptyStreak >= settings.emptyWindowsToStop) final = { kind: 'exhausted', reason: 'empty_windows' };
      }

      if (iteration % settings.checkpointEvery === 0) {
        checkpoint(runId, userId, scan, iteration, state.windowStart, options);
      }
      windowEnd = state.windowStart;
    }

    const incomplete = final.kind !== 'exhausted' || failedWindows > 0;
    const finishedAt = clock();
    db.run(
      `UPDATE backfill_runs SET status = ?, reason = ?, incomplete = ?, windows_scanned = ?, orders_collected = ?,
         oldest_window_start = ?, finished_at = ?
       WHERE id = ?`,
      [final.kind, 'reason' in final ? final.reason : null, incomplete, iteration, scan.ordersCollected, oldestWindowStart, finishedAt, runId],
    );
    if (oldestWindowStart !== null) setWatermark(db, userId, 'orders_backfill', oldestWindowStart, finishedAt);

    const report: BackfillReport = {
      runId,
      userId,
      final,
      windowsScanned: iteration,
      ordersCollected: scan.ordersCollected,
      ordersApplied: scan.ordersApplied,
      failedOrders: scan.failedOrders,
      failedWindows,
      oldestWindowStart,
      incomplete,
    };
    logger.info(report, 'Backfill finished');

    if (final.kind === 'exhausted' || (final.kind === 'aborted' && final.reason !== 'reconnect_required')) {
      deps.notifications.notify(
        userId,
        incomplete
          ? {
              type: 'warning',
              title: 'Sales import incomplete',
              message: `Imported ${scan.ordersCollected} orders. Some history may be missing; failed imports can be retried.`,
              source: 'backfill',
            }
          : {
              type: 'success',
              title: 'Sales import complete',
              message: `Imported ${scan.ordersCollected} orders.`,
              source: 'backfill',
            },
        finishedAt,
      );
    }
    return report;
  }

  function begin(userId: string, options: BackfillOptions): { runId: string; done: Promise<BackfillReport> } {
    if (running.has(userId)) throw new BackfillInProgressError(userId);

    const settings: BackfillSettings = {
      windowDays: options.windowDays ?? config.windowDays,
      maxIterations: options.maxIterations ?? config.maxIterations,
      maxOrders: options.maxOrders ?? config.maxOrders,
      maxLookbackYears: options.maxLookbackYears ?? config.maxLookbackYears,
      emptyWindowsToStop: options.emptyWindowsToStop ?? config.emptyWindowsToStop,
      checkpointEvery: options.checkpointEvery ?? config.checkpointEvery,
      pageSize: options.pageSize ?? config.pageSize,
    };
    const startAt = options.now ?? clock();
    const runId = generateId('bfr');
    db.run("INSERT INTO backfill_runs (id, user_id, status, started_at) VALUES (?, ?, 'running', ?)", [runId, userId, clock()]);

    const controller = new AbortController();
    const external = options.signal;
    const forwardAbort = () => controller.abort();
    if (external?.aborted) controller.abort();
    external?.addEventListener('abort', forwardAbort, { once: true });

    running.set(userId, { runId, controller });
    logger.info({ userId, runId, startAt, ...settings }, 'Backfill started');

    const done = execute(runId, userId, startAt, settings, controller.signal, options)
      .catch((err: unknown) => {
        db.run("UPDATE backfill_runs SET status = 'failed', reason = ?, incomplete = 1, finished_at = ? WHERE id = ?", [
          errorMessage(err),
          clock(),
          runId,
        ]);
        logger.error({ userId, runId, error: errorMessage(err) }, 'Backfill failed');
        throw err;
      })
      .finally(() => {
        external?.removeEventListener('abort', forwardAbort);
        running.delete(userId);
      });
    return { runId, done };
  }

  function listFailedImports(userId: string, options: { includeResolved?: boolean } = {}): FailedImport[] {
    const sql = options.includeResolved
      ? 'SELECT * FROM failed_imports WHERE user_id = ? ORDER BY created_at, rowid'
      : 'SELECT * FROM failed_imports WHERE user_id = ? AND resolved_at IS NULL ORDER BY created_at, rowid';
    return db.query(sql, [userId]).map(parseFailedImportRow);
  }

  async function retryOne(failed: FailedImport): Promise<void> {
    const payload: unknown = JSON.parse(failed.payload ?? 'null');
    if (failed.kind === 'window') {
      const window = failedWindowPayloadSchema.parse(payload);
      const scan: ScanState = {
        userId: failed.userId,
        seen: new Set(),
        ordersCollected: 0,
        ordersApplied: 0,
        failedOrders: 0,
        maxOrders: Number.POSITIVE_INFINITY,
        pageSize: config.pageSize,
      };
      await scanWindow(scan, window.from, window.to);
      return;
    }

    const stored = failedOrderPayloadSchema.parse(payload);
    const order: IncomingOrder = stored.stage === 'map' ? mapRemoteOrder(stored.raw) : stored.order;
    applyOrder(failed.userId, order);
  }

  return {
    async runBackfill(userId, options = {}) {
      return begin(userId, options).done;
    },

    startBackfill(userId, options = {}) {
      const { runId, done } = begin(userId, options);
      void done.catch((err: unknown) => {
        logger.error({ userId, runId, error: errorMessage(err) }, 'Background backfill rejected');
      });
      return { runId };
    },

    cancelBackfill(userId) {
      const active = running.get(userId);
      if (!active) return false;
      active.controller.abort();
      logger.info({ userId, runId: active.runId }, 'Backfill cancellation requested');
      return true;
    },

    isRunning(userId) {
      return running.has(userId);
    },

    getRun(runId) {
      const row = db.get('SELECT * FROM backfill_runs WHERE id = ?', [runId]);
      return row ? parseRunRow(row) : null;
    },

    latestRun(userId) {
      const row = db.get('SELECT * FROM backfill_runs WHERE user_id = ? ORDER BY started_at DESC, rowid DESC LIMIT 1', [userId]);
      return row ? parseRunRow(row) : null;
    },

    listFailedImports,

    async retryFailedImports(userId) {
      const pending = listFailedImports(userId);
      const summary: RetryImportsSummary = { resolved: 0, failed: 0 };

      for (const failed of pending) {
        try {
          await retryOne(failed);
          db.run('UPDATE failed_imports SET resolved_at = ? WHERE id = ?', [clock(), failed.id]);
          summary.resolved++;
        } catch (err) {
          summary.failed++;
          db.run('UPDATE failed_imports SET attempts = attempts + 1, error = ? WHERE id = ?', [errorMessage(err), failed.id]);
          logger.warn({ userId, importId: failed.id, kind: failed.kind, error: errorMessage(err) }, 'Import retry failed');
          if (err instanceof CredentialError) break;
        }
      }

      logger.info({ userId, ...summary }, 'Failed imports retried');
      return summary;
    },
  };
}
