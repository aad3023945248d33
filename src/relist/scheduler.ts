/**
 * Auto-Relist Scheduler
 *
 * tick(now) runs every enabled auto rule whose nextRunAt has passed and
 * every rule with a pending manual trigger. Each run:
 *   1. computes the decayed price (rounded to cents, clamped to the floor)
 *   2. relists: in-place revise when the client can, else end-and-recreate
 *   3. records history and updates the rule and its bound item
 *   4. schedules the next run strictly after now and the previous nextRunAt
 *
 * Before relisting, the bound item must still have stock and must not have
 * sold within minHoursSinceLastOrder; otherwise the run is recorded as
 * skipped. A failed run is recorded and rescheduled at the normal cadence;
 * with pauseOnError, an auto rule is disabled after maxConsecutiveErrors
 * failures in a row.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { Database, Row } from '../db/index';
import { bool, num, oneOf, optNum, optOneOf, optStr, str } from '../db/rows';
import { errorMessage, NotFoundError } from '../infra/errors';
import { RETRY_POLICIES, withRetry, type RetryOptions } from '../infra/retry';
import type { CredentialVault } from '../credentials/index';
import type { MarketplaceClient } from '../marketplace/client';
import type { NotificationService } from '../notifications/index';
import { findItemForListing, getItem, updateItem } from '../inventory/items';
import type { Item } from '../types';
import { CADENCE_VALUES, cadenceIntervalMs, decayPrice, nextRunAfter, type Cadence, type DecayType } from './decay';

const logger = createLogger('auto-relist');

// =============================================================================
// TYPES
// =============================================================================

export type RelistMode = 'auto' | 'manual';
export type RelistOutcome = 'success' | 'failed' | 'skipped';

const MODES: readonly RelistMode[] = ['auto', 'manual'];
const DECAY_TYPES: readonly DecayType[] = ['fixed', 'percentage'];
const OUTCOMES: readonly RelistOutcome[] = ['success', 'failed', 'skipped'];
const HOUR_MS = 60 * 60 * 1000;

export interface AutoRelistRule {
  id: string;
  userId: string;
  itemId: string | null;
  listingId: string;
  mode: RelistMode;
  cadence: Cadence;
  customIntervalDays: number | null;
  decayType: DecayType | null;
  decayValue: number | null;
  floorPrice: number | null;
  currentPrice: number;
  runImmediately: boolean;
  enabled: boolean;
  manualTriggerRequested: boolean;
  nextRunAt: number | null;
  lastRunAt: number | null;
  lastError: string | null;
  runCount: number;
  successCount: number;
  failureCount: number;
  skipCount: number;
  consecutiveErrors: number;
  requirePositiveQuantity: boolean;
  minHoursSinceLastOrder: number;
  pauseOnError: boolean;
  maxConsecutiveErrors: number;
  createdAt: number;
  updatedAt: number;
}

export interface RelistHistoryEntry {
  id: string;
  ruleId: string;
  userId: string;
  itemId: string | null;
  oldListingId: string;
  newListingId: string | null;
  oldPrice: number;
  newPrice: number;
  status: RelistOutcome;
  error: string | null;
  skipReason: string | null;
  startedAt: number;
  finishedAt: number;
}

export const newRelistRuleSchema = z
  .object({
    userId: z.string().min(1),
    itemId: z.string().min(1).nullable().default(null),
    listingId: z.string().min(1),
    mode: z.enum(['auto', 'manual']).default('auto'),
    cadence: z.enum(CADENCE_VALUES).optional(),
    customIntervalDays: z.number().int().positive().nullable().default(null),
    decayType: z.enum(['fixed', 'percentage']).nullable().default(null),
    decayValue: z.number().positive().nullable().default(null),
    floorPrice: z.number().nonnegative().nullable().default(null),
    currentPrice: z.number().positive(),
    runImmediately: z.boolean().default(false),
    requirePositiveQuantity: z.boolean().default(true),
    minHoursSinceLastOrder: z.number().int().nonnegative().default(48),
    pauseOnError: z.boolean().default(true),
    maxConsecutiveErrors: z.number().int().positive().default(3),
  })
  .refine((rule) => rule.decayType === null || rule.decayValue !== null, {
    message: 'decayValue is required with a decayType',
    path: ['decayValue'],
  })
  .refine((rule) => rule.decayType !== 'percentage' || (rule.decayValue ?? 0) < 100, {
    message: 'percentage decay must be below 100',
    path: ['decayValue'],
  })
  .refine((rule) => rule.cadence !== 'custom' || rule.customIntervalDays !== null, {
    message: 'customIntervalDays is required for a custom cadence',
    path: ['customIntervalDays'],
  });

export type NewRelistRule = z.input<typeof newRelistRuleSchema>;

export interface TickSummary {
  due: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface RelistSchedulerDeps {
  db: Database;
  vault: Pick<CredentialVault, 'getCredential'>;
  client: Pick<MarketplaceClient, 'reviseListingPrice' | 'endAndRecreate'>;
  notifications: NotificationService;
  retry?: RetryOptions;
}

export interface RelistSchedulerConfig {
  defaultCadence: Exclude<Cadence, 'custom'>;
}

export interface RelistScheduler {
  /** Create a rule; with runImmediately it fires once now, then follows the cadence. */
  createRule(input: NewRelistRule, now: number): Promise<AutoRelistRule>;
  tick(now: number): Promise<TickSummary>;
  /** Request a run at the next tick. */
  triggerManual(userId: string, ruleId: string): boolean;
  setEnabled(userId: string, ruleId: string, enabled: boolean, now: number): boolean;
  getRule(userId: string, ruleId: string): AutoRelistRule | null;
  listRules(userId: string): AutoRelistRule[];
  listHistory(userId: string, options?: { ruleId?: string; limit?: number }): RelistHistoryEntry[];
}

// =============================================================================
// ROWS
// =============================================================================

function parseRuleRow(row: Row): AutoRelistRule {
  return {
    id: str(row, 'id'),
    userId: str(row, 'user_id'),
    itemId: optStr(row, 'item_id'),
    listingId: str(row, 'listing_id'),
    mode: oneOf(row, 'mode', MODES),
    cadence: oneOf(row, 'cadence', CADENCE_VALUES),
    customIntervalDays: optNum(row, 'custom_interval_days'),
    decayType: optOneOf(row, 'decay_type', DECAY_TYPES),
    decayValue: optNum(row, 'decay_value'),
    floorPrice: optNum(row, 'floor_price'),
    currentPrice: num(row, 'current_price'),
    runImmediately: bool(row, 'run_immediately'),
    enabled: bool(row, 'enabled'),
    manualTriggerRequested: bool(row, 'manual_trigger_requested'),
    nextRunAt: optNum(row, 'next_run_at'),
    lastRunAt: optNum(row, 'last_run_at'),
    lastError: optStr(row, 'last_error'),
    runCount: num(row, 'run_count'),
    successCount: num(row, 'success_count'),
    failureCount: num(row, 'failure_count'),
    skipCount: num(row, 'skip_count'),
    consecutiveErrors: num(row, 'consecutive_errors'),
    requirePositiveQuantity: bool(row, 'require_positive_quantity'),
    minHoursSinceLastOrder: num(row, 'min_hours_since_last_order'),
    pauseOnError: bool(row, 'pause_on_error'),
    maxConsecutiveErrors: num(row, 'max_consecutive_errors'),
    createdAt: num(row, 'created_at'),
    updatedAt: num(row, 'updated_at'),
  };
}

function parseHistoryRow(row: Row): RelistHistoryEntry {
  return {
    id: str(row, 'id'),
    ruleId: str(row, 'rule_id'),
    userId: str(row, 'user_id'),
    itemId: optStr(row, 'item_id'),
    oldListingId: str(row, 'old_listing_id'),
    newListingId: optStr(row, 'new_listing_id'),
    oldPrice: num(row, 'old_price'),
    newPrice: num(row, 'new_price'),
    status: oneOf(row, 'status', OUTCOMES),
    error: optStr(row, 'error'),
    skipReason: optStr(row, 'skip_reason'),
    startedAt: num(row, 'started_at'),
    finishedAt: num(row, 'finished_at'),
  };
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createRelistScheduler(deps: RelistSchedulerDeps, config: RelistSchedulerConfig): RelistScheduler {
  const { db } = deps;
  const retry = deps.retry ?? RETRY_POLICIES.marketplace.config;

  function getRule(userId: string, ruleId: string): AutoRelistRule | null {
    const row = db.get('SELECT * FROM auto_relist_rules WHERE id = ? AND user_id = ?', [ruleId, userId]);
    return row ? parseRuleRow(row) : null;
  }

  function scheduleAfter(rule: AutoRelistRule, now: number): number | null {
    if (rule.mode === 'manual') return null;
    return nextRunAfter(rule.nextRunAt, now, cadenceIntervalMs(rule.cadence, rule.customIntervalDays));
  }

  async function relist(rule: AutoRelistRule, price: number): Promise<string> {
    const token = await deps.vault.getCredential(rule.userId).getAccessToken();
    const revise = deps.client.reviseListingPrice;
    if (revise && price !== rule.currentPrice) {
      await withRetry(() => revise(token, rule.listingId, price), retry);
      return rule.listingId;
    }
    return withRetry(() => deps.client.endAndRecreate(token, rule.listingId, price), retry);
  }

  function recordHistory(rule: AutoRelistRule, entry: Omit<RelistHistoryEntry, 'id' | 'ruleId' | 'userId' | 'oldListingId' | 'oldPrice'>): void {
    db.run(
      `INSERT INTO auto_relist_history (id, rule_id, user_id, item_id, old_listing_id, new_listing_id, old_price, new_price,
         status, error, skip_reason, started_at, finished_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        generateId('rlh'),
        rule.id,
        rule.userId,
        entry.itemId,
        rule.listingId,
        entry.newListingId,
        rule.currentPrice,
        entry.newPrice,
        entry.status,
        entry.error,
        entry.skipReason,
        entry.startedAt,
        entry.finishedAt,
      ],
    );
  }

  /** Why the bound item must not be relisted right now, or null. */
  function skipReason(rule: AutoRelistRule, item: Item | null, now: number): string | null {
    if (!item) return null;
    if (rule.requirePositiveQuantity) {
      if (!item.active) return 'item is no longer active';
      if (item.quantity <= 0) return 'item has no stock';
    }
    if (rule.minHoursSinceLastOrder > 0 && item.soldAt !== null && now - item.soldAt < rule.minHoursSinceLastOrder * HOUR_MS) {
      return `item sold within the last ${rule.minHoursSinceLastOrder} hours`;
    }
    return null;
  }

  function recordSkip(rule: AutoRelistRule, item: Item | null, reason: string, nextRunAt: number | null, now: number): void {
    db.transaction(() => {
      recordHistory(rule, {
        itemId: item?.id ?? rule.itemId,
        newListingId: null,
        newPrice: rule.currentPrice,
        status: 'skipped',
        error: null,
        skipReason: reason,
        startedAt: now,
        finishedAt: now,
      });
      db.run(
        `UPDATE auto_relist_rules SET run_count = run_count + 1, skip_count = skip_count + 1, last_error = ?,
           last_run_at = ?, manual_trigger_requested = 0, next_run_at = ?, updated_at = ?
         WHERE id = ?`,
        [`Skipped: ${reason}`, now, nextRunAt, now, rule.id],
      );
    });
    logger.info({ ruleId: rule.id, userId: rule.userId, listingId: rule.listingId, reason, nextRunAt }, 'Relist skipped');
  }

  /** Run one rule. Never throws for marketplace failures; they are recorded. */
  async function runRule(rule: AutoRelistRule, now: number): Promise<RelistOutcome> {
    const newPrice = decayPrice(rule.currentPrice, rule);
    const nextRunAt = scheduleAfter(rule, now);
    const item = rule.itemId ? getItem(db, rule.userId, rule.itemId) : findItemForListing(db, rule.userId, rule.listingId);

    const reason = skipReason(rule, item, now);
    if (reason !== null) {
      recordSkip(rule, item, reason, nextRunAt, now);
      return 'skipped';
    }

    let newListingId: string;
    try {
      if (rule.itemId && !item) throw new NotFoundError(`Item ${rule.itemId} no longer exists`);
      newListingId = await relist(rule, newPrice);
    } catch (err) {
      const message = errorMessage(err);
      const consecutiveErrors = rule.consecutiveErrors + 1;
      const pause = rule.mode === 'auto' && rule.pauseOnError && consecutiveErrors >= rule.maxConsecutiveErrors;
      db.transaction(() => {
        recordHistory(rule, {
          itemId: item?.id ?? rule.itemId,
          newListingId: null,
          newPrice,
          status: 'failed',
          error: message,
          skipReason: null,
          startedAt: now,
          finishedAt: now,
        });
        db.run(
          `UPDATE auto_relist_rules SET run_count = run_count + 1, failure_count = failure_count + 1, consecutive_errors = ?,
             enabled = ?, last_error = ?, last_run_at = ?, manual_trigger_requested = 0, next_run_at = ?, updated_at = ?
           WHERE id = ?`,
          [consecutiveErrors, !pause, message, now, nextRunAt, now, rule.id],
        );
      });
      logger.warn(
        { ruleId: rule.id, userId: rule.userId, listingId: rule.listingId, error: message, consecutiveErrors, paused: pause, nextRunAt },
        'Relist failed',
      );
      deps.notifications.notify(
        rule.userId,
        pause
          ? {
              type: 'error',
              title: 'Auto-relist paused',
              message: `Listing ${rule.listingId} failed ${consecutiveErrors} times in a row: ${message}`,
              source: 'auto-relist',
            }
          : {
              type: 'warning',
              title: 'Relist failed',
              message: `Listing ${rule.listingId} could not be relisted: ${message}`,
              source: 'auto-relist',
            },
        now,
      );
      return 'failed';
    }

    db.transaction(() => {
      recordHistory(rule, {
        itemId: item?.id ?? null,
        newListingId,
        newPrice,
        status: 'success',
        error: null,
        skipReason: null,
        startedAt: now,
        finishedAt: now,
      });
      db.run(
        `UPDATE auto_relist_rules SET current_price = ?, listing_id = ?, run_count = run_count + 1,
           success_count = success_count + 1, consecutive_errors = 0, last_error = NULL, last_run_at = ?, manual_trigger_requested = 0,
           next_run_at = ?, updated_at = ?
         WHERE id = ?`,
        [newPrice, newListingId, now, nextRunAt, now, rule.id],
      );
      if (item) {
        updateItem(db, item.id, { price: newPrice, externalListingId: newListingId, lastSyncedAt: now }, now);
      }
    });
    logger.info(
      { ruleId: rule.id, userId: rule.userId, oldListingId: rule.listingId, newListingId, oldPrice: rule.currentPrice, newPrice, nextRunAt },
      'Listing relisted',
    );
    return 'success';
  }

  return {
    async createRule(input, now) {
      const parsed = newRelistRuleSchema.parse(input);
      const cadence = parsed.cadence ?? config.defaultCadence;
      const intervalMs = cadenceIntervalMs(cadence, parsed.customIntervalDays);
      const id = generateId('rlr');
      const nextRunAt = parsed.mode === 'auto' ? now + intervalMs : null;

      db.run(
        `INSERT INTO auto_relist_rules (id, user_id, item_id, listing_id, mode, cadence, custom_interval_days, decay_type,
           decay_value, floor_price, current_price, run_immediately, require_positive_quantity, min_hours_since_last_order,
           pause_on_error, max_consecutive_errors, enabled, manual_trigger_requested, next_run_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, 0, ?, ?, ?)`,
        [
          id,
          parsed.userId,
          parsed.itemId,
          parsed.listingId,
          parsed.mode,
          cadence,
          parsed.customIntervalDays,
          parsed.decayType,
          parsed.decayValue,
          parsed.floorPrice,
          parsed.currentPrice,
          parsed.runImmediately,
          parsed.requirePositiveQuantity,
          parsed.minHoursSinceLastOrder,
          parsed.pauseOnError,
          parsed.maxConsecutiveErrors,
          nextRunAt,
          now,
          now,
        ],
      );
      logger.info({ ruleId: id, userId: parsed.userId, listingId: parsed.listingId, mode: parsed.mode, cadence, nextRunAt }, 'Relist rule created');

      const created = getRule(parsed.userId, id);
      if (!created) throw new Error(`Relist rule ${id} vanished after insert`);
      if (!parsed.runImmediately) return created;

      // the immediate run schedules from `now`, not from the cadence slot above
      await runRule({ ...created, nextRunAt: null }, now);
      return getRule(parsed.userId, id) ?? created;
    },

    async tick(now) {
      const due = db
        .query(
          `SELECT * FROM auto_relist_rules
           WHERE enabled = 1 AND (manual_trigger_requested = 1 OR (mode = 'auto' AND next_run_at IS NOT NULL AND next_run_at <= ?))
           ORDER BY next_run_at, created_at`,
          [now],
        )
        .map(parseRuleRow);

      const summary: TickSummary = { due: due.length, succeeded: 0, failed: 0, skipped: 0 };
      for (const rule of due) {
        try {
          const outcome = await runRule(rule, now);
          if (outcome === 'success') summary.succeeded++;
          else if (outcome === 'skipped') summary.skipped++;
          else summary.failed++;
        } catch (err) {
          summary.failed++;
          logger.error({ ruleId: rule.id, error: errorMessage(err) }, 'Relist rule crashed');
        }
      }
      if (due.length > 0) logger.info({ now, ...summary }, 'Relist tick complete');
      return summary;
    },

    triggerManual(userId, ruleId) {
      const changed = db.run('UPDATE auto_relist_rules SET manual_trigger_requested = 1 WHERE id = ? AND user_id = ? AND enabled = 1', [
        ruleId,
        userId,
      ]);
      if (changed > 0) logger.info({ userId, ruleId }, 'Manual relist requested');
      return changed > 0;
    },

    setEnabled(userId, ruleId, enabled, now) {
      // re-enabling a paused rule starts its error streak afresh
      return (
        db.run(
          `UPDATE auto_relist_rules SET enabled = ?, consecutive_errors = CASE WHEN ? THEN 0 ELSE consecutive_errors END,
             updated_at = ?
           WHERE id = ? AND user_id = ?`,
          [enabled, enabled, now, ruleId, userId],
        ) > 0
      );
    },

    getRule,

    listRules(userId) {
      return db.query('SELECT * FROM auto_relist_rules WHERE user_id = ? ORDER BY created_at, rowid', [userId]).map(parseRuleRow);
    },

    listHistory(userId, options = {}) {
      const limit = options.limit ?? 100;
      const rows = options.ruleId
        ? db.query('SELECT * FROM auto_relist_history WHERE user_id = ? AND rule_id = ? ORDER BY started_at DESC, rowid DESC LIMIT ?', [
            userId,
            options.ruleId,
            limit,
          ])
        : db.query('SELECT * FROM auto_relist_history WHERE user_id = ? ORDER BY started_at DESC, rowid DESC LIMIT ?', [userId, limit]);
      return rows.map(parseHistoryRow);
    },
  };
}
