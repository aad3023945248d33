/**
 * Subscription Lifecycle Manager
 *
 * Keeps each user's push subscriptions alive:
 * - ensureSubscriptions: create whatever topics are missing
 * - renewExpiring: extend subscriptions close to expiry, disabling ones
 *   that keep failing
 * - teardown: delete remotely (best effort), always delete locally
 *
 * Every remote call goes through the vault's decrypting credential.
 */

import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { Database, Row } from '../db/index';
import { num, oneOf, optNum, optStr, str } from '../db/rows';
import { CredentialError, errorMessage, NotFoundError } from '../infra/errors';
import { RETRY_POLICIES, withRetry, type RetryOptions } from '../infra/retry';
import type { CredentialVault } from '../credentials/index';
import type { NotificationClient } from '../marketplace/notification';
import { LEGACY_PREFERENCE_EVENTS, REMOTE_TOPIC_IDS } from '../marketplace/topics';
import type { NotificationService } from '../notifications/index';
import { ALL_TOPICS, type EventTopic } from '../types';

const logger = createLogger('subscriptions');

const DAY_MS = 24 * 60 * 60 * 1000;

// =============================================================================
// TYPES
// =============================================================================

export type SubscriptionProtocol = 'push_json' | 'push_xml';
export type SubscriptionStatus = 'enabled' | 'disabled';

const PROTOCOLS: readonly SubscriptionProtocol[] = ['push_json', 'push_xml'];
const STATUSES: readonly SubscriptionStatus[] = ['enabled', 'disabled'];

export interface Subscription {
  id: string;
  userId: string;
  protocol: SubscriptionProtocol;
  topic: EventTopic;
  externalSubscriptionId: string | null;
  destinationId: string | null;
  destinationUrl: string;
  status: SubscriptionStatus;
  expiresAt: number;
  eventCount: number;
  lastEventAt: number | null;
  errorCount: number;
  lastError: string | null;
  lastRenewedAt: number | null;
  createdAt: number;
}

export interface EnsureSummary {
  created: EventTopic[];
  existing: EventTopic[];
  failed: EventTopic[];
  /** Topics the protocol cannot deliver. */
  unsupported: EventTopic[];
}

export interface RenewSummary {
  renewed: number;
  failed: number;
  disabled: number;
}

export interface TeardownSummary {
  removed: number;
  remoteFailures: number;
}

export interface SubscriptionManagerConfig {
  protocol: SubscriptionProtocol;
  ttlDays: number;
  maxDeleteAttempts: number;
  maxRenewalFailures: number;
  publicBaseUrl: string;
  verificationToken: string;
  /** Receiver paths the marketplace posts to. */
  paths: { json: string; xml: string };
  retry?: RetryOptions;
}

export interface SubscriptionManagerDeps {
  vault: Pick<CredentialVault, 'getCredential'>;
  client: NotificationClient;
  notifications: NotificationService;
  clock?: () => number;
}

export interface SubscriptionManager {
  ensureSubscriptions(userId: string, topics: readonly EventTopic[]): Promise<EnsureSummary>;
  renewExpiring(options: { horizonDays: number; now: number }): Promise<RenewSummary>;
  teardown(userId: string): Promise<TeardownSummary>;
  recordEvent(userId: string, topic: EventTopic, now: number): void;
  listSubscriptions(userId: string): Subscription[];
  hasEnabledSubscriptions(userId: string): boolean;
}

// =============================================================================
// ROWS
// =============================================================================

function parseSubscriptionRow(row: Row): Subscription {
  return {
    id: str(row, 'id'),
    userId: str(row, 'user_id'),
    protocol: oneOf(row, 'protocol', PROTOCOLS),
    topic: oneOf(row, 'topic', ALL_TOPICS),
    externalSubscriptionId: optStr(row, 'external_subscription_id'),
    destinationId: optStr(row, 'destination_id'),
    destinationUrl: str(row, 'destination_url'),
    status: oneOf(row, 'status', STATUSES),
    expiresAt: num(row, 'expires_at'),
    eventCount: num(row, 'event_count'),
    lastEventAt: optNum(row, 'last_event_at'),
    errorCount: num(row, 'error_count'),
    lastError: optStr(row, 'last_error'),
    lastRenewedAt: optNum(row, 'last_renewed_at'),
    createdAt: num(row, 'created_at'),
  };
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createSubscriptionManager(
  db: Database,
  deps: SubscriptionManagerDeps,
  config: SubscriptionManagerConfig,
): SubscriptionManager {
  const clock = deps.clock ?? Date.now;
  const retry = config.retry ?? RETRY_POLICIES.lifecycle.config;
  const jsonUrl = `${trimSlash(config.publicBaseUrl)}${config.paths.json}`;
  const xmlUrl = `${trimSlash(config.publicBaseUrl)}${config.paths.xml}`;

  function listFor(userId: string, protocol?: SubscriptionProtocol): Subscription[] {
    const rows = protocol
      ? db.query('SELECT * FROM subscriptions WHERE user_id = ? AND protocol = ? ORDER BY topic', [userId, protocol])
      : db.query('SELECT * FROM subscriptions WHERE user_id = ? ORDER BY protocol, topic', [userId]);
    return rows.map(parseSubscriptionRow);
  }

  function upsert(
    userId: string,
    protocol: SubscriptionProtocol,
    topic: EventTopic,
    remote: { externalSubscriptionId: string | null; destinationId: string | null; destinationUrl: string },
    now: number,
  ): void {
    db.run(
      `INSERT INTO subscriptions (id, user_id, protocol, topic, external_subscription_id, destination_id, destination_url,
         status, expires_at, event_count, error_count, last_renewed_at, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, 'enabled', ?, 0, 0, ?, ?)
       ON CONFLICT(user_id, protocol, topic) DO UPDATE SET
         external_subscription_id = excluded.external_subscription_id,
         destination_id = excluded.destination_id,
         destination_url = excluded.destination_url,
         status = 'enabled',
         expires_at = excluded.expires_at,
         error_count = 0,
         last_error = NULL,
         last_renewed_at = excluded.last_renewed_at`,
      [
        generateId('sub'),
        userId,
        protocol,
        topic,
        remote.externalSubscriptionId,
        remote.destinationId,
        remote.destinationUrl,
        now + config.ttlDays * DAY_MS,
        now,
        now,
      ],
    );
  }

  async function ensureJson(userId: string, token: string, missing: EventTopic[], summary: EnsureSummary): Promise<void> {
    const now = clock();
    const known = listFor(userId, 'push_json').find((sub) => sub.destinationId !== null);
    const destinationId =
      known?.destinationId ??
      (await withRetry(
        () =>
          deps.client.createDestination(token, {
            name: `marketsync-${userId}`,
            endpoint: jsonUrl,
            verificationToken: config.verificationToken,
          }),
        retry,
      ));

    for (const topic of missing) {
      try {
        const subscriptionId = await withRetry(
          () => deps.client.createSubscription(token, { topicId: REMOTE_TOPIC_IDS[topic], destinationId }),
          retry,
        );
        upsert(userId, 'push_json', topic, { externalSubscriptionId: subscriptionId, destinationId, destinationUrl: jsonUrl }, now);
        summary.created.push(topic);
      } catch (err) {
        if (err instanceof CredentialError) throw err;
        logger.error({ userId, topic, error: errorMessage(err) }, 'Failed to create subscription');
        summary.failed.push(topic);
      }
    }
  }

  async function ensureXml(userId: string, token: string, missing: EventTopic[], summary: EnsureSummary): Promise<void> {
    const now = clock();
    const deliverable = missing.filter((topic) => LEGACY_PREFERENCE_EVENTS[topic].length > 0);
    summary.unsupported.push(...missing.filter((topic) => LEGACY_PREFERENCE_EVENTS[topic].length === 0));
    if (deliverable.length === 0) return;

    const events = deliverable.flatMap((topic) => LEGACY_PREFERENCE_EVENTS[topic]);
    try {
      await withRetry(
        () => deps.client.setNotificationPreferences(token, { applicationUrl: xmlUrl, events, enable: true }),
        retry,
      );
    } catch (err) {
      if (err instanceof CredentialError) throw err;
      logger.error({ userId, events, error: errorMessage(err) }, 'Failed to set notification preferences');
      summary.failed.push(...deliverable);
      return;
    }
    for (const topic of deliverable) {
      upsert(userId, 'push_xml', topic, { externalSubscriptionId: null, destinationId: null, destinationUrl: xmlUrl }, now);
      summary.created.push(topic);
    }
  }

  async function renewOne(sub: Subscription, now: number): Promise<void> {
    const token = await deps.vault.getCredential(sub.userId).getAccessToken();
    if (sub.protocol === 'push_json') {
      const { externalSubscriptionId, destinationId } = sub;
      if (!externalSubscriptionId || !destinationId) {
        throw new Error('subscription has no remote id');
      }
      await withRetry(() => deps.client.renewSubscription(token, externalSubscriptionId, destinationId), retry);
    } else {
      await withRetry(
        () =>
          deps.client.setNotificationPreferences(token, {
            applicationUrl: sub.destinationUrl,
            events: LEGACY_PREFERENCE_EVENTS[sub.topic],
            enable: true,
          }),
        retry,
      );
    }
    db.run(
      `UPDATE subscriptions SET expires_at = ?, last_renewed_at = ?, error_count = 0, last_error = NULL
       WHERE id = ?`,
      [now + config.ttlDays * DAY_MS, now, sub.id],
    );
  }

  /** Returns true when the failure disabled the subscription. */
  function recordRenewalFailure(sub: Subscription, err: unknown, now: number): boolean {
    const errorCount = sub.errorCount + 1;
    const disable = errorCount >= config.maxRenewalFailures;
    db.run('UPDATE subscriptions SET error_count = ?, last_error = ?, status = ? WHERE id = ?', [
      errorCount,
      errorMessage(err),
      disable ? 'disabled' : sub.status,
      sub.id,
    ]);
    logger.warn({ subscriptionId: sub.id, userId: sub.userId, topic: sub.topic, errorCount, error: errorMessage(err) }, 'Subscription renewal failed');

    if (disable && !(err instanceof CredentialError)) {
      deps.notifications.notify(
        sub.userId,
        {
          type: 'warning',
          title: 'Subscription disabled',
          message: `Notifications for ${sub.topic} stopped after ${errorCount} failed renewals. Sync falls back to polling.`,
          source: 'subscriptions',
        },
        now,
      );
    }
    return disable;
  }

  return {
    async ensureSubscriptions(userId, topics) {
      const summary: EnsureSummary = { created: [], existing: [], failed: [], unsupported: [] };
      const enabled = new Set(
        listFor(userId, config.protocol)
          .filter((sub) => sub.status === 'enabled')
          .map((sub) => sub.topic),
      );
      const wanted = [...new Set(topics)];
      summary.existing = wanted.filter((topic) => enabled.has(topic));
      const missing = wanted.filter((topic) => !enabled.has(topic));
      if (missing.length === 0) return summary;

      const token = await deps.vault.getCredential(userId).getAccessToken();
      if (config.protocol === 'push_json') {
        await ensureJson(userId, token, missing, summary);
      } else {
        await ensureXml(userId, token, missing, summary);
      }
      logger.info({ userId, protocol: config.protocol, ...summary }, 'Subscriptions ensured');
      return summary;
    },

    async renewExpiring({ horizonDays, now }) {
      const due = db
        .query("SELECT * FROM subscriptions WHERE status = 'enabled' AND expires_at <= ? ORDER BY expires_at", [
          now + horizonDays * DAY_MS,
        ])
        .map(parseSubscriptionRow);

      const summary: RenewSummary = { renewed: 0, failed: 0, disabled: 0 };
      for (const sub of due) {
        try {
          await renewOne(sub, now);
          summary.renewed++;
        } catch (err) {
          summary.failed++;
          if (recordRenewalFailure(sub, err, now)) summary.disabled++;
        }
      }
      if (due.length > 0) {
        logger.info({ due: due.length, ...summary }, 'Subscription renewal pass complete');
      }
      return summary;
    },

    async teardown(userId) {
      const subs = listFor(userId);
      let remoteFailures = 0;

      let token: string | null = null;
      if (subs.length > 0) {
        try {
          token = await deps.vault.getCredential(userId).getAccessToken();
        } catch (err) {
          logger.warn({ userId, error: errorMessage(err) }, 'No usable credential for remote teardown');
          remoteFailures = subs.length;
        }
      }

      if (token !== null) {
        const accessToken = token;
        for (const sub of subs.filter((s) => s.protocol === 'push_json' && s.externalSubscriptionId)) {
          const subscriptionId = sub.externalSubscriptionId ?? '';
          try {
            await withRetry(() => deps.client.deleteSubscription(accessToken, subscriptionId), {
              ...retry,
              maxAttempts: config.maxDeleteAttempts,
              retryPredicate: (error) => !(error instanceof NotFoundError || error instanceof CredentialError),
            });
          } catch (err) {
            if (err instanceof NotFoundError) continue;
            remoteFailures++;
            logger.warn({ userId, subscriptionId, error: errorMessage(err) }, 'Remote subscription delete failed');
          }
        }

        const legacy = subs.filter((s) => s.protocol === 'push_xml');
        if (legacy.length > 0) {
          try {
            await withRetry(
              () =>
                deps.client.setNotificationPreferences(accessToken, {
                  applicationUrl: legacy[0]?.destinationUrl ?? xmlUrl,
                  events: legacy.flatMap((s) => LEGACY_PREFERENCE_EVENTS[s.topic]),
                  enable: false,
                }),
              { ...retry, maxAttempts: config.maxDeleteAttempts },
            );
          } catch (err) {
            remoteFailures++;
            logger.warn({ userId, error: errorMessage(err) }, 'Disabling notification preferences failed');
          }
        }
      }

      const removed = db.run('DELETE FROM subscriptions WHERE user_id = ?', [userId]);
      logger.info({ userId, removed, remoteFailures }, 'Subscriptions torn down');
      return { removed, remoteFailures };
    },

    recordEvent(userId, topic, now) {
      db.run('UPDATE subscriptions SET event_count = event_count + 1, last_event_at = ? WHERE user_id = ? AND topic = ?', [
        now,
        userId,
        topic,
      ]);
    },

    listSubscriptions(userId) {
      return listFor(userId);
    },

    hasEnabledSubscriptions(userId) {
      return db.get("SELECT 1 AS hit FROM subscriptions WHERE user_id = ? AND status = 'enabled' LIMIT 1", [userId]) !== undefined;
    },
  };
}
