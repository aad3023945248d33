/**
 * Gateway - orchestrates the marketsync services
 *
 * Initializes: DB, credential vault, marketplace clients, event queue and
 * worker pool, subscriptions, backfill, auto-relist, poller, cron, HTTP server.
 */

import { createLogger } from '../utils/logger';
import type { AppConfig } from '../utils/config';
import { createDatabase, type Database } from '../db/index';
import { createCredentialVault, type CredentialVault } from '../credentials/index';
import { createTokenRefresher } from '../marketplace/auth';
import { createMarketplaceClient } from '../marketplace/client';
import { createNotificationClient } from '../marketplace/notification';
import { createTradingCall } from '../marketplace/trading';
import { createNotificationService, type NotificationService } from '../notifications/index';
import { createEventQueue, type EventQueue } from '../queue/event-queue';
import { createEventWorkerPool, type EventWorkerPool } from '../queue/worker';
import { createSubscriptionManager, type SubscriptionManager } from '../subscriptions/manager';
import { createBackfillImporter, type BackfillImporter } from '../backfill/importer';
import { createRelistScheduler, type RelistScheduler } from '../relist/scheduler';
import { createPoller, type Poller } from '../poller/index';
import type { MatcherOptions } from '../matching/sale-matcher';
import { CronScheduler, registerSyncJobs } from '../cron/index';
import { createServer } from './server';

const logger = createLogger('gateway');

export const RECEIVER_PATHS = { json: '/webhooks/notify', xml: '/webhooks/legacy' };

export interface Services {
  config: AppConfig;
  db: Database;
  vault: CredentialVault;
  notifications: NotificationService;
  queue: EventQueue;
  workers: EventWorkerPool;
  subscriptions: SubscriptionManager;
  backfill: BackfillImporter;
  relist: RelistScheduler;
  poller: Poller;
  matcher: MatcherOptions;
  resolveUser: (sellerUsername: string) => string | null;
}

/**
 * Wire every service against one database. Nothing is started; the CLI's
 * one-shot commands use this directly.
 */
export function createServices(config: AppConfig, db: Database): Services {
  const { marketplace } = config;
  const notifications = createNotificationService(db);
  const vault = createCredentialVault(db, {
    notifications,
    refresh: createTokenRefresher({
      clientId: marketplace.clientId,
      clientSecret: marketplace.clientSecret,
      environment: marketplace.environment,
      requestTimeoutMs: marketplace.requestTimeoutMs,
    }),
  });
  const resolveUser = (sellerUsername: string) => vault.resolveUserByMarketplaceUser(sellerUsername);

  const tradingCall = createTradingCall({ environment: marketplace.environment, requestTimeoutMs: marketplace.requestTimeoutMs });
  const client = createMarketplaceClient({
    environment: marketplace.environment,
    requestTimeoutMs: marketplace.requestTimeoutMs,
    relistStrategy: marketplace.relistStrategy,
    tradingCall,
  });
  const notificationClient = createNotificationClient({
    environment: marketplace.environment,
    requestTimeoutMs: marketplace.requestTimeoutMs,
    tradingCall,
  });

  const matcher: MatcherOptions = { ...config.matcher };
  const queue = createEventQueue(db, {
    bucketMs: config.dedup.bucketMs,
    maxRetries: config.queue.maxRetries,
    retryBaseDelayMs: config.queue.retryBaseDelayMs,
    processingTimeoutMs: config.queue.processingTimeoutMs,
  });
  const workers = createEventWorkerPool(
    {
      db,
      queue,
      notifications,
      matcher,
      resolveUser,
      onFatal: (error) => logger.fatal({ err: error.message }, 'Event pipeline halted'),
    },
    { concurrency: config.queue.concurrency, pollIntervalMs: config.queue.pollIntervalMs },
  );

  const subscriptions = createSubscriptionManager(
    db,
    { vault, client: notificationClient, notifications },
    {
      protocol: config.subscriptions.protocol,
      ttlDays: config.subscriptions.ttlDays,
      maxDeleteAttempts: config.subscriptions.maxDeleteAttempts,
      maxRenewalFailures: config.subscriptions.maxRenewalFailures,
      publicBaseUrl: config.server.publicBaseUrl,
      verificationToken: marketplace.verificationToken,
      paths: RECEIVER_PATHS,
    },
  );

  const backfill = createBackfillImporter(
    { db, vault, client, notifications, matcher },
    { ...config.backfill, pageSize: marketplace.pageSize },
  );
  const relist = createRelistScheduler({ db, vault, client, notifications }, { defaultCadence: config.relist.defaultCadence });
  const poller = createPoller(
    { db, vault, client, queue, subscriptions },
    { alwaysPoll: config.poller.alwaysPoll, pageSize: marketplace.pageSize, initialLookbackMs: config.poller.initialLookbackMs },
  );

  return { config, db, vault, notifications, queue, workers, subscriptions, backfill, relist, poller, matcher, resolveUser };
}

export interface Gateway {
  services: Services;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export async function createGateway(config: AppConfig): Promise<Gateway> {
  logger.info('Initializing marketsync gateway...');

  const db = await createDatabase();
  const services = createServices(config, db);
  logger.info('Services initialized');

  const cron = new CronScheduler();
  registerSyncJobs(
    cron,
    {
      sweepEvents: (now) => services.queue.sweepStuck(now),
      renewSubscriptions: (now) => services.subscriptions.renewExpiring({ horizonDays: config.subscriptions.renewalHorizonDays, now }),
      relistTick: (now) => services.relist.tick(now),
      poll: config.poller.enabled ? (now) => services.poller.pollAll(now) : undefined,
    },
    {
      sweepMs: config.queue.sweepIntervalMs,
      renewMs: config.subscriptions.renewIntervalMs,
      relistMs: config.relist.tickIntervalMs,
      pollMs: config.poller.intervalMs,
    },
  );

  const server = createServer(
    {
      port: config.server.port,
      authToken: config.server.authToken,
      requestTimeoutMs: config.server.requestTimeoutMs,
      receiverPaths: RECEIVER_PATHS,
      defaultTopics: config.subscriptions.topics,
    },
    {
      db,
      queue: services.queue,
      notifications: services.notifications,
      subscriptions: services.subscriptions,
      backfill: services.backfill,
      relist: services.relist,
      matcher: services.matcher,
      resolveUser: services.resolveUser,
      cron,
    },
  );

  if (!config.server.authToken) {
    logger.warn('MARKETSYNC_AUTH_TOKEN is not set; the /api routes are open');
  }

  return {
    services,

    async start() {
      services.workers.start();
      cron.start();
      await server.start();
      logger.info({ port: config.server.port }, 'Gateway started');
    },

    async stop() {
      cron.stop();
      for (const userId of services.vault.listActiveUsers()) {
        services.backfill.cancelBackfill(userId);
      }
      await server.stop();
      await services.workers.stop();
      db.close();
      logger.info('Gateway stopped');
    },
  };
}
