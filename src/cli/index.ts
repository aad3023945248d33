#!/usr/bin/env node
/**
 * marketsync CLI
 *
 * Commands:
 * - marketsync serve                 Start the gateway
 * - marketsync status                Show configuration and whether the server is up
 * - marketsync endpoints             Show webhook and API endpoints
 * - marketsync connect <userId>      Store marketplace tokens for a user
 * - marketsync disconnect <userId>   Tear down subscriptions and forget tokens
 * - marketsync backfill <userId>     Import historical orders
 * - marketsync renew                 Renew subscriptions close to expiry
 * - marketsync relist-tick           Run due auto-relist rules
 * - marketsync replay <eventId>      Re-process one stored event
 * - marketsync rematch <userId>      Re-run matching for orphaned sales
 * - marketsync sweep                 Recover events stuck in processing
 * - marketsync poll [userId]         Poll the marketplace for missed changes
 */

import { Command, InvalidArgumentError } from 'commander';
import { createGateway, createServices, RECEIVER_PATHS, type Services } from '../gateway/index';
import { createDatabase } from '../db/index';
import { ensureCredentialKey, installShutdownHandlers } from '../index';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) throw new InvalidArgumentError('Not a positive integer.');
  return parsed;
}

/** Open the database, run a one-shot task against the services, close. */
async function withServices<T>(task: (services: Services) => Promise<T> | T): Promise<T> {
  ensureCredentialKey();
  const config = await loadConfig();
  const db = await createDatabase();
  try {
    return await task(createServices(config, db));
  } finally {
    db.close();
  }
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

program.name('marketsync').description('Marketplace event reconciliation engine').version('0.1.0');

// ============================================================================
// serve - Start the gateway
// ============================================================================
program
  .command('serve')
  .alias('start')
  .description('Start the HTTP gateway, worker pool and scheduled jobs')
  .option('-p, --port <port>', 'Override gateway port')
  .action(async (options: { port?: string }) => {
    if (options.port) process.env.MARKETSYNC_PORT = options.port;
    ensureCredentialKey();
    const config = await loadConfig();
    const gateway = await createGateway(config);
    await gateway.start();
    installShutdownHandlers(gateway);
  });

// ============================================================================
// status / endpoints
// ============================================================================
program
  .command('status')
  .description('Show configuration and whether the server is running')
  .action(async () => {
    const config = await loadConfig();
    const port = config.server.port;

    console.log('\n\x1b[1mmarketsync status\x1b[0m\n');
    const configured = (flag: boolean) => (flag ? '\x1b[32m✓ configured\x1b[0m' : '\x1b[31m✗ not set\x1b[0m');
    console.log(`  Marketplace app:    ${configured(Boolean(config.marketplace.clientId && config.marketplace.clientSecret))}`);
    console.log(`  Verification token: ${configured(Boolean(config.marketplace.verificationToken))}`);
    console.log(`  API auth token:     ${configured(Boolean(config.server.authToken))}`);
    console.log(`  Environment:        ${config.marketplace.environment}`);
    console.log(`  Push protocol:      ${config.subscriptions.protocol}`);
    console.log(`  Poller:             ${config.poller.enabled ? 'on' : 'off'}`);

    try {
      const resp = await fetch(`http://localhost:${port}/health`);
      console.log(resp.ok ? '\n  \x1b[32mServer is running\x1b[0m\n' : `\n  \x1b[33mServer returned ${resp.status}\x1b[0m\n`);
    } catch {
      console.log('\n  \x1b[90mServer is not running\x1b[0m\n');
    }
  });

program
  .command('endpoints')
  .description('Show webhook and API endpoints')
  .action(async () => {
    const config = await loadConfig();
    const baseUrl = config.server.publicBaseUrl.replace(/\/+$/, '');

    console.log('\n\x1b[1mmarketsync endpoints\x1b[0m\n');
    console.log(`  Health:          GET  ${baseUrl}/health`);
    console.log(`  JSON webhooks:   POST ${baseUrl}${RECEIVER_PATHS.json}`);
    console.log(`  Legacy webhooks: POST ${baseUrl}${RECEIVER_PATHS.xml}`);
    console.log(`  API:                  ${baseUrl}/api/...\n`);
  });

// ============================================================================
// connect - store tokens
// ============================================================================
program
  .command('connect')
  .argument('<userId>', 'Local user id')
  .requiredOption('--seller <name>', 'Marketplace seller username')
  .requiredOption('--access-token <token>', 'OAuth access token')
  .requiredOption('--refresh-token <token>', 'OAuth refresh token')
  .option('--expires-in <seconds>', 'Access token lifetime in seconds', positiveInt, 7200)
  .description('Store marketplace tokens for a user (encrypted at rest)')
  .action(async (userId: string, options: { seller: string; accessToken: string; refreshToken: string; expiresIn: number }) => {
    await withServices(({ vault }) => {
      vault.storeCredential(userId, {
        marketplaceUserId: options.seller,
        accessToken: options.accessToken,
        refreshToken: options.refreshToken,
        expiresAt: Date.now() + options.expiresIn * 1000,
      });
      print(vault.describe(userId));
    });
  });

program
  .command('disconnect')
  .argument('<userId>', 'Local user id')
  .description('Remove push subscriptions, then delete the stored tokens')
  .action(async (userId: string) => {
    await withServices(async ({ subscriptions, vault }) => {
      const teardown = await subscriptions.teardown(userId);
      print({ teardown, credentialDeleted: vault.deleteCredential(userId) });
    });
  });

// ============================================================================
// One-shot maintenance
// ============================================================================
program
  .command('backfill')
  .argument('<userId>', 'Local user id')
  .option('--window-days <days>', 'Window width in days', positiveInt)
  .option('--max-orders <count>', 'Stop after this many orders', positiveInt)
  .option('--retry-failed', 'Retry failed imports instead of scanning')
  .description('Import historical orders, newest window first')
  .action(async (userId: string, options: { windowDays?: number; maxOrders?: number; retryFailed?: boolean }) => {
    await withServices(async ({ backfill }) => {
      if (options.retryFailed) {
        print(await backfill.retryFailedImports(userId));
        return;
      }
      const controller = new AbortController();
      const cancel = () => controller.abort();
      process.once('SIGINT', cancel);
      try {
        print(
          await backfill.runBackfill(userId, {
            windowDays: options.windowDays,
            maxOrders: options.maxOrders,
            signal: controller.signal,
            onCheckpoint: (checkpoint) => logger.info(checkpoint, 'Backfill checkpoint'),
          }),
        );
      } finally {
        process.removeListener('SIGINT', cancel);
      }
    });
  });

program
  .command('renew')
  .description('Renew subscriptions expiring within the configured horizon')
  .action(async () => {
    await withServices(async ({ subscriptions, config }) => {
      print(await subscriptions.renewExpiring({ horizonDays: config.subscriptions.renewalHorizonDays, now: Date.now() }));
    });
  });

program
  .command('relist-tick')
  .description('Run every auto-relist rule that is due')
  .action(async () => {
    await withServices(async ({ relist }) => print(await relist.tick(Date.now())));
  });

program
  .command('replay')
  .argument('<eventId>', 'Stored event id')
  .description('Re-arm a stored event and process it now')
  .action(async (eventId: string) => {
    await withServices(async ({ queue, workers }) => {
      if (!queue.enqueueProcessing(eventId, Date.now())) {
        console.error(`\n  \x1b[31mError:\x1b[0m Event ${eventId} is unknown or being processed.\n`);
        process.exitCode = 1;
        return;
      }
      await workers.drain();
      print(queue.getEvent(eventId));
    });
  });

program
  .command('rematch')
  .argument('<userId>', 'Local user id')
  .description('Re-run matching for sales with no item')
  .action(async (userId: string) => {
    const { rematchSales } = await import('../matching/sale-matcher');
    await withServices(({ db, matcher }) => print(rematchSales(db, userId, matcher, Date.now())));
  });

program
  .command('sweep')
  .description('Re-queue or fail events stuck in processing')
  .action(async () => {
    await withServices(({ queue }) => print(queue.sweepStuck(Date.now())));
  });

program
  .command('poll')
  .argument('[userId]', 'Poll one user; all active users when omitted')
  .description('Poll the marketplace for changes missed by push delivery')
  .action(async (userId: string | undefined) => {
    await withServices(async ({ poller, workers }) => {
      const now = Date.now();
      print(userId ? await poller.pollUser(userId, now) : await poller.pollAll(now));
      await workers.drain();
    });
  });

program.parseAsync().catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  process.exit(1);
});
