/**
 * marketsync - marketplace event reconciliation engine
 *
 * Entry point - starts the gateway and all services
 */

import { randomBytes } from 'crypto';
import { existsSync, mkdirSync, readFileSync, appendFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createGateway, type Gateway } from './gateway/index';
import { loadConfig, resolveStateDir } from './utils/config';
import { logger } from './utils/logger';

/**
 * Generate MARKETSYNC_CREDENTIAL_KEY on first start and persist it to the
 * state directory's .env.
 */
export function ensureCredentialKey(stateDir = resolveStateDir()): void {
  if (process.env.MARKETSYNC_CREDENTIAL_KEY) return;

  const generated = randomBytes(32).toString('hex');
  process.env.MARKETSYNC_CREDENTIAL_KEY = generated;
  const envPath = join(stateDir, '.env');
  try {
    if (!existsSync(stateDir)) mkdirSync(stateDir, { recursive: true });
    if (existsSync(envPath)) {
      const existing = readFileSync(envPath, 'utf-8');
      if (!existing.includes('MARKETSYNC_CREDENTIAL_KEY=')) {
        appendFileSync(envPath, `\nMARKETSYNC_CREDENTIAL_KEY=${generated}\n`);
      }
    } else {
      writeFileSync(envPath, `MARKETSYNC_CREDENTIAL_KEY=${generated}\n`, { mode: 0o600 });
    }
    logger.info({ envPath }, 'Auto-generated MARKETSYNC_CREDENTIAL_KEY');
    logger.warn('Back up MARKETSYNC_CREDENTIAL_KEY; losing it makes stored credentials unrecoverable');
  } catch (err) {
    logger.warn({ err }, 'Could not persist MARKETSYNC_CREDENTIAL_KEY; stored credentials will be lost on restart');
  }
}

/** Stop the gateway on SIGINT/SIGTERM, giving it 15s before exiting anyway. */
export function installShutdownHandlers(gateway: Gateway): void {
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    try {
      await Promise.race([
        gateway.stop(),
        new Promise<void>((resolve) =>
          setTimeout(() => {
            logger.warn('Shutdown timeout');
            resolve();
          }, 15_000).unref(),
        ),
      ]);
    } catch (err) {
      logger.error({ err }, 'Shutdown error');
    }
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

export async function main(): Promise<void> {
  process.on('unhandledRejection', (reason) => logger.error({ reason }, 'Unhandled rejection'));
  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    process.exit(1);
  });

  logger.info('Starting marketsync...');
  ensureCredentialKey();
  const config = await loadConfig();
  const gateway = await createGateway(config);
  await gateway.start();
  logger.info({ health: `http://localhost:${config.server.port}/health` }, 'marketsync is live');
  installShutdownHandlers(gateway);
}

if (require.main === module) {
  main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
  });
}
