/**
 * Configuration loading and management
 *
 * Loads env from ~/.marketsync/.env (then CWD), merges ~/.marketsync/marketsync.json
 * over the defaults, substitutes ${VAR} references and validates with zod.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger('config');

dotenvConfig({ path: join(homedir(), '.marketsync', '.env') });
dotenvConfig();

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env = process.env): string {
  const override = env.MARKETSYNC_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.marketsync');
}

function resolveConfigPath(env = process.env): string {
  const override = env.MARKETSYNC_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'marketsync.json');
}

// =============================================================================
// SCHEMA
// =============================================================================

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

export const TOPIC_VALUES = [
  'item_listed',
  'item_relisted',
  'item_revised',
  'item_ended',
  'item_sold',
  'item_out_of_stock',
  'order_shipped',
  'order_delivered',
] as const;

const serverSchema = z.object({
  port: z.coerce.number().int().positive().default(18800),
  authToken: z.string().optional(),
  publicBaseUrl: z.string().default('http://localhost:18800'),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
});

const marketplaceSchema = z.object({
  environment: z.enum(['production', 'sandbox']).default('production'),
  clientId: z.string().default(''),
  clientSecret: z.string().default(''),
  verificationToken: z.string().default(''),
  requestTimeoutMs: z.coerce.number().int().positive().default(20_000),
  pageSize: z.coerce.number().int().min(1).max(200).default(200),
  relistStrategy: z.enum(['revise', 'recreate']).default('recreate'),
});

const queueSchema = z.object({
  concurrency: z.coerce.number().int().min(1).default(4),
  maxRetries: z.coerce.number().int().min(0).default(3),
  processingTimeoutMs: z.coerce.number().int().positive().default(5 * MINUTE),
  sweepIntervalMs: z.coerce.number().int().positive().default(MINUTE),
  pollIntervalMs: z.coerce.number().int().positive().default(2000),
  retryBaseDelayMs: z.coerce.number().int().positive().default(5 * MINUTE),
});

const dedupSchema = z.object({
  bucketMs: z.coerce.number().int().positive().default(15 * MINUTE),
});

const matcherSchema = z.object({
  fuzzyThreshold: z.coerce.number().min(0).max(1).default(0.8),
  recentlyEndedDays: z.coerce.number().int().min(0).default(90),
});

const backfillSchema = z.object({
  windowDays: z.coerce.number().int().positive().default(90),
  maxIterations: z.coerce.number().int().positive().default(100),
  maxOrders: z.coerce.number().int().positive().default(20_000),
  maxLookbackYears: z.coerce.number().int().positive().default(20),
  emptyWindowsToStop: z.coerce.number().int().positive().default(2),
  checkpointEvery: z.coerce.number().int().positive().default(4),
});

const subscriptionsSchema = z.object({
  topics: z.array(z.enum(TOPIC_VALUES)).default(['item_sold', 'item_ended', 'item_out_of_stock', 'order_shipped', 'order_delivered']),
  protocol: z.enum(['push_json', 'push_xml']).default('push_json'),
  ttlDays: z.coerce.number().int().positive().default(7),
  renewalHorizonDays: z.coerce.number().int().positive().default(2),
  renewIntervalMs: z.coerce.number().int().positive().default(6 * HOUR),
  maxDeleteAttempts: z.coerce.number().int().positive().default(3),
  maxRenewalFailures: z.coerce.number().int().positive().default(3),
});

const relistSchema = z.object({
  tickIntervalMs: z.coerce.number().int().positive().default(15 * MINUTE),
  defaultCadence: z
    .enum(['daily', 'every_3_days', 'weekly', 'every_10_days', 'biweekly', 'every_20_days', 'monthly'])
    .default('weekly'),
});

const pollerSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: z.coerce.number().int().positive().default(30 * MINUTE),
  alwaysPoll: z.boolean().default(false),
  initialLookbackMs: z.coerce.number().int().positive().default(24 * HOUR),
});

export const configSchema = z.object({
  server: serverSchema.default({}),
  marketplace: marketplaceSchema.default({}),
  queue: queueSchema.default({}),
  dedup: dedupSchema.default({}),
  matcher: matcherSchema.default({}),
  backfill: backfillSchema.default({}),
  subscriptions: subscriptionsSchema.default({}),
  relist: relistSchema.default({}),
  poller: pollerSchema.default({}),
});

export type AppConfig = z.infer<typeof configSchema>;

// =============================================================================
// LOADING
// =============================================================================

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((entry) => substituteEnvVars(entry, env));
  }
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Skips prototype-polluting keys.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

/** Environment variables that override file values. */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const server: Record<string, unknown> = {};
  const marketplace: Record<string, unknown> = {};
  if (env.MARKETSYNC_PORT) server.port = env.MARKETSYNC_PORT;
  if (env.MARKETSYNC_AUTH_TOKEN) server.authToken = env.MARKETSYNC_AUTH_TOKEN;
  if (env.MARKETSYNC_PUBLIC_BASE_URL) server.publicBaseUrl = env.MARKETSYNC_PUBLIC_BASE_URL;
  if (env.MARKETPLACE_CLIENT_ID) marketplace.clientId = env.MARKETPLACE_CLIENT_ID;
  if (env.MARKETPLACE_CLIENT_SECRET) marketplace.clientSecret = env.MARKETPLACE_CLIENT_SECRET;
  if (env.MARKETPLACE_VERIFICATION_TOKEN) marketplace.verificationToken = env.MARKETPLACE_VERIFICATION_TOKEN;
  if (env.MARKETPLACE_ENVIRONMENT) marketplace.environment = env.MARKETPLACE_ENVIRONMENT;
  return { server, marketplace };
}

/**
 * Validate a raw config object (file contents already merged) against the schema.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const base = isPlainObject(raw) ? raw : {};
  const merged = deepMerge(base, envOverrides(env));
  return configSchema.parse(substituteEnvVars(merged, env));
}

/**
 * Load configuration from file and environment
 */
export async function loadConfig(customPath?: string): Promise<AppConfig> {
  let fileConfig: unknown = {};

  const configPath = customPath ?? resolveConfigPath();
  if (existsSync(configPath)) {
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      logger.error({ configPath, err }, 'Failed to parse config file');
    }
  }

  const config = parseConfig(fileConfig);
  logger.debug({ configPath, port: config.server.port }, 'Configuration loaded');
  return config;
}
