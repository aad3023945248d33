/**
 * HTTP Server for marketsync
 *
 * Middleware, in order:
 * - Security headers (nosniff, DENY, optional HSTS)
 * - Request timeout
 * - Request logging (method, path, status, duration)
 * - Webhook receiver (raw body, mounted before the JSON parser)
 * - JSON body parser, then the bearer-protected /api routes
 * - Error-handling middleware
 */

import crypto from 'crypto';
import express, { type NextFunction, type Request, type Response } from 'express';
import http from 'http';
import { z, ZodError } from 'zod';
import { createLogger } from '../utils/logger';
import type { Database } from '../db/index';
import { CredentialError, NotFoundError, errorMessage } from '../infra/errors';
import { createReceiverRouter, type ReceiverPaths } from '../ingest/receiver';
import type { EventQueue } from '../queue/event-queue';
import type { NotificationService } from '../notifications/index';
import type { SubscriptionManager } from '../subscriptions/manager';
import type { BackfillImporter } from '../backfill/importer';
import { BackfillInProgressError } from '../backfill/importer';
import { newRelistRuleSchema, type RelistScheduler } from '../relist/scheduler';
import { listOrphanedSales } from '../inventory/sales';
import { rematchSales, resolveSale, type MatcherOptions } from '../matching/sale-matcher';
import { ALL_TOPICS, type EventTopic } from '../types';
import { TOPIC_VALUES } from '../utils/config';
import type { CronJob, CronScheduler } from '../cron/index';

const logger = createLogger('server');

// =============================================================================
// CONFIG TYPES
// =============================================================================

export interface ServerConfig {
  port: number;
  authToken?: string;
  /** Enable HSTS header. Defaults to false. */
  hstsEnabled?: boolean;
  /** Request timeout in milliseconds. Defaults to 30000 (30s). */
  requestTimeoutMs?: number;
  receiverPaths: ReceiverPaths;
  /** Topics subscribed when a request names none. */
  defaultTopics: readonly EventTopic[];
}

export interface GatewayServices {
  db: Database;
  queue: EventQueue;
  notifications: NotificationService;
  subscriptions: SubscriptionManager;
  backfill: BackfillImporter;
  relist: RelistScheduler;
  matcher: MatcherOptions;
  resolveUser: (sellerUsername: string) => string | null;
  /** Maintenance jobs; the /api/jobs routes are only mounted when present. */
  cron?: Pick<CronScheduler, 'getJobs' | 'getJob' | 'isRunning' | 'pauseJob' | 'resumeJob' | 'runNow'>;
  clock?: () => number;
}

// =============================================================================
// REQUEST HELPERS
// =============================================================================

const limitQuery = z.coerce.number().int().min(1).max(1000).optional();
const flagQuery = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const eventsQuery = z.object({
  status: z.enum(['received', 'processing', 'processed', 'failed']).optional(),
  userId: z.string().min(1).optional(),
  limit: limitQuery,
});

const ensureBody = z.object({ topics: z.array(z.enum(TOPIC_VALUES)).min(1).optional() }).default({});
const resolveBody = z.object({ itemId: z.string().min(1) });
const enabledBody = z.object({ enabled: z.boolean() });
const ruleBody = z.record(z.unknown()).default({});
const backfillBody = z
  .object({
    windowDays: z.number().int().positive().optional(),
    maxOrders: z.number().int().positive().optional(),
    maxLookbackYears: z.number().int().positive().optional(),
  })
  .default({});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function describeJob({ handler: _handler, ...job }: CronJob) {
  return job;
}

/** Express 4 does not route rejected promises to the error middleware. */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    void handler(req, res).catch(next);
  };
}

function statusFor(err: unknown): { status: number; body: Record<string, unknown> } {
  if (err instanceof ZodError) {
    return { status: 400, body: { error: 'Invalid request', issues: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`) } };
  }
  if (err instanceof CredentialError) {
    return { status: 409, body: { error: err.message, reconnectRequired: true } };
  }
  if (err instanceof BackfillInProgressError) {
    return { status: 409, body: { error: err.message } };
  }
  if (err instanceof NotFoundError) {
    return { status: 404, body: { error: err.message } };
  }
  if (err instanceof SyntaxError) {
    return { status: 400, body: { error: 'Malformed JSON body' } };
  }
  return { status: 500, body: { error: process.env.NODE_ENV === 'production' ? 'Internal server error' : errorMessage(err) } };
}

// =============================================================================
// SERVER FACTORY
// =============================================================================

export function createServer(config: ServerConfig, services: GatewayServices) {
  const app = express();
  const clock = services.clock ?? Date.now;
  const { db, queue, notifications, subscriptions, backfill, relist } = services;

  // ---------------------------------------------------------------------------
  // 1. Security headers
  // ---------------------------------------------------------------------------
  app.disable('x-powered-by');
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');

    const isSecure = req.secure || req.headers['x-forwarded-proto'] === 'https';
    if (config.hstsEnabled || isSecure) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  // ---------------------------------------------------------------------------
  // 2. Request timeout
  // ---------------------------------------------------------------------------
  const timeoutMs = config.requestTimeoutMs ?? 30_000;
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setTimeout(timeoutMs, () => {
      if (!res.headersSent) {
        res.status(408).json({ error: 'Request timeout' });
      }
    });
    next();
  });

  // ---------------------------------------------------------------------------
  // 3. Request logging
  // ---------------------------------------------------------------------------
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      logger[level]({ method: req.method, path: req.path, status: res.statusCode, duration }, '%s %s %d %dms', req.method, req.path, res.statusCode, duration);
    });
    next();
  });

  // ---------------------------------------------------------------------------
  // Health check (always open, before auth)
  // ---------------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    let database = 'ok';
    try {
      db.get('SELECT 1 AS ok');
    } catch (err) {
      database = errorMessage(err);
    }
    const healthy = database === 'ok';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      service: 'marketsync',
      timestamp: clock(),
      uptime: process.uptime() * 1000,
      checks: { database },
    });
  });

  // ---------------------------------------------------------------------------
  // Webhooks (raw bodies; must precede the JSON parser)
  // ---------------------------------------------------------------------------
  app.use(
    createReceiverRouter(
      { queue, resolveUser: services.resolveUser, subscriptions, clock },
      config.receiverPaths,
    ),
  );

  app.use(express.json({ limit: '1mb' }));

  // ---------------------------------------------------------------------------
  // Auth middleware for protected routes
  // ---------------------------------------------------------------------------
  const requireAuth = (req: Request, res: Response, next: NextFunction) => {
    if (!config.authToken) return next();
    const header = req.headers.authorization;
    const token = header?.startsWith('Bearer ') ? header.slice(7) : undefined;
    if (
      typeof token !== 'string' ||
      token.length !== config.authToken.length ||
      !crypto.timingSafeEqual(Buffer.from(token), Buffer.from(config.authToken))
    ) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };

  const api = express.Router();
  api.use(requireAuth);

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------
  api.get('/events', (req: Request, res: Response) => {
    const filter = eventsQuery.parse(req.query);
    res.json({ events: queue.listEvents(filter) });
  });

  api.get('/events/:eventId', (req: Request, res: Response) => {
    const event = queue.getEvent(req.params.eventId);
    if (!event) {
      res.status(404).json({ error: 'Event not found' });
      return;
    }
    res.json({ event });
  });

  api.post('/events/:eventId/replay', (req: Request, res: Response) => {
    const { eventId } = req.params;
    if (!queue.getEvent(eventId)) {
      res.status(404).json({ error: 'Event not found' });
      return;
    }
    if (!queue.enqueueProcessing(eventId, clock())) {
      res.status(409).json({ error: 'Event is being processed' });
      return;
    }
    res.status(202).json({ replayed: eventId });
  });

  // ---------------------------------------------------------------------------
  // Sales
  // ---------------------------------------------------------------------------
  api.get('/users/:userId/sales/orphaned', (req: Request, res: Response) => {
    const limit = limitQuery.parse(req.query.limit);
    res.json({ sales: listOrphanedSales(db, req.params.userId, limit) });
  });

  api.post('/users/:userId/sales/rematch', (req: Request, res: Response) => {
    res.json(rematchSales(db, req.params.userId, services.matcher, clock()));
  });

  api.post('/users/:userId/sales/:saleId/resolve', (req: Request, res: Response) => {
    const { itemId } = resolveBody.parse(req.body);
    const result = resolveSale(db, req.params.userId, req.params.saleId, itemId, clock());
    if (!result.ok) {
      res.status(404).json({ error: result.error });
      return;
    }
    res.json({ sale: result.value });
  });

  // ---------------------------------------------------------------------------
  // Backfill
  // ---------------------------------------------------------------------------
  api.post('/users/:userId/backfill', (req: Request, res: Response) => {
    const options = backfillBody.parse(req.body);
    const { runId } = backfill.startBackfill(req.params.userId, options);
    res.status(202).json({ runId });
  });

  api.get('/users/:userId/backfill', (req: Request, res: Response) => {
    const { userId } = req.params;
    const run = backfill.latestRun(userId);
    if (!run) {
      res.status(404).json({ error: 'No backfill has run for this user' });
      return;
    }
    res.json({ run, running: backfill.isRunning(userId) });
  });

  api.delete('/users/:userId/backfill', (req: Request, res: Response) => {
    res.json({ cancelled: backfill.cancelBackfill(req.params.userId) });
  });

  api.get('/users/:userId/failed-imports', (req: Request, res: Response) => {
    const includeResolved = flagQuery.parse(req.query.includeResolved);
    res.json({ failedImports: backfill.listFailedImports(req.params.userId, { includeResolved }) });
  });

  api.post(
    '/users/:userId/failed-imports/retry',
    asyncRoute(async (req, res) => {
      res.json(await backfill.retryFailedImports(req.params.userId));
    }),
  );

  // ---------------------------------------------------------------------------
  // Subscriptions
  // ---------------------------------------------------------------------------
  api.get('/users/:userId/subscriptions', (req: Request, res: Response) => {
    res.json({ subscriptions: subscriptions.listSubscriptions(req.params.userId) });
  });

  api.post(
    '/users/:userId/subscriptions',
    asyncRoute(async (req, res) => {
      const { topics } = ensureBody.parse(req.body);
      const wanted = topics ?? config.defaultTopics;
      res.json(await subscriptions.ensureSubscriptions(req.params.userId, ALL_TOPICS.filter((t) => wanted.includes(t))));
    }),
  );

  api.delete(
    '/users/:userId/subscriptions',
    asyncRoute(async (req, res) => {
      res.json(await subscriptions.teardown(req.params.userId));
    }),
  );

  // ---------------------------------------------------------------------------
  // Auto-relist
  // ---------------------------------------------------------------------------
  api.get('/users/:userId/relist-rules', (req: Request, res: Response) => {
    res.json({ rules: relist.listRules(req.params.userId) });
  });

  api.post(
    '/users/:userId/relist-rules',
    asyncRoute(async (req, res) => {
      const body = ruleBody.parse(req.body);
      const rule = await relist.createRule(newRelistRuleSchema.parse({ ...body, userId: req.params.userId }), clock());
      res.status(201).json({ rule });
    }),
  );

  api.patch('/users/:userId/relist-rules/:ruleId', (req: Request, res: Response) => {
    const { enabled } = enabledBody.parse(req.body);
    if (!relist.setEnabled(req.params.userId, req.params.ruleId, enabled, clock())) {
      res.status(404).json({ error: 'Rule not found' });
      return;
    }
    res.json({ rule: relist.getRule(req.params.userId, req.params.ruleId) });
  });

  api.post('/users/:userId/relist-rules/:ruleId/trigger', (req: Request, res: Response) => {
    if (!relist.triggerManual(req.params.userId, req.params.ruleId)) {
      res.status(404).json({ error: 'Rule not found or disabled' });
      return;
    }
    res.status(202).json({ triggered: req.params.ruleId });
  });

  api.get('/users/:userId/relist-history', (req: Request, res: Response) => {
    const limit = limitQuery.parse(req.query.limit);
    const ruleId = typeof req.query.ruleId === 'string' ? req.query.ruleId : undefined;
    res.json({ history: relist.listHistory(req.params.userId, { ruleId, limit }) });
  });

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------
  api.get('/users/:userId/notifications', (req: Request, res: Response) => {
    const unreadOnly = flagQuery.parse(req.query.unreadOnly);
    const limit = limitQuery.parse(req.query.limit);
    res.json({ notifications: notifications.list(req.params.userId, { unreadOnly, limit }) });
  });

  api.post('/users/:userId/notifications/:id/read', (req: Request, res: Response) => {
    if (!notifications.markRead(req.params.userId, req.params.id, clock())) {
      res.status(404).json({ error: 'Notification not found' });
      return;
    }
    res.json({ read: req.params.id });
  });

  // ---------------------------------------------------------------------------
  // Maintenance jobs
  // ---------------------------------------------------------------------------
  const { cron } = services;
  if (cron) {
    api.get('/jobs', (_req: Request, res: Response) => {
      res.json({ running: cron.isRunning(), jobs: cron.getJobs().map(describeJob) });
    });

    api.post(
      '/jobs/:jobId/run',
      asyncRoute(async (req, res) => {
        const { jobId } = req.params;
        if (!cron.getJob(jobId)) throw new NotFoundError(`Job ${jobId} not found`);
        if (!(await cron.runNow(jobId))) {
          res.status(409).json({ error: 'Job is already running' });
          return;
        }
        const job = cron.getJob(jobId);
        res.json({ job: job ? describeJob(job) : null });
      }),
    );

    api.post('/jobs/:jobId/pause', (req: Request, res: Response) => {
      if (!cron.pauseJob(req.params.jobId)) throw new NotFoundError(`Job ${req.params.jobId} not found`);
      res.json({ paused: req.params.jobId });
    });

    api.post('/jobs/:jobId/resume', (req: Request, res: Response) => {
      if (!cron.resumeJob(req.params.jobId)) throw new NotFoundError(`Job ${req.params.jobId} not found`);
      res.json({ resumed: req.params.jobId });
    });
  }

  app.use('/api', api);

  // ---------------------------------------------------------------------------
  // Error-handling middleware (must be last)
  // ---------------------------------------------------------------------------
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = statusFor(err);
    if (status >= 500) {
      logger.error({ err: errorMessage(err), method: req.method, path: req.path }, 'Unhandled error in request handler');
    }
    if (res.headersSent) return;
    res.status(status).json(body);
  });

  const server = http.createServer(app);

  return {
    app,
    server,
    start(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.on('error', reject);
        server.listen(config.port, '0.0.0.0', () => {
          logger.info({ port: config.port }, 'Server started');
          resolve();
        });
      });
    },
    stop(): Promise<void> {
      return new Promise((resolve) => {
        server.close(() => {
          logger.info('Server stopped');
          resolve();
        });
      });
    },
  };
}
