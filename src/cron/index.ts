/**
 * Cron Scheduler - recurring maintenance jobs
 *
 * Features:
 * - Interval jobs (run every N milliseconds)
 * - Pause/resume and force-run
 * - A job never overlaps itself; a tick that finds it still running skips it
 * - Handlers receive the tick time from an injectable clock
 */

import { createLogger } from '../utils/logger';
import { errorMessage } from '../infra/errors';

const logger = createLogger('cron');

// =============================================================================
// TYPES
// =============================================================================

export type CronJobStatus = 'ok' | 'error' | 'pending';

export type CronJobHandler = (now: number) => Promise<unknown> | unknown;

export interface CronJob {
  id: string;
  name: string;
  intervalMs: number;
  handler: CronJobHandler;
  enabled: boolean;
  running: boolean;
  lastRunAt: number | null;
  nextRunAt: number;
  lastStatus: CronJobStatus;
  lastError?: string;
  lastDurationMs?: number;
}

export interface CronJobInput {
  id: string;
  name: string;
  intervalMs: number;
  handler: CronJobHandler;
  enabled?: boolean;
  /** Run on the first tick instead of one interval after registration. */
  runAtStart?: boolean;
}

export interface CronSchedulerOptions {
  tickIntervalMs?: number;
  clock?: () => number;
}

// =============================================================================
// CRON SCHEDULER
// =============================================================================

export class CronScheduler {
  private jobs = new Map<string, CronJob>();
  private tickTimer: NodeJS.Timeout | null = null;
  private readonly tickIntervalMs: number;
  private readonly clock: () => number;

  constructor(options: CronSchedulerOptions = {}) {
    this.tickIntervalMs = options.tickIntervalMs ?? 30_000;
    this.clock = options.clock ?? Date.now;
  }

  addJob(input: CronJobInput): CronJob {
    if (this.jobs.has(input.id)) {
      logger.warn({ jobId: input.id }, 'Job already exists, replacing');
      this.removeJob(input.id);
    }
    if (!Number.isFinite(input.intervalMs) || input.intervalMs <= 0) {
      throw new Error(`Job ${input.id} needs a positive interval`);
    }

    const now = this.clock();
    const job: CronJob = {
      id: input.id,
      name: input.name,
      intervalMs: input.intervalMs,
      handler: input.handler,
      enabled: input.enabled !== false,
      running: false,
      lastRunAt: null,
      nextRunAt: input.runAtStart ? now : now + input.intervalMs,
      lastStatus: 'pending',
    };

    this.jobs.set(job.id, job);
    logger.info({ jobId: job.id, name: job.name, intervalMs: job.intervalMs, nextRunAt: job.nextRunAt }, 'Cron job added');
    return job;
  }

  removeJob(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    this.jobs.delete(id);
    logger.info({ jobId: id, name: job.name }, 'Cron job removed');
    return true;
  }

  /** Disable without removing. */
  pauseJob(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    job.enabled = false;
    logger.info({ jobId: id, name: job.name }, 'Cron job paused');
    return true;
  }

  resumeJob(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    job.enabled = true;
    job.nextRunAt = Math.max(job.nextRunAt, this.clock());
    logger.info({ jobId: id, name: job.name, nextRunAt: job.nextRunAt }, 'Cron job resumed');
    return true;
  }

  /**
   * Start the scheduler loop (checks every tickIntervalMs)
   */
  start(): void {
    if (this.tickTimer) {
      logger.warn('Cron scheduler already running');
      return;
    }

    logger.info({ tickIntervalMs: this.tickIntervalMs, jobCount: this.jobs.size }, 'Cron scheduler started');
    void this.tick();
    this.tickTimer = setInterval(() => {
      void this.tick();
    }, this.tickIntervalMs);
  }

  stop(): void {
    if (!this.tickTimer) return;
    clearInterval(this.tickTimer);
    this.tickTimer = null;
    logger.info('Cron scheduler stopped');
  }

  getJobs(): CronJob[] {
    return Array.from(this.jobs.values());
  }

  getJob(id: string): CronJob | undefined {
    return this.jobs.get(id);
  }

  isRunning(): boolean {
    return this.tickTimer !== null;
  }

  /**
   * Force-run a specific job immediately (ignoring schedule). False when
   * unknown or already running.
   */
  async runNow(id: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.running) return false;
    await this.executeJob(job);
    return true;
  }

  /**
   * Start every due job. Resolves when the jobs started by this tick finish;
   * the interval loop does not wait for it.
   */
  async tick(): Promise<void> {
    const now = this.clock();
    const started: Promise<void>[] = [];

    for (const job of this.jobs.values()) {
      if (!job.enabled || job.nextRunAt > now) continue;
      if (job.running) {
        logger.debug({ jobId: job.id }, 'Previous run still in progress, skipping');
        continue;
      }
      started.push(this.executeJob(job));
    }
    await Promise.all(started);
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  /** Never rejects; failures land on the job's status. */
  private async executeJob(job: CronJob): Promise<void> {
    const startedAt = this.clock();
    job.running = true;
    logger.debug({ jobId: job.id, name: job.name }, 'Running cron job');

    try {
      await job.handler(startedAt);
      job.lastStatus = 'ok';
      job.lastError = undefined;
    } catch (error) {
      job.lastStatus = 'error';
      job.lastError = errorMessage(error);
      logger.error({ jobId: job.id, name: job.name, error: job.lastError }, 'Cron job failed');
    } finally {
      const finishedAt = this.clock();
      job.running = false;
      job.lastRunAt = startedAt;
      job.lastDurationMs = finishedAt - startedAt;
      job.nextRunAt = Math.max(startedAt + job.intervalMs, finishedAt);
      logger.debug({ jobId: job.id, durationMs: job.lastDurationMs, nextRunAt: job.nextRunAt }, 'Cron job finished');
    }
  }
}

// =============================================================================
// SYNC JOBS
// =============================================================================

export interface SyncJobHandlers {
  /** Re-queue or fail events stuck in processing. */
  sweepEvents: (now: number) => unknown;
  renewSubscriptions: (now: number) => Promise<unknown>;
  relistTick: (now: number) => Promise<unknown>;
  /** Omitted when polling is disabled. */
  poll?: (now: number) => Promise<unknown>;
}

export interface SyncJobIntervals {
  sweepMs: number;
  renewMs: number;
  relistMs: number;
  pollMs: number;
}

export function registerSyncJobs(scheduler: CronScheduler, handlers: SyncJobHandlers, intervals: SyncJobIntervals): void {
  scheduler.addJob({ id: 'sweep_events', name: 'Stuck Event Sweep', intervalMs: intervals.sweepMs, handler: handlers.sweepEvents });
  scheduler.addJob({
    id: 'renew_subscriptions',
    name: 'Subscription Renewal',
    intervalMs: intervals.renewMs,
    handler: handlers.renewSubscriptions,
    runAtStart: true,
  });
  scheduler.addJob({ id: 'relist_tick', name: 'Auto-Relist', intervalMs: intervals.relistMs, handler: handlers.relistTick, runAtStart: true });
  if (handlers.poll) {
    scheduler.addJob({ id: 'poll_marketplace', name: 'Marketplace Poller', intervalMs: intervals.pollMs, handler: handlers.poll });
  }

  logger.info({ jobs: scheduler.getJobs().map((job) => job.id) }, 'Sync jobs registered');
}
