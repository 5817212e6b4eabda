/**
 * Job Dispatcher
 *
 * Fixed-interval poll loop: claims every due job and starts its handler
 * without waiting for earlier handlers, so one slow job never holds up the
 * rest. Failed jobs are not retried.
 */

import type { Logger } from 'pino';
import type { Job } from '../store/index.js';
import type { JobQueue } from './job-queue.js';
import { errorMessage } from '../utils/logger.js';

export interface DispatcherOptions {
  queue: JobQueue;
  logger: Logger;
  /** Poll interval in milliseconds (default: 2 seconds) */
  interval?: number;
  /** Running jobs locked longer than this are requeued (default: 5 minutes) */
  staleJobThresholdMs?: number;
  /** Maximum jobs claimed per pass (default: 100) */
  claimLimit?: number;
  /** How long stop() waits for running handlers (default: 30 seconds) */
  drainTimeoutMs?: number;
}

export interface DispatchSummary {
  claimed: number;
  succeeded: number;
  failed: number;
}

export class Dispatcher {
  private queue: JobQueue;
  private logger: Logger;
  private interval: number;
  private staleJobThresholdMs: number;
  private claimLimit: number;
  private drainTimeoutMs: number;

  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  // job id -> handler run, resolving to whether it succeeded
  private inFlight = new Map<string, Promise<boolean>>();

  constructor(options: DispatcherOptions) {
    this.queue = options.queue;
    this.logger = options.logger.child({ component: 'dispatcher' });
    this.interval = options.interval ?? 2 * 1000;
    this.staleJobThresholdMs = options.staleJobThresholdMs ?? 5 * 60 * 1000;
    this.claimLimit = options.claimLimit ?? 100;
    this.drainTimeoutMs = options.drainTimeoutMs ?? 30 * 1000;
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('Dispatcher already running');
      return;
    }

    this.isRunning = true;
    this.logger.info({ intervalMs: this.interval }, 'Starting dispatcher');

    this.tick();
    this.intervalHandle = setInterval(() => this.tick(), this.interval);
  }

  /**
   * Stop polling and wait, up to the drain timeout, for running handlers.
   */
  async stop(): Promise<void> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    this.isRunning = false;

    if (this.inFlight.size > 0) {
      const drained = await this.drain();
      if (!drained) {
        this.logger.warn({ jobIds: [...this.inFlight.keys()] }, 'Stopped with handlers still running');
      }
    }
    this.logger.info('Dispatcher stopped');
  }

  get running(): boolean {
    return this.isRunning;
  }

  /** Number of handlers currently running. */
  get activeJobs(): number {
    return this.inFlight.size;
  }

  /**
   * Requeue jobs left 'running' by a previous process. Jobs this process is
   * still handling have their locks refreshed first.
   */
  recoverStaleJobs(now: number = Date.now()): { requeued: number; cancelled: number } {
    this.queue.touch([...this.inFlight.keys()], now);
    const result = this.queue.requeueStale(this.staleJobThresholdMs, now);
    if (result.requeued > 0 || result.cancelled > 0) {
      this.logger.info(result, 'Recovered stale running jobs');
    }
    return result;
  }

  /**
   * Run one dispatch pass: sweep stale jobs, claim what is due and start the
   * handlers. Resolves once this pass's handlers have settled; later passes
   * do not wait for it.
   */
  async runOnce(): Promise<DispatchSummary> {
    // Jobs orphaned by a crash come back once their lock goes stale
    this.recoverStaleJobs();
    const jobs = this.queue.claimDue(Date.now(), this.claimLimit);
    if (jobs.length === 0) {
      return { claimed: 0, succeeded: 0, failed: 0 };
    }

    this.logger.debug({ count: jobs.length, inFlight: this.inFlight.size }, 'Claimed due jobs');

    const results = await Promise.all(jobs.map((job) => this.track(job)));
    const succeeded = results.filter(Boolean).length;
    return { claimed: jobs.length, succeeded, failed: jobs.length - succeeded };
  }

  private tick(): void {
    this.runOnce().catch((err) => {
      this.logger.error({ error: errorMessage(err) }, 'Dispatch pass failed');
    });
  }

  private track(job: Job): Promise<boolean> {
    const run = this.runJob(job).finally(() => {
      this.inFlight.delete(job.id);
    });
    this.inFlight.set(job.id, run);
    return run;
  }

  /** Resolves to false when the drain timeout passed first. */
  private async drain(): Promise<boolean> {
    let timeout: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<false>((resolve) => {
      timeout = setTimeout(() => resolve(false), this.drainTimeoutMs);
    });
    const settled = Promise.all(this.inFlight.values()).then(() => true);
    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Run one claimed job; resolves to whether it succeeded. Never rejects.
   */
  private async runJob(job: Job): Promise<boolean> {
    const handler = this.queue.getHandler(job.kind);
    if (!handler) {
      this.logger.error({ jobId: job.id, kind: job.kind }, 'No handler registered for job kind');
      this.recordOutcome(job, 'no handler registered');
      return false;
    }

    try {
      await handler(this.queue.toClaimed(job));
      this.recordOutcome(job, null);
      this.logger.debug({ jobId: job.id, kind: job.kind }, 'Job done');
      return true;
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error({ jobId: job.id, kind: job.kind, error: message }, 'Job handler failed');
      this.recordOutcome(job, message);
      return false;
    }
  }

  private recordOutcome(job: Job, error: string | null): void {
    try {
      if (error === null) {
        this.queue.complete(job.id);
      } else {
        this.queue.fail(job.id, error);
      }
    } catch (err) {
      this.logger.error({ jobId: job.id, error: errorMessage(err) }, 'Failed to record job outcome');
    }
  }
}
