/**
 * Durable Job Queue
 *
 * Thin domain layer over the jobs table: serializes payloads, routes job
 * kinds to handlers and converts store failures into TransientDependencyError.
 */

import type { Logger } from 'pino';
import type { HabitDatabase, Job } from '../store/index.js';
import { isHabitLoopError, TransientDependencyError, ValidationError } from '../errors/index.js';
import { parseJsonObject, type JsonObject } from '../utils/json.js';

/**
 * A claimed job as seen by its handler
 */
export interface ClaimedJob {
  id: string;
  kind: string;
  runAt: number;
  payload: JsonObject;
  dedupeKey: string | null;
  attempt: number;
}

/**
 * Handlers must be idempotent: re-read state and no-op when the work is obsolete.
 */
export type JobHandler = (job: ClaimedJob) => Promise<void>;

export interface JobQueueOptions {
  db: HabitDatabase;
  logger: Logger;
}

export class JobQueue {
  private db: HabitDatabase;
  private logger: Logger;
  private handlers = new Map<string, JobHandler>();

  constructor(options: JobQueueOptions) {
    this.db = options.db;
    this.logger = options.logger.child({ component: 'job-queue' });
  }

  /**
   * Enqueue a job. With a dedupe key, any pending job holding the same key
   * is superseded atomically. Returns the new job id.
   */
  enqueue(kind: string, runAt: number | Date, payload: JsonObject, dedupeKey?: string): string {
    if (!kind) {
      throw new ValidationError('job kind is required', 'kind');
    }
    const runAtMs = runAt instanceof Date ? runAt.getTime() : runAt;
    if (!Number.isFinite(runAtMs)) {
      throw new ValidationError('runAt must be a finite timestamp', 'runAt');
    }

    const { job, superseded } = this.withStore(() =>
      this.db.enqueueJob({ kind, runAt: runAtMs, payload: JSON.stringify(payload), dedupeKey })
    );

    if (superseded.length > 0) {
      this.logger.debug({ jobId: job.id, dedupeKey, superseded }, 'Superseded pending job');
    }
    this.logger.debug({ jobId: job.id, kind, runAt: new Date(runAtMs).toISOString() }, 'Job enqueued');
    return job.id;
  }

  /** Idempotent; returns whether a pending or running job was cancelled. */
  cancel(jobId: string): boolean {
    return this.withStore(() => this.db.cancelJob(jobId));
  }

  cancelByDedupeKey(dedupeKey: string): number {
    return this.withStore(() => this.db.cancelJobsByDedupeKey(dedupeKey));
  }

  registerHandler(kind: string, handler: JobHandler): void {
    if (this.handlers.has(kind)) {
      this.logger.warn({ kind }, 'Replacing existing job handler');
    }
    this.handlers.set(kind, handler);
  }

  getHandler(kind: string): JobHandler | undefined {
    return this.handlers.get(kind);
  }

  getJob(jobId: string): Job | null {
    return this.withStore(() => this.db.getJob(jobId));
  }

  /** The pending or running job holding the dedupe key, if any. */
  findActive(dedupeKey: string): Job | null {
    return this.withStore(
      () =>
        this.db.listJobs({ dedupeKey }).find((job) => job.status === 'pending' || job.status === 'running') ?? null
    );
  }

  hasActive(dedupeKey: string): boolean {
    return this.findActive(dedupeKey) !== null;
  }

  listPending(): Job[] {
    return this.withStore(() => this.db.listJobs({ status: 'pending' }));
  }

  claimDue(now: number = Date.now(), limit?: number): Job[] {
    return this.withStore(() => this.db.claimDueJobs(now, limit));
  }

  complete(jobId: string): boolean {
    return this.withStore(() => this.db.completeJob(jobId));
  }

  fail(jobId: string, error: string): boolean {
    return this.withStore(() => this.db.failJob(jobId, error));
  }

  /** Keep the locks of jobs still being handled from going stale. */
  touch(jobIds: readonly string[], now: number = Date.now()): number {
    if (jobIds.length === 0) return 0;
    return this.withStore(() => this.db.touchJobs(jobIds, now));
  }

  requeueStale(thresholdMs: number, now: number = Date.now()): { requeued: number; cancelled: number } {
    return this.withStore(() => this.db.requeueStaleJobs(now - thresholdMs, now));
  }

  /** Parse a stored job into its handler-facing form. */
  toClaimed(job: Job): ClaimedJob {
    return {
      id: job.id,
      kind: job.kind,
      runAt: job.runAt,
      payload: parseJsonObject(job.payload),
      dedupeKey: job.dedupeKey,
      attempt: job.attempt,
    };
  }

  private withStore<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isHabitLoopError(error)) throw error;
      throw new TransientDependencyError('job store', error);
    }
  }
}
