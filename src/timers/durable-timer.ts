/**
 * Durable timer backing on top of the job queue.
 *
 * Every handle is used as the job's dedupe key, so re-arming a key
 * supersedes its pending job and cancel(handle) reaches pending and
 * claimed jobs alike. Recurring timers are a single pending job that
 * enqueues its own successor each time it fires.
 */

import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { ClaimedJob, JobQueue } from '../jobs/index.js';
import {
  nextOccurrence,
  scheduleSpecSchema,
  describeScheduleSpec,
  scheduleSpecToJson,
  type ScheduleSpec,
} from '../schedule/index.js';
import { ValidationError } from '../errors/index.js';
import { jsonObjectSchema } from '../utils/json.js';
import { errorMessage } from '../utils/logger.js';
import type { ActionRegistry } from './action-registry.js';
import type {
  RecurringTimerOptions,
  Timer,
  TimerAction,
  TimerHandle,
  TimerOptions,
} from './types.js';
import { assertAction, assertDelay, toInstantMs } from './validation.js';

export const TIMER_FIRE_JOB = 'timer.fire';
export const TIMER_RECURRING_JOB = 'timer.recurring';

const actionSchema = z.object({
  kind: z.string().min(1),
  payload: jsonObjectSchema,
});

const oneOffPayloadSchema = z.object({
  handle: z.string().min(1),
  action: actionSchema,
});

const recurringPayloadSchema = oneOffPayloadSchema.extend({
  spec: scheduleSpecSchema,
});

export interface DurableTimerOptions {
  queue: JobQueue;
  registry: ActionRegistry;
  logger: Logger;
}

export class DurableTimer implements Timer {
  private queue: JobQueue;
  private registry: ActionRegistry;
  private logger: Logger;

  constructor(options: DurableTimerOptions) {
    this.queue = options.queue;
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'durable-timer' });

    this.queue.registerHandler(TIMER_FIRE_JOB, (job) => this.handleOneOff(job));
    this.queue.registerHandler(TIMER_RECURRING_JOB, (job) => this.handleRecurring(job));
  }

  after(delayMs: number, action: TimerAction, options: TimerOptions = {}): TimerHandle {
    assertDelay(delayMs);
    return this.at(Date.now() + delayMs, action, options);
  }

  at(instant: Date | number, action: TimerAction, options: TimerOptions = {}): TimerHandle {
    assertAction(action);
    const runAt = toInstantMs(instant);
    const handle = options.key ?? `tmr_${nanoid()}`;
    this.queue.enqueue(TIMER_FIRE_JOB, runAt, { handle, action: { kind: action.kind, payload: action.payload } }, handle);
    return handle;
  }

  recurring(spec: ScheduleSpec, action: TimerAction, options: RecurringTimerOptions = {}): TimerHandle {
    assertAction(action);
    const reference = options.startAfter !== undefined ? toInstantMs(options.startAfter, 'startAfter') : Date.now();
    const runAt = nextOccurrence(spec, new Date(reference)).getTime();
    const handle = options.key ?? `rec_${nanoid()}`;
    this.enqueueOccurrence(handle, spec, action, runAt);
    this.logger.debug(
      { handle, schedule: describeScheduleSpec(spec), firstRunAt: new Date(runAt).toISOString() },
      'Recurring timer armed'
    );
    return handle;
  }

  cancel(handle: TimerHandle): void {
    try {
      const cancelled = this.queue.cancelByDedupeKey(handle);
      if (cancelled > 0) {
        this.logger.debug({ handle, cancelled }, 'Timer cancelled');
      }
    } catch (err) {
      // Cancel never throws to callers; a stuck job is still checked by its handler
      this.logger.error({ handle, error: errorMessage(err) }, 'Failed to cancel timer');
    }
  }

  isArmed(handle: TimerHandle): boolean {
    return this.queue.hasActive(handle);
  }

  stop(): void {
    // Jobs stay in the store; the dispatcher owns the poll loop
  }

  private enqueueOccurrence(handle: TimerHandle, spec: ScheduleSpec, action: TimerAction, runAt: number): string {
    return this.queue.enqueue(
      TIMER_RECURRING_JOB,
      runAt,
      { handle, spec: scheduleSpecToJson(spec), action: { kind: action.kind, payload: action.payload } },
      handle
    );
  }

  private async handleOneOff(job: ClaimedJob): Promise<void> {
    const parsed = oneOffPayloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      throw new ValidationError(`malformed timer job payload: ${parsed.error.message}`, 'payload');
    }
    const { handle, action } = parsed.data;
    await this.registry.invoke({
      handle,
      kind: action.kind,
      payload: action.payload,
      scheduledFor: job.runAt,
      firedAt: Date.now(),
    });
  }

  private async handleRecurring(job: ClaimedJob): Promise<void> {
    const parsed = recurringPayloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      throw new ValidationError(`malformed recurring timer payload: ${parsed.error.message}`, 'payload');
    }
    const { handle, spec, action } = parsed.data;

    if (this.wasCancelled(job.id)) {
      this.logger.debug({ handle, jobId: job.id }, 'Recurring timer cancelled before firing');
      return;
    }

    const reference = Math.max(job.runAt, Date.now());
    const nextRunAt = nextOccurrence(spec, new Date(reference)).getTime();
    const nextJobId = this.enqueueOccurrence(handle, spec, action, nextRunAt);

    // A cancel that landed between the check and the re-arm must win
    if (this.wasCancelled(job.id)) {
      this.queue.cancel(nextJobId);
      return;
    }

    await this.registry.invoke({
      handle,
      kind: action.kind,
      payload: action.payload,
      scheduledFor: job.runAt,
      firedAt: Date.now(),
    });
  }

  private wasCancelled(jobId: string): boolean {
    return this.queue.getJob(jobId)?.status === 'cancelled';
  }
}
