/**
 * In-memory timer backing. Timers live only as long as the process.
 */

import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import { nextOccurrence, describeScheduleSpec, type ScheduleSpec } from '../schedule/index.js';
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

// setTimeout overflows above 2^31-1 ms (~24.8 days); longer waits are chained
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

interface ActiveTimer {
  handle: TimerHandle;
  action: TimerAction;
  dueAt: number;
  spec: ScheduleSpec | null;
  timeout: ReturnType<typeof setTimeout>;
}

export interface ActiveTimerInfo {
  handle: TimerHandle;
  kind: string;
  dueAt: number;
  recurring: boolean;
}

export interface InMemoryTimerOptions {
  registry: ActionRegistry;
  logger: Logger;
}

export class InMemoryTimer implements Timer {
  private registry: ActionRegistry;
  private logger: Logger;
  private timers = new Map<TimerHandle, ActiveTimer>();

  constructor(options: InMemoryTimerOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'memory-timer' });
  }

  after(delayMs: number, action: TimerAction, options: TimerOptions = {}): TimerHandle {
    assertDelay(delayMs);
    return this.at(Date.now() + delayMs, action, options);
  }

  at(instant: Date | number, action: TimerAction, options: TimerOptions = {}): TimerHandle {
    assertAction(action);
    const dueAt = toInstantMs(instant);
    const handle = options.key ?? `tmr_${nanoid()}`;
    this.arm(handle, action, dueAt, null);
    return handle;
  }

  recurring(spec: ScheduleSpec, action: TimerAction, options: RecurringTimerOptions = {}): TimerHandle {
    assertAction(action);
    const reference = options.startAfter !== undefined ? toInstantMs(options.startAfter, 'startAfter') : Date.now();
    const dueAt = nextOccurrence(spec, new Date(reference)).getTime();
    const handle = options.key ?? `rec_${nanoid()}`;
    this.arm(handle, action, dueAt, spec);
    this.logger.debug({ handle, schedule: describeScheduleSpec(spec) }, 'Recurring timer armed');
    return handle;
  }

  cancel(handle: TimerHandle): void {
    const timer = this.timers.get(handle);
    if (!timer) return;
    clearTimeout(timer.timeout);
    this.timers.delete(handle);
    this.logger.debug({ handle }, 'Timer cancelled');
  }

  isArmed(handle: TimerHandle): boolean {
    return this.timers.has(handle);
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer.timeout);
    }
    this.timers.clear();
  }

  listActive(): ActiveTimerInfo[] {
    return [...this.timers.values()].map((t) => ({
      handle: t.handle,
      kind: t.action.kind,
      dueAt: t.dueAt,
      recurring: t.spec !== null,
    }));
  }

  private arm(handle: TimerHandle, action: TimerAction, dueAt: number, spec: ScheduleSpec | null): void {
    this.cancel(handle);

    const remaining = Math.max(0, dueAt - Date.now());
    const timeout = setTimeout(() => {
      if (remaining > MAX_TIMEOUT_MS) {
        // Only an intermediate hop; re-arm for the rest
        this.arm(handle, action, dueAt, spec);
        return;
      }
      this.fire(handle);
    }, Math.min(remaining, MAX_TIMEOUT_MS));

    this.timers.set(handle, { handle, action, dueAt, spec, timeout });
  }

  private fire(handle: TimerHandle): void {
    const timer = this.timers.get(handle);
    if (!timer) return;
    this.timers.delete(handle);

    if (timer.spec) {
      // Re-arm before running so a slow handler never delays the next occurrence
      const reference = Math.max(timer.dueAt, Date.now());
      const next = nextOccurrence(timer.spec, new Date(reference)).getTime();
      this.arm(handle, timer.action, next, timer.spec);
    }

    this.registry
      .invoke({
        handle,
        kind: timer.action.kind,
        payload: timer.action.payload,
        scheduledFor: timer.dueAt,
        firedAt: Date.now(),
      })
      .catch((err) => {
        this.logger.error({ handle, kind: timer.action.kind, error: errorMessage(err) }, 'Timer action failed');
      });
  }
}
