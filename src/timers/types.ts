import type { ScheduleSpec } from '../schedule/index.js';
import type { JsonObject } from '../utils/json.js';

/** Opaque timer identity; doubles as the durable dedupe key. */
export type TimerHandle = string;

/**
 * What a timer does when it fires: a registered action kind plus plain
 * serializable data. Never a closure, so durable timers survive restarts.
 */
export interface TimerAction {
  kind: string;
  payload: JsonObject;
}

export interface TimerFiring {
  handle: TimerHandle;
  kind: string;
  payload: JsonObject;
  /** When the timer was due (epoch ms) */
  scheduledFor: number;
  /** When the handler actually ran (epoch ms) */
  firedAt: number;
}

/** Action handlers must be idempotent. */
export type ActionHandler = (firing: TimerFiring) => Promise<void>;

export interface TimerOptions {
  /**
   * Logical identity. Arming again with the same key replaces the earlier
   * timer, and the key is returned as the handle.
   */
  key?: string;
}

export interface RecurringTimerOptions extends TimerOptions {
  /** Reference instant for the first occurrence (default: now) */
  startAfter?: Date | number;
}

export interface Timer {
  after(delayMs: number, action: TimerAction, options?: TimerOptions): TimerHandle;
  at(instant: Date | number, action: TimerAction, options?: TimerOptions): TimerHandle;
  recurring(spec: ScheduleSpec, action: TimerAction, options?: RecurringTimerOptions): TimerHandle;
  /** Idempotent; unknown or already-fired handles are ignored. */
  cancel(handle: TimerHandle): void;
  /** Whether the handle will still fire (or is firing right now). */
  isArmed(handle: TimerHandle): boolean;
  /** Release in-process resources. Durable timers stay scheduled. */
  stop(): void;
}
