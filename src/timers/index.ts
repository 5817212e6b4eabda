export type {
  Timer,
  TimerHandle,
  TimerAction,
  TimerFiring,
  ActionHandler,
  TimerOptions,
  RecurringTimerOptions,
} from './types.js';
export { ActionRegistry } from './action-registry.js';
export { InMemoryTimer, type InMemoryTimerOptions, type ActiveTimerInfo } from './memory-timer.js';
export {
  DurableTimer,
  TIMER_FIRE_JOB,
  TIMER_RECURRING_JOB,
  type DurableTimerOptions,
} from './durable-timer.js';
