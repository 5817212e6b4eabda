import { ValidationError } from '../errors/index.js';
import type { TimerAction } from './types.js';

export function toInstantMs(instant: Date | number, field = 'instant'): number {
  const ms = instant instanceof Date ? instant.getTime() : instant;
  if (!Number.isFinite(ms)) {
    throw new ValidationError('must be a valid date or timestamp', field);
  }
  return ms;
}

export function assertDelay(delayMs: number): void {
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new ValidationError('must be a non-negative number of milliseconds', 'delayMs');
  }
}

export function assertAction(action: TimerAction): void {
  if (!action.kind) {
    throw new ValidationError('action kind is required', 'action.kind');
  }
}
