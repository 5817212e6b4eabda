/**
 * Tracked timers: timers whose existence is recorded in the participant's
 * state bag, so a restarted process can find and re-arm them.
 *
 * Marker key: `timer:<name>`. Timer key (and durable dedupe key):
 * `<flowType>:<participantId>:<name>`, so re-arming the same name replaces
 * the previous timer.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { Timer, TimerAction, TimerHandle } from '../timers/index.js';
import { jsonObjectSchema } from '../utils/json.js';
import { errorMessage } from '../utils/logger.js';
import type { StateManager } from './state-manager.js';

export const MARKER_PREFIX = 'timer:';

export const timerMarkerSchema = z.object({
  handle: z.string().min(1),
  dueAt: z.number(),
  armedAt: z.number(),
  action: z.object({
    kind: z.string().min(1),
    payload: jsonObjectSchema,
  }),
});

export type TimerMarker = z.infer<typeof timerMarkerSchema>;

export interface NamedMarker {
  name: string;
  marker: TimerMarker;
}

export type TimerWhen = { delayMs: number } | { at: Date | number };

export interface TrackedTimersOptions {
  state: StateManager;
  timer: Timer;
  logger: Logger;
}

export function markerKey(name: string): string {
  return `${MARKER_PREFIX}${name}`;
}

export function timerKey(participantId: string, flowType: string, name: string): string {
  return `${flowType}:${participantId}:${name}`;
}

/** Every readable marker in a state bag. */
export function readMarkers(stateData: Record<string, string>): NamedMarker[] {
  const markers: NamedMarker[] = [];
  for (const [key, raw] of Object.entries(stateData)) {
    if (!key.startsWith(MARKER_PREFIX)) continue;
    const marker = parseMarker(raw);
    if (marker) {
      markers.push({ name: key.slice(MARKER_PREFIX.length), marker });
    }
  }
  return markers;
}

function parseMarker(raw: string): TimerMarker | null {
  try {
    const result = timerMarkerSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export class TrackedTimers {
  private state: StateManager;
  private timer: Timer;
  private logger: Logger;

  constructor(options: TrackedTimersOptions) {
    this.state = options.state;
    this.timer = options.timer;
    this.logger = options.logger.child({ component: 'tracked-timers' });
  }

  /**
   * Arm a timer and record its marker. A failed marker write is logged and
   * swallowed: the timer stays armed, only restart recovery loses sight of it.
   */
  arm(participantId: string, flowType: string, name: string, when: TimerWhen, action: TimerAction): TimerHandle {
    const dueAt = 'delayMs' in when ? Date.now() + when.delayMs : toMs(when.at);
    const key = timerKey(participantId, flowType, name);
    const handle = this.timer.at(dueAt, action, { key });

    this.writeMarker(participantId, flowType, name, {
      handle,
      dueAt,
      armedAt: Date.now(),
      action: { kind: action.kind, payload: action.payload },
    });

    this.logger.debug({ participantId, flowType, name, dueAt: new Date(dueAt).toISOString() }, 'Tracked timer armed');
    return handle;
  }

  /**
   * Re-arm a recovered marker for a new due time, overwriting its stale handle.
   */
  rearm(participantId: string, flowType: string, name: string, marker: TimerMarker, dueAt: number): TimerHandle {
    const handle = this.timer.at(dueAt, marker.action, { key: timerKey(participantId, flowType, name) });
    // dueAt stays the original due time; only the handle and armedAt change
    this.writeMarker(participantId, flowType, name, { ...marker, handle, armedAt: Date.now() });
    return handle;
  }

  /** Cancel the timer and drop its marker. */
  disarm(participantId: string, flowType: string, name: string): void {
    const marker = this.getMarker(participantId, flowType, name);
    this.timer.cancel(marker?.handle ?? timerKey(participantId, flowType, name));
    this.clear(participantId, flowType, name);
  }

  /** Drop the marker only, after the timer fired. */
  clear(participantId: string, flowType: string, name: string): void {
    try {
      this.state.setStateData(participantId, flowType, markerKey(name), null);
    } catch (err) {
      this.logger.warn({ participantId, flowType, name, error: errorMessage(err) }, 'Failed to clear timer marker');
    }
  }

  getMarker(participantId: string, flowType: string, name: string): TimerMarker | null {
    const raw = this.state.getStateData(participantId, flowType, markerKey(name));
    return raw === undefined ? null : parseMarker(raw);
  }

  private writeMarker(participantId: string, flowType: string, name: string, marker: TimerMarker): void {
    try {
      this.state.setStateData(participantId, flowType, markerKey(name), JSON.stringify(marker));
    } catch (err) {
      this.logger.warn({ participantId, flowType, name, error: errorMessage(err) }, 'Failed to record timer marker');
    }
  }
}

function toMs(at: Date | number): number {
  return at instanceof Date ? at.getTime() : at;
}
