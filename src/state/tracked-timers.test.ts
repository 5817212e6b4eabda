import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { pino } from 'pino';
import { HabitDatabase } from '../store/index.js';
import { ActionRegistry, InMemoryTimer } from '../timers/index.js';
import { StateManager } from './state-manager.js';
import { markerKey, readMarkers, timerKey, TrackedTimers } from './tracked-timers.js';

const logger = pino({ level: 'silent' });
const NOW = Date.parse('2025-06-02T08:00:00Z');
const FLOW = 'micro_health_intervention';
const ACTION = { kind: 'intervention.timeout', payload: { participantId: 'p1', state: 'FEELING_PROMPT' } };

describe('TrackedTimers', () => {
  let db: HabitDatabase;
  let state: StateManager;
  let timer: InMemoryTimer;
  let timers: TrackedTimers;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    db = new HabitDatabase(':memory:');
    state = new StateManager({ db, logger });
    const registry = new ActionRegistry(logger);
    registry.register('intervention.timeout', async () => {});
    timer = new InMemoryTimer({ registry, logger });
    timers = new TrackedTimers({ state, timer, logger });
  });

  afterEach(() => {
    timer.stop();
    db.close();
    vi.useRealTimers();
  });

  it('should build keys from flow, participant and name', () => {
    expect(markerKey('stateTimeout')).toBe('timer:stateTimeout');
    expect(timerKey('p1', FLOW, 'stateTimeout')).toBe('micro_health_intervention:p1:stateTimeout');
  });

  it('should arm the timer and record its marker', () => {
    const handle = timers.arm('p1', FLOW, 'stateTimeout', { delayMs: 15 * 60 * 1000 }, ACTION);

    expect(handle).toBe('micro_health_intervention:p1:stateTimeout');
    expect(timer.isArmed(handle)).toBe(true);
    expect(timers.getMarker('p1', FLOW, 'stateTimeout')).toEqual({
      handle,
      dueAt: NOW + 15 * 60 * 1000,
      armedAt: NOW,
      action: ACTION,
    });
  });

  it('should accept an absolute due time', () => {
    timers.arm('p1', FLOW, 'prompt', { at: new Date(NOW + 5000) }, ACTION);

    expect(timers.getMarker('p1', FLOW, 'prompt')?.dueAt).toBe(NOW + 5000);
  });

  it('should cancel the timer and drop the marker on disarm', () => {
    const handle = timers.arm('p1', FLOW, 'stateTimeout', { delayMs: 1000 }, ACTION);

    timers.disarm('p1', FLOW, 'stateTimeout');

    expect(timer.isArmed(handle)).toBe(false);
    expect(timers.getMarker('p1', FLOW, 'stateTimeout')).toBeNull();
    expect(state.getStateData('p1', FLOW, 'timer:stateTimeout')).toBeUndefined();
  });

  it('should disarm a name that was never armed', () => {
    expect(() => timers.disarm('p1', FLOW, 'stateTimeout')).not.toThrow();
  });

  it('should drop only the marker on clear', () => {
    const handle = timers.arm('p1', FLOW, 'stateTimeout', { delayMs: 1000 }, ACTION);

    timers.clear('p1', FLOW, 'stateTimeout');

    expect(timer.isArmed(handle)).toBe(true);
    expect(timers.getMarker('p1', FLOW, 'stateTimeout')).toBeNull();
  });

  it('should keep the original due time when re-arming a recovered marker', () => {
    timers.arm('p1', FLOW, 'stateTimeout', { delayMs: 1000 }, ACTION);
    const marker = timers.getMarker('p1', FLOW, 'stateTimeout');
    if (!marker) throw new Error('marker missing');

    vi.setSystemTime(NOW + 60_000);
    timers.rearm('p1', FLOW, 'stateTimeout', marker, NOW + 65_000);

    expect(timers.getMarker('p1', FLOW, 'stateTimeout')).toEqual({ ...marker, armedAt: NOW + 60_000 });
    expect(timer.listActive()).toEqual([
      { handle: marker.handle, kind: 'intervention.timeout', dueAt: NOW + 65_000, recurring: false },
    ]);
  });

  it('should keep the timer armed when the marker cannot be written', () => {
    db.close();

    const handle = timers.arm('p1', FLOW, 'stateTimeout', { delayMs: 1000 }, ACTION);

    expect(timer.isArmed(handle)).toBe(true);
  });
});

describe('readMarkers', () => {
  it('should return readable markers and skip everything else', () => {
    const marker = { handle: 'f:p1:a', dueAt: 10, armedAt: 5, action: { kind: 'k', payload: {} } };
    const markers = readMarkers({
      address: '+15551230000',
      'timer:a': JSON.stringify(marker),
      'timer:broken': '{"handle":',
      'timer:incomplete': '{"handle":"x"}',
    });

    expect(markers).toEqual([{ name: 'a', marker }]);
  });
});
