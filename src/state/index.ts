export {
  StateManager,
  INITIAL_STATE,
  type StateManagerOptions,
  type FlowStateDraft,
} from './state-manager.js';
export { StateView, defineStateView } from './state-view.js';
export {
  TrackedTimers,
  MARKER_PREFIX,
  markerKey,
  timerKey,
  readMarkers,
  timerMarkerSchema,
  type TimerMarker,
  type NamedMarker,
  type TimerWhen,
  type TrackedTimersOptions,
} from './tracked-timers.js';
