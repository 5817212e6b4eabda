export {
  InterventionFlow,
  INTERVENTION_TIMEOUT_ACTION,
  interventionView,
  type InterventionFlowOptions,
} from './intervention-flow.js';
export {
  INTERVENTION_FLOW,
  InterventionState,
  WAITING_STATE_TIMEOUTS,
  STATE_PROMPTS,
  isWaitingState,
  isInterventionState,
  timeoutFor,
  type Assignment,
  type WaitingState,
} from './states.js';
