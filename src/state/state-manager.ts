/**
 * Per-participant state store access layer.
 *
 * Every mutation reads the full record, applies the change and writes the
 * full record back inside one SQLite transaction.
 */

import type { Logger } from 'pino';
import type { FlowStateRecord, HabitDatabase } from '../store/index.js';
import { isHabitLoopError, TransientDependencyError, ValidationError } from '../errors/index.js';

/** State assigned to a record created by a data write before any transition */
export const INITIAL_STATE = 'INIT';

export interface FlowStateDraft {
  currentState: string;
  stateData: Record<string, string>;
}

export interface StateManagerOptions {
  db: HabitDatabase;
  logger: Logger;
}

export class StateManager {
  private db: HabitDatabase;
  private logger: Logger;

  constructor(options: StateManagerOptions) {
    this.db = options.db;
    this.logger = options.logger.child({ component: 'state-manager' });
  }

  getFlowState(participantId: string, flowType: string): FlowStateRecord | null {
    assertIds(participantId, flowType);
    return this.withStore(() => this.db.getFlowState(participantId, flowType));
  }

  getCurrentState(participantId: string, flowType: string): string | null {
    return this.getFlowState(participantId, flowType)?.currentState ?? null;
  }

  setCurrentState(participantId: string, flowType: string, state: string): FlowStateRecord {
    if (!state) {
      throw new ValidationError('state is required', 'state');
    }
    const previous = this.getCurrentState(participantId, flowType);
    const saved = this.update(participantId, flowType, (draft) => {
      draft.currentState = state;
    });
    this.logger.debug({ participantId, flowType, from: previous, to: state }, 'State transition');
    return saved;
  }

  getStateData(participantId: string, flowType: string, key: string): string | undefined {
    return this.getFlowState(participantId, flowType)?.stateData[key];
  }

  /** Set one key; `null` removes it. */
  setStateData(participantId: string, flowType: string, key: string, value: string | null): FlowStateRecord {
    if (!key) {
      throw new ValidationError('key is required', 'key');
    }
    return this.update(participantId, flowType, (draft) => {
      if (value === null) {
        delete draft.stateData[key];
      } else {
        draft.stateData[key] = value;
      }
    });
  }

  /**
   * Read-modify-write of the whole record. Creates the record in
   * `initialState` when it does not exist yet.
   */
  update(
    participantId: string,
    flowType: string,
    mutate: (draft: FlowStateDraft) => void,
    initialState: string = INITIAL_STATE
  ): FlowStateRecord {
    assertIds(participantId, flowType);
    return this.withStore(() =>
      this.db.transaction(() => {
        const existing = this.db.getFlowState(participantId, flowType);
        const draft: FlowStateDraft = {
          currentState: existing?.currentState ?? initialState,
          stateData: { ...(existing?.stateData ?? {}) },
        };
        mutate(draft);
        return this.db.saveFlowState({ participantId, flowType, ...draft });
      })
    );
  }

  listActive(flowType?: string): FlowStateRecord[] {
    return this.withStore(() => this.db.listFlowStates(flowType));
  }

  listFlows(participantId: string): FlowStateRecord[] {
    return this.listActive().filter((s) => s.participantId === participantId);
  }

  listParticipantIds(): string[] {
    return this.withStore(() => this.db.listParticipantIds());
  }

  /** Delete one flow's record, or every record of the participant. */
  reset(participantId: string, flowType?: string): number {
    if (!participantId) {
      throw new ValidationError('participantId is required', 'participantId');
    }
    const removed = this.withStore(() => this.db.deleteFlowState(participantId, flowType));
    this.logger.info({ participantId, flowType, removed }, 'Flow state reset');
    return removed;
  }

  private withStore<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isHabitLoopError(error)) throw error;
      throw new TransientDependencyError('state store', error);
    }
  }
}

function assertIds(participantId: string, flowType: string): void {
  if (!participantId) {
    throw new ValidationError('participantId is required', 'participantId');
  }
  if (!flowType) {
    throw new ValidationError('flowType is required', 'flowType');
  }
}
