/**
 * Recovery Coordinator
 *
 * Runs once at startup, before the dispatcher and before inbound traffic.
 * For every participant with a non-terminal flow it re-arms outstanding
 * timed work from the state bag's timer markers and re-registers response
 * routing. One participant's failure never stops the batch.
 */

import type { Logger } from 'pino';
import type { ResponseRouter } from '../messaging/index.js';
import { readMarkers, type StateManager, type TrackedTimers } from '../state/index.js';
import type { FlowStateRecord } from '../store/index.js';
import { errorMessage } from '../utils/logger.js';
import type { FlowRecoveryHooks, RecoverySummary } from './types.js';

export interface RecoveryCoordinatorOptions {
  state: StateManager;
  timers: TrackedTimers;
  router: ResponseRouter;
  flows: FlowRecoveryHooks[];
  logger: Logger;
  /** Delay before firing work that came due while the process was down (default: 5 seconds) */
  graceMs?: number;
}

type ParticipantOutcome = 'recovered' | 'skipped';

export class RecoveryCoordinator {
  private state: StateManager;
  private timers: TrackedTimers;
  private router: ResponseRouter;
  private flows: Map<string, FlowRecoveryHooks>;
  private logger: Logger;
  private graceMs: number;

  constructor(options: RecoveryCoordinatorOptions) {
    this.state = options.state;
    this.timers = options.timers;
    this.router = options.router;
    this.flows = new Map(options.flows.map((flow) => [flow.flowType, flow]));
    this.logger = options.logger.child({ component: 'recovery' });
    this.graceMs = options.graceMs ?? 5000;
  }

  /**
   * Recover every participant that has stored flow state.
   */
  async recoverActive(): Promise<RecoverySummary> {
    return this.recoverAll(this.state.listParticipantIds());
  }

  async recoverAll(participantIds: readonly string[]): Promise<RecoverySummary> {
    const startedAt = Date.now();
    const summary: RecoverySummary = { recovered: 0, skipped: 0, errored: 0 };

    this.logger.info({ participants: participantIds.length }, 'Starting recovery');

    for (const participantId of participantIds) {
      try {
        const outcome = await this.recoverParticipant(participantId);
        summary[outcome]++;
      } catch (err) {
        summary.errored++;
        this.logger.error({ participantId, error: errorMessage(err) }, 'Participant recovery failed');
      }
    }

    this.logger.info({ ...summary, durationMs: Date.now() - startedAt }, 'Recovery complete');
    return summary;
  }

  private async recoverParticipant(participantId: string): Promise<ParticipantOutcome> {
    const records = this.state.listFlows(participantId);
    let recoveredAny = false;

    for (const record of records) {
      const hooks = this.flows.get(record.flowType);
      if (!hooks) {
        this.logger.warn({ participantId, flowType: record.flowType }, 'No recovery hooks for flow type');
        continue;
      }
      if (hooks.isTerminal(record)) {
        continue;
      }

      await this.recoverFlow(record, hooks);
      recoveredAny = true;
    }

    return recoveredAny ? 'recovered' : 'skipped';
  }

  private async recoverFlow(record: FlowStateRecord, hooks: FlowRecoveryHooks): Promise<void> {
    const { participantId, flowType } = record;
    const now = Date.now();
    const rearmed: string[] = [];

    for (const { name, marker } of readMarkers(record.stateData)) {
      // Overdue work fires shortly after startup; future work keeps its remaining delay
      const dueAt = marker.dueAt <= now ? now + this.graceMs : marker.dueAt;
      this.timers.rearm(participantId, flowType, name, marker, dueAt);
      rearmed.push(name);
      this.logger.debug(
        { participantId, flowType, name, overdue: marker.dueAt <= now, dueAt: new Date(dueAt).toISOString() },
        'Timer re-armed'
      );
    }

    const address = hooks.responseAddress(record);
    if (address) {
      this.router.register(address, participantId, flowType);
    }

    if (hooks.ensureProgress) {
      // Re-read so the hook sees the handles written above
      const current = this.state.getFlowState(participantId, flowType) ?? record;
      await hooks.ensureProgress(current, rearmed);
    }

    this.logger.info({ participantId, flowType, state: record.currentState, timers: rearmed.length }, 'Flow recovered');
  }
}
