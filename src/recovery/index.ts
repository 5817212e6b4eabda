export { RecoveryCoordinator, type RecoveryCoordinatorOptions } from './recovery-coordinator.js';
export type { FlowRecoveryHooks, RecoverySummary } from './types.js';
