export {
  HabitDatabase,
  type Job,
  type JobStatus,
  type NewJob,
  type EnqueueResult,
  type JobFilter,
  type FlowStateRecord,
  type InboundMessage,
} from './db.js';
