export { JobQueue, type JobQueueOptions, type ClaimedJob, type JobHandler } from './job-queue.js';
export { Dispatcher, type DispatcherOptions, type DispatchSummary } from './dispatcher.js';
