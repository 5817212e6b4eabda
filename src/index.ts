// habitloop - durable scheduling and recovery for habit coaching conversations
// Main entry point for library usage

export * from './config/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
export * from './schedule/index.js';
export * from './store/index.js';
export * from './jobs/index.js';
export * from './timers/index.js';
export * from './state/index.js';
export * from './messaging/index.js';
export * from './content/index.js';
export * from './intervention/index.js';
export * from './habits/index.js';
export * from './recovery/index.js';
export * from './runtime/index.js';
