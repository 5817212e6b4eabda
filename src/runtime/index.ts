export { Runtime, setupGracefulShutdown, type RuntimeOptions } from './runtime.js';
