export {
  configSchema,
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type StorageConfig,
  type LoggingConfig,
  type TimersConfig,
  type OutboxConfig,
  type RecoveryConfig,
  type HabitsConfig,
  type InterventionConfig,
} from './config.js';
