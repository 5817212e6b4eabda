import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

const storageSchema = z.object({
  databasePath: z.string().min(1, 'Database path is required'),
});

// Logging configuration schema
const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

const timersSchema = z.object({
  backend: z.enum(['durable', 'memory']).default('durable'),
  pollIntervalMs: z.number().int().positive().default(2000),
  staleJobThresholdMs: z.number().int().positive().default(5 * 60 * 1000),
});

const outboxSchema = z.object({
  enabled: z.boolean().default(true),
  maxAttempts: z.number().int().positive().default(5),
  retryBaseMs: z.number().int().positive().default(10 * 1000),
});

const recoverySchema = z.object({
  graceMs: z.number().int().nonnegative().default(5000),
});

const habitsSchema = z.object({
  defaultTimezone: z.string().min(1).default('UTC'),
  defaultPrepOffsetMinutes: z.number().int().min(0).max(12 * 60).default(10),
  reminderDelayMs: z.number().int().positive().default(5 * 60 * 60 * 1000),
});

const interventionSchema = z.object({
  commitmentTimeoutMs: z.number().int().positive().default(12 * 60 * 60 * 1000),
  feelingTimeoutMs: z.number().int().positive().default(15 * 60 * 1000),
  completionTimeoutMs: z.number().int().positive().default(30 * 60 * 1000),
  questionTimeoutMs: z.number().int().positive().default(15 * 60 * 1000),
});

// Main configuration schema
export const configSchema = z.object({
  storage: storageSchema,
  logging: loggingSchema.default({ level: 'info' }),
  timers: timersSchema.default({}),
  outbox: outboxSchema.default({}),
  recovery: recoverySchema.default({}),
  habits: habitsSchema.default({}),
  intervention: interventionSchema.default({}),
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type StorageConfig = z.infer<typeof storageSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type TimersConfig = z.infer<typeof timersSchema>;
export type OutboxConfig = z.infer<typeof outboxSchema>;
export type RecoveryConfig = z.infer<typeof recoverySchema>;
export type HabitsConfig = z.infer<typeof habitsSchema>;
export type InterventionConfig = z.infer<typeof interventionSchema>;

function intFromEnv(name: string): number | undefined {
  const value = process.env[name];
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Load configuration from environment variables
 * @throws Error if configuration is invalid
 */
export function loadConfig(): Config {
  const rawConfig = {
    storage: {
      databasePath: process.env.DATABASE_PATH || './data/habitloop.db',
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
    },
    timers: {
      backend: process.env.TIMER_BACKEND || 'durable',
      pollIntervalMs: intFromEnv('DISPATCH_POLL_INTERVAL_MS'),
      staleJobThresholdMs: intFromEnv('STALE_JOB_THRESHOLD_MS'),
    },
    outbox: {
      enabled: process.env.OUTBOX_ENABLED !== 'false',
      maxAttempts: intFromEnv('OUTBOX_MAX_ATTEMPTS'),
      retryBaseMs: intFromEnv('OUTBOX_RETRY_BASE_MS'),
    },
    recovery: {
      graceMs: intFromEnv('RECOVERY_GRACE_MS'),
    },
    habits: {
      defaultTimezone: process.env.DEFAULT_TIMEZONE || 'UTC',
      defaultPrepOffsetMinutes: intFromEnv('DEFAULT_PREP_OFFSET_MINUTES'),
      reminderDelayMs: intFromEnv('REMINDER_DELAY_MS'),
    },
    intervention: {
      commitmentTimeoutMs: intFromEnv('COMMITMENT_TIMEOUT_MS'),
      feelingTimeoutMs: intFromEnv('FEELING_TIMEOUT_MS'),
      completionTimeoutMs: intFromEnv('COMPLETION_TIMEOUT_MS'),
      questionTimeoutMs: intFromEnv('QUESTION_TIMEOUT_MS'),
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errorMessages}`);
  }

  return result.data;
}

// Lazily loaded singleton
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
