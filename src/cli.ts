#!/usr/bin/env node

import { Command } from 'commander';
import { pino } from 'pino';
import { loadConfig, resetConfig } from './config/index.js';
import { Runtime, setupGracefulShutdown } from './runtime/index.js';
import { describeScheduleSpec, dailyAt } from './schedule/index.js';
import { createLogger, errorMessage } from './utils/logger.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('habitloop')
  .description('Durable scheduling and recovery engine for habit coaching conversations')
  .version(VERSION);

/**
 * Runtime for one-shot commands: quiet logs, never started.
 */
function openRuntime(): Runtime {
  resetConfig();
  return new Runtime({ config: loadConfig(), logger: pino({ level: 'silent' }) });
}

function fail(action: string, error: unknown): never {
  console.error(`${action} failed:`, errorMessage(error));
  process.exit(1);
}

function parseMinutes(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`'${value}' is not a number of minutes`);
  }
  return parsed;
}

// Start command - recovers state and runs the dispatcher
program
  .command('start')
  .description('Recover participants and start dispatching timed work')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: { verbose?: boolean }) => {
    try {
      resetConfig();
      const config = loadConfig();

      if (options.verbose) {
        config.logging.level = 'debug';
      }

      const logger = createLogger(config.logging);

      logger.info({ version: VERSION }, 'Starting habitloop...');

      const runtime = new Runtime({ config, logger });
      setupGracefulShutdown(runtime, logger);

      const summary = await runtime.start();

      logger.info(summary, 'habitloop is running. Press Ctrl+C to stop.');
    } catch (error) {
      fail('Start', error);
    }
  });

// Enroll command - starts the micro health intervention for a participant
program
  .command('enroll <participantId> <address>')
  .description('Enroll a participant in the micro health intervention')
  .option('--habit <text>', 'Habit the participant is working on', '')
  .action(async (participantId: string, address: string, options: { habit: string }) => {
    const runtime = openRuntime();
    try {
      await runtime.intervention.enroll(participantId, address, options.habit);
      console.log(`Enrolled ${participantId}`);
    } catch (error) {
      fail('Enroll', error);
    } finally {
      await runtime.stop();
    }
  });

// Schedule command group
const scheduleCommand = program
  .command('schedule')
  .description('Manage daily habit schedules');

scheduleCommand
  .command('create <participantId> <time>')
  .description('Create a daily prompt ahead of a habit time (HH:MM)')
  .option('--timezone <tz>', 'IANA timezone of the habit time')
  .option('--offset <minutes>', 'Minutes before the habit time to send the prompt', parseMinutes)
  .option('--habit <text>', 'Habit description used in prompts')
  .option('--address <phone>', 'Delivery address, required for a new participant')
  .action(
    async (
      participantId: string,
      time: string,
      options: { timezone?: string; offset?: number; habit?: string; address?: string }
    ) => {
      const runtime = openRuntime();
      try {
        const id = runtime.habits.createSchedule(participantId, time, options.timezone, options.offset, {
          habitDescription: options.habit,
          address: options.address,
        });
        console.log(id);
      } catch (error) {
        fail('Create schedule', error);
      } finally {
        await runtime.stop();
      }
    }
  );

scheduleCommand
  .command('list <participantId>')
  .description("List a participant's schedules")
  .option('--json', 'Output as JSON')
  .action(async (participantId: string, options: { json?: boolean }) => {
    const runtime = openRuntime();
    try {
      const schedules = runtime.habits.listSchedules(participantId);
      if (options.json) {
        console.log(JSON.stringify(schedules, null, 2));
        return;
      }
      if (schedules.length === 0) {
        console.log('No schedules.');
        return;
      }
      for (const schedule of schedules) {
        const [hour, minute] = schedule.prepTime.split(':').map((part) => parseInt(part, 10));
        console.log(`  ${schedule.id}  habit at ${schedule.targetTime}, prompt ${describeScheduleSpec(dailyAt(hour, minute, schedule.timezone))}`);
        if (schedule.habitDescription) {
          console.log(`    ${schedule.habitDescription}`);
        }
      }
    } catch (error) {
      fail('List schedules', error);
    } finally {
      await runtime.stop();
    }
  });

scheduleCommand
  .command('delete <participantId> <scheduleId>')
  .description('Delete a schedule by id')
  .action(async (participantId: string, scheduleId: string) => {
    const runtime = openRuntime();
    try {
      const result = runtime.habits.deleteSchedule(participantId, scheduleId);
      console.log(result === 'ok' ? `Deleted ${scheduleId}` : `No schedule ${scheduleId} for ${participantId}`);
    } catch (error) {
      fail('Delete schedule', error);
    } finally {
      await runtime.stop();
    }
  });

// Jobs command - inspect the durable queue
program
  .command('jobs')
  .description('List pending durable jobs')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    const runtime = openRuntime();
    try {
      const jobs = runtime.queue.listPending();
      if (options.json) {
        console.log(JSON.stringify(jobs, null, 2));
        return;
      }
      if (jobs.length === 0) {
        console.log('No pending jobs.');
        return;
      }
      console.log(`Pending jobs (${jobs.length}):\n`);
      for (const job of jobs) {
        console.log(`  ${job.id}  ${job.kind}  ${new Date(job.runAt).toISOString()}  ${job.dedupeKey ?? ''}`);
      }
    } catch (error) {
      fail('List jobs', error);
    } finally {
      await runtime.stop();
    }
  });

// Config command - show current configuration
program
  .command('config')
  .description('Show current configuration')
  .action(() => {
    try {
      resetConfig();
      console.log(JSON.stringify(loadConfig(), null, 2));
    } catch (error) {
      fail('Load config', error);
    }
  });

program.parse();
