export {
  HabitScheduler,
  HABIT_FLOW,
  DAILY_PROMPT_ACTION,
  REMINDER_ACTION,
  habitView,
  scheduleDescriptorSchema,
  type ScheduleDescriptor,
  type CreateScheduleOptions,
  type HabitSchedulerOptions,
} from './habit-scheduler.js';
