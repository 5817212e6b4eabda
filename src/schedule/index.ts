export {
  scheduleSpecSchema,
  validateScheduleSpec,
  nextOccurrence,
  dailyAt,
  describeScheduleSpec,
  scheduleSpecToJson,
  type ScheduleSpec,
} from './schedule-spec.js';
