export { createLogger, errorMessage, type Logger } from './logger.js';
export {
  assertTimezone,
  isValidTimezone,
  getZonedParts,
  zonedTimeToUtc,
  addLocalDays,
  daysInMonth,
  weekdayOf,
  formatLocalTime,
  type ZonedParts,
  type LocalDate,
} from './timezone.js';
export {
  isJsonObject,
  jsonValueSchema,
  jsonObjectSchema,
  parseJsonObject,
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
} from './json.js';
