export {
  HabitLoopError,
  ValidationError,
  NotFoundError,
  TransientDependencyError,
  InvariantViolation,
  isHabitLoopError,
  type ErrorCode,
} from './errors.js';
