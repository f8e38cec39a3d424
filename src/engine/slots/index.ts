export {
  duration,
  compareByDuration,
  fitsDuration,
  containsSlot,
  startTime,
  endTime,
  startDate,
  endDate,
} from './time-slot.js';
export {
  toInstant,
  formatTimeSlot,
  createTimeSlot,
  createSentinelSlot,
  slotOfDuration,
  isSentinel,
} from './slot-factory.js';
export { ZonedLocalDay, createLocalDay } from './local-day.js';
export { priorityRank, comparePriority, isPriority } from './priority.js';
