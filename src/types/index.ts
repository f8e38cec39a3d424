/**
 * Appointment planner core type system.
 *
 * Domain primitives for ranking appointments and describing the time they occupy.
 */

// Branded calendar values
export type { LocalDate, LocalTime } from './branded.js';

// Ranking
export { PRIORITIES } from './priority.js';
export type { Priority } from './priority.js';

// Temporal
export type { Instant, SlotDuration, TimeSlot } from './time-slot.js';
export type { LocalDay } from './local-day.js';
