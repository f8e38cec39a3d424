import { Duration } from 'luxon';
import type { LocalDate, LocalDay, LocalTime, SlotDuration, TimeSlot } from '../../types/index.js';

// ─── Derived queries ─────────────────────────────────────────────────────────
//
// Every query is expressed through `start` and `end` alone, so any object
// satisfying TimeSlot gets them for free.

/**
 * Length of the slot, `end - start`, in hours down to milliseconds.
 * Zero for a sentinel slot.
 */
export function duration(slot: TimeSlot): SlotDuration {
  return Duration.fromMillis(slot.end.toMillis() - slot.start.toMillis()).shiftTo(
    'hours',
    'minutes',
    'seconds',
    'milliseconds',
  );
}

/**
 * Orders slots by length only. Two slots of equal length at different
 * positions compare as 0; keep positional order in the containing list.
 */
export function compareByDuration(a: TimeSlot, b: TimeSlot): number {
  return Math.sign(duration(a).toMillis() - duration(b).toMillis());
}

/** Is the slot long enough to accommodate `required`? */
export function fitsDuration(slot: TimeSlot, required: SlotDuration): boolean {
  return duration(slot).toMillis() >= required.toMillis();
}

/** Does `other` neither start earlier nor end later than `slot`? */
export function containsSlot(slot: TimeSlot, other: TimeSlot): boolean {
  return (
    slot.start.toMillis() <= other.start.toMillis() &&
    slot.end.toMillis() >= other.end.toMillis()
  );
}

// ─── Local projections ───────────────────────────────────────────────────────

export function startTime(slot: TimeSlot, day: LocalDay): LocalTime {
  return day.timeOfInstant(slot.start);
}

export function endTime(slot: TimeSlot, day: LocalDay): LocalTime {
  return day.timeOfInstant(slot.end);
}

export function startDate(slot: TimeSlot, day: LocalDay): LocalDate {
  return day.dateOfInstant(slot.start);
}

export function endDate(slot: TimeSlot, day: LocalDay): LocalDate {
  return day.dateOfInstant(slot.end);
}
