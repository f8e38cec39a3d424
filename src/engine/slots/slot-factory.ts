import type { DateTime } from 'luxon';
import { InvalidInstantError, InvalidIntervalError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { Instant, SlotDuration, TimeSlot } from '../../types/index.js';
import { duration } from './time-slot.js';

const log = createLogger('slot-factory');

type AnyDateTime = DateTime<true> | DateTime<false>;

/** Validate a luxon DateTime and move it to UTC. */
export function toInstant(value: AnyDateTime): Instant {
  if (!value.isValid) {
    throw new InvalidInstantError(value.invalidReason, value.invalidExplanation);
  }
  return value.toUTC();
}

/**
 * Text form of a slot: start instant, end instant and duration.
 *
 *   [2024-03-11T09:00:00.000Z, 2024-03-11T10:30:00.000Z) PT1H30M
 */
export function formatTimeSlot(slot: TimeSlot): string {
  return `[${slot.start.toISO()}, ${slot.end.toISO()}) ${duration(slot).toISO() ?? 'invalid duration'}`;
}

function makeSlot(start: Instant, end: Instant): TimeSlot {
  return Object.freeze({
    start,
    end,
    toString: () => formatTimeSlot({ start, end }),
  });
}

/**
 * Build an immutable slot [start, end).
 * Throws InvalidIntervalError when `end` is before `start`; equal bounds are allowed.
 */
export function createTimeSlot(start: AnyDateTime, end: AnyDateTime): TimeSlot {
  const from = toInstant(start);
  const to = toInstant(end);

  if (to.toMillis() < from.toMillis()) {
    log.debug({ start: from.toISO(), end: to.toISO() }, 'rejected time slot with end before start');
    throw new InvalidIntervalError(from.toISO(), to.toISO());
  }

  return makeSlot(from, to);
}

/** A zero-duration slot at `at`. */
export function createSentinelSlot(at: AnyDateTime): TimeSlot {
  const instant = toInstant(at);
  return makeSlot(instant, instant);
}

/** The slot [start, start + length). A negative length throws InvalidIntervalError. */
export function slotOfDuration(start: AnyDateTime, length: SlotDuration): TimeSlot {
  const from = toInstant(start);
  return createTimeSlot(from, from.plus(length));
}

export function isSentinel(slot: TimeSlot): boolean {
  return duration(slot).toMillis() === 0;
}
