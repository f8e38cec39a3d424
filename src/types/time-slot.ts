/**
 * TimeSlot — an (un)allocated range of time [start, end).
 *
 * `start` belongs to the slot, `end` belongs to the slot that follows it.
 * A slot whose start equals its end has zero duration and serves as a
 * sentinel value. `end` is never before `start`.
 */

import type { DateTime, Duration } from 'luxon';

/** An absolute point on the time line, held in UTC. */
export type Instant = DateTime<true>;

export type SlotDuration = Duration;

export interface TimeSlot {
  /** Inclusive lower bound. */
  readonly start: Instant;
  /** Exclusive upper bound. */
  readonly end: Instant;
}
