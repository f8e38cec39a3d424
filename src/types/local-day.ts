/**
 * LocalDay — projects absolute instants onto a calendar day in a time zone.
 */

import type { LocalDate, LocalTime } from './branded.js';
import type { Instant } from './time-slot.js';

export interface LocalDay {
  timeOfInstant(instant: Instant): LocalTime;
  dateOfInstant(instant: Instant): LocalDate;
}
