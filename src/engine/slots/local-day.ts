import { DateTime, IANAZone } from 'luxon';
import { getPlannerConfig } from '../../lib/config/planner.js';
import { ValidationError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { Instant, LocalDate, LocalDay, LocalTime, TimeSlot } from '../../types/index.js';
import { createTimeSlot, toInstant } from './slot-factory.js';

const log = createLogger('local-day');

const LOCAL_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d{3})?)?$/;

function asLocalDate(value: string): LocalDate {
  return value as LocalDate;
}

function asLocalTime(value: string): LocalTime {
  return value as LocalTime;
}

/**
 * A calendar day in an IANA time zone.
 *
 * Local times are rendered the short way: `HH:mm`, widened to `HH:mm:ss`
 * and `HH:mm:ss.SSS` only when seconds or milliseconds are set.
 */
export class ZonedLocalDay implements LocalDay {
  readonly date: LocalDate;
  readonly zone: string;
  /** Local midnight opening the day. */
  private readonly midnight: DateTime<true>;

  constructor(date: string, zone: string) {
    if (!IANAZone.isValidZone(zone)) {
      throw new ValidationError(`Unknown time zone '${zone}'`, { zone });
    }

    const midnight = DateTime.fromFormat(date, 'yyyy-MM-dd', { zone });
    if (!midnight.isValid) {
      throw new ValidationError(`Invalid calendar date '${date}'`, {
        date,
        reason: midnight.invalidReason,
      });
    }

    this.midnight = midnight;
    this.date = asLocalDate(midnight.toISODate());
    this.zone = zone;
  }

  timeOfInstant(instant: Instant): LocalTime {
    const local = this.localise(instant);
    const pattern =
      local.millisecond !== 0 ? 'HH:mm:ss.SSS' : local.second !== 0 ? 'HH:mm:ss' : 'HH:mm';
    return asLocalTime(local.toFormat(pattern));
  }

  dateOfInstant(instant: Instant): LocalDate {
    return asLocalDate(this.localise(instant).toISODate());
  }

  /**
   * The instant at wall-clock `time` on this day.
   * A time inside a spring-forward gap is moved forward by the gap.
   */
  instantOf(time: string): Instant {
    if (!LOCAL_TIME_PATTERN.test(time)) {
      throw new ValidationError(`Invalid local time '${time}', expected HH:mm[:ss[.SSS]]`, { time });
    }
    return toInstant(DateTime.fromISO(`${this.date}T${time}`, { zone: this.zone }));
  }

  startOfDay(): Instant {
    return this.midnight.toUTC();
  }

  /** Midnight opening the following day; the day is [startOfDay, endOfDay). */
  endOfDay(): Instant {
    return this.midnight.plus({ days: 1 }).toUTC();
  }

  asTimeSlot(): TimeSlot {
    return createTimeSlot(this.startOfDay(), this.endOfDay());
  }

  private localise(instant: Instant): DateTime<true> {
    const local = instant.setZone(this.zone);
    if (!local.isValid) {
      throw new ValidationError(`Cannot project instant into zone '${this.zone}'`, {
        zone: this.zone,
        reason: local.invalidReason,
      });
    }
    return local;
  }
}

/**
 * Anchor a LocalDay to `date` (yyyy-MM-dd). Without a zone, the configured
 * PLANNER_TIME_ZONE applies.
 */
export function createLocalDay(date: string, zone?: string): ZonedLocalDay {
  if (zone === undefined) {
    const { defaultTimeZone } = getPlannerConfig();
    log.debug({ date, zone: defaultTimeZone }, 'using configured default time zone');
    return new ZonedLocalDay(date, defaultTimeZone);
  }
  return new ZonedLocalDay(date, zone);
}
