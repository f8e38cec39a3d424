import { DateTime } from 'luxon';
import { z } from 'zod';
import { createTimeSlot } from '../engine/slots/slot-factory.js';
import { ValidationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { PRIORITIES } from '../types/index.js';
import type { TimeSlot } from '../types/index.js';

const log = createLogger('time-slot-schema');

export const prioritySchema = z.enum(PRIORITIES);

const isoInstant = z.string().datetime({ offset: true });

export const timeSlotInputSchema = z
  .object({
    start: isoInstant,
    end: isoInstant,
  })
  .refine(
    (data) => {
      const start = DateTime.fromISO(data.start, { setZone: true });
      const end = DateTime.fromISO(data.end, { setZone: true });
      // Malformed instants are already reported by the field schemas
      if (!start.isValid || !end.isValid) return true;
      return end.toMillis() >= start.toMillis();
    },
    { message: 'end must not be before start', path: ['end'] }
  );

export type TimeSlotInput = z.infer<typeof timeSlotInputSchema>;

/**
 * Parse untrusted `{ start, end }` input into a TimeSlot.
 * Throws ValidationError listing each failing path.
 */
export function parseTimeSlot(input: unknown): TimeSlot {
  const result = timeSlotInputSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    log.debug({ issues }, 'time slot input failed validation');
    throw new ValidationError('Time slot input failed validation', { issues });
  }

  return createTimeSlot(
    DateTime.fromISO(result.data.start, { setZone: true }),
    DateTime.fromISO(result.data.end, { setZone: true }),
  );
}
