/**
 * Branded types for the local calendar values produced by a LocalDay.
 * Prevents passing an arbitrary string where an ISO date or time is expected.
 */

declare const __brand: unique symbol;

type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** ISO 8601 calendar date, e.g. `2024-03-11`. */
export type LocalDate = Brand<string, 'LocalDate'>;
/** ISO 8601 wall-clock time, e.g. `09:30` or `09:30:15.250`. */
export type LocalTime = Brand<string, 'LocalTime'>;
