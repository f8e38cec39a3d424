/**
 * Priority — the rank of an appointment.
 *
 * Declaration order is the ranking: LOW < MEDIUM < HIGH.
 */

export const PRIORITIES = Object.freeze(['LOW', 'MEDIUM', 'HIGH'] as const);

export type Priority = (typeof PRIORITIES)[number];
