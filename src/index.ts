import 'dotenv/config';

export * from './types/index.js';
export * from './engine/slots/index.js';
export { prioritySchema, timeSlotInputSchema, parseTimeSlot } from './schemas/time-slot.schema.js';
export type { TimeSlotInput } from './schemas/time-slot.schema.js';
export { ValidationError, InvalidIntervalError, InvalidInstantError } from './lib/errors.js';
export { getLogLevel, getPlannerConfig, resetPlannerConfigCache } from './lib/config/planner.js';
export type { PlannerConfig } from './lib/config/planner.js';
export { logger, createLogger } from './lib/logger.js';
