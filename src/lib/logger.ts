import { pino } from 'pino';
import type { Logger } from 'pino';
import { getLogLevel } from './config/planner.js';

export const logger: Logger = pino({
  name: 'appointment-planner',
  level: getLogLevel(),
});

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
