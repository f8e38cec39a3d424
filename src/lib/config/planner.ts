import { IANAZone } from 'luxon';
import type { LevelWithSilent } from 'pino';
import { ValidationError } from '../errors.js';

export interface PlannerConfig {
  defaultTimeZone: string;
  logLevel: LevelWithSilent;
}

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

let cachedConfig: PlannerConfig | undefined;

/**
 * Read and validate LOG_LEVEL alone, so building the logger never depends
 * on the rest of the planner configuration.
 */
export function getLogLevel(): LevelWithSilent {
  const logLevel = process.env.LOG_LEVEL || 'info';

  if (!isLogLevel(logLevel)) {
    throw new ValidationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'`,
      { variable: 'LOG_LEVEL', value: logLevel }
    );
  }

  return logLevel;
}

/**
 * Read and validate the planner environment variables.
 * Unset variables fall back to defaults; malformed ones throw ValidationError.
 */
export function getPlannerConfig(): PlannerConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const defaultTimeZone = process.env.PLANNER_TIME_ZONE || 'UTC';

  if (!IANAZone.isValidZone(defaultTimeZone)) {
    throw new ValidationError(
      `PLANNER_TIME_ZONE must be an IANA time zone name, got '${defaultTimeZone}'`,
      { variable: 'PLANNER_TIME_ZONE', value: defaultTimeZone }
    );
  }

  cachedConfig = { defaultTimeZone, logLevel: getLogLevel() };
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetPlannerConfigCache(): void {
  cachedConfig = undefined;
}
