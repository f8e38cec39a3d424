import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DateTime } from 'luxon';
import { getLogLevel, getPlannerConfig, resetPlannerConfigCache } from '../lib/config/planner.js';
import { ValidationError } from '../lib/errors.js';

const saved = {
  PLANNER_TIME_ZONE: process.env.PLANNER_TIME_ZONE,
  LOG_LEVEL: process.env.LOG_LEVEL,
};

function clearPlannerEnv() {
  delete process.env.PLANNER_TIME_ZONE;
  delete process.env.LOG_LEVEL;
}

function restorePlannerEnv() {
  clearPlannerEnv();
  if (saved.PLANNER_TIME_ZONE !== undefined) process.env.PLANNER_TIME_ZONE = saved.PLANNER_TIME_ZONE;
  if (saved.LOG_LEVEL !== undefined) process.env.LOG_LEVEL = saved.LOG_LEVEL;
}

describe('Planner Config', () => {
  beforeEach(() => {
    clearPlannerEnv();
    resetPlannerConfigCache();
  });

  afterEach(() => {
    restorePlannerEnv();
    resetPlannerConfigCache();
  });

  it('falls back to UTC and info when nothing is set', () => {
    expect(getPlannerConfig()).toEqual({ defaultTimeZone: 'UTC', logLevel: 'info' });
  });

  it('reads the zone and level from the environment', () => {
    process.env.PLANNER_TIME_ZONE = 'Europe/Amsterdam';
    process.env.LOG_LEVEL = 'debug';

    expect(getPlannerConfig()).toEqual({ defaultTimeZone: 'Europe/Amsterdam', logLevel: 'debug' });
  });

  it('rejects an unknown time zone', () => {
    process.env.PLANNER_TIME_ZONE = 'Nowhere/Special';

    expect(() => getPlannerConfig()).toThrow(ValidationError);
    expect(() => getPlannerConfig()).toThrow(
      "PLANNER_TIME_ZONE must be an IANA time zone name, got 'Nowhere/Special'",
    );
  });

  it('rejects an unknown log level', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(() => getPlannerConfig()).toThrow(
      "LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent, got 'verbose'",
    );
  });

  it('caches the first result until reset', () => {
    expect(getPlannerConfig().defaultTimeZone).toBe('UTC');

    process.env.PLANNER_TIME_ZONE = 'Asia/Tokyo';
    expect(getPlannerConfig().defaultTimeZone).toBe('UTC');

    resetPlannerConfigCache();
    expect(getPlannerConfig().defaultTimeZone).toBe('Asia/Tokyo');
  });

  describe('getLogLevel', () => {
    it('reads LOG_LEVEL without checking the time zone', () => {
      process.env.PLANNER_TIME_ZONE = 'Not/AZone';
      process.env.LOG_LEVEL = 'warn';

      expect(getLogLevel()).toBe('warn');
    });

    it('defaults to info', () => {
      expect(getLogLevel()).toBe('info');
    });
  });

  describe('with a malformed PLANNER_TIME_ZONE', () => {
    beforeEach(() => {
      process.env.PLANNER_TIME_ZONE = 'Not/AZone';
      process.env.LOG_LEVEL = 'silent';
      vi.resetModules();
    });

    it('still loads and builds slots', async () => {
      const { createTimeSlot } = await import('../engine/slots/slot-factory.js');

      const slot = createTimeSlot(
        DateTime.fromISO('2024-03-11T09:00:00Z'),
        DateTime.fromISO('2024-03-11T10:00:00Z'),
      );

      expect(slot.end.toISO()).toBe('2024-03-11T10:00:00.000Z');
    });

    it('accepts an explicit zone for a local day', async () => {
      const { createLocalDay } = await import('../engine/slots/local-day.js');

      expect(createLocalDay('2024-03-11', 'Europe/Amsterdam').zone).toBe('Europe/Amsterdam');
    });

    it('rejects a local day that needs the default zone', async () => {
      const { createLocalDay } = await import('../engine/slots/local-day.js');
      const errors = await import('../lib/errors.js');

      expect(() => createLocalDay('2024-03-11')).toThrow(errors.ValidationError);
      expect(() => createLocalDay('2024-03-11')).toThrow(
        "PLANNER_TIME_ZONE must be an IANA time zone name, got 'Not/AZone'",
      );
    });
  });
});
