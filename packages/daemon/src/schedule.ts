import { SnapdeltaError } from '@snapdelta/core';

export type Schedule = { pollIntervalMs: number } | { dailyAt: string };

const DAILY_AT_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function parseDailyAt(dailyAt: string): { hour: number; minute: number } {
  const match = DAILY_AT_PATTERN.exec(dailyAt);
  if (!match) {
    throw new SnapdeltaError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid dailyAt "${dailyAt}"`,
      suggestion: 'Use 24-hour HH:MM, e.g. "06:30".',
    });
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * Next local-time occurrence of HH:MM strictly after `now`
 */
export function nextDailyRun(dailyAt: string, now: Date): Date {
  const { hour, minute } = parseDailyAt(dailyAt);
  const next = new Date(now.getTime());
  next.setHours(hour, minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
    next.setHours(hour, minute, 0, 0);
  }
  return next;
}

/**
 * Milliseconds from `now` until the next scheduled cycle
 */
export function delayUntilNextRun(schedule: Schedule, now: Date): number {
  if ('pollIntervalMs' in schedule) return schedule.pollIntervalMs;
  return nextDailyRun(schedule.dailyAt, now).getTime() - now.getTime();
}
