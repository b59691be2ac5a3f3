import { Cron } from 'croner';
import { WEEKDAYS } from './types.js';
import type { ScheduleDescriptor } from './types.js';

/**
 * Cron pattern equivalent of a scheduled descriptor, or null when the
 * descriptor is continuous or has no days.
 */
export function toCronPattern(schedule: ScheduleDescriptor): string | null {
  if (!schedule.scheduleEnabled || schedule.daysOfWeek.length === 0) return null;
  const days = schedule.daysOfWeek
    .map((day) => WEEKDAYS.indexOf(day))
    .sort((a, b) => a - b)
    .join(',');
  return `${schedule.timeOfDay.minute} ${schedule.timeOfDay.hour} * * ${days}`;
}

/**
 * Next instant the trigger could fire after `after`. Display only: the
 * scheduling loop never sleeps until this value. Once a repeating task has
 * run, the repeat interval from `lastRunEndedAt` decides.
 */
export function nextScheduledRun(
  schedule: ScheduleDescriptor,
  after: Date,
  lastRunEndedAt: number | null = null,
): Date | null {
  if (schedule.repeatEnabled && lastRunEndedAt !== null) {
    const due = lastRunEndedAt + schedule.repeatIntervalSeconds * 1000;
    return due > after.getTime() ? new Date(due) : after;
  }
  if (!schedule.scheduleEnabled) return after;

  const pattern = toCronPattern(schedule);
  if (pattern === null) return null;

  const cron = new Cron(pattern, { paused: true });
  try {
    return cron.nextRun(after);
  } finally {
    cron.stop();
  }
}
