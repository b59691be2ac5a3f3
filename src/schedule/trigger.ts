// Tasklane Trigger Evaluator - decides whether an idle task starts on this tick

import type { TaskRuntimeState } from '../core/types.js';
import { WEEKDAYS } from './types.js';
import type { ScheduleDescriptor } from './types.js';

export type TriggerState = Pick<TaskRuntimeState, 'phase' | 'lastFiredDate' | 'lastRunEndedAt' | 'runCount'>;

/** Local calendar date as YYYY-MM-DD. */
export function localDateKey(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Scheduled mode fires once inside the matching minute of a matching day;
 * with repeat on, every later run follows the repeat interval instead of
 * the window. Continuous mode fires whenever idle, spaced by the repeat
 * interval, or only once when repeat is off. Missed windows are never
 * caught up.
 */
export function shouldFire(
  schedule: ScheduleDescriptor,
  now: Date,
  state: TriggerState,
): boolean {
  if (state.phase !== 'idle') return false;

  if (schedule.scheduleEnabled) {
    if (schedule.repeatEnabled && state.lastRunEndedAt !== null) {
      return repeatIntervalElapsed(schedule, now, state.lastRunEndedAt);
    }
    const weekday = WEEKDAYS[now.getDay()];
    if (!schedule.daysOfWeek.includes(weekday)) return false;
    if (now.getHours() !== schedule.timeOfDay.hour) return false;
    if (now.getMinutes() !== schedule.timeOfDay.minute) return false;
    return state.lastFiredDate !== localDateKey(now);
  }

  if (!schedule.repeatEnabled) {
    return state.runCount === 0;
  }

  if (state.lastRunEndedAt === null) return true;
  return repeatIntervalElapsed(schedule, now, state.lastRunEndedAt);
}

function repeatIntervalElapsed(schedule: ScheduleDescriptor, now: Date, lastRunEndedAt: number): boolean {
  return now.getTime() - lastRunEndedAt >= schedule.repeatIntervalSeconds * 1000;
}
