// Tasklane Schedule Types

export const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

/** Index matches Date#getDay(). */
export type Weekday = (typeof WEEKDAYS)[number];

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface ScheduleDescriptor {
  /** Gate by day and time. When false the task is eligible continuously. */
  readonly scheduleEnabled: boolean;
  readonly daysOfWeek: readonly Weekday[];
  readonly timeOfDay: TimeOfDay;
  readonly repeatEnabled: boolean;
  readonly repeatIntervalSeconds: number;
  /** null means unbounded. */
  readonly maxDurationSeconds: number | null;
}

/** Serialized trigger.json record. */
export interface TriggerRecord {
  schedule_on: boolean;
  timeout_on: boolean;
  days_of_week?: string[];
  time_of_day?: string;
  timeout_interval?: number;
  max_duration?: number | null;
}
