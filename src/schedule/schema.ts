import { z } from 'zod';
import { WEEKDAYS } from './types.js';
import type { ScheduleDescriptor, TimeOfDay, Weekday } from './types.js';

const weekdaySchema = z
  .string()
  .transform((value, ctx): Weekday => {
    const match = WEEKDAYS.find((day) => day.toLowerCase() === value.trim().toLowerCase());
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown weekday "${value}"` });
      return z.NEVER;
    }
    return match;
  });

const timeOfDaySchema = z
  .string()
  .regex(/^\d{1,2}:\d{2}$/, 'expected HH:MM')
  .transform((value, ctx): TimeOfDay => {
    const [hour, minute] = value.split(':').map((part) => Number.parseInt(part, 10));
    if (hour > 23 || minute > 59) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `time out of range "${value}"` });
      return z.NEVER;
    }
    return { hour, minute };
  });

export const triggerRecordSchema = z
  .object({
    schedule_on: z.boolean(),
    timeout_on: z.boolean(),
    days_of_week: z.array(weekdaySchema).optional(),
    time_of_day: timeOfDaySchema.optional(),
    timeout_interval: z.number().min(0).optional(),
    max_duration: z.number().min(0).nullable().optional(),
  })
  .superRefine((record, ctx) => {
    if (record.schedule_on && record.days_of_week === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['days_of_week'],
        message: 'required when schedule_on is true',
      });
    }
    if (record.schedule_on && record.time_of_day === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['time_of_day'],
        message: 'required when schedule_on is true',
      });
    }
    if (record.timeout_on && record.timeout_interval === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['timeout_interval'],
        message: 'required when timeout_on is true',
      });
    }
  });

export function parseScheduleDescriptor(data: unknown): {
  success: boolean;
  data?: ScheduleDescriptor;
  errors?: string[];
} {
  const result = triggerRecordSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    return { success: false, errors };
  }

  const record = result.data;
  const maxDuration = record.max_duration ?? null;
  const descriptor: ScheduleDescriptor = Object.freeze({
    scheduleEnabled: record.schedule_on,
    daysOfWeek: Object.freeze([...new Set(record.days_of_week ?? [])]),
    timeOfDay: Object.freeze(record.time_of_day ?? { hour: 0, minute: 0 }),
    repeatEnabled: record.timeout_on,
    repeatIntervalSeconds: record.timeout_interval ?? 0,
    // 0 carries no budget, same as omitting the field
    maxDurationSeconds: maxDuration === 0 ? null : maxDuration,
  });
  return { success: true, data: descriptor };
}

/**
 * Continuous mode that re-fires every intervalSeconds, keeping the budget.
 */
export function continuousSchedule(
  base: ScheduleDescriptor,
  intervalSeconds: number,
): ScheduleDescriptor {
  return Object.freeze({
    ...base,
    scheduleEnabled: false,
    repeatEnabled: true,
    repeatIntervalSeconds: intervalSeconds,
  });
}
