import { CronExpressionParser } from "cron-parser";
import { ValidationError } from "../core/errors";

export const SCHEDULE_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export interface ScheduleTime {
  hour: number;
  minute: number;
}

export function parseScheduleTime(value: string): ScheduleTime {
  const match = SCHEDULE_TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid schedule time "${value}", expected HH:MM (24h)`, "invalid_schedule_time");
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function toCronExpression(value: string): string {
  const { hour, minute } = parseScheduleTime(value);
  return `${minute} ${hour} * * *`;
}

/** Next occurrence of the daily time strictly after `from`, in the process's local timezone. */
export function nextDailyRun(value: string, from: Date): Date {
  const interval = CronExpressionParser.parse(toCronExpression(value), {
    currentDate: from,
  });
  return new Date(interval.next().getTime());
}
