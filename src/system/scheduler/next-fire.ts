/**
 * Daily schedule arithmetic. Pure: every function takes the reference time explicitly.
 */

import { parseExpression } from 'cron-parser';

export interface DailySchedule {
  hour: number;
  minute: number;
  /** IANA timezone name */
  timezone: string;
}

export function toCronExpression(schedule: DailySchedule): string {
  return `${schedule.minute} ${schedule.hour} * * *`;
}

export function isValidTimezone(timezone: string): boolean {
  if (!timezone) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Problems with the schedule, empty when valid.
 */
export function validateSchedule(schedule: DailySchedule): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(schedule.hour) || schedule.hour < 0 || schedule.hour > 23) {
    problems.push(`scheduler hour must be an integer between 0 and 23 (got ${schedule.hour})`);
  }
  if (!Number.isInteger(schedule.minute) || schedule.minute < 0 || schedule.minute > 59) {
    problems.push(`scheduler minute must be an integer between 0 and 59 (got ${schedule.minute})`);
  }
  if (!isValidTimezone(schedule.timezone)) {
    problems.push(`scheduler timezone is not a valid IANA timezone: "${schedule.timezone}"`);
  }
  return problems;
}

/**
 * First fire time strictly after `from`.
 */
export function computeNextFireTime(schedule: DailySchedule, from: Date): Date {
  const interval = parseExpression(toCronExpression(schedule), {
    currentDate: from,
    tz: schedule.timezone
  });
  const next = interval.next().toDate();
  if (next.getTime() > from.getTime()) {
    return next;
  }
  return interval.next().toDate();
}

/**
 * Most recent fire time at or before `at`: the slot a tick at `at` belongs to.
 */
export function computePreviousFireTime(schedule: DailySchedule, at: Date): Date {
  const interval = parseExpression(toCronExpression(schedule), {
    currentDate: new Date(at.getTime() + 1000),
    tz: schedule.timezone
  });
  const previous = interval.prev().toDate();
  if (previous.getTime() <= at.getTime()) {
    return previous;
  }
  return interval.prev().toDate();
}
