// Date helpers for schedule dates. A schedule date is a calendar day ("YYYY-MM-DD")
// with no time zone attached, so everything here works in UTC.

export const WEEKDAY_NAMES = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

const SCHEDULE_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function toScheduleDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function tryParseScheduleDate(scheduleDate: string): Date | null {
  if (!SCHEDULE_DATE_PATTERN.test(scheduleDate)) {
    return null;
  }
  const parsed = new Date(`${scheduleDate}T00:00:00Z`);
  // Date rolls "2024-02-30" over to March instead of failing
  if (Number.isNaN(parsed.getTime()) || toScheduleDate(parsed) !== scheduleDate) {
    return null;
  }
  return parsed;
}

function parseScheduleDate(scheduleDate: string): Date {
  const parsed = tryParseScheduleDate(scheduleDate);
  if (!parsed) {
    throw new RangeError(`Invalid schedule date: ${scheduleDate}`);
  }
  return parsed;
}

export function isScheduleDate(value: string): boolean {
  return tryParseScheduleDate(value) !== null;
}

/**
 * Every schedule date from `start` to `end`, both included
 */
export function scheduleDatesBetween(start: string, end: string): string[] {
  const dates: string[] = [];
  const last = parseScheduleDate(end).getTime();
  for (let day = parseScheduleDate(start); day.getTime() <= last; day = new Date(day.getTime() + 86_400_000)) {
    dates.push(toScheduleDate(day));
  }
  return dates;
}

/**
 * ISO weekday of a schedule date: 1 = Monday ... 7 = Sunday
 */
export function weekdayOf(scheduleDate: string): number {
  const day = parseScheduleDate(scheduleDate).getUTCDay();
  return day === 0 ? 7 : day;
}

export function weekdayName(weekday: number): WeekdayName {
  const name = WEEKDAY_NAMES[weekday - 1];
  if (!name) {
    throw new RangeError(`Weekday must be between 1 and 7, got ${weekday}`);
  }
  return name;
}

/**
 * Format a schedule date for log lines and messages
 */
export function formatScheduleDate(scheduleDate: string, options?: Intl.DateTimeFormatOptions): string {
  const defaultOptions: Intl.DateTimeFormatOptions = {
    timeZone: "UTC",
    year: "numeric",
    month: "long",
    day: "numeric",
  };

  return new Intl.DateTimeFormat("en-GB", {
    ...defaultOptions,
    ...options,
  }).format(parseScheduleDate(scheduleDate));
}
