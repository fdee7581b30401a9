// ============================================
// TIME UTILITIES
// ============================================
// Destination wall-clock times are modelled as UTC instants: "2031-05-02" + "09:30"
// becomes 2031-05-02T09:30:00.000Z regardless of the host timezone.

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/**
 * Parse time string to minutes from midnight
 */
export function parseTimeToMinutes(time: string): number {
  const [hours, minutes] = time.split(":").map(Number);
  return hours * 60 + minutes;
}

export function isValidTime(time: string): boolean {
  return TIME_PATTERN.test(time);
}

/**
 * Parse a "YYYY-MM-DD" key into a UTC midnight Date, or null when malformed
 */
export function parseDateKey(dateKey: string): Date | null {
  if (!DATE_KEY_PATTERN.test(dateKey)) {
    return null;
  }
  const date = new Date(`${dateKey}T00:00:00.000Z`);
  if (isNaN(date.getTime()) || toDateKey(date) !== dateKey) {
    return null;
  }
  return date;
}

export function toDateKey(date: Date): string {
  return date.toISOString().split("T")[0];
}

/**
 * "HH:MM" wall-clock time of an instant
 */
export function toTimeOfDay(date: Date): string {
  return date.toISOString().substring(11, 16);
}

export function minutesOfDay(date: Date): number {
  return date.getUTCHours() * 60 + date.getUTCMinutes();
}

export function combineDateAndTime(dateKey: string, time: string): Date {
  return new Date(`${dateKey}T${time.padStart(5, "0")}:00.000Z`);
}

/**
 * Parse an event's "YYYY-MM-DDTHH:MM" local date-time
 */
export function parseLocalDateTime(value: string): Date | null {
  const [dateKey, time] = value.split("T");
  if (!dateKey || !time || !parseDateKey(dateKey)) {
    return null;
  }
  const hhmm = time.substring(0, 5);
  if (!isValidTime(hhmm)) {
    return null;
  }
  return combineDateAndTime(dateKey, hhmm);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

export function addHours(date: Date, hours: number): Date {
  return addMinutes(date, hours * 60);
}

export function addDays(dateKey: string, days: number): string {
  const base = parseDateKey(dateKey);
  if (!base) {
    throw new Error(`Invalid date key: ${dateKey}`);
  }
  return toDateKey(new Date(base.getTime() + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  const start = parseDateKey(from);
  const end = parseDateKey(to);
  if (!start || !end) {
    throw new Error(`Invalid date range: ${from} - ${to}`);
  }
  return Math.round((end.getTime() - start.getTime()) / MS_PER_DAY);
}

export function getWeekday(dateKey: string): Weekday {
  const date = parseDateKey(dateKey);
  if (!date) {
    throw new Error(`Invalid date key: ${dateKey}`);
  }
  return WEEKDAYS[date.getUTCDay()];
}

export function weekdayIndex(name: string): number {
  return WEEKDAYS.findIndex((day) => day.toLowerCase() === name.trim().toLowerCase());
}
