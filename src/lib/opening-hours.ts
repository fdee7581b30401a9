/**
 * Opening Hours
 *
 * Interprets a place's opening schedule ("Daily": "09:00-17:00",
 * "Weekends": "10:00-14:00", "Monday-Friday": "08:00-20:00", "Sunday": "Closed").
 */

import type { OpeningSchedule } from "@/types/places";
import { getWeekday, isValidTime, parseTimeToMinutes, weekdayIndex } from "./time-utils";

export type DayOpeningHours =
  | { status: "always-open" }
  | { status: "unknown" }
  | { status: "closed"; label: string }
  | { status: "open"; label: string; openMinutes: number; closeMinutes: number; text: string };

// Lower is more specific
const SPECIFICITY = {
  weekday: 0,
  range: 1,
  group: 2,
  daily: 3,
} as const;

function keyCoversDay(key: string, dayIndex: number): number | null {
  const normalized = key.trim().toLowerCase();

  if (normalized === "daily" || normalized === "every day" || normalized === "everyday") {
    return SPECIFICITY.daily;
  }
  if (normalized === "weekdays") {
    return dayIndex >= 1 && dayIndex <= 5 ? SPECIFICITY.group : null;
  }
  if (normalized === "weekends") {
    return dayIndex === 0 || dayIndex === 6 ? SPECIFICITY.group : null;
  }

  const rangeParts = normalized.split("-");
  if (rangeParts.length === 2) {
    const from = weekdayIndex(rangeParts[0]);
    const to = weekdayIndex(rangeParts[1]);
    if (from < 0 || to < 0) return null;
    const covered = from <= to
      ? dayIndex >= from && dayIndex <= to
      : dayIndex >= from || dayIndex <= to;
    return covered ? SPECIFICITY.range : null;
  }

  return weekdayIndex(normalized) === dayIndex ? SPECIFICITY.weekday : null;
}

function parseTimeRange(value: string): { open: number; close: number } | null {
  const [open, close] = value.split("-").map((part) => part.trim());
  if (!open || !close || !isValidTime(open) || !isValidTime(close)) {
    return null;
  }
  const openMinutes = parseTimeToMinutes(open);
  let closeMinutes = parseTimeToMinutes(close);
  // Closing after midnight
  if (closeMinutes <= openMinutes) {
    closeMinutes += 24 * 60;
  }
  return { open: openMinutes, close: closeMinutes };
}

/**
 * Resolve the opening hours that apply on a date
 */
export function getOpeningHoursForDay(schedule: OpeningSchedule, dateKey: string): DayOpeningHours {
  const entries = Object.entries(schedule);
  if (entries.length === 0) {
    return { status: "always-open" };
  }

  const weekday = getWeekday(dateKey);
  const dayIndex = weekdayIndex(weekday);

  let best: { key: string; value: string; specificity: number } | null = null;
  for (const [key, value] of entries) {
    const specificity = keyCoversDay(key, dayIndex);
    if (specificity === null) continue;
    if (!best || specificity < best.specificity) {
      best = { key, value, specificity };
    }
  }

  if (!best) {
    return { status: "unknown" };
  }

  if (best.value.trim().toLowerCase() === "closed") {
    return { status: "closed", label: best.key };
  }

  const range = parseTimeRange(best.value);
  if (!range) {
    return { status: "unknown" };
  }

  return {
    status: "open",
    label: best.key,
    openMinutes: range.open,
    closeMinutes: range.close,
    text: best.value.trim(),
  };
}

/**
 * Note for the traveler when a visit starting at `startMinutes` may find the place closed
 */
export function checkOpeningHours(
  schedule: OpeningSchedule,
  dateKey: string,
  startMinutes: number
): string | null {
  const hours = getOpeningHoursForDay(schedule, dateKey);

  switch (hours.status) {
    case "always-open":
    case "unknown":
      return null;
    case "closed":
      return `Usually closed on ${getWeekday(dateKey)}`;
    case "open":
      if (startMinutes < hours.openMinutes || startMinutes >= hours.closeMinutes) {
        return `May be closed at this time (opening hours on ${getWeekday(dateKey)}: ${hours.text})`;
      }
      return null;
  }
}

export function isOpeningHoursNote(note: string): boolean {
  return note.startsWith("Usually closed on ") || note.startsWith("May be closed at this time");
}
