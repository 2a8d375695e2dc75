import type { Weekday } from "@supply-forecast/contracts";

const DAY_MS = 24 * 60 * 60 * 1000;

// Indexed by Date#getUTCDay().
const WEEKDAYS_BY_UTC_DAY: Weekday[] = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

export const WEEKDAYS: Weekday[] = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
];

export function weekdayOf(date: string): Weekday {
  const day = toUtcDate(date).getUTCDay();
  return WEEKDAYS_BY_UTC_DAY[day] ?? "Monday";
}

export function addDays(date: string, days: number): string {
  return new Date(toUtcDate(date).getTime() + days * DAY_MS).toISOString().slice(0, 10);
}

export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcDate(to).getTime() - toUtcDate(from).getTime()) / DAY_MS);
}

export function toIsoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

function toUtcDate(date: string): Date {
  return new Date(`${date.slice(0, 10)}T00:00:00.000Z`);
}
