import { MalformedRecordError } from "./errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Monday 00:00:00 UTC of the ISO week containing `date`. */
export function startOfIsoWeek(date: Date): Date {
  const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  // Monday-start: Mon(1)->0 ... Sun(0)->6
  const offset = (d.getUTCDay() + 6) % 7;
  return new Date(d.getTime() - offset * DAY_MS);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Parses a `YYYY-MM-DD` key as UTC midnight. */
export function fromDateKey(key: string): Date {
  const date = new Date(`${key}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || toDateKey(date) !== key) {
    throw new Error(`Invalid date "${key}", expected YYYY-MM-DD`);
  }
  return date;
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/** Strava `start_date` values are UTC with a Z suffix; anything unparseable is a malformed record. */
export function isoToEpochSeconds(iso: string): number {
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) {
    throw new MalformedRecordError(`Unparseable timestamp "${iso}"`);
  }
  return Math.floor(ms / 1000);
}

export interface WeekWindow {
  start: Date;
  end: Date;
}

/** Half-open [Monday, next Monday) window containing `date`. */
export function isoWeekWindow(date: Date): WeekWindow {
  const start = startOfIsoWeek(date);
  return { start, end: addDays(start, 7) };
}
