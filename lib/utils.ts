import { clsx, type ClassValue } from "clsx"
import { twMerge } from "tailwind-merge"

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs))
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

export function getTodayDate(): string {
  return new Date().toISOString().split('T')[0];
}

/**
 * Normalizes "2024-01-15", "2024-01-15T00:00:00" or "2024-01-15 00:00:00"
 * to "2024-01-15". Returns null for anything that is not a real calendar date.
 */
export function parseCalendarDate(value: string): string | null {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  const date = new Date(toUtcMillis(year, month, day));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return `${year}-${month}-${day}`;
}

function toUtcMillis(year: string, month: string, day: string): number {
  return Date.UTC(Number(year), Number(month) - 1, Number(day));
}

function calendarDateToMillis(date: string): number {
  const [year, month, day] = date.split('-');
  return toUtcMillis(year, month, day);
}

// Whole days from `from` to `to`; negative when `to` is earlier
export function daysBetween(from: string, to: string): number {
  return Math.round((calendarDateToMillis(to) - calendarDateToMillis(from)) / MS_PER_DAY);
}

export function addDays(date: string, days: number): string {
  return new Date(calendarDateToMillis(date) + days * MS_PER_DAY).toISOString().split('T')[0];
}
