/**
 * ISO calendar-date helpers. Dates are YYYY-MM-DD strings compared in UTC,
 * so results do not depend on the host time zone.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDay(new Date(Date.parse(isoDate) + days * MS_PER_DAY));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(to) - Date.parse(from)) / MS_PER_DAY);
}

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(Date.parse(value));
}
