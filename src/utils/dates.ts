/**
 * Calendar helpers. Dates are ISO `YYYY-MM-DD` strings interpreted in UTC,
 * so arithmetic never crosses a daylight-saving boundary.
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Operating days, Monday first. Index 0..5 is the offset from week start. */
export const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const WEEKDAY_LABELS: Record<Weekday, string> = {
  mon: 'MON',
  tue: 'TUE',
  wed: 'WED',
  thu: 'THU',
  fri: 'FRI',
  sat: 'SAT',
};

const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function fromParts(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const ms = Date.UTC(year, month - 1, day);
  const d = new Date(ms);
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

export function isIsoDate(value: string): boolean {
  const m = ISO_RE.exec(value);
  return m !== null && fromParts(Number(m[1]), Number(m[2]), Number(m[3])) !== null;
}

export function toEpochDay(iso: string): number {
  const m = ISO_RE.exec(iso);
  if (!m) throw new Error(`Not an ISO date: ${iso}`);
  return Math.floor(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])) / MS_PER_DAY);
}

export function fromEpochDay(day: number): string {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(iso: string, days: number): string {
  return fromEpochDay(toEpochDay(iso) + days);
}

export function daysBetween(from: string, to: string): number {
  return toEpochDay(to) - toEpochDay(from);
}

/** 0 = Monday … 6 = Sunday */
export function isoWeekdayIndex(iso: string): number {
  // 1970-01-01 was a Thursday (index 3)
  return (((toEpochDay(iso) + 3) % 7) + 7) % 7;
}

/** Operating weekday of a date, or null for Sunday. */
export function weekdayOf(iso: string): Weekday | null {
  const idx = isoWeekdayIndex(iso);
  return idx < WEEKDAYS.length ? WEEKDAYS[idx] : null;
}

export function isMonday(iso: string): boolean {
  return isIsoDate(iso) && isoWeekdayIndex(iso) === 0;
}

export function monthOf(iso: string): number {
  return Number(iso.slice(5, 7));
}

/** The six operating dates of the week starting on `weekStart`. */
export function weekDates(weekStart: string): Array<{ weekday: Weekday; date: string }> {
  return WEEKDAYS.map((weekday, i) => ({ weekday, date: addDays(weekStart, i) }));
}

/** Next Monday on or after `today`. */
export function nextMonday(today: Date = new Date()): string {
  const iso = fromParts(today.getFullYear(), today.getMonth() + 1, today.getDate());
  if (!iso) throw new Error('Invalid current date');
  const idx = isoWeekdayIndex(iso);
  return addDays(iso, (7 - idx) % 7);
}

/**
 * Parse the date formats seen in sales exports:
 * `2024-03-04`, `2024-03-04 10:15`, `2024-03-04T10:15:00Z`,
 * `04/03/2024`, `4-3-24`, `04.03.2024`.
 * Slash/dash/dot day-month forms honour `dayFirst`.
 */
export function parseDateValue(raw: string, dayFirst = true): string | null {
  const value = raw.trim();
  if (!value) return null;

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/.exec(value);
  if (iso) {
    return fromParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dmy = /^(\d{1,2})[/\-.](\d{1,2})[/\-.](\d{2}|\d{4})(?:\s.*)?$/.exec(value);
  if (dmy) {
    const a = Number(dmy[1]);
    const b = Number(dmy[2]);
    let year = Number(dmy[3]);
    if (dmy[3].length === 2) year += 2000;
    return dayFirst ? fromParts(year, b, a) : fromParts(year, a, b);
  }

  return null;
}

/** Whether a header cell looks like a date column of a wide export. */
export function isDateLikeHeader(header: string): boolean {
  return /^\s*(\d{1,2}[/\-]\d{1,2}[/\-]\d{2,4}|\d{4}-\d{1,2}-\d{1,2})\s*$/.test(header);
}
