import { DateTime } from 'luxon';
import { TimeRange } from '../types/diary';
import { InvalidRangeError, ValidationError } from './errors';

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$|^24:00$/;

export function isClock(value: string): boolean {
  return CLOCK_PATTERN.test(value);
}

export function toMinutes(clock: string): number {
  if (!isClock(clock)) {
    throw new ValidationError(`Invalid clock time: ${clock}`);
  }
  const [hours, minutes] = clock.split(':').map(Number);
  return hours * 60 + minutes;
}

export function fromMinutes(total: number): string {
  const hours = Math.floor(total / 60);
  const minutes = total % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function durationOf(range: TimeRange): number {
  return toMinutes(range.end) - toMinutes(range.start);
}

export function assertPositiveRange(range: TimeRange): void {
  if (durationOf(range) <= 0) {
    throw new InvalidRangeError(`Time range ${range.start}-${range.end} has no positive duration`);
  }
}

export function overlaps(a: TimeRange, b: TimeRange): boolean {
  return toMinutes(a.start) < toMinutes(b.end) && toMinutes(b.start) < toMinutes(a.end);
}

export function within(inner: TimeRange, outer: TimeRange): boolean {
  return toMinutes(inner.start) >= toMinutes(outer.start) && toMinutes(inner.end) <= toMinutes(outer.end);
}

export function sameRange(a: TimeRange, b: TimeRange): boolean {
  return a.start === b.start && a.end === b.end;
}

export function formatRange(range: TimeRange): string {
  return `${range.start}-${range.end}`;
}

export function isIsoDate(value: string): boolean {
  return DateTime.fromISO(value).isValid && /^\d{4}-\d{2}-\d{2}$/.test(value);
}

/** Consecutive ISO dates starting at `startDate`. */
export function dateRange(startDate: string, count: number): string[] {
  const start = DateTime.fromISO(startDate, { zone: 'utc' });
  if (!start.isValid) {
    throw new ValidationError(`Invalid date: ${startDate}`);
  }

  const dates: string[] = [];
  for (let offset = 0; offset < count; offset++) {
    const iso = start.plus({ days: offset }).toISODate();
    if (iso) dates.push(iso);
  }
  return dates;
}

export function today(timezone: string): string {
  const iso = DateTime.now().setZone(timezone).toISODate();
  if (!iso) {
    throw new ValidationError(`Invalid timezone: ${timezone}`);
  }
  return iso;
}
