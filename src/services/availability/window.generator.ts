import { CandidateWindow } from '../../types/coordinator';
import { DiarySnapshot, TimeRange } from '../../types/diary';
import { fromMinutes, toMinutes } from '../../utils/clock';
import { InvalidRangeError } from '../../utils/errors';
import { isFree } from './availability.engine';

export interface WindowOptions {
  durationMinutes: number;
  dayWindow: TimeRange;
  granularityMinutes: number;
}

/**
 * Slides a window of the requested duration across the day, stepping by the
 * granularity from `dayWindow.start`. A window may end exactly at
 * `dayWindow.end` since ranges are half-open.
 */
export function generateCandidateWindows(date: string, options: WindowOptions): CandidateWindow[] {
  const { durationMinutes, dayWindow, granularityMinutes } = options;

  if (durationMinutes <= 0) {
    throw new InvalidRangeError(`Duration must be positive, got ${durationMinutes}`);
  }
  if (granularityMinutes <= 0) {
    throw new InvalidRangeError(`Granularity must be positive, got ${granularityMinutes}`);
  }

  const dayStart = toMinutes(dayWindow.start);
  const dayEnd = toMinutes(dayWindow.end);
  const windows: CandidateWindow[] = [];

  for (let cursor = dayStart; cursor + durationMinutes <= dayEnd; cursor += granularityMinutes) {
    windows.push({
      date,
      timeRange: { start: fromMinutes(cursor), end: fromMinutes(cursor + durationMinutes) },
    });
  }

  return windows;
}

/** Every candidate window on `dates` that the diary reports free. */
export function computeFreeWindows(diary: DiarySnapshot, dates: string[], options: WindowOptions): CandidateWindow[] {
  const free: CandidateWindow[] = [];

  for (const date of dates) {
    if (!diary.days[date]) continue;

    for (const window of generateCandidateWindows(date, options)) {
      if (isFree(diary, date, window.timeRange).free) {
        free.push(window);
      }
    }
  }

  return free;
}
