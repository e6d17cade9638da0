import { CandidateWindow } from '../../types/coordinator';
import { ValidationError } from '../../utils/errors';

function windowKey(window: CandidateWindow): string {
  return `${window.date}_${window.timeRange.start}_${window.timeRange.end}`;
}

export function compareWindows(a: CandidateWindow, b: CandidateWindow): number {
  return (
    a.date.localeCompare(b.date) ||
    a.timeRange.start.localeCompare(b.timeRange.start) ||
    a.timeRange.end.localeCompare(b.timeRange.end)
  );
}

/**
 * Windows free for every participant, sorted by date then start time.
 * Participant order never changes the result.
 */
export function intersect(freeWindows: ReadonlyMap<string, readonly CandidateWindow[]>): CandidateWindow[] {
  if (freeWindows.size === 0) {
    throw new ValidationError('Cannot intersect free windows of zero participants');
  }

  let common: Map<string, CandidateWindow> | null = null;

  for (const windows of freeWindows.values()) {
    const current = new Map<string, CandidateWindow>();
    for (const window of windows) {
      const key = windowKey(window);
      if (common === null || common.has(key)) {
        current.set(key, window);
      }
    }
    common = current;
    if (common.size === 0) break;
  }

  return [...(common ?? new Map<string, CandidateWindow>()).values()]
    .map((window) => ({ date: window.date, timeRange: { ...window.timeRange } }))
    .sort(compareWindows);
}
