import { Slot } from '../../../types/coordinator';
import { toMinutes } from '../../../utils/clock';
import { compareWindows } from '../slot.intersector';
import { RankingStrategy } from './ranking.strategy';

export class EarliestFirstStrategy implements RankingStrategy {
  readonly name = 'earliest' as const;

  async rank(candidates: readonly Slot[]): Promise<Slot[]> {
    return [...candidates].sort(compareWindows);
  }
}

const AFTERNOON = { start: toMinutes('13:00'), end: toMinutes('17:00') };
const DAYTIME = { start: toMinutes('09:00'), end: toMinutes('18:00') };

function tier(slot: Slot): number {
  const start = toMinutes(slot.timeRange.start);
  const end = toMinutes(slot.timeRange.end);

  if (start >= AFTERNOON.start && end <= AFTERNOON.end) return 0;
  if (start >= DAYTIME.start && end <= DAYTIME.end) return 1;
  return 2;
}

/**
 * Earlier dates first. Within a day, afternoon windows (13:00–17:00) come
 * before other daytime windows, and very early or late ones come last.
 */
export class PreferAfternoonStrategy implements RankingStrategy {
  readonly name = 'prefer-afternoon' as const;

  async rank(candidates: readonly Slot[]): Promise<Slot[]> {
    return [...candidates].sort(
      (a, b) => a.date.localeCompare(b.date) || tier(a) - tier(b) || compareWindows(a, b)
    );
  }
}
