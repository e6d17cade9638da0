import { Slot } from '../../types/coordinator';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { compareWindows } from './slot.intersector';
import { RankingStrategy } from './strategies/ranking.strategy';

export interface SelectionResult {
  slot: Slot;
  /** `strategy` when the ranking was used, `fallback` when the earliest candidate was taken instead. */
  source: 'strategy' | 'fallback';
}

function sameSlot(a: Slot, b: Slot): boolean {
  return compareWindows(a, b) === 0;
}

/**
 * Picks the strategy's favourite candidate. If the strategy fails, times out
 * or answers with something that is not a candidate, the earliest candidate
 * wins. Returns null when there is nothing to choose from.
 */
export async function selectSlot(
  candidates: readonly Slot[],
  strategy: RankingStrategy,
  timeoutMs: number
): Promise<SelectionResult | null> {
  if (candidates.length === 0) return null;

  const earliest = [...candidates].sort(compareWindows)[0];

  try {
    const ranked = await withTimeout(strategy.rank(candidates), timeoutMs, `${strategy.name} ranking`);
    const choice = ranked[0];

    if (choice && candidates.some((candidate) => sameSlot(candidate, choice))) {
      return { slot: { date: choice.date, timeRange: { ...choice.timeRange } }, source: 'strategy' };
    }

    logger.warn('Ranking strategy returned no usable candidate, using earliest', { strategy: strategy.name });
  } catch (error) {
    logger.warn('Ranking strategy failed, using earliest', { strategy: strategy.name, error: errorMessage(error) });
  }

  return { slot: { date: earliest.date, timeRange: { ...earliest.timeRange } }, source: 'fallback' };
}
