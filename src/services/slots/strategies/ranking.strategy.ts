import { Slot } from '../../../types/coordinator';

export type RankingStrategyName = 'earliest' | 'prefer-afternoon' | 'anthropic';

export interface RankingStrategy {
  readonly name: RankingStrategyName;
  /** Candidates ordered by preference, best first. May reject or be slow. */
  rank(candidates: readonly Slot[]): Promise<Slot[]>;
}
