import { AnthropicRankingStrategy } from './anthropic.strategy';
import { EarliestFirstStrategy, PreferAfternoonStrategy } from './heuristic.strategies';
import { RankingStrategy } from './ranking.strategy';

export interface StrategyConfig {
  anthropicApiKey?: string;
  model?: string;
}

export class RankingStrategyFactory {
  static create(name: string, config: StrategyConfig = {}): RankingStrategy {
    switch (name) {
      case 'earliest':
        return new EarliestFirstStrategy();
      case 'prefer-afternoon':
        return new PreferAfternoonStrategy();
      case 'anthropic':
        if (!config.anthropicApiKey) {
          throw new Error('ANTHROPIC_API_KEY is required for the anthropic ranking strategy');
        }
        return new AnthropicRankingStrategy(config.anthropicApiKey, config.model ?? 'claude-3-5-haiku-latest');
      default:
        throw new Error(`Unsupported ranking strategy: ${name}`);
    }
  }
}
