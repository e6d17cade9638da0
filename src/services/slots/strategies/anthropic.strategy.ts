import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { Slot } from '../../../types/coordinator';
import { ServiceError, toError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';
import { RankingStrategy } from './ranking.strategy';

const SYSTEM_PROMPT = `You are a meeting organizer choosing when a group of people should meet.

RULES:
- Earlier in the week is generally better
- Afternoon windows (13:00-17:00) are ideal
- Avoid very early morning or late evening

Reply with ONLY a JSON array of candidate indexes, best first. No prose, no markdown.`;

const rankingSchema = z.array(z.number().int().nonnegative());

function extractJson(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) return fenced[1].trim();

  const bracketed = text.match(/\[[\s\S]*\]/);
  return bracketed ? bracketed[0] : text.trim();
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/** Asks Claude to order the candidates. Indexes it invents or repeats are dropped. */
export class AnthropicRankingStrategy implements RankingStrategy {
  readonly name = 'anthropic' as const;
  private client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string
  ) {
    this.client = new Anthropic({ apiKey });
  }

  async rank(candidates: readonly Slot[]): Promise<Slot[]> {
    const options = candidates.map((slot, index) => ({
      index,
      date: slot.date,
      start: slot.timeRange.start,
      end: slot.timeRange.end,
    }));

    let text: string;
    try {
      const response = await this.client.messages.create({
        model: this.model,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: `Candidates:\n${JSON.stringify(options, null, 2)}` }],
        temperature: 0.3,
        max_tokens: 300,
      });

      text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    } catch (error) {
      const status = statusOf(error);
      throw new ServiceError('Anthropic', 'rank', toError(error), status !== 400 && status !== 401);
    }

    let indexes: number[];
    try {
      const parsed = rankingSchema.safeParse(JSON.parse(extractJson(text)));
      if (!parsed.success) {
        throw new Error(parsed.error.issues.map((i) => i.message).join(', '));
      }
      indexes = parsed.data;
    } catch (error) {
      throw new ServiceError('Anthropic', 'parseRanking', toError(error), false);
    }

    const seen = new Set<number>();
    const ranked: Slot[] = [];
    for (const index of indexes) {
      if (index >= candidates.length || seen.has(index)) continue;
      seen.add(index);
      ranked.push(candidates[index]);
    }

    logger.debug('Anthropic ranking received', { candidates: candidates.length, ranked: ranked.length });
    return ranked;
  }
}
