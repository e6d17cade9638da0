import { ParticipantLiveness } from '../../types/coordinator';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { ParticipantRegistry } from '../participants/participant.registry';

/**
 * Cheap preflight before the diary fetch. A participant that cannot answer in
 * time is reported offline; the check never throws.
 */
export class HealthChecker {
  constructor(private readonly registry: ParticipantRegistry) {}

  async check(participantId: string, timeoutMs: number): Promise<ParticipantLiveness> {
    try {
      const client = this.registry.get(participantId);
      const healthy = await withTimeout(client.health({ timeoutMs }), timeoutMs, `${participantId} health`);
      return healthy ? 'online' : 'offline';
    } catch (error) {
      logger.warn('Participant health check failed', { participantId, error: errorMessage(error) });
      return 'offline';
    }
  }

  async checkAll(participantIds: string[], timeoutMs: number): Promise<Record<string, ParticipantLiveness>> {
    const results = await Promise.all(
      participantIds.map(async (id) => [id, await this.check(id, timeoutMs)] as const)
    );
    return Object.fromEntries(results);
  }
}
