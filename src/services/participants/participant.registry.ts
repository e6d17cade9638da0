import { ParticipantClient } from '../../types/participant';
import { ValidationError } from '../../utils/errors';

export class ParticipantRegistry {
  private clients = new Map<string, ParticipantClient>();

  constructor(clients: ParticipantClient[] = []) {
    for (const client of clients) {
      this.register(client);
    }
  }

  /** Later registrations replace earlier ones with the same id. */
  register(client: ParticipantClient): void {
    this.clients.set(client.participantId, client);
  }

  has(participantId: string): boolean {
    return this.clients.has(participantId);
  }

  get(participantId: string): ParticipantClient {
    const client = this.clients.get(participantId);
    if (!client) {
      throw new ValidationError(`Unknown participant: ${participantId}`);
    }
    return client;
  }

  ids(): string[] {
    return [...this.clients.keys()];
  }

  list(): ParticipantClient[] {
    return [...this.clients.values()];
  }
}
