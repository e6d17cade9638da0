import { z } from 'zod';
import { DiaryService } from '../services/diary/diary.service';
import { DiaryStore } from '../services/diary/diary.store';
import { HttpParticipantClient } from '../services/participants/http.participant';
import { LocalParticipantClient } from '../services/participants/local.participant';
import { ParticipantRegistry } from '../services/participants/participant.registry';
import { today } from '../utils/clock';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { Env } from './env';
import { loadDiaryTemplates } from './templates';

const remoteParticipantsSchema = z.record(z.string().min(1), z.string().url());

export function parseRemoteParticipants(raw: string): Record<string, string> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError('REMOTE_PARTICIPANTS must be a JSON object of participant id to base URL');
  }

  const parsed = remoteParticipantsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid REMOTE_PARTICIPANTS: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ')}`
    );
  }
  return parsed.data;
}

export interface Participants {
  diaries: DiaryService;
  registry: ParticipantRegistry;
}

/**
 * Hosts the configured template diaries in-process and registers a client for
 * each, then adds the remote participants. A remote entry replaces a hosted
 * one with the same id.
 */
export function buildParticipants(config: Env): Participants {
  const templates = loadDiaryTemplates(config.DIARY_TEMPLATES_PATH);
  const anchorDate = config.DIARY_ANCHOR_DATE ?? today(config.TIMEZONE);

  const hostedIds = config.HOSTED_PARTICIPANTS
    ? config.HOSTED_PARTICIPANTS.split(',').map((id) => id.trim()).filter((id) => id.length > 0)
    : Object.keys(templates);

  const diaries = new DiaryService();
  const registry = new ParticipantRegistry();

  for (const id of hostedIds) {
    const template = templates[id];
    if (!template) {
      throw new ValidationError(`No diary template for hosted participant: ${id}`);
    }
    diaries.register(new DiaryStore(id, template, anchorDate));
    registry.register(new LocalParticipantClient(id, diaries));
  }

  for (const [id, baseUrl] of Object.entries(parseRemoteParticipants(config.REMOTE_PARTICIPANTS))) {
    registry.register(new HttpParticipantClient(id, baseUrl));
  }

  logger.info('Participants configured', {
    hosted: hostedIds,
    registered: registry.ids(),
    anchorDate,
  });

  return { diaries, registry };
}
