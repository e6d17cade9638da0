import { DiaryService } from '../../src/services/diary/diary.service';
import { DiaryStore } from '../../src/services/diary/diary.store';
import { LocalParticipantClient } from '../../src/services/participants/local.participant';
import { CoordinatorOptions } from '../../src/types/coordinator';
import { Appointment, AppointmentKind, DiaryTemplate } from '../../src/types/diary';
import { ParticipantClient } from '../../src/types/participant';

export const DAY = '2026-01-21';
export const NEXT_DAY = '2026-01-22';

export function appointment(start: string, end: string, label: string, kind: AppointmentKind): Appointment {
  return { timeRange: { start, end }, label, kind };
}

export function template(appointments: Appointment[], overrides: Partial<DiaryTemplate> = {}): DiaryTemplate {
  return {
    displayName: 'Test participant',
    days: 1,
    dayBounds: { start: '08:00', end: '19:00' },
    appointments,
    variations: [],
    ...overrides,
  };
}

export function hostedParticipants(templates: Record<string, DiaryTemplate>, anchorDate: string = DAY) {
  const diaries = new DiaryService(
    Object.entries(templates).map(([id, t]) => new DiaryStore(id, t, anchorDate))
  );
  const clients: Record<string, LocalParticipantClient> = {};
  for (const id of Object.keys(templates)) {
    clients[id] = new LocalParticipantClient(id, diaries);
  }
  return { diaries, clients };
}

/** Delegates to `inner` but has no cancellation operation. */
export function withoutCancellation(inner: ParticipantClient): ParticipantClient {
  return {
    participantId: inner.participantId,
    transport: inner.transport,
    health: (options) => inner.health(options),
    getDiary: (options) => inner.getDiary(options),
    checkAvailability: (query, options) => inner.checkAvailability(query, options),
    bookAppointment: (query, options) => inner.bookAppointment(query, options),
    resetDiary: (options) => inner.resetDiary(options),
  };
}

export const testOptions: CoordinatorOptions = {
  granularityMinutes: 60,
  commitMode: 'concurrent',
  timezone: 'UTC',
  healthTimeoutMs: 200,
  diaryFetchTimeoutMs: 200,
  bookingTimeoutMs: 200,
  compensationTimeoutMs: 200,
  rankingTimeoutMs: 200,
  runTimeoutMs: 5000,
};

export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
