import { BookingCoordinator } from '../../src/services/coordinator/booking.coordinator';
import { ParticipantRegistry } from '../../src/services/participants/participant.registry';
import { EarliestFirstStrategy } from '../../src/services/slots/strategies/heuristic.strategies';
import { RankingStrategy } from '../../src/services/slots/strategies/ranking.strategy';
import { CoordinatorOptions, ScheduleMatchRequest, ScheduleMatchResult } from '../../src/types/coordinator';
import { DiaryTemplate } from '../../src/types/diary';
import { ParticipantClient } from '../../src/types/participant';
import { InvalidRangeError, ParticipantError, ValidationError } from '../../src/utils/errors';
import {
  DAY,
  NEXT_DAY,
  appointment,
  hostedParticipants,
  never,
  template,
  testOptions,
  withoutCancellation,
} from '../helpers/fixtures';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const officeHours = template([appointment('10:00', '12:00', 'Office', 'fixed')]);

const request: ScheduleMatchRequest = {
  participantIds: ['riley', 'morgan'],
  durationMinutes: 120,
  dayWindowStart: '08:00',
  dayWindowEnd: '19:00',
  searchDays: 1,
  startDate: DAY,
};

function setup(
  templates: Record<string, DiaryTemplate> = { riley: officeHours, morgan: officeHours },
  options: Partial<CoordinatorOptions> = {},
  strategy: RankingStrategy = new EarliestFirstStrategy()
) {
  const hosted = hostedParticipants(templates);
  const registry = new ParticipantRegistry(Object.values(hosted.clients));
  const coordinator = new BookingCoordinator(registry, strategy, { ...testOptions, ...options });
  return { ...hosted, registry, coordinator };
}

function bookedLabels(days: Record<string, { label: string; kind: string }[]>, date: string): string[] {
  return days[date].filter((a) => a.kind === 'booked').map((a) => a.label);
}

/** Runs `book` right after the coordinator has read the diary, so the snapshot is stale. */
function bookAfterSnapshot(client: ParticipantClient, book: () => void): void {
  const original = client.getDiary.bind(client);
  jest.spyOn(client, 'getDiary').mockImplementation(async (options) => {
    const snapshot = await original(options);
    book();
    return snapshot;
  });
}

/** Stores the booking, then answers only after `delayMs`. */
function bookLate(client: ParticipantClient, delayMs: number): void {
  const original = client.bookAppointment.bind(client);
  jest.spyOn(client, 'bookAppointment').mockImplementation(async (query, options) => {
    const reply = await original(query, options);
    await new Promise((resolve) => setTimeout(resolve, delayMs));
    return reply;
  });
}

/** Holds every diary read until two have been made, so both runs see the same diary. */
function holdDiaryUntilReadTwice(client: ParticipantClient): void {
  const original = client.getDiary.bind(client);
  const waiting: Array<() => void> = [];
  jest.spyOn(client, 'getDiary').mockImplementation(async (options) => {
    const snapshot = await original(options);
    await new Promise<void>((resolve) => {
      waiting.push(resolve);
      if (waiting.length === 2) waiting.forEach((release) => release());
    });
    return snapshot;
  });
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('BookingCoordinator.scheduleMatch', () => {
  it('should book the earliest common window for everyone', async () => {
    const { coordinator, diaries } = setup();

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('committed');
    expect(result.reason).toBeUndefined();
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(result.selectedSlot).toEqual({ date: DAY, start: '08:00', end: '10:00' });
    expect(result.candidatesFound).toBe(7);
    expect(result.candidates.map((c) => `${c.start}-${c.end}`)).toEqual([
      '08:00-10:00',
      '12:00-14:00',
      '13:00-15:00',
      '14:00-16:00',
      '15:00-17:00',
      '16:00-18:00',
      '17:00-19:00',
    ]);
    expect(result.perParticipant).toEqual({
      riley: { freeSlots: 7, bookingStatus: 'committed' },
      morgan: { freeSlots: 7, bookingStatus: 'committed' },
    });
    expect(result.transitions).toEqual([
      'Init',
      'HealthChecking',
      'FetchingDiaries',
      'ComputingAvailability',
      'Intersecting',
      'Selecting',
      'Committing',
      'Committed',
      'Done',
    ]);
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual(['Shared appointment']);
    expect(bookedLabels(diaries.getDiary('morgan').days, DAY)).toEqual(['Shared appointment']);
  });

  it('should never book the same window twice across runs', async () => {
    const { coordinator, diaries } = setup();

    const first = await coordinator.scheduleMatch({ ...request, label: 'First match' });
    const second = await coordinator.scheduleMatch({ ...request, label: 'Second match' });

    expect(first.selectedSlot).toEqual({ date: DAY, start: '08:00', end: '10:00' });
    expect(second.selectedSlot).toEqual({ date: DAY, start: '12:00', end: '14:00' });
    expect(second.candidatesFound).toBe(6);
    expect(bookedLabels(diaries.getDiary('morgan').days, DAY)).toEqual(['First match', 'Second match']);
  });

  it('should look past a day that is fully blocked for one participant', async () => {
    const { coordinator } = setup({
      riley: { ...officeHours, days: 2 },
      morgan: template([], {
        days: 2,
        variations: [{ everyNthDay: 2, appointment: appointment('08:00', '19:00', 'Conference', 'fixed') }],
      }),
    });

    const result = await coordinator.scheduleMatch({ ...request, searchDays: 2 });

    expect(result.status).toBe('committed');
    expect(result.selectedSlot).toEqual({ date: NEXT_DAY, start: '08:00', end: '10:00' });
    expect(result.candidates.every((c) => c.date === NEXT_DAY)).toBe(true);
    expect(result.perParticipant.riley.freeSlots).toBe(14);
    expect(result.perParticipant.morgan.freeSlots).toBe(10);
  });

  it('should abort with NoCommonSlot when the free windows never line up', async () => {
    const { coordinator, diaries } = setup({
      riley: template([appointment('08:00', '13:00', 'Morning shift', 'fixed')]),
      morgan: template([appointment('13:00', '19:00', 'Afternoon shift', 'fixed')]),
    });

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('aborted');
    expect(result.reason).toBe('NoCommonSlot');
    expect(result.selectedSlot).toBeUndefined();
    expect(result.candidatesFound).toBe(0);
    expect(result.perParticipant).toEqual({
      riley: { freeSlots: 5, bookingStatus: 'not_attempted' },
      morgan: { freeSlots: 4, bookingStatus: 'not_attempted' },
    });
    expect(result.transitions).toEqual([
      'Init',
      'HealthChecking',
      'FetchingDiaries',
      'ComputingAvailability',
      'Intersecting',
      'Aborted',
      'Done',
    ]);
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
  });

  it('should roll back a committed booking when another participant reports a conflict', async () => {
    const { coordinator, diaries, clients } = setup();
    bookAfterSnapshot(clients.morgan, () => {
      diaries.upsertAppointment('morgan', DAY, appointment('08:00', '10:00', 'Other run', 'booked'));
    });

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('partially_failed');
    expect(result.reason).toBe('Conflict');
    expect(result.selectedSlot).toEqual({ date: DAY, start: '08:00', end: '10:00' });
    expect(result.perParticipant).toEqual({
      riley: { freeSlots: 7, bookingStatus: 'rolled_back' },
      morgan: {
        freeSlots: 7,
        bookingStatus: 'failed',
        failure: 'Conflict',
        conflict: appointment('08:00', '10:00', 'Other run', 'booked'),
      },
    });
    expect(result.transitions.slice(-3)).toEqual(['Committing', 'PartiallyFailed', 'Done']);
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
    expect(bookedLabels(diaries.getDiary('morgan').days, DAY)).toEqual(['Other run']);
  });

  it('should retry a failed cancellation once', async () => {
    const { coordinator, diaries, clients } = setup();
    bookAfterSnapshot(clients.morgan, () => {
      diaries.upsertAppointment('morgan', DAY, appointment('08:00', '10:00', 'Other run', 'booked'));
    });
    const cancel = jest.spyOn(clients.riley, 'cancelAppointment').mockRejectedValueOnce(new Error('flaky'));

    const result = await coordinator.scheduleMatch(request);

    expect(cancel).toHaveBeenCalledTimes(2);
    expect(result.perParticipant.riley.bookingStatus).toBe('rolled_back');
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
  });

  it('should report compensation_failed after the retry also fails', async () => {
    const { coordinator, diaries, clients } = setup();
    bookAfterSnapshot(clients.morgan, () => {
      diaries.upsertAppointment('morgan', DAY, appointment('08:00', '10:00', 'Other run', 'booked'));
    });
    const cancel = jest.spyOn(clients.riley, 'cancelAppointment').mockResolvedValue('error');

    const result = await coordinator.scheduleMatch(request);

    expect(cancel).toHaveBeenCalledTimes(2);
    expect(result.status).toBe('partially_failed');
    expect(result.perParticipant.riley).toEqual({
      freeSlots: 7,
      bookingStatus: 'compensation_failed',
      compensationError: 'participant reported an error',
    });
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual(['Shared appointment']);
  });

  it('should report compensation_failed when the participant cannot cancel', async () => {
    const hosted = hostedParticipants({ riley: officeHours, morgan: officeHours });
    bookAfterSnapshot(hosted.clients.morgan, () => {
      hosted.diaries.upsertAppointment('morgan', DAY, appointment('08:00', '10:00', 'Other run', 'booked'));
    });
    const registry = new ParticipantRegistry([withoutCancellation(hosted.clients.riley), hosted.clients.morgan]);
    const coordinator = new BookingCoordinator(registry, new EarliestFirstStrategy(), testOptions);

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('partially_failed');
    expect(result.perParticipant.riley).toEqual({
      freeSlots: 7,
      bookingStatus: 'compensation_failed',
      compensationError: 'cancellation unsupported',
    });
  });

  it('should abort when every booking fails', async () => {
    const { coordinator, clients } = setup();
    jest.spyOn(clients.riley, 'bookAppointment').mockResolvedValue({ status: 'conflict' });
    jest
      .spyOn(clients.morgan, 'bookAppointment')
      .mockRejectedValue(new ParticipantError('morgan', 'bookAppointment', 'unreachable', new Error('ECONNREFUSED')));

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('aborted');
    expect(result.reason).toBe('Conflict');
    expect(result.perParticipant).toEqual({
      riley: { freeSlots: 7, bookingStatus: 'failed', failure: 'Conflict' },
      morgan: { freeSlots: 7, bookingStatus: 'rolled_back', failure: 'Unreachable' },
    });
  });

  it('should cancel a booking that landed after its call timed out', async () => {
    const { coordinator, diaries, clients } = setup(undefined, { bookingTimeoutMs: 20 });
    bookLate(clients.morgan, 60);

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('partially_failed');
    expect(result.reason).toBe('Timeout');
    expect(result.perParticipant).toEqual({
      riley: { freeSlots: 7, bookingStatus: 'rolled_back' },
      morgan: { freeSlots: 7, bookingStatus: 'rolled_back', failure: 'Timeout' },
    });
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
    expect(bookedLabels(diaries.getDiary('morgan').days, DAY)).toEqual([]);
  });

  it('should cancel late bookings even when every call timed out', async () => {
    const { coordinator, diaries, clients } = setup(undefined, { bookingTimeoutMs: 20 });
    bookLate(clients.riley, 60);
    bookLate(clients.morgan, 60);

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('aborted');
    expect(result.reason).toBe('Timeout');
    expect(result.perParticipant).toEqual({
      riley: { freeSlots: 7, bookingStatus: 'rolled_back', failure: 'Timeout' },
      morgan: { freeSlots: 7, bookingStatus: 'rolled_back', failure: 'Timeout' },
    });
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
    expect(bookedLabels(diaries.getDiary('morgan').days, DAY)).toEqual([]);
  });

  it('should let only one of two concurrent runs commit the same window', async () => {
    const { coordinator, diaries, clients } = setup();
    holdDiaryUntilReadTwice(clients.riley);

    const results = await Promise.all([coordinator.scheduleMatch(request), coordinator.scheduleMatch(request)]);

    const committed = results.filter((r) => r.status === 'committed');
    const aborted = results.filter((r) => r.status === 'aborted');
    expect(committed).toHaveLength(1);
    expect(aborted).toHaveLength(1);
    expect(aborted[0].reason).toBe('Conflict');
    expect(aborted[0].selectedSlot).toEqual({ date: DAY, start: '08:00', end: '10:00' });

    for (const id of ['riley', 'morgan']) {
      const booked = diaries.getDiary(id).days[DAY].filter((a) => a.kind === 'booked');
      expect(booked).toEqual([
        { ...appointment('08:00', '10:00', 'Shared appointment', 'booked'), runId: committed[0].runId },
      ]);
    }
  });

  it('should leave the booking of a concurrent run in place', async () => {
    const { coordinator, diaries, clients } = setup({ riley: officeHours, morgan: officeHours, avery: officeHours });
    const runs: ScheduleMatchResult[] = [];
    const original = clients.avery.getDiary.bind(clients.avery);
    jest.spyOn(clients.avery, 'getDiary').mockImplementationOnce(async (options) => {
      const snapshot = await original(options);
      runs.push(await coordinator.scheduleMatch(request));
      diaries.upsertAppointment('avery', DAY, appointment('08:00', '10:00', 'Other run', 'booked'));
      return snapshot;
    });

    const result = await coordinator.scheduleMatch({ ...request, participantIds: ['riley', 'avery'] });

    expect(runs.map((r) => r.status)).toEqual(['committed']);
    expect(result.status).toBe('aborted');
    expect(result.reason).toBe('Conflict');
    expect(result.perParticipant).toEqual({
      riley: {
        freeSlots: 7,
        bookingStatus: 'failed',
        failure: 'Conflict',
        conflict: { ...appointment('08:00', '10:00', 'Shared appointment', 'booked'), runId: runs[0].runId },
      },
      avery: {
        freeSlots: 7,
        bookingStatus: 'failed',
        failure: 'Conflict',
        conflict: appointment('08:00', '10:00', 'Other run', 'booked'),
      },
    });
    expect(diaries.getDiary('riley').days[DAY].filter((a) => a.kind === 'booked')).toEqual([
      { ...appointment('08:00', '10:00', 'Shared appointment', 'booked'), runId: runs[0].runId },
    ]);
  });

  it('should stop at the first failure when committing sequentially', async () => {
    const { coordinator, diaries, clients } = setup(
      { riley: officeHours, morgan: officeHours, avery: officeHours },
      { commitMode: 'sequential' }
    );
    bookAfterSnapshot(clients.morgan, () => {
      diaries.upsertAppointment('morgan', DAY, appointment('08:00', '10:00', 'Other run', 'booked'));
    });
    const averyBook = jest.spyOn(clients.avery, 'bookAppointment');

    const result = await coordinator.scheduleMatch({ ...request, participantIds: ['riley', 'morgan', 'avery'] });

    expect(averyBook).not.toHaveBeenCalled();
    expect(result.status).toBe('partially_failed');
    expect(result.reason).toBe('Conflict');
    expect(result.perParticipant.riley.bookingStatus).toBe('rolled_back');
    expect(result.perParticipant.morgan.bookingStatus).toBe('failed');
    expect(result.perParticipant.avery.bookingStatus).toBe('not_attempted');
  });

  it('should abort with ParticipantUnavailable when a health check fails', async () => {
    const { coordinator, clients } = setup();
    jest.spyOn(clients.morgan, 'health').mockResolvedValue(false);
    const getDiary = jest.spyOn(clients.riley, 'getDiary');

    const result = await coordinator.scheduleMatch(request);

    expect(getDiary).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: 'aborted', reason: 'ParticipantUnavailable', candidatesFound: 0 });
    expect(result.perParticipant).toEqual({
      riley: { freeSlots: 0, bookingStatus: 'not_attempted' },
      morgan: { freeSlots: 0, bookingStatus: 'failed', failure: 'Unreachable' },
    });
    expect(result.transitions).toEqual(['Init', 'HealthChecking', 'Aborted', 'Done']);
  });

  it('should abort with DiaryFetchFailed when a diary cannot be read', async () => {
    const { coordinator, clients } = setup();
    jest
      .spyOn(clients.morgan, 'getDiary')
      .mockRejectedValue(new ParticipantError('morgan', 'getDiary', 'unreachable', new Error('ECONNREFUSED')));

    const result = await coordinator.scheduleMatch(request);

    expect(result.status).toBe('aborted');
    expect(result.reason).toBe('DiaryFetchFailed');
    expect(result.perParticipant.morgan).toEqual({ freeSlots: 0, bookingStatus: 'failed', failure: 'Unreachable' });
    expect(result.transitions).toEqual(['Init', 'HealthChecking', 'FetchingDiaries', 'Aborted', 'Done']);
  });

  it('should record a diary fetch that runs past its timeout', async () => {
    const { coordinator, clients } = setup(undefined, { diaryFetchTimeoutMs: 20 });
    jest.spyOn(clients.morgan, 'getDiary').mockImplementation(() => never());

    const result = await coordinator.scheduleMatch(request);

    expect(result.reason).toBe('DiaryFetchFailed');
    expect(result.perParticipant.morgan.failure).toBe('Timeout');
  });

  describe('validation', () => {
    it('should reject unknown participants before calling anyone', async () => {
      const { coordinator, clients } = setup();
      const health = jest.spyOn(clients.riley, 'health');

      await expect(coordinator.scheduleMatch({ ...request, participantIds: ['riley', 'ghost'] })).rejects.toThrow(
        'Unknown participant: ghost'
      );
      expect(health).not.toHaveBeenCalled();
    });

    it('should reject an empty or repeated participant list', async () => {
      const { coordinator } = setup();

      await expect(coordinator.scheduleMatch({ ...request, participantIds: [] })).rejects.toThrow(ValidationError);
      await expect(
        coordinator.scheduleMatch({ ...request, participantIds: ['riley', 'riley'] })
      ).rejects.toThrow('Participant ids must be unique');
    });

    it('should reject durations that are not positive or do not fit the day window', async () => {
      const { coordinator } = setup();

      await expect(coordinator.scheduleMatch({ ...request, durationMinutes: 0 })).rejects.toThrow(InvalidRangeError);
      await expect(
        coordinator.scheduleMatch({ ...request, dayWindowStart: '17:00', dayWindowEnd: '18:00' })
      ).rejects.toThrow(InvalidRangeError);
      await expect(
        coordinator.scheduleMatch({ ...request, dayWindowStart: '18:00', dayWindowEnd: '09:00' })
      ).rejects.toThrow('is empty');
    });

    it('should reject a search range outside 1 to 31 days', async () => {
      const { coordinator } = setup();

      await expect(coordinator.scheduleMatch({ ...request, searchDays: 0 })).rejects.toThrow(ValidationError);
      await expect(coordinator.scheduleMatch({ ...request, searchDays: 32 })).rejects.toThrow(ValidationError);
    });
  });

  describe('run deadline', () => {
    let clock: number;

    beforeEach(() => {
      clock = 1_000_000;
      jest.spyOn(Date, 'now').mockImplementation(() => clock);
    });

    it('should abort with Timeout when selection uses up the run budget', async () => {
      const slowStrategy: RankingStrategy = {
        name: 'earliest',
        rank: async (candidates) => {
          clock += 6000;
          return [...candidates];
        },
      };
      const { coordinator, diaries } = setup(undefined, {}, slowStrategy);

      const result = await coordinator.scheduleMatch(request);

      expect(result.status).toBe('aborted');
      expect(result.reason).toBe('Timeout');
      expect(result.selectedSlot).toEqual({ date: DAY, start: '08:00', end: '10:00' });
      expect(result.transitions.slice(-3)).toEqual(['Selecting', 'Aborted', 'Done']);
      expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
    });

    it('should skip remaining bookings and roll back once the deadline passes mid-commit', async () => {
      const { coordinator, diaries, clients } = setup(
        { riley: officeHours, morgan: officeHours, avery: officeHours },
        { commitMode: 'sequential' }
      );
      const original = clients.riley.bookAppointment.bind(clients.riley);
      jest.spyOn(clients.riley, 'bookAppointment').mockImplementation(async (query) => {
        clock += 6000;
        return original(query);
      });

      const result = await coordinator.scheduleMatch({ ...request, participantIds: ['riley', 'morgan', 'avery'] });

      expect(result.status).toBe('partially_failed');
      expect(result.reason).toBe('Timeout');
      expect(result.perParticipant).toEqual({
        riley: { freeSlots: 7, bookingStatus: 'rolled_back' },
        morgan: { freeSlots: 7, bookingStatus: 'not_attempted', failure: 'Timeout' },
        avery: { freeSlots: 7, bookingStatus: 'not_attempted' },
      });
      expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
    });
  });
});

describe('BookingCoordinator maintenance', () => {
  it('should report readiness of every participant', async () => {
    const { coordinator, clients } = setup();
    expect(await coordinator.checkAll()).toEqual({
      ready: true,
      participants: { riley: 'online', morgan: 'online' },
    });

    jest.spyOn(clients.morgan, 'health').mockRejectedValue(new Error('down'));
    expect(await coordinator.checkAll()).toEqual({
      ready: false,
      participants: { riley: 'online', morgan: 'offline' },
    });
  });

  it('should reset every diary and report failures per participant', async () => {
    const { coordinator, diaries, clients } = setup();
    await coordinator.scheduleMatch(request);
    jest.spyOn(clients.morgan, 'resetDiary').mockRejectedValue(new Error('read-only'));

    expect(await coordinator.resetAll()).toEqual({ riley: 'reset', morgan: 'failed' });
    expect(bookedLabels(diaries.getDiary('riley').days, DAY)).toEqual([]);
    expect(bookedLabels(diaries.getDiary('morgan').days, DAY)).toEqual(['Shared appointment']);
  });
});
