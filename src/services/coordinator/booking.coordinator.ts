import {
  BookingFailure,
  CandidateWindow,
  CoordinatorOptions,
  ParticipantLiveness,
  RunReason,
  ScheduleMatchRequest,
  ScheduleMatchResult,
  Slot,
} from '../../types/coordinator';
import { DiarySnapshot, TimeRange } from '../../types/diary';
import { BookingReply } from '../../types/participant';
import { dateRange, formatRange, isClock, isIsoDate, toMinutes, today } from '../../utils/clock';
import {
  InvalidRangeError,
  ParticipantError,
  TimeoutError,
  ValidationError,
  errorMessage,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { Deadline, withTimeout } from '../../utils/timeout';
import { computeFreeWindows } from '../availability/window.generator';
import { HealthChecker } from '../health/health.checker';
import { ParticipantRegistry } from '../participants/participant.registry';
import { intersect } from '../slots/slot.intersector';
import { selectSlot } from '../slots/slot.selector';
import { RankingStrategy } from '../slots/strategies/ranking.strategy';
import { BookingTransaction } from './booking.transaction';

const DEFAULT_LABEL = 'Shared appointment';
const MAX_SEARCH_DAYS = 31;
const COMPENSATION_ATTEMPTS = 2;

interface RunParams {
  participantIds: string[];
  durationMinutes: number;
  dayWindow: TimeRange;
  dates: string[];
  label: string;
}

const FAILURE_REASONS: Record<BookingFailure, RunReason> = {
  Conflict: 'Conflict',
  Unreachable: 'Unreachable',
  Timeout: 'Timeout',
  Error: 'BookingFailed',
};

function classify(error: unknown): BookingFailure {
  if (error instanceof TimeoutError) return 'Timeout';
  if (error instanceof ParticipantError) {
    if (error.kind === 'timeout') return 'Timeout';
    if (error.kind === 'unreachable') return 'Unreachable';
  }
  return 'Error';
}

/**
 * Drives one scheduling run across independently owned diaries:
 * health check, concurrent diary fetch, local availability and intersection,
 * slot selection, then booking on every participant.
 *
 * There is no shared transaction manager between participants, so a booking
 * that succeeds on some participants and fails on others is undone by
 * cancelling it where it succeeded (saga-style compensation).
 */
export class BookingCoordinator {
  private healthChecker: HealthChecker;

  constructor(
    private readonly registry: ParticipantRegistry,
    private readonly strategy: RankingStrategy,
    private readonly options: CoordinatorOptions
  ) {
    this.healthChecker = new HealthChecker(registry);
  }

  async scheduleMatch(request: ScheduleMatchRequest): Promise<ScheduleMatchResult> {
    const params = this.validate(request);
    const tx = new BookingTransaction(params.participantIds);
    const deadline = new Deadline(this.options.runTimeoutMs);

    logger.info('Coordination run started', {
      runId: tx.runId,
      participants: params.participantIds,
      durationMinutes: params.durationMinutes,
      dayWindow: formatRange(params.dayWindow),
      dates: params.dates.length,
    });

    const result = await this.run(tx, params, deadline);

    logger.info('Coordination run finished', {
      runId: result.runId,
      status: result.status,
      reason: result.reason,
      selectedSlot: result.selectedSlot,
      candidatesFound: result.candidatesFound,
    });
    return result;
  }

  /** Liveness of every registered participant. */
  async checkAll(): Promise<{ ready: boolean; participants: Record<string, ParticipantLiveness> }> {
    const participants = await this.healthChecker.checkAll(this.registry.ids(), this.options.healthTimeoutMs);
    const ready = Object.values(participants).every((status) => status === 'online');
    return { ready, participants };
  }

  /** Resets every registered participant's diary; failures are reported per participant. */
  async resetAll(): Promise<Record<string, 'reset' | 'failed'>> {
    const results = await Promise.all(
      this.registry.list().map(async (client) => {
        try {
          await withTimeout(
            client.resetDiary({ timeoutMs: this.options.diaryFetchTimeoutMs }),
            this.options.diaryFetchTimeoutMs,
            `${client.participantId} reset`
          );
          return [client.participantId, 'reset'] as const;
        } catch (error) {
          logger.warn('Participant reset failed', { participantId: client.participantId, error: errorMessage(error) });
          return [client.participantId, 'failed'] as const;
        }
      })
    );
    return Object.fromEntries(results);
  }

  private validate(request: ScheduleMatchRequest): RunParams {
    const ids = request.participantIds;
    if (!Array.isArray(ids) || ids.length === 0) {
      throw new ValidationError('At least one participant is required');
    }
    if (new Set(ids).size !== ids.length) {
      throw new ValidationError('Participant ids must be unique');
    }
    for (const id of ids) {
      if (!this.registry.has(id)) {
        throw new ValidationError(`Unknown participant: ${id}`);
      }
    }

    if (!Number.isInteger(request.durationMinutes) || request.durationMinutes <= 0) {
      throw new InvalidRangeError(`durationMinutes must be a positive integer, got ${request.durationMinutes}`);
    }
    if (!isClock(request.dayWindowStart) || !isClock(request.dayWindowEnd)) {
      throw new InvalidRangeError('dayWindowStart and dayWindowEnd must be HH:MM clock times');
    }

    const windowMinutes = toMinutes(request.dayWindowEnd) - toMinutes(request.dayWindowStart);
    if (windowMinutes <= 0) {
      throw new InvalidRangeError(`Day window ${request.dayWindowStart}-${request.dayWindowEnd} is empty`);
    }
    if (request.durationMinutes > windowMinutes) {
      throw new InvalidRangeError(
        `A ${request.durationMinutes} minute appointment does not fit in ${request.dayWindowStart}-${request.dayWindowEnd}`
      );
    }

    if (!Number.isInteger(request.searchDays) || request.searchDays < 1 || request.searchDays > MAX_SEARCH_DAYS) {
      throw new ValidationError(`searchDays must be an integer between 1 and ${MAX_SEARCH_DAYS}`);
    }

    const startDate = request.startDate ?? today(this.options.timezone);
    if (!isIsoDate(startDate)) {
      throw new ValidationError(`startDate must be YYYY-MM-DD, got ${startDate}`);
    }

    return {
      participantIds: [...ids],
      durationMinutes: request.durationMinutes,
      dayWindow: { start: request.dayWindowStart, end: request.dayWindowEnd },
      dates: dateRange(startDate, request.searchDays),
      label: request.label?.trim() || DEFAULT_LABEL,
    };
  }

  private async run(tx: BookingTransaction, params: RunParams, deadline: Deadline): Promise<ScheduleMatchResult> {
    const ids = params.participantIds;

    tx.transition('HealthChecking');
    const liveness = await this.healthChecker.checkAll(ids, deadline.budget(this.options.healthTimeoutMs));
    const offline = ids.filter((id) => liveness[id] !== 'online');
    if (offline.length > 0) {
      for (const id of offline) tx.mark(id, 'failed', 'Unreachable');
      logger.warn('Participants unavailable, aborting run', { runId: tx.runId, offline });
      return tx.finish('aborted', deadline.expired() ? 'Timeout' : 'ParticipantUnavailable');
    }
    if (deadline.expired()) return tx.finish('aborted', 'Timeout');

    tx.transition('FetchingDiaries');
    const diaries = await this.fetchDiaries(tx, ids, deadline);
    if (!diaries) {
      return tx.finish('aborted', deadline.expired() ? 'Timeout' : 'DiaryFetchFailed');
    }
    if (deadline.expired()) return tx.finish('aborted', 'Timeout');

    tx.transition('ComputingAvailability');
    const freeWindows = new Map<string, CandidateWindow[]>();
    for (const id of ids) {
      const diary = diaries.get(id);
      const windows = diary
        ? computeFreeWindows(diary, params.dates, {
            durationMinutes: params.durationMinutes,
            dayWindow: params.dayWindow,
            granularityMinutes: this.options.granularityMinutes,
          })
        : [];
      freeWindows.set(id, windows);
      tx.setFreeSlots(id, windows.length);
    }

    tx.transition('Intersecting');
    const candidates = intersect(freeWindows);
    tx.setCandidates(candidates);
    if (candidates.length === 0) {
      logger.info('No common slot found', { runId: tx.runId, dates: params.dates.length });
      return tx.finish('aborted', 'NoCommonSlot');
    }
    if (deadline.expired()) return tx.finish('aborted', 'Timeout');

    tx.transition('Selecting');
    const selection = await selectSlot(candidates, this.strategy, deadline.budget(this.options.rankingTimeoutMs));
    if (!selection) {
      return tx.finish('aborted', 'NoCommonSlot');
    }
    tx.selectSlot(selection.slot);
    logger.info('Slot selected', {
      runId: tx.runId,
      date: selection.slot.date,
      time: formatRange(selection.slot.timeRange),
      source: selection.source,
      strategy: this.strategy.name,
    });
    if (deadline.expired()) return tx.finish('aborted', 'Timeout');

    tx.transition('Committing');
    await this.commit(tx, selection.slot, params.label, deadline);

    const committed = tx.withStatus('committed');
    const failed = tx.withStatus('failed');

    if (failed.length === 0 && committed.length === ids.length) {
      return tx.finish('committed');
    }

    const failure = tx.firstFailure();
    const reason: RunReason = deadline.expired() ? 'Timeout' : failure ? FAILURE_REASONS[failure] : 'BookingFailed';
    const status = committed.length === 0 ? 'aborted' : 'partially_failed';

    // A timed-out or unreachable booking may still have landed on the participant.
    const uncertain = failed.filter((id) => {
      const outcome = tx.outcomeOf(id);
      return outcome.failure === 'Timeout' || outcome.failure === 'Unreachable';
    });
    const toCancel = [...committed, ...uncertain];
    if (toCancel.length > 0) {
      logger.warn('Booking failed, compensating', { runId: tx.runId, committed, uncertain, failed, reason });
      await Promise.all(toCancel.map((id) => this.compensate(tx, id, selection.slot)));
    }
    return tx.finish(status, reason);
  }

  /** All diaries, or null if any participant's diary could not be fetched. */
  private async fetchDiaries(
    tx: BookingTransaction,
    ids: string[],
    deadline: Deadline
  ): Promise<Map<string, DiarySnapshot> | null> {
    const timeoutMs = deadline.budget(this.options.diaryFetchTimeoutMs);

    const results = await Promise.all(
      ids.map(async (id) => {
        try {
          const diary = await withTimeout(
            this.registry.get(id).getDiary({ timeoutMs }),
            timeoutMs,
            `${id} diary fetch`
          );
          return { id, diary };
        } catch (error) {
          tx.mark(id, 'failed', classify(error));
          logger.warn('Diary fetch failed', { runId: tx.runId, participantId: id, error: errorMessage(error) });
          return { id, diary: null };
        }
      })
    );

    const diaries = new Map<string, DiarySnapshot>();
    for (const { id, diary } of results) {
      if (!diary) return null;
      diaries.set(id, diary);
    }
    return diaries;
  }

  private async commit(tx: BookingTransaction, slot: Slot, label: string, deadline: Deadline): Promise<void> {
    const ids = tx.participantIds;

    if (this.options.commitMode === 'concurrent') {
      await Promise.all(ids.map((id) => this.book(tx, id, slot, label, deadline)));
      return;
    }

    for (const id of ids) {
      const booked = await this.book(tx, id, slot, label, deadline);
      if (!booked) break;
    }
  }

  /** One booking call; records the outcome and resolves true only when booked. */
  private async book(
    tx: BookingTransaction,
    participantId: string,
    slot: Slot,
    label: string,
    deadline: Deadline
  ): Promise<boolean> {
    const timeoutMs = deadline.budget(this.options.bookingTimeoutMs);
    if (timeoutMs === 0) {
      tx.mark(participantId, 'not_attempted', 'Timeout');
      return false;
    }

    let reply: BookingReply;
    try {
      reply = await withTimeout(
        this.registry.get(participantId).bookAppointment(
          { date: slot.date, timeRange: slot.timeRange, label, runId: tx.runId },
          { timeoutMs }
        ),
        timeoutMs,
        `${participantId} booking`
      );
    } catch (error) {
      const failure = classify(error);
      tx.mark(participantId, 'failed', failure);
      logger.warn('Booking call failed', { runId: tx.runId, participantId, failure, error: errorMessage(error) });
      return false;
    }

    switch (reply.status) {
      case 'booked':
        tx.mark(participantId, 'committed');
        logger.info('Participant booked', { runId: tx.runId, participantId });
        return true;
      case 'conflict':
        tx.mark(participantId, 'failed', 'Conflict', reply.conflict);
        logger.warn('Participant reported conflict', {
          runId: tx.runId,
          participantId,
          conflict: reply.conflict?.label,
        });
        return false;
      default:
        tx.mark(participantId, 'failed', 'Error');
        logger.warn('Participant reported booking error', { runId: tx.runId, participantId, error: reply.error });
        return false;
    }
  }

  /**
   * Cancels this run's booking: one attempt and at most one retry, each
   * bounded by the compensation timeout. This runs even after the run
   * deadline has passed.
   */
  private async compensate(tx: BookingTransaction, participantId: string, slot: Slot): Promise<void> {
    const client = this.registry.get(participantId);
    const cancel = client.cancelAppointment?.bind(client);
    const timeoutMs = this.options.compensationTimeoutMs;

    if (!cancel) {
      tx.markCompensationFailed(participantId, 'cancellation unsupported');
      logger.error('Compensation unsupported, booking left in place', { runId: tx.runId, participantId });
      return;
    }

    let lastError = 'unknown error';
    for (let attempt = 1; attempt <= COMPENSATION_ATTEMPTS; attempt++) {
      try {
        const reply = await withTimeout(
          cancel({ date: slot.date, timeRange: slot.timeRange, runId: tx.runId }, { timeoutMs }),
          timeoutMs,
          `${participantId} cancellation`
        );

        if (reply === 'cancelled' || reply === 'not_found') {
          tx.mark(participantId, 'rolled_back');
          logger.info('Booking rolled back', { runId: tx.runId, participantId, reply, attempt });
          return;
        }
        if (reply === 'unsupported') {
          lastError = 'cancellation unsupported';
          break;
        }
        lastError = 'participant reported an error';
      } catch (error) {
        lastError = errorMessage(error);
      }
      logger.warn('Compensation attempt failed', { runId: tx.runId, participantId, attempt, error: lastError });
    }

    tx.markCompensationFailed(participantId, lastError);
    logger.error('Compensation failed, manual reconciliation required', {
      runId: tx.runId,
      participantId,
      date: slot.date,
      time: formatRange(slot.timeRange),
      error: lastError,
    });
  }
}
