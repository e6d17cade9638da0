import { v4 as uuidv4 } from 'uuid';
import {
  BookingFailure,
  BookingStatus,
  CandidateWindow,
  CoordinatorState,
  ParticipantOutcome,
  RunReason,
  RunStatus,
  ScheduleMatchResult,
  Slot,
} from '../../types/coordinator';
import { Appointment } from '../../types/diary';
import { logger } from '../../utils/logger';

function toWire(window: CandidateWindow): { date: string; start: string; end: string } {
  return { date: window.date, start: window.timeRange.start, end: window.timeRange.end };
}

/** In-memory record of one coordination run. Discarded when the run returns. */
export class BookingTransaction {
  readonly runId = uuidv4();
  private outcomes = new Map<string, ParticipantOutcome>();
  private states: CoordinatorState[] = ['Init'];
  private candidates: CandidateWindow[] = [];
  private slot?: Slot;

  constructor(readonly participantIds: string[]) {
    for (const id of participantIds) {
      this.outcomes.set(id, { freeSlots: 0, bookingStatus: 'pending' });
    }
  }

  get state(): CoordinatorState {
    return this.states[this.states.length - 1];
  }

  transition(next: CoordinatorState, meta: Record<string, unknown> = {}): void {
    logger.debug('Coordinator state change', { runId: this.runId, from: this.state, to: next, ...meta });
    this.states.push(next);
  }

  setCandidates(candidates: CandidateWindow[]): void {
    this.candidates = candidates;
  }

  selectSlot(slot: Slot): void {
    this.slot = slot;
  }

  setFreeSlots(participantId: string, count: number): void {
    this.outcome(participantId).freeSlots = count;
  }

  mark(participantId: string, bookingStatus: BookingStatus, failure?: BookingFailure, conflict?: Appointment): void {
    const outcome = this.outcome(participantId);
    outcome.bookingStatus = bookingStatus;
    if (failure) outcome.failure = failure;
    if (conflict) outcome.conflict = conflict;
  }

  markCompensationFailed(participantId: string, error: string): void {
    const outcome = this.outcome(participantId);
    outcome.bookingStatus = 'compensation_failed';
    outcome.compensationError = error;
  }

  outcomeOf(participantId: string): Readonly<ParticipantOutcome> {
    return this.outcome(participantId);
  }

  withStatus(status: BookingStatus): string[] {
    return this.participantIds.filter((id) => this.outcome(id).bookingStatus === status);
  }

  /** Participants still `pending` once the run is over were never asked to book. */
  settlePending(): void {
    for (const id of this.withStatus('pending')) {
      this.outcome(id).bookingStatus = 'not_attempted';
    }
  }

  firstFailure(): BookingFailure | undefined {
    for (const id of this.participantIds) {
      const failure = this.outcome(id).failure;
      if (failure) return failure;
    }
    return undefined;
  }

  finish(status: RunStatus, reason?: RunReason): ScheduleMatchResult {
    this.settlePending();
    this.transition(status === 'committed' ? 'Committed' : status === 'partially_failed' ? 'PartiallyFailed' : 'Aborted', {
      reason,
    });
    this.transition('Done');

    const perParticipant: Record<string, ParticipantOutcome> = {};
    for (const id of this.participantIds) {
      perParticipant[id] = { ...this.outcome(id) };
    }

    return {
      runId: this.runId,
      status,
      ...(reason ? { reason } : {}),
      ...(this.slot ? { selectedSlot: toWire(this.slot) } : {}),
      candidatesFound: this.candidates.length,
      candidates: this.candidates.map(toWire),
      perParticipant,
      transitions: [...this.states],
    };
  }

  private outcome(participantId: string): ParticipantOutcome {
    const outcome = this.outcomes.get(participantId);
    if (!outcome) {
      throw new Error(`Participant ${participantId} is not part of run ${this.runId}`);
    }
    return outcome;
  }
}
