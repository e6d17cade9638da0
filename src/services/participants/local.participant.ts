import { AvailabilityResult, DiarySnapshot } from '../../types/diary';
import { BookingReply, CallOptions, CancelQuery, CancellationReply, ParticipantClient, SlotQuery } from '../../types/participant';
import { ParticipantError, toError } from '../../utils/errors';
import { DiaryService } from '../diary/diary.service';

/** A participant whose diary lives in this process. */
export class LocalParticipantClient implements ParticipantClient {
  readonly transport = 'local' as const;

  constructor(
    readonly participantId: string,
    private readonly diaries: DiaryService
  ) {}

  private call<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return Promise.resolve(fn());
    } catch (error) {
      return Promise.reject(new ParticipantError(this.participantId, operation, 'rejected', toError(error)));
    }
  }

  async health(): Promise<boolean> {
    return this.diaries.has(this.participantId);
  }

  getDiary(_options?: CallOptions): Promise<DiarySnapshot> {
    return this.call('getDiary', () => this.diaries.getDiary(this.participantId));
  }

  checkAvailability(query: SlotQuery): Promise<AvailabilityResult> {
    return this.call('checkAvailability', () =>
      this.diaries.checkAvailability(this.participantId, query.date, query.timeRange)
    );
  }

  bookAppointment(query: SlotQuery): Promise<BookingReply> {
    return this.call('bookAppointment', (): BookingReply => {
      const result = this.diaries.upsertAppointment(this.participantId, query.date, {
        timeRange: { ...query.timeRange },
        label: query.label,
        kind: 'booked',
        ...(query.runId ? { runId: query.runId } : {}),
      });
      return result.status === 'booked'
        ? { status: 'booked', appointment: result.appointment }
        : { status: 'conflict', conflict: result.conflict };
    });
  }

  cancelAppointment(query: CancelQuery): Promise<CancellationReply> {
    return this.call('cancelAppointment', () =>
      this.diaries.cancelAppointment(this.participantId, query.date, query.timeRange, query.runId)
    );
  }

  resetDiary(): Promise<DiarySnapshot> {
    return this.call('resetDiary', () => this.diaries.reset(this.participantId));
  }
}
