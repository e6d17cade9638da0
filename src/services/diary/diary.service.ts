import { Appointment, AvailabilityResult, CancellationStatus, DiarySnapshot, TimeRange, UpsertResult } from '../../types/diary';
import { NotFoundError } from '../../utils/errors';
import { isFree } from '../availability/availability.engine';
import { DiaryStore } from './diary.store';

/**
 * The diaries this process hosts, keyed by participant id. Callers never see
 * a store's internal mapping, only snapshots and operation results.
 */
export class DiaryService {
  private stores = new Map<string, DiaryStore>();

  constructor(stores: DiaryStore[] = []) {
    for (const store of stores) {
      this.register(store);
    }
  }

  register(store: DiaryStore): void {
    this.stores.set(store.participantId, store);
  }

  has(participantId: string): boolean {
    return this.stores.has(participantId);
  }

  participantIds(): string[] {
    return [...this.stores.keys()];
  }

  describe(participantId: string): { participantId: string; displayName: string; dayBounds: TimeRange; dates: string[] } {
    const store = this.require(participantId);
    return {
      participantId,
      displayName: store.displayName,
      dayBounds: store.dayBounds,
      dates: store.dates(),
    };
  }

  getDiary(participantId: string): DiarySnapshot {
    return this.require(participantId).snapshot();
  }

  checkAvailability(participantId: string, date: string, range: TimeRange): AvailabilityResult {
    return isFree(this.require(participantId).snapshot(), date, range);
  }

  upsertAppointment(participantId: string, date: string, appointment: Appointment): UpsertResult {
    return this.require(participantId).upsertAppointment(date, appointment);
  }

  cancelAppointment(participantId: string, date: string, range: TimeRange, runId?: string): CancellationStatus {
    return this.require(participantId).cancelAppointment(date, range, runId);
  }

  reset(participantId: string): DiarySnapshot {
    return this.require(participantId).reset();
  }

  private require(participantId: string): DiaryStore {
    const store = this.stores.get(participantId);
    if (!store) {
      throw new NotFoundError(`Unknown participant: ${participantId}`);
    }
    return store;
  }
}
