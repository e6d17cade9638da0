import { Appointment, AvailabilityResult, DiarySnapshot, TimeRange } from './diary';

export interface SlotQuery {
  date: string;
  timeRange: TimeRange;
  label: string;
  /** Identifies the booking so a repeat from the same run is idempotent and only that run can cancel it. */
  runId?: string;
}

export interface CancelQuery {
  date: string;
  timeRange: TimeRange;
  runId?: string;
}

export type BookingReply =
  | { status: 'booked'; appointment?: Appointment }
  | { status: 'conflict'; conflict?: Appointment }
  | { status: 'error'; error?: string };

export type CancellationReply = 'cancelled' | 'not_found' | 'error' | 'unsupported';

export interface CallOptions {
  timeoutMs?: number;
}

/**
 * How the coordinator talks to one participant. Transport failures reject
 * with a ParticipantError; protocol-level answers resolve.
 */
export interface ParticipantClient {
  readonly participantId: string;
  readonly transport: 'http' | 'local';
  health(options?: CallOptions): Promise<boolean>;
  getDiary(options?: CallOptions): Promise<DiarySnapshot>;
  checkAvailability(query: SlotQuery, options?: CallOptions): Promise<AvailabilityResult>;
  bookAppointment(query: SlotQuery, options?: CallOptions): Promise<BookingReply>;
  /** Optional: participants without it cannot be rolled back. */
  cancelAppointment?(query: CancelQuery, options?: CallOptions): Promise<CancellationReply>;
  resetDiary(options?: CallOptions): Promise<DiarySnapshot>;
}
