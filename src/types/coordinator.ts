import { Appointment, TimeRange } from './diary';

export interface CandidateWindow {
  date: string;
  timeRange: TimeRange;
}

/** A candidate window every participant in the run reported free. */
export type Slot = CandidateWindow;

export type CoordinatorState =
  | 'Init'
  | 'HealthChecking'
  | 'FetchingDiaries'
  | 'ComputingAvailability'
  | 'Intersecting'
  | 'Selecting'
  | 'Committing'
  | 'Committed'
  | 'PartiallyFailed'
  | 'Aborted'
  | 'Done';

export type RunStatus = 'committed' | 'partially_failed' | 'aborted';

export type RunReason =
  | 'ParticipantUnavailable'
  | 'DiaryFetchFailed'
  | 'NoCommonSlot'
  | 'Conflict'
  | 'Unreachable'
  | 'BookingFailed'
  | 'Timeout';

export type BookingStatus =
  | 'pending'
  | 'committed'
  | 'failed'
  | 'rolled_back'
  | 'compensation_failed'
  | 'not_attempted';

export type BookingFailure = 'Conflict' | 'Unreachable' | 'Timeout' | 'Error';

export interface ParticipantOutcome {
  freeSlots: number;
  bookingStatus: BookingStatus;
  failure?: BookingFailure;
  conflict?: Appointment;
  /** Set when a rollback was attempted and did not succeed. */
  compensationError?: string;
}

export interface ScheduleMatchRequest {
  participantIds: string[];
  durationMinutes: number;
  dayWindowStart: string;
  dayWindowEnd: string;
  searchDays: number;
  startDate?: string;
  label?: string;
}

export interface ScheduleMatchResult {
  runId: string;
  status: RunStatus;
  reason?: RunReason;
  selectedSlot?: { date: string; start: string; end: string };
  candidatesFound: number;
  candidates: Array<{ date: string; start: string; end: string }>;
  perParticipant: Record<string, ParticipantOutcome>;
  transitions: CoordinatorState[];
}

export type ParticipantLiveness = 'online' | 'offline';

export interface CoordinatorOptions {
  granularityMinutes: number;
  commitMode: 'concurrent' | 'sequential';
  timezone: string;
  healthTimeoutMs: number;
  diaryFetchTimeoutMs: number;
  bookingTimeoutMs: number;
  compensationTimeoutMs: number;
  rankingTimeoutMs: number;
  runTimeoutMs: number;
}
