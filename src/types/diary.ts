export type AppointmentKind = 'fixed' | 'flexible' | 'leisure' | 'booked';

/** Half-open `[start, end)` range of zero-padded `HH:MM` clock times within one day. */
export interface TimeRange {
  start: string;
  end: string;
}

export interface Appointment {
  timeRange: TimeRange;
  label: string;
  kind: AppointmentKind;
  /** Coordination run that made a `booked` appointment. */
  runId?: string;
}

export interface DiarySnapshot {
  participantId: string;
  displayName: string;
  dayBounds: TimeRange;
  /** ISO date → appointments ordered by `timeRange.start` */
  days: Record<string, Appointment[]>;
}

export interface DiaryVariation {
  everyNthDay: number;
  appointment: Appointment;
}

export interface DiaryTemplate {
  displayName: string;
  days: number;
  dayBounds: TimeRange;
  appointments: Appointment[];
  variations: DiaryVariation[];
}

export type AvailabilityReason = 'conflict' | 'out_of_bounds' | 'unknown_date';

export interface AvailabilityResult {
  free: boolean;
  conflictingAppointment?: Appointment;
  reason?: AvailabilityReason;
}

export type UpsertResult =
  | { status: 'booked'; appointment: Appointment }
  | { status: 'conflict'; conflict: Appointment };

export type CancellationStatus = 'cancelled' | 'not_found';
