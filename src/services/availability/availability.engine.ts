import { Appointment, AppointmentKind, AvailabilityResult, DiarySnapshot, TimeRange } from '../../types/diary';
import { assertPositiveRange, overlaps, within } from '../../utils/clock';

const BLOCKING_KINDS: ReadonlySet<AppointmentKind> = new Set(['fixed', 'booked']);

/**
 * Flexible and leisure appointments are advisory: they can be moved by their
 * owner, so they never make a window unavailable.
 */
export function isBlocking(appointment: Appointment): boolean {
  return BLOCKING_KINDS.has(appointment.kind);
}

/** First blocking appointment overlapping `range`, in diary order. */
export function findBlockingAppointment(
  appointments: readonly Appointment[],
  range: TimeRange
): Appointment | undefined {
  return appointments.find((appointment) => isBlocking(appointment) && overlaps(appointment.timeRange, range));
}

export function isFree(diary: DiarySnapshot, date: string, range: TimeRange): AvailabilityResult {
  assertPositiveRange(range);

  if (!within(range, diary.dayBounds)) {
    return { free: false, reason: 'out_of_bounds' };
  }

  const appointments = diary.days[date];
  if (!appointments) {
    return { free: false, reason: 'unknown_date' };
  }

  const conflict = findBlockingAppointment(appointments, range);
  if (conflict) {
    return { free: false, conflictingAppointment: conflict, reason: 'conflict' };
  }

  return { free: true };
}
