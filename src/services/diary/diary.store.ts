import { DateTime } from 'luxon';
import {
  Appointment,
  CancellationStatus,
  DiarySnapshot,
  DiaryTemplate,
  TimeRange,
  UpsertResult,
} from '../../types/diary';
import { assertPositiveRange, formatRange, overlaps, sameRange, within } from '../../utils/clock';
import { InvalidRangeError, NotFoundError, ValidationError } from '../../utils/errors';
import { findBlockingAppointment } from '../availability/availability.engine';
import { logger } from '../../utils/logger';

function copyAppointment(appointment: Appointment): Appointment {
  return {
    timeRange: { ...appointment.timeRange },
    label: appointment.label,
    kind: appointment.kind,
    ...(appointment.runId ? { runId: appointment.runId } : {}),
  };
}

function byStart(a: Appointment, b: Appointment): number {
  return a.timeRange.start.localeCompare(b.timeRange.start);
}

/**
 * Builds the day-by-day schedule a template describes, starting at `anchorDate`.
 * Each variation replaces whatever it overlaps on the days it applies to.
 */
export function expandTemplate(template: DiaryTemplate, anchorDate: string): Map<string, Appointment[]> {
  const anchor = DateTime.fromISO(anchorDate, { zone: 'utc' });
  if (!anchor.isValid) {
    throw new ValidationError(`Invalid anchor date: ${anchorDate}`);
  }

  const days = new Map<string, Appointment[]>();

  for (let offset = 0; offset < template.days; offset++) {
    const date = anchor.plus({ days: offset }).toISODate();
    if (!date) continue;

    let appointments = template.appointments.map(copyAppointment);
    for (const variation of template.variations) {
      if (offset % variation.everyNthDay !== 0) continue;
      appointments = appointments.filter((a) => !overlaps(a.timeRange, variation.appointment.timeRange));
      appointments.push(copyAppointment(variation.appointment));
    }

    appointments.sort(byStart);
    assertNoOverlap(date, appointments, template.dayBounds);
    days.set(date, appointments);
  }

  return days;
}

function assertNoOverlap(date: string, appointments: Appointment[], dayBounds: TimeRange): void {
  for (let i = 0; i < appointments.length; i++) {
    const current = appointments[i];
    assertPositiveRange(current.timeRange);
    if (!within(current.timeRange, dayBounds)) {
      throw new ValidationError(
        `Template appointment ${formatRange(current.timeRange)} on ${date} is outside ${formatRange(dayBounds)}`
      );
    }
    const next = appointments[i + 1];
    if (next && overlaps(current.timeRange, next.timeRange)) {
      throw new ValidationError(
        `Template appointments overlap on ${date}: ${formatRange(current.timeRange)} and ${formatRange(next.timeRange)}`
      );
    }
  }
}

/**
 * One participant's diary. All mutation goes through this class, and each
 * mutating method runs its check and its write in a single synchronous step,
 * so two bookings for the same date can never interleave.
 */
export class DiaryStore {
  private days: Map<string, Appointment[]>;

  constructor(
    readonly participantId: string,
    private readonly template: DiaryTemplate,
    private readonly anchorDate: string
  ) {
    this.days = expandTemplate(template, anchorDate);
  }

  get dayBounds(): TimeRange {
    return { ...this.template.dayBounds };
  }

  get displayName(): string {
    return this.template.displayName;
  }

  dates(): string[] {
    return [...this.days.keys()];
  }

  snapshot(): DiarySnapshot {
    const days: Record<string, Appointment[]> = {};
    for (const [date, appointments] of this.days) {
      days[date] = appointments.map(copyAppointment);
    }

    return {
      participantId: this.participantId,
      displayName: this.template.displayName,
      dayBounds: this.dayBounds,
      days,
    };
  }

  upsertAppointment(date: string, appointment: Appointment): UpsertResult {
    const day = this.requireDay(date);
    const range = appointment.timeRange;

    assertPositiveRange(range);
    if (!within(range, this.template.dayBounds)) {
      throw new InvalidRangeError(
        `Time range ${formatRange(range)} is outside ${formatRange(this.template.dayBounds)}`
      );
    }

    const existing = appointment.runId
      ? day.find((a) => a.kind === 'booked' && a.runId === appointment.runId && sameRange(a.timeRange, range))
      : undefined;
    if (existing) {
      logger.debug('Booking already made by this run', {
        participantId: this.participantId,
        date,
        time: formatRange(range),
        runId: appointment.runId,
      });
      return { status: 'booked', appointment: copyAppointment(existing) };
    }

    const conflict = findBlockingAppointment(day, range);
    if (conflict) {
      logger.info('Appointment rejected', {
        participantId: this.participantId,
        date,
        time: formatRange(range),
        conflict: conflict.label,
      });
      return { status: 'conflict', conflict: copyAppointment(conflict) };
    }

    const stored = copyAppointment(appointment);
    day.push(stored);
    day.sort(byStart);

    logger.info('Appointment stored', {
      participantId: this.participantId,
      date,
      time: formatRange(range),
      kind: stored.kind,
    });
    return { status: 'booked', appointment: copyAppointment(stored) };
  }

  /**
   * Removes the `booked` appointment with exactly this range made under
   * `runId`. Without a runId only bookings that carry none match.
   */
  cancelAppointment(date: string, range: TimeRange, runId?: string): CancellationStatus {
    const day = this.days.get(date);
    if (!day) return 'not_found';

    const index = day.findIndex((a) => a.kind === 'booked' && a.runId === runId && sameRange(a.timeRange, range));
    if (index === -1) return 'not_found';

    day.splice(index, 1);
    logger.info('Appointment cancelled', { participantId: this.participantId, date, time: formatRange(range), runId });
    return 'cancelled';
  }

  reset(): DiarySnapshot {
    this.days = expandTemplate(this.template, this.anchorDate);
    logger.info('Diary reset to template', { participantId: this.participantId, anchorDate: this.anchorDate });
    return this.snapshot();
  }

  private requireDay(date: string): Appointment[] {
    const day = this.days.get(date);
    if (!day) {
      throw new NotFoundError(`Date ${date} is not in ${this.participantId}'s diary range`);
    }
    return day;
  }
}
