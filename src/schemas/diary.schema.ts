import { z } from 'zod';
import { isClock, isIsoDate, toMinutes } from '../utils/clock';

export const clockSchema = z.string().refine(isClock, { message: 'Expected HH:MM clock time' });

export const isoDateSchema = z.string().refine(isIsoDate, { message: 'Expected YYYY-MM-DD date' });

export const timeRangeSchema = z.object({
  start: clockSchema,
  end: clockSchema,
});

export const appointmentKindSchema = z.enum(['fixed', 'flexible', 'leisure', 'booked']);

export const appointmentSchema = z.object({
  timeRange: timeRangeSchema,
  label: z.string(),
  kind: appointmentKindSchema,
  runId: z.string().optional(),
});

export const diarySnapshotSchema = z.object({
  participantId: z.string(),
  displayName: z.string(),
  dayBounds: timeRangeSchema,
  days: z.record(isoDateSchema, z.array(appointmentSchema)),
});

export const diaryTemplateSchema = z.object({
  displayName: z.string().min(1),
  days: z.number().int().positive(),
  dayBounds: timeRangeSchema.refine((range) => toMinutes(range.start) < toMinutes(range.end), {
    message: 'dayBounds must have a positive duration',
  }),
  appointments: z.array(appointmentSchema),
  variations: z
    .array(
      z.object({
        everyNthDay: z.number().int().positive(),
        appointment: appointmentSchema,
      })
    )
    .default([]),
});

export const diaryTemplatesSchema = z.record(z.string().min(1), diaryTemplateSchema);

// Participant wire contract

export const slotRequestSchema = z.object({
  date: isoDateSchema,
  start: clockSchema,
  end: clockSchema,
  label: z.string().min(1).max(200).default('Shared appointment'),
  runId: z.string().min(1).max(100).optional(),
});

export const cancelRequestSchema = z.object({
  date: isoDateSchema,
  start: clockSchema,
  end: clockSchema,
  runId: z.string().min(1).max(100).optional(),
});

export const availabilityResponseSchema = z.object({
  free: z.boolean(),
  conflict: appointmentSchema.optional(),
  reason: z.enum(['conflict', 'out_of_bounds', 'unknown_date']).optional(),
});

export const bookingResponseSchema = z.object({
  status: z.enum(['booked', 'conflict', 'error']),
  conflict: appointmentSchema.optional(),
  appointment: appointmentSchema.optional(),
  error: z.string().optional(),
});

export const cancellationResponseSchema = z.object({
  status: z.enum(['cancelled', 'not_found', 'error']),
  error: z.string().optional(),
});

export const healthResponseSchema = z.object({
  status: z.string(),
});
