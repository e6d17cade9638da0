import { z } from 'zod';
import {
  availabilityResponseSchema,
  bookingResponseSchema,
  cancellationResponseSchema,
  diarySnapshotSchema,
  healthResponseSchema,
} from '../../schemas/diary.schema';
import { AvailabilityResult, DiarySnapshot } from '../../types/diary';
import {
  BookingReply,
  CallOptions,
  CancelQuery,
  CancellationReply,
  ParticipantClient,
  SlotQuery,
} from '../../types/participant';
import { ParticipantError, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const DEFAULT_TIMEOUT_MS = 10000;
const UNSUPPORTED_STATUSES = new Set([404, 405, 501]);

interface RawResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

function isTimeout(error: Error): boolean {
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/** A participant served by another process, reached over HTTP/JSON. */
export class HttpParticipantClient implements ParticipantClient {
  readonly transport = 'http' as const;
  private baseUrl: string;

  constructor(
    readonly participantId: string,
    baseUrl: string
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  private async send(
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    options: CallOptions = {},
    body?: Record<string, unknown>
  ): Promise<RawResponse> {
    const url = `${this.baseUrl}${path}`;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: { 'Content-Type': 'application/json' },
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const cause = toError(error);
      const kind = isTimeout(cause) ? 'timeout' : 'unreachable';
      logger.warn('Participant request failed', { participantId: this.participantId, operation, kind, error: cause.message });
      throw new ParticipantError(this.participantId, operation, kind, cause);
    }

    let parsedBody: unknown = null;
    try {
      const text = await res.text();
      parsedBody = text ? JSON.parse(text) : null;
    } catch (error) {
      if (res.ok) {
        throw new ParticipantError(this.participantId, operation, 'protocol', toError(error), res.status);
      }
    }

    return { status: res.status, ok: res.ok, body: parsedBody };
  }

  private parse<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: RawResponse): T {
    if (!response.ok) {
      throw new ParticipantError(
        this.participantId,
        operation,
        'rejected',
        new Error(`returned ${response.status}: ${JSON.stringify(response.body)}`),
        response.status
      );
    }

    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new ParticipantError(
        this.participantId,
        operation,
        'protocol',
        new Error(parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ')),
        response.status
      );
    }
    return parsed.data;
  }

  async health(options?: CallOptions): Promise<boolean> {
    const response = await this.send('health', 'GET', '/health', options);
    return response.ok && healthResponseSchema.safeParse(response.body).success;
  }

  async getDiary(options?: CallOptions): Promise<DiarySnapshot> {
    const response = await this.send('getDiary', 'GET', '/diary', options);
    return this.parse('getDiary', diarySnapshotSchema, response);
  }

  async checkAvailability(query: SlotQuery, options?: CallOptions): Promise<AvailabilityResult> {
    const response = await this.send('checkAvailability', 'POST', '/check-availability', options, {
      date: query.date,
      start: query.timeRange.start,
      end: query.timeRange.end,
      label: query.label,
    });
    const result = this.parse('checkAvailability', availabilityResponseSchema, response);
    return { free: result.free, conflictingAppointment: result.conflict, reason: result.reason };
  }

  async bookAppointment(query: SlotQuery, options?: CallOptions): Promise<BookingReply> {
    const response = await this.send('bookAppointment', 'POST', '/book-appointment', options, {
      date: query.date,
      start: query.timeRange.start,
      end: query.timeRange.end,
      label: query.label,
      runId: query.runId,
    });

    // A structured refusal from the participant is an answer, not a transport failure
    if (response.status === 409) {
      const conflict = bookingResponseSchema.safeParse(response.body);
      return { status: 'conflict', conflict: conflict.success ? conflict.data.conflict : undefined };
    }

    const result = this.parse('bookAppointment', bookingResponseSchema, response);
    switch (result.status) {
      case 'booked':
        return { status: 'booked', appointment: result.appointment };
      case 'conflict':
        return { status: 'conflict', conflict: result.conflict };
      default:
        return { status: 'error', error: result.error };
    }
  }

  async cancelAppointment(query: CancelQuery, options?: CallOptions): Promise<CancellationReply> {
    const response = await this.send('cancelAppointment', 'POST', '/cancel-appointment', options, {
      date: query.date,
      start: query.timeRange.start,
      end: query.timeRange.end,
      runId: query.runId,
    });

    if (UNSUPPORTED_STATUSES.has(response.status)) {
      return 'unsupported';
    }

    return this.parse('cancelAppointment', cancellationResponseSchema, response).status;
  }

  async resetDiary(options?: CallOptions): Promise<DiarySnapshot> {
    const response = await this.send('resetDiary', 'POST', '/reset-diary', options, {});
    return this.parse('resetDiary', diarySnapshotSchema, response);
  }
}
