import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { cancelRequestSchema, slotRequestSchema } from '../schemas/diary.schema';
import { DiaryService } from '../services/diary/diary.service';
import { ValidationError } from '../utils/errors';

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

/**
 * Endpoints of the diaries hosted by this process, mounted at
 * `/participants/:participantId`. Handlers are synchronous, so thrown
 * errors reach the error handler directly.
 */
export function createParticipantRoutes(diaries: DiaryService): Router {
  const router = Router({ mergeParams: true });

  const participantIdOf = (req: Request): string => String(req.params.participantId);

  router.get('/', (req: Request, res: Response) => {
    res.json({ ...diaries.describe(participantIdOf(req)), status: 'active' });
  });

  router.get('/health', (req: Request, res: Response) => {
    const participantId = participantIdOf(req);
    diaries.describe(participantId);
    res.json({ status: 'ok', participantId, timestamp: new Date().toISOString() });
  });

  router.get('/diary', (req: Request, res: Response) => {
    res.json(diaries.getDiary(participantIdOf(req)));
  });

  router.post('/check-availability', (req: Request, res: Response) => {
    const query = parseBody(slotRequestSchema, req.body);
    const result = diaries.checkAvailability(participantIdOf(req), query.date, { start: query.start, end: query.end });

    res.json({
      free: result.free,
      ...(result.conflictingAppointment ? { conflict: result.conflictingAppointment } : {}),
      ...(result.reason ? { reason: result.reason } : {}),
    });
  });

  router.post('/book-appointment', (req: Request, res: Response) => {
    const query = parseBody(slotRequestSchema, req.body);
    const result = diaries.upsertAppointment(participantIdOf(req), query.date, {
      timeRange: { start: query.start, end: query.end },
      label: query.label,
      kind: 'booked',
      ...(query.runId ? { runId: query.runId } : {}),
    });

    if (result.status === 'conflict') {
      res.status(409).json({ status: 'conflict', conflict: result.conflict });
      return;
    }
    res.json({ status: 'booked', appointment: result.appointment });
  });

  router.post('/cancel-appointment', (req: Request, res: Response) => {
    const query = parseBody(cancelRequestSchema, req.body);
    const status = diaries.cancelAppointment(
      participantIdOf(req),
      query.date,
      { start: query.start, end: query.end },
      query.runId
    );
    res.json({ status });
  });

  router.post('/reset-diary', (req: Request, res: Response) => {
    res.json(diaries.reset(participantIdOf(req)));
  });

  return router;
}
