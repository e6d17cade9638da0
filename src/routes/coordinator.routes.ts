import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { clockSchema, isoDateSchema } from '../schemas/diary.schema';
import { BookingCoordinator } from '../services/coordinator/booking.coordinator';
import { ParticipantRegistry } from '../services/participants/participant.registry';
import { ValidationError } from '../utils/errors';

const scheduleMatchSchema = z.object({
  participantIds: z.array(z.string().min(1)).min(1),
  durationMinutes: z.number().int().positive(),
  dayWindowStart: clockSchema.default('08:00'),
  dayWindowEnd: clockSchema.default('19:00'),
  searchDays: z.number().int().min(1).max(31).default(10),
  startDate: isoDateSchema.optional(),
  label: z.string().min(1).max(200).optional(),
});

export function createCoordinatorRoutes(coordinator: BookingCoordinator, registry: ParticipantRegistry): Router {
  const router = Router();

  router.post('/schedule-match', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = scheduleMatchSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
      }

      const result = await coordinator.scheduleMatch(parsed.data);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { ready, participants } = await coordinator.checkAll();
      res.status(ready ? 200 : 503).json({
        status: ready ? 'ready' : 'not_ready',
        participants,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/participants', (_req: Request, res: Response) => {
    res.json({
      participants: registry.list().map((client) => ({
        participantId: client.participantId,
        transport: client.transport,
        supportsCancellation: typeof client.cancelAppointment === 'function',
      })),
    });
  });

  router.post('/reset-diaries', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const results = await coordinator.resetAll();
      const ok = Object.values(results).every((status) => status === 'reset');
      res.status(ok ? 200 : 502).json({ success: ok, participants: results });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
