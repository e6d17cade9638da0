import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { apiKeyAuth } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { createCoordinatorRoutes } from './routes/coordinator.routes';
import { createParticipantRoutes } from './routes/participant.routes';
import { BookingCoordinator } from './services/coordinator/booking.coordinator';
import { DiaryService } from './services/diary/diary.service';
import { ParticipantRegistry } from './services/participants/participant.registry';

export interface AppDependencies {
  diaries: DiaryService;
  registry: ParticipantRegistry;
  coordinator: BookingCoordinator;
  apiKeys: string;
  /** Installs extra error middleware (Sentry) ahead of the JSON error handler. */
  beforeErrorHandler?: (app: express.Express) => void;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Routes
  app.use('/participants/:participantId', createParticipantRoutes(deps.diaries));
  app.use('/api/coordinator', apiKeyAuth(deps.apiKeys), createCoordinatorRoutes(deps.coordinator, deps.registry));

  // Health check (no auth)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handler
  deps.beforeErrorHandler?.(app);
  app.use(errorHandler);

  return app;
}
