import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { buildParticipants } from './config/participants';
import { createApp } from './app';
import { BookingCoordinator } from './services/coordinator/booking.coordinator';
import { RankingStrategyFactory } from './services/slots/strategies/strategy.factory';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

function start() {
  try {
    const { diaries, registry } = buildParticipants(env);

    const strategy = RankingStrategyFactory.create(env.RANKING_STRATEGY, {
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      model: env.RANKING_MODEL,
    });

    const coordinator = new BookingCoordinator(registry, strategy, {
      granularityMinutes: env.SLOT_GRANULARITY_MINUTES,
      commitMode: env.COMMIT_MODE,
      timezone: env.TIMEZONE,
      healthTimeoutMs: env.HEALTH_TIMEOUT_MS,
      diaryFetchTimeoutMs: env.DIARY_FETCH_TIMEOUT_MS,
      bookingTimeoutMs: env.BOOKING_TIMEOUT_MS,
      compensationTimeoutMs: env.COMPENSATION_TIMEOUT_MS,
      rankingTimeoutMs: env.RANKING_TIMEOUT_MS,
      runTimeoutMs: env.RUN_TIMEOUT_MS,
    });

    if (!env.API_KEYS.trim()) {
      logger.warn('API_KEYS is empty, every coordinator request will be rejected');
    }

    const app = createApp({
      diaries,
      registry,
      coordinator,
      apiKeys: env.API_KEYS,
      beforeErrorHandler: env.SENTRY_DSN ? (instance) => Sentry.setupExpressErrorHandler(instance) : undefined,
    });

    app.listen(parseInt(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, {
        env: env.NODE_ENV,
        strategy: strategy.name,
        commitMode: env.COMMIT_MODE,
      });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

start();
