import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: optionalString,
  API_KEYS: z.string().default(''),
  SENTRY_DSN: optionalString,
  TIMEZONE: z.string().default('UTC'),
  DIARY_TEMPLATES_PATH: z.string().default('data/diary-templates.json'),
  HOSTED_PARTICIPANTS: optionalString,
  DIARY_ANCHOR_DATE: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'DIARY_ANCHOR_DATE must be YYYY-MM-DD').optional()
  ),
  REMOTE_PARTICIPANTS: z.string().default('{}'),
  SLOT_GRANULARITY_MINUTES: z.coerce.number().int().positive().default(60),
  RANKING_STRATEGY: z.enum(['earliest', 'prefer-afternoon', 'anthropic']).default('earliest'),
  RANKING_MODEL: z.string().default('claude-3-5-haiku-latest'),
  ANTHROPIC_API_KEY: optionalString,
  COMMIT_MODE: z.enum(['concurrent', 'sequential']).default('concurrent'),
  HEALTH_TIMEOUT_MS: milliseconds(2000),
  DIARY_FETCH_TIMEOUT_MS: milliseconds(10000),
  BOOKING_TIMEOUT_MS: milliseconds(10000),
  COMPENSATION_TIMEOUT_MS: milliseconds(5000),
  RANKING_TIMEOUT_MS: milliseconds(15000),
  RUN_TIMEOUT_MS: milliseconds(60000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export type Env = typeof env;
