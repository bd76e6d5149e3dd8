/**
 * Configuration for the care schedule functions.
 * Reads from environment variables (process.env)
 *
 * Required environment variables:
 * - OPENAI_API_KEY: For extracting checklist/plan items from note text
 * - REDIS_URL: Due cache connection string
 *
 * Optional:
 * - OPENAI_MODEL: Chat model used for extraction (default gpt-4o-mini)
 * - SCHEDULE_STATES_COLLECTION / ACTIONABLE_STEPS_COLLECTION: Firestore collection overrides
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 * - SENTRY_DSN: Enables error reporting to Sentry
 *
 * For production, set secrets via Firebase Functions secrets:
 *   firebase functions:secrets:set OPENAI_API_KEY
 */

export const openAIConfig = {
  apiKey: process.env.OPENAI_API_KEY || '',
  model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
};

export const redisConfig = {
  url: process.env.REDIS_URL || 'redis://localhost:6379',
};

export const schedulingConfig = {
  scheduleStatesCollection: process.env.SCHEDULE_STATES_COLLECTION || 'scheduleStates',
  actionableStepsCollection: process.env.ACTIONABLE_STEPS_COLLECTION || 'actionableSteps',
  // Due-cache entries always live for one day
  dueCacheTtlSeconds: 86_400,
};

export const corsConfig = {
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  isDevelopment: process.env.NODE_ENV !== 'production',
};

export const sentryConfig = {
  dsn: process.env.SENTRY_DSN || '',
  environment: process.env.NODE_ENV || 'development',
  release: process.env.FUNCTIONS_VERSION || 'unknown',
};
