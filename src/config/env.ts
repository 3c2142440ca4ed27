import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // PostgreSQL (subscription data)
  DATABASE_URL: z.string().min(1, 'Database URL is required'),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(5),

  // Telegram Bot API
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'Telegram bot token is required'),
  TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),

  // Marketplace + geocoding
  MARKETPLACE_BASE_URL: z.string().url().default('https://www.facebook.com'),
  GEOCODER_BASE_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  GEOCODER_USER_AGENT: z.string().default('marketplace-watch-worker/1.0'),

  // Worker Configuration
  WORKER_HEALTH_PORT: z.coerce.number().int().positive().default(3001),
  WORKER_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Polling cadence (seconds after cycle completion, randomized in range)
  CYCLE_DELAY_MIN_SEC: z.coerce.number().nonnegative().default(15),
  CYCLE_DELAY_MAX_SEC: z.coerce.number().nonnegative().default(25),
  IDLE_DELAY_MIN_SEC: z.coerce.number().nonnegative().default(180),
  IDLE_DELAY_MAX_SEC: z.coerce.number().nonnegative().default(300),

  // Page waits after navigation
  SEARCH_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  DETAIL_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),

  // Persisted artifacts
  PAIRS_LOG_PATH: z.string().default('pairs_log.txt'),
  STATUS_SNAPSHOT_PATH: z.string().default('monitoring_status.json'),
  DEBUG_DUMP_DIR: z.string().optional(),

  NOTIFY_INITIAL_STATUS: booleanFlag,

  // Node
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(): Env {
  if (_env) return _env;

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    const messages = Object.entries(formatted)
      .map(([key, errors]) => `  ${key}: ${errors?.join(', ')}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  if (result.data.CYCLE_DELAY_MAX_SEC < result.data.CYCLE_DELAY_MIN_SEC) {
    throw new Error('Environment validation failed:\n  CYCLE_DELAY_MAX_SEC: must be >= CYCLE_DELAY_MIN_SEC');
  }
  if (result.data.IDLE_DELAY_MAX_SEC < result.data.IDLE_DELAY_MIN_SEC) {
    throw new Error('Environment validation failed:\n  IDLE_DELAY_MAX_SEC: must be >= IDLE_DELAY_MIN_SEC');
  }

  _env = result.data;
  return _env;
}

export function getEnv(): Env {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnv() first.');
  }
  return _env;
}
