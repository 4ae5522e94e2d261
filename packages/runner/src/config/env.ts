import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  // Persistence
  DATABASE_URL: z.string().url().optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(5),

  // Portal + browser
  PORTAL_BASE_URL: z.string().url().default('https://portal.example.com'),
  PORTAL_USERNAME: z.string().min(1).optional(),
  PORTAL_PASSWORD: z.string().min(1).optional(),
  PORTAL_FORMS_PATH: z.string().min(1).optional(),
  BROWSER_HEADLESS: booleanFlag.default('true'),
  BROWSER_CHANNEL: z.string().min(1).optional(),
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  SESSION_STATE_PATH: z.string().default('.portal-session.json'),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  SESSION_CREATE_RETRIES: z.coerce.number().int().min(0).default(2),
  SESSION_MAX_CREATE_FAILURES: z.coerce.number().int().min(1).default(3),
  KEEP_ALIVE_MINUTES: z.coerce.number().min(0).default(12),

  // Execution + retry
  TASK_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  RETRY_MAX: z.coerce.number().int().min(0).default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10_000),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0),

  // Worker
  WORKER_ID: z.string().min(1).optional(),
  WORKER_MAX_CONCURRENT: z.coerce.number().int().min(1).default(1),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  STALE_CLAIM_SECONDS: z.coerce.number().int().positive().default(900),
  WATCHDOG_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  DRAIN_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  ARTIFACTS_DIR: z.string().default('artifacts'),

  // API
  API_PORT: z.coerce.number().int().positive().default(3100),
  SERVICE_SECRET: z.string().min(1).optional(),
  CORS_ORIGIN: z.string().default('*'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the memoized env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}

/** Parse an arbitrary env-like record without touching the memoized value. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}
