import { describe, expect, test } from 'vitest';
import { parseEnv } from '../../../src/config/env.js';

describe('parseEnv', () => {
  test('applies defaults to an empty environment', () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORTAL_BASE_URL: 'https://portal.example.com',
      BROWSER_HEADLESS: true,
      SESSION_CREATE_RETRIES: 2,
      SESSION_MAX_CREATE_FAILURES: 3,
      TASK_TIMEOUT_MS: 180_000,
      RETRY_MAX: 2,
      RETRY_BASE_DELAY_MS: 2_000,
      RETRY_MAX_DELAY_MS: 10_000,
      RETRY_JITTER_RATIO: 0,
      WORKER_MAX_CONCURRENT: 1,
      STALE_CLAIM_SECONDS: 900,
      API_PORT: 3100,
    });
    expect(env.DATABASE_URL).toBeUndefined();
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  test('coerces numbers and flags from strings', () => {
    const env = parseEnv({ RETRY_MAX: '4', BROWSER_HEADLESS: 'false', KEEP_ALIVE_MINUTES: '0', API_PORT: '8080' });

    expect(env.RETRY_MAX).toBe(4);
    expect(env.BROWSER_HEADLESS).toBe(false);
    expect(env.KEEP_ALIVE_MINUTES).toBe(0);
    expect(env.API_PORT).toBe(8080);
  });

  test('rejects out-of-range values', () => {
    expect(() => parseEnv({ RETRY_JITTER_RATIO: '2' })).toThrow();
    expect(() => parseEnv({ DATABASE_URL: 'not a url' })).toThrow();
    expect(() => parseEnv({ BROWSER_HEADLESS: 'maybe' })).toThrow();
  });
});
