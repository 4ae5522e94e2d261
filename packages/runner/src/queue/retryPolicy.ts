import type { ErrorKind } from '../errors/taxonomy.js';
import { TERMINAL_STATUS_BY_KIND } from './stateMachine.js';
import type { FailureStatus } from './types.js';

export interface RetryOptions {
  /** Retries allowed after the first attempt for transient failures. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added at jitter = 1. 0 disables jitter. */
  jitterRatio: number;
}

export const DEFAULT_RETRY_OPTIONS: Readonly<RetryOptions> = {
  maxRetries: 2,
  baseDelayMs: 2_000,
  maxDelayMs: 10_000,
  jitterRatio: 0,
};

export type RetryVerdict =
  | { action: 'retry'; delayMs: number }
  | { action: 'terminate'; status: FailureStatus };

/** Capped exponential backoff for the retry that follows attempt `attemptCount`. */
export function backoffDelay(attemptCount: number, options: RetryOptions, jitter = 0): number {
  const exponent = Math.max(attemptCount - 1, 0);
  const base = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** exponent);
  const clampedJitter = Math.min(Math.max(jitter, 0), 1);
  return Math.round(base * (1 + options.jitterRatio * clampedJitter));
}

/**
 * Decide what follows a failed attempt. Pure: the same kind, attempt count,
 * options and jitter always produce the same verdict.
 *
 * @param attemptCount the attempt that just failed (1 for the first).
 * @param jitter caller-supplied value in [0, 1).
 */
export function decide(
  kind: ErrorKind,
  attemptCount: number,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
  jitter = 0,
): RetryVerdict {
  if (kind === 'TransientError' && attemptCount <= options.maxRetries) {
    return { action: 'retry', delayMs: backoffDelay(attemptCount, options, jitter) };
  }
  return { action: 'terminate', status: TERMINAL_STATUS_BY_KIND[kind] };
}

export class RetryPolicy {
  readonly options: Readonly<RetryOptions>;

  constructor(options: Partial<RetryOptions> = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
  }

  /** Highest attemptCount an item can legitimately reach. */
  get maxAttempts(): number {
    return this.options.maxRetries + 1;
  }

  decide(kind: ErrorKind, attemptCount: number, jitter = 0): RetryVerdict {
    return decide(kind, attemptCount, this.options, jitter);
  }
}
