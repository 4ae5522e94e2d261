import { errorMessage } from '../errors/classify.js';
import { getLogger } from '../monitoring/logger.js';
import type { SessionManager } from './SessionManager.js';

const logger = getLogger({ service: 'keep-alive' });

export interface KeepAliveOptions<H> {
  sessions: SessionManager<H>;
  intervalMs: number;
}

/**
 * Periodically touches the live portal session so it does not idle out
 * between work items. Does nothing unless a live session exists.
 */
export class KeepAliveService<H> {
  private readonly sessions: SessionManager<H>;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private tickInFlight = false;

  constructor(opts: KeepAliveOptions<H>) {
    this.sessions = opts.sessions;
    this.intervalMs = opts.intervalMs;
  }

  start(): void {
    if (this.timer || this.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        logger.warn('Keep-alive tick failed', { error: errorMessage(err) });
      });
    }, this.intervalMs);
    this.timer.unref();
    logger.info('Keep-alive started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** One keep-alive round. Returns false when skipped. */
  async tick(): Promise<boolean> {
    if (this.tickInFlight || this.sessions.state !== 'live') {
      return false;
    }
    this.tickInFlight = true;
    try {
      // The session may have been invalidated while waiting for the lock.
      const ran = await this.sessions.withLiveSession(async (handle) => {
        if (!(await this.sessions.validate(handle))) {
          this.sessions.invalidate(handle);
          logger.warn('Keep-alive found the session dead, invalidated');
          return;
        }
        try {
          await this.sessions.touch(handle);
          logger.debug('Session kept alive');
        } catch (err) {
          this.sessions.invalidate(handle);
          logger.warn('Keep-alive touch failed, session invalidated', { error: errorMessage(err) });
        }
      });
      if (!ran) {
        logger.debug('Keep-alive skipped, session no longer live');
      }
      return ran;
    } finally {
      this.tickInFlight = false;
    }
  }
}
