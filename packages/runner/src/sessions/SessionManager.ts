/**
 * Session Manager
 *
 * Owns the single shared automation handle. Callers borrow it through
 * acquire()/release(); the internal mutex guarantees at most one borrower at
 * a time, and the handle is validated (and replaced if dead) on every acquire.
 */

import { errorMessage } from '../errors/classify.js';
import { TransientError, UnknownError } from '../errors/taxonomy.js';
import { getLogger } from '../monitoring/logger.js';
import { AsyncMutex } from './asyncMutex.js';
import type { SessionFactory, SessionState } from './types.js';

const logger = getLogger({ service: 'session-manager' });

// ── Types ──────────────────────────────────────────────────────────────────

export interface SessionManagerConfig<H> {
  factory: SessionFactory<H>;
  /** Extra create() attempts within a single acquire (default 2). */
  createRetries?: number;
  /** Consecutive failed acquires after which creation errors become UnknownError (default 3). */
  maxCreateFailures?: number;
}

// ── Implementation ─────────────────────────────────────────────────────────

export class SessionManager<H> {
  private readonly factory: SessionFactory<H>;
  private readonly createRetries: number;
  private readonly maxCreateFailures: number;
  private readonly mutex = new AsyncMutex();

  private handle: H | null = null;
  private invalidated = false;
  private leased = false;
  private consecutiveCreateFailures = 0;

  constructor(config: SessionManagerConfig<H>) {
    this.factory = config.factory;
    this.createRetries = config.createRetries ?? 2;
    this.maxCreateFailures = config.maxCreateFailures ?? 3;
  }

  get state(): SessionState {
    if (this.handle === null) return 'empty';
    return this.invalidated ? 'invalidated' : 'live';
  }

  /** True while a caller holds the handle. */
  get busy(): boolean {
    return this.leased;
  }

  /**
   * Wait for exclusive use of the handle and return a valid one, creating or
   * replacing it as needed. The caller must release() it.
   *
   * @throws TransientError when a handle could not be created
   * @throws UnknownError once creation has failed on maxCreateFailures consecutive acquires
   */
  async acquire(): Promise<H> {
    await this.mutex.lock();
    try {
      const handle = await this.ensureHandle();
      this.leased = true;
      return handle;
    } catch (err) {
      this.mutex.unlock();
      throw err;
    }
  }

  release(handle: H): void {
    if (!this.leased) {
      logger.warn('release() called without an active lease');
      return;
    }
    if (handle !== this.handle && this.handle !== null) {
      logger.warn('release() called with a handle that is no longer current');
    }
    this.leased = false;
    this.mutex.unlock();
  }

  async validate(handle: H): Promise<boolean> {
    try {
      return await this.factory.validate(handle);
    } catch (err) {
      logger.warn('Session validation threw', { error: errorMessage(err) });
      return false;
    }
  }

  /** Mark the handle dead; the next acquire() replaces it. */
  invalidate(handle: H): void {
    if (handle !== this.handle) return;
    if (!this.invalidated) {
      logger.info('Session invalidated');
    }
    this.invalidated = true;
  }

  /** Keep-alive hook; a no-op when the factory has no touch(). */
  async touch(handle: H): Promise<void> {
    if (this.factory.touch) {
      await this.factory.touch(handle);
    }
  }

  async withSession<T>(fn: (handle: H) => Promise<T>): Promise<T> {
    const handle = await this.acquire();
    try {
      return await fn(handle);
    } finally {
      this.release(handle);
    }
  }

  /**
   * Run `fn` with the current handle only if it is still live once the lock
   * is held. Never creates a handle. Returns false when skipped.
   */
  async withLiveSession(fn: (handle: H) => Promise<void>): Promise<boolean> {
    await this.mutex.lock();
    try {
      const handle = this.handle;
      if (handle === null || this.invalidated) {
        return false;
      }
      this.leased = true;
      try {
        await fn(handle);
      } finally {
        this.leased = false;
      }
      return true;
    } finally {
      this.mutex.unlock();
    }
  }

  /** Destroy the live handle once the current borrower (if any) releases it. */
  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.discard();
    });
  }

  // ── Internals ────────────────────────────────────────────────────────

  private async ensureHandle(): Promise<H> {
    if (this.handle !== null) {
      if (!this.invalidated && (await this.validate(this.handle))) {
        return this.handle;
      }
      logger.info('Replacing session', { reason: this.invalidated ? 'invalidated' : 'validation failed' });
      await this.discard();
    }

    let lastError: unknown = null;
    for (let attempt = 0; attempt <= this.createRetries; attempt++) {
      try {
        const handle = await this.factory.create();
        this.handle = handle;
        this.invalidated = false;
        this.consecutiveCreateFailures = 0;
        logger.info('Session created', { attempt: attempt + 1 });
        return handle;
      } catch (err) {
        lastError = err;
        logger.warn('Session creation failed', { attempt: attempt + 1, error: errorMessage(err) });
      }
    }

    this.consecutiveCreateFailures += 1;
    const message = `Could not create portal session: ${errorMessage(lastError)}`;
    if (this.consecutiveCreateFailures >= this.maxCreateFailures) {
      throw new UnknownError(
        `${message} (failed ${this.consecutiveCreateFailures} times in a row)`,
        { cause: lastError },
      );
    }
    throw new TransientError(message, { sessionInvalid: true, cause: lastError });
  }

  private async discard(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.invalidated = false;
    if (handle === null) return;
    try {
      await this.factory.destroy(handle);
    } catch (err) {
      logger.warn('Failed to destroy session', { error: errorMessage(err) });
    }
  }
}
