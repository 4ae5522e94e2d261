import { EventEmitter } from 'eventemitter3';
import { classifyError, errorMessage } from '../errors/classify.js';
import type { TaskError } from '../errors/taxonomy.js';
import { getLogger } from '../monitoring/logger.js';
import { RetryPolicy } from '../queue/retryPolicy.js';
import type { FailureStatus, LastError, OutcomeInput, WorkItem } from '../queue/types.js';
import { StoreError } from '../store/errors.js';
import type { ClaimToken, ReclaimResult, WorkItemStore } from '../store/types.js';
import type { WorkItemExecutor } from './types.js';

const logger = getLogger({ service: 'QueueDispatcher' });

const POLL_INTERVAL_MS = 5_000;
const DRAIN_TIMEOUT_MS = 30_000;
const STALE_CLAIM_MS = 15 * 60_000;
const WATCHDOG_INTERVAL_MS = 60_000;
const MIN_IDLE_WAIT_MS = 100;

export type DispatchReport =
  | { outcome: 'succeeded'; item: WorkItem }
  | { outcome: 'retried'; item: WorkItem; delayMs: number; error: LastError }
  | { outcome: 'failed'; item: WorkItem; status: FailureStatus; error: LastError }
  | { outcome: 'abandoned'; item: WorkItem; reason: string };

export interface DispatcherEvents {
  claimed: (item: WorkItem) => void;
  succeeded: (item: WorkItem) => void;
  retried: (item: WorkItem, delayMs: number, error: LastError) => void;
  failed: (item: WorkItem, status: FailureStatus, error: LastError) => void;
  abandoned: (item: WorkItem, reason: string) => void;
}

export interface QueueDispatcherOptions {
  store: WorkItemStore;
  executor: WorkItemExecutor;
  workerId: string;
  retryPolicy?: RetryPolicy;
  /** In-flight items per worker (default 1). */
  maxConcurrent?: number;
  pollIntervalMs?: number;
  /** IN_PROGRESS claims older than this are reclaimed by the watchdog. */
  staleClaimMs?: number;
  watchdogIntervalMs?: number;
  drainTimeoutMs?: number;
  clock?: () => Date;
  /** Jitter source in [0, 1). */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Claim -> execute -> persist loop over a WorkItemStore.
 *
 * Any number of dispatchers (in one process or many) can share a store; the
 * store's atomic claim guarantees each attempt runs on exactly one of them.
 */
export class QueueDispatcher extends EventEmitter<DispatcherEvents> {
  private readonly store: WorkItemStore;
  private readonly executor: WorkItemExecutor;
  private readonly retryPolicy: RetryPolicy;
  private readonly maxConcurrent: number;
  private readonly pollIntervalMs: number;
  private readonly staleClaimMs: number;
  private readonly watchdogIntervalMs: number;
  private readonly drainTimeoutMs: number;
  private readonly clock: () => Date;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  readonly workerId: string;

  private running = false;
  private pickupInFlight = false;
  private readonly inFlight = new Set<Promise<void>>();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private watchdogTimer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: QueueDispatcherOptions) {
    super();
    this.store = opts.store;
    this.executor = opts.executor;
    this.workerId = opts.workerId;
    this.retryPolicy = opts.retryPolicy ?? new RetryPolicy();
    this.maxConcurrent = opts.maxConcurrent ?? 1;
    this.pollIntervalMs = opts.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.staleClaimMs = opts.staleClaimMs ?? STALE_CLAIM_MS;
    this.watchdogIntervalMs = opts.watchdogIntervalMs ?? WATCHDOG_INTERVAL_MS;
    this.drainTimeoutMs = opts.drainTimeoutMs ?? DRAIN_TIMEOUT_MS;
    this.clock = opts.clock ?? (() => new Date());
    this.random = opts.random ?? Math.random;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  // ── One-shot dispatch ──────────────────────────────────────────────

  /** Claim and fully process one item. Null when nothing is claimable. */
  async dispatchOnce(): Promise<DispatchReport | null> {
    const item = await this.store.claimNext(this.workerId);
    if (!item) return null;
    this.emit('claimed', item);
    return this.process(item);
  }

  /**
   * Dispatch until nothing is claimable and no retry is pending, sleeping
   * until the earliest scheduled retry when needed.
   */
  async runUntilIdle(): Promise<DispatchReport[]> {
    const reports: DispatchReport[] = [];
    for (;;) {
      const report = await this.dispatchOnce();
      if (report) {
        reports.push(report);
        continue;
      }

      const nextAt = await this.store.nextClaimableAt();
      if (!nextAt) return reports;
      const waitMs = nextAt.getTime() - this.clock().getTime();
      await this.sleep(Math.max(waitMs, MIN_IDLE_WAIT_MS));
    }
  }

  // ── Polling loop ───────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    await this.recoverStale();

    this.pollTimer = setInterval(() => {
      this.tryPickup().catch((err) => {
        logger.warn('Poll pickup failed', { error: errorMessage(err) });
      });
    }, this.pollIntervalMs);

    this.watchdogTimer = setInterval(() => {
      this.recoverStale().catch((err) => {
        logger.warn('Watchdog pass failed', { error: errorMessage(err) });
      });
    }, this.watchdogIntervalMs);

    logger.info('QueueDispatcher started', {
      workerId: this.workerId,
      pollIntervalMs: this.pollIntervalMs,
      maxConcurrent: this.maxConcurrent,
    });

    await this.tryPickup();
  }

  /**
   * Stop claiming, wait up to drainTimeoutMs for in-flight items, then hand
   * any claims still held by this worker back to the queue.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.watchdogTimer) {
      clearInterval(this.watchdogTimer);
      this.watchdogTimer = null;
    }

    const drained = await this.waitForDrain(this.drainTimeoutMs);
    if (!drained) {
      logger.warn('Shutdown with items still in flight', { activeItems: this.inFlight.size });
    }
    await this.releaseClaims();
  }

  /**
   * Return this worker's claims to the queue, failing those that have used
   * their last attempt. Safe to call during forced shutdown.
   */
  async releaseClaims(): Promise<ReclaimResult> {
    try {
      const result = await this.store.releaseClaims(this.workerId, this.retryPolicy.maxAttempts);
      if (result.requeued.length > 0 || result.failed.length > 0) {
        logger.info('Released work items back to queue', {
          requeued: result.requeued,
          failed: result.failed,
        });
      }
      return result;
    } catch (err) {
      logger.error('Failed to release claimed work items', { error: errorMessage(err) });
      return { requeued: [], failed: [] };
    }
  }

  /** One watchdog pass over stale IN_PROGRESS claims. */
  async recoverStale(): Promise<ReclaimResult> {
    const olderThan = new Date(this.clock().getTime() - this.staleClaimMs);
    const result = await this.store.reclaimStale(olderThan, this.retryPolicy.maxAttempts);
    if (result.requeued.length > 0 || result.failed.length > 0) {
      logger.warn('Recovered stale claims', {
        requeued: result.requeued,
        failed: result.failed,
        olderThan: olderThan.toISOString(),
      });
    }
    return result;
  }

  private async tryPickup(): Promise<void> {
    if (!this.running || this.inFlight.size >= this.maxConcurrent) return;
    if (this.pickupInFlight) return; // debounce concurrent pickup calls

    this.pickupInFlight = true;
    let item: WorkItem | null;
    try {
      item = await this.store.claimNext(this.workerId);
    } finally {
      this.pickupInFlight = false;
    }
    if (!item) return;

    this.emit('claimed', item);
    logger.info('Picked up work item', {
      workItemId: item.id,
      taskType: item.taskType,
      attempt: item.attemptCount,
      activeItems: this.inFlight.size + 1,
    });

    const claimed = item;
    const task = this.process(claimed)
      .then(() => undefined)
      .catch((err) => {
        logger.error('Work item processing failed', { workItemId: claimed.id, error: errorMessage(err) });
      })
      .finally(() => {
        this.inFlight.delete(task);
        if (this.running && this.inFlight.size < this.maxConcurrent) {
          this.tryPickup().catch((err) => {
            logger.warn('Post-item pickup failed', { error: errorMessage(err) });
          });
        }
      });
    this.inFlight.add(task);

    // Still capacity: look for more without waiting for the next poll
    if (this.inFlight.size < this.maxConcurrent) {
      setTimeout(() => {
        this.tryPickup().catch((err) => {
          logger.warn('Pickup failed', { error: errorMessage(err) });
        });
      }, 0);
    }
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void Promise.allSettled([...this.inFlight]).then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  // ── Processing ─────────────────────────────────────────────────────

  private async process(item: WorkItem): Promise<DispatchReport> {
    let outcome: OutcomeInput;
    try {
      outcome = await this.executor.execute(item);
    } catch (err) {
      return this.handleFailure(item, classifyError(err));
    }

    try {
      await this.store.recordOutcome(item.id, outcome, this.claimOf(item));
    } catch (err) {
      return this.abandon(item, err);
    }

    const updated = await this.store.get(item.id);
    logger.info('Work item succeeded', { workItemId: item.id, attempt: item.attemptCount });
    this.emit('succeeded', updated);
    return { outcome: 'succeeded', item: updated };
  }

  private async handleFailure(item: WorkItem, error: TaskError): Promise<DispatchReport> {
    const lastError: LastError = { kind: error.kind, message: error.message };
    const verdict = this.retryPolicy.decide(error.kind, item.attemptCount, this.random());

    try {
      if (verdict.action === 'retry') {
        const notBefore = new Date(this.clock().getTime() + verdict.delayMs);
        await this.store.recordFailure(item.id, 'PENDING', lastError, this.claimOf(item), { notBefore });
      } else {
        await this.store.recordFailure(item.id, verdict.status, lastError, this.claimOf(item));
      }
    } catch (err) {
      return this.abandon(item, err);
    }

    const updated = await this.store.get(item.id);
    if (verdict.action === 'retry') {
      logger.warn('Work item will be retried', {
        workItemId: item.id,
        attempt: item.attemptCount,
        kind: error.kind,
        delayMs: verdict.delayMs,
        error: error.message,
      });
      this.emit('retried', updated, verdict.delayMs, lastError);
      return { outcome: 'retried', item: updated, delayMs: verdict.delayMs, error: lastError };
    }

    logger.warn('Work item failed', {
      workItemId: item.id,
      attempt: item.attemptCount,
      status: verdict.status,
      kind: error.kind,
      error: error.message,
    });
    this.emit('failed', updated, verdict.status, lastError);
    return { outcome: 'failed', item: updated, status: verdict.status, error: lastError };
  }

  private claimOf(item: WorkItem): ClaimToken {
    return { workerId: this.workerId, attempt: item.attemptCount };
  }

  /**
   * The store refused the write, e.g. because the watchdog or a drain release
   * already took the claim back. The item's current state stands.
   */
  private async abandon(item: WorkItem, err: unknown): Promise<DispatchReport> {
    if (!(err instanceof StoreError)) {
      throw err;
    }
    const reason = err.message;
    logger.error('Result discarded, claim no longer held', { workItemId: item.id, error: reason });
    const current = await this.store.get(item.id).catch((getErr: unknown) => {
      logger.warn('Could not reload abandoned work item', { workItemId: item.id, error: errorMessage(getErr) });
      return item;
    });
    this.emit('abandoned', current, reason);
    return { outcome: 'abandoned', item: current, reason };
  }
}
