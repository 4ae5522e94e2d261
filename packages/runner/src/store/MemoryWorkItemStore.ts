import { randomUUID } from 'node:crypto';
import { failureEvent, transition } from '../queue/stateMachine.js';
import type {
  EnqueueInput,
  FailureStatus,
  LastError,
  Outcome,
  OutcomeInput,
  WorkItem,
} from '../queue/types.js';
import { ClaimLostError, DuplicateError, NotFoundError } from './errors.js';
import {
  DEFAULT_LIST_LIMIT,
  emptyCounts,
  isCurrentClaim,
  releasedClaimMessage,
  staleClaimMessage,
  type ClaimToken,
  type ListFilter,
  type ReclaimResult,
  type RecordFailureOptions,
  type StatusCounts,
  type WorkItemStore,
} from './types.js';

export interface MemoryWorkItemStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

/**
 * In-process WorkItemStore. Each method does its read-modify-write without
 * awaiting, so it is atomic with respect to every other caller in the process.
 * Used for single-shot runs and tests.
 */
export class MemoryWorkItemStore implements WorkItemStore {
  private readonly items = new Map<string, WorkItem>();
  private readonly outcomes = new Map<string, Outcome>();
  private readonly keys = new Map<string, string>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryWorkItemStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async enqueue(input: EnqueueInput): Promise<string> {
    const key = input.idempotencyKey ?? null;
    if (key !== null) {
      const existing = this.keys.get(key);
      if (existing) {
        throw new DuplicateError(key, existing);
      }
    }

    const id = this.generateId();
    const at = this.now();
    this.items.set(id, {
      id,
      taskType: input.taskType,
      payload: Object.freeze(structuredClone(input.payload)),
      idempotencyKey: key,
      status: 'PENDING',
      attemptCount: 0,
      lastError: null,
      notBefore: null,
      claimedBy: null,
      claimedAt: null,
      createdAt: at,
      updatedAt: at,
    });
    if (key !== null) {
      this.keys.set(key, id);
    }
    return id;
  }

  async claimNext(workerId: string): Promise<WorkItem | null> {
    const at = this.now();
    let next: WorkItem | null = null;
    for (const item of this.items.values()) {
      if (item.status !== 'PENDING') continue;
      if (item.notBefore && item.notBefore.getTime() > at.getTime()) continue;
      if (!next || compareFifo(item, next) < 0) {
        next = item;
      }
    }
    if (!next) return null;

    next.status = transition(next.status, 'claim');
    next.attemptCount += 1;
    next.claimedBy = workerId;
    next.claimedAt = at;
    next.notBefore = null;
    next.updatedAt = at;
    return snapshot(next);
  }

  async recordOutcome(id: string, outcome: OutcomeInput, claim: ClaimToken): Promise<void> {
    const item = this.requireClaimed(id, claim);
    const next = transition(item.status, 'succeed');
    const at = this.now();

    this.outcomes.set(id, {
      workItemId: id,
      result: structuredClone(outcome.result),
      lines: outcome.lines.map((line, index) => ({
        position: index + 1,
        category: line.category,
        data: structuredClone(line.data),
      })),
      createdAt: at,
    });
    item.status = next;
    item.lastError = null;
    item.claimedBy = null;
    item.claimedAt = null;
    item.updatedAt = at;
  }

  async recordFailure(
    id: string,
    status: FailureStatus | 'PENDING',
    error: LastError,
    claim: ClaimToken,
    options: RecordFailureOptions = {},
  ): Promise<void> {
    const item = this.requireClaimed(id, claim);
    item.status = transition(item.status, failureEvent(status));
    item.lastError = { kind: error.kind, message: error.message };
    item.notBefore = status === 'PENDING' ? options.notBefore ?? null : null;
    item.claimedBy = null;
    item.claimedAt = null;
    item.updatedAt = this.now();
  }

  async get(id: string): Promise<WorkItem> {
    return snapshot(this.require(id));
  }

  async getOutcome(id: string): Promise<Outcome | null> {
    const outcome = this.outcomes.get(id);
    return outcome ? structuredClone(outcome) : null;
  }

  async list(filter: ListFilter = {}): Promise<WorkItem[]> {
    const statuses = filter.status && filter.status.length > 0 ? new Set(filter.status) : null;
    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? DEFAULT_LIST_LIMIT;

    return [...this.items.values()]
      .filter((item) => !statuses || statuses.has(item.status))
      .filter((item) => !filter.taskType || item.taskType === filter.taskType)
      .sort((a, b) => compareFifo(b, a))
      .slice(offset, offset + limit)
      .map(snapshot);
  }

  async nextClaimableAt(): Promise<Date | null> {
    const at = this.now();
    let earliest: Date | null = null;
    for (const item of this.items.values()) {
      if (item.status !== 'PENDING') continue;
      const visibleAt = item.notBefore && item.notBefore.getTime() > at.getTime() ? item.notBefore : at;
      if (!earliest || visibleAt.getTime() < earliest.getTime()) {
        earliest = visibleAt;
      }
    }
    return earliest;
  }

  async reclaimStale(olderThan: Date, maxAttempts: number): Promise<ReclaimResult> {
    const result: ReclaimResult = { requeued: [], failed: [] };
    const at = this.now();

    for (const item of this.items.values()) {
      if (item.status !== 'IN_PROGRESS') continue;
      if (!item.claimedAt || item.claimedAt.getTime() >= olderThan.getTime()) continue;

      const exhausted = item.attemptCount >= maxAttempts;
      item.status = transition(item.status, exhausted ? 'fail_tech' : 'reclaim');
      item.lastError = { kind: 'TransientError', message: staleClaimMessage(item.claimedAt) };
      item.claimedBy = null;
      item.claimedAt = null;
      item.updatedAt = at;
      (exhausted ? result.failed : result.requeued).push(item.id);
    }
    return result;
  }

  async releaseClaims(workerId: string, maxAttempts: number): Promise<ReclaimResult> {
    const result: ReclaimResult = { requeued: [], failed: [] };
    const at = this.now();

    for (const item of this.items.values()) {
      if (item.status !== 'IN_PROGRESS' || item.claimedBy !== workerId) continue;
      const exhausted = item.attemptCount >= maxAttempts;
      item.status = transition(item.status, exhausted ? 'fail_tech' : 'reclaim');
      item.lastError = { kind: 'TransientError', message: releasedClaimMessage(workerId) };
      item.claimedBy = null;
      item.claimedAt = null;
      item.updatedAt = at;
      (exhausted ? result.failed : result.requeued).push(item.id);
    }
    return result;
  }

  async counts(): Promise<StatusCounts> {
    const counts = emptyCounts();
    for (const item of this.items.values()) {
      counts[item.status] += 1;
    }
    return counts;
  }

  private require(id: string): WorkItem {
    const item = this.items.get(id);
    if (!item) {
      throw new NotFoundError(id);
    }
    return item;
  }

  /** The item, once its status allows the write and `claim` is still the live one. */
  private requireClaimed(id: string, claim: ClaimToken): WorkItem {
    const item = this.require(id);
    if (item.status === 'IN_PROGRESS' && !isCurrentClaim(item, claim)) {
      throw new ClaimLostError(id, claim.workerId, claim.attempt);
    }
    return item;
  }
}

function compareFifo(a: WorkItem, b: WorkItem): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function snapshot(item: WorkItem): WorkItem {
  return {
    ...item,
    lastError: item.lastError ? { ...item.lastError } : null,
  };
}
