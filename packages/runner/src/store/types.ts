import type {
  EnqueueInput,
  FailureStatus,
  LastError,
  Outcome,
  OutcomeInput,
  WorkItem,
  WorkItemStatus,
} from '../queue/types.js';

export interface ListFilter {
  status?: WorkItemStatus[];
  taskType?: string;
  limit?: number;
  offset?: number;
}

/**
 * Identifies one claim of an item: the worker holding it and the attempt it
 * is running. Writes carrying a token that no longer matches are refused.
 */
export interface ClaimToken {
  workerId: string;
  attempt: number;
}

export interface RecordFailureOptions {
  /** Earliest time a requeued item becomes claimable again. */
  notBefore?: Date | null;
}

export interface ReclaimResult {
  requeued: string[];
  failed: string[];
}

export type StatusCounts = Record<WorkItemStatus, number>;

/**
 * Durable record of work items and their outcomes.
 *
 * Every mutating operation is atomic: either all of its effects are visible
 * or none are. Status changes follow the table in queue/stateMachine.ts.
 */
export interface WorkItemStore {
  /** @throws DuplicateError when the idempotency key is already taken. */
  enqueue(input: EnqueueInput): Promise<string>;

  /**
   * Claim the oldest claimable PENDING item (createdAt, then id) for
   * `workerId`, incrementing its attemptCount. Null when none is claimable.
   */
  claimNext(workerId: string): Promise<WorkItem | null>;

  /**
   * IN_PROGRESS -> SUCCESS together with the outcome and its lines.
   * @throws ClaimLostError when `claim` is no longer the item's current claim.
   */
  recordOutcome(id: string, outcome: OutcomeInput, claim: ClaimToken): Promise<void>;

  /**
   * IN_PROGRESS -> PENDING (retry) or IN_PROGRESS -> FAILED_*.
   * @throws ClaimLostError when `claim` is no longer the item's current claim.
   */
  recordFailure(
    id: string,
    status: FailureStatus | 'PENDING',
    error: LastError,
    claim: ClaimToken,
    options?: RecordFailureOptions,
  ): Promise<void>;

  /** @throws NotFoundError */
  get(id: string): Promise<WorkItem>;

  getOutcome(id: string): Promise<Outcome | null>;

  list(filter?: ListFilter): Promise<WorkItem[]>;

  /**
   * Earliest time a PENDING item becomes claimable (now, for items without a
   * retry gate). Null when nothing is pending.
   */
  nextClaimableAt(): Promise<Date | null>;

  /**
   * Return IN_PROGRESS items claimed before `olderThan` to PENDING, or to
   * FAILED_TECH once their attemptCount has reached `maxAttempts`.
   */
  reclaimStale(olderThan: Date, maxAttempts: number): Promise<ReclaimResult>;

  /**
   * Return every IN_PROGRESS item claimed by `workerId` to PENDING, or to
   * FAILED_TECH once its attemptCount has reached `maxAttempts`.
   */
  releaseClaims(workerId: string, maxAttempts: number): Promise<ReclaimResult>;

  counts(): Promise<StatusCounts>;
}

export function emptyCounts(): StatusCounts {
  return {
    PENDING: 0,
    IN_PROGRESS: 0,
    SUCCESS: 0,
    FAILED_VALIDATION: 0,
    FAILED_PORTAL: 0,
    FAILED_TECH: 0,
  };
}

export const DEFAULT_LIST_LIMIT = 50;

export function isCurrentClaim(item: WorkItem, claim: ClaimToken): boolean {
  return item.claimedBy === claim.workerId && item.attemptCount === claim.attempt;
}

export function releasedClaimMessage(workerId: string): string {
  return `Claim released: worker ${workerId} stopped before the item finished`;
}

export function staleClaimMessage(claimedAt: Date | null): string {
  const since = claimedAt ? claimedAt.toISOString() : 'unknown time';
  return `Claim expired: item was in progress since ${since} without a result`;
}
