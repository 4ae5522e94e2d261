import type { ErrorKind } from '../errors/taxonomy.js';

export const WORK_ITEM_STATUSES = [
  'PENDING',
  'IN_PROGRESS',
  'SUCCESS',
  'FAILED_VALIDATION',
  'FAILED_PORTAL',
  'FAILED_TECH',
] as const;

export type WorkItemStatus = (typeof WORK_ITEM_STATUSES)[number];

export type FailureStatus = 'FAILED_VALIDATION' | 'FAILED_PORTAL' | 'FAILED_TECH';

export const TERMINAL_STATUSES: ReadonlySet<WorkItemStatus> = new Set<WorkItemStatus>([
  'SUCCESS',
  'FAILED_VALIDATION',
  'FAILED_PORTAL',
  'FAILED_TECH',
]);

export function isWorkItemStatus(value: string): value is WorkItemStatus {
  return WORK_ITEM_STATUSES.some((status) => status === value);
}

export interface LastError {
  kind: ErrorKind;
  message: string;
}

export interface WorkItem {
  id: string;
  taskType: string;
  /** Opaque to the queue beyond its task type; validated by the executor. */
  payload: Readonly<Record<string, unknown>>;
  idempotencyKey: string | null;
  status: WorkItemStatus;
  attemptCount: number;
  lastError: LastError | null;
  notBefore: Date | null;
  claimedBy: string | null;
  claimedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface EnqueueInput {
  taskType: string;
  payload: Record<string, unknown>;
  idempotencyKey?: string | null;
}

export interface OutcomeLineInput {
  category: string;
  data: Record<string, unknown>;
}

export interface OutcomeInput {
  result: Record<string, unknown>;
  lines: OutcomeLineInput[];
}

export interface OutcomeLine extends OutcomeLineInput {
  /** 1-based order within the outcome. */
  position: number;
}

export interface Outcome {
  workItemId: string;
  result: Record<string, unknown>;
  lines: OutcomeLine[];
  createdAt: Date;
}
