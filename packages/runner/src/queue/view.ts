import type { Outcome, WorkItem } from './types.js';

export interface WorkItemView {
  id: string;
  taskType: string;
  status: WorkItem['status'];
  attemptCount: number;
  idempotencyKey: string | null;
  lastError: WorkItem['lastError'];
  notBefore: string | null;
  createdAt: string;
  updatedAt: string;
  outcome: {
    result: Record<string, unknown>;
    lines: Outcome['lines'];
    createdAt: string;
  } | null;
}

/** JSON-ready projection for the API and operator scripts. Payloads are left out. */
export function toWorkItemView(item: WorkItem, outcome: Outcome | null = null): WorkItemView {
  return {
    id: item.id,
    taskType: item.taskType,
    status: item.status,
    attemptCount: item.attemptCount,
    idempotencyKey: item.idempotencyKey,
    lastError: item.lastError,
    notBefore: item.notBefore ? item.notBefore.toISOString() : null,
    createdAt: item.createdAt.toISOString(),
    updatedAt: item.updatedAt.toISOString(),
    outcome: outcome
      ? { result: outcome.result, lines: outcome.lines, createdAt: outcome.createdAt.toISOString() }
      : null,
  };
}
