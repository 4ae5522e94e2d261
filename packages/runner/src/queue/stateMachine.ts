import { InvalidTransitionError } from '../store/errors.js';
import type { ErrorKind } from '../errors/taxonomy.js';
import { TERMINAL_STATUSES, type FailureStatus, type WorkItemStatus } from './types.js';

export type TransitionEvent =
  | 'claim'
  | 'succeed'
  | 'retry'
  | 'fail_validation'
  | 'fail_portal'
  | 'fail_tech'
  | 'reclaim';

const TRANSITIONS: Readonly<Partial<Record<WorkItemStatus, Partial<Record<TransitionEvent, WorkItemStatus>>>>> = {
  PENDING: {
    claim: 'IN_PROGRESS',
  },
  IN_PROGRESS: {
    succeed: 'SUCCESS',
    retry: 'PENDING',
    fail_validation: 'FAILED_VALIDATION',
    fail_portal: 'FAILED_PORTAL',
    fail_tech: 'FAILED_TECH',
    reclaim: 'PENDING',
  },
};

/** Next status for `event`, or InvalidTransitionError when the table has no edge. */
export function transition(current: WorkItemStatus, event: TransitionEvent): WorkItemStatus {
  const next = TRANSITIONS[current]?.[event];
  if (!next) {
    throw new InvalidTransitionError(current, event);
  }
  return next;
}

export function canTransition(current: WorkItemStatus, event: TransitionEvent): boolean {
  return TRANSITIONS[current]?.[event] !== undefined;
}

export function isTerminal(status: WorkItemStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

const FAILURE_EVENTS: Record<FailureStatus, TransitionEvent> = {
  FAILED_VALIDATION: 'fail_validation',
  FAILED_PORTAL: 'fail_portal',
  FAILED_TECH: 'fail_tech',
};

/** Event that moves an in-progress item to `status` after a failed attempt. */
export function failureEvent(status: FailureStatus | 'PENDING'): TransitionEvent {
  return status === 'PENDING' ? 'retry' : FAILURE_EVENTS[status];
}

export const TERMINAL_STATUS_BY_KIND: Readonly<Record<ErrorKind, FailureStatus>> = {
  ValidationError: 'FAILED_VALIDATION',
  PortalBusinessError: 'FAILED_PORTAL',
  PortalChangedError: 'FAILED_TECH',
  TransientError: 'FAILED_TECH',
  UnknownError: 'FAILED_TECH',
};
