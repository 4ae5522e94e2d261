import { describe, expect, test } from 'vitest';
import {
  canTransition,
  failureEvent,
  isTerminal,
  transition,
  type TransitionEvent,
} from '../../../src/queue/stateMachine.js';
import { WORK_ITEM_STATUSES } from '../../../src/queue/types.js';
import { InvalidTransitionError } from '../../../src/store/errors.js';

const ALL_EVENTS: TransitionEvent[] = [
  'claim',
  'succeed',
  'retry',
  'fail_validation',
  'fail_portal',
  'fail_tech',
  'reclaim',
];

describe('transition', () => {
  test('claims pending items', () => {
    expect(transition('PENDING', 'claim')).toBe('IN_PROGRESS');
  });

  test('in-progress items move to every outcome', () => {
    expect(transition('IN_PROGRESS', 'succeed')).toBe('SUCCESS');
    expect(transition('IN_PROGRESS', 'retry')).toBe('PENDING');
    expect(transition('IN_PROGRESS', 'fail_validation')).toBe('FAILED_VALIDATION');
    expect(transition('IN_PROGRESS', 'fail_portal')).toBe('FAILED_PORTAL');
    expect(transition('IN_PROGRESS', 'fail_tech')).toBe('FAILED_TECH');
    expect(transition('IN_PROGRESS', 'reclaim')).toBe('PENDING');
  });

  test('rejects recording a result for an unclaimed item', () => {
    expect(() => transition('PENDING', 'succeed')).toThrow(InvalidTransitionError);
    expect(() => transition('PENDING', 'succeed')).toThrow(
      "Invalid transition: 'succeed' is not allowed from PENDING",
    );
  });

  test('terminal statuses have no outgoing edges', () => {
    for (const status of WORK_ITEM_STATUSES.filter(isTerminal)) {
      for (const event of ALL_EVENTS) {
        expect(canTransition(status, event)).toBe(false);
      }
    }
  });
});

describe('isTerminal', () => {
  test('only success and failures are terminal', () => {
    expect(WORK_ITEM_STATUSES.filter(isTerminal)).toEqual([
      'SUCCESS',
      'FAILED_VALIDATION',
      'FAILED_PORTAL',
      'FAILED_TECH',
    ]);
  });
});

describe('failureEvent', () => {
  test('maps each failure status to its event', () => {
    expect(failureEvent('PENDING')).toBe('retry');
    expect(failureEvent('FAILED_VALIDATION')).toBe('fail_validation');
    expect(failureEvent('FAILED_PORTAL')).toBe('fail_portal');
    expect(failureEvent('FAILED_TECH')).toBe('fail_tech');
  });
});
