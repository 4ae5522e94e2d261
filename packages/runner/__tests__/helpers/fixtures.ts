import type { WorkItem } from '../../src/queue/types.js';

/**
 * Shared test fixtures: a controllable clock, predictable ids and valid
 * payloads for each task type.
 */

export interface FakeClock {
  now: () => Date;
  advance: (ms: number) => void;
  /** Drop-in for the dispatcher's sleep: advances time instead of waiting. */
  sleep: (ms: number) => Promise<void>;
}

export function createFakeClock(start = '2026-01-05T09:00:00.000Z'): FakeClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
    sleep: async (ms) => {
      current += ms;
    },
  };
}

/** UUID-shaped ids that sort in creation order. */
export function sequentialIds(): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
  };
}

export function eligibilityPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    payerName: 'Acme Health',
    memberId: 'M123',
    patientLastName: 'Doe',
    dateOfBirth: '1980-04-15',
    dosFrom: '2026-01-02',
    ...overrides,
  };
}

export function claimStatusPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    payerName: 'Acme Health',
    payerClaimId: 'CLM-001',
    dosFrom: '2025-12-01',
    ...overrides,
  };
}

export function appealsPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    searchBy: 'claim_number',
    searchTerm: 'CLM-001',
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** A claimed eligibility item, as the dispatcher hands it to an executor. */
export function workItem(overrides: Partial<WorkItem> = {}): WorkItem {
  const at = new Date('2026-01-05T09:00:00.000Z');
  return {
    id: 'item-1',
    taskType: 'eligibility',
    payload: eligibilityPayload(),
    idempotencyKey: null,
    status: 'IN_PROGRESS',
    attemptCount: 1,
    lastError: null,
    notBefore: null,
    claimedBy: 'worker-a',
    claimedAt: at,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

export function claimsPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    payerName: 'Acme Health',
    patientLastName: 'Doe',
    patientFirstName: 'Jane',
    patientBirthDate: '1980-04-15',
    subscriberMemberId: 'M123',
    billingProviderName: 'Main Street Clinic',
    billingProviderNpi: '1234567890',
    billingProviderTaxId: '123456789',
    diagnosisCode: 'J06.9',
    serviceLines: [
      { fromDate: '2026-01-02', procedureCode: '99213', amount: 125 },
      { fromDate: '2026-01-02', procedureCode: '87880', amount: 35.5 },
    ],
    ...overrides,
  };
}
