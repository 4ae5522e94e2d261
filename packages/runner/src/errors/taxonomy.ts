/**
 * Execution error taxonomy.
 *
 * Every failure an attempt can end with is exactly one of these kinds. The
 * kind (not the message) drives the retry decision and the terminal status.
 */

export const ERROR_KINDS = [
  'ValidationError',
  'PortalBusinessError',
  'PortalChangedError',
  'TransientError',
  'UnknownError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

export abstract class TaskError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

/** The payload violates its schema or business rules. Never retried. */
export class ValidationError extends TaskError {
  readonly kind = 'ValidationError' as const;
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}

/** The portal answered with a legitimate negative (member not found, claim denied, ...). */
export class PortalBusinessError extends TaskError {
  readonly kind = 'PortalBusinessError' as const;

  constructor(readonly reason: string) {
    super(reason);
  }
}

/** A known page element or flow step was not where the workflow expects it. */
export class PortalChangedError extends TaskError {
  readonly kind = 'PortalChangedError' as const;

  constructor(
    readonly step: string,
    message: string,
  ) {
    super(`${step}: ${message}`);
  }
}

export interface TransientErrorOptions {
  /** The automation handle is dead or logged out and must be replaced. */
  sessionInvalid?: boolean;
  cause?: unknown;
}

/** Timeouts, connection resets, expired sessions. Retried with backoff. */
export class TransientError extends TaskError {
  readonly kind = 'TransientError' as const;
  readonly sessionInvalid: boolean;

  constructor(message: string, options: TransientErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.sessionInvalid = options.sessionInvalid ?? false;
  }
}

export class UnknownError extends TaskError {
  readonly kind = 'UnknownError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
