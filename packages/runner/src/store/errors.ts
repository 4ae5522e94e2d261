export abstract class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateError extends StoreError {
  constructor(
    readonly idempotencyKey: string,
    readonly existingId: string | null = null,
  ) {
    super(`Work item with idempotency key '${idempotencyKey}' already exists`);
  }
}

export class NotFoundError extends StoreError {
  constructor(readonly workItemId: string) {
    super(`Work item ${workItemId} not found`);
  }
}

export class InvalidTransitionError extends StoreError {
  constructor(
    readonly from: string,
    readonly event: string,
  ) {
    super(`Invalid transition: '${event}' is not allowed from ${from}`);
  }
}

/** The claim a write was made under has been taken back or handed to another worker. */
export class ClaimLostError extends StoreError {
  constructor(
    readonly workItemId: string,
    readonly workerId: string,
    readonly attempt: number,
  ) {
    super(`Work item ${workItemId} is no longer claimed by ${workerId} for attempt ${attempt}`);
  }
}
