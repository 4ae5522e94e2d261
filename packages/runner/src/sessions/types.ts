/**
 * Creates, checks and tears down the automation handle a SessionManager owns.
 * `H` is whatever the portal collaborator drives (a logged-in browser page).
 */
export interface SessionFactory<H> {
  create(): Promise<H>;
  /** True when the handle is alive and still logged in. May throw. */
  validate(handle: H): Promise<boolean>;
  destroy(handle: H): Promise<void>;
  /** Light activity to keep the portal session from idling out. */
  touch?(handle: H): Promise<void>;
}

export type SessionState = 'empty' | 'live' | 'invalidated';
