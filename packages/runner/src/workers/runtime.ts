import { hostname } from 'node:os';
import { FileArtifactSink } from '../artifacts/ArtifactSink.js';
import type { Env } from '../config/env.js';
import { loadPortalForms, type PortalFormsConfig } from '../config/portalForms.js';
import { createFormWorkflows } from '../portal/createFormWorkflows.js';
import { RoutedPortalCollaborator } from '../portal/RoutedPortalCollaborator.js';
import { RetryPolicy } from '../queue/retryPolicy.js';
import { PgDatabase } from '../store/db.js';
import { PgWorkItemStore } from '../store/PgWorkItemStore.js';
import { KeepAliveService } from '../sessions/KeepAliveService.js';
import { PlaywrightSessionFactory, type PortalSession } from '../sessions/PlaywrightSessionFactory.js';
import { SessionManager } from '../sessions/SessionManager.js';
import { AdHocRunner } from './AdHocRunner.js';
import { TaskExecutor } from './TaskExecutor.js';

export interface PortalStack {
  forms: PortalFormsConfig;
  sessions: SessionManager<PortalSession>;
  executor: TaskExecutor<PortalSession>;
  retryPolicy: RetryPolicy;
  adHoc: AdHocRunner;
  keepAlive: KeepAliveService<PortalSession>;
}

export function retryPolicyFromEnv(env: Env): RetryPolicy {
  return new RetryPolicy({
    maxRetries: env.RETRY_MAX,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxDelayMs: env.RETRY_MAX_DELAY_MS,
    jitterRatio: env.RETRY_JITTER_RATIO,
  });
}

/** Browser session, portal workflows, executor and ad hoc runner, wired from env. */
export function createPortalStack(env: Env): PortalStack {
  const forms = loadPortalForms(env.PORTAL_FORMS_PATH);

  const factory = new PlaywrightSessionFactory({
    baseUrl: env.PORTAL_BASE_URL,
    dashboardPath: forms.dashboardPath,
    login: forms.login,
    username: env.PORTAL_USERNAME,
    password: env.PORTAL_PASSWORD,
    headless: env.BROWSER_HEADLESS,
    channel: env.BROWSER_CHANNEL,
    executablePath: env.BROWSER_EXECUTABLE_PATH,
    storageStatePath: env.SESSION_STATE_PATH,
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    actionTimeoutMs: env.ACTION_TIMEOUT_MS,
  });

  const sessions = new SessionManager<PortalSession>({
    factory,
    createRetries: env.SESSION_CREATE_RETRIES,
    maxCreateFailures: env.SESSION_MAX_CREATE_FAILURES,
  });

  const pageOf = (session: PortalSession) => session.form;
  const workflows = createFormWorkflows<PortalSession>({
    config: forms,
    baseUrl: env.PORTAL_BASE_URL,
    timeouts: {
      navigationMs: env.NAVIGATION_TIMEOUT_MS,
      elementMs: env.ACTION_TIMEOUT_MS,
      resultMs: env.NAVIGATION_TIMEOUT_MS,
    },
    pageOf,
  });

  const executor = new TaskExecutor<PortalSession>({
    sessions,
    collaborator: new RoutedPortalCollaborator(workflows, pageOf),
    artifacts: new FileArtifactSink(env.ARTIFACTS_DIR),
    taskTimeoutMs: env.TASK_TIMEOUT_MS,
  });

  const retryPolicy = retryPolicyFromEnv(env);

  return {
    forms,
    sessions,
    executor,
    retryPolicy,
    adHoc: new AdHocRunner({ executor, retryPolicy }),
    keepAlive: new KeepAliveService({ sessions, intervalMs: env.KEEP_ALIVE_MINUTES * 60_000 }),
  };
}

export interface Persistence {
  db: PgDatabase;
  store: PgWorkItemStore;
}

export function requireDatabaseUrl(env: Env): string {
  if (!env.DATABASE_URL) {
    throw new Error('Missing required environment variable: DATABASE_URL');
  }
  return env.DATABASE_URL;
}

export function createPersistence(env: Env): Persistence {
  const db = new PgDatabase({ connectionString: requireDatabaseUrl(env), max: env.DATABASE_POOL_MAX });
  return { db, store: new PgWorkItemStore(db) };
}

export function defaultWorkerId(env: Env): string {
  return env.WORKER_ID ?? `worker-${hostname()}-${process.pid}`;
}
