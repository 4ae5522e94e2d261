import type { ArtifactSink } from '../artifacts/ArtifactSink.js';
import { classifyError, errorMessage } from '../errors/classify.js';
import { TransientError } from '../errors/taxonomy.js';
import { getLogger } from '../monitoring/logger.js';
import type { PortalCollaborator } from '../portal/types.js';
import { parseTaskPayload } from '../portal/workflows/index.js';
import type { OutcomeInput, WorkItem } from '../queue/types.js';
import type { SessionManager } from '../sessions/SessionManager.js';
import type { WorkItemExecutor } from './types.js';

const logger = getLogger({ service: 'TaskExecutor' });

const DEFAULT_TASK_TIMEOUT_MS = 180_000;

export interface TaskExecutorOptions<H> {
  sessions: SessionManager<H>;
  collaborator: PortalCollaborator<H>;
  artifacts?: ArtifactSink;
  /** Upper bound for one collaborator call (default 3 minutes). */
  taskTimeoutMs?: number;
  now?: () => Date;
}

/**
 * Executes one work item against the portal through the shared session.
 *
 * Payload validation happens before the session is touched, so a malformed
 * item never waits on (or disturbs) the browser.
 */
export class TaskExecutor<H> implements WorkItemExecutor {
  private readonly sessions: SessionManager<H>;
  private readonly collaborator: PortalCollaborator<H>;
  private readonly artifacts: ArtifactSink | null;
  private readonly taskTimeoutMs: number;
  private readonly now: () => Date;

  constructor(opts: TaskExecutorOptions<H>) {
    this.sessions = opts.sessions;
    this.collaborator = opts.collaborator;
    this.artifacts = opts.artifacts ?? null;
    this.taskTimeoutMs = opts.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.now = opts.now ?? (() => new Date());
  }

  async execute(item: WorkItem): Promise<OutcomeInput> {
    const log = logger.child({ workItemId: item.id, taskType: item.taskType, attempt: item.attemptCount });

    const payload = parseTaskPayload(item.taskType, item.payload);
    const handle = await this.sessions.acquire();

    try {
      const result = await this.withTimeout(this.collaborator.perform(handle, payload));
      log.info('Portal workflow completed', { lines: result.lines.length });
      return { result: result.result, lines: result.lines };
    } catch (err) {
      const error = classifyError(err);
      if (error instanceof TransientError && error.sessionInvalid) {
        this.sessions.invalidate(handle);
      }
      log.warn('Portal workflow failed', { kind: error.kind, error: error.message });
      await this.captureArtifacts(handle, item.id);
      throw error;
    } finally {
      this.sessions.release(handle);
    }
  }

  /**
   * A timed-out call may still be driving the page, so the timeout error marks
   * the session invalid and the next acquire starts from a fresh handle.
   */
  private withTimeout<T>(work: Promise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let timedOut = false;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new TransientError(`Task timed out after ${this.taskTimeoutMs}ms`, { sessionInvalid: true }));
      }, this.taskTimeoutMs);
    });

    work.catch((err: unknown) => {
      if (timedOut) {
        logger.debug('Timed-out portal call failed afterwards', { error: errorMessage(err) });
      }
    });

    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
  }

  private async captureArtifacts(handle: H, workItemId: string): Promise<void> {
    if (!this.artifacts) return;
    const capturedAt = this.now();

    try {
      const blobs = await this.collaborator.captureArtifacts(handle, workItemId, capturedAt);
      for (const blob of blobs) {
        const ref = await this.artifacts.store({ ...blob, workItemId, capturedAt });
        logger.info('Diagnostic artifact stored', { workItemId, kind: blob.kind, ref });
      }
    } catch (err) {
      logger.warn('Artifact capture failed', { workItemId, error: errorMessage(err) });
    }
  }
}
