import { errorMessage } from '../errors/classify.js';
import { UnknownError } from '../errors/taxonomy.js';
import { getLogger } from '../monitoring/logger.js';
import type { ArtifactBlob, FormPage, PortalCollaborator, PortalResult, PortalWorkflow } from './types.js';
import type { AppealsData, ClaimsData, ClaimStatusData, EligibilityData, TaskPayload } from './workflows/index.js';

const logger = getLogger({ service: 'portal' });

/** One workflow per task type. */
export interface PortalWorkflows<H> {
  eligibility: PortalWorkflow<H, Readonly<EligibilityData>>;
  claim_status: PortalWorkflow<H, Readonly<ClaimStatusData>>;
  appeals: PortalWorkflow<H, Readonly<AppealsData>>;
  claims: PortalWorkflow<H, Readonly<ClaimsData>>;
}

/** Dispatches each payload to the workflow registered for its tag. */
export class RoutedPortalCollaborator<H> implements PortalCollaborator<H> {
  constructor(
    private readonly workflows: PortalWorkflows<H>,
    private readonly pageOf: (handle: H) => FormPage,
  ) {}

  perform(handle: H, payload: TaskPayload): Promise<PortalResult> {
    switch (payload.taskType) {
      case 'eligibility':
        return this.workflows.eligibility.perform(handle, payload.data);
      case 'claim_status':
        return this.workflows.claim_status.perform(handle, payload.data);
      case 'appeals':
        return this.workflows.appeals.perform(handle, payload.data);
      case 'claims':
        return this.workflows.claims.perform(handle, payload.data);
      default: {
        const unreachable: never = payload;
        throw new UnknownError(`No workflow for payload ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /** Screenshot and page HTML; whichever capture fails is logged and skipped. */
  async captureArtifacts(handle: H, workItemId: string, at: Date): Promise<ArtifactBlob[]> {
    const page = this.pageOf(handle);
    const [screenshot, html] = await Promise.allSettled([page.screenshot(), page.html()]);
    const blobs: ArtifactBlob[] = [];

    if (screenshot.status === 'fulfilled') {
      blobs.push({ kind: 'screenshot', extension: 'png', data: screenshot.value });
    } else {
      logger.warn('Screenshot capture failed', { workItemId, at: at.toISOString(), error: errorMessage(screenshot.reason) });
    }

    if (html.status === 'fulfilled') {
      blobs.push({ kind: 'page_html', extension: 'html', data: html.value });
    } else {
      logger.warn('Page HTML capture failed', { workItemId, at: at.toISOString(), error: errorMessage(html.reason) });
    }

    return blobs;
  }
}
