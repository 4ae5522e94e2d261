import type { PortalFormsConfig } from '../config/portalForms.js';
import { FormWorkflow, type FormTimeouts } from './FormWorkflow.js';
import type { PortalWorkflows } from './RoutedPortalCollaborator.js';
import type { FormPage } from './types.js';
import { summarizeAppeals, summarizeClaims, summarizeClaimStatus, summarizeEligibility } from './workflows/index.js';

export interface FormWorkflowsOptions<H> {
  config: PortalFormsConfig;
  baseUrl: string;
  timeouts: FormTimeouts;
  pageOf: (handle: H) => FormPage;
}

/** Build every workflow from the portal's selector configuration. */
export function createFormWorkflows<H>(opts: FormWorkflowsOptions<H>): PortalWorkflows<H> {
  const shared = {
    baseUrl: opts.baseUrl,
    loginUrlPattern: opts.config.login.urlPattern,
    timeouts: opts.timeouts,
    pageOf: opts.pageOf,
  };

  return {
    eligibility: new FormWorkflow({
      ...shared,
      name: 'eligibility',
      form: opts.config.forms.eligibility,
      summarize: summarizeEligibility,
    }),
    claim_status: new FormWorkflow({
      ...shared,
      name: 'claim status',
      form: opts.config.forms.claim_status,
      summarize: summarizeClaimStatus,
    }),
    appeals: new FormWorkflow({
      ...shared,
      name: 'appeals',
      form: opts.config.forms.appeals,
      summarize: summarizeAppeals,
    }),
    claims: new FormWorkflow({
      ...shared,
      name: 'claims',
      form: opts.config.forms.claims,
      summarize: summarizeClaims,
    }),
  };
}
