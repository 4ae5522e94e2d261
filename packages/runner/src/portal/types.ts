import type { OutcomeLineInput } from '../queue/types.js';
import type { TaskPayload } from './workflows/index.js';

export interface PortalResult {
  result: Record<string, unknown>;
  lines: OutcomeLineInput[];
}

export interface ArtifactBlob {
  kind: 'screenshot' | 'page_html';
  extension: string;
  data: Buffer | string;
}

/**
 * Performs one workflow against the portal using a borrowed handle. Throws
 * taxonomy errors (or raw errors the executor classifies).
 */
export interface PortalCollaborator<H> {
  perform(handle: H, payload: TaskPayload): Promise<PortalResult>;
  captureArtifacts(handle: H, workItemId: string, at: Date): Promise<ArtifactBlob[]>;
}

/** One workflow's portal interaction for its own payload variant. */
export interface PortalWorkflow<H, P> {
  perform(handle: H, data: P): Promise<PortalResult>;
}

/** Text pulled from a result page before a workflow shapes it. */
export interface ExtractedPage {
  fields: Record<string, string | null>;
  rows: Array<Record<string, string | null>>;
}

/**
 * Minimal page surface the form workflows drive. Implemented over a
 * Playwright Page by playwrightFormPage(); faked in tests.
 */
export interface FormPage {
  currentUrl(): string;
  open(url: string, timeoutMs: number): Promise<void>;
  exists(selector: string): Promise<boolean>;
  waitFor(selector: string, timeoutMs: number): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  select(selector: string, value: string): Promise<void>;
  setChecked(selector: string, checked: boolean): Promise<void>;
  click(selector: string): Promise<void>;
  /** Trimmed text of the first match, or null when nothing matches. */
  text(selector: string): Promise<string | null>;
  /** One record per `rowSelector` match with the trimmed text of each cell. */
  rows(rowSelector: string, cells: Record<string, string>): Promise<Array<Record<string, string | null>>>;
  screenshot(): Promise<Buffer>;
  html(): Promise<string>;
}
