import type { FormConfig, FormFieldConfig, RepeatConfig } from '../config/portalForms.js';
import { errorMessage } from '../errors/classify.js';
import { PortalBusinessError, PortalChangedError, TransientError } from '../errors/taxonomy.js';
import type { ExtractedPage, FormPage, PortalResult, PortalWorkflow } from './types.js';

export interface FormTimeouts {
  navigationMs: number;
  /** Wait for a known element (form ready) before declaring the page changed. */
  elementMs: number;
  /** Wait for the portal to answer a submitted form. */
  resultMs: number;
}

export interface FormWorkflowOptions<H, P> {
  name: string;
  form: FormConfig;
  baseUrl: string;
  /** URL fragment that means the portal bounced us to its login page. */
  loginUrlPattern: string;
  timeouts: FormTimeouts;
  pageOf: (handle: H) => FormPage;
  summarize: (page: ExtractedPage, data: P) => PortalResult;
}

/**
 * Selector-driven portal form: open, fill from the payload, submit, then read
 * either the result container or the portal's error banner.
 */
export class FormWorkflow<H, P extends Readonly<Record<string, unknown>>> implements PortalWorkflow<H, P> {
  constructor(private readonly opts: FormWorkflowOptions<H, P>) {}

  async perform(handle: H, data: P): Promise<PortalResult> {
    const { form, timeouts } = this.opts;
    const page = this.opts.pageOf(handle);

    await page.open(new URL(form.path, this.opts.baseUrl).toString(), timeouts.navigationMs);
    this.assertLoggedIn(page);

    try {
      await page.waitFor(form.ready, timeouts.elementMs);
    } catch (err) {
      this.assertLoggedIn(page);
      throw new PortalChangedError('open form', `form '${form.ready}' did not appear (${errorMessage(err)})`);
    }

    for (const [name, field] of Object.entries(form.fields)) {
      const value = data[name];
      if (value === undefined || value === null) continue;
      await this.fillField(page, name, field, value);
    }
    if (form.repeat) {
      await this.fillRepeated(page, form.repeat, data[form.repeat.source]);
    }

    if (!(await page.exists(form.submit))) {
      throw new PortalChangedError('submit', `submit control '${form.submit}' not found`);
    }
    await page.click(form.submit);

    try {
      await page.waitFor(`${form.result.container}, ${form.businessError}`, timeouts.resultMs);
    } catch (err) {
      this.assertLoggedIn(page);
      throw new TransientError(`Portal did not answer the ${this.opts.name} request: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (await page.exists(form.businessError)) {
      const reason = await page.text(form.businessError);
      throw new PortalBusinessError(reason || 'Portal rejected the request without a reason');
    }

    return this.opts.summarize(await this.extract(page), data);
  }

  private assertLoggedIn(page: FormPage): void {
    if (page.currentUrl().includes(this.opts.loginUrlPattern)) {
      throw new TransientError('Portal session expired (redirected to login)', { sessionInvalid: true });
    }
  }

  private async fillField(page: FormPage, name: string, field: FormFieldConfig, value: unknown): Promise<void> {
    if (!(await page.exists(field.selector))) {
      throw new PortalChangedError('fill form', `field '${name}' (${field.selector}) not found`);
    }

    switch (field.type) {
      case 'check':
        await page.setChecked(field.selector, value === true);
        return;
      case 'select':
        await page.select(field.selector, String(value));
        return;
      case 'fill':
        await page.fill(field.selector, formatValue(value, field.dateFormat));
        return;
    }
  }

  private async fillRepeated(page: FormPage, repeat: RepeatConfig, entries: unknown): Promise<void> {
    if (!Array.isArray(entries)) return;

    for (const [index, entry] of entries.entries()) {
      if (!isRecord(entry)) continue;
      const n = String(index + 1);
      if (index > 0) {
        if (!(await page.exists(repeat.add))) {
          throw new PortalChangedError('fill form', `control to add ${repeat.source} entry ${n} (${repeat.add}) not found`);
        }
        await page.click(repeat.add);
      }
      for (const [name, field] of Object.entries(repeat.fields)) {
        const value = entry[name];
        if (value === undefined || value === null) continue;
        const selector = field.selector.replaceAll('{n}', n);
        await this.fillField(page, `${repeat.source}[${n}].${name}`, { ...field, selector }, value);
      }
    }
  }

  private async extract(page: FormPage): Promise<ExtractedPage> {
    const { result } = this.opts.form;
    const fields: Record<string, string | null> = {};
    for (const [name, selector] of Object.entries(result.fields)) {
      fields[name] = await page.text(`${result.container} ${selector}`);
    }
    const rows = result.lines ? await page.rows(result.lines.row, result.lines.cells) : [];
    return { fields, rows };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatValue(value: unknown, dateFormat: FormFieldConfig['dateFormat']): string {
  const text = String(value);
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (!match || !dateFormat || dateFormat === 'iso') return text;
  const [, year, month, day] = match;
  return dateFormat === 'mm/dd/yyyy' ? `${month}/${day}/${year}` : `${year}${month}${day}`;
}
