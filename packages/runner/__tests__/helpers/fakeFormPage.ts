import type { FormConfig } from '../../src/config/portalForms.js';
import type { FormPage } from '../../src/portal/types.js';

/**
 * In-memory FormPage. Selectors in `present` exist on the page; selectors in
 * `afterSubmit` appear once anything is clicked. Every interaction is
 * recorded in `actions`.
 */
export class FakeFormPage implements FormPage {
  url = 'about:blank';
  readonly present = new Set<string>();
  readonly afterSubmit = new Set<string>();
  readonly texts = new Map<string, string>();
  readonly tableRows = new Map<string, Array<Record<string, string | null>>>();
  readonly actions: string[] = [];
  /** When set, open() lands on this URL instead of the requested one. */
  redirectTo: string | null = null;
  screenshotError: Error | null = null;

  currentUrl(): string {
    return this.url;
  }

  async open(url: string): Promise<void> {
    this.actions.push(`open ${url}`);
    this.url = this.redirectTo ?? url;
  }

  async exists(selector: string): Promise<boolean> {
    return this.present.has(selector);
  }

  async waitFor(selector: string, timeoutMs: number): Promise<void> {
    const alternatives = selector.split(',').map((part) => part.trim());
    if (alternatives.some((part) => this.present.has(part))) return;
    throw new Error(`Timeout ${timeoutMs}ms exceeded waiting for ${selector}`);
  }

  async fill(selector: string, value: string): Promise<void> {
    this.actions.push(`fill ${selector}=${value}`);
  }

  async select(selector: string, value: string): Promise<void> {
    this.actions.push(`select ${selector}=${value}`);
  }

  async setChecked(selector: string, checked: boolean): Promise<void> {
    this.actions.push(`check ${selector}=${checked}`);
  }

  async click(selector: string): Promise<void> {
    this.actions.push(`click ${selector}`);
    for (const appearing of this.afterSubmit) {
      this.present.add(appearing);
    }
  }

  async text(selector: string): Promise<string | null> {
    return this.texts.get(selector) ?? null;
  }

  async rows(rowSelector: string): Promise<Array<Record<string, string | null>>> {
    return this.tableRows.get(rowSelector) ?? [];
  }

  async screenshot(): Promise<Buffer> {
    if (this.screenshotError) throw this.screenshotError;
    return Buffer.from('png-bytes');
  }

  async html(): Promise<string> {
    return '<html><body>result</body></html>';
  }
}

/**
 * A page with the form, every field and the submit control in place. Forms
 * with a repeated group also get `repeatEntries` entries and the add control.
 */
export function pageWithForm(form: FormConfig, repeatEntries = 1): FakeFormPage {
  const page = new FakeFormPage();
  page.present.add(form.ready);
  page.present.add(form.submit);
  for (const field of Object.values(form.fields)) {
    page.present.add(field.selector);
  }
  if (form.repeat) {
    page.present.add(form.repeat.add);
    for (let n = 1; n <= repeatEntries; n += 1) {
      for (const field of Object.values(form.repeat.fields)) {
        page.present.add(field.selector.replaceAll('{n}', String(n)));
      }
    }
  }
  return page;
}
