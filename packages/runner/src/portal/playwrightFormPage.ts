import type { Page } from 'playwright-core';
import type { FormPage } from './types.js';

async function trimmedText(locator: ReturnType<Page['locator']>): Promise<string | null> {
  if ((await locator.count()) === 0) return null;
  const text = await locator.first().textContent();
  return text === null ? null : text.trim();
}

/** FormPage over a Playwright Page. Actions use the page's default timeout. */
export function playwrightFormPage(page: Page): FormPage {
  return {
    currentUrl: () => page.url(),

    open: async (url, timeoutMs) => {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    },

    exists: async (selector) => (await page.locator(selector).count()) > 0,

    waitFor: async (selector, timeoutMs) => {
      await page.locator(selector).first().waitFor({ state: 'visible', timeout: timeoutMs });
    },

    fill: async (selector, value) => {
      await page.locator(selector).first().fill(value);
    },

    select: async (selector, value) => {
      await page.locator(selector).first().selectOption(value);
    },

    setChecked: async (selector, checked) => {
      await page.locator(selector).first().setChecked(checked);
    },

    click: async (selector) => {
      await page.locator(selector).first().click();
    },

    text: (selector) => trimmedText(page.locator(selector)),

    rows: async (rowSelector, cells) => {
      const records: Array<Record<string, string | null>> = [];
      for (const row of await page.locator(rowSelector).all()) {
        const record: Record<string, string | null> = {};
        for (const [name, cellSelector] of Object.entries(cells)) {
          record[name] = await trimmedText(row.locator(cellSelector));
        }
        records.push(record);
      }
      return records;
    },

    screenshot: () => page.screenshot({ fullPage: true }),

    html: () => page.content(),
  };
}
