import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import type { LoginConfig } from '../config/portalForms.js';
import { errorMessage } from '../errors/classify.js';
import { getLogger } from '../monitoring/logger.js';
import { playwrightFormPage } from '../portal/playwrightFormPage.js';
import type { FormPage } from '../portal/types.js';
import type { SessionFactory } from './types.js';

const logger = getLogger({ service: 'browser-session' });

/** A logged-in browser page on the portal. */
export interface PortalSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  form: FormPage;
  createdAt: Date;
}

export interface PlaywrightSessionFactoryConfig {
  baseUrl: string;
  dashboardPath: string;
  login: LoginConfig;
  username?: string;
  password?: string;
  headless: boolean;
  channel?: string;
  executablePath?: string;
  /** Where cookies/localStorage are persisted between runs. */
  storageStatePath: string;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
}

/**
 * Launches Chromium, restores the saved storage state and logs in to the
 * portal when it asks for credentials.
 */
export class PlaywrightSessionFactory implements SessionFactory<PortalSession> {
  constructor(private readonly config: PlaywrightSessionFactoryConfig) {}

  async create(): Promise<PortalSession> {
    const browser = await chromium.launch({
      headless: this.config.headless,
      channel: this.config.channel,
      executablePath: this.config.executablePath,
    });

    try {
      const hasState = existsSync(this.config.storageStatePath);
      const context = await browser.newContext(hasState ? { storageState: this.config.storageStatePath } : {});
      const page = await context.newPage();
      page.setDefaultTimeout(this.config.actionTimeoutMs);
      page.setDefaultNavigationTimeout(this.config.navigationTimeoutMs);

      await page.goto(this.url(this.config.dashboardPath), { waitUntil: 'domcontentloaded' });
      if (this.onLoginPage(page)) {
        await this.login(page);
      } else {
        logger.info('Restored portal session from saved state');
      }

      await mkdir(dirname(this.config.storageStatePath), { recursive: true });
      await context.storageState({ path: this.config.storageStatePath });

      return { browser, context, page, form: playwrightFormPage(page), createdAt: new Date() };
    } catch (err) {
      await browser.close().catch((closeErr: unknown) => {
        logger.warn('Failed to close browser after session setup error', { error: errorMessage(closeErr) });
      });
      throw err;
    }
  }

  async validate(session: PortalSession): Promise<boolean> {
    if (!session.browser.isConnected() || session.page.isClosed()) {
      return false;
    }
    return !this.onLoginPage(session.page);
  }

  async destroy(session: PortalSession): Promise<void> {
    await session.browser.close();
  }

  /** Reload the dashboard and persist refreshed cookies. */
  async touch(session: PortalSession): Promise<void> {
    await session.page.goto(this.url(this.config.dashboardPath), { waitUntil: 'domcontentloaded' });
    if (this.onLoginPage(session.page)) {
      throw new Error('Portal session expired during keep-alive');
    }
    await session.context.storageState({ path: this.config.storageStatePath });
  }

  private async login(page: Page): Promise<void> {
    const { login, username, password } = this.config;
    if (!username || !password) {
      throw new Error('Portal credentials are not configured (PORTAL_USERNAME / PORTAL_PASSWORD)');
    }

    logger.info('Logging in to portal');
    if (!page.url().includes(login.urlPattern)) {
      await page.goto(this.url(login.path), { waitUntil: 'domcontentloaded' });
    }
    await page.locator(login.username).fill(username);
    await page.locator(login.password).fill(password);
    await page.locator(login.submit).click();

    try {
      await page.locator(login.loggedInMarker).first().waitFor({ state: 'visible' });
    } catch (err) {
      const banner =
        login.errorBanner && (await page.locator(login.errorBanner).count()) > 0
          ? await page.locator(login.errorBanner).first().textContent()
          : null;
      throw new Error(`Portal login failed: ${banner?.trim() || errorMessage(err)}`);
    }
    logger.info('Portal login succeeded');
  }

  private onLoginPage(page: Page): boolean {
    return page.url().includes(this.config.login.urlPattern);
  }

  private url(path: string): string {
    return new URL(path, this.config.baseUrl).toString();
  }
}
