/**
 * browserManager.ts — Owns the Chromium process used to enumerate the grid.
 *
 * puppeteer-core drives a locally installed Chrome/Chromium (CHROME_PATH);
 * nothing is downloaded.  `withSession()` lends out a fresh browser context
 * wrapped as an `InteractiveSession` and always disposes the context, so a
 * navigator that throws mid-walk never leaves a tab behind.  `close()` ends
 * the process.
 */

import puppeteer, {
  type Browser,
  type BrowserContext,
  type ElementHandle,
  type Page,
} from 'puppeteer-core';
import { describeError, isStaleElementMessage, StaleElementError } from './errors';
import { Logger } from './logger';
import type { InteractiveSession, SessionElement, WaitOptions } from './types';
import { pollUntil } from './utils';

export interface BrowserLaunchOptions {
  executablePath: string;
  headless: boolean;
  windowWidth: number;
  windowHeight: number;
  /** Navigation timeout for `page.goto`. */
  navigationTimeoutMs: number;
  userAgent?: string;
  logger?: Logger;
}

// ── Session adapter ────────────────────────────────────────

/** Re-throws puppeteer's "node was replaced" failures as `StaleElementError`. */
async function guardStale<T>(action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (err) {
    if (err instanceof Error && isStaleElementMessage(err.message)) {
      throw new StaleElementError(err.message);
    }
    throw err;
  }
}

export class PuppeteerElement implements SessionElement {
  readonly handle: ElementHandle<Element>;

  constructor(handle: ElementHandle<Element>) {
    this.handle = handle;
  }

  attribute(name: string): Promise<string | null> {
    return guardStale(() => this.handle.evaluate((el, attr) => el.getAttribute(attr), name));
  }

  text(): Promise<string> {
    return guardStale(() => this.handle.evaluate((el) => el.textContent ?? ''));
  }

  isVisible(): Promise<boolean> {
    return guardStale(() => this.handle.isVisible());
  }
}

export class PuppeteerSession implements InteractiveSession {
  private readonly page: Page;
  private readonly navigationTimeoutMs: number;

  constructor(page: Page, navigationTimeoutMs: number) {
    this.page = page;
    this.navigationTimeoutMs = navigationTimeoutMs;
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.navigationTimeoutMs,
    });
  }

  async find(selector: string): Promise<SessionElement[]> {
    const handles = await guardStale(() => this.page.$$(selector));
    return handles.map((handle) => new PuppeteerElement(handle));
  }

  async click(element: SessionElement): Promise<void> {
    if (!(element instanceof PuppeteerElement)) {
      throw new TypeError('PuppeteerSession can only click elements it returned from find()');
    }
    // DOM click, so a loading overlay cannot swallow it.
    await guardStale(() =>
      element.handle.evaluate((el) => {
        if (el instanceof HTMLElement) el.click();
      }),
    );
  }

  execute(script: string): Promise<unknown> {
    return guardStale(() => this.page.evaluate(script));
  }

  waitUntil(predicate: () => Promise<boolean>, options: WaitOptions): Promise<boolean> {
    return pollUntil(predicate, options.timeoutMs, options.pollMs);
  }
}

// ── Browser lifecycle ──────────────────────────────────────

export class BrowserManager {
  private browser: Browser | null = null;
  private readonly options: BrowserLaunchOptions;
  private readonly logger: Logger;

  constructor(options: BrowserLaunchOptions) {
    this.options = options;
    this.logger = options.logger ?? new Logger('BrowserManager');
  }

  /** Run `fn` against a fresh context; the context is closed afterwards. */
  async withSession<T>(fn: (session: InteractiveSession) => Promise<T>): Promise<T> {
    const browser = await this.ensureBrowser();
    const context: BrowserContext = await browser.createBrowserContext();

    try {
      const page = await context.newPage();
      await page.setViewport({
        width: this.options.windowWidth,
        height: this.options.windowHeight,
      });
      if (this.options.userAgent) {
        await page.setUserAgent(this.options.userAgent);
      }
      return await fn(new PuppeteerSession(page, this.options.navigationTimeoutMs));
    } finally {
      await context.close().catch((err: unknown) => {
        this.logger.warn(`Failed to close browser context: ${describeError(err)}`);
      });
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close().catch((err: unknown) => {
        this.logger.warn(`Failed to close the browser: ${describeError(err)}`);
      });
    }
  }

  private async ensureBrowser(): Promise<Browser> {
    if (!this.browser || !this.browser.connected) {
      this.logger.info(
        `Launching ${this.options.headless ? 'headless ' : ''}Chromium from ${this.options.executablePath}`,
      );
      this.browser = await puppeteer.launch({
        executablePath: this.options.executablePath,
        headless: this.options.headless,
        args: [
          '--no-sandbox',
          '--disable-setuid-sandbox',
          '--disable-dev-shm-usage',
          `--window-size=${this.options.windowWidth},${this.options.windowHeight}`,
        ],
      });
    }
    return this.browser;
  }
}
