/**
 * browserManager.ts — Puppeteer-backed browser sessions for renewal attempts.
 *
 * One Chromium process is shared by the daemon; every renewal attempt gets
 * its own incognito BrowserContext so cookies never leak between accounts.
 * `openSession()` hands out a `PuppeteerSession` (the BrowserDriver the
 * adapters use) and the state machine closes it on every exit path.
 *
 * puppeteer-core drives the system Chrome named by CHROME_EXECUTABLE_PATH
 * (or the installed Chrome channel); stealth evasions come from
 * puppeteer-extra's plugin.
 */

import puppeteerCore, { TimeoutError } from 'puppeteer-core';
import type { Browser, BrowserContext, ElementHandle, Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type {
  BrowserDriver,
  BrowserElement,
  BrowserSessionProvider,
  CookieSpec,
  ElementAction,
  PauseKind,
} from './browserDriver';
import type { RenewalConfig, RenewalSpeed } from './config';
import { Logger } from './logger';
import { humanClick, humanPause, humanType } from '../middleware/humanBehavior';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

const NAVIGATION_TIMEOUT_MS = 45_000;

// ── Elements ───────────────────────────────────────────────

class PuppeteerElement implements BrowserElement {
  constructor(
    readonly selector: string,
    readonly handle: ElementHandle<Element>,
  ) {}
}

// ── Session (BrowserDriver) ────────────────────────────────

export class PuppeteerSession implements BrowserDriver {
  private closed = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly speed: RenewalSpeed,
  ) {}

  async open(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS });
    await this.settle();
  }

  async find(selector: string): Promise<BrowserElement | null> {
    const handle = await this.page.$(selector);
    return handle ? new PuppeteerElement(selector, handle) : null;
  }

  async act(element: BrowserElement, action: ElementAction): Promise<void> {
    const handle = await this.resolve(element);

    switch (action.kind) {
      case 'click':
        await humanClick(handle, this.speed);
        break;
      case 'type':
        await humanType(this.page, handle, action.text, this.speed, action.clear ?? true);
        break;
      case 'press':
        await handle.press(keyInput(action.key));
        break;
    }
  }

  async attribute(element: BrowserElement, name: string): Promise<string | null> {
    const handle = await this.resolve(element);
    return handle.evaluate((el, attr) => el.getAttribute(attr), name);
  }

  async currentText(): Promise<string> {
    return this.page.evaluate(() => document.body?.innerText ?? '');
  }

  async currentHtml(): Promise<string> {
    return this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async screenshot(): Promise<Uint8Array> {
    return this.page.screenshot({ fullPage: true, type: 'png' });
  }

  async setCookie(cookie: CookieSpec): Promise<void> {
    await this.page.setCookie({
      name: cookie.name,
      value: cookie.value,
      path: cookie.path ?? '/',
      secure: cookie.secure ?? true,
      ...(cookie.domain ? { domain: cookie.domain } : { url: cookie.url }),
    });
  }

  async userAgent(): Promise<string> {
    return this.page.evaluate(() => navigator.userAgent);
  }

  async waitForNavigation(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForNavigation({ waitUntil: 'networkidle2', timeout: timeoutMs });
      return true;
    } catch (err) {
      // AJAX-driven forms update in place without a navigation.
      if (err instanceof TimeoutError) return false;
      throw err;
    }
  }

  async pause(kind: PauseKind): Promise<void> {
    await humanPause(kind, this.speed);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.context.close();
    } catch (err) {
      logger.warn(`Browser context did not close cleanly: ${String(err)}`);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async resolve(element: BrowserElement): Promise<ElementHandle<Element>> {
    if (element instanceof PuppeteerElement) return element.handle;
    const handle = await this.page.$(element.selector);
    if (!handle) throw new Error(`Element "${element.selector}" is no longer on the page`);
    return handle;
  }

  private async settle(): Promise<void> {
    try {
      await this.page.waitForNetworkIdle({ idleTime: 500, timeout: 10_000 });
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      logger.debug(`Network still busy on ${this.page.url()}; continuing`);
    }
  }
}

// Puppeteer's KeyInput is a union of key names; map the few keys adapters press.
function keyInput(key: string): 'Enter' | 'Tab' | 'Escape' {
  if (key === 'Tab' || key === 'Escape') return key;
  return 'Enter';
}

// ── Manager ────────────────────────────────────────────────

export class BrowserManager implements BrowserSessionProvider {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(private readonly config: RenewalConfig) {}

  async openSession(): Promise<BrowserDriver> {
    const browser = await this.ensureBrowser();
    const context = await browser.createBrowserContext();

    try {
      const page = await context.newPage();
      await page.setViewport({ width: 1366, height: 900 });
      if (this.config.browserUserAgent) {
        await page.setUserAgent(this.config.browserUserAgent);
      }
      await page.setExtraHTTPHeaders({ 'accept-language': `${this.config.dateLocale},en;q=0.9` });
      page.setDefaultTimeout(NAVIGATION_TIMEOUT_MS);

      return new PuppeteerSession(context, page, this.config.renewalSpeed);
    } catch (err) {
      await context.close();
      throw err;
    }
  }

  async shutdown(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close();
      logger.info('Browser closed');
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.connected) return this.browser;

    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    this.browser = await this.launching;
    return this.browser;
  }

  private async launch(): Promise<Browser> {
    logger.info('Launching browser…');
    const browser: Browser = await puppeteer.launch({
      headless: this.config.headless,
      ...(this.config.chromeExecutablePath
        ? { executablePath: this.config.chromeExecutablePath }
        : { channel: 'chrome' }),
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        `--lang=${this.config.dateLocale}`,
      ],
    });
    return browser;
  }
}
