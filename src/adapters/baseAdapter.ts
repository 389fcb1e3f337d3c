/**
 * baseAdapter.ts — Abstract base classes + selector helpers for site adapters.
 *
 * A renewal walks two sites: the library (card/PIN login that unlocks the
 * sponsored pass) and the newspaper (account login + pass activation).
 * `LibraryAdapter` and `NewspaperAdapter` are the two halves; the registry
 * composes one of each into a `RenewalAdapter` for an account.
 *
 * Helpers here try selector lists in order, because every library and
 * newspaper marks up its forms differently, and build the `StepResult`
 * snapshots the classifier reads.
 */

import type { BrowserDriver, BrowserElement } from '../core/browserDriver';
import type {
  CaptchaChallenge,
  Credentials,
  LibraryProfile,
  NextAction,
  StepResult,
  StepTag,
} from '../core/types';
import { Logger } from '../core/logger';

// ── Shared selector lists ──────────────────────────────────

export const PASSWORD_FIELD_SELECTORS = [
  "input[type='password']",
  "input[name='password']",
  "input[id='password']",
  '#password-input',
  "[data-testid='password']",
];

export const SUBMIT_SELECTORS = [
  "button[type='submit']",
  "input[type='submit']",
  'button::-p-text(Sign in)',
  'button::-p-text(Log in)',
  "[data-testid*='submit']",
  "[data-testid*='signin']",
  '.submit-button',
  '#submit',
];

const CAPTCHA_FRAME_SELECTORS = [
  "iframe[src*='captcha-delivery.com']",
  "iframe[title*='DataDome' i]",
  "iframe[src*='captcha' i]",
  "iframe[title*='captcha' i]",
];

/** Text-contains lookup for links or buttons, e.g. xpathText('a', 'Sign In'). */
export function xpathText(tag: 'a' | 'button', text: string): string {
  return `::-p-xpath(//${tag}[contains(normalize-space(.), "${text}")])`;
}

export interface SnapshotExtras {
  captcha?: CaptchaChallenge;
  expirationText?: string;
}

// ── Site adapter base ──────────────────────────────────────

export abstract class SiteAdapter {
  protected readonly logger: Logger;

  protected constructor(context: string) {
    this.logger = new Logger(context);
  }

  /** First selector that resolves to an element, or null. */
  protected async findFirst(
    session: BrowserDriver,
    selectors: readonly string[],
  ): Promise<BrowserElement | null> {
    for (const selector of selectors) {
      const element = await session.find(selector);
      if (element) {
        this.logger.debug(`Matched selector ${selector}`);
        return element;
      }
    }
    return null;
  }

  /** Type into the first matching field. Returns false when no field matched. */
  protected async fillFirst(
    session: BrowserDriver,
    selectors: readonly string[],
    value: string,
  ): Promise<boolean> {
    const field = await this.findFirst(session, selectors);
    if (!field) return false;
    await session.act(field, { kind: 'type', text: value, clear: true });
    return true;
  }

  /** Click the first matching element. Returns false when none matched. */
  protected async clickFirst(session: BrowserDriver, selectors: readonly string[]): Promise<boolean> {
    const target = await this.findFirst(session, selectors);
    if (!target) return false;
    await session.act(target, { kind: 'click' });
    return true;
  }

  /** Click and wait for the page to change, pausing like a reader would. */
  protected async submitWith(session: BrowserDriver, selectors: readonly string[]): Promise<boolean> {
    const clicked = await this.clickFirst(session, selectors);
    if (clicked) {
      await session.waitForNavigation(15_000);
      await session.pause('medium');
    }
    return clicked;
  }

  protected async hasPasswordField(session: BrowserDriver): Promise<boolean> {
    return (await this.findFirst(session, PASSWORD_FIELD_SELECTORS)) !== null;
  }

  /** Challenge artifact when a DataDome/CAPTCHA iframe is on the page. */
  protected async detectCaptcha(session: BrowserDriver): Promise<CaptchaChallenge | undefined> {
    for (const selector of CAPTCHA_FRAME_SELECTORS) {
      const frame = await session.find(selector);
      if (!frame) continue;

      const captchaUrl = (await session.attribute(frame, 'src')) ?? '';
      if (!captchaUrl) continue;

      return {
        kind: 'datadome',
        captchaUrl,
        websiteUrl: session.currentUrl(),
        userAgent: await session.userAgent(),
      };
    }
    return undefined;
  }

  /** Capture the current page as a StepResult. */
  protected async snapshot(
    session: BrowserDriver,
    tag: StepTag,
    suggestedNext: NextAction,
    extras: SnapshotExtras = {},
  ): Promise<StepResult> {
    const text = await session.currentText();
    return {
      tag,
      url: session.currentUrl(),
      text,
      ...(text.trim() === '' ? { html: await session.currentHtml() } : {}),
      ...extras,
      suggestedNext,
      capturedAt: new Date(),
    };
  }

  protected captchaSnapshot(session: BrowserDriver, captcha: CaptchaChallenge): Promise<StepResult> {
    return this.snapshot(session, 'captcha_challenge', 'solve_captcha', { captcha });
  }
}

// ── Library side ───────────────────────────────────────────

export interface LibraryAdapterContext {
  library: LibraryProfile;
  newspaperType: string;
  giftCodeUrl?: string;
}

export abstract class LibraryAdapter extends SiteAdapter {
  protected readonly library: LibraryProfile;
  protected readonly newspaperType: string;

  protected constructor(context: string, adapterContext: LibraryAdapterContext) {
    super(context);
    this.library = adapterContext.library;
    this.newspaperType = adapterContext.newspaperType;
  }

  /**
   * Get past the library's login and onto the newspaper's side.  A result
   * tagged `login_form` means the library kept us on its login page.
   */
  abstract authenticate(session: BrowserDriver, credentials: Credentials): Promise<StepResult>;

  getLibraryName(): string {
    return this.library.name;
  }

  /** Library entry URL for this newspaper; throws when the library has none. */
  protected passUrl(): string {
    const url = this.library.passUrls[this.newspaperType];
    if (!url) {
      throw new Error(`Library "${this.library.name}" has no pass URL for "${this.newspaperType}"`);
    }
    return url;
  }

  /** Tag the page reached after submitting library credentials. */
  protected async afterLogin(session: BrowserDriver, newspaperDomain: string): Promise<StepResult> {
    const captcha = await this.detectCaptcha(session);
    if (captcha) return this.captchaSnapshot(session, captcha);

    if (await this.hasPasswordField(session)) {
      return onDomain(session.currentUrl(), newspaperDomain)
        ? this.snapshot(session, 'newspaper_portal', 'activate')
        : this.snapshot(session, 'login_form', 'classify');
    }

    return onDomain(session.currentUrl(), newspaperDomain)
      ? this.snapshot(session, 'newspaper_portal', 'activate')
      : this.snapshot(session, 'library_portal', 'activate');
  }
}

/** Lowercase host of a URL, or '' for unparsable input. */
export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/** True when the URL's host is `domain` or one of its subdomains. */
export function onDomain(url: string, domain: string): boolean {
  const host = hostOf(url);
  return host === domain || host.endsWith(`.${domain}`);
}

// ── Newspaper side ─────────────────────────────────────────

const MAX_LOGIN_ROUNDS = 6;

const LOGIN_URL_MARKERS = ['login', 'signin', 'auth', 'sso'];

export const USERNAME_FIELD_SELECTORS = [
  "input[type='email']",
  "input[name='username']",
  "input[name='email']",
  "input[id='email']",
  "input[id='username']",
];

const CONTINUE_SELECTORS = [
  'button::-p-text(Continue)',
  'button::-p-text(Next)',
  "input[value*='Continue']",
  "input[value*='Next']",
  "button[type='submit']",
];

const SIGN_IN_LINK_SELECTORS = [
  xpathText('a', 'Log in'),
  xpathText('a', 'Log In'),
  xpathText('a', 'Sign In'),
  xpathText('a', 'Sign in'),
  '.sign-in-link',
  '.login-link',
];

export const ACTIVATION_SELECTORS = [
  xpathText('button', 'Redeem'),
  xpathText('button', 'Claim'),
  xpathText('button', 'Activate'),
  xpathText('button', 'Get Access'),
  xpathText('a', 'Redeem'),
  xpathText('a', 'Claim'),
  "[data-testid*='redeem']",
  "[data-testid*='activate']",
  '.redeem-button',
];

/** A solver cookie string ("datadome=…; Domain=.x.com; Path=/") split into parts. */
export interface ParsedCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
}

export function parseSolverCookie(token: string): ParsedCookie | null {
  const [pair, ...attributes] = token.split(';').map((part) => part.trim());
  const eq = pair?.indexOf('=') ?? -1;
  if (!pair || eq <= 0) return null;

  const cookie: ParsedCookie = { name: pair.slice(0, eq), value: pair.slice(eq + 1) };
  for (const attribute of attributes) {
    const [key, value] = attribute.split('=', 2);
    const lower = key.trim().toLowerCase();
    if (lower === 'domain' && value) cookie.domain = value.trim();
    if (lower === 'path' && value) cookie.path = value.trim();
  }
  return cookie;
}

export abstract class NewspaperAdapter extends SiteAdapter {
  /** Registrable domain every page of this newspaper lives under. */
  abstract readonly domain: string;
  /** Links on a library landing page that lead on to the newspaper. */
  protected abstract readonly portalLinkSelectors: readonly string[];
  /** Site-specific username fields, tried before the shared list. */
  protected readonly extraUsernameSelectors: readonly string[] = [];
  /** Domain for the anti-bot cookie when the solver's cookie names none. */
  protected abstract readonly cookieDomain: string;
  /** Other domains whose login forms take this newspaper's credentials. */
  protected readonly loginDomains: readonly string[] = [];

  /** The sentence on the page that states when the pass lapses, if present. */
  abstract describeExpiration(text: string): string | undefined;

  /**
   * Sign in to the newspaper, trying a combined form first, then a
   * username-first flow, then a lone password step.  Stops early on a
   * CAPTCHA and leaves success or failure to the classifier.  Forms are
   * only filled on the newspaper's own domains.
   */
  async signIn(session: BrowserDriver, credentials: Credentials): Promise<StepResult> {
    for (let round = 1; round <= MAX_LOGIN_ROUNDS; round++) {
      if (!this.onSite(session)) {
        if (!(await this.clickFirst(session, this.portalLinkSelectors))) {
          this.logger.warn(`No link to ${this.domain} on ${hostOf(session.currentUrl()) || 'the current page'}`);
          break;
        }
        this.logger.info(`Followed library link to ${this.domain}`);
        await session.waitForNavigation(10_000);
        await session.pause('medium');
        continue;
      }

      const captcha = await this.detectCaptcha(session);
      if (captcha) return this.captchaSnapshot(session, captcha);

      if (await this.clickFirst(session, SIGN_IN_LINK_SELECTORS)) {
        await session.waitForNavigation(10_000);
        await session.pause('medium');
      }

      const submitted = await this.submitLoginForm(session, credentials);
      if (!submitted) {
        this.logger.debug(`No login form on round ${round}`);
        break;
      }

      await session.pause('long');
      if (!LOGIN_URL_MARKERS.some((marker) => session.currentUrl().toLowerCase().includes(marker))) {
        break;
      }
      this.logger.info(`Still on a login page after round ${round}`);
    }

    const captcha = await this.detectCaptcha(session);
    if (captcha) return this.captchaSnapshot(session, captcha);

    const loginForm = await this.hasPasswordField(session);
    if (!this.onSite(session)) {
      return this.snapshot(session, loginForm ? 'login_form' : 'library_portal', 'classify');
    }
    return loginForm
      ? this.snapshot(session, 'login_form', 'activate')
      : this.snapshot(session, 'newspaper_portal', 'activate');
  }

  /** Claim the pass, signing in again first if the site shows a login form. */
  async activatePass(session: BrowserDriver, credentials: Credentials): Promise<StepResult> {
    let captcha = await this.detectCaptcha(session);
    if (captcha) return this.captchaSnapshot(session, captcha);

    if (await this.hasPasswordField(session)) {
      if (!this.onSite(session)) {
        this.logger.warn(`Login form on ${hostOf(session.currentUrl())} is not ${this.domain}'s; not signing in`);
        return this.snapshot(session, 'login_form', 'classify');
      }
      const login = await this.signIn(session, credentials);
      if (login.tag === 'captcha_challenge') return login;
    }

    if (await this.submitWith(session, ACTIVATION_SELECTORS)) {
      this.logger.info('Clicked pass activation control');
    }

    captcha = await this.detectCaptcha(session);
    if (captcha) return this.captchaSnapshot(session, captcha);

    const text = await session.currentText();
    const expirationText = this.describeExpiration(text);
    return this.snapshot(session, 'activation_page', 'classify', expirationText ? { expirationText } : {});
  }

  /** Install the solver's anti-bot cookie and reload the challenged page. */
  async applyCaptchaToken(session: BrowserDriver, token: string, challenge: CaptchaChallenge): Promise<void> {
    const cookie = parseSolverCookie(token);
    if (!cookie) throw new Error('CAPTCHA token is not a cookie string');

    await session.setCookie({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain ?? this.cookieDomain,
      path: cookie.path ?? '/',
      secure: true,
      url: challenge.websiteUrl,
    });
    await session.open(challenge.websiteUrl);
    await session.pause('long');
  }

  // ── Internals ──────────────────────────────────────────

  protected onSite(session: BrowserDriver): boolean {
    const url = session.currentUrl();
    return [this.domain, ...this.loginDomains].some((domain) => onDomain(url, domain));
  }

  private usernameSelectors(): string[] {
    return [...this.extraUsernameSelectors, ...USERNAME_FIELD_SELECTORS];
  }

  private async submitLoginForm(session: BrowserDriver, credentials: Credentials): Promise<boolean> {
    const username = await this.findFirst(session, this.usernameSelectors());
    const password = await this.findFirst(session, PASSWORD_FIELD_SELECTORS);

    if (username && password) {
      await session.act(username, { kind: 'type', text: credentials.username, clear: true });
      await session.pause('short');
      await session.act(password, { kind: 'type', text: credentials.password, clear: true });
      this.logger.info('Submitting combined login form');
      return this.submitOrEnter(session, password);
    }

    if (username) {
      await session.act(username, { kind: 'type', text: credentials.username, clear: true });
      this.logger.info('Submitting username step');
      if (!(await this.submitWith(session, CONTINUE_SELECTORS))) {
        await session.act(username, { kind: 'press', key: 'Enter' });
        await session.waitForNavigation(10_000);
      }
      await session.pause('medium');
      const passwordStep = await this.findFirst(session, PASSWORD_FIELD_SELECTORS);
      if (passwordStep) {
        await session.act(passwordStep, { kind: 'type', text: credentials.password, clear: true });
        await this.submitOrEnter(session, passwordStep);
      }
      return true;
    }

    if (password) {
      await session.act(password, { kind: 'type', text: credentials.password, clear: true });
      this.logger.info('Submitting password step');
      return this.submitOrEnter(session, password);
    }

    return false;
  }

  private async submitOrEnter(session: BrowserDriver, field: BrowserElement): Promise<boolean> {
    if (!(await this.submitWith(session, SUBMIT_SELECTORS))) {
      await session.act(field, { kind: 'press', key: 'Enter' });
      await session.waitForNavigation(15_000);
    }
    return true;
  }
}
