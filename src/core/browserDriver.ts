/**
 * browserDriver.ts — The browser capability surface adapters are written against.
 *
 * Adapters and the state machine only see these interfaces.  The Puppeteer
 * implementation lives in browserManager.ts; tests use a scripted fake.
 * Selectors use Puppeteer's syntax, including `::-p-xpath(...)` for
 * text-based lookups.
 */

/** Opaque handle returned by `find`; only the driver that produced it can act on it. */
export interface BrowserElement {
  readonly selector: string;
}

export type ElementAction =
  | { kind: 'click' }
  | { kind: 'type'; text: string; clear?: boolean }
  | { kind: 'press'; key: string };

export type PauseKind = 'short' | 'medium' | 'long';

export interface CookieSpec {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  secure?: boolean;
  /** Used to scope the cookie when no domain is given. */
  url: string;
}

export interface BrowserDriver {
  open(url: string): Promise<void>;
  find(selector: string): Promise<BrowserElement | null>;
  act(element: BrowserElement, action: ElementAction): Promise<void>;
  attribute(element: BrowserElement, name: string): Promise<string | null>;
  currentText(): Promise<string>;
  currentHtml(): Promise<string>;
  currentUrl(): string;
  screenshot(): Promise<Uint8Array>;
  setCookie(cookie: CookieSpec): Promise<void>;
  userAgent(): Promise<string>;
  /** Resolves true on navigation, false when none happened within the timeout. */
  waitForNavigation(timeoutMs: number): Promise<boolean>;
  /** Human-paced delay; length depends on the configured renewal speed. */
  pause(kind: PauseKind): Promise<void>;
  /** Dispose the session's browser context. Safe to call twice. */
  close(): Promise<void>;
}

/** Opens isolated sessions; one per renewal attempt. */
export interface BrowserSessionProvider {
  openSession(): Promise<BrowserDriver>;
  shutdown(): Promise<void>;
}
