/**
 * fakeBrowser.ts — Scripted BrowserDriver for adapter and engine tests.
 *
 * A session holds a map of URL → page.  Each page lists the selectors that
 * resolve on it; clicking (or pressing Enter in) an element with
 * `navigatesTo` moves the session to that URL.  Everything the adapter does
 * is recorded so tests can assert on it.
 */

import type {
  BrowserDriver,
  BrowserElement,
  BrowserSessionProvider,
  CookieSpec,
  ElementAction,
  PauseKind,
} from '../core/browserDriver';

export interface FakeElement {
  attributes?: Record<string, string>;
  /** URL the session moves to when this element is clicked or receives Enter. */
  navigatesTo?: string;
}

export interface FakePage {
  text: string;
  html?: string;
  elements?: Record<string, FakeElement>;
}

export interface TypedValue {
  url: string;
  selector: string;
  text: string;
}

export class FakeBrowserSession implements BrowserDriver {
  readonly visited: string[] = [];
  readonly clicked: string[] = [];
  readonly typed: TypedValue[] = [];
  readonly pressed: string[] = [];
  readonly cookies: CookieSpec[] = [];
  readonly pauses: PauseKind[] = [];
  closeCount = 0;
  private url = 'about:blank';
  private navigated = false;

  constructor(
    readonly pages: Record<string, FakePage>,
    private readonly agent = 'test-agent/1.0',
  ) {}

  async open(url: string): Promise<void> {
    this.goTo(url);
  }

  async find(selector: string): Promise<BrowserElement | null> {
    return this.page().elements?.[selector] ? { selector } : null;
  }

  async act(element: BrowserElement, action: ElementAction): Promise<void> {
    const target = this.page().elements?.[element.selector];
    switch (action.kind) {
      case 'type':
        this.typed.push({ url: this.url, selector: element.selector, text: action.text });
        return;
      case 'click':
        this.clicked.push(element.selector);
        break;
      case 'press':
        this.pressed.push(action.key);
        if (action.key !== 'Enter') return;
        break;
    }
    if (target?.navigatesTo) this.goTo(target.navigatesTo);
  }

  async attribute(element: BrowserElement, name: string): Promise<string | null> {
    return this.page().elements?.[element.selector]?.attributes?.[name] ?? null;
  }

  async currentText(): Promise<string> {
    return this.page().text;
  }

  async currentHtml(): Promise<string> {
    return this.page().html ?? `<html><body>${this.page().text}</body></html>`;
  }

  currentUrl(): string {
    return this.url;
  }

  async screenshot(): Promise<Uint8Array> {
    return new Uint8Array([137, 80, 78, 71]);
  }

  async setCookie(cookie: CookieSpec): Promise<void> {
    this.cookies.push(cookie);
  }

  async userAgent(): Promise<string> {
    return this.agent;
  }

  async waitForNavigation(): Promise<boolean> {
    const happened = this.navigated;
    this.navigated = false;
    return happened;
  }

  async pause(kind: PauseKind): Promise<void> {
    this.pauses.push(kind);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }

  private page(): FakePage {
    return this.pages[this.url] ?? { text: '' };
  }

  private goTo(url: string): void {
    this.url = url;
    this.navigated = true;
    this.visited.push(url);
  }
}

/** Hands out sessions from a factory and counts what was opened and shut down. */
export class FakeBrowserProvider implements BrowserSessionProvider {
  readonly sessions: FakeBrowserSession[] = [];
  shutdownCount = 0;
  /** When set, openSession rejects with this error. */
  openError: Error | null = null;

  constructor(private readonly createSession: () => FakeBrowserSession = () => new FakeBrowserSession({})) {}

  async openSession(): Promise<BrowserDriver> {
    if (this.openError) throw this.openError;
    const session = this.createSession();
    this.sessions.push(session);
    return session;
  }

  async shutdown(): Promise<void> {
    this.shutdownCount += 1;
  }
}
