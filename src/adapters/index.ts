/**
 * adapters/index.ts — Adapter registry keyed by (library type, newspaper type).
 *
 * Each account names a library variant and a newspaper variant; the
 * registry turns that pair into one `RenewalAdapter` that the state machine
 * drives.  Lookup happens before any browser is launched, so an account
 * with an unknown pair fails with `UnsupportedAdapterError` at no cost.
 *
 * Adding a site: write a `LibraryAdapter` or `NewspaperAdapter` subclass and
 * register a factory for each pair it serves in `createDefaultRegistry()`.
 */

import type { BrowserDriver } from '../core/browserDriver';
import { UnsupportedAdapterError } from '../core/errors';
import {
  KNOWN_LIBRARY_TYPES,
  KNOWN_NEWSPAPER_TYPES,
  type Account,
  type CaptchaChallenge,
  type Credentials,
  type KnownLibraryType,
  type KnownNewspaperType,
  type StepResult,
} from '../core/types';
import type { LibraryAdapter, LibraryAdapterContext, NewspaperAdapter } from './baseAdapter';
import { CustomLibraryAdapter } from './customLibraryAdapter';
import { GiftCodeAdapter, isGiftCodeUrl } from './giftCodeAdapter';
import { NytAdapter } from './nytAdapter';
import { OclcAdapter } from './oclcAdapter';
import { WsjAdapter } from './wsjAdapter';

export interface AdapterCredentials {
  library: Credentials;
  newspaper: Credentials;
}

/** Uniform capability set the state machine sees for one account. */
export interface RenewalAdapter {
  /** "library/newspaper", e.g. "oclc/nyt". */
  readonly key: string;
  getLibraryName(): string;
  authenticate(session: BrowserDriver, credentials: AdapterCredentials): Promise<StepResult>;
  activatePass(session: BrowserDriver): Promise<StepResult>;
  describeExpiration(text: string): string | undefined;
  applyCaptchaToken(session: BrowserDriver, token: string, challenge: CaptchaChallenge): Promise<void>;
}

export type AdapterFactory = (account: Account) => RenewalAdapter;

/** A library adapter followed by a newspaper adapter. */
export class PassAdapter implements RenewalAdapter {
  private newspaperCredentials: Credentials | null = null;

  constructor(
    readonly key: string,
    private readonly library: LibraryAdapter,
    private readonly newspaper: NewspaperAdapter,
  ) {}

  getLibraryName(): string {
    return this.library.getLibraryName();
  }

  async authenticate(session: BrowserDriver, credentials: AdapterCredentials): Promise<StepResult> {
    this.newspaperCredentials = credentials.newspaper;

    const libraryStep = await this.library.authenticate(session, credentials.library);
    if (libraryStep.tag === 'captcha_challenge' || libraryStep.tag === 'login_form') {
      return libraryStep;
    }
    return this.newspaper.signIn(session, credentials.newspaper);
  }

  async activatePass(session: BrowserDriver): Promise<StepResult> {
    if (!this.newspaperCredentials) {
      throw new Error(`activatePass called before authenticate on ${this.key}`);
    }
    return this.newspaper.activatePass(session, this.newspaperCredentials);
  }

  describeExpiration(text: string): string | undefined {
    return this.newspaper.describeExpiration(text);
  }

  applyCaptchaToken(session: BrowserDriver, token: string, challenge: CaptchaChallenge): Promise<void> {
    return this.newspaper.applyCaptchaToken(session, token, challenge);
  }
}

export class AdapterRegistry {
  private readonly factories = new Map<string, AdapterFactory>();

  static keyOf(libraryType: string, newspaperType: string): string {
    return `${libraryType}/${newspaperType}`;
  }

  register(libraryType: string, newspaperType: string, factory: AdapterFactory): this {
    this.factories.set(AdapterRegistry.keyOf(libraryType, newspaperType), factory);
    return this;
  }

  has(libraryType: string, newspaperType: string): boolean {
    return this.factories.has(AdapterRegistry.keyOf(libraryType, newspaperType));
  }

  /** Registered keys, sorted. */
  keys(): string[] {
    return [...this.factories.keys()].sort();
  }

  /** @throws UnsupportedAdapterError when the account's pair has no factory. */
  resolve(account: Account): RenewalAdapter {
    const factory = this.factories.get(AdapterRegistry.keyOf(account.library.type, account.newspaperType));
    if (!factory) {
      throw new UnsupportedAdapterError(account.library.type, account.newspaperType);
    }
    return factory(account);
  }
}

// ── Default registrations ──────────────────────────────────

type LibraryCtor = new (context: LibraryAdapterContext, newspaperDomain: string) => LibraryAdapter;

function contextFor(account: Account): LibraryAdapterContext {
  return {
    library: account.library,
    newspaperType: account.newspaperType,
    giftCodeUrl: account.giftCodeUrl,
  };
}

function compose(Library: LibraryCtor, createNewspaper: () => NewspaperAdapter): AdapterFactory {
  return (account) => {
    const newspaper = createNewspaper();
    const context = contextFor(account);
    // An OCLC/custom library whose pass URL is itself a gift link needs no login.
    const library = isGiftCodeUrl(account.library.passUrls[account.newspaperType])
      ? new GiftCodeAdapter(context, newspaper.domain)
      : new Library(context, newspaper.domain);
    return new PassAdapter(AdapterRegistry.keyOf(account.library.type, account.newspaperType), library, newspaper);
  };
}

export function createDefaultRegistry(): AdapterRegistry {
  const registry = new AdapterRegistry();
  const libraries: Record<KnownLibraryType, LibraryCtor> = {
    oclc: OclcAdapter,
    custom: CustomLibraryAdapter,
    gift_code: GiftCodeAdapter,
  };
  const newspapers: Record<KnownNewspaperType, () => NewspaperAdapter> = {
    nyt: () => new NytAdapter(),
    wsj: () => new WsjAdapter(),
  };

  for (const libraryType of KNOWN_LIBRARY_TYPES) {
    for (const newspaperType of KNOWN_NEWSPAPER_TYPES) {
      registry.register(libraryType, newspaperType, compose(libraries[libraryType], newspapers[newspaperType]));
    }
  }
  return registry;
}

export { isGiftCodeUrl } from './giftCodeAdapter';
export { parseSolverCookie } from './baseAdapter';
