/**
 * types.ts — Shared type definitions for the renewal engine.
 *
 * Adapters, the classifier, the state machine, the scheduler and the record
 * store all exchange these shapes.  All instants are `Date` objects holding
 * UTC time; conversion to a display zone happens only when formatting.
 */

// ─── Accounts ──────────────────────────────────────────────

export interface Credentials {
  username: string;
  password: string;
}

/** Library types with a built-in adapter. Records may name others; lookup then fails. */
export const KNOWN_LIBRARY_TYPES = ['oclc', 'custom', 'gift_code'] as const;
export const KNOWN_NEWSPAPER_TYPES = ['nyt', 'wsj'] as const;

export type KnownLibraryType = (typeof KNOWN_LIBRARY_TYPES)[number];
export type KnownNewspaperType = (typeof KNOWN_NEWSPAPER_TYPES)[number];

/** Optional CSS selectors for libraries whose login form is non-standard. */
export interface LoginSelectors {
  username?: string;
  password?: string;
  submit?: string;
}

/** The library that sponsors the pass, and where its login lives. */
export interface LibraryProfile {
  id: string;
  /** Adapter variant, e.g. "oclc". */
  type: string;
  name: string;
  /** Login page for `custom` libraries. */
  loginUrl?: string;
  /** Per-newspaper entry URL, keyed by newspaper type ("nyt" → EZproxy link). */
  passUrls: Record<string, string>;
  selectors?: LoginSelectors;
  /** Library-wide fallback interval in hours. */
  defaultRenewalHours?: number;
}

export type AccountStatus =
  | 'pending'
  | 'in_progress'
  | 'renewed'
  | 'renewed_with_warning'
  | 'failed'
  | 'needs_attention';

/** One (library + newspaper) pairing that gets renewed. */
export interface Account {
  id: string;
  /** Friendly name; the only account identity that appears in logs. */
  name: string;
  newspaperType: string;
  library: LibraryProfile;
  libraryCredentials: Credentials;
  newspaperCredentials: Credentials;
  /** Redemption link for `gift_code` libraries. */
  giftCodeUrl?: string;
  enabled: boolean;
  /** Per-account fallback interval override, in hours. */
  renewalHours?: number;
  status: AccountStatus;
  lastExpiration?: Date;
  nextRunAt?: Date;
  schedulePolicy?: SchedulePolicy;
  lastAttemptAt?: Date;
}

/** The single write applied to an account after each attempt. */
export interface AccountStatusUpdate {
  status: AccountStatus;
  nextRunAt: Date;
  schedulePolicy: SchedulePolicy;
  /** `undefined` keeps the stored value. */
  lastExpiration?: Date;
  lastAttemptAt: Date;
}

// ─── Step results ──────────────────────────────────────────

export type StepTag =
  | 'login_form'
  | 'library_portal'
  | 'newspaper_portal'
  | 'activation_page'
  | 'captcha_challenge'
  | 'success_page'
  | 'already_subscribed'
  | 'error_page'
  | 'unknown';

/** What the adapter thinks the state machine should do next. */
export type NextAction = 'activate' | 'solve_captcha' | 'classify';

/** A DataDome-style challenge as seen in the page. */
export interface CaptchaChallenge {
  kind: 'datadome';
  /** `src` of the challenge iframe. */
  captchaUrl: string;
  /** Page the challenge was served on. */
  websiteUrl: string;
  userAgent: string;
}

/** Snapshot of the page after one adapter step. */
export interface StepResult {
  tag: StepTag;
  url: string;
  /** Visible page text; the classifier's primary input. */
  text: string;
  html?: string;
  /** Site-specific excerpt that states the pass expiration, when found. */
  expirationText?: string;
  captcha?: CaptchaChallenge;
  suggestedNext: NextAction;
  capturedAt: Date;
}

// ─── Verdicts ──────────────────────────────────────────────

export type VerdictKind = 'success' | 'success_with_warning' | 'failure' | 'indeterminate';

export type ReasonCode =
  | 'pass_active'
  | 'pass_claimed'
  | 'direct_subscription'
  | 'credentials'
  | 'account_locked'
  | 'access_denied'
  | 'library_expired'
  | 'geo_restricted'
  | 'maintenance'
  | 'captcha'
  | 'proxy_unavailable'
  | 'timeout'
  | 'adapter_error'
  | 'no_match';

/** Created only by the outcome classifier (see middleware/outcomeClassifier). */
export interface Verdict {
  readonly kind: VerdictKind;
  readonly reason: ReasonCode;
  readonly message: string;
  /** 0–1; rule matches carry the rule's confidence, indeterminate is 0. */
  readonly confidence: number;
  readonly ruleId?: string;
  readonly expiration?: Date;
}

// ─── Attempts ──────────────────────────────────────────────

export type SessionState =
  | 'Idle'
  | 'SessionStarting'
  | 'Authenticating'
  | 'ActivatingPass'
  | 'AwaitingCaptcha'
  | 'Classifying'
  | 'Finalized'
  | 'Closed';

export interface StepOutcome {
  readonly state: SessionState;
  readonly tag: StepTag;
  readonly url: string;
  readonly at: Date;
  readonly note?: string;
}

export interface AttemptError {
  readonly name: string;
  readonly message: string;
  /** State the machine was in when the error surfaced. */
  readonly state: SessionState;
}

/** One sealed execution record, handed to the record store when finished. */
export interface RenewalAttempt {
  readonly id: string;
  readonly accountId: string;
  readonly accountName: string;
  readonly startedAt: Date;
  readonly endedAt: Date;
  readonly steps: readonly StepOutcome[];
  readonly verdict: Verdict;
  readonly expiration?: Date;
  readonly error?: AttemptError;
  readonly screenshots: readonly string[];
}

// ─── Scheduling ────────────────────────────────────────────

export type SchedulePolicy = 'expiration' | 'fallback';

export interface ScheduleEntry {
  accountId: string;
  nextRunAt: Date;
  policy: SchedulePolicy;
  /** Instant the policy measured from: the expiration, or the attempt end. */
  basis: Date;
  /** nextRunAt − basis, in milliseconds. */
  effectiveIntervalMs: number;
}

// ─── Proxy leases ──────────────────────────────────────────

/** Where the CAPTCHA service should connect, and with what credentials. */
export interface ProxyEndpoint {
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface ProxyLease {
  readonly id: string;
  readonly attemptId: string;
  readonly username: string;
  readonly password: string;
  readonly port: number;
  readonly createdAt: Date;
  readonly ttlMs: number;
  readonly expiresAt: Date;
}

/** Pluggable "now"; tests pass a fixed clock. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
