/**
 * renewalDaemon.ts — Builds one instance of every component and exposes the operator surface.
 *
 *   Scheduler ──fires──▶ RenewalEngine ──drives──▶ adapters (browser)
 *                              │                       │ CAPTCHA?
 *                              │                       ▼
 *                              │            ProxyCredentialManager + CapSolver
 *                              ▼
 *                       OutcomeClassifier ──▶ ExpirationSchedulePolicy ──▶ RecordStore
 *
 * Nothing here is a module-level singleton: the CLI (or a test) owns the
 * daemon, and the daemon owns the scheduler, the browser, and the relay.
 */

import { createClient } from '@supabase/supabase-js';
import { AdapterRegistry, createDefaultRegistry } from './adapters';
import {
  CapSolverClient,
  describeSchedule,
  ExpirationSchedulePolicy,
  formatEffectiveInterval,
  ProxyCredentialManager,
  RenewalEngine,
  RenewalScheduler,
  UnconfiguredSolver,
  type CaptchaSolver,
  type RenewalOutcome,
} from './agents';
import type { BrowserSessionProvider } from './core/browserDriver';
import { BrowserManager } from './core/browserManager';
import { loadRenewalConfig, validateRenewalConfig, type RenewalConfig } from './core/config';
import { ConfigError, describeError } from './core/errors';
import { Logger } from './core/logger';
import { systemClock, type AccountStatus, type Clock, type RenewalAttempt, type SchedulePolicy } from './core/types';
import { OutcomeClassifier } from './middleware';
import type { RecordStore } from './services/recordStore';
import { ScreenshotStore } from './services/screenshotStore';
import { SupabaseRecordStore } from './services/supabaseRecordStore';

const logger = new Logger('RenewalDaemon');

/** Collaborators a caller may supply instead of the production ones. */
export interface DaemonOverrides {
  store?: RecordStore;
  browsers?: BrowserSessionProvider;
  registry?: AdapterRegistry;
  solver?: CaptchaSolver;
  clock?: Clock;
  /** Called when the record store becomes unreachable. Default: stop and set exit code 1. */
  onFatal?: (err: Error) => void;
}

export interface AccountSummary {
  id: string;
  name: string;
  library: string;
  newspaperType: string;
  enabled: boolean;
  /** `in_progress` while an attempt is running, otherwise the stored status. */
  status: AccountStatus;
  lastExpiration?: Date;
  nextRunAt: Date;
  policy: SchedulePolicy;
  /** e.g. "24h 1m". */
  effectiveInterval: string;
  /** Next run in the configured display zone. */
  nextRunDisplay: string;
}

export interface NextRunView {
  accountId: string;
  nextRunAt: Date;
  policy: SchedulePolicy;
  effectiveInterval: string;
  display: string;
}

export class RenewalDaemon {
  readonly config: RenewalConfig;
  readonly engine: RenewalEngine;
  readonly scheduler: RenewalScheduler;
  private readonly store: RecordStore;
  private readonly browsers: BrowserSessionProvider;
  private readonly proxies: ProxyCredentialManager;
  private readonly policy: ExpirationSchedulePolicy;
  private readonly clock: Clock;

  constructor(config: RenewalConfig = loadRenewalConfig(), overrides: DaemonOverrides = {}) {
    this.config = config;
    this.clock = overrides.clock ?? systemClock;

    this.store = overrides.store ?? createSupabaseStore(config);
    this.browsers = overrides.browsers ?? new BrowserManager(config);
    this.proxies = new ProxyCredentialManager({
      bindHost: config.proxyBindHost,
      port: config.proxyPort,
      publicHost: config.proxyPublicHost,
      leaseTtlMs: config.proxyLeaseTtlMs,
      acquireTimeoutMs: config.proxyAcquireTimeoutMs,
      clock: this.clock,
    });
    this.policy = new ExpirationSchedulePolicy(this.store, config.fallbackIntervalHours);

    const solver =
      overrides.solver ??
      (config.capsolverApiKey
        ? new CapSolverClient({ apiKey: config.capsolverApiKey, timeoutMs: config.captchaTimeoutMs })
        : new UnconfiguredSolver());

    this.engine = new RenewalEngine(
      {
        store: this.store,
        registry: overrides.registry ?? createDefaultRegistry(),
        browsers: this.browsers,
        classifier: new OutcomeClassifier({ timezone: config.timezone, locale: config.dateLocale }),
        proxies: this.proxies,
        solver,
        policy: this.policy,
        screenshots: config.debug ? new ScreenshotStore(config.screenshotDir, config.screenshotRetention) : undefined,
        clock: this.clock,
      },
      { sessionTimeoutMs: config.sessionTimeoutMs, maxCaptchaRounds: config.maxCaptchaRounds },
    );

    this.scheduler = new RenewalScheduler(this.engine, this.store, this.policy, {
      tickMs: config.schedulerTickMs,
      maxConcurrent: config.maxConcurrentRenewals,
      clock: this.clock,
      onFatal: overrides.onFatal ?? ((err) => this.failFatally(err)),
    });
  }

  // ── Lifecycle ──────────────────────────────────────────

  /** Validate configuration and start the scheduler loop. */
  start(): void {
    const report = validateRenewalConfig(this.config);
    for (const warning of report.warnings) logger.warn(warning);
    if (report.errors.length > 0) throw new ConfigError(report.errors);

    logger.info(`Renewal daemon starting (TZ=${this.config.timezone})`);
    this.scheduler.start();
  }

  /** Stop scheduling, wait for running renewals, release the relay and the browser. */
  async stop(): Promise<void> {
    await this.scheduler.stop();
    await this.proxies.shutdown();
    await this.browsers.shutdown();
    logger.info('Renewal daemon stopped');
  }

  // ── Operator surface ───────────────────────────────────

  async listAccounts(): Promise<AccountSummary[]> {
    const now = this.clock();
    const accounts = await this.store.listAccounts();

    return accounts.map((account) => {
      const entry = this.policy.entryFor(account, now);
      return {
        id: account.id,
        name: account.name,
        library: account.library.name,
        newspaperType: account.newspaperType,
        enabled: account.enabled,
        status: this.engine.isInFlight(account.id) ? 'in_progress' : account.status,
        lastExpiration: account.lastExpiration,
        nextRunAt: entry.nextRunAt,
        policy: entry.policy,
        effectiveInterval: formatEffectiveInterval(entry.effectiveIntervalMs),
        nextRunDisplay: describeSchedule(entry, this.config.timezone),
      };
    });
  }

  /** Renew now. Rejects with ConcurrentRenewalError if the account is already renewing. */
  renewNow(accountId: string): Promise<RenewalOutcome> {
    logger.info(`Manual renewal requested for account ${accountId}`);
    return this.engine.runOnce(accountId);
  }

  async nextRun(accountId: string): Promise<NextRunView | null> {
    const entry = await this.scheduler.nextRun(accountId);
    if (!entry) return null;
    return {
      accountId,
      nextRunAt: entry.nextRunAt,
      policy: entry.policy,
      effectiveInterval: formatEffectiveInterval(entry.effectiveIntervalMs),
      display: describeSchedule(entry, this.config.timezone),
    };
  }

  history(accountId: string, limit = 10): Promise<RenewalAttempt[]> {
    return this.store.listAttempts(accountId, limit);
  }

  // ── Internals ──────────────────────────────────────────

  private failFatally(err: Error): void {
    logger.error('Record store is unreachable; shutting down', err);
    process.exitCode = 1;
    this.stop().catch((stopErr: unknown) => logger.error(`Shutdown after fatal error failed: ${describeError(stopErr)}`));
  }
}

function createSupabaseStore(config: RenewalConfig): RecordStore {
  if (config.supabaseUrl && config.supabaseKey) {
    return new SupabaseRecordStore(
      createClient(config.supabaseUrl, config.supabaseKey, { auth: { persistSession: false } }),
    );
  }
  return new SupabaseRecordStore();
}
