/**
 * renewalSession.ts — The per-account renewal state machine.
 *
 *   Idle → SessionStarting → Authenticating → ActivatingPass
 *        → AwaitingCaptcha (only on a challenge) → Classifying
 *        → Finalized(verdict) → Closed
 *
 * `runOnce(accountId)` drives one attempt end to end:
 *
 *   1. Reject the trigger with ConcurrentRenewalError if the account already
 *      has an attempt in flight (checked and marked synchronously).
 *   2. Resolve the adapter pair before any browser starts.
 *   3. Open a browser session and run the steps under one hard wall-clock
 *      deadline that spans Authenticating..Classifying.
 *   4. Any error inside the attempt becomes a Failure verdict from the
 *      classifier with the error captured on the attempt record.
 *   5. Close the browser and release proxy leases on every path, seal the
 *      attempt, and hand it to the schedule policy for the single status
 *      write plus the attempt append.
 *
 * Transitions are logged with the account's friendly name only.
 */

import { randomUUID } from 'crypto';
import type { AdapterRegistry, RenewalAdapter } from '../adapters';
import type { BrowserDriver, BrowserSessionProvider } from '../core/browserDriver';
import {
  AccountNotFoundError,
  ConcurrentRenewalError,
  describeError,
  ProxyUnavailableError,
  SolverFailure,
  StepTimeoutError,
} from '../core/errors';
import { Logger } from '../core/logger';
import {
  systemClock,
  type Account,
  type AttemptError,
  type Clock,
  type RenewalAttempt,
  type ScheduleEntry,
  type SessionState,
  type StepOutcome,
  type StepResult,
  type Verdict,
} from '../core/types';
import type { OutcomeClassifier } from '../middleware/outcomeClassifier';
import type { RecordStore } from '../services/recordStore';
import type { AttemptScreenshots, ScreenshotStore } from '../services/screenshotStore';
import type { CaptchaSolver } from './captchaSolver';
import type { ProxyCredentialManager } from './proxyCredentialManager';
import type { ExpirationSchedulePolicy } from './schedulePolicy';

const logger = new Logger('RenewalEngine');

export interface RenewalEngineDeps {
  store: RecordStore;
  registry: AdapterRegistry;
  browsers: BrowserSessionProvider;
  classifier: OutcomeClassifier;
  proxies: ProxyCredentialManager;
  solver: CaptchaSolver;
  policy: ExpirationSchedulePolicy;
  /** Debug screenshots after each step; omitted outside debug mode. */
  screenshots?: ScreenshotStore;
  clock?: Clock;
}

export interface RenewalEngineOptions {
  /** Hard limit for Authenticating..Classifying. */
  sessionTimeoutMs: number;
  maxCaptchaRounds: number;
}

export interface RenewalOutcome {
  attempt: RenewalAttempt;
  schedule: ScheduleEntry;
}

// ── Attempt bookkeeping ────────────────────────────────────

/** Mutable record of one attempt while it runs; sealed into a RenewalAttempt at the end. */
class AttemptRun {
  readonly id = randomUUID();
  readonly snapshots: StepResult[] = [];
  private readonly steps: StepOutcome[] = [];
  private readonly screenshotPaths: string[] = [];
  state: SessionState = 'Idle';
  session: BrowserDriver | null = null;
  shots: AttemptScreenshots | null = null;
  error: AttemptError | undefined;
  verdict: Verdict | null = null;
  /** Set once the outcome is decided; late work from a timed-out run must stop. */
  finished = false;

  constructor(
    readonly account: Account,
    readonly startedAt: Date,
    private readonly clock: Clock,
  ) {}

  transition(next: SessionState, note?: string): void {
    logger.info(`"${this.account.name}": ${this.state} → ${next}`, note ? { note } : undefined);
    this.state = next;
  }

  async record(result: StepResult): Promise<void> {
    this.snapshots.push(result);
    this.steps.push(
      Object.freeze({
        state: this.state,
        tag: result.tag,
        url: result.url,
        at: this.clock(),
      }),
    );
    logger.debug(`"${this.account.name}" reached ${result.tag}`, { next: result.suggestedNext });

    if (!this.shots || !this.session) return;
    try {
      const image = await this.session.screenshot();
      this.screenshotPaths.push(await this.shots.save(`${this.state}_${result.tag}`, image));
    } catch (err) {
      logger.warn(`Debug screenshot failed for "${this.account.name}": ${describeError(err)}`);
    }
  }

  /** Throw if the deadline already decided this attempt. */
  ensureActive(): void {
    if (this.finished) {
      throw new Error(`Attempt ${this.id} was already finalized`);
    }
  }

  seal(endedAt: Date): RenewalAttempt {
    if (!this.verdict) throw new Error(`Attempt ${this.id} sealed before a verdict was reached`);
    return Object.freeze({
      id: this.id,
      accountId: this.account.id,
      accountName: this.account.name,
      startedAt: this.startedAt,
      endedAt,
      steps: Object.freeze([...this.steps]),
      verdict: this.verdict,
      ...(this.verdict.expiration ? { expiration: this.verdict.expiration } : {}),
      ...(this.error ? { error: this.error } : {}),
      screenshots: Object.freeze([...this.screenshotPaths]),
    });
  }
}

// ── Engine ─────────────────────────────────────────────────

export class RenewalEngine {
  private readonly inFlight = new Set<string>();
  private readonly clock: Clock;

  constructor(
    private readonly deps: RenewalEngineDeps,
    private readonly options: RenewalEngineOptions,
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  isInFlight(accountId: string): boolean {
    return this.inFlight.has(accountId);
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Run one renewal attempt for an account.
   *
   * @throws ConcurrentRenewalError if an attempt for this account is in flight.
   * @throws AccountNotFoundError, UnsupportedAdapterError before any browser opens.
   * @throws RecordStoreError if the result cannot be persisted.
   */
  async runOnce(accountId: string): Promise<RenewalOutcome> {
    if (this.inFlight.has(accountId)) {
      throw new ConcurrentRenewalError(accountId);
    }
    this.inFlight.add(accountId);

    try {
      const account = await this.deps.store.loadAccount(accountId);
      if (!account) throw new AccountNotFoundError(accountId);

      const adapter = this.deps.registry.resolve(account);
      return await this.execute(account, adapter);
    } finally {
      this.inFlight.delete(accountId);
    }
  }

  // ── One attempt ────────────────────────────────────────

  private async execute(account: Account, adapter: RenewalAdapter): Promise<RenewalOutcome> {
    const run = new AttemptRun(account, this.clock(), this.clock);
    logger.info(`Starting renewal for "${account.name}"`, {
      library: adapter.getLibraryName(),
      adapter: adapter.key,
    });

    try {
      const verdict = await this.decide(run, adapter);
      run.verdict = verdict;
      run.transition('Finalized', `${verdict.kind}/${verdict.reason}`);
    } finally {
      await this.teardown(run);
    }

    const attempt = run.seal(this.clock());
    const schedule = await this.deps.policy.commit(account, attempt);

    logger.info(`Renewal finished for "${account.name}"`, {
      verdict: attempt.verdict.kind,
      reason: attempt.verdict.reason,
      expiration: attempt.expiration?.toISOString(),
      nextRun: schedule.nextRunAt.toISOString(),
      policy: schedule.policy,
    });
    return { attempt, schedule };
  }

  /** Never rejects: every error becomes a failure verdict. */
  private async decide(run: AttemptRun, adapter: RenewalAdapter): Promise<Verdict> {
    try {
      run.transition('SessionStarting');
      if (this.deps.screenshots) {
        try {
          run.shots = await this.deps.screenshots.beginAttempt(run.account.name, run.startedAt);
        } catch (err) {
          logger.warn(`Debug screenshots disabled for "${run.account.name}": ${describeError(err)}`);
        }
      }
      run.session = await this.deps.browsers.openSession();
      return await this.withDeadline(run, this.drive(run, adapter, run.session));
    } catch (err) {
      return this.failureFor(run, err);
    }
  }

  private async drive(run: AttemptRun, adapter: RenewalAdapter, session: BrowserDriver): Promise<Verdict> {
    run.transition('Authenticating');
    let step = await adapter.authenticate(session, {
      library: run.account.libraryCredentials,
      newspaper: run.account.newspaperCredentials,
    });
    run.ensureActive();
    await run.record(step);

    let captchaRounds = 0;
    if (step.tag === 'captcha_challenge') {
      captchaRounds += 1;
      await this.solveCaptcha(run, adapter, session, step);
    } else {
      const interim = this.deps.classifier.classify([step]);
      if (interim.kind === 'failure' || step.suggestedNext === 'classify') {
        run.transition('Classifying', 'stopped after sign-in');
        return this.deps.classifier.classify(run.snapshots);
      }
    }

    run.transition('ActivatingPass');
    step = await adapter.activatePass(session);
    run.ensureActive();
    await run.record(step);

    while (step.tag === 'captcha_challenge') {
      if (captchaRounds >= this.options.maxCaptchaRounds) {
        throw new SolverFailure(`CAPTCHA still present after ${captchaRounds} solve rounds`);
      }
      captchaRounds += 1;
      await this.solveCaptcha(run, adapter, session, step);

      run.transition('ActivatingPass', `after CAPTCHA round ${captchaRounds}`);
      step = await adapter.activatePass(session);
      run.ensureActive();
      await run.record(step);
    }

    run.transition('Classifying');
    return this.deps.classifier.classify(run.snapshots);
  }

  /** AwaitingCaptcha: lease a relay credential, solve through it, apply the token. */
  private async solveCaptcha(
    run: AttemptRun,
    adapter: RenewalAdapter,
    session: BrowserDriver,
    step: StepResult,
  ): Promise<void> {
    const challenge = step.captcha;
    if (!challenge) {
      throw new SolverFailure('CAPTCHA page reached without a challenge to submit');
    }

    run.transition('AwaitingCaptcha');
    run.ensureActive();

    const token = await this.deps.proxies.withLease(run.id, (lease, endpoint) => {
      logger.info(`Submitting CAPTCHA for "${run.account.name}" through lease ${lease.id}`);
      return this.deps.solver.solve(challenge, endpoint);
    });

    run.ensureActive();
    await adapter.applyCaptchaToken(session, token, challenge);
  }

  private async withDeadline(run: AttemptRun, work: Promise<Verdict>): Promise<Verdict> {
    const timeoutMs = this.options.sessionTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new StepTimeoutError(`Renewal of "${run.account.name}"`, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
      run.finished = true;
    }
  }

  private failureFor(run: AttemptRun, err: unknown): Verdict {
    run.error = Object.freeze({
      name: err instanceof Error ? err.name : 'Error',
      message: err instanceof Error ? err.message : describeError(err),
      state: run.state,
    });
    logger.error(`Renewal of "${run.account.name}" failed in ${run.state}`, err);

    const { classifier } = this.deps;
    if (err instanceof StepTimeoutError) return classifier.fail('timeout', err.message);
    if (err instanceof ProxyUnavailableError) return classifier.fail('proxy_unavailable', err.message);
    if (err instanceof SolverFailure) return classifier.fail('captcha', err.message);
    return classifier.fail('adapter_error', describeError(err));
  }

  /** Closed: release the browser and any proxy lease, whatever happened before. */
  private async teardown(run: AttemptRun): Promise<void> {
    run.finished = true;

    if (run.session) {
      try {
        await run.session.close();
      } catch (err) {
        logger.warn(`Browser session for "${run.account.name}" did not close cleanly: ${describeError(err)}`);
      }
      run.session = null;
    }

    try {
      await this.deps.proxies.releaseAll(run.id);
    } catch (err) {
      logger.error(`Could not release proxy leases for attempt ${run.id}`, err);
    }

    run.transition('Closed');
  }
}
