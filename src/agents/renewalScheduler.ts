/**
 * renewalScheduler.ts — Background loop that fires due renewals.
 *
 * Every tick lists the accounts, picks the enabled ones whose next run has
 * passed, and queues each on a Bottleneck limiter whose `maxConcurrent` is
 * the worker-pool bound (each renewal holds a browser).  An account is
 * queued at most once at a time and never while a manual renewal for it is
 * in flight, so attempts for one account run one after another.
 *
 * Failures of a single account are logged and never stop the loop; only a
 * RecordStoreError (the store is unreachable) is fatal.  One instance is
 * built by the daemon and passed to whatever needs it.
 */

import Bottleneck from 'bottleneck';
import {
  AccountNotFoundError,
  ConcurrentRenewalError,
  describeError,
  RecordStoreError,
  UnsupportedAdapterError,
} from '../core/errors';
import { Logger } from '../core/logger';
import { systemClock, type Account, type Clock, type ScheduleEntry } from '../core/types';
import type { RecordStore } from '../services/recordStore';
import type { RenewalEngine } from './renewalSession';
import type { ExpirationSchedulePolicy } from './schedulePolicy';

const logger = new Logger('RenewalScheduler');

export interface RenewalSchedulerOptions {
  tickMs: number;
  maxConcurrent: number;
  /** Called once when the loop stops on a fatal store error. */
  onFatal?: (err: Error) => void;
  clock?: Clock;
}

export class RenewalScheduler {
  private readonly limiter: Bottleneck;
  private readonly clock: Clock;
  private readonly queued = new Set<string>();
  private readonly active = new Set<Promise<void>>();
  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<void> | null = null;
  private running = false;
  private halted = false;

  constructor(
    private readonly engine: RenewalEngine,
    private readonly store: RecordStore,
    private readonly policy: ExpirationSchedulePolicy,
    private readonly options: RenewalSchedulerOptions,
  ) {
    this.limiter = new Bottleneck({ maxConcurrent: options.maxConcurrent });
    this.clock = options.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Start ticking; the first tick runs immediately. */
  start(): void {
    if (this.running || this.halted) return;
    this.running = true;
    logger.info(`Scheduler started (tick ${Math.round(this.options.tickMs / 1000)}s, ${this.options.maxConcurrent} workers)`);
    this.scheduleTick(0);
  }

  /** Stop ticking, drop queued renewals and wait for running ones to finish. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.ticking) await this.ticking;

    if (!this.halted) {
      this.halted = true;
      await this.limiter.stop({ dropWaitingJobs: true });
    }
    await Promise.allSettled([...this.active]);
    logger.info('Scheduler stopped');
  }

  /** Queue every due account and wait until those renewals finish. Returns the ids queued. */
  async runDueRenewals(): Promise<string[]> {
    const jobs = await this.enqueueDue();
    await Promise.all(jobs.map(([, done]) => done));
    return jobs.map(([accountId]) => accountId);
  }

  /** Next run for an account, or null when the account does not exist. */
  async nextRun(accountId: string): Promise<ScheduleEntry | null> {
    const account = await this.store.loadAccount(accountId);
    return account ? this.policy.entryFor(account, this.clock()) : null;
  }

  isQueued(accountId: string): boolean {
    return this.queued.has(accountId);
  }

  // ── Loop ───────────────────────────────────────────────

  private scheduleTick(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.ticking = this.tick().finally(() => {
        this.ticking = null;
        if (this.running) this.scheduleTick(this.options.tickMs);
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    try {
      const jobs = await this.enqueueDue();
      if (jobs.length > 0) logger.info(`${jobs.length} renewal(s) queued`);
    } catch (err) {
      this.handleError(err, 'listing accounts');
    }
  }

  private async enqueueDue(): Promise<Array<[string, Promise<void>]>> {
    if (this.halted) return [];

    const now = this.clock().getTime();
    const accounts = await this.store.listAccounts();
    const due = accounts.filter(
      (account) =>
        account.enabled &&
        (account.nextRunAt === undefined || account.nextRunAt.getTime() <= now) &&
        !this.queued.has(account.id) &&
        !this.engine.isInFlight(account.id),
    );

    return due.map((account): [string, Promise<void>] => [account.id, this.enqueue(account)]);
  }

  /** Queue one renewal; the returned promise settles when it is done and never rejects. */
  private enqueue(account: Account): Promise<void> {
    this.queued.add(account.id);
    logger.debug(`Queued "${account.name}"`);

    const done: Promise<void> = this.limiter
      .schedule(() => this.engine.runOnce(account.id))
      .then(
        () => undefined,
        (err: unknown) => this.onRenewalError(account, err),
      )
      .finally(() => {
        this.queued.delete(account.id);
        this.active.delete(done);
      });

    this.active.add(done);
    return done;
  }

  private async onRenewalError(account: Account, err: unknown): Promise<void> {
    if (err instanceof ConcurrentRenewalError) {
      logger.info(`"${account.name}" is already renewing; skipped this run`);
      return;
    }
    if (err instanceof UnsupportedAdapterError) {
      logger.warn(`"${account.name}" has no adapter: ${err.message}`);
      try {
        const entry = await this.policy.deferUnsupported(account, this.clock());
        logger.info(`"${account.name}" parked until ${entry.nextRunAt.toISOString()}`);
      } catch (storeErr) {
        this.handleError(storeErr, `parking "${account.name}"`);
      }
      return;
    }
    if (err instanceof AccountNotFoundError) {
      logger.warn(`"${account.name}" was removed before its renewal ran`);
      return;
    }
    if (err instanceof Bottleneck.BottleneckError) {
      logger.debug(`Dropped queued renewal for "${account.name}" on shutdown`);
      return;
    }
    this.handleError(err, `renewing "${account.name}"`);
  }

  private handleError(err: unknown, during: string): void {
    if (err instanceof RecordStoreError) {
      logger.error(`Record store unreachable while ${during}; stopping scheduler`, err);
      this.running = false;
      if (this.timer) {
        clearTimeout(this.timer);
        this.timer = null;
      }
      this.options.onFatal?.(err);
      return;
    }
    logger.error(`Unexpected error while ${during}: ${describeError(err)}`, err);
  }
}
