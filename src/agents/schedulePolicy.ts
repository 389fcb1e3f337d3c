/**
 * schedulePolicy.ts — When does an account run next?
 *
 * Policy, in priority order:
 *   1. Success (with or without warning) and an extracted expiration
 *      later than the attempt's end: next run = expiration + 1 minute.
 *   2. Anything else, including an expiration already in the past: next run = attempt end + fallback interval + 1 minute.
 *
 * The fallback interval is the account's own override, else its library's
 * default, else FALLBACK_INTERVAL_HOURS.  All arithmetic is on UTC epoch
 * milliseconds; the configured display zone is used only by
 * `describeSchedule()`.
 */

import { DateTime } from 'luxon';
import type {
  Account,
  AccountStatus,
  RenewalAttempt,
  ScheduleEntry,
  Verdict,
} from '../core/types';
import type { RecordStore } from '../services/recordStore';
import { isSuccessful } from '../middleware/outcomeClassifier';

/** Margin added to every computed run so renewal starts after the old grant lapses. */
export const SAFETY_MARGIN_MS = 60_000;

const HOUR_MS = 3_600_000;

type ScheduledAccount = Pick<Account, 'id' | 'renewalHours' | 'library'>;

export function effectiveFallbackHours(account: ScheduledAccount, defaultHours: number): number {
  return account.renewalHours ?? account.library.defaultRenewalHours ?? defaultHours;
}

/** Pure next-run computation for one finished attempt. */
export function computeScheduleEntry(
  account: ScheduledAccount,
  verdict: Verdict,
  endedAt: Date,
  defaultHours: number,
): ScheduleEntry {
  if (isSuccessful(verdict) && verdict.expiration && verdict.expiration.getTime() > endedAt.getTime()) {
    const nextRunAt = new Date(verdict.expiration.getTime() + SAFETY_MARGIN_MS);
    return {
      accountId: account.id,
      nextRunAt,
      policy: 'expiration',
      basis: verdict.expiration,
      effectiveIntervalMs: SAFETY_MARGIN_MS,
    };
  }

  const intervalMs = effectiveFallbackHours(account, defaultHours) * HOUR_MS + SAFETY_MARGIN_MS;
  return {
    accountId: account.id,
    nextRunAt: new Date(endedAt.getTime() + intervalMs),
    policy: 'fallback',
    basis: endedAt,
    effectiveIntervalMs: intervalMs,
  };
}

/** Persisted account status for a verdict. */
export function statusForVerdict(verdict: Verdict): AccountStatus {
  switch (verdict.kind) {
    case 'success':
      return 'renewed';
    case 'success_with_warning':
      return 'renewed_with_warning';
    case 'indeterminate':
      return 'needs_attention';
    case 'failure':
      return ['credentials', 'account_locked', 'library_expired'].includes(verdict.reason)
        ? 'needs_attention'
        : 'failed';
  }
}

/** "24h 1m" style rendering of an interval. */
export function formatEffectiveInterval(ms: number): string {
  const totalMinutes = Math.round(ms / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  if (hours === 0) return `${minutes}m`;
  return minutes === 0 ? `${hours}h` : `${hours}h ${minutes}m`;
}

/** Operator-facing line, e.g. "2025-09-16 00:00 EDT (expiration, +1m)". */
export function describeSchedule(entry: ScheduleEntry, timezone: string): string {
  const local = DateTime.fromJSDate(entry.nextRunAt).setZone(timezone).toFormat('yyyy-LL-dd HH:mm ZZZZ');
  const interval = formatEffectiveInterval(entry.effectiveIntervalMs);
  return entry.policy === 'expiration'
    ? `${local} (expiration, +${interval})`
    : `${local} (fallback, every ${interval})`;
}

export class ExpirationSchedulePolicy {
  constructor(
    private readonly store: RecordStore,
    private readonly fallbackIntervalHours: number,
  ) {}

  plan(account: ScheduledAccount, attempt: RenewalAttempt): ScheduleEntry {
    return computeScheduleEntry(account, attempt.verdict, attempt.endedAt, this.fallbackIntervalHours);
  }

  /**
   * Persist a sealed attempt: one status write carrying the verdict-derived
   * status and the next run, then the attempt record itself.
   */
  async commit(account: Account, attempt: RenewalAttempt): Promise<ScheduleEntry> {
    const entry = this.plan(account, attempt);

    await this.store.saveAccountStatus(account.id, {
      status: statusForVerdict(attempt.verdict),
      nextRunAt: entry.nextRunAt,
      schedulePolicy: entry.policy,
      lastExpiration: attempt.expiration,
      lastAttemptAt: attempt.endedAt,
    });
    await this.store.appendAttempt(attempt);
    return entry;
  }

  /** Park an account whose adapter pair is unknown until the fallback interval passes. */
  async deferUnsupported(account: Account, now: Date): Promise<ScheduleEntry> {
    const intervalMs = effectiveFallbackHours(account, this.fallbackIntervalHours) * HOUR_MS + SAFETY_MARGIN_MS;
    const entry: ScheduleEntry = {
      accountId: account.id,
      nextRunAt: new Date(now.getTime() + intervalMs),
      policy: 'fallback',
      basis: now,
      effectiveIntervalMs: intervalMs,
    };

    await this.store.saveAccountStatus(account.id, {
      status: 'needs_attention',
      nextRunAt: entry.nextRunAt,
      schedulePolicy: 'fallback',
      lastAttemptAt: now,
    });
    return entry;
  }

  /** Next run as stored, or "due now" for accounts never scheduled. */
  entryFor(account: Account, now: Date): ScheduleEntry {
    const nextRunAt = account.nextRunAt ?? now;
    const policy = account.schedulePolicy ?? 'fallback';
    const basis =
      policy === 'expiration' && account.lastExpiration ? account.lastExpiration : account.lastAttemptAt ?? now;
    return {
      accountId: account.id,
      nextRunAt,
      policy,
      basis,
      effectiveIntervalMs: Math.max(0, nextRunAt.getTime() - basis.getTime()),
    };
  }
}
