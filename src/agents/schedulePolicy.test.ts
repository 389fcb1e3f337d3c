import { describe, it, expect } from 'vitest';
import type { RenewalAttempt } from '../core/types';
import { OutcomeClassifier } from '../middleware/outcomeClassifier';
import { InMemoryRecordStore, makeAccount } from '../test/inMemoryRecordStore';
import {
  computeScheduleEntry,
  describeSchedule,
  effectiveFallbackHours,
  ExpirationSchedulePolicy,
  formatEffectiveInterval,
  SAFETY_MARGIN_MS,
  statusForVerdict,
} from './schedulePolicy';

const classifier = new OutcomeClassifier({
  timezone: 'America/New_York',
  reference: new Date('2025-09-01T12:00:00Z'),
});

const endedAt = new Date('2025-09-10T12:00:00Z');

const withExpiration = classifier.classify([
  {
    tag: 'activation_page',
    url: 'https://www.nytimes.com/activate',
    text: 'Your pass is active. Access expires 09/15/2025 11:59 PM EST',
    suggestedNext: 'classify',
    capturedAt: endedAt,
  },
]);
const withoutExpiration = classifier.classify([
  {
    tag: 'activation_page',
    url: 'https://www.nytimes.com/activate',
    text: 'Your subscription is now active',
    suggestedNext: 'classify',
    capturedAt: endedAt,
  },
]);

function attemptFor(accountId: string, verdict = withExpiration): RenewalAttempt {
  return {
    id: 'attempt-1',
    accountId,
    accountName: 'Main NYT',
    startedAt: new Date(endedAt.getTime() - 60_000),
    endedAt,
    steps: [],
    verdict,
    ...(verdict.expiration ? { expiration: verdict.expiration } : {}),
    screenshots: [],
  };
}

describe('computeScheduleEntry', () => {
  it('schedules one minute after an extracted expiration', () => {
    const entry = computeScheduleEntry(makeAccount(), withExpiration, endedAt, 24);

    expect(entry.policy).toBe('expiration');
    expect(entry.basis.toISOString()).toBe('2025-09-16T03:59:00.000Z');
    expect(entry.nextRunAt.toISOString()).toBe('2025-09-16T04:00:00.000Z');
    expect(entry.effectiveIntervalMs).toBe(SAFETY_MARGIN_MS);
  });

  it('falls back to the default interval plus a minute when no expiration was found', () => {
    const entry = computeScheduleEntry(makeAccount(), withoutExpiration, endedAt, 24);

    expect(entry.policy).toBe('fallback');
    expect(entry.nextRunAt.toISOString()).toBe('2025-09-11T12:01:00.000Z');
    expect(formatEffectiveInterval(entry.effectiveIntervalMs)).toBe('24h 1m');
  });

  it('falls back when the extracted expiration has already passed', () => {
    const lapsed = classifier.classify([
      {
        tag: 'activation_page',
        url: 'https://www.nytimes.com/activate',
        text: 'Your pass is active. Access expires 09/01/2025 11:59 PM',
        suggestedNext: 'classify',
        capturedAt: endedAt,
      },
    ]);
    expect(lapsed.expiration?.toISOString()).toBe('2025-09-02T03:59:00.000Z');

    const entry = computeScheduleEntry(makeAccount(), lapsed, endedAt, 24);

    expect(entry.policy).toBe('fallback');
    expect(entry.basis).toEqual(endedAt);
    expect(entry.nextRunAt.toISOString()).toBe('2025-09-11T12:01:00.000Z');
  });

  it('uses the fallback for failures and indeterminate verdicts', () => {
    const failure = computeScheduleEntry(makeAccount(), classifier.fail('timeout', 'slow'), endedAt, 24);
    const unknown = computeScheduleEntry(makeAccount(), classifier.classify([]), endedAt, 24);

    expect(failure.policy).toBe('fallback');
    expect(unknown.policy).toBe('fallback');
    expect(unknown.nextRunAt).toEqual(failure.nextRunAt);
  });

  it('never schedules at or before the attempt end', () => {
    for (const hours of [1, 6, 24, 72]) {
      const entry = computeScheduleEntry(makeAccount({ renewalHours: hours }), withoutExpiration, endedAt, 24);
      expect(entry.nextRunAt.getTime()).toBeGreaterThan(endedAt.getTime());
      expect(entry.nextRunAt.getTime() - endedAt.getTime()).toBe(hours * 3_600_000 + SAFETY_MARGIN_MS);
    }
  });
});

describe('effectiveFallbackHours', () => {
  it('prefers the account override, then the library default, then the global default', () => {
    const library = { ...makeAccount().library, defaultRenewalHours: 12 };

    expect(effectiveFallbackHours(makeAccount({ renewalHours: 6, library }), 24)).toBe(6);
    expect(effectiveFallbackHours(makeAccount({ library }), 24)).toBe(12);
    expect(effectiveFallbackHours(makeAccount(), 24)).toBe(24);
  });
});

describe('statusForVerdict', () => {
  it('maps verdicts to account statuses', () => {
    expect(statusForVerdict(withExpiration)).toBe('renewed');
    expect(statusForVerdict(classifier.classify([]))).toBe('needs_attention');
    expect(statusForVerdict(classifier.fail('credentials', 'bad pin'))).toBe('needs_attention');
    expect(statusForVerdict(classifier.fail('timeout', 'slow'))).toBe('failed');
  });
});

describe('formatEffectiveInterval', () => {
  it('renders hours and minutes', () => {
    expect(formatEffectiveInterval(60_000)).toBe('1m');
    expect(formatEffectiveInterval(24 * 3_600_000)).toBe('24h');
    expect(formatEffectiveInterval(24 * 3_600_000 + 60_000)).toBe('24h 1m');
  });
});

describe('describeSchedule', () => {
  it('shows the next run in the display zone', () => {
    const entry = computeScheduleEntry(makeAccount(), withExpiration, endedAt, 24);

    expect(describeSchedule(entry, 'America/New_York')).toBe('2025-09-16 00:00 EDT (expiration, +1m)');
  });

  it('shows the fallback interval', () => {
    const entry = computeScheduleEntry(makeAccount(), withoutExpiration, endedAt, 24);

    expect(describeSchedule(entry, 'UTC')).toBe('2025-09-11 12:01 UTC (fallback, every 24h 1m)');
  });
});

describe('ExpirationSchedulePolicy', () => {
  it('writes the status and next run together, then appends the attempt', async () => {
    const account = makeAccount();
    const store = new InMemoryRecordStore([account]);
    const policy = new ExpirationSchedulePolicy(store, 24);

    const entry = await policy.commit(account, attemptFor(account.id));

    expect(store.statusWrites).toHaveLength(1);
    expect(store.statusWrites[0].update).toEqual({
      status: 'renewed',
      nextRunAt: entry.nextRunAt,
      schedulePolicy: 'expiration',
      lastExpiration: new Date('2025-09-16T03:59:00.000Z'),
      lastAttemptAt: endedAt,
    });
    expect(store.attempts).toHaveLength(1);
  });

  it('parks an unsupported account for the fallback interval', async () => {
    const account = makeAccount();
    const store = new InMemoryRecordStore([account]);
    const policy = new ExpirationSchedulePolicy(store, 24);

    const entry = await policy.deferUnsupported(account, endedAt);

    expect(entry.nextRunAt.toISOString()).toBe('2025-09-11T12:01:00.000Z');
    expect(store.accounts.get(account.id)?.status).toBe('needs_attention');
    expect(store.attempts).toHaveLength(0);
  });

  it('treats a never-scheduled account as due now', () => {
    const policy = new ExpirationSchedulePolicy(new InMemoryRecordStore(), 24);
    const now = new Date('2025-09-10T00:00:00Z');

    const entry = policy.entryFor(makeAccount(), now);

    expect(entry.nextRunAt).toEqual(now);
    expect(entry.policy).toBe('fallback');
  });
});
