import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDefaultRegistry, AdapterRegistry, type RenewalAdapter } from '../adapters';
import { RecordStoreError } from '../core/errors';
import type { Account, StepResult } from '../core/types';
import { OutcomeClassifier } from '../middleware/outcomeClassifier';
import { FakeBrowserProvider } from '../test/fakeBrowser';
import { InMemoryRecordStore, makeAccount } from '../test/inMemoryRecordStore';
import { UnconfiguredSolver } from './captchaSolver';
import { ProxyCredentialManager } from './proxyCredentialManager';
import { RenewalEngine } from './renewalSession';
import { RenewalScheduler } from './renewalScheduler';
import { ExpirationSchedulePolicy } from './schedulePolicy';

const NOW = new Date('2025-09-10T12:00:00Z');

const ACTIVE: StepResult = {
  tag: 'activation_page',
  url: 'https://www.nytimes.com/activate',
  text: 'Your subscription is now active',
  suggestedNext: 'classify',
  capturedAt: NOW,
};

function adapterWith(authenticate: () => Promise<StepResult>): RenewalAdapter {
  return {
    key: 'oclc/nyt',
    getLibraryName: () => 'Springfield Public Library',
    authenticate,
    activatePass: async () => ACTIVE,
    describeExpiration: () => undefined,
    applyCaptchaToken: async () => undefined,
  };
}

const schedulers: RenewalScheduler[] = [];
const proxyManagers: ProxyCredentialManager[] = [];

function setup(
  accounts: Account[],
  adapter: RenewalAdapter = adapterWith(async () => ACTIVE),
  onFatal?: (err: Error) => void,
) {
  const store = new InMemoryRecordStore(accounts);
  const registry = createDefaultRegistry();
  registry.register('oclc', 'nyt', () => adapter);
  const proxies = new ProxyCredentialManager({ bindHost: '127.0.0.1', port: 0, leaseTtlMs: 5_000, acquireTimeoutMs: 1_000 });
  proxyManagers.push(proxies);
  const policy = new ExpirationSchedulePolicy(store, 24);
  const engine = new RenewalEngine(
    {
      store,
      registry,
      browsers: new FakeBrowserProvider(),
      classifier: new OutcomeClassifier({ timezone: 'America/New_York' }),
      proxies,
      solver: new UnconfiguredSolver(),
      policy,
      clock: () => NOW,
    },
    { sessionTimeoutMs: 1_000, maxCaptchaRounds: 3 },
  );
  const scheduler = new RenewalScheduler(engine, store, policy, {
    tickMs: 20,
    maxConcurrent: 2,
    clock: () => NOW,
    onFatal,
  });
  schedulers.push(scheduler);
  return { store, engine, scheduler };
}

afterEach(async () => {
  await Promise.all(schedulers.splice(0).map((scheduler) => scheduler.stop()));
  await Promise.all(proxyManagers.splice(0).map((manager) => manager.shutdown()));
});

describe('RenewalScheduler', () => {
  it('runs enabled accounts whose next run has passed', async () => {
    const { scheduler, store } = setup([
      makeAccount({ id: 'due' }),
      makeAccount({ id: 'overdue', nextRunAt: new Date(NOW.getTime() - 1) }),
      makeAccount({ id: 'later', nextRunAt: new Date(NOW.getTime() + 3_600_000) }),
      makeAccount({ id: 'off', enabled: false }),
    ]);

    const ran = await scheduler.runDueRenewals();

    expect(ran).toEqual(['due', 'overdue']);
    expect(store.attempts.map((attempt) => attempt.accountId).sort()).toEqual(['due', 'overdue']);
    expect(store.accounts.get('due')?.nextRunAt?.toISOString()).toBe('2025-09-11T12:01:00.000Z');
    expect(scheduler.isQueued('due')).toBe(false);
  });

  it('does not run an account again until its next run', async () => {
    const { scheduler } = setup([makeAccount()]);

    expect(await scheduler.runDueRenewals()).toEqual(['acct-1']);
    expect(await scheduler.runDueRenewals()).toEqual([]);
  });

  it('never runs more renewals at once than maxConcurrent', async () => {
    const gates: Array<() => void> = [];
    let current = 0;
    let peak = 0;
    const gated = adapterWith(async () => {
      current += 1;
      peak = Math.max(peak, current);
      await new Promise<void>((resolve) => gates.push(resolve));
      current -= 1;
      return ACTIVE;
    });
    const { scheduler, store } = setup(
      ['a', 'b', 'c', 'd'].map((id) => makeAccount({ id })),
      gated,
    );

    const running = scheduler.runDueRenewals();
    await vi.waitFor(() => expect(gates).toHaveLength(2));
    for (let released = 0; released < 4; released++) {
      await vi.waitFor(() => expect(gates.length).toBeGreaterThan(released));
      expect(current).toBeLessThanOrEqual(2);
      gates[released]();
    }

    expect((await running).sort()).toEqual(['a', 'b', 'c', 'd']);
    expect(peak).toBe(2);
    expect(store.attempts).toHaveLength(4);
  });

  it('does not rerun an account whose pass reports an expiration in the past', async () => {
    const lapsed: StepResult = { ...ACTIVE, text: 'Your pass is active. Access expires 09/01/2025 11:59 PM' };
    const { scheduler, store } = setup([makeAccount()], adapterWith(async () => lapsed));

    expect(await scheduler.runDueRenewals()).toEqual(['acct-1']);
    expect(await scheduler.runDueRenewals()).toEqual([]);

    expect(store.attempts).toHaveLength(1);
    expect(store.accounts.get('acct-1')?.nextRunAt?.toISOString()).toBe('2025-09-11T12:01:00.000Z');
  });

  it('skips an account that is already renewing', async () => {
    let finish: (result: StepResult) => void = () => undefined;
    const pending = new Promise<StepResult>((resolve) => {
      finish = resolve;
    });
    const { scheduler, engine } = setup([makeAccount()], adapterWith(() => pending));

    const manual = engine.runOnce('acct-1');
    expect(await scheduler.runDueRenewals()).toEqual([]);

    finish(ACTIVE);
    await manual;
  });

  it('parks accounts without an adapter', async () => {
    const { scheduler, store } = setup([makeAccount({ newspaperType: 'guardian' })]);

    await scheduler.runDueRenewals();

    const account = store.accounts.get('acct-1');
    expect(account?.status).toBe('needs_attention');
    expect(account?.nextRunAt?.toISOString()).toBe('2025-09-11T12:01:00.000Z');
    expect(store.attempts).toHaveLength(0);
  });

  it('reports the next run, or null for an unknown account', async () => {
    const { scheduler } = setup([makeAccount({ nextRunAt: new Date('2025-09-16T04:00:00Z') })]);

    expect((await scheduler.nextRun('acct-1'))?.nextRunAt.toISOString()).toBe('2025-09-16T04:00:00.000Z');
    expect(await scheduler.nextRun('missing')).toBeNull();
  });

  it('fires due renewals from its own loop', async () => {
    const { scheduler, store } = setup([makeAccount()]);

    scheduler.start();
    await vi.waitFor(() => expect(store.attempts).toHaveLength(1));
    await scheduler.stop();

    expect(scheduler.isRunning).toBe(false);
  });

  it('waits for a running renewal when stopped', async () => {
    let finish: (result: StepResult) => void = () => undefined;
    const pending = new Promise<StepResult>((resolve) => {
      finish = resolve;
    });
    const { scheduler, engine, store } = setup([makeAccount()], adapterWith(() => pending));

    scheduler.start();
    await vi.waitFor(() => expect(engine.isInFlight('acct-1')).toBe(true));

    const stopping = scheduler.stop();
    finish(ACTIVE);
    await stopping;

    expect(store.attempts).toHaveLength(1);
  });

  it('stops and reports when the record store is unreachable', async () => {
    const fatal: Error[] = [];
    const { scheduler, store } = setup([makeAccount()], undefined, (err) => fatal.push(err));
    store.unreachable = true;

    scheduler.start();
    await vi.waitFor(() => expect(fatal).toHaveLength(1));

    expect(fatal[0]).toBeInstanceOf(RecordStoreError);
    expect(scheduler.isRunning).toBe(false);
  });
});

describe('AdapterRegistry overrides', () => {
  it('replaces a default registration', () => {
    const registry = createDefaultRegistry();
    const adapter = adapterWith(async () => ACTIVE);
    registry.register('oclc', 'nyt', () => adapter);

    expect(registry.resolve(makeAccount())).toBe(adapter);
    expect(registry.keys()).toHaveLength(6);
    expect(AdapterRegistry.keyOf('oclc', 'nyt')).toBe('oclc/nyt');
  });
});
