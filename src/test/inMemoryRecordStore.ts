/** In-process RecordStore for tests. */

import { RecordStoreError } from '../core/errors';
import type { Account, AccountStatusUpdate, RenewalAttempt } from '../core/types';
import type { RecordStore } from '../services/recordStore';

export class InMemoryRecordStore implements RecordStore {
  readonly accounts = new Map<string, Account>();
  readonly attempts: RenewalAttempt[] = [];
  readonly statusWrites: Array<{ id: string; update: AccountStatusUpdate }> = [];
  /** When set, every call rejects with RecordStoreError. */
  unreachable = false;

  constructor(accounts: Account[] = []) {
    for (const account of accounts) this.accounts.set(account.id, account);
  }

  async loadAccount(id: string): Promise<Account | null> {
    this.check();
    return this.accounts.get(id) ?? null;
  }

  async listAccounts(): Promise<Account[]> {
    this.check();
    return [...this.accounts.values()];
  }

  async saveAccountStatus(id: string, update: AccountStatusUpdate): Promise<void> {
    this.check();
    const account = this.accounts.get(id);
    if (!account) throw new RecordStoreError(`No account ${id}`);

    this.statusWrites.push({ id, update });
    this.accounts.set(id, {
      ...account,
      status: update.status,
      nextRunAt: update.nextRunAt,
      schedulePolicy: update.schedulePolicy,
      lastExpiration: update.lastExpiration ?? account.lastExpiration,
      lastAttemptAt: update.lastAttemptAt,
    });
  }

  async appendAttempt(attempt: RenewalAttempt): Promise<void> {
    this.check();
    this.attempts.push(attempt);
  }

  async listAttempts(accountId: string, limit: number): Promise<RenewalAttempt[]> {
    this.check();
    return this.attempts
      .filter((attempt) => attempt.accountId === accountId)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit);
  }

  private check(): void {
    if (this.unreachable) throw new RecordStoreError('store offline');
  }
}

/** An enabled oclc/nyt account; override any field. */
export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 'acct-1',
    name: 'Main NYT',
    newspaperType: 'nyt',
    library: {
      id: 'lib-1',
      type: 'oclc',
      name: 'Springfield Public Library',
      passUrls: { nyt: 'https://springfield.idm.oclc.org/login?url=https://www.nytimes.com/activate' },
    },
    libraryCredentials: { username: '21234000000000', password: 'test-pin' },
    newspaperCredentials: { username: 'reader@example.com', password: 'test-secret' },
    enabled: true,
    status: 'pending',
    ...overrides,
  };
}
