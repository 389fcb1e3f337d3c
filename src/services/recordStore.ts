/**
 * recordStore.ts — The narrow persistence contract the renewal engine depends on.
 *
 * Implementations must apply `saveAccountStatus` as one atomic write, so
 * readers never see a status from one attempt next to a next-run time from
 * another.  Any failure to reach the store surfaces as `RecordStoreError`.
 */

import type { Account, AccountStatusUpdate, RenewalAttempt } from '../core/types';

export interface RecordStore {
  /** Resolves null when no account has this id. */
  loadAccount(id: string): Promise<Account | null>;
  listAccounts(): Promise<Account[]>;
  saveAccountStatus(id: string, update: AccountStatusUpdate): Promise<void>;
  appendAttempt(attempt: RenewalAttempt): Promise<void>;
  /** Newest first. */
  listAttempts(accountId: string, limit: number): Promise<RenewalAttempt[]>;
}
