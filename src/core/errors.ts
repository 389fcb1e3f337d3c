/**
 * errors.ts — Error taxonomy for the renewal engine.
 *
 * Each class carries a stable `code` so the attempt record and the operator
 * CLI can report failures without parsing messages.  Only `RecordStoreError`
 * is fatal at process level; everything raised inside an attempt is turned
 * into a Failure verdict at the state-machine boundary.
 */

export type RenewalErrorCode =
  | 'unsupported_adapter'
  | 'concurrent_renewal'
  | 'proxy_unavailable'
  | 'step_timeout'
  | 'solver_failure'
  | 'account_not_found'
  | 'record_store'
  | 'config';

export class RenewalError extends Error {
  readonly code: RenewalErrorCode;

  constructor(code: RenewalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No adapter is registered for an account's (library, newspaper) pair. */
export class UnsupportedAdapterError extends RenewalError {
  constructor(
    readonly libraryType: string,
    readonly newspaperType: string,
  ) {
    super(
      'unsupported_adapter',
      `No adapter registered for library "${libraryType}" with newspaper "${newspaperType}"`,
    );
  }
}

/** A renewal for this account is already in flight; the new trigger is rejected. */
export class ConcurrentRenewalError extends RenewalError {
  constructor(readonly accountId: string) {
    super(
      'concurrent_renewal',
      `A renewal is already in progress for account ${accountId}; retry after it completes`,
    );
  }
}

/** The SOCKS5 relay could not start, or no lease slot freed up in time. */
export class ProxyUnavailableError extends RenewalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('proxy_unavailable', message, options);
  }
}

/** A bounded wait was exceeded. `stage` names what was being waited on. */
export class StepTimeoutError extends RenewalError {
  constructor(
    readonly stage: string,
    readonly timeoutMs: number,
  ) {
    super('step_timeout', `${stage} did not finish within ${Math.round(timeoutMs / 1000)}s`);
  }
}

/** The CAPTCHA service declined the task, reported an error, or timed out. */
export class SolverFailure extends RenewalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('solver_failure', message, options);
  }
}

export class AccountNotFoundError extends RenewalError {
  constructor(readonly accountId: string) {
    super('account_not_found', `Account ${accountId} does not exist`);
  }
}

/** The record store could not be reached or rejected a query. */
export class RecordStoreError extends RenewalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('record_store', message, options);
  }
}

export class ConfigError extends RenewalError {
  constructor(readonly problems: string[]) {
    super('config', `Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }
}

/** One-line description of anything thrown, for logs and attempt records. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  if (typeof err === 'string') return err;
  return `Non-error value thrown: ${String(err)}`;
}
