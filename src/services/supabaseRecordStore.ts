/**
 * supabaseRecordStore.ts — RecordStore backed by Supabase (PostgREST).
 *
 * Tables (see supabase/migrations): `libraries`, `accounts` and
 * `renewal_attempts`.  Rows are snake_case; this class maps them to the
 * camelCase domain types and validates every field it reads, since the
 * client is untyped.  Each status save is a single UPDATE of one row.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { RecordStoreError } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  Account,
  AccountStatus,
  AccountStatusUpdate,
  AttemptError,
  Credentials,
  LibraryProfile,
  LoginSelectors,
  ReasonCode,
  RenewalAttempt,
  SchedulePolicy,
  SessionState,
  StepOutcome,
  StepTag,
  Verdict,
  VerdictKind,
} from '../core/types';
import type { RecordStore } from './recordStore';

const logger = new Logger('SupabaseRecordStore');

const ACCOUNT_COLUMNS = '*, library:libraries(*)';

export class SupabaseRecordStore implements RecordStore {
  private readonly client: SupabaseClient;

  /**
   * @param client - An existing client, or `undefined` to build one from
   *   SUPABASE_URL + SUPABASE_SERVICE_ROLE_KEY.
   */
  constructor(client?: SupabaseClient) {
    if (client) {
      this.client = client;
    } else {
      const url = process.env.SUPABASE_URL;
      const key = process.env.SUPABASE_SERVICE_ROLE_KEY;

      if (!url || !key) {
        throw new RecordStoreError(
          'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in the environment.  See .env.example.',
        );
      }
      this.client = createClient(url, key, { auth: { persistSession: false } });
    }
  }

  // ── Accounts ─────────────────────────────────────────────

  async loadAccount(id: string): Promise<Account | null> {
    const { data, error } = await this.client
      .from('accounts')
      .select(ACCOUNT_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error) throw new RecordStoreError(`loadAccount(${id}) failed: ${error.message}`);
    const row: unknown = data;
    return row === null ? null : rowToAccount(row);
  }

  async listAccounts(): Promise<Account[]> {
    const { data, error } = await this.client
      .from('accounts')
      .select(ACCOUNT_COLUMNS)
      .order('name', { ascending: true });

    if (error) throw new RecordStoreError(`listAccounts failed: ${error.message}`);
    const rows: unknown = data;
    return asArray(rows, 'accounts').map(rowToAccount);
  }

  async saveAccountStatus(id: string, update: AccountStatusUpdate): Promise<void> {
    const row: Record<string, unknown> = {
      status: update.status,
      next_run_at: update.nextRunAt.toISOString(),
      schedule_policy: update.schedulePolicy,
      last_attempt_at: update.lastAttemptAt.toISOString(),
      updated_at: new Date().toISOString(),
    };
    if (update.lastExpiration) {
      row.last_expiration = update.lastExpiration.toISOString();
    }

    const { error } = await this.client.from('accounts').update(row).eq('id', id);
    if (error) throw new RecordStoreError(`saveAccountStatus(${id}) failed: ${error.message}`);

    logger.debug(`Saved status for account ${id}`, { status: update.status, policy: update.schedulePolicy });
  }

  // ── Attempts ─────────────────────────────────────────────

  async appendAttempt(attempt: RenewalAttempt): Promise<void> {
    const { error } = await this.client.from('renewal_attempts').insert({
      id: attempt.id,
      account_id: attempt.accountId,
      account_name: attempt.accountName,
      started_at: attempt.startedAt.toISOString(),
      ended_at: attempt.endedAt.toISOString(),
      steps: attempt.steps.map((step) => ({ ...step, at: step.at.toISOString() })),
      verdict_kind: attempt.verdict.kind,
      reason: attempt.verdict.reason,
      message: attempt.verdict.message,
      confidence: attempt.verdict.confidence,
      rule_id: attempt.verdict.ruleId ?? null,
      expiration: attempt.expiration?.toISOString() ?? null,
      error: attempt.error ?? null,
      screenshots: [...attempt.screenshots],
    });

    if (error) throw new RecordStoreError(`appendAttempt(${attempt.id}) failed: ${error.message}`);
  }

  async listAttempts(accountId: string, limit: number): Promise<RenewalAttempt[]> {
    const { data, error } = await this.client
      .from('renewal_attempts')
      .select('*')
      .eq('account_id', accountId)
      .order('started_at', { ascending: false })
      .limit(limit);

    if (error) throw new RecordStoreError(`listAttempts(${accountId}) failed: ${error.message}`);
    const rows: unknown = data;
    return asArray(rows, 'renewal_attempts').map(rowToAttempt);
  }
}

// ── Row mapping ────────────────────────────────────────────

type Row = Record<string, unknown>;

const ACCOUNT_STATUSES: readonly AccountStatus[] = [
  'pending',
  'in_progress',
  'renewed',
  'renewed_with_warning',
  'failed',
  'needs_attention',
];
const VERDICT_KINDS: readonly VerdictKind[] = ['success', 'success_with_warning', 'failure', 'indeterminate'];
const REASON_CODES: readonly ReasonCode[] = [
  'pass_active',
  'pass_claimed',
  'direct_subscription',
  'credentials',
  'account_locked',
  'access_denied',
  'library_expired',
  'geo_restricted',
  'maintenance',
  'captcha',
  'proxy_unavailable',
  'timeout',
  'adapter_error',
  'no_match',
];
const SESSION_STATES: readonly SessionState[] = [
  'Idle',
  'SessionStarting',
  'Authenticating',
  'ActivatingPass',
  'AwaitingCaptcha',
  'Classifying',
  'Finalized',
  'Closed',
];
const STEP_TAGS: readonly StepTag[] = [
  'login_form',
  'library_portal',
  'newspaper_portal',
  'activation_page',
  'captcha_challenge',
  'success_page',
  'already_subscribed',
  'error_page',
  'unknown',
];
const POLICIES: readonly SchedulePolicy[] = ['expiration', 'fallback'];

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRow(value: unknown, what: string): Row {
  if (!isRow(value)) throw new RecordStoreError(`Malformed ${what} row`);
  return value;
}

function asArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) throw new RecordStoreError(`Expected a list of ${what} rows`);
  return value;
}

function str(row: Row, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') throw new RecordStoreError(`Column ${key} is missing or not text`);
  return value;
}

function optStr(row: Row, key: string): string | undefined {
  const value = row[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optNum(row: Row, key: string): number | undefined {
  const value = row[key];
  return typeof value === 'number' ? value : undefined;
}

function optDate(row: Row, key: string): Date | undefined {
  const value = optStr(row, key);
  if (!value) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new RecordStoreError(`Column ${key} is not a timestamp`);
  return date;
}

function date(row: Row, key: string): Date {
  const value = optDate(row, key);
  if (!value) throw new RecordStoreError(`Column ${key} is missing`);
  return value;
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function stringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRow(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key] = entry;
  }
  return result;
}

function selectors(value: unknown): LoginSelectors | undefined {
  if (!isRow(value)) return undefined;
  return {
    username: optStr(value, 'username'),
    password: optStr(value, 'password'),
    submit: optStr(value, 'submit'),
  };
}

function rowToLibrary(value: unknown): LibraryProfile {
  const row = asRow(value, 'libraries');
  return {
    id: str(row, 'id'),
    type: str(row, 'type'),
    name: str(row, 'name'),
    loginUrl: optStr(row, 'login_url'),
    passUrls: stringMap(row.pass_urls),
    selectors: selectors(row.selectors),
    defaultRenewalHours: optNum(row, 'default_renewal_hours'),
  };
}

function credentials(row: Row, prefix: string): Credentials {
  return {
    username: optStr(row, `${prefix}_username`) ?? '',
    password: optStr(row, `${prefix}_password`) ?? '',
  };
}

function rowToAccount(value: unknown): Account {
  const row = asRow(value, 'accounts');
  return {
    id: str(row, 'id'),
    name: str(row, 'name'),
    newspaperType: str(row, 'newspaper_type'),
    library: rowToLibrary(row.library),
    libraryCredentials: credentials(row, 'library'),
    newspaperCredentials: credentials(row, 'newspaper'),
    giftCodeUrl: optStr(row, 'gift_code_url'),
    enabled: row.enabled !== false,
    renewalHours: optNum(row, 'renewal_hours'),
    status: oneOf(ACCOUNT_STATUSES, row.status, 'pending'),
    lastExpiration: optDate(row, 'last_expiration'),
    nextRunAt: optDate(row, 'next_run_at'),
    schedulePolicy: POLICIES.find((policy) => policy === row.schedule_policy),
    lastAttemptAt: optDate(row, 'last_attempt_at'),
  };
}

function rowToStep(value: unknown): StepOutcome {
  const row = asRow(value, 'step');
  return {
    state: oneOf(SESSION_STATES, row.state, 'Idle'),
    tag: oneOf(STEP_TAGS, row.tag, 'unknown'),
    url: optStr(row, 'url') ?? '',
    at: date(row, 'at'),
    note: optStr(row, 'note'),
  };
}

function rowToError(value: unknown): AttemptError | undefined {
  if (!isRow(value)) return undefined;
  return {
    name: optStr(value, 'name') ?? 'Error',
    message: optStr(value, 'message') ?? '',
    state: oneOf(SESSION_STATES, value.state, 'Idle'),
  };
}

function rowToAttempt(value: unknown): RenewalAttempt {
  const row = asRow(value, 'renewal_attempts');
  const expiration = optDate(row, 'expiration');
  const verdict: Verdict = {
    kind: oneOf(VERDICT_KINDS, row.verdict_kind, 'indeterminate'),
    reason: oneOf(REASON_CODES, row.reason, 'no_match'),
    message: optStr(row, 'message') ?? '',
    confidence: optNum(row, 'confidence') ?? 0,
    ruleId: optStr(row, 'rule_id'),
    expiration,
  };

  return {
    id: str(row, 'id'),
    accountId: str(row, 'account_id'),
    accountName: optStr(row, 'account_name') ?? '',
    startedAt: date(row, 'started_at'),
    endedAt: date(row, 'ended_at'),
    steps: Array.isArray(row.steps) ? row.steps.map(rowToStep) : [],
    verdict,
    expiration,
    error: rowToError(row.error),
    screenshots: Array.isArray(row.screenshots)
      ? row.screenshots.filter((entry): entry is string => typeof entry === 'string')
      : [],
  };
}
