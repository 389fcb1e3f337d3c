#!/usr/bin/env node
/**
 * cli.ts — Operator entry point.
 *
 *   pass-renewer start                    run the scheduler until SIGINT/SIGTERM
 *   pass-renewer renew <accountId>        renew one account now
 *   pass-renewer next <accountId>         show the next scheduled run
 *   pass-renewer list                     every account with status and next run
 *   pass-renewer history <accountId> [n]  the n most recent attempts (default 10)
 *   pass-renewer check-config             validate the environment and exit
 */

import { DateTime } from 'luxon';
import { loadRenewalConfig, validateRenewalConfig, type RenewalConfig } from './core/config';
import { describeError } from './core/errors';
import type { RenewalAttempt } from './core/types';
import { RenewalDaemon } from './renewalDaemon';

const USAGE =
  'Usage: pass-renewer <command>\n' +
  '  start                       run the renewal scheduler\n' +
  '  renew <accountId>           renew one account now\n' +
  '  next <accountId>            show the next scheduled run\n' +
  '  list                        list accounts with status and next run\n' +
  '  history <accountId> [limit] show recent attempts\n' +
  '  check-config                validate configuration';

const DAEMON_COMMANDS = ['renew', 'next', 'list', 'history'];

function formatInstant(date: Date | undefined, timezone: string): string {
  if (!date) return '—';
  return DateTime.fromJSDate(date).setZone(timezone).toFormat('yyyy-LL-dd HH:mm ZZZZ');
}

function formatAttempt(attempt: RenewalAttempt, timezone: string): string {
  const { verdict } = attempt;
  const parts = [
    formatInstant(attempt.startedAt, timezone),
    `${verdict.kind}/${verdict.reason}`,
    attempt.expiration ? `expires ${formatInstant(attempt.expiration, timezone)}` : '',
    attempt.error ? `error ${attempt.error.name} in ${attempt.error.state}` : '',
  ];
  return `  ${parts.filter(Boolean).join('  ')}\n    ${verdict.message}`;
}

function requireArg(value: string | undefined, command: string): string {
  if (!value) {
    console.error(`"${command}" needs an account id\n\n${USAGE}`);
    process.exit(1);
  }
  return value;
}

function checkConfig(config: RenewalConfig): boolean {
  const report = validateRenewalConfig(config);
  for (const warning of report.warnings) console.log(`⚠ ${warning}`);
  for (const error of report.errors) console.error(`✗ ${error}`);
  if (report.errors.length === 0) console.log('✓ Configuration is valid');
  return report.errors.length === 0;
}

/** Run one command; resolves the process exit code. */
export async function runCommand(argv: string[], daemon?: RenewalDaemon): Promise<number> {
  const [command, first, second] = argv;

  if (command === 'check-config') {
    return checkConfig(daemon?.config ?? loadRenewalConfig()) ? 0 : 1;
  }
  if (!command || !DAEMON_COMMANDS.includes(command)) {
    console.error(USAGE);
    return 1;
  }

  const renewer = daemon ?? new RenewalDaemon();
  const tz = renewer.config.timezone;

  switch (command) {
    case 'renew': {
      const { attempt, schedule } = await renewer.renewNow(requireArg(first, command));
      console.log(`✓ ${attempt.accountName}: ${attempt.verdict.kind} (${attempt.verdict.reason})`);
      console.log(`  ${attempt.verdict.message}`);
      console.log(`  Next run: ${formatInstant(schedule.nextRunAt, tz)} [${schedule.policy}]`);
      return attempt.verdict.kind === 'failure' ? 2 : 0;
    }

    case 'next': {
      const view = await renewer.nextRun(requireArg(first, command));
      if (!view) {
        console.error(`✗ Account ${first} does not exist`);
        return 1;
      }
      console.log(view.display);
      return 0;
    }

    case 'list': {
      const accounts = await renewer.listAccounts();
      if (accounts.length === 0) console.log('No accounts configured');
      for (const account of accounts) {
        const enabled = account.enabled ? '' : ' [disabled]';
        console.log(`${account.name} (${account.library} → ${account.newspaperType})${enabled}`);
        console.log(`  status:     ${account.status}`);
        console.log(`  expires:    ${formatInstant(account.lastExpiration, tz)}`);
        console.log(`  next run:   ${account.nextRunDisplay}`);
      }
      return 0;
    }

    case 'history': {
      const limit = second ? parseInt(second, 10) : 10;
      if (!Number.isInteger(limit) || limit <= 0) {
        console.error(`✗ limit must be a positive integer, got "${second}"`);
        return 1;
      }
      const attempts = await renewer.history(requireArg(first, command), limit);
      if (attempts.length === 0) console.log('No attempts recorded');
      for (const attempt of attempts) console.log(formatAttempt(attempt, tz));
      return 0;
    }

    default:
      console.error(USAGE);
      return 1;
  }
}

// ─── CLI entry point ───────────────────────────────────────

const isDirectRun = require.main === module;
if (isDirectRun) {
  const argv = process.argv.slice(2);

  if (argv[0] === 'start') {
    let daemon: RenewalDaemon;
    try {
      daemon = new RenewalDaemon();
      daemon.start();
    } catch (err) {
      console.error('\n✗ Startup failed:', describeError(err));
      process.exit(1);
    }

    const shutdown = (signal: string): void => {
      console.log(`\n${signal} received, stopping…`);
      daemon
        .stop()
        .then(() => process.exit(process.exitCode ?? 0))
        .catch((err: unknown) => {
          console.error('\n✗ Shutdown failed:', describeError(err));
          process.exit(1);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } else {
    let daemon: RenewalDaemon | undefined;
    Promise.resolve()
      .then(() => {
        if (DAEMON_COMMANDS.includes(argv[0] ?? '')) daemon = new RenewalDaemon();
        return runCommand(argv, daemon);
      })
      .then((code) => {
        process.exitCode = code;
      })
      .catch((err: unknown) => {
        console.error('\n✗ Command failed:', describeError(err));
        process.exitCode = 1;
      })
      .finally(() =>
        daemon?.stop().catch((err: unknown) => {
          console.error('\n✗ Shutdown failed:', describeError(err));
          process.exitCode = 1;
        }),
      );
  }
}
