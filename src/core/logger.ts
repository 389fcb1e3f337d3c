/**
 * logger.ts — Natural-language progress logger for the renewal engine.
 *
 * Every line carries an ISO timestamp, an uppercase level and the module
 * context, followed by optional `key=value` fields:
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [RenewalEngine] Renewal finished for "Main NYT" verdict=success
 *
 * Field values whose key names a secret are printed as `[redacted]`.  Callers
 * log account friendly names and lease ids, never raw credentials.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEY = /password|^pass$|secret|token|api[-_]?key|credential|cookie/i;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/** Threshold read once per process from LOG_LEVEL; unknown values mean "info". */
function thresholdFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let threshold: LogLevel = thresholdFromEnv();

/** Override the level threshold (the CLI's `--verbose` flag and tests use this). */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('Scheduler');
 *   logger.info('2 accounts due, queueing renewals…');
 */
export class Logger {
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Selector probing, relay handshakes, poll ticks. */
  debug(message: string, fields?: LogFields): void {
    this.emit('debug', message, fields);
  }

  /** Routine progress: state transitions, verdicts, next runs. */
  info(message: string, fields?: LogFields): void {
    this.emit('info', message, fields);
  }

  /** Something unexpected but non-fatal: indeterminate verdict, missing solver key. */
  warn(message: string, fields?: LogFields): void {
    this.emit('warn', message, fields);
  }

  /** A hard failure: browser crash, record store unreachable, relay bind error. */
  error(message: string, err?: unknown, fields?: LogFields): void {
    this.emit('error', message, fields);
    if (err && LEVEL_ORDER[threshold] <= LEVEL_ORDER.debug) {
      console.error(err);
    } else if (err instanceof Error) {
      console.error(`  ↳ ${err.name}: ${err.message}`);
    }
  }

  /** A child logger whose context is `Parent:child`. */
  child(suffix: string): Logger {
    return new Logger(`${this.context}:${suffix}`);
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    const suffix = fields ? formatFields(fields) : '';
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}${suffix}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

/** Render fields as ` key=value`, masking anything whose key looks secret. */
export function formatFields(fields: LogFields): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const shown = SENSITIVE_KEY.test(key) ? '[redacted]' : String(value);
    parts.push(`${key}=${/\s/.test(shown) ? JSON.stringify(shown) : shown}`);
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}
