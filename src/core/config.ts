/**
 * config.ts — Environment-driven configuration for the renewal daemon.
 *
 * `loadRenewalConfig()` never throws: it fills defaults and leaves judgement
 * to `validateRenewalConfig()`, which the CLI's `check-config` command and
 * the daemon's startup both call.
 */

import { IANAZone } from 'luxon';

export type RenewalSpeed = 'fast' | 'normal' | 'slow';

export interface RenewalConfig {
  // Time
  timezone: string;
  dateLocale: string;

  // Scheduling
  fallbackIntervalHours: number;
  schedulerTickMs: number;
  maxConcurrentRenewals: number;

  // Sessions
  sessionTimeoutMs: number;
  renewalSpeed: RenewalSpeed;
  maxCaptchaRounds: number;
  chromeExecutablePath?: string;
  headless: boolean;
  browserUserAgent?: string;

  // CAPTCHA service
  capsolverApiKey?: string;
  captchaTimeoutMs: number;

  // SOCKS5 relay
  proxyBindHost: string;
  proxyPort: number;
  proxyPublicHost?: string;
  proxyLeaseTtlMs: number;
  proxyAcquireTimeoutMs: number;

  // Debug artifacts
  debug: boolean;
  screenshotDir: string;
  screenshotRetention: number;

  // Record store
  supabaseUrl?: string;
  supabaseKey?: string;
}

export interface ConfigReport {
  errors: string[];
  warnings: string[];
}

const SPEEDS: readonly RenewalSpeed[] = ['fast', 'normal', 'slow'];

function isSpeed(value: string): value is RenewalSpeed {
  return SPEEDS.some((speed) => speed === value);
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function blankToUndefined(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/** Build a RenewalConfig from the environment with defaults. */
export function loadRenewalConfig(env: NodeJS.ProcessEnv = process.env): RenewalConfig {
  const speed = (env.RENEWAL_SPEED ?? 'normal').toLowerCase();

  return {
    timezone: env.TZ ?? 'America/New_York',
    dateLocale: env.DATE_LOCALE ?? 'en-US',

    fallbackIntervalHours: parseInt(env.FALLBACK_INTERVAL_HOURS ?? '24', 10),
    schedulerTickMs: parseInt(env.SCHEDULER_TICK_SECONDS ?? '30', 10) * 1000,
    maxConcurrentRenewals: parseInt(env.MAX_CONCURRENT_RENEWALS ?? '2', 10),

    sessionTimeoutMs: parseInt(env.SESSION_TIMEOUT_SECONDS ?? '300', 10) * 1000,
    renewalSpeed: isSpeed(speed) ? speed : 'normal',
    maxCaptchaRounds: parseInt(env.MAX_CAPTCHA_ROUNDS ?? '3', 10),
    chromeExecutablePath: blankToUndefined(env.CHROME_EXECUTABLE_PATH),
    headless: flag(env.BROWSER_HEADLESS, true),
    browserUserAgent: blankToUndefined(env.CAPSOLVER_USER_AGENT),

    capsolverApiKey: blankToUndefined(env.CAPSOLVER_API_KEY),
    captchaTimeoutMs: parseInt(env.CAPTCHA_TIMEOUT_SECONDS ?? '120', 10) * 1000,

    proxyBindHost: env.PROXY_BIND_HOST ?? '0.0.0.0',
    proxyPort: parseInt(env.SOCKS5_PROXY_PORT ?? '3333', 10),
    proxyPublicHost: blankToUndefined(env.PROXY_HOST),
    proxyLeaseTtlMs: parseInt(env.PROXY_LEASE_TTL_SECONDS ?? '180', 10) * 1000,
    proxyAcquireTimeoutMs: parseInt(env.PROXY_ACQUIRE_TIMEOUT_SECONDS ?? '30', 10) * 1000,

    debug: flag(env.RENEWAL_DEBUG, false),
    screenshotDir: env.SCREENSHOT_DIR ?? './data/screenshots',
    screenshotRetention: parseInt(env.SCREENSHOT_RETENTION ?? '10', 10),

    supabaseUrl: blankToUndefined(env.SUPABASE_URL),
    supabaseKey: blankToUndefined(env.SUPABASE_SERVICE_ROLE_KEY),
  };
}

/** Check ranges and cross-field requirements. Errors block startup; warnings do not. */
export function validateRenewalConfig(config: RenewalConfig): ConfigReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!IANAZone.isValidZone(config.timezone)) {
    errors.push(`TZ "${config.timezone}" is not a valid IANA timezone`);
  }

  const positive: Array<[string, number]> = [
    ['FALLBACK_INTERVAL_HOURS', config.fallbackIntervalHours],
    ['SCHEDULER_TICK_SECONDS', config.schedulerTickMs],
    ['MAX_CONCURRENT_RENEWALS', config.maxConcurrentRenewals],
    ['SESSION_TIMEOUT_SECONDS', config.sessionTimeoutMs],
    ['MAX_CAPTCHA_ROUNDS', config.maxCaptchaRounds],
    ['CAPTCHA_TIMEOUT_SECONDS', config.captchaTimeoutMs],
    ['PROXY_LEASE_TTL_SECONDS', config.proxyLeaseTtlMs],
    ['PROXY_ACQUIRE_TIMEOUT_SECONDS', config.proxyAcquireTimeoutMs],
    ['SCREENSHOT_RETENTION', config.screenshotRetention],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  if (!Number.isInteger(config.proxyPort) || config.proxyPort < 1 || config.proxyPort > 65_535) {
    errors.push('SOCKS5_PROXY_PORT must be between 1 and 65535');
  }

  if (config.maxConcurrentRenewals > 5) {
    warnings.push('MAX_CONCURRENT_RENEWALS above 5 runs many browsers at once');
  }

  if (!config.capsolverApiKey) {
    warnings.push('CAPSOLVER_API_KEY is not set; attempts that hit a CAPTCHA will fail');
  } else {
    if (!config.proxyPublicHost) {
      errors.push('PROXY_HOST must be set when CAPSOLVER_API_KEY is configured');
    }
    if (!config.browserUserAgent) {
      warnings.push('CAPSOLVER_USER_AGENT is not set; the solver will receive the browser default');
    }
  }

  if (config.proxyLeaseTtlMs < config.captchaTimeoutMs) {
    warnings.push('PROXY_LEASE_TTL_SECONDS is shorter than CAPTCHA_TIMEOUT_SECONDS');
  }

  if (!config.supabaseUrl || !config.supabaseKey) {
    errors.push('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set');
  }

  return { errors, warnings };
}
