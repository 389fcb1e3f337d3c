import { describe, it, expect } from 'vitest';
import { loadRenewalConfig, validateRenewalConfig } from './config';

const SUPABASE = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
};

describe('loadRenewalConfig', () => {
  it('fills defaults from an empty environment', () => {
    const config = loadRenewalConfig({});

    expect(config).toMatchObject({
      timezone: 'America/New_York',
      dateLocale: 'en-US',
      fallbackIntervalHours: 24,
      schedulerTickMs: 30_000,
      maxConcurrentRenewals: 2,
      sessionTimeoutMs: 300_000,
      renewalSpeed: 'normal',
      headless: true,
      proxyBindHost: '0.0.0.0',
      proxyPort: 3333,
      proxyLeaseTtlMs: 180_000,
      debug: false,
      screenshotRetention: 10,
    });
    expect(config.capsolverApiKey).toBeUndefined();
    expect(config.supabaseUrl).toBeUndefined();
  });

  it('reads flags, blank strings and unknown speeds', () => {
    const config = loadRenewalConfig({
      BROWSER_HEADLESS: 'false',
      RENEWAL_DEBUG: 'yes',
      RENEWAL_SPEED: 'Ludicrous',
      CAPSOLVER_API_KEY: '   ',
      PROXY_HOST: 'relay.example.com',
    });

    expect(config.headless).toBe(false);
    expect(config.debug).toBe(true);
    expect(config.renewalSpeed).toBe('normal');
    expect(config.capsolverApiKey).toBeUndefined();
    expect(config.proxyPublicHost).toBe('relay.example.com');
  });
});

describe('validateRenewalConfig', () => {
  it('accepts a complete configuration', () => {
    const report = validateRenewalConfig(
      loadRenewalConfig({
        ...SUPABASE,
        CAPSOLVER_API_KEY: 'test-key',
        CAPSOLVER_USER_AGENT: 'test-agent/1.0',
        PROXY_HOST: 'relay.example.com',
        PROXY_LEASE_TTL_SECONDS: '180',
      }),
    );

    expect(report).toEqual({ errors: [], warnings: [] });
  });

  it('rejects an unknown timezone and a missing record store', () => {
    const report = validateRenewalConfig(loadRenewalConfig({ TZ: 'Mars/Olympus_Mons' }));

    expect(report.errors).toEqual([
      'TZ "Mars/Olympus_Mons" is not a valid IANA timezone',
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set',
    ]);
  });

  it('rejects non-positive numbers and an out-of-range port', () => {
    const report = validateRenewalConfig(
      loadRenewalConfig({ ...SUPABASE, FALLBACK_INTERVAL_HOURS: '0', SCREENSHOT_RETENTION: 'many', SOCKS5_PROXY_PORT: '70000' }),
    );

    expect(report.errors).toEqual([
      'FALLBACK_INTERVAL_HOURS must be a positive integer',
      'SCREENSHOT_RETENTION must be a positive integer',
      'SOCKS5_PROXY_PORT must be between 1 and 65535',
    ]);
  });

  it('requires a public proxy host once a solver key is set', () => {
    const report = validateRenewalConfig(
      loadRenewalConfig({ ...SUPABASE, CAPSOLVER_API_KEY: 'test-key', PROXY_LEASE_TTL_SECONDS: '60' }),
    );

    expect(report.errors).toEqual(['PROXY_HOST must be set when CAPSOLVER_API_KEY is configured']);
    expect(report.warnings).toEqual([
      'CAPSOLVER_USER_AGENT is not set; the solver will receive the browser default',
      'PROXY_LEASE_TTL_SECONDS is shorter than CAPTCHA_TIMEOUT_SECONDS',
    ]);
  });

  it('gives a lease that outlives the CAPTCHA timeout by default', () => {
    const config = loadRenewalConfig({ ...SUPABASE });

    expect(config.proxyLeaseTtlMs).toBeGreaterThan(config.captchaTimeoutMs);
    expect(validateRenewalConfig(config).warnings).toEqual([
      'CAPSOLVER_API_KEY is not set; attempts that hit a CAPTCHA will fail',
    ]);
  });

  it('warns about a missing solver key and heavy concurrency', () => {
    const report = validateRenewalConfig(
      loadRenewalConfig({ ...SUPABASE, MAX_CONCURRENT_RENEWALS: '8', PROXY_LEASE_TTL_SECONDS: '120' }),
    );

    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([
      'MAX_CONCURRENT_RENEWALS above 5 runs many browsers at once',
      'CAPSOLVER_API_KEY is not set; attempts that hit a CAPTCHA will fail',
    ]);
  });
});
