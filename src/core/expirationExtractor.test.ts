import { describe, it, expect } from 'vitest';
import { extractExpiration, type ExpirationOptions } from './expirationExtractor';

const NY: ExpirationOptions = { timezone: 'America/New_York', reference: new Date('2025-09-01T12:00:00Z') };

function iso(text: string, options: ExpirationOptions = NY): string | undefined {
  return extractExpiration(text, options)?.toISOString();
}

describe('extractExpiration', () => {
  it('reads a US numeric date with a zone abbreviation', () => {
    expect(iso('Access expires 09/15/2025 11:59 PM EST')).toBe('2025-09-16T03:59:00.000Z');
  });

  it('reads a long-form NYT sentence in the user timezone', () => {
    expect(iso('Your pass is active and will expire on August 7th, 2025 at 10:12 PM.')).toBe(
      '2025-08-08T02:12:00.000Z',
    );
  });

  it('uses midnight when no time is given', () => {
    expect(iso('Valid until Mar 15, 2026')).toBe('2026-03-15T04:00:00.000Z');
  });

  it('keeps an explicit ISO offset', () => {
    expect(iso('expires: 2026-03-15T23:59:00-04:00')).toBe('2026-03-16T03:59:00.000Z');
  });

  it('uses the zone named in the text over the configured one', () => {
    expect(iso('Expires 09/15/2025 11:59 PM PT')).toBe('2025-09-16T06:59:00.000Z');
  });

  it('does not read the year after a bare month as a day', () => {
    expect(iso('Your access expires June 2026')).toBeUndefined();
  });

  it('rolls a year-less date past the reference into next year', () => {
    expect(iso('Active until March 15')).toBe('2026-03-15T04:00:00.000Z');
  });

  it('reads day-first numeric dates for non-US locales', () => {
    expect(iso('Expires 05/10/2025', { ...NY, timezone: 'Europe/London', locale: 'en-GB' })).toBe(
      '2025-10-04T23:00:00.000Z',
    );
  });

  it('ignores dates that are not next to an expiry keyword', () => {
    expect(iso('Published 09/01/2025. © 2025 The Newspaper')).toBeUndefined();
  });

  it('skips a keyword with no date and keeps searching', () => {
    expect(iso('Offer expires after 30 days. Your access is valid through 10/01/2025')).toBe(
      '2025-10-01T04:00:00.000Z',
    );
  });

  it('rejects impossible times', () => {
    expect(iso('Expires 09/15/2025 13:00 PM')).toBeUndefined();
  });
});
