/**
 * expirationExtractor.ts — Find the pass expiration in page text and return it as a UTC instant.
 *
 * Newspaper confirmation pages state the end of the grant in many shapes:
 *
 *   "Your pass is active and will expire on August 7th, 2025 at 10:12 PM."
 *   "Access expires 09/15/2025 11:59 PM EST"
 *   "Valid until Mar 15, 2026"
 *   "expires: 2026-03-15T23:59:00-04:00"
 *
 * The search is anchored on expiry keywords so unrelated dates on the page
 * (article bylines, copyright years) are ignored.  Wall-clock values are
 * interpreted in an explicit IANA zone, never the server's local zone: a US
 * zone abbreviation next to the time selects that region's zone (so "EST"
 * in September still resolves with daylight saving, the way the sites use
 * it), otherwise the configured user timezone applies.
 */

import { DateTime, Info } from 'luxon';

export interface ExpirationOptions {
  /** IANA zone used when the text carries no zone of its own. */
  timezone: string;
  /** Drives month names and day/month order of numeric dates. Default "en-US". */
  locale?: string;
  /** Anchor for dates written without a year. Default: now. */
  reference?: Date;
}

// ── Zone abbreviations ─────────────────────────────────────

const ZONE_ABBREVIATIONS: Record<string, string> = {
  et: 'America/New_York',
  est: 'America/New_York',
  edt: 'America/New_York',
  ct: 'America/Chicago',
  cst: 'America/Chicago',
  cdt: 'America/Chicago',
  mt: 'America/Denver',
  mst: 'America/Denver',
  mdt: 'America/Denver',
  pt: 'America/Los_Angeles',
  pst: 'America/Los_Angeles',
  pdt: 'America/Los_Angeles',
  utc: 'UTC',
  gmt: 'UTC',
};

// ── Patterns ───────────────────────────────────────────────

const KEYWORD = String.raw`(?:expires?|expiring|expiration(?:\s+date)?|valid\s+(?:through|thru|until)|active\s+(?:through|thru|until)|renewal\s+date|until)`;
const ISO_DATETIME = String.raw`\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?`;
const MONTH_DATE = String.raw`[a-z]{3,9}\.?\s+\d{1,2}(?!\d)(?:st|nd|rd|th)?(?:,?\s+\d{4})?`;
const NUMERIC_DATE = String.raw`\d{1,2}[/.-]\d{1,2}[/.-]\d{4}`;
const ISO_DATE = String.raw`\d{4}-\d{2}-\d{2}`;
const TIME = String.raw`\d{1,2}(?::\d{2})?\s*[ap]\.?m\.?|\d{1,2}:\d{2}`;

const EXPIRATION_PATTERN = new RegExp(
  String.raw`${KEYWORD}\s*:?\s*(?:on\s+)?(?:(?<iso>${ISO_DATETIME})|(?<date>${ISO_DATE}|${NUMERIC_DATE}|${MONTH_DATE})(?:\s*(?:,|at|@)?\s*(?<time>${TIME}))?(?:\s+(?<zone>[a-z]{2,4})\b)?)`,
  'gi',
);

// ── Public API ─────────────────────────────────────────────

/**
 * Return the first keyword-anchored expiration found in `text`, or undefined.
 *
 * Candidates that fail to parse (e.g. "expires after 30 days") are skipped
 * and the search continues.
 */
export function extractExpiration(text: string, options: ExpirationOptions): Date | undefined {
  const locale = options.locale ?? 'en-US';
  const reference = DateTime.fromJSDate(options.reference ?? new Date());

  for (const match of text.matchAll(EXPIRATION_PATTERN)) {
    const groups = match.groups;
    if (!groups) continue;

    const iso: string | undefined = groups.iso;
    if (iso) {
      const parsed = DateTime.fromISO(iso, { zone: options.timezone });
      if (parsed.isValid) return parsed.toUTC().toJSDate();
      continue;
    }

    const dateText: string | undefined = groups.date;
    if (!dateText) continue;

    const timeText: string | undefined = groups.time;
    const zoneText: string | undefined = groups.zone;
    const zone = (zoneText && ZONE_ABBREVIATIONS[zoneText.toLowerCase()]) || options.timezone;

    const resolved = resolveInstant(dateText, timeText, zone, locale, reference);
    if (resolved) return resolved;
  }

  return undefined;
}

// ── Internals ──────────────────────────────────────────────

interface CalendarDate {
  year?: number;
  month: number;
  day: number;
}

function resolveInstant(
  dateText: string,
  timeText: string | undefined,
  zone: string,
  locale: string,
  reference: DateTime,
): Date | undefined {
  const calendar = parseCalendarDate(dateText, locale);
  if (!calendar) return undefined;

  const clock = timeText ? parseTime(timeText) : { hour: 0, minute: 0 };
  if (!clock) return undefined;

  const zonedReference = reference.setZone(zone);
  let local = DateTime.fromObject(
    {
      year: calendar.year ?? zonedReference.year,
      month: calendar.month,
      day: calendar.day,
      hour: clock.hour,
      minute: clock.minute,
    },
    { zone },
  );
  if (!local.isValid) return undefined;

  // "March 15" with no year means the next March 15 on or after the reference day.
  if (calendar.year === undefined && local.toMillis() < zonedReference.startOf('day').toMillis()) {
    local = local.plus({ years: 1 });
  }

  return local.toUTC().toJSDate();
}

function parseCalendarDate(raw: string, locale: string): CalendarDate | undefined {
  const text = raw.trim();

  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (iso) {
    return { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
  }

  const numeric = text.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/);
  if (numeric) {
    const first = Number(numeric[1]);
    const second = Number(numeric[2]);
    const year = Number(numeric[3]);
    return monthComesFirst(locale)
      ? { year, month: first, day: second }
      : { year, month: second, day: first };
  }

  const named = text
    .replace(/(\d)(st|nd|rd|th)\b/gi, '$1')
    .replace(/[.,]/g, ' ')
    .trim()
    .split(/\s+/);
  if (named.length < 2) return undefined;

  const month = monthNumber(named[0], locale);
  if (month === undefined) return undefined;

  const day = Number(named[1]);
  const year = named[2] === undefined ? undefined : Number(named[2]);
  if (!Number.isInteger(day) || (year !== undefined && !Number.isInteger(year))) {
    return undefined;
  }
  return { year, month, day };
}

/** US-style locales write 09/15/2025; most others write 15/09/2025. */
function monthComesFirst(locale: string): boolean {
  return /^en$/i.test(locale) || /-US$/i.test(locale);
}

/** Resolve "sept", "Sep", "September" to 9 using the locale's month names. */
function monthNumber(token: string, locale: string): number | undefined {
  const needle = token.toLowerCase();
  const longNames = Info.months('long', { locale }).map((name) => name.toLowerCase());
  const shortNames = Info.months('short', { locale }).map((name) =>
    name.toLowerCase().replace(/\.$/, ''),
  );

  const exact = longNames.indexOf(needle);
  if (exact >= 0) return exact + 1;

  const short = shortNames.indexOf(needle);
  if (short >= 0) return short + 1;

  if (needle.length >= 3) {
    const prefixed = longNames.findIndex((name) => name.startsWith(needle));
    if (prefixed >= 0) return prefixed + 1;
  }
  return undefined;
}

/** "11:59 PM", "10pm", "9:00 a.m.", "23:59" → 24-hour clock. */
function parseTime(time: string): { hour: number; minute: number } | undefined {
  const cleaned = time.trim().toUpperCase().replace(/\./g, '');

  const match12 = cleaned.match(/^(\d{1,2})(?::(\d{2}))?\s*(AM|PM)$/);
  if (match12) {
    let hour = parseInt(match12[1], 10);
    const minute = match12[2] ? parseInt(match12[2], 10) : 0;
    if (hour < 1 || hour > 12 || minute > 59) return undefined;

    if (match12[3] === 'PM' && hour !== 12) hour += 12;
    if (match12[3] === 'AM' && hour === 12) hour = 0;
    return { hour, minute };
  }

  const match24 = cleaned.match(/^(\d{1,2}):(\d{2})$/);
  if (match24) {
    const hour = parseInt(match24[1], 10);
    const minute = parseInt(match24[2], 10);
    if (hour > 23 || minute > 59) return undefined;
    return { hour, minute };
  }

  return undefined;
}
