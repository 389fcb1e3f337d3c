/**
 * outcomeClassifier.ts — Turn step snapshots into a renewal verdict.
 *
 * The classifier is a pure function of its input: the same snapshots and
 * options always give the same verdict.  It is also the only place verdicts
 * are built; the state machine asks it for failure verdicts (timeouts,
 * adapter crashes) through `fail()` rather than writing its own.
 *
 * Snapshots are read newest first.  The first snapshot that produces a
 * non-indeterminate verdict decides the outcome; within one snapshot the
 * rule tiers run failure → warning → success.  When the result is a
 * success (with or without warning) a second pass extracts the expiration
 * from the same snapshot.
 */

import * as cheerio from 'cheerio';
import type { ReasonCode, StepResult, Verdict, VerdictKind } from '../core/types';
import { extractExpiration } from '../core/expirationExtractor';
import { CLASSIFIER_RULES, TIER_ORDER, type ClassifierRule } from './classifierRules';

export interface ClassifierOptions {
  /** User timezone for wall-clock expiration text. */
  timezone: string;
  locale?: string;
  /** Anchor for year-less dates; fixed in tests to keep results reproducible. */
  reference?: Date;
}

export class OutcomeClassifier {
  private readonly rules: readonly ClassifierRule[];
  private readonly options: ClassifierOptions;

  constructor(options: ClassifierOptions, rules: readonly ClassifierRule[] = CLASSIFIER_RULES) {
    this.options = options;
    // Stable sort keeps registration order inside each tier.
    this.rules = [...rules].sort(
      (a, b) => TIER_ORDER.indexOf(a.verdict) - TIER_ORDER.indexOf(b.verdict),
    );
  }

  /** Classify one or more snapshots; an empty list is indeterminate. */
  classify(results: readonly StepResult[]): Verdict {
    for (let i = results.length - 1; i >= 0; i--) {
      const snapshot = results[i];
      const rule = this.firstMatch(snapshot);
      if (!rule) continue;

      const expiration =
        rule.verdict === 'failure' ? undefined : this.expirationFrom(snapshot);

      return buildVerdict(rule.verdict, rule.reason, rule.message, rule.confidence, {
        ruleId: rule.id,
        expiration,
      });
    }

    return buildVerdict(
      'indeterminate',
      'no_match',
      'No known outcome message on the page; the site layout may have changed',
      0,
    );
  }

  /** Failure verdict for conditions detected outside the page (timeouts, crashes, solver errors). */
  fail(reason: ReasonCode, message: string): Verdict {
    return buildVerdict('failure', reason, message, 1);
  }

  // ── Internals ──────────────────────────────────────────

  private firstMatch(snapshot: StepResult): ClassifierRule | undefined {
    const text = normalizeText(snapshotText(snapshot));
    const url = snapshot.url.toLowerCase();

    return this.rules.find((rule) => {
      const subject = rule.source === 'url' ? url : text;
      const patterns = rule.match instanceof RegExp ? [rule.match] : rule.match;
      if (!patterns.every((pattern) => pattern.test(subject))) return false;
      return !(rule.unless && rule.unless.test(subject));
    });
  }

  private expirationFrom(snapshot: StepResult): Date | undefined {
    const source = snapshot.expirationText ?? snapshotText(snapshot);
    return extractExpiration(source, {
      timezone: this.options.timezone,
      locale: this.options.locale,
      reference: this.options.reference,
    });
  }
}

// ── Helpers ────────────────────────────────────────────────

function buildVerdict(
  kind: VerdictKind,
  reason: ReasonCode,
  message: string,
  confidence: number,
  extra: { ruleId?: string; expiration?: Date } = {},
): Verdict {
  const verdict: Verdict = {
    kind,
    reason,
    message,
    confidence,
    ...(extra.ruleId ? { ruleId: extra.ruleId } : {}),
    ...(extra.expiration ? { expiration: extra.expiration } : {}),
  };
  return Object.freeze(verdict);
}

/** Visible text of a snapshot, falling back to the HTML body when no text was captured. */
export function snapshotText(snapshot: StepResult): string {
  if (snapshot.text.trim() !== '' || !snapshot.html) return snapshot.text;

  const $ = cheerio.load(snapshot.html);
  $('script, style, noscript').remove();
  return $('body').text();
}

/** Lowercase, straighten quotes and collapse whitespace. */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/\s+/g, ' ')
    .trim();
}

/** True for verdicts that mean the pass is usable. */
export function isSuccessful(verdict: Verdict): boolean {
  return verdict.kind === 'success' || verdict.kind === 'success_with_warning';
}
