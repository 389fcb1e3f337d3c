/**
 * classifierRules.ts — Declarative rule table for the outcome classifier.
 *
 * Rules are tested against a lowercased, whitespace-collapsed copy of the
 * page text (or the URL, for `source: 'url'`).  The classifier evaluates
 * tiers in the order failure → success_with_warning → success and, within a
 * tier, in the order rules appear here, so specific phrasings go before
 * general ones.  New site behaviour is a new row, not new control flow.
 */

import type { ReasonCode, VerdictKind } from '../core/types';

export type RuleVerdict = Exclude<VerdictKind, 'indeterminate'>;

export interface ClassifierRule {
  id: string;
  verdict: RuleVerdict;
  reason: ReasonCode;
  /** A single pattern, or several that must all match. */
  match: RegExp | readonly RegExp[];
  /** Skip the rule when this also matches. */
  unless?: RegExp;
  source?: 'text' | 'url';
  confidence: number;
  message: string;
}

export const TIER_ORDER: readonly RuleVerdict[] = ['failure', 'success_with_warning', 'success'];

export const CLASSIFIER_RULES: readonly ClassifierRule[] = [
  // ── Failure ──────────────────────────────────────────────
  {
    id: 'failure.library_card_or_pin',
    verdict: 'failure',
    reason: 'credentials',
    match: /invalid library card or pin/,
    confidence: 1,
    message: 'Library rejected the card number or PIN',
  },
  {
    id: 'failure.invalid_credentials',
    verdict: 'failure',
    reason: 'credentials',
    match:
      /\b(?:invalid|incorrect|wrong) (?:library card|card number|barcode|pin|username|user name|email(?: address)?|password|credentials|login)\b/,
    confidence: 1,
    message: 'Site reported invalid credentials',
  },
  {
    id: 'failure.password_incorrect',
    verdict: 'failure',
    reason: 'credentials',
    match: /\b(?:password|pin) (?:you entered )?(?:is|was) (?:incorrect|invalid)/,
    confidence: 1,
    message: 'Site reported an incorrect password',
  },
  {
    id: 'failure.credentials_mismatch',
    verdict: 'failure',
    reason: 'credentials',
    match: /\b(?:email|username)(?: address)? (?:and|or) password (?:do not|don't|does not|doesn't) match/,
    confidence: 1,
    message: 'Site reported that the username and password do not match',
  },
  {
    id: 'failure.authentication_failed',
    verdict: 'failure',
    reason: 'credentials',
    match: /\b(?:authentication|login|log in|sign[- ]in) (?:failed|was unsuccessful|unsuccessful)\b/,
    confidence: 0.9,
    message: 'Site reported a failed login',
  },
  {
    id: 'failure.account_locked',
    verdict: 'failure',
    reason: 'account_locked',
    match: /\baccount (?:has been |is )?(?:locked|suspended|disabled)\b/,
    confidence: 1,
    message: 'Account is locked or suspended',
  },
  {
    id: 'failure.library_card_expired',
    verdict: 'failure',
    reason: 'library_expired',
    match: /\b(?:library card|library account|your card) (?:has )?expired\b/,
    confidence: 1,
    message: 'Library card has expired',
  },
  {
    id: 'failure.library_access_ended',
    verdict: 'failure',
    reason: 'library_expired',
    match: /\blibrary(?:'s)? (?:subscription|access) (?:has )?(?:expired|ended)\b/,
    confidence: 0.9,
    message: 'Library subscription to the newspaper has ended',
  },
  {
    id: 'failure.geo_restricted',
    verdict: 'failure',
    reason: 'geo_restricted',
    match: /\bnot available in your (?:region|country|location)\b|\bgeographic(?:al)? restrictions?\b/,
    confidence: 1,
    message: 'Site refused access from this region',
  },
  {
    id: 'failure.maintenance',
    verdict: 'failure',
    reason: 'maintenance',
    match: /\b(?:down|closed) for (?:scheduled )?maintenance\b|\bunder maintenance\b|\btemporarily unavailable\b/,
    confidence: 0.9,
    message: 'Site is under maintenance',
  },
  {
    id: 'failure.access_denied',
    verdict: 'failure',
    reason: 'access_denied',
    match: /\baccess denied\b|\byou (?:have been|are|were) blocked\b|\brequest (?:was |has been )?blocked\b/,
    unless: /captcha|datadome|slide (?:right|to)/,
    confidence: 0.8,
    message: 'Site denied access',
  },

  // ── Success with warning ─────────────────────────────────
  {
    id: 'warning.digital_subscription',
    verdict: 'success_with_warning',
    reason: 'direct_subscription',
    match: /\balready (?:has|have) an? (?:active )?digital subscription\b/,
    confidence: 1,
    message: 'Account already holds its own digital subscription',
  },
  {
    id: 'warning.associated_subscription',
    verdict: 'success_with_warning',
    reason: 'direct_subscription',
    match: /\balready associated with an active [a-z .]{0,40}subscription\b/,
    confidence: 1,
    message: 'Account is already tied to an active subscription',
  },
  {
    id: 'warning.existing_subscriber',
    verdict: 'success_with_warning',
    reason: 'direct_subscription',
    match: /\b(?:account|you) already (?:has|have) an? (?:active |paid )?subscription\b/,
    unless: /welcome back/,
    confidence: 0.8,
    message: 'Account already has a subscription',
  },

  // ── Success ──────────────────────────────────────────────
  {
    id: 'success.pass_active',
    verdict: 'success',
    reason: 'pass_active',
    match: /\byour (?:pass|subscription|access) is (?:now )?active\b/,
    confidence: 1,
    message: 'Pass is active',
  },
  {
    id: 'success.pass_claimed',
    verdict: 'success',
    reason: 'pass_claimed',
    match: /\byou(?:'ve| have) (?:successfully )?(?:claimed|redeemed|activated) your [a-z .]{0,40}pass\b/,
    confidence: 1,
    message: 'Pass claimed',
  },
  {
    id: 'success.welcome_back_subscriber',
    verdict: 'success',
    reason: 'pass_active',
    match: [/\bwelcome back\b/, /\blooks like you already have a subscription\b/],
    confidence: 0.9,
    message: 'Returning subscriber with an active pass',
  },
  {
    id: 'success.activated',
    verdict: 'success',
    reason: 'pass_active',
    match: /\b(?:pass|access|subscription) (?:has been |was )?(?:successfully )?activated\b/,
    confidence: 0.9,
    message: 'Pass activated',
  },
  {
    id: 'success.renewal_confirmed',
    verdict: 'success',
    reason: 'pass_active',
    match: /\brenewal (?:was )?successful\b|\bsuccessfully renewed\b/,
    confidence: 0.9,
    message: 'Renewal confirmed',
  },
  {
    id: 'success.wsj_home',
    verdict: 'success',
    reason: 'pass_active',
    source: 'url',
    match: /^https?:\/\/(?:www\.)?wsj\.com(?:\/(?!.*(?:login|signin|activate|redeem|subscribe)).*)?$/,
    confidence: 0.6,
    message: 'Landed on the WSJ home page after activation',
  },
];
