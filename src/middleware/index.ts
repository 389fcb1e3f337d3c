/**
 * middleware/index.ts — Barrel export for the middleware layer.
 *
 * The rest of the codebase imports from `middleware` (one path) rather than
 * reaching into individual files.
 */

// ── Classification ──────────────────────────────────────────
export { OutcomeClassifier, isSuccessful, normalizeText, snapshotText } from './outcomeClassifier';
export type { ClassifierOptions } from './outcomeClassifier';
export { CLASSIFIER_RULES, TIER_ORDER } from './classifierRules';
export type { ClassifierRule, RuleVerdict } from './classifierRules';

// ── Fetch layer ─────────────────────────────────────────────
export { lightFetch } from './lightFetcher';
export type { LightFetchOptions, LightFetchResult } from './lightFetcher';

// ── Human behaviour ─────────────────────────────────────────
export { humanClick, humanPause, humanType, pauseDuration, sleep } from './humanBehavior';

// ── SOCKS5 relay ────────────────────────────────────────────
export { Socks5Relay, REPLY } from './socks5Relay';
export type { CredentialCheck, Socks5RelayOptions } from './socks5Relay';
