/**
 * humanBehavior.ts — Human-paced typing, clicking and pauses for renewal sessions.
 *
 * Library and newspaper login pages sit behind bot defences that score input
 * timing.  Keystrokes follow a normal distribution around a mean inter-key
 * delay with longer gaps after spaces and before capitals; pauses between
 * steps are drawn from ranges scaled by RENEWAL_SPEED.
 */

import type { ElementHandle, Page } from 'puppeteer-core';
import type { RenewalSpeed } from '../core/config';
import type { PauseKind } from '../core/browserDriver';

/** Base pause ranges in milliseconds at "normal" speed. */
const PAUSE_RANGES: Record<PauseKind, [number, number]> = {
  short: [300, 800],
  medium: [1_000, 2_500],
  long: [3_000, 6_000],
};

const SPEED_FACTOR: Record<RenewalSpeed, number> = {
  fast: 0.4,
  normal: 1,
  slow: 1.8,
};

// ─── Pauses ─────────────────────────────────────────────────

/** Delay in ms for a pause of the given kind, before sleeping. */
export function pauseDuration(kind: PauseKind, speed: RenewalSpeed): number {
  const [min, max] = PAUSE_RANGES[kind];
  return Math.round(randomBetween(min, max) * SPEED_FACTOR[speed]);
}

export async function humanPause(kind: PauseKind, speed: RenewalSpeed): Promise<void> {
  await sleep(pauseDuration(kind, speed));
}

// ─── Mouse ──────────────────────────────────────────────────

/** Hover, hesitate briefly, then click. */
export async function humanClick(handle: ElementHandle<Element>, speed: RenewalSpeed): Promise<void> {
  await handle.hover();
  await sleep(randomBetween(50, 150) * SPEED_FACTOR[speed]);
  await handle.click({ delay: randomBetween(40, 110) });
}

// ─── Typing ─────────────────────────────────────────────────

/**
 * Type text character-by-character with human-like inter-key timing.
 * With `clear`, existing field content is selected and replaced.
 */
export async function humanType(
  page: Page,
  handle: ElementHandle<Element>,
  text: string,
  speed: RenewalSpeed,
  clear = true,
): Promise<void> {
  await handle.click({ count: clear ? 3 : 1 });
  if (clear) await page.keyboard.press('Backspace');
  await sleep(randomBetween(100, 300) * SPEED_FACTOR[speed]);

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    await page.keyboard.type(char);
    await sleep(keyDelay(text, i) * SPEED_FACTOR[speed]);
  }
}

/** Inter-key delay after `text[index]`: Gaussian around 80 ms, clamped to 20–500 ms. */
export function keyDelay(text: string, index: number): number {
  let delay = gaussianRandom(80, 30);

  const next = text[index + 1];
  if (text[index] === ' ' || (next !== undefined && /[A-Z]/.test(next))) {
    delay += randomBetween(100, 400);
  }

  return Math.max(20, Math.min(delay, 500));
}

// ─── Utility functions ──────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

/** Box-Muller transform. */
function gaussianRandom(mean: number, stdDev: number): number {
  const u1 = Math.random() || Number.MIN_VALUE;
  const u2 = Math.random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return z * stdDev + mean;
}
