/**
 * giftCodeAdapter.ts — Passes granted through a redemption link instead of a library login.
 *
 * Some libraries hand out a newspaper gift/partner URL that applies the pass
 * by itself.  Opening it either lands on a redemption page with a button,
 * or redirects to the newspaper's login, in which case the code is already
 * attached and the newspaper adapter takes over.
 */

import type { BrowserDriver } from '../core/browserDriver';
import type { StepResult } from '../core/types';
import { LibraryAdapter, onDomain, type LibraryAdapterContext, xpathText } from './baseAdapter';

const GIFT_CODE_MARKERS = [
  'subscription/redeem',
  'gift_code=',
  'giftcode=',
  'redeem?',
  'activation?code=',
  'promo_code=',
  'pass_code=',
  'enter-redemption-code',
  'partner.wsj.com/p/',
];

const REDEEM_SELECTORS = [
  xpathText('button', 'Redeem'),
  xpathText('button', 'Get Access'),
  xpathText('button', 'Activate'),
  xpathText('button', 'Continue'),
  "[data-testid*='redeem']",
  '.redeem-button',
  "button[type='submit']",
  "input[type='submit']",
];

export function isGiftCodeUrl(url: string | undefined): boolean {
  if (!url) return false;
  const lower = url.toLowerCase();
  return GIFT_CODE_MARKERS.some((marker) => lower.includes(marker));
}

export class GiftCodeAdapter extends LibraryAdapter {
  private readonly giftCodeUrl?: string;

  constructor(
    context: LibraryAdapterContext,
    private readonly newspaperDomain: string,
  ) {
    super('GiftCodeAdapter', context);
    this.giftCodeUrl = context.giftCodeUrl;
  }

  async authenticate(session: BrowserDriver): Promise<StepResult> {
    const url = this.giftCodeUrl ?? this.passUrl();
    this.logger.info(`Opening redemption link for ${this.library.name}`);
    await session.open(url);
    await session.pause('medium');

    const captcha = await this.detectCaptcha(session);
    if (captcha) return this.captchaSnapshot(session, captcha);

    const current = session.currentUrl().toLowerCase();
    if (['login', 'signin', 'auth', 'sso'].some((marker) => current.includes(marker))) {
      this.logger.info('Redemption link redirected to sign-in');
      return this.snapshot(session, 'newspaper_portal', 'activate');
    }

    if (!(await this.submitWith(session, REDEEM_SELECTORS))) {
      this.logger.info('No redemption control; waiting for an automatic redirect');
      await session.waitForNavigation(10_000);
    }

    return onDomain(session.currentUrl(), this.newspaperDomain)
      ? this.snapshot(session, 'newspaper_portal', 'activate')
      : this.snapshot(session, 'activation_page', 'activate');
  }
}
