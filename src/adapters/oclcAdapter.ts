/**
 * oclcAdapter.ts — Library login through an OCLC EZproxy ("idm.oclc.org") gateway.
 *
 * The library's pass URL for the newspaper lands on an EZproxy login page
 * asking for a card number/barcode and PIN.  After a successful login the
 * gateway either redirects straight to the newspaper or shows a landing page
 * with a link onward, which the newspaper adapter follows.
 */

import type { BrowserDriver } from '../core/browserDriver';
import type { Credentials, StepResult } from '../core/types';
import { LibraryAdapter, type LibraryAdapterContext } from './baseAdapter';

export const OCLC_USERNAME_FIELDS = ['user', 'username', 'barcode', 'cardnumber'];
export const OCLC_PASSWORD_FIELDS = ['pass', 'password', 'pin'];

const OCLC_SUBMIT_SELECTORS = ["input[type='submit']", "button[type='submit']", '.submit-button', '#submit'];

/** `input[name='x']` selectors for each field name. */
export function byName(names: readonly string[]): string[] {
  return names.map((name) => `input[name='${name}']`);
}

export class OclcAdapter extends LibraryAdapter {
  constructor(
    context: LibraryAdapterContext,
    private readonly newspaperDomain: string,
  ) {
    super('OclcAdapter', context);
  }

  async authenticate(session: BrowserDriver, credentials: Credentials): Promise<StepResult> {
    this.logger.info(`Opening ${this.library.name} login for ${this.newspaperType.toUpperCase()}`);
    await session.open(this.passUrl());
    await session.pause('short');

    const captcha = await this.detectCaptcha(session);
    if (captcha) return this.captchaSnapshot(session, captcha);

    // Already signed in to the gateway from an earlier step.
    if (!(await this.findFirst(session, byName(OCLC_PASSWORD_FIELDS)))) {
      return this.afterLogin(session, this.newspaperDomain);
    }

    if (!(await this.fillFirst(session, byName(OCLC_USERNAME_FIELDS), credentials.username))) {
      this.logger.warn('No card number field on the library login page');
      return this.snapshot(session, 'login_form', 'classify');
    }
    await session.pause('short');
    await this.fillFirst(session, byName(OCLC_PASSWORD_FIELDS), credentials.password);

    if (!(await this.submitWith(session, OCLC_SUBMIT_SELECTORS))) {
      this.logger.warn('No submit control on the library login page');
      return this.snapshot(session, 'login_form', 'classify');
    }

    return this.afterLogin(session, this.newspaperDomain);
  }
}
