/**
 * customLibraryAdapter.ts — Library login for sites outside the OCLC gateway.
 *
 * The library profile names a login URL (falling back to the newspaper pass
 * URL) and may carry its own selectors; otherwise the OCLC field names plus
 * `email` are tried.
 */

import type { BrowserDriver } from '../core/browserDriver';
import type { Credentials, StepResult } from '../core/types';
import { LibraryAdapter, type LibraryAdapterContext, SUBMIT_SELECTORS } from './baseAdapter';
import { byName, OCLC_PASSWORD_FIELDS, OCLC_USERNAME_FIELDS } from './oclcAdapter';

export class CustomLibraryAdapter extends LibraryAdapter {
  constructor(
    context: LibraryAdapterContext,
    private readonly newspaperDomain: string,
  ) {
    super('CustomLibraryAdapter', context);
  }

  async authenticate(session: BrowserDriver, credentials: Credentials): Promise<StepResult> {
    const url = this.library.loginUrl ?? this.passUrl();
    const selectors = this.library.selectors ?? {};

    await session.open(url);
    await session.pause('short');

    const captcha = await this.detectCaptcha(session);
    if (captcha) return this.captchaSnapshot(session, captcha);

    const usernameSelectors = selectors.username
      ? [selectors.username]
      : byName([...OCLC_USERNAME_FIELDS, 'email']);
    const passwordSelectors = selectors.password ? [selectors.password] : byName(OCLC_PASSWORD_FIELDS);
    const submitSelectors = selectors.submit ? [selectors.submit, ...SUBMIT_SELECTORS] : SUBMIT_SELECTORS;

    const filledUser = await this.fillFirst(session, usernameSelectors, credentials.username);
    const filledPass = filledUser && (await this.fillFirst(session, passwordSelectors, credentials.password));
    if (!filledPass) {
      this.logger.warn(`Login form on ${this.library.name} did not match the configured selectors`);
      return this.snapshot(session, 'login_form', 'classify');
    }

    await this.submitWith(session, submitSelectors);

    // Libraries with a separate login page send the patron back to the pass URL afterwards.
    if (this.library.loginUrl && !(await this.hasPasswordField(session))) {
      const passUrl = this.library.passUrls[this.newspaperType];
      if (passUrl) {
        await session.open(passUrl);
        await session.pause('short');
      }
    }

    return this.afterLogin(session, this.newspaperDomain);
  }
}
