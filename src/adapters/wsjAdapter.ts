/**
 * wsjAdapter.ts — Wall Street Journal sign-in and pass claim.
 *
 * WSJ signs in through Dow Jones SSO, which asks for `emailOrUsername`
 * first and the password on a second step, and sets its DataDome cookie on
 * the parent `.dowjones.com` domain.
 */

import { NewspaperAdapter, xpathText } from './baseAdapter';

const EXPIRATION_EXCERPT =
  /(?:your (?:subscription|access|pass) (?:ends|expires)(?: on)?|expires on|valid (?:until|through)|active (?:until|through))[^\n]*/i;

export class WsjAdapter extends NewspaperAdapter {
  readonly domain = 'wsj.com';
  protected readonly cookieDomain = '.dowjones.com';
  protected readonly loginDomains = ['dowjones.com'];
  protected readonly extraUsernameSelectors = ["input[name='emailOrUsername']", "input[id='emailOrUsername']"];
  protected readonly portalLinkSelectors = [
    xpathText('a', 'Visit the Wall Street Journal'),
    xpathText('a', 'Visit The Wall Street Journal'),
    xpathText('a', 'Access Wall Street Journal'),
    xpathText('a', 'Wall Street Journal'),
    "a[href*='wsj.com']",
  ];

  constructor() {
    super('WsjAdapter');
  }

  describeExpiration(text: string): string | undefined {
    return text.match(EXPIRATION_EXCERPT)?.[0].trim();
  }
}
