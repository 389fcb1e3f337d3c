/** nytAdapter.ts — New York Times sign-in, pass claim and expiration excerpt. */

import { NewspaperAdapter, xpathText } from './baseAdapter';

const EXPIRATION_EXCERPT =
  /(?:your (?:pass|access) is active and will expire on|will expire on|expires on|access expires|valid (?:until|through))[^\n]*/i;

export class NytAdapter extends NewspaperAdapter {
  readonly domain = 'nytimes.com';
  protected readonly cookieDomain = '.nytimes.com';
  protected readonly portalLinkSelectors = [
    xpathText('a', 'Visit the New York Times'),
    xpathText('a', 'Visit The New York Times'),
    xpathText('a', 'New York Times'),
    xpathText('a', 'NYTimes'),
    "a[href*='nytimes.com']",
    "a[href*='nyt.com']",
  ];

  constructor() {
    super('NytAdapter');
  }

  describeExpiration(text: string): string | undefined {
    return text.match(EXPIRATION_EXCERPT)?.[0].trim();
  }
}
