/**
 * lightFetcher.ts — Browser-grade HTTP client for API calls made outside the browser.
 *
 * The CAPTCHA service is reached through got-scraping so outgoing requests
 * carry the same Chrome-like TLS and header profile as the rest of the
 * renewal traffic.
 *
 * got-scraping v4 is ESM-only while this project compiles to CommonJS.  The
 * loader below is built with `new Function` so the compiled output keeps a
 * native `import()` instead of turning it into `require()`.
 */

import { Logger } from '../core/logger';

const logger = new Logger('LightFetcher');

// ── got-scraping surface used here ─────────────────────────

interface GotScrapingRequest {
  url: string;
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  responseType: 'text';
  throwHttpErrors: boolean;
  timeout: { request: number };
  headerGeneratorOptions: {
    browsers: Array<{ name: string; minVersion: number }>;
    devices: string[];
    operatingSystems: string[];
  };
}

interface GotScrapingResponse {
  statusCode?: number;
  body: unknown;
  headers: Record<string, string | string[] | undefined>;
}

interface GotScrapingModule {
  gotScraping: (request: GotScrapingRequest) => Promise<GotScrapingResponse>;
}

function isGotScrapingModule(value: unknown): value is GotScrapingModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'gotScraping' in value &&
    typeof value.gotScraping === 'function'
  );
}

const importEsm = new Function('specifier', 'return import(specifier)');

let gotScrapingModule: GotScrapingModule | null = null;

async function getGotScraping(): Promise<GotScrapingModule> {
  if (!gotScrapingModule) {
    const loaded: unknown = await importEsm('got-scraping');
    if (!isGotScrapingModule(loaded)) {
      throw new Error('got-scraping did not export gotScraping()');
    }
    gotScrapingModule = loaded;
  }
  return gotScrapingModule;
}

// ── Public API ─────────────────────────────────────────────

export interface LightFetchResult {
  body: string;
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
}

export interface LightFetchOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialised as the JSON request body. */
  json?: unknown;
  timeout?: number;
}

/**
 * Fetch a URL with Chrome-like TLS and headers.  Non-2xx responses resolve
 * normally; callers inspect `statusCode`.
 */
export async function lightFetch(url: string, options: LightFetchOptions = {}): Promise<LightFetchResult> {
  const { gotScraping } = await getGotScraping();

  const headers: Record<string, string> = { ...options.headers };
  let body: string | undefined;
  if (options.json !== undefined) {
    headers['content-type'] = 'application/json';
    body = JSON.stringify(options.json);
  }

  const response = await gotScraping({
    url,
    method: options.method ?? (body === undefined ? 'GET' : 'POST'),
    headers,
    body,
    responseType: 'text',
    throwHttpErrors: false,
    timeout: { request: options.timeout ?? 30_000 },
    headerGeneratorOptions: {
      browsers: [{ name: 'chrome', minVersion: 120 }],
      devices: ['desktop'],
      operatingSystems: ['macos', 'windows'],
    },
  });

  const statusCode = response.statusCode ?? 0;
  logger.debug(`HTTP ${statusCode} from ${new URL(url).host}`);

  return {
    body: typeof response.body === 'string' ? response.body : String(response.body ?? ''),
    statusCode,
    headers: response.headers,
  };
}
