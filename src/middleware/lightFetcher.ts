/**
 * lightFetcher.ts — Cookie-preserving HTTP session for the export phase.
 *
 * The export form needs no JavaScript: a GET returns the form with a fresh
 * view-state, a POST of that form returns the XML.  A plain HTTP client is
 * 10–30× faster than driving the browser for this, and one instance can be
 * shared by every export worker.
 *
 * got-scraping v4 is ESM-only (built on got v14) while this project compiles
 * to CommonJS, so it is loaded with a dynamic `import()` on first use.
 */

import { CookieJar } from 'tough-cookie';
import { Logger } from '../core/logger';
import type { HttpResponse, HttpSession } from '../core/types';

const loadGotScraping = () => import('got-scraping');

let gotScrapingModule: ReturnType<typeof loadGotScraping> | null = null;

function getGotScraping(): ReturnType<typeof loadGotScraping> {
  if (!gotScrapingModule) {
    gotScrapingModule = loadGotScraping();
  }
  return gotScrapingModule;
}

export interface LightSessionOptions {
  /** Per-request timeout. */
  timeoutMs: number;
  /** Overrides the generated User-Agent header. */
  userAgent?: string;
  /** Extra headers sent with every request (e.g. Referer). */
  headers?: Record<string, string>;
  /** Share an existing jar, e.g. one seeded with the browser's cookies. */
  cookieJar?: CookieJar;
  logger?: Logger;
}

export class LightHttpSession implements HttpSession {
  private readonly jar: CookieJar;
  private readonly options: LightSessionOptions;
  private readonly logger: Logger;

  constructor(options: LightSessionOptions) {
    this.options = options;
    this.jar = options.cookieJar ?? new CookieJar();
    this.logger = options.logger ?? new Logger('LightFetcher');
  }

  get(url: string): Promise<HttpResponse> {
    return this.request('GET', url);
  }

  post(url: string, form: Record<string, string>): Promise<HttpResponse> {
    return this.request('POST', url, form);
  }

  private async request(
    method: 'GET' | 'POST',
    url: string,
    form?: Record<string, string>,
  ): Promise<HttpResponse> {
    this.logger.debug(`${method} ${url}`);

    const { gotScraping } = await getGotScraping();

    const headers: Record<string, string> = { ...this.options.headers };
    if (this.options.userAgent) {
      headers['user-agent'] = this.options.userAgent;
    }

    const response = await gotScraping({
      url,
      method,
      form,
      headers,
      cookieJar: this.jar,
      responseType: 'buffer',
      // Status handling and retries belong to the caller.
      throwHttpErrors: false,
      retry: { limit: 0 },
      timeout: { request: this.options.timeoutMs },
      headerGeneratorOptions: {
        browsers: [{ name: 'chrome', minVersion: 130 }],
        devices: ['desktop'],
        operatingSystems: ['macos', 'windows'],
      },
    });

    const body = Buffer.isBuffer(response.body)
      ? response.body
      : Buffer.from(String(response.body), 'utf8');

    this.logger.debug(`${method} ${url} → HTTP ${response.statusCode} (${body.length} bytes)`);

    return {
      statusCode: response.statusCode,
      url: response.url,
      body,
      text: body.toString('utf8'),
    };
  }
}
