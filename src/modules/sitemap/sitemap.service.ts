import { Logger } from '../../common/logger.js';
import { SitemapFetchError } from '../../common/errors/tracker.errors.js';
import { ErrorExtractor } from '../../common/utils/error-extractor.util.js';
import type { FetchClient } from '../../http/fetch-client.js';
import type { SitemapArticle } from './interfaces/sitemap-article.interface.js';
import { parseSitemap } from './sitemap-parser.js';

export const SITEMAP_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
    '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  Pragma: 'no-cache',
};

/**
 * Append a `_cb` timestamp so CDN page caches never serve a stale sitemap
 */
export function withCacheBuster(url: string, now: Date): string {
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}_cb=${Math.floor(now.getTime() / 1000)}`;
}

export class SitemapService {
  private readonly logger = new Logger(SitemapService.name);
  private readonly fetchClient: FetchClient;
  private readonly timeoutSecs: number;
  private readonly now: () => Date;

  constructor(params: { fetchClient: FetchClient; timeoutSecs: number; now?: () => Date }) {
    this.fetchClient = params.fetchClient;
    this.timeoutSecs = params.timeoutSecs;
    this.now = params.now ?? (() => new Date());
  }

  public async fetchSitemap(sitemapUrl: string): Promise<string> {
    const url = withCacheBuster(sitemapUrl, this.now());

    let response: Response;
    try {
      response = await this.fetchClient.fetch(url, {
        method: 'GET',
        headers: SITEMAP_REQUEST_HEADERS,
        signal: AbortSignal.timeout(this.timeoutSecs * 1000),
      });
    } catch (error) {
      throw this.toFetchError(error);
    }

    if (!response.ok) {
      throw new SitemapFetchError(
        `Failed to fetch sitemap: HTTP ${response.status}`,
        response.status,
      );
    }

    // The body is still read under the request timeout
    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw this.toFetchError(error);
    }
    this.logger.debug(`Sitemap fetched: ${Buffer.byteLength(body)} bytes`);
    return body;
  }

  private toFetchError(error: unknown): SitemapFetchError {
    const reason = ErrorExtractor.isAbortError(error)
      ? `timed out after ${this.timeoutSecs}s`
      : ErrorExtractor.extractErrorMessage(error);
    return new SitemapFetchError(`Failed to fetch sitemap: ${reason}`, undefined, {
      cause: error,
    });
  }

  public async fetchAndParse(sitemapUrl: string): Promise<SitemapArticle[]> {
    const xml = await this.fetchSitemap(sitemapUrl);
    return parseSitemap(xml);
  }
}
