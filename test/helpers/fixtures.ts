import type { TrackerConfig } from '../../src/config/tracker-config.interface.js';
import type { TrackedArticle } from '../../src/modules/storage/interfaces/tracker-state.interface.js';

export const SITEMAP_URL = 'https://news.example.com/news-sitemap.xml';
export const WEBHOOK_URL = 'https://discord.example.com/api/webhooks/1/test-token';
export const DASHBOARD_URL = 'http://127.0.0.1:8080/?key=test-secret';

/**
 * 2024-10-15 10:00 in Asia/Jakarta (UTC+7)
 */
export const FIXED_NOW = new Date('2024-10-15T03:00:00.000Z');

/**
 * Cache busted sitemap URL requested at FIXED_NOW
 */
export const SITEMAP_REQUEST_URL = `${SITEMAP_URL}?_cb=${FIXED_NOW.getTime() / 1000}`;

export function createTestConfig(overrides: Partial<TrackerConfig> = {}): TrackerConfig {
  return {
    sitemap: { url: SITEMAP_URL, timeoutSecs: 30 },
    discord: { webhookUrl: WEBHOOK_URL, userId: '' },
    earnings: { articleValueCents: 415, dailyTarget: 8, monthlyTarget: 240 },
    polling: { intervalSecs: 180, maxConsecutiveFailures: 3 },
    dashboard: { url: '', password: 'test-secret', host: '127.0.0.1', port: 8080 },
    storage: { type: 'memory' },
    timezone: 'Asia/Jakarta',
    logLevel: 'silent',
    ...overrides,
  };
}

interface SitemapEntry {
  loc: string;
  title?: string;
  publicationDate?: string;
  keywords?: string;
}

export function buildSitemapXml(entries: SitemapEntry[]): string {
  const urls = entries
    .map(entry => {
      const news: string[] = [];
      if (entry.publicationDate !== undefined) {
        news.push(`<news:publication_date>${entry.publicationDate}</news:publication_date>`);
      }
      if (entry.title !== undefined) {
        news.push(`<news:title>${entry.title}</news:title>`);
      }
      if (entry.keywords !== undefined) {
        news.push(`<news:keywords>${entry.keywords}</news:keywords>`);
      }
      return [
        '  <url>',
        `    <loc>${entry.loc}</loc>`,
        '    <news:news>',
        '      <news:publication><news:name>Example News</news:name><news:language>en</news:language></news:publication>',
        ...news.map(line => `      ${line}`),
        '    </news:news>',
        '  </url>',
      ].join('\n');
    })
    .join('\n');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9" xmlns:news="http://www.google.com/schemas/sitemap-news/0.9">',
    urls,
    '</urlset>',
  ].join('\n');
}

export function createTrackedArticle(
  slug: string,
  detectedAt: string,
  overrides: Partial<TrackedArticle> = {},
): TrackedArticle {
  return {
    url: `https://news.example.com/${slug}`,
    title: slug,
    publishedAt: null,
    detectedAt,
    earningCents: 415,
    ...overrides,
  };
}
