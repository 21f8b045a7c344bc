import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { createTracker } from '../../../../src/modules/tracker/create-tracker.js';
import {
  buildConfigSummary,
  type PollerService,
} from '../../../../src/modules/tracker/poller.service.js';
import { InMemoryTrackerStorage } from '../../../../src/modules/storage/storage/in-memory-tracker-storage.js';
import { MockFetchClient } from '../../../helpers/mock-fetch-client.js';
import { InstantRetryHandler } from '../../../helpers/instant-retry-handler.js';
import {
  DASHBOARD_URL,
  FIXED_NOW,
  SITEMAP_REQUEST_URL,
  WEBHOOK_URL,
  buildSitemapXml,
  createTestConfig,
} from '../../../helpers/fixtures.js';

const SITEMAP_XML = buildSitemapXml([{ loc: 'https://news.example.com/one', title: 'One' }]);

describe('PollerService', () => {
  let fetchClient: MockFetchClient;
  let pollerService: PollerService;
  const wait = jest.fn(async (_ms: number, _signal: AbortSignal): Promise<boolean> => true);

  const sitemapResponses = (...responses: Array<{ status: number; body?: string }>) => {
    fetchClient.setResponses({ method: 'GET', url: SITEMAP_REQUEST_URL, responses });
  };
  const webhookBodies = () =>
    fetchClient.requestsTo({ method: 'POST', url: WEBHOOK_URL }).map(request => request.body ?? '');

  beforeEach(() => {
    wait.mockReset();
    wait.mockResolvedValue(true);
    fetchClient = new MockFetchClient();
    fetchClient.setResponse({ method: 'POST', url: WEBHOOK_URL, response: { status: 204 } });

    ({ pollerService } = createTracker({
      config: createTestConfig(),
      storage: new InMemoryTrackerStorage(),
      fetchClient,
      timeZone: 'Asia/Jakarta',
      retryHandler: new InstantRetryHandler(),
      now: () => FIXED_NOW,
      sleep: async () => undefined,
      wait,
    }));
  });

  describe('runOnce', () => {
    it('should report new articles', async () => {
      sitemapResponses({ status: 200, body: SITEMAP_XML });

      await expect(pollerService.runOnce()).resolves.toEqual({
        status: 'success',
        newArticles: 1,
      });
    });

    it('should alert once failures reach the threshold', async () => {
      sitemapResponses({ status: 500 });

      const first = await pollerService.runOnce();
      const second = await pollerService.runOnce();
      expect(pollerService.failuresInARow).toBe(2);
      const third = await pollerService.runOnce();

      expect(first).toEqual({
        status: 'failure',
        error: 'Failed to fetch sitemap: HTTP 500',
        consecutiveFailures: 1,
        alertSent: false,
      });
      expect(second).toMatchObject({ consecutiveFailures: 2, alertSent: false });
      expect(third).toMatchObject({ consecutiveFailures: 3, alertSent: true });
      expect(pollerService.failuresInARow).toBe(0);

      const bodies = webhookBodies();
      expect(bodies).toHaveLength(1);
      expect(JSON.parse(bodies[0] ?? '{}')).toEqual({
        content: [
          '⚠️  **ARTICLE TRACKER — ERROR**',
          '',
          'Sitemap polling has failed **3** consecutive times.',
          '```',
          'Sitemap fetch failed 3x in a row.',
          'Last error: Failed to fetch sitemap: HTTP 500',
          '```',
          'Bot will keep retrying.',
        ].join('\n'),
      });
    });

    it('should reset the counter after a success', async () => {
      sitemapResponses({ status: 500 }, { status: 500 }, { status: 200, body: SITEMAP_XML });

      await pollerService.runOnce();
      await pollerService.runOnce();
      await pollerService.runOnce();

      expect(pollerService.failuresInARow).toBe(0);
      expect(webhookBodies()).toHaveLength(1);
      expect(webhookBodies()[0]).toContain('ARTICLE PUBLISHED');
    });

    it('should count unparsable sitemaps as failures', async () => {
      sitemapResponses({ status: 200, body: '<html><body>Maintenance</body></html>' });

      await expect(pollerService.runOnce()).resolves.toEqual({
        status: 'failure',
        error: 'Sitemap document has no <urlset> root element',
        consecutiveFailures: 1,
        alertSent: false,
      });
    });
  });

  describe('run', () => {
    it('should announce startup and poll until aborted', async () => {
      sitemapResponses({ status: 200, body: SITEMAP_XML });
      const controller = new AbortController();
      wait.mockResolvedValueOnce(true).mockImplementationOnce(async () => {
        controller.abort();
        return false;
      });

      await pollerService.run(controller.signal);

      expect(fetchClient.getCallCount({ method: 'GET', url: SITEMAP_REQUEST_URL })).toBe(2);
      expect(wait).toHaveBeenCalledTimes(2);
      expect(wait).toHaveBeenCalledWith(180_000, controller.signal);

      const bodies = webhookBodies();
      expect(bodies).toHaveLength(2);
      expect(bodies[0]).toContain('ARTICLE TRACKER — ONLINE');
      expect(bodies[1]).toContain('ARTICLE PUBLISHED');
    });
  });
});

describe('buildConfigSummary', () => {
  it('should list the effective settings', () => {
    const config = createTestConfig();
    config.dashboard.url = DASHBOARD_URL;

    expect(buildConfigSummary(config)).toBe(
      [
        'Sitemap: https://news.example.com/news-sitemap.xml',
        'Rate: $4.15/article',
        'Daily target: 8',
        'Monthly target: 240',
        'Poll interval: 180s',
        `Dashboard: ${DASHBOARD_URL}`,
      ].join('\n'),
    );
  });
});
