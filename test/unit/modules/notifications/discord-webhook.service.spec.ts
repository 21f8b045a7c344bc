import { describe, it, expect, beforeEach } from '@jest/globals';
import { DiscordWebhookService } from '../../../../src/modules/notifications/discord-webhook.service.js';
import {
  buildArticleMessage,
  dashboardButton,
} from '../../../../src/modules/notifications/message-builder.js';
import type { ArticleNotification } from '../../../../src/modules/notifications/interfaces/discord-payload.interface.js';
import { MockFetchClient } from '../../../helpers/mock-fetch-client.js';
import { InstantRetryHandler } from '../../../helpers/instant-retry-handler.js';
import { DASHBOARD_URL, WEBHOOK_URL } from '../../../helpers/fixtures.js';

const notification: ArticleNotification = {
  articleTitle: 'Harbour Reopens',
  articleUrl: 'https://news.example.com/harbour-reopens',
  articleValueCents: 415,
  todayCount: 1,
  dailyTarget: 8,
  monthlyCount: 10,
  monthlyTarget: 240,
  streak: 2,
  monthlyEarnedCents: 4150,
};

describe('DiscordWebhookService', () => {
  let fetchClient: MockFetchClient;
  let retryHandler: InstantRetryHandler;
  let service: DiscordWebhookService;

  const respond = (...responses: Array<{ status: number; body?: string; error?: Error }>) => {
    fetchClient.setResponses({ method: 'POST', url: WEBHOOK_URL, responses });
  };
  const callCount = () => fetchClient.getCallCount({ method: 'POST', url: WEBHOOK_URL });

  beforeEach(() => {
    fetchClient = new MockFetchClient();
    retryHandler = new InstantRetryHandler();
    service = new DiscordWebhookService({
      fetchClient,
      webhookUrl: WEBHOOK_URL,
      userId: '1234',
      dashboardUrl: DASHBOARD_URL,
      retryHandler,
    });
  });

  it('should post the article message as JSON', async () => {
    respond({ status: 204 });

    await expect(service.sendArticleNotification(notification)).resolves.toBe(true);

    const [request] = fetchClient.requests;
    expect(request?.headers['content-type']).toBe('application/json');
    expect(JSON.parse(request?.body ?? '')).toEqual({
      content: buildArticleMessage(notification, { userId: '1234' }).content,
      components: dashboardButton(DASHBOARD_URL),
    });
  });

  it('should wait for retry_after when rate limited', async () => {
    respond({ status: 429, body: JSON.stringify({ retry_after: 1.25 }) }, { status: 204 });

    await expect(service.sendErrorAlert('HTTP 503', 3)).resolves.toBe(true);

    expect(callCount()).toBe(2);
    expect(retryHandler.delays).toEqual([1250]);
  });

  it('should wait 5 seconds when retry_after is missing', async () => {
    respond({ status: 429, body: 'slow down' }, { status: 204 });

    await expect(service.sendStartupMessage('summary')).resolves.toBe(true);

    expect(retryHandler.delays).toEqual([5000]);
  });

  it('should back off exponentially on server errors and give up after 3 attempts', async () => {
    respond({ status: 502 });

    await expect(service.sendStartupMessage('summary')).resolves.toBe(false);

    expect(callCount()).toBe(3);
    expect(retryHandler.delays).toEqual([2000, 4000]);
  });

  it('should retry network errors', async () => {
    respond({ status: 0, error: new Error('socket hang up') }, { status: 200, body: '{}' });

    await expect(service.sendStartupMessage('summary')).resolves.toBe(true);

    expect(callCount()).toBe(2);
    expect(retryHandler.delays).toEqual([2000]);
  });

  it('should not retry client errors', async () => {
    respond({ status: 400, body: '{"message":"Invalid Form Body"}' });

    await expect(service.sendStartupMessage('summary')).resolves.toBe(false);

    expect(callCount()).toBe(1);
    expect(retryHandler.delays).toEqual([]);
  });

  it('should fail at once for a deleted webhook', async () => {
    respond({ status: 404, body: '{"message":"Unknown Webhook","code":10015}' });

    await expect(service.sendErrorAlert('HTTP 503', 3)).resolves.toBe(false);

    expect(callCount()).toBe(1);
    expect(retryHandler.delays).toEqual([]);
  });

  it('should stop retrying once the signal is aborted', async () => {
    respond({ status: 500 });
    const controller = new AbortController();
    controller.abort();

    await expect(service.sendStartupMessage('summary', controller.signal)).resolves.toBe(false);

    expect(callCount()).toBe(1);
  });

  it('should honour a custom attempt limit', async () => {
    service = new DiscordWebhookService({
      fetchClient,
      webhookUrl: WEBHOOK_URL,
      retryHandler,
      maxAttempts: 1,
    });
    respond({ status: 500 });

    await expect(service.sendStartupMessage('summary')).resolves.toBe(false);

    expect(callCount()).toBe(1);
  });
});
