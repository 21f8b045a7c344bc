import type { TrackerConfig } from '../../config/tracker-config.interface.js';
import type { FetchClient } from '../../http/fetch-client.js';
import { DiscordWebhookService } from '../notifications/discord-webhook.service.js';
import { RetryHandlerService } from '../notifications/services/retry-handler.service.js';
import { SitemapService } from '../sitemap/sitemap.service.js';
import { StatsService } from '../stats/stats.service.js';
import type { TrackerStorage } from '../storage/interfaces/tracker-storage.interface.js';
import { StreakService } from '../streak/streak.service.js';
import { PollerService } from './poller.service.js';
import { TrackerService } from './tracker.service.js';

export interface CreateTrackerOptions {
  config: TrackerConfig;
  storage: TrackerStorage;
  fetchClient: FetchClient;
  timeZone: string;
  retryHandler?: RetryHandlerService;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  wait?: (ms: number, abortSignal: AbortSignal) => Promise<boolean>;
}

export interface Tracker {
  notifier: DiscordWebhookService;
  trackerService: TrackerService;
  pollerService: PollerService;
}

/**
 * Wire the bot services together
 */
export function createTracker(options: CreateTrackerOptions): Tracker {
  const { config, storage, fetchClient, timeZone, now } = options;

  const sitemapService = new SitemapService({
    fetchClient,
    timeoutSecs: config.sitemap.timeoutSecs,
    now,
  });

  const notifier = new DiscordWebhookService({
    fetchClient,
    webhookUrl: config.discord.webhookUrl,
    userId: config.discord.userId,
    dashboardUrl: config.dashboard.url,
    retryHandler: options.retryHandler ?? new RetryHandlerService(),
  });

  const streakService = new StreakService({ storage, timeZone });
  const statsService = new StatsService({ storage, timeZone, earnings: config.earnings });

  const trackerService = new TrackerService({
    sitemapService,
    storage,
    streakService,
    statsService,
    notifier,
    config,
    timeZone,
    now,
    sleep: options.sleep,
  });

  const pollerService = new PollerService({
    trackerService,
    notifier,
    config,
    timeZone,
    now,
    wait: options.wait,
  });

  return { notifier, trackerService, pollerService };
}
