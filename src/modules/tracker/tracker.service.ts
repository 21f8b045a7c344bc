import { Logger } from '../../common/logger.js';
import { NOTIFICATION_SPACING_MS } from '../../common/constants/app.constants.js';
import { toDateKey } from '../../common/utils/calendar.util.js';
import { sleep } from '../../common/utils/sleep.util.js';
import type { TrackerConfig } from '../../config/tracker-config.interface.js';
import type { DiscordWebhookService } from '../notifications/discord-webhook.service.js';
import type { SitemapArticle } from '../sitemap/interfaces/sitemap-article.interface.js';
import type { SitemapService } from '../sitemap/sitemap.service.js';
import type { StatsService } from '../stats/stats.service.js';
import type { TrackerStorage } from '../storage/interfaces/tracker-storage.interface.js';
import type { StreakService } from '../streak/streak.service.js';

/**
 * ISO form of a sitemap publication date, null when absent or unparsable
 */
export function parsePublishedAt(value: string): string | null {
  if (!value) {
    return null;
  }
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

export class TrackerService {
  private readonly logger = new Logger(TrackerService.name);
  private readonly sitemapService: SitemapService;
  private readonly storage: TrackerStorage;
  private readonly streakService: StreakService;
  private readonly statsService: StatsService;
  private readonly notifier: DiscordWebhookService;
  private readonly config: TrackerConfig;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(params: {
    sitemapService: SitemapService;
    storage: TrackerStorage;
    streakService: StreakService;
    statsService: StatsService;
    notifier: DiscordWebhookService;
    config: TrackerConfig;
    timeZone: string;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this.sitemapService = params.sitemapService;
    this.storage = params.storage;
    this.streakService = params.streakService;
    this.statsService = params.statsService;
    this.notifier = params.notifier;
    this.config = params.config;
    this.timeZone = params.timeZone;
    this.now = params.now ?? (() => new Date());
    this.sleep = params.sleep ?? (ms => sleep(ms));
  }

  /**
   * Fetch the sitemap once, record and announce every unknown article.
   * Fetch and parse failures propagate to the caller.
   * @returns number of new articles
   */
  public async pollCycle(abortSignal?: AbortSignal): Promise<number> {
    const articles = await this.sitemapService.fetchAndParse(this.config.sitemap.url);

    let newCount = 0;

    for (const article of articles) {
      if (abortSignal?.aborted) {
        this.logger.log('Poll cycle interrupted by shutdown');
        break;
      }

      if (await this.storage.hasArticle(article.url)) {
        continue;
      }

      if (newCount > 0) {
        await this.sleep(NOTIFICATION_SPACING_MS);
      }

      const recorded = await this.recordArticle(article, abortSignal);
      if (recorded) {
        newCount++;
      }
    }

    return newCount;
  }

  /**
   * Send a sample notification to check the webhook and the dashboard button
   */
  public async sendTestNotification(): Promise<boolean> {
    const { earnings } = this.config;
    this.logger.log('=== TEST MODE ===');

    const delivered = await this.notifier.sendArticleNotification({
      articleTitle: '🧪 Test Article — Bot Works!',
      articleUrl: 'https://example.com/test-article',
      articleValueCents: earnings.articleValueCents,
      todayCount: 3,
      dailyTarget: earnings.dailyTarget,
      monthlyCount: 42,
      monthlyTarget: earnings.monthlyTarget,
      streak: 5,
      monthlyEarnedCents: 3750,
    });

    if (delivered) {
      this.logger.log('Test notification sent! Check Discord.');
    }
    return delivered;
  }

  private async recordArticle(article: SitemapArticle, abortSignal?: AbortSignal): Promise<boolean> {
    const now = this.now();
    const day = toDateKey(now, this.timeZone);
    const { earnings } = this.config;

    this.logger.log(`🆕 New article: ${article.title}`);

    const inserted = await this.storage.insertArticle(
      {
        url: article.url,
        title: article.title,
        publishedAt: parsePublishedAt(article.publicationDate),
        detectedAt: now.toISOString(),
        earningCents: earnings.articleValueCents,
      },
      day,
    );

    if (!inserted) {
      this.logger.debug(`Article already recorded: ${article.url}`);
      return false;
    }
    this.logger.log(`Article inserted: ${article.title}`);

    const streak = await this.streakService.recordPublication(now);
    const snapshot = await this.statsService.getPeriodSnapshot(now);

    await this.notifier.sendArticleNotification(
      {
        articleTitle: article.title,
        articleUrl: article.url,
        articleValueCents: earnings.articleValueCents,
        todayCount: snapshot.today.count,
        dailyTarget: earnings.dailyTarget,
        monthlyCount: snapshot.month.count,
        monthlyTarget: earnings.monthlyTarget,
        streak,
        monthlyEarnedCents: snapshot.month.earnedCents,
      },
      abortSignal,
    );

    return true;
  }
}
