import { Redis } from 'ioredis';
import type { TrackerStorage } from '../interfaces/tracker-storage.interface.js';
import {
  INITIAL_STREAK,
  type DailyStats,
  type StreakInfo,
  type TrackedArticle,
  type TrackerTotals,
} from '../interfaces/tracker-state.interface.js';
import { Logger } from '../../../common/logger.js';

function isTrackedArticle(value: unknown): value is TrackedArticle {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.url === 'string' &&
    typeof record.title === 'string' &&
    (record.publishedAt === null || typeof record.publishedAt === 'string') &&
    typeof record.detectedAt === 'string' &&
    typeof record.earningCents === 'number'
  );
}

export type TransactionResults = Array<[error: Error | null, result: unknown]> | null;

function toInt(value: string | undefined | null): number {
  if (!value) return 0;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Redis implementation of TrackerStorage using ioredis (TCP).
 */
export class RedisTrackerStorage implements TrackerStorage {
  private readonly logger = new Logger(RedisTrackerStorage.name);
  private readonly redis: Redis;
  private readonly KEY_PREFIX = 'tracker:';
  private readonly URLS_KEY = `${this.KEY_PREFIX}articles:urls`;
  private readonly ARTICLES_KEY = `${this.KEY_PREFIX}articles`;
  private readonly DAILY_COUNT_KEY = `${this.KEY_PREFIX}daily:count`;
  private readonly DAILY_EARNED_KEY = `${this.KEY_PREFIX}daily:earned`;
  private readonly TOTALS_KEY = `${this.KEY_PREFIX}totals`;
  private readonly STREAK_KEY = `${this.KEY_PREFIX}streak`;

  constructor(urlOrClient: string | Redis) {
    this.redis =
      typeof urlOrClient === 'string'
        ? new Redis(urlOrClient, {
            maxRetriesPerRequest: 3,
            retryStrategy: (times: number) => Math.min(times * 50, 2000),
          })
        : urlOrClient;

    this.redis.on('error', (err: Error) => {
      this.logger.error(`Redis connection error: ${err.message}`);
    });
  }

  public async init(): Promise<void> {
    await this.redis.ping();
    this.logger.log('Redis storage ready');
  }

  public async close(): Promise<void> {
    await this.redis.quit();
  }

  public async hasArticle(url: string): Promise<boolean> {
    return (await this.redis.sismember(this.URLS_KEY, url)) === 1;
  }

  public async insertArticle(article: TrackedArticle, day: string): Promise<boolean> {
    // The URL set is the uniqueness guard: only the first writer gets 1 back
    const added = await this.redis.sadd(this.URLS_KEY, article.url);
    if (added === 0) {
      return false;
    }

    try {
      const results = await this.writeArticle(article, day);
      const failure = results?.find(([error]) => error !== null);
      if (!results || failure) {
        throw new Error(failure?.[0]?.message ?? 'transaction aborted');
      }
    } catch (error) {
      // Release the URL so the next poll records the article again
      await this.redis.srem(this.URLS_KEY, article.url);
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to record article ${article.url}: ${reason}`, { cause: error });
    }

    return true;
  }

  protected writeArticle(article: TrackedArticle, day: string): Promise<TransactionResults> {
    return this.redis
      .multi()
      .lpush(this.ARTICLES_KEY, JSON.stringify(article))
      .hincrby(this.DAILY_COUNT_KEY, day, 1)
      .hincrby(this.DAILY_EARNED_KEY, day, article.earningCents)
      .hincrby(this.TOTALS_KEY, 'articleCount', 1)
      .hincrby(this.TOTALS_KEY, 'earnedCents', article.earningCents)
      .exec();
  }

  public async getDailyStats(day: string): Promise<DailyStats | null> {
    const [count, earned] = await Promise.all([
      this.redis.hget(this.DAILY_COUNT_KEY, day),
      this.redis.hget(this.DAILY_EARNED_KEY, day),
    ]);
    if (count === null && earned === null) {
      return null;
    }
    return { date: day, articleCount: toInt(count), earnedCents: toInt(earned) };
  }

  public async getDailyStatsRange(fromDay: string, toDay: string): Promise<DailyStats[]> {
    const [counts, earned] = await Promise.all([
      this.redis.hgetall(this.DAILY_COUNT_KEY),
      this.redis.hgetall(this.DAILY_EARNED_KEY),
    ]);

    const days = new Set([...Object.keys(counts), ...Object.keys(earned)]);

    return Array.from(days)
      .filter(day => day >= fromDay && day <= toDay)
      .sort()
      .map(day => ({
        date: day,
        articleCount: toInt(counts[day]),
        earnedCents: toInt(earned[day]),
      }));
  }

  public async getTotals(): Promise<TrackerTotals> {
    const totals = await this.redis.hgetall(this.TOTALS_KEY);
    return {
      articleCount: toInt(totals['articleCount']),
      earnedCents: toInt(totals['earnedCents']),
    };
  }

  public async getRecentArticles(limit: number, offset = 0): Promise<TrackedArticle[]> {
    if (limit <= 0) {
      return [];
    }
    const rows = await this.redis.lrange(this.ARTICLES_KEY, offset, offset + limit - 1);

    const articles: TrackedArticle[] = [];
    for (const row of rows) {
      try {
        const parsed: unknown = JSON.parse(row);
        if (isTrackedArticle(parsed)) {
          articles.push(parsed);
        } else {
          this.logger.warn('Skipping malformed article record', row);
        }
      } catch (e) {
        this.logger.error(`Failed to parse article record: ${String(e)}`);
      }
    }
    return articles;
  }

  public async getStreak(): Promise<StreakInfo> {
    const data = await this.redis.hgetall(this.STREAK_KEY);
    if (data['currentStreak'] === undefined) {
      return { ...INITIAL_STREAK };
    }
    return {
      currentStreak: toInt(data['currentStreak']),
      lastPublishDate: data['lastPublishDate'] ? data['lastPublishDate'] : null,
    };
  }

  public async setStreak(streak: StreakInfo): Promise<void> {
    await this.redis.hset(this.STREAK_KEY, {
      currentStreak: String(streak.currentStreak),
      lastPublishDate: streak.lastPublishDate ?? '',
    });
  }
}
