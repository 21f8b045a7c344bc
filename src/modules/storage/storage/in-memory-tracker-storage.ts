import type { TrackerStorage } from '../interfaces/tracker-storage.interface.js';
import {
  INITIAL_STREAK,
  type DailyStats,
  type StreakInfo,
  type TrackedArticle,
  type TrackerTotals,
} from '../interfaces/tracker-state.interface.js';

/**
 * In-memory implementation of TrackerStorage.
 * State is lost on restart.
 */
export class InMemoryTrackerStorage implements TrackerStorage {
  private readonly articles = new Map<string, TrackedArticle>();
  private readonly dailyStats = new Map<string, DailyStats>();
  private streak: StreakInfo = { ...INITIAL_STREAK };

  public async init(): Promise<void> {
    // Nothing to initialize
  }

  public async close(): Promise<void> {
    // Nothing to close
  }

  public async hasArticle(url: string): Promise<boolean> {
    return this.articles.has(url);
  }

  public async insertArticle(article: TrackedArticle, day: string): Promise<boolean> {
    if (this.articles.has(article.url)) {
      return false;
    }

    this.articles.set(article.url, { ...article });

    const stats = this.dailyStats.get(day) ?? { date: day, articleCount: 0, earnedCents: 0 };
    this.dailyStats.set(day, {
      date: day,
      articleCount: stats.articleCount + 1,
      earnedCents: stats.earnedCents + article.earningCents,
    });

    return true;
  }

  public async getDailyStats(day: string): Promise<DailyStats | null> {
    const stats = this.dailyStats.get(day);
    return stats ? { ...stats } : null;
  }

  public async getDailyStatsRange(fromDay: string, toDay: string): Promise<DailyStats[]> {
    return Array.from(this.dailyStats.values())
      .filter(stats => stats.date >= fromDay && stats.date <= toDay)
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(stats => ({ ...stats }));
  }

  public async getTotals(): Promise<TrackerTotals> {
    let earnedCents = 0;
    for (const article of this.articles.values()) {
      earnedCents += article.earningCents;
    }
    return { articleCount: this.articles.size, earnedCents };
  }

  public async getRecentArticles(limit: number, offset = 0): Promise<TrackedArticle[]> {
    // Insertion order is detection order; a stable sort keeps it for equal timestamps
    return Array.from(this.articles.values())
      .reverse()
      .sort((a, b) => b.detectedAt.localeCompare(a.detectedAt))
      .slice(offset, offset + limit)
      .map(article => ({ ...article }));
  }

  public async getStreak(): Promise<StreakInfo> {
    return { ...this.streak };
  }

  public async setStreak(streak: StreakInfo): Promise<void> {
    this.streak = { ...streak };
  }
}
