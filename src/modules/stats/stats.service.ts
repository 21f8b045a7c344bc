import {
  DASHBOARD_CHART_DAYS,
  DASHBOARD_HEATMAP_DAYS,
  DASHBOARD_RECENT_ARTICLES,
} from '../../common/constants/app.constants.js';
import {
  addDays,
  firstOfMonth,
  formatShortDate,
  formatTimestamp,
  toDateKey,
} from '../../common/utils/calendar.util.js';
import type { EarningsConfig } from '../../config/tracker-config.interface.js';
import { calculateDailyRemaining, calculatePercent, centsToUsd } from '../progress/progress.util.js';
import type { TrackerStorage } from '../storage/interfaces/tracker-storage.interface.js';
import type { TrackedArticle } from '../storage/interfaces/tracker-state.interface.js';
import type {
  DashboardArticle,
  DashboardModel,
  PeriodSnapshot,
  StatsSummary,
} from './interfaces/stats.interface.js';

export function toDashboardArticle(article: TrackedArticle): DashboardArticle {
  return {
    title: article.title,
    url: article.url,
    detectedAt: article.detectedAt,
    publishedAt: article.publishedAt,
    earning: centsToUsd(article.earningCents),
  };
}

/**
 * Aggregates over the tracker storage, in calendar days of the configured zone
 */
export class StatsService {
  private readonly storage: TrackerStorage;
  private readonly timeZone: string;
  private readonly earnings: EarningsConfig;

  constructor(params: { storage: TrackerStorage; timeZone: string; earnings: EarningsConfig }) {
    this.storage = params.storage;
    this.timeZone = params.timeZone;
    this.earnings = params.earnings;
  }

  public async getPeriodSnapshot(now: Date): Promise<PeriodSnapshot> {
    const today = toDateKey(now, this.timeZone);
    const [todayStats, monthStats] = await Promise.all([
      this.storage.getDailyStats(today),
      this.storage.getDailyStatsRange(firstOfMonth(today), today),
    ]);

    return {
      today: {
        count: todayStats?.articleCount ?? 0,
        earnedCents: todayStats?.earnedCents ?? 0,
      },
      month: {
        count: monthStats.reduce((sum, day) => sum + day.articleCount, 0),
        earnedCents: monthStats.reduce((sum, day) => sum + day.earnedCents, 0),
      },
    };
  }

  public async getSummary(now: Date): Promise<StatsSummary> {
    const [snapshot, streak] = await Promise.all([
      this.getPeriodSnapshot(now),
      this.storage.getStreak(),
    ]);

    return {
      today_count: snapshot.today.count,
      today_earned: centsToUsd(snapshot.today.earnedCents),
      monthly_count: snapshot.month.count,
      monthly_earned: centsToUsd(snapshot.month.earnedCents),
      streak: streak.currentStreak,
      daily_target: this.earnings.dailyTarget,
      monthly_target: this.earnings.monthlyTarget,
    };
  }

  public async getArticles(limit: number, offset: number): Promise<DashboardArticle[]> {
    const articles = await this.storage.getRecentArticles(limit, offset);
    return articles.map(toDashboardArticle);
  }

  public async getDashboard(now: Date): Promise<DashboardModel> {
    const today = toDateKey(now, this.timeZone);
    const { dailyTarget, monthlyTarget, articleValueCents } = this.earnings;

    const heatmapStart = addDays(today, -DASHBOARD_HEATMAP_DAYS);
    const [snapshot, totals, streak, recent, heatmapRows] = await Promise.all([
      this.getPeriodSnapshot(now),
      this.storage.getTotals(),
      this.storage.getStreak(),
      this.storage.getRecentArticles(DASHBOARD_RECENT_ARTICLES),
      this.storage.getDailyStatsRange(heatmapStart, today),
    ]);

    const chartStart = addDays(today, -DASHBOARD_CHART_DAYS);
    const chartRows = heatmapRows.filter(row => row.date >= chartStart);

    // Every day of the window, oldest first, empty days included
    const counts = new Map(heatmapRows.map(row => [row.date, row.articleCount] as const));
    const heatmapDays = Array.from({ length: DASHBOARD_HEATMAP_DAYS + 1 }, (_, index) => {
      const date = addDays(heatmapStart, index);
      return { date, count: counts.get(date) ?? 0 };
    });

    return {
      generatedAt: formatTimestamp(now, this.timeZone),
      timezone: this.timeZone,

      todayEarned: centsToUsd(snapshot.today.earnedCents),
      monthlyEarned: centsToUsd(snapshot.month.earnedCents),
      totalEarned: centsToUsd(totals.earnedCents),
      articleValue: centsToUsd(articleValueCents),

      todayCount: snapshot.today.count,
      dailyTarget,
      monthlyCount: snapshot.month.count,
      monthlyTarget,
      totalCount: totals.articleCount,
      dailyRemaining: calculateDailyRemaining(snapshot.today.count, dailyTarget),

      todayPct: calculatePercent(snapshot.today.count, dailyTarget),
      monthlyPct: calculatePercent(snapshot.month.count, monthlyTarget),

      streak: streak.currentStreak,
      lastPublish: streak.lastPublishDate,

      recentArticles: recent.map(toDashboardArticle),

      chart: {
        labels: chartRows.map(row => formatShortDate(row.date)),
        values: chartRows.map(row => row.articleCount),
      },

      heatmapDays,
    };
  }
}
