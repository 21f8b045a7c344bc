export interface PeriodStats {
  count: number;
  earnedCents: number;
}

export interface PeriodSnapshot {
  today: PeriodStats;
  month: PeriodStats;
}

/**
 * Compact stats returned by GET /api/stats (snake_case wire format, dollars)
 */
export interface StatsSummary {
  today_count: number;
  today_earned: number;
  monthly_count: number;
  monthly_earned: number;
  streak: number;
  daily_target: number;
  monthly_target: number;
}

export interface DashboardArticle {
  title: string;
  url: string;
  detectedAt: string;
  publishedAt: string | null;
  earning: number;
}

export interface HeatmapDay {
  date: string;
  count: number;
}

/**
 * Everything the dashboard page renders
 */
export interface DashboardModel {
  generatedAt: string;
  timezone: string;

  todayEarned: number;
  monthlyEarned: number;
  totalEarned: number;
  articleValue: number;

  todayCount: number;
  dailyTarget: number;
  monthlyCount: number;
  monthlyTarget: number;
  totalCount: number;
  dailyRemaining: number;

  todayPct: number;
  monthlyPct: number;

  streak: number;
  lastPublish: string | null;

  recentArticles: DashboardArticle[];

  chart: {
    labels: string[];
    values: number[];
  };

  /**
   * Oldest first, one entry per calendar day (YYYY-MM-DD) in the configured time zone,
   * today included
   */
  heatmapDays: HeatmapDay[];
}
