/**
 * Article recorded by the tracker
 */
export interface TrackedArticle {
  url: string;
  title: string;

  /**
   * Publication date announced by the sitemap (ISO 8601), null when unknown
   */
  publishedAt: string | null;

  /**
   * When the bot first saw the article (ISO 8601)
   */
  detectedAt: string;

  earningCents: number;
}

/**
 * Per calendar day counters
 */
export interface DailyStats {
  /**
   * Calendar day in the configured time zone (YYYY-MM-DD)
   */
  date: string;

  articleCount: number;
  earnedCents: number;
}

export interface StreakInfo {
  currentStreak: number;

  /**
   * Last calendar day an article was detected (YYYY-MM-DD)
   */
  lastPublishDate: string | null;
}

export interface TrackerTotals {
  articleCount: number;
  earnedCents: number;
}

export const INITIAL_STREAK: Readonly<StreakInfo> = {
  currentStreak: 0,
  lastPublishDate: null,
};
