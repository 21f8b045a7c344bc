import type {
  DailyStats,
  StreakInfo,
  TrackedArticle,
  TrackerTotals,
} from './tracker-state.interface.js';

/**
 * Interface for tracker persistence.
 * Abstracts away the actual storage mechanism (memory, redis)
 */
export interface TrackerStorage {
  /**
   * Initialize the storage
   */
  init(): Promise<void>;

  /**
   * Close the storage connection
   */
  close(): Promise<void>;

  /**
   * Check if an article URL was already recorded
   */
  hasArticle(url: string): Promise<boolean>;

  /**
   * Record an article and add it to the stats of `day`.
   * @returns false when the URL was already recorded (nothing changes)
   */
  insertArticle(article: TrackedArticle, day: string): Promise<boolean>;

  /**
   * Get counters of a single day, null when nothing was recorded that day
   */
  getDailyStats(day: string): Promise<DailyStats | null>;

  /**
   * Get counters of every recorded day in [fromDay, toDay], oldest first
   */
  getDailyStatsRange(fromDay: string, toDay: string): Promise<DailyStats[]>;

  /**
   * Get all-time counters
   */
  getTotals(): Promise<TrackerTotals>;

  /**
   * Get articles by detection time, newest first
   */
  getRecentArticles(limit: number, offset?: number): Promise<TrackedArticle[]>;

  getStreak(): Promise<StreakInfo>;

  setStreak(streak: StreakInfo): Promise<void>;
}
