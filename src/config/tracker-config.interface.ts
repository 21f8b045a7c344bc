import type { LogLevel } from '../common/logger.js';

/**
 * Sitemap polling configuration
 */
export interface SitemapConfig {
  /**
   * News sitemap URL (required by the bot)
   */
  url: string;

  /**
   * Request timeout in seconds
   */
  timeoutSecs: number;
}

/**
 * Discord webhook configuration
 */
export interface DiscordConfig {
  /**
   * Webhook URL (required by the bot)
   */
  webhookUrl: string;

  /**
   * User mentioned at the end of every message (optional, empty disables the mention)
   */
  userId: string;
}

/**
 * Earnings and goals
 */
export interface EarningsConfig {
  /**
   * Value of one published article, in cents
   */
  articleValueCents: number;

  dailyTarget: number;
  monthlyTarget: number;
}

export interface PollingConfig {
  /**
   * Delay between two sitemap polls in seconds
   */
  intervalSecs: number;

  /**
   * Failed polls in a row before an error alert is sent
   */
  maxConsecutiveFailures: number;
}

export interface DashboardConfig {
  /**
   * Public dashboard link used in Discord messages (optional)
   */
  url: string;

  /**
   * Value expected in the `key` query parameter. Empty disables the check.
   */
  password: string;

  host: string;
  port: number;
}

export type StorageType = 'memory' | 'redis';

export interface StorageConfig {
  type: StorageType;

  /**
   * Redis connection URL, used when type is `redis`
   */
  url?: string;
}

/**
 * Article tracker configuration
 */
export interface TrackerConfig {
  sitemap: SitemapConfig;
  discord: DiscordConfig;
  earnings: EarningsConfig;
  polling: PollingConfig;
  dashboard: DashboardConfig;
  storage: StorageConfig;

  /**
   * IANA time zone used to decide calendar days
   */
  timezone: string;

  logLevel: LogLevel;
}
