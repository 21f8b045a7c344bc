/**
 * Global application constants
 */

/**
 * Graceful shutdown timeout in milliseconds.
 * Cleanup hooks still running after this duration are abandoned.
 */
export const SHUTDOWN_TIMEOUT_MS = 10_000;

/**
 * Sitemap request timeout in seconds (default for SITEMAP_TIMEOUT_SECS)
 */
export const SITEMAP_FETCH_TIMEOUT_SECS = 30;

/**
 * Discord webhook request timeout in milliseconds
 */
export const WEBHOOK_TIMEOUT_MS = 15_000;

/**
 * Delivery attempts per webhook message
 */
export const WEBHOOK_MAX_ATTEMPTS = 3;

/**
 * Base of the exponential backoff between webhook attempts, in seconds
 */
export const WEBHOOK_BACKOFF_BASE_SECS = 2;

/**
 * Wait applied when Discord answers 429 without a retry_after value, in seconds
 */
export const WEBHOOK_DEFAULT_RETRY_AFTER_SECS = 5;

/**
 * Pause between two article notifications of the same poll cycle
 */
export const NOTIFICATION_SPACING_MS = 1_000;

/**
 * Maximum length of an error text embedded in an alert message
 */
export const ALERT_ERROR_MAX_LENGTH = 500;

/**
 * Dashboard windows
 */
export const DASHBOARD_RECENT_ARTICLES = 20;
export const DASHBOARD_CHART_DAYS = 30;
export const DASHBOARD_HEATMAP_DAYS = 90;
