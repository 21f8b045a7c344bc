import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { Logger, type LoggerLike } from '../common/logger.js';
import { isValidTimeZone } from '../common/utils/calendar.util.js';
import { SITEMAP_FETCH_TIMEOUT_SECS } from '../common/constants/app.constants.js';
import type { TrackerConfig } from './tracker-config.interface.js';
import { ConfigValidationError } from './validators/config-validator.js';
import { TrackerConfigValidator } from './validators/tracker-config-validator.js';

export const DEFAULT_TIMEZONE = 'Asia/Jakarta';

type Env = Record<string, string | undefined>;

/**
 * Load environment variables from .env files.
 * Variables already present in the process environment win.
 */
export function loadEnvironmentFiles(): void {
  const nodeEnv = process.env['NODE_ENV'] ?? 'development';
  const envFiles = [`.env.${nodeEnv}`, '.env'];

  for (const envFile of envFiles) {
    const envPath = resolve(envFile);
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath });
    }
  }
}

/**
 * Build the tracker configuration from environment variables
 */
export function loadTrackerConfig(env: Env = process.env): TrackerConfig {
  const getEnv = (name: string, defaultValue = ''): string => {
    const val = env[name];
    return val === undefined || val.trim() === '' ? defaultValue : val.trim();
  };
  const getEnvNum = (name: string, defaultValue: number): number => {
    const val = env[name];
    if (val === undefined || val.trim() === '') return defaultValue;
    const parsed = Number(val);
    if (Number.isNaN(parsed)) {
      throw new ConfigValidationError(`${name} must be a number, got "${val}"`);
    }
    return parsed;
  };

  const storageType = getEnv('STORAGE_TYPE', 'memory').toLowerCase();
  const redisUrl = getEnv('REDIS_URL');

  const config = {
    sitemap: {
      url: getEnv('SITEMAP_URL'),
      timeoutSecs: getEnvNum('SITEMAP_TIMEOUT_SECS', SITEMAP_FETCH_TIMEOUT_SECS),
    },
    discord: {
      webhookUrl: getEnv('DISCORD_WEBHOOK_URL'),
      userId: getEnv('DISCORD_USER_ID'),
    },
    earnings: {
      articleValueCents: Math.round(getEnvNum('ARTICLE_VALUE_USD', 4.15) * 100),
      dailyTarget: getEnvNum('DAILY_TARGET', 8),
      monthlyTarget: getEnvNum('MONTHLY_TARGET', 240),
    },
    polling: {
      intervalSecs: getEnvNum('POLL_INTERVAL', 180),
      maxConsecutiveFailures: getEnvNum('MAX_CONSECUTIVE_FAILURES', 3),
    },
    dashboard: {
      url: getEnv('DASHBOARD_URL'),
      password: getEnv('DASHBOARD_PASSWORD'),
      host: getEnv('DASHBOARD_HOST', '0.0.0.0'),
      port: getEnvNum('DASHBOARD_PORT', 8080),
    },
    storage: {
      type: storageType,
      url: redisUrl === '' ? undefined : redisUrl,
    },
    timezone: getEnv('TIMEZONE', DEFAULT_TIMEZONE),
    logLevel: getEnv('LOG_LEVEL', 'info').toLowerCase(),
  };

  validateTrackerConfig(config);

  return config;
}

function validateTrackerConfig(config: unknown): asserts config is TrackerConfig {
  const validator: TrackerConfigValidator = new TrackerConfigValidator();
  validator.validate(config);
}

/**
 * Throws ConfigValidationError when settings the bot cannot run without are missing
 */
export function assertBotConfig(config: TrackerConfig): void {
  const validator: TrackerConfigValidator = new TrackerConfigValidator();
  validator.validateForBot(config);
}

/**
 * Return the time zone when the runtime knows it, UTC otherwise
 */
export function resolveTimeZone(
  timeZone: string,
  logger: LoggerLike = new Logger('Config'),
): string {
  if (isValidTimeZone(timeZone)) {
    return timeZone;
  }
  logger.error(`Unknown timezone: ${timeZone}. Using UTC.`);
  return 'UTC';
}
