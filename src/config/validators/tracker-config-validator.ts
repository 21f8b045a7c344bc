import { LOG_LEVELS } from '../../common/logger.js';
import { BaseValidator } from './config-validator.js';
import type { TrackerConfig } from '../tracker-config.interface.js';

export const STORAGE_TYPES = ['memory', 'redis'] as const;

export class TrackerConfigValidator extends BaseValidator<TrackerConfig> {
  public validate(value: unknown, path = 'TrackerConfig'): asserts value is TrackerConfig {
    this.assertType(value, 'object', path);

    const config = value;

    this.validateSitemap(config.sitemap, `${path}.sitemap`);
    this.validateDiscord(config.discord, `${path}.discord`);
    this.validateEarnings(config.earnings, `${path}.earnings`);
    this.validatePolling(config.polling, `${path}.polling`);
    this.validateDashboard(config.dashboard, `${path}.dashboard`);
    this.validateStorage(config.storage, `${path}.storage`);

    this.assertNonEmptyString(config.timezone, `${path}.timezone`);
    this.assertEnum(config.logLevel, LOG_LEVELS, `${path}.logLevel`);
  }

  /**
   * Requirements only the bot has: it cannot run without a sitemap and a webhook
   */
  public validateForBot(config: TrackerConfig, path = 'TrackerConfig'): void {
    this.assertUrl(config.sitemap.url, `${path}.sitemap.url (SITEMAP_URL)`);
    this.assertUrl(config.discord.webhookUrl, `${path}.discord.webhookUrl (DISCORD_WEBHOOK_URL)`);
  }

  private validateSitemap(value: unknown, path: string): void {
    this.assertType(value, 'object', path);
    this.assertString(value.url, `${path}.url`);
    this.assertNumber(value.timeoutSecs, `${path}.timeoutSecs`, 1, 300);
  }

  private validateDiscord(value: unknown, path: string): void {
    this.assertType(value, 'object', path);
    this.assertString(value.webhookUrl, `${path}.webhookUrl`);
    this.assertString(value.userId, `${path}.userId`);
  }

  private validateEarnings(value: unknown, path: string): void {
    this.assertType(value, 'object', path);
    this.assertInteger(value.articleValueCents, `${path}.articleValueCents`, 0);
    this.assertInteger(value.dailyTarget, `${path}.dailyTarget`, 0);
    this.assertInteger(value.monthlyTarget, `${path}.monthlyTarget`, 0);
  }

  private validatePolling(value: unknown, path: string): void {
    this.assertType(value, 'object', path);
    this.assertInteger(value.intervalSecs, `${path}.intervalSecs`, 1, 86_400);
    this.assertInteger(value.maxConsecutiveFailures, `${path}.maxConsecutiveFailures`, 1, 100);
  }

  private validateDashboard(value: unknown, path: string): void {
    this.assertType(value, 'object', path);
    this.assertString(value.url, `${path}.url`);
    this.assertString(value.password, `${path}.password`);
    this.assertNonEmptyString(value.host, `${path}.host`);
    this.assertInteger(value.port, `${path}.port`, 1, 65_535);
  }

  private validateStorage(value: unknown, path: string): void {
    this.assertType(value, 'object', path);
    this.assertEnum(value.type, STORAGE_TYPES, `${path}.type`);
    if (value.url !== undefined) {
      this.assertString(value.url, `${path}.url`);
    }
  }
}
