import { Logger } from '../../common/logger.js';
import { SitemapFetchError, SitemapParseError } from '../../common/errors/tracker.errors.js';
import { formatTimestamp } from '../../common/utils/calendar.util.js';
import { ErrorExtractor } from '../../common/utils/error-extractor.util.js';
import { waitUnlessAborted } from '../../common/utils/sleep.util.js';
import type { TrackerConfig } from '../../config/tracker-config.interface.js';
import type { DiscordWebhookService } from '../notifications/discord-webhook.service.js';
import { formatUsd } from '../progress/progress.util.js';
import type { TrackerService } from './tracker.service.js';

export type PollOutcome =
  | { status: 'success'; newArticles: number }
  | { status: 'failure'; error: string; consecutiveFailures: number; alertSent: boolean };

export function buildConfigSummary(config: TrackerConfig): string {
  return [
    `Sitemap: ${config.sitemap.url}`,
    `Rate: ${formatUsd(config.earnings.articleValueCents)}/article`,
    `Daily target: ${config.earnings.dailyTarget}`,
    `Monthly target: ${config.earnings.monthlyTarget}`,
    `Poll interval: ${config.polling.intervalSecs}s`,
    `Dashboard: ${config.dashboard.url}`,
  ].join('\n');
}

/**
 * Main bot loop: poll, count failures in a row, alert, wait
 */
export class PollerService {
  private readonly logger = new Logger(PollerService.name);
  private readonly trackerService: TrackerService;
  private readonly notifier: DiscordWebhookService;
  private readonly config: TrackerConfig;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly wait: (ms: number, abortSignal: AbortSignal) => Promise<boolean>;
  private consecutiveFailures = 0;

  constructor(params: {
    trackerService: TrackerService;
    notifier: DiscordWebhookService;
    config: TrackerConfig;
    timeZone: string;
    now?: () => Date;
    wait?: (ms: number, abortSignal: AbortSignal) => Promise<boolean>;
  }) {
    this.trackerService = params.trackerService;
    this.notifier = params.notifier;
    this.config = params.config;
    this.timeZone = params.timeZone;
    this.now = params.now ?? (() => new Date());
    this.wait = params.wait ?? waitUnlessAborted;
  }

  public get failuresInARow(): number {
    return this.consecutiveFailures;
  }

  /**
   * Run a single poll cycle and update the failure counter
   */
  public async runOnce(abortSignal?: AbortSignal): Promise<PollOutcome> {
    this.logger.log(`--- Poll @ ${formatTimestamp(this.now(), this.timeZone, true)} ---`);

    try {
      const newArticles = await this.trackerService.pollCycle(abortSignal);
      this.consecutiveFailures = 0;

      if (newArticles > 0) {
        this.logger.log(`✅ ${newArticles} new article(s)!`);
      } else {
        this.logger.log('No new articles.');
      }
      return { status: 'success', newArticles };
    } catch (error) {
      return this.handleFailure(error, abortSignal);
    }
  }

  /**
   * Announce startup, then poll until the signal aborts
   */
  public async run(abortSignal: AbortSignal): Promise<void> {
    const summary = buildConfigSummary(this.config);
    this.logger.log(`\n${summary}`);

    await this.notifier.sendStartupMessage(summary, abortSignal);

    const intervalSecs = this.config.polling.intervalSecs;
    this.logger.log(`Starting polling (every ${intervalSecs}s)...`);

    while (!abortSignal.aborted) {
      await this.runOnce(abortSignal);

      const completed = await this.wait(intervalSecs * 1000, abortSignal);
      if (!completed) {
        break;
      }
    }

    this.logger.log('Bot stopped. Goodbye! 👋');
  }

  private async handleFailure(error: unknown, abortSignal?: AbortSignal): Promise<PollOutcome> {
    const message = ErrorExtractor.extractErrorMessage(error);
    const maxFailures = this.config.polling.maxConsecutiveFailures;
    this.consecutiveFailures++;

    if (error instanceof SitemapFetchError || error instanceof SitemapParseError) {
      this.logger.warn(`Poll failed (${this.consecutiveFailures}/${maxFailures}): ${message}`);
    } else {
      this.logger.error(`Unexpected error: ${message}`, error);
    }

    const failures = this.consecutiveFailures;
    let alertSent = false;

    if (failures >= maxFailures) {
      alertSent = await this.notifier.sendErrorAlert(
        `Sitemap fetch failed ${failures}x in a row.\nLast error: ${message}`,
        failures,
        abortSignal,
      );
      this.consecutiveFailures = 0;
    }

    return { status: 'failure', error: message, consecutiveFailures: failures, alertSent };
  }
}
