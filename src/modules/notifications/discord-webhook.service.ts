import { Logger } from '../../common/logger.js';
import {
  WEBHOOK_BACKOFF_BASE_SECS,
  WEBHOOK_DEFAULT_RETRY_AFTER_SECS,
  WEBHOOK_MAX_ATTEMPTS,
  WEBHOOK_TIMEOUT_MS,
} from '../../common/constants/app.constants.js';
import { WebhookDeliveryError } from '../../common/errors/tracker.errors.js';
import { ErrorExtractor } from '../../common/utils/error-extractor.util.js';
import type { FetchClient } from '../../http/fetch-client.js';
import type {
  ArticleNotification,
  DiscordWebhookPayload,
} from './interfaces/discord-payload.interface.js';
import {
  buildArticleMessage,
  buildErrorAlert,
  buildStartupMessage,
  type MessageContext,
} from './message-builder.js';
import { RetryHandlerService } from './services/retry-handler.service.js';

async function readRetryAfterMs(response: Response): Promise<number> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'retry_after' in body) {
      const retryAfter = body.retry_after;
      if (typeof retryAfter === 'number' && retryAfter >= 0) {
        return Math.ceil(retryAfter * 1000);
      }
    }
  } catch {
    // Rate limit responses without a JSON body use the default wait
  }
  return WEBHOOK_DEFAULT_RETRY_AFTER_SECS * 1000;
}

/**
 * Client errors other than 429 will fail again with the same payload
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof WebhookDeliveryError && error.statusCode !== undefined) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  return true;
}

function retryDelayMs(attempt: number, error: unknown): number {
  if (error instanceof WebhookDeliveryError && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }
  return WEBHOOK_BACKOFF_BASE_SECS ** attempt * 1000;
}

/**
 * Discord webhook delivery with plain text messages and a dashboard link button
 */
export class DiscordWebhookService {
  private readonly logger = new Logger(DiscordWebhookService.name);
  private readonly fetchClient: FetchClient;
  private readonly webhookUrl: string;
  private readonly context: MessageContext;
  private readonly retryHandler: RetryHandlerService;
  private readonly maxAttempts: number;

  constructor(params: {
    fetchClient: FetchClient;
    webhookUrl: string;
    userId?: string;
    dashboardUrl?: string;
    retryHandler?: RetryHandlerService;
    maxAttempts?: number;
  }) {
    this.fetchClient = params.fetchClient;
    this.webhookUrl = params.webhookUrl;
    this.context = { userId: params.userId, dashboardUrl: params.dashboardUrl };
    this.retryHandler = params.retryHandler ?? new RetryHandlerService();
    this.maxAttempts = params.maxAttempts ?? WEBHOOK_MAX_ATTEMPTS;
  }

  public async sendArticleNotification(
    notification: ArticleNotification,
    abortSignal?: AbortSignal,
  ): Promise<boolean> {
    return this.send(buildArticleMessage(notification, this.context), abortSignal);
  }

  public async sendErrorAlert(
    errorMessage: string,
    consecutiveFailures: number,
    abortSignal?: AbortSignal,
  ): Promise<boolean> {
    return this.send(buildErrorAlert(errorMessage, consecutiveFailures, this.context), abortSignal);
  }

  public async sendStartupMessage(configSummary: string, abortSignal?: AbortSignal): Promise<boolean> {
    return this.send(buildStartupMessage(configSummary, this.context), abortSignal);
  }

  /**
   * Deliver a payload. Failures are logged and reported as `false`,
   * they never propagate to the caller.
   */
  public async send(payload: DiscordWebhookPayload, abortSignal?: AbortSignal): Promise<boolean> {
    try {
      await this.retryHandler.executeWithRetry({
        operation: () => this.post(payload),
        maxAttempts: this.maxAttempts,
        retryDelay: retryDelayMs,
        shouldRetry: isRetryable,
        abortSignal,
        onRetry: (attempt, error, delayMs) => {
          if (error instanceof WebhookDeliveryError && error.statusCode === 429) {
            this.logger.warn(`Rate limited. Retrying after ${delayMs / 1000}s...`);
            return;
          }
          this.logger.warn(
            `Webhook attempt ${attempt}/${this.maxAttempts} failed: ${ErrorExtractor.extractErrorMessage(error)}`,
          );
        },
      });
      this.logger.log('Discord webhook sent successfully.');
      return true;
    } catch (error) {
      if (ErrorExtractor.isAbortError(error) && abortSignal?.aborted) {
        this.logger.warn('Webhook delivery cancelled by shutdown');
        return false;
      }
      this.logger.error(
        `Webhook delivery failed: ${ErrorExtractor.extractErrorMessage(error)}`,
      );
      return false;
    }
  }

  private async post(payload: DiscordWebhookPayload): Promise<void> {
    const response = await this.fetchClient.fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    });

    if (response.status === 429) {
      throw new WebhookDeliveryError('Rate limited', 429, await readRetryAfterMs(response));
    }

    if (!response.ok) {
      throw new WebhookDeliveryError(`HTTP ${response.status}`, response.status);
    }
  }
}
