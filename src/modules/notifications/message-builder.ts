import { ALERT_ERROR_MAX_LENGTH } from '../../common/constants/app.constants.js';
import {
  calculateDailyRemaining,
  formatEarningIncrement,
  formatUsd,
  makeProgressBar,
} from '../progress/progress.util.js';
import type {
  ArticleNotification,
  DiscordActionRow,
  DiscordWebhookPayload,
} from './interfaces/discord-payload.interface.js';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━';

export interface MessageContext {
  userId?: string;
  dashboardUrl?: string;
}

export function mention(userId?: string): string {
  return userId ? `<@${userId}>` : '';
}

export function dashboardButton(dashboardUrl?: string): DiscordActionRow[] | undefined {
  if (!dashboardUrl) {
    return undefined;
  }
  return [
    {
      type: 1,
      components: [{ type: 2, style: 5, label: '📊 View Dashboard', url: dashboardUrl }],
    },
  ];
}

function toPayload(lines: string[], components?: DiscordActionRow[]): DiscordWebhookPayload {
  const payload: DiscordWebhookPayload = { content: lines.join('\n').trim() };
  if (components) {
    payload.components = components;
  }
  return payload;
}

export function buildArticleMessage(
  notification: ArticleNotification,
  context: MessageContext = {},
): DiscordWebhookPayload {
  const { todayCount, dailyTarget, monthlyCount, monthlyTarget, streak } = notification;
  const dailyRemaining = calculateDailyRemaining(todayCount, dailyTarget);
  const goalLine =
    dailyRemaining > 0 ? `🎯  ${dailyRemaining} More To Daily Goal` : '🎯  ✅ Daily Goal Reached!';

  const lines = [
    `💸  **${formatEarningIncrement(notification.articleValueCents)}**`,
    `💰  Total This Month: **${formatUsd(notification.monthlyEarnedCents)}**`,
    '',
    DIVIDER,
    '',
    '🚀  **ARTICLE PUBLISHED**',
    `📰  ${notification.articleTitle}`,
    `🔗  ${notification.articleUrl}`,
    '',
    DIVIDER,
    '',
    '📊  **Today**',
    `\`${makeProgressBar(todayCount, dailyTarget)}\``,
    `**${todayCount} / ${dailyTarget}** Articles`,
    '',
    `🔥  **Streak: ${streak} Day${streak === 1 ? '' : 's'}**`,
    '',
    goalLine,
    '',
    '📈  **Monthly Progress**',
    `\`${makeProgressBar(monthlyCount, monthlyTarget)}\``,
    `**${monthlyCount} / ${monthlyTarget}** Articles`,
    '',
    mention(context.userId),
  ];

  return toPayload(lines, dashboardButton(context.dashboardUrl));
}

export function buildErrorAlert(
  errorMessage: string,
  consecutiveFailures: number,
  context: MessageContext = {},
): DiscordWebhookPayload {
  const lines = [
    '⚠️  **ARTICLE TRACKER — ERROR**',
    '',
    `Sitemap polling has failed **${consecutiveFailures}** consecutive times.`,
    '```',
    errorMessage.slice(0, ALERT_ERROR_MAX_LENGTH),
    '```',
    'Bot will keep retrying.',
    '',
    mention(context.userId),
  ];

  return toPayload(lines);
}

export function buildStartupMessage(
  configSummary: string,
  context: MessageContext = {},
): DiscordWebhookPayload {
  const lines = [
    '✅  **ARTICLE TRACKER — ONLINE**',
    '',
    'Bot is now running and monitoring articles.',
    '```',
    configSummary,
    '```',
    '',
    mention(context.userId),
  ];

  return toPayload(lines, dashboardButton(context.dashboardUrl));
}
