/**
 * Link button component (type 2, style 5)
 */
export interface DiscordLinkButton {
  type: 2;
  style: 5;
  label: string;
  url: string;
}

/**
 * Action row component (type 1)
 */
export interface DiscordActionRow {
  type: 1;
  components: DiscordLinkButton[];
}

/**
 * Body of an "execute webhook" request.
 * Plain text content, no embeds.
 */
export interface DiscordWebhookPayload {
  content: string;
  components?: DiscordActionRow[];
}

export interface ArticleNotification {
  articleTitle: string;
  articleUrl: string;
  articleValueCents: number;
  todayCount: number;
  dailyTarget: number;
  monthlyCount: number;
  monthlyTarget: number;
  streak: number;
  monthlyEarnedCents: number;
}
