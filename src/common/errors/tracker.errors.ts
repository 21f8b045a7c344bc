export class SitemapFetchError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SitemapFetchError';
  }
}

export class SitemapParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SitemapParseError';
  }
}

export class WebhookDeliveryError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'WebhookDeliveryError';
  }
}
