/**
 * Chat webhook interface (Discord-compatible payloads).
 */

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface Embed {
  title?: string;
  description?: string;
  url?: string;
  /** ISO-8601 */
  timestamp?: string;
  color?: number;
  thumbnail?: { url: string };
  image?: { url: string };
  footer?: { text: string; icon_url?: string };
  fields?: EmbedField[];
}

export interface WebhookMessage {
  content?: string;
  embeds?: Embed[];
  /** Overrides the provider's default username. */
  username?: string;
  /** Overrides the provider's default avatar. */
  avatarUrl?: string;
}

export interface IWebhookProvider {
  /**
   * Post a message to the webhook URL.
   * Throws ValidationError for payloads the webhook would reject and
   * WebhookError for non-2xx responses.
   */
  send(url: string, message: WebhookMessage): Promise<void>;
}
