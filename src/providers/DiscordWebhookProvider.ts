/**
 * Discord webhook provider.
 * Validates the payload against Discord's limits before posting.
 */

import { ValidationError, WebhookError } from '../errors.js';
import type { Embed, IWebhookProvider, WebhookMessage } from './IWebhookProvider.js';

export const MAX_CONTENT_CHARACTERS = 2000;
export const MAX_EMBED_CHARACTERS = 6000;

export interface DiscordWebhookProviderOptions {
  /** Default username for every message. Omitted when branding is disabled. */
  username?: string;
  /** Default avatar for every message. Omitted when branding is disabled. */
  avatarUrl?: string;
}

interface DiscordPayload {
  content?: string;
  embeds?: Array<Embed & { type: 'rich' }>;
  username?: string;
  avatar_url?: string;
}

export class DiscordWebhookProvider implements IWebhookProvider {
  constructor(private readonly opts: DiscordWebhookProviderOptions = {}) {}

  async send(url: string, message: WebhookMessage): Promise<void> {
    const payload = this.buildPayload(message);

    const target = new URL(url);
    target.searchParams.set('wait', 'true');

    const response = await fetch(target.toString(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new WebhookError(response.status, text || response.statusText);
    }
  }

  buildPayload(message: WebhookMessage): DiscordPayload {
    const hasEmbeds = message.embeds !== undefined && message.embeds.length > 0;

    if (!message.content && !hasEmbeds) {
      throw new ValidationError('Webhook message needs content or embeds');
    }
    if (message.content && message.content.length > MAX_CONTENT_CHARACTERS) {
      throw new ValidationError(
        `Webhook content exceeds ${MAX_CONTENT_CHARACTERS} characters`
      );
    }

    const payload: DiscordPayload = {};
    if (message.content) payload.content = message.content;

    if (hasEmbeds) {
      payload.embeds = (message.embeds ?? []).map((embed) => {
        const rich = { type: 'rich' as const, ...embed };
        const size = JSON.stringify(rich).length;
        if (size > MAX_EMBED_CHARACTERS) {
          throw new ValidationError(
            `Embed exceeds maximum allowed char size of ${MAX_EMBED_CHARACTERS} by ${size - MAX_EMBED_CHARACTERS}`
          );
        }
        return rich;
      });
    }

    const username = message.username ?? this.opts.username;
    if (username) payload.username = username;

    const avatarUrl = message.avatarUrl ?? this.opts.avatarUrl;
    if (avatarUrl) payload.avatar_url = avatarUrl;

    return payload;
  }
}
