/**
 * Telegram channel: one photo post (or text post without an image) per
 * listing, to every configured chat.
 */

import { z } from 'zod';
import type { TrackedSource } from '../source/adapter.js';
import type { ClassifiedItem } from '../scan/freshness.js';
import type { Delivery } from './delivery.js';
import { DeliveryError } from '../shared/errors.js';
import { truncate } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const TITLE_MAX = 50;
const CAPTION_MAX = 1024;

export interface TelegramOptions {
  botToken: string;
  chatIds: string[];
  apiBase: string;
}

const TelegramResponse = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

/** Escape the characters legacy Markdown treats as markup. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

/** "Stan: Używane" → "#Stan_Używane"; null when nothing word-like is left. */
export function toHashtag(text: string): string | null {
  const body = text.replace(/^#/, '').replace(/[^\p{L}\p{N}]+/gu, '_').replace(/^_+|_+$/g, '');
  return body ? `#${body}` : null;
}

export function renderCaption(item: ClassifiedItem, source: TrackedSource): string {
  const lines: string[] = [];
  if (item.title && item.title !== 'Untitled') {
    lines.push(`📌 *${escapeMarkdown(truncate(item.title, TITLE_MAX))}*`);
  }
  if (item.description) lines.push(`📌 ${escapeMarkdown(item.description)}`);
  if (item.price) lines.push(`💰 ${escapeMarkdown(item.price)}`);
  if (item.location) lines.push(`📍 ${escapeMarkdown(item.location)}`);
  lines.push(`📆 ${escapeMarkdown(item.postedText || 'Unknown date')}`);
  lines.push('');
  lines.push(`🔗 [Visit site](${item.url})`);

  const hashtags = [...(item.tags ?? []), ...(item.category ? [item.category] : [])]
    .map(toHashtag)
    .filter((tag): tag is string => tag !== null);
  if (source.hashtag) hashtags.push(source.hashtag);
  const unique = [...new Set(hashtags)];
  if (unique.length > 0) {
    lines.push('');
    lines.push(escapeMarkdown(unique.join(' ')));
  }
  return truncate(lines.join('\n'), CAPTION_MAX - 3);
}

export class TelegramDelivery implements Delivery {
  readonly name = 'telegram';

  constructor(private readonly options: TelegramOptions) {}

  async send(item: ClassifiedItem, source: TrackedSource): Promise<void> {
    const caption = renderCaption(item, source);
    const failures: Array<{ chatId: string; error: string }> = [];

    for (const chatId of this.options.chatIds) {
      try {
        if (item.image) {
          await this.call('sendPhoto', {
            chat_id: chatId,
            photo: item.image,
            caption,
            parse_mode: 'Markdown',
          });
        } else {
          await this.call('sendMessage', {
            chat_id: chatId,
            text: caption,
            parse_mode: 'Markdown',
          });
        }
        logger.debug({ chatId, url: item.url }, 'Telegram message sent');
      } catch (err) {
        failures.push({ chatId, error: err instanceof Error ? err.message : String(err) });
      }
    }

    if (failures.length > 0) {
      throw new DeliveryError(
        `Telegram delivery failed for ${failures.length}/${this.options.chatIds.length} chats`,
        { url: item.url, failures },
      );
    }
  }

  private async call(method: string, body: Record<string, unknown>): Promise<void> {
    const response = await fetch(`${this.options.apiBase}/bot${this.options.botToken}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    const parsed = TelegramResponse.safeParse(await response.json().catch(() => null));
    const payload = parsed.success ? parsed.data : { ok: false, description: undefined };
    if (!response.ok || !payload.ok) {
      throw new DeliveryError(
        `Telegram ${method} failed: ${payload.description ?? `HTTP ${response.status}`}`,
        { method, status: response.status },
      );
    }
  }
}
