import type { TrackedSource } from '../source/adapter.js';
import type { ClassifiedItem } from '../scan/freshness.js';
import type { DeliveryConfig } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { TelegramDelivery } from './telegram.js';
import { EmailDelivery } from './email.js';

/**
 * A channel that renders and sends one listing. Failures are thrown; the
 * queue logs them and moves on.
 */
export interface Delivery {
  readonly name: string;
  send(item: ClassifiedItem, source: TrackedSource): Promise<void>;
}

export class LogDelivery implements Delivery {
  readonly name = 'log';

  async send(item: ClassifiedItem, source: TrackedSource): Promise<void> {
    logger.info(
      {
        source: source.url,
        hashtag: source.hashtag,
        url: item.url,
        price: item.price,
        posted: item.postedText,
        tier: item.tier,
      },
      `New listing: ${item.title}`,
    );
  }
}

export function createDeliveries(config: DeliveryConfig): Delivery[] {
  const deliveries: Delivery[] = [];

  if (config.telegram.enabled) {
    if (!config.telegram.bot_token || config.telegram.chat_ids.length === 0) {
      logger.warn('Telegram delivery enabled without bot_token or chat_ids, skipping');
    } else {
      deliveries.push(
        new TelegramDelivery({
          botToken: config.telegram.bot_token,
          chatIds: config.telegram.chat_ids,
          apiBase: config.telegram.api_base,
        }),
      );
    }
  }

  if (config.email.enabled) {
    if (!config.email.smtp_host || config.email.to.length === 0) {
      logger.warn('Email delivery enabled without smtp_host or recipients, skipping');
    } else {
      deliveries.push(new EmailDelivery(config.email));
    }
  }

  if (config.log.enabled || deliveries.length === 0) {
    deliveries.push(new LogDelivery());
  }

  return deliveries;
}
