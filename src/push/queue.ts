import PQueue from 'p-queue';
import type { TrackedSource } from '../source/adapter.js';
import type { ClassifiedItem } from '../scan/freshness.js';
import type { Delivery } from './delivery.js';
import { logger } from '../shared/logger.js';

export interface DeliveryStats {
  queued: number;
  sent: number;
  failed: number;
}

export interface DeliveryQueueOptions {
  /** Minimum gap between the start of one listing's sends and the next. */
  sendDelayMs?: number;
  /** Runs once per listing before any channel sees it. A failure sends the card as it is. */
  prepare?: (item: ClassifiedItem, source: TrackedSource) => Promise<ClassifiedItem>;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Serialises sends across all channels, one listing per `sendDelayMs`.
 * A failed send is logged and not retried: the listing is already recorded
 * as seen.
 */
export class DeliveryQueue {
  private readonly queue: PQueue;
  private readonly prepare: DeliveryQueueOptions['prepare'];
  private readonly stats: DeliveryStats = { queued: 0, sent: 0, failed: 0 };

  constructor(
    private readonly deliveries: Delivery[],
    options: DeliveryQueueOptions = {},
  ) {
    const sendDelayMs = options.sendDelayMs ?? 0;
    this.queue =
      sendDelayMs > 0
        ? new PQueue({ concurrency: 1, interval: sendDelayMs, intervalCap: 1 })
        : new PQueue({ concurrency: 1 });
    this.prepare = options.prepare;
  }

  enqueue(items: ClassifiedItem[], source: TrackedSource): void {
    for (const item of items) {
      this.stats.queued++;
      this.queue
        .add(() => this.deliver(item, source))
        .catch((err: unknown) => {
          logger.error({ url: item.url, error: errorText(err) }, 'Delivery task failed');
        });
    }
  }

  /** Resolves once everything queued so far has been attempted. */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }

  getStats(): DeliveryStats {
    return { ...this.stats };
  }

  private async deliver(item: ClassifiedItem, source: TrackedSource): Promise<void> {
    let listing = item;
    if (this.prepare) {
      try {
        listing = await this.prepare(item, source);
      } catch (err) {
        logger.warn({ url: item.url, error: errorText(err) }, 'Listing details unavailable, sending the card');
      }
    }

    for (const delivery of this.deliveries) {
      try {
        await delivery.send(listing, source);
        this.stats.sent++;
      } catch (err) {
        this.stats.failed++;
        logger.error({ channel: delivery.name, url: item.url, error: errorText(err) }, 'Delivery failed');
      }
    }
  }
}
