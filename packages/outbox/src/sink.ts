import Redis from 'ioredis';
import type { DeliveryResult, INotificationSink, Notification } from '@hubrelay/types';

const DEFAULT_STREAM_KEY = 'hubrelay:notifications';
const DEFAULT_MAX_LEN = 100_000;
const DEFAULT_DEDUPE_TTL_SECONDS = 86_400;
const DEFAULT_DEDUPE_PREFIX = 'hubrelay:delivery:';

/** The Redis commands the sink uses. */
export type OutboxConnection = Pick<Redis, 'set' | 'del' | 'xadd' | 'quit'>;

export interface RedisNotificationSinkConfig {
  /** Redis connection URL or ioredis instance. */
  redis: string | OutboxConnection;
  /** Stream key name. Default: "hubrelay:notifications". */
  streamKey?: string;
  /** Approximate max stream length for auto-trimming. Default: 100000. Set to 0 to disable. */
  maxStreamLength?: number;
  /** How long a delivery id stays claimed. Default: 86400. Set to 0 to disable deduplication. */
  dedupeTtlSeconds?: number;
  /** Key prefix for delivery id claims. Default: "hubrelay:delivery:". */
  dedupeKeyPrefix?: string;
}

/**
 * Publishes flushed notifications to a Redis Stream for the renderer.
 *
 * Every delivery id is claimed with `SET NX` before publishing. A
 * notification whose ids were all claimed already (an upstream retry of
 * something that went out) is skipped. Stream entries carry JSON fields:
 *
 * ```
 * kind, action, channel, subscription, deliveries, event, aggregation, metrics, timestamp
 * ```
 */
export class RedisNotificationSink implements INotificationSink {
  private redis: OutboxConnection;
  private streamKey: string;
  private maxStreamLength: number;
  private dedupeTtlSeconds: number;
  private dedupeKeyPrefix: string;
  private ownsConnection: boolean;

  constructor(config: RedisNotificationSinkConfig) {
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis);
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }
    this.streamKey = config.streamKey ?? DEFAULT_STREAM_KEY;
    this.maxStreamLength = config.maxStreamLength ?? DEFAULT_MAX_LEN;
    this.dedupeTtlSeconds = config.dedupeTtlSeconds ?? DEFAULT_DEDUPE_TTL_SECONDS;
    this.dedupeKeyPrefix = config.dedupeKeyPrefix ?? DEFAULT_DEDUPE_PREFIX;
  }

  async deliver(notification: Notification): Promise<DeliveryResult> {
    const claimed = await this.claim(notification.deliveryIds);
    if (this.dedupeTtlSeconds > 0 && claimed.length === 0) {
      return { published: false, reason: 'duplicate' };
    }

    try {
      await this.publish(notification);
    } catch (err) {
      // Let an upstream retry through again
      await this.release(claimed);
      throw err;
    }
    return { published: true };
  }

  /** Close the Redis connection (only if this sink created it). */
  async close(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.quit();
    }
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  /** Keys of the delivery ids this call claimed first. */
  private async claim(deliveryIds: string[]): Promise<string[]> {
    if (this.dedupeTtlSeconds <= 0) return [];

    const keys = deliveryIds.map((id) => `${this.dedupeKeyPrefix}${id}`);
    const replies = await Promise.allSettled(
      keys.map((key) => this.redis.set(key, '1', 'EX', this.dedupeTtlSeconds, 'NX')),
    );
    const claimed = keys.filter((_key, index) => {
      const reply = replies[index];
      return reply.status === 'fulfilled' && reply.value === 'OK';
    });

    const failure = replies.find((reply): reply is PromiseRejectedResult => reply.status === 'rejected');
    if (failure) {
      // Nothing was published, so none of these ids may stay claimed
      await this.release(claimed);
      throw failure.reason;
    }
    return claimed;
  }

  private async release(keys: string[]): Promise<void> {
    if (keys.length > 0) {
      await this.redis.del(...keys);
    }
  }

  private async publish(notification: Notification): Promise<void> {
    const fields: string[] = [
      'kind', notification.kind,
      'action', notification.action ?? '',
      'channel', notification.channelId,
      'subscription', notification.subscriptionId,
      'deliveries', JSON.stringify(notification.deliveryIds),
      'event', JSON.stringify(notification.event.payload),
      'aggregation', JSON.stringify(notification.aggregation),
      'metrics', JSON.stringify(notification.metrics),
      'timestamp', String(Date.now()),
    ];

    if (this.maxStreamLength > 0) {
      // Approximate trimming (~) is O(1) and keeps the stream bounded
      await this.redis.xadd(
        this.streamKey, 'MAXLEN', '~', String(this.maxStreamLength), '*', ...fields
      );
    } else {
      await this.redis.xadd(this.streamKey, '*', ...fields);
    }
  }
}
