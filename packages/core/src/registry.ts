import crypto from 'crypto';
import type { ISubscriptionStore, Subscription, SubscriptionChanges } from '@hubrelay/types';
import { DuplicateSubscriptionError } from './errors';
import { deriveWebhookSecret, isUuid } from './secret';

/**
 * In-process cache of subscriptions, read through to the durable store.
 *
 * The registry is the only writer of the cache. Mutations update the cached
 * copy first and then the store; if the durable write fails the error
 * propagates while the cache keeps the new value, since the store is the
 * source of truth again after a restart.
 */
export class SubscriptionRegistry {
  private cache = new Map<string, Subscription>();

  constructor(
    private readonly store: ISubscriptionStore,
    private readonly rootSecret: string,
  ) {}

  /** Cached subscription, or a store lookup on a miss. */
  async get(id: string): Promise<Subscription | null> {
    if (!isUuid(id)) return null;
    const cached = this.cache.get(id);
    if (cached) return cached;

    const stored = await this.store.get(id);
    if (stored) this.cache.set(id, stored);
    return stored;
  }

  /** Cached subscription without touching the store. */
  peek(id: string): Subscription | undefined {
    return this.cache.get(id);
  }

  async find(repo: string, channelId: string): Promise<Subscription | null> {
    const found = await this.store.findByRepoAndChannel(repo, channelId);
    if (found) this.cache.set(found.id, found);
    return found;
  }

  async listForChannel(channelId: string): Promise<Subscription[]> {
    return this.store.listByChannel(channelId);
  }

  /** Register a new webhook binding. */
  async create(repo: string, userId: string, channelId: string): Promise<Subscription> {
    if (await this.store.findByRepoAndChannel(repo, channelId)) {
      throw new DuplicateSubscriptionError(repo, channelId);
    }
    const subscription: Subscription = {
      id: crypto.randomUUID(),
      repo,
      userId,
      channelId,
      upstreamId: null,
    };
    await this.store.insert(subscription);
    this.cache.set(subscription.id, subscription);
    return subscription;
  }

  /** Attach the upstream hook id confirmed by a ping. */
  async setUpstreamId(id: string, upstreamId: number): Promise<Subscription | null> {
    return this.update(id, { upstreamId });
  }

  /** Follow a repository rename or transfer. */
  async rename(id: string, repo: string): Promise<Subscription | null> {
    return this.update(id, { repo });
  }

  async delete(id: string): Promise<void> {
    this.cache.delete(id);
    await this.store.delete(id);
  }

  /**
   * Move every subscription of a superseded channel to its replacement.
   *
   * @returns The number of subscriptions moved in the durable store
   */
  async migrateChannel(oldChannelId: string, newChannelId: string): Promise<number> {
    for (const [id, subscription] of this.cache) {
      if (subscription.channelId === oldChannelId) {
        this.cache.set(id, { ...subscription, channelId: newChannelId });
      }
    }
    return this.store.replaceChannel(oldChannelId, newChannelId);
  }

  secretFor(subscription: Subscription): string {
    return deriveWebhookSecret(this.rootSecret, subscription.id, subscription.userId);
  }

  private async update(id: string, changes: SubscriptionChanges): Promise<Subscription | null> {
    const current = this.cache.get(id) ?? (await this.store.get(id));
    if (!current) return null;

    const next: Subscription = { ...current, ...changes };
    this.cache.set(id, next);
    await this.store.update(id, changes);
    return next;
  }
}
