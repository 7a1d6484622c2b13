import type { Connection, Model } from 'mongoose';
import { DuplicateSubscriptionError } from '@hubrelay/core';
import type { ISubscriptionStore, Subscription, SubscriptionChanges } from '@hubrelay/types';
import { getSubscriptionModel } from './schema';
import type { ISubscriptionDocument } from './schema';

export interface MongoSubscriptionStoreConfig {
  /** Existing Mongoose connection. If omitted, uses the default connection. */
  connection?: Connection;
  /** Collection name for subscription documents. Default: "subscriptions". */
  collectionName?: string;
}

type SubscriptionRecord = Pick<ISubscriptionDocument, '_id' | 'repo' | 'userId' | 'channelId'> & {
  upstreamId?: number | null;
};

function toSubscription(doc: SubscriptionRecord): Subscription {
  return {
    id: doc._id,
    repo: doc.repo,
    userId: doc.userId,
    channelId: doc.channelId,
    upstreamId: doc.upstreamId ?? null,
  };
}

const DUPLICATE_KEY = 11000;

function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === DUPLICATE_KEY;
}

/**
 * MongoDB-backed subscription store.
 *
 * Reads use `lean()` so callers get plain objects. The unique
 * (repo, channelId) index backs the one-webhook-per-channel rule even when
 * two registrations race.
 */
export class MongoSubscriptionStore implements ISubscriptionStore {
  private model: Model<ISubscriptionDocument>;

  constructor(config: MongoSubscriptionStoreConfig = {}) {
    this.model = getSubscriptionModel(config.connection, config.collectionName);
  }

  async get(id: string): Promise<Subscription | null> {
    const doc = await this.model.findById(id).lean();
    return doc ? toSubscription(doc) : null;
  }

  async findByRepoAndChannel(repo: string, channelId: string): Promise<Subscription | null> {
    const doc = await this.model.findOne({ repo, channelId }).lean();
    return doc ? toSubscription(doc) : null;
  }

  async listByChannel(channelId: string): Promise<Subscription[]> {
    const docs = await this.model.find({ channelId }).lean();
    return docs.map(toSubscription);
  }

  async insert(subscription: Subscription): Promise<void> {
    try {
      await this.model.create({
        _id: subscription.id,
        repo: subscription.repo,
        userId: subscription.userId,
        channelId: subscription.channelId,
        upstreamId: subscription.upstreamId,
      });
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DuplicateSubscriptionError(subscription.repo, subscription.channelId);
      }
      throw err;
    }
  }

  async update(id: string, changes: SubscriptionChanges): Promise<void> {
    if (Object.keys(changes).length === 0) return;
    await this.model.updateOne({ _id: id }, { $set: changes });
  }

  async delete(id: string): Promise<void> {
    await this.model.deleteOne({ _id: id });
  }

  async replaceChannel(oldChannelId: string, newChannelId: string): Promise<number> {
    const result = await this.model.updateMany(
      { channelId: oldChannelId },
      { $set: { channelId: newChannelId } },
    );
    return result.modifiedCount;
  }

  async initialize(): Promise<void> {
    await this.model.createIndexes();
  }

  async close(): Promise<void> {
    // The caller owns the connection
  }
}
