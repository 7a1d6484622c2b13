import mongoose, { Schema, Model } from 'mongoose';

export interface ISubscriptionDocument {
  /** Subscription UUID, also the webhook path segment. */
  _id: string;
  repo: string;
  userId: string;
  channelId: string;
  upstreamId: number | null;
  createdAt?: Date;
  updatedAt?: Date;
}

const subscriptionSchema = new Schema<ISubscriptionDocument>(
  {
    _id: { type: String, required: true },
    repo: { type: String, required: true },
    userId: { type: String, required: true },
    channelId: { type: String, required: true, index: true },
    upstreamId: { type: Number, default: null },
  },
  {
    timestamps: true,
    versionKey: false,
    collection: 'subscriptions',
  }
);

// One webhook per repository and channel
subscriptionSchema.index({ repo: 1, channelId: 1 }, { unique: true });

export function getSubscriptionModel(
  connection?: mongoose.Connection,
  collectionName = 'subscriptions'
): Model<ISubscriptionDocument> {
  const modelName = `Subscription_${collectionName}`;

  if (connection) {
    try {
      return connection.model<ISubscriptionDocument>(modelName);
    } catch {
      const schema = subscriptionSchema.clone();
      schema.set('collection', collectionName);
      return connection.model<ISubscriptionDocument>(modelName, schema);
    }
  }

  // Use default mongoose connection
  try {
    return mongoose.model<ISubscriptionDocument>(modelName);
  } catch {
    const schema = subscriptionSchema.clone();
    schema.set('collection', collectionName);
    return mongoose.model<ISubscriptionDocument>(modelName, schema);
  }
}
