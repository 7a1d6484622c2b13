/**
 * A binding between one upstream repository's webhook and one destination
 * channel. At most one exists per (repo, channelId).
 */
export interface Subscription {
  /** Opaque UUID; part of the webhook URL and of the secret derivation. */
  readonly id: string;

  /** Repository full name, e.g. "octo-org/widgets". */
  readonly repo: string;

  /** User that registered the webhook. */
  readonly userId: string;

  /** Destination chat channel. */
  readonly channelId: string;

  /** Upstream hook id, null until the first ping confirms the registration. */
  readonly upstreamId: number | null;
}

/** Fields a subscription may change after creation. */
export type SubscriptionChanges = Partial<Pick<Subscription, 'repo' | 'channelId' | 'upstreamId'>>;

/**
 * Durable storage for subscriptions.
 * All database-specific implementations must conform to this interface.
 */
export interface ISubscriptionStore {
  /** Load one subscription, or null if it does not exist. */
  get(id: string): Promise<Subscription | null>;

  /** Look up the subscription binding `repo` to `channelId`. */
  findByRepoAndChannel(repo: string, channelId: string): Promise<Subscription | null>;

  /** All subscriptions delivering into a channel. */
  listByChannel(channelId: string): Promise<Subscription[]>;

  /**
   * Persist a new subscription. Rejects with `DuplicateSubscriptionError`
   * when one already binds the same repo and channel, so that concurrent
   * registrations cannot both succeed.
   */
  insert(subscription: Subscription): Promise<void>;

  update(id: string, changes: SubscriptionChanges): Promise<void>;

  delete(id: string): Promise<void>;

  /**
   * Point every subscription of `oldChannelId` at `newChannelId`.
   *
   * @returns The number of subscriptions moved
   */
  replaceChannel(oldChannelId: string, newChannelId: string): Promise<number>;

  /**
   * Optional: Initialize store resources (indexes, connections, etc.)
   */
  initialize?(): Promise<void>;

  /**
   * Optional: Clean up resources on shutdown
   */
  close?(): Promise<void>;
}
