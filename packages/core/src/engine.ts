import { EventEmitter } from 'events';
import { actionOf } from '@hubrelay/types';
import type {
  DeliveryResult,
  DispatchStats,
  HubEvent,
  INotificationSink,
  Notification,
  PushMetrics,
  Subscription,
} from '@hubrelay/types';
import { PendingAggregation, toNotification } from './pending';
import type { Accumulator } from './policy';
import { starterFor } from './policy';

const DEFAULTS = {
  TIMEOUT_MS: 1000,
};

export type SubmitOutcome = 'merged' | 'started' | 'solo' | 'abandoned';

export type EngineStats = Omit<DispatchStats, 'eventsReceived'>;

export interface AggregationEngineOptions {
  sink: INotificationSink;
  timeoutMs?: number;

  /**
   * Current destination of a subscription, consulted at flush time so a
   * channel migration during the window is honoured.
   */
  resolveChannel?: (subscriptionId: string) => string | undefined;
}

/** Context attached to `error` events. */
export interface EngineErrorContext {
  stage: 'start' | 'merge' | 'deliver';
  subscriptionId: string;
  kind: HubEvent['kind'];
  action: string | null;
  deliveryIds: string[];
}

/**
 * Per-subscription coalescing of webhook events.
 *
 * Each subscription owns a FIFO queue of pending aggregations. An incoming
 * event is offered to that queue oldest first; the first aggregation that
 * merges it wins. Otherwise the policy table decides whether the event starts
 * a new aggregation or is delivered on its own.
 *
 * Expiry removes the aggregation from its queue and seals it in one
 * synchronous step, then calls the sink without touching the queue again.
 *
 * Events: `started`, `merged`, `flush`, `skipped`, `error`.
 */
export class AggregationEngine extends EventEmitter {
  private queues = new Map<string, PendingAggregation[]>();
  private inflight = new Set<Promise<void>>();
  private readonly sink: INotificationSink;
  private readonly resolveChannel: (subscriptionId: string) => string | undefined;
  private timeout: number;

  private stats: EngineStats = {
    aggregationsStarted: 0,
    merges: 0,
    flushes: 0,
    pendingAggregations: 0,
    lastFlushAt: undefined,
    errorCount: 0,
  };

  constructor(options: AggregationEngineOptions) {
    super();
    this.sink = options.sink;
    this.timeout = options.timeoutMs ?? DEFAULTS.TIMEOUT_MS;
    this.resolveChannel = options.resolveChannel ?? (() => undefined);
  }

  /** Coalescing window; negative means aggregation is disabled. */
  get timeoutMs(): number {
    return this.timeout;
  }

  /** Applies to aggregations started after the call. */
  setTimeoutMs(timeoutMs: number): void {
    this.timeout = timeoutMs;
  }

  /** Offer an event to the subscription's pending aggregations, or start one. */
  submit(
    subscription: Subscription,
    event: HubEvent,
    deliveryId: string,
    metrics: PushMetrics | null = null,
  ): SubmitOutcome {
    for (const pending of this.queueOf(subscription.id)) {
      try {
        const outcome = pending.offer(event, deliveryId);
        if (outcome === 'rejected') continue;

        this.stats.merges++;
        this.emit('merged', {
          subscriptionId: subscription.id,
          kind: pending.kind,
          action: pending.action,
          deliveryId,
          resetDeadline: outcome === 'merged',
        });
        return 'merged';
      } catch (err) {
        this.abandon(pending, err);
      }
    }

    const starter = starterFor(event);
    const draft = { event, action: actionOf(event), metrics };

    if (!starter) {
      this.deliver(toNotification(subscription.id, subscription.channelId, draft, null, [deliveryId]));
      return 'solo';
    }

    let accumulator: Accumulator;
    try {
      accumulator = starter(draft);
    } catch (err) {
      this.report(err, {
        stage: 'start',
        subscriptionId: subscription.id,
        kind: event.kind,
        action: draft.action,
        deliveryIds: [deliveryId],
      });
      return 'abandoned';
    }

    const pending = new PendingAggregation(
      subscription.id,
      subscription.channelId,
      { ...draft, accumulator },
      deliveryId,
    );
    this.enqueue(pending);
    pending.arm(this.timeout, () => this.expire(pending));

    this.stats.aggregationsStarted++;
    this.emit('started', {
      subscriptionId: subscription.id,
      kind: pending.kind,
      action: pending.action,
      deliveryId,
      timeoutMs: this.timeout,
    });
    return 'started';
  }

  /** Deliver an event on its own, without looking at any queue. */
  deliverSolo(
    subscription: Subscription,
    event: HubEvent,
    deliveryId: string,
    metrics: PushMetrics | null = null,
  ): void {
    const draft = { event, action: actionOf(event), metrics };
    this.deliver(toNotification(subscription.id, subscription.channelId, draft, null, [deliveryId]));
  }

  /** Number of aggregations waiting for their deadline. */
  pendingCount(subscriptionId?: string): number {
    if (subscriptionId !== undefined) {
      return this.queues.get(subscriptionId)?.length ?? 0;
    }
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  /** Seal every pending aggregation now, e.g. on shutdown. */
  flushAll(): void {
    const queues = this.queues;
    this.queues = new Map();
    for (const queue of queues.values()) {
      for (const pending of queue) {
        this.deliver(pending.seal(this.channelFor(pending)));
      }
    }
  }

  /** Resolves once every delivery started so far has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  getStats(): Readonly<EngineStats> {
    return { ...this.stats, pendingAggregations: this.pendingCount() };
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private queueOf(subscriptionId: string): PendingAggregation[] {
    return [...(this.queues.get(subscriptionId) ?? [])];
  }

  private enqueue(pending: PendingAggregation): void {
    const queue = this.queues.get(pending.subscriptionId);
    if (queue) queue.push(pending);
    else this.queues.set(pending.subscriptionId, [pending]);
  }

  private dequeue(pending: PendingAggregation): boolean {
    const queue = this.queues.get(pending.subscriptionId);
    const index = queue ? queue.indexOf(pending) : -1;
    if (!queue || index === -1) return false;

    queue.splice(index, 1);
    if (queue.length === 0) this.queues.delete(pending.subscriptionId);
    return true;
  }

  private expire(pending: PendingAggregation): void {
    if (!this.dequeue(pending)) return;
    this.deliver(pending.seal(this.channelFor(pending)));
  }

  private abandon(pending: PendingAggregation, err: unknown): void {
    this.dequeue(pending);
    pending.cancel();
    this.report(err, {
      stage: 'merge',
      subscriptionId: pending.subscriptionId,
      kind: pending.kind,
      action: pending.action,
      deliveryIds: [...pending.deliveries],
    });
  }

  private channelFor(pending: PendingAggregation): string | undefined {
    return this.resolveChannel(pending.subscriptionId);
  }

  /** Hand a notification to the sink; the queue is never held meanwhile. */
  private deliver(notification: Notification): void {
    const delivery: Promise<void> = Promise.resolve()
      .then(() => this.sink.deliver(notification))
      .then((result) => this.delivered(notification, result))
      .catch((err: unknown) => {
        this.report(err, {
          stage: 'deliver',
          subscriptionId: notification.subscriptionId,
          kind: notification.kind,
          action: notification.action,
          deliveryIds: notification.deliveryIds,
        });
      })
      .finally(() => {
        this.inflight.delete(delivery);
      });
    this.inflight.add(delivery);
  }

  private delivered(notification: Notification, result: DeliveryResult | void): void {
    if (result && !result.published) {
      this.emit('skipped', { notification, reason: result.reason ?? 'unpublished' });
      return;
    }
    this.stats.flushes++;
    this.stats.lastFlushAt = new Date();
    this.emit('flush', { notification });
  }

  private report(err: unknown, context: EngineErrorContext): void {
    this.stats.errorCount++;
    if (this.listenerCount('error') > 0) {
      this.emit('error', err, context);
    }
  }
}
