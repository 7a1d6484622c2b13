import { EventEmitter } from 'events';
import { actionOf } from '@hubrelay/types';
import type {
  DispatchStats,
  DispatcherConfig,
  EventOfKind,
  HubEvent,
  PushMetrics,
  Subscription,
} from '@hubrelay/types';
import { AggregationEngine } from './engine';
import type { EngineErrorContext, SubmitOutcome } from './engine';
import { SerialLanes } from './lanes';
import type { SubscriptionRegistry } from './registry';

export interface DispatcherOptions extends DispatcherConfig {
  registry: SubscriptionRegistry;
}

/** `dropped`: the event removed its own subscription and was not forwarded. */
export type HandleOutcome = SubmitOutcome | 'dropped';

export type LifecycleChange = 'upstream-id' | 'renamed' | 'deleted';

/** Context attached to `warn` events for failed subscription writes. */
export interface MutationFailureContext {
  subscriptionId: string;
  change: LifecycleChange;
  deliveryId: string;
}

const FORWARDED_EVENTS = ['started', 'merged', 'flush', 'skipped'] as const;

/** Total and distinct commit counts, preferring the counts upstream sent. */
export function pushMetrics(payload: EventOfKind<'push'>['payload']): PushMetrics {
  return {
    size: payload.size ?? payload.commits.length,
    distinctSize: payload.distinct_size ?? payload.commits.filter((commit) => commit.distinct).length,
  };
}

/**
 * Entry point for decoded webhook events.
 *
 * Applies subscription housekeeping for lifecycle events, then hands the
 * event to the aggregation engine, or straight to the sink when aggregation
 * is disabled. Calls for one subscription run strictly in order; different
 * subscriptions proceed concurrently.
 *
 * Events: `lifecycle`, `warn`, `error`, plus the engine's `started`,
 * `merged`, `flush` and `skipped`.
 */
export class Dispatcher extends EventEmitter {
  private readonly engine: AggregationEngine;
  private readonly registry: SubscriptionRegistry;
  private readonly lanes = new SerialLanes();
  private eventsReceived = 0;
  private stopped = false;

  constructor(config: DispatcherOptions) {
    super();
    this.registry = config.registry;
    this.engine = new AggregationEngine({
      sink: config.sink,
      timeoutMs: config.aggregation?.timeoutMs,
      resolveChannel: (id) => this.registry.peek(id)?.channelId,
    });

    for (const name of FORWARDED_EVENTS) {
      this.engine.on(name, (payload: unknown) => this.emit(name, payload));
    }
    this.engine.on('error', (err: unknown, context: EngineErrorContext) => {
      if (this.listenerCount('error') > 0) this.emit('error', err, context);
    });
  }

  handle(event: HubEvent, deliveryId: string, subscription: Subscription): Promise<HandleOutcome> {
    if (this.stopped) {
      return Promise.reject(new Error('Dispatcher is stopped'));
    }
    return this.lanes.run(subscription.id, () => this.process(event, deliveryId, subscription));
  }

  /** Change the coalescing window for aggregations started from now on. */
  setTimeoutMs(timeoutMs: number): void {
    this.engine.setTimeoutMs(timeoutMs);
  }

  get timeoutMs(): number {
    return this.engine.timeoutMs;
  }

  /**
   * Refuse new events, let queued ones finish, flush every pending
   * aggregation and wait for the sink.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.lanes.settle();
    this.engine.flushAll();
    await this.engine.drain();
    this.emit('stopped');
  }

  getStats(): Readonly<DispatchStats> {
    return { ...this.engine.getStats(), eventsReceived: this.eventsReceived };
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private async process(event: HubEvent, deliveryId: string, subscription: Subscription): Promise<HandleOutcome> {
    this.eventsReceived++;
    let metrics: PushMetrics | null = null;
    const action = actionOf(event);

    switch (event.kind) {
      case 'ping': {
        const hookId = event.payload.hook_id;
        await this.mutate(subscription, 'upstream-id', deliveryId, () =>
          this.registry.setUpstreamId(subscription.id, hookId),
        );
        break;
      }
      case 'meta':
        if (action === 'deleted') {
          await this.mutate(subscription, 'deleted', deliveryId, () => this.registry.delete(subscription.id));
          return 'dropped';
        }
        break;
      case 'repository': {
        const fullName = event.payload.repository.full_name;
        if (action === 'renamed' || action === 'transferred') {
          await this.mutate(subscription, 'renamed', deliveryId, () =>
            this.registry.rename(subscription.id, fullName),
          );
        } else if (action === 'deleted') {
          await this.mutate(subscription, 'deleted', deliveryId, () => this.registry.delete(subscription.id));
        }
        break;
      }
      case 'push':
        metrics = pushMetrics(event.payload);
        break;
      default:
        break;
    }

    const current = this.registry.peek(subscription.id) ?? subscription;
    if (this.engine.timeoutMs < 0) {
      this.engine.deliverSolo(current, event, deliveryId, metrics);
      return 'solo';
    }
    return this.engine.submit(current, event, deliveryId, metrics);
  }

  /** Failed durable writes are reported and processing carries on. */
  private async mutate(
    subscription: Subscription,
    change: LifecycleChange,
    deliveryId: string,
    write: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await write();
      this.emit('lifecycle', { subscriptionId: subscription.id, change });
    } catch (err) {
      const context: MutationFailureContext = { subscriptionId: subscription.id, change, deliveryId };
      this.emit('warn', err, context);
    }
  }
}
