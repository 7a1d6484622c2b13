import type { HubEvent, Notification, PushMetrics } from '@hubrelay/types';
import { mergeInto, summarize } from './policy';
import type { AggregationDraft, MergeOutcome } from './policy';

export type AggregationState = 'starting' | 'aggregating' | 'flushed';

/** Build the outgoing notice for a representative event. */
export function toNotification(
  subscriptionId: string,
  channelId: string,
  draft: { event: HubEvent; action: string | null; metrics: PushMetrics | null },
  aggregation: Notification['aggregation'],
  deliveryIds: string[],
): Notification {
  return {
    kind: draft.event.kind,
    action: draft.action,
    event: draft.event,
    aggregation,
    metrics: draft.metrics,
    subscriptionId,
    channelId,
    deliveryIds,
  };
}

/**
 * One coalescing window for a subscription.
 *
 * Lifecycle: `starting` until {@link arm} registers the deadline, then
 * `aggregating` while merges keep arriving, then `flushed` once {@link seal}
 * or {@link cancel} runs. A flushed instance refuses every offer, so a merge
 * can never land after its notification was produced.
 */
export class PendingAggregation {
  private state: AggregationState = 'starting';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private timeoutMs = 0;
  private onExpire: (() => void) | null = null;
  private readonly deliveryIds: string[];

  constructor(
    readonly subscriptionId: string,
    private readonly channelId: string,
    private readonly draft: AggregationDraft,
    deliveryId: string,
  ) {
    this.deliveryIds = [deliveryId];
  }

  get status(): AggregationState {
    return this.state;
  }

  get kind(): HubEvent['kind'] {
    return this.draft.event.kind;
  }

  get action(): string | null {
    return this.draft.action;
  }

  /** Delivery ids folded in so far, starter first. */
  get deliveries(): readonly string[] {
    return this.deliveryIds;
  }

  /** Enter `aggregating` and start the deadline. */
  arm(timeoutMs: number, onExpire: () => void): void {
    if (this.state !== 'starting') {
      throw new Error(`Cannot arm an aggregation in state ${this.state}`);
    }
    this.state = 'aggregating';
    this.timeoutMs = timeoutMs;
    this.onExpire = onExpire;
    this.schedule();
  }

  /**
   * Try to fold `event` into this aggregation. A resetting merge restarts the
   * deadline from now; a final merge leaves it running.
   */
  offer(event: HubEvent, deliveryId: string): MergeOutcome {
    if (this.state !== 'aggregating') return 'rejected';

    const outcome = mergeInto(this.draft, event);
    if (outcome === 'rejected') return outcome;

    this.deliveryIds.push(deliveryId);
    if (outcome === 'merged') this.schedule();
    return outcome;
  }

  /**
   * The only transition into `flushed` that produces output.
   *
   * @param channelId - Destination at flush time, when the subscription moved
   */
  seal(channelId: string = this.channelId): Notification {
    if (this.state === 'flushed') {
      throw new Error(`Aggregation for ${this.subscriptionId} already flushed`);
    }
    this.clearTimer();
    this.state = 'flushed';
    return toNotification(
      this.subscriptionId,
      channelId,
      this.draft,
      summarize(this.draft.accumulator),
      [...this.deliveryIds],
    );
  }

  /** Abandon without producing a notification. */
  cancel(): void {
    this.clearTimer();
    this.state = 'flushed';
  }

  private schedule(): void {
    this.clearTimer();
    const onExpire = this.onExpire;
    if (!onExpire) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      onExpire();
    }, this.timeoutMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
