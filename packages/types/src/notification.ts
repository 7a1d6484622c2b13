import type { EventKind, HubEvent, Label, Milestone, PushMetrics } from './events';

/** Accumulated merge data folded into a flushed notification. */
export type AggregationSummary =
  | { type: 'labels'; added: Label[]; removed: Label[] }
  | { type: 'milestone'; from: Milestone | null; to: Milestone | null }
  | { type: 'state-change'; closed: boolean; reopened: boolean };

/**
 * One outgoing notice: the representative event of a (possibly merged)
 * aggregation and every delivery id that was folded into it.
 */
export interface Notification {
  kind: EventKind;

  /** Upstream action, a pseudo-action such as "x_labels_changed", or null. */
  action: string | null;

  event: HubEvent;

  aggregation: AggregationSummary | null;

  /** Present for push events only. */
  metrics: PushMetrics | null;

  subscriptionId: string;

  channelId: string;

  deliveryIds: string[];
}

/**
 * Result of a delivery. Sinks that deduplicate by delivery id report
 * skipped notifications here.
 */
export interface DeliveryResult {
  published: boolean;
  reason?: 'duplicate';
}

/**
 * The rendering/delivery collaborator. The core hands it every flushed
 * notification exactly once.
 */
export interface INotificationSink {
  deliver(notification: Notification): Promise<DeliveryResult | void>;

  /**
   * Optional: Clean up resources on shutdown
   */
  close?(): Promise<void>;
}
