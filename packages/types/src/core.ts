import type { INotificationSink } from './notification';

/**
 * Aggregation configuration for the dispatcher.
 */
export interface AggregationConfig {
  /**
   * Coalescing window in milliseconds, restarted by every resetting merge.
   * A negative value disables aggregation. Default: 1000
   */
  timeoutMs?: number;
}

/**
 * Configuration for the core Dispatcher
 */
export interface DispatcherConfig {
  /** Delivery collaborator that receives flushed notifications */
  sink: INotificationSink;

  /** Coalescing options */
  aggregation?: AggregationConfig;
}

/**
 * Aggregation statistics for monitoring
 */
export interface DispatchStats {
  /** Events handed to the dispatcher */
  eventsReceived: number;

  /** Aggregations that entered the pending queue */
  aggregationsStarted: number;

  /** Events folded into an existing aggregation */
  merges: number;

  /** Notifications handed to the sink successfully */
  flushes: number;

  /** Current number of pending aggregations across all subscriptions */
  pendingAggregations: number;

  /** Last successful flush */
  lastFlushAt?: Date;

  /** Errors encountered */
  errorCount: number;
}
