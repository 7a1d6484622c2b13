export * from './events';
export type { Subscription, SubscriptionChanges, ISubscriptionStore } from './store';
export type { AggregationSummary, Notification, DeliveryResult, INotificationSink } from './notification';
export type { AggregationConfig, DispatcherConfig, DispatchStats } from './core';
