export { Dispatcher, pushMetrics } from './dispatcher';
export type { DispatcherOptions, HandleOutcome, LifecycleChange, MutationFailureContext } from './dispatcher';
export { AggregationEngine } from './engine';
export type { AggregationEngineOptions, EngineErrorContext, EngineStats, SubmitOutcome } from './engine';
export { PendingAggregation, toNotification } from './pending';
export type { AggregationState } from './pending';
export { mergeInto, starterFor, summarize } from './policy';
export type { Accumulator, AggregationDraft, MergeOutcome, Starter } from './policy';
export { decodeWebhook, HEADERS } from './decoder';
export type { DecodedWebhook, RequestHeaders, SubscriptionDirectory, WebhookRequest } from './decoder';
export { computeSignature, verifySignature } from './signature';
export type { SignatureAlgorithm } from './signature';
export { deriveWebhookSecret, isUuid } from './secret';
export { SubscriptionRegistry } from './registry';
export { SerialLanes } from './lanes';
export {
  IntakeError,
  SubscriptionNotFoundError,
  MalformedRequestError,
  UnsupportedEventKindError,
  InvalidSignatureError,
  MalformedBodyError,
  PayloadSchemaMismatchError,
  DuplicateSubscriptionError,
} from './errors';
export type { IntakeErrorCode } from './errors';

// Re-export types consumers need
export type {
  AggregationConfig,
  DispatcherConfig,
  DispatchStats,
  HubEvent,
  INotificationSink,
  ISubscriptionStore,
  Notification,
  Subscription,
} from '@hubrelay/types';
